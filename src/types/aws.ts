import type { _InstanceType } from '@aws-sdk/client-ec2';

export interface SecurityGroupRule {
  protocol: 'tcp' | 'udp' | 'icmp' | '-1';
  fromPort: number;
  toPort: number;
  source: string;
  description?: string;
}

export interface SSHKeyPair {
  id: string;
  name: string;
  /** Missing only if the provider created the pair without returning its material. */
  privateKey?: string;
}

export interface InstanceLaunchRequest {
  name: string;
  amiId: string;
  instanceType: _InstanceType;
  keyPairName: string;
  securityGroupIds: string[];
  shutdownBehavior: 'stop' | 'terminate';
  tags: Record<string, string>;
}

/**
 * Everything one run has provisioned so far. Each setup step returns a new
 * record with one more resource filled in, so whatever is present is exactly
 * what teardown has to release.
 */
export interface Session {
  name: string;
  keyFile: string;
  keyPairName?: string;
  securityGroupId?: string;
  instanceId?: string;
  publicIp?: string;
}

export interface StatusLogEntry {
  time: string;
  msg: string;
}

export interface StatusResponse {
  logs: StatusLogEntry[];
  done: boolean;
}
