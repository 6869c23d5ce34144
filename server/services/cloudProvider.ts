import { EC2Client } from '@aws-sdk/client-ec2';
import { InstanceLaunchRequest, SecurityGroupRule, SSHKeyPair } from '../../src/types/aws.js';
import { KeyPairService } from './aws/keyPairService.js';
import { SecurityGroupService } from './aws/securityGroupService.js';
import { InstanceService } from './aws/instanceService.js';

/** The provider operations one launch needs, in the order setup uses them. */
export interface CloudProvider {
  createKeyPair(name: string): Promise<SSHKeyPair>;
  createSecurityGroup(name: string, description: string): Promise<string>;
  authorizeIngress(groupId: string, rules: SecurityGroupRule[]): Promise<void>;
  launchInstance(request: InstanceLaunchRequest): Promise<string>;
  /** Stops waiting when `signal` aborts; the instance itself keeps starting. */
  waitForRunning(instanceId: string, maxWaitMs: number, signal?: AbortSignal): Promise<void>;
  getPublicIp(instanceId: string): Promise<string>;
  terminateInstance(instanceId: string): Promise<void>;
  waitForTerminated(instanceId: string, maxWaitMs: number): Promise<void>;
  deleteSecurityGroup(groupId: string): Promise<void>;
  deleteKeyPair(name: string): Promise<void>;
}

export class AWSCloudProvider implements CloudProvider {
  private readonly keyPairs: KeyPairService;
  private readonly securityGroups: SecurityGroupService;
  private readonly instances: InstanceService;

  constructor(ec2Client: EC2Client) {
    this.keyPairs = new KeyPairService(ec2Client);
    this.securityGroups = new SecurityGroupService(ec2Client);
    this.instances = new InstanceService(ec2Client);
  }

  createKeyPair(name: string): Promise<SSHKeyPair> {
    return this.keyPairs.createKeyPair(name);
  }

  createSecurityGroup(name: string, description: string): Promise<string> {
    return this.securityGroups.createSecurityGroup(name, description);
  }

  authorizeIngress(groupId: string, rules: SecurityGroupRule[]): Promise<void> {
    return this.securityGroups.authorizeIngress(groupId, rules);
  }

  launchInstance(request: InstanceLaunchRequest): Promise<string> {
    return this.instances.launchInstance(request);
  }

  waitForRunning(instanceId: string, maxWaitMs: number, signal?: AbortSignal): Promise<void> {
    return this.instances.waitForRunning(instanceId, maxWaitMs, signal);
  }

  getPublicIp(instanceId: string): Promise<string> {
    return this.instances.getPublicIp(instanceId);
  }

  terminateInstance(instanceId: string): Promise<void> {
    return this.instances.terminateInstance(instanceId);
  }

  waitForTerminated(instanceId: string, maxWaitMs: number): Promise<void> {
    return this.instances.waitForTerminated(instanceId, maxWaitMs);
  }

  deleteSecurityGroup(groupId: string): Promise<void> {
    return this.securityGroups.deleteSecurityGroup(groupId);
  }

  deleteKeyPair(name: string): Promise<void> {
    return this.keyPairs.deleteKeyPair(name);
  }
}
