import {
  EC2Client,
  CreateSecurityGroupCommand,
  DeleteSecurityGroupCommand,
  AuthorizeSecurityGroupIngressCommand,
} from '@aws-sdk/client-ec2';
import { SecurityGroupRule } from '../../../src/types/aws.js';

export const OPEN_CIDR = '0.0.0.0/0';

/**
 * One TCP rule per port, open to every source. The instance is throwaway, so
 * the policy is deliberately broad.
 */
export function launchIngressRules(ports: number[]): SecurityGroupRule[] {
  return ports.map(port => ({
    protocol: 'tcp',
    fromPort: port,
    toPort: port,
    source: OPEN_CIDR,
  }));
}

export class SecurityGroupService {
  constructor(private readonly ec2Client: EC2Client) {}

  // ==========================================
  // SECURITY GROUP MANAGEMENT
  // ==========================================
  async createSecurityGroup(name: string, description: string): Promise<string> {
    try {
      const command = new CreateSecurityGroupCommand({
        GroupName: name,
        Description: description,
      });

      const response = await this.ec2Client.send(command);

      if (!response.GroupId) {
        throw new Error(`Security group ${name} was created without a group id`);
      }

      return response.GroupId;
    } catch (error) {
      console.error('❌ Failed to create security group in AWS:', error);
      throw error;
    }
  }

  async authorizeIngress(groupId: string, rules: SecurityGroupRule[]): Promise<void> {
    if (rules.length === 0) return;

    try {
      const command = new AuthorizeSecurityGroupIngressCommand({
        GroupId: groupId,
        IpPermissions: rules.map(rule => ({
          IpProtocol: rule.protocol,
          FromPort: rule.fromPort,
          ToPort: rule.toPort,
          IpRanges: [{ CidrIp: rule.source, Description: rule.description }],
        })),
      });

      await this.ec2Client.send(command);
      console.log(`✅ Authorized ${rules.length} ingress rules on ${groupId}`);
    } catch (error) {
      console.error('❌ Failed to authorize security group rules:', error);
      throw error;
    }
  }

  async deleteSecurityGroup(id: string): Promise<void> {
    try {
      const command = new DeleteSecurityGroupCommand({
        GroupId: id,
      });

      await this.ec2Client.send(command);
    } catch (error) {
      console.error('❌ Failed to delete security group from AWS:', error);
      throw error;
    }
  }
}
