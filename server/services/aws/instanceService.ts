import {
  EC2Client,
  RunInstancesCommand,
  TerminateInstancesCommand,
  DescribeInstancesCommand,
  Instance,
  waitUntilInstanceRunning,
  waitUntilInstanceTerminated,
} from '@aws-sdk/client-ec2';
import { InstanceLaunchRequest } from '../../../src/types/aws.js';

export class InstanceService {
  constructor(private readonly ec2Client: EC2Client) {}

  // ==========================================
  // INSTANCE MANAGEMENT
  // ==========================================
  async launchInstance(request: InstanceLaunchRequest): Promise<string> {
    try {
      console.log(`🚀 Launching ${request.instanceType} instance with AMI: ${request.amiId}`);

      const tags = [{ Key: 'Name', Value: request.name }];
      Object.entries(request.tags).forEach(([key, value]) => {
        if (key !== 'Name') {
          tags.push({ Key: key, Value: value });
        }
      });

      const command = new RunInstancesCommand({
        ImageId: request.amiId,
        InstanceType: request.instanceType,
        InstanceInitiatedShutdownBehavior: request.shutdownBehavior,
        MinCount: 1,
        MaxCount: 1,
        KeyName: request.keyPairName,
        SecurityGroupIds: request.securityGroupIds,
        TagSpecifications: [
          {
            ResourceType: 'instance',
            Tags: tags,
          },
        ],
      });

      const response = await this.ec2Client.send(command);
      const instanceId = response.Instances?.[0]?.InstanceId;

      if (!instanceId) {
        throw new Error('Failed to launch instance - no instance returned');
      }

      console.log(`✅ Instance launched successfully: ${instanceId}`);
      return instanceId;
    } catch (error) {
      console.error('❌ Failed to launch instance:', error);
      throw error;
    }
  }

  async waitForRunning(instanceId: string, maxWaitMs: number, signal?: AbortSignal): Promise<void> {
    await waitUntilInstanceRunning(
      { client: this.ec2Client, maxWaitTime: Math.ceil(maxWaitMs / 1000), abortSignal: signal },
      { InstanceIds: [instanceId] },
    );
    console.log(`Instance ${instanceId} is now running`);
  }

  async getPublicIp(instanceId: string): Promise<string> {
    const instance = await this.getInstanceDetails(instanceId);

    if (!instance?.PublicIpAddress) {
      throw new Error(`Instance ${instanceId} has no public IP address`);
    }

    return instance.PublicIpAddress;
  }

  async terminateInstance(instanceId: string): Promise<void> {
    try {
      const command = new TerminateInstancesCommand({
        InstanceIds: [instanceId],
      });

      await this.ec2Client.send(command);
      console.log(`✅ Instance ${instanceId} termination initiated`);
    } catch (error) {
      console.error('❌ Failed to terminate instance:', error);
      throw error;
    }
  }

  async waitForTerminated(instanceId: string, maxWaitMs: number): Promise<void> {
    await waitUntilInstanceTerminated(
      { client: this.ec2Client, maxWaitTime: Math.ceil(maxWaitMs / 1000) },
      { InstanceIds: [instanceId] },
    );
    console.log(`Instance ${instanceId} terminated`);
  }

  async getInstanceDetails(instanceId: string): Promise<Instance | null> {
    const command = new DescribeInstancesCommand({
      InstanceIds: [instanceId],
    });

    const response = await this.ec2Client.send(command);
    const reservation = response.Reservations?.[0];
    return reservation?.Instances?.[0] || null;
  }
}
