import {
  EC2Client,
  CreateKeyPairCommand,
  DeleteKeyPairCommand,
} from '@aws-sdk/client-ec2';
import { SSHKeyPair } from '../../../src/types/aws.js';

export class KeyPairService {
  constructor(private readonly ec2Client: EC2Client) {}

  // ==========================================
  // KEY PAIR MANAGEMENT
  // ==========================================
  async createKeyPair(name: string): Promise<SSHKeyPair> {
    try {
      const command = new CreateKeyPairCommand({
        KeyName: name,
        KeyType: 'rsa',
        KeyFormat: 'pem',
      });

      const response = await this.ec2Client.send(command);

      return {
        id: response.KeyPairId || name,
        name: response.KeyName || name,
        privateKey: response.KeyMaterial,
      };
    } catch (error) {
      console.error('❌ Failed to create key pair in AWS:', error);
      throw error;
    }
  }

  async deleteKeyPair(keyName: string): Promise<void> {
    try {
      const command = new DeleteKeyPairCommand({
        KeyName: keyName,
      });

      await this.ec2Client.send(command);
    } catch (error) {
      console.error('❌ Failed to delete key pair from AWS:', error);
      throw error;
    }
  }
}
