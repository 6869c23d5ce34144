import { EC2Client, type EC2ClientConfig } from '@aws-sdk/client-ec2';

// AWS Configuration
export const getAWSConfig = (region: string): EC2ClientConfig => {
  const config: EC2ClientConfig = { region };

  // Explicit keys win; otherwise the SDK walks its default chain (profile, SSO, instance role)
  if (process.env.AWS_ACCESS_KEY_ID && process.env.AWS_SECRET_ACCESS_KEY) {
    config.credentials = {
      accessKeyId: process.env.AWS_ACCESS_KEY_ID,
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY,
      sessionToken: process.env.AWS_SESSION_TOKEN || undefined,
    };
  }

  return config;
};

export const createEC2Client = (region: string): EC2Client => {
  return new EC2Client(getAWSConfig(region));
};

// Check if explicit credentials are configured
export const isAWSConfigured = (): boolean => {
  return !!(process.env.AWS_ACCESS_KEY_ID && process.env.AWS_SECRET_ACCESS_KEY);
};
