#!/usr/bin/env node
import dotenv from 'dotenv';
import { createEC2Client, isAWSConfigured } from './config/aws.js';
import { loadLauncherConfig, LauncherConfig } from './config/launcher.js';
import { AWSCloudProvider } from './services/cloudProvider.js';
import SSHService from './services/sshService.js';
import { exitCodeFor, runLauncher } from './services/runner.js';
import { installSignalHandlers } from './utils/signals.js';
import { ConfigError } from './utils/errors.js';

// Load environment variables
dotenv.config();

async function main(): Promise<number> {
  let config: LauncherConfig;
  try {
    config = loadLauncherConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  }

  if (!isAWSConfigured()) {
    console.log('💡 AWS_ACCESS_KEY_ID not set, using the default AWS credential chain');
  }

  const controller = new AbortController();
  const removeSignalHandlers = installSignalHandlers(controller);

  try {
    const outcome = await runLauncher({
      config,
      cloud: new AWSCloudProvider(createEC2Client(config.region)),
      connectShell: options => SSHService.connect(options),
      workDir: process.cwd(),
      signal: controller.signal,
    });
    return exitCodeFor(outcome);
  } finally {
    removeSignalHandlers();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error('❌ Launcher crashed:', error);
    process.exit(1);
  });
