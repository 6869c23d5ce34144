import { promises as fs } from 'fs';
import path from 'path';
import { Session } from '../../src/types/aws.js';
import { LauncherConfig } from '../config/launcher.js';
import { CloudProvider } from './cloudProvider.js';
import { launchIngressRules } from './aws/securityGroupService.js';
import { RemoteShell, SSHConnectOptions } from './sshService.js';
import { fetchStatus, formatLogEntry, LogCursor } from './statusService.js';
import { pollUntil, throwIfCancelled } from '../utils/polling.js';
import { removePrivateKey, tcpCheck, waitForPort, writePrivateKey } from '../utils/sshUtils.js';
import {
  CancelledError,
  describeError,
  TeardownError,
  TeardownFailure,
  TransientError,
} from '../utils/errors.js';

export interface LaunchContext {
  config: LauncherConfig;
  cloud: CloudProvider;
  connectShell: (options: SSHConnectOptions) => Promise<RemoteShell>;
  /** Directory holding the upload sources; key file, log and results are written here too. */
  workDir: string;
  signal?: AbortSignal;
  print?: (line: string) => void;
  onTransient?: (error: TransientError, attempt: number) => void;
  probe?: typeof tcpCheck;
}

export function logTransient(error: TransientError, attempt: number): void {
  console.warn(`⚠️ [${error.kind}] attempt ${attempt}: ${error.message}`);
}

export function createSession(prefix: string, workDir: string, now: number = Date.now()): Session {
  const name = `${prefix}-${Math.floor(now / 1000)}`;
  return {
    name,
    keyFile: path.join(workDir, `${name}.pem`),
  };
}

// ==========================================
// SETUP
// ==========================================

/**
 * Thrown by a setup step that created a resource and then failed. Carries the
 * session including that resource so teardown can still release it.
 */
export class StepFailure extends Error {
  readonly session: Session;

  constructor(session: Session, cause: unknown) {
    super(describeError(cause), { cause });
    this.name = 'StepFailure';
    this.session = session;
  }
}

export type SetupStep = (session: Session, ctx: LaunchContext) => Promise<Session>;

export const createKeyPairStep: SetupStep = async (session, ctx) => {
  console.log('- creating SSH keypair');
  const keyPair = await ctx.cloud.createKeyPair(session.name);
  const next: Session = { ...session, keyPairName: keyPair.name };

  if (!keyPair.privateKey) {
    throw new StepFailure(next, new Error(`Key pair ${keyPair.name} was created without private key material`));
  }
  try {
    await writePrivateKey(session.keyFile, keyPair.privateKey);
  } catch (error) {
    throw new StepFailure(next, error);
  }
  return next;
};

export const createSecurityGroupStep: SetupStep = async (session, ctx) => {
  const { config } = ctx;
  console.log('- creating security group');
  const groupId = await ctx.cloud.createSecurityGroup(session.name, config.securityGroupDescription);
  const next: Session = { ...session, securityGroupId: groupId };

  try {
    await ctx.cloud.authorizeIngress(groupId, launchIngressRules([config.sshPort, config.statusPort]));
  } catch (error) {
    throw new StepFailure(next, error);
  }
  return next;
};

export const launchInstanceStep: SetupStep = async (session, ctx) => {
  const { config } = ctx;
  if (!session.keyPairName || !session.securityGroupId) {
    throw new Error('Cannot launch instance before the key pair and security group exist');
  }

  console.log('- launching instance');
  const instanceId = await ctx.cloud.launchInstance({
    name: session.name,
    amiId: config.imageId,
    instanceType: config.instanceType,
    keyPairName: session.keyPairName,
    securityGroupIds: [session.securityGroupId],
    shutdownBehavior: 'terminate',
    tags: { Session: session.name },
  });
  const launched: Session = { ...session, instanceId };

  try {
    await ctx.cloud.waitForRunning(instanceId, config.instanceWaitTimeoutMs, ctx.signal);
    const publicIp = await ctx.cloud.getPublicIp(instanceId);
    console.log(`- launched: ${publicIp}`);
    return { ...launched, publicIp };
  } catch (error) {
    throw new StepFailure(launched, ctx.signal?.aborted ? new CancelledError() : error);
  }
};

export const SETUP_STEPS: SetupStep[] = [createKeyPairStep, createSecurityGroupStep, launchInstanceStep];

export interface StepsResult {
  session: Session;
  error?: unknown;
}

// Never throws: the last session reached is needed for teardown either way
export async function runSteps(session: Session, steps: SetupStep[], ctx: LaunchContext): Promise<StepsResult> {
  let current = session;

  for (const step of steps) {
    try {
      throwIfCancelled(ctx.signal);
      current = await step(current, ctx);
    } catch (error) {
      if (error instanceof StepFailure) {
        return { session: error.session, error: error.cause };
      }
      return { session: current, error };
    }
  }

  return { session: current };
}

// ==========================================
// DEPLOY
// ==========================================
export interface DeployReport {
  logLines: number;
  resultsDir?: string;
}

export function resultsDirFor(session: Session, ctx: LaunchContext): string {
  return path.join(ctx.workDir, `${ctx.config.resultsDirPrefix}-${session.name}`);
}

async function pollWorkload(host: string, shell: RemoteShell, ctx: LaunchContext): Promise<number> {
  const { config } = ctx;
  const cursor = new LogCursor();
  const print = ctx.print ?? ((line: string) => console.log(line));
  const onTransient = ctx.onTransient ?? logTransient;

  return pollUntil<number>(
    async (attempt) => {
      let finished = false;
      let failure: TransientError | undefined;

      try {
        const status = await fetchStatus(host, config.statusPort, config.statusRequestTimeoutMs);
        const batch = cursor.take(status.logs);
        if (batch.regressed) {
          console.warn(`⚠️ Status endpoint returned ${status.logs.length} entries after ${cursor.count} were printed; ignoring`);
        }
        batch.entries.forEach(entry => print(formatLogEntry(entry)));
        finished = status.done;
      } catch (error) {
        if (!(error instanceof TransientError)) throw error;
        failure = error;
      }

      // The log file appears as soon as the start command runs; until then this fails
      try {
        await shell.downloadFile(config.remoteLogPath, ctx.workDir);
      } catch (error) {
        onTransient(new TransientError('download', `Could not fetch ${config.remoteLogPath}: ${describeError(error)}`, { cause: error }), attempt);
      }

      if (failure) throw failure;
      return finished ? { done: true, value: cursor.count } : { done: false };
    },
    config.statusPolicy,
    { label: 'Workload', signal: ctx.signal, onTransient, delayFirst: true },
  );
}

export async function deploy(session: Session, ctx: LaunchContext): Promise<DeployReport> {
  const { config } = ctx;
  const host = session.publicIp;
  if (!host) {
    throw new Error(`Session ${session.name} has no instance address to deploy to`);
  }

  console.log('- polling SSH until successful connection');
  await waitForPort(host, config.sshPort, config.sshPolicy, {
    probeTimeoutMs: config.probeTimeoutMs,
    signal: ctx.signal,
    onTransient: ctx.onTransient ?? logTransient,
    probe: ctx.probe,
  });

  console.log(`- connecting to instance via SSH (ssh -i ${session.keyFile} ${config.sshUser}@${host})`);
  const privateKey = await fs.readFile(session.keyFile, 'utf8');
  const shell = await ctx.connectShell({
    host,
    port: config.sshPort,
    username: config.sshUser,
    privateKey,
    readyTimeoutMs: config.sshReadyTimeoutMs,
  });

  try {
    console.log('- copying files to instance');
    await shell.upload(config.uploadPaths.map(entry => path.resolve(ctx.workDir, entry)), config.remoteDir);

    console.log('- executing script on instance');
    const started = await shell.exec(config.startCommand);
    if (started.code !== null && started.code !== 0) {
      throw new Error(`Start command exited with code ${started.code}: ${started.stderr.trim()}`);
    }

    const logName = path.posix.basename(config.remoteLogPath);
    console.log(`- polling instance for logs (run 'tail -f ${logName}' to get running output)`);
    const logLines = await pollWorkload(host, shell, ctx);

    console.log('downloading results');
    const resultsDir = resultsDirFor(session, ctx);
    try {
      await shell.downloadDirectory(config.remoteResultsDir, resultsDir);
      console.log(`✅ Results saved to ${resultsDir}`);
      return { logLines, resultsDir };
    } catch (error) {
      console.error(`Error - could not download results: ${describeError(error)}`);
      console.error(`Check ${logName} for logs of EC2 instance.`);
      return { logLines };
    }
  } finally {
    shell.close();
  }
}

// ==========================================
// TEARDOWN
// ==========================================

/**
 * Releases whatever the session holds: instance, then security group (it
 * cannot be deleted while attached), then key pair and key file. Resources
 * never created are skipped. Ignores cancellation.
 */
export async function teardown(session: Session, ctx: LaunchContext): Promise<void> {
  const { cloud, config } = ctx;
  const failures: TeardownFailure[] = [];
  let instanceGone = true;

  if (session.instanceId) {
    console.log('- terminating instance');
    try {
      await cloud.terminateInstance(session.instanceId);
      await cloud.waitForTerminated(session.instanceId, config.instanceWaitTimeoutMs);
    } catch (error) {
      instanceGone = false;
      console.error(`❌ Could not terminate instance ${session.instanceId}: ${describeError(error)}`);
      failures.push({ step: 'terminate-instance', error });
    }
  }

  if (session.securityGroupId) {
    if (!instanceGone) {
      console.warn(`⚠️ Leaving security group ${session.securityGroupId}: instance is still attached`);
      failures.push({
        step: 'delete-security-group',
        error: new Error(`skipped while instance ${session.instanceId} is not terminated`),
      });
    } else {
      console.log('- deleting security group');
      try {
        await cloud.deleteSecurityGroup(session.securityGroupId);
      } catch (error) {
        console.error(`❌ Could not delete security group ${session.securityGroupId}: ${describeError(error)}`);
        failures.push({ step: 'delete-security-group', error });
      }
    }
  }

  if (session.keyPairName) {
    console.log('- deleting SSH key');
    try {
      await cloud.deleteKeyPair(session.keyPairName);
    } catch (error) {
      console.error(`❌ Could not delete key pair ${session.keyPairName}: ${describeError(error)}`);
      failures.push({ step: 'delete-key-pair', error });
    }
  }

  try {
    await removePrivateKey(session.keyFile);
  } catch (error) {
    console.error(`❌ Could not remove ${session.keyFile}: ${describeError(error)}`);
    failures.push({ step: 'remove-key-file', error });
  }

  if (failures.length > 0) {
    throw new TeardownError(failures);
  }
}
