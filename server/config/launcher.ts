import { _InstanceType } from '@aws-sdk/client-ec2';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import type { PollPolicy } from '../utils/polling.js';

export interface LauncherConfig {
  region: string;
  imageId: string;
  instanceType: _InstanceType;
  sessionPrefix: string;
  securityGroupDescription: string;
  sshUser: string;
  sshPort: number;
  sshReadyTimeoutMs: number;
  probeTimeoutMs: number;
  statusPort: number;
  statusRequestTimeoutMs: number;
  uploadPaths: string[];
  remoteDir: string;
  startCommand: string;
  remoteLogPath: string;
  remoteResultsDir: string;
  resultsDirPrefix: string;
  instanceWaitTimeoutMs: number;
  sshPolicy: PollPolicy;
  statusPolicy: PollPolicy;
}

const positiveInt = z.coerce.number().int().positive();
const port = z.coerce.number().int().min(1).max(65535);
const backoff = z.coerce.number().min(1).max(10);

const pathList = z
  .string()
  .transform(value => value.split(',').map(entry => entry.trim()).filter(Boolean))
  .pipe(z.array(z.string()).min(1));

const envSchema = z.object({
  AWS_REGION: z.string().min(1).default('us-east-1'),
  LAUNCHER_IMAGE_ID: z.string().regex(/^ami-[0-9a-f]+$/, 'must look like ami-xxxxxxxx').default('ami-6c14310f'),
  LAUNCHER_INSTANCE_TYPE: z.nativeEnum(_InstanceType).default('t2.micro'),
  LAUNCHER_SESSION_PREFIX: z.string().regex(/^[A-Za-z0-9-]+$/, 'letters, digits and dashes only').default('openquake'),
  LAUNCHER_SSH_USER: z.string().min(1).default('ubuntu'),
  LAUNCHER_SSH_PORT: port.default(22),
  LAUNCHER_SSH_READY_TIMEOUT_MS: positiveInt.default(30000),
  LAUNCHER_PROBE_TIMEOUT_MS: positiveInt.default(1000),
  LAUNCHER_STATUS_PORT: port.default(8080),
  LAUNCHER_STATUS_REQUEST_TIMEOUT_MS: positiveInt.default(5000),
  LAUNCHER_UPLOAD_PATHS: pathList.default('master_script.sh,webserver.py,openquake'),
  LAUNCHER_REMOTE_DIR: z.string().startsWith('/').default('/tmp/'),
  LAUNCHER_START_SCRIPT: z.string().min(1).default('master_script.sh'),
  LAUNCHER_REMOTE_LOG: z.string().startsWith('/').default('/tmp/aws_log.log'),
  LAUNCHER_RESULTS_DIR: z.string().startsWith('/').default('/home/ubuntu/oqdata'),
  LAUNCHER_RESULTS_PREFIX: z.string().min(1).default('oqdata'),
  LAUNCHER_INSTANCE_WAIT_TIMEOUT_MS: positiveInt.min(30000).default(600000),
  LAUNCHER_SSH_POLL_INTERVAL_MS: positiveInt.default(1000),
  LAUNCHER_SSH_POLL_MAX_INTERVAL_MS: positiveInt.default(10000),
  LAUNCHER_SSH_POLL_BACKOFF: backoff.default(1.5),
  LAUNCHER_SSH_POLL_TIMEOUT_MS: positiveInt.default(600000),
  LAUNCHER_STATUS_POLL_INTERVAL_MS: positiveInt.default(1000),
  LAUNCHER_STATUS_POLL_MAX_INTERVAL_MS: positiveInt.default(10000),
  LAUNCHER_STATUS_POLL_BACKOFF: backoff.default(1),
  LAUNCHER_STATUS_POLL_TIMEOUT_MS: positiveInt.default(43200000),
}).refine(env => env.LAUNCHER_SSH_PORT !== env.LAUNCHER_STATUS_PORT, {
  message: 'must differ from LAUNCHER_SSH_PORT',
  path: ['LAUNCHER_STATUS_PORT'],
});

type LauncherEnv = z.infer<typeof envSchema>;

function remoteLogName(remoteLogPath: string): string {
  return remoteLogPath.slice(remoteLogPath.lastIndexOf('/') + 1);
}

export function buildStartCommand(remoteDir: string, script: string, logName: string): string {
  return `cd ${remoteDir}; chmod +x ${script}; nohup ./${script} > ${logName} 2>&1 &`;
}

function toConfig(env: LauncherEnv): LauncherConfig {
  return {
    region: env.AWS_REGION,
    imageId: env.LAUNCHER_IMAGE_ID,
    instanceType: env.LAUNCHER_INSTANCE_TYPE,
    sessionPrefix: env.LAUNCHER_SESSION_PREFIX,
    securityGroupDescription: env.LAUNCHER_SESSION_PREFIX,
    sshUser: env.LAUNCHER_SSH_USER,
    sshPort: env.LAUNCHER_SSH_PORT,
    sshReadyTimeoutMs: env.LAUNCHER_SSH_READY_TIMEOUT_MS,
    probeTimeoutMs: env.LAUNCHER_PROBE_TIMEOUT_MS,
    statusPort: env.LAUNCHER_STATUS_PORT,
    statusRequestTimeoutMs: env.LAUNCHER_STATUS_REQUEST_TIMEOUT_MS,
    uploadPaths: env.LAUNCHER_UPLOAD_PATHS,
    remoteDir: env.LAUNCHER_REMOTE_DIR,
    startCommand: buildStartCommand(
      env.LAUNCHER_REMOTE_DIR,
      env.LAUNCHER_START_SCRIPT,
      remoteLogName(env.LAUNCHER_REMOTE_LOG),
    ),
    remoteLogPath: env.LAUNCHER_REMOTE_LOG,
    remoteResultsDir: env.LAUNCHER_RESULTS_DIR,
    resultsDirPrefix: env.LAUNCHER_RESULTS_PREFIX,
    instanceWaitTimeoutMs: env.LAUNCHER_INSTANCE_WAIT_TIMEOUT_MS,
    sshPolicy: {
      intervalMs: env.LAUNCHER_SSH_POLL_INTERVAL_MS,
      maxIntervalMs: env.LAUNCHER_SSH_POLL_MAX_INTERVAL_MS,
      backoffFactor: env.LAUNCHER_SSH_POLL_BACKOFF,
      timeoutMs: env.LAUNCHER_SSH_POLL_TIMEOUT_MS,
    },
    statusPolicy: {
      intervalMs: env.LAUNCHER_STATUS_POLL_INTERVAL_MS,
      maxIntervalMs: env.LAUNCHER_STATUS_POLL_MAX_INTERVAL_MS,
      backoffFactor: env.LAUNCHER_STATUS_POLL_BACKOFF,
      timeoutMs: env.LAUNCHER_STATUS_POLL_TIMEOUT_MS,
    },
  };
}

/**
 * Reads the launcher settings from the environment. Empty strings count as
 * unset so a copied .env.example with blank lines still gets the defaults.
 */
export function loadLauncherConfig(env: NodeJS.ProcessEnv = process.env): LauncherConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }

  return Object.freeze(toConfig(parsed.data));
}
