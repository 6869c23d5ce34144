import { Session } from '../../src/types/aws.js';
import { CancelledError, describeError } from '../utils/errors.js';
import { throwIfCancelled } from '../utils/polling.js';
import {
  createSession,
  deploy,
  DeployReport,
  LaunchContext,
  runSteps,
  SETUP_STEPS,
  SetupStep,
  teardown,
} from './launcherService.js';

export type RunStatus = 'completed' | 'failed' | 'cancelled';

export interface RunOutcome {
  status: RunStatus;
  session: Session;
  report?: DeployReport;
  error?: unknown;
  teardownError?: unknown;
}

export interface RunOptions {
  now?: number;
  steps?: SetupStep[];
  deployStage?: (session: Session, ctx: LaunchContext) => Promise<DeployReport>;
}

/**
 * setup → deploy → teardown. Teardown runs exactly once on every path:
 * success, a failed stage, or cancellation through `ctx.signal`.
 */
export async function runLauncher(ctx: LaunchContext, options: RunOptions = {}): Promise<RunOutcome> {
  let session = createSession(ctx.config.sessionPrefix, ctx.workDir, options.now);
  let report: DeployReport | undefined;
  let error: unknown;

  console.log(`🚀 Session ${session.name}`);

  try {
    console.log('setting up');
    const setup = await runSteps(session, options.steps ?? SETUP_STEPS, ctx);
    session = setup.session;
    if (setup.error !== undefined) {
      throw setup.error;
    }

    throwIfCancelled(ctx.signal);
    console.log('deploying');
    report = await (options.deployStage ?? deploy)(session, ctx);
  } catch (err) {
    error = err;
    if (err instanceof CancelledError) {
      console.warn(`⚠️ ${err.message}`);
    } else {
      console.error(`Error - could not run: ${describeError(err)}`);
    }
  }

  console.log('tearing down');
  let teardownError: unknown;
  try {
    await teardown(session, ctx);
    console.log('✅ All resources released');
  } catch (err) {
    teardownError = err;
    console.error(`❌ ${describeError(err)}`);
  }

  return {
    status: runStatus(error, teardownError),
    session,
    report,
    error,
    teardownError,
  };
}

function runStatus(error: unknown, teardownError: unknown): RunStatus {
  if (error instanceof CancelledError) return 'cancelled';
  if (error !== undefined || teardownError !== undefined) return 'failed';
  return 'completed';
}

export function exitCodeFor(outcome: RunOutcome): number {
  switch (outcome.status) {
    case 'completed': return 0;
    case 'cancelled': return 130;
    case 'failed': return 1;
  }
}
