export type TransientKind = 'connect' | 'http' | 'parse' | 'download';

/**
 * A failure that is expected while the instance is still coming up: polling
 * loops log it and try again on the next tick.
 */
export class TransientError extends Error {
  readonly kind: TransientKind;

  constructor(kind: TransientKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientError';
    this.kind = kind;
  }
}

export class PollTimeoutError extends Error {
  readonly elapsedMs: number;
  readonly attempts: number;
  readonly lastError?: TransientError;

  constructor(what: string, elapsedMs: number, attempts: number, lastError?: TransientError) {
    const last = lastError ? ` (last error: ${lastError.message})` : '';
    super(`${what} did not complete within ${Math.round(elapsedMs / 1000)} seconds after ${attempts} attempts${last}`);
    this.name = 'PollTimeoutError';
    this.elapsedMs = elapsedMs;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class CancelledError extends Error {
  constructor(message = 'Run cancelled by operator') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export interface TeardownFailure {
  step: 'terminate-instance' | 'delete-security-group' | 'delete-key-pair' | 'remove-key-file';
  error: unknown;
}

export class TeardownError extends Error {
  readonly failures: TeardownFailure[];

  constructor(failures: TeardownFailure[]) {
    super(`Teardown incomplete: ${failures.map(f => `${f.step} (${describeError(f.error)})`).join(', ')}`);
    this.name = 'TeardownError';
    this.failures = failures;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
