import axios from 'axios';
import { z } from 'zod';
import { StatusLogEntry, StatusResponse } from '../../src/types/aws.js';
import { TransientError } from '../utils/errors.js';

const statusSchema = z.object({
  logs: z.array(z.object({ time: z.string(), msg: z.string() })),
  done: z.boolean(),
});

export async function fetchStatus(host: string, port: number, timeoutMs: number): Promise<StatusResponse> {
  const url = `http://${host}:${port}/`;
  let body: unknown;

  try {
    const response = await axios.get<unknown>(url, { timeout: timeoutMs });
    body = response.data;
  } catch (error) {
    if (axios.isAxiosError(error)) {
      const reason = error.response ? `HTTP ${error.response.status}` : error.code || error.message;
      throw new TransientError('http', `Status endpoint ${url} unavailable: ${reason}`, { cause: error });
    }
    throw error;
  }

  const parsed = statusSchema.safeParse(body);
  if (!parsed.success) {
    throw new TransientError('parse', `Status endpoint ${url} returned an unexpected body: ${parsed.error.issues[0]?.message}`);
  }

  return parsed.data;
}

export function formatLogEntry(entry: StatusLogEntry): string {
  return `${entry.time}: ${entry.msg}`;
}

export interface LogBatch {
  entries: StatusLogEntry[];
  /** The endpoint returned fewer entries than were already printed. */
  regressed: boolean;
}

/**
 * Remembers how many entries of the remote log have been printed. The remote
 * log is append-only, so position is the only identity an entry has.
 */
export class LogCursor {
  private seen = 0;

  get count(): number {
    return this.seen;
  }

  take(logs: StatusLogEntry[]): LogBatch {
    if (logs.length < this.seen) {
      return { entries: [], regressed: true };
    }

    const entries = logs.slice(this.seen);
    this.seen = logs.length;
    return { entries, regressed: false };
  }
}
