import { describe, it, expect, afterEach } from 'vitest';
import { fetchStatus, formatLogEntry, LogCursor } from '../services/statusService.js';
import { TransientError } from '../utils/errors.js';
import { startStatusServer, StatusServer, unusedPort } from './helpers.js';

describe('fetchStatus', () => {
  let server: StatusServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it('returns the parsed status body', async () => {
    server = await startStatusServer([{ logs: [{ time: '10:00:01', msg: 'started' }], done: false }]);

    const status = await fetchStatus('127.0.0.1', server.port, 1000);

    expect(status).toEqual({ logs: [{ time: '10:00:01', msg: 'started' }], done: false });
  });

  it('raises a parse error for an empty body', async () => {
    server = await startStatusServer([{ status: 200 }]);

    const error = await fetchStatus('127.0.0.1', server.port, 1000).catch((e: unknown) => e);

    expect(error instanceof TransientError && error.kind).toBe('parse');
  });

  it('raises a parse error for a body that is not JSON', async () => {
    server = await startStatusServer(['garbage']);

    const error = await fetchStatus('127.0.0.1', server.port, 1000).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientError);
    expect(error instanceof TransientError && error.kind).toBe('parse');
  });

  it('raises a parse error for JSON of the wrong shape', async () => {
    server = await startStatusServer([{ raw: '{"logs":"none","done":false}' }]);

    const error = await fetchStatus('127.0.0.1', server.port, 1000).catch((e: unknown) => e);

    expect(error instanceof TransientError && error.kind).toBe('parse');
  });

  it('raises an http error for a failing status code', async () => {
    server = await startStatusServer([{ status: 503 }]);

    const error = await fetchStatus('127.0.0.1', server.port, 1000).catch((e: unknown) => e);

    expect(error instanceof TransientError && error.kind).toBe('http');
    expect(error instanceof Error && error.message).toBe(
      `Status endpoint http://127.0.0.1:${server.port}/ unavailable: HTTP 503`,
    );
  });

  it('raises an http error when nothing is listening', async () => {
    const port = await unusedPort();

    const error = await fetchStatus('127.0.0.1', port, 1000).catch((e: unknown) => e);

    expect(error instanceof TransientError && error.kind).toBe('http');
    expect(error instanceof Error && error.message).toBe(
      `Status endpoint http://127.0.0.1:${port}/ unavailable: ECONNREFUSED`,
    );
  });
});

describe('LogCursor', () => {
  const a = { time: 't1', msg: 'a' };
  const b = { time: 't2', msg: 'b' };

  it('hands out only entries not seen before', () => {
    const cursor = new LogCursor();

    expect(cursor.take([a])).toEqual({ entries: [a], regressed: false });
    expect(cursor.take([a, b])).toEqual({ entries: [b], regressed: false });
    expect(cursor.take([a, b])).toEqual({ entries: [], regressed: false });
    expect(cursor.count).toBe(2);
  });

  it('reports a shrinking log without reprinting', () => {
    const cursor = new LogCursor();
    cursor.take([a, b]);

    expect(cursor.take([a])).toEqual({ entries: [], regressed: true });
    expect(cursor.count).toBe(2);
    expect(cursor.take([a, b])).toEqual({ entries: [], regressed: false });
  });
});

describe('formatLogEntry', () => {
  it('prints time and message', () => {
    expect(formatLogEntry({ time: '2024-01-01 10:00', msg: 'hazard curves done' })).toBe('2024-01-01 10:00: hazard curves done');
  });
});
