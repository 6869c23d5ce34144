import { connect } from 'net';
import { promises as fs } from 'fs';
import { TransientError } from './errors.js';
import { pollUntil, PollPolicy } from './polling.js';

/**
 * Probe whether a TCP port accepts connections. Resolves false on refusal,
 * error or when `timeoutMs` passes without a connection.
 */
export function tcpCheck(host: string, port: number, timeoutMs = 1000): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = connect({ host, port });
    const timer = setTimeout(() => {
      socket.destroy();
      resolve(false);
    }, timeoutMs);
    socket.on('connect', () => {
      clearTimeout(timer);
      socket.destroy();
      resolve(true);
    });
    socket.on('error', () => {
      clearTimeout(timer);
      socket.destroy();
      resolve(false);
    });
  });
}

export interface WaitForPortOptions {
  probeTimeoutMs?: number;
  signal?: AbortSignal;
  onTransient?: (error: TransientError, attempt: number) => void;
  probe?: typeof tcpCheck;
}

// Resolves only after one probe has connected
export async function waitForPort(
  host: string,
  port: number,
  policy: PollPolicy,
  options: WaitForPortOptions = {},
): Promise<number> {
  const probe = options.probe ?? tcpCheck;

  return pollUntil(
    async (attempt) => {
      if (await probe(host, port, options.probeTimeoutMs ?? 1000)) {
        return { done: true, value: attempt };
      }
      throw new TransientError('connect', `${host}:${port} is not accepting connections yet`);
    },
    policy,
    { label: `Port ${port} on ${host}`, signal: options.signal, onTransient: options.onTransient },
  );
}

// ==========================================
// PRIVATE KEY FILES
// ==========================================
export async function writePrivateKey(filePath: string, material: string): Promise<void> {
  await fs.writeFile(filePath, material, { mode: 0o600 });
  // writeFile only applies the mode when it creates the file
  await fs.chmod(filePath, 0o600);
}

export async function removePrivateKey(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}
