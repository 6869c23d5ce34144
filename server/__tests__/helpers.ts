/**
 * Shared fakes for the launcher tests: an in-memory cloud provider, an
 * in-memory remote shell and an in-process status endpoint.
 */

import http from 'http';
import path from 'path';
import { InstanceLaunchRequest, SecurityGroupRule, SSHKeyPair, StatusResponse } from '../../src/types/aws.js';
import { loadLauncherConfig, LauncherConfig } from '../config/launcher.js';
import { CloudProvider } from '../services/cloudProvider.js';
import { ExecResult, RemoteShell } from '../services/sshService.js';
import { PollPolicy } from '../utils/polling.js';

export const FAST_POLICY: PollPolicy = {
  intervalMs: 5,
  maxIntervalMs: 5,
  backoffFactor: 1,
  timeoutMs: 2000,
};

export function testConfig(overrides: Partial<LauncherConfig> = {}): LauncherConfig {
  return {
    ...loadLauncherConfig({}),
    sshPolicy: FAST_POLICY,
    statusPolicy: FAST_POLICY,
    statusRequestTimeoutMs: 1000,
    ...overrides,
  };
}

export type CloudOperation =
  | 'createKeyPair'
  | 'createSecurityGroup'
  | 'authorizeIngress'
  | 'launchInstance'
  | 'waitForRunning'
  | 'getPublicIp'
  | 'terminateInstance'
  | 'waitForTerminated'
  | 'deleteSecurityGroup'
  | 'deleteKeyPair';

export class FakeCloud implements CloudProvider {
  readonly calls: string[] = [];
  readonly failOn = new Map<CloudOperation, Error>();
  readonly ingress: SecurityGroupRule[] = [];
  launchRequest?: InstanceLaunchRequest;
  publicIp = '127.0.0.1';
  privateKey: string | undefined = 'test-private-key';
  /** Keep waitForRunning pending until its signal aborts. */
  holdRunning = false;

  private record(operation: CloudOperation, arg: string): void {
    this.calls.push(`${operation}:${arg}`);
    const failure = this.failOn.get(operation);
    if (failure) throw failure;
  }

  async createKeyPair(name: string): Promise<SSHKeyPair> {
    this.record('createKeyPair', name);
    return { id: 'key-0001', name, privateKey: this.privateKey };
  }

  async createSecurityGroup(name: string): Promise<string> {
    this.record('createSecurityGroup', name);
    return 'sg-0001';
  }

  async authorizeIngress(groupId: string, rules: SecurityGroupRule[]): Promise<void> {
    this.record('authorizeIngress', groupId);
    this.ingress.push(...rules);
  }

  async launchInstance(request: InstanceLaunchRequest): Promise<string> {
    this.record('launchInstance', request.name);
    this.launchRequest = request;
    return 'i-0001';
  }

  async waitForRunning(instanceId: string, _maxWaitMs: number, signal?: AbortSignal): Promise<void> {
    this.record('waitForRunning', instanceId);
    if (!this.holdRunning) return;

    await new Promise<void>((_resolve, reject) => {
      const abort = () => reject(new Error('Request was aborted'));
      if (signal?.aborted) abort();
      signal?.addEventListener('abort', abort, { once: true });
    });
  }

  async getPublicIp(instanceId: string): Promise<string> {
    this.record('getPublicIp', instanceId);
    return this.publicIp;
  }

  async terminateInstance(instanceId: string): Promise<void> {
    this.record('terminateInstance', instanceId);
  }

  async waitForTerminated(instanceId: string): Promise<void> {
    this.record('waitForTerminated', instanceId);
  }

  async deleteSecurityGroup(groupId: string): Promise<void> {
    this.record('deleteSecurityGroup', groupId);
  }

  async deleteKeyPair(name: string): Promise<void> {
    this.record('deleteKeyPair', name);
  }
}

export class FakeShell implements RemoteShell {
  readonly uploads: { localPaths: string[]; remoteDir: string }[] = [];
  readonly commands: string[] = [];
  readonly fileDownloads: string[] = [];
  readonly directoryDownloads: { remotePath: string; localDir: string }[] = [];
  resultsFailure?: Error;
  logFailure?: Error;
  execResult: ExecResult = { code: 0, stdout: '', stderr: '' };
  closed = false;

  async exec(command: string): Promise<ExecResult> {
    this.commands.push(command);
    return this.execResult;
  }

  async upload(localPaths: string[], remoteDir: string): Promise<void> {
    this.uploads.push({ localPaths, remoteDir });
  }

  async downloadFile(remotePath: string, localDir: string): Promise<string> {
    this.fileDownloads.push(remotePath);
    if (this.logFailure) throw this.logFailure;
    return path.join(localDir, path.posix.basename(remotePath));
  }

  async downloadDirectory(remotePath: string, localDir: string): Promise<void> {
    this.directoryDownloads.push({ remotePath, localDir });
    if (this.resultsFailure) throw this.resultsFailure;
  }

  close(): void {
    this.closed = true;
  }
}

/** One scripted reply: a status body, a dropped connection, non-JSON text, a bare status code or raw JSON text. */
export type StatusReply = StatusResponse | 'drop' | 'garbage' | { status: number } | { raw: string };

export interface StatusServer {
  port: number;
  requests: () => number;
  close: () => Promise<void>;
}

// Replies are served in order; the last one repeats
export async function startStatusServer(replies: StatusReply[]): Promise<StatusServer> {
  let count = 0;

  const server = http.createServer((req, res) => {
    const reply = replies[Math.min(count, replies.length - 1)];
    count++;

    if (reply === 'drop') {
      req.socket.destroy();
      return;
    }
    if (reply === 'garbage') {
      res.writeHead(200, { 'Content-Type': 'text/plain' });
      res.end('not json');
      return;
    }
    if ('status' in reply) {
      res.writeHead(reply.status);
      res.end();
      return;
    }
    if ('raw' in reply) {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(reply.raw);
      return;
    }
    res.writeHead(200, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(reply));
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('status server did not bind to a TCP port');
  }

  return {
    port: address.port,
    requests: () => count,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

export async function unusedPort(): Promise<number> {
  const server = http.createServer();
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('server did not bind to a TCP port');
  }
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return address.port;
}
