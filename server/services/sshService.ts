import ssh2 from 'ssh2';
import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import path from 'path';

export interface SSHConnectOptions {
  host: string;
  port: number;
  username: string;
  privateKey: string;
  readyTimeoutMs: number;
}

export interface ExecResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

type TransferCallback = (err?: Error | null) => void;

export interface RemoteEntry {
  filename: string;
  attrs: { mode: number; isDirectory(): boolean };
}

// The parts of an ssh2 SFTPWrapper the transfers use
export interface SftpSession {
  stat(path: string, callback: (err: Error | undefined, stats?: { isDirectory(): boolean }) => void): void;
  mkdir(path: string, callback: TransferCallback): void;
  fastPut(localPath: string, remotePath: string, options: { mode?: number }, callback: TransferCallback): void;
  fastGet(remotePath: string, localPath: string, options: { mode?: number }, callback: TransferCallback): void;
  readdir(path: string, callback: (err: Error | undefined, list: RemoteEntry[]) => void): void;
  end(): void;
}

export interface CommandStream extends EventEmitter {
  stderr: EventEmitter;
}

// The parts of an ssh2 Client the shell uses once connected
export interface ShellClient {
  exec(command: string, callback: (err: Error | undefined, stream: CommandStream) => void): void;
  end(): void;
}

/** The remote side of a deploy: command execution plus file transfer. */
export interface RemoteShell {
  exec(command: string): Promise<ExecResult>;
  upload(localPaths: string[], remoteDir: string): Promise<void>;
  downloadFile(remotePath: string, localDir: string): Promise<string>;
  downloadDirectory(remotePath: string, localDir: string): Promise<void>;
  close(): void;
}

export function describeSSHError(err: Error): string {
  if (err.message.includes('ECONNREFUSED')) {
    return 'Connection refused. Check if SSH service is running on the instance and security group allows port 22.';
  } else if (err.message.includes('ENOTFOUND')) {
    return 'Host not found. Check if the instance has a valid IP address.';
  } else if (err.message.includes('ETIMEDOUT') || err.message.includes('Timed out')) {
    return 'Connection timeout. Check security group settings and instance network configuration.';
  } else if (err.message.toLowerCase().includes('authentication')) {
    return 'Authentication failed. Verify the SSH key pair is correct for this instance.';
  }
  return `Connection failed: ${err.message}`;
}

function done(resolve: () => void, reject: (err: Error) => void) {
  return (err?: Error | null) => {
    if (err) {
      reject(err);
    } else {
      resolve();
    }
  };
}

class SSHService implements RemoteShell {
  private constructor(
    private readonly sshClient: ShellClient,
    private readonly sftp: SftpSession,
  ) {}

  static fromClient(sshClient: ShellClient, sftp: SftpSession): SSHService {
    return new SSHService(sshClient, sftp);
  }

  /**
   * Opens an SSH session and its SFTP channel. The host key is not checked
   * against any known_hosts store: every instance is new and short lived.
   */
  static connect(options: SSHConnectOptions): Promise<SSHService> {
    const sshClient = new ssh2.Client();

    return new Promise((resolve, reject) => {
      sshClient.on('ready', () => {
        console.log(`✅ SSH connection established to ${options.host}`);
        sshClient.sftp((err, sftp) => {
          if (err) {
            sshClient.end();
            reject(err);
            return;
          }
          resolve(new SSHService(sshClient, sftp));
        });
      });

      sshClient.on('error', (err) => {
        console.error(`❌ SSH connection error: ${describeSSHError(err)}`);
        reject(err);
      });

      sshClient.connect({
        host: options.host,
        port: options.port,
        username: options.username,
        privateKey: options.privateKey,
        readyTimeout: options.readyTimeoutMs,
        keepaliveInterval: 30000,
        keepaliveCountMax: 3,
      });
    });
  }

  exec(command: string): Promise<ExecResult> {
    return new Promise((resolve, reject) => {
      this.sshClient.exec(command, (err, stream) => {
        if (err) {
          reject(err);
          return;
        }

        let code: number | null = null;
        let stdout = '';
        let stderr = '';

        stream.on('data', (data: Buffer) => {
          stdout += data.toString();
        });
        stream.stderr.on('data', (data: Buffer) => {
          stderr += data.toString();
        });
        stream.on('exit', (exitCode: number | null) => {
          code = exitCode;
        });
        stream.on('close', () => {
          resolve({ code, stdout, stderr });
        });
      });
    });
  }

  async upload(localPaths: string[], remoteDir: string): Promise<void> {
    await this.ensureRemoteDir(remoteDir);

    for (const localPath of localPaths) {
      await this.uploadEntry(localPath, path.posix.join(remoteDir, path.basename(localPath)));
    }
  }

  async downloadFile(remotePath: string, localDir: string): Promise<string> {
    const localPath = path.join(localDir, path.posix.basename(remotePath));
    await this.fastGet(remotePath, localPath, {});
    return localPath;
  }

  async downloadDirectory(remotePath: string, localDir: string): Promise<void> {
    await fs.mkdir(localDir, { recursive: true });

    const entries = await this.readdir(remotePath);
    for (const entry of entries) {
      const remoteChild = path.posix.join(remotePath, entry.filename);
      const localChild = path.join(localDir, entry.filename);

      if (entry.isDirectory) {
        await this.downloadDirectory(remoteChild, localChild);
      } else {
        await this.fastGet(remoteChild, localChild, { mode: entry.mode & 0o777 });
      }
    }
  }

  close(): void {
    this.sftp.end();
    this.sshClient.end();
  }

  // ==========================================
  // SFTP HELPERS
  // ==========================================
  private async uploadEntry(localPath: string, remotePath: string): Promise<void> {
    const stats = await fs.stat(localPath);

    if (!stats.isDirectory()) {
      await this.fastPut(localPath, remotePath, { mode: stats.mode & 0o777 });
      return;
    }

    await this.ensureRemoteDir(remotePath);
    for (const child of await fs.readdir(localPath)) {
      await this.uploadEntry(path.join(localPath, child), path.posix.join(remotePath, child));
    }
  }

  private async ensureRemoteDir(remotePath: string): Promise<void> {
    const exists = await new Promise<boolean>((resolve) => {
      this.sftp.stat(remotePath, (err, stats) => resolve(!err && stats !== undefined && stats.isDirectory()));
    });
    if (exists) return;

    await new Promise<void>((resolve, reject) => {
      this.sftp.mkdir(remotePath, done(resolve, reject));
    });
  }

  // Carries the permission bits over, so executables stay executable
  private fastPut(localPath: string, remotePath: string, options: { mode?: number }): Promise<void> {
    return new Promise((resolve, reject) => {
      this.sftp.fastPut(localPath, remotePath, options, done(resolve, reject));
    });
  }

  private fastGet(remotePath: string, localPath: string, options: { mode?: number }): Promise<void> {
    return new Promise((resolve, reject) => {
      this.sftp.fastGet(remotePath, localPath, options, done(resolve, reject));
    });
  }

  private readdir(remotePath: string): Promise<{ filename: string; isDirectory: boolean; mode: number }[]> {
    return new Promise((resolve, reject) => {
      this.sftp.readdir(remotePath, (err, list) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(list.map(entry => ({
          filename: entry.filename,
          isDirectory: entry.attrs.isDirectory(),
          mode: entry.attrs.mode,
        })));
      });
    });
  }
}

export default SSHService;
