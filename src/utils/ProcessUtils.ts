import { ChildProcess } from 'child_process';
import { StringDecoder } from 'string_decoder';
import kill from 'tree-kill';
import crossSpawn from 'cross-spawn';
import { ProcessTimeoutError, ToolNotFoundError } from '../types/Errors';
import { logger } from './Logger';

export interface ProcessOptions {
  cwd?: string;
  shell?: boolean;
  /** Kill the process tree and reject once this elapses. */
  timeoutMs?: number;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/** How long a closed stream's process gets to exit on SIGTERM before SIGKILL. */
export const KILL_GRACE_MS = 2000;

function isMissingBinary(error: Error): boolean {
  return 'code' in error && error.code === 'ENOENT';
}

/**
 * Lines of combined stdout/stderr from one spawned process.
 *
 * Iterate it with `for await`; leaving the loop early (or calling `close()`)
 * kills the whole process tree. The sequence ends when the process exits and
 * throws `ToolNotFoundError` if the binary could not be spawned.
 */
export class LineStream implements AsyncIterable<string> {
  private readonly lines: string[] = [];
  private readonly decoders = {
    stdout: new StringDecoder('utf8'),
    stderr: new StringDecoder('utf8'),
  };
  private readonly partial = { stdout: '', stderr: '' };
  private waiting: (() => void) | null = null;
  private ended = false;
  private exitCode = 1;
  private failure: Error | null = null;
  private readonly done: Promise<void>;

  constructor(
    private readonly child: ChildProcess,
    private readonly command: string
  ) {
    child.stdout?.on('data', (chunk: Buffer) => this.push('stdout', chunk));
    child.stderr?.on('data', (chunk: Buffer) => this.push('stderr', chunk));

    this.done = new Promise(resolve => {
      child.on('close', (code: number | null) => {
        this.flush('stdout');
        this.flush('stderr');
        this.exitCode = code ?? 1;
        this.ended = true;
        this.wake();
        resolve();
      });

      child.on('error', (error: Error) => {
        this.failure = isMissingBinary(error)
          ? new ToolNotFoundError(this.command)
          : new Error(`Process execution failed: ${error.message}`);
        this.ended = true;
        this.wake();
        resolve();
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  /** Resolves with the exit code once the process has exited. */
  async wait(): Promise<number> {
    await this.done;
    if (this.failure) {
      throw this.failure;
    }
    return this.exitCode;
  }

  async close(): Promise<void> {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.lines.length = 0;
    this.wake();

    const pid = this.child.pid;
    if (pid === undefined || this.child.exitCode !== null) {
      return;
    }

    try {
      await ProcessUtils.killProcess(pid);
      if (!(await this.exitsWithin(KILL_GRACE_MS))) {
        logger.debug(`${this.command} ignored SIGTERM, sending SIGKILL`);
        await ProcessUtils.killProcess(pid, 'SIGKILL');
      }
    } catch (error) {
      // The process may have exited between the check and the kill
      logger.debug(`Could not stop ${this.command}`, error);
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string> {
    try {
      while (true) {
        const line = this.lines.shift();
        if (line !== undefined) {
          yield line;
          continue;
        }
        if (this.failure) {
          throw this.failure;
        }
        if (this.ended) {
          return;
        }
        await new Promise<void>(resolve => {
          this.waiting = resolve;
        });
      }
    } finally {
      await this.close();
    }
  }

  private push(source: 'stdout' | 'stderr', chunk: Buffer): void {
    if (this.ended) {
      return;
    }
    const text = this.partial[source] + this.decoders[source].write(chunk);
    const parts = text.split('\n');
    this.partial[source] = parts.pop() ?? '';
    for (const part of parts) {
      this.lines.push(part.replace(/\r$/, ''));
    }
    this.wake();
  }

  private flush(source: 'stdout' | 'stderr'): void {
    const rest = this.partial[source] + this.decoders[source].end();
    this.partial[source] = '';
    if (rest.length > 0 && !this.ended) {
      this.lines.push(rest.replace(/\r$/, ''));
    }
  }

  private async exitsWithin(ms: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(false), ms);
    });
    try {
      return await Promise.race([this.done.then(() => true), expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private wake(): void {
    const resolve = this.waiting;
    this.waiting = null;
    resolve?.();
  }
}

export class ProcessUtils {
  static async execute(
    command: string,
    args: string[] = [],
    options: ProcessOptions = {}
  ): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const child = crossSpawn(command, args, {
        cwd: options.cwd || process.cwd(),
        shell: options.shell || false,
        stdio: 'pipe',
      });

      let stdout = '';
      let stderr = '';
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const settle = (action: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        if (timer) {
          clearTimeout(timer);
        }
        action();
      };

      if (options.timeoutMs !== undefined) {
        timer = setTimeout(() => {
          settle(() => reject(new ProcessTimeoutError(command, options.timeoutMs ?? 0)));
          if (child.pid !== undefined) {
            ProcessUtils.killProcess(child.pid, 'SIGKILL').catch((error: unknown) => {
              logger.debug(`Could not kill timed out process ${child.pid}`, error);
            });
          }
        }, options.timeoutMs);
      }

      const stdoutDecoder = new StringDecoder('utf8');
      const stderrDecoder = new StringDecoder('utf8');

      child.stdout?.on('data', (data: Buffer) => {
        stdout += stdoutDecoder.write(data);
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderr += stderrDecoder.write(data);
      });

      child.on('close', (code: number | null) => {
        stdout += stdoutDecoder.end();
        stderr += stderrDecoder.end();
        settle(() =>
          resolve({
            stdout: stdout.trim(),
            stderr: stderr.trim(),
            exitCode: code ?? 1,
          })
        );
      });

      child.on('error', (error: Error) => {
        settle(() =>
          reject(
            isMissingBinary(error)
              ? new ToolNotFoundError(command)
              : new Error(`Process execution failed: ${error.message}`)
          )
        );
      });
    });
  }

  static async executeShell(
    commandLine: string,
    options: Omit<ProcessOptions, 'shell'> = {}
  ): Promise<ProcessResult> {
    return this.execute(commandLine, [], { ...options, shell: true });
  }

  /**
   * Spawns a process whose combined output is read line by line. Every call
   * starts a new, independent process.
   */
  static stream(
    command: string,
    args: string[] = [],
    options: Omit<ProcessOptions, 'timeoutMs'> = {}
  ): LineStream {
    const child = crossSpawn(command, args, {
      cwd: options.cwd || process.cwd(),
      shell: options.shell || false,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    return new LineStream(child, command);
  }

  static streamShell(commandLine: string, options: { cwd?: string } = {}): LineStream {
    return this.stream(commandLine, [], { ...options, shell: true });
  }

  static async killProcess(pid: number, signal: string = 'SIGTERM'): Promise<void> {
    return new Promise((resolve, reject) => {
      kill(pid, signal, (error?: Error) => {
        if (error) {
          reject(new Error(`Failed to kill process ${pid}: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  static isProcessRunning(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch {
      return false;
    }
  }

  static parseCommand(commandString: string): { command: string; args: string[] } {
    const parts = commandString.trim().split(/\s+/);
    const command = parts[0] ?? '';
    const args = parts.slice(1);

    return { command, args };
  }
}
