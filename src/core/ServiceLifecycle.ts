import * as fs from 'fs-extra';
import * as path from 'path';
import { ProcessTimeoutError } from '../types/Errors';
import { LifecycleResult, ServiceConfig } from '../types/Service';
import { LineStream, ProcessResult, ProcessUtils } from '../utils/ProcessUtils';
import { logger } from '../utils/Logger';

export const UPDATE_SCRIPT = 'update.sh';

export interface LifecycleOptions {
  composeCommand?: string;
  commandTimeoutMs?: number;
}

export interface LogsOptions {
  follow?: boolean;
  tail?: number;
  /** Aborting ends the sequence and kills the log process. */
  signal?: AbortSignal;
}

/**
 * Runs start/stop/restart/install/logs for a service. A command declared
 * under `lifecycle` in the descriptor replaces the compose fallback for that
 * operation. None of these methods reject: failures come back as a
 * `LifecycleResult` or as an `Error: ...` line.
 */
export class ServiceLifecycle {
  private readonly composeCommand: string;
  private readonly commandTimeoutMs: number;

  constructor(options: LifecycleOptions = {}) {
    this.composeCommand = options.composeCommand ?? 'docker compose';
    this.commandTimeoutMs = options.commandTimeoutMs ?? 120000;
  }

  async start(config: ServiceConfig): Promise<LifecycleResult> {
    if (config.lifecycle.start) {
      return this.runShellCommand(config, config.lifecycle.start);
    }
    return this.runComposeCommand(config, ['up', '-d']);
  }

  async stop(config: ServiceConfig): Promise<LifecycleResult> {
    if (config.lifecycle.stop) {
      return this.runShellCommand(config, config.lifecycle.stop);
    }
    return this.runComposeCommand(config, ['down']);
  }

  /**
   * Without an override this is stop followed by start; start is never tried
   * once stop has failed. Health is not re-checked afterwards.
   */
  async restart(config: ServiceConfig): Promise<LifecycleResult> {
    if (config.lifecycle.restart) {
      return this.runShellCommand(config, config.lifecycle.restart);
    }

    const stopped = await this.stop(config);
    if (!stopped.success) {
      return { success: false, message: `Failed to stop: ${stopped.message}` };
    }

    const started = await this.start(config);
    if (!started.success) {
      return { success: false, message: `Failed to start: ${started.message}` };
    }

    return { success: true, message: 'Restarted successfully' };
  }

  /**
   * Streams the install command's output, or `update.sh` when no install
   * command is declared. Always ends with a line reporting the exit code.
   */
  async *install(config: ServiceConfig): AsyncGenerator<string> {
    let stream: LineStream;

    if (config.lifecycle.install) {
      stream = ProcessUtils.streamShell(config.lifecycle.install, { cwd: config.path });
    } else {
      const updateScript = path.join(config.path, UPDATE_SCRIPT);
      if (!(await fs.pathExists(updateScript))) {
        yield `Error: ${updateScript} not found and no lifecycle.install command`;
        return;
      }
      stream = ProcessUtils.stream(updateScript, [], { cwd: config.path });
    }

    try {
      for await (const line of stream) {
        yield line;
      }
      const exitCode = await stream.wait();
      yield exitCode === 0
        ? 'Install completed successfully'
        : `Install failed with code ${exitCode}`;
    } catch (error) {
      logger.debug(`Install failed for ${config.id}`, error);
      yield `Error: ${error instanceof Error ? error.message : String(error)}`;
    }
  }

  /**
   * Streams service logs. With `follow` the sequence only ends when the
   * consumer stops reading, which also kills the underlying process.
   */
  async *logs(config: ServiceConfig, options: LogsOptions = {}): AsyncGenerator<string> {
    const follow = options.follow ?? false;
    const tail = options.tail ?? 50;

    let stream: LineStream;
    if (config.lifecycle.logs) {
      let command = config.lifecycle.logs;
      if (follow) {
        command = `${command} -f`;
      }
      if (tail > 0) {
        command = `${command} --tail=${tail}`;
      }
      stream = ProcessUtils.streamShell(command, { cwd: config.path });
    } else {
      const { command, args } = ProcessUtils.parseCommand(this.composeCommand);
      stream = ProcessUtils.stream(
        command,
        [...args, 'logs', `--tail=${tail}`, ...(follow ? ['-f'] : [])],
        { cwd: config.path }
      );
    }

    const onAbort = (): void => {
      stream.close().catch((error: unknown) => logger.debug('Could not close log stream', error));
    };
    if (options.signal?.aborted) {
      onAbort();
    }
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      for await (const line of stream) {
        yield line;
      }
    } catch (error) {
      logger.debug(`Log stream failed for ${config.id}`, error);
      yield `Error: ${error instanceof Error ? error.message : String(error)}`;
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  private async runShellCommand(config: ServiceConfig, command: string): Promise<LifecycleResult> {
    return this.toResult(() =>
      ProcessUtils.executeShell(command, {
        cwd: config.path,
        timeoutMs: this.commandTimeoutMs,
      })
    );
  }

  private async runComposeCommand(config: ServiceConfig, verb: string[]): Promise<LifecycleResult> {
    const { command, args } = ProcessUtils.parseCommand(this.composeCommand);
    return this.toResult(() =>
      ProcessUtils.execute(command, [...args, ...verb], {
        cwd: config.path,
        timeoutMs: this.commandTimeoutMs,
      })
    );
  }

  private async toResult(run: () => Promise<ProcessResult>): Promise<LifecycleResult> {
    try {
      const result = await run();
      if (result.exitCode === 0) {
        return { success: true, message: result.stdout || 'Success' };
      }
      return { success: false, message: result.stderr || result.stdout || 'Unknown error' };
    } catch (error) {
      if (error instanceof ProcessTimeoutError) {
        return { success: false, message: 'Command timed out' };
      }
      return {
        success: false,
        message: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }
}
