import * as fs from 'fs-extra';
import * as path from 'path';
import { KILL_GRACE_MS, ProcessUtils } from '../../src/utils/ProcessUtils';
import { ProcessTimeoutError, ToolNotFoundError } from '../../src/types/Errors';
import { collect, createTempDir, cleanupTempDir } from '../setup';

describe('ProcessUtils', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  describe('execute', () => {
    it('should capture trimmed stdout and stderr separately', async () => {
      const result = await ProcessUtils.executeShell('echo "  out  "; echo err >&2');

      expect(result).toEqual({ stdout: 'out', stderr: 'err', exitCode: 0 });
    });

    it('should decode a multibyte character split across output chunks', async () => {
      const result = await ProcessUtils.executeShell("printf '\\303'; sleep 0.2; printf '\\251'");

      expect(result.stdout).toBe('\u00e9');
    });

    it('should resolve with a nonzero exit code instead of rejecting', async () => {
      const result = await ProcessUtils.execute('sh', ['-c', 'exit 7']);

      expect(result.exitCode).toBe(7);
    });

    it('should run in the given working directory', async () => {
      const result = await ProcessUtils.executeShell('pwd', { cwd: tempDir });

      expect(result.stdout).toBe(await fs.realpath(tempDir));
    });

    it('should reject with ToolNotFoundError for a missing binary', async () => {
      const missing = path.join(tempDir, 'missing-tool');

      await expect(ProcessUtils.execute(missing, ['--version'])).rejects.toEqual(
        new ToolNotFoundError(missing)
      );
    });

    it('should reject with ProcessTimeoutError once the timeout elapses', async () => {
      const started = Date.now();

      await expect(
        ProcessUtils.execute('sleep', ['5'], { timeoutMs: 200 })
      ).rejects.toBeInstanceOf(ProcessTimeoutError);
      expect(Date.now() - started).toBeLessThan(4000);
    });
  });

  describe('stream', () => {
    it('should yield lines without line endings and report the exit code', async () => {
      const stream = ProcessUtils.streamShell("printf 'a\\nb\\r\\nc'");

      expect(await collect(stream)).toEqual(['a', 'b', 'c']);
      expect(await stream.wait()).toBe(0);
    });

    it('should combine stdout and stderr', async () => {
      const stream = ProcessUtils.streamShell('echo out; echo err >&2; exit 2');

      expect((await collect(stream)).sort()).toEqual(['err', 'out']);
      expect(await stream.wait()).toBe(2);
    });

    it('should spawn a new process for every stream', async () => {
      const counter = path.join(tempDir, 'count');
      const command = `echo x >> "${counter}"; wc -l < "${counter}"`;

      expect(await collect(ProcessUtils.streamShell(command))).toEqual(['1']);
      expect(await collect(ProcessUtils.streamShell(command))).toEqual(['2']);
    });

    it('should kill the process when the consumer stops early', async () => {
      const stream = ProcessUtils.streamShell('echo ready; sleep 60');
      const pid = stream.pid;

      for await (const line of stream) {
        expect(line).toBe('ready');
        break;
      }

      expect(await stream.wait()).toBe(1);
      expect(pid).toBeDefined();
      expect(ProcessUtils.isProcessRunning(pid ?? 0)).toBe(false);
    });

    it('should SIGKILL a process that ignores SIGTERM after the grace period', async () => {
      const stream = ProcessUtils.streamShell("trap '' TERM; echo ready; sleep 60");
      const pid = stream.pid;
      const started = Date.now();

      for await (const line of stream) {
        expect(line).toBe('ready');
        break;
      }

      expect(await stream.wait()).toBe(1);
      expect(Date.now() - started).toBeGreaterThanOrEqual(KILL_GRACE_MS);
      expect(ProcessUtils.isProcessRunning(pid ?? 0)).toBe(false);
    });

    it('should throw ToolNotFoundError for a missing binary', async () => {
      const missing = path.join(tempDir, 'missing-tool');
      const stream = ProcessUtils.stream(missing);

      await expect(collect(stream)).rejects.toEqual(new ToolNotFoundError(missing));
      await expect(stream.wait()).rejects.toBeInstanceOf(ToolNotFoundError);
    });
  });

  describe('parseCommand', () => {
    it('should split a command line on whitespace', () => {
      expect(ProcessUtils.parseCommand('  docker   compose ')).toEqual({
        command: 'docker',
        args: ['compose'],
      });
    });
  });
});
