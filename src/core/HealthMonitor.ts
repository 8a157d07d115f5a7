import * as fs from 'fs-extra';
import * as http from 'http';
import * as path from 'path';
import { HealthProbeError, NonZeroExitError } from '../types/Errors';
import { PortConfig, ServiceConfig, ServiceStatus, primaryPort } from '../types/Service';
import { ProcessUtils } from '../utils/ProcessUtils';
import { logger } from '../utils/Logger';
import { ServiceRegistry } from './ServiceRegistry';

export const COMPOSE_FILES = [
  'docker-compose.yml',
  'docker-compose.yaml',
  'compose.yml',
  'compose.yaml',
];

export interface HealthMonitorOptions {
  composeCommand?: string;
  httpTimeoutMs?: number;
  statusTimeoutMs?: number;
  containerQueryTimeoutMs?: number;
}

export interface WaitOptions {
  timeoutMs?: number;
  intervalMs?: number;
}

type ContainerState = 'not_installed' | 'stopped' | 'present' | 'error';

export function findComposeFile(servicePath: string): string | null {
  for (const name of COMPOSE_FILES) {
    const candidate = path.join(servicePath, name);
    if (fs.pathExistsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Derives one status per service from, in order: the service's own status
 * command, the compose project's running containers, and the primary port's
 * HTTP health endpoint.
 */
export class HealthMonitor {
  private readonly composeCommand: string;
  private readonly httpTimeoutMs: number;
  private readonly statusTimeoutMs: number;
  private readonly containerQueryTimeoutMs: number;

  constructor(
    private readonly registry: ServiceRegistry,
    options: HealthMonitorOptions = {}
  ) {
    this.composeCommand = options.composeCommand ?? 'docker compose';
    this.httpTimeoutMs = options.httpTimeoutMs ?? 2000;
    this.statusTimeoutMs = options.statusTimeoutMs ?? 10000;
    this.containerQueryTimeoutMs = options.containerQueryTimeoutMs ?? 5000;
  }

  async check(config: ServiceConfig): Promise<ServiceStatus> {
    if (config.lifecycle.status) {
      return this.checkCustomStatus(config, config.lifecycle.status);
    }

    const containers = await this.checkContainers(config);
    if (containers !== 'present') {
      return containers;
    }

    const port = primaryPort(config);
    if (port?.healthEndpoint) {
      return (await this.probe(port)) ? 'running' : 'unhealthy';
    }

    // Containers are up and nothing else can be asked
    return 'running';
  }

  /**
   * Checks every service concurrently. A failing check only turns its own
   * entry into `error`.
   */
  async checkAll(
    configs: readonly ServiceConfig[] = this.registry.list()
  ): Promise<Record<string, ServiceStatus>> {
    const results = await Promise.allSettled(configs.map(config => this.check(config)));

    const statuses: Record<string, ServiceStatus> = {};
    results.forEach((result, index) => {
      const config = configs[index];
      if (!config) {
        return;
      }
      if (result.status === 'fulfilled') {
        statuses[config.id] = result.value;
      } else {
        logger.debug(`Health check failed for ${config.id}`, result.reason);
        statuses[config.id] = 'error';
      }
    });

    return statuses;
  }

  async probe(port: PortConfig): Promise<boolean> {
    if (!port.healthEndpoint) {
      return true;
    }

    const url = `http://localhost:${port.port}${port.healthEndpoint}`;
    try {
      const statusCode = await this.httpGet(url);
      return statusCode >= 200 && statusCode < 300;
    } catch (error) {
      logger.debug(`Health endpoint unreachable`, error);
      return false;
    }
  }

  /**
   * Polls until the service reports `target` or the deadline passes, and
   * returns the last status seen.
   */
  async waitForStatus(
    config: ServiceConfig,
    target: ServiceStatus,
    options: WaitOptions = {}
  ): Promise<ServiceStatus> {
    const timeoutMs = options.timeoutMs ?? 60000;
    const intervalMs = options.intervalMs ?? 2000;
    const deadline = Date.now() + timeoutMs;

    let status = await this.check(config);
    while (status !== target && Date.now() + intervalMs <= deadline) {
      await this.sleep(intervalMs);
      status = await this.check(config);
    }
    return status;
  }

  private async checkCustomStatus(config: ServiceConfig, command: string): Promise<ServiceStatus> {
    try {
      const result = await ProcessUtils.executeShell(command, {
        cwd: config.path,
        timeoutMs: this.statusTimeoutMs,
      });
      return result.exitCode === 0 ? 'running' : 'stopped';
    } catch (error) {
      logger.debug(`Status command failed for ${config.id}`, error);
      return 'error';
    }
  }

  private async checkContainers(config: ServiceConfig): Promise<ContainerState> {
    if (!findComposeFile(config.path)) {
      return 'not_installed';
    }

    const { command, args } = ProcessUtils.parseCommand(this.composeCommand);
    try {
      const result = await ProcessUtils.execute(command, [...args, 'ps', '-q'], {
        cwd: config.path,
        timeoutMs: this.containerQueryTimeoutMs,
      });

      if (result.exitCode !== 0) {
        throw new NonZeroExitError(`${this.composeCommand} ps -q`, result.exitCode, result.stderr);
      }

      return result.stdout === '' ? 'stopped' : 'present';
    } catch (error) {
      logger.debug(`Container query failed for ${config.id}`, error);
      return 'error';
    }
  }

  private async httpGet(url: string): Promise<number> {
    return new Promise((resolve, reject) => {
      const urlObj = new URL(url);

      const req = http.request(
        {
          hostname: urlObj.hostname,
          port: urlObj.port,
          path: urlObj.pathname + urlObj.search,
          method: 'GET',
          headers: {
            'User-Agent': 'svcdeck-health/1.0',
          },
        },
        res => {
          res.resume();
          resolve(res.statusCode ?? 0);
        }
      );

      req.on('error', error =>
        reject(error instanceof HealthProbeError ? error : new HealthProbeError(url, error.message))
      );
      req.setTimeout(this.httpTimeoutMs, () => {
        req.destroy(new HealthProbeError(url, `no response within ${this.httpTimeoutMs}ms`));
      });
      req.end();
    });
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
