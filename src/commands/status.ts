import { Args, Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import ora from 'ora';
import { loadServiceContext, requireService } from '../core/ServiceContext';
import { ServiceConfig, ServiceState, primaryPort } from '../types/Service';
import { logger } from '../utils/Logger';
import { formatStatus } from '../utils/StatusDisplay';

export default class Status extends Command {
  static override description = 'Show the health status of services';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> langfuse',
    '<%= config.bin %> <%= command.id %> --json',
  ];

  static override args = {
    service: Args.string({
      description: 'Only check this service',
    }),
  };

  static override flags = {
    json: Flags.boolean({
      char: 'j',
      description: 'Output in JSON format',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Status);

    let states: ServiceState[];
    try {
      const context = await loadServiceContext();
      const configs = args.service
        ? [requireService(context, args.service)]
        : context.registry.discover();

      const spinner = flags.json ? null : ora('Checking services...').start();
      const statuses = await context.health.checkAll(configs);
      spinner?.stop();

      states = configs.map(config => ({ config, status: statuses[config.id] ?? 'error' }));
    } catch (error) {
      logger.error('Failed to get status', error);
      this.error(error instanceof Error ? error.message : 'Unknown error occurred');
    }

    if (flags.json) {
      this.log(
        JSON.stringify(
          Object.fromEntries(states.map(state => [state.config.id, state.status])),
          null,
          2
        )
      );
      return;
    }

    if (states.length === 0) {
      this.log(chalk.yellow('No services found'));
      return;
    }

    const width = Math.max(...states.map(state => state.config.id.length));
    for (const state of states) {
      const id = state.config.id.padEnd(width);
      this.log(`  ${id}  ${formatStatus(state.status)}${this.endpoint(state.config)}`);
    }

    const running = states.filter(state => state.status === 'running').length;
    this.log(chalk.gray(`\n  ${running}/${states.length} running`));
  }

  private endpoint(config: ServiceConfig): string {
    const port = primaryPort(config);
    return port ? chalk.blue(`  → http://localhost:${port.port}`) : '';
  }
}
