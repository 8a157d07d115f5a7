import { Args, Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import ora from 'ora';
import { ServiceContext, loadServiceContext, requireService } from '../core/ServiceContext';
import { LifecycleResult, ServiceConfig } from '../types/Service';
import { logger } from '../utils/Logger';
import { formatStatus } from '../utils/StatusDisplay';

export default class Restart extends Command {
  static override description = 'Restart a service';

  static override examples = [
    '<%= config.bin %> <%= command.id %> openmemory',
    '<%= config.bin %> <%= command.id %> openmemory --wait',
    '<%= config.bin %> <%= command.id %> openmemory --wait --timeout 120',
  ];

  static override args = {
    service: Args.string({
      description: 'Service to restart',
      required: true,
    }),
  };

  static override flags = {
    wait: Flags.boolean({
      char: 'w',
      description: 'Wait until the service reports running',
      default: false,
    }),
    timeout: Flags.integer({
      description: 'Seconds to wait with --wait',
      default: 60,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Restart);

    let context: ServiceContext;
    let config: ServiceConfig;
    let result: LifecycleResult;
    const spinner = ora();
    try {
      context = await loadServiceContext();
      config = requireService(context, args.service);
      spinner.start(`Restarting ${config.name}...`);
      result = await context.lifecycle.restart(config);
    } catch (error) {
      spinner.stop();
      logger.error('Failed to restart service', error);
      this.error(error instanceof Error ? error.message : 'Unknown error occurred');
    }

    if (!result.success) {
      spinner.fail(`Failed to restart ${config.name}`);
      this.error(result.message);
    }

    if (!flags.wait) {
      spinner.succeed(`Restarted ${config.name}`);
      this.log(chalk.gray(result.message));
      return;
    }

    spinner.text = `Waiting for ${config.name} to report running...`;
    const status = await context.health.waitForStatus(config, 'running', {
      timeoutMs: flags.timeout * 1000,
    });

    if (status !== 'running') {
      spinner.warn(`Restarted ${config.name}, but it is ${formatStatus(status)}`);
      this.exit(1);
    }

    spinner.succeed(`Restarted ${config.name} (${formatStatus(status)})`);
  }
}
