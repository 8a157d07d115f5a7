import { Args, Command } from '@oclif/core';
import chalk from 'chalk';
import ora from 'ora';
import { loadServiceContext, requireService } from '../core/ServiceContext';
import { LifecycleResult, ServiceConfig } from '../types/Service';
import { logger } from '../utils/Logger';

export default class Start extends Command {
  static override description = 'Start a service';

  static override examples = ['<%= config.bin %> <%= command.id %> openmemory'];

  static override args = {
    service: Args.string({
      description: 'Service to start',
      required: true,
    }),
  };

  public async run(): Promise<void> {
    const { args } = await this.parse(Start);

    let config: ServiceConfig;
    let result: LifecycleResult;
    const spinner = ora();
    try {
      const context = await loadServiceContext();
      config = requireService(context, args.service);
      spinner.start(`Starting ${config.name}...`);
      result = await context.lifecycle.start(config);
    } catch (error) {
      spinner.stop();
      logger.error('Failed to start service', error);
      this.error(error instanceof Error ? error.message : 'Unknown error occurred');
    }

    if (!result.success) {
      spinner.fail(`Failed to start ${config.name}`);
      this.error(result.message);
    }

    spinner.succeed(`Started ${config.name}`);
    this.log(chalk.gray(result.message));
  }
}
