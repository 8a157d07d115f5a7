import { Args, Command } from '@oclif/core';
import chalk from 'chalk';
import { loadServiceContext, requireService } from '../core/ServiceContext';
import { logger } from '../utils/Logger';

export default class Install extends Command {
  static override description = 'Install or update a service, streaming its output';

  static override examples = ['<%= config.bin %> <%= command.id %> languagetool'];

  static override args = {
    service: Args.string({
      description: 'Service to install',
      required: true,
    }),
  };

  public async run(): Promise<void> {
    const { args } = await this.parse(Install);

    let lastLine = '';
    try {
      const context = await loadServiceContext();
      const config = requireService(context, args.service);

      this.log(chalk.blue(`Installing ${config.name} (this may take a while)...\n`));

      for await (const line of context.lifecycle.install(config)) {
        lastLine = line;
        this.log(line);
      }
    } catch (error) {
      logger.error('Failed to install service', error);
      this.error(error instanceof Error ? error.message : 'Unknown error occurred');
    }

    if (lastLine !== 'Install completed successfully') {
      this.exit(1);
    }
  }
}
