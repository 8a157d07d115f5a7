import { Args, Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { loadServiceContext, requireService } from '../core/ServiceContext';
import { logger } from '../utils/Logger';

export default class Logs extends Command {
  static override description = 'Show logs for a service';

  static override examples = [
    '<%= config.bin %> <%= command.id %> openmemory',
    '<%= config.bin %> <%= command.id %> openmemory --follow',
    '<%= config.bin %> <%= command.id %> openmemory --tail 200',
    '<%= config.bin %> <%= command.id %> openmemory --grep error',
  ];

  static override args = {
    service: Args.string({
      description: 'Service to show logs for',
      required: true,
    }),
  };

  static override flags = {
    follow: Flags.boolean({
      char: 'f',
      description: 'Follow log output until interrupted',
      default: false,
    }),
    tail: Flags.integer({
      char: 'n',
      description: 'Number of recent log lines to show',
      default: 50,
    }),
    grep: Flags.string({
      char: 'g',
      description: 'Only show lines containing this text',
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Logs);

    const controller = new AbortController();
    const stop = (): void => {
      this.log(chalk.yellow('\nStopping log follow...'));
      controller.abort();
    };

    let shown = 0;
    try {
      const context = await loadServiceContext();
      const config = requireService(context, args.service);

      if (flags.follow) {
        process.once('SIGINT', stop);
        process.once('SIGTERM', stop);
      }

      const lines = context.lifecycle.logs(config, {
        follow: flags.follow,
        tail: flags.tail,
        signal: controller.signal,
      });

      for await (const line of lines) {
        if (flags.grep && !line.includes(flags.grep)) {
          continue;
        }
        shown++;
        this.log(line);
      }
    } catch (error) {
      logger.error('Failed to show logs', error);
      this.error(error instanceof Error ? error.message : 'Unknown error occurred');
    } finally {
      process.removeListener('SIGINT', stop);
      process.removeListener('SIGTERM', stop);
    }

    if (shown === 0 && !flags.follow) {
      this.log(chalk.gray('No logs available'));
    }
  }
}
