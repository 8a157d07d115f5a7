import { Args, Command } from '@oclif/core';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { envFilePath, loadEnvFile, missingRequired, saveEnvFile } from '../core/EnvFile';
import { loadServiceContext, requireService } from '../core/ServiceContext';
import { EnvVarConfig, ServiceConfig } from '../types/Service';
import { logger } from '../utils/Logger';

type EnvAnswers = Record<string, string>;

export default class Setup extends Command {
  static override description = 'Prompt for the required settings a service is missing';

  static override examples = ['<%= config.bin %> <%= command.id %> openmemory'];

  static override args = {
    service: Args.string({
      description: 'Service to set up',
      required: true,
    }),
  };

  public async run(): Promise<void> {
    const { args } = await this.parse(Setup);

    let config: ServiceConfig;
    let current: Record<string, string>;
    try {
      const context = await loadServiceContext();
      config = requireService(context, args.service);
      current = await loadEnvFile(envFilePath(config));
    } catch (error) {
      logger.error('Failed to set up service', error);
      this.error(error instanceof Error ? error.message : 'Unknown error occurred');
    }

    const missing = missingRequired(config, current);
    if (missing.length === 0) {
      this.log(chalk.green(`${config.name} has every required setting`));
      return;
    }

    this.log(chalk.blue(`${config.name} needs ${missing.length} more setting(s):\n`));

    const questions = config.envVars
      .filter(envVar => missing.includes(envVar.name))
      .map(envVar => this.question(envVar));

    let answers: EnvAnswers;
    try {
      answers = await inquirer.prompt<EnvAnswers>(questions);
    } catch (error) {
      // Raised when stdin is not a TTY
      logger.warn('Could not prompt for settings', error);
      this.error(`Set the missing values with: svcdeck env ${config.id} --set KEY=VALUE`);
    }

    try {
      await saveEnvFile(envFilePath(config), { ...current, ...answers });
    } catch (error) {
      logger.error('Failed to save settings', error);
      this.error(error instanceof Error ? error.message : 'Unknown error occurred');
    }

    logger.success(`Saved ${envFilePath(config)}`);
  }

  private question(envVar: EnvVarConfig): inquirer.DistinctQuestion<EnvAnswers> {
    const message = envVar.description ? `${envVar.name} (${envVar.description})` : envVar.name;
    const validate = (value: string): boolean | string =>
      value.trim() !== '' || `${envVar.name} is required`;

    if (envVar.secret) {
      return { type: 'password', name: envVar.name, message, mask: '*', validate };
    }
    return { type: 'input', name: envVar.name, message, validate };
  }
}
