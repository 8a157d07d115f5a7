import { Args, Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { envFilePath, loadEnvFile, maskValue, saveEnvFile } from '../core/EnvFile';
import { loadServiceContext, requireService } from '../core/ServiceContext';
import { EnvVarConfig, ServiceConfig } from '../types/Service';
import { logger } from '../utils/Logger';

export default class Env extends Command {
  static override description = "Show or edit a service's .env configuration";

  static override examples = [
    '<%= config.bin %> <%= command.id %> langfuse',
    '<%= config.bin %> <%= command.id %> langfuse --reveal',
    '<%= config.bin %> <%= command.id %> langfuse --set PORT=3000 --set "TITLE=My tools"',
    '<%= config.bin %> <%= command.id %> langfuse --unset DEBUG',
  ];

  static override args = {
    service: Args.string({
      description: 'Service whose .env to show or edit',
      required: true,
    }),
  };

  static override flags = {
    set: Flags.string({
      char: 's',
      description: 'Set KEY=VALUE (repeatable)',
      multiple: true,
    }),
    unset: Flags.string({
      char: 'u',
      description: 'Remove KEY (repeatable)',
      multiple: true,
    }),
    reveal: Flags.boolean({
      description: 'Show secret values unmasked',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Env);

    let config: ServiceConfig;
    let values: Record<string, string>;
    try {
      const context = await loadServiceContext();
      config = requireService(context, args.service);
      values = await loadEnvFile(envFilePath(config));
    } catch (error) {
      logger.error('Failed to read service configuration', error);
      this.error(error instanceof Error ? error.message : 'Unknown error occurred');
    }

    const assignments = flags.set ?? [];
    const removals = flags.unset ?? [];

    if (assignments.length > 0 || removals.length > 0) {
      const updated = { ...values };
      for (const assignment of assignments) {
        const separator = assignment.indexOf('=');
        if (separator <= 0) {
          this.error(`Expected KEY=VALUE, got '${assignment}'`);
        }
        updated[assignment.slice(0, separator).trim()] = assignment.slice(separator + 1);
      }
      for (const key of removals) {
        delete updated[key];
      }

      try {
        await saveEnvFile(envFilePath(config), updated);
      } catch (error) {
        logger.error('Failed to save service configuration', error);
        this.error(error instanceof Error ? error.message : 'Unknown error occurred');
      }

      logger.success(`Saved ${envFilePath(config)}`);
      values = updated;
    }

    this.show(config, values, flags.reveal);
  }

  private show(config: ServiceConfig, values: Record<string, string>, reveal: boolean): void {
    this.log(chalk.blue(`Configuration for ${config.name}:\n`));

    const declared = new Set(config.envVars.map(envVar => envVar.name));
    for (const envVar of config.envVars) {
      this.log(`  ${this.label(envVar)} = ${this.display(envVar, values[envVar.name], reveal)}`);
      if (envVar.description) {
        this.log(chalk.gray(`      ${envVar.description}`));
      }
    }

    const extra = Object.keys(values).filter(key => !declared.has(key));
    if (extra.length > 0) {
      this.log(chalk.gray('\n  Not declared in service.yaml:'));
      for (const key of extra.sort()) {
        this.log(`  ${key} = ${values[key] ?? ''}`);
      }
    }
  }

  private label(envVar: EnvVarConfig): string {
    return envVar.required ? `${chalk.white(envVar.name)}${chalk.red('*')}` : chalk.white(envVar.name);
  }

  private display(envVar: EnvVarConfig, value: string | undefined, reveal: boolean): string {
    if (value === undefined || value === '') {
      return envVar.default !== undefined
        ? chalk.gray(`(default: ${envVar.default})`)
        : chalk.gray('(unset)');
    }
    return envVar.secret && !reveal ? maskValue(value) : value;
  }
}
