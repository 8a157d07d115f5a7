import { Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { loadServiceContext } from '../core/ServiceContext';
import { ServiceConfig } from '../types/Service';
import { logger } from '../utils/Logger';
import { formatCategory } from '../utils/StatusDisplay';

export default class List extends Command {
  static override description = 'List services discovered in the services directory';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --verbose',
    '<%= config.bin %> <%= command.id %> --json',
  ];

  static override flags = {
    verbose: Flags.boolean({
      char: 'v',
      description: 'Show ports, dependencies and notes',
      default: false,
    }),
    json: Flags.boolean({
      char: 'j',
      description: 'Output in JSON format',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(List);

    let services: ServiceConfig[];
    let servicesDir: string;
    try {
      const context = await loadServiceContext();
      services = context.registry.discover();
      servicesDir = context.registry.getServicesDir();
    } catch (error) {
      logger.error('Failed to list services', error);
      this.error(error instanceof Error ? error.message : 'Unknown error occurred');
    }

    if (flags.json) {
      this.log(JSON.stringify(services, null, 2));
      return;
    }

    if (services.length === 0) {
      this.log(chalk.yellow(`No services found in ${servicesDir}`));
      this.log(chalk.gray(`   Each service needs its own directory with a service.yaml`));
      return;
    }

    this.log(chalk.blue(`Found ${services.length} service${services.length === 1 ? '' : 's'}:\n`));

    for (const service of services) {
      this.log(
        `  ${chalk.white.bold(service.id)} ${chalk.gray(`[${formatCategory(service.category)}]`)} ${service.name}`
      );
      this.log(chalk.gray(`     ${service.description}`));

      if (flags.verbose) {
        this.showDetails(service);
      }
    }
  }

  private showDetails(service: ServiceConfig): void {
    for (const port of service.ports) {
      const health = port.healthEndpoint ? ` (health: ${port.healthEndpoint})` : '';
      this.log(chalk.gray(`     Port ${port.name}: ${port.port}${health}`));
    }

    if (service.vendor) {
      this.log(chalk.gray(`     Vendor: ${service.vendor.url} @ ${service.vendor.ref}`));
    }

    if (service.systemDependencies.length > 0) {
      this.log(chalk.gray(`     Requires: ${service.systemDependencies.join(', ')}`));
    }

    if (service.serviceDependencies.length > 0) {
      this.log(chalk.gray(`     Uses services: ${service.serviceDependencies.join(', ')}`));
    }

    const overrides = Object.keys(service.lifecycle);
    if (overrides.length > 0) {
      this.log(chalk.gray(`     Custom commands: ${overrides.join(', ')}`));
    }

    for (const [key, note] of Object.entries(service.notes)) {
      this.log(chalk.gray(`     ${key}: ${note}`));
    }

    this.log('');
  }
}
