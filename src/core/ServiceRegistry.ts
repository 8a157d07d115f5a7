import * as fs from 'fs-extra';
import * as path from 'path';
import * as yaml from 'yaml';
import { DescriptorParseError } from '../types/Errors';
import {
  EnvVarConfig,
  LifecycleOperation,
  PortConfig,
  SERVICE_CATEGORIES,
  ServiceConfig,
  VendorConfig,
} from '../types/Service';
import { logger } from '../utils/Logger';

export const DESCRIPTOR_FILE = 'service.yaml';

const LIFECYCLE_OPERATIONS: readonly LifecycleOperation[] = [
  'start',
  'stop',
  'restart',
  'install',
  'logs',
  'status',
];

/** Receives descriptors that failed to parse during discovery. */
export type DiagnosticSink = (error: DescriptorParseError) => void;

const warnSink: DiagnosticSink = error => {
  logger.warn(`Skipping service: ${error.message}`);
};

export class ServiceRegistry {
  private readonly cache = new Map<string, ServiceConfig>();

  constructor(
    private readonly servicesDir: string,
    private readonly report: DiagnosticSink = warnSink
  ) {}

  getServicesDir(): string {
    return this.servicesDir;
  }

  /**
   * Scans the services directory in name order. Directories without a
   * descriptor are skipped; descriptors that fail to parse are reported and
   * left out without affecting the rest of the scan.
   */
  discover(): ServiceConfig[] {
    const services: ServiceConfig[] = [];

    if (!fs.pathExistsSync(this.servicesDir)) {
      logger.debug(`Services directory ${this.servicesDir} does not exist`);
      return services;
    }

    const entries = fs
      .readdirSync(this.servicesDir)
      .filter(name => this.isDirectory(name))
      .sort();

    for (const id of entries) {
      const descriptorPath = path.join(this.servicesDir, id, DESCRIPTOR_FILE);
      if (!fs.pathExistsSync(descriptorPath)) {
        continue;
      }

      try {
        const config = this.load(id);
        services.push(config);
        this.cache.set(id, config);
      } catch (error) {
        this.report(
          error instanceof DescriptorParseError
            ? error
            : new DescriptorParseError(
                descriptorPath,
                error instanceof Error ? error.message : String(error)
              )
        );
      }
    }

    return services;
  }

  /**
   * Returns the cached entry, or loads that one descriptor from disk.
   * Throws `DescriptorParseError` when the descriptor exists but is invalid.
   */
  get(id: string): ServiceConfig | undefined {
    const cached = this.cache.get(id);
    if (cached) {
      return cached;
    }

    if (!this.isServiceId(id)) {
      return undefined;
    }

    if (!fs.pathExistsSync(path.join(this.servicesDir, id, DESCRIPTOR_FILE))) {
      return undefined;
    }

    const config = this.load(id);
    this.cache.set(id, config);
    return config;
  }

  reload(id: string): ServiceConfig | undefined {
    this.cache.delete(id);
    return this.get(id);
  }

  /** Cached catalog in id order, discovering first if nothing is cached. */
  list(): ServiceConfig[] {
    if (this.cache.size === 0) {
      return this.discover();
    }
    return [...this.cache.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  ids(): string[] {
    return this.list().map(config => config.id);
  }

  // Follows symlinks, so a linked service directory counts
  private isDirectory(name: string): boolean {
    try {
      return fs.statSync(path.join(this.servicesDir, name)).isDirectory();
    } catch (error) {
      logger.debug(`Cannot stat ${name} in ${this.servicesDir}`, error);
      return false;
    }
  }

  private isServiceId(id: string): boolean {
    return id.length > 0 && id !== '.' && id !== '..' && !/[\\/]/.test(id);
  }

  private load(id: string): ServiceConfig {
    const servicePath = path.join(this.servicesDir, id);
    const descriptorPath = path.join(servicePath, DESCRIPTOR_FILE);

    let data: unknown;
    try {
      data = yaml.parse(fs.readFileSync(descriptorPath, 'utf8'));
    } catch (error) {
      throw new DescriptorParseError(
        descriptorPath,
        error instanceof Error ? error.message : 'Unreadable file'
      );
    }

    return parseDescriptor(data, id, servicePath, descriptorPath);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates a parsed `service.yaml` document and fills in defaults.
 */
export function parseDescriptor(
  data: unknown,
  id: string,
  servicePath: string,
  file: string = path.join(servicePath, DESCRIPTOR_FILE)
): ServiceConfig {
  const fail = (reason: string): never => {
    throw new DescriptorParseError(file, reason);
  };

  if (!isRecord(data)) {
    return fail('descriptor must be a mapping');
  }
  const descriptor = data;

  const requireString = (value: unknown, field: string): string => {
    if (typeof value !== 'string' || value.trim() === '') {
      return fail(`'${field}' is required`);
    }
    return value;
  };
  const optionalString = (value: unknown, field: string): string | undefined => {
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string') {
      return fail(`'${field}' must be a string`);
    }
    return value;
  };
  const stringList = (value: unknown, field: string): string[] => {
    if (value === undefined || value === null) {
      return [];
    }
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
      return fail(`'${field}' must be a list of strings`);
    }
    return value;
  };
  const list = (value: unknown, field: string): unknown[] => {
    if (value === undefined || value === null) {
      return [];
    }
    if (!Array.isArray(value)) {
      return fail(`'${field}' must be a list`);
    }
    return value;
  };
  const mapping = (value: unknown, field: string): Record<string, unknown> => {
    if (value === undefined || value === null) {
      return {};
    }
    if (!isRecord(value)) {
      return fail(`'${field}' must be a mapping`);
    }
    return value;
  };

  const name = requireString(descriptor.name, 'name');
  const description = requireString(descriptor.description, 'description');

  const categoryValue = descriptor.category ?? 'optional';
  const category = SERVICE_CATEGORIES.find(c => c === categoryValue);
  if (!category) {
    return fail(`'category' must be one of ${SERVICE_CATEGORIES.join(', ')}`);
  }

  let vendor: VendorConfig | undefined;
  if (descriptor.vendor !== undefined && descriptor.vendor !== null) {
    const vendorData = mapping(descriptor.vendor, 'vendor');
    vendor = Object.freeze({
      url: requireString(vendorData.url, 'vendor.url'),
      ref: requireString(vendorData.ref, 'vendor.ref'),
    });
  }

  const ports = list(descriptor.ports, 'ports').map((raw, index): PortConfig => {
    const entry = mapping(raw, `ports[${index}]`);
    const port = entry.port;
    if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
      return fail(`'ports[${index}].port' must be an integer between 1 and 65535`);
    }
    const healthEndpoint = optionalString(entry.health_endpoint, `ports[${index}].health_endpoint`);
    return Object.freeze({
      name: requireString(entry.name, `ports[${index}].name`),
      port,
      ...(healthEndpoint && { healthEndpoint }),
    });
  });

  const envVars = list(descriptor.env_vars, 'env_vars').map((raw, index): EnvVarConfig => {
    const entry = mapping(raw, `env_vars[${index}]`);
    const defaultValue = entry.default;
    const description = optionalString(entry.description, `env_vars[${index}].description`);
    return Object.freeze({
      name: requireString(entry.name, `env_vars[${index}].name`),
      required: entry.required === true,
      secret: entry.secret === true,
      // YAML turns `default: 8080` into a number; env values are always text
      ...(defaultValue !== undefined && defaultValue !== null && { default: String(defaultValue) }),
      ...(description !== undefined && { description }),
    });
  });

  const dependencies = mapping(descriptor.dependencies, 'dependencies');

  const lifecycleData = mapping(descriptor.lifecycle, 'lifecycle');
  const lifecycle: Partial<Record<LifecycleOperation, string>> = {};
  for (const operation of LIFECYCLE_OPERATIONS) {
    const command = optionalString(lifecycleData[operation], `lifecycle.${operation}`);
    if (command !== undefined && command.trim() !== '') {
      lifecycle[operation] = command;
    }
  }

  const notes: Record<string, string> = {};
  for (const [key, value] of Object.entries(mapping(descriptor.notes, 'notes'))) {
    notes[key] = String(value);
  }

  return Object.freeze({
    id,
    name,
    description,
    category,
    path: servicePath,
    ...(vendor && { vendor }),
    ports: Object.freeze(ports),
    envVars: Object.freeze(envVars),
    systemDependencies: Object.freeze(stringList(dependencies.system, 'dependencies.system')),
    serviceDependencies: Object.freeze(stringList(dependencies.services, 'dependencies.services')),
    notes: Object.freeze(notes),
    lifecycle: Object.freeze(lifecycle),
  });
}
