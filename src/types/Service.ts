export type ServiceCategory = 'core' | 'optional' | 'experimental';

export const SERVICE_CATEGORIES: readonly ServiceCategory[] = ['core', 'optional', 'experimental'];

export type ServiceStatus =
  | 'not_installed'
  | 'stopped'
  | 'starting'
  | 'running'
  | 'unhealthy'
  | 'error';

export interface VendorConfig {
  readonly url: string;
  readonly ref: string; // tag, branch or commit
}

export interface PortConfig {
  readonly name: string;
  readonly port: number;
  readonly healthEndpoint?: string;
}

export interface EnvVarConfig {
  readonly name: string;
  readonly required: boolean;
  readonly secret: boolean;
  readonly default?: string;
  readonly description?: string;
}

export type LifecycleOperation = 'start' | 'stop' | 'restart' | 'install' | 'logs' | 'status';

export type LifecycleCommands = Readonly<Partial<Record<LifecycleOperation, string>>>;

export interface ServiceConfig {
  /** Directory name, unique within one registry. */
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly category: ServiceCategory;
  readonly path: string;
  readonly vendor?: VendorConfig;
  readonly ports: readonly PortConfig[];
  readonly envVars: readonly EnvVarConfig[];
  readonly systemDependencies: readonly string[];
  readonly serviceDependencies: readonly string[];
  readonly notes: Readonly<Record<string, string>>;
  readonly lifecycle: LifecycleCommands;
}

export interface ServiceState {
  config: ServiceConfig;
  status: ServiceStatus;
  errorMessage?: string;
}

export interface LifecycleResult {
  success: boolean;
  message: string;
}

/**
 * The first port carrying a health endpoint, else the first port.
 */
export function primaryPort(config: ServiceConfig): PortConfig | undefined {
  return config.ports.find(port => port.healthEndpoint) ?? config.ports[0];
}
