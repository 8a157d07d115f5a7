import { SvcdeckSettings } from '../types/Config';
import { ServiceConfig } from '../types/Service';
import { logger } from '../utils/Logger';
import { ConfigManager } from './ConfigManager';
import { HealthMonitor } from './HealthMonitor';
import { DiagnosticSink, ServiceRegistry } from './ServiceRegistry';
import { ServiceLifecycle } from './ServiceLifecycle';

export interface ServiceContext {
  settings: SvcdeckSettings;
  registry: ServiceRegistry;
  health: HealthMonitor;
  lifecycle: ServiceLifecycle;
}

export function createServiceContext(
  settings: SvcdeckSettings,
  report?: DiagnosticSink
): ServiceContext {
  const registry = new ServiceRegistry(settings.servicesDir, report);

  return {
    settings,
    registry,
    health: new HealthMonitor(registry, {
      composeCommand: settings.composeCommand,
      httpTimeoutMs: settings.healthTimeoutMs,
      statusTimeoutMs: settings.statusTimeoutMs,
      containerQueryTimeoutMs: settings.containerQueryTimeoutMs,
    }),
    lifecycle: new ServiceLifecycle({
      composeCommand: settings.composeCommand,
      commandTimeoutMs: settings.commandTimeoutMs,
    }),
  };
}

/** Loads settings, applies the configured log level and wires the core. */
export async function loadServiceContext(
  configManager: ConfigManager = ConfigManager.getInstance()
): Promise<ServiceContext> {
  const settings = await configManager.loadSettings();
  logger.setLevel(settings.logLevel);
  return createServiceContext(settings);
}

/**
 * Looks a service up by id, failing with the list of known ids.
 */
export function requireService(context: ServiceContext, id: string): ServiceConfig {
  const config = context.registry.get(id);
  if (!config) {
    const available = context.registry.ids().join(', ');
    throw new Error(`Service '${id}' not found. Available services: ${available || 'none'}`);
  }
  return config;
}
