import chalk from 'chalk';
import { ServiceCategory, ServiceStatus } from '../types/Service';

interface StatusStyle {
  symbol: string;
  label: string;
  paint: (text: string) => string;
}

export const STATUS_STYLES: Record<ServiceStatus, StatusStyle> = {
  not_installed: { symbol: '◌', label: 'not installed', paint: chalk.dim },
  stopped: { symbol: '○', label: 'stopped', paint: chalk.white },
  starting: { symbol: '◐', label: 'starting', paint: chalk.yellow },
  running: { symbol: '●', label: 'running', paint: chalk.green },
  unhealthy: { symbol: '✕', label: 'unhealthy', paint: chalk.red },
  error: { symbol: '✕', label: 'error', paint: chalk.red },
};

const CATEGORY_COLORS: Record<ServiceCategory, (text: string) => string> = {
  core: chalk.cyan,
  optional: chalk.white,
  experimental: chalk.magenta,
};

export function formatStatus(status: ServiceStatus): string {
  const style = STATUS_STYLES[status];
  return style.paint(`${style.symbol} ${style.label}`);
}

export function formatCategory(category: ServiceCategory): string {
  return CATEGORY_COLORS[category](category);
}
