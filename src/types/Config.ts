import { LogLevel } from '../utils/Logger';

export interface SvcdeckSettings {
  servicesDir: string;
  composeCommand: string;
  logLevel: LogLevel;
  healthTimeoutMs: number;
  statusTimeoutMs: number;
  containerQueryTimeoutMs: number;
  commandTimeoutMs: number;
}
