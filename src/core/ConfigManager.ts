import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import * as yaml from 'yaml';
import { SvcdeckSettings } from '../types/Config';
import { isLogLevel } from '../utils/Logger';

export class ConfigManager {
  private static instance: ConfigManager;
  private readonly configDir: string;
  private readonly configPath: string;
  private settings: SvcdeckSettings | null = null;

  constructor(configDir: string = ConfigManager.defaultConfigDir()) {
    this.configDir = configDir;
    this.configPath = path.join(this.configDir, 'config.yml');
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  static defaultConfigDir(): string {
    return process.env.SVCDECK_HOME || path.join(os.homedir(), '.svcdeck');
  }

  async ensureConfigDir(): Promise<void> {
    await fs.ensureDir(this.configDir);
  }

  async loadSettings(): Promise<SvcdeckSettings> {
    if (this.settings) {
      return this.applyEnvironment(this.settings);
    }

    await this.ensureConfigDir();

    if (!(await fs.pathExists(this.configPath))) {
      this.settings = this.createDefaultSettings();
      await this.saveSettings();
      return this.applyEnvironment(this.settings);
    }

    try {
      const content = await fs.readFile(this.configPath, 'utf8');
      const parsed: unknown = yaml.parse(content);
      this.settings = this.validateSettings(parsed);
      return this.applyEnvironment(this.settings);
    } catch (error) {
      throw new Error(
        `Failed to load config: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  async saveSettings(): Promise<void> {
    if (!this.settings) {
      throw new Error('No settings to save');
    }

    await this.ensureConfigDir();

    try {
      const content = yaml.stringify(this.settings, {
        indent: 2,
        lineWidth: 100,
        minContentWidth: 0,
      });

      await fs.writeFile(this.configPath, content, 'utf8');
    } catch (error) {
      throw new Error(
        `Failed to save config: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  getConfigDir(): string {
    return this.configDir;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  private createDefaultSettings(): SvcdeckSettings {
    return {
      servicesDir: './services',
      composeCommand: 'docker compose',
      logLevel: 'info',
      healthTimeoutMs: 2000,
      statusTimeoutMs: 10000,
      containerQueryTimeoutMs: 5000,
      commandTimeoutMs: 120000,
    };
  }

  private validateSettings(raw: unknown): SvcdeckSettings {
    const defaults = this.createDefaultSettings();

    if (raw === null || raw === undefined) {
      return defaults;
    }
    if (typeof raw !== 'object' || Array.isArray(raw)) {
      throw new Error(`${this.configPath} must contain a mapping`);
    }

    const entries = new Map<string, unknown>(Object.entries(raw));
    const text = (key: keyof SvcdeckSettings, fallback: string): string => {
      const value = entries.get(key);
      if (value === undefined) {
        return fallback;
      }
      if (typeof value !== 'string' || value.trim() === '') {
        throw new Error(`'${key}' must be a non-empty string`);
      }
      return value;
    };
    const millis = (key: keyof SvcdeckSettings, fallback: number): number => {
      const value = entries.get(key);
      if (value === undefined) {
        return fallback;
      }
      if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
        throw new Error(`'${key}' must be a positive integer`);
      }
      return value;
    };

    const logLevel = entries.get('logLevel') ?? defaults.logLevel;
    if (!isLogLevel(logLevel)) {
      throw new Error(`'logLevel' must be one of debug, info, warn, error`);
    }

    return {
      servicesDir: text('servicesDir', defaults.servicesDir),
      composeCommand: text('composeCommand', defaults.composeCommand),
      logLevel,
      healthTimeoutMs: millis('healthTimeoutMs', defaults.healthTimeoutMs),
      statusTimeoutMs: millis('statusTimeoutMs', defaults.statusTimeoutMs),
      containerQueryTimeoutMs: millis('containerQueryTimeoutMs', defaults.containerQueryTimeoutMs),
      commandTimeoutMs: millis('commandTimeoutMs', defaults.commandTimeoutMs),
    };
  }

  private applyEnvironment(settings: SvcdeckSettings): SvcdeckSettings {
    const servicesDir = process.env.SVCDECK_SERVICES_DIR || settings.servicesDir;

    return {
      ...settings,
      servicesDir: path.resolve(servicesDir),
    };
  }
}
