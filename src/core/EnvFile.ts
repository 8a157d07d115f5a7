import * as fs from 'fs-extra';
import * as path from 'path';
import { ServiceConfig } from '../types/Service';

export const ENV_FILE = '.env';

export function envFilePath(config: ServiceConfig): string {
  return path.join(config.path, ENV_FILE);
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(["\\n])/g, (_match, char: string) =>
      char === 'n' ? '\n' : char
    );
  }
  if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
    return value.slice(1, -1);
  }
  return value;
}

function needsQuotes(value: string): boolean {
  return value !== value.trim() || /[\s="'#\\]/.test(value);
}

function quote(value: string): string {
  const escaped = value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
  return `"${escaped}"`;
}

export function parseEnv(content: string): Record<string, string> {
  const vars: Record<string, string> = {};

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }

    const separator = line.indexOf('=');
    if (separator === -1) {
      continue;
    }

    const key = line.slice(0, separator).trim();
    if (key) {
      vars[key] = unquote(line.slice(separator + 1).trim());
    }
  }

  return vars;
}

export function serializeEnv(vars: Record<string, string>): string {
  const lines = Object.keys(vars)
    .sort()
    .map(key => {
      const value = vars[key] ?? '';
      return `${key}=${needsQuotes(value) ? quote(value) : value}`;
    });
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

export async function loadEnvFile(filePath: string): Promise<Record<string, string>> {
  if (!(await fs.pathExists(filePath))) {
    return {};
  }

  try {
    return parseEnv(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    throw new Error(
      `Failed to read env file ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
}

export async function saveEnvFile(filePath: string, vars: Record<string, string>): Promise<void> {
  try {
    await fs.ensureDir(path.dirname(filePath));
    await fs.writeFile(filePath, serializeEnv(vars), 'utf8');
  } catch (error) {
    throw new Error(
      `Failed to write env file ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
}

export function maskValue(value: string): string {
  if (!value) {
    return '';
  }
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  return value.slice(0, 4) + '*'.repeat(value.length - 8) + value.slice(-4);
}

/** Required variables that have neither a value nor a declared default. */
export function missingRequired(config: ServiceConfig, vars: Record<string, string>): string[] {
  return config.envVars
    .filter(envVar => envVar.required && !vars[envVar.name] && envVar.default === undefined)
    .map(envVar => envVar.name);
}
