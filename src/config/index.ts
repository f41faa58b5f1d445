import path from 'path';
import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { ExitCode, ResetError } from '../errors.js';

export const CONFIG_FILES = ['dbreset.yaml', '.dbreset.yaml'];

export const DEFAULTS = {
  host: '127.0.0.1',
  port: 3306,
  user: 'root',
  mysqlBin: 'mysql',
} as const;

// Project file config (dbreset.yaml)
export interface FileConfig {
  host?: string;
  port?: string;
  user?: string;
  password?: string;
  mysqlBin?: string;
}

/**
 * Connection settings before command-line flags are applied
 */
export interface BaseConfig {
  host: string;
  port: number;
  user: string;
  password?: string;
  mysqlBin: string;
}

/**
 * Everything a run needs. `deleteBeforeCreate` is tri-state:
 * undefined means the operator is asked (when interactive).
 */
export interface Configuration extends BaseConfig {
  database?: string;
  skipInsert: boolean;
  deleteBeforeCreate: boolean | undefined;
}

/**
 * Flags as read from the command line
 */
export type CliOptions = {
  fresh?: string;
  user?: string;
  password?: string;
  host?: string;
  port?: number;
  insert: boolean;
  initial?: boolean;
};

export function toPort(value: string): number | undefined {
  if (!/^\d+$/.test(value.trim())) return undefined;
  const port = parseInt(value, 10);
  return port >= 1 && port <= 65535 ? port : undefined;
}

function stringField(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load dbreset.yaml (or .dbreset.yaml) from the working directory.
 * A file that fails to parse is reported and ignored.
 */
export function loadFileConfig(
  cwd: string,
  warn: (message: string) => void = console.warn
): FileConfig {
  for (const name of CONFIG_FILES) {
    const configPath = path.join(cwd, name);
    if (!fs.existsSync(configPath)) continue;

    try {
      const parsed: unknown = parseYaml(fs.readFileSync(configPath, 'utf-8'));
      if (parsed === null || parsed === undefined) return {};
      if (!isRecord(parsed)) {
        warn(`Ignoring ${configPath}: expected a mapping at the top level`);
        return {};
      }
      return {
        host: stringField(parsed, 'host'),
        port: stringField(parsed, 'port'),
        user: stringField(parsed, 'user'),
        password: stringField(parsed, 'password'),
        mysqlBin: stringField(parsed, 'mysqlBin'),
      };
    } catch (err) {
      warn(`Failed to parse config at ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
      return {};
    }
  }
  return {};
}

/**
 * Defaults, overlaid by the project file, overlaid by DBRESET_* env vars
 */
export function loadBaseConfig(
  cwd: string,
  env: NodeJS.ProcessEnv,
  warn?: (message: string) => void
): BaseConfig {
  const file = loadFileConfig(cwd, warn);

  const rawPort = env.DBRESET_PORT || file.port;
  let port: number = DEFAULTS.port;
  if (rawPort !== undefined && rawPort !== '') {
    const parsed = toPort(rawPort);
    if (parsed === undefined) {
      throw new ResetError(`Invalid port in configuration: '${rawPort}'`, ExitCode.Usage, {
        hint: 'Use a number between 1 and 65535 for DBRESET_PORT or "port" in dbreset.yaml.',
      });
    }
    port = parsed;
  }

  return {
    host: env.DBRESET_HOST || file.host || DEFAULTS.host,
    port,
    user: env.DBRESET_USER || file.user || DEFAULTS.user,
    // An empty DBRESET_PASSWORD is a deliberate empty password
    password: env.DBRESET_PASSWORD ?? file.password,
    mysqlBin: env.DBRESET_MYSQL_BIN || file.mysqlBin || DEFAULTS.mysqlBin,
  };
}

/**
 * Apply command-line flags on top of the base config
 */
export function applyCliOptions(base: BaseConfig, options: CliOptions): Configuration {
  let deleteBeforeCreate: boolean | undefined;
  if (options.fresh !== undefined) {
    deleteBeforeCreate = true;
  } else if (options.initial) {
    deleteBeforeCreate = false;
  }

  return {
    host: options.host ?? base.host,
    port: options.port ?? base.port,
    user: options.user ?? base.user,
    password: options.password ?? base.password,
    mysqlBin: base.mysqlBin,
    database: options.fresh,
    skipInsert: !options.insert,
    deleteBeforeCreate,
  };
}
