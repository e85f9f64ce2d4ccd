/**
 * Zone Finder CLI Configuration Management
 *
 * Loads configuration from .zonefinderrc (YAML or JSON) with environment
 * variable overrides and sensible defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (ZONE_FINDER_*)
 * 3. Config file (.zonefinderrc or --config path)
 * 4. Default values
 *
 * Example .zonefinderrc:
 * ```yaml
 * version: 1
 * data_files:
 *   - /data/misc/zoneinfo/current/tzlookup.xml
 *   - /system/usr/share/zoneinfo/tzlookup.xml
 * log_level: warn
 * ```
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { delimiter, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { parseLogLevel, type LogLevel } from '../../core/utils/logger.js';
import { TZLOOKUP_FILE_NAME } from '../../finder/time-zone-finder.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Candidate data files, tried in order */
  readonly dataFiles: readonly string[];
  /** Minimum level for library and CLI logs */
  readonly logLevel: LogLevel;
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure
 */
const configFileSchema = z
  .object({
    version: z.literal(1).optional(),
    data_files: z.array(z.string().min(1, 'Data file path cannot be empty')).min(1).optional(),
    log_level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    json: z.boolean().optional(),
  })
  .strict();

type ConfigFileSchema = z.infer<typeof configFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'configPath'> = {
  dataFiles: [`./data/${TZLOOKUP_FILE_NAME}`],
  logLevel: 'info',
  json: false,
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.zonefinderrc',
  '.zonefinderrc.yaml',
  '.zonefinderrc.yml',
  '.zonefinderrc.json',
];

/**
 * Find config file in current directory or parent directories
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (dir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    dir = resolve(dir, '..');
  }

  return null;
}

/**
 * Parse and validate config file content
 */
export function parseConfigFile(filePath: string): ConfigFileSchema {
  const content = readFileSync(filePath, 'utf-8');

  // YAML is a superset of JSON, but JSON files get JSON error messages
  const raw: unknown = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);

  // An empty YAML file parses to null
  const result = configFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config file ${filePath}: ${issues}`, { cause: result.error });
  }
  return result.data;
}

function getEnvVar(name: string): string | undefined {
  return process.env[`ZONE_FINDER_${name}`];
}

function getEnvBool(name: string): boolean | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvList(name: string): string[] | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  const entries = value
    .split(delimiter)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return entries.length > 0 ? entries : undefined;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    dataFiles?: readonly string[];
  };
}

/**
 * Load and merge configuration from all sources
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  let configPath: string | null = null;
  let fileConfig: ConfigFileSchema = {};

  if (options.configPath) {
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar('CONFIG');
    if (envConfigPath) {
      configPath = resolve(envConfigPath);
      if (existsSync(configPath)) {
        fileConfig = parseConfigFile(configPath);
      }
    } else {
      configPath = findConfigFile(options.cwd ?? process.cwd());
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const verbose = options.overrides?.verbose ?? getEnvBool('VERBOSE') ?? false;

  return {
    dataFiles:
      options.overrides?.dataFiles ??
      getEnvList('DATA_FILES') ??
      fileConfig.data_files ??
      DEFAULT_CONFIG.dataFiles,
    logLevel: verbose
      ? 'debug'
      : parseLogLevel(getEnvVar('LOG_LEVEL')) ?? fileConfig.log_level ?? DEFAULT_CONFIG.logLevel,
    verbose,
    json: options.overrides?.json ?? getEnvBool('JSON') ?? fileConfig.json ?? DEFAULT_CONFIG.json,
    configPath,
  };
}
