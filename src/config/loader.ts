/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { SchedulerError } from '../api/errors.js';
import type { RenderOptions } from '../report/renderer.js';
import type { SimulationOptions } from '../types/scheduling.js';
import {
  ENVIRONMENTS,
  SchedulerConfigSchema,
  type Environment,
  type SchedulerConfig,
} from '../types/schemas/config.js';

export type { SchedulerConfig, Environment };

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEnvironment(value: string): value is Environment {
  return ENVIRONMENTS.some((environment) => environment === value);
}

/**
 * Deep merge two objects; arrays and scalars from `source` replace
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

/**
 * Default config path inside the installed package
 */
export function defaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'scheduler.yaml');
}

function formatIssues(error: { issues: Array<{ path: Array<string | number>; message: string }> }): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'root'} ${issue.message}`)
    .join('\n');
}

/**
 * Load configuration from YAML file
 */
export function loadConfig(configPath?: string, environment?: Environment): SchedulerConfig {
  const finalPath = configPath || defaultConfigPath();

  let fileContents: string;
  try {
    fileContents = readFileSync(finalPath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new SchedulerError('ConfigError', `Configuration file not found: ${finalPath}`, {
        path: finalPath,
      });
    }
    throw new SchedulerError('ConfigError', `Failed to load configuration: ${String(error)}`, {
      path: finalPath,
    });
  }

  let document: unknown;
  try {
    document = yaml.load(fileContents);
  } catch (error) {
    throw new SchedulerError('ConfigError', `Invalid YAML in ${finalPath}: ${String(error)}`, {
      path: finalPath,
    });
  }

  if (!isPlainObject(document)) {
    throw new SchedulerError('ConfigError', `Configuration root must be a mapping: ${finalPath}`, {
      path: finalPath,
    });
  }

  // Apply environment-specific overrides
  const envName = environment ?? process.env.NODE_ENV ?? 'development';
  const env: Environment = isEnvironment(envName) ? envName : 'development';
  const { environments, ...base } = document;

  let merged: PlainObject = base;
  if (isPlainObject(environments)) {
    const overrides = environments[env];
    if (isPlainObject(overrides)) {
      merged = deepMerge(base, overrides);
    }
  }

  const parseResult = SchedulerConfigSchema.safeParse(merged);
  if (!parseResult.success) {
    throw new SchedulerError(
      'ConfigError',
      `Configuration validation failed:\n${formatIssues(parseResult.error)}`,
      { path: finalPath, environment: env }
    );
  }

  return parseResult.data;
}

/**
 * Validate configuration values (for configs built in code)
 */
export function validateConfig(config: SchedulerConfig): void {
  const parseResult = SchedulerConfigSchema.safeParse(config);
  if (!parseResult.success) {
    throw new SchedulerError(
      'ConfigError',
      `Configuration validation failed:\n${formatIssues(parseResult.error)}`
    );
  }
}

/**
 * Global configuration instance
 */
let globalConfig: SchedulerConfig | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: Environment): SchedulerConfig {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): SchedulerConfig {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

/**
 * Simulation options derived from configuration
 */
export function getSimulationOptions(config: SchedulerConfig = getConfig()): SimulationOptions {
  return {
    quantum: config.scheduling.round_robin.quantum,
  };
}

/**
 * Renderer options derived from configuration
 */
export function getRenderOptions(config: SchedulerConfig = getConfig()): RenderOptions {
  return {
    ganttCellWidth: config.report.gantt_cell_width,
    decimals: config.report.decimals,
  };
}
