/**
 * Configuration management for autocrew
 */

import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { z } from 'zod';
import type { AutocrewConfig } from '../types.js';
import { logger, initErrorTracking } from './logger.js';

const StoreConfigSchema = z.object({
  fileName: z.string().min(1).default('.autocrew.db'),
});

const QualityConfigSchema = z.object({
  maxRetries: z.number().int().min(1).max(50).default(3),
});

const CoordinatorConfigSchema = z.object({
  maxInFlightPerRole: z.number().int().min(1).max(20).default(3),
  // 30 minutes
  staleAfterMs: z.number().int().min(1000).max(86_400_000).default(1_800_000),
  redeliverOnResume: z.boolean().default(true),
});

const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  format: z.enum(['json', 'pretty']).optional(),
  sentryDsn: z.string().optional(),
});

const ConfigSchema = z.object({
  version: z.string().default('1.0.0'),
  store: StoreConfigSchema.default({}),
  quality: QualityConfigSchema.default({}),
  coordinator: CoordinatorConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export const CONFIG_FILE_NAME = 'autocrew.config.json';

/**
 * Interpolate environment variables in config values
 */
function interpolateEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
      return process.env[envVar] ?? '';
    });
  }
  if (Array.isArray(obj)) {
    return obj.map(interpolateEnvVars);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = interpolateEnvVars(value);
    }
    return result;
  }
  return obj;
}

/**
 * Find config file by walking up directories
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = startDir;

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

/**
 * Load and validate configuration
 *
 * An explicit `configPath` wins; otherwise the nearest config file above
 * `startDir` is used. Invalid files fall back to defaults with a warning.
 */
export function loadConfig(configPath?: string, startDir?: string): AutocrewConfig {
  const path = configPath ?? findConfigFile(startDir);

  let rawConfig: unknown = {};

  if (path && existsSync(path)) {
    try {
      const content = readFileSync(path, 'utf-8');
      rawConfig = JSON.parse(content);
      logger.debug('Loaded config from file', { path });
    } catch (error) {
      logger.warn('Failed to parse config file, using defaults', {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  } else {
    logger.debug('No config file found, using defaults');
  }

  const interpolated = interpolateEnvVars(rawConfig);
  const result = ConfigSchema.safeParse(interpolated);

  if (!result.success) {
    logger.warn('Config validation errors, using defaults', {
      errors: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
    });
    return ConfigSchema.parse({});
  }

  return result.data;
}

export function getDefaultConfig(): AutocrewConfig {
  return ConfigSchema.parse({});
}

/**
 * Merge a partial override onto the defaults, validating the result
 */
export function createConfig(overrides: {
  store?: Partial<AutocrewConfig['store']>;
  quality?: Partial<AutocrewConfig['quality']>;
  coordinator?: Partial<AutocrewConfig['coordinator']>;
  logging?: Partial<AutocrewConfig['logging']>;
} = {}): AutocrewConfig {
  return ConfigSchema.parse(overrides);
}

/**
 * Save configuration to file
 */
export function saveConfig(config: AutocrewConfig, configPath?: string): void {
  const path = configPath ?? join(process.cwd(), CONFIG_FILE_NAME);

  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  writeFileSync(path, JSON.stringify(config, null, 2));
  logger.info('Configuration saved', { path });
}

export function validateConfig(config: unknown): { valid: boolean; errors?: string[] } {
  const result = ConfigSchema.safeParse(config);

  if (result.success) {
    return { valid: true };
  }

  return {
    valid: false,
    errors: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
  };
}

/**
 * Push the logging section into the shared logger and error tracking
 */
export function applyLoggingConfig(config: AutocrewConfig): void {
  logger.configure({ level: config.logging.level, format: config.logging.format });
  initErrorTracking(config.logging.sentryDsn);
}

let cachedConfig: AutocrewConfig | null = null;

/**
 * Get the current configuration (cached)
 */
export function getConfig(): AutocrewConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
