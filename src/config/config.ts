/**
 * Config Loader
 *
 * Loads config/fusion.json with {env:VAR} resolution.
 * Supports FUSION_CONFIG env var to override config path.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { configError } from '@/core/fusion/errors';
import { type Config, configSchema } from './schema';

export const DEFAULT_CONFIG_PATH = 'config/fusion.json';

/**
 * Resolve {env:VAR} patterns in text.
 * Returns empty string if env var is not set.
 */
export function resolveEnvVars(text: string): string {
  return text.replace(/\{env:([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => {
    return process.env[varName] ?? '';
  });
}

/**
 * Validate parsed config data. Throws a CONFIG_ERROR FusionError listing every issue.
 */
export function parseConfig(data: unknown): Config {
  const result = configSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`);
    throw configError(`Invalid config:\n${issues.join('\n')}`);
  }
  return result.data;
}

/**
 * Load and validate config from file.
 */
export function loadConfig(configPath: string): Config {
  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw configError(
        `Config file not found: ${configPath}\n` +
          'Copy config/fusion.example.json to config/fusion.json and configure it.'
      );
    }
    throw err;
  }

  text = resolveEnvVars(text);

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    throw configError(`Invalid JSON in config file: ${configPath}`);
  }

  return parseConfig(data);
}

// Lazy load and cache
let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    const configPath = process.env['FUSION_CONFIG'] ?? resolve(process.cwd(), DEFAULT_CONFIG_PATH);
    cachedConfig = loadConfig(configPath);
  }
  return cachedConfig;
}
