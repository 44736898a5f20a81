import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import type { ConfigSources, RipConfig } from './types.js';
import { DEFAULT_CONFIG, defaultConfigSources } from './defaults.js';
import { logger } from '../utils/logger.js';
import { isAccessible } from '../utils/fs-utils.js';

/**
 * Load configuration from file
 */
async function loadConfigFile(path: string): Promise<Partial<RipConfig> | null> {
  if (!(await isAccessible(path))) {
    return null;
  }

  try {
    const content = await readFile(path, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error('Configuration file must define an object');
    }
    const config = parsed as Partial<RipConfig>;
    logger.debug(`Loaded config from: ${path}`);
    return config;
  } catch (error) {
    logger.warn(`Failed to parse config file: ${path}`);
    logger.debug(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

function requireSection(value: unknown, field: string): void {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Configuration error: ${field} must be an object`);
  }
}

/**
 * Merge configurations with precedence
 */
function mergeConfigs(...configs: Array<Partial<RipConfig> | null>): RipConfig {
  const merged: RipConfig = {
    ...DEFAULT_CONFIG,
    naming: { ...DEFAULT_CONFIG.naming },
    progress: { ...DEFAULT_CONFIG.progress },
  };

  for (const config of configs) {
    if (!config) continue;

    if (config.outputDirectory !== undefined) merged.outputDirectory = config.outputDirectory;
    if (config.dryRun !== undefined) merged.dryRun = config.dryRun;
    if (config.compression !== undefined) merged.compression = config.compression;
    if (config.debug !== undefined) merged.debug = config.debug;
    if (config.naming !== undefined) {
      requireSection(config.naming, 'naming');
      merged.naming = { ...merged.naming, ...config.naming };
    }
    if (config.progress !== undefined) {
      requireSection(config.progress, 'progress');
      merged.progress = { ...merged.progress, ...config.progress };
    }
  }

  return merged;
}

/**
 * Replace a leading ~ with the home directory
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

function requireBoolean(value: unknown, field: string): void {
  if (typeof value !== 'boolean') {
    throw new Error(`Configuration error: ${field} must be a boolean`);
  }
}

function requirePositiveInterval(value: unknown, field: string): void {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new Error(`Configuration error: ${field} must be a positive number of milliseconds`);
  }
}

/**
 * Validates the merged configuration
 * @throws Error if configuration is invalid
 */
function validateConfig(config: RipConfig): void {
  if (typeof config.outputDirectory !== 'string' || config.outputDirectory.trim() === '') {
    throw new Error('Configuration error: outputDirectory must be a non-empty string');
  }

  requireBoolean(config.dryRun, 'dryRun');
  requireBoolean(config.compression, 'compression');
  requireBoolean(config.debug, 'debug');

  if (typeof config.naming.separator !== 'string') {
    throw new Error('Configuration error: naming.separator must be a string');
  }
  requireBoolean(config.naming.lowercase, 'naming.lowercase');

  requirePositiveInterval(config.progress.pollIntervalMs, 'progress.pollIntervalMs');
  requirePositiveInterval(config.progress.sampleIntervalMs, 'progress.sampleIntervalMs');
}

/**
 * Load configuration with hierarchy:
 * 1. Explicit config file path (highest priority)
 * 2. ~/.config/disc-rip/config.json
 * 3. ./disc-rip.json
 * 4. Default config (lowest priority)
 */
export async function loadConfig(
  configPath?: string,
  sources: ConfigSources = defaultConfigSources()
): Promise<RipConfig> {
  const configs: Array<Partial<RipConfig> | null> = [];

  configs.push(await loadConfigFile(sources.localPath));
  configs.push(await loadConfigFile(sources.userPath));

  if (configPath) {
    const explicitConfig = await loadConfigFile(configPath);
    if (!explicitConfig) {
      throw new Error(`Config file not found or invalid: ${configPath}`);
    }
    configs.push(explicitConfig);
  }

  const config = mergeConfigs(...configs);
  validateConfig(config);

  return { ...config, outputDirectory: expandHome(config.outputDirectory) };
}
