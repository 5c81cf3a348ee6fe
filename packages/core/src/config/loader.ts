/**
 * Configuration loader - supports both JSON and TypeScript config files
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { ScanConfig } from '@route-conventions/types';
import { BASE_URL_ENV, DEFAULT_CONFIG } from './defaults';
import { ConfigFileSchema, type ConfigFileInput } from './schema';
import { toConfigError, validateConfig } from './validator';

export interface LoadConfigOptions {
  rootDir: string;
  configPath?: string;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

export const CONFIG_FILE_NAMES = [
  'route-conventions.config.ts',
  'route-conventions.config.js',
  'route-conventions.config.json',
  '.route-conventions.json',
];

/**
 * Load configuration from file or use defaults
 */
export async function loadConfig(options: LoadConfigOptions): Promise<ScanConfig> {
  const { rootDir, configPath, env = process.env } = options;

  let fileConfig: ConfigFileInput = {};

  if (configPath) {
    const resolvedPath = path.isAbsolute(configPath)
      ? configPath
      : path.resolve(rootDir, configPath);
    fileConfig = await loadConfigFromFile(resolvedPath);
  } else {
    // If no config path provided, try to find default config file
    const defaultPath = await findDefaultConfig(rootDir);
    if (defaultPath) {
      fileConfig = await loadConfigFromFile(defaultPath);
    }
  }

  return mergeWithDefaults(fileConfig, rootDir, env);
}

/**
 * Find default config file in directory
 */
export async function findDefaultConfig(rootDir: string): Promise<string | null> {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(rootDir, name);
    try {
      await fs.access(configPath);
      return configPath;
    } catch {
      // File doesn't exist, try next
    }
  }

  return null;
}

/**
 * Load and validate configuration from a specific file
 */
async function loadConfigFromFile(configPath: string): Promise<ConfigFileInput> {
  try {
    const ext = path.extname(configPath).toLowerCase();
    let rawConfig: unknown;

    if (ext === '.json') {
      const content = await fs.readFile(configPath, 'utf-8');
      rawConfig = JSON.parse(content);
    } else if (ext === '.ts' || ext === '.js') {
      rawConfig = await loadModuleConfig(configPath);
    } else {
      throw new Error(`Unsupported config file extension: ${ext}`);
    }

    const parsed = ConfigFileSchema.safeParse(rawConfig);
    if (!parsed.success) {
      throw toConfigError(parsed.error);
    }
    return parsed.data;
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(`Failed to load config from ${configPath}: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Load TypeScript/JavaScript config file
 */
async function loadModuleConfig(configPath: string): Promise<unknown> {
  try {
    const configModule: unknown = await import(configPath);

    // Support both default export and named export
    if (
      typeof configModule === 'object' &&
      configModule !== null &&
      'default' in configModule &&
      configModule.default
    ) {
      return configModule.default;
    }
    return configModule;
  } catch (error) {
    throw new Error(
      `Failed to load TypeScript config. Ensure the file exports a default config object. ` +
      `Error: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Merge file configuration with defaults and environment overrides
 */
function mergeWithDefaults(
  fileConfig: ConfigFileInput,
  rootDir: string,
  env: NodeJS.ProcessEnv,
): ScanConfig {
  const envBaseUrl = env[BASE_URL_ENV]?.trim();

  return validateConfig({
    ...DEFAULT_CONFIG,
    ...fileConfig,
    // Merge arrays properly
    include: fileConfig.include ?? DEFAULT_CONFIG.include,
    exclude: fileConfig.exclude ?? DEFAULT_CONFIG.exclude,
    actionsDir: fileConfig.actionsDir ?? DEFAULT_CONFIG.actionsDir,
    baseUrl: fileConfig.baseUrl ?? (envBaseUrl || undefined),
    // rootDir always comes from the function parameter, not config file
    rootDir,
  });
}
