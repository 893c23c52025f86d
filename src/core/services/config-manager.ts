/**
 * Configuration management service
 *
 * Finds and reads config.yaml and secrets.yaml, validates them, and applies
 * environment overrides. The loaded configuration is frozen and handed to the
 * pipeline explicitly.
 */

import { access, mkdir, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { errors, errorMessage } from '../../utils/errors.js';
import logger from '../../utils/logger.js';
import type { ProviderConfig, ProviderName } from './llm-service.js';

export const CONFIG_FILE = 'config.yaml';
export const SECRETS_FILE = 'secrets.yaml';
export const SECRETS_TEMPLATE_FILE = 'secrets.yaml.template';

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  openai: 'gpt-4o',
  anthropic: 'claude-3-5-sonnet-20241022',
};

// ============================================================================
// SCHEMA
// ============================================================================

export const generationConfigSchema = z.object({
  maxKeyFiles: z.number().int().positive().default(12),
  maxBytesPerFile: z.number().int().positive().default(8000),
  maxSelectionBytes: z.number().int().positive().default(1024 * 1024),
  maxTotalPromptBytes: z.number().int().positive().default(60000),
  output: z.string().min(1).default('README.md'),
});

export const retryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  initialDelay: z.number().int().min(0).default(1000),
  maxDelay: z.number().int().min(0).default(30000),
  timeout: z.number().int().positive().default(120000),
});

export const configSchema = z.object({
  provider: z.enum(['openai', 'anthropic']).default('openai'),
  model: z.string().min(1).optional(),
  apiBase: z.string().url().optional(),
  apiKeys: z.object({
    openai: z.string().optional(),
    anthropic: z.string().optional(),
  }).default({}),
  generation: generationConfigSchema.default({}),
  retry: retryConfigSchema.default({}),
  exclude: z.array(z.string()).default([]),
});

export type RepodocConfig = z.infer<typeof configSchema>;

/**
 * Validated configuration plus the directory it came from
 */
export type LoadedConfig = Readonly<RepodocConfig> & {
  /** Directory holding config.yaml, null when running on built-in defaults */
  readonly source: string | null;
};

export interface LoadConfigOptions {
  /** Explicit configuration directory (--config) */
  configDir?: string;
  cwd?: string;
  homeDir?: string;
  /** Environment variables to apply on top of the files */
  env?: Record<string, string | undefined>;
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Check if a file exists
 */
async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge `override` into a copy of `base`; nested objects merge, everything
 * else is replaced
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? deepMerge(current, value) : value;
  }

  return merged;
}

function deepFreeze<T extends object>(value: T): T {
  Object.values(value).forEach((child: unknown) => {
    if (typeof child === 'object' && child !== null) {
      deepFreeze(child);
    }
  });
  return Object.freeze(value);
}

/**
 * Read a YAML file as a mapping; null when the file does not exist
 */
async function readYamlFile(path: string): Promise<Record<string, unknown> | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw errors.invalidConfig(path, errorMessage(error));
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (error) {
    throw errors.invalidConfig(path, errorMessage(error));
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw errors.invalidConfig(path, 'expected a mapping at the top level');
  }
  return parsed;
}

// ============================================================================
// LOADING
// ============================================================================

/**
 * Directories searched for config.yaml, in priority order
 */
export function configSearchPaths(options: LoadConfigOptions = {}): string[] {
  const cwd = options.cwd ?? process.cwd();
  const home = options.homeDir ?? homedir();

  if (options.configDir) {
    return [resolve(cwd, options.configDir)];
  }

  return [
    join(cwd, '.repodoc'),
    join(home, '.config', 'repodoc'),
    '/etc/repodoc',
  ];
}

/**
 * First search directory that holds a config.yaml
 */
export async function findConfigDir(options: LoadConfigOptions = {}): Promise<string | null> {
  const candidates = configSearchPaths(options);

  for (const dir of candidates) {
    if (await fileExists(join(dir, CONFIG_FILE))) {
      return dir;
    }
  }

  if (options.configDir) {
    throw errors.configNotFound(candidates[0] ?? options.configDir);
  }

  return null;
}

/**
 * Overlay environment variables on raw configuration
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: Record<string, string | undefined>
): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const apiKeys: Record<string, string> = {};

  if (env.OPENAI_API_KEY) apiKeys.openai = env.OPENAI_API_KEY;
  if (env.ANTHROPIC_API_KEY) apiKeys.anthropic = env.ANTHROPIC_API_KEY;
  if (Object.keys(apiKeys).length > 0) overrides.apiKeys = apiKeys;

  if (env.REPODOC_PROVIDER) overrides.provider = env.REPODOC_PROVIDER;
  if (env.REPODOC_MODEL) overrides.model = env.REPODOC_MODEL;

  return deepMerge(raw, overrides);
}

/**
 * Validate raw configuration, reporting every problem at once
 */
export function parseConfig(raw: unknown, source: string): RepodocConfig {
  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const details = result.error.errors
      .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
      .join('; ');
    throw errors.invalidConfig(source, details);
  }

  return result.data;
}

/**
 * Load configuration: config.yaml, then secrets.yaml, then the environment.
 * Without any configuration directory the built-in defaults apply.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const dir = await findConfigDir(options);
  let raw: Record<string, unknown> = {};

  if (dir) {
    const configPath = join(dir, CONFIG_FILE);
    raw = (await readYamlFile(configPath)) ?? {};

    const secrets = await readYamlFile(join(dir, SECRETS_FILE));
    if (secrets) {
      raw = deepMerge(raw, secrets);
    } else {
      logger.debug(`No ${SECRETS_FILE} in ${dir}`);
    }
    logger.debug(`Loaded configuration from ${dir}`);
  } else {
    logger.debug('No configuration directory found, using defaults');
  }

  raw = applyEnvOverrides(raw, options.env ?? {});
  const config = parseConfig(raw, dir ? join(dir, CONFIG_FILE) : 'environment');

  return deepFreeze({ ...config, source: dir });
}

// ============================================================================
// PROVIDER SETTINGS
// ============================================================================

/**
 * True for empty keys and the values shipped in the secrets template
 */
export function isPlaceholderKey(key: string | undefined): boolean {
  if (!key || key.trim() === '') return true;
  return /^(your[-_]|<|changeme|xxx)/i.test(key.trim());
}

/**
 * Model for the configured provider, honouring an explicit override
 */
export function resolveModel(config: RepodocConfig, override?: string): string {
  return override ?? config.model ?? DEFAULT_MODELS[config.provider];
}

/**
 * Backend settings for the configured provider. Only checks that a real
 * looking key is present; the backend decides whether it is valid.
 */
export function resolveProviderConfig(config: RepodocConfig, modelOverride?: string): ProviderConfig {
  const apiKey = config.apiKeys[config.provider];

  if (apiKey === undefined || isPlaceholderKey(apiKey)) {
    throw errors.noApiKey(config.provider);
  }

  return {
    provider: config.provider,
    apiKey,
    model: resolveModel(config, modelOverride),
    apiBase: config.apiBase,
  };
}

// ============================================================================
// DEFAULT FILES
// ============================================================================

function templateUrl(name: string): URL {
  return new URL(`../../../data/${name}`, import.meta.url);
}

export interface WrittenConfig {
  configPath: string;
  secretsTemplatePath: string;
}

/**
 * Write config.yaml and secrets.yaml.template into a directory
 */
export async function writeDefaultConfig(dir: string): Promise<WrittenConfig> {
  const configPath = join(dir, CONFIG_FILE);
  const secretsTemplatePath = join(dir, SECRETS_TEMPLATE_FILE);

  try {
    await mkdir(dir, { recursive: true });
    await writeFile(configPath, await readFile(templateUrl(CONFIG_FILE), 'utf-8'), 'utf-8');
    await writeFile(
      secretsTemplatePath,
      await readFile(templateUrl(SECRETS_TEMPLATE_FILE), 'utf-8'),
      'utf-8'
    );
  } catch (error) {
    throw errors.fileWriteError(dir, errorMessage(error));
  }

  return { configPath, secretsTemplatePath };
}

/**
 * Check if a directory already holds a config.yaml
 */
export async function configExists(dir: string): Promise<boolean> {
  return fileExists(join(dir, CONFIG_FILE));
}
