/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the lantern directory
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Apply environment overrides (env values override the file)
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML, { type JsonMap } from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { loadEnv, type EnvVars } from './env.js';
import { getConfigPath, getLanternDir, expandHome } from './paths.js';
import { ConfigError } from '../errors/index.js';

/**
 * Options for loadConfig
 */
export interface LoadConfigOptions {
  /** Write the commented template on first run (default: true) */
  createIfMissing?: boolean;
  /** Config file to read (default: <lantern dir>/config.toml) */
  configPath?: string;
  /** Environment overrides (default: process.env via loadEnv) */
  env?: EnvVars;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source values overriding target.
 * Arrays and primitives are replaced, nested objects are merged.
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Validate a merged object against the full schema.
 */
function validateMerged(merged: PlainObject, context: string, hint: string): Config {
  const result = ConfigSchema.safeParse(merged);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`${context}:\n${issues}`, hint);
  }

  return result.data;
}

/**
 * Apply environment overrides on top of a config.
 * Each variable is independent; unset variables leave the config alone.
 */
export function applyEnvOverrides(config: Config, env: EnvVars): Config {
  return {
    ...config,
    embedding: {
      ...config.embedding,
      model: env.EMBEDDING_MODEL ?? config.embedding.model,
      dimensions: env.EMBEDDING_DIM ?? config.embedding.dimensions,
    },
    chunking: {
      ...config.chunking,
      chunk_size: env.CHUNK_SIZE ?? config.chunking.chunk_size,
      chunk_overlap: env.CHUNK_OVERLAP ?? config.chunking.chunk_overlap,
    },
    context: {
      ...config.context,
      max_tokens: env.MAX_CONTEXT_TOKENS ?? config.context.max_tokens,
    },
    index: {
      ...config.index,
      path: env.INDEX_FILE ?? config.index.path,
    },
  };
}

/**
 * Resolve the configured index path to an absolute path.
 * `~` expands to the home directory; relative paths sit in the lantern directory.
 */
export function resolveIndexPath(config: Config): string {
  const expanded = expandHome(config.index.path);
  return path.isAbsolute(expanded) ? expanded : path.join(getLanternDir(), expanded);
}

/**
 * Read and parse a TOML file into a plain object.
 */
function readToml(configPath: string): PlainObject {
  const content = fs.readFileSync(configPath, 'utf-8');

  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: lantern config reset --force`
    );
  }
}

/**
 * Load and parse the config file.
 * Returns defaults + file values + environment overrides.
 *
 * @throws ConfigError if the file or an environment override is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const {
    createIfMissing = true,
    configPath = getConfigPath(),
    env = loadEnv(),
  } = options;

  let fileConfig: PlainObject = {};

  if (fs.existsSync(configPath)) {
    const parsed = readToml(configPath);

    // Validate against the partial schema (allows missing fields)
    const validationResult = PartialConfigSchema.safeParse(parsed);
    if (!validationResult.success) {
      const issues = validationResult.error.issues
        .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
        .join('\n');
      throw new ConfigError(
        `Invalid configuration:\n${issues}`,
        'Run: lantern config reset --force  to restore defaults'
      );
    }
    fileConfig = parsed;
  } else if (createIfMissing) {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  }

  const merged = validateMerged(
    deepMerge(DEFAULT_CONFIG, fileConfig),
    'Invalid configuration',
    'Run: lantern config reset --force  to restore defaults'
  );

  return validateMerged(
    applyEnvOverrides(merged, env),
    'Invalid configuration after environment overrides',
    'Check EMBEDDING_DIM, CHUNK_SIZE, CHUNK_OVERLAP and MAX_CONTEXT_TOKENS'
  );
}

/**
 * Look up a value by dot-notation path.
 * Example: getConfigValue(config, 'embedding.model') => 'all-minilm'
 */
export function getConfigValue(config: Config, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a specific config value by dot-notation path.
 * Writes the change back to the config file after validating it.
 */
export function setConfigValue(
  key: string,
  value: string,
  configPath: string = getConfigPath()
): void {
  const parts = key.split('.').filter(Boolean);
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError(
      'Invalid config key: empty key',
      'Run: lantern config list  to see available keys'
    );
  }

  const config: PlainObject = fs.existsSync(configPath) ? readToml(configPath) : {};

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: PlainObject = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parseValue(value);

  // Unknown keys would be stripped silently by zod; reject them instead
  if (getConfigValue(DEFAULT_CONFIG, key) === undefined && !key.startsWith('indexing.')) {
    throw new ConfigError(
      `Unknown config key: ${key}`,
      'Run: lantern config list  to see available keys'
    );
  }

  validateMerged(
    deepMerge(DEFAULT_CONFIG, config),
    `Invalid value for '${key}'`,
    'Run: lantern config list  to see current values and types'
  );

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, TOML.stringify(toJsonMap(config)), 'utf-8');
}

/**
 * Narrow a plain object to the map type TOML.stringify accepts.
 * Values come from TOML.parse or parseValue, so every leaf is a
 * string, number, boolean or an array/table of those.
 */
function toJsonMap(value: PlainObject): JsonMap {
  const out: JsonMap = {};
  for (const [key, entry] of Object.entries(value)) {
    if (isPlainObject(entry)) {
      out[key] = toJsonMap(entry);
    } else if (
      typeof entry === 'string' ||
      typeof entry === 'number' ||
      typeof entry === 'boolean'
    ) {
      out[key] = entry;
    } else if (Array.isArray(entry)) {
      out[key] = entry.filter(
        (item): item is string | number | boolean =>
          typeof item === 'string' || typeof item === 'number' || typeof item === 'boolean'
      );
    }
  }
  return out;
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
function parseValue(value: string): string | number | boolean {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * List all config values in a flat format
 * Returns entries like ['embedding.model', 'all-minilm']
 */
export function listConfig(config: Config): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: PlainObject, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}
