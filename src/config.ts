/**
 * Configuration loading
 *
 * Precedence, highest first:
 *   1. process environment (OPENWEBUI_URL, OPENWEBUI_API_KEY, OPENWEBUI_TIMEOUT, OPENWEBUI_MODEL)
 *   2. `<cwd>/.env`
 *   3. `<cwd>/.owui/config.yaml`
 *   4. `<home>/.owui/config.yaml`
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import dotenv from 'dotenv';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors.js';
import { DEFAULT_TIMEOUT_MS } from './http.js';
import { createLogger } from './logger.js';

const log = createLogger('config');

export const CONFIG_DIRNAME = '.owui';
export const CONFIG_FILENAME = 'config.yaml';

export interface Config {
  serverUrl: string;
  apiKey: string;
  /** Request timeout in milliseconds */
  timeout: number;
  /** Model used when a command does not name one */
  defaultModel?: string;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  homeDir?: string;
}

const yamlConfigSchema = z.object({
  server: z
    .object({
      url: z.string().optional(),
      api_key: z.string().optional(),
      timeout: z.union([z.number(), z.string()]).optional(),
    })
    .optional(),
  defaults: z
    .object({
      model: z.string().optional(),
    })
    .optional(),
});

type YamlConfig = z.infer<typeof yamlConfigSchema>;

interface ConfigLayer {
  url?: string;
  apiKey?: string;
  timeout?: string | number;
  model?: string;
}

function readYamlConfig(path: string): YamlConfig {
  if (!existsSync(path)) {
    return {};
  }

  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Error reading YAML config file '${path}': ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (error) {
    throw new ConfigurationError(`Error parsing YAML config file '${path}': ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    log.warn(`Ignoring '${path}': root is not a mapping.`);
    return {};
  }

  const result = yamlConfigSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(
      `Invalid YAML config file '${path}': ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid value'}`
    );
  }
  log.debug(`Loaded configuration from '${path}'.`);
  return result.data;
}

function readDotenv(path: string): Record<string, string> {
  if (!existsSync(path)) {
    return {};
  }
  try {
    return dotenv.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Error reading env file '${path}': ${errorMessage(error)}`, { cause: error });
  }
}

function fromEnv(env: Record<string, string | undefined>): ConfigLayer {
  return {
    url: env.OPENWEBUI_URL || undefined,
    apiKey: env.OPENWEBUI_API_KEY || undefined,
    timeout: env.OPENWEBUI_TIMEOUT || undefined,
    model: env.OPENWEBUI_MODEL || undefined,
  };
}

function fromYaml(config: YamlConfig): ConfigLayer {
  return {
    url: config.server?.url || undefined,
    apiKey: config.server?.api_key || undefined,
    timeout: config.server?.timeout,
    model: config.defaults?.model || undefined,
  };
}

function parseTimeout(value: string | number | undefined): number {
  if (value === undefined || value === '') {
    return DEFAULT_TIMEOUT_MS;
  }
  const timeout = Number(value);
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new ConfigurationError(`Configuration error: timeout must be a positive number of milliseconds, got '${value}'.`);
  }
  return timeout;
}

/**
 * Resolve the client configuration from every source.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const home = options.homeDir ?? homedir();

  const userPath = join(home, CONFIG_DIRNAME, CONFIG_FILENAME);
  const projectPath = join(cwd, CONFIG_DIRNAME, CONFIG_FILENAME);

  // Lowest precedence first; later layers win.
  const layers: ConfigLayer[] = [
    fromYaml(readYamlConfig(userPath)),
    fromYaml(readYamlConfig(projectPath)),
    fromEnv(readDotenv(join(cwd, '.env'))),
    fromEnv(env),
  ];

  const merged: ConfigLayer = {};
  for (const layer of layers) {
    merged.url = layer.url ?? merged.url;
    merged.apiKey = layer.apiKey ?? merged.apiKey;
    merged.timeout = layer.timeout ?? merged.timeout;
    merged.model = layer.model ?? merged.model;
  }

  const sources = `the environment, ${join(cwd, '.env')}, ${projectPath} or ${userPath}`;
  if (!merged.url) {
    throw new ConfigurationError(
      `Configuration error: Open WebUI server URL is not configured. Set OPENWEBUI_URL or 'server.url' in ${sources}.`
    );
  }
  if (!merged.apiKey) {
    throw new ConfigurationError(
      `Configuration error: Open WebUI API key is not configured. Set OPENWEBUI_API_KEY or 'server.api_key' in ${sources}.`
    );
  }

  return {
    serverUrl: merged.url.replace(/\/+$/, ''),
    apiKey: merged.apiKey,
    timeout: parseTimeout(merged.timeout),
    defaultModel: merged.model,
  };
}
