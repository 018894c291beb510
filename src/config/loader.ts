import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { ZodError } from 'zod';
import { ConfigSchema, type Config } from './schema.js';
import { logger } from '../utils/logger.js';

export const CONFIG_FILE_NAME = 'repo-publish.config.json';

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly configPath: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

export async function loadConfig(cwd: string, env: Env = process.env): Promise<Config> {
  const configPath = resolve(cwd, CONFIG_FILE_NAME);
  const rawConfig = await readRawConfig(configPath);

  const processedConfig = applyEnvOverrides(substituteEnvVars(rawConfig, env), env);

  try {
    const config = ConfigSchema.parse(processedConfig);
    logger.debug(`Resolved config: ${JSON.stringify(config)}`);
    return config;
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration in ${configPath}: ${details}`, configPath);
    }
    throw error;
  }
}

async function readRawConfig(configPath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      logger.debug('No config file found, using defaults');
      return {};
    }
    throw error;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    logger.debug(`Loaded config from ${configPath}`);
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not parse ${configPath}: ${reason}`, configPath);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function substituteEnvVars(obj: unknown, env: Env): unknown {
  if (typeof obj === 'string') {
    // Replace ${VAR_NAME} with environment variable
    return obj.replace(/\$\{([^}]+)\}/g, (_, varName: string) => env[varName] ?? '');
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVars(item, env));
  }

  if (isRecord(obj)) {
    return Object.fromEntries(
      Object.entries(obj).map(([key, value]) => [key, substituteEnvVars(value, env)])
    );
  }

  return obj;
}

const ENV_OVERRIDES = [
  { variable: 'REPO_PUBLISH_GIT', section: 'git', key: 'binary' },
  { variable: 'REPO_PUBLISH_BRANCH', section: 'publish', key: 'branch' },
  { variable: 'REPO_PUBLISH_REMOTE', section: 'publish', key: 'remote' },
] as const;

function applyEnvOverrides(obj: unknown, env: Env): unknown {
  if (!isRecord(obj)) {
    // Let the schema report the shape error
    return obj;
  }

  const result: Record<string, unknown> = { ...obj };
  for (const { variable, section, key } of ENV_OVERRIDES) {
    const value = env[variable];
    if (!value) {
      continue;
    }
    const current = result[section];
    result[section] = { ...(isRecord(current) ? current : {}), [key]: value };
    logger.debug(`${variable} overrides ${section}.${key}`);
  }
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
