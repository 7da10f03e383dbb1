import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { ZodError } from 'zod';
import { ConfigSchema, CONFIG_FILE_NAME, type Config } from './schema.js';
import { logger } from '../utils/logger.js';
import { ConfigurationError, describeFsError, isErrnoException } from '../errors.js';

/**
 * Load `prompt-merge.config.json` from `cwd`, or the file named by `explicitPath`.
 *
 * A missing default file means defaults; a missing explicit file is an error.
 */
export async function loadConfig(cwd: string, explicitPath?: string): Promise<Config> {
  const configPath = resolve(cwd, explicitPath ?? CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (!explicitPath && isErrnoException(error) && error.code === 'ENOENT') {
      logger.debug('No config file found, using defaults');
      return ConfigSchema.parse({});
    }
    throw new ConfigurationError(
      `Cannot read config file ${configPath}: ${describeFsError(error)}`
    );
  }

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(
      `Config file ${configPath} is not valid JSON`,
      error instanceof Error ? error.message : String(error)
    );
  }

  // Substitute environment variables
  const processedConfig = substituteEnvVars(rawConfig);

  try {
    const config = ConfigSchema.parse(processedConfig);
    logger.debug(`Loaded config from ${configPath}`);
    return config;
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(
        `Invalid config file ${configPath}: ${formatIssues(error)}`,
        error.message
      );
    }
    throw error;
  }
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export function substituteEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    // Replace ${VAR_NAME} with environment variable
    return obj.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      return process.env[varName] || '';
    });
  }

  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVars);
  }

  if (obj && typeof obj === 'object') {
    return Object.fromEntries(
      Object.entries(obj).map(([key, value]) => [key, substituteEnvVars(value)])
    );
  }

  return obj;
}
