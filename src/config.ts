import * as dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { ConfigError, MissingCredentialError } from './core/errors.js';
import type { MalformedResponsePolicy } from './core/entities/Comparison.js';

export const API_KEY_VARIABLE = 'PERPLEXITY_API_KEY';
export const DEFAULT_API_URL = 'https://api.perplexity.ai';
export const DEFAULT_MODEL = 'llama-3.1-sonar-small-128k-online';

export interface Config {
  perplexity: {
    apiKey: string;
    apiUrl: string;
    model: string;
    timeoutMs: number;
  };
  tls: {
    allowInsecureRetry: boolean;
  };
  malformedResponsePolicy: MalformedResponsePolicy;
}

/**
 * Values given on the command line; they win over the environment
 */
export interface ConfigOverrides {
  model?: string;
  allowInsecureTlsRetry?: boolean;
}

// Zod validation schema
const ConfigSchema = z.object({
  perplexity: z.object({
    apiKey: z.string().min(1),
    apiUrl: z.string().url('Invalid API URL format'),
    model: z.string().min(1, 'Model must not be empty'),
    timeoutMs: z.number().int('Timeout must be a whole number of milliseconds').min(1000).max(600000),
  }),
  tls: z.object({
    allowInsecureRetry: z.boolean(),
  }),
  malformedResponsePolicy: z.enum(['sentinel', 'error']),
});

/**
 * Load variables from a .env file in the given directory (default: the working
 * directory), if there is one. Variables already set in the environment are left alone.
 */
export function loadDotEnv(dir: string = process.cwd()): void {
  dotenv.config({ path: path.join(dir, '.env') });
}

/**
 * Build configuration from environment variables and CLI overrides.
 * The credential is checked first so a missing key is reported on its own.
 */
export function getConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): Config {
  const apiKey = env[API_KEY_VARIABLE]?.trim();
  if (!apiKey) {
    throw new MissingCredentialError(API_KEY_VARIABLE);
  }

  const getBoolean = (envKey: string, defaultValue: boolean): boolean => {
    const envValue = env[envKey]?.toLowerCase();
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (envKey: string, defaultValue: number): number => {
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const rawConfig = {
    perplexity: {
      apiKey,
      apiUrl: (env.PERPLEXITY_API_URL || DEFAULT_API_URL).replace(/\/+$/, ''),
      model: overrides.model ?? (env.PERPLEXITY_MODEL || DEFAULT_MODEL),
      timeoutMs: getNumber('REQUEST_TIMEOUT_MS', 30000),
    },
    tls: {
      allowInsecureRetry: overrides.allowInsecureTlsRetry || getBoolean('ALLOW_INSECURE_TLS_RETRY', false),
    },
    malformedResponsePolicy: (env.MALFORMED_RESPONSE_POLICY || 'sentinel').toLowerCase(),
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
    );
  }
  return result.data;
}

/**
 * Print the effective configuration (verbose mode). The API key is never shown.
 */
export function printConfigInfo(config: Config, print: (line: string) => void): void {
  print(`API: ${config.perplexity.apiUrl}`);
  print(`Model: ${config.perplexity.model}`);
  print('API key: set (hidden)');
  print(`Timeout: ${config.perplexity.timeoutMs}ms`);
  if (config.tls.allowInsecureRetry) {
    print('Insecure TLS retry: ENABLED');
  }
  print(`Malformed response policy: ${config.malformedResponsePolicy}`);
}
