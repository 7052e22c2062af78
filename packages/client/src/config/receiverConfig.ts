/**
 * @fileoverview Receiver configuration loading from YAML.
 * Validates and caches the endpoints and logging settings.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { DEFAULT_AUDIO_URL, DEFAULT_EMOTION_URL } from '@avatar-link/protocol';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

// Schema for receiver configuration
const ReceiverConfigSchema = z.object({
  audio: z.object({ url: z.string().default(DEFAULT_AUDIO_URL) }).default({}),
  emotion: z.object({ url: z.string().default(DEFAULT_EMOTION_URL) }).default({}),
  connectTimeoutMs: z.number().int().min(0).default(0),
  logLevel: LogLevelSchema.default('info'),
});

// Environment overrides, applied after the file
const EnvOverridesSchema = z.object({
  AVATAR_LINK_AUDIO_URL: z.string().optional(),
  AVATAR_LINK_EMOTION_URL: z.string().optional(),
  AVATAR_LINK_LOG_LEVEL: LogLevelSchema.optional(),
  AVATAR_LINK_CONNECT_TIMEOUT_MS: z.coerce.number().int().min(0).optional(),
});

export type ReceiverConfig = z.infer<typeof ReceiverConfigSchema>;

/**
 * Error thrown when the configuration file or environment is invalid.
 */
export class InvalidConfigError extends Error {
  constructor(message: string) {
    super(`Invalid receiver configuration: ${message}`);
    this.name = 'InvalidConfigError';
  }
}

let cachedConfig: ReceiverConfig | null = null;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function readConfigFile(configPath: string): unknown {
  let fileContents: string;
  try {
    fileContents = readFileSync(configPath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return {};
    }
    throw error;
  }

  try {
    const parsed: unknown = parseYaml(fileContents);
    // An empty document parses to null
    return parsed ?? {};
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidConfigError(`${configPath}: ${message}`);
  }
}

/**
 * Load and validate receiver configuration.
 * Caches the result for subsequent calls.
 *
 * Config file is loaded from:
 * - the `configPath` argument if given
 * - otherwise the AVATAR_LINK_CONFIG environment variable if set
 * - otherwise ./config/avatar-link.yaml relative to cwd
 *
 * A missing file yields the defaults. AVATAR_LINK_AUDIO_URL,
 * AVATAR_LINK_EMOTION_URL, AVATAR_LINK_LOG_LEVEL and
 * AVATAR_LINK_CONNECT_TIMEOUT_MS override the file.
 */
export function loadReceiverConfig(configPath?: string): ReceiverConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const resolvedPath =
    // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
    configPath ?? process.env['AVATAR_LINK_CONFIG'] ?? join(process.cwd(), 'config/avatar-link.yaml');

  const fileConfig = ReceiverConfigSchema.safeParse(readConfigFile(resolvedPath));
  if (!fileConfig.success) {
    throw new InvalidConfigError(`${resolvedPath}: ${describeIssues(fileConfig.error)}`);
  }

  const env = EnvOverridesSchema.safeParse(process.env);
  if (!env.success) {
    throw new InvalidConfigError(`environment: ${describeIssues(env.error)}`);
  }

  const config: ReceiverConfig = {
    audio: { url: env.data.AVATAR_LINK_AUDIO_URL ?? fileConfig.data.audio.url },
    emotion: { url: env.data.AVATAR_LINK_EMOTION_URL ?? fileConfig.data.emotion.url },
    connectTimeoutMs: env.data.AVATAR_LINK_CONNECT_TIMEOUT_MS ?? fileConfig.data.connectTimeoutMs,
    logLevel: env.data.AVATAR_LINK_LOG_LEVEL ?? fileConfig.data.logLevel,
  };

  cachedConfig = config;
  return config;
}

/**
 * Clear the cached config (useful for testing or hot-reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
