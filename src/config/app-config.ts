/**
 * Unified Application Configuration
 *
 * Single source of truth for all configuration with Zod validation.
 * Consolidates environment variables, constants, and defaults.
 */

import { z } from 'zod';
import { readFileSync } from 'fs';
import { join } from 'path';
import { ConfigurationError } from '../lib/errors';

export const CONSTANTS = {
  MCP: {
    NAME: 'image-analysis-mcp',
  },
  LIMITS: {
    SAMPLE_LIMIT: 250_000,
    TOP_COLORS: 3,
    MAX_TOP_COLORS: 50,
    MAX_INPUT_BYTES: 20 * 1024 * 1024, // 20MB
    MAX_INPUT_PIXELS: 100_000_000,
    DECODE_TIMEOUT_SECONDS: 30,
  },
  DEFAULTS: {
    HOST: '127.0.0.1',
    PORT: 7860,
  },
} as const;

const NodeEnvSchema = z.enum(['development', 'production', 'test']).default('production');
const LogLevelSchema = z
  .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  .default('info');
const TransportSchema = z.enum(['stdio', 'sse']).default('stdio');
const LogFormatSchema = z.enum(['json', 'pretty']).default('json');

const AppConfigSchema = z.object({
  server: z.object({
    nodeEnv: NodeEnvSchema,
    logLevel: LogLevelSchema,
    transport: TransportSchema,
    host: z.string().min(1).default(CONSTANTS.DEFAULTS.HOST),
    port: z.coerce.number().int().min(1).max(65535).default(CONSTANTS.DEFAULTS.PORT),
  }),
  mcp: z.object({
    name: z.string().min(1).default(CONSTANTS.MCP.NAME),
    version: z.string(),
  }),
  logging: z.object({
    format: LogFormatSchema,
  }),
  analysis: z.object({
    sampleLimit: z.coerce.number().int().positive().default(CONSTANTS.LIMITS.SAMPLE_LIMIT),
    topColors: z.coerce
      .number()
      .int()
      .min(1)
      .max(CONSTANTS.LIMITS.MAX_TOP_COLORS)
      .default(CONSTANTS.LIMITS.TOP_COLORS),
    maxInputBytes: z.coerce.number().int().positive().default(CONSTANTS.LIMITS.MAX_INPUT_BYTES),
    maxInputPixels: z.coerce.number().int().positive().default(CONSTANTS.LIMITS.MAX_INPUT_PIXELS),
    decodeTimeoutSeconds: z.coerce
      .number()
      .int()
      .positive()
      .default(CONSTANTS.LIMITS.DECODE_TIMEOUT_SECONDS),
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AnalysisConfig = AppConfig['analysis'];
export type TransportType = AppConfig['server']['transport'];

type Env = Record<string, string | undefined>;

/**
 * Get package version from package.json
 */
function getPackageVersion(): string {
  try {
    const packageJsonPath = join(process.cwd(), 'package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return '1.0.0';
  } catch {
    // Running outside the project directory (e.g. installed globally)
    return '1.0.0';
  }
}

/**
 * Treat empty strings as unset so Zod defaults apply
 */
function getEnvValue(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Create configuration with environment variable overrides and validation
 */
export function createAppConfig(env: Env = process.env): AppConfig {
  const rawConfig = {
    server: {
      nodeEnv: getEnvValue(env, 'NODE_ENV'),
      logLevel: getEnvValue(env, 'LOG_LEVEL'),
      transport: getEnvValue(env, 'MCP_TRANSPORT'),
      host: getEnvValue(env, 'HOST'),
      port: getEnvValue(env, 'PORT'),
    },
    mcp: {
      name: getEnvValue(env, 'MCP_SERVER_NAME'),
      version: getPackageVersion(),
    },
    logging: {
      format: getEnvValue(env, 'LOG_FORMAT'),
    },
    analysis: {
      sampleLimit: getEnvValue(env, 'IMAGE_SAMPLE_LIMIT'),
      topColors: getEnvValue(env, 'IMAGE_TOP_COLORS'),
      maxInputBytes: getEnvValue(env, 'IMAGE_MAX_BYTES'),
      maxInputPixels: getEnvValue(env, 'IMAGE_MAX_PIXELS'),
      decodeTimeoutSeconds: getEnvValue(env, 'IMAGE_DECODE_TIMEOUT'),
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Configuration validation failed: ${issues.join('; ')}`, {
      issues,
    });
  }

  return result.data;
}
