/**
 * Configuration module
 * Handles loading and validating configuration from environment
 */

import { z, ZodError } from 'zod';
import dotenv from 'dotenv';
import { resolve } from 'path';

/**
 * Grouping modes understood by the export splitter
 */
export const SplitModeSchema = z.enum(['month', 'week', 'title', 'date_title']);
export type SplitMode = z.infer<typeof SplitModeSchema>;

/**
 * Configuration schema with zod validation
 * All options have sensible defaults
 */
export const ConfigSchema = z.object({
  // Logging Configuration
  logLevel: z
    .enum(['debug', 'info', 'warn', 'error', 'silent'])
    .default('info')
    .describe('Logging verbosity level'),
  logFormat: z
    .enum(['json', 'pretty'])
    .default('pretty')
    .describe('Log output format'),

  // Splitter defaults
  splitMode: SplitModeSchema
    .default('month')
    .describe('Default grouping mode for split'),
  filePrefix: z
    .string()
    .min(1)
    .default('conversations')
    .describe('Filename prefix for split output files'),

  // Master book
  bookTitle: z
    .string()
    .min(1)
    .default('CHATGPT CONVERSATIONS MASTER BOOK')
    .describe('Banner line at the top of the master book'),
  progressInterval: z
    .coerce
    .number()
    .int()
    .min(1)
    .max(100000)
    .default(10)
    .describe('Report master book progress every N files'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Configuration error with helpful messages
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  static fromZodError(error: ZodError): ConfigError {
    const messages = error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    return new ConfigError(
      `Configuration validation failed:\n${messages.join('\n')}`,
      error.issues
    );
  }
}

/**
 * Load .env file from specified path or default locations
 */
export function loadEnvFile(envPath?: string): void {
  if (envPath) {
    dotenv.config({ path: resolve(envPath) });
  } else {
    dotenv.config({ path: resolve(process.cwd(), '.env') });
    dotenv.config({ path: resolve(process.cwd(), '.env.local') });
  }
}

/**
 * Build raw config object from environment variables
 */
function buildRawConfig(): Record<string, unknown> {
  return {
    logLevel: process.env.CHATBOOK_LOG_LEVEL,
    logFormat: process.env.CHATBOOK_LOG_FORMAT,
    splitMode: process.env.CHATBOOK_SPLIT_MODE,
    filePrefix: process.env.CHATBOOK_PREFIX,
    bookTitle: process.env.CHATBOOK_BOOK_TITLE,
    progressInterval: process.env.CHATBOOK_PROGRESS_INTERVAL,
  };
}

/**
 * Load and validate configuration from environment
 * @param envPath Optional path to .env file
 * @throws ConfigError if validation fails
 */
export function loadConfig(envPath?: string): Config {
  loadEnvFile(envPath);

  const rawConfig = buildRawConfig();
  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Validate a partial config object
 */
export function validateConfig(config: unknown): Config {
  const result = ConfigSchema.safeParse(config);

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Get default configuration values
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

// Singleton config instance
let _config: Config | null = null;

/**
 * Get the global configuration instance (singleton)
 * Loads from environment on first access
 */
export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

/**
 * Set the global configuration instance
 * Useful for testing or programmatic configuration
 */
export function setConfig(config: Partial<Config>): void {
  _config = validateConfig(config);
}

/**
 * Reset the global configuration instance
 * Forces reload on next getConfig() call
 */
export function resetConfig(): void {
  _config = null;
}
