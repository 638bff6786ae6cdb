/**
 * Settings loader — reads the environment or a JSON settings file,
 * resolves environment variable placeholders, and validates with Zod.
 */
import { readFile } from 'node:fs/promises';

import type { ZodError } from 'zod';

import { ConduitError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import type { Settings } from './schema.js';
import { settingsSchema } from './schema.js';

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends ConduitError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ConfigError';
  }
}

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

/**
 * Recursively resolves environment variable placeholders in an object.
 * Replaces strings matching the pattern `${VAR_NAME}` with the value
 * of the corresponding environment variable.
 *
 * @throws ConfigError if a referenced environment variable is not defined
 */
export function resolveEnvVars(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    const match = ENV_VAR_PATTERN.exec(obj);
    const varName = match?.[1];
    if (varName !== undefined) {
      const value = env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable "${varName}" is not defined`, {
          variableName: varName,
          pattern: obj,
        });
      }
      return value;
    }
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item, env));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value, env);
    }
    return result;
  }

  // Numbers, booleans, null: return as-is
  return obj;
}

// ─── Environment Mapping ────────────────────────────────────────

/** Environment variable → settings key. */
const ENV_KEYS = {
  PORT: 'port',
  HOST: 'host',
  LOG_LEVEL: 'logLevel',
  RATE_LIMIT_PER_MINUTE: 'rateLimitPerMinute',
  STREAM_TIMEOUT_SECONDS: 'streamTimeoutSeconds',
  REQUEST_TIMEOUT_SECONDS: 'requestTimeoutSeconds',
  TOOL_TIMEOUT_SECONDS: 'toolTimeoutSeconds',
  WEB_SEARCH_TIMEOUT_SECONDS: 'webSearchTimeoutSeconds',
  HEARTBEAT_INTERVAL_SECONDS: 'heartbeatIntervalSeconds',
  HTTP_TRANSPORT_ENABLED: 'httpTransportEnabled',
  ENABLE_HITL: 'hitlEnabled',
  CHECKPOINT_GRACE_WINDOW_MS: 'checkpointGraceWindowMs',
  CHECKPOINT_RETENTION_DAYS: 'checkpointRetentionDays',
  CHECKPOINT_CLEANUP_INTERVAL_MINUTES: 'checkpointCleanupIntervalMinutes',
  DATABASE_URL: 'databaseUrl',
  OPENAI_API_KEY: 'openaiApiKey',
  OPENAI_MODEL: 'openaiModel',
  OPENAI_BASE_URL: 'openaiBaseUrl',
  TAVILY_API_KEY: 'tavilyApiKey',
  MAX_TOOL_CALLS_PER_TURN: 'maxToolCallsPerTurn',
  MAX_TURNS_PER_RUN: 'maxTurnsPerRun',
} as const satisfies Record<string, keyof Settings>;

function toConfigError(error: ZodError, context: Record<string, unknown>): ConfigError {
  const issues = error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  return new ConfigError('Configuration validation failed', { ...context, issues });
}

// ─── Loaders ────────────────────────────────────────────────────

/**
 * Builds settings from environment variables.
 * Unset and empty variables fall back to the schema defaults.
 */
export function loadSettingsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Result<Settings, ConfigError> {
  const raw: Record<string, unknown> = {};
  for (const [envName, key] of Object.entries(ENV_KEYS)) {
    const value = env[envName]?.trim();
    if (value) raw[key] = value;
  }

  const origins = env['CORS_ORIGINS']
    ?.split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  if (origins && origins.length > 0) raw['corsOrigins'] = origins;

  const validation = settingsSchema.safeParse(raw);
  if (!validation.success) {
    return err(toConfigError(validation.error, { source: 'environment' }));
  }
  return ok(validation.data);
}

/**
 * Loads and validates a JSON settings file.
 *
 * 1. Reads the JSON file from disk
 * 2. Parses the JSON content
 * 3. Resolves environment variable placeholders
 * 4. Validates against the Zod schema
 */
export async function loadSettingsFile(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Result<Settings, ConfigError>> {
  // 1. Read the file
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
    if (code === 'ENOENT') {
      return err(
        new ConfigError(`Configuration file not found: ${filePath}`, {
          filePath,
          errorCode: 'ENOENT',
        }),
      );
    }
    return err(
      new ConfigError(`Failed to read configuration file: ${filePath}`, {
        filePath,
        errorCode: code,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  // 2. Parse JSON
  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch {
    return err(
      new ConfigError('Invalid JSON in configuration file', {
        filePath,
      }),
    );
  }

  // 3. Resolve environment variables
  let resolved: unknown;
  try {
    resolved = resolveEnvVars(parsed, env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return err(error);
    }
    return err(
      new ConfigError('Failed to resolve environment variables', {
        filePath,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  // 4. Validate with Zod
  const validation = settingsSchema.safeParse(resolved);
  if (!validation.success) {
    return err(toConfigError(validation.error, { filePath }));
  }

  return ok(validation.data);
}
