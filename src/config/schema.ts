/**
 * Zod schema for the service settings.
 * Numeric fields accept numbers or numeric strings so the same schema
 * validates both a JSON settings file and raw environment variables.
 */
import { z } from 'zod';

// ─── Primitives ─────────────────────────────────────────────────

const positiveNumber = (label: string): z.ZodNumber =>
  z.coerce.number({ invalid_type_error: `${label} must be a number` }).positive(`${label} must be positive`);

const positiveInt = (label: string): z.ZodNumber =>
  z.coerce.number({ invalid_type_error: `${label} must be a number` }).int().positive(`${label} must be a positive integer`);

/** Longest delay Node timers honor, in whole seconds (2^31 - 1 ms). Longer delays fire after 1 ms. */
export const MAX_TIMER_SECONDS = 2_147_483;

const timerSeconds = (label: string): z.ZodNumber =>
  positiveNumber(label).max(MAX_TIMER_SECONDS, `${label} must be at most ${String(MAX_TIMER_SECONDS)} seconds`);

/** Booleans, or the strings "true"/"false"/"1"/"0" as found in the environment. */
const booleanish = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1'),
]);

// ─── Settings ───────────────────────────────────────────────────

export const settingsSchema = z.object({
  // Server
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  host: z.string().min(1).default('0.0.0.0'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  corsOrigins: z.array(z.string().min(1)).default(['http://localhost:3000']),
  rateLimitPerMinute: positiveInt('rateLimitPerMinute').default(30),

  // Timeout hierarchy
  streamTimeoutSeconds: timerSeconds('streamTimeoutSeconds').default(300),
  requestTimeoutSeconds: timerSeconds('requestTimeoutSeconds').default(60),
  toolTimeoutSeconds: timerSeconds('toolTimeoutSeconds').default(45),
  webSearchTimeoutSeconds: timerSeconds('webSearchTimeoutSeconds').default(30),
  heartbeatIntervalSeconds: timerSeconds('heartbeatIntervalSeconds').default(30),

  // Transports & HITL
  httpTransportEnabled: booleanish.default(true),
  hitlEnabled: booleanish.default(true),

  // Checkpoints
  checkpointGraceWindowMs: z.coerce.number().int().min(0).max(MAX_TIMER_SECONDS * 1000).default(500),
  checkpointRetentionDays: positiveInt('checkpointRetentionDays').default(30),
  checkpointCleanupIntervalMinutes: z.coerce.number().int().min(0).max(Math.floor(MAX_TIMER_SECONDS / 60)).default(60),
  databaseUrl: z.string().url('Invalid database URL').optional(),

  // Engine
  openaiApiKey: z.string().min(1).optional(),
  openaiModel: z.string().min(1, 'Model identifier cannot be empty').default('gpt-4o'),
  openaiBaseUrl: z.string().url('Invalid base URL format').optional(),
  tavilyApiKey: z.string().min(1).optional(),
  maxToolCallsPerTurn: positiveInt('maxToolCallsPerTurn').default(12),
  maxTurnsPerRun: positiveInt('maxTurnsPerRun').default(10),
});

export type Settings = z.infer<typeof settingsSchema>;

/** The subset of settings the timeout hierarchy is checked against. */
export type TimeoutSettings = Pick<
  Settings,
  | 'streamTimeoutSeconds'
  | 'requestTimeoutSeconds'
  | 'toolTimeoutSeconds'
  | 'webSearchTimeoutSeconds'
  | 'httpTransportEnabled'
>;
