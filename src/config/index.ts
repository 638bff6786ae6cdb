// ─── Schema ─────────────────────────────────────────────────────
export type { Settings, TimeoutSettings } from './schema.js';
export { settingsSchema } from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export { ConfigError, loadSettingsFile, loadSettingsFromEnv, resolveEnvVars } from './loader.js';
