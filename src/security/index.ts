export {
  REDACTED_MESSAGE,
  SECRET_PATTERNS,
  maskApiKey,
  redactError,
  redactSecrets,
} from './secret-redaction.js';
export type { RedactionResult } from './secret-redaction.js';
