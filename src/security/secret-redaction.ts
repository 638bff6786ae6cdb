/**
 * Secret redaction for error text that is about to be logged.
 * A message containing anything that looks like a credential is replaced
 * wholesale; partial masking would still leak key prefixes.
 */

/** Substrings that mark a message as possibly carrying a credential. */
export const SECRET_PATTERNS: readonly string[] = [
  'sk-',
  'lsv2_',
  'ls__',
  'key=',
  'token=',
  'password=',
  'api_key=',
  'secret=',
];

export const REDACTED_MESSAGE = '[REDACTED: Potential secret in error message]';

export interface RedactionResult {
  /** The message, or REDACTED_MESSAGE. */
  message: string;
  wasRedacted: boolean;
  /** Constructor name of the original error, when one was given. */
  errorType?: string;
}

/** Return the message unchanged, or the redaction marker if it looks secret. */
export function redactSecrets(message: string): string {
  return SECRET_PATTERNS.some((pattern) => message.includes(pattern)) ? REDACTED_MESSAGE : message;
}

/** Redact an unknown thrown value's message, keeping its type name for logs. */
export function redactError(error: unknown): RedactionResult {
  const raw = error instanceof Error ? error.message : String(error);
  const message = redactSecrets(raw);
  return {
    message,
    wasRedacted: message !== raw,
    errorType: error instanceof Error ? error.constructor.name : undefined,
  };
}

/**
 * Mask an API key for display: prefix...suffix, or `***` for short keys.
 */
export function maskApiKey(apiKey: string, prefixLength = 8, suffixLength = 4): string {
  if (apiKey.length > prefixLength + suffixLength) {
    return `${apiKey.slice(0, prefixLength)}...${apiKey.slice(-suffixLength)}`;
  }
  if (apiKey.length > prefixLength) {
    return `${apiKey.slice(0, Math.floor(prefixLength / 2))}...***`;
  }
  return '***';
}
