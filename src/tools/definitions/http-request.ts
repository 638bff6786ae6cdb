/**
 * HTTP request tool — calls external APIs on the agent's behalf.
 *
 * Has side effects, so it requires human approval when HITL is enabled.
 * Blocks private and reserved hosts and caps the response size.
 */
import { z } from 'zod';

import type { ConduitError } from '@/core/errors.js';
import { ToolExecutionError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { createLogger } from '@/observability/logger.js';
import type { ExecutableTool, ToolContext, ToolResult } from '@/tools/types.js';

const logger = createLogger({ name: 'http-request' });

const MAX_RESPONSE_SIZE = 1_048_576; // 1MB

const inputSchema = z.object({
  url: z.string().url(),
  method: z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE']),
  headers: z.record(z.string()).optional(),
  body: z.unknown().optional(),
});

export interface HttpRequestToolOptions {
  /** URL patterns (`*` wildcard) to allow. When set, nothing else is reachable. */
  allowedUrlPatterns?: string[];
}

// ─── SSRF Protection ───────────────────────────────────────────

const BLOCKED_HOSTNAMES = ['localhost', '0.0.0.0', '[::1]', '[::]'];

const BLOCKED_IPV4 = [
  /^10\./,
  /^172\.(1[6-9]|2\d|3[01])\./,
  /^192\.168\./,
  /^127\./,
  /^169\.254\./,
  /^0\./,
];

/** True for loopback, private, link-local and unique-local hosts. */
export function isBlockedHost(hostname: string): boolean {
  const host = hostname.toLowerCase();
  if (BLOCKED_HOSTNAMES.includes(host)) return true;
  if (BLOCKED_IPV4.some((pattern) => pattern.test(host))) return true;
  return /^\[(fc|fd|fe[89ab])/.test(host);
}

function matchUrlPattern(url: string, pattern: string): boolean {
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
  return new RegExp(`^${escaped}$`).test(url);
}

function checkUrl(url: string, allowedPatterns: string[] | undefined): string | undefined {
  const parsed = new URL(url);
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return `Unsupported protocol: ${parsed.protocol}`;
  }
  if (isBlockedHost(parsed.hostname)) {
    return 'Blocked host: requests to private/reserved addresses are not allowed';
  }
  if (allowedPatterns?.length && !allowedPatterns.some((p) => matchUrlPattern(url, p))) {
    return `URL not in allowlist: ${url}`;
  }
  return undefined;
}

async function readLimited(response: Response): Promise<string> {
  const text = await response.text();
  if (Buffer.byteLength(text) > MAX_RESPONSE_SIZE) {
    throw new ToolExecutionError('http-request', `Response body exceeds ${String(MAX_RESPONSE_SIZE)} bytes limit`);
  }
  return text;
}

// ─── Tool Factory ──────────────────────────────────────────────

export function createHttpRequestTool(options?: HttpRequestToolOptions): ExecutableTool {
  const allowedPatterns = options?.allowedUrlPatterns;

  return {
    id: 'http-request',
    name: 'HTTP Request',
    description:
      'Make HTTP requests to external APIs (GET, POST, PUT, PATCH, DELETE). ' +
      'Returns status code and response body.',
    category: 'integration',
    inputSchema,
    riskLevel: 'medium',
    requiresApproval: true,
    sideEffects: true,
    timeoutScope: 'tool',

    async execute(input: unknown, context: ToolContext): Promise<Result<ToolResult, ConduitError>> {
      const startTime = Date.now();
      const parsed = inputSchema.parse(input);

      const rejection = checkUrl(parsed.url, allowedPatterns);
      if (rejection) return err(new ToolExecutionError('http-request', rejection));

      const init: RequestInit = {
        method: parsed.method,
        headers: parsed.headers,
        signal: context.signal,
      };
      if (parsed.body !== undefined && parsed.method !== 'GET') {
        init.body = typeof parsed.body === 'string' ? parsed.body : JSON.stringify(parsed.body);
      }

      logger.info('Making HTTP request', {
        component: 'http-request',
        threadId: context.threadId,
        traceId: context.traceId,
        method: parsed.method,
        url: parsed.url,
      });

      const response = await fetch(parsed.url, init);
      const text = await readLimited(response);

      let body: unknown = text;
      try {
        body = JSON.parse(text);
      } catch {
        body = text;
      }

      return ok({
        success: response.ok,
        output: { status: response.status, body },
        durationMs: Date.now() - startTime,
      });
    },
  };
}
