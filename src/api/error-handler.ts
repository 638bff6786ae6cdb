/**
 * Global Fastify error handler and response helpers.
 * Maps ConduitError subclasses and ZodError to structured ApiResponse envelopes.
 */
import type { FastifyInstance, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { ConduitError, TimeoutExceededError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import { redactError } from '@/security/secret-redaction.js';
import type { ApiResponse } from './types.js';

const logger = createLogger({ name: 'error-handler' });

export const GATEWAY_TIMEOUT_CODE = 'GATEWAY_TIMEOUT';

// ─── Response Helpers ───────────────────────────────────────────

/** Send a success response wrapped in the ApiResponse envelope. */
export async function sendSuccess(
  reply: FastifyReply,
  data: unknown,
  statusCode = 200,
): Promise<void> {
  const body: ApiResponse<unknown> = { success: true, data };
  await reply.status(statusCode).send(body);
}

/** Build the error envelope without sending it. */
export function errorBody(
  code: string,
  message: string,
  details?: Record<string, unknown>,
): ApiResponse<never> {
  return {
    success: false,
    error: { code, message, ...(details && { details }) },
  };
}

/** Send an error response wrapped in the ApiResponse envelope. */
export async function sendError(
  reply: FastifyReply,
  code: string,
  message: string,
  statusCode = 500,
  details?: Record<string, unknown>,
): Promise<void> {
  await reply.status(statusCode).send(errorBody(code, message, details));
}

/** Send a 404 not-found response. */
export async function sendNotFound(
  reply: FastifyReply,
  resource: string,
  id: string,
): Promise<void> {
  await sendError(reply, 'NOT_FOUND', `${resource} "${id}" not found`, 404);
}

/** Envelope for a request that outlived the connection deadline. */
export function gatewayTimeoutBody(error: TimeoutExceededError): ApiResponse<never> {
  return errorBody(GATEWAY_TIMEOUT_CODE, `Request timed out after ${String(error.timeoutMs / 1000)}s`);
}

// ─── Global Error Handler ───────────────────────────────────────

/** Register the global Fastify error handler. */
export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler(async (error, request, reply) => {
    // Zod validation errors
    if (error instanceof ZodError) {
      const details: Record<string, unknown> = {
        issues: error.issues.map((i) => ({
          path: i.path.join('.'),
          message: i.message,
        })),
      };
      await sendError(reply, 'VALIDATION_ERROR', 'Request validation failed', 400, details);
      return;
    }

    if (error instanceof TimeoutExceededError) {
      logger.warn('Request exceeded its deadline', {
        component: 'error-handler',
        url: request.url,
        scope: error.scope,
        timeoutMs: error.timeoutMs,
      });
      await reply.status(504).send(gatewayTimeoutBody(error));
      return;
    }

    // ConduitError hierarchy: use the error's own statusCode and code
    if (error instanceof ConduitError) {
      const { message } = redactError(error);
      logger.warn('Request failed with ConduitError', {
        component: 'error-handler',
        code: error.code,
        statusCode: error.statusCode,
        message,
      });
      await sendError(
        reply,
        error.code,
        message,
        error.statusCode,
        error.context,
      );
      return;
    }

    // Fastify built-in errors (e.g., JSON parse failures, validation)
    if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number') {
      await sendError(reply, 'REQUEST_ERROR', error.message, error.statusCode);
      return;
    }

    // Unknown errors
    const { message, errorType } = redactError(error);
    logger.error('Unhandled error in request', {
      component: 'error-handler',
      errorType,
      error: message,
    });
    await sendError(reply, 'INTERNAL_ERROR', 'An unexpected error occurred', 500);
  });
}
