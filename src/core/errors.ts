/**
 * Base error class for all Conduit errors.
 * Extends Error with a machine-readable code, HTTP status, and structured context.
 */
export class ConduitError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'ConduitError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Thrown when input validation (Zod) fails. */
export class ValidationError extends ConduitError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}

/** One violated ordering between two timeout settings. */
export interface TimeoutInvariantViolation {
  /** Setting that must be the smaller one. */
  setting: string;
  /** Setting it is compared against. */
  limit: string;
  value: number;
  limitValue: number;
  rule: string;
}

/**
 * Thrown at startup when the timeout settings break the nesting invariant.
 * Lists every offending setting, not only the first.
 */
export class ConfigInvariantError extends ConduitError {
  public readonly violations: readonly TimeoutInvariantViolation[];

  constructor(violations: readonly TimeoutInvariantViolation[]) {
    super({
      message: `Invalid timeout configuration: ${violations
        .map((v) => `${v.setting}=${String(v.value)} must be ${v.rule} ${v.limit}=${String(v.limitValue)}`)
        .join('; ')}`,
      code: 'CONFIG_INVARIANT_VIOLATION',
      statusCode: 500,
      context: { violations },
      isOperational: false,
    });
    this.name = 'ConfigInvariantError';
    this.violations = violations;
  }
}

/**
 * Thrown when an operation outlives the deadline of its timeout scope.
 * Answered with 504 when it reaches the HTTP boundary.
 */
export class TimeoutExceededError extends ConduitError {
  public readonly scope: string;
  public readonly timeoutMs: number;

  constructor(scope: string, timeoutMs: number) {
    super({
      message: `${scope} timeout of ${String(timeoutMs / 1000)}s exceeded`,
      code: 'TIMEOUT',
      statusCode: 504,
      context: { scope, timeoutMs },
    });
    this.name = 'TimeoutExceededError';
    this.scope = scope;
    this.timeoutMs = timeoutMs;
  }
}

/** Thrown when a tool's execute() fails at runtime. */
export class ToolExecutionError extends ConduitError {
  constructor(toolId: string, message: string, cause?: Error) {
    super({
      message: `Tool "${toolId}" execution failed: ${message}`,
      code: 'TOOL_EXECUTION_ERROR',
      statusCode: 500,
      cause,
      context: { toolId },
    });
    this.name = 'ToolExecutionError';
  }
}

/** Thrown when the model requests a tool that does not exist in the registry. */
export class ToolNotFoundError extends ConduitError {
  constructor(toolId: string, availableTools: string[]) {
    super({
      message: `Model requested non-existent tool "${toolId}"`,
      code: 'TOOL_NOT_FOUND',
      statusCode: 400,
      context: { toolId, availableTools },
    });
    this.name = 'ToolNotFoundError';
  }
}

/** Thrown when an LLM provider call fails. */
export class ProviderError extends ConduitError {
  constructor(provider: string, message: string, cause?: Error) {
    super({
      message: `LLM provider "${provider}" error: ${message}`,
      code: 'PROVIDER_ERROR',
      statusCode: 502,
      cause,
      context: { provider },
    });
    this.name = 'ProviderError';
  }
}

/** Thrown when a thread has no checkpoint yet. */
export class ThreadNotFoundError extends ConduitError {
  constructor(threadId: string) {
    super({
      message: `Thread "${threadId}" not found`,
      code: 'NOT_FOUND',
      statusCode: 404,
      context: { threadId },
    });
    this.name = 'ThreadNotFoundError';
  }
}

/** Thrown when a HITL decision arrives for a thread without a pending interrupt. */
export class NoPendingApprovalError extends ConduitError {
  constructor(threadId: string) {
    super({
      message: `No pending approval for thread "${threadId}"`,
      code: 'NO_PENDING_APPROVAL',
      statusCode: 400,
      context: { threadId },
    });
    this.name = 'NoPendingApprovalError';
  }
}

/** Thrown when no engine is registered under the requested agent name. */
export class EngineNotFoundError extends ConduitError {
  constructor(agentName: string, available: string[]) {
    super({
      message: `No agent engine registered as "${agentName}"`,
      code: 'ENGINE_NOT_FOUND',
      statusCode: 500,
      context: { agentName, available },
    });
    this.name = 'EngineNotFoundError';
  }
}
