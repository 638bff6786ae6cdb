// Tool system — registry + definitions
export type {
  ExecutableTool,
  RiskLevel,
  ToolContext,
  ToolDefinition,
  ToolResult,
  ToolTimeoutScope,
} from './types.js';

export { createToolRegistry } from './registry/tool-registry.js';
export type { ToolRegistry, ToolRegistryOptions } from './registry/tool-registry.js';

export * from './definitions/index.js';
