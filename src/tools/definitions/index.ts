// Individual tool implementations
export { createHttpRequestTool, isBlockedHost } from './http-request.js';
export type { HttpRequestToolOptions } from './http-request.js';
export { createWebSearchTool } from './web-search.js';
export type { WebSearchToolOptions } from './web-search.js';
