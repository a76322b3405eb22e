/**
 * Insights module exports
 */

// Core
export { executeTool, listToolDefinitions, type RegisteredTool } from './core/registry.js';
export { type SuccessEnvelope, type ErrorEnvelope, type ToolEnvelope } from './core/envelope.js';
export { type InsightsError, type InsightsErrorKind } from './core/errors.js';
export { TOOL_NAMES, type ToolName } from './core/types.js';

// Shell
export { createMcpServer, runMcpServerStdio, type CreateMcpServerDeps } from './shell/server/mcp-server.js';
export { makeInsightsRoutes, type InsightsRoutesDeps } from './shell/rest/routes.js';
