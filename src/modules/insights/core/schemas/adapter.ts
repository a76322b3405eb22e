/**
 * TypeBox to JSON Schema Adapter
 *
 * TypeBox schemas ARE JSON Schema, but carry TypeBox symbols. This adapter
 * strips them so the schemas can be served to HTTP clients.
 */

import type { TSchema } from '@sinclair/typebox';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Converts a TypeBox schema to plain JSON Schema.
 */
export function toJsonSchema(schema: TSchema): Record<string, unknown> {
  // JSON stringify/parse removes Symbol properties
  const plain: unknown = JSON.parse(JSON.stringify(schema));
  return isRecord(plain) ? plain : {};
}

/**
 * Behaviour hints shared with MCP clients.
 */
export interface ToolAnnotations {
  title?: string;
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

/**
 * Every analytics tool reads a fixed, local dataset.
 */
export const READ_ONLY_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: false,
};

/**
 * Tool definition as listed over HTTP.
 */
export interface ToolDefinition {
  name: string;
  title: string;
  description: string;
  parameters: string[];
  inputSchema: Record<string, unknown>;
  annotations?: ToolAnnotations | undefined;
}

/**
 * Creates a serializable tool definition from a TypeBox schema.
 */
export function createToolDefinition(config: {
  name: string;
  title: string;
  description: string;
  parameters: readonly string[];
  inputSchema: TSchema;
  annotations?: ToolAnnotations;
}): ToolDefinition {
  const result: ToolDefinition = {
    name: config.name,
    title: config.title,
    description: config.description,
    parameters: [...config.parameters],
    inputSchema: toJsonSchema(config.inputSchema),
  };

  if (config.annotations !== undefined) {
    result.annotations = config.annotations;
  }

  return result;
}
