// =============================================================================
// Tool Conversion Utilities
// =============================================================================
// Convert @taskweave/shared-types ToolDefinitions to Vercel AI SDK tools

import { jsonSchema, tool, type CoreTool } from 'ai';
import type { ToolDefinition } from '@taskweave/shared-types';

type JSONSchemaInput = Parameters<typeof jsonSchema>[0];

const EMPTY_OBJECT_SCHEMA: JSONSchemaInput = { type: 'object', properties: {} };

/**
 * Convert ToolDefinition[] to an AI SDK tool set.
 *
 * No execute functions are attached: the model only proposes calls, and the
 * agent decides whether and how they run.
 */
export function convertToolDefinitions(tools: ToolDefinition[]): Record<string, CoreTool> {
  const toolSet: Record<string, CoreTool> = {};

  for (const t of tools) {
    toolSet[t.name] = tool({
      description: t.description,
      parameters: jsonSchema<Record<string, unknown>>(toJSONSchema(t.parameters)),
    });
  }

  return toolSet;
}

/**
 * Tool parameters arrive as arbitrary JSON Schema objects (MCP servers
 * publish their own). Anything that is not an object schema becomes an
 * empty object schema.
 */
function toJSONSchema(parameters: Record<string, unknown>): JSONSchemaInput {
  if (isJSONSchema(parameters) && parameters.type === 'object') {
    return parameters;
  }
  return EMPTY_OBJECT_SCHEMA;
}

function isJSONSchema(value: unknown): value is JSONSchemaInput {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
