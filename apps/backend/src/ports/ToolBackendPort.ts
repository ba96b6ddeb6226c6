import type { ToolDefinition, ToolResultContent } from '@taskweave/shared-types';
import type { ManagedResource } from './ManagedResource.js';

// =============================================================================
// Tool Back-end Port
// =============================================================================

/**
 * Port interface for an external provider of JSON tools (an MCP server).
 */
export interface ToolBackendPort extends ManagedResource {
  /**
   * Tools this back-end exposes, with names unique across all back-ends
   */
  listTools(): Promise<ToolDefinition[]>;

  /**
   * Whether `name` is one of this back-end's tools
   */
  hasTool(name: string): boolean;

  /**
   * Invoke a tool
   *
   * @param name - A name returned by `listTools`
   * @returns The tool's result, as text or structured content
   * @throws ToolError when the call fails
   */
  callTool(name: string, args: Record<string, unknown>): Promise<ToolResultContent>;
}
