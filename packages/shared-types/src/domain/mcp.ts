import { z } from 'zod';

// =============================================================================
// MCP Server Config
// =============================================================================
// A server is launched as a child process (stdio) or reached over
// Streamable HTTP. Tools listed in `excludedTools` are hidden from the model.

export const MCPStdioServerConfigSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string(), z.string()).optional(),
  cwd: z.string().optional(),
  excludedTools: z.array(z.string()).default([]),
});

export const MCPHttpServerConfigSchema = z.object({
  url: z.string().url(),
  headers: z.record(z.string(), z.string()).optional(),
  excludedTools: z.array(z.string()).default([]),
});

export const MCPServerConfigSchema = z.union([
  MCPStdioServerConfigSchema,
  MCPHttpServerConfigSchema,
]);

export type MCPStdioServerConfig = z.infer<typeof MCPStdioServerConfigSchema>;
export type MCPHttpServerConfig = z.infer<typeof MCPHttpServerConfigSchema>;
export type MCPServerConfig = z.infer<typeof MCPServerConfigSchema>;

// =============================================================================
// MCP Servers File (`{ "mcpServers": { "<name>": { ... } } }`)
// =============================================================================

export const MCPServersFileSchema = z.object({
  mcpServers: z.record(z.string().regex(/^[A-Za-z0-9_-]+$/), MCPServerConfigSchema).default({}),
});

export type MCPServersFile = z.infer<typeof MCPServersFileSchema>;

// =============================================================================
// MCP Tool (as returned from an MCP server)
// =============================================================================

export const MCPToolSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  inputSchema: z.record(z.string(), z.unknown()), // JSON Schema
});

export type MCPTool = z.infer<typeof MCPToolSchema>;
