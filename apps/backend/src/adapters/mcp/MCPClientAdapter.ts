// =============================================================================
// MCP Client Adapter
// =============================================================================
// One MCP server as a tool back-end, over stdio or Streamable HTTP, using the
// official MCP SDK. Tools are exposed to the model as `<server>_<tool>`.

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { MCPServerConfig, ToolDefinition, ToolResultContent } from '@taskweave/shared-types';
import type { ToolBackendPort } from '../../ports/ToolBackendPort.js';
import { ToolError } from '../../domain/errors/index.js';
import { logger, type Logger } from '../../infrastructure/logging/logger.js';
import { createTracer, SpanKind, SpanStatusCode } from '../../infrastructure/observability/index.js';

const tracer = createTracer('mcp-client', '1.0.0');

export interface MCPClientAdapterOptions {
  /** Overrides the transport built from the server config */
  transportFactory?: () => Transport;
}

/**
 * MCP Client Adapter
 *
 * Connects on `start`, lists the server's tools once and keeps them until
 * `stop`. Tools named in the server's `excludedTools` are never exposed.
 */
export class MCPClientAdapter implements ToolBackendPort {
  readonly name: string;
  private client: Client | null = null;
  private tools = new Map<string, ToolDefinition & { remoteName: string }>();
  private readonly log: Logger;

  constructor(
    readonly serverName: string,
    private readonly config: MCPServerConfig,
    private readonly options: MCPClientAdapterOptions = {}
  ) {
    this.name = `mcp-server-${serverName}`;
    this.log = logger.child({ module: 'MCPClientAdapter', server: serverName });
  }

  async start(): Promise<void> {
    if (this.client) {
      return;
    }

    const client = new Client({ name: 'taskweave', version: '0.1.0' }, { capabilities: {} });
    this.log.info('Connecting to MCP server');
    await client.connect(this.createTransport());
    this.client = client;

    try {
      await this.refreshTools();
    } catch (error) {
      await this.stop();
      throw error;
    }
  }

  async stop(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.tools.clear();
    if (client) {
      await client.close();
      this.log.info('Disconnected from MCP server');
    }
  }

  async listTools(): Promise<ToolDefinition[]> {
    return [...this.tools.values()].map(({ name, description, parameters }) => ({ name, description, parameters }));
  }

  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<ToolResultContent> {
    const tool = this.tools.get(name);
    const client = this.client;
    if (!tool || !client) {
      throw new ToolError(name, `Not provided by MCP server ${this.serverName}`);
    }

    return tracer.startActiveSpan(
      `mcp.tool.call ${name}`,
      {
        kind: SpanKind.CLIENT,
        attributes: {
          'mcp.server.name': this.serverName,
          'mcp.tool.name': tool.remoteName,
        },
      },
      async (span) => {
        const startTime = Date.now();
        try {
          const raw = await client.callTool({ name: tool.remoteName, arguments: args });
          const result = CallToolResultSchema.safeParse(raw);
          if (!result.success) {
            throw new ToolError(name, 'Unexpected result format');
          }

          const text = result.data.content
            .flatMap((item) => (item.type === 'text' ? [item.text] : []))
            .join('\n');

          span.setAttributes({
            'mcp.tool.latency_ms': Date.now() - startTime,
            'mcp.tool.is_error': result.data.isError === true,
          });

          if (result.data.isError) {
            throw new ToolError(name, text || 'Tool returned an error');
          }

          this.log.debug('Tool call completed', { tool: name, latencyMs: Date.now() - startTime });

          if (result.data.structuredContent) {
            return result.data.structuredContent;
          }
          if (result.data.content.every((item) => item.type === 'text')) {
            return text;
          }
          return result.data.content;
        } catch (error) {
          const err = error instanceof Error ? error : new Error(String(error));
          span.recordException(err);
          span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
          throw error;
        } finally {
          span.end();
        }
      }
    );
  }

  // =========================================================================
  // Private Methods
  // =========================================================================

  private createTransport(): Transport {
    if (this.options.transportFactory) {
      return this.options.transportFactory();
    }

    if ('command' in this.config) {
      return new StdioClientTransport({
        command: this.config.command,
        args: this.config.args,
        env: { ...getDefaultEnvironment(), ...this.config.env },
        cwd: this.config.cwd,
        stderr: 'inherit',
      });
    }

    return new StreamableHTTPClientTransport(new URL(this.config.url), {
      requestInit: { headers: this.config.headers },
    });
  }

  private async refreshTools(): Promise<void> {
    if (!this.client) {
      return;
    }

    const excluded = new Set(this.config.excludedTools);
    const result = await this.client.listTools();

    this.tools.clear();
    for (const tool of result.tools) {
      if (excluded.has(tool.name)) {
        continue;
      }
      const exposedName = `${this.serverName}_${tool.name}`;
      this.tools.set(exposedName, {
        name: exposedName,
        description: tool.description ?? '',
        parameters: tool.inputSchema,
        remoteName: tool.name,
      });
    }

    this.log.info('Tools fetched', { count: this.tools.size, excluded: excluded.size });
  }
}
