import type { ToolDefinition, ToolResultContent } from '@taskweave/shared-types';
import type { ToolBackendPort } from '../ports/ToolBackendPort.js';
import { ToolError } from '../domain/errors/index.js';

export type FakeToolHandler = (args: Record<string, unknown>) => ToolResultContent | Promise<ToolResultContent>;

/**
 * Tool back-end serving in-process handlers
 */
export class FakeToolBackend implements ToolBackendPort {
  readonly calls: Array<{ name: string; args: Record<string, unknown> }> = [];
  started = false;

  constructor(
    readonly name: string,
    private readonly handlers: Record<string, FakeToolHandler>
  ) {}

  async start(): Promise<void> {
    this.started = true;
  }

  async stop(): Promise<void> {
    this.started = false;
  }

  async listTools(): Promise<ToolDefinition[]> {
    return Object.keys(this.handlers).map((name) => ({
      name,
      description: `Fake tool ${name}`,
      parameters: { type: 'object', properties: {} },
    }));
  }

  hasTool(name: string): boolean {
    return name in this.handlers;
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<ToolResultContent> {
    const handler = this.handlers[name];
    if (!handler) {
      throw new ToolError(name, 'not found');
    }
    this.calls.push({ name, args });
    return handler(args);
  }
}
