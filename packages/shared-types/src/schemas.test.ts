import { describe, it, expect } from 'vitest';
import {
  ConversationMessageSchema,
  MCPServersFileSchema,
  OpenSessionRequestSchema,
  WireEventSchema,
  ApprovalAlreadyResolvedError,
  NotFoundError,
} from './index.js';

describe('ConversationMessageSchema', () => {
  it('should accept a tool message with structured content', () => {
    const message = {
      role: 'tool',
      results: [{ toolCallId: 'c1', toolName: 'files_list', content: { entries: 2 }, rejected: false }],
    };

    expect(ConversationMessageSchema.parse(message)).toEqual(message);
  });

  it('should reject an assistant message without tool calls', () => {
    const result = ConversationMessageSchema.safeParse({ role: 'assistant', content: 'hi' });

    expect(result.success).toBe(false);
  });
});

describe('WireEventSchema', () => {
  it('should accept an approval request', () => {
    const event = {
      type: 'approval.request',
      agentId: 'main',
      corrId: 'a1b2c3d4',
      id: 'req-1',
      toolName: 'execute_code',
      toolArgs: { code: 'print(1)' },
      ptc: false,
    };

    expect(WireEventSchema.parse(event)).toEqual(event);
  });

  it('should reject an unknown event type', () => {
    expect(WireEventSchema.safeParse({ type: 'response.done', agentId: 'main', corrId: 'x' }).success).toBe(false);
  });
});

describe('MCPServersFileSchema', () => {
  it('should fill defaults for stdio and http servers', () => {
    const parsed = MCPServersFileSchema.parse({
      mcpServers: {
        files: { command: 'files-server' },
        search: { url: 'http://localhost:8080/mcp' },
      },
    });

    expect(parsed.mcpServers).toEqual({
      files: { command: 'files-server', args: [], excludedTools: [] },
      search: { url: 'http://localhost:8080/mcp', excludedTools: [] },
    });
  });

  it('should reject server names that cannot prefix tool names', () => {
    expect(MCPServersFileSchema.safeParse({ mcpServers: { 'my server': { command: 'x' } } }).success).toBe(false);
  });
});

describe('OpenSessionRequestSchema', () => {
  it('should allow omitting the session id', () => {
    expect(OpenSessionRequestSchema.parse({})).toEqual({});
  });

  it('should reject path separators in the session id', () => {
    expect(OpenSessionRequestSchema.safeParse({ sessionId: 'a/b' }).success).toBe(false);
  });
});

describe('errors', () => {
  it('should serialize a not-found error', () => {
    const error = new NotFoundError('Session', 's1');

    expect(error.statusCode).toBe(404);
    expect(error.toJSON()).toEqual({
      error: { code: 'SESSION_NOT_FOUND', message: 'Session with id s1 not found' },
    });
  });

  it('should report a double resolution as a conflict', () => {
    const error = new ApprovalAlreadyResolvedError('req-1', 'approved');

    expect(error.statusCode).toBe(409);
    expect(error.message).toBe('Approval request req-1 is already approved');
    expect(error.toJSON().error.details).toEqual({ requestId: 'req-1', state: 'approved' });
  });
});
