import { describe, it, expect } from 'vitest';
import type { ConversationMessage } from '@taskweave/shared-types';
import { VercelAIAdapter, mapFinishReason, toCoreMessages } from './VercelAIAdapter.js';
import { LLMError } from '../../domain/errors/index.js';

describe('toCoreMessages', () => {
  it('should convert every role', () => {
    const messages: ConversationMessage[] = [
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'hi' },
      {
        role: 'assistant',
        content: 'running',
        toolCalls: [{ id: 'c1', name: 'execute_code', args: { code: '1' } }],
      },
      { role: 'tool', results: [{ toolCallId: 'c1', toolName: 'execute_code', content: '1', rejected: false }] },
      { role: 'assistant', content: 'done', thoughts: 'easy', toolCalls: [] },
    ];

    expect(toCoreMessages(messages)).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'hi' },
      {
        role: 'assistant',
        content: [
          { type: 'text', text: 'running' },
          { type: 'tool-call', toolCallId: 'c1', toolName: 'execute_code', args: { code: '1' } },
        ],
      },
      {
        role: 'tool',
        content: [{ type: 'tool-result', toolCallId: 'c1', toolName: 'execute_code', result: '1' }],
      },
      { role: 'assistant', content: 'done' },
    ]);
  });

  it('should omit empty text next to tool calls', () => {
    const [converted] = toCoreMessages([
      { role: 'assistant', content: '', toolCalls: [{ id: 'c1', name: 'reset_execution', args: {} }] },
    ]);

    expect(converted).toEqual({
      role: 'assistant',
      content: [{ type: 'tool-call', toolCallId: 'c1', toolName: 'reset_execution', args: {} }],
    });
  });
});

describe('mapFinishReason', () => {
  it('should map AI SDK reasons', () => {
    expect(mapFinishReason('tool-calls')).toBe('tool_calls');
    expect(mapFinishReason('length')).toBe('length');
    expect(mapFinishReason('error')).toBe('error');
    expect(mapFinishReason('content-filter')).toBe('stop');
  });
});

describe('VercelAIAdapter', () => {
  it('should refuse to stream before start', async () => {
    const adapter = new VercelAIAdapter('openai:gpt-4o-mini');
    const stream = adapter.stream([{ role: 'user', content: 'hi' }], { tools: [] });

    await expect(stream.next()).rejects.toBeInstanceOf(LLMError);
  });

  it('should reject an unsupported model id on start', async () => {
    const adapter = new VercelAIAdapter('gpt-4o-mini');

    await expect(adapter.start()).rejects.toThrow('Unsupported model id: gpt-4o-mini');
  });
});
