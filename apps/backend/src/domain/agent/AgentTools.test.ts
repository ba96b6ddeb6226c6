import { describe, it, expect } from 'vitest';
import { ToolDefinitionSchema } from '@taskweave/shared-types';
import { getBuiltinTools, SubagentTaskArgsSchema } from './AgentTools.js';

describe('getBuiltinTools', () => {
  it('should offer delegation only when subagents are enabled', () => {
    expect(getBuiltinTools({ enableSubagents: true }).map((t) => t.name)).toEqual([
      'execute_code',
      'reset_execution',
      'subagent_task',
    ]);
    expect(getBuiltinTools({ enableSubagents: false }).map((t) => t.name)).toEqual([
      'execute_code',
      'reset_execution',
    ]);
  });

  it('should produce valid tool definitions', () => {
    for (const tool of getBuiltinTools({ enableSubagents: true })) {
      expect(ToolDefinitionSchema.safeParse(tool).success).toBe(true);
    }
  });
});

describe('SubagentTaskArgsSchema', () => {
  it('should leave max_turns unset when omitted', () => {
    expect(SubagentTaskArgsSchema.parse({ prompt: 'count files' })).toEqual({ prompt: 'count files' });
  });

  it('should reject an empty prompt', () => {
    expect(SubagentTaskArgsSchema.safeParse({ prompt: '' }).success).toBe(false);
  });
});
