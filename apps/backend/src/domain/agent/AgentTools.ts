// =============================================================================
// Built-in Agent Tools
// =============================================================================
// Tools every agent offers the model in addition to those of its MCP servers.

import { z } from 'zod';
import type { ToolDefinition } from '@taskweave/shared-types';

// =============================================================================
// Tool: execute_code
// =============================================================================

export const EXECUTE_CODE_TOOL_NAME = 'execute_code';

export const EXECUTE_CODE_TOOL: ToolDefinition = {
  name: EXECUTE_CODE_TOOL_NAME,
  description: `Run code in the execution session and return its output.
Files written to the working directory persist between calls.
Images saved to the directory in $TASKWEAVE_ARTIFACTS_DIR are returned as artifacts.`,
  parameters: {
    type: 'object',
    properties: {
      code: {
        type: 'string',
        description: 'Source code to run',
      },
    },
    required: ['code'],
  },
};

export const ExecuteCodeArgsSchema = z.object({
  code: z.string(),
});

// =============================================================================
// Tool: reset_execution
// =============================================================================

export const RESET_EXECUTION_TOOL_NAME = 'reset_execution';

export const RESET_EXECUTION_TOOL: ToolDefinition = {
  name: RESET_EXECUTION_TOOL_NAME,
  description: 'Reset the execution session, discarding its scratch state. Use when the session is in a bad state.',
  parameters: {
    type: 'object',
    properties: {},
  },
};

// =============================================================================
// Tool: subagent_task
// =============================================================================

export const SUBAGENT_TASK_TOOL_NAME = 'subagent_task';

export const SUBAGENT_TASK_TOOL: ToolDefinition = {
  name: SUBAGENT_TASK_TOOL_NAME,
  description: `Delegate a self-contained sub-task to a fresh subagent.
The subagent has its own execution session and the same tools, except that it cannot delegate further.
Several subagent tasks proposed together run concurrently.
Returns the subagent's final response.`,
  parameters: {
    type: 'object',
    properties: {
      prompt: {
        type: 'string',
        description: 'Complete description of the sub-task, including all context the subagent needs',
      },
      max_turns: {
        type: 'integer',
        description: 'Maximum number of tool-execution rounds for the subagent (default 10)',
      },
    },
    required: ['prompt'],
  },
};

export const SubagentTaskArgsSchema = z.object({
  prompt: z.string().min(1),
  max_turns: z.number().int().positive().optional(),
});

// =============================================================================
// Catalog
// =============================================================================

export function getBuiltinTools(options: { enableSubagents: boolean }): ToolDefinition[] {
  const tools = [EXECUTE_CODE_TOOL, RESET_EXECUTION_TOOL];
  if (options.enableSubagents) {
    tools.push(SUBAGENT_TASK_TOOL);
  }
  return tools;
}
