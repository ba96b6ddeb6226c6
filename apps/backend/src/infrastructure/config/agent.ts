// =============================================================================
// Agent Configuration
// =============================================================================
// Per-agent settings, derived from the environment and shared by a root agent
// and every subagent it spawns.

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { MCPServerConfigSchema, MCPServersFileSchema, type MCPServerConfig } from '@taskweave/shared-types';
import { ValidationError } from '../../domain/errors/index.js';
import { DEFAULT_AGENT_MODEL, DEFAULT_SYSTEM_PROMPT } from '../ai/config.js';
import type { Env } from './index.js';

export const AgentConfigSchema = z.object({
  modelId: z.string().regex(/^(openai|anthropic):.+/).default(DEFAULT_AGENT_MODEL),
  systemPrompt: z.string().default(DEFAULT_SYSTEM_PROMPT),
  workingDir: z.string().min(1),

  executionCommand: z.string().min(1).default('python3'),
  executionFileExtension: z.string().default('py'),
  executionTimeoutMs: z.number().int().positive().default(300000),
  approvalTimeoutMs: z.number().int().positive().optional(),

  enableSubagents: z.boolean().default(true),
  maxSubagents: z.number().int().positive().default(5),

  enablePersistence: z.boolean().default(true),
  sessionsDir: z.string().default('.taskweave/sessions'),
  sessionFlush: z.boolean().default(false),

  toolResultInlineMaxBytes: z.number().int().positive().default(32768),
  toolResultPreviewLines: z.number().int().positive().default(10),

  mcpServers: z.record(z.string(), MCPServerConfigSchema).default({}),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type AgentConfigInput = z.input<typeof AgentConfigSchema>;

export function createAgentConfig(input: AgentConfigInput): AgentConfig {
  const result = AgentConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid agent configuration', { issues: result.error.flatten().fieldErrors });
  }
  return result.data;
}

/**
 * Configuration of a child agent: same model, instructions and tools, but
 * no further delegation
 */
export function forSubagent(config: AgentConfig): AgentConfig {
  return { ...config, enableSubagents: false };
}

export function agentConfigFromEnv(
  env: Env,
  mcpServers: Record<string, MCPServerConfig> = {}
): AgentConfig {
  const workingDir = path.resolve(env.AGENT_WORKING_DIR);
  return createAgentConfig({
    modelId: env.AGENT_MODEL,
    systemPrompt: env.AGENT_SYSTEM_PROMPT,
    workingDir,
    executionCommand: env.EXECUTION_COMMAND,
    executionFileExtension: env.EXECUTION_FILE_EXTENSION,
    executionTimeoutMs: env.EXECUTION_TIMEOUT_MS,
    approvalTimeoutMs: env.APPROVAL_TIMEOUT_MS,
    enableSubagents: env.ENABLE_SUBAGENTS === 'true',
    maxSubagents: env.MAX_SUBAGENTS,
    enablePersistence: env.ENABLE_PERSISTENCE === 'true',
    sessionsDir: path.resolve(workingDir, env.SESSIONS_DIR),
    sessionFlush: env.SESSION_FLUSH === 'true',
    toolResultInlineMaxBytes: env.TOOL_RESULT_INLINE_MAX_BYTES,
    toolResultPreviewLines: env.TOOL_RESULT_PREVIEW_LINES,
    mcpServers,
  });
}

// =============================================================================
// MCP Servers File
// =============================================================================

const VARIABLE_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replace `${VAR}` in every string of a parsed JSON value
 *
 * @throws ValidationError naming the first variable missing from `env`
 */
export function substituteVariables(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return value.replace(VARIABLE_PATTERN, (_match, name: string) => {
      const replacement = env[name];
      if (replacement === undefined) {
        throw new ValidationError(`Environment variable ${name} is not set`, { variable: name });
      }
      return replacement;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => substituteVariables(item, env));
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, substituteVariables(item, env)])
    );
  }
  return value;
}

/**
 * Read MCP server definitions from a `{ "mcpServers": { ... } }` JSON file
 */
export async function loadMCPServers(
  file: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<Record<string, MCPServerConfig>> {
  let raw: string;
  try {
    raw = await readFile(file, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Cannot read MCP servers file ${file}: ${message}`, { file });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ValidationError(`MCP servers file ${file} is not valid JSON`, { file });
  }

  const result = MCPServersFileSchema.safeParse(substituteVariables(parsed, env));
  if (!result.success) {
    throw new ValidationError(`Invalid MCP servers file ${file}`, {
      file,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return result.data.mcpServers;
}
