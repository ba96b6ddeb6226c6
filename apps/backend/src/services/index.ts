// =============================================================================
// Services - Composition Root
// =============================================================================
// Wires the agent core to its production adapters. Services are created once
// at startup and shared across the application.

import { VercelAIAdapter } from '../adapters/llm/VercelAIAdapter.js';
import { ProcessExecutionAdapter } from '../adapters/execution/ProcessExecutionAdapter.js';
import { MCPClientAdapter } from '../adapters/mcp/index.js';
import { JsonlSessionStore } from '../adapters/storage/session-store.js';
import { Agent, type AgentFactory } from '../application/services/Agent.js';
import { AgentSessionService } from '../application/services/AgentSessionService.js';
import { ApprovalRegistry } from '../application/services/ApprovalRegistry.js';
import { agentConfigFromEnv, loadMCPServers, type AgentConfig } from '../infrastructure/config/agent.js';
import type { Env } from '../infrastructure/config/index.js';
import { logger } from '../infrastructure/logging/logger.js';

// =============================================================================
// Agent Factory
// =============================================================================

/**
 * Build agents on the production adapters. The same factory builds root
 * agents and their subagents; every agent gets its own connections.
 */
export const createProductionAgent: AgentFactory = ({ agentId, sessionId, config, sessionStore }) =>
  new Agent({
    agentId,
    sessionId,
    config,
    modelSession: new VercelAIAdapter(config.modelId),
    executionSession: new ProcessExecutionAdapter({
      command: config.executionCommand,
      fileExtension: config.executionFileExtension,
      workingDir: config.workingDir,
      sessionName: `${sessionId}-${agentId}`,
    }),
    toolBackends: Object.entries(config.mcpServers).map(
      ([serverName, serverConfig]) => new MCPClientAdapter(serverName, serverConfig)
    ),
    sessionStore,
    createSubagent: createProductionAgent,
  });

// =============================================================================
// Services
// =============================================================================

export interface Services {
  agentConfig: AgentConfig;
  approvals: ApprovalRegistry;
  sessions: AgentSessionService;
}

/**
 * Create the application services from the validated environment
 */
export async function createServices(env: Env): Promise<Services> {
  const mcpServers = env.MCP_SERVERS_FILE ? await loadMCPServers(env.MCP_SERVERS_FILE) : {};
  const agentConfig = agentConfigFromEnv(env, mcpServers);

  logger.info('Agent configuration loaded', {
    model: agentConfig.modelId,
    workingDir: agentConfig.workingDir,
    mcpServers: Object.keys(mcpServers),
    subagents: agentConfig.enableSubagents,
    persistence: agentConfig.enablePersistence,
  });

  const approvals = new ApprovalRegistry();
  const sessions = new AgentSessionService({
    config: agentConfig,
    createAgent: createProductionAgent,
    createSessionStore: (sessionId) =>
      new JsonlSessionStore({
        sessionsDir: agentConfig.sessionsDir,
        sessionId,
        flushAfterAppend: agentConfig.sessionFlush,
      }),
    approvals,
  });

  return { agentConfig, approvals, sessions };
}
