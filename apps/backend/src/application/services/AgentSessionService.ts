// =============================================================================
// Agent Session Service
// =============================================================================
// Keeps one root agent per session for the HTTP surface and registers the
// approval requests it streams.

import { v4 as uuidv4 } from 'uuid';
import type { SessionStorePort } from '../../ports/SessionStorePort.js';
import type { AgentEvent } from '../../domain/agent/events.js';
import { NotFoundError, ValidationError } from '../../domain/errors/index.js';
import type { AgentConfig } from '../../infrastructure/config/agent.js';
import { logger } from '../../infrastructure/logging/logger.js';
import { MAIN_AGENT_ID, type Agent, type AgentFactory, type StreamOptions } from './Agent.js';
import type { ApprovalRegistry } from './ApprovalRegistry.js';

export interface AgentSessionServiceOptions {
  config: AgentConfig;
  createAgent: AgentFactory;
  /** Called only when persistence is enabled */
  createSessionStore: (sessionId: string) => SessionStorePort;
  approvals: ApprovalRegistry;
}

export interface SessionInfo {
  sessionId: string;
  /** Messages replayed from the session log */
  messageCount: number;
  persistent: boolean;
}

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export class AgentSessionService {
  private readonly sessions = new Map<string, Agent>();
  private readonly log = logger.child({ module: 'AgentSessionService' });

  constructor(private readonly options: AgentSessionServiceOptions) {}

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Open a session, resuming its persisted conversation when `sessionId`
   * names an existing one
   *
   * @throws ValidationError when `sessionId` is given but persistence is disabled
   */
  async open(sessionId?: string): Promise<SessionInfo> {
    const { config } = this.options;
    if (sessionId !== undefined) {
      if (!config.enablePersistence) {
        throw new ValidationError('Resuming a session requires persistence to be enabled', { sessionId });
      }
      if (!SESSION_ID_PATTERN.test(sessionId)) {
        throw new ValidationError(`Invalid session id: ${sessionId}`, { sessionId });
      }
      const existing = this.sessions.get(sessionId);
      if (existing) {
        return this.describe(sessionId, existing);
      }
    }

    const id = sessionId ?? uuidv4();
    const agent = this.options.createAgent({
      agentId: MAIN_AGENT_ID,
      sessionId: id,
      config,
      sessionStore: config.enablePersistence ? this.options.createSessionStore(id) : null,
    });
    await agent.start();
    this.sessions.set(id, agent);
    this.log.info('Session opened', { sessionId: id, replayedMessages: agent.messages.length });

    return this.describe(id, agent);
  }

  /**
   * @throws NotFoundError when the session is not open
   */
  get(sessionId: string): Agent {
    const agent = this.sessions.get(sessionId);
    if (!agent) {
      throw new NotFoundError('Session', sessionId);
    }
    return agent;
  }

  /**
   * Stream one exchange on the session's root agent. An agent stopped by
   * cancellation is restarted first.
   */
  async *stream(sessionId: string, prompt: string, options: StreamOptions = {}): AsyncGenerator<AgentEvent, void, undefined> {
    const agent = this.get(sessionId);
    if (!agent.isRunning) {
      await agent.start();
    }

    for await (const event of agent.stream(prompt, options)) {
      if (event.type === 'approval.request') {
        this.options.approvals.register(sessionId, event);
      }
      yield event;
    }
  }

  /**
   * Abort the running exchange of a session, keeping the session open
   */
  async cancel(sessionId: string): Promise<void> {
    await this.get(sessionId).cancel();
  }

  /**
   * Cancel the session's agent and forget the session
   */
  async close(sessionId: string): Promise<void> {
    const agent = this.get(sessionId);
    this.sessions.delete(sessionId);
    this.options.approvals.forgetSession(sessionId);
    await agent.cancel();
    this.log.info('Session closed', { sessionId });
  }

  /**
   * Close every session, attempting all of them
   */
  async closeAll(): Promise<void> {
    const ids = [...this.sessions.keys()];
    const results = await Promise.allSettled(ids.map((id) => this.close(id)));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.log.error('Failed to close session', result.reason, { sessionId: ids[index] });
      }
    });
  }

  private describe(sessionId: string, agent: Agent): SessionInfo {
    return {
      sessionId,
      messageCount: agent.messages.length,
      persistent: this.options.config.enablePersistence,
    };
  }
}
