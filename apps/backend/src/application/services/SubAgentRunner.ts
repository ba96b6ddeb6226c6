// =============================================================================
// Sub-Agent Runner
// =============================================================================
// Runs delegated sub-tasks on child agents. Each child gets its own
// resources and a `sub-XXXX` id, shares the parent's session store and
// cannot delegate further. At most `maxSubagents` children run at a time.

import { v4 as uuidv4 } from 'uuid';
import type { SessionStorePort } from '../../ports/SessionStorePort.js';
import type { AgentEvent } from '../../domain/agent/events.js';
import { forSubagent, type AgentConfig } from '../../infrastructure/config/agent.js';
import type { Logger } from '../../infrastructure/logging/logger.js';
import type { Agent, AgentFactory } from './Agent.js';
import { Semaphore } from './concurrency.js';

export interface SubAgentRunnerOptions {
  sessionId: string;
  /** Parent configuration; children run with delegation disabled */
  config: AgentConfig;
  sessionStore: SessionStorePort | null;
  createAgent: AgentFactory;
  logger: Logger;
}

export const SUBAGENT_CANCELLED_RESULT = 'Subagent error: cancelled';

export function newSubagentId(): string {
  return `sub-${uuidv4().replace(/-/g, '').slice(0, 4)}`;
}

export class SubAgentRunner {
  private readonly slots: Semaphore;
  private readonly live = new Set<Agent>();
  private readonly log: Logger;
  private cancelled = false;

  constructor(private readonly options: SubAgentRunnerOptions) {
    this.slots = new Semaphore(options.config.maxSubagents);
    this.log = options.logger.child({ module: 'SubAgentRunner' });
  }

  /** Children currently running */
  get liveCount(): number {
    return this.live.size;
  }

  /** Delegations waiting for a free slot */
  get waitingCount(): number {
    return this.slots.waiting;
  }

  /**
   * Accept delegations again after `cancelAll()`
   */
  resume(): void {
    this.cancelled = false;
  }

  /**
   * Run a sub-task to completion on a fresh child agent
   *
   * @yields every event of the child, unchanged
   * @returns the child's final response, or `Subagent error: <message>`.
   *   A delegation admitted after `cancelAll()` returns without creating a child.
   */
  async *run(prompt: string, maxTurns: number): AsyncGenerator<AgentEvent, string, undefined> {
    const release = await this.slots.acquire();
    const agentId = newSubagentId();
    let child: Agent | null = null;

    try {
      if (this.cancelled) {
        this.log.info('Subagent not started, delegations cancelled', { subagentId: agentId });
        return SUBAGENT_CANCELLED_RESULT;
      }
      child = this.options.createAgent({
        agentId,
        sessionId: this.options.sessionId,
        config: forSubagent(this.options.config),
        sessionStore: this.options.sessionStore,
      });
      this.live.add(child);
      this.log.info('Subagent started', { subagentId: agentId, maxTurns });
      await child.start();
      if (this.cancelled) {
        return SUBAGENT_CANCELLED_RESULT;
      }

      let finalResponse = '';
      for await (const event of child.stream(prompt, { maxTurns })) {
        if (event.type === 'response' && event.agentId === agentId) {
          finalResponse = event.content;
        }
        yield event;
      }
      return finalResponse;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.error('Subagent failed', error, { subagentId: agentId });
      return `Subagent error: ${message}`;
    } finally {
      if (child) {
        this.live.delete(child);
        await child.stop().catch((stopError: unknown) => {
          this.log.error('Failed to stop subagent', stopError, { subagentId: agentId });
        });
      }
      release();
      this.log.debug('Subagent finished', { subagentId: agentId });
    }
  }

  /**
   * Cancel every live child and refuse delegations still waiting for a slot
   */
  async cancelAll(): Promise<void> {
    this.cancelled = true;
    const children = [...this.live];
    const results = await Promise.allSettled(children.map((child) => child.cancel()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.log.error('Failed to cancel subagent', result.reason, { subagentId: children[index].agentId });
      }
    });
  }
}
