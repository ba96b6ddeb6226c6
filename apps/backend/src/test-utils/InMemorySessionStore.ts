import path from 'node:path';
import type { ConversationMessage } from '@taskweave/shared-types';
import type { SessionStorePort, ToolResultExtension } from '../ports/SessionStorePort.js';

/**
 * Session store that keeps logs in memory. Saved tool results get paths
 * under `rootDir` without touching the disk.
 */
export class InMemorySessionStore implements SessionStorePort {
  readonly logs = new Map<string, ConversationMessage[]>();
  readonly toolResults = new Map<string, string>();
  failSaves = false;

  constructor(
    readonly sessionId: string = 'test-session',
    private readonly rootDir: string = '/work/.sessions'
  ) {}

  async append(agentId: string, messages: ConversationMessage[]): Promise<void> {
    const log = this.logs.get(agentId) ?? [];
    log.push(...structuredClone(messages));
    this.logs.set(agentId, log);
  }

  async load(agentId: string): Promise<ConversationMessage[]> {
    return structuredClone(this.logs.get(agentId) ?? []);
  }

  async saveToolResult(payload: string, ext: ToolResultExtension): Promise<string> {
    if (this.failSaves) {
      throw new Error('disk full');
    }
    const filePath = path.join(this.rootDir, this.sessionId, 'tool-results', `result-${this.toolResults.size + 1}.${ext}`);
    this.toolResults.set(filePath, payload);
    return filePath;
  }
}
