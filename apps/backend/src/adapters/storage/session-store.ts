// =============================================================================
// Session Store - Storage Adapter
// =============================================================================
// Persists each agent's conversation as JSON lines under
// `<sessionsDir>/<sessionId>/<agentId>.jsonl`, one versioned envelope per
// message. Oversized tool results go to `<sessionId>/tool-results/`.

import { appendFile, mkdir, open, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import {
  ConversationMessageSchema,
  SESSION_ENVELOPE_VERSION,
  SessionEnvelopeSchema,
  type ConversationMessage,
  type SessionEnvelope,
} from '@taskweave/shared-types';
import type { SessionStorePort, ToolResultExtension } from '../../ports/SessionStorePort.js';
import { PersistenceError, ValidationError } from '../../domain/errors/index.js';

const SAFE_NAME = /^[A-Za-z0-9_-]+$/;

export interface JsonlSessionStoreOptions {
  sessionsDir: string;
  sessionId: string;
  /** fsync the log after every append */
  flushAfterAppend?: boolean;
}

export class JsonlSessionStore implements SessionStorePort {
  readonly sessionId: string;
  private readonly sessionDir: string;
  private readonly flushAfterAppend: boolean;

  constructor(options: JsonlSessionStoreOptions) {
    assertSafeName('sessionId', options.sessionId);
    this.sessionId = options.sessionId;
    this.sessionDir = path.resolve(options.sessionsDir, options.sessionId);
    this.flushAfterAppend = options.flushAfterAppend ?? false;
  }

  /**
   * Path of an agent's log file
   */
  logPath(agentId: string): string {
    assertSafeName('agentId', agentId);
    return path.join(this.sessionDir, `${agentId}.jsonl`);
  }

  async append(agentId: string, messages: ConversationMessage[]): Promise<void> {
    if (messages.length === 0) {
      return;
    }

    const file = this.logPath(agentId);
    const lines = messages
      .map((message) => {
        const envelope: SessionEnvelope = {
          v: SESSION_ENVELOPE_VERSION,
          message,
          meta: { ts: new Date().toISOString() },
        };
        return `${JSON.stringify(envelope)}\n`;
      })
      .join('');

    try {
      await mkdir(this.sessionDir, { recursive: true });
      if (this.flushAfterAppend) {
        const handle = await open(file, 'a');
        try {
          await handle.appendFile(lines, 'utf8');
          await handle.sync();
        } finally {
          await handle.close();
        }
      } else {
        await appendFile(file, lines, 'utf8');
      }
    } catch (error) {
      throw new PersistenceError(`Failed to append to session log ${file}`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Replay an agent's log.
   *
   * An unparsable final line (an interrupted write) is ignored; any other
   * malformed line fails the whole load.
   */
  async load(agentId: string): Promise<ConversationMessage[]> {
    const file = this.logPath(agentId);

    let raw: string;
    try {
      raw = await readFile(file, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw new PersistenceError(`Failed to read session log ${file}`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const lines = raw.split('\n');
    if (lines[lines.length - 1] === '') {
      lines.pop();
    }

    const messages: ConversationMessage[] = [];
    for (const [index, line] of lines.entries()) {
      const lineNo = index + 1;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        if (index === lines.length - 1) {
          break;
        }
        throw new PersistenceError(`Malformed JSONL line ${lineNo} in ${file}`, { line: lineNo });
      }

      const envelope = parseEnvelope(parsed, lineNo, file);
      const message = ConversationMessageSchema.safeParse(envelope.message);
      if (!message.success) {
        throw new PersistenceError(`Invalid message on line ${lineNo} in ${file}`, {
          line: lineNo,
          issues: message.error.issues,
        });
      }
      messages.push(message.data);
    }

    return messages;
  }

  async saveToolResult(payload: string, ext: ToolResultExtension): Promise<string> {
    const dir = path.join(this.sessionDir, 'tool-results');
    const file = path.join(dir, `${uuidv4().replace(/-/g, '').slice(0, 12)}.${ext}`);
    try {
      await mkdir(dir, { recursive: true });
      await writeFile(file, payload, 'utf8');
    } catch (error) {
      throw new PersistenceError(`Failed to save tool result to ${file}`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
    return file;
  }
}

function parseEnvelope(value: unknown, lineNo: number, file: string): SessionEnvelope {
  const result = SessionEnvelopeSchema.safeParse(value);
  if (!result.success) {
    throw new PersistenceError(`Malformed JSONL line ${lineNo} in ${file}`, { line: lineNo });
  }

  const envelope = result.data;
  if (envelope.v !== SESSION_ENVELOPE_VERSION) {
    throw new PersistenceError(`Unsupported session envelope version on line ${lineNo} in ${file}`, {
      line: lineNo,
      version: envelope.v,
    });
  }
  if ('agentId' in envelope.meta) {
    throw new PersistenceError(
      `Invalid session envelope on line ${lineNo} in ${file}: meta.agentId is forbidden`,
      { line: lineNo }
    );
  }
  return envelope;
}

function assertSafeName(field: string, value: string): void {
  if (!SAFE_NAME.test(value)) {
    throw new ValidationError(`Invalid ${field}: ${value}`, { [field]: value });
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
