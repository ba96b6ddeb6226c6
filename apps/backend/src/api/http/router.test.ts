// =============================================================================
// HTTP Routes - Integration Tests
// =============================================================================
// Drives the Hono app in process. Agents run on scripted models and fake
// execution sessions, so no provider or interpreter is reached.

import { describe, it, expect } from 'vitest';
import { createApp } from './router.js';
import { Agent, type AgentFactory } from '../../application/services/Agent.js';
import { AgentSessionService } from '../../application/services/AgentSessionService.js';
import { ApprovalRegistry } from '../../application/services/ApprovalRegistry.js';
import { createAgentConfig } from '../../infrastructure/config/agent.js';
import { ScriptedModelSession, codeCall, textStep, toolStep, type ScriptedStep } from '../../test-utils/ScriptedModelSession.js';
import { FakeExecutionSession } from '../../test-utils/FakeExecutionSession.js';
import { InMemorySessionStore } from '../../test-utils/InMemorySessionStore.js';

// =============================================================================
// Test Fixtures
// =============================================================================

interface SSEMessage {
  event: string;
  data: Record<string, unknown>;
}

function createTestApp(steps: ScriptedStep[]) {
  const approvals = new ApprovalRegistry();
  const createAgent: AgentFactory = (init) =>
    new Agent({
      agentId: init.agentId,
      sessionId: init.sessionId,
      config: init.config,
      modelSession: new ScriptedModelSession(steps),
      executionSession: new FakeExecutionSession(),
      sessionStore: init.sessionStore,
    });
  const sessions = new AgentSessionService({
    config: createAgentConfig({ workingDir: '/work', enableSubagents: false }),
    createAgent,
    createSessionStore: (sessionId) => new InMemorySessionStore(sessionId),
    approvals,
  });
  return { app: createApp({ sessions, approvals }), sessions, approvals };
}

function post(body: unknown): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

/**
 * Split complete SSE messages off the front of `buffer`
 */
function takeMessages(buffer: string): { messages: SSEMessage[]; rest: string } {
  const blocks = buffer.split('\n\n');
  const rest = blocks.pop() ?? '';
  const messages = blocks
    .filter((block) => block.trim() !== '')
    .map((block) => {
      const lines = block.split('\n');
      const event = lines.find((line) => line.startsWith('event: '))?.slice('event: '.length) ?? 'message';
      const data = lines.find((line) => line.startsWith('data: '))?.slice('data: '.length) ?? '{}';
      return { event, data: JSON.parse(data) };
    });
  return { messages, rest };
}

function parseSSE(text: string): SSEMessage[] {
  return takeMessages(`${text}\n\n`).messages;
}

async function readJson(res: Response): Promise<Record<string, unknown>> {
  const value: unknown = await res.json();
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error('Expected a JSON object');
  }
  return Object.fromEntries(Object.entries(value));
}

async function openSession(app: ReturnType<typeof createApp>): Promise<string> {
  const body = await readJson(await app.request('/api/v1/sessions', post({})));
  if (typeof body.sessionId !== 'string') {
    throw new Error('Expected a session id');
  }
  return body.sessionId;
}

// =============================================================================
// Health
// =============================================================================

describe('Health routes', () => {
  it('should report status and the number of open sessions', async () => {
    const { app } = createTestApp([textStep('hi')]);
    await openSession(app);

    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', version: '0.1.0', sessions: 1 });
  });

  it('should answer the liveness probe', async () => {
    const { app } = createTestApp([textStep('hi')]);

    const res = await app.request('/health/live');

    expect(await res.json()).toMatchObject({ status: 'alive' });
  });

  it('should return NOT_FOUND for unknown routes', async () => {
    const { app } = createTestApp([textStep('hi')]);

    const res = await app.request('/api/v1/nothing');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: 'NOT_FOUND', message: 'Route GET /api/v1/nothing not found' },
    });
  });
});

// =============================================================================
// Sessions
// =============================================================================

describe('Session routes', () => {
  it('should open a session', async () => {
    const { app } = createTestApp([textStep('hi')]);

    const res = await app.request('/api/v1/sessions', post({}));

    expect(res.status).toBe(201);
    const body = await readJson(res);
    expect(body.sessionId).toMatch(/^[0-9a-f-]{36}$/);
    expect(body).toMatchObject({ messageCount: 0, persistent: true });
  });

  it('should open a session under a chosen id', async () => {
    const { app, sessions } = createTestApp([textStep('hi')]);

    const res = await app.request('/api/v1/sessions', post({ sessionId: 'project-1' }));

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ sessionId: 'project-1', messageCount: 0, persistent: true });
    expect(sessions.get('project-1').isRunning).toBe(true);
  });

  it('should reject a malformed session id', async () => {
    const { app } = createTestApp([textStep('hi')]);

    const res = await app.request('/api/v1/sessions', post({ sessionId: '../escape' }));

    expect(res.status).toBe(400);
  });

  it('should stream a text-only exchange as SSE', async () => {
    const { app } = createTestApp([textStep('hello there')]);
    const sessionId = await openSession(app);

    const res = await app.request(`/api/v1/sessions/${sessionId}/stream`, post({ prompt: 'hi' }));

    expect(res.status).toBe(200);
    expect(res.headers.get('Content-Type')).toBe('text/event-stream');
    const messages = parseSSE(await res.text());
    expect(messages.map((message) => message.event)).toEqual(['response.chunk', 'response']);
    expect(messages[1].data).toEqual({
      type: 'response',
      agentId: 'main',
      corrId: messages[0].data.corrId,
      content: 'hello there',
    });
  });

  it('should return 404 when streaming on an unknown session', async () => {
    const { app } = createTestApp([textStep('hi')]);

    const res = await app.request('/api/v1/sessions/missing/stream', post({ prompt: 'hi' }));

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: 'SESSION_NOT_FOUND', message: 'Session with id missing not found' },
    });
  });

  it('should reject an empty prompt', async () => {
    const { app } = createTestApp([textStep('hi')]);
    const sessionId = await openSession(app);

    const res = await app.request(`/api/v1/sessions/${sessionId}/stream`, post({ prompt: '' }));

    expect(res.status).toBe(400);
  });

  it('should cancel a session and keep it open', async () => {
    const { app, sessions } = createTestApp([textStep('hi')]);
    const sessionId = await openSession(app);

    const res = await app.request(`/api/v1/sessions/${sessionId}/cancel`, { method: 'POST' });

    expect(await res.json()).toEqual({ sessionId, cancelled: true });
    expect(sessions.size).toBe(1);
  });

  it('should close a session', async () => {
    const { app, sessions } = createTestApp([textStep('hi')]);
    const sessionId = await openSession(app);

    const res = await app.request(`/api/v1/sessions/${sessionId}`, { method: 'DELETE' });

    expect(await res.json()).toEqual({ sessionId, closed: true });
    expect(sessions.size).toBe(0);

    const again = await app.request(`/api/v1/sessions/${sessionId}`, { method: 'DELETE' });
    expect(again.status).toBe(404);
  });
});

// =============================================================================
// Approvals
// =============================================================================

describe('Approval routes', () => {
  it('should pause the stream until the approval is resolved over HTTP', async () => {
    const { app } = createTestApp([toolStep(codeCall('c1', 'print(1)')), textStep('done')]);
    const sessionId = await openSession(app);

    const res = await app.request(`/api/v1/sessions/${sessionId}/stream`, post({ prompt: 'run it' }));
    const body = res.body;
    if (!body) {
      throw new Error('Expected a streamed body');
    }
    const reader = body.getReader();
    const decoder = new TextDecoder();
    const received: SSEMessage[] = [];
    let buffer = '';

    const readUntil = async (eventType: string): Promise<SSEMessage> => {
      for (;;) {
        const found = received.find((message) => message.event === eventType);
        if (found) {
          return found;
        }
        const { value, done } = await reader.read();
        if (done) {
          throw new Error(`Stream ended before ${eventType}`);
        }
        const parsed = takeMessages(buffer + decoder.decode(value, { stream: true }));
        received.push(...parsed.messages);
        buffer = parsed.rest;
      }
    };

    const request = await readUntil('approval.request');
    expect(request.data).toMatchObject({
      agentId: 'main',
      toolName: 'execute_code',
      toolArgs: { code: 'print(1)' },
      ptc: false,
    });

    const listed = await app.request(`/api/v1/approvals?sessionId=${sessionId}`);
    expect(await listed.json()).toMatchObject({ count: 1, approvals: [{ id: request.data.id }] });

    const resolved = await app.request(`/api/v1/approvals/${String(request.data.id)}`, post({ decision: true }));
    expect(await resolved.json()).toEqual({ id: request.data.id, status: 'approved' });

    const final = await readUntil('response');
    expect(final.data).toMatchObject({ content: 'done' });
    expect(received.map((message) => message.event)).toEqual([
      'approval.request',
      'code.output.chunk',
      'code.output',
      'response.chunk',
      'response',
    ]);

    const again = await app.request(`/api/v1/approvals/${String(request.data.id)}`, post({ decision: false }));
    expect(again.status).toBe(404);
    expect(await again.json()).toMatchObject({ error: { code: 'APPROVALREQUEST_NOT_FOUND' } });
  });

  it('should return 404 for an unknown approval request', async () => {
    const { app } = createTestApp([textStep('hi')]);

    const res = await app.request('/api/v1/approvals/unknown', post({ decision: true }));

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: 'APPROVALREQUEST_NOT_FOUND', message: 'ApprovalRequest with id unknown not found' },
    });
  });

  it('should reject a decision that is not a boolean', async () => {
    const { app } = createTestApp([textStep('hi')]);

    const res = await app.request('/api/v1/approvals/unknown', post({ decision: 'yes' }));

    expect(res.status).toBe(400);
  });

  it('should list no approvals when nothing is pending', async () => {
    const { app } = createTestApp([textStep('hi')]);

    const res = await app.request('/api/v1/approvals');

    expect(await res.json()).toEqual({ approvals: [], count: 0 });
  });
});
