import { describe, it, expect, vi, afterEach } from 'vitest';
import { ApprovalRequest } from './ApprovalRequest.js';
import { ApprovalAlreadyResolvedError, ApprovalTimeoutError } from '../errors/index.js';

function createRequest(timeoutMs?: number): ApprovalRequest {
  return new ApprovalRequest({
    id: 'req-1',
    agentId: 'main',
    corrId: 'abcd1234',
    toolName: 'execute_code',
    toolArgs: { code: 'print(2 + 2)' },
    timeoutMs,
  });
}

describe('ApprovalRequest', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should start pending', () => {
    const request = createRequest();
    expect(request.status).toBe('pending');
    expect(request.ptc).toBe(false);
  });

  it('should resolve approved() with the decision', async () => {
    const request = createRequest();
    const pending = request.approved();

    request.approve(true);

    await expect(pending).resolves.toBe(true);
    expect(request.status).toBe('approved');
  });

  it('should resolve a decision given before approved() is awaited', async () => {
    const request = createRequest();
    request.approve(false);

    await expect(request.approved()).resolves.toBe(false);
    expect(request.status).toBe('rejected');
  });

  it('should throw on a second approve without changing the decision', async () => {
    const request = createRequest();
    request.approve(true);

    expect(() => request.approve(false)).toThrow(ApprovalAlreadyResolvedError);
    expect(() => request.approve(false)).toThrow('Approval request req-1 is already approved');
    await expect(request.approved()).resolves.toBe(true);
    expect(request.status).toBe('approved');
  });

  it('should expire when no decision arrives in time', async () => {
    vi.useFakeTimers();
    const request = createRequest(1000);
    const pending = request.approved();
    const assertion = expect(pending).rejects.toBeInstanceOf(ApprovalTimeoutError);

    await vi.advanceTimersByTimeAsync(1000);

    await assertion;
    expect(request.status).toBe('expired');
    expect(() => request.approve(true)).toThrow('Approval request req-1 is already expired');
  });

  it('should not expire when resolved before the timeout', async () => {
    vi.useFakeTimers();
    const request = createRequest(1000);
    const pending = request.approved();

    await vi.advanceTimersByTimeAsync(500);
    request.approve(true);
    await vi.advanceTimersByTimeAsync(1000);

    await expect(pending).resolves.toBe(true);
    expect(request.status).toBe('approved');
  });

  it('should share one wait between repeated approved() calls', () => {
    const request = createRequest(1000);
    expect(request.approved()).toBe(request.approved());
  });

  it('should serialize without the resolution cell', () => {
    const request = createRequest();
    expect(request.toWire()).toEqual({
      type: 'approval.request',
      agentId: 'main',
      corrId: 'abcd1234',
      id: 'req-1',
      toolName: 'execute_code',
      toolArgs: { code: 'print(2 + 2)' },
      ptc: false,
    });
  });
});
