import { describe, it, expect } from 'vitest';
import { ApprovalGate } from './ApprovalGate.js';

describe('ApprovalGate', () => {
  it('should stamp requests with the agent id and origin', () => {
    const gate = new ApprovalGate({ agentId: 'sub-0f0f' });

    const request = gate.request('execute_code', { code: '1' }, { corrId: 'aa11bb22', ptc: true });

    expect(request.agentId).toBe('sub-0f0f');
    expect(request.corrId).toBe('aa11bb22');
    expect(request.ptc).toBe(true);
    expect(request.status).toBe('pending');
  });

  it('should give every request a unique id', () => {
    const gate = new ApprovalGate({ agentId: 'main' });
    const first = gate.request('a', {}, { corrId: 'c1' });
    const second = gate.request('a', {}, { corrId: 'c1' });

    expect(first.id).not.toBe(second.id);
  });

  it('should count only unresolved requests as pending', () => {
    const gate = new ApprovalGate({ agentId: 'main' });
    const first = gate.request('a', {}, { corrId: 'c1' });
    gate.request('b', {}, { corrId: 'c2' });

    first.approve(true);

    expect(gate.pendingCount).toBe(1);
  });

  it('should reject every pending request on rejectPending', async () => {
    const gate = new ApprovalGate({ agentId: 'main' });
    const approvedEarlier = gate.request('a', {}, { corrId: 'c1' });
    const waiting = gate.request('b', {}, { corrId: 'c2' });
    approvedEarlier.approve(true);

    const decision = waiting.approved();
    const rejected = gate.rejectPending();

    expect(rejected).toBe(1);
    await expect(decision).resolves.toBe(false);
    expect(approvedEarlier.status).toBe('approved');
    expect(gate.pendingCount).toBe(0);
  });
});
