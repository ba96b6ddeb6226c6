import { describe, it, expect } from 'vitest';
import { WireEventSchema } from '@taskweave/shared-types';
import { ApprovalRequest } from './ApprovalRequest.js';
import {
  codeOutput,
  formatCodeOutput,
  response,
  toWireEvent,
  toolOutput,
  type AgentEvent,
} from './events.js';

const origin = { agentId: 'sub-1a2b', corrId: 'c0ffee00' };

describe('formatCodeOutput', () => {
  it('should append a markdown link per image', () => {
    expect(formatCodeOutput({ text: 'done', images: ['/tmp/a.png', '/tmp/b.png'] })).toBe(
      'done\n![Image](/tmp/a.png)\n![Image](/tmp/b.png)'
    );
  });

  it('should render images alone when there is no text', () => {
    expect(formatCodeOutput({ text: null, images: ['/tmp/a.png'] })).toBe('![Image](/tmp/a.png)');
  });

  it('should render nothing for empty output', () => {
    expect(formatCodeOutput({ text: '', images: [] })).toBe('');
  });
});

describe('toWireEvent', () => {
  it('should pass plain events through unchanged', () => {
    const event = response(origin, '4');
    expect(toWireEvent(event)).toBe(event);
  });

  it('should produce payloads accepted by the wire schema', () => {
    const events: AgentEvent[] = [
      response(origin, 'hello'),
      codeOutput(origin, '4', []),
      toolOutput(origin, { rows: [1, 2] }),
      new ApprovalRequest({ id: 'r1', ...origin, toolName: 'fs_read', toolArgs: { path: 'a' }, ptc: true }),
    ];

    for (const event of events) {
      expect(WireEventSchema.safeParse(toWireEvent(event)).success).toBe(true);
    }
  });
});
