import { describe, it, expect } from 'vitest';
import { ToolResultMaterializer } from './ToolResultMaterializer.js';
import { InMemorySessionStore } from '../../test-utils/InMemorySessionStore.js';
import { logger } from '../../infrastructure/logging/logger.js';

function createMaterializer(store: InMemorySessionStore | null, inlineMaxBytes = 10, previewLines = 2) {
  return new ToolResultMaterializer({
    store,
    inlineMaxBytes,
    previewLines,
    workingDir: '/work',
    logger,
  });
}

describe('ToolResultMaterializer', () => {
  it('should keep results within the threshold inline', async () => {
    const store = new InMemorySessionStore('s1');
    const materializer = createMaterializer(store, 100);

    await expect(materializer.materialize('short')).resolves.toBe('short');
    await expect(materializer.materialize({ ok: true })).resolves.toEqual({ ok: true });
    expect(store.toolResults.size).toBe(0);
  });

  it('should replace oversized text with a notice and preview', async () => {
    const store = new InMemorySessionStore('s1');
    const materializer = createMaterializer(store);

    const result = await materializer.materialize('l1\nl2\nl3\nl4\nl5\nl6');

    expect(result).toBe(
      [
        'Tool result exceeded configured inline threshold (10 bytes).',
        'Actual size: 17 bytes.',
        'Preview (first and last 2 lines):',
        'l1',
        'l2',
        '... (2 lines omitted) ...',
        'l5',
        'l6',
        'Full content saved to: .sessions/s1/tool-results/result-1.txt',
      ].join('\n')
    );
    expect(store.toolResults.get('/work/.sessions/s1/tool-results/result-1.txt')).toBe('l1\nl2\nl3\nl4\nl5\nl6');
  });

  it('should save structured results as JSON with sorted keys', async () => {
    const store = new InMemorySessionStore('s1');
    const materializer = createMaterializer(store, 10, 10);

    const result = await materializer.materialize({ b: 1, a: [1] });

    const saved = store.toolResults.get('/work/.sessions/s1/tool-results/result-1.json');
    expect(saved).toBe('{\n  "a": [\n    1\n  ],\n  "b": 1\n}');
    expect(typeof result).toBe('string');
    expect(result).toContain('Full content saved to: .sessions/s1/tool-results/result-1.json');
  });

  it('should truncate long preview lines', async () => {
    const store = new InMemorySessionStore('s1');
    const materializer = createMaterializer(store);

    const result = await materializer.materializeText('x'.repeat(300));

    expect(result.split('\n')[3]).toBe(`${'x'.repeat(240)}... [truncated 60 chars]`);
  });

  it('should keep the payload inline without a session store', async () => {
    const materializer = createMaterializer(null);
    const text = 'a'.repeat(50);

    await expect(materializer.materialize(text)).resolves.toBe(text);
  });

  it('should keep the payload inline when saving fails', async () => {
    const store = new InMemorySessionStore('s1');
    store.failSaves = true;
    const materializer = createMaterializer(store);
    const text = 'a'.repeat(50);

    await expect(materializer.materialize(text)).resolves.toBe(text);
  });

  it('should report paths outside the working directory as absolute', async () => {
    const store = new InMemorySessionStore('s1', '/var/sessions');
    const materializer = createMaterializer(store);

    const result = await materializer.materializeText('a'.repeat(50));

    expect(result.split('\n').pop()).toBe('Full content saved to: /var/sessions/s1/tool-results/result-1.txt');
  });
});
