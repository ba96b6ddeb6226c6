// =============================================================================
// Tool Result Materializer
// =============================================================================
// Keeps oversized tool results out of the conversation. Results above the
// inline threshold are written to the session's tool-results directory and
// replaced by a short notice with a preview.

import path from 'node:path';
import type { ToolResultContent } from '@taskweave/shared-types';
import type { SessionStorePort, ToolResultExtension } from '../../ports/SessionStorePort.js';
import type { Logger } from '../../infrastructure/logging/logger.js';

const MAX_PREVIEW_LINE_CHARS = 240;
const MAX_PREVIEW_TOTAL_BYTES = 4096;

export interface ToolResultMaterializerOptions {
  store: SessionStorePort | null;
  inlineMaxBytes: number;
  previewLines: number;
  /** Saved paths are reported relative to this directory when inside it */
  workingDir: string;
  logger: Logger;
}

interface CanonicalResult {
  payload: string;
  ext: ToolResultExtension;
}

export class ToolResultMaterializer {
  constructor(private readonly options: ToolResultMaterializerOptions) {}

  /**
   * Return the content unchanged, or an overflow notice when its canonical
   * form is larger than the inline threshold
   */
  async materialize(content: ToolResultContent): Promise<ToolResultContent> {
    const canonical = canonicalize(content);
    const size = Buffer.byteLength(canonical.payload, 'utf8');
    const { inlineMaxBytes, store, logger } = this.options;

    if (size <= inlineMaxBytes) {
      return content;
    }

    if (!store) {
      logger.warn('Tool result exceeded inline threshold but no session store is configured', {
        size,
        threshold: inlineMaxBytes,
      });
      return content;
    }

    let savedPath: string;
    try {
      savedPath = await store.saveToolResult(canonical.payload, canonical.ext);
    } catch (error) {
      logger.error('Failed to persist large tool result; keeping inline payload', error, {
        size,
        threshold: inlineMaxBytes,
      });
      return content;
    }

    return [
      `Tool result exceeded configured inline threshold (${inlineMaxBytes} bytes).`,
      `Actual size: ${size} bytes.`,
      `Preview (first and last ${this.options.previewLines} lines):`,
      ...this.preview(canonical.payload),
      `Full content saved to: ${this.displayPath(savedPath)}`,
    ].join('\n');
  }

  /**
   * Same as `materialize` for results that are always text
   */
  async materializeText(text: string): Promise<string> {
    const content = await this.materialize(text);
    return typeof content === 'string' ? content : JSON.stringify(content);
  }

  private preview(text: string): string[] {
    const lines = splitLines(text);
    if (lines.length === 0) {
      return ['<empty>'];
    }

    const boundary = this.options.previewLines;
    const selected =
      lines.length <= boundary * 2
        ? lines
        : [
            ...lines.slice(0, boundary),
            `... (${lines.length - boundary * 2} lines omitted) ...`,
            ...lines.slice(-boundary),
          ];

    return capTotalBytes(selected.map(capLine));
  }

  private displayPath(absolutePath: string): string {
    const relative = path.relative(this.options.workingDir, absolutePath);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      return absolutePath.split(path.sep).join('/');
    }
    return relative.split(path.sep).join('/');
  }
}

function canonicalize(content: ToolResultContent): CanonicalResult {
  if (typeof content === 'string') {
    return { payload: content, ext: 'txt' };
  }
  return { payload: JSON.stringify(sortKeys(content), null, 2), ext: 'json' };
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, nested]) => [key, sortKeys(nested)])
    );
  }
  return value;
}

function splitLines(text: string): string[] {
  if (text === '') {
    return [];
  }
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function capLine(line: string): string {
  if (line.length <= MAX_PREVIEW_LINE_CHARS) {
    return line;
  }
  const omitted = line.length - MAX_PREVIEW_LINE_CHARS;
  return `${line.slice(0, MAX_PREVIEW_LINE_CHARS)}... [truncated ${omitted} chars]`;
}

function capTotalBytes(lines: string[]): string[] {
  const kept: string[] = [];
  let used = 0;

  for (const line of lines) {
    const separator = kept.length > 0 ? 1 : 0;
    const budget = MAX_PREVIEW_TOTAL_BYTES - used - separator;
    if (budget <= 0) {
      break;
    }

    const size = Buffer.byteLength(line, 'utf8');
    if (size <= budget) {
      kept.push(line);
      used += separator + size;
      continue;
    }

    const trimmed = trimToBytes(line, budget);
    if (trimmed) {
      kept.push(trimmed);
    }
    break;
  }

  return kept.length > 0 ? kept : ['<preview truncated>'];
}

function trimToBytes(text: string, budget: number): string {
  const chars = Array.from(text);
  while (chars.length > 0 && Buffer.byteLength(chars.join(''), 'utf8') > budget) {
    chars.pop();
  }
  return chars.join('');
}
