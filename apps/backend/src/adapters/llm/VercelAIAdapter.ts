// =============================================================================
// Vercel AI SDK Adapter
// =============================================================================
// Implements ModelSessionPort using the Vercel AI SDK

import { streamText, type CoreMessage, type LanguageModel } from 'ai';
import type { ConversationMessage } from '@taskweave/shared-types';
import type {
  ModelFinishReason,
  ModelSessionPort,
  ModelStreamOptions,
  ModelStreamPart,
} from '../../ports/ModelSessionPort.js';
import { getLanguageModel, providerOf } from '../../infrastructure/ai/registry.js';
import { convertToolDefinitions } from './tools.js';
import { createTracer, SpanKind, SpanStatusCode, context, trace } from '../../infrastructure/observability/index.js';
import { logger } from '../../infrastructure/logging/logger.js';
import { AppError, LLMError } from '../../domain/errors/index.js';

const tracer = createTracer('model-session', '1.0.0');

/**
 * Model session backed by the Vercel AI SDK.
 *
 * Each `stream` call is one model step: tools are offered without execute
 * functions, so the SDK stops after the model has proposed its calls.
 *
 * @example
 * ```typescript
 * const session = new VercelAIAdapter('openai:gpt-4o-mini');
 * await session.start();
 * for await (const part of session.stream(messages, { tools })) {
 *   // ...
 * }
 * ```
 */
export class VercelAIAdapter implements ModelSessionPort {
  readonly name = 'model-session';
  private model: LanguageModel | null = null;

  /**
   * @param modelId - Model ID in format "provider:model" (e.g., "openai:gpt-4o-mini")
   */
  constructor(readonly modelId: string) {}

  async start(): Promise<void> {
    this.model = getLanguageModel(this.modelId);
  }

  async stop(): Promise<void> {
    this.model = null;
  }

  async *stream(
    messages: ConversationMessage[],
    options: ModelStreamOptions
  ): AsyncGenerator<ModelStreamPart, void, unknown> {
    const provider = providerOf(this.modelId);
    if (!this.model) {
      throw new LLMError(provider, 'Model session is not started');
    }
    const model = this.model;

    const span = tracer.startSpan(`llm.stream ${this.modelId}`, {
      kind: SpanKind.CLIENT,
      attributes: {
        'gen_ai.system': provider,
        'gen_ai.request.model': this.modelId,
        'gen_ai.request.message_count': messages.length,
        'gen_ai.request.tool_count': options.tools.length,
      },
    });
    const ctx = trace.setSpan(context.active(), span);

    let toolCallCount = 0;
    let finished = false;

    try {
      const result = context.with(ctx, () =>
        streamText({
          model,
          messages: toCoreMessages(messages),
          tools: options.tools.length > 0 ? convertToolDefinitions(options.tools) : undefined,
          abortSignal: options.abortSignal,
        })
      );

      for await (const part of result.fullStream) {
        switch (part.type) {
          case 'reasoning':
            yield { type: 'thoughts-delta', delta: part.textDelta };
            break;

          case 'text-delta':
            yield { type: 'text-delta', delta: part.textDelta };
            break;

          case 'tool-call':
            toolCallCount++;
            yield {
              type: 'tool-call',
              toolCall: {
                id: part.toolCallId,
                name: part.toolName,
                args: isRecord(part.args) ? part.args : {},
              },
            };
            break;

          case 'finish':
            finished = true;
            span.setAttributes({
              'gen_ai.usage.prompt_tokens': part.usage.promptTokens,
              'gen_ai.usage.completion_tokens': part.usage.completionTokens,
              'gen_ai.response.finish_reason': part.finishReason,
              'gen_ai.response.tool_calls': toolCallCount,
            });
            yield { type: 'finish', finishReason: mapFinishReason(part.finishReason) };
            break;

          case 'error':
            throw part.error;
        }
      }

      if (!finished) {
        logger.warn('Model stream ended without finish event', { modelId: this.modelId });
        yield { type: 'finish', finishReason: toolCallCount > 0 ? 'tool_calls' : 'stop' };
      }

      span.setStatus({ code: SpanStatusCode.OK });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      span.recordException(error instanceof Error ? error : new Error(message));
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      if (error instanceof AppError) {
        throw error;
      }
      throw new LLMError(provider, message, { modelId: this.modelId });
    } finally {
      span.end();
    }
  }
}

// =============================================================================
// Conversion Helpers
// =============================================================================

/**
 * Convert conversation messages to AI SDK CoreMessages
 */
export function toCoreMessages(messages: ConversationMessage[]): CoreMessage[] {
  return messages.map((m): CoreMessage => {
    switch (m.role) {
      case 'system':
        return { role: 'system', content: m.content };
      case 'user':
        return { role: 'user', content: m.content };
      case 'assistant':
        if (m.toolCalls.length === 0) {
          return { role: 'assistant', content: m.content };
        }
        return {
          role: 'assistant',
          content: [
            ...(m.content ? [{ type: 'text' as const, text: m.content }] : []),
            ...m.toolCalls.map((tc) => ({
              type: 'tool-call' as const,
              toolCallId: tc.id,
              toolName: tc.name,
              args: tc.args,
            })),
          ],
        };
      case 'tool':
        return {
          role: 'tool',
          content: m.results.map((r) => ({
            type: 'tool-result' as const,
            toolCallId: r.toolCallId,
            toolName: r.toolName,
            result: r.content,
          })),
        };
    }
  });
}

/**
 * Map AI SDK finish reason to ModelFinishReason
 */
export function mapFinishReason(reason: string): ModelFinishReason {
  switch (reason) {
    case 'tool-calls':
      return 'tool_calls';
    case 'length':
      return 'length';
    case 'error':
      return 'error';
    default:
      return 'stop';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
