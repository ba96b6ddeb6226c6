import type { ConversationMessage, ToolCallProposal, ToolDefinition } from '@taskweave/shared-types';
import type { ModelSessionPort, ModelStreamOptions, ModelStreamPart } from '../ports/ModelSessionPort.js';

/**
 * One model step: the parts to emit, or a function computing them from the
 * conversation so far
 */
export type ScriptedStep =
  | ModelStreamPart[]
  | ((messages: ConversationMessage[]) => ModelStreamPart[] | Promise<ModelStreamPart[]>);

export interface RecordedModelCall {
  messages: ConversationMessage[];
  tools: ToolDefinition[];
}

/**
 * Model session that replays scripted steps in order. Once the script is
 * exhausted the last step repeats.
 */
export class ScriptedModelSession implements ModelSessionPort {
  readonly name = 'model-session';
  readonly calls: RecordedModelCall[] = [];
  started = false;
  startCount = 0;
  stopCount = 0;
  failStart: Error | null = null;

  constructor(
    private readonly steps: ScriptedStep[],
    readonly modelId: string = 'openai:test-model'
  ) {}

  async start(): Promise<void> {
    if (this.failStart) {
      throw this.failStart;
    }
    this.started = true;
    this.startCount++;
  }

  async stop(): Promise<void> {
    this.started = false;
    this.stopCount++;
  }

  async *stream(
    messages: ConversationMessage[],
    options: ModelStreamOptions
  ): AsyncGenerator<ModelStreamPart, void, unknown> {
    this.calls.push({ messages: structuredClone(messages), tools: options.tools });
    const step = this.steps[Math.min(this.calls.length - 1, this.steps.length - 1)];
    const parts = typeof step === 'function' ? await step(messages) : step;
    for (const part of parts) {
      yield part;
    }
  }
}

// =============================================================================
// Step builders
// =============================================================================

export function textStep(text: string): ModelStreamPart[] {
  return [
    { type: 'text-delta', delta: text },
    { type: 'finish', finishReason: 'stop' },
  ];
}

export function toolStep(...toolCalls: ToolCallProposal[]): ModelStreamPart[] {
  return [
    ...toolCalls.map((toolCall): ModelStreamPart => ({ type: 'tool-call', toolCall })),
    { type: 'finish', finishReason: 'tool_calls' },
  ];
}

export function codeCall(id: string, code: string): ToolCallProposal {
  return { id, name: 'execute_code', args: { code } };
}
