// =============================================================================
// Agent
// =============================================================================
// Turn loop of one agent. Streams the model's output, turns its proposals
// into approved and executed actions, feeds the results back and persists
// every message as it is produced.

import { v4 as uuidv4 } from 'uuid';
import type { ZodError } from 'zod';
import type {
  AssistantMessage,
  ConversationMessage,
  ToolCallProposal,
  ToolDefinition,
  ToolResultContent,
  ToolReturn,
} from '@taskweave/shared-types';
import type {
  ExecutionSessionPort,
  ModelSessionPort,
  SessionStorePort,
  ToolBackendPort,
} from '../../ports/index.js';
import {
  EXECUTE_CODE_TOOL_NAME,
  ExecuteCodeArgsSchema,
  RESET_EXECUTION_TOOL_NAME,
  SUBAGENT_TASK_TOOL_NAME,
  SubagentTaskArgsSchema,
  assertNever,
  codeOutput,
  codeOutputChunk,
  formatCodeOutput,
  response,
  responseChunk,
  thoughts,
  thoughtsChunk,
  toolOutput,
  type AgentEvent,
  getBuiltinTools,
  type EventOrigin,
} from '../../domain/agent/index.js';
import {
  ApprovalTimeoutError,
  ConflictError,
  ExecutionError,
  ValidationError,
} from '../../domain/errors/index.js';
import type { AgentConfig } from '../../infrastructure/config/agent.js';
import { DEFAULT_SUBAGENT_MAX_TURNS } from '../../infrastructure/ai/config.js';
import { logger, type Logger } from '../../infrastructure/logging/logger.js';
import { createTracer, SpanStatusCode, withSpan } from '../../infrastructure/observability/index.js';
import { ApprovalGate } from './ApprovalGate.js';
import { ResourceSupervisor } from './ResourceSupervisor.js';
import { mergeAsyncIterables, Semaphore } from './concurrency.js';
import { SubAgentRunner } from './SubAgentRunner.js';
import { ToolResultMaterializer } from './ToolResultMaterializer.js';

const tracer = createTracer('agent', '1.0.0');

export const MAIN_AGENT_ID = 'main';

export const REJECTED_RESULT = 'Tool call rejected';
export const APPROVAL_TIMEOUT_RESULT = 'Approval request timed out';
export const DISCARDED_RESULT =
  'Tool call result discarded because another tool call of the same step was not approved';

// =============================================================================
// Types
// =============================================================================

export interface AgentInit {
  agentId: string;
  sessionId: string;
  config: AgentConfig;
  sessionStore: SessionStorePort | null;
}

/**
 * Builds the child agent of a delegation, with its own model session,
 * execution session and tool connections
 */
export type AgentFactory = (init: AgentInit) => Agent;

export interface AgentOptions {
  /** Defaults to "main" */
  agentId?: string;
  /** Shared by an agent and its subagents; defaults to the store's session id */
  sessionId?: string;
  config: AgentConfig;
  modelSession: ModelSessionPort;
  executionSession: ExecutionSessionPort;
  toolBackends?: ToolBackendPort[];
  sessionStore?: SessionStorePort | null;
  /** Required when `config.enableSubagents` is set */
  createSubagent?: AgentFactory;
}

export interface StreamOptions {
  /** Stop after this many executed rounds of tool calls; unbounded when unset */
  maxTurns?: number;
}

type ApprovalOutcome = 'approved' | 'rejected' | 'timed-out';

interface ActionOutcome {
  content: ToolResultContent;
  status: 'ok' | 'rejected' | 'timed-out';
}

interface DispatchResult {
  results: ToolReturn[];
  /** Text of the terminal response when the round ends the turn */
  stopReason: string | null;
}

function newCorrId(): string {
  return uuidv4().replace(/-/g, '').slice(0, 8);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function denied(outcome: Exclude<ApprovalOutcome, 'approved'>): ActionOutcome {
  return outcome === 'rejected'
    ? { content: REJECTED_RESULT, status: 'rejected' }
    : { content: APPROVAL_TIMEOUT_RESULT, status: 'timed-out' };
}

// =============================================================================
// Agent
// =============================================================================

/**
 * An LLM-driven agent.
 *
 * @example
 * ```typescript
 * const agent = new Agent({ config, modelSession, executionSession });
 * await agent.start();
 * for await (const event of agent.stream('compute 2+2')) {
 *   if (event.type === 'approval.request') event.approve(true);
 * }
 * await agent.stop();
 * ```
 */
export class Agent {
  readonly agentId: string;
  readonly sessionId: string;
  readonly config: AgentConfig;

  private readonly modelSession: ModelSessionPort;
  private readonly executionSession: ExecutionSessionPort;
  private readonly toolBackends: ToolBackendPort[];
  private readonly store: SessionStorePort | null;
  private readonly supervisor: ResourceSupervisor;
  private readonly gate: ApprovalGate;
  private readonly executionLock = new Semaphore(1);
  private readonly materializer: ToolResultMaterializer;
  private readonly subagents: SubAgentRunner | null;
  private readonly log: Logger;

  private history: ConversationMessage[] = [];
  private tools: ToolDefinition[] = [];
  private streaming = false;
  private cancelled = false;
  private abortController = new AbortController();

  constructor(options: AgentOptions) {
    this.agentId = options.agentId ?? MAIN_AGENT_ID;
    this.config = options.config;
    this.modelSession = options.modelSession;
    this.executionSession = options.executionSession;
    this.toolBackends = options.toolBackends ?? [];
    this.store = options.sessionStore ?? null;
    this.sessionId = options.sessionId ?? this.store?.sessionId ?? uuidv4();
    this.log = logger.child({ module: 'Agent', agentId: this.agentId, sessionId: this.sessionId });

    this.supervisor = new ResourceSupervisor(
      [this.modelSession, this.executionSession, ...this.toolBackends],
      this.log
    );
    this.gate = new ApprovalGate({
      agentId: this.agentId,
      approvalTimeoutMs: this.config.approvalTimeoutMs,
    });
    this.materializer = new ToolResultMaterializer({
      store: this.store,
      inlineMaxBytes: this.config.toolResultInlineMaxBytes,
      previewLines: this.config.toolResultPreviewLines,
      workingDir: this.config.workingDir,
      logger: this.log,
    });

    if (this.config.enableSubagents) {
      if (!options.createSubagent) {
        throw new ValidationError('Subagents are enabled but no subagent factory was given', {
          agentId: this.agentId,
        });
      }
      this.subagents = new SubAgentRunner({
        sessionId: this.sessionId,
        config: this.config,
        sessionStore: this.store,
        createAgent: options.createSubagent,
        logger: this.log,
      });
    } else {
      this.subagents = null;
    }
  }

  get isRunning(): boolean {
    return this.supervisor.isRunning;
  }

  /** Conversation so far, including replayed history */
  get messages(): readonly ConversationMessage[] {
    return this.history;
  }

  /** Number of approval requests still waiting for a decision */
  get pendingApprovals(): number {
    return this.gate.pendingCount;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Start every resource, collect the tool set and replay the persisted
   * conversation of the root agent
   */
  async start(): Promise<void> {
    if (this.supervisor.isRunning) {
      return;
    }

    this.cancelled = false;
    this.abortController = new AbortController();
    this.subagents?.resume();
    await this.supervisor.start();

    try {
      this.tools = await this.collectTools();
      if (this.agentId === MAIN_AGENT_ID && this.store) {
        this.history = await this.store.load(MAIN_AGENT_ID);
      }
    } catch (error) {
      await this.supervisor.stop().catch((stopError: unknown) => {
        this.log.error('Failed to stop resources after a failed start', stopError);
      });
      throw error;
    }

    this.log.info('Agent started', {
      tools: this.tools.length,
      replayedMessages: this.history.length,
    });
  }

  async stop(): Promise<void> {
    await this.subagents?.cancelAll();
    await this.supervisor.stop();
    this.log.info('Agent stopped');
  }

  /**
   * Abort the agent: reject pending approvals, interrupt the running
   * execution, cancel live subagents and stop all resources
   */
  async cancel(): Promise<void> {
    this.cancelled = true;
    const rejected = this.gate.rejectPending();
    this.abortController.abort();

    const errors: unknown[] = [];
    const attempt = async (step: string, fn: () => Promise<void>) => {
      try {
        await fn();
      } catch (error) {
        this.log.error(`Cancellation step failed: ${step}`, error);
        errors.push(error);
      }
    };

    await attempt('interrupt execution', () => this.executionSession.interrupt());
    await attempt('cancel subagents', async () => {
      await this.subagents?.cancelAll();
    });
    await attempt('stop resources', () => this.supervisor.stop());

    this.log.info('Agent cancelled', { rejectedApprovals: rejected });

    if (errors.length === 1) {
      throw errors[0];
    }
    if (errors.length > 1) {
      throw new AggregateError(errors, `Multiple errors while cancelling agent ${this.agentId}`);
    }
  }

  // ===========================================================================
  // Turn Loop
  // ===========================================================================

  /**
   * Run one exchange starting from `prompt`
   *
   * @yields every event of this agent and of its subagents
   * @throws LLMError when the model session fails
   * @throws PersistenceError when the conversation cannot be persisted
   */
  async *stream(prompt: string, options: StreamOptions = {}): AsyncGenerator<AgentEvent, void, undefined> {
    if (!this.supervisor.isRunning) {
      throw new ValidationError(`Agent ${this.agentId} is not started`);
    }
    if (this.streaming) {
      throw new ConflictError(`Agent ${this.agentId} is already streaming`);
    }
    const { maxTurns } = options;
    if (maxTurns !== undefined && (!Number.isInteger(maxTurns) || maxTurns < 1)) {
      throw new ValidationError('maxTurns must be a positive integer', { maxTurns });
    }

    this.streaming = true;
    const span = tracer.startSpan('agent.stream', {
      attributes: {
        'agent.id': this.agentId,
        'agent.model': this.modelSession.modelId,
        ...(maxTurns !== undefined && { 'agent.max_turns': maxTurns }),
      },
    });
    let rounds = 0;

    try {
      const opening: ConversationMessage[] = [];
      if (this.history.length === 0) {
        opening.push({ role: 'system', content: this.config.systemPrompt });
      }
      opening.push({ role: 'user', content: prompt });
      await this.record(opening);

      while (!this.cancelled) {
        const step = yield* this.modelStep();
        if (step.toolCalls.length === 0) {
          break;
        }

        const { results, stopReason } = yield* this.dispatch(step.toolCalls);
        await this.record([{ role: 'tool', results }]);

        if (stopReason) {
          const origin = this.origin();
          yield responseChunk(origin, stopReason);
          yield response(origin, stopReason);
          break;
        }

        rounds++;
        if (maxTurns !== undefined && rounds >= maxTurns) {
          this.log.info('Turn budget exhausted', { maxTurns });
          break;
        }
      }

      span.setStatus({ code: SpanStatusCode.OK });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
      if (this.cancelled) {
        this.log.warn('Stream ended by cancellation', { error: err.message });
        return;
      }
      throw error;
    } finally {
      span.setAttribute('agent.rounds', rounds);
      span.end();
      this.streaming = false;
    }
  }

  /**
   * Stream one model step and record the assistant message
   */
  private async *modelStep(): AsyncGenerator<AgentEvent, AssistantMessage, undefined> {
    const thoughtsOrigin = this.origin();
    const responseOrigin = this.origin();
    let text = '';
    let reasoning = '';
    const toolCalls: ToolCallProposal[] = [];

    const parts = this.modelSession.stream(this.history, {
      tools: this.tools,
      abortSignal: this.abortController.signal,
    });

    for await (const part of parts) {
      switch (part.type) {
        case 'thoughts-delta':
          reasoning += part.delta;
          yield thoughtsChunk(thoughtsOrigin, part.delta);
          break;
        case 'text-delta':
          text += part.delta;
          yield responseChunk(responseOrigin, part.delta);
          break;
        case 'tool-call':
          toolCalls.push(part.toolCall);
          break;
        case 'finish':
          if (part.finishReason === 'length') {
            this.log.warn('Model step hit the output token limit');
          }
          break;
        default:
          assertNever(part);
      }
    }

    if (reasoning) {
      yield thoughts(thoughtsOrigin, reasoning);
    }
    if (text || toolCalls.length === 0) {
      yield response(responseOrigin, text);
    }

    const message: AssistantMessage = { role: 'assistant', content: text, toolCalls };
    if (reasoning) {
      message.thoughts = reasoning;
    }
    await this.record([message]);
    return message;
  }

  /**
   * Run every proposal of a step concurrently and collect the results in
   * proposal order
   */
  private async *dispatch(calls: ToolCallProposal[]): AsyncGenerator<AgentEvent, DispatchResult, undefined> {
    const outcomes: ActionOutcome[] = [];
    yield* mergeAsyncIterables(calls.map((call, index) => this.collectAction(call, outcomes, index)));

    const stopReason = outcomes.some((outcome) => outcome.status === 'rejected')
      ? REJECTED_RESULT
      : outcomes.some((outcome) => outcome.status === 'timed-out')
        ? APPROVAL_TIMEOUT_RESULT
        : null;

    const results = calls.map((call, index): ToolReturn => {
      const outcome = outcomes[index];
      return {
        toolCallId: call.id,
        toolName: call.name,
        content: stopReason && outcome.status === 'ok' ? DISCARDED_RESULT : outcome.content,
        rejected: outcome.status === 'rejected',
      };
    });

    return { results, stopReason };
  }

  private async *collectAction(
    call: ToolCallProposal,
    outcomes: ActionOutcome[],
    index: number
  ): AsyncGenerator<AgentEvent, void, undefined> {
    outcomes[index] = yield* this.runAction(call);
  }

  private async *runAction(call: ToolCallProposal): AsyncGenerator<AgentEvent, ActionOutcome, undefined> {
    const origin = this.origin();

    switch (call.name) {
      case EXECUTE_CODE_TOOL_NAME:
        return yield* this.runCode(call, origin);
      case RESET_EXECUTION_TOOL_NAME:
        return yield* this.runReset(call, origin);
      case SUBAGENT_TASK_TOOL_NAME:
        if (this.subagents) {
          return yield* this.runSubagent(call, origin, this.subagents);
        }
        break;
    }

    const backend = this.toolBackends.find((candidate) => candidate.hasTool(call.name));
    if (backend) {
      return yield* this.runTool(call, origin, backend);
    }

    const content = `Unknown tool name: ${call.name}`;
    this.log.warn('Model proposed an unknown tool', { toolName: call.name });
    yield toolOutput(origin, content);
    return { content, status: 'ok' };
  }

  // ===========================================================================
  // Actions
  // ===========================================================================

  private async *runCode(
    call: ToolCallProposal,
    origin: EventOrigin
  ): AsyncGenerator<AgentEvent, ActionOutcome, undefined> {
    const args = ExecuteCodeArgsSchema.safeParse(call.args);
    if (!args.success) {
      return yield* this.invalidArguments(call, origin, args.error);
    }

    const decision = yield* this.awaitApproval(call.name, call.args, origin);
    if (decision !== 'approved') {
      return denied(decision);
    }

    // Rejection wins over timeout when several nested requests are denied
    let nested: ApprovalOutcome = 'approved';
    const release = await this.executionLock.acquire();
    if (this.cancelled) {
      release();
      return denied('rejected');
    }
    try {
      const parts = this.executionSession.execute(args.data.code, {
        timeoutMs: this.config.executionTimeoutMs,
      });
      for await (const part of parts) {
        switch (part.type) {
          case 'chunk':
            yield codeOutputChunk(origin, part.text);
            break;
          case 'approval': {
            const { approval } = part;
            const outcome = yield* this.awaitApproval(approval.toolName, approval.toolArgs, origin, true);
            if (outcome === 'approved') {
              approval.accept();
            } else {
              approval.reject();
              nested = nested === 'rejected' ? nested : outcome;
            }
            break;
          }
          case 'result': {
            const output = codeOutput(origin, part.text, part.artifacts);
            yield output;
            if (nested !== 'approved') {
              return denied(nested);
            }
            return { content: await this.materializer.materializeText(formatCodeOutput(output)), status: 'ok' };
          }
          default:
            assertNever(part);
        }
      }
      throw new ExecutionError('Execution ended without a result');
    } catch (error) {
      const message = errorMessage(error);
      this.log.warn('Code execution failed', { corrId: origin.corrId, error: message });
      yield codeOutputChunk(origin, message);
      yield codeOutput(origin, message, []);
      return nested !== 'approved' ? denied(nested) : { content: message, status: 'ok' };
    } finally {
      release();
    }
  }

  private async *runReset(
    call: ToolCallProposal,
    origin: EventOrigin
  ): AsyncGenerator<AgentEvent, ActionOutcome, undefined> {
    const decision = yield* this.awaitApproval(call.name, call.args, origin);
    if (decision !== 'approved') {
      return denied(decision);
    }

    let content: string;
    const release = await this.executionLock.acquire();
    if (this.cancelled) {
      release();
      return denied('rejected');
    }
    try {
      await this.executionSession.reset();
      content = 'Execution session reset successfully.';
    } catch (error) {
      this.log.error('Execution session reset failed', error);
      content = `Execution session reset failed: ${errorMessage(error)}`;
    } finally {
      release();
    }

    yield toolOutput(origin, content);
    return { content, status: 'ok' };
  }

  private async *runSubagent(
    call: ToolCallProposal,
    origin: EventOrigin,
    runner: SubAgentRunner
  ): AsyncGenerator<AgentEvent, ActionOutcome, undefined> {
    const args = SubagentTaskArgsSchema.safeParse(call.args);
    if (!args.success) {
      return yield* this.invalidArguments(call, origin, args.error);
    }

    const decision = yield* this.awaitApproval(call.name, call.args, origin);
    if (decision !== 'approved') {
      return denied(decision);
    }

    const text = yield* runner.run(args.data.prompt, args.data.max_turns ?? DEFAULT_SUBAGENT_MAX_TURNS);
    const content = await this.materializer.materializeText(text);
    yield toolOutput(origin, content);
    return { content, status: 'ok' };
  }

  private async *runTool(
    call: ToolCallProposal,
    origin: EventOrigin,
    backend: ToolBackendPort
  ): AsyncGenerator<AgentEvent, ActionOutcome, undefined> {
    const decision = yield* this.awaitApproval(call.name, call.args, origin);
    if (decision !== 'approved') {
      return denied(decision);
    }

    let content: ToolResultContent;
    try {
      const result = await withSpan(
        tracer,
        `agent.tool ${call.name}`,
        { 'agent.id': this.agentId, 'tool.name': call.name, 'tool.backend': backend.name },
        () => backend.callTool(call.name, call.args)
      );
      content = await this.materializer.materialize(result);
    } catch (error) {
      this.log.warn('Tool call failed', { toolName: call.name, error: errorMessage(error) });
      content = `MCP tool call failed: ${errorMessage(error)}`;
    }

    yield toolOutput(origin, content);
    return { content, status: 'ok' };
  }

  private async *invalidArguments(
    call: ToolCallProposal,
    origin: EventOrigin,
    error: ZodError
  ): AsyncGenerator<AgentEvent, ActionOutcome, undefined> {
    const issues = error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`);
    const content = `Invalid arguments for ${call.name}: ${issues.join('; ')}`;
    yield toolOutput(origin, content);
    return { content, status: 'ok' };
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  /**
   * Emit an approval request and wait for its decision
   */
  private async *awaitApproval(
    toolName: string,
    toolArgs: Record<string, unknown>,
    origin: EventOrigin,
    ptc = false
  ): AsyncGenerator<AgentEvent, ApprovalOutcome, undefined> {
    const request = this.gate.request(toolName, toolArgs, { corrId: origin.corrId, ptc });
    yield request;

    try {
      return (await request.approved()) ? 'approved' : 'rejected';
    } catch (error) {
      if (error instanceof ApprovalTimeoutError) {
        this.log.warn('Approval request timed out', { toolName, requestId: request.id });
        return 'timed-out';
      }
      throw error;
    }
  }

  private async collectTools(): Promise<ToolDefinition[]> {
    const tools = getBuiltinTools({ enableSubagents: this.config.enableSubagents });
    const names = new Set(tools.map((tool) => tool.name));

    for (const backend of this.toolBackends) {
      for (const tool of await backend.listTools()) {
        if (names.has(tool.name)) {
          throw new ValidationError(`Duplicate tool name: ${tool.name}`, { backend: backend.name });
        }
        names.add(tool.name);
        tools.push(tool);
      }
    }

    return tools;
  }

  private async record(messages: ConversationMessage[]): Promise<void> {
    this.history.push(...messages);
    if (this.store) {
      await this.store.append(this.agentId, messages);
    }
  }

  private origin(): EventOrigin {
    return { agentId: this.agentId, corrId: newCorrId() };
  }
}
