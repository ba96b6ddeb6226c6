import type { ExecuteOptions, ExecutionPart, ExecutionSessionPort } from '../ports/ExecutionSessionPort.js';

export type ExecutionScript = (code: string) => AsyncGenerator<ExecutionPart, void, unknown> | ExecutionPart[];

/**
 * Execution session whose runs are produced by a script. By default a run
 * prints its source code back.
 */
export class FakeExecutionSession implements ExecutionSessionPort {
  readonly name = 'execution-session';
  readonly executed: string[] = [];
  readonly timeouts: Array<number | undefined> = [];
  resetCount = 0;
  interruptCount = 0;
  stopCount = 0;
  failReset: Error | null = null;

  constructor(private readonly script: ExecutionScript = echo) {}

  async start(): Promise<void> {}

  async stop(): Promise<void> {
    this.stopCount++;
  }

  async *execute(code: string, options: ExecuteOptions = {}): AsyncGenerator<ExecutionPart, void, unknown> {
    this.executed.push(code);
    this.timeouts.push(options.timeoutMs);
    const run = this.script(code);
    if (Array.isArray(run)) {
      for (const part of run) {
        yield part;
      }
    } else {
      yield* run;
    }
  }

  async reset(): Promise<void> {
    if (this.failReset) {
      throw this.failReset;
    }
    this.resetCount++;
  }

  async interrupt(): Promise<void> {
    this.interruptCount++;
  }
}

function echo(code: string): ExecutionPart[] {
  return [
    { type: 'chunk', text: code },
    { type: 'result', text: code, artifacts: [] },
  ];
}
