// =============================================================================
// Process Execution Adapter
// =============================================================================
// Runs each code action as a child process of a configured interpreter
// (`python3 <file>` by default) inside the agent's working directory.
//
// Running code may ask for approval by printing a single line
//   @@approval {"toolName": "...", "toolArgs": {...}}
// to stdout and then reading one line from stdin: "approved" or "rejected".

import { spawn } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';
import { mkdir, readdir, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type {
  ExecuteOptions,
  ExecutionPart,
  ExecutionSessionPort,
} from '../../ports/ExecutionSessionPort.js';
import { ExecutionError } from '../../domain/errors/index.js';
import { AsyncQueue } from '../../application/services/concurrency.js';
import { logger, type Logger } from '../../infrastructure/logging/logger.js';

export const APPROVAL_MARKER = '@@approval ';

const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.gif', '.svg', '.webp']);

const ApprovalLineSchema = z.object({
  toolName: z.string().min(1),
  toolArgs: z.record(z.string(), z.unknown()).default({}),
});

/**
 * The part of a child process the adapter relies on
 */
export interface InterpreterProcess {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnProcess = (
  command: string,
  args: string[],
  options: { cwd: string; env: NodeJS.ProcessEnv }
) => InterpreterProcess;

export interface ProcessExecutionAdapterOptions {
  /** Interpreter executable, e.g. "python3" or "node" */
  command: string;
  /** Arguments placed before the source file */
  args?: string[];
  /** Extension of the source file handed to the interpreter */
  fileExtension: string;
  workingDir: string;
  /** Scratch directory name under `.taskweave/exec`, one per agent */
  sessionName?: string;
  /** Images written here during a run are reported as artifacts */
  artifactsDir?: string;
  /** Extra environment for the interpreter */
  env?: Record<string, string>;
  spawnProcess?: SpawnProcess;
}

const defaultSpawn: SpawnProcess = (command, args, options) =>
  spawn(command, args, { ...options, stdio: 'pipe', shell: false });

/**
 * Execution session backed by short-lived interpreter processes.
 *
 * State that must survive between actions lives in the working directory;
 * `reset` clears the session's scratch files.
 */
export class ProcessExecutionAdapter implements ExecutionSessionPort {
  readonly name = 'execution-session';
  private readonly scratchDir: string;
  private readonly artifactsDir: string;
  private readonly spawnProcess: SpawnProcess;
  private readonly log: Logger;
  private active: { child: InterpreterProcess; interrupted: boolean } | null = null;
  private cellCount = 0;

  constructor(private readonly options: ProcessExecutionAdapterOptions) {
    this.scratchDir = path.join(options.workingDir, '.taskweave', 'exec', options.sessionName ?? 'main');
    this.artifactsDir = options.artifactsDir ?? path.join(options.workingDir, 'images');
    this.spawnProcess = options.spawnProcess ?? defaultSpawn;
    this.log = logger.child({ module: 'ProcessExecutionAdapter' });
  }

  async start(): Promise<void> {
    await mkdir(this.scratchDir, { recursive: true });
    await mkdir(this.artifactsDir, { recursive: true });
  }

  async stop(): Promise<void> {
    await this.interrupt();
    await rm(this.scratchDir, { recursive: true, force: true });
  }

  async reset(): Promise<void> {
    await this.interrupt();
    await rm(this.scratchDir, { recursive: true, force: true });
    await mkdir(this.scratchDir, { recursive: true });
    this.cellCount = 0;
  }

  async interrupt(): Promise<void> {
    if (this.active) {
      this.active.interrupted = true;
      this.active.child.kill('SIGKILL');
    }
  }

  async *execute(code: string, options: ExecuteOptions = {}): AsyncGenerator<ExecutionPart, void, unknown> {
    if (this.active) {
      throw new ExecutionError('Another execution is still running');
    }

    const file = path.join(this.scratchDir, `cell-${++this.cellCount}.${this.options.fileExtension}`);
    await writeFile(file, code, 'utf8');
    const before = await this.snapshotArtifacts();

    const child = this.spawnProcess(this.options.command, [...(this.options.args ?? []), file], {
      cwd: this.options.workingDir,
      env: { ...process.env, ...this.options.env, TASKWEAVE_ARTIFACTS_DIR: this.artifactsDir },
    });
    const { stdout, stderr, stdin } = child;
    if (!stdout || !stderr || !stdin) {
      child.kill('SIGKILL');
      throw new ExecutionError('Interpreter process has no stdio pipes');
    }

    const run = { child, interrupted: false };
    this.active = run;

    const queue = new AsyncQueue<ExecutionPart>();
    let output = '';
    let partialLine = '';
    let timedOut = false;
    let closed = false;

    // The timeout bounds active execution only; it is paused while a nested
    // approval waits for a decision
    let remainingMs = options.timeoutMs;
    let timerStartedAt = 0;
    let timer: NodeJS.Timeout | null = null;
    let awaitingApproval = 0;

    const armTimer = () => {
      if (remainingMs === undefined || timer || closed) return;
      timerStartedAt = Date.now();
      timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, remainingMs);
    };

    const pauseTimer = () => {
      if (!timer || remainingMs === undefined) return;
      clearTimeout(timer);
      timer = null;
      remainingMs = Math.max(0, remainingMs - (Date.now() - timerStartedAt));
    };

    const stopTimer = () => {
      if (timer) clearTimeout(timer);
      timer = null;
    };

    const emitText = (text: string) => {
      output += text;
      queue.push({ type: 'chunk', text });
    };

    const handleLine = (line: string) => {
      if (line.startsWith(APPROVAL_MARKER)) {
        const request = parseApprovalLine(line.slice(APPROVAL_MARKER.length));
        if (request) {
          let answered = false;
          const reply = (decision: 'approved' | 'rejected') => {
            if (answered) return;
            answered = true;
            awaitingApproval--;
            if (awaitingApproval === 0) {
              armTimer();
            }
            stdin.write(`${decision}\n`);
          };
          awaitingApproval++;
          pauseTimer();
          queue.push({
            type: 'approval',
            approval: {
              toolName: request.toolName,
              toolArgs: request.toolArgs,
              accept: () => reply('approved'),
              reject: () => reply('rejected'),
            },
          });
          return;
        }
      }
      emitText(`${line}\n`);
    };

    armTimer();

    // Decode through a StringDecoder so characters split across reads stay intact
    stdout.setEncoding('utf8');
    stderr.setEncoding('utf8');

    stdout.on('data', (data: Buffer | string) => {
      partialLine += String(data);
      let newline = partialLine.indexOf('\n');
      while (newline !== -1) {
        handleLine(partialLine.slice(0, newline));
        partialLine = partialLine.slice(newline + 1);
        newline = partialLine.indexOf('\n');
      }
    });

    stderr.on('data', (data: Buffer | string) => {
      const text = String(data);
      if (text !== '') {
        emitText(text);
      }
    });

    // EPIPE when the process exits before reading an approval reply
    stdin.on('error', (error) => {
      this.log.debug('Interpreter stdin closed', { error: error.message });
    });

    child.on('error', (error) => {
      stopTimer();
      queue.fail(new ExecutionError(`Failed to start ${this.options.command}: ${error.message}`));
    });

    child.on('close', (exitCode, signal) => {
      closed = true;
      stopTimer();
      if (partialLine) {
        emitText(partialLine);
        partialLine = '';
      }

      if (timedOut) {
        queue.fail(new ExecutionError(`Execution timed out after ${options.timeoutMs}ms`));
      } else if (run.interrupted) {
        queue.fail(new ExecutionError('Execution interrupted'));
      } else if (exitCode !== 0) {
        const status = exitCode === null ? `signal ${signal ?? 'unknown'}` : `code ${exitCode}`;
        queue.fail(new ExecutionError(`${output}Process exited with ${status}`, { exitCode }));
      } else {
        void this.collectArtifacts(before).then(
          (artifacts) => {
            queue.push({ type: 'result', text: output === '' ? null : output, artifacts });
            queue.close();
          },
          (error: unknown) => queue.fail(error)
        );
      }
    });

    try {
      for await (const part of queue) {
        yield part;
      }
    } finally {
      if (!closed) {
        child.kill('SIGKILL');
      }
      if (this.active === run) {
        this.active = null;
      }
    }
  }

  // =========================================================================
  // Artifacts
  // =========================================================================

  private async snapshotArtifacts(): Promise<Map<string, number>> {
    const snapshot = new Map<string, number>();
    const entries = await readdir(this.artifactsDir).catch((error: unknown) => {
      this.log.warn('Artifacts directory is not readable', {
        dir: this.artifactsDir,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    });
    for (const entry of entries) {
      if (!IMAGE_EXTENSIONS.has(path.extname(entry).toLowerCase())) continue;
      const info = await stat(path.join(this.artifactsDir, entry));
      if (info.isFile()) {
        snapshot.set(entry, info.mtimeMs);
      }
    }
    return snapshot;
  }

  private async collectArtifacts(before: Map<string, number>): Promise<string[]> {
    const after = await this.snapshotArtifacts();
    return [...after.entries()]
      .filter(([entry, mtime]) => before.get(entry) !== mtime)
      .map(([entry]) => path.join(this.artifactsDir, entry))
      .sort();
  }
}

function parseApprovalLine(json: string): z.infer<typeof ApprovalLineSchema> | null {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch {
    return null;
  }
  const result = ApprovalLineSchema.safeParse(value);
  return result.success ? result.data : null;
}
