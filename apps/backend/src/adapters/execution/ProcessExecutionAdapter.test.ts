import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EventEmitter, once } from 'node:events';
import { PassThrough } from 'node:stream';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ProcessExecutionAdapter, type SpawnProcess } from './ProcessExecutionAdapter.js';
import type { ExecutionPart } from '../../ports/ExecutionSessionPort.js';
import { ExecutionError } from '../../domain/errors/index.js';

class FakeInterpreter extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  private exited = false;

  kill(signal?: NodeJS.Signals): boolean {
    void this.finish(null, signal ?? 'SIGTERM');
    return true;
  }

  async finish(code: number | null, signal: NodeJS.Signals | null = null): Promise<void> {
    if (this.exited) return;
    this.exited = true;
    this.stdout.end();
    this.stderr.end();
    await Promise.all([once(this.stdout, 'end'), once(this.stderr, 'end')]);
    this.emit('close', code, signal);
  }
}

interface SpawnCall {
  command: string;
  args: string[];
}

function scripted(script: (proc: FakeInterpreter) => Promise<void>): { spawnProcess: SpawnProcess; calls: SpawnCall[] } {
  const calls: SpawnCall[] = [];
  const spawnProcess: SpawnProcess = (command, args) => {
    const proc = new FakeInterpreter();
    calls.push({ command, args });
    setImmediate(() => {
      void script(proc);
    });
    return proc;
  };
  return { spawnProcess, calls };
}

async function collect(parts: AsyncIterable<ExecutionPart>): Promise<ExecutionPart[]> {
  const collected: ExecutionPart[] = [];
  for await (const part of parts) {
    collected.push(part);
  }
  return collected;
}

describe('ProcessExecutionAdapter', () => {
  let workingDir: string;

  beforeEach(async () => {
    workingDir = await mkdtemp(path.join(tmpdir(), 'taskweave-exec-'));
  });

  afterEach(async () => {
    await rm(workingDir, { recursive: true, force: true });
  });

  function createAdapter(spawnProcess: SpawnProcess): ProcessExecutionAdapter {
    return new ProcessExecutionAdapter({
      command: 'python3',
      fileExtension: 'py',
      workingDir,
      spawnProcess,
    });
  }

  it('should run the code file and stream its output', async () => {
    const { spawnProcess, calls } = scripted(async (proc) => {
      proc.stdout.write('4\n');
      await proc.finish(0);
    });
    const adapter = createAdapter(spawnProcess);
    await adapter.start();

    const parts = await collect(adapter.execute('print(2 + 2)'));

    expect(parts).toEqual([
      { type: 'chunk', text: '4\n' },
      { type: 'result', text: '4\n', artifacts: [] },
    ]);
    expect(calls[0].command).toBe('python3');
    expect(path.basename(calls[0].args[0])).toBe('cell-1.py');
    await expect(readFile(calls[0].args[0], 'utf8')).resolves.toBe('print(2 + 2)');
  });

  it('should report a null text when nothing was printed', async () => {
    const { spawnProcess } = scripted(async (proc) => {
      await proc.finish(0);
    });
    const adapter = createAdapter(spawnProcess);
    await adapter.start();

    const parts = await collect(adapter.execute('x = 1'));

    expect(parts).toEqual([{ type: 'result', text: null, artifacts: [] }]);
  });

  it('should fail with the output when the process exits non-zero', async () => {
    const { spawnProcess } = scripted(async (proc) => {
      proc.stderr.write('NameError: y\n');
      await proc.finish(1);
    });
    const adapter = createAdapter(spawnProcess);
    await adapter.start();

    const error = await collect(adapter.execute('y')).then(
      () => null,
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(ExecutionError);
    expect(error instanceof Error ? error.message : '').toBe('NameError: y\nProcess exited with code 1');
  });

  it('should relay nested approvals and answer on stdin', async () => {
    const { spawnProcess } = scripted(async (proc) => {
      proc.stdout.write('@@approval {"toolName":"calc_add","toolArgs":{"a":1}}\n');
      const [reply] = await once(proc.stdin, 'data');
      proc.stdout.write(`got ${String(reply)}`);
      await proc.finish(0);
    });
    const adapter = createAdapter(spawnProcess);
    await adapter.start();

    const parts: ExecutionPart[] = [];
    for await (const part of adapter.execute('calc.add(a=1)')) {
      parts.push(part);
      if (part.type === 'approval') {
        expect(part.approval.toolName).toBe('calc_add');
        expect(part.approval.toolArgs).toEqual({ a: 1 });
        part.approval.accept();
      }
    }

    expect(parts.map((p) => p.type)).toEqual(['approval', 'chunk', 'result']);
    expect(parts[1]).toEqual({ type: 'chunk', text: 'got approved\n' });
  });

  it('should not count the approval wait against the timeout', async () => {
    const { spawnProcess } = scripted(async (proc) => {
      proc.stdout.write('@@approval {"toolName":"calc_add","toolArgs":{}}\n');
      const [reply] = await once(proc.stdin, 'data');
      proc.stdout.write(`got ${String(reply)}`);
      await proc.finish(0);
    });
    const adapter = createAdapter(spawnProcess);
    await adapter.start();

    const parts: ExecutionPart[] = [];
    for await (const part of adapter.execute('calc.add()', { timeoutMs: 50 })) {
      parts.push(part);
      if (part.type === 'approval') {
        await new Promise((resolve) => setTimeout(resolve, 150));
        part.approval.accept();
      }
    }

    expect(parts.map((p) => p.type)).toEqual(['approval', 'chunk', 'result']);
    expect(parts[2]).toEqual({ type: 'result', text: 'got approved\n', artifacts: [] });
  });

  it('should keep multi-byte characters split across reads intact', async () => {
    const { spawnProcess } = scripted(async (proc) => {
      proc.stdout.write(Buffer.from([0xe2, 0x82]));
      await new Promise((resolve) => setTimeout(resolve, 20));
      proc.stdout.write(Buffer.from([0xac, 0x0a]));
      await proc.finish(0);
    });
    const adapter = createAdapter(spawnProcess);
    await adapter.start();

    const parts = await collect(adapter.execute('print("\u20ac")'));

    expect(parts).toEqual([
      { type: 'chunk', text: '\u20ac\n' },
      { type: 'result', text: '\u20ac\n', artifacts: [] },
    ]);
  });

  it('should treat a malformed approval line as output', async () => {
    const { spawnProcess } = scripted(async (proc) => {
      proc.stdout.write('@@approval not-json\n');
      await proc.finish(0);
    });
    const adapter = createAdapter(spawnProcess);
    await adapter.start();

    const parts = await collect(adapter.execute('pass'));

    expect(parts[0]).toEqual({ type: 'chunk', text: '@@approval not-json\n' });
  });

  it('should kill the process when the timeout elapses', async () => {
    const { spawnProcess } = scripted(async () => {});
    const adapter = createAdapter(spawnProcess);
    await adapter.start();

    await expect(collect(adapter.execute('while True: pass', { timeoutMs: 50 }))).rejects.toThrow(
      'Execution timed out after 50ms'
    );
  });

  it('should stop the active run on interrupt', async () => {
    const { spawnProcess } = scripted(async (proc) => {
      proc.stdout.write('started\n');
    });
    const adapter = createAdapter(spawnProcess);
    await adapter.start();

    const run = adapter.execute('import time; time.sleep(60)');
    const first = await run.next();
    expect(first.value).toEqual({ type: 'chunk', text: 'started\n' });

    await adapter.interrupt();

    await expect(run.next()).rejects.toThrow('Execution interrupted');
  });

  it('should refuse a second concurrent execution', async () => {
    const { spawnProcess } = scripted(async (proc) => {
      proc.stdout.write('busy\n');
    });
    const adapter = createAdapter(spawnProcess);
    await adapter.start();

    const run = adapter.execute('sleep');
    await run.next();

    await expect(adapter.execute('other').next()).rejects.toThrow('Another execution is still running');

    await adapter.interrupt();
    await expect(run.next()).rejects.toBeInstanceOf(ExecutionError);
  });

  it('should report images written during the run', async () => {
    const artifactsDir = path.join(workingDir, 'images');
    const { spawnProcess } = scripted(async (proc) => {
      await writeFile(path.join(artifactsDir, 'plot.png'), 'png-bytes');
      await writeFile(path.join(artifactsDir, 'notes.txt'), 'not an image');
      await proc.finish(0);
    });
    const adapter = createAdapter(spawnProcess);
    await adapter.start();

    const parts = await collect(adapter.execute('plot()'));

    expect(parts).toEqual([{ type: 'result', text: null, artifacts: [path.join(artifactsDir, 'plot.png')] }]);
  });

  it('should number source files from one again after reset', async () => {
    const { spawnProcess, calls } = scripted(async (proc) => {
      await proc.finish(0);
    });
    const adapter = createAdapter(spawnProcess);
    await adapter.start();

    await collect(adapter.execute('a = 1'));
    await collect(adapter.execute('b = 2'));
    await adapter.reset();
    await collect(adapter.execute('c = 3'));

    expect(calls.map((call) => path.basename(call.args[0]))).toEqual(['cell-1.py', 'cell-2.py', 'cell-1.py']);
  });
});
