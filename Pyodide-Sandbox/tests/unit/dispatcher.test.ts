/**
 * Dispatcher end to end over in-memory streams: request lines in, result
 * lines out, backed by the fake interpreter.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PassThrough, Readable } from 'node:stream';
import { Dispatcher } from '../../src/protocol/dispatcher.js';
import { ResponseEmitter } from '../../src/protocol/emitter.js';
import { Executor } from '../../src/executor/executor.js';
import { RuntimeManager } from '../../src/runtime/manager.js';
import { RuntimeInitializationError } from '../../src/errors.js';
import { createStandardInterpreter, type FakeInterpreter } from '../helpers/fake-interpreter.js';
import { collectingLogger } from '../helpers/logger.js';
import type { GuestInterpreter } from '../../src/runtime/types.js';
import type { ExecutionResult } from '../../src/executor/types.js';

const OPTIONS = { defaultTimeoutSeconds: 30, maxTimeoutSeconds: 300, interruptGraceMs: 500 };

let lines: string[];
let interpreter: FakeInterpreter;

beforeEach(() => {
  lines = [];
  interpreter = createStandardInterpreter();
});

function build(loader: () => Promise<GuestInterpreter> = async () => interpreter) {
  const logger = collectingLogger(lines);
  const runtime = new RuntimeManager(loader, logger);
  const executor = new Executor(runtime, OPTIONS, { logger });
  const output = new PassThrough();
  const chunks: string[] = [];
  output.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));
  const dispatcher = new Dispatcher(executor, runtime, new ResponseEmitter(output), logger);
  return { dispatcher, executor, output, text: () => chunks.join('') };
}

async function serve(input: string) {
  const harness = build();
  await harness.dispatcher.run(Readable.from([input]));
  await new Promise<void>((resolve) => setImmediate(resolve));
  return harness;
}

function responses(text: string): unknown[] {
  return text
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line): unknown => JSON.parse(line));
}

describe('Dispatcher', () => {
  it('answers a bare code line', async () => {
    const { text } = await serve('{"code":"print(1+1)"}\n');

    expect(text()).toBe('{"success":true,"output":"2\\n","error":null,"logs":[]}\n');
  });

  it('writes a file and reads it back', async () => {
    const { text } = await serve(
      '{"type":"writeFile","path":"/tmp/a.txt","content":"hi"}\n' +
        '{"type":"readFile","path":"/tmp/a.txt"}\n',
    );

    expect(text()).toBe(
      '{"success":true,"output":"File written to /tmp/a.txt","error":null,"logs":[]}\n' +
        '{"success":true,"output":"hi","error":null,"logs":[]}\n',
    );
    expect(interpreter.fs.files.get('/tmp/a.txt')).toBe('hi');
  });

  it('makes written files visible to later executions', async () => {
    const { text } = await serve(
      '{"type":"writeFile","path":"/data/in.txt","content":"hello"}\n' +
        '{"code":"cat /data/in.txt"}\n',
    );

    expect(responses(text())[1]).toEqual({ success: true, output: 'hello\n', error: null, logs: [] });
  });

  it('answers a malformed line and keeps serving', async () => {
    const { text, dispatcher } = await serve(`{oops\n${JSON.stringify({ code: 'print("x")' })}\n`);

    const [first, second] = responses(text());
    expect(first).toMatchObject({ success: false, output: '', logs: [] });
    expect(first).toHaveProperty('error', expect.stringMatching(/^Failed to parse request: /));
    expect(second).toEqual({ success: true, output: 'x\n', error: null, logs: [] });
    expect(dispatcher.handledCount).toBe(2);
  });

  it('rejects execute requests without code', async () => {
    const { text } = await serve('{"type":"execute"}\n');

    expect(text()).toBe('{"success":false,"output":"","error":"No code provided for execution","logs":[]}\n');
  });

  it('skips blank lines and accepts CRLF endings', async () => {
    const { text, dispatcher } = await serve('\n   \n{"code":"print(1+1)"}\r\n');

    expect(responses(text())).toEqual([{ success: true, output: '2\n', error: null, logs: [] }]);
    expect(dispatcher.handledCount).toBe(1);
  });

  it('reports file request failures as error results', async () => {
    interpreter.fs.readOnly.add('/tmp/locked.txt');

    const { text } = await serve(
      '{"type":"writeFile","path":"/tmp/locked.txt","content":"x"}\n' +
        '{"type":"readFile","path":"/tmp/none.txt"}\n',
    );

    expect(responses(text())).toEqual([
      {
        success: false,
        output: '',
        error: 'Failed to write file /tmp/locked.txt: Permission denied',
        logs: [],
      },
      {
        success: false,
        output: '',
        error: 'Failed to read file /tmp/none.txt: No such file or directory',
        logs: [],
      },
    ]);
  });

  it('converts unexpected failures into a processing error', async () => {
    const harness = build();
    vi.spyOn(harness.executor, 'execute').mockRejectedValue(new Error('kaput'));

    await harness.dispatcher.run(Readable.from(['{"code":"print(1+1)"}\n']));
    await new Promise<void>((resolve) => setImmediate(resolve));

    expect(harness.text()).toBe(
      '{"success":false,"output":"","error":"Failed to process request: kaput","logs":[]}\n',
    );
    expect(lines.some((line) => line.includes('[ERROR] [test:dispatcher] Failed to process execute request'))).toBe(true);
  });

  it('logs when stdin closes', async () => {
    await serve('');

    expect(lines.some((line) => line.endsWith('[INFO] [test:dispatcher] Stdin closed, exiting...'))).toBe(true);
  });

  it('emits an error result and stops when the interpreter cannot be built', async () => {
    const harness = build(async () => {
      throw new Error('no wasm');
    });

    await expect(
      harness.dispatcher.run(Readable.from(['{"code":"print(1+1)"}\n{"code":"print(1+1)"}\n'])),
    ).rejects.toBeInstanceOf(RuntimeInitializationError);
    await new Promise<void>((resolve) => setImmediate(resolve));

    expect(harness.text()).toBe(
      '{"success":false,"output":"","error":"Failed to initialize interpreter: no wasm","logs":[]}\n',
    );
  });

  it('keeps serving after a write failure that leaves the channel usable', async () => {
    class FlakyEmitter extends ResponseEmitter {
      private failures = 1;

      override async emit(result: ExecutionResult): Promise<void> {
        if (this.failures > 0) {
          this.failures--;
          throw Object.assign(new Error('write EIO'), { code: 'EIO' });
        }
        return super.emit(result);
      }
    }

    const logger = collectingLogger(lines);
    const runtime = new RuntimeManager(async () => interpreter, logger);
    const output = new PassThrough();
    const chunks: string[] = [];
    output.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));
    const dispatcher = new Dispatcher(
      new Executor(runtime, OPTIONS, { logger }),
      runtime,
      new FlakyEmitter(output),
      logger,
    );

    await dispatcher.run(Readable.from([`{"code":"print(1+1)"}\n${JSON.stringify({ code: 'print("x")' })}\n`]));
    await new Promise<void>((resolve) => setImmediate(resolve));

    expect(chunks.join('')).toBe('{"success":true,"output":"x\\n","error":null,"logs":[]}\n');
    expect(dispatcher.handledCount).toBe(2);
    expect(lines.some((line) => line.includes('[ERROR] [test:dispatcher] Failed to write result'))).toBe(true);
  });

  it('stops quietly when the output channel is gone', async () => {
    const harness = build();
    harness.output.destroy();

    await expect(
      harness.dispatcher.run(Readable.from(['{"code":"print(1+1)"}\n{"code":"print(1+1)"}\n'])),
    ).resolves.toBeUndefined();

    expect(interpreter.executed).toEqual(['print(1+1)']);
    expect(lines.some((line) => line.includes('[ERROR] [test:dispatcher] Control channel lost, stopping'))).toBe(true);
  });
});
