import { describe, it, expect } from 'vitest';
import { PassThrough, Writable } from 'node:stream';
import { ResponseEmitter, serializeResult } from '../../src/protocol/emitter.js';
import { FatalTransportError } from '../../src/errors.js';
import { errorResult, successResult } from '../../src/executor/types.js';

function failingStream(error: Error): Writable {
  const stream = new Writable({
    write(_chunk, _encoding, callback) {
      callback(error);
    },
  });
  // The stream also emits the error; the emitter reports it through the callback.
  stream.on('error', () => undefined);
  return stream;
}

function errnoError(code: string): Error {
  return Object.assign(new Error(`write ${code}`), { code });
}

describe('serializeResult', () => {
  it('writes one compact line in a fixed field order', () => {
    expect(serializeResult(successResult('2\n'))).toBe(
      '{"success":true,"output":"2\\n","error":null,"logs":[]}\n',
    );
    expect(serializeResult(errorResult('boom', 'partial', ['Wrote file: /a']))).toBe(
      '{"success":false,"output":"partial","error":"boom","logs":["Wrote file: /a"]}\n',
    );
  });
});

describe('ResponseEmitter', () => {
  it('writes each result on its own line', async () => {
    const output = new PassThrough();
    const chunks: string[] = [];
    output.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));
    const emitter = new ResponseEmitter(output);

    await emitter.emit(successResult('first'));
    await emitter.emit(errorResult('second'));

    expect(chunks.join('')).toBe(
      '{"success":true,"output":"first","error":null,"logs":[]}\n' +
        '{"success":false,"output":"","error":"second","logs":[]}\n',
    );
  });

  it('rejects with FatalTransportError once the stream has ended', async () => {
    const output = new PassThrough();
    output.end();
    const emitter = new ResponseEmitter(output);

    await expect(emitter.emit(successResult('late'))).rejects.toThrow(
      new FatalTransportError('Output stream is closed'),
    );
  });

  it('rejects with FatalTransportError on a broken pipe', async () => {
    const emitter = new ResponseEmitter(failingStream(errnoError('EPIPE')));

    const attempt = emitter.emit(successResult('x'));

    await expect(attempt).rejects.toBeInstanceOf(FatalTransportError);
    await expect(attempt).rejects.toThrow('Output stream failed: write EPIPE');
  });

  it('passes other write errors through unchanged', async () => {
    const error = errnoError('EIO');
    const emitter = new ResponseEmitter(failingStream(error));

    await expect(emitter.emit(successResult('x'))).rejects.toBe(error);
  });
});
