import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { MAX_LINE_LENGTH } from '../../../lib/constants.js';
import {
  isDecodeError,
  iterateLines,
} from '../../../lib/grep/line-iterator.js';

async function* chunksOf(
  ...parts: Array<string | number[]>
): AsyncGenerator<Uint8Array> {
  for (const part of parts) {
    yield typeof part === 'string'
      ? Buffer.from(part, 'utf-8')
      : Uint8Array.from(part);
  }
}

async function collect(
  chunks: AsyncIterable<Uint8Array>,
  maxLineLength?: number
): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of iterateLines(chunks, maxLineLength)) {
    lines.push(line);
  }
  return lines;
}

void describe('iterateLines', () => {
  void it('accepts \\n, \\r\\n and \\r terminators', async () => {
    assert.deepEqual(await collect(chunksOf('a\nb\r\nc\rd')), [
      'a',
      'b',
      'c',
      'd',
    ]);
  });

  void it('does not emit an empty line after a final terminator', async () => {
    assert.deepEqual(await collect(chunksOf('a\nb\n')), ['a', 'b']);
    assert.deepEqual(await collect(chunksOf('a\r')), ['a']);
  });

  void it('keeps empty lines in the middle', async () => {
    assert.deepEqual(await collect(chunksOf('a\n\nb')), ['a', '', 'b']);
  });

  void it('joins \\r\\n split across chunks', async () => {
    assert.deepEqual(await collect(chunksOf('x\r', '\ny')), ['x', 'y']);
  });

  void it('joins lines and characters split across chunks', async () => {
    assert.deepEqual(
      await collect(chunksOf('caf', [0xc3], [0xa9, 0x0a], 'end')),
      ['café', 'end']
    );
  });

  void it('cuts lines longer than the limit', async () => {
    assert.deepEqual(
      await collect(chunksOf('abc', 'defgh', 'ij\nnext'), 5),
      ['abcde', 'next']
    );
  });

  void it('keeps a line of exactly the limit and cuts the final line', async () => {
    assert.deepEqual(
      await collect(chunksOf('12345\r', '\n1234567'), 5),
      ['12345', '12345']
    );
  });

  void it('uses the configured limit by default', async () => {
    const long = 'x'.repeat(MAX_LINE_LENGTH + 10);
    const lines = await collect(chunksOf(long, '\nok'));
    assert.deepEqual(
      lines.map((line) => line.length),
      [MAX_LINE_LENGTH, 2]
    );
  });

  void it('yields nothing for empty input', async () => {
    assert.deepEqual(await collect(chunksOf()), []);
    assert.deepEqual(await collect(chunksOf('')), []);
  });

  void it('throws a decode error on invalid UTF-8', async () => {
    await assert.rejects(collect(chunksOf('ok\n', [0xff, 0x0a])), (error) =>
      isDecodeError(error)
    );
  });

  void it('throws a decode error on a truncated sequence', async () => {
    await assert.rejects(collect(chunksOf('ok\n', [0xe2, 0x82])), (error) =>
      isDecodeError(error)
    );
  });
});

void describe('isDecodeError', () => {
  void it('ignores other errors', () => {
    assert.equal(isDecodeError(new TypeError('x is not a function')), false);
    assert.equal(isDecodeError(new Error('encoded data was not valid')), false);
  });
});
