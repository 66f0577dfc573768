import { TextDecoder } from 'node:util';
import { MAX_LINE_LENGTH } from '../constants.js';

interface LineBufferState {
  decoder: TextDecoder;
  buffer: string;
  overflow: boolean;
  pendingCarriageReturn: boolean;
}

function createBufferState(): LineBufferState {
  return {
    decoder: new TextDecoder('utf-8', { fatal: true }),
    buffer: '',
    overflow: false,
    pendingCarriageReturn: false,
  };
}

function appendSegment(
  state: LineBufferState,
  segment: string,
  maxLineLength: number
): void {
  if (state.overflow) return;

  const available = maxLineLength - state.buffer.length;
  if (segment.length > available) {
    state.buffer += segment.slice(0, available);
    state.overflow = true;
    return;
  }

  state.buffer += segment;
}

function takeLine(state: LineBufferState): string {
  const line = state.buffer;
  state.buffer = '';
  state.overflow = false;
  return line;
}

function* processChunk(
  text: string,
  state: LineBufferState,
  maxLineLength: number
): Generator<string> {
  if (text.length === 0) return;

  let cursor = 0;
  // A '\r' that ended the previous chunk may be the first half of '\r\n'.
  if (state.pendingCarriageReturn && text.startsWith('\n')) cursor = 1;
  state.pendingCarriageReturn = false;

  const lineBreak = /\r\n|\r|\n/g;
  lineBreak.lastIndex = cursor;
  for (
    let match = lineBreak.exec(text);
    match !== null;
    match = lineBreak.exec(text)
  ) {
    appendSegment(state, text.slice(cursor, match.index), maxLineLength);
    yield takeLine(state);
    cursor = match.index + match[0].length;
    state.pendingCarriageReturn = match[0] === '\r' && cursor === text.length;
  }

  appendSegment(state, text.slice(cursor), maxLineLength);
}

/**
 * Splits a byte stream into lines, accepting `\n`, `\r\n` and `\r` as
 * terminators. Lines longer than `maxLineLength` are cut at that length
 * and the rest of the line is discarded. Decoding is strict UTF-8: an
 * invalid sequence makes the iterator throw a `TypeError`
 * (`ERR_ENCODING_INVALID_ENCODED_DATA`).
 */
export async function* iterateLines(
  chunks: AsyncIterable<Uint8Array>,
  maxLineLength: number = MAX_LINE_LENGTH
): AsyncGenerator<string> {
  const state = createBufferState();

  for await (const chunk of chunks) {
    const text = state.decoder.decode(chunk, { stream: true });
    yield* processChunk(text, state, maxLineLength);
  }

  yield* processChunk(state.decoder.decode(), state, maxLineLength);
  if (state.buffer.length > 0) yield takeLine(state);
}

const INVALID_DATA_MESSAGE = /encoded data was not valid/i;

export function isDecodeError(error: unknown): boolean {
  if (!(error instanceof TypeError)) return false;
  if ('code' in error && error.code === 'ERR_ENCODING_INVALID_ENCODED_DATA') {
    return true;
  }
  return INVALID_DATA_MESSAGE.test(error.message);
}
