/**
 * Command framing
 *
 * Pure encode/decode helpers for both controller kinds. Nothing here touches
 * a socket or the vendor library, so every function is testable on its own.
 *
 * Network controller wire rules (Prologix-style):
 * - a message ends at the first unescaped LF
 * - CR, LF, ESC and '+' inside data must be preceded by ESC
 * - lines starting with "++" are addressed to the controller itself
 */

import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';

export const LF = 0x0a;
export const CR = 0x0d;
export const ESC = 0x1b;
export const PLUS = 0x2b;
const HASH = 0x23;

const ESCAPED_BYTES = new Set([CR, LF, ESC, PLUS]);

export type FramingTarget = 'local' | 'network';

export type FrameDecode =
  | { status: 'complete'; frame: Buffer; rest: Buffer }
  | { status: 'pending' }
  | { status: 'malformed'; reason: string };

export type FrameDecoder = (buffer: Buffer) => FrameDecode;

/** Escape control bytes so the controller forwards them as data */
export function escapeBinary(data: Uint8Array): Buffer {
  let extra = 0;
  for (const byte of data) {
    if (ESCAPED_BYTES.has(byte)) extra++;
  }
  if (extra === 0) return Buffer.from(data);

  const out = Buffer.alloc(data.length + extra);
  let j = 0;
  for (const byte of data) {
    if (ESCAPED_BYTES.has(byte)) out[j++] = ESC;
    out[j++] = byte;
  }
  return out;
}

export function unescapeBinary(data: Uint8Array): Buffer {
  const out = Buffer.alloc(data.length);
  let j = 0;
  for (let i = 0; i < data.length; i++) {
    if (data[i] === ESC && i + 1 < data.length) i++;
    out[j++] = data[i];
  }
  return out.subarray(0, j);
}

/**
 * Encode an instrument command for the given controller kind.
 * The vendor library terminates commands itself; the network controller
 * needs escaping and a trailing LF. A leading "++" is escaped as well, so
 * callers can never reach the controller itself; only encodeDirective() can.
 */
export function encodeCommand(
  command: string,
  target: FramingTarget,
  encoding: BufferEncoding = 'ascii'
): Buffer {
  const bytes = Buffer.from(command, encoding);
  if (target === 'local') return bytes;
  return Buffer.concat([escapeBinary(bytes), Buffer.of(LF)]);
}

/** Frame raw bytes for writeBinary on the network controller */
export function encodeBinaryPayload(data: Uint8Array): Buffer {
  return Buffer.concat([escapeBinary(data), Buffer.of(LF)]);
}

/** Controller directive, e.g. encodeDirective('addr', 5) -> "++addr 5\n" */
export function encodeDirective(name: string, ...args: Array<string | number>): Buffer {
  return Buffer.from(`++${[name, ...args].join(' ')}\n`, 'ascii');
}

/** Split one LF-terminated line off the front of the buffer */
export function decodeLine(buffer: Buffer): FrameDecode {
  const lf = buffer.indexOf(LF);
  if (lf === -1) return { status: 'pending' };

  const end = lf > 0 && buffer[lf - 1] === CR ? lf - 1 : lf;
  return {
    status: 'complete',
    frame: Buffer.from(buffer.subarray(0, end)),
    rest: buffer.subarray(lf + 1),
  };
}

/**
 * Split one IEEE 488.2 definite-length block (#<n><length><data>) off the
 * front of the buffer. The payload length always comes from the header, so
 * embedded LF or NUL bytes never end the frame early. A terminator that
 * already follows the block is consumed.
 */
export function decodeBlock(buffer: Buffer): FrameDecode {
  if (buffer.length === 0) return { status: 'pending' };
  if (buffer[0] !== HASH) {
    return { status: 'malformed', reason: `expected '#' block header, got 0x${buffer[0].toString(16).padStart(2, '0')}` };
  }
  if (buffer.length < 2) return { status: 'pending' };

  const digitChar = String.fromCharCode(buffer[1]);
  if (digitChar === '0') {
    return { status: 'malformed', reason: 'indefinite-length blocks are not supported' };
  }
  const numDigits = parseInt(digitChar, 10);
  if (isNaN(numDigits)) {
    return { status: 'malformed', reason: `invalid digit count: "${digitChar}"` };
  }
  if (buffer.length < 2 + numDigits) return { status: 'pending' };

  const lengthStr = buffer.subarray(2, 2 + numDigits).toString('ascii');
  if (!/^\d+$/.test(lengthStr)) {
    return { status: 'malformed', reason: `invalid length field: "${lengthStr}"` };
  }

  const dataStart = 2 + numDigits;
  const dataEnd = dataStart + parseInt(lengthStr, 10);
  if (buffer.length < dataEnd) return { status: 'pending' };

  return {
    status: 'complete',
    frame: Buffer.from(buffer.subarray(dataStart, dataEnd)),
    rest: consumeTerminator(buffer.subarray(dataEnd)),
  };
}

/** Wrap data in a definite-length block header */
export function encodeBlock(data: Uint8Array): Buffer {
  const length = String(data.length);
  return Buffer.concat([Buffer.from(`#${length.length}${length}`, 'ascii'), data]);
}

function consumeTerminator(rest: Buffer): Buffer {
  if (rest[0] === LF) return rest.subarray(1);
  if (rest[0] === CR && rest[1] === LF) return rest.subarray(2);
  return rest;
}

/**
 * Take exactly `length` bytes from a buffer the vendor library may have
 * over-allocated or NUL-padded.
 */
export function sliceBinary(data: Uint8Array, length: number): Result<Buffer, string> {
  if (!Number.isInteger(length) || length < 0) {
    return Err(`invalid binary length ${length}`);
  }
  if (length > data.length) {
    return Err(`binary length ${length} exceeds the ${data.length}-byte buffer`);
  }
  return Ok(Buffer.from(data.subarray(0, length)));
}
