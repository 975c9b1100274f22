/**
 * Vendor library binding for the LQ Electronics UG01 USB-GPIB controller
 * (LQUG01_c.dll, cdecl). Windows only; the transport itself only sees the
 * LocalControllerLibrary interface, so tests never load this.
 */

import koffi from 'koffi';
import type { LocalControllerLibrary } from '../types.js';
import { MAX_BUS_ADDRESS } from '../address.js';

// Gfind() returns a pointer to an int array; the first entry outside 1-30 ends it
const FIND_MAX_ENTRIES = MAX_BUS_ADDRESS + 1;

// Longest NUL-terminated reply Gread()/Gquery() is expected to hand back
const TEXT_MAX_BYTES = 65536;

export function loadLocalControllerLibrary(libraryPath: string): LocalControllerLibrary {
  console.log(`[LocalController] Loading vendor library from ${libraryPath}`);
  const lib = koffi.load(libraryPath);

  // Text goes in and out as bytes so koffi never applies its own UTF-8 conversion
  const Gwrite = lib.func('int Gwrite(int address, const uint8_t *scpi)');
  const Gbwrite = lib.func('int Gbwrite(int address, bool bmode, const uint8_t *bdata, int writelength)');
  const Gread = lib.func('void *Gread(int address)');
  const Gbread = lib.func('void *Gbread(int address)');
  const Gbreadlength = lib.func('int Gbreadlength()');
  const Gquery = lib.func('void *Gquery(int address, const uint8_t *scpi)');
  const Gfind = lib.func('void *Gfind()');
  const Gfilesave = lib.func('int Gfilesave(int address, bool mode, const char *filename)');

  function asInt(value: unknown, fn: string): number {
    if (typeof value !== 'number') throw new TypeError(`${fn} returned ${typeof value}, expected int`);
    return value;
  }

  function cString(command: Uint8Array): Buffer {
    return Buffer.concat([command, Buffer.of(0)]);
  }

  // Copy a NUL-terminated reply out of library memory, byte by byte
  function decodeText(pointer: unknown, fn: string): Uint8Array | null {
    if (pointer === null) return null;
    const bytes: number[] = [];
    for (let offset = 0; offset < TEXT_MAX_BYTES; offset++) {
      const byte: unknown = koffi.decode(pointer, offset, 'uint8_t');
      if (typeof byte !== 'number') throw new TypeError(`${fn} reply could not be decoded`);
      if (byte === 0) return Uint8Array.from(bytes);
      bytes.push(byte);
    }
    throw new TypeError(`${fn} reply is not terminated within ${TEXT_MAX_BYTES} bytes`);
  }

  function decodeBytes(pointer: unknown, length: number): Uint8Array {
    if (length <= 0) return new Uint8Array(0);
    const decoded: unknown = koffi.decode(pointer, koffi.array('uint8_t', length, 'Typed'));
    if (decoded instanceof Uint8Array) return decoded;
    throw new TypeError('Gbread buffer could not be decoded');
  }

  function decodeInts(pointer: unknown, count: number): number[] {
    const decoded: unknown = koffi.decode(pointer, koffi.array('int', count, 'Array'));
    if (!Array.isArray(decoded)) throw new TypeError('Gfind result could not be decoded');
    return decoded.filter((v): v is number => typeof v === 'number');
  }

  return {
    write: (address, command) => asInt(Gwrite(address, cString(command)), 'Gwrite'),

    writeBinary: (address, mode, data, length) =>
      asInt(Gbwrite(address, mode, Buffer.from(data.buffer, data.byteOffset, data.byteLength), length), 'Gbwrite'),

    readText: address => decodeText(Gread(address), 'Gread'),

    readBinary(address) {
      const pointer: unknown = Gbread(address);
      if (pointer === null) return null;
      // The pointer carries no size; decode up to the length the library just recorded.
      // The transport still slices by its own readBinaryLength() call.
      return decodeBytes(pointer, asInt(Gbreadlength(), 'Gbreadlength'));
    },

    readBinaryLength: () => asInt(Gbreadlength(), 'Gbreadlength'),

    query: (address, command) => decodeText(Gquery(address, cString(command)), 'Gquery'),

    discover() {
      const pointer: unknown = Gfind();
      if (pointer === null) return [];
      const entries = decodeInts(pointer, FIND_MAX_ENTRIES);
      const end = entries.findIndex(v => v < 1 || v > MAX_BUS_ADDRESS);
      return end === -1 ? entries : entries.slice(0, end);
    },

    saveFile: (address, mode, filename) => asInt(Gfilesave(address, mode, filename), 'Gfilesave'),
  };
}
