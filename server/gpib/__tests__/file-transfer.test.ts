import { describe, it, expect, vi, beforeEach } from 'vitest';
import { transferToFile, writeExact } from '../file-transfer.js';
import { FileIOError, TransportError } from '../errors.js';
import { Ok, Err } from '../../../shared/types.js';
import type { GpibTransport } from '../types.js';
import { createLocalControllerTransport } from '../transports/local-controller.js';
import { createNetworkControllerTransport } from '../transports/network-controller.js';
import {
  createSimulatedController,
  createSimulatedInstrument,
  createSimulatedLibrary,
  type SimulatedBus,
} from './simulated-bus.js';
import { createMemoryFileSystem, type MemoryFileSystem } from './memory-fs.js';

// Every byte value, including LF, ESC and NUL
function patternBytes(length: number): Buffer {
  return Buffer.from(Array.from({ length }, (_, i) => i % 256));
}

describe('file transfer', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  describe('writeExact', () => {
    it('keeps writing through short writes', async () => {
      const fileSystem = createMemoryFileSystem({ maxChunk: 1000 });
      const data = patternBytes(65536);

      expect(await writeExact('/captures/wave.bin', data, fileSystem)).toEqual({ ok: true, value: 65536 });
      expect(fileSystem.files.get('/captures/wave.bin')?.equals(data)).toBe(true);
      expect(fileSystem.writeCalls).toBe(66);
      expect(fileSystem.closed).toEqual(['/captures/wave.bin']);
    });

    it('creates an empty file for an empty payload', async () => {
      const fileSystem = createMemoryFileSystem();

      expect(await writeExact('/captures/empty.bin', Buffer.alloc(0), fileSystem)).toEqual({ ok: true, value: 0 });
      expect(fileSystem.files.get('/captures/empty.bin')?.length).toBe(0);
      expect(fileSystem.writeCalls).toBe(0);
    });

    it('reports a full disk as FileIOError and still closes the file', async () => {
      const fileSystem = createMemoryFileSystem({ capacity: 100 });

      const result = await writeExact('/captures/full.bin', patternBytes(4096), fileSystem);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(FileIOError);
        expect(result.error instanceof FileIOError && result.error.code).toBe('ENOSPC');
        expect(result.error.message).toBe('Failed to write /captures/full.bin: ENOSPC: no space left on device');
      }
      expect(fileSystem.closed).toEqual(['/captures/full.bin']);
    });

    it('reports an open failure with its errno code', async () => {
      const fileSystem = createMemoryFileSystem({ openError: 'EACCES' });

      const result = await writeExact('/captures/locked.bin', patternBytes(4), fileSystem);

      expect(!result.ok && result.error instanceof FileIOError && result.error.code).toBe('EACCES');
      expect(fileSystem.closed).toEqual([]);
    });
  });

  describe('transferToFile', () => {
    it('passes a bus failure through without creating a file', async () => {
      const fileSystem = createMemoryFileSystem();
      const source = {
        readBinary: vi.fn(async () => Err(new TransportError('timeout'))),
      };

      const result = await transferToFile(source, 4, true, '/captures/none.bin', fileSystem);

      expect(!result.ok && result.error instanceof TransportError && result.error.isTimeout).toBe(true);
      expect(fileSystem.files.size).toBe(0);
    });

    it('forwards the binary mode to the read', async () => {
      const source = {
        readBinary: vi.fn(async () => Ok(Buffer.from('abc', 'ascii'))),
      };

      await transferToFile(source, 4, false, '/captures/abc.bin', createMemoryFileSystem());
      expect(source.readBinary).toHaveBeenCalledWith(4, false);
    });
  });

  describe.each(['local', 'network'] as const)('saveFile over the %s controller', kind => {
    let bus: SimulatedBus;
    let fileSystem: MemoryFileSystem;

    function createTransport(): GpibTransport {
      if (kind === 'local') {
        return createLocalControllerTransport(createSimulatedLibrary(bus, { padBinaryTo: 70000 }), {
          fileDirectory: '/captures',
          fileSystem,
        });
      }
      return createNetworkControllerTransport({
        host: '10.0.0.5',
        timeoutMs: 10,
        responseMarginMs: 10,
        fileDirectory: '/captures',
        fileSystem,
        connect: createSimulatedController(bus, { chunkSize: 8192 }).connect,
      });
    }

    beforeEach(() => {
      bus = new Map();
      fileSystem = createMemoryFileSystem();
    });

    it.each([0, 1, 4096, 65536])('writes exactly %i bytes to disk', async size => {
      const payload = patternBytes(size);
      bus.set(2, createSimulatedInstrument({ responses: { ':WAV:DATA?': payload } }));
      const transport = createTransport();

      await transport.write(2, ':WAV:DATA?');
      expect(await transport.saveFile(2, true, 'wave.bin')).toEqual({ ok: true, value: size });

      const written = fileSystem.files.get('/captures/wave.bin');
      expect(written?.length).toBe(size);
      expect(written?.equals(payload)).toBe(true);
    });
  });
});
