/**
 * Local Controller Transport
 * Drives a USB-GPIB controller through its vendor library.
 *
 * The library is one process-wide, stateful call surface: the length of a
 * binary read lives in a global that only the next readBinaryLength() call
 * reports. Every call therefore goes through one command lock, and the
 * readBinary/readBinaryLength pair runs inside a single acquisition.
 *
 * The library has no cancel primitive and no retries are attempted here;
 * a blind retry can desynchronize the controller.
 */

import path from 'path';
import type {
  BinaryMode,
  BusAddress,
  GpibResult,
  GpibTransport,
  LocalControllerLibrary,
} from '../types.js';
import { Ok, Err, toError } from '../../../shared/types.js';
import { checkBusAddress, normalizeAddresses } from '../address.js';
import { ConnectionFault, TransportError } from '../errors.js';
import { encodeCommand, sliceBinary } from '../framing.js';
import { createCommandLock } from '../lock.js';
import { transferToFile, nodeFileSystem, type FileSystem } from '../file-transfer.js';

export interface LocalControllerConfig {
  /**
   * Who persists saveFile() payloads:
   * - 'host' (default): read through readBinary() and write the file here
   * - 'adapter': hand the whole transfer to the library's file-save entry point
   */
  fileTransfer?: 'host' | 'adapter';
  /** Directory relative filenames are resolved against (default: cwd) */
  fileDirectory?: string;
  fileSystem?: FileSystem;
  /** Encoding of commands and text replies (default: 'ascii') */
  encoding?: BufferEncoding;
  /** Log every transaction with console.debug */
  trace?: boolean;
}

export function createLocalControllerTransport(
  library: LocalControllerLibrary,
  config: LocalControllerConfig = {}
): GpibTransport {
  const {
    fileTransfer = 'host',
    fileDirectory = process.cwd(),
    fileSystem = nodeFileSystem,
    encoding = 'ascii',
    trace = false,
  } = config;

  const withLock = createCommandLock();
  let opened = true;

  function log(message: string): void {
    if (trace) console.debug(`[LocalController] ${message}`);
  }

  // Run one library call under the lock, turning a thrown native error into a TransportError
  function transaction<T>(
    address: BusAddress | null,
    fn: () => GpibResult<T>
  ): Promise<GpibResult<T>> {
    return withLock(async () => {
      if (!opened) return Err(new ConnectionFault('Local controller transport is closed'));
      if (address !== null) {
        const checked = checkBusAddress(address);
        if (!checked.ok) return checked;
      }
      try {
        return fn();
      } catch (e) {
        const err = toError(e);
        console.error(`[LocalController] Library call failed: ${err.message}`);
        return Err(new TransportError('native_error', err.message));
      }
    });
  }

  function checkStatus(status: number, what: string): GpibResult<void> {
    if (status < 0) {
      return Err(new TransportError(status, `${what} failed with status ${status}`));
    }
    return Ok();
  }

  const transport: GpibTransport = {
    kind: 'local',

    async open(): Promise<GpibResult<void>> {
      opened = true;
      return Ok();
    },

    async close(): Promise<GpibResult<void>> {
      // Wait for in-flight calls before refusing new ones
      await withLock(async () => {
        opened = false;
      });
      return Ok();
    },

    isOpen(): boolean {
      return opened;
    },

    write(address: BusAddress, command: string): Promise<GpibResult<void>> {
      return transaction(address, () => {
        log(`write ${address}: ${command}`);
        return checkStatus(library.write(address, encodeCommand(command, 'local', encoding)), `write to ${address}`);
      });
    },

    writeBinary(address: BusAddress, mode: BinaryMode, data: Uint8Array): Promise<GpibResult<void>> {
      return transaction(address, () => {
        log(`writeBinary ${address} (mode ${mode}): ${data.length} bytes`);
        return checkStatus(
          library.writeBinary(address, mode, data, data.length),
          `binary write to ${address}`
        );
      });
    },

    readText(address: BusAddress): Promise<GpibResult<string>> {
      return transaction(address, () => {
        const bytes = library.readText(address);
        // '' is a real (empty) response; only a missing buffer is a failure
        if (bytes === null) return Err(new TransportError('no_response', `No response buffer from ${address}`));
        const text = Buffer.from(bytes).toString(encoding);
        log(`read ${address}: ${text}`);
        return Ok(text);
      });
    },

    readBinary(address: BusAddress): Promise<GpibResult<Buffer>> {
      return transaction(address, () => {
        const raw = library.readBinary(address);
        const length = library.readBinaryLength();
        if (raw === null) return Err(new TransportError('no_response', `No binary buffer from ${address}`));
        if (length < 0) {
          return Err(new TransportError(length, `binary read from ${address} failed with status ${length}`));
        }

        const sliced = sliceBinary(raw, length);
        if (!sliced.ok) return Err(new TransportError('length_mismatch', sliced.error));
        log(`readBinary ${address}: ${sliced.value.length} bytes`);
        return Ok(sliced.value);
      });
    },

    query(address: BusAddress, command: string): Promise<GpibResult<string>> {
      return transaction(address, () => {
        // One library call: no other caller can slip in between write and read
        const bytes = library.query(address, encodeCommand(command, 'local', encoding));
        if (bytes === null) return Err(new TransportError('no_response', `No response to "${command}" from ${address}`));
        const text = Buffer.from(bytes).toString(encoding);
        log(`query ${address}: ${command} -> ${text}`);
        return Ok(text);
      });
    },

    discover(): Promise<GpibResult<BusAddress[]>> {
      return transaction(null, () => {
        const addresses = normalizeAddresses(library.discover());
        console.log(`[LocalController] Found ${addresses.length} device(s) on the bus`);
        return Ok(addresses);
      });
    },

    async saveFile(address: BusAddress, mode: BinaryMode, filename: string): Promise<GpibResult<number>> {
      const destination = path.resolve(fileDirectory, filename);

      if (fileTransfer === 'adapter') {
        return transaction(address, () => {
          const status = library.saveFile(address, mode, destination);
          if (status < 0) return Err(new TransportError(status, `file save from ${address} failed with status ${status}`));
          console.log(`[LocalController] Adapter saved file from GPIB ${address} to ${destination}`);
          return Ok(status);
        });
      }

      return transferToFile(transport, address, mode, destination, fileSystem);
    },
  };

  return transport;
}
