/**
 * File Transfer
 * Pulls a binary payload (waveform, trace, screenshot) off the bus and
 * persists exactly the bytes the transport reported.
 *
 * Bus-side failures come back as the transport's own error; anything that
 * goes wrong on disk is a FileIOError, so callers can tell a silent device
 * from a full disk.
 */

import { open } from 'fs/promises';
import type { BinaryMode, BusAddress, GpibResult, GpibTransport } from './types.js';
import { Ok, Err, toError } from '../../shared/types.js';
import { FileIOError } from './errors.js';

/** The slice of a file handle the agent needs */
export interface WritableFile {
  write(data: Uint8Array, offset: number, length: number, position: number): Promise<{ bytesWritten: number }>;
  close(): Promise<void>;
}

export interface FileSystem {
  open(path: string, flags: 'w'): Promise<WritableFile>;
}

export const nodeFileSystem: FileSystem = {
  open: (path, flags) => open(path, flags),
};

/** Binary reads the agent depends on */
export type BinarySource = Pick<GpibTransport, 'readBinary'>;

export async function writeExact(
  destinationPath: string,
  data: Uint8Array,
  fileSystem: FileSystem = nodeFileSystem
): Promise<GpibResult<number>> {
  let handle: WritableFile;
  try {
    handle = await fileSystem.open(destinationPath, 'w');
  } catch (e) {
    return Err(new FileIOError(destinationPath, toError(e)));
  }

  let written = 0;
  let writeError: Error | null = null;
  try {
    // fs may report short writes; keep going until every byte is down
    while (written < data.length) {
      const { bytesWritten } = await handle.write(data, written, data.length - written, written);
      if (bytesWritten <= 0) throw new Error(`short write at byte ${written}`);
      written += bytesWritten;
    }
  } catch (e) {
    writeError = toError(e);
  } finally {
    try {
      await handle.close();
    } catch (e) {
      writeError ??= toError(e);
    }
  }

  if (writeError) return Err(new FileIOError(destinationPath, writeError));
  return Ok(written);
}

export async function transferToFile(
  transport: BinarySource,
  address: BusAddress,
  mode: BinaryMode,
  destinationPath: string,
  fileSystem: FileSystem = nodeFileSystem
): Promise<GpibResult<number>> {
  const payload = await transport.readBinary(address, mode);
  if (!payload.ok) return payload;

  const result = await writeExact(destinationPath, payload.value, fileSystem);
  if (result.ok) {
    console.log(`[FileTransfer] Saved ${result.value} bytes from GPIB ${address} to ${destinationPath}`);
  } else {
    console.error(`[FileTransfer] ${result.error.message}`);
  }
  return result;
}
