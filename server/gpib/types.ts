// Re-export shared types
export * from '../../shared/types.js';

import type { Result } from '../../shared/types.js';
import type { GpibError } from './errors.js';

/** Primary GPIB address of one instrument, 1-30 */
export type BusAddress = number;

/**
 * Opaque binary transfer selector. Its meaning is adapter- and
 * instrument-specific: the local controller hands it to the vendor library,
 * the network controller maps it onto EOI assertion (writes) and the read
 * terminator (reads).
 */
export type BinaryMode = boolean;

export type GpibResult<T> = Result<T, GpibError>;

/**
 * Driver-facing bus contract, uniform across adapter kinds.
 * Transactions on one transport run strictly in submission order.
 */
export interface GpibTransport {
  readonly kind: 'local' | 'network';

  write(address: BusAddress, command: string): Promise<GpibResult<void>>;
  writeBinary(address: BusAddress, mode: BinaryMode, data: Uint8Array): Promise<GpibResult<void>>;
  readText(address: BusAddress): Promise<GpibResult<string>>;
  readBinary(address: BusAddress, mode?: BinaryMode): Promise<GpibResult<Buffer>>;
  query(address: BusAddress, command: string): Promise<GpibResult<string>>;
  discover(): Promise<GpibResult<BusAddress[]>>;
  saveFile(address: BusAddress, mode: BinaryMode, filename: string): Promise<GpibResult<number>>;

  open(): Promise<GpibResult<void>>;
  close(): Promise<GpibResult<void>>;
  isOpen(): boolean;
}

/**
 * Logical call surface of the USB controller's vendor library.
 * Status codes below zero are failures. readBinaryLength() reports the
 * length of the most recent readBinary() only and is not reentrant.
 * Commands and text replies cross this boundary as raw bytes; the
 * transport owns the text encoding.
 */
export interface LocalControllerLibrary {
  write(address: number, command: Uint8Array): number;
  writeBinary(address: number, mode: boolean, data: Uint8Array, length: number): number;
  readText(address: number): Uint8Array | null;
  readBinary(address: number): Uint8Array | null;
  readBinaryLength(): number;
  query(address: number, command: Uint8Array): Uint8Array | null;
  discover(): number[];
  saveFile(address: number, mode: boolean, filename: string): number;
}

export type ConnectionState = 'disconnected' | 'connected' | 'faulted';

/** Decoded NetFinder identify reply from a GPIB-Ethernet controller */
export interface ControllerInfo {
  macAddress: string;
  ipAddress: string;
  netmask: string;
  gateway: string;
  ipType: 'dynamic' | 'static';
  uptime: { days: number; hours: number; minutes: number; seconds: number };
  mode: number;
  alert: number;
  appVersion: string;
  bootVersion: string;
  hardwareVersion: string;
  name: string;
}
