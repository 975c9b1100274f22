/**
 * Network Controller Transport
 * Drives a GPIB-Ethernet controller (Prologix-style "++" protocol) over one
 * persistent TCP connection.
 *
 * Connection state:
 *   disconnected -> connected   socket established (lazily on first use, or open())
 *   connected    -> faulted     socket error, unexpected EOF, malformed frame, read timeout
 *   faulted      -> connected   only through an explicit open()
 *
 * A faulted transport never heals on its own: every call fails with
 * ConnectionFault until open() is called. This keeps a late response from
 * attaching itself to a later transaction and keeps a wiring fault visible.
 */

import net from 'net';
import path from 'path';
import type { EventEmitter } from 'events';
import type {
  BinaryMode,
  BusAddress,
  ConnectionState,
  GpibResult,
  GpibTransport,
} from '../types.js';
import { Ok, Err } from '../../../shared/types.js';
import { BUS_ADDRESSES, checkBusAddress, normalizeAddresses } from '../address.js';
import { ConnectionFault, TransportError, type GpibError } from '../errors.js';
import {
  LF,
  decodeBlock,
  decodeLine,
  encodeBinaryPayload,
  encodeCommand,
  encodeDirective,
  type FrameDecoder,
} from '../framing.js';
import { createCommandLock } from '../lock.js';
import { transferToFile, nodeFileSystem, type FileSystem } from '../file-transfer.js';

export const DEFAULT_CONTROLLER_PORT = 1234;

// The controller accepts read timeouts between 1 ms and 3 s
export const MIN_TIMEOUT_MS = 1;
export const MAX_TIMEOUT_MS = 3000;

/** The parts of net.Socket the transport uses */
export interface ControllerSocket extends EventEmitter {
  write(data: Uint8Array, callback?: (err?: Error | null) => void): boolean;
  destroy(): void;
}

export type SocketFactory = (options: { host: string; port: number }) => ControllerSocket;

export interface NetworkControllerConfig {
  host: string;
  port?: number;                // Default: 1234
  timeoutMs?: number;           // Controller-side GPIB read timeout (default: 1000)
  responseMarginMs?: number;    // Extra idle time allowed on top of timeoutMs (default: 250)
  connectTimeoutMs?: number;    // TCP connect timeout (default: 3000)
  encoding?: BufferEncoding;    // Text encoding (default: 'ascii')
  fileDirectory?: string;       // Where relative saveFile() names land (default: cwd)
  fileSystem?: FileSystem;
  connect?: SocketFactory;      // Default: net.connect
  trace?: boolean;              // Log every line sent with console.debug
}

export interface NetworkControllerTransport extends GpibTransport {
  readonly kind: 'network';
  readonly host: string;
  readonly port: number;
  getState(): ConnectionState;
}

interface ReadOptions {
  /** Timing out moves the connection to faulted (default: true) */
  faultOnTimeout?: boolean;
}

export function createNetworkControllerTransport(config: NetworkControllerConfig): NetworkControllerTransport {
  const {
    host,
    port = DEFAULT_CONTROLLER_PORT,
    timeoutMs = 1000,
    responseMarginMs = 250,
    connectTimeoutMs = 3000,
    encoding = 'ascii',
    fileDirectory = process.cwd(),
    fileSystem = nodeFileSystem,
    connect = (options: { host: string; port: number }): ControllerSocket => net.connect(options),
    trace = false,
  } = config;

  if (!Number.isInteger(timeoutMs) || timeoutMs < MIN_TIMEOUT_MS || timeoutMs > MAX_TIMEOUT_MS) {
    throw new RangeError(`timeoutMs must be between ${MIN_TIMEOUT_MS} and ${MAX_TIMEOUT_MS}, got ${timeoutMs}`);
  }

  const idleTimeoutMs = timeoutMs + responseMarginMs;
  const label = `${host}:${port}`;
  const withLock = createCommandLock();

  let state: ConnectionState = 'disconnected';
  let socket: ControllerSocket | null = null;
  let faultError: GpibError | null = null;
  let rx: Buffer = Buffer.alloc(0);
  let lastSelectedAddress: BusAddress | null = null;
  let lastEoi: boolean | null = null;
  // Wakes the pending reader when bytes arrive or the connection faults
  let notify: (() => void) | null = null;

  function fault(err: GpibError): void {
    if (state === 'faulted') return;
    console.error(`[NetworkController] ${label} faulted: ${err.message}`);
    state = 'faulted';
    faultError = err;
    socket?.destroy();
    socket = null;
    notify?.();
  }

  function notConnected(): GpibError {
    return faultError ?? new ConnectionFault(`Not connected to ${label}`);
  }

  function attach(s: ControllerSocket): void {
    s.on('data', (chunk: Buffer) => {
      if (s !== socket) return;
      rx = rx.length === 0 ? chunk : Buffer.concat([rx, chunk]);
      notify?.();
    });
    s.on('error', (err: Error) => {
      if (s !== socket) {
        console.error(`[NetworkController] Error on discarded socket for ${label}: ${err.message}`);
        return;
      }
      fault(new ConnectionFault(`Socket error on ${label}: ${err.message}`, { cause: err }));
    });
    s.on('close', () => {
      if (s !== socket) return;
      fault(new ConnectionFault(`Connection to ${label} closed unexpectedly`));
    });
  }

  function teardown(): void {
    const s = socket;
    socket = null;
    s?.destroy();
    rx = Buffer.alloc(0);
    lastSelectedAddress = null;
    lastEoi = null;
  }

  async function establish(): Promise<GpibResult<void>> {
    teardown();
    faultError = null;
    console.log(`[NetworkController] Connecting to ${label}...`);

    const s = connect({ host, port });
    const connected = await new Promise<GpibResult<void>>(resolve => {
      const timer = setTimeout(() => {
        resolve(Err(new ConnectionFault(`Timed out connecting to ${label}`)));
      }, connectTimeoutMs);
      s.once('connect', () => {
        clearTimeout(timer);
        resolve(Ok());
      });
      s.once('error', (err: Error) => {
        clearTimeout(timer);
        resolve(Err(new ConnectionFault(`Failed to connect to ${label}: ${err.message}`, { cause: err })));
      });
    });

    if (!connected.ok) {
      s.destroy();
      state = 'faulted';
      faultError = connected.error;
      console.error(`[NetworkController] ${connected.error.message}`);
      return connected;
    }

    socket = s;
    state = 'connected';
    attach(s);

    // Controller mode, no read-after-write, GPIB read timeout, no CR/LF appended to GPIB data
    const setup = [
      encodeDirective('mode', 1),
      encodeDirective('auto', 0),
      encodeDirective('read_tmo_ms', timeoutMs),
      encodeDirective('eos', 3),
    ];
    for (const line of setup) {
      const sent = await send(line);
      if (!sent.ok) return sent;
    }

    console.log(`[NetworkController] CONNECTED: ${label}`);
    return Ok();
  }

  function send(bytes: Buffer): Promise<GpibResult<void>> {
    const s = socket;
    if (state !== 'connected' || !s) return Promise.resolve(Err(notConnected()));

    // Anything still buffered belongs to an earlier, finished exchange
    rx = Buffer.alloc(0);
    if (trace) console.debug(`[NetworkController] >> ${JSON.stringify(bytes.toString('latin1'))}`);

    return new Promise(resolve => {
      s.write(bytes, err => {
        if (err) {
          const f = new ConnectionFault(`Write to ${label} failed: ${err.message}`, { cause: err });
          fault(f);
          resolve(Err(f));
        } else {
          resolve(Ok());
        }
      });
    });
  }

  function readFrame(decoder: FrameDecoder, options: ReadOptions = {}): Promise<GpibResult<Buffer>> {
    const { faultOnTimeout = true } = options;

    return new Promise(resolve => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const finish = (result: GpibResult<Buffer>): void => {
        clearTimeout(timer);
        notify = null;
        resolve(result);
      };

      const onTimeout = (): void => {
        finish(Err(new TransportError('timeout', `No response from ${label} within ${idleTimeoutMs}ms`)));
        if (faultOnTimeout) {
          fault(new ConnectionFault(`Connection to ${label} abandoned after a read timeout; call open() to reconnect`));
        }
      };

      const check = (): void => {
        if (state !== 'connected') {
          finish(Err(notConnected()));
          return;
        }
        const decoded = decoder(rx);
        if (decoded.status === 'complete') {
          rx = decoded.rest;
          finish(Ok(decoded.frame));
          return;
        }
        if (decoded.status === 'malformed') {
          const f = new ConnectionFault(`Malformed response from ${label}: ${decoded.reason}`);
          finish(Err(f));
          fault(f);
          return;
        }
        // Still waiting: the idle window restarts with every chunk
        clearTimeout(timer);
        timer = setTimeout(onTimeout, idleTimeoutMs);
      };

      notify = check;
      check();
    });
  }

  /**
   * Wait for idleTimeoutMs of silence and hand back whatever arrived in the
   * meantime, so a late reply cannot be read by the next exchange.
   */
  function drain(): Promise<Buffer> {
    return new Promise(resolve => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const done = (): void => {
        clearTimeout(timer);
        notify = null;
        const late = rx;
        rx = Buffer.alloc(0);
        resolve(late);
      };

      notify = () => {
        clearTimeout(timer);
        if (state !== 'connected') {
          done();
          return;
        }
        timer = setTimeout(done, idleTimeoutMs);
      };
      timer = setTimeout(done, idleTimeoutMs);
    });
  }

  function isPollReply(line: Buffer): boolean {
    return /^\d+$/.test(line.toString('ascii').trim());
  }

  async function select(address: BusAddress): Promise<GpibResult<void>> {
    if (lastSelectedAddress === address) return Ok();
    const sent = await send(encodeDirective('addr', address));
    if (sent.ok) lastSelectedAddress = address;
    return sent;
  }

  // Validate, connect on first use, then run fn under the lock
  function transaction<T>(
    address: BusAddress | null,
    fn: () => Promise<GpibResult<T>>
  ): Promise<GpibResult<T>> {
    return withLock(async () => {
      if (address !== null) {
        const checked = checkBusAddress(address);
        if (!checked.ok) return checked;
      }
      if (state === 'faulted') return Err(notConnected());
      if (state === 'disconnected') {
        const opened = await establish();
        if (!opened.ok) return opened;
      }
      if (address !== null) {
        const selected = await select(address);
        if (!selected.ok) return selected;
      }
      return fn();
    });
  }

  async function readLine(): Promise<GpibResult<string>> {
    const sent = await send(encodeDirective('read', 'eoi'));
    if (!sent.ok) return sent;
    const frame = await readFrame(decodeLine);
    if (!frame.ok) return frame;
    return Ok(frame.value.toString(encoding));
  }

  const transport: NetworkControllerTransport = {
    kind: 'network',
    host,
    port,

    getState(): ConnectionState {
      return state;
    },

    open(): Promise<GpibResult<void>> {
      return withLock(async () => {
        if (state === 'connected') return Ok();
        return establish();
      });
    },

    async close(): Promise<GpibResult<void>> {
      await withLock(async () => {
        teardown();
        state = 'disconnected';
        faultError = null;
      });
      console.log(`[NetworkController] Disconnected from ${label}`);
      return Ok();
    },

    isOpen(): boolean {
      return state === 'connected';
    },

    write(address: BusAddress, command: string): Promise<GpibResult<void>> {
      return transaction(address, () => send(encodeCommand(command, 'network', encoding)));
    },

    writeBinary(address: BusAddress, mode: BinaryMode, data: Uint8Array): Promise<GpibResult<void>> {
      return transaction(address, async () => {
        // mode true asserts EOI with the last byte
        if (lastEoi !== mode) {
          const sent = await send(encodeDirective('eoi', mode ? 1 : 0));
          if (!sent.ok) return sent;
          lastEoi = mode;
        }
        return send(encodeBinaryPayload(data));
      });
    },

    readText(address: BusAddress): Promise<GpibResult<string>> {
      return transaction(address, readLine);
    },

    readBinary(address: BusAddress, mode: BinaryMode = true): Promise<GpibResult<Buffer>> {
      return transaction(address, async () => {
        // mode true reads until EOI, false until the device sends LF
        const sent = await send(encodeDirective('read', mode ? 'eoi' : LF));
        if (!sent.ok) return sent;
        return readFrame(decodeBlock);
      });
    },

    query(address: BusAddress, command: string): Promise<GpibResult<string>> {
      return transaction(address, async () => {
        const sent = await send(encodeCommand(command, 'network', encoding));
        if (!sent.ok) return sent;
        return readLine();
      });
    },

    discover(): Promise<GpibResult<BusAddress[]>> {
      return transaction(null, async () => {
        const found: BusAddress[] = [];
        // Serial-poll every address; silence means nobody is there
        for (const address of BUS_ADDRESSES) {
          const sent = await send(encodeDirective('spoll', address));
          if (!sent.ok) return sent;

          const reply = await readFrame(decodeLine, { faultOnTimeout: false });
          if (reply.ok) {
            if (isPollReply(reply.value)) found.push(address);
            continue;
          }
          if (!(reply.error instanceof TransportError && reply.error.isTimeout)) return reply;

          // A slow device may still answer this poll; it must not be credited to the next address
          const late = decodeLine(await drain());
          if (state !== 'connected') return Err(notConnected());
          if (late.status === 'complete' && isPollReply(late.frame)) found.push(address);
        }
        const addresses = normalizeAddresses(found);
        console.log(`[NetworkController] Found ${addresses.length} device(s) on ${label}`);
        return Ok(addresses);
      });
    },

    saveFile(address: BusAddress, mode: BinaryMode, filename: string): Promise<GpibResult<number>> {
      return transferToFile(transport, address, mode, path.resolve(fileDirectory, filename), fileSystem);
    },
  };

  return transport;
}
