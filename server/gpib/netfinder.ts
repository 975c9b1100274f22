/**
 * NetFinder discovery
 * Locates GPIB-Ethernet controllers on the local segment by broadcasting an
 * identify request (UDP port 3040) from every IPv4 interface and collecting
 * the replies for a fixed window.
 *
 * Nothing answering is a valid outcome for discoverControllers(); only
 * findFirstController() turns it into an error, since it must produce a host.
 */

import dgram from 'dgram';
import { networkInterfaces } from 'os';
import type { EventEmitter } from 'events';
import type { ControllerInfo, GpibResult } from './types.js';
import { Ok, Err } from '../../shared/types.js';
import { TransportError } from './errors.js';

export const NETFINDER_PORT = 3040;
export const NF_MAGIC = 0x5a;
export const NF_IDENTIFY = 0;
export const NF_IDENTIFY_REPLY = 1;

const BROADCAST_ADDR = '255.255.255.255';

// magic(1) id(1) sequence(2) ethernet address(6) padding(2)
export const HEADER_LENGTH = 12;
// uptime days(2) hrs/min/secs/mode/alert/ip type(6) ip/netmask/gw/app/boot/hw(6x4) name(32)
export const IDENTIFY_REPLY_LENGTH = HEADER_LENGTH + 64;

/** The parts of dgram.Socket discovery needs */
export interface DiscoverySocket extends EventEmitter {
  bind(port: number, address: string, callback: () => void): void;
  setBroadcast(flag: boolean): void;
  send(msg: Uint8Array, port: number, address: string, callback: (err: Error | null) => void): void;
  address(): { port: number };
  close(): void;
}

export interface DiscoveryOptions {
  timeoutMs?: number;                             // Reply window (default: 500)
  interfaces?: () => string[];                    // IPv4 addresses to broadcast from
  createSocket?: () => DiscoverySocket;           // Default: dgram udp4 with reuseAddr
}

// Exported for testing
export function encodeIdentifyRequest(sequence: number): Buffer {
  const buf = Buffer.alloc(HEADER_LENGTH);
  buf[0] = NF_MAGIC;
  buf[1] = NF_IDENTIFY;
  buf.writeUInt16BE(sequence, 2);
  buf.fill(0xff, 4, 10);           // Any ethernet address
  return buf;
}

function formatQuad(buf: Buffer, offset: number): string {
  return [...buf.subarray(offset, offset + 4)].join('.');
}

// Exported for testing - null for anything that is not a reply to our request
export function decodeIdentifyReply(msg: Buffer, sequence?: number): ControllerInfo | null {
  if (msg.length !== IDENTIFY_REPLY_LENGTH) return null;
  if (msg[0] !== NF_MAGIC || msg[1] !== NF_IDENTIFY_REPLY) return null;
  if (sequence !== undefined && msg.readUInt16BE(2) !== sequence) return null;

  const p = HEADER_LENGTH;
  const nameBytes = msg.subarray(p + 32, p + 64);
  const nul = nameBytes.indexOf(0);

  return {
    macAddress: [...msg.subarray(4, 10)].map(b => b.toString(16).padStart(2, '0')).join(':'),
    uptime: {
      days: msg.readUInt16BE(p),
      hours: msg[p + 2],
      minutes: msg[p + 3],
      seconds: msg[p + 4],
    },
    mode: msg[p + 5],
    alert: msg[p + 6],
    ipType: msg[p + 7] === 1 ? 'static' : 'dynamic',
    ipAddress: formatQuad(msg, p + 8),
    netmask: formatQuad(msg, p + 12),
    gateway: formatQuad(msg, p + 16),
    appVersion: formatQuad(msg, p + 20),
    bootVersion: formatQuad(msg, p + 24),
    hardwareVersion: formatQuad(msg, p + 28),
    name: (nul === -1 ? nameBytes : nameBytes.subarray(0, nul)).toString('ascii').trim(),
  };
}

function localIPv4Addresses(): string[] {
  const addresses: string[] = [];
  for (const entries of Object.values(networkInterfaces())) {
    for (const net of entries ?? []) {
      if (net.family === 'IPv4' && !net.internal) addresses.push(net.address);
    }
  }
  return addresses;
}

// Resolves with the bind error instead of waiting forever for a callback that never comes
function bind(socket: DiscoverySocket, port: number, address: string): Promise<Error | null> {
  return new Promise(resolve => {
    const onError = (err: Error): void => resolve(err);
    socket.once('error', onError);
    socket.bind(port, address, () => {
      socket.removeListener('error', onError);
      resolve(null);
    });
  });
}

export async function discoverControllers(options: DiscoveryOptions = {}): Promise<ControllerInfo[]> {
  const {
    timeoutMs = 500,
    interfaces = localIPv4Addresses,
    createSocket = () => dgram.createSocket({ type: 'udp4', reuseAddr: true }),
  } = options;

  const sequence = Math.floor(Math.random() * 0xffff) + 1;
  const request = encodeIdentifyRequest(sequence);
  const found = new Map<string, ControllerInfo>();
  const sockets: DiscoverySocket[] = [];

  const onMessage = (msg: Buffer): void => {
    const info = decodeIdentifyReply(msg, sequence);
    if (info && !found.has(info.macAddress)) {
      found.set(info.macAddress, info);
      console.log(`[NetFinder] Found controller ${info.ipAddress} (${info.macAddress})`);
    }
  };

  for (const localAddress of interfaces()) {
    // Sender bound to the interface; receiver on the same port picks up broadcast replies
    const sender = createSocket();
    const receiver = createSocket();

    for (const s of [sender, receiver]) {
      s.on('message', onMessage);
      s.on('error', (err: Error) => console.error(`[NetFinder] Socket error on ${localAddress}: ${err.message}`));
    }

    const senderError = await bind(sender, 0, localAddress);
    const bindError = senderError ?? await bind(receiver, sender.address().port, '0.0.0.0');
    if (bindError) {
      console.error(`[NetFinder] Skipping ${localAddress}: ${bindError.message}`);
      sender.close();
      receiver.close();
      continue;
    }
    sockets.push(sender, receiver);
    sender.setBroadcast(true);

    sender.send(request, NETFINDER_PORT, BROADCAST_ADDR, err => {
      if (err) console.error(`[NetFinder] Broadcast from ${localAddress} failed: ${err.message}`);
    });
  }

  await new Promise(resolve => setTimeout(resolve, timeoutMs));
  for (const s of sockets) s.close();

  return [...found.values()];
}

/** Host of the first controller that answers, for bootstrapping a network transport */
export async function findFirstController(options: DiscoveryOptions = {}): Promise<GpibResult<string>> {
  const controllers = await discoverControllers(options);
  const first = controllers[0];
  if (!first) {
    return Err(new TransportError('no_controller', 'No GPIB-Ethernet controllers answered the discovery broadcast'));
  }
  return Ok(first.ipAddress);
}
