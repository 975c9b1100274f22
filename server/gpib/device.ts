/**
 * GPIB Device
 * One instrument at a fixed address on a shared transport. Instrument drivers
 * are written against this handle instead of (transport, address) pairs.
 */

import type { BinaryMode, BusAddress, GpibResult, GpibTransport } from './types.js';
import { Ok, Err } from '../../shared/types.js';
import { checkBusAddress } from './address.js';
import { TransportError } from './errors.js';
import { ScpiParser, type InstrumentIdentity, type ScpiErrorEntry } from './scpi-parser.js';

export interface GpibDevice {
  readonly address: BusAddress;
  readonly transport: GpibTransport;

  write(command: string): Promise<GpibResult<void>>;
  writeBinary(mode: BinaryMode, data: Uint8Array): Promise<GpibResult<void>>;
  read(): Promise<GpibResult<string>>;
  query(command: string): Promise<GpibResult<string>>;
  readBinary(mode?: BinaryMode): Promise<GpibResult<Buffer>>;
  saveFile(mode: BinaryMode, filename: string): Promise<GpibResult<number>>;

  /** *IDN? */
  identify(): Promise<GpibResult<InstrumentIdentity>>;
  /** *RST */
  reset(): Promise<GpibResult<void>>;
  /** *CLS */
  clearStatus(): Promise<GpibResult<void>>;
  /** Next :SYST:ERR? entry, or null when the queue is empty */
  nextError(): Promise<GpibResult<ScpiErrorEntry | null>>;

  /** Query a numeric reading, e.g. queryNumber('MEAS:VOLT:DC?') */
  queryNumber(command: string): Promise<GpibResult<number>>;
  /** Query an on/off setting, e.g. queryBool('OUTP?') */
  queryBool(command: string): Promise<GpibResult<boolean>>;
}

export function createGpibDevice(transport: GpibTransport, address: BusAddress): GpibResult<GpibDevice> {
  const checked = checkBusAddress(address);
  if (!checked.ok) return checked;

  const device: GpibDevice = {
    address,
    transport,

    write: command => transport.write(address, command),
    writeBinary: (mode, data) => transport.writeBinary(address, mode, data),
    read: () => transport.readText(address),
    query: command => transport.query(address, command),
    readBinary: mode => transport.readBinary(address, mode),
    saveFile: (mode, filename) => transport.saveFile(address, mode, filename),

    async identify(): Promise<GpibResult<InstrumentIdentity>> {
      const response = await transport.query(address, '*IDN?');
      if (!response.ok) return response;

      const identity = ScpiParser.parseIdentity(response.value);
      if (!identity.ok) return Err(new TransportError('malformed_response', identity.error));
      return Ok(identity.value);
    },

    reset: () => transport.write(address, '*RST'),
    clearStatus: () => transport.write(address, '*CLS'),

    async nextError(): Promise<GpibResult<ScpiErrorEntry | null>> {
      const response = await transport.query(address, ':SYST:ERR?');
      if (!response.ok) return response;
      if (ScpiParser.isErrorResponseOk(response.value)) return Ok(null);

      const entry = ScpiParser.parseError(response.value);
      if (!entry.ok) return Err(new TransportError('malformed_response', entry.error));
      return Ok(entry.value);
    },

    async queryNumber(command: string): Promise<GpibResult<number>> {
      const response = await transport.query(address, command);
      if (!response.ok) return response;

      const value = ScpiParser.parseNumber(response.value);
      if (!value.ok) return Err(new TransportError('malformed_response', `${command}: ${value.error}`));
      return Ok(value.value);
    },

    async queryBool(command: string): Promise<GpibResult<boolean>> {
      const response = await transport.query(address, command);
      if (!response.ok) return response;
      return Ok(ScpiParser.parseBool(response.value));
    },
  };

  return Ok(device);
}
