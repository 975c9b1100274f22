import type { BusAddress, GpibResult } from './types.js';
import { Ok, Err } from '../../shared/types.js';
import { TransportError } from './errors.js';

export const MIN_BUS_ADDRESS = 1;
export const MAX_BUS_ADDRESS = 30;

/** Every primary address a device can occupy, in scan order */
export const BUS_ADDRESSES: readonly BusAddress[] = Array.from(
  { length: MAX_BUS_ADDRESS - MIN_BUS_ADDRESS + 1 },
  (_, i) => MIN_BUS_ADDRESS + i
);

export function isBusAddress(value: unknown): value is BusAddress {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= MIN_BUS_ADDRESS &&
    value <= MAX_BUS_ADDRESS
  );
}

export function checkBusAddress(address: BusAddress): GpibResult<BusAddress> {
  return isBusAddress(address)
    ? Ok(address)
    : Err(new TransportError('invalid_address', `Invalid GPIB address: ${address}`));
}

/** Parse an address from untrusted text (route params, env vars) */
export function parseBusAddress(raw: string): GpibResult<BusAddress> {
  if (!/^\d+$/.test(raw.trim())) {
    return Err(new TransportError('invalid_address', `Invalid GPIB address: "${raw}"`));
  }
  return checkBusAddress(parseInt(raw, 10));
}

/** Sorted, de-duplicated valid addresses; anything else is dropped */
export function normalizeAddresses(addresses: Iterable<number>): BusAddress[] {
  const found = new Set<BusAddress>();
  for (const address of addresses) {
    if (isBusAddress(address)) found.add(address);
  }
  return [...found].sort((a, b) => a - b);
}
