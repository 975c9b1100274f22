/**
 * SCPI Response Parser
 *
 * Utilities for parsing SCPI (Standard Commands for Programmable Instruments)
 * responses as they come off the bus, for drivers layered on a GpibTransport.
 */

import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';

/**
 * Many instruments return 9.9E37 for overload / not-a-number readings.
 * Any value above this threshold is considered invalid.
 */
const OVERFLOW_THRESHOLD = 9e36;

export interface InstrumentIdentity {
  manufacturer: string;
  model: string;
  serial: string;
  firmware: string;
}

export interface ScpiErrorEntry {
  code: number;
  message: string;
}

export const ScpiParser = {
  /**
   * Parse a numeric SCPI response.
   *
   * Handles standard and scientific notation, surrounding whitespace, the
   * 9.9E37 overload marker, and responses with a leading function label
   * ("VDC +1.234E+00" reads as 1.234).
   *
   * @returns Result with parsed number, or error string describing the issue
   */
  parseNumber(response: string): Result<number, string> {
    const trimmed = response.trim();

    if (trimmed === '') {
      return Err('empty response');
    }

    const parts = trimmed.split(/\s+/);
    const last = parts[parts.length - 1];
    const value = Number(last);

    if (isNaN(value)) {
      return Err(`non-numeric response: "${trimmed}"`);
    }

    if (Math.abs(value) > OVERFLOW_THRESHOLD) {
      return Err('overflow (9.9E37)');
    }

    return Ok(value);
  },

  /**
   * Parse a boolean SCPI response ("0"/"1", "OFF"/"ON", case-insensitive).
   */
  parseBool(response: string): boolean {
    const val = response.trim();
    return val === '1' || val.toUpperCase() === 'ON';
  },

  /**
   * Parse an *IDN? response: <manufacturer>,<model>,<serial>,<firmware>
   */
  parseIdentity(response: string): Result<InstrumentIdentity, string> {
    const parts = this.parseCsv(response);
    if (parts.length !== 4) {
      return Err(`invalid *IDN? response "${response.trim()}", expected <manufacturer>,<model>,<serial>,<firmware>`);
    }
    const [manufacturer, model, serial, firmware] = parts;
    return Ok({ manufacturer, model, serial, firmware });
  },

  /**
   * Parse a :SYST:ERR? entry, e.g. '-113,"Undefined header"'.
   */
  parseError(response: string): Result<ScpiErrorEntry, string> {
    const match = response.trim().match(/^([+-]?\d+)\s*,\s*"?(.*?)"?$/);
    if (!match) {
      return Err(`invalid error queue entry: "${response.trim()}"`);
    }
    return Ok({ code: parseInt(match[1], 10), message: match[2] });
  },

  /**
   * Check if a SCPI error response indicates success.
   *
   * Standard SCPI error format: "0,No error" or "+0,No error"
   */
  isErrorResponseOk(response: string): boolean {
    const trimmed = response.trim();
    return trimmed.startsWith('0,') || trimmed.startsWith('+0,');
  },

  /**
   * Parse a comma-separated SCPI response into trimmed parts.
   */
  parseCsv(response: string): string[] {
    return response.split(',').map(s => s.trim());
  },
};
