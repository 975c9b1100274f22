/**
 * Server configuration (defaults, overridable by ENV)
 *
 *   PORT                       HTTP port (3001)
 *   GPIB_ADAPTER               'network' | 'local' ('network')
 *   GPIB_HOST                  Network controller host; empty -> NetFinder lookup
 *   GPIB_PORT                  Network controller TCP port (1234)
 *   GPIB_TIMEOUT_MS            Controller read timeout, 1-3000 (1000)
 *   GPIB_DISCOVERY_TIMEOUT_MS  NetFinder reply window (500)
 *   GPIB_LIBRARY_PATH          Vendor library for the local controller
 *   GPIB_FILE_TRANSFER         'host' | 'adapter' for local saveFile ('host')
 *   GPIB_FILE_DIR              Directory saved files land in (./captures)
 *   GPIB_ENCODING              'ascii' | 'latin1' | 'utf8' for command text ('ascii')
 *   GPIB_TRACE                 '1' logs every transaction
 */

import path from 'path';
import type { Result } from '../shared/types.js';
import { Ok, Err } from '../shared/types.js';

export interface ServerConfig {
  port: number;
  adapter: 'network' | 'local';
  host: string | null;
  controllerPort: number;
  timeoutMs: number;
  discoveryTimeoutMs: number;
  libraryPath: string | null;
  fileTransfer: 'host' | 'adapter';
  fileDirectory: string;
  encoding: TextEncoding;
  trace: boolean;
}

export const TEXT_ENCODINGS = ['ascii', 'latin1', 'utf8'] as const;
export type TextEncoding = typeof TEXT_ENCODINGS[number];

type Env = Record<string, string | undefined>;

function intVar(env: Env, name: string, fallback: number): Result<number, string> {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return Ok(fallback);
  const value = parseInt(raw, 10);
  if (isNaN(value) || String(value) !== raw.trim()) {
    return Err(`${name} must be an integer, got "${raw}"`);
  }
  return Ok(value);
}

function oneOf<T extends string>(env: Env, name: string, allowed: readonly T[], fallback: T): Result<T, string> {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return Ok(fallback);
  const match = allowed.find(a => a === raw.trim());
  if (match === undefined) {
    return Err(`${name} must be one of ${allowed.join(', ')}, got "${raw}"`);
  }
  return Ok(match);
}

export function loadConfig(env: Env = process.env): Result<ServerConfig, string> {
  const port = intVar(env, 'PORT', 3001);
  if (!port.ok) return port;
  const adapter = oneOf(env, 'GPIB_ADAPTER', ['network', 'local'] as const, 'network');
  if (!adapter.ok) return adapter;
  const controllerPort = intVar(env, 'GPIB_PORT', 1234);
  if (!controllerPort.ok) return controllerPort;
  const timeoutMs = intVar(env, 'GPIB_TIMEOUT_MS', 1000);
  if (!timeoutMs.ok) return timeoutMs;
  const discoveryTimeoutMs = intVar(env, 'GPIB_DISCOVERY_TIMEOUT_MS', 500);
  if (!discoveryTimeoutMs.ok) return discoveryTimeoutMs;
  const fileTransfer = oneOf(env, 'GPIB_FILE_TRANSFER', ['host', 'adapter'] as const, 'host');
  if (!fileTransfer.ok) return fileTransfer;
  const encoding = oneOf(env, 'GPIB_ENCODING', TEXT_ENCODINGS, 'ascii');
  if (!encoding.ok) return encoding;

  if (timeoutMs.value < 1 || timeoutMs.value > 3000) {
    return Err(`GPIB_TIMEOUT_MS must be between 1 and 3000, got ${timeoutMs.value}`);
  }

  const libraryPath = env.GPIB_LIBRARY_PATH?.trim() || null;
  if (adapter.value === 'local' && !libraryPath) {
    return Err('GPIB_LIBRARY_PATH is required when GPIB_ADAPTER=local');
  }

  return Ok({
    port: port.value,
    adapter: adapter.value,
    host: env.GPIB_HOST?.trim() || null,
    controllerPort: controllerPort.value,
    timeoutMs: timeoutMs.value,
    discoveryTimeoutMs: discoveryTimeoutMs.value,
    libraryPath,
    fileTransfer: fileTransfer.value,
    fileDirectory: path.resolve(env.GPIB_FILE_DIR?.trim() || 'captures'),
    encoding: encoding.value,
    trace: env.GPIB_TRACE === '1',
  });
}
