import path from 'path';
import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      ok: true,
      value: {
        port: 3001,
        adapter: 'network',
        host: null,
        controllerPort: 1234,
        timeoutMs: 1000,
        discoveryTimeoutMs: 500,
        libraryPath: null,
        fileTransfer: 'host',
        fileDirectory: path.resolve('captures'),
        encoding: 'ascii',
        trace: false,
      },
    });
  });

  it('reads every variable', () => {
    const result = loadConfig({
      PORT: '8080',
      GPIB_ADAPTER: 'local',
      GPIB_HOST: ' 10.0.0.5 ',
      GPIB_PORT: '5000',
      GPIB_TIMEOUT_MS: '3000',
      GPIB_DISCOVERY_TIMEOUT_MS: '250',
      GPIB_LIBRARY_PATH: 'C:\\gpib\\ug01.dll',
      GPIB_FILE_TRANSFER: 'adapter',
      GPIB_FILE_DIR: '/data/captures',
      GPIB_ENCODING: 'latin1',
      GPIB_TRACE: '1',
    });

    expect(result).toEqual({
      ok: true,
      value: {
        port: 8080,
        adapter: 'local',
        host: '10.0.0.5',
        controllerPort: 5000,
        timeoutMs: 3000,
        discoveryTimeoutMs: 250,
        libraryPath: 'C:\\gpib\\ug01.dll',
        fileTransfer: 'adapter',
        fileDirectory: '/data/captures',
        encoding: 'latin1',
        trace: true,
      },
    });
  });

  it('rejects non-integer numbers', () => {
    expect(loadConfig({ GPIB_PORT: '12ab' })).toEqual({ ok: false, error: 'GPIB_PORT must be an integer, got "12ab"' });
  });

  it('rejects a read timeout outside 1-3000 ms', () => {
    expect(loadConfig({ GPIB_TIMEOUT_MS: '0' })).toEqual({
      ok: false,
      error: 'GPIB_TIMEOUT_MS must be between 1 and 3000, got 0',
    });
    expect(loadConfig({ GPIB_TIMEOUT_MS: '3001' }).ok).toBe(false);
  });

  it('rejects an unknown adapter', () => {
    expect(loadConfig({ GPIB_ADAPTER: 'serial' })).toEqual({
      ok: false,
      error: 'GPIB_ADAPTER must be one of network, local, got "serial"',
    });
  });

  it('rejects an unsupported text encoding', () => {
    expect(loadConfig({ GPIB_ENCODING: 'utf16le' })).toEqual({
      ok: false,
      error: 'GPIB_ENCODING must be one of ascii, latin1, utf8, got "utf16le"',
    });
  });

  it('requires a library path for the local adapter', () => {
    expect(loadConfig({ GPIB_ADAPTER: 'local' })).toEqual({
      ok: false,
      error: 'GPIB_LIBRARY_PATH is required when GPIB_ADAPTER=local',
    });
  });
});
