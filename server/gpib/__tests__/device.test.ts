import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createGpibDevice } from '../device.js';
import { TransportError } from '../errors.js';
import { createLocalControllerTransport } from '../transports/local-controller.js';
import {
  createSimulatedInstrument,
  createSimulatedLibrary,
  type SimulatedBus,
  type SimulatedInstrument,
} from './simulated-bus.js';
import type { GpibTransport } from '../types.js';

describe('GpibDevice', () => {
  let bus: SimulatedBus;
  let instrument: SimulatedInstrument;
  let transport: GpibTransport;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    instrument = createSimulatedInstrument({
      responses: {
        '*IDN?': 'ACME,PSU-3,SN42,2.1',
        ':SYST:ERR?': '+0,"No error"',
        'VOLT?': '+5.000E+00',
      },
    });
    bus = new Map([[8, instrument]]);
    transport = createLocalControllerTransport(createSimulatedLibrary(bus));
  });

  function device() {
    const created = createGpibDevice(transport, 8);
    if (!created.ok) throw created.error;
    return created.value;
  }

  it('refuses an address outside the bus range', () => {
    const created = createGpibDevice(transport, 0);
    expect(!created.ok && created.error instanceof TransportError && created.error.code).toBe('invalid_address');
  });

  it('routes every call to its own address', async () => {
    const psu = device();

    await psu.write('VOLT 5');
    expect(await psu.query('VOLT?')).toEqual({ ok: true, value: '+5.000E+00' });
    expect(instrument.received).toEqual(['VOLT 5', 'VOLT?']);
  });

  it('identifies the instrument', async () => {
    expect(await device().identify()).toEqual({
      ok: true,
      value: { manufacturer: 'ACME', model: 'PSU-3', serial: 'SN42', firmware: '2.1' },
    });
  });

  it('reports an unparseable identity as malformed_response', async () => {
    instrument.responses['*IDN?'] = 'ACME';

    const result = await device().identify();
    expect(!result.ok && result.error instanceof TransportError && result.error.code).toBe('malformed_response');
    expect(!result.ok && result.error.message).toBe(
      'invalid *IDN? response "ACME", expected <manufacturer>,<model>,<serial>,<firmware>'
    );
  });

  it('keeps no_response for an instrument that never answers', async () => {
    instrument.silent = true;

    const result = await device().identify();
    expect(!result.ok && result.error instanceof TransportError && result.error.code).toBe('no_response');
  });

  it('sends *RST and *CLS', async () => {
    const psu = device();

    await psu.reset();
    await psu.clearStatus();
    expect(instrument.received).toEqual(['*RST', '*CLS']);
  });

  it('returns null when the error queue is empty', async () => {
    expect(await device().nextError()).toEqual({ ok: true, value: null });
  });

  it('returns the next queued error', async () => {
    instrument.responses[':SYST:ERR?'] = '-222,"Data out of range"';
    expect(await device().nextError()).toEqual({ ok: true, value: { code: -222, message: 'Data out of range' } });
  });

  it('reports an unparseable error queue entry as malformed_response', async () => {
    instrument.responses[':SYST:ERR?'] = 'garbage';

    const result = await device().nextError();
    expect(!result.ok && result.error instanceof TransportError && result.error.code).toBe('malformed_response');
  });

  describe('typed queries', () => {
    it('parses a numeric reading', async () => {
      expect(await device().queryNumber('VOLT?')).toEqual({ ok: true, value: 5 });
    });

    it('rejects an overload reading as malformed_response', async () => {
      instrument.responses['MEAS?'] = '+9.90000000E+37';

      const result = await device().queryNumber('MEAS?');
      expect(!result.ok && result.error instanceof TransportError && result.error.code).toBe('malformed_response');
      expect(!result.ok && result.error.message).toBe('MEAS?: overflow (9.9E37)');
    });

    it('reads on/off settings', async () => {
      instrument.responses['OUTP?'] = 'ON';
      instrument.responses['DISP?'] = '0';
      const psu = device();

      expect(await psu.queryBool('OUTP?')).toEqual({ ok: true, value: true });
      expect(await psu.queryBool('DISP?')).toEqual({ ok: true, value: false });
    });

    it('passes transport errors through', async () => {
      instrument.silent = true;

      const result = await device().queryBool('OUTP?');
      expect(!result.ok && result.error instanceof TransportError && result.error.code).toBe('no_response');
    });
  });
});
