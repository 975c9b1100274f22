import { describe, it, expect } from 'vitest';
import { ScpiParser } from '../scpi-parser.js';

describe('ScpiParser', () => {
  describe('parseNumber', () => {
    it('parses standard numeric responses', () => {
      expect(ScpiParser.parseNumber('1.234')).toEqual({ ok: true, value: 1.234 });
      expect(ScpiParser.parseNumber('-5.67')).toEqual({ ok: true, value: -5.67 });
      expect(ScpiParser.parseNumber('42')).toEqual({ ok: true, value: 42 });
    });

    it('parses scientific notation', () => {
      expect(ScpiParser.parseNumber('+1.23E+06')).toEqual({ ok: true, value: 1.23e6 });
      expect(ScpiParser.parseNumber('-5.67E-03')).toEqual({ ok: true, value: -5.67e-3 });
    });

    it('skips a leading function label', () => {
      expect(ScpiParser.parseNumber('VDC +1.234E+00')).toEqual({ ok: true, value: 1.234 });
    });

    it('handles whitespace', () => {
      expect(ScpiParser.parseNumber('\t42\r\n')).toEqual({ ok: true, value: 42 });
    });

    it('returns error for empty responses', () => {
      expect(ScpiParser.parseNumber('  ')).toEqual({ ok: false, error: 'empty response' });
    });

    it('returns error for the overload marker', () => {
      expect(ScpiParser.parseNumber('9.9E37')).toEqual({ ok: false, error: 'overflow (9.9E37)' });
      expect(ScpiParser.parseNumber('-9.9E37')).toEqual({ ok: false, error: 'overflow (9.9E37)' });
    });

    it('returns error for non-numeric responses', () => {
      expect(ScpiParser.parseNumber('AUTO')).toEqual({ ok: false, error: 'non-numeric response: "AUTO"' });
    });
  });

  describe('parseBool', () => {
    it('accepts 1 and ON in any case', () => {
      expect(ScpiParser.parseBool('1')).toBe(true);
      expect(ScpiParser.parseBool(' on\n')).toBe(true);
    });

    it('treats everything else as false', () => {
      expect(ScpiParser.parseBool('0')).toBe(false);
      expect(ScpiParser.parseBool('OFF')).toBe(false);
      expect(ScpiParser.parseBool('true')).toBe(false);
    });
  });

  describe('parseIdentity', () => {
    it('splits an *IDN? response into its four fields', () => {
      expect(ScpiParser.parseIdentity('ACME INSTRUMENTS,DMM-1,SN0001,1.0.2\n')).toEqual({
        ok: true,
        value: { manufacturer: 'ACME INSTRUMENTS', model: 'DMM-1', serial: 'SN0001', firmware: '1.0.2' },
      });
    });

    it('rejects a response with the wrong number of fields', () => {
      expect(ScpiParser.parseIdentity('ACME,DMM-1')).toEqual({
        ok: false,
        error: 'invalid *IDN? response "ACME,DMM-1", expected <manufacturer>,<model>,<serial>,<firmware>',
      });
    });
  });

  describe('parseError', () => {
    it('parses a quoted error queue entry', () => {
      expect(ScpiParser.parseError('-113,"Undefined header"')).toEqual({
        ok: true,
        value: { code: -113, message: 'Undefined header' },
      });
    });

    it('parses an unquoted entry', () => {
      expect(ScpiParser.parseError('+0, No error')).toEqual({ ok: true, value: { code: 0, message: 'No error' } });
    });

    it('rejects text without a code', () => {
      expect(ScpiParser.parseError('garbage')).toEqual({ ok: false, error: 'invalid error queue entry: "garbage"' });
    });
  });

  describe('isErrorResponseOk', () => {
    it('returns true for no-error responses', () => {
      expect(ScpiParser.isErrorResponseOk('0,No error')).toBe(true);
      expect(ScpiParser.isErrorResponseOk('+0,"No error"')).toBe(true);
      expect(ScpiParser.isErrorResponseOk('  0,No error  ')).toBe(true);
    });

    it('returns false for error responses', () => {
      expect(ScpiParser.isErrorResponseOk('-100,Command error')).toBe(false);
      expect(ScpiParser.isErrorResponseOk('1,Some error')).toBe(false);
    });
  });

  describe('parseCsv', () => {
    it('trims whitespace from each part', () => {
      expect(ScpiParser.parseCsv('  a , b , c  ')).toEqual(['a', 'b', 'c']);
    });
  });
});
