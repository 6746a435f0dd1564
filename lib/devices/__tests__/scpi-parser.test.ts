import { describe, it, expect } from 'vitest';
import { ScpiParser, UNEXPECTED_RESPONSE } from '../scpi-parser.js';
import { Ok, Err } from '../../../shared/types.js';

describe('ScpiParser', () => {
  describe('parseNumber', () => {
    it('parses standard numeric responses', () => {
      expect(ScpiParser.parseNumber('1.234')).toEqual({ ok: true, value: 1.234 });
      expect(ScpiParser.parseNumber('+0.150000')).toEqual({ ok: true, value: 0.15 });
      expect(ScpiParser.parseNumber('-5.67E-03')).toEqual({ ok: true, value: -5.67e-3 });
    });

    it('handles whitespace', () => {
      expect(ScpiParser.parseNumber('  42\r\n')).toEqual({ ok: true, value: 42 });
    });

    it('returns error for empty responses', () => {
      expect(ScpiParser.parseNumber('')).toEqual({ ok: false, error: 'empty response' });
    });

    it('returns error for overflow (9.9E37)', () => {
      expect(ScpiParser.parseNumber('9.9E37')).toEqual({ ok: false, error: 'overflow (9.9E37)' });
    });

    it('returns error for non-numeric responses', () => {
      const result = ScpiParser.parseNumber('AUTO');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe('non-numeric response: "AUTO"');
      }
    });
  });

  describe('decimal-only numbers', () => {
    it('rejects hexadecimal, binary and octal literals', () => {
      expect(ScpiParser.parseNumber('0x10')).toEqual({ ok: false, error: 'non-numeric response: "0x10"' });
      expect(ScpiParser.parseNumber('0b101')).toEqual({ ok: false, error: 'non-numeric response: "0b101"' });
      expect(ScpiParser.parseNumber('0o7')).toEqual({ ok: false, error: 'non-numeric response: "0o7"' });
    });

    it('rejects Infinity', () => {
      expect(ScpiParser.parseNumber('Infinity').ok).toBe(false);
    });

    it('accepts bare leading and trailing decimal points', () => {
      expect(ScpiParser.parseNumber('.5')).toEqual({ ok: true, value: 0.5 });
      expect(ScpiParser.parseNumber('5.')).toEqual({ ok: true, value: 5 });
    });

    it('turns a hexadecimal reply into NaN', () => {
      expect(ScpiParser.parseNumberResult(Ok('0x10'))).toBeNaN();
    });
  });

  describe('parseNumberResult', () => {
    it('returns the number of a successful query', () => {
      expect(ScpiParser.parseNumberResult(Ok('25.125'))).toBe(25.125);
    });

    it('returns NaN on transport failure', () => {
      expect(ScpiParser.parseNumberResult(Err(new Error('Timeout')))).toBeNaN();
    });

    it('returns NaN for garbage', () => {
      expect(ScpiParser.parseNumberResult(Ok('n/a'))).toBeNaN();
    });
  });

  describe('parseBool', () => {
    it('accepts 1, ON and CLOSED in any case', () => {
      expect(ScpiParser.parseBool('1')).toBe(true);
      expect(ScpiParser.parseBool('on')).toBe(true);
      expect(ScpiParser.parseBool(' Closed\n')).toBe(true);
    });

    it('treats everything else as false', () => {
      expect(ScpiParser.parseBool('0')).toBe(false);
      expect(ScpiParser.parseBool('OPEN')).toBe(false);
      expect(ScpiParser.parseBool('')).toBe(false);
    });

    it('is false when the query failed', () => {
      expect(ScpiParser.parseBoolResult(Err(new Error('Timeout')))).toBe(false);
    });
  });

  describe('parseState', () => {
    it('distinguishes on, off and neither', () => {
      expect(ScpiParser.parseState('ON')).toBe(true);
      expect(ScpiParser.parseState('0')).toBe(false);
      expect(ScpiParser.parseState('2')).toBeNull();
    });
  });

  describe('parseEnum', () => {
    const map = { CURR: 'CurrentMode', POW: 'PowerMode' };

    it('maps case-insensitively', () => {
      expect(ScpiParser.parseEnum('curr\n', map)).toEqual({ ok: true, value: 'CurrentMode' });
    });

    it('lists the valid keys on failure', () => {
      expect(ScpiParser.parseEnum('xyz', map)).toEqual({
        ok: false,
        error: 'unknown value "XYZ", expected one of: CURR, POW',
      });
    });
  });

  describe('parseKeyword', () => {
    const map = { CURR: 'CurrentMode', POW: 'PowerMode' } as const;

    it('returns the long name', () => {
      expect(ScpiParser.parseKeyword(Ok('POW'), map)).toBe('PowerMode');
    });

    it('returns the unexpected-response marker for unknown replies', () => {
      expect(ScpiParser.parseKeyword(Ok('VOLT'), map)).toBe(UNEXPECTED_RESPONSE);
    });

    it('returns an empty string on transport failure', () => {
      expect(ScpiParser.parseKeyword(Err(new Error('Timeout')), map)).toBe('');
    });
  });
});
