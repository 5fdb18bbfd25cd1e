import { describe, it, expect } from 'vitest';
import { AirportDirectory } from '../AirportDirectory';

describe('AirportDirectory', () => {
  const directory = AirportDirectory.fromDefaults();

  describe('resolveAirport', () => {
    it('passes four-letter ICAO codes through', () => {
      expect(directory.resolveAirport('ENSB')).toBe('ENSB');
      expect(directory.resolveAirport('ZZZZ')).toBe('ZZZZ');
    });

    it('treats three letters as IATA regardless of case', () => {
      expect(directory.resolveAirport('LHR')).toBe('EGLL');
      expect(directory.resolveAirport('syd')).toBe('YSSY');
      expect(directory.resolveAirport('XQX')).toBeNull();
    });

    it('looks up names case-insensitively', () => {
      expect(directory.resolveAirport('Heathrow')).toBe('EGLL');
      expect(directory.resolveAirport('  Longyearbyen ')).toBe('ENSB');
      expect(directory.resolveAirport('Ushuaia')).toBe('SAWH');
      expect(directory.resolveAirport('Ushuai')).toBe('SAWH');
    });

    it('falls back to the closest name within the typo allowance', () => {
      expect(directory.resolveAirport('Madris')).toBe('LEMD');
      expect(directory.resolveAirport('Longyearbyn')).toBe('ENSB');
    });

    it('returns null when nothing is close enough', () => {
      expect(directory.resolveAirport('Qwxyzville')).toBeNull();
      expect(directory.resolveAirport('nowhere special')).toBeNull();
    });

    it('breaks fuzzy ties on the lexically smallest name', () => {
      const forward = new AirportDirectory({
        names: { abcd: 'AAAA', abce: 'BBBB' },
        iataToIcao: {},
        cityAirports: {}
      });
      const reversed = new AirportDirectory({
        names: { abce: 'BBBB', abcd: 'AAAA' },
        iataToIcao: {},
        cityAirports: {}
      });

      expect(forward.resolveAirport('abcf')).toBe('AAAA');
      expect(reversed.resolveAirport('abcf')).toBe('AAAA');
    });
  });

  describe('resolveCityAirports', () => {
    it('expands multi-airport cities to ICAO and IATA codes', () => {
      expect(directory.resolveCityAirports('London')).toEqual(new Set([
        'EGLL', 'LHR', 'EGKK', 'LGW', 'EGSS', 'STN', 'EGGW', 'LTN', 'EGLC', 'LCY'
      ]));
      expect(directory.resolveCityAirports('new york')).toEqual(new Set([
        'KJFK', 'JFK', 'KEWR', 'EWR', 'KLGA', 'LGA'
      ]));
    });

    it('falls back to a single airport', () => {
      expect(directory.resolveCityAirports('Heathrow')).toEqual(new Set(['EGLL', 'LHR']));
      expect(directory.resolveCityAirports('SYD')).toEqual(new Set(['YSSY', 'SYD']));
    });

    it('is empty for unknown places', () => {
      expect(directory.resolveCityAirports('Qwxyzville').size).toBe(0);
    });
  });

  describe('code conversion', () => {
    it('maps between IATA and ICAO', () => {
      expect(directory.toIcao('NRT')).toBe('RJAA');
      expect(directory.toIata('RJAA')).toBe('NRT');
      expect(directory.toIata('QQQQ')).toBeUndefined();
    });

    it('adds the counterpart of every known code', () => {
      expect(directory.expandCodes(['YSSY'])).toEqual(new Set(['YSSY', 'SYD']));
      expect(directory.expandCodes(['LYR', 'QQQ'])).toEqual(new Set(['LYR', 'ENSB', 'QQQ']));
    });
  });
});
