import { describe, it, expect } from 'vitest';
import { isConstellationLetter, normalizeSatelliteId } from '../rinex/satellite.js';

describe('normalizeSatelliteId', () => {
  it('zero-pads the PRN', () => {
    expect(normalizeSatelliteId('G 7')).toEqual({ ok: true, sv: 'G07', system: 'G' });
  });

  it('reads a blank letter as GPS', () => {
    expect(normalizeSatelliteId('  7')).toEqual({ ok: true, sv: 'G07', system: 'G' });
  });

  it('upper-cases the letter', () => {
    expect(normalizeSatelliteId('e11')).toEqual({ ok: true, sv: 'E11', system: 'E' });
  });

  it('reports unknown letters and bad numbers', () => {
    expect(normalizeSatelliteId('X01')).toEqual({ ok: false, sv: 'X01', system: 'X' });
    expect(normalizeSatelliteId('G1a').ok).toBe(false);
  });

  it('rejects PRN 00 and blank slots', () => {
    expect(normalizeSatelliteId('G00')).toEqual({ ok: false, sv: 'G00', system: 'G' });
    expect(normalizeSatelliteId('G  ')).toEqual({ ok: false, sv: 'G00', system: 'G' });
    expect(normalizeSatelliteId('   ')).toEqual({ ok: false, sv: '', system: '' });
    expect(normalizeSatelliteId('')).toEqual({ ok: false, sv: '', system: '' });
  });
});

describe('isConstellationLetter', () => {
  it('knows the seven systems and nothing else', () => {
    expect(['G', 'R', 'E', 'S', 'C', 'J', 'I'].every(isConstellationLetter)).toBe(true);
    expect(isConstellationLetter('M')).toBe(false);
    expect(isConstellationLetter('toString')).toBe(false);
  });
});
