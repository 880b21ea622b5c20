import { describe, it, expect } from 'vitest';
import { decodeRinex, iterateRinex } from '../rinex/decode.js';
import type { DecodeWarning, ObsEpoch } from '../rinex/types.js';
import { RinexDecodeError } from '../shared/index.js';
import { obs, obs3Epoch, obs3Header, text } from './rinexLines.js';

const GPS = { G: ['C1C', 'L1C', 'D1C', 'S1C'] };
const T0 = [2021, 3, 15, 0, 0, 0] as const;

function epochs(lines: string[], warnings: DecodeWarning[] = []): ObsEpoch[] {
  const out: ObsEpoch[] = [];
  for (const record of iterateRinex(text(lines), w => warnings.push(w))) {
    if (record.kind === 'obs') out.push(record);
  }
  return out;
}

function decodeError(lines: string[]): RinexDecodeError {
  try {
    decodeRinex(text(lines));
  } catch (err) {
    if (err instanceof RinexDecodeError) return err;
    throw err;
  }
  throw new Error('expected a RinexDecodeError');
}

describe('RINEX 3 observation epochs', () => {
  it('reads values and indicators by fixed column', () => {
    const [epoch] = epochs([...obs3Header(GPS, 'G'), obs3Epoch(T0, 0, 1), 'G01  20000000.000 5 105000000.00008']);
    expect(epoch.satellites).toHaveLength(1);
    expect(epoch.satellites[0].observations).toEqual({
      C1C: { value: 20000000, lli: null, ssi: 5 },
      L1C: { value: 105000000, lli: 0, ssi: 8 },
    });
  });

  it('reads the receiver clock offset from the epoch line', () => {
    const line = `${obs3Epoch(T0, 0, 1)}${' '.repeat(6)}${(0.000000125).toFixed(12).padStart(15)}`;
    const [epoch] = epochs([...obs3Header(GPS, 'G'), line, 'G01' + obs(1)]);
    expect(epoch.clockOffset).toBe(1.25e-7);
  });

  it('treats missing trailing slots as absent', () => {
    const [epoch] = epochs([...obs3Header(GPS, 'G'), obs3Epoch(T0, 0, 1), 'G01' + obs(20000000)]);
    expect(Object.keys(epoch.satellites[0].observations)).toEqual(['C1C']);
  });

  it('keeps a satellite whose system declares no types, with a warning', () => {
    const warnings: DecodeWarning[] = [];
    const [epoch] = epochs([...obs3Header(GPS), obs3Epoch(T0, 0, 1), 'C06' + obs(38000000)], warnings);
    expect(epoch.satellites).toEqual([{ sv: 'C06', system: 'C', line: 5, observations: {} }]);
    expect(warnings.map(w => w.code)).toEqual(['UNKNOWN_CONSTELLATION_OBSERVATION_SET']);
  });

  it('skips unknown constellations with a warning', () => {
    const warnings: DecodeWarning[] = [];
    const [epoch] = epochs([...obs3Header(GPS), obs3Epoch(T0, 0, 2), 'X01' + obs(1), 'G02' + obs(2)], warnings);
    expect(epoch.satellites.map(s => s.sv)).toEqual(['G02']);
    expect(warnings).toEqual([{
      code: 'UNKNOWN_CONSTELLATION',
      message: 'Unknown satellite "X01"; line skipped',
      line: 5,
      sv: 'X01',
    }]);
  });

  it('keeps satellites outside a single-system file but warns', () => {
    const warnings: DecodeWarning[] = [];
    const [epoch] = epochs([
      ...obs3Header({ G: ['C1C'], E: ['C1X'] }, 'G'),
      obs3Epoch(T0, 0, 1),
      'E11' + obs(23000000),
    ], warnings);
    expect(epoch.satellites[0].observations.C1X.value).toBe(23000000);
    expect(warnings.map(w => w.code)).toEqual(['CONSTELLATION_MISMATCH']);
  });

  it('warns about stray lines between epochs', () => {
    const warnings: DecodeWarning[] = [];
    const out = epochs([...obs3Header(GPS), 'stray', obs3Epoch(T0, 0, 1), 'G01' + obs(1)], warnings);
    expect(out).toHaveLength(1);
    expect(warnings).toEqual([{ code: 'UNEXPECTED_LINE', message: 'Line outside an epoch skipped', line: 4 }]);
  });

  it('skips PRN 00 and blank satellite ids without touching other records', () => {
    const warnings: DecodeWarning[] = [];
    const [epoch] = epochs([
      ...obs3Header(GPS),
      obs3Epoch(T0, 0, 3),
      'G00' + obs(1),
      '   ' + obs(2),
      'G02' + obs(3),
    ], warnings);
    expect(epoch.satellites.map(s => s.sv)).toEqual(['G02']);
    expect(warnings).toEqual([
      { code: 'UNKNOWN_CONSTELLATION', message: 'Unknown satellite "G00"; line skipped', line: 5, sv: 'G00' },
      { code: 'UNKNOWN_CONSTELLATION', message: 'Blank satellite slot; line skipped', line: 6, sv: '' },
    ]);
  });

  it('names the satellite of a data line found before any epoch', () => {
    const warnings: DecodeWarning[] = [];
    const out = epochs([...obs3Header(GPS), 'G01' + obs(1), obs3Epoch(T0, 0, 1), 'G02' + obs(2)], warnings);
    expect(out.map(e => e.satellites.map(s => s.sv))).toEqual([['G02']]);
    expect(warnings).toEqual([{
      code: 'UNEXPECTED_LINE',
      message: 'Observations of G01 outside an epoch skipped',
      line: 4,
      sv: 'G01',
    }]);
  });

  it('keeps the data of a power-failure epoch and stays in step', () => {
    const out = epochs([
      ...obs3Header(GPS),
      obs3Epoch(T0, 1, 2),
      'G01' + obs(1),
      'G02' + obs(2),
      obs3Epoch([2021, 3, 15, 0, 0, 30], 0, 1),
      'G01' + obs(3),
    ]);
    expect(out.map(e => [e.time, e.flag, e.satellites.map(s => s.sv)])).toEqual([
      ['2021-03-15T00:00:00.0000000', 1, ['G01', 'G02']],
      ['2021-03-15T00:00:30.0000000', 0, ['G01']],
    ]);
  });

  it('collects special records after an event epoch', () => {
    const [event] = epochs([
      ...obs3Header(GPS),
      obs3Epoch([2021, 3, 15, 0, 0, 45], 3, 1),
      'NEW SITE',
    ]);
    expect(event.time).toBe('2021-03-15T00:00:45.0000000');
    expect(event.flag).toBe(3);
    expect(event.specialRecords).toEqual(['NEW SITE']);
  });
});

describe('RINEX 3 observation failures', () => {
  it('reports an epoch cut short by the next epoch line', () => {
    const err = decodeError([
      ...obs3Header(GPS),
      obs3Epoch(T0, 0, 2),
      'G01' + obs(1),
      obs3Epoch([2021, 3, 15, 0, 0, 30], 0, 1),
      'G01' + obs(2),
    ]);
    expect(err.code).toBe('TRUNCATED_RECORD');
    expect(err.data).toEqual({ line: 4, nextRecordLine: 6 });
  });

  it('reports an epoch cut short by the end of input', () => {
    const err = decodeError([...obs3Header(GPS), obs3Epoch(T0, 0, 2), 'G01' + obs(1)]);
    expect(err.code).toBe('TRUNCATED_RECORD');
    expect(err.data).toEqual({ line: 4, endOfInput: true });
  });

  it('rejects a data epoch without a date', () => {
    const err = decodeError([...obs3Header(GPS), `>${' '.repeat(30)}0  1`, 'G01' + obs(1)]);
    expect(err.code).toBe('MALFORMED_EPOCH');
    expect(err.message).toBe('Observation epoch has no date (line 4)');
  });

  it('rejects a day the month does not have', () => {
    const err = decodeError([...obs3Header(GPS), obs3Epoch([2021, 2, 31, 0, 0, 0], 0, 1), 'G01' + obs(1)]);
    expect(err.code).toBe('MALFORMED_EPOCH');
    expect(err.data.line).toBe(4);
  });

  it('rejects a partial date', () => {
    const err = decodeError([...obs3Header(GPS), '> 2021', 'G01' + obs(1)]);
    expect(err.code).toBe('MALFORMED_EPOCH');
    expect(err.message).toBe('Epoch date is incomplete (line 4)');
  });
});

describe('RINEX 3 indicator variables', () => {
  it('adds lli for carrier phase only and ssi for every code', () => {
    const ds = decodeRinex(
      text([...obs3Header(GPS, 'G'), obs3Epoch(T0, 0, 1), 'G01  20000000.000 5 105000000.00008']),
      { useIndicators: true },
    );
    expect(Object.keys(ds.dataVars)).toEqual([
      'C1C', 'C1Cssi', 'L1C', 'L1Clli', 'L1Cssi', 'D1C', 'D1Cssi', 'S1C', 'S1Cssi',
    ]);
    expect(ds.dataVars.C1Cssi).toEqual([[5]]);
    expect(ds.dataVars.L1Clli).toEqual([[0]]);
    expect(ds.dataVars.L1Cssi).toEqual([[8]]);
    expect(ds.dataVars.D1Cssi).toEqual([[null]]);
  });
});

describe('RINEX 3 observation datasets', () => {
  it('puts satellites of systems without declared types on the axis', () => {
    const lines = [...obs3Header(GPS), obs3Epoch(T0, 0, 2), 'G01' + obs(1), 'C06' + obs(38000000)];
    const ds = decodeRinex(text(lines));
    expect(ds.coords.sv).toEqual(['G01', 'C06']);
    expect(ds.dataVars.C1C).toEqual([[1, null]]);
    expect(ds.warnings.map(w => w.code)).toEqual(['UNKNOWN_CONSTELLATION_OBSERVATION_SET']);
    expect(decodeRinex(text(lines), { use: ['G'] }).coords.sv).toEqual(['G01']);
  });

  it('records a power-failure epoch beside the next one', () => {
    const ds = decodeRinex(text([
      ...obs3Header(GPS),
      obs3Epoch(T0, 1, 2),
      'G01' + obs(1),
      'G02' + obs(2),
      obs3Epoch([2021, 3, 15, 0, 0, 30], 0, 1),
      'G01' + obs(3),
    ]));
    expect(ds.coords.time).toEqual(['2021-03-15T00:00:00.0000000', '2021-03-15T00:00:30.0000000']);
    expect(ds.dataVars.C1C).toEqual([[1, 2], [3, null]]);
    expect(ds.timeVars.epochFlag).toEqual([1, 0]);
    expect(ds.events).toEqual([]);
  });
});
