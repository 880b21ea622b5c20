import { describe, it, expect } from 'vitest';
import { DatasetBuilder } from '../rinex/assembler.js';
import type { DecodeWarning } from '../rinex/types.js';

const T0 = '2021-03-15T00:00:00.0000000';
const T1 = '2021-03-15T00:00:30.0000000';

function builder(): { b: DatasetBuilder; warnings: DecodeWarning[] } {
  const warnings: DecodeWarning[] = [];
  return { b: new DatasetBuilder(w => warnings.push(w)), warnings };
}

describe('DatasetBuilder', () => {
  it('fills absent cells with null and keeps declared fields', () => {
    const { b } = builder();
    b.declareField('C1C');
    b.declareField('L1C');
    b.beginEpoch(T0, 1);
    b.addRecord(T0, 'G01', { C1C: 1 }, 2);
    b.addRecord(T0, 'E11', { C1C: 2 }, 3);
    const tables = b.finalize();
    expect(tables.sv).toEqual(['G01', 'E11']);
    expect(tables.dataVars).toEqual({ C1C: [[1, 2]], L1C: [[null, null]] });
  });

  it('replaces a whole cell on a duplicate and warns', () => {
    const { b, warnings } = builder();
    b.addRecord(T0, 'G01', { C1C: 1, L1C: 2 }, 5);
    b.addRecord(T0, 'G01', { C1C: 3 }, 9);
    expect(b.finalize().dataVars).toEqual({ C1C: [[3]], L1C: [[null]] });
    expect(warnings).toEqual([{
      code: 'DUPLICATE_RECORD',
      message: `Second record for G01 at ${T0} replaces the first`,
      line: 9,
      sv: 'G01',
      time: T0,
    }]);
  });

  it('sorts the time axis and carries rows and time values with it', () => {
    const { b, warnings } = builder();
    b.beginEpoch(T1, 1);
    b.setTimeValue(T1, 'clockOffset', 0.5);
    b.addRecord(T1, 'G01', { C1C: 2 }, 2);
    b.beginEpoch(T0, 3);
    b.setTimeValue(T0, 'clockOffset', null);
    b.addRecord(T0, 'G01', { C1C: 1 }, 4);

    const tables = b.finalize();
    expect(tables.time).toEqual([T0, T1]);
    expect(tables.dataVars.C1C).toEqual([[1], [2]]);
    expect(tables.timeVars.clockOffset).toEqual([null, 0.5]);
    expect(warnings.map(w => w.code)).toEqual(['NON_MONOTONIC_EPOCH']);
    expect(b.epochCount).toBe(2);
  });

  it('keeps epochs with no satellites on the axis', () => {
    const { b } = builder();
    b.declareField('C1C');
    b.beginEpoch(T0, 1);
    expect(b.finalize()).toEqual({ time: [T0], sv: [], dataVars: { C1C: [[]] }, timeVars: {} });
  });
});
