import { describe, it, expect } from 'vitest';
import { decodeRinex } from '../rinex/decode.js';
import { getValue, getVariable, satelliteSeries, selectDataset, summarizeDataset } from '../rinex/query.js';
import { obs, obs3Epoch, obs3Header, text } from './rinexLines.js';

const ds = decodeRinex(text([
  ...obs3Header({ G: ['C1C', 'L1C'], E: ['C1X'] }),
  obs3Epoch([2021, 3, 15, 0, 0, 0], 0, 2),
  'G01' + obs(100) + obs(1000),
  'E11' + obs(200),
  obs3Epoch([2021, 3, 15, 0, 0, 30], 0, 1),
  'G01' + obs(101),
  obs3Epoch([2021, 3, 15, 0, 0, 45], 5, 0),
  obs3Epoch([2021, 3, 15, 0, 1, 0], 0, 2),
  'G01' + obs(102) + obs(1002),
  'E11' + obs(202),
]));

describe('getValue / getVariable', () => {
  it('reads one cell by label or Date', () => {
    expect(getValue(ds, '2021-03-15T00:00:30.0000000', 'G01', 'C1C')).toBe(101);
    expect(getValue(ds, new Date(Date.UTC(2021, 2, 15, 0, 1, 0)), 'E11', 'C1X')).toBe(202);
  });

  it('returns null for absent values and unknown keys', () => {
    expect(getValue(ds, '2021-03-15T00:00:30.0000000', 'E11', 'C1X')).toBeNull();
    expect(getValue(ds, '2021-03-15T00:00:30.0000000', 'G09', 'C1C')).toBeNull();
    expect(getValue(ds, '2021-03-15T00:00:30.0000000', 'G01', 'S1C')).toBeNull();
    expect(getVariable(ds, 'toString')).toBeNull();
  });
});

describe('satelliteSeries', () => {
  it('lists present values in time order', () => {
    expect(satelliteSeries(ds, 'G01', 'L1C')).toEqual([
      { time: '2021-03-15T00:00:00.0000000', value: 1000 },
      { time: '2021-03-15T00:01:00.0000000', value: 1002 },
    ]);
    expect(satelliteSeries(ds, 'J01', 'L1C')).toEqual([]);
  });
});

describe('selectDataset', () => {
  it('restricts satellites, fields and time', () => {
    const sub = selectDataset(ds, {
      sv: ['E11'],
      fields: ['C1X'],
      tlim: ['2021-03-15T00:00:30Z', '2021-03-15T00:01:00Z'],
    });
    expect(sub.coords).toEqual({
      time: ['2021-03-15T00:00:30.0000000', '2021-03-15T00:01:00.0000000'],
      sv: ['E11'],
    });
    expect(sub.dataVars).toEqual({ C1X: [[null], [202]] });
    expect(sub.timeVars.epochFlag).toEqual([0, 0]);
    expect(sub.events.map(e => e.flag)).toEqual([5]);
  });

  it('drops events outside the window', () => {
    const sub = selectDataset(ds, { tlim: ['2021-03-15T00:01:00Z', '2021-03-15T00:02:00Z'] });
    expect(sub.events).toEqual([]);
    expect(sub.coords.time).toEqual(['2021-03-15T00:01:00.0000000']);
  });

  it('rejects a reversed window', () => {
    expect(() => selectDataset(ds, { tlim: ['2021-03-15T01:00:00Z', '2021-03-15T00:00:00Z'] }))
      .toThrow(/is after end/);
  });
});

describe('summarizeDataset', () => {
  it('counts present values and ranges', () => {
    const summary = summarizeDataset(ds);
    expect(summary).toMatchObject({
      kind: 'obs',
      version: 3.04,
      epochs: 3,
      satellites: ['G01', 'E11'],
      firstTime: '2021-03-15T00:00:00.0000000',
      lastTime: '2021-03-15T00:01:00.0000000',
      interval: 30,
      timeSystem: 'GPS',
      warningCounts: {},
      eventCount: 1,
    });
    expect(summary.fields).toEqual({
      C1C: { present: 3, min: 100, max: 102 },
      L1C: { present: 2, min: 1000, max: 1002 },
      C1X: { present: 2, min: 200, max: 202 },
    });
  });
});
