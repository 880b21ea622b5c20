import { invalidOptions } from '../shared/index.js';
import { toEpochLabel, type EpochLabel } from './epochTime.js';
import type { DataMatrix, RinexDataset } from './types.js';

export function getVariable(ds: RinexDataset, field: string): DataMatrix | null {
  return Object.prototype.hasOwnProperty.call(ds.dataVars, field) ? ds.dataVars[field] : null;
}

/** One cell; null when the time, satellite or field is unknown or the value is absent. */
export function getValue(ds: RinexDataset, time: EpochLabel | Date, sv: string, field: string): number | null {
  const matrix = getVariable(ds, field);
  if (!matrix) return null;
  const t = ds.coords.time.indexOf(toEpochLabel(time));
  const s = ds.coords.sv.indexOf(sv);
  if (t < 0 || s < 0) return null;
  return matrix[t][s];
}

export interface SeriesPoint {
  time: EpochLabel;
  value: number;
}

/** Present values of one field for one satellite, in time order. */
export function satelliteSeries(ds: RinexDataset, sv: string, field: string): SeriesPoint[] {
  const matrix = getVariable(ds, field);
  const s = ds.coords.sv.indexOf(sv);
  if (!matrix || s < 0) return [];
  const points: SeriesPoint[] = [];
  ds.coords.time.forEach((time, t) => {
    const value = matrix[t][s];
    if (value !== null) points.push({ time, value });
  });
  return points;
}

export interface DatasetSelection {
  sv?: readonly string[];
  fields?: readonly string[];
  tlim?: readonly [EpochLabel | Date, EpochLabel | Date];
}

function pickIndices<T>(values: readonly T[], keep: (value: T) => boolean): number[] {
  const indices: number[] = [];
  values.forEach((value, i) => {
    if (keep(value)) indices.push(i);
  });
  return indices;
}

/**
 * A new dataset restricted to the requested satellites, fields and time
 * window. Requested labels missing from the dataset are ignored.
 */
export function selectDataset(ds: RinexDataset, selection: DatasetSelection): RinexDataset {
  let start: EpochLabel | null = null;
  let end: EpochLabel | null = null;
  if (selection.tlim) {
    start = toEpochLabel(selection.tlim[0]);
    end = toEpochLabel(selection.tlim[1]);
    if (start > end) throw invalidOptions(`tlim start ${start} is after end ${end}`);
  }
  const wantedSv = selection.sv ? new Set(selection.sv) : null;
  const wantedFields = selection.fields ? new Set(selection.fields) : null;

  const inWindow = (t: EpochLabel): boolean => (start === null || t >= start) && (end === null || t <= end);
  const ti = pickIndices(ds.coords.time, inWindow);
  const si = pickIndices(ds.coords.sv, sv => wantedSv === null || wantedSv.has(sv));

  const dataVars: Record<string, DataMatrix> = {};
  for (const [name, matrix] of Object.entries(ds.dataVars)) {
    if (wantedFields && !wantedFields.has(name)) continue;
    dataVars[name] = ti.map(t => si.map(s => matrix[t][s]));
  }
  const timeVars: Record<string, (number | null)[]> = {};
  for (const [name, series] of Object.entries(ds.timeVars)) {
    timeVars[name] = ti.map(t => series[t]);
  }

  return {
    ...ds,
    coords: { time: ti.map(t => ds.coords.time[t]), sv: si.map(s => ds.coords.sv[s]) },
    dataVars,
    timeVars,
    warnings: [...ds.warnings],
    events: ds.events.filter(e => e.time === null || inWindow(e.time)),
  };
}

export interface FieldSummary {
  present: number;
  min: number | null;
  max: number | null;
}

export interface DatasetSummary {
  kind: RinexDataset['kind'];
  version: number;
  epochs: number;
  satellites: string[];
  firstTime: EpochLabel | null;
  lastTime: EpochLabel | null;
  interval: number | null;
  timeSystem: string | null;
  fields: Record<string, FieldSummary>;
  warningCounts: Record<string, number>;
  eventCount: number;
}

function summarizeField(matrix: DataMatrix): FieldSummary {
  let present = 0;
  let min: number | null = null;
  let max: number | null = null;
  for (const row of matrix) {
    for (const value of row) {
      if (value === null) continue;
      present += 1;
      if (min === null || value < min) min = value;
      if (max === null || value > max) max = value;
    }
  }
  return { present, min, max };
}

export function summarizeDataset(ds: RinexDataset): DatasetSummary {
  const fields: Record<string, FieldSummary> = {};
  for (const [name, matrix] of Object.entries(ds.dataVars)) {
    fields[name] = summarizeField(matrix);
  }
  const warningCounts: Record<string, number> = {};
  for (const warning of ds.warnings) {
    warningCounts[warning.code] = (warningCounts[warning.code] ?? 0) + 1;
  }
  const { time } = ds.coords;
  return {
    kind: ds.kind,
    version: ds.attrs.version,
    epochs: time.length,
    satellites: [...ds.coords.sv],
    firstTime: time.length > 0 ? time[0] : null,
    lastTime: time.length > 0 ? time[time.length - 1] : null,
    interval: ds.attrs.interval,
    timeSystem: ds.attrs.timeSystem,
    fields,
    warningCounts,
    eventCount: ds.events.length,
  };
}
