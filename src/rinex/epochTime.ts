/**
 * Epoch timestamps.
 *
 * Times are carried as fixed-width labels `YYYY-MM-DDTHH:MM:SS.fffffff`
 * (100 ns ticks, the resolution of the F11.7 seconds field). Fixed width
 * means lexicographic order is chronological order.
 */

import { invalidOptions, malformedEpoch } from '../shared/index.js';

export interface EpochParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

export type EpochLabel = string;

const TICKS_PER_SECOND = 10_000_000;
const LABEL_RE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d{7})$/;
const ISO_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?Z?$/;

/** Two-digit RINEX 2 years: 80-99 are 1980-1999, 00-79 are 2000-2079. */
export function expandTwoDigitYear(yy: number): number {
  if (yy >= 100) return yy;
  return yy < 80 ? 2000 + yy : 1900 + yy;
}

function utcMillis(year: number, month: number, day: number, hour: number, minute: number, second: number): number {
  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);
  return date.getTime();
}

function daysInMonth(year: number, month: number): number {
  const date = new Date(0);
  date.setUTCFullYear(year, month, 0);
  return date.getUTCDate();
}

function formatLabel(ms: number, ticks: number): EpochLabel {
  return `${new Date(ms).toISOString().slice(0, 19)}.${String(ticks).padStart(7, '0')}`;
}

export function makeEpochLabel(parts: EpochParts, line?: number): EpochLabel {
  const { year, month, day, hour, minute, second } = parts;
  if (
    !Number.isInteger(year) || month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month) ||
    hour < 0 || hour > 24 || minute < 0 || minute > 59 || second < 0 || second >= 61
  ) {
    throw malformedEpoch(
      `Epoch date out of range: ${year}-${month}-${day} ${hour}:${minute}:${second}`,
      line === undefined ? {} : { line },
    );
  }
  let whole = Math.floor(second);
  let ticks = Math.round((second - whole) * TICKS_PER_SECOND);
  if (ticks === TICKS_PER_SECOND) {
    whole += 1;
    ticks = 0;
  }
  return formatLabel(utcMillis(year, month, day, hour, minute, whole), ticks);
}

interface LabelInstant {
  ms: number;
  ticks: number;
}

function parseLabel(label: EpochLabel): LabelInstant {
  const m = LABEL_RE.exec(label);
  if (!m) throw invalidOptions(`Not an epoch label: ${label}`);
  const [, y, mo, d, h, mi, s, frac] = m;
  return {
    ms: utcMillis(Number(y), Number(mo), Number(d), Number(h), Number(mi), Number(s)),
    ticks: Number(frac),
  };
}

/** Seconds from `a` to `b`. */
export function secondsBetween(a: EpochLabel, b: EpochLabel): number {
  const ia = parseLabel(a);
  const ib = parseLabel(b);
  return (ib.ms - ia.ms) / 1000 + (ib.ticks - ia.ticks) / TICKS_PER_SECOND;
}

export function epochToDate(label: EpochLabel): Date {
  const { ms, ticks } = parseLabel(label);
  return new Date(ms + Math.floor(ticks / 10_000));
}

/**
 * Accept an ISO-8601 UTC string, an epoch label or a Date and return the
 * epoch label, for comparing user-supplied bounds against the time axis.
 */
export function toEpochLabel(value: string | Date): EpochLabel {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) throw invalidOptions('Invalid Date');
    return formatLabel(value.getTime() - value.getUTCMilliseconds(), value.getUTCMilliseconds() * 10_000);
  }
  const m = ISO_RE.exec(value.trim());
  if (!m) throw invalidOptions(`Invalid time: ${value}`);
  const [, y, mo, d, h, mi, s, frac] = m;
  const second = Number(s ?? '0') + (frac ? Number(`0.${frac}`) : 0);
  return makeEpochLabel({
    year: Number(y),
    month: Number(mo),
    day: Number(d),
    hour: Number(h ?? '0'),
    minute: Number(mi ?? '0'),
    second,
  });
}
