/**
 * Pieces shared by the version 2 and version 3 record grammars.
 */

import { malformedEpoch } from '../shared/index.js';
import { expandTwoDigitYear, makeEpochLabel, type EpochLabel } from './epochTime.js';
import type { DecodedFields } from './fieldDecoder.js';
import { decodeFloat, decodeInt } from './fortranNumber.js';
import { OBSERVATION_SLOT } from './layouts.js';
import type { EpochFlag, Observation } from './types.js';

export type TimeField = 'year' | 'month' | 'day' | 'hour' | 'minute' | 'second';

/**
 * Build the epoch label from decoded date fields. Returns null when the date
 * is entirely blank, which RINEX allows on event epochs.
 */
export function epochLabelFromFields(
  fields: DecodedFields<TimeField>,
  lineNo: number,
  twoDigitYear: boolean,
): EpochLabel | null {
  const year = fields.get('year');
  const month = fields.get('month');
  const day = fields.get('day');
  const hour = fields.get('hour');
  const minute = fields.get('minute');
  const second = fields.get('second');

  if (year === null && month === null && day === null && hour === null && minute === null && second === null) {
    return null;
  }
  if (year === null || month === null || day === null) {
    throw malformedEpoch('Epoch date is incomplete', { line: lineNo });
  }
  return makeEpochLabel(
    {
      year: twoDigitYear ? expandTwoDigitYear(year) : year,
      month,
      day,
      hour: hour ?? 0,
      minute: minute ?? 0,
      second: second ?? 0,
    },
    lineNo,
  );
}

export function toEpochFlag(value: number | null, lineNo: number): EpochFlag {
  const flag = value ?? 0;
  switch (flag) {
    case 0: case 1: case 2: case 3: case 4: case 5: case 6:
      return flag;
    default:
      throw malformedEpoch(`Unknown epoch flag ${flag}`, { line: lineNo });
  }
}

/** Flags 2-5 announce special records instead of observation data. */
export function isSpecialRecordFlag(flag: EpochFlag): boolean {
  return flag >= 2 && flag <= 5;
}

/**
 * Decode the observation slot starting at `start`: F14.3 value, then the
 * loss-of-lock and signal-strength digits. A blank value means the
 * observation is absent, whatever the indicator columns hold.
 */
export function decodeObservation(line: string, lineNo: number, start: number): Observation | null {
  const valueEnd = start + OBSERVATION_SLOT.valueWidth;
  const value = decodeFloat(line.slice(start, valueEnd), { line: lineNo, start, end: valueEnd });
  if (value === null) return null;

  const lliAt = start + OBSERVATION_SLOT.lliOffset;
  const ssiAt = start + OBSERVATION_SLOT.ssiOffset;
  return {
    value,
    lli: decodeInt(line.slice(lliAt, lliAt + 1), { line: lineNo, start: lliAt, end: lliAt + 1 }),
    ssi: decodeInt(line.slice(ssiAt, ssiAt + 1), { line: lineNo, start: ssiAt, end: ssiAt + 1 }),
  };
}
