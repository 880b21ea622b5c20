import { truncatedRecord } from '../shared/index.js';
import type { EpochLabel } from './epochTime.js';
import type { DecodedFields } from './fieldDecoder.js';
import { sliceFloat } from './fortranNumber.js';
import { ORBIT_LINE, type NavEpochField, type NavSystemLayout } from './layouts.js';
import { padLine, type LineCursor } from './lineCursor.js';
import type { ConstellationLetter } from './satellite.js';
import type { NavRecord } from './types.js';

export interface NavRecordStart {
  sv: string;
  system: ConstellationLetter;
  time: EpochLabel;
  line: number;
  fields: DecodedFields<NavEpochField>;
}

/**
 * Read the broadcast-orbit lines that follow a record line and build the
 * record. A line with text inside the indent is the start of another record,
 * so the current one is short.
 */
export function readNavRecord(
  cursor: LineCursor,
  start: NavRecordStart,
  layout: NavSystemLayout,
  indent: number,
): NavRecord {
  const parameters: Record<string, number> = {};
  const clock = [start.fields.get('clock0'), start.fields.get('clock1'), start.fields.get('clock2')] as const;
  layout.clock.forEach((name, i) => {
    const value = clock[i];
    if (value !== null) parameters[name] = value;
  });

  const width = indent + ORBIT_LINE.perLine * ORBIT_LINE.width;
  layout.orbits.forEach((names, index) => {
    const source = cursor.nextRequired(`the orbit lines of ${start.sv}`, start.line);
    if (source.text.slice(0, indent).trim().length > 0) {
      throw truncatedRecord(
        `Record for ${start.sv} has ${index} of ${layout.orbits.length} orbit lines`,
        { line: start.line, nextRecordLine: source.number },
      );
    }
    const line = padLine(source.text, width);
    names.forEach((name, k) => {
      if (name === null) return;
      const from = indent + k * ORBIT_LINE.width;
      const value = sliceFloat(line, source.number, from, from + ORBIT_LINE.width);
      if (value !== null) parameters[name] = value;
    });
  });

  return {
    kind: 'nav',
    sv: start.sv,
    system: start.system,
    time: start.time,
    line: start.line,
    clockBias: clock[0],
    clockDrift: clock[1],
    clockDriftRate: clock[2],
    parameters,
  };
}
