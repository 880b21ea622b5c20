/**
 * RINEX 2 observation bodies.
 *
 * An epoch line carries up to 12 satellites; longer lists continue on
 * following lines at the same columns. Each satellite then takes
 * ceil(types / 5) observation lines in list order. One type list applies
 * to every constellation.
 */

import { malformedEpoch } from '../shared/index.js';
import { decodeObservation, epochLabelFromFields, isSpecialRecordFlag, toEpochFlag } from './epochFields.js';
import { decodeFields } from './fieldDecoder.js';
import type { ObsGrammar, ObsGrammarContext } from './grammar.js';
import {
  OBS2_EPOCH_LAYOUT,
  OBS2_OBSERVATIONS_PER_LINE,
  OBS2_SATELLITE_LIST,
  OBSERVATION_SLOT,
} from './layouts.js';
import { padLine, type LineCursor, type SourceLine } from './lineCursor.js';
import { normalizeSatelliteId } from './satellite.js';
import type { ObsEpoch, ObsSatelliteRecord, Observation } from './types.js';

const LINE_WIDTH = 80;

/** Satellite slots of the epoch line and its continuation lines. */
function readSatelliteList(cursor: LineCursor, first: string, count: number, epochLine: number): string[] {
  const { start, slotWidth, perLine } = OBS2_SATELLITE_LIST;
  const slots: string[] = [];
  let line = first;
  while (slots.length < count) {
    if (slots.length > 0 && slots.length % perLine === 0) {
      line = padLine(cursor.nextRequired('the satellite list', epochLine).text, LINE_WIDTH);
    }
    const at = start + (slots.length % perLine) * slotWidth;
    slots.push(line.slice(at, at + slotWidth));
  }
  return slots;
}

function linesPerSatellite(typeCount: number): number {
  return Math.ceil(typeCount / OBS2_OBSERVATIONS_PER_LINE);
}

function readObservationLines(cursor: LineCursor, typeCount: number, sv: string, epochLine: number): SourceLine[] {
  const lines: SourceLine[] = [];
  for (let i = 0; i < linesPerSatellite(typeCount); i += 1) {
    lines.push(cursor.nextRequired(`the observations of ${sv}`, epochLine));
  }
  return lines;
}

function decodeSatellite(lines: SourceLine[], types: readonly string[]): Record<string, Observation> {
  const observations: Record<string, Observation> = {};
  types.forEach((code, index) => {
    const source = lines[Math.floor(index / OBS2_OBSERVATIONS_PER_LINE)];
    const start = (index % OBS2_OBSERVATIONS_PER_LINE) * OBSERVATION_SLOT.width;
    const observation = decodeObservation(padLine(source.text, LINE_WIDTH), source.number, start);
    if (observation) observations[code] = observation;
  });
  return observations;
}

function* parseBody(cursor: LineCursor, ctx: ObsGrammarContext): Generator<ObsEpoch, void, undefined> {
  const globalTypes = ctx.header.observationTypes.kind === 'global' ? ctx.header.observationTypes.types : [];
  const typeCount = globalTypes.length;

  for (let source = cursor.next(); source !== null; source = cursor.next()) {
    if (source.text.trim().length === 0) continue;
    const line = padLine(source.text, LINE_WIDTH);
    const fields = decodeFields(line, source.number, OBS2_EPOCH_LAYOUT);
    const flag = toEpochFlag(fields.get('flag'), source.number);
    const count = fields.get('count') ?? 0;
    const time = epochLabelFromFields(fields, source.number, true);
    const epoch: ObsEpoch = {
      kind: 'obs',
      time,
      flag,
      clockOffset: fields.get('clockOffset'),
      line: source.number,
      satellites: [],
      specialRecords: [],
    };

    // Flags 2-5: the count is the number of special-record lines that follow.
    if (isSpecialRecordFlag(flag)) {
      for (let i = 0; i < count; i += 1) {
        epoch.specialRecords.push(cursor.nextRequired('the special records', source.number).text);
      }
      yield epoch;
      continue;
    }

    if (time === null) {
      throw malformedEpoch('Observation epoch has no date', { line: source.number });
    }
    const slots = readSatelliteList(cursor, line, count, source.number);
    for (const slot of slots) {
      const id = normalizeSatelliteId(slot);
      const lines = readObservationLines(cursor, typeCount, id.sv || 'a blank slot', source.number);

      // Cycle-slip records share the observation layout but are only reported.
      if (flag === 6) {
        epoch.specialRecords.push(...lines.map(l => l.text));
        continue;
      }
      if (!id.ok) {
        ctx.warn({
          code: 'UNKNOWN_CONSTELLATION',
          message: id.sv === '' ? 'Blank satellite slot; observations skipped' : `Unknown satellite "${slot}"; observations skipped`,
          line: source.number,
          sv: id.sv,
          time,
        });
        continue;
      }

      const types = ctx.observationTable.get(id.system) ?? globalTypes;
      const record: ObsSatelliteRecord = {
        sv: id.sv,
        system: id.system,
        line: lines.length > 0 ? lines[0].number : source.number,
        observations: decodeSatellite(lines, types),
      };
      epoch.satellites.push(record);
    }
    yield epoch;
  }
}

export const obs2Grammar: ObsGrammar = { name: 'v2-obs', parseBody };
