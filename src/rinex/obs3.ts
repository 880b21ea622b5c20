/**
 * RINEX 3 observation bodies: a `>` epoch line followed by one line per
 * satellite, each starting with the satellite id. Observation slots match
 * the type list of the satellite's constellation by position.
 */

import { malformedEpoch, truncatedRecord } from '../shared/index.js';
import { decodeObservation, epochLabelFromFields, isSpecialRecordFlag, toEpochFlag } from './epochFields.js';
import { decodeFields } from './fieldDecoder.js';
import type { ObsGrammar, ObsGrammarContext } from './grammar.js';
import { OBS3_EPOCH_LAYOUT, OBS3_SATELLITE_ID_WIDTH, OBSERVATION_SLOT } from './layouts.js';
import { padLine, type LineCursor, type SourceLine } from './lineCursor.js';
import { normalizeSatelliteId } from './satellite.js';
import type { DecodeWarning, ObsEpoch, ObsSatelliteRecord, Observation } from './types.js';

const EPOCH_MARKER = '>';
const EPOCH_LINE_WIDTH = 56;

function decodeSatelliteLine(source: SourceLine, types: readonly string[]): Record<string, Observation> {
  const line = padLine(source.text, OBS3_SATELLITE_ID_WIDTH + types.length * OBSERVATION_SLOT.width);
  const observations: Record<string, Observation> = {};
  types.forEach((code, index) => {
    const observation = decodeObservation(line, source.number, OBS3_SATELLITE_ID_WIDTH + index * OBSERVATION_SLOT.width);
    if (observation) observations[code] = observation;
  });
  return observations;
}

function satelliteRecord(source: SourceLine, ctx: ObsGrammarContext): ObsSatelliteRecord | null {
  const slot = source.text.slice(0, OBS3_SATELLITE_ID_WIDTH);
  const id = normalizeSatelliteId(slot);
  if (!id.ok) {
    ctx.warn({
      code: 'UNKNOWN_CONSTELLATION',
      message: id.sv === '' ? 'Blank satellite slot; line skipped' : `Unknown satellite "${slot.trim()}"; line skipped`,
      line: source.number,
      sv: id.sv,
    });
    return null;
  }

  const declared = ctx.header.satelliteSystem;
  if (declared !== 'M' && declared !== '' && declared !== id.system) {
    ctx.warn({
      code: 'CONSTELLATION_MISMATCH',
      message: `Satellite ${id.sv} in a file declared for system ${declared}`,
      line: source.number,
      sv: id.sv,
    });
  }

  const types = ctx.observationTable.get(id.system);
  if (!types) {
    ctx.warn({
      code: 'UNKNOWN_CONSTELLATION_OBSERVATION_SET',
      message: `No observation types declared for system ${id.system}; ${id.sv} has no fields`,
      line: source.number,
      sv: id.sv,
    });
  }
  return {
    sv: id.sv,
    system: id.system,
    line: source.number,
    observations: types ? decodeSatelliteLine(source, types) : {},
  };
}

/** A satellite line with no epoch above it is named, so lost data stands apart from junk. */
function strayLineWarning(source: SourceLine): DecodeWarning {
  const id = normalizeSatelliteId(source.text.slice(0, OBS3_SATELLITE_ID_WIDTH));
  if (!id.ok) return { code: 'UNEXPECTED_LINE', message: 'Line outside an epoch skipped', line: source.number };
  return {
    code: 'UNEXPECTED_LINE',
    message: `Observations of ${id.sv} outside an epoch skipped`,
    line: source.number,
    sv: id.sv,
  };
}

function* parseBody(cursor: LineCursor, ctx: ObsGrammarContext): Generator<ObsEpoch, void, undefined> {
  for (let source = cursor.next(); source !== null; source = cursor.next()) {
    if (source.text.trim().length === 0) continue;
    if (!source.text.startsWith(EPOCH_MARKER)) {
      ctx.warn(strayLineWarning(source));
      continue;
    }

    const line = padLine(source.text, EPOCH_LINE_WIDTH);
    const fields = decodeFields(line, source.number, OBS3_EPOCH_LAYOUT);
    const flag = toEpochFlag(fields.get('flag'), source.number);
    const count = fields.get('count') ?? 0;
    const time = epochLabelFromFields(fields, source.number, false);
    const epoch: ObsEpoch = {
      kind: 'obs',
      time,
      flag,
      clockOffset: fields.get('clockOffset'),
      line: source.number,
      satellites: [],
      specialRecords: [],
    };

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

    for (let i = 0; i < count; i += 1) {
      const satLine = cursor.nextRequired('the satellite lines', source.number);
      if (satLine.text.startsWith(EPOCH_MARKER)) {
        throw truncatedRecord(`Epoch lists ${count} satellites but has ${i}`, {
          line: source.number,
          nextRecordLine: satLine.number,
        });
      }
      if (flag === 6) {
        epoch.specialRecords.push(satLine.text);
        continue;
      }
      const record = satelliteRecord(satLine, ctx);
      if (record) epoch.satellites.push(record);
    }
    yield epoch;
  }
}

export const obs3Grammar: ObsGrammar = { name: 'v3-obs', parseBody };
