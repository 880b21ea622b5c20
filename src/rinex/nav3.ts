/**
 * RINEX 3 navigation bodies. Records of several constellations interleave;
 * the satellite letter picks the orbit layout for each record.
 */

import { malformedEpoch } from '../shared/index.js';
import { epochLabelFromFields } from './epochFields.js';
import { decodeFields } from './fieldDecoder.js';
import type { NavGrammar } from './grammar.js';
import { NAV3_RECORD_LAYOUT, ORBIT_LINE, navLayoutFor } from './layouts.js';
import { padLine, type LineCursor } from './lineCursor.js';
import { readNavRecord } from './navBody.js';
import { normalizeSatelliteId } from './satellite.js';

const RECORD_LINE_WIDTH = 80;

/** Skip orbit lines of a record we cannot decode, up to the next record line. */
function skipRecordBody(cursor: LineCursor): void {
  for (let next = cursor.peek(); next !== null; next = cursor.peek()) {
    if (next.text.length > 0 && next.text[0] !== ' ') return;
    cursor.next();
  }
}

export function createNav3Grammar(version: number): NavGrammar {
  return {
    name: 'v3-nav',
    *parseBody(cursor, ctx) {
      for (let source = cursor.next(); source !== null; source = cursor.next()) {
        if (source.text.trim().length === 0) continue;
        if (source.text[0] === ' ') {
          ctx.warn({ code: 'UNEXPECTED_LINE', message: 'Orbit line outside a record skipped', line: source.number });
          continue;
        }

        const id = normalizeSatelliteId(source.text.slice(0, 3));
        const layout = id.ok ? navLayoutFor(version, id.system) : null;
        if (!id.ok || layout === null) {
          ctx.warn({
            code: 'UNKNOWN_CONSTELLATION',
            message: `No navigation layout for satellite ${id.sv}; record skipped`,
            line: source.number,
            sv: id.sv,
          });
          skipRecordBody(cursor);
          continue;
        }

        const system = ctx.header.satelliteSystem;
        if (system !== 'M' && system !== '' && system !== id.system) {
          ctx.warn({
            code: 'CONSTELLATION_MISMATCH',
            message: `Satellite ${id.sv} in a file declared for system ${system}`,
            line: source.number,
            sv: id.sv,
          });
        }

        const line = padLine(source.text, RECORD_LINE_WIDTH);
        const fields = decodeFields(line, source.number, NAV3_RECORD_LAYOUT);
        const time = epochLabelFromFields(fields, source.number, false);
        if (time === null) {
          throw malformedEpoch(`Navigation record for ${id.sv} has no time of clock`, { line: source.number });
        }

        yield readNavRecord(
          cursor,
          { sv: id.sv, system: id.system, time, line: source.number, fields },
          layout,
          ORBIT_LINE.v3Indent,
        );
      }
    },
  };
}
