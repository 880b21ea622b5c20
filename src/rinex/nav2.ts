/**
 * RINEX 2 navigation bodies. The file holds one constellation, taken from
 * the header's file-type letter (N GPS, G GLONASS, H SBAS).
 */

import { malformedEpoch } from '../shared/index.js';
import { epochLabelFromFields } from './epochFields.js';
import { decodeFields } from './fieldDecoder.js';
import type { NavGrammar } from './grammar.js';
import { NAV2_RECORD_LAYOUT, ORBIT_LINE, type NavSystemLayout } from './layouts.js';
import { padLine } from './lineCursor.js';
import { readNavRecord } from './navBody.js';
import type { ConstellationLetter } from './satellite.js';

const RECORD_LINE_WIDTH = 79;

export function createNav2Grammar(system: ConstellationLetter, layout: NavSystemLayout): NavGrammar {
  return {
    name: `v2-nav-${system}`,
    *parseBody(cursor) {
      for (let source = cursor.next(); source !== null; source = cursor.next()) {
        if (source.text.trim().length === 0) continue;
        const line = padLine(source.text, RECORD_LINE_WIDTH);
        const fields = decodeFields(line, source.number, NAV2_RECORD_LAYOUT);

        const prn = fields.get('prn');
        if (prn === null) {
          throw malformedEpoch('Navigation record has no satellite number', { line: source.number, columns: [1, 2] });
        }
        const time = epochLabelFromFields(fields, source.number, true);
        if (time === null) {
          throw malformedEpoch('Navigation record has no time of clock', { line: source.number });
        }

        yield readNavRecord(
          cursor,
          { sv: `${system}${String(prn).padStart(2, '0')}`, system, time, line: source.number, fields },
          layout,
          ORBIT_LINE.v2Indent,
        );
      }
    },
  };
}
