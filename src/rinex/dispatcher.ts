import { RinexDecodeError, malformedHeader } from '../shared/index.js';
import type { NavGrammar, ObsGrammar, ObservationTable } from './grammar.js';
import { navLayoutFor } from './layouts.js';
import { createNav2Grammar } from './nav2.js';
import { createNav3Grammar } from './nav3.js';
import { obs2Grammar } from './obs2.js';
import { obs3Grammar } from './obs3.js';
import { CONSTELLATION_LETTERS, isConstellationLetter } from './satellite.js';
import type { HeaderMetadata } from './types.js';

export type GrammarVariant =
  | { kind: 'v2-obs'; grammar: ObsGrammar; observationTable: ObservationTable }
  | { kind: 'v3-obs'; grammar: ObsGrammar; observationTable: ObservationTable }
  | { kind: 'v2-nav'; grammar: NavGrammar }
  | { kind: 'v3-nav'; grammar: NavGrammar };

export type GrammarKind = GrammarVariant['kind'];

export const MIN_VERSION = 2;
export const MAX_VERSION_EXCLUSIVE = 4;

/**
 * Pick the body grammar for a parsed header. Pure: the same header always
 * yields the same variant.
 */
export function selectGrammar(header: HeaderMetadata): GrammarVariant {
  const { version } = header;
  if (!(version >= MIN_VERSION && version < MAX_VERSION_EXCLUSIVE)) {
    throw new RinexDecodeError('UNSUPPORTED_VERSION', `Unsupported RINEX version ${version}`, { version });
  }
  const major = version < 3 ? 2 : 3;

  if (header.fileType === 'NAV') {
    if (major === 3) return { kind: 'v3-nav', grammar: createNav3Grammar(version) };
    const system = header.satelliteSystem;
    const layout = isConstellationLetter(system) ? navLayoutFor(version, system) : null;
    if (!isConstellationLetter(system) || layout === null) {
      throw new RinexDecodeError(
        'UNSUPPORTED_FILE_TYPE',
        `No version 2 navigation layout for system "${system}"`,
        { version, system },
      );
    }
    return { kind: 'v2-nav', grammar: createNav2Grammar(system, layout) };
  }

  const types = header.observationTypes;
  if (major === 2) {
    if (types.kind !== 'global') {
      throw malformedHeader('Version 2 observation file needs a "# / TYPES OF OBSERV" record');
    }
    const table = new Map<string, readonly string[]>(CONSTELLATION_LETTERS.map(letter => [letter, types.types]));
    return { kind: 'v2-obs', grammar: obs2Grammar, observationTable: table };
  }

  if (types.kind !== 'per-system') {
    throw malformedHeader('Version 3 observation file needs "SYS / # / OBS TYPES" records');
  }
  return { kind: 'v3-obs', grammar: obs3Grammar, observationTable: new Map(Object.entries(types.bySystem)) };
}
