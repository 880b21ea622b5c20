/**
 * Fixed-column record layouts.
 *
 * Every version/constellation quirk of the line formats lives here as data:
 * epoch lines as field tables, broadcast-orbit parameter names in
 * data/nav-parameters.json. The grammars only walk these tables.
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { field, type FieldSpec } from './fieldDecoder.js';
import type { ConstellationLetter } from './satellite.js';

// ── Epoch lines ───────────────────────────────────────────────────────────

export type EpochField = 'year' | 'month' | 'day' | 'hour' | 'minute' | 'second' | 'flag' | 'count' | 'clockOffset';

/** RINEX 2 OBS: 1X,I2,4(1X,I2),F11.7,2X,I1,I3,12(A1,I2),F12.9 */
export const OBS2_EPOCH_LAYOUT: readonly FieldSpec<EpochField>[] = [
  field('year', 1, 2, 'int'),
  field('month', 4, 2, 'int'),
  field('day', 7, 2, 'int'),
  field('hour', 10, 2, 'int'),
  field('minute', 13, 2, 'int'),
  field('second', 15, 11, 'float'),
  field('flag', 28, 1, 'int'),
  field('count', 29, 3, 'int'),
  field('clockOffset', 68, 12, 'float'),
];

export const OBS2_SATELLITE_LIST = { start: 32, slotWidth: 3, perLine: 12 } as const;

/** RINEX 3 OBS: A1,1X,I4,4(1X,I2),F11.7,2X,I1,I3,6X,F15.12 */
export const OBS3_EPOCH_LAYOUT: readonly FieldSpec<EpochField>[] = [
  field('year', 2, 4, 'int'),
  field('month', 7, 2, 'int'),
  field('day', 10, 2, 'int'),
  field('hour', 13, 2, 'int'),
  field('minute', 16, 2, 'int'),
  field('second', 18, 11, 'float'),
  field('flag', 31, 1, 'int'),
  field('count', 32, 3, 'int'),
  field('clockOffset', 41, 15, 'float'),
];

/** One observation: F14.3 value, I1 loss-of-lock, I1 signal strength. */
export const OBSERVATION_SLOT = { width: 16, valueWidth: 14, lliOffset: 14, ssiOffset: 15 } as const;

export const OBS2_OBSERVATIONS_PER_LINE = 5;
export const OBS3_SATELLITE_ID_WIDTH = 3;

// ── Navigation record lines ───────────────────────────────────────────────

export type NavEpochField = 'prn' | 'year' | 'month' | 'day' | 'hour' | 'minute' | 'second' | 'clock0' | 'clock1' | 'clock2';

/** RINEX 2 NAV: I2,1X,I2.2,4(1X,I2),F5.1,3D19.12 */
export const NAV2_RECORD_LAYOUT: readonly FieldSpec<NavEpochField>[] = [
  field('prn', 0, 2, 'int'),
  field('year', 3, 2, 'int'),
  field('month', 6, 2, 'int'),
  field('day', 9, 2, 'int'),
  field('hour', 12, 2, 'int'),
  field('minute', 15, 2, 'int'),
  field('second', 17, 5, 'float'),
  field('clock0', 22, 19, 'float'),
  field('clock1', 41, 19, 'float'),
  field('clock2', 60, 19, 'float'),
];

/** RINEX 3 NAV: A1,I2.2,1X,I4,5(1X,I2.2),3D19.12 (satellite id read separately) */
export const NAV3_RECORD_LAYOUT: readonly FieldSpec<NavEpochField>[] = [
  field('year', 4, 4, 'int'),
  field('month', 9, 2, 'int'),
  field('day', 12, 2, 'int'),
  field('hour', 15, 2, 'int'),
  field('minute', 18, 2, 'int'),
  field('second', 21, 2, 'int'),
  field('clock0', 23, 19, 'float'),
  field('clock1', 42, 19, 'float'),
  field('clock2', 61, 19, 'float'),
];

/** Broadcast-orbit lines: 3X (v2) or 4X (v3) then 4D19.12. */
export const ORBIT_LINE = { v2Indent: 3, v3Indent: 4, width: 19, perLine: 4 } as const;

// ── Broadcast-orbit parameter tables ──────────────────────────────────────

const ParameterLine = z.array(z.string().nullable()).length(4);

const SystemLayout = z.object({
  clock: z.tuple([z.string(), z.string(), z.string()]),
  orbits: z.array(ParameterLine).min(1),
});

const NavParameterFile = z.object({
  v2: z.record(z.string(), SystemLayout),
  v3: z.record(z.string(), SystemLayout),
  overrides: z.array(z.object({
    minVersion: z.number(),
    system: z.string().length(1),
    orbits: z.array(ParameterLine).min(1),
  })),
});

export interface NavSystemLayout {
  /** Names of the three clock terms on the record line. */
  clock: readonly [string, string, string];
  /** One entry per orbit line, four names each; null marks a spare field. */
  orbits: readonly (readonly (string | null)[])[];
}

type NavParameterTables = z.infer<typeof NavParameterFile>;

let cachedTables: NavParameterTables | null = null;

function loadTables(): NavParameterTables {
  if (cachedTables) return cachedTables;
  const filePath = fileURLToPath(new URL('../../data/nav-parameters.json', import.meta.url));
  cachedTables = NavParameterFile.parse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
  return cachedTables;
}

/**
 * Parameter layout for one constellation in a given file version, or null
 * when the version has no broadcast format for it.
 */
export function navLayoutFor(version: number, system: ConstellationLetter): NavSystemLayout | null {
  const tables = loadTables();
  const base = (version < 3 ? tables.v2 : tables.v3)[system];
  if (!base) return null;

  let orbits = base.orbits;
  if (version >= 3) {
    for (const override of tables.overrides) {
      // Compare in hundredths: version strings are two-decimal (3.05).
      if (override.system === system && Math.round(version * 100) >= Math.round(override.minVersion * 100)) {
        orbits = override.orbits;
      }
    }
  }
  return { clock: base.clock, orbits };
}
