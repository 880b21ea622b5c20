// ── Constellations ────────────────────────────────────────────────────────

export type ConstellationLetter = 'G' | 'R' | 'E' | 'S' | 'C' | 'J' | 'I';

export const CONSTELLATIONS: Record<ConstellationLetter, { name: string; timeSystem: string }> = {
  G: { name: 'GPS', timeSystem: 'GPS' },
  R: { name: 'GLONASS', timeSystem: 'GLO' },
  E: { name: 'Galileo', timeSystem: 'GAL' },
  S: { name: 'SBAS', timeSystem: 'GPS' },
  C: { name: 'BeiDou', timeSystem: 'BDT' },
  J: { name: 'QZSS', timeSystem: 'QZS' },
  I: { name: 'NavIC/IRNSS', timeSystem: 'IRN' },
};

export const CONSTELLATION_LETTERS: readonly ConstellationLetter[] = ['G', 'R', 'E', 'S', 'C', 'J', 'I'];

export function isConstellationLetter(letter: string): letter is ConstellationLetter {
  return Object.prototype.hasOwnProperty.call(CONSTELLATIONS, letter);
}

export type SatelliteIdResult =
  | { ok: true; sv: string; system: ConstellationLetter }
  | { ok: false; sv: string; system: string };

/**
 * Normalise a 3-character satellite slot: `G 7` → `G07`, `  7` → `G07`
 * (RINEX 2 leaves the GPS letter blank). Unknown letters, PRN 00 and blank
 * slots are reported back unresolved so the caller can warn and skip.
 */
export function normalizeSatelliteId(slot: string): SatelliteIdResult {
  const raw = slot.padEnd(3, ' ').slice(0, 3);
  if (raw.trim().length === 0) return { ok: false, sv: '', system: '' };
  const letter = raw[0] === ' ' ? 'G' : raw[0].toUpperCase();
  const prn = raw.slice(1).replace(/ /g, '0');
  const sv = `${letter}${prn}`;
  // PRN numbering starts at 1 in every system.
  if (!isConstellationLetter(letter) || !/^\d{2}$/.test(prn) || prn === '00') {
    return { ok: false, sv: sv.trim(), system: letter };
  }
  return { ok: true, sv, system: letter };
}
