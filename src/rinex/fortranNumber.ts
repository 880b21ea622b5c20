/**
 * Fortran-style fixed-width numeric fields.
 *
 * RINEX writes floats with Fortran edit descriptors: F14.3 for observations,
 * D19.12 for broadcast orbits. Blank fields mean "no value" and are returned
 * as null so they never collide with a real zero.
 */

import { malformedNumericField, type RinexErrorData } from '../shared/index.js';

/** 0-based start, exclusive end, 1-based line number. */
export interface FieldPosition {
  line: number;
  start: number;
  end: number;
}

const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([Ee][+-]?\d+)?$/;
const INT_RE = /^[+-]?\d+$/;

function errorData(raw: string, pos: FieldPosition | undefined): RinexErrorData {
  if (!pos) return { text: raw };
  return { line: pos.line, columns: [pos.start + 1, pos.end], text: raw };
}

/** Normalise `D`/`d`/`e` exponent markers to `E`. */
export function normalizeExponent(token: string): string {
  return token.replace(/[Dde]/g, 'E');
}

export function decodeFloat(raw: string, pos?: FieldPosition): number | null {
  const token = raw.trim();
  if (token.length === 0) return null;
  const normalized = normalizeExponent(token);
  if (!FLOAT_RE.test(normalized)) {
    throw malformedNumericField('float', errorData(raw, pos));
  }
  return Number(normalized);
}

export function decodeInt(raw: string, pos?: FieldPosition): number | null {
  const token = raw.trim();
  if (token.length === 0) return null;
  if (!INT_RE.test(token)) {
    throw malformedNumericField('integer', errorData(raw, pos));
  }
  return Number(token);
}

export function sliceFloat(line: string, lineNo: number, start: number, end: number): number | null {
  return decodeFloat(line.slice(start, end), { line: lineNo, start, end });
}

export function sliceInt(line: string, lineNo: number, start: number, end: number): number | null {
  return decodeInt(line.slice(start, end), { line: lineNo, start, end });
}
