import { decodeFloat, decodeInt } from './fortranNumber.js';

export type FieldKind = 'float' | 'int';

/** One fixed-width numeric field: 0-based start column and width. */
export interface FieldSpec<N extends string = string> {
  name: N;
  start: number;
  width: number;
  kind: FieldKind;
}

export class DecodedFields<N extends string> {
  constructor(private readonly values: ReadonlyMap<string, number | null>) {}

  get(name: N): number | null {
    return this.values.get(name) ?? null;
  }
}

/** Decode every field of a layout from one line. */
export function decodeFields<N extends string>(
  line: string,
  lineNo: number,
  layout: readonly FieldSpec<N>[],
): DecodedFields<N> {
  const values = new Map<string, number | null>();
  for (const spec of layout) {
    const end = spec.start + spec.width;
    const raw = line.slice(spec.start, end);
    const pos = { line: lineNo, start: spec.start, end };
    values.set(spec.name, spec.kind === 'float' ? decodeFloat(raw, pos) : decodeInt(raw, pos));
  }
  return new DecodedFields(values);
}

export function field<N extends string>(name: N, start: number, width: number, kind: FieldKind): FieldSpec<N> {
  return { name, start, width, kind };
}
