/**
 * Decoder entry points: header → grammar → assembler.
 *
 * Everything here is synchronous and single-pass over one input. Options are
 * validated up front; filters (`use`, `meas`, `tlim`, `interval`) are applied
 * to what the grammar yields, so the grammar always walks every line and the
 * line numbers in errors stay exact.
 */

import { z, ZodError } from 'zod';
import { invalidOptions } from '../shared/index.js';
import { DatasetBuilder } from './assembler.js';
import { selectGrammar, type GrammarKind, type GrammarVariant } from './dispatcher.js';
import { secondsBetween, toEpochLabel, type EpochLabel } from './epochTime.js';
import { ecefToGeodetic } from './geodetic.js';
import type { ObservationTable } from './grammar.js';
import { parseHeader } from './header.js';
import { LineCursor } from './lineCursor.js';
import { CONSTELLATIONS, isConstellationLetter } from './satellite.js';
import {
  EPOCH_FLAG_NAMES,
  type DatasetAttributes,
  type DecodeWarning,
  type EpochEvent,
  type HeaderMetadata,
  type NavRecord,
  type ObsEpoch,
  type ParsedEpoch,
  type RinexDataset,
} from './types.js';

/** Decoded text, whole or as lines. */
export type RinexInput = string | Iterable<string>;

export type WarningHandler = (warning: DecodeWarning) => void;

// ── Options ───────────────────────────────────────────────────────────────

const TimeBoundSchema = z.union([z.string(), z.date()]);

export const DecodeOptionsSchema = z.object({
  use: z.array(z.enum(['G', 'R', 'E', 'S', 'C', 'J', 'I'])).min(1).optional()
    .describe('Constellation letters to keep'),
  meas: z.array(z.string().trim().min(1)).min(1).optional()
    .describe('Observation code prefixes to keep, e.g. "L1" keeps L1C and L1W'),
  tlim: z.tuple([TimeBoundSchema, TimeBoundSchema]).optional()
    .describe('Inclusive [start, end] time window'),
  useIndicators: z.boolean().default(false)
    .describe('Also return loss-of-lock and signal-strength variables'),
  interval: z.number().positive().optional()
    .describe('Keep observation epochs at least this many seconds apart'),
  onWarning: z.custom<WarningHandler>(v => typeof v === 'function', 'onWarning must be a function').optional(),
  filename: z.string().optional(),
}).strict();

export type DecodeOptions = z.input<typeof DecodeOptionsSchema>;

export interface ResolvedOptions {
  use: ReadonlySet<string> | null;
  meas: readonly string[] | null;
  tlim: readonly [EpochLabel, EpochLabel] | null;
  useIndicators: boolean;
  interval: number | null;
  onWarning: WarningHandler | null;
  filename: string | null;
}

export function resolveOptions(options: DecodeOptions = {}): ResolvedOptions {
  let parsed: z.output<typeof DecodeOptionsSchema>;
  try {
    parsed = DecodeOptionsSchema.parse(options);
  } catch (err) {
    if (err instanceof ZodError) {
      throw invalidOptions('Invalid decode options', { issues: err.issues });
    }
    throw err;
  }

  let tlim: readonly [EpochLabel, EpochLabel] | null = null;
  if (parsed.tlim) {
    const start = toEpochLabel(parsed.tlim[0]);
    const end = toEpochLabel(parsed.tlim[1]);
    if (start > end) throw invalidOptions(`tlim start ${start} is after end ${end}`);
    tlim = [start, end];
  }

  return {
    use: parsed.use ? new Set(parsed.use) : null,
    meas: parsed.meas ?? null,
    tlim,
    useIndicators: parsed.useIndicators,
    interval: parsed.interval ?? null,
    onWarning: parsed.onWarning ?? null,
    filename: parsed.filename ?? null,
  };
}

// ── Session ───────────────────────────────────────────────────────────────

interface DecodeSession {
  header: HeaderMetadata;
  variant: GrammarVariant;
  warnings: DecodeWarning[];
  records: Generator<ParsedEpoch, void, undefined>;
}

function openSession(input: RinexInput, onWarning: WarningHandler | null): DecodeSession {
  const cursor = new LineCursor(input);
  const header = parseHeader(cursor);
  const variant = selectGrammar(header);
  const warnings: DecodeWarning[] = [];
  const warn = (warning: DecodeWarning): void => {
    warnings.push(warning);
    onWarning?.(warning);
  };

  const records = variant.kind === 'v2-obs' || variant.kind === 'v3-obs'
    ? variant.grammar.parseBody(cursor, { header, warn, observationTable: variant.observationTable })
    : variant.grammar.parseBody(cursor, { header, warn });
  return { header, variant, warnings, records };
}

// ── Filters ───────────────────────────────────────────────────────────────

function keepCode(code: string, meas: readonly string[] | null): boolean {
  return meas === null || meas.some(prefix => code.startsWith(prefix));
}

/** Observation codes per constellation after `use` and `meas`. */
export function filterObservationTable(table: ObservationTable, options: ResolvedOptions): Map<string, readonly string[]> {
  const filtered = new Map<string, readonly string[]>();
  for (const [system, codes] of table) {
    if (options.use && !options.use.has(system)) continue;
    filtered.set(system, codes.filter(code => keepCode(code, options.meas)));
  }
  return filtered;
}

function indicatorNames(code: string): string[] {
  // Loss of lock only applies to carrier phase.
  return code.startsWith('L') ? [`${code}lli`, `${code}ssi`] : [`${code}ssi`];
}

/** Accepts epochs at least `interval` seconds apart, stepping from the first kept epoch. */
class Decimator {
  private first: EpochLabel | null = null;
  private due = 0;

  constructor(private readonly interval: number) {}

  accept(time: EpochLabel): boolean {
    if (this.first === null) {
      this.first = time;
      this.due = this.interval;
      return true;
    }
    // 1 ns slack for the float sum of steps.
    if (secondsBetween(this.first, time) < this.due - 1e-9) return false;
    this.due += this.interval;
    return true;
  }
}

// ── Derived attributes ────────────────────────────────────────────────────

function medianSpacing(times: readonly EpochLabel[]): number | null {
  if (times.length < 2) return null;
  const steps = times.slice(1).map((t, i) => secondsBetween(times[i], t)).sort((a, b) => a - b);
  const mid = Math.floor(steps.length / 2);
  return steps.length % 2 === 1 ? steps[mid] : (steps[mid - 1] + steps[mid]) / 2;
}

export function deriveTimeSystem(header: HeaderMetadata): string | null {
  if (header.timeSystem) return header.timeSystem;
  const letter = header.satelliteSystem;
  if (letter === 'M') return 'GPS';
  return isConstellationLetter(letter) ? CONSTELLATIONS[letter].timeSystem : null;
}

function buildAttributes(header: HeaderMetadata, times: readonly EpochLabel[], filename: string | null): DatasetAttributes {
  return {
    rinexType: header.fileType === 'OBS' ? 'obs' : 'nav',
    version: header.version,
    header,
    interval: header.interval ?? medianSpacing(times),
    timeSystem: deriveTimeSystem(header),
    position: header.position,
    positionGeodetic: header.position ? ecefToGeodetic(header.position) : null,
    ...(filename === null ? {} : { filename }),
  };
}

// ── Assembly ──────────────────────────────────────────────────────────────

function eventOf(epoch: ObsEpoch): EpochEvent {
  return {
    time: epoch.time,
    flag: epoch.flag,
    description: EPOCH_FLAG_NAMES[epoch.flag],
    line: epoch.line,
    records: epoch.specialRecords,
  };
}

function assembleObs(
  session: DecodeSession,
  table: ObservationTable,
  options: ResolvedOptions,
  builder: DatasetBuilder,
  events: EpochEvent[],
): void {
  const kept = filterObservationTable(table, options);
  if (options.use && kept.size === 0) {
    throw invalidOptions(
      `File declares observations for none of the requested systems ${[...options.use].join(',')}`,
      { declared: [...table.keys()] },
    );
  }
  const keptCodes = new Map<string, ReadonlySet<string>>();
  for (const [system, codes] of kept) {
    keptCodes.set(system, new Set(codes));
    for (const code of codes) {
      builder.declareField(code);
      if (options.useIndicators) indicatorNames(code).forEach(name => builder.declareField(name));
    }
  }

  const decimator = options.interval === null ? null : new Decimator(options.interval);
  for (const record of session.records) {
    if (record.kind !== 'obs') continue;
    if (record.flag >= 2 || record.time === null) {
      events.push(eventOf(record));
      continue;
    }
    const time = record.time;
    if (options.tlim) {
      if (time < options.tlim[0]) continue;
      if (time > options.tlim[1]) break;
    }
    if (decimator && !decimator.accept(time)) continue;

    builder.beginEpoch(time, record.line);
    builder.setTimeValue(time, 'clockOffset', record.clockOffset);
    builder.setTimeValue(time, 'epochFlag', record.flag);

    for (const sat of record.satellites) {
      if (options.use && !options.use.has(sat.system)) continue;
      // A system without declared types still gets its satellite slot.
      const codes = keptCodes.get(sat.system);
      const values: Record<string, number> = {};
      for (const [code, obs] of Object.entries(sat.observations)) {
        if (!codes?.has(code)) continue;
        values[code] = obs.value;
        if (options.useIndicators) {
          if (obs.lli !== null && code.startsWith('L')) values[`${code}lli`] = obs.lli;
          if (obs.ssi !== null) values[`${code}ssi`] = obs.ssi;
        }
      }
      builder.addRecord(time, sat.sv, values, sat.line);
    }
  }
}

function assembleNav(session: DecodeSession, options: ResolvedOptions, builder: DatasetBuilder): void {
  for (const record of session.records) {
    if (record.kind !== 'nav') continue;
    if (!keepNavRecord(record, options)) continue;
    builder.addRecord(record.time, record.sv, record.parameters, record.line);
  }
}

function keepNavRecord(record: NavRecord, options: ResolvedOptions): boolean {
  if (options.use && !options.use.has(record.system)) return false;
  // Records are grouped by satellite, not time, so a late time does not end the scan.
  if (options.tlim && (record.time < options.tlim[0] || record.time > options.tlim[1])) return false;
  return true;
}

// ── Public API ────────────────────────────────────────────────────────────

/** Decode a whole RINEX OBS or NAV text into a dataset. */
export function decodeRinex(input: RinexInput, options: DecodeOptions = {}): RinexDataset {
  const resolved = resolveOptions(options);
  const session = openSession(input, resolved.onWarning);
  const warn = (warning: DecodeWarning): void => {
    session.warnings.push(warning);
    resolved.onWarning?.(warning);
  };
  const builder = new DatasetBuilder(warn);
  const events: EpochEvent[] = [];

  const { variant } = session;
  if (variant.kind === 'v2-obs' || variant.kind === 'v3-obs') {
    assembleObs(session, variant.observationTable, resolved, builder, events);
  } else {
    assembleNav(session, resolved, builder);
  }

  const tables = builder.finalize();
  return {
    kind: session.header.fileType === 'OBS' ? 'obs' : 'nav',
    dims: ['time', 'sv'],
    coords: { time: tables.time, sv: tables.sv },
    dataVars: tables.dataVars,
    timeVars: tables.timeVars,
    attrs: buildAttributes(session.header, tables.time, resolved.filename),
    warnings: session.warnings,
    events,
  };
}

export interface HeaderSummary {
  header: HeaderMetadata;
  grammar: GrammarKind;
}

/** Parse only the header and report which body grammar would read the file. */
export function readRinexHeader(input: RinexInput): HeaderSummary {
  const cursor = new LineCursor(input);
  const header = parseHeader(cursor);
  return { header, grammar: selectGrammar(header).kind };
}

/**
 * Stream parsed epochs (OBS) or records (NAV) in file order without
 * assembling a dataset. Warnings go to `onWarning`.
 */
export function* iterateRinex(input: RinexInput, onWarning?: WarningHandler): Generator<ParsedEpoch, void, undefined> {
  yield* openSession(input, onWarning ?? null).records;
}

export interface EpochTimesResult {
  kind: 'obs' | 'nav';
  times: EpochLabel[];
  warnings: DecodeWarning[];
}

/**
 * Epoch labels of a file: observation epochs in file order (event epochs
 * excluded), or the distinct navigation record times in order.
 */
export function listEpochTimes(input: RinexInput): EpochTimesResult {
  const session = openSession(input, null);
  const times: EpochLabel[] = [];

  if (session.header.fileType === 'NAV') {
    const seen = new Set<EpochLabel>();
    for (const record of session.records) {
      if (record.kind === 'nav') seen.add(record.time);
    }
    return { kind: 'nav', times: [...seen].sort(), warnings: session.warnings };
  }

  for (const record of session.records) {
    if (record.kind !== 'obs' || record.flag >= 2 || record.time === null) continue;
    const previous = times.length > 0 ? times[times.length - 1] : null;
    if (previous !== null && record.time < previous) {
      session.warnings.push({
        code: 'NON_MONOTONIC_EPOCH',
        message: `Epoch ${record.time} follows ${previous}`,
        line: record.line,
        time: record.time,
      });
    }
    times.push(record.time);
  }
  return { kind: 'obs', times, warnings: session.warnings };
}
