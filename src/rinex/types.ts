import type { EpochLabel } from './epochTime.js';
import type { ConstellationLetter } from './satellite.js';

// ── Header ─────────────────────────────────────────────────────────────────

export type FileType = 'OBS' | 'NAV';

export type ObservationTypes =
  | { kind: 'global'; types: readonly string[] }
  | { kind: 'per-system'; bySystem: Readonly<Record<string, readonly string[]>> }
  | { kind: 'none' };

export interface TimeSystemCorrection {
  a0: number | null;
  a1: number | null;
  referenceTime: number | null;
  referenceWeek: number | null;
  source: string | null;
  utcId: number | null;
}

export type Vector3 = readonly [number, number, number];

export interface HeaderMetadata {
  readonly version: number;
  readonly fileType: FileType;
  /** Letter from the version line; `M` for mixed files. */
  readonly satelliteSystem: string;
  readonly observationTypes: ObservationTypes;
  readonly leapSeconds: number | null;
  readonly position: Vector3 | null;
  readonly antennaDelta: Vector3 | null;
  readonly timeSystem: string | null;
  readonly interval: number | null;
  readonly firstObsTime: EpochLabel | null;
  readonly lastObsTime: EpochLabel | null;
  readonly markerName: string | null;
  readonly markerNumber: string | null;
  readonly observer: string | null;
  readonly agency: string | null;
  readonly receiver: { number: string; type: string; version: string } | null;
  readonly antenna: { number: string; type: string } | null;
  readonly program: { program: string; runBy: string; date: string } | null;
  readonly receiverClockOffsetApplied: boolean | null;
  readonly ionosphericCorrections: Readonly<Record<string, readonly (number | null)[]>>;
  readonly timeSystemCorrections: Readonly<Record<string, TimeSystemCorrection>>;
  readonly comments: readonly string[];
  /** Labels the parser has no handler for, with their 60-column content lines. */
  readonly extra: Readonly<Record<string, readonly string[]>>;
  readonly headerLineCount: number;
}

// ── Body records ──────────────────────────────────────────────────────────

export type EpochFlag = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export const EPOCH_FLAG_NAMES: Record<EpochFlag, string> = {
  0: 'ok',
  1: 'power failure',
  2: 'start moving antenna',
  3: 'new site occupation',
  4: 'header information follows',
  5: 'external event',
  6: 'cycle slip records follow',
};

export interface Observation {
  value: number;
  lli: number | null;
  ssi: number | null;
}

export interface ObsSatelliteRecord {
  sv: string;
  system: ConstellationLetter;
  line: number;
  /** Observation code → value. Codes with a blank value are absent. */
  observations: Record<string, Observation>;
}

export interface ObsEpoch {
  kind: 'obs';
  time: EpochLabel | null;
  flag: EpochFlag;
  clockOffset: number | null;
  line: number;
  satellites: ObsSatelliteRecord[];
  /** Raw lines of event records (flags 2-6). */
  specialRecords: string[];
}

export interface NavRecord {
  kind: 'nav';
  sv: string;
  system: ConstellationLetter;
  time: EpochLabel;
  line: number;
  clockBias: number | null;
  clockDrift: number | null;
  clockDriftRate: number | null;
  /** Named parameters in layout order, clock terms included. Blank fields are absent. */
  parameters: Record<string, number>;
}

export type ParsedEpoch = ObsEpoch | NavRecord;

// ── Warnings and events ───────────────────────────────────────────────────

export type WarningCode =
  | 'UNKNOWN_CONSTELLATION'
  | 'UNKNOWN_CONSTELLATION_OBSERVATION_SET'
  | 'DUPLICATE_RECORD'
  | 'NON_MONOTONIC_EPOCH'
  | 'UNEXPECTED_LINE'
  | 'CONSTELLATION_MISMATCH';

export interface DecodeWarning {
  code: WarningCode;
  message: string;
  line?: number;
  sv?: string;
  time?: EpochLabel;
}

export interface EpochEvent {
  time: EpochLabel | null;
  flag: EpochFlag;
  description: string;
  line: number;
  records: string[];
}

// ── Dataset ───────────────────────────────────────────────────────────────

export interface GeodeticPosition {
  latitude: number;
  longitude: number;
  height: number;
}

export interface DatasetAttributes {
  rinexType: 'obs' | 'nav';
  version: number;
  header: HeaderMetadata;
  interval: number | null;
  timeSystem: string | null;
  position: Vector3 | null;
  positionGeodetic: GeodeticPosition | null;
  filename?: string;
}

export type DataMatrix = (number | null)[][];

export interface RinexDataset {
  kind: 'obs' | 'nav';
  dims: readonly ['time', 'sv'];
  coords: { time: EpochLabel[]; sv: string[] };
  /** Variable name → values indexed [time][sv]. */
  dataVars: Record<string, DataMatrix>;
  /** Per-epoch series aligned with coords.time. */
  timeVars: Record<string, (number | null)[]>;
  attrs: DatasetAttributes;
  warnings: DecodeWarning[];
  events: EpochEvent[];
}
