/**
 * RINEX header block parser.
 *
 * Header records are 80-column lines: content in columns 1-60, label in
 * columns 61-80. Records are not strictly ordered, so parsing dispatches on
 * the label. Unknown labels are kept verbatim under `extra`.
 */

import {
  RinexDecodeError,
  compressedInput,
  malformedHeader,
} from '../shared/index.js';
import { makeEpochLabel, type EpochLabel } from './epochTime.js';
import { decodeFloat, sliceFloat, sliceInt } from './fortranNumber.js';
import { padLine, type LineCursor } from './lineCursor.js';
import type {
  FileType,
  HeaderMetadata,
  ObservationTypes,
  TimeSystemCorrection,
  Vector3,
} from './types.js';

export const END_OF_HEADER = 'END OF HEADER';
export const VERSION_LABEL = 'RINEX VERSION / TYPE';

const CONTENT_WIDTH = 60;
const LINE_WIDTH = 80;

/** Mutable state while the header block is being read. */
interface HeaderDraft {
  version: number | null;
  fileTypeChar: string | null;
  systemChar: string;
  v2Types: { declared: number; types: string[]; line: number } | null;
  v3Types: Map<string, { declared: number; types: string[]; line: number }>;
  lastV3System: string | null;
  leapSeconds: number | null;
  position: Vector3 | null;
  antennaDelta: Vector3 | null;
  timeSystem: string | null;
  interval: number | null;
  firstObsTime: EpochLabel | null;
  lastObsTime: EpochLabel | null;
  markerName: string | null;
  markerNumber: string | null;
  observer: string | null;
  agency: string | null;
  receiver: { number: string; type: string; version: string } | null;
  antenna: { number: string; type: string } | null;
  program: { program: string; runBy: string; date: string } | null;
  receiverClockOffsetApplied: boolean | null;
  ionosphericCorrections: Record<string, (number | null)[]>;
  timeSystemCorrections: Record<string, TimeSystemCorrection>;
  comments: string[];
  extra: Record<string, string[]>;
}

type LabelHandler = (draft: HeaderDraft, content: string, lineNo: number) => void;

function text(content: string, start: number, end: number): string {
  return content.slice(start, end).trim();
}

function vector3(content: string, lineNo: number): Vector3 | null {
  const x = sliceFloat(content, lineNo, 0, 14);
  const y = sliceFloat(content, lineNo, 14, 28);
  const z = sliceFloat(content, lineNo, 28, 42);
  if (x === null || y === null || z === null) return null;
  return [x, y, z];
}

/** 5I6,F13.7,5X,A3 as used by TIME OF FIRST/LAST OBS. */
function headerTime(content: string, lineNo: number): { time: EpochLabel | null; system: string | null } {
  const year = sliceInt(content, lineNo, 0, 6);
  const month = sliceInt(content, lineNo, 6, 12);
  const day = sliceInt(content, lineNo, 12, 18);
  const hour = sliceInt(content, lineNo, 18, 24);
  const minute = sliceInt(content, lineNo, 24, 30);
  const second = sliceFloat(content, lineNo, 30, 43);
  const system = text(content, 48, 51) || null;
  if (year === null || month === null || day === null) return { time: null, system };
  const time = makeEpochLabel(
    { year, month, day, hour: hour ?? 0, minute: minute ?? 0, second: second ?? 0 },
    lineNo,
  );
  return { time, system };
}

function observationTypeTokens(content: string, start: number): string[] {
  return content.slice(start, CONTENT_WIDTH).trim().split(/\s+/).filter(t => t.length > 0);
}

// ── Label handlers ────────────────────────────────────────────────────────

const HANDLERS: Record<string, LabelHandler> = {
  [VERSION_LABEL]: (draft, content, lineNo) => {
    draft.version = decodeFloat(content.slice(0, 9), { line: lineNo, start: 0, end: 9 });
    draft.fileTypeChar = content[20] === ' ' ? null : content[20].toUpperCase();
    draft.systemChar = content[40] === ' ' ? '' : content[40].toUpperCase();
  },
  'PGM / RUN BY / DATE': (draft, content) => {
    draft.program ??= { program: text(content, 0, 20), runBy: text(content, 20, 40), date: text(content, 40, 60) };
  },
  'MARKER NAME': (draft, content) => {
    draft.markerName ??= text(content, 0, 60);
  },
  'MARKER NUMBER': (draft, content) => {
    draft.markerNumber ??= text(content, 0, 20);
  },
  'OBSERVER / AGENCY': (draft, content) => {
    draft.observer ??= text(content, 0, 20);
    draft.agency ??= text(content, 20, 60);
  },
  'REC # / TYPE / VERS': (draft, content) => {
    draft.receiver ??= { number: text(content, 0, 20), type: text(content, 20, 40), version: text(content, 40, 60) };
  },
  'ANT # / TYPE': (draft, content) => {
    draft.antenna ??= { number: text(content, 0, 20), type: text(content, 20, 40) };
  },
  // Some receivers write this record more than once; the first one wins.
  'APPROX POSITION XYZ': (draft, content, lineNo) => {
    draft.position ??= vector3(content, lineNo);
  },
  'ANTENNA: DELTA H/E/N': (draft, content, lineNo) => {
    draft.antennaDelta ??= vector3(content, lineNo);
  },
  '# / TYPES OF OBSERV': (draft, content, lineNo) => {
    const declared = sliceInt(content, lineNo, 0, 6);
    const tokens = observationTypeTokens(content, 6);
    if (declared !== null || !draft.v2Types) {
      draft.v2Types = { declared: declared ?? 0, types: tokens, line: lineNo };
    } else {
      draft.v2Types.types.push(...tokens);
    }
  },
  'SYS / # / OBS TYPES': (draft, content, lineNo) => {
    const system = content[0] === ' ' ? null : content[0].toUpperCase();
    const tokens = observationTypeTokens(content, 7);
    if (system !== null) {
      const declared = sliceInt(content, lineNo, 3, 6) ?? 0;
      draft.v3Types.set(system, { declared, types: tokens, line: lineNo });
      draft.lastV3System = system;
      return;
    }
    const current = draft.lastV3System === null ? undefined : draft.v3Types.get(draft.lastV3System);
    if (!current) {
      throw malformedHeader('Observation type continuation without a system record', { line: lineNo });
    }
    current.types.push(...tokens);
  },
  'INTERVAL': (draft, content, lineNo) => {
    draft.interval = sliceFloat(content, lineNo, 0, 10);
  },
  'TIME OF FIRST OBS': (draft, content, lineNo) => {
    const { time, system } = headerTime(content, lineNo);
    draft.firstObsTime = time;
    draft.timeSystem = system ?? draft.timeSystem;
  },
  'TIME OF LAST OBS': (draft, content, lineNo) => {
    draft.lastObsTime = headerTime(content, lineNo).time;
  },
  'LEAP SECONDS': (draft, content, lineNo) => {
    draft.leapSeconds = sliceInt(content, lineNo, 0, 6);
  },
  'RCV CLOCK OFFS APPL': (draft, content, lineNo) => {
    const applied = sliceInt(content, lineNo, 0, 6);
    draft.receiverClockOffsetApplied = applied === null ? null : applied === 1;
  },
  'COMMENT': (draft, content) => {
    draft.comments.push(content.trimEnd());
  },
  // RINEX 2 NAV: 2X,4D12.4
  'ION ALPHA': (draft, content, lineNo) => {
    draft.ionosphericCorrections.GPSA = [2, 14, 26, 38].map(s => sliceFloat(content, lineNo, s, s + 12));
  },
  'ION BETA': (draft, content, lineNo) => {
    draft.ionosphericCorrections.GPSB = [2, 14, 26, 38].map(s => sliceFloat(content, lineNo, s, s + 12));
  },
  // RINEX 2 NAV: 3X,2D19.12,2I9
  'DELTA-UTC: A0,A1,T,W': (draft, content, lineNo) => {
    draft.timeSystemCorrections.GPUT = {
      a0: sliceFloat(content, lineNo, 3, 22),
      a1: sliceFloat(content, lineNo, 22, 41),
      referenceTime: sliceInt(content, lineNo, 41, 50),
      referenceWeek: sliceInt(content, lineNo, 50, 59),
      source: null,
      utcId: null,
    };
  },
  // RINEX 3 NAV: A4,1X,4D12.4
  'IONOSPHERIC CORR': (draft, content, lineNo) => {
    const type = text(content, 0, 4);
    draft.ionosphericCorrections[type] = [5, 17, 29, 41].map(s => sliceFloat(content, lineNo, s, s + 12));
  },
  // RINEX 3 NAV: A4,1X,D17.10,D16.9,1X,I6,1X,I4,1X,A5,1X,I2
  'TIME SYSTEM CORR': (draft, content, lineNo) => {
    const type = text(content, 0, 4);
    draft.timeSystemCorrections[type] = {
      a0: sliceFloat(content, lineNo, 5, 22),
      a1: sliceFloat(content, lineNo, 22, 38),
      referenceTime: sliceInt(content, lineNo, 39, 45),
      referenceWeek: sliceInt(content, lineNo, 46, 50),
      source: text(content, 51, 56) || null,
      utcId: sliceInt(content, lineNo, 57, 59),
    };
  },
};

// ── File type resolution ──────────────────────────────────────────────────

/** RINEX 2 NAV files encode the constellation in the file-type letter. */
const NAV2_TYPE_SYSTEM: Record<string, string> = { N: 'G', G: 'R', H: 'S' };

function resolveFileType(draft: HeaderDraft, version: number, lineNo: number): { fileType: FileType; system: string } {
  const typeChar = draft.fileTypeChar ?? '';
  if (typeChar === 'O') {
    return { fileType: 'OBS', system: draft.systemChar || 'G' };
  }
  if (typeChar === 'N' && version >= 3) {
    return { fileType: 'NAV', system: draft.systemChar || 'G' };
  }
  if (version < 3 && typeChar in NAV2_TYPE_SYSTEM) {
    return { fileType: 'NAV', system: NAV2_TYPE_SYSTEM[typeChar] };
  }
  throw new RinexDecodeError(
    'UNSUPPORTED_FILE_TYPE',
    `Unsupported RINEX file type "${typeChar}" (version ${version})`,
    { line: lineNo, fileType: typeChar },
  );
}

function resolveObservationTypes(draft: HeaderDraft, fileType: FileType): ObservationTypes {
  if (fileType === 'NAV') return { kind: 'none' };

  if (draft.v3Types.size > 0) {
    const bySystem: Record<string, readonly string[]> = {};
    for (const [system, entry] of draft.v3Types) {
      if (entry.types.length !== entry.declared) {
        throw malformedHeader(
          `System ${system} declares ${entry.declared} observation types but lists ${entry.types.length}`,
          { line: entry.line },
        );
      }
      bySystem[system] = Object.freeze([...entry.types]);
    }
    return { kind: 'per-system', bySystem: Object.freeze(bySystem) };
  }

  if (draft.v2Types) {
    const { declared, types, line } = draft.v2Types;
    if (types.length !== declared) {
      throw malformedHeader(`Header declares ${declared} observation types but lists ${types.length}`, { line });
    }
    return { kind: 'global', types: Object.freeze([...types]) };
  }

  return { kind: 'none' };
}

function emptyDraft(): HeaderDraft {
  return {
    version: null,
    fileTypeChar: null,
    systemChar: '',
    v2Types: null,
    v3Types: new Map(),
    lastV3System: null,
    leapSeconds: null,
    position: null,
    antennaDelta: null,
    timeSystem: null,
    interval: null,
    firstObsTime: null,
    lastObsTime: null,
    markerName: null,
    markerNumber: null,
    observer: null,
    agency: null,
    receiver: null,
    antenna: null,
    program: null,
    receiverClockOffsetApplied: null,
    ionosphericCorrections: {},
    timeSystemCorrections: {},
    comments: [],
    extra: {},
  };
}

/**
 * Consume the header block from the cursor, leaving it on the first body line.
 */
export function parseHeader(cursor: LineCursor): HeaderMetadata {
  const draft = emptyDraft();
  let versionLine = 0;
  let terminated = false;
  let lineCount = 0;

  for (let source = cursor.next(); source !== null; source = cursor.next()) {
    lineCount += 1;
    if (source.text.trim().length === 0) continue;
    const line = padLine(source.text, LINE_WIDTH);
    const label = line.slice(CONTENT_WIDTH, LINE_WIDTH).trim();
    const content = line.slice(0, CONTENT_WIDTH);

    if (label.startsWith(END_OF_HEADER)) {
      terminated = true;
      break;
    }
    if (label.startsWith('CRINEX')) {
      throw compressedInput('Hatanaka-compressed (CRINEX) input must be expanded before decoding', {
        line: source.number,
      });
    }

    const handler = HANDLERS[label];
    if (handler) {
      handler(draft, content, source.number);
      if (label === VERSION_LABEL) versionLine = source.number;
    } else {
      (draft.extra[label] ??= []).push(content.trimEnd());
    }
  }

  if (draft.version === null) {
    throw new RinexDecodeError('MISSING_VERSION_HEADER', `No "${VERSION_LABEL}" record before "${END_OF_HEADER}"`, {
      line: cursor.position,
    });
  }
  if (!terminated) {
    throw malformedHeader(`Input ended before "${END_OF_HEADER}"`, { line: cursor.position });
  }

  const version = draft.version;
  const { fileType, system } = resolveFileType(draft, version, versionLine);

  return Object.freeze({
    version,
    fileType,
    satelliteSystem: system,
    observationTypes: resolveObservationTypes(draft, fileType),
    leapSeconds: draft.leapSeconds,
    position: draft.position,
    antennaDelta: draft.antennaDelta,
    timeSystem: draft.timeSystem,
    interval: draft.interval,
    firstObsTime: draft.firstObsTime,
    lastObsTime: draft.lastObsTime,
    markerName: draft.markerName,
    markerNumber: draft.markerNumber,
    observer: draft.observer,
    agency: draft.agency,
    receiver: draft.receiver,
    antenna: draft.antenna,
    program: draft.program,
    receiverClockOffsetApplied: draft.receiverClockOffsetApplied,
    ionosphericCorrections: draft.ionosphericCorrections,
    timeSystemCorrections: draft.timeSystemCorrections,
    comments: draft.comments,
    extra: draft.extra,
    headerLineCount: lineCount,
  });
}
