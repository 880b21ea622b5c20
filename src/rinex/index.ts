export {
  decodeRinex,
  deriveTimeSystem,
  filterObservationTable,
  iterateRinex,
  listEpochTimes,
  readRinexHeader,
  resolveOptions,
  DecodeOptionsSchema,
} from './decode.js';
export type {
  DecodeOptions,
  EpochTimesResult,
  HeaderSummary,
  ResolvedOptions,
  RinexInput,
  WarningHandler,
} from './decode.js';
export { selectGrammar } from './dispatcher.js';
export type { GrammarKind, GrammarVariant } from './dispatcher.js';
export { DatasetBuilder } from './assembler.js';
export { parseHeader } from './header.js';
export { LineCursor } from './lineCursor.js';
export { decodeFloat, decodeInt } from './fortranNumber.js';
export { epochToDate, expandTwoDigitYear, makeEpochLabel, secondsBetween, toEpochLabel } from './epochTime.js';
export type { EpochLabel, EpochParts } from './epochTime.js';
export { ecefToGeodetic } from './geodetic.js';
export { getValue, getVariable, satelliteSeries, selectDataset, summarizeDataset } from './query.js';
export type { DatasetSelection, DatasetSummary, FieldSummary, SeriesPoint } from './query.js';
export { CONSTELLATIONS, normalizeSatelliteId } from './satellite.js';
export type { ConstellationLetter } from './satellite.js';
export { EPOCH_FLAG_NAMES } from './types.js';
export type * from './types.js';
export { RinexDecodeError } from '../shared/index.js';
export type { RinexErrorCode, RinexErrorData } from '../shared/index.js';
