import type { LineCursor } from './lineCursor.js';
import type { DecodeWarning, HeaderMetadata, NavRecord, ObsEpoch, ParsedEpoch } from './types.js';

/** Observation codes per constellation letter, already resolved from the header. */
export type ObservationTable = ReadonlyMap<string, readonly string[]>;

export interface GrammarContext {
  header: HeaderMetadata;
  warn(warning: DecodeWarning): void;
}

export interface ObsGrammarContext extends GrammarContext {
  observationTable: ObservationTable;
}

/** A body grammar turns the lines after the header into parsed epochs, in file order. */
export interface BodyGrammar<R extends ParsedEpoch, C extends GrammarContext = GrammarContext> {
  readonly name: string;
  parseBody(cursor: LineCursor, ctx: C): Generator<R, void, undefined>;
}

export type ObsGrammar = BodyGrammar<ObsEpoch, ObsGrammarContext>;
export type NavGrammar = BodyGrammar<NavRecord, GrammarContext>;
