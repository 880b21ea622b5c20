import { z } from 'zod';
import { zodToMcpInputSchema } from './mcpSchema.js';
import { resolveToolPath, type RinexConfig } from '../config.js';
import { decodeRinexFiles } from '../io/decodeFiles.js';
import { decodeRinexFile, readRinexText } from '../io/rinexFile.js';
import { listEpochTimes, readRinexHeader } from '../rinex/decode.js';
import { selectDataset, summarizeDataset } from '../rinex/query.js';
import type { RinexDataset } from '../rinex/types.js';
import { internalError, McpError, RinexDecodeError } from '../shared/index.js';
import {
  RINEX_BATCH_SUMMARY,
  RINEX_INFO,
  RINEX_READ,
  RINEX_TIMES,
} from '../constants.js';

export type ToolExposureMode = 'standard' | 'full';
export type ToolExposure = 'standard' | 'full';

export interface ToolHandlerContext {
  config: RinexConfig;
}

export interface ToolSpec<TSchema extends z.ZodType = z.ZodType> {
  name: string;
  description: string;
  exposure: ToolExposure;
  zodSchema: TSchema;
  handler(params: z.output<TSchema>, ctx: ToolHandlerContext): Promise<unknown>;
}

function defineTool<TSchema extends z.ZodType>(spec: ToolSpec<TSchema>): ToolSpec {
  return spec;
}

export function isToolExposed(spec: ToolSpec, mode: ToolExposureMode): boolean {
  return mode === 'full' ? true : spec.exposure === 'standard';
}

// ── Tool Schemas ──────────────────────────────────────────────────────────

const PathParam = z.string().min(1).describe('RINEX file path (.gz is decompressed); relative to RINEX_DATA_ROOT when set');

const ConstellationParam = z.enum(['G', 'R', 'E', 'S', 'C', 'J', 'I']);

const DecodeFilterParams = {
  use: z.array(ConstellationParam).min(1).optional().describe('Constellation letters to keep, e.g. ["G","E"]'),
  meas: z.array(z.string().min(1)).min(1).optional().describe('Observation code prefixes to keep, e.g. ["L1","C1C"]'),
};

const RinexInfoSchema = z.object({
  path: PathParam,
});

const RinexReadSchema = z.object({
  path: PathParam,
  ...DecodeFilterParams,
  sv: z.array(z.string().regex(/^[A-Z]\d{2}$/)).min(1).optional().describe('Satellites to return, e.g. ["G01","E11"]'),
  fields: z.array(z.string().min(1)).min(1).optional().describe('Variables to return, e.g. ["C1C","L1C"]'),
  tlim: z.tuple([z.string(), z.string()]).optional().describe('Inclusive ISO-8601 UTC time window [start, end]'),
  use_indicators: z.boolean().optional().default(false).describe('Include <code>lli / <code>ssi variables'),
  interval: z.number().positive().optional().describe('Decimate observation epochs to this many seconds'),
  summary_only: z.boolean().optional().default(false).describe('Return per-field counts and ranges instead of values'),
  max_epochs: z.number().int().min(1).max(100_000).optional().default(2_000)
    .describe('Cap on epochs returned; the response says when it was cut'),
});

const RinexTimesSchema = z.object({
  path: PathParam,
});

const RinexBatchSummarySchema = z.object({
  paths: z.array(PathParam).min(1).max(500),
  ...DecodeFilterParams,
});

// ── Helpers ───────────────────────────────────────────────────────────────

function errorPayload(err: unknown): Record<string, unknown> {
  const known = err instanceof RinexDecodeError || err instanceof McpError
    ? err
    : internalError(err instanceof Error ? err.message : String(err));
  return { code: known.code, message: known.message, data: known.data };
}

function capEpochs(ds: RinexDataset, maxEpochs: number): { dataset: RinexDataset; truncated: boolean } {
  if (ds.coords.time.length <= maxEpochs) return { dataset: ds, truncated: false };
  const last = ds.coords.time[maxEpochs - 1];
  return { dataset: selectDataset(ds, { tlim: [ds.coords.time[0], last] }), truncated: true };
}

// ── Tool Specs ────────────────────────────────────────────────────────────

export const TOOL_SPECS: ToolSpec[] = [
  defineTool({
    name: RINEX_INFO,
    description: 'Parse the header of a RINEX 2/3 OBS or NAV file: version, type, observation types, position, time system, and which body grammar reads it.',
    exposure: 'standard',
    zodSchema: RinexInfoSchema,
    handler: async (params, ctx) => {
      const filePath = resolveToolPath(params.path, ctx.config);
      const text = readRinexText(filePath, { maxInputBytes: ctx.config.maxInputBytes });
      const { header, grammar } = readRinexHeader(text);
      return { path: filePath, grammar, header };
    },
  }),
  defineTool({
    name: RINEX_READ,
    description: 'Decode a RINEX 2/3 OBS or NAV file into time x satellite arrays. Filter by constellation, observation code, satellite, field or time window; summary_only returns counts and ranges.',
    exposure: 'standard',
    zodSchema: RinexReadSchema,
    handler: async (params, ctx) => {
      const filePath = resolveToolPath(params.path, ctx.config);
      const full = decodeRinexFile(filePath, {
        maxInputBytes: ctx.config.maxInputBytes,
        use: params.use,
        meas: params.meas,
        tlim: params.tlim,
        useIndicators: params.use_indicators,
        interval: params.interval,
      });
      const selected = params.sv || params.fields
        ? selectDataset(full, { sv: params.sv, fields: params.fields })
        : full;
      if (params.summary_only) return summarizeDataset(selected);

      const { dataset, truncated } = capEpochs(selected, params.max_epochs);
      return {
        ...dataset,
        truncated,
        total_epochs: selected.coords.time.length,
      };
    },
  }),
  defineTool({
    name: RINEX_TIMES,
    description: 'List the epoch times of a RINEX file without decoding it into arrays (observation epochs in file order, or distinct navigation record times).',
    exposure: 'standard',
    zodSchema: RinexTimesSchema,
    handler: async (params, ctx) => {
      const filePath = resolveToolPath(params.path, ctx.config);
      const text = readRinexText(filePath, { maxInputBytes: ctx.config.maxInputBytes });
      const result = listEpochTimes(text);
      return { path: filePath, ...result, count: result.times.length };
    },
  }),
  defineTool({
    name: RINEX_BATCH_SUMMARY,
    description: 'Decode several RINEX files concurrently and return one summary, or one error, per file.',
    exposure: 'full',
    zodSchema: RinexBatchSummarySchema,
    handler: async (params, ctx) => {
      const paths = params.paths.map(p => resolveToolPath(p, ctx.config));
      const results = await decodeRinexFiles(paths, {
        concurrency: ctx.config.batchConcurrency,
        maxInputBytes: ctx.config.maxInputBytes,
        decode: { use: params.use, meas: params.meas },
      });
      const failed = results.filter(r => !r.ok).length;
      return {
        files: results.map(r => (r.ok
          ? { path: r.path, ok: true, summary: summarizeDataset(r.dataset) }
          : { path: r.path, ok: false, error: errorPayload(r.error) })),
        failed,
      };
    },
  }),
];

// ── Exports ───────────────────────────────────────────────────────────────

export function getToolSpec(name: string): ToolSpec | undefined {
  return TOOL_SPECS.find(s => s.name === name);
}

export function getToolSpecs(mode: ToolExposureMode = 'standard'): ToolSpec[] {
  return mode === 'full' ? TOOL_SPECS : TOOL_SPECS.filter(s => s.exposure === 'standard');
}

export function getTools(mode: ToolExposureMode = 'standard'): Array<{
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}> {
  return getToolSpecs(mode).map(s => ({
    name: s.name,
    description: s.description,
    inputSchema: zodToMcpInputSchema(s.zodSchema),
  }));
}
