import * as path from 'path';
import { z } from 'zod';
import { invalidParams } from './shared/index.js';
import type { ToolExposureMode } from './tools/registry.js';

export const RINEX_TOOL_MODE_ENV = 'RINEX_TOOL_MODE';
export const RINEX_MAX_INPUT_BYTES_ENV = 'RINEX_MAX_INPUT_BYTES';
export const RINEX_BATCH_CONCURRENCY_ENV = 'RINEX_BATCH_CONCURRENCY';
export const RINEX_DATA_ROOT_ENV = 'RINEX_DATA_ROOT';

export const DEFAULT_MAX_INPUT_BYTES = 256 * 1024 * 1024;
export const DEFAULT_BATCH_CONCURRENCY = 4;

export interface RinexConfig {
  toolMode: ToolExposureMode;
  maxInputBytes: number;
  batchConcurrency: number;
  /** Absolute directory tool paths must resolve under; null allows any path. */
  dataRoot: string | null;
}

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim().length === 0 ? undefined : v);

const EnvSchema = z.object({
  [RINEX_TOOL_MODE_ENV]: z.preprocess(blankToUndefined, z.enum(['standard', 'full']).default('standard')),
  [RINEX_MAX_INPUT_BYTES_ENV]: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_MAX_INPUT_BYTES),
  ),
  [RINEX_BATCH_CONCURRENCY_ENV]: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).max(64).default(DEFAULT_BATCH_CONCURRENCY),
  ),
  [RINEX_DATA_ROOT_ENV]: z.preprocess(
    blankToUndefined,
    z.string().trim().refine(p => path.isAbsolute(p), 'must be an absolute path').optional(),
  ),
});

/** Read and validate configuration from the environment. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RinexConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw invalidParams('Invalid environment configuration', { issues: parsed.error.issues });
  }
  const root = parsed.data[RINEX_DATA_ROOT_ENV];
  return {
    toolMode: parsed.data[RINEX_TOOL_MODE_ENV],
    maxInputBytes: parsed.data[RINEX_MAX_INPUT_BYTES_ENV],
    batchConcurrency: parsed.data[RINEX_BATCH_CONCURRENCY_ENV],
    dataRoot: root === undefined ? null : path.resolve(root),
  };
}

/**
 * Resolve a path given to a tool. With a data root configured, relative
 * paths resolve against it and anything outside it is rejected.
 */
export function resolveToolPath(requested: string, config: RinexConfig): string {
  if (config.dataRoot === null) return path.resolve(requested);
  const resolved = path.resolve(config.dataRoot, requested);
  const rel = path.relative(config.dataRoot, resolved);
  if (rel.startsWith('..') || path.isAbsolute(rel)) {
    throw invalidParams(`Path is outside ${RINEX_DATA_ROOT_ENV}`, { path: requested, root: config.dataRoot });
  }
  return resolved;
}
