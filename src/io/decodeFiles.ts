import * as path from 'path';
import { DEFAULT_BATCH_CONCURRENCY } from '../config.js';
import { decodeRinex, type DecodeOptions } from '../rinex/decode.js';
import type { RinexDataset } from '../rinex/types.js';
import { readRinexTextAsync, type ReadOptions } from './rinexFile.js';

export type FileDecodeResult =
  | { path: string; ok: true; dataset: RinexDataset }
  | { path: string; ok: false; error: unknown };

export interface BatchOptions extends ReadOptions {
  concurrency?: number;
  decode?: DecodeOptions;
}

async function decodeOne(filePath: string, options: BatchOptions): Promise<FileDecodeResult> {
  try {
    const text = await readRinexTextAsync(filePath, { maxInputBytes: options.maxInputBytes });
    const dataset = decodeRinex(text, { ...options.decode, filename: path.basename(filePath) });
    return { path: filePath, ok: true, dataset };
  } catch (error) {
    return { path: filePath, ok: false, error };
  }
}

/**
 * Decode independent files with at most `concurrency` in flight. Each file
 * has its own cursor, header and builder; a fatal error fails that file only.
 * Results keep the order of `paths`.
 */
export async function decodeRinexFiles(paths: readonly string[], options: BatchOptions = {}): Promise<FileDecodeResult[]> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_BATCH_CONCURRENCY));
  const results: FileDecodeResult[] = new Array(paths.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < paths.length) {
      const index = next;
      next += 1;
      results[index] = await decodeOne(paths[index], options);
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, paths.length) }, () => worker()));
  return results;
}
