/**
 * File adapter: reads RINEX text from disk, undoing gzip. Unix compress and
 * Hatanaka compression are detected and rejected; expanding them belongs to
 * external tools (uncompress, CRX2RNX).
 */

import * as fs from 'fs';
import * as path from 'path';
import * as zlib from 'zlib';
import { DEFAULT_MAX_INPUT_BYTES } from '../config.js';
import { RinexDecodeError, compressedInput, notFound } from '../shared/index.js';
import { decodeRinex, type DecodeOptions } from '../rinex/decode.js';
import type { RinexDataset } from '../rinex/types.js';

const GZIP_MAGIC = [0x1f, 0x8b] as const;
const COMPRESS_MAGIC = [0x1f, 0x9d] as const;
/** Short-name Hatanaka files end in a two-digit year and `d` (`site0010.21d`). */
const HATANAKA_SHORT_NAME = /\.\d{2}d$/i;

export interface ReadOptions {
  maxInputBytes?: number;
}

function hasMagic(buf: Buffer, magic: readonly number[]): boolean {
  return buf.length >= magic.length && magic.every((b, i) => buf[i] === b);
}

function inputTooLarge(filePath: string, limit: number, size: number | null): RinexDecodeError {
  const actual = size === null ? 'larger than the limit once decompressed' : `${size} bytes`;
  return new RinexDecodeError('INPUT_TOO_LARGE', `${path.basename(filePath)} is ${actual}; limit is ${limit}`, {
    path: filePath,
    size,
    limit,
  });
}

function checkSize(size: number, limit: number, filePath: string): void {
  if (size > limit) throw inputTooLarge(filePath, limit, size);
}

function missingFile(err: unknown, filePath: string): unknown {
  if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
    return notFound(`RINEX file not found: ${filePath}`, { path: filePath });
  }
  return err;
}

/** The uncompressed name a file decodes as: `.gz` stripped. */
export function logicalName(filePath: string): string {
  const base = path.basename(filePath);
  return base.toLowerCase().endsWith('.gz') ? base.slice(0, -3) : base;
}

function rejectHatanakaName(filePath: string): void {
  const name = logicalName(filePath);
  if (name.toLowerCase().endsWith('.crx') || HATANAKA_SHORT_NAME.test(name)) {
    throw compressedInput(`${path.basename(filePath)} is Hatanaka-compressed; expand it with CRX2RNX first`, {
      path: filePath,
    });
  }
}

function bufferToText(raw: Buffer, filePath: string, limit: number): string {
  let buf = raw;
  if (hasMagic(buf, COMPRESS_MAGIC) || filePath.endsWith('.Z')) {
    throw compressedInput(`${path.basename(filePath)} is Unix-compressed (.Z); decompress it first`, { path: filePath });
  }
  if (hasMagic(buf, GZIP_MAGIC)) {
    try {
      buf = zlib.gunzipSync(buf, { maxOutputLength: limit });
    } catch (err) {
      // zlib stops at maxOutputLength with a RangeError.
      if (err instanceof RangeError) throw inputTooLarge(filePath, limit, null);
      throw err;
    }
  }
  checkSize(buf.length, limit, filePath);
  // One byte per character keeps the fixed columns aligned.
  return buf.toString('latin1');
}

export function readRinexText(filePath: string, options: ReadOptions = {}): string {
  const limit = options.maxInputBytes ?? DEFAULT_MAX_INPUT_BYTES;
  rejectHatanakaName(filePath);
  let raw: Buffer;
  try {
    checkSize(fs.statSync(filePath).size, limit, filePath);
    raw = fs.readFileSync(filePath);
  } catch (err) {
    throw missingFile(err, filePath);
  }
  return bufferToText(raw, filePath, limit);
}

export async function readRinexTextAsync(filePath: string, options: ReadOptions = {}): Promise<string> {
  const limit = options.maxInputBytes ?? DEFAULT_MAX_INPUT_BYTES;
  rejectHatanakaName(filePath);
  let raw: Buffer;
  try {
    checkSize((await fs.promises.stat(filePath)).size, limit, filePath);
    raw = await fs.promises.readFile(filePath);
  } catch (err) {
    throw missingFile(err, filePath);
  }
  return bufferToText(raw, filePath, limit);
}

export function decodeRinexFile(filePath: string, options: DecodeOptions & ReadOptions = {}): RinexDataset {
  const { maxInputBytes, ...decodeOptions } = options;
  const text = readRinexText(filePath, { maxInputBytes });
  return decodeRinex(text, { filename: path.basename(filePath), ...decodeOptions });
}
