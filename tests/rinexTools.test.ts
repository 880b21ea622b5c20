import { afterAll, describe, expect, it } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { RinexConfig } from '../src/config.js';
import { DEFAULT_MAX_INPUT_BYTES } from '../src/config.js';
import { handleToolCall, type ToolResponse } from '../src/tools/index.js';

const FIXTURES = path.resolve(__dirname, 'fixtures');

const config: RinexConfig = {
  toolMode: 'full',
  maxInputBytes: DEFAULT_MAX_INPUT_BYTES,
  batchConcurrency: 2,
  dataRoot: FIXTURES,
};

function payload(response: ToolResponse): Record<string, unknown> {
  const parsed: unknown = JSON.parse(response.content[0].text);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('tool response is not a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

function errorCode(response: ToolResponse): unknown {
  const { error } = payload(response);
  return typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
}

describe('rinex_info', () => {
  it('returns the parsed header and grammar', async () => {
    const res = await handleToolCall('rinex_info', { path: 'site0740.21o' }, 'standard', { config });
    expect(res.isError).toBeUndefined();
    const body = payload(res);
    expect(body.path).toBe(path.join(FIXTURES, 'site0740.21o'));
    expect(body.grammar).toBe('v2-obs');
    expect(body.header).toMatchObject({ version: 2.11, fileType: 'OBS', satelliteSystem: 'M', leapSeconds: 18 });
  });

  it('refuses paths outside the data root', async () => {
    const res = await handleToolCall('rinex_info', { path: '../package.json' }, 'standard', { config });
    expect(res.isError).toBe(true);
    expect(errorCode(res)).toBe('INVALID_PARAMS');
  });
});

describe('rinex_read', () => {
  it('returns a summary on request', async () => {
    const res = await handleToolCall('rinex_read', { path: 'brdc0740.21n', summary_only: true }, 'standard', { config });
    expect(payload(res)).toMatchObject({
      kind: 'nav',
      epochs: 2,
      satellites: ['G01', 'G02'],
      interval: 7200,
      eventCount: 0,
    });
  });

  it('selects satellites and fields and caps epochs', async () => {
    const res = await handleToolCall(
      'rinex_read',
      { path: 'site0740.21o', sv: ['G05'], fields: ['C1'], max_epochs: 2 },
      'standard',
      { config },
    );
    const body = payload(res);
    expect(body.coords).toEqual({
      time: ['2021-03-15T00:00:00.0000000', '2021-03-15T00:00:30.0000000'],
      sv: ['G05'],
    });
    expect(body.dataVars).toEqual({ C1: [[23619095.45], [20005000]] });
    expect(body.truncated).toBe(true);
    expect(body.total_epochs).toBe(3);
  });

  it('passes decode options through', async () => {
    const res = await handleToolCall(
      'rinex_read',
      { path: 'SITE00TST_R_20210740000_01H_30S_MO.rnx', use: ['E'], use_indicators: true, summary_only: true },
      'standard',
      { config },
    );
    const { satellites, fields } = payload(res);
    expect(satellites).toEqual(['E11']);
    expect(typeof fields === 'object' && fields !== null ? Object.keys(fields) : []).toEqual([
      'C1X', 'C1Xssi', 'L1X', 'L1Xlli', 'L1Xssi',
    ]);
  });

  it('rejects malformed arguments', async () => {
    const res = await handleToolCall('rinex_read', { path: 'site0740.21o', sv: ['GPS1'] }, 'standard', { config });
    expect(res.isError).toBe(true);
    expect(errorCode(res)).toBe('INVALID_PARAMS');
  });

  it('reports missing files as NOT_FOUND', async () => {
    const res = await handleToolCall('rinex_read', { path: 'nope.21o' }, 'standard', { config });
    expect(errorCode(res)).toBe('NOT_FOUND');
  });
});

describe('rinex_read decode errors', () => {
  const tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'rinex-tools-'));

  afterAll(() => {
    fs.rmSync(tmpRoot, { recursive: true, force: true });
  });

  it('returns the decoder error code and position', async () => {
    const lines = fs.readFileSync(path.join(FIXTURES, 'brdc0740.21n'), 'latin1').split('\n');
    // Keep the header, the first record line and six of its seven orbit lines.
    fs.writeFileSync(path.join(tmpRoot, 'short.21n'), lines.slice(0, 14).join('\n'));
    const res = await handleToolCall('rinex_read', { path: 'short.21n' }, 'standard', {
      config: { ...config, dataRoot: tmpRoot },
    });
    expect(res.isError).toBe(true);
    expect(payload(res).error).toEqual({
      code: 'TRUNCATED_RECORD',
      message: 'Input ended inside the orbit lines of G01 (line 8)',
      data: { line: 8, endOfInput: true },
    });
  });
});

describe('rinex_read unexpected errors', () => {
  const tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'rinex-tools-dir-'));
  fs.mkdirSync(path.join(tmpRoot, 'site.21o'));

  afterAll(() => {
    fs.rmSync(tmpRoot, { recursive: true, force: true });
  });

  it('reports them as INTERNAL_ERROR', async () => {
    const res = await handleToolCall('rinex_read', { path: 'site.21o' }, 'standard', {
      config: { ...config, dataRoot: tmpRoot },
    });
    expect(res.isError).toBe(true);
    const { error } = payload(res);
    expect(error).toMatchObject({ code: 'INTERNAL_ERROR', message: expect.stringMatching(/^EISDIR/) });
  });
});

describe('rinex_times', () => {
  it('lists epochs with the grammar warnings', async () => {
    const res = await handleToolCall('rinex_times', { path: 'SITE00TST_R_20210740000_01H_30S_MO.rnx' }, 'standard', {
      config,
    });
    const body = payload(res);
    expect(body.kind).toBe('obs');
    expect(body.count).toBe(3);
    expect(body.times).toEqual([
      '2021-03-15T00:00:00.0000000',
      '2021-03-15T00:00:30.0000000',
      '2021-03-15T00:01:00.0000000',
    ]);
  });
});

describe('rinex_batch_summary', () => {
  it('is only exposed in full mode', async () => {
    const res = await handleToolCall('rinex_batch_summary', { paths: ['site0740.21o'] }, 'standard', { config });
    expect(res.isError).toBe(true);
    expect(errorCode(res)).toBe('INVALID_PARAMS');
  });

  it('summarizes each file and reports failures per file', async () => {
    const res = await handleToolCall(
      'rinex_batch_summary',
      { paths: ['site0740.21o', 'missing.21o', 'brdc0740.21n'] },
      'full',
      { config },
    );
    expect(res.isError).toBeUndefined();
    const body = payload(res);
    expect(body.failed).toBe(1);
    expect(body.files).toMatchObject([
      { path: path.join(FIXTURES, 'site0740.21o'), ok: true, summary: { kind: 'obs', epochs: 3 } },
      { path: path.join(FIXTURES, 'missing.21o'), ok: false, error: { code: 'NOT_FOUND' } },
      { path: path.join(FIXTURES, 'brdc0740.21n'), ok: true, summary: { kind: 'nav', epochs: 2 } },
    ]);
  });
});

describe('unknown tools', () => {
  it('are rejected as INVALID_PARAMS', async () => {
    const res = await handleToolCall('nope', {}, 'full', { config });
    expect(errorCode(res)).toBe('INVALID_PARAMS');
  });
});
