export const RINEX_INFO = 'rinex_info' as const;
export const RINEX_READ = 'rinex_read' as const;
export const RINEX_TIMES = 'rinex_times' as const;
export const RINEX_BATCH_SUMMARY = 'rinex_batch_summary' as const;

export type RinexToolName =
  | typeof RINEX_INFO
  | typeof RINEX_READ
  | typeof RINEX_TIMES
  | typeof RINEX_BATCH_SUMMARY;

export const SERVER_NAME = 'rinex-mcp';
export const SERVER_VERSION = '0.1.0';
export const LOG_PREFIX = `[${SERVER_NAME}]`;
