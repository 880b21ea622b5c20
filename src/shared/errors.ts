export type ErrorCode =
  | 'INVALID_PARAMS'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR';

export class McpError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public data?: unknown
  ) {
    super(message);
    this.name = 'McpError';
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
    };
  }
}

export function invalidParams(message: string, data?: unknown): McpError {
  return new McpError('INVALID_PARAMS', message, data);
}

export function notFound(message: string, data?: unknown): McpError {
  return new McpError('NOT_FOUND', message, data);
}

export function internalError(message: string, data?: unknown): McpError {
  return new McpError('INTERNAL_ERROR', message, data);
}

// ── Decoder errors ────────────────────────────────────────────────────────

export type RinexErrorCode =
  | 'MALFORMED_NUMERIC_FIELD'
  | 'MISSING_VERSION_HEADER'
  | 'UNSUPPORTED_VERSION'
  | 'UNSUPPORTED_FILE_TYPE'
  | 'MALFORMED_HEADER'
  | 'MALFORMED_EPOCH'
  | 'TRUNCATED_RECORD'
  | 'COMPRESSED_INPUT'
  | 'INVALID_OPTIONS'
  | 'INPUT_TOO_LARGE';

/** Where in the source text a problem sits. Columns are 1-based and inclusive. */
export interface SourcePosition {
  line?: number;
  columns?: [number, number];
  text?: string;
}

export interface RinexErrorData extends SourcePosition {
  [key: string]: unknown;
}

export class RinexDecodeError extends Error {
  constructor(
    public code: RinexErrorCode,
    message: string,
    public data: RinexErrorData = {}
  ) {
    super(message);
    this.name = 'RinexDecodeError';
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
    };
  }
}

function located(message: string, data: RinexErrorData): string {
  if (data.line === undefined) return message;
  const cols = data.columns ? `, columns ${data.columns[0]}-${data.columns[1]}` : '';
  return `${message} (line ${data.line}${cols})`;
}

export function malformedNumericField(kind: 'float' | 'integer', data: RinexErrorData): RinexDecodeError {
  const text = JSON.stringify(data.text ?? '');
  return new RinexDecodeError('MALFORMED_NUMERIC_FIELD', located(`Invalid ${kind} field ${text}`, data), data);
}

export function truncatedRecord(message: string, data: RinexErrorData): RinexDecodeError {
  return new RinexDecodeError('TRUNCATED_RECORD', located(message, data), data);
}

export function malformedEpoch(message: string, data: RinexErrorData): RinexDecodeError {
  return new RinexDecodeError('MALFORMED_EPOCH', located(message, data), data);
}

export function malformedHeader(message: string, data: RinexErrorData = {}): RinexDecodeError {
  return new RinexDecodeError('MALFORMED_HEADER', located(message, data), data);
}

export function compressedInput(message: string, data: RinexErrorData = {}): RinexDecodeError {
  return new RinexDecodeError('COMPRESSED_INPUT', message, data);
}

export function invalidOptions(message: string, data: RinexErrorData = {}): RinexDecodeError {
  return new RinexDecodeError('INVALID_OPTIONS', message, data);
}
