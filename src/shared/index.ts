export {
  McpError,
  RinexDecodeError,
  compressedInput,
  invalidOptions,
  internalError,
  invalidParams,
  malformedEpoch,
  malformedHeader,
  malformedNumericField,
  notFound,
  truncatedRecord,
} from './errors.js';
export type { ErrorCode, RinexErrorCode, RinexErrorData, SourcePosition } from './errors.js';
