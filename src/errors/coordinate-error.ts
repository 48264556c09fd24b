import { ValidationError } from './validation-error';

/**
 * Reasons a coordinate text can be rejected.
 */
export type CoordinateErrorCode =
  | 'NO_COORDINATES'
  | 'INVALID_FORMAT'
  | 'PARSE_ERROR'
  | 'LATITUDE_OUT_OF_RANGE'
  | 'LONGITUDE_OUT_OF_RANGE'
  | 'TOO_FEW_COORDINATES';

/**
 * Error thrown when coordinate text cannot be turned into a polygon.
 */
export class CoordinateParseError extends ValidationError {
  readonly code: CoordinateErrorCode;
  /** The offending line, trimmed */
  readonly line?: string;
  /** 1-based line number in the original text */
  readonly lineNumber?: number;
  /** Field that failed a range check */
  readonly field?: 'latitude' | 'longitude';
  /** Value that failed a range check */
  readonly value?: number;

  constructor(
    code: CoordinateErrorCode,
    message: string,
    details?: {
      line?: string;
      lineNumber?: number;
      field?: 'latitude' | 'longitude';
      value?: number;
    }
  ) {
    super(message, [
      {
        path: details?.lineNumber !== undefined ? `line ${details.lineNumber}` : '',
        message,
        code,
      },
    ]);
    this.name = 'CoordinateParseError';
    this.code = code;
    this.line = details?.line;
    this.lineNumber = details?.lineNumber;
    this.field = details?.field;
    this.value = details?.value;
    Object.setPrototypeOf(this, CoordinateParseError.prototype);
  }
}
