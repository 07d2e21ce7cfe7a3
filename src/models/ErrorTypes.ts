/**
 * Error codes raised by the gateway payload codecs
 */
export enum ErrorCode {
  // Decoding errors
  STRUCTURAL_DECODE_ERROR = "STRUCTURAL_DECODE_ERROR",
  MISSING_REQUIRED_FIELD = "MISSING_REQUIRED_FIELD",

  // Encoding errors
  UNSUPPORTED_ENCODING = "UNSUPPORTED_ENCODING",

  // Internal errors
  INTERNAL_ERROR = "INTERNAL_ERROR"
}

/**
 * Validation error details
 */
export interface ValidationError {
  /** Path of the wire field that failed validation */
  field: string;

  /** Validation rule that was violated */
  rule: string;

  /** Human-readable error message */
  message: string;

  /** Value that failed validation */
  value?: unknown;
}

/**
 * Raised when a wire payload does not match any accepted shape
 */
export class GatewayDecodeError extends Error {
  readonly code: ErrorCode;
  readonly details: ValidationError[];

  constructor(message: string, code: ErrorCode, details: ValidationError[]) {
    super(message);
    this.name = 'GatewayDecodeError';
    this.code = code;
    this.details = details;
  }

  /**
   * Single-problem structural error, used by the hand-written codecs
   */
  static structural(field: string, rule: string, message: string, value?: unknown): GatewayDecodeError {
    return new GatewayDecodeError(message, ErrorCode.STRUCTURAL_DECODE_ERROR, [
      { field, rule, message, value }
    ]);
  }
}

/**
 * Raised when an entity holds a value that has no wire representation
 */
export class GatewayEncodeError extends Error {
  readonly code = ErrorCode.UNSUPPORTED_ENCODING;
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'GatewayEncodeError';
    this.field = field;
  }
}
