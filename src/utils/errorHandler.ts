import { ErrorCode, GatewayDecodeError, GatewayEncodeError, ValidationError } from '../models/ErrorTypes';
import { LogContext, logger } from './logger';

/**
 * Outcome of a non-throwing decode
 */
export type DecodeResult<T> =
  | { isValid: true; data: T }
  | { isValid: false; code: ErrorCode; message: string; errors: ValidationError[] };

/**
 * Build a decode error from collected validation problems.
 * Only absent required fields yield MISSING_REQUIRED_FIELD.
 */
export function createDecodeError(root: string, errors: ValidationError[]): GatewayDecodeError {
  const missingOnly = errors.length > 0 && errors.every(error => error.rule === 'any.required');
  const code = missingOnly ? ErrorCode.MISSING_REQUIRED_FIELD : ErrorCode.STRUCTURAL_DECODE_ERROR;
  const summary = errors.map(error => error.message).join('; ');

  return new GatewayDecodeError(`Invalid ${root} payload: ${summary}`, code, errors);
}

/**
 * Extract error information from various error types
 */
export function extractErrorInfo(error: unknown): {
  code: ErrorCode;
  message: string;
  details?: ValidationError[];
} {
  if (error instanceof GatewayDecodeError) {
    return {
      code: error.code,
      message: error.message,
      details: error.details
    };
  }

  if (error instanceof GatewayEncodeError) {
    return {
      code: error.code,
      message: error.message,
      details: [{ field: error.field, rule: 'encode', message: error.message }]
    };
  }

  return {
    code: ErrorCode.INTERNAL_ERROR,
    message: error instanceof Error ? error.message : 'An unexpected error occurred'
  };
}

/**
 * Run a decoder and report failure as a value instead of throwing.
 * Errors other than decode errors are not expected here and are rethrown.
 */
export function safeDecode<T>(
  decoder: (payload: unknown) => T,
  payload: unknown,
  context?: LogContext
): DecodeResult<T> {
  try {
    return { isValid: true, data: decoder(payload) };
  } catch (error) {
    if (!(error instanceof GatewayDecodeError)) {
      logger.error('Unexpected error while decoding payload', {
        ...context,
        operation: 'safe_decode'
      }, error instanceof Error ? error : undefined);
      throw error;
    }

    return {
      isValid: false,
      code: error.code,
      message: error.message,
      errors: error.details
    };
  }
}
