import { ErrorCode, GatewayDecodeError, GatewayEncodeError } from '../../models/ErrorTypes';
import { createDecodeError, extractErrorInfo, safeDecode } from '../errorHandler';

describe('errorHandler', () => {
  describe('createDecodeError', () => {
    it('should use MISSING_REQUIRED_FIELD when every problem is a missing field', () => {
      const error = createDecodeError('user', [
        { field: 'id', rule: 'any.required', message: '"id" is required' },
        { field: 'username', rule: 'any.required', message: '"username" is required' }
      ]);

      expect(error.code).toBe(ErrorCode.MISSING_REQUIRED_FIELD);
      expect(error.message).toBe('Invalid user payload: "id" is required; "username" is required');
    });

    it('should use STRUCTURAL_DECODE_ERROR when any problem is structural', () => {
      const error = createDecodeError('user', [
        { field: 'id', rule: 'any.required', message: '"id" is required' },
        { field: 'bot', rule: 'boolean.base', message: '"bot" must be a boolean' }
      ]);

      expect(error.code).toBe(ErrorCode.STRUCTURAL_DECODE_ERROR);
      expect(error.details).toHaveLength(2);
    });

    it('should treat an empty problem list as structural', () => {
      expect(createDecodeError('user', []).code).toBe(ErrorCode.STRUCTURAL_DECODE_ERROR);
    });
  });

  describe('safeDecode', () => {
    it('should return the decoded value', () => {
      expect(safeDecode(payload => String(payload), 5)).toEqual({ isValid: true, data: '5' });
    });

    it('should return decode errors as a value', () => {
      const result = safeDecode(() => {
        throw GatewayDecodeError.structural('v', 'number.base', '"v" must be a number', 'x');
      }, {});

      expect(result).toEqual({
        isValid: false,
        code: ErrorCode.STRUCTURAL_DECODE_ERROR,
        message: '"v" must be a number',
        errors: [{ field: 'v', rule: 'number.base', message: '"v" must be a number', value: 'x' }]
      });
    });

    it('should rethrow other errors', () => {
      expect(() => safeDecode(() => {
        throw new RangeError('boom');
      }, {})).toThrow(RangeError);
    });
  });

  describe('extractErrorInfo', () => {
    it('should describe an encode error', () => {
      const info = extractErrorInfo(new GatewayEncodeError('type', 'ActivityType.Unknown cannot be encoded'));

      expect(info.code).toBe(ErrorCode.UNSUPPORTED_ENCODING);
      expect(info.details).toEqual([
        { field: 'type', rule: 'encode', message: 'ActivityType.Unknown cannot be encoded' }
      ]);
    });

    it('should map unexpected errors to INTERNAL_ERROR', () => {
      expect(extractErrorInfo(new Error('oops'))).toEqual({ code: ErrorCode.INTERNAL_ERROR, message: 'oops' });
      expect(extractErrorInfo('not an error')).toEqual({
        code: ErrorCode.INTERNAL_ERROR,
        message: 'An unexpected error occurred'
      });
    });
  });
});
