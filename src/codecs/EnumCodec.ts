import { GatewayEncodeError } from '../models/ErrorTypes';
import { LogContext, logger } from '../utils/logger';

/**
 * Maps wire integer codes onto a closed numeric enum with a catch-all variant.
 *
 * Codes the service introduces later decode to the catch-all instead of
 * failing, so older clients keep working against newer payloads.
 */
export interface EnumCodec<T extends number> {
  /** Name used in logs and errors */
  readonly name: string;

  /** Variant used when the field is absent from the wire */
  readonly defaultValue: T;

  /** Catch-all variant for unrecognized codes */
  readonly unknownValue: T;

  decode(code: number, context?: LogContext): T;

  /** Like `decode`, but absent input yields `defaultValue` */
  decodeOptional(code: number | null | undefined, context?: LogContext): T;

  /** @throws GatewayEncodeError for the catch-all variant */
  encode(value: T, field?: string): number;

  isKnown(value: T): boolean;
}

/**
 * Build a codec from the known variants in declaration order.
 * The first entry doubles as the default for absent fields.
 */
export function createEnumCodec<T extends number>(
  name: string,
  known: readonly [T, ...T[]],
  unknownValue: T
): EnumCodec<T> {
  const [defaultValue] = known;
  const byCode = new Map<number, T>(known.map(value => [value, value]));

  const decode = (code: number, context?: LogContext): T => {
    const value = byCode.get(code);
    if (value === undefined) {
      logger.unknownEnumValue(name, code, context);
      return unknownValue;
    }
    return value;
  };

  return {
    name,
    defaultValue,
    unknownValue,
    decode,

    decodeOptional(code, context) {
      return code === null || code === undefined ? defaultValue : decode(code, context);
    },

    encode(value, field = name) {
      if (!byCode.has(value)) {
        throw new GatewayEncodeError(field, `${name} value ${value} has no wire code`);
      }
      return value;
    },

    isKnown(value) {
      return byCode.has(value);
    }
  };
}
