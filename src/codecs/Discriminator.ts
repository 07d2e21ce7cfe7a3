import { GatewayDecodeError, GatewayEncodeError } from '../models/ErrorTypes';

const DISCRIMINATOR_PATTERN = /^\d{1,4}$/;

/**
 * Parse the wire discriminator, a zero-padded numeric string such as "0042"
 */
export function decodeDiscriminator(value: string, field = 'discriminator'): number {
  if (!DISCRIMINATOR_PATTERN.test(value)) {
    throw GatewayDecodeError.structural(
      field,
      'string.pattern.base',
      'Discriminator must be a numeric string of at most 4 digits',
      value
    );
  }
  return parseInt(value, 10);
}

/**
 * Absent means unknown; an empty string is still rejected
 */
export function decodeOptionalDiscriminator(
  value: string | null | undefined,
  field = 'discriminator'
): number | undefined {
  return value === null || value === undefined ? undefined : decodeDiscriminator(value, field);
}

export function encodeDiscriminator(value: number, field = 'discriminator'): string {
  if (!Number.isInteger(value) || value < 0 || value > 9999) {
    throw new GatewayEncodeError(field, `Discriminator ${value} is outside 0-9999`);
  }
  return value.toString().padStart(4, '0');
}
