import { GatewayDecodeError } from '../models/ErrorTypes';
import { LogContext, logger } from '../utils/logger';

/**
 * Flag name to bit value table
 */
export type FlagTable<F extends string> = Readonly<Record<F, bigint>>;

/**
 * Immutable set of named flags packed into one integer.
 *
 * Bits that have no name in the table are kept as-is, so a set decoded from
 * the wire encodes back to the exact same integer.
 */
export class BitFlagSet<F extends string> {
  private readonly table: FlagTable<F>;
  private readonly bits: bigint;

  constructor(table: FlagTable<F>, bits: bigint = 0n) {
    this.table = table;
    this.bits = bits;
  }

  has(flag: F): boolean {
    const bit = this.bitOf(flag);
    return (this.bits & bit) === bit;
  }

  with(...flags: F[]): BitFlagSet<F> {
    const added = flags.reduce((acc, flag) => acc | this.bitOf(flag), this.bits);
    return new BitFlagSet(this.table, added);
  }

  without(...flags: F[]): BitFlagSet<F> {
    const removed = flags.reduce((acc, flag) => acc & ~this.bitOf(flag), this.bits);
    return new BitFlagSet(this.table, removed);
  }

  /**
   * Named flags that are set, in table order
   */
  names(): F[] {
    return this.flagNames().filter(flag => this.has(flag));
  }

  /**
   * Set bits that have no name in the table
   */
  unknownBits(): bigint {
    const known = this.flagNames().reduce((acc, flag) => acc | this.bitOf(flag), 0n);
    return this.bits & ~known;
  }

  isEmpty(): boolean {
    return this.bits === 0n;
  }

  equals(other: BitFlagSet<F>): boolean {
    return this.bits === other.bits;
  }

  toBits(): number {
    return Number(this.bits);
  }

  private bitOf(flag: F): bigint {
    const bit: bigint = this.table[flag];
    return bit;
  }

  private flagNames(): F[] {
    return Object.keys(this.table).filter((key): key is F => key in this.table);
  }
}

/**
 * Wire codec for one flag table
 */
export interface FlagCodec<F extends string> {
  readonly name: string;
  readonly table: FlagTable<F>;
  decode(bits: number, context?: LogContext): BitFlagSet<F>;
  encode(flags: BitFlagSet<F>): number;
  empty(): BitFlagSet<F>;
  of(...flags: F[]): BitFlagSet<F>;
}

export function createFlagCodec<F extends string>(name: string, table: FlagTable<F>): FlagCodec<F> {
  return {
    name,
    table,

    decode(bits, context) {
      if (!Number.isSafeInteger(bits) || bits < 0) {
        throw GatewayDecodeError.structural(
          name,
          'flags.integer',
          `${name} must be a non-negative safe integer`,
          bits
        );
      }

      const flags = new BitFlagSet(table, BigInt(bits));
      const unknown = flags.unknownBits();
      if (unknown !== 0n) {
        logger.unknownFlagBits(name, unknown, context);
      }
      return flags;
    },

    encode(flags) {
      return flags.toBits();
    },

    empty() {
      return new BitFlagSet(table);
    },

    of(...flags) {
      return new BitFlagSet(table).with(...flags);
    }
  };
}
