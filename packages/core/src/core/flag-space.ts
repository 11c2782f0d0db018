/*
 * FlagSpace
 * ---------
 * Immutable enumeration of named capability bits.
 *
 * Layout (signed 32-bit integer, as produced by JS bitwise operators):
 *   Bit i:     the i-th declared name (1 << i)
 *   Bit 31:    never used, so every value (ALL included) stays positive
 *
 * Synthetic members:
 *   NONE = 0
 *   ALL  = OR of every declared bit
 *
 * Combining flags is left to the caller: `FLAGS.flags.BASE | FLAGS.flags.RULES`.
 */
import { ConfigurationError, UnknownFlagError } from '../errors/errors.js';

/** A single flag or a combination of flags. */
export type Flag = number;

/** Maximum number of declared names; bit 31 is the sign bit. */
export const MAX_FLAGS = 31;

export const NONE: Flag = 0;

/**
 * Spellings of "none" accepted by lookups.
 */
const NONE_ALIASES: ReadonlySet<string> = new Set(['NONE', 'None', 'none']);
const RESERVED: ReadonlySet<string> = new Set([...NONE_ALIASES, 'ALL']);

/**
 * Read-only member table: one property per declared name plus the synthetic members.
 */
export type FlagMembers<N extends string> = { readonly [K in N | 'ALL' | 'NONE' | 'None']: Flag };

export class FlagSpace<N extends string = string> {
  readonly NONE: Flag = NONE;
  readonly ALL: Flag;
  readonly names: readonly N[];
  readonly flags: FlagMembers<N>;

  private readonly bits: ReadonlyMap<string, Flag>;

  private constructor(names: readonly N[]) {
    const bits = new Map<string, Flag>();
    const flags = {} as { [K in N | 'ALL' | 'NONE' | 'None']: Flag };
    let all = NONE;

    names.forEach((name, i) => {
      const bit = 1 << i;
      bits.set(name, bit);
      flags[name] = bit;
      all |= bit;
    });

    flags.ALL = all;
    flags.NONE = NONE;
    flags.None = NONE;

    this.ALL = all;
    this.names = Object.freeze([...names]);
    this.flags = Object.freeze(flags);
    this.bits = bits;
    Object.freeze(this);
  }

  /**
   * Declare a flag space from an ordered list of distinct names.
   *
   * @throws ConfigurationError for an empty list, duplicates, reserved or blank
   *         names, or more than {@link MAX_FLAGS} names
   *
   * @example
   * ```typescript
   * const FLAGS = FlagSpace.define(['BASE', 'LISTENERS', 'RULES']);
   * FLAGS.flags.RULES; // 4
   * FLAGS.ALL;         // 7
   * ```
   */
  static define<N extends string>(names: readonly N[]): FlagSpace<N> {
    if (names.length === 0) {
      throw new ConfigurationError('a flag space needs at least one name');
    }
    if (names.length > MAX_FLAGS) {
      throw new ConfigurationError(
        `a flag space holds at most ${MAX_FLAGS} names, got ${names.length}`
      );
    }

    const seen = new Set<string>();
    for (let i = 0; i < names.length; i++) {
      const name = names[i];
      if (typeof name !== 'string' || name.length === 0) {
        throw new ConfigurationError(`names[${i}] must be a non-empty string`);
      }
      if (RESERVED.has(name)) {
        throw new ConfigurationError(`'${name}' is reserved and cannot be declared`);
      }
      if (seen.has(name)) {
        throw new ConfigurationError(`duplicate flag name '${name}'`);
      }
      seen.add(name);
    }

    return new FlagSpace(names);
  }

  /**
   * Exact, case-sensitive lookup of a flag value by name.
   *
   * "NONE", "None" and "none" always resolve to 0; "ALL" to the union of every bit.
   */
  get(name: string): Flag {
    if (NONE_ALIASES.has(name)) return NONE;
    if (name === 'ALL') return this.ALL;
    const bit = this.bits.get(name);
    if (bit === undefined) throw new UnknownFlagError(name, [...this.names]);
    return bit;
  }

  has(name: string): boolean {
    return RESERVED.has(name) || this.bits.has(name);
  }

  /**
   * True when `flags` uses only bits declared in this space.
   */
  contains(flags: Flag): boolean {
    // The range check comes first: bitwise operators truncate to 32 bits.
    return Number.isInteger(flags) && flags >= 0 && flags <= this.ALL && (flags & ~this.ALL) === 0;
  }

  /**
   * Name of a single declared bit.
   */
  nameOf(bit: Flag): N {
    const index = this.indexOf(bit);
    if (index < 0) throw new UnknownFlagError(bit, [...this.names]);
    return this.names[index];
  }

  /**
   * Declared names whose bits are set in `flags`, in declaration order.
   */
  describe(flags: Flag): N[] {
    return this.names.filter((_, i) => (flags & (1 << i)) !== 0);
  }

  /**
   * Ordered `[name, value]` pairs, followed by the synthetic members.
   */
  entries(): Array<[string, Flag]> {
    const out: Array<[string, Flag]> = this.names.map(
      (name, i): [string, Flag] => [name, 1 << i]
    );
    out.push(['ALL', this.ALL], ['None', NONE], ['NONE', NONE]);
    return out;
  }

  toString(): string {
    const members = this.names.map((name, i) => `${name}=${1 << i}`);
    return `FlagSpace(${[...members, `ALL=${this.ALL}`, `NONE=${NONE}`].join(', ')})`;
  }

  private indexOf(bit: Flag): number {
    if (!isSingleBit(bit)) return -1;
    const index = 31 - Math.clz32(bit);
    return index < this.names.length ? index : -1;
  }
}

/**
 * Variadic shorthand for {@link FlagSpace.define}.
 */
export function defineFlags<N extends string>(...names: N[]): FlagSpace<N> {
  return FlagSpace.define(names);
}

/**
 * True when `flag` is exactly one bit.
 */
export function isSingleBit(flag: Flag): boolean {
  return (
    Number.isInteger(flag) && flag > 0 && flag <= 2 ** (MAX_FLAGS - 1) && (flag & (flag - 1)) === 0
  );
}

/**
 * Split a combined flag into its single bits, lowest first.
 */
export function bitsOf(flags: Flag): Flag[] {
  const out: Flag[] = [];
  let rest = flags;
  while (rest !== 0) {
    const low = rest & -rest;
    out.push(low);
    rest &= ~low;
  }
  return out;
}
