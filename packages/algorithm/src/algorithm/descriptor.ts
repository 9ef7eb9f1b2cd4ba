/**
 * @ipsec-xfrm/algorithm - Algorithm Descriptor
 *
 * Immutable (name, key, truncation length) triple handed to a transform.
 * Construction from parameters validates against the rule table; reconstruction
 * from a trusted record does not.
 */

import { AlgorithmError } from '../types';
import { bytesToHex, equalBytes } from '../utils/encoding';
import { isTruncationLengthValid } from './rules';

/** Raw fields of a descriptor as they appear in a serialized record */
export type AlgorithmFields = {
  name: string;
  key: Uint8Array;
  truncationLengthBits: number;
};

export type DescribeOptions = {
  /** Include the key as hex. Only pass true from debuggable builds. */
  revealKey: boolean;
};

const HIDDEN_KEY = '<hidden>';

export class AlgorithmDescriptor {
  private readonly name: string;
  private readonly key: Uint8Array;
  private readonly truncationLengthBits: number;

  private constructor(name: string, key: Uint8Array, truncationLengthBits: number) {
    this.name = name;
    // new Uint8Array() copies; Buffer#slice would return a view
    this.key = new Uint8Array(key);
    this.truncationLengthBits = truncationLengthBits;
    Object.freeze(this);
  }

  /**
   * Create a descriptor for one of the supported algorithms.
   *
   * The supplied truncation length is checked before it is clamped to the key's
   * bit length, so 256 for cbc(aes) with a 16-byte key is accepted and stored as
   * 128, while 512 is rejected.
   *
   * @param name - Algorithm identifier (see constants)
   * @param key - Key material; copied, never aliased
   * @param truncationLengthBits - Bits of output to use; defaults to the key's bit length
   * @throws AlgorithmError INVALID_ARGUMENT for an unknown name or invalid length
   */
  static create(
    name: string,
    key: Uint8Array,
    truncationLengthBits: number = key.length * 8
  ): AlgorithmDescriptor {
    if (!isTruncationLengthValid(name, truncationLengthBits)) {
      throw new AlgorithmError('Unknown algorithm or invalid length', 'INVALID_ARGUMENT');
    }
    return new AlgorithmDescriptor(
      name,
      key,
      Math.min(truncationLengthBits, key.length * 8)
    );
  }

  /**
   * Rebuild a descriptor from fields read out of a trusted record.
   *
   * Skips rule validation and clamping: the fields are stored as given.
   * Use create() for anything that did not come from marshalAlgorithm().
   */
  static fromTrustedRecord(fields: AlgorithmFields): AlgorithmDescriptor {
    return new AlgorithmDescriptor(fields.name, fields.key, fields.truncationLengthBits);
  }

  /**
   * Compare two possibly absent descriptors.
   * Absent (null or undefined) equals only absent.
   */
  static equals(
    lhs: AlgorithmDescriptor | null | undefined,
    rhs: AlgorithmDescriptor | null | undefined
  ): boolean {
    if (lhs == null || rhs == null) {
      return lhs == null && rhs == null;
    }
    return (
      lhs.name === rhs.name &&
      equalBytes(lhs.key, rhs.key) &&
      lhs.truncationLengthBits === rhs.truncationLengthBits
    );
  }

  getName(): string {
    return this.name;
  }

  /** Returns a fresh copy of the key on every call */
  getKey(): Uint8Array {
    return new Uint8Array(this.key);
  }

  /** Truncation length of the algorithm output, in bits */
  getTruncationLengthBits(): number {
    return this.truncationLengthBits;
  }

  equals(other: AlgorithmDescriptor | null | undefined): boolean {
    return AlgorithmDescriptor.equals(this, other);
  }

  /**
   * Human-readable form for diagnostics.
   * The key is printed as hex only when revealKey is set.
   */
  describe(options: DescribeOptions): string {
    const key = options.revealKey ? bytesToHex(this.key) : HIDDEN_KEY;
    return `{name=${this.name}, key=${key}, truncationLengthBits=${this.truncationLengthBits}}`;
  }

  toString(): string {
    return this.describe({ revealKey: false });
  }

  /** JSON form carries no key material */
  toJSON(): { name: string; truncationLengthBits: number } {
    return { name: this.name, truncationLengthBits: this.truncationLengthBits };
  }

  // console.log / util.inspect would otherwise print the key bytes
  [Symbol.for('nodejs.util.inspect.custom')](): string {
    return `AlgorithmDescriptor ${this.toString()}`;
  }
}
