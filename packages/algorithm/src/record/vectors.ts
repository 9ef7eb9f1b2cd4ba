/**
 * @ipsec-xfrm/algorithm - Reference Vectors
 *
 * Deterministic records for every supported algorithm, used to pin the wire
 * format in tests and documentation.
 */

import { ALGORITHM_NAMES, type AlgorithmName } from '../constants';
import { ALGORITHM_RULES, type TruncationRule } from '../algorithm/rules';
import { AlgorithmDescriptor } from '../algorithm/descriptor';
import { bytesToHex } from '../utils/encoding';
import { marshalAlgorithmHex } from './marshal';

export type ReferenceVector = {
  name: AlgorithmName;
  /** Test key: bytes 0x00, 0x01, ... (NOT secret) */
  keyHex: string;
  truncationLengthBits: number;
  recordHex: string;
};

function maxTruncation(truncation: TruncationRule): number {
  return truncation.kind === 'range' ? truncation.max : Math.max(...truncation.values);
}

/**
 * Build the reference vector for one algorithm.
 *
 * Key size is the largest documented key size, or the digest size for HMAC.
 * Truncation is the largest valid length.
 */
export function createReferenceVector(name: AlgorithmName): ReferenceVector {
  const rule = ALGORITHM_RULES[name];
  const truncationLengthBits = maxTruncation(rule.truncation);
  const keyBits =
    rule.keyLengthsBits.length > 0 ? Math.max(...rule.keyLengthsBits) : truncationLengthBits;

  const key = Uint8Array.from({ length: keyBits / 8 }, (_, i) => i);
  const descriptor = AlgorithmDescriptor.create(name, key, truncationLengthBits);

  return {
    name,
    keyHex: bytesToHex(key),
    truncationLengthBits: descriptor.getTruncationLengthBits(),
    recordHex: marshalAlgorithmHex(descriptor),
  };
}

/**
 * One reference vector per supported algorithm, in ALGORITHM_NAMES order.
 */
export function createReferenceVectors(): ReferenceVector[] {
  return ALGORITHM_NAMES.map(createReferenceVector);
}
