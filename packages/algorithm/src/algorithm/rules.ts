/**
 * @ipsec-xfrm/algorithm - Validation Rules
 *
 * Per-algorithm truncation length rules. The table is keyed by AlgorithmName,
 * so adding an identifier without a rule fails to compile.
 */

import {
  ALGORITHM_NAMES,
  AUTH_CRYPT_AES_GCM,
  AUTH_HMAC_MD5,
  AUTH_HMAC_SHA1,
  AUTH_HMAC_SHA256,
  AUTH_HMAC_SHA384,
  AUTH_HMAC_SHA512,
  CRYPT_AES_CBC,
  type AlgorithmName,
} from '../constants';

/** What an algorithm provides inside a transform */
export type AlgorithmCategory = 'encryption' | 'authentication' | 'aead';

/** Accepted truncation lengths: an enumerated set or an inclusive range */
export type TruncationRule =
  | { kind: 'set'; values: readonly number[] }
  | { kind: 'range'; min: number; max: number };

export type AlgorithmRule = {
  category: AlgorithmCategory;
  /** Provided for interoperability only; not for new deployments */
  legacy: boolean;
  truncation: TruncationRule;
  /** Documented key sizes in bits. Empty when any size is accepted. Not enforced. */
  keyLengthsBits: readonly number[];
};

export const ALGORITHM_RULES: Readonly<Record<AlgorithmName, AlgorithmRule>> = {
  [CRYPT_AES_CBC]: {
    category: 'encryption',
    legacy: false,
    truncation: { kind: 'set', values: [128, 192, 256] },
    keyLengthsBits: [128, 192, 256],
  },
  [AUTH_HMAC_MD5]: {
    category: 'authentication',
    legacy: true,
    truncation: { kind: 'range', min: 96, max: 128 },
    keyLengthsBits: [],
  },
  [AUTH_HMAC_SHA1]: {
    category: 'authentication',
    legacy: true,
    truncation: { kind: 'range', min: 96, max: 160 },
    keyLengthsBits: [],
  },
  [AUTH_HMAC_SHA256]: {
    category: 'authentication',
    legacy: false,
    truncation: { kind: 'range', min: 96, max: 256 },
    keyLengthsBits: [],
  },
  [AUTH_HMAC_SHA384]: {
    category: 'authentication',
    legacy: false,
    truncation: { kind: 'range', min: 192, max: 384 },
    keyLengthsBits: [],
  },
  [AUTH_HMAC_SHA512]: {
    category: 'authentication',
    legacy: false,
    truncation: { kind: 'range', min: 256, max: 512 },
    keyLengthsBits: [],
  },
  [AUTH_CRYPT_AES_GCM]: {
    category: 'aead',
    legacy: false,
    truncation: { kind: 'set', values: [64, 96, 128] },
    // 128/192/256-bit AES key + 32-bit salt
    keyLengthsBits: [160, 224, 288],
  },
};

/**
 * Narrow an arbitrary string to a supported algorithm identifier.
 */
export function isSupportedAlgorithm(name: string): name is AlgorithmName {
  return (ALGORITHM_NAMES as readonly string[]).includes(name);
}

/**
 * Look up the rule for an identifier.
 *
 * @returns The rule, or undefined for identifiers outside the closed set
 */
export function getAlgorithmRule(name: string): AlgorithmRule | undefined {
  return isSupportedAlgorithm(name) ? ALGORITHM_RULES[name] : undefined;
}

/**
 * Check a caller-supplied truncation length against the algorithm's rule.
 *
 * Unknown identifiers and non-integer lengths are never valid.
 */
export function isTruncationLengthValid(name: string, truncationLengthBits: number): boolean {
  const rule = getAlgorithmRule(name);
  if (!rule || !Number.isInteger(truncationLengthBits)) {
    return false;
  }

  const truncation = rule.truncation;
  switch (truncation.kind) {
    case 'set':
      return truncation.values.includes(truncationLengthBits);
    case 'range':
      return truncationLengthBits >= truncation.min && truncationLengthBits <= truncation.max;
  }
}

export function isEncryption(name: string): boolean {
  return getAlgorithmRule(name)?.category === 'encryption';
}

export function isAuthentication(name: string): boolean {
  return getAlgorithmRule(name)?.category === 'authentication';
}

export function isAuthenticatedEncryption(name: string): boolean {
  return getAlgorithmRule(name)?.category === 'aead';
}
