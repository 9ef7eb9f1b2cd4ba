/**
 * @ipsec-xfrm/algorithm
 *
 * Immutable, validated descriptors for the algorithms of an IPsec transform
 * (encryption, authentication, or authenticated encryption).
 *
 * - Construction validates the truncation length against a per-algorithm rule table
 * - Keys are Uint8Array, copied on the way in and on every read
 * - Diagnostics redact key material unless the caller explicitly reveals it
 * - Records round-trip exactly; unmarshaling trusts the record and skips validation
 *
 * @example
 * ```typescript
 * import {
 *   AlgorithmDescriptor,
 *   AUTH_HMAC_SHA256,
 *   marshalAlgorithm,
 *   unmarshalAlgorithm,
 * } from '@ipsec-xfrm/algorithm';
 *
 * const auth = AlgorithmDescriptor.create(AUTH_HMAC_SHA256, key, 128);
 * const record = marshalAlgorithm(auth);
 * const copy = unmarshalAlgorithm(record);
 * copy.equals(auth); // true
 * ```
 */

export const ALGORITHM_VERSION = '0.1.0';

// Descriptor and rule table
export {
  AlgorithmDescriptor,
  ALGORITHM_RULES,
  getAlgorithmRule,
  isSupportedAlgorithm,
  isTruncationLengthValid,
  isEncryption,
  isAuthentication,
  isAuthenticatedEncryption,
  type AlgorithmFields,
  type DescribeOptions,
  type AlgorithmCategory,
  type AlgorithmRule,
  type TruncationRule,
} from './algorithm';

// Record serialization
export {
  marshalAlgorithm,
  unmarshalAlgorithm,
  marshalAlgorithmHex,
  unmarshalAlgorithmHex,
  createReferenceVector,
  createReferenceVectors,
  type ReferenceVector,
} from './record';

// Configuration
export { loadAlgorithmConfig, type AlgorithmConfig } from './config';

// Utility functions
export { hexToBytes, bytesToHex, equalBytes } from './utils';

// Types
export { AlgorithmError, type AlgorithmErrorCode } from './types';

// Constants
export {
  CRYPT_AES_CBC,
  AUTH_HMAC_MD5,
  AUTH_HMAC_SHA1,
  AUTH_HMAC_SHA256,
  AUTH_HMAC_SHA384,
  AUTH_HMAC_SHA512,
  AUTH_CRYPT_AES_GCM,
  ALGORITHM_NAMES,
  type AlgorithmName,
} from './constants';
