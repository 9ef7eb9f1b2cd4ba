/**
 * @ipsec-xfrm/algorithm - Record Module
 *
 * Wire codec for descriptors and deterministic reference vectors.
 */

export {
  marshalAlgorithm,
  unmarshalAlgorithm,
  marshalAlgorithmHex,
  unmarshalAlgorithmHex,
} from './marshal';
export { createReferenceVector, createReferenceVectors, type ReferenceVector } from './vectors';
