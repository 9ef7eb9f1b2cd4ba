/**
 * @ipsec-xfrm/algorithm - Algorithm Module
 *
 * Rule table and the immutable algorithm descriptor.
 */

export {
  AlgorithmDescriptor,
  type AlgorithmFields,
  type DescribeOptions,
} from './descriptor';
export {
  ALGORITHM_RULES,
  getAlgorithmRule,
  isSupportedAlgorithm,
  isTruncationLengthValid,
  isEncryption,
  isAuthentication,
  isAuthenticatedEncryption,
  type AlgorithmCategory,
  type AlgorithmRule,
  type TruncationRule,
} from './rules';
