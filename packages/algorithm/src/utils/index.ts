/**
 * @ipsec-xfrm/algorithm - Utilities
 */

export { hexToBytes, bytesToHex, concatBytes, equalBytes } from './encoding';
