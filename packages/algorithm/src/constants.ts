/**
 * @ipsec-xfrm/algorithm - Constants
 *
 * Algorithm identifiers and record layout sizes.
 */

/** AES-CBC encryption. Valid key lengths are {128, 192, 256} bits. */
export const CRYPT_AES_CBC = 'cbc(aes)';

/**
 * MD5 HMAC authentication. Legacy only, kept for 3GPP interoperability.
 * Truncation lengths 96 to (default) 128 bits.
 */
export const AUTH_HMAC_MD5 = 'hmac(md5)';

/**
 * SHA1 HMAC authentication. Legacy only, kept for 3GPP interoperability.
 * Truncation lengths 96 to (default) 160 bits.
 */
export const AUTH_HMAC_SHA1 = 'hmac(sha1)';

/** SHA256 HMAC authentication. Truncation lengths 96 to (default) 256 bits. */
export const AUTH_HMAC_SHA256 = 'hmac(sha256)';

/** SHA384 HMAC authentication. Truncation lengths 192 to (default) 384 bits. */
export const AUTH_HMAC_SHA384 = 'hmac(sha384)';

/** SHA512 HMAC authentication. Truncation lengths 256 to (default) 512 bits. */
export const AUTH_HMAC_SHA512 = 'hmac(sha512)';

/**
 * AES-GCM authenticated encryption (RFC 4106).
 *
 * Keying material is a 128, 192 or 256 bit AES key followed by a 32-bit salt,
 * so valid keying material lengths are {160, 224, 288} bits.
 * Valid ICV (truncation) lengths are {64, 96, 128} bits.
 */
export const AUTH_CRYPT_AES_GCM = 'rfc4106(gcm(aes))';

/** Every supported identifier, in declaration order */
export const ALGORITHM_NAMES = [
  CRYPT_AES_CBC,
  AUTH_HMAC_MD5,
  AUTH_HMAC_SHA1,
  AUTH_HMAC_SHA256,
  AUTH_HMAC_SHA384,
  AUTH_HMAC_SHA512,
  AUTH_CRYPT_AES_GCM,
] as const;

/** Closed set of supported algorithm identifiers */
export type AlgorithmName = (typeof ALGORITHM_NAMES)[number];

/** Size of each length prefix in a serialized record, in bytes (u32 big-endian) */
export const RECORD_LENGTH_PREFIX_SIZE = 4;

/** Size of the trailing truncation length field, in bytes (i32 big-endian) */
export const RECORD_TRUNCATION_SIZE = 4;

/** Smallest possible record: empty name, empty key, truncation field */
export const RECORD_MIN_SIZE = RECORD_LENGTH_PREFIX_SIZE * 2 + RECORD_TRUNCATION_SIZE;
