/**
 * @ipsec-xfrm/algorithm - Record Marshaling
 *
 * Serializes a descriptor to bytes for transport between processes.
 *
 * Format (all integers big-endian):
 *   nameLength (u32) || name (UTF-8) || keyLength (u32) || key || truncationLengthBits (i32)
 *
 * Unmarshaling trusts the field values and does not re-run rule validation.
 * Only the framing is checked.
 */

import { AlgorithmError } from '../types';
import { RECORD_LENGTH_PREFIX_SIZE, RECORD_MIN_SIZE, RECORD_TRUNCATION_SIZE } from '../constants';
import { AlgorithmDescriptor } from '../algorithm/descriptor';
import { bytesToHex, concatBytes, hexToBytes } from '../utils/encoding';

function uint32(value: number): Uint8Array {
  const bytes = new Uint8Array(RECORD_LENGTH_PREFIX_SIZE);
  new DataView(bytes.buffer).setUint32(0, value);
  return bytes;
}

function int32(value: number): Uint8Array {
  const bytes = new Uint8Array(RECORD_TRUNCATION_SIZE);
  new DataView(bytes.buffer).setInt32(0, value);
  return bytes;
}

function malformed(): AlgorithmError {
  return new AlgorithmError('Malformed algorithm record', 'MALFORMED_RECORD');
}

/**
 * Serialize a descriptor.
 *
 * @returns Record bytes (contains key material in the clear)
 */
export function marshalAlgorithm(descriptor: AlgorithmDescriptor): Uint8Array {
  const name = new TextEncoder().encode(descriptor.getName());
  const key = descriptor.getKey();

  return concatBytes(
    uint32(name.length),
    name,
    uint32(key.length),
    key,
    int32(descriptor.getTruncationLengthBits())
  );
}

/**
 * Deserialize a record produced by marshalAlgorithm.
 *
 * @throws AlgorithmError MALFORMED_RECORD if the framing is broken
 */
export function unmarshalAlgorithm(bytes: Uint8Array): AlgorithmDescriptor {
  if (bytes.length < RECORD_MIN_SIZE) {
    throw malformed();
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let offset = 0;

  const readSized = (): Uint8Array => {
    if (offset + RECORD_LENGTH_PREFIX_SIZE > bytes.length) {
      throw malformed();
    }
    const length = view.getUint32(offset);
    offset += RECORD_LENGTH_PREFIX_SIZE;
    if (length > bytes.length - offset) {
      throw malformed();
    }
    const field = bytes.slice(offset, offset + length);
    offset += length;
    return field;
  };

  const nameBytes = readSized();
  const key = readSized();

  // Truncation field must end the record exactly
  if (offset + RECORD_TRUNCATION_SIZE !== bytes.length) {
    throw malformed();
  }
  const truncationLengthBits = view.getInt32(offset);

  let name: string;
  try {
    name = new TextDecoder('utf-8', { fatal: true }).decode(nameBytes);
  } catch {
    throw malformed();
  }

  return AlgorithmDescriptor.fromTrustedRecord({ name, key, truncationLengthBits });
}

/**
 * Serialize a descriptor to a lowercase hex string.
 */
export function marshalAlgorithmHex(descriptor: AlgorithmDescriptor): string {
  return bytesToHex(marshalAlgorithm(descriptor));
}

/**
 * Deserialize a hex record.
 *
 * @throws AlgorithmError MALFORMED_RECORD for bad hex or broken framing
 */
export function unmarshalAlgorithmHex(hex: string): AlgorithmDescriptor {
  let bytes: Uint8Array;
  try {
    bytes = hexToBytes(hex);
  } catch {
    throw malformed();
  }
  return unmarshalAlgorithm(bytes);
}
