/**
 * @ipsec-xfrm/algorithm - Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { loadAlgorithmConfig } from '../config';
import { AlgorithmDescriptor } from '../algorithm/descriptor';
import { CRYPT_AES_CBC } from '../constants';

describe('loadAlgorithmConfig', () => {
  it('is not debuggable when the variable is unset', () => {
    expect(loadAlgorithmConfig({})).toEqual({ debuggable: false });
  });

  it.each(['true', '1', ' TRUE '])('is debuggable for %j', (value) => {
    expect(loadAlgorithmConfig({ ALGORITHM_DEBUGGABLE: value }).debuggable).toBe(true);
  });

  it.each(['false', '0', 'yes', ''])('is not debuggable for %j', (value) => {
    expect(loadAlgorithmConfig({ ALGORITHM_DEBUGGABLE: value }).debuggable).toBe(false);
  });

  it('threads into describe as revealKey', () => {
    const descriptor = AlgorithmDescriptor.create(CRYPT_AES_CBC, new Uint8Array(16).fill(0xab));
    const { debuggable } = loadAlgorithmConfig({ ALGORITHM_DEBUGGABLE: '1' });

    expect(descriptor.describe({ revealKey: debuggable })).toBe(
      '{name=cbc(aes), key=abababababababababababababababab, truncationLengthBits=128}'
    );
  });
});
