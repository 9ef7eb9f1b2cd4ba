/**
 * Algorithm Record Test Vector Generator
 *
 * Prints the reference records for every supported algorithm, for use in
 * wire-format documentation and interop tests in other implementations.
 * Each record is decoded again and compared before it is printed.
 *
 * Keys are the fixed pattern 0x00, 0x01, ... and are NOT secret. Descriptor
 * lines still go through describe(), which hides the key unless
 * ALGORITHM_DEBUGGABLE is set.
 *
 * Run: npx tsx scripts/generate-test-vectors.ts
 */

import { config } from 'dotenv';
import {
  AlgorithmDescriptor,
  createReferenceVectors,
  hexToBytes,
  loadAlgorithmConfig,
  unmarshalAlgorithmHex,
} from '../packages/algorithm/src';

// Load environment variables
config();

function main(): void {
  const { debuggable } = loadAlgorithmConfig();

  console.log('='.repeat(72));
  console.log('Algorithm Record Test Vectors');
  console.log('='.repeat(72));
  console.log();

  for (const vector of createReferenceVectors()) {
    const expected = AlgorithmDescriptor.create(
      vector.name,
      hexToBytes(vector.keyHex),
      vector.truncationLengthBits
    );
    const decoded = unmarshalAlgorithmHex(vector.recordHex);

    console.log(`--- ${vector.name} ---`);
    console.log(`Descriptor: ${decoded.describe({ revealKey: debuggable })}`);
    console.log(`Key (hex, ${vector.keyHex.length / 2} bytes):`);
    console.log(`  ${vector.keyHex}`);
    console.log(`Truncation length: ${vector.truncationLengthBits} bits`);
    console.log(`Record (hex, ${vector.recordHex.length / 2} bytes):`);
    console.log(`  ${vector.recordHex}`);

    const match = decoded.equals(expected);
    console.log(`Round-trip verification: ${match ? 'PASS' : 'FAIL'}`);
    if (!match) {
      console.error('  Expected:', expected.describe({ revealKey: debuggable }));
      console.error('  Got:     ', decoded.describe({ revealKey: debuggable }));
      process.exit(1);
    }
    console.log();
  }
}

main();
