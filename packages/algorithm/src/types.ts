/**
 * @ipsec-xfrm/algorithm - Type Definitions
 *
 * Error type shared by the descriptor and the record codec.
 */

/**
 * Error codes for categorized error handling.
 *
 * - INVALID_ARGUMENT: rejected by the rule table during validating construction
 * - MALFORMED_RECORD: a serialized record could not be read
 */
export type AlgorithmErrorCode = 'INVALID_ARGUMENT' | 'MALFORMED_RECORD';

/**
 * Custom error class for algorithm descriptor operations.
 * Messages are fixed strings and never carry key material.
 */
export class AlgorithmError extends Error {
  readonly code: AlgorithmErrorCode;

  constructor(message: string, code: AlgorithmErrorCode) {
    super(message);
    this.name = 'AlgorithmError';
    this.code = code;

    // Maintain proper stack trace for V8 (Node.js-specific)
    const ErrorWithCapture = Error as typeof Error & {
      captureStackTrace?: (target: object, constructor: unknown) => void;
    };
    if (ErrorWithCapture.captureStackTrace) {
      ErrorWithCapture.captureStackTrace(this, AlgorithmError);
    }
  }
}
