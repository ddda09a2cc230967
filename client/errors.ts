import * as t from 'io-ts';
import { left } from 'fp-ts/lib/Either';
import { PathReporter } from 'io-ts/lib/PathReporter';

export type DecodeErrorCode = 'UnrecognizedTag' | 'PayloadShapeMismatch' | 'MissingField';

/**
 * Failure raised while decoding a single response envelope. It never affects other
 * in-flight responses, the dispatch layer reports it as the outcome of one request.
 */
export abstract class ResponseDecodeError extends Error {
  abstract readonly code: DecodeErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnrecognizedTagError extends ResponseDecodeError {
  readonly code = 'UnrecognizedTag' as const;

  constructor(readonly tag: string) {
    super(`Unrecognized response tag "${tag}"`);
  }
}

export class PayloadShapeMismatchError extends ResponseDecodeError {
  readonly code = 'PayloadShapeMismatch' as const;

  constructor(message: string, readonly details: string[] = []) {
    super(message);
  }

  static fromErrors(expected: string, errors: t.Errors): PayloadShapeMismatchError {
    return new PayloadShapeMismatchError(`Expected payload of ${expected}`, PathReporter.report(left(errors)));
  }
}

export class MissingFieldError extends ResponseDecodeError {
  readonly code = 'MissingField' as const;

  constructor(readonly field: string) {
    super(`Missing field "${field}"`);
  }
}

/**
 * The server answered with an `error` envelope. Raised by callers that collapse the
 * response into a plain value, decoding itself reports it as a regular response.
 */
export class RpcRemoteError extends Error {
  constructor(readonly operation: string, message: string) {
    super(message);
    this.name = 'RpcRemoteError';
  }
}
