import * as t from 'io-ts';
import * as E from 'fp-ts/lib/Either';
import * as O from 'fp-ts/lib/Option';
import { pipe } from 'fp-ts/lib/function';

import { MissingFieldError, PayloadShapeMismatchError, ResponseDecodeError, UnrecognizedTagError } from '../errors';
import { Envelope, ErrorTag, Operation, RpcResponse, SuccessTag, failure, success } from './types';

// `undefined` only shows up for envelopes built in memory, treat it like an omitted field
const readField = (record: Record<string, unknown>, key: string): O.Option<unknown> => {
  const value = Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
  return value === undefined ? O.none : O.some(value);
};

function decodeErrorMessage(data: O.Option<unknown>): E.Either<ResponseDecodeError, string> {
  if (O.isNone(data)) {
    return E.left(new MissingFieldError('data'));
  }
  // A non-string here may well be a success payload that serialized to something odd,
  // there is no telling from the envelope, so it stays a shape mismatch.
  return pipe(
    t.string.decode(data.value),
    E.mapLeft(errors => PayloadShapeMismatchError.fromErrors('error message', errors))
  );
}

/**
 * Decodes a response envelope `{ type, data? }` into an {@link RpcResponse}.
 *
 * The `list`, `methods` and `result` tags are accepted for any operation; the shape of the
 * payload comes from the operation alone. Errors are returned, never thrown.
 */
export function decodeResponse<A>(
  operation: Operation<A>,
  input: unknown
): E.Either<ResponseDecodeError, RpcResponse<A>> {
  if (!t.UnknownRecord.is(input)) {
    return E.left(new PayloadShapeMismatchError('Expected response envelope to be an object'));
  }

  const tag = readField(input, 'type');
  if (O.isNone(tag)) {
    return E.left(new MissingFieldError('type'));
  }
  if (!t.string.is(tag.value)) {
    return E.left(new PayloadShapeMismatchError('Expected response tag to be a string'));
  }

  const data = readField(input, 'data');

  if (SuccessTag.is(tag.value)) {
    return pipe(
      operation.decodePayload(data),
      E.map(payload => success(payload))
    );
  }
  if (ErrorTag.is(tag.value)) {
    return pipe(
      decodeErrorMessage(data),
      E.map((message): RpcResponse<A> => failure(message))
    );
  }
  return E.left(new UnrecognizedTagError(tag.value));
}

/**
 * Writes a response the way the server would send it for the given operation.
 */
export function encodeResponse<A>(operation: Operation<A>, response: RpcResponse<A>): Envelope {
  switch (response.kind) {
    case 'success': {
      const data = operation.encodePayload(response.payload);
      return O.isSome(data) ? { type: operation.tag, data: data.value } : { type: operation.tag };
    }
    case 'error':
      return { type: 'error', data: response.message };
  }
}
