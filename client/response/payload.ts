import * as t from 'io-ts';
import * as E from 'fp-ts/lib/Either';
import * as O from 'fp-ts/lib/Option';
import { pipe } from 'fp-ts/lib/function';

import { MissingFieldError, PayloadShapeMismatchError, ResponseDecodeError } from '../errors';
import { Codec } from './types';

export function decodeSequence<D>(descriptor: Codec<D>) {
  const codec = t.array(descriptor);

  return (data: O.Option<unknown>): E.Either<ResponseDecodeError, D[]> => {
    if (O.isNone(data)) {
      return E.left(new PayloadShapeMismatchError(`Expected payload of ${codec.name}, got nothing`));
    }
    return pipe(
      codec.decode(data.value),
      E.mapLeft(errors => PayloadShapeMismatchError.fromErrors(codec.name, errors))
    );
  };
}

/**
 * Decodes the payload of a method declared without a return value.
 *
 * The server omits `data` entirely in this case. An explicit `null` is accepted as well,
 * anything else means the method did return something and the caller got its
 * declaration wrong.
 */
export function decodeUnit(data: O.Option<unknown>): E.Either<ResponseDecodeError, void> {
  if (O.isNone(data)) {
    return E.right(undefined);
  }
  return pipe(
    t.null.decode(data.value),
    E.bimap(
      errors => PayloadShapeMismatchError.fromErrors('void', errors),
      () => undefined
    )
  );
}

/**
 * Decodes the payload of a method that declares a return value. An absent `data` field is
 * a protocol violation here, never an empty result.
 *
 * An explicit `data: null` is handed to the codec like any other value: it decodes when
 * the codec accepts `null` and is a `PayloadShapeMismatch` otherwise, not a missing field.
 */
export function decodeValue<R>(codec: Codec<R>) {
  return (data: O.Option<unknown>): E.Either<ResponseDecodeError, R> => {
    if (O.isNone(data)) {
      return E.left(new MissingFieldError('data'));
    }
    return pipe(
      codec.decode(data.value),
      E.mapLeft(errors => PayloadShapeMismatchError.fromErrors(codec.name, errors))
    );
  };
}
