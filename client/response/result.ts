import * as E from 'fp-ts/lib/Either';

import { RpcResponse } from './types';

/**
 * Collapses a decoded response into the request outcome.
 *
 * NOTE: An operation whose own success payload serializes to `null` can't be told apart
 * from a malformed error envelope, this assumes the server never sends the latter.
 */
export function toResult<A>(response: RpcResponse<A>): E.Either<string, A> {
  return response.kind === 'success' ? E.right(response.payload) : E.left(response.message);
}
