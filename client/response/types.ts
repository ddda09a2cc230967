import * as t from 'io-ts';
import { Either } from 'fp-ts/lib/Either';
import { Option } from 'fp-ts/lib/Option';

import { ResponseDecodeError } from '../errors';

/**
 * Any codec that decodes from untrusted input. Descriptor and return value codecs
 * supplied by callers only need to agree on the decoded type.
 */
export type Codec<A> = t.Type<A, unknown, unknown>;

/**
 * Wire tags that denote a successful response. The server picks one depending on the
 * operation, but all of them decode to the same variant.
 */
export type SuccessTag = t.TypeOf<typeof SuccessTag>;
export const SuccessTag = t.keyof({
  list: null,
  methods: null,
  result: null,
});

export type ErrorTag = t.TypeOf<typeof ErrorTag>;
export const ErrorTag = t.literal('error');

export type Envelope = {
  readonly type: SuccessTag | ErrorTag;
  readonly data?: unknown;
};

export type RpcSuccess<A> = { readonly kind: 'success'; readonly payload: A };
export type RpcFailure = { readonly kind: 'error'; readonly message: string };
export type RpcResponse<A> = RpcSuccess<A> | RpcFailure;

export const success = <A>(payload: A): RpcResponse<A> => ({ kind: 'success', payload });
export const failure = (message: string): RpcFailure => ({ kind: 'error', message });

/**
 * A single RPC operation. Each operation owns the decoding of its own success payload,
 * the envelope decoder never inspects the operation beyond calling into it.
 *
 * The `data` field of the envelope is handed over as an `Option` so that an omitted
 * field can be told apart from an explicit `null`.
 */
export type Operation<A> = {
  readonly name: string;
  readonly tag: SuccessTag;
  readonly decodePayload: (data: Option<unknown>) => Either<ResponseDecodeError, A>;
  readonly encodePayload: (payload: A) => Option<unknown>;
};

export type PayloadOf<Op> = Op extends Operation<infer A> ? A : never;

export type UnitReturns = { readonly kind: 'unit' };
export type ValueReturns<R> = { readonly kind: 'value'; readonly codec: Codec<R> };

/**
 * Declared return type of an invoked method, either nothing at all or a value of `R`.
 */
export type Returns<R> = UnitReturns | ValueReturns<R>;

const unit: UnitReturns = { kind: 'unit' };

export const Returns = {
  unit,
  value: <R>(codec: Codec<R>): ValueReturns<R> => ({ kind: 'value', codec }),
};
