import * as E from 'fp-ts/lib/Either';

import { ClientConfig } from '../config';
import { Logger } from '../logger';
import { ResponseDecodeError, RpcRemoteError } from '../errors';
import { decodeResponse } from './envelope';
import { toResult } from './result';
import { DEFAULT_MAX_RESPONSE_BYTES, readEnvelope } from './wire';
import { Operation, RpcResponse } from './types';

export type ResponseDecoderConfig = Pick<ClientConfig, 'maxResponseBytes'>;

/**
 * Entry point for the dispatch layer. Decodes raw responses for a known operation and
 * logs every failure with the operation it belonged to.
 */
export class ResponseDecoder {
  constructor(
    readonly logger: Logger,
    readonly config: ResponseDecoderConfig = { maxResponseBytes: DEFAULT_MAX_RESPONSE_BYTES }
  ) {}

  public decode<A>(operation: Operation<A>, input: unknown): E.Either<ResponseDecodeError, RpcResponse<A>> {
    this.logger.debug({ operation: operation.name }, 'Decoding RPC response');

    const result = decodeResponse(operation, input);
    if (E.isLeft(result)) {
      this.logger.warn({ operation: operation.name, err: result.left }, 'Failed to decode RPC response');
    }
    return result;
  }

  public decodeText<A>(
    operation: Operation<A>,
    raw: string | Uint8Array
  ): E.Either<ResponseDecodeError, RpcResponse<A>> {
    const envelope = readEnvelope(raw, { maxBytes: this.config.maxResponseBytes });
    if (E.isLeft(envelope)) {
      this.logger.warn({ operation: operation.name, err: envelope.left }, 'Failed to read RPC response');
      return envelope;
    }
    return this.decode(operation, envelope.right);
  }

  /**
   * Decodes the raw response and returns the payload. Throws the decode error, or a
   * {@link RpcRemoteError} when the server reported a failure.
   */
  public unwrap<A>(operation: Operation<A>, raw: string | Uint8Array): A {
    const response = this.decodeText(operation, raw);
    if (E.isLeft(response)) {
      throw response.left;
    }

    const outcome = toResult(response.right);
    if (E.isLeft(outcome)) {
      this.logger.debug({ operation: operation.name, message: outcome.left }, 'RPC call failed remotely');
      throw new RpcRemoteError(operation.name, outcome.left);
    }
    return outcome.right;
  }
}
