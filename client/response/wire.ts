import * as E from 'fp-ts/lib/Either';
import { TextDecoder } from 'util';
import { pipe } from 'fp-ts/lib/function';

import { PayloadShapeMismatchError } from '../errors';

export const DEFAULT_MAX_RESPONSE_BYTES = 8 * 1024 * 1024;

export type ReadEnvelopeOptions = {
  readonly maxBytes?: number;
};

/**
 * Parses the raw response handed over by the transport. The result still has to go
 * through {@link decodeResponse}.
 */
export function readEnvelope(
  raw: string | Uint8Array,
  options: ReadEnvelopeOptions = {}
): E.Either<PayloadShapeMismatchError, unknown> {
  const { maxBytes = DEFAULT_MAX_RESPONSE_BYTES } = options;

  const size = typeof raw === 'string' ? Buffer.byteLength(raw, 'utf8') : raw.byteLength;
  if (size > maxBytes) {
    return E.left(new PayloadShapeMismatchError(`Response of ${size} bytes exceeds the limit of ${maxBytes}`));
  }

  const decoded: E.Either<PayloadShapeMismatchError, string> =
    typeof raw === 'string' ? E.right(raw) : decodeText(raw);

  return pipe(
    decoded,
    E.chain((text: string) =>
      E.tryCatch(
        (): unknown => JSON.parse(text),
        err => new PayloadShapeMismatchError('Response is not valid JSON', [reasonOf(err)])
      )
    )
  );
}

const reasonOf = (err: unknown) => (err instanceof Error ? err.message : String(err));

// Malformed byte sequences must fail, not turn into replacement characters
function decodeText(raw: Uint8Array): E.Either<PayloadShapeMismatchError, string> {
  return E.tryCatch(
    () => new TextDecoder('utf-8', { fatal: true }).decode(raw),
    err => new PayloadShapeMismatchError('Response is not valid UTF-8', [reasonOf(err)])
  );
}
