import * as t from 'io-ts';
import { isLeft, left } from 'fp-ts/lib/Either';
import { PathReporter } from 'io-ts/lib/PathReporter';
import { BaseConfig } from '@navch/common';

import { DEFAULT_MAX_RESPONSE_BYTES } from './response/wire';

export type LogLevel = t.TypeOf<typeof LogLevel>;
export const LogLevel = t.keyof({
  fatal: null,
  error: null,
  warn: null,
  info: null,
  debug: null,
  trace: null,
  silent: null,
});

type PositiveIntBrand = { readonly PositiveInt: unique symbol };

export type PositiveInt = t.TypeOf<typeof PositiveInt>;
export const PositiveInt = t.brand(
  t.number,
  (n): n is t.Branded<number, PositiveIntBrand> => Number.isInteger(n) && n > 0,
  'PositiveInt'
);

/**
 * Every setting has a default, so the client works without any environment at all.
 * Empty values count as unset.
 */
export class ClientConfig extends BaseConfig {
  readonly logLevel: LogLevel = this.readValidated<LogLevel>('RPC_LOG_LEVEL', LogLevel, 'info');

  readonly loggerName: string = this.read('RPC_LOGGER_NAME', null) || 'device-rpc';

  /**
   * Upper bound for a single raw response. Larger responses are rejected before parsing.
   */
  readonly maxResponseBytes: number = this.readValidated<number>(
    'RPC_MAX_RESPONSE_BYTES',
    PositiveInt,
    DEFAULT_MAX_RESPONSE_BYTES,
    Number
  );

  private readValidated<A>(
    key: string,
    codec: t.Decoder<unknown, A>,
    defaultValue: A,
    parse: (value: string) => unknown = value => value
  ): A {
    const value = this.read(key, null);
    if (!value) return defaultValue;

    const result = codec.decode(parse(value));
    if (isLeft(result)) {
      const [reason] = PathReporter.report(left(result.left));
      throw new Error(`Invalid config "${key}": ${reason}`);
    }
    return result.right;
  }
}
