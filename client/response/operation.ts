import * as O from 'fp-ts/lib/Option';

import { DeviceDescriptor, MethodDescriptor } from '../descriptor/types';
import { decodeSequence, decodeUnit, decodeValue } from './payload';
import { Codec, Operation, Returns, SuccessTag, UnitReturns, ValueReturns } from './types';

function sequenceOperation<D>(tag: SuccessTag, descriptor: Codec<D>): Operation<D[]> {
  return {
    name: tag,
    tag,
    decodePayload: decodeSequence(descriptor),
    encodePayload: payload => O.some(payload.map(item => descriptor.encode(item))),
  };
}

/**
 * Lists the devices known to the server, in the order the server reports them.
 */
export function listDevices(): Operation<DeviceDescriptor[]>;
export function listDevices<D>(descriptor: Codec<D>): Operation<D[]>;
export function listDevices<D>(descriptor?: Codec<D>): Operation<D[]> | Operation<DeviceDescriptor[]> {
  return descriptor ? sequenceOperation('list', descriptor) : sequenceOperation('list', DeviceDescriptor);
}

/**
 * Lists the methods exposed by a device.
 */
export function listMethods(): Operation<MethodDescriptor[]>;
export function listMethods<D>(descriptor: Codec<D>): Operation<D[]>;
export function listMethods<D>(descriptor?: Codec<D>): Operation<D[]> | Operation<MethodDescriptor[]> {
  return descriptor ? sequenceOperation('methods', descriptor) : sequenceOperation('methods', MethodDescriptor);
}

/**
 * Invokes a device method. The declared return type decides whether the response may
 * come without a `data` field.
 *
 * @example
 * ```ts
 * const setVoltage = invoke('setVoltage', Returns.unit);
 * const readVoltage = invoke('readVoltage', Returns.value(t.number));
 * ```
 */
export function invoke(method: string, returns: UnitReturns): Operation<void>;
export function invoke<R>(method: string, returns: ValueReturns<R>): Operation<R>;
export function invoke<R>(method: string, returns: Returns<R>): Operation<R> | Operation<void> {
  const name = `invoke:${method}`;
  switch (returns.kind) {
    case 'unit': {
      const operation: Operation<void> = {
        name,
        tag: 'result',
        decodePayload: decodeUnit,
        encodePayload: () => O.none,
      };
      return operation;
    }
    case 'value': {
      const { codec } = returns;
      const operation: Operation<R> = {
        name,
        tag: 'result',
        decodePayload: decodeValue(codec),
        encodePayload: payload => O.some(codec.encode(payload)),
      };
      return operation;
    }
  }
}
