import * as t from 'io-ts';
import * as E from 'fp-ts/lib/Either';
import * as O from 'fp-ts/lib/Option';

import { DeviceDescriptor, MethodDescriptor } from '../descriptor/types';
import { MissingFieldError, PayloadShapeMismatchError, ResponseDecodeError, UnrecognizedTagError } from '../errors';
import { decodeResponse, encodeResponse } from './envelope';
import { invoke, listDevices, listMethods } from './operation';
import { toResult } from './result';
import { Returns, RpcResponse, failure, success } from './types';

const getLeft = <L, R>(result: E.Either<L, R>): L => {
  if (E.isRight(result)) throw new Error('Expected a decode failure');
  return result.left;
};

describe('decodeResponse', () => {
  const devices: DeviceDescriptor[] = [
    { id: 'scope-1', type: 'oscilloscope', name: 'Bench scope' },
    { id: 'psu-1', type: 'power-supply' },
    { id: 'awg-2', type: 'waveform-generator', description: 'Two channel AWG' },
  ];

  const methods: MethodDescriptor[] = [
    { name: 'setVoltage', args: [{ name: 'volts', type: 'number' }] },
    { name: 'readVoltage', args: [], returns: 'number' },
  ];

  describe('list devices', () => {
    it.each(['list', 'result', 'methods'])('should decode the device list tagged "%s"', tag => {
      const result = decodeResponse(listDevices(), { type: tag, data: devices });
      expect(result).toEqual(E.right(success(devices)));
    });

    it('should preserve the server order', () => {
      const reversed = [...devices].reverse();
      const result = decodeResponse(listDevices(), { type: 'list', data: reversed });
      expect(result).toEqual(E.right(success(reversed)));
    });

    it('should decode an empty device list', () => {
      const result = decodeResponse(listDevices(), { type: 'list', data: [] });
      expect(result).toEqual(E.right(success([])));
    });

    it('should fail when the device list is absent', () => {
      const error = getLeft(decodeResponse(listDevices(), { type: 'list' }));
      expect(error).toBeInstanceOf(PayloadShapeMismatchError);
      expect(error.code).toBe('PayloadShapeMismatch');
    });

    it('should fail when the device list is not an array', () => {
      const error = getLeft(decodeResponse(listDevices(), { type: 'list', data: { id: 'psu-1' } }));
      expect(error.code).toBe('PayloadShapeMismatch');
    });

    it('should decode with a custom descriptor codec', () => {
      const Serial = t.type({ serial: t.number });
      const result = decodeResponse(listDevices(Serial), { type: 'list', data: [{ serial: 7 }, { serial: 3 }] });
      expect(result).toEqual(E.right(success([{ serial: 7 }, { serial: 3 }])));
    });
  });

  describe('list methods', () => {
    it('should decode the method list in order', () => {
      const result = decodeResponse(listMethods(), { type: 'methods', data: methods });
      expect(result).toEqual(E.right(success(methods)));
    });

    it('should fail when any method descriptor is malformed', () => {
      const data = [methods[0], { name: 'broken', args: 'none' }];
      const error = getLeft(decodeResponse(listMethods(), { type: 'methods', data }));

      expect(error).toBeInstanceOf(PayloadShapeMismatchError);
      expect(error instanceof PayloadShapeMismatchError && error.details.length).toBeGreaterThan(0);
    });
  });

  describe('invoke', () => {
    const readVoltage = invoke('readVoltage', Returns.value(t.number));
    const setVoltage = invoke('setVoltage', Returns.unit);

    it('should decode the returned value', () => {
      expect(decodeResponse(readVoltage, { type: 'result', data: 3.3 })).toEqual(E.right(success(3.3)));
    });

    it('should decode a missing payload of a void method', () => {
      expect(decodeResponse(setVoltage, { type: 'result' })).toEqual(E.right(success(undefined)));
    });

    it('should accept an explicit null payload of a void method', () => {
      expect(decodeResponse(setVoltage, { type: 'result', data: null })).toEqual(E.right(success(undefined)));
    });

    it('should reject a non-null payload of a void method', () => {
      const error = getLeft(decodeResponse(setVoltage, { type: 'result', data: 1 }));
      expect(error.code).toBe('PayloadShapeMismatch');
    });

    it('should fail with a missing data field for a non-void method', () => {
      const error = getLeft(decodeResponse(readVoltage, { type: 'result' }));

      expect(error).toBeInstanceOf(MissingFieldError);
      expect(error instanceof MissingFieldError && error.field).toBe('data');
      expect(error.message).toBe('Missing field "data"');
    });

    it('should not treat a missing payload as null for a nullable return type', () => {
      const readLabel = invoke('readLabel', Returns.value(t.union([t.string, t.null])));

      expect(getLeft(decodeResponse(readLabel, { type: 'result' })).code).toBe('MissingField');
      expect(decodeResponse(readLabel, { type: 'result', data: null })).toEqual(E.right(success(null)));
    });

    it('should treat an undefined payload as omitted', () => {
      const error = getLeft(decodeResponse(readVoltage, { type: 'result', data: undefined }));
      expect(error.code).toBe('MissingField');
    });

    it('should fail when the payload does not match the return type', () => {
      const error = getLeft(decodeResponse(readVoltage, { type: 'result', data: 'high' }));
      expect(error.code).toBe('PayloadShapeMismatch');
    });
  });

  describe('error envelopes', () => {
    type Decode = (input: unknown) => E.Either<ResponseDecodeError, RpcResponse<unknown>>;

    it.each<[string, Decode]>([
      ['list devices', input => decodeResponse(listDevices(), input)],
      ['list methods', input => decodeResponse(listMethods(), input)],
      ['invoke', input => decodeResponse(invoke('readVoltage', Returns.value(t.number)), input)],
      ['invoke void', input => decodeResponse(invoke('reset', Returns.unit), input)],
    ])('should decode the error message for %s', (_desc, decode) => {
      expect(decode({ type: 'error', data: 'oops' })).toEqual(E.right(failure('oops')));
    });

    it('should fail when the error message is absent', () => {
      const error = getLeft(decodeResponse(listDevices(), { type: 'error' }));
      expect(error).toEqual(new MissingFieldError('data'));
    });

    it('should fail when the error message is not a string', () => {
      const error = getLeft(decodeResponse(listDevices(), { type: 'error', data: [] }));
      expect(error.code).toBe('PayloadShapeMismatch');
    });
  });

  describe('malformed envelopes', () => {
    it('should reject an unknown tag', () => {
      const error = getLeft(decodeResponse(listDevices(), { type: 'banana' }));

      expect(error).toBeInstanceOf(UnrecognizedTagError);
      expect(error.message).toBe('Unrecognized response tag "banana"');
    });

    it('should reject an envelope without a tag', () => {
      const error = getLeft(decodeResponse(listDevices(), { data: [] }));
      expect(error instanceof MissingFieldError && error.field).toBe('type');
    });

    it('should reject a tag that is not a string', () => {
      const error = getLeft(decodeResponse(listDevices(), { type: 3, data: [] }));
      expect(error.code).toBe('PayloadShapeMismatch');
    });

    it.each<[unknown]>([[null], ['result'], [42], [[{ type: 'result' }]]])('should reject %p as envelope', input => {
      const error = getLeft(decodeResponse(listDevices(), input));
      expect(error.code).toBe('PayloadShapeMismatch');
    });
  });
});

describe('encodeResponse', () => {
  it('should write the canonical tag of each operation', () => {
    expect(encodeResponse(listDevices(), success([]))).toEqual({ type: 'list', data: [] });
    expect(encodeResponse(listMethods(), success([]))).toEqual({ type: 'methods', data: [] });
    expect(encodeResponse(invoke('readVoltage', Returns.value(t.number)), success(1.5))).toEqual({
      type: 'result',
      data: 1.5,
    });
  });

  it('should encode the returned value through the return codec', () => {
    const readCount = invoke('readCount', Returns.value(t.array(t.number)));
    expect(readCount.encodePayload([3, 1])).toEqual(O.some([3, 1]));
  });

  it('should omit the payload of a void method', () => {
    const envelope = encodeResponse(invoke('reset', Returns.unit), success(undefined));
    expect(envelope).toStrictEqual({ type: 'result' });
  });

  it('should write errors with the message as payload', () => {
    expect(encodeResponse(listDevices(), failure('device busy'))).toEqual({ type: 'error', data: 'device busy' });
  });

  it('should decode its own output for non-void methods', () => {
    const Reading = t.type({ channel: t.number, volts: t.number, label: t.union([t.string, t.null]) });
    type Reading = t.TypeOf<typeof Reading>;

    const readAll = invoke('readAll', Returns.value(t.array(Reading)));
    const values: Reading[][] = [
      [],
      [{ channel: 1, volts: 0, label: null }],
      [
        { channel: 2, volts: -1.25, label: 'ref' },
        { channel: 1, volts: 12, label: '' },
      ],
    ];

    for (const value of values) {
      const wire: unknown = JSON.parse(JSON.stringify(encodeResponse(readAll, success(value))));
      expect(decodeResponse(readAll, wire)).toEqual(E.right(success(value)));
    }
  });
});

describe('toResult', () => {
  it('should carry the payload of a success', () => {
    expect(toResult(success([1, 2]))).toEqual(E.right([1, 2]));
  });

  it('should carry the message of an error', () => {
    const result = decodeResponse(listMethods(), { type: 'error', data: 'oops' });
    expect(E.isRight(result) && toResult(result.right)).toEqual(E.left('oops'));
  });
});
