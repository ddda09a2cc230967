import * as t from 'io-ts';

// Structural shapes only, unknown properties pass through untouched.

export type DeviceDescriptor = t.TypeOf<typeof DeviceDescriptor>;
export const DeviceDescriptor = t.intersection([
  t.type({
    id: t.string,
    type: t.string,
  }),
  t.partial({
    name: t.string,
    description: t.string,
  }),
]);

export type MethodArgument = t.TypeOf<typeof MethodArgument>;
export const MethodArgument = t.type({
  name: t.string,
  type: t.string,
});

export type MethodDescriptor = t.TypeOf<typeof MethodDescriptor>;
export const MethodDescriptor = t.intersection([
  t.type({
    name: t.string,
    args: t.array(MethodArgument),
  }),
  t.partial({
    /**
     * Declared return type of the method. Absent when the method returns nothing.
     */
    returns: t.string,
    description: t.string,
  }),
]);
