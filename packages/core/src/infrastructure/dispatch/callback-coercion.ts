/**
 * @fileoverview Callback Coercion - Bare Functions as Capability Objects
 *
 * @packageDocumentation
 * @module @decorum/core/infrastructure/dispatch
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * A method declared to take a single-method capability as its last parameter
 * also accepts a bare function there:
 *
 * ```typescript
 * const Action = Types.capability('Action', 'execute');
 *
 * tester.oneAction((subject) => console.log(subject));
 * // the implementation receives { execute: (subject) => ... }
 * ```
 *
 * Whatever the function throws reaches the caller unchanged.
 *
 * @version 1.0.0
 */

import {
  type ICapabilityType,
  type RuntimeType,
  findEnumMember,
} from '../../domain';

/**
 * Adapter exposing a function as the capability's one method.
 *
 * @remarks
 * The method is an own enumerable property named after the capability's
 * method, so `wrapper.execute(subject)` and `Object.keys(wrapper)` both see it.
 */
export class CallbackWrapper {
  constructor(
    public readonly capability: ICapabilityType,
    public readonly callable: (...args: unknown[]) => unknown,
  ) {
    Object.defineProperty(this, capability.method, {
      value: (...args: unknown[]): unknown =>
        translateReturn(capability.returns, Reflect.apply(callable, undefined, args)),
      enumerable: true,
    });
  }
}

/**
 * Wrap a function so that it satisfies a capability.
 */
export function coerce(
  capability: ICapabilityType,
  callable: (...args: unknown[]) => unknown,
): CallbackWrapper {
  return new CallbackWrapper(capability, callable);
}

/**
 * Check if a value was produced by {@link coerce}.
 */
export function isCallbackWrapper(value: unknown): value is CallbackWrapper {
  return value instanceof CallbackWrapper;
}

/**
 * Translate a callback's result to the capability's declared return type.
 *
 * @remarks
 * `Void` discards the result. Nullish results pass through for every other
 * type. Values already of the declared type are returned as they are, and so
 * are `bigint` and non-numeric results for numeric types.
 */
export function translateReturn(type: RuntimeType, value: unknown): unknown {
  if (type.kind === 'void') {
    return undefined;
  }

  if (value === null || value === undefined) {
    return value;
  }

  switch (type.kind) {
    case 'string':
      return typeof value === 'string' ? value : String(value);
    case 'boolean':
      return Boolean(value);
    case 'integer': {
      const numeric = toNumber(value);
      return numeric === undefined ? value : Math.trunc(numeric);
    }
    case 'number':
      return toNumber(value) ?? value;
    case 'enum':
      return typeof value === 'string' ? (findEnumMember(type.values, value) ?? value) : value;
    default:
      return value;
  }
}

/**
 * Numeric form of a callback result. `bigint` values and results that do
 * not read as a number yield `undefined` and are returned unchanged.
 */
function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'bigint') {
    return undefined;
  }
  const numeric = Number(value);
  return Number.isNaN(numeric) ? undefined : numeric;
}
