/**
 * @fileoverview ServiceIdentifier - Lookup Keys for Injection Points
 *
 * @packageDocumentation
 * @module @decorum/core/domain/injection
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Injection points are resolved by key. A key is either a classic service
 * identifier (constructor, symbol, string) or the runtime type an injection
 * getter declares:
 *
 * ```typescript
 * class Bean {
 *   static members = [getter('clock', Types.instanceOf(Clock), { markers: [Inject] })];
 * }
 *
 * registry.add(Clock, new SystemClock());   // found through the declared type
 * ```
 *
 * @version 1.0.0
 */

import { type RuntimeType, isRuntimeType } from '../reflection/runtime-type';

/**
 * Type representing a constructor function.
 *
 * @template T - The instance type created by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = new (...args: any[]) => T;

/**
 * Abstract constructor type for interfaces/abstract classes.
 *
 * @template T - The instance type
 *
 * @remarks
 * Decoration accepts abstract classes: an abstract injection getter has no
 * runtime body at all and is served entirely by the dispatch layer.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractConstructor<T = any> = abstract new (...args: any[]) => T;

/**
 * ServiceIdentifier - Unified type for identifying services.
 *
 * @template T - The service instance type
 *
 * @remarks
 * 1. **Constructor<T>**: class-based identification
 * 2. **Symbol**: token-based identification (see {@link createToken})
 * 3. **string**: configuration-driven identification
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type ServiceIdentifier<T = any> = AbstractConstructor<T> | symbol | string;

/**
 * Key used to look up the value of an injection point.
 */
export type InjectionKey = ServiceIdentifier | RuntimeType;

/**
 * Check if a value is a valid ServiceIdentifier.
 */
export function isServiceIdentifier(value: unknown): value is ServiceIdentifier {
  const type = typeof value;
  return type === 'symbol' || type === 'string' || type === 'function';
}

/**
 * Check if a value can be used as an injection key.
 */
export function isInjectionKey(value: unknown): value is InjectionKey {
  return isServiceIdentifier(value) || isRuntimeType(value);
}

/**
 * Get a human-readable name for an injection key.
 *
 * @example
 * ```typescript
 * getServiceName(UserService);          // 'UserService'
 * getServiceName(Symbol('ILogger'));    // 'Symbol(ILogger)'
 * getServiceName('my-service');         // 'my-service'
 * getServiceName(Types.Number);         // 'Number'
 * ```
 */
export function getServiceName(key: InjectionKey): string {
  if (typeof key === 'symbol') {
    return key.toString();
  }

  if (typeof key === 'string') {
    return key;
  }

  if (typeof key === 'function') {
    return key.name || 'AnonymousClass';
  }

  return key.name;
}

/**
 * Create the identity under which a key is stored in a lookup table.
 *
 * @remarks
 * Runtime types that wrap another identity collapse onto it, so
 * `Types.instanceOf(Clock)` and `Clock` address the same registration and
 * `Types.enumOf(Color)` addresses the `Color` enum object. Every other key
 * is its own identity.
 *
 * @internal
 */
export function getServiceKey(key: InjectionKey): unknown {
  if (!isRuntimeType(key)) {
    return key;
  }

  switch (key.kind) {
    case 'instance':
      return key.ctor;
    case 'enum':
      return key.values;
    default:
      return key;
  }
}

/**
 * Create a typed service token (Symbol) for interface abstraction.
 *
 * @example
 * ```typescript
 * interface IClock { now(): number; }
 * const IClock = createToken<IClock>('IClock');
 *
 * class Job {
 *   static members = [getter('clock', Types.Object, { markers: [Inject], key: IClock })];
 * }
 * ```
 */
export function createToken<T>(description: string): ServiceIdentifier<T> {
  return Symbol(description);
}
