/**
 * @fileoverview Prototype Member Lookup Without Side Effects
 *
 * @packageDocumentation
 * @module @decorum/core/infrastructure/reflection
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Walks a prototype chain with `Object.getOwnPropertyDescriptor`, so getters
 * are found but never run.
 *
 * @version 1.0.0
 */

/**
 * Any callable value.
 */
export type Callable = (...args: unknown[]) => unknown;

/**
 * Check if a value can be called.
 */
export function isCallable(value: unknown): value is Callable {
  return typeof value === 'function';
}

/**
 * Find the nearest property descriptor for `key`, starting at `object`.
 */
export function findPropertyDescriptor(
  object: object,
  key: string,
): PropertyDescriptor | undefined {
  let current: unknown = object;
  while (typeof current === 'object' && current !== null) {
    const descriptor = Object.getOwnPropertyDescriptor(current, key);
    if (descriptor) {
      return descriptor;
    }
    current = Object.getPrototypeOf(current);
  }
  return undefined;
}

/**
 * The function stored under `key` on the chain, if the nearest property
 * there is a data property holding one.
 */
export function findFunction(object: object, key: string): Callable | undefined {
  const value: unknown = findPropertyDescriptor(object, key)?.value;
  return isCallable(value) ? value : undefined;
}
