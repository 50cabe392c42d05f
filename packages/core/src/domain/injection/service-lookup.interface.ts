/**
 * @fileoverview IServiceLookup - Lookup Service Capability
 *
 * @packageDocumentation
 * @module @decorum/core/domain/injection
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Port)
 *
 * Injection points are served by a lookup service owned by the surrounding
 * application. The engine only ever calls `get()`, at most once per instance
 * per injection point.
 *
 * @version 1.0.0
 */

import { type InjectionKey } from './service-identifier';

/**
 * Lookup service capability.
 *
 * @remarks
 * `get()` returns `undefined` when nothing is registered under the key; the
 * engine reports that as `UnresolvedDependencyError`. Anything `get()`
 * throws reaches the reader of the injection point unchanged. Retry policy,
 * if any, belongs here rather than in the engine.
 *
 * @example
 * ```typescript
 * const lookup: IServiceLookup = {
 *   get: (key) => (key === Types.Number ? 12 : undefined),
 * };
 * ```
 */
export interface IServiceLookup {
  get(key: InjectionKey): unknown;
}

/**
 * Check if a value implements IServiceLookup.
 */
export function isServiceLookup(value: unknown): value is IServiceLookup {
  return (
    typeof value === 'object' && value !== null && typeof Reflect.get(value, 'get') === 'function'
  );
}
