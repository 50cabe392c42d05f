/**
 * @fileoverview DispatchHandler - Proxy Traps of the Decorated Prototype
 *
 * @packageDocumentation
 * @module @decorum/core/infrastructure/dynamic
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ```
 * instance ──► Thing_Decorated.prototype ──► Proxy(DispatchHandler) ──► Thing.prototype
 * ```
 *
 * A read or write the instance cannot satisfy from its own properties falls
 * through to the proxy, whose traps hand it to the instance's DynamicObject.
 * Accesses whose receiver is not a decorated instance (the prototype
 * itself, the proxy) and symbol keys take the plain path.
 *
 * `then` and `toJSON` always take the plain path: promise resolution and
 * JSON.stringify probe them on every value and must not reach the
 * missing-property protocol.
 *
 * @version 1.0.0
 */

import { DynamicObject } from './dynamic-object';

/**
 * Keys that never go through dynamic dispatch.
 */
export const PASSTHROUGH_KEYS: ReadonlySet<string> = new Set(['then', 'toJSON']);

/**
 * DispatchHandler - routes prototype-chain misses to DynamicObject.
 */
export class DispatchHandler implements ProxyHandler<object> {
  get(target: object, name: string | symbol, receiver: unknown): unknown {
    const dynamicObject = this.dispatchTarget(name, receiver);
    if (!dynamicObject || typeof name === 'symbol') {
      return Reflect.get(target, name, receiver);
    }
    return dynamicObject.getProperty(name);
  }

  set(target: object, name: string | symbol, value: unknown, receiver: unknown): boolean {
    const dynamicObject = this.dispatchTarget(name, receiver);
    if (!dynamicObject || typeof name === 'symbol') {
      return Reflect.set(target, name, value, receiver);
    }
    dynamicObject.setProperty(name, value);
    return true;
  }

  private dispatchTarget(name: string | symbol, receiver: unknown): DynamicObject | undefined {
    if (typeof name === 'symbol' || PASSTHROUGH_KEYS.has(name)) {
      return undefined;
    }
    return DynamicObject.for(receiver);
  }
}
