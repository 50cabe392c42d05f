/**
 * @fileoverview ExtensionBag - Ad-Hoc Properties of a Decorated Instance
 *
 * @packageDocumentation
 * @module @decorum/core/infrastructure/dynamic
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ```typescript
 * thing.ext.color = 'red';   // adds an extension
 * thing.color;               // 'red'
 * thing.color = 'blue';      // existing extensions are writable
 * ```
 *
 * The bag keeps insertion order. It is created on first access to the
 * extension container and never for non-extensible types.
 *
 * @version 1.0.0
 */

/**
 * ExtensionBag - ordered name/value store with an object-shaped view.
 */
export class ExtensionBag {
  readonly values = new Map<string, unknown>();

  /**
   * Object view of the bag: property reads and writes go to `values`.
   */
  readonly container: Record<string, unknown>;

  constructor() {
    const values = this.values;
    const target: Record<string, unknown> = {};

    this.container = new Proxy(target, {
      get: (_target, key) => (typeof key === 'string' ? values.get(key) : undefined),
      set: (_target, key, value: unknown) => {
        if (typeof key !== 'string') {
          return false;
        }
        values.set(key, value);
        return true;
      },
      has: (_target, key) => typeof key === 'string' && values.has(key),
      deleteProperty: (_target, key) => typeof key === 'string' && values.delete(key),
      ownKeys: () => [...values.keys()],
      getOwnPropertyDescriptor: (_target, key) =>
        typeof key === 'string' && values.has(key)
          ? { value: values.get(key), writable: true, enumerable: true, configurable: true }
          : undefined,
    });
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get(name: string): unknown {
    return this.values.get(name);
  }

  set(name: string, value: unknown): void {
    this.values.set(name, value);
  }
}
