/**
 * @fileoverview ServiceRegistry - Default Lookup Service
 *
 * @packageDocumentation
 * @module @decorum/core/infrastructure/injection
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE (Adapter)
 *
 * A small keyed store implementing IServiceLookup. Values are registered
 * directly or through a factory that runs once, on first lookup.
 *
 * ## Lookup Algorithm
 *
 * ```
 * get(key)
 *   1. Normalise the key (Types.instanceOf(Clock) and Clock are one key)
 *   2. Registered value: return it
 *   3. Registered factory:
 *      a. Fail if the key is already being created (circular)
 *      b. Run the factory, cache its result as the value
 *   4. Otherwise ask the parent, if any
 *   5. Otherwise undefined (not found)
 * ```
 *
 * @version 1.0.0
 */

import {
  type IServiceLookup,
  type InjectionKey,
  CircularDependencyError,
  DuplicateServiceError,
  getServiceKey,
  getServiceName,
} from '../../domain';

/**
 * Factory producing a registered value on first lookup.
 *
 * @template T - The value type
 */
export type ServiceFactory<T = unknown> = (registry: ServiceRegistry) => T;

interface IFactoryRegistration {
  readonly key: InjectionKey;
  readonly factory: ServiceFactory;
}

/**
 * ServiceRegistry - IServiceLookup implementation.
 *
 * @remarks
 * **Key Identity:**
 *
 * A runtime type wrapping a class or an enum is stored under that class or
 * enum, so an injection point declared as `Types.instanceOf(Clock)` finds a
 * value added under `Clock`.
 *
 * **Parent Chaining:**
 *
 * Keys the registry does not hold are looked up in the parent. A child may
 * hold a key its parent also holds; the child's value wins.
 *
 * @example
 * ```typescript
 * const services = new ServiceRegistry()
 *   .add(Types.Number, 12)
 *   .addFactory(Clock, () => new SystemClock());
 *
 * const factory = decorate(Bean, { lookupService: services });
 * ```
 */
export class ServiceRegistry implements IServiceLookup {
  private readonly values = new Map<unknown, unknown>();

  private readonly factories = new Map<unknown, IFactoryRegistration>();

  /**
   * Keys whose factories are running, outermost first.
   */
  private readonly creating: InjectionKey[] = [];

  constructor(private readonly parent?: IServiceLookup) {}

  // ============================================================================
  // Registration
  // ============================================================================

  /**
   * Register a value.
   *
   * @throws DuplicateServiceError if the key is already registered here
   * @throws TypeError if the value is undefined
   */
  add<T>(key: InjectionKey, value: T): this {
    if (value === undefined) {
      throw new TypeError(`Cannot register undefined for '${getServiceName(key)}'.`);
    }

    this.ensureNotRegistered(key);
    this.values.set(getServiceKey(key), value);
    return this;
  }

  /**
   * Register a factory, run once on first lookup.
   *
   * @throws DuplicateServiceError if the key is already registered here
   */
  addFactory<T>(key: InjectionKey, factory: ServiceFactory<T>): this {
    this.ensureNotRegistered(key);
    this.factories.set(getServiceKey(key), { key, factory });
    return this;
  }

  // ============================================================================
  // IServiceLookup Implementation
  // ============================================================================

  /**
   * Check if a key is registered here or in a parent registry.
   */
  has(key: InjectionKey): boolean {
    const identity = getServiceKey(key);
    if (this.values.has(identity) || this.factories.has(identity)) {
      return true;
    }
    return this.parent instanceof ServiceRegistry ? this.parent.has(key) : false;
  }

  /**
   * Look up a value.
   *
   * @returns The value, or `undefined` when nothing is registered
   * @throws CircularDependencyError if a factory needs its own key
   */
  get(key: InjectionKey): unknown {
    const identity = getServiceKey(key);

    if (this.values.has(identity)) {
      return this.values.get(identity);
    }

    const registration = this.factories.get(identity);
    if (registration) {
      return this.create(identity, registration);
    }

    return this.parent?.get(key);
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  private create(identity: unknown, registration: IFactoryRegistration): unknown {
    if (this.creating.some((key) => getServiceKey(key) === identity)) {
      throw new CircularDependencyError(registration.key, this.creating.map(getServiceName));
    }

    this.creating.push(registration.key);
    try {
      const value = registration.factory(this);
      this.values.set(identity, value);
      this.factories.delete(identity);
      return value;
    } finally {
      this.creating.pop();
    }
  }

  private ensureNotRegistered(key: InjectionKey): void {
    const identity = getServiceKey(key);
    if (this.values.has(identity) || this.factories.has(identity)) {
      throw new DuplicateServiceError(key);
    }
  }
}

/**
 * Create a new service registry.
 */
export function createServiceRegistry(parent?: IServiceLookup): ServiceRegistry {
  return new ServiceRegistry(parent);
}
