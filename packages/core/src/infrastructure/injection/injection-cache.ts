/**
 * @fileoverview InjectionCache - Lazy, Cached Injection Points
 *
 * @packageDocumentation
 * @module @decorum/core/infrastructure/injection
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ## Resolution Algorithm
 *
 * ```
 * getInjected(instance, point)
 *   1. Resolved or explicit slot: return the value (no lookup)
 *   2. Resolving slot: circular, fail
 *   3. Pick the lookup service (the instance's own, else the factory's)
 *   4. Enter Resolving, call lookup.get(key) once
 *      - throws: back to Unresolved, rethrow as is
 *      - undefined: back to Unresolved, UnresolvedDependencyError
 *      - a value: Resolved(value)
 * ```
 *
 * The lookup service never sees more than one query per instance per point
 * once a value is held.
 *
 * @version 1.0.0
 */

import {
  type IDecorationLogger,
  type IInjectionPoint,
  type IRegistryEntry,
  type IServiceLookup,
  type InjectionSlot,
  CircularInjectionError,
  ReadOnlyPropertyError,
  RESOLVING,
  UNRESOLVED,
  UnresolvedDependencyError,
  explicitSlot,
  getServiceName,
  isServiceLookup,
  isSettled,
  resolvedSlot,
} from '../../domain';
import { findPropertyDescriptor } from '../reflection/prototype-members';

/**
 * Injection cache options.
 */
export interface IInjectionCacheOptions {
  /**
   * Lookup service used when the instance provides none.
   */
  lookupService?: IServiceLookup;

  /**
   * Property through which an instance may provide its own lookup service.
   * @default 'services'
   */
  instanceLookupProperty?: string;

  logger?: IDecorationLogger;
}

/**
 * InjectionCache - per-instance injection slots of one decorated type.
 *
 * @example
 * ```typescript
 * const cache = new InjectionCache(entry, { lookupService });
 * const point = entry.injectionPoints.get('thing');
 *
 * cache.getInjected(bean, point);   // queries lookupService
 * cache.getInjected(bean, point);   // cached
 * ```
 */
export class InjectionCache {
  private readonly slots = new WeakMap<object, Map<string, InjectionSlot>>();

  private readonly lookupService: IServiceLookup | undefined;

  private readonly instanceLookupProperty: string;

  private readonly logger: IDecorationLogger | undefined;

  constructor(
    private readonly entry: IRegistryEntry,
    options?: IInjectionCacheOptions,
  ) {
    this.lookupService = options?.lookupService;
    this.instanceLookupProperty = options?.instanceLookupProperty ?? 'services';
    this.logger = options?.logger;
  }

  /**
   * Value of an injection point, resolved on first read.
   *
   * @throws UnresolvedDependencyError if no value can be found
   * @throws CircularInjectionError if the lookup reads the same point again
   */
  getInjected(instance: object, point: IInjectionPoint): unknown {
    const slots = this.slotsOf(instance);
    const slot = slots.get(point.name) ?? UNRESOLVED;

    if (isSettled(slot)) {
      return slot.value;
    }

    if (slot.state === 'resolving') {
      throw new CircularInjectionError(this.entry.typeName, point.name);
    }

    const lookup = this.lookupFor(instance);
    if (!lookup) {
      throw new UnresolvedDependencyError(
        this.entry.typeName,
        point.name,
        point.key,
        'no lookup service',
      );
    }

    slots.set(point.name, RESOLVING);
    let value: unknown;
    try {
      value = lookup.get(point.key);
    } catch (error) {
      if (slots.get(point.name) === RESOLVING) {
        slots.set(point.name, UNRESOLVED);
      }
      throw error;
    }

    const current = slots.get(point.name);
    if (current?.state === 'explicit') {
      return current.value;
    }

    if (value === undefined) {
      slots.set(point.name, UNRESOLVED);
      throw new UnresolvedDependencyError(this.entry.typeName, point.name, point.key);
    }

    slots.set(point.name, resolvedSlot(value));
    this.logger?.debug(
      `[decorum] Injected ${this.entry.typeName}.${point.name} from '${getServiceName(point.key)}'`,
    );
    return value;
  }

  /**
   * Assign an injection point explicitly. Later reads never query the
   * lookup service.
   *
   * @throws ReadOnlyPropertyError if the point has no setter
   */
  setInjected(instance: object, point: IInjectionPoint, value: unknown): void {
    if (!point.setter) {
      throw new ReadOnlyPropertyError(this.entry.typeName, point.name);
    }
    this.slotsOf(instance).set(point.name, explicitSlot(value));
  }

  /**
   * Current slot state, for diagnostics.
   */
  getState(instance: object, point: IInjectionPoint): InjectionSlot['state'] {
    return (this.slots.get(instance)?.get(point.name) ?? UNRESOLVED).state;
  }

  /**
   * Lookup service serving an instance.
   *
   * @remarks
   * An instance whose class (or whose own state) provides the lookup
   * property, holding an IServiceLookup, serves its own injection points.
   * The property is only read when it exists, so reading it never reaches
   * the missing-property protocol.
   */
  lookupFor(instance: object): IServiceLookup | undefined {
    const property = this.instanceLookupProperty;

    if (findPropertyDescriptor(instance, property) || this.entry.properties.has(property)) {
      const own: unknown = Reflect.get(instance, property);
      if (isServiceLookup(own)) {
        return own;
      }
    }

    return this.lookupService;
  }

  private slotsOf(instance: object): Map<string, InjectionSlot> {
    let slots = this.slots.get(instance);
    if (!slots) {
      slots = new Map();
      this.slots.set(instance, slots);
    }
    return slots;
  }
}
