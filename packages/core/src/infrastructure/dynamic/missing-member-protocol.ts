/**
 * @fileoverview MissingMemberProtocol - Fallbacks for Undeclared Members
 *
 * @packageDocumentation
 * @module @decorum/core/infrastructure/dynamic
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ## Handler Lookup
 *
 * ```
 * 1. Instance slot      dynamic(thing).setMethodMissingHandler(...)
 * 2. Base type          methodMissing / propertyMissing / propertyMissingSet
 *                       on the prototype, called with the instance as `this`
 * 3. Factory option     decorate(Type, { handlers: { ... } })
 * 4. None               UnknownMethodError / UnknownPropertyError
 * ```
 *
 * Whatever a handler throws reaches the caller unchanged.
 *
 * @version 1.0.0
 */

import {
  type IMissingMemberHandlers,
  type MethodMissingHandler,
  type PropertyGetMissingHandler,
  type PropertySetMissingHandler,
  UnknownMethodError,
  UnknownPropertyError,
} from '../../domain';
import { findFunction } from '../reflection/prototype-members';

/**
 * MissingMemberProtocol - one per decorated type.
 */
export class MissingMemberProtocol {
  private readonly handlers: Readonly<IMissingMemberHandlers>;

  constructor(
    private readonly typeName: string,
    private readonly prototype: object,
    handlers?: IMissingMemberHandlers,
  ) {
    this.handlers = Object.freeze({ ...handlers });
  }

  // ============================================================================
  // Handler Lookup
  // ============================================================================

  findMethodMissing(
    receiver: object,
    slots: IMissingMemberHandlers,
  ): MethodMissingHandler | undefined {
    if (slots.methodMissing) {
      return slots.methodMissing;
    }

    const own = findFunction(this.prototype, 'methodMissing');
    if (own) {
      return (name, args) => Reflect.apply(own, receiver, [name, args]);
    }

    return this.handlers.methodMissing;
  }

  findPropertyMissing(
    receiver: object,
    slots: IMissingMemberHandlers,
  ): PropertyGetMissingHandler | undefined {
    if (slots.propertyMissing) {
      return slots.propertyMissing;
    }

    const own = findFunction(this.prototype, 'propertyMissing');
    if (own) {
      return (name) => Reflect.apply(own, receiver, [name]);
    }

    return this.handlers.propertyMissing;
  }

  findPropertyMissingSet(
    receiver: object,
    slots: IMissingMemberHandlers,
  ): PropertySetMissingHandler | undefined {
    if (slots.propertyMissingSet) {
      return slots.propertyMissingSet;
    }

    const own = findFunction(this.prototype, 'propertyMissingSet');
    if (own) {
      return (name, value) => {
        Reflect.apply(own, receiver, [name, value]);
      };
    }

    return this.handlers.propertyMissingSet;
  }

  // ============================================================================
  // Invocation
  // ============================================================================

  /**
   * @throws UnknownMethodError if no handler is configured
   */
  invokeMethodMissing(
    receiver: object,
    slots: IMissingMemberHandlers,
    name: string,
    args: readonly unknown[],
  ): unknown {
    const handler = this.findMethodMissing(receiver, slots);
    if (!handler) {
      throw new UnknownMethodError(this.typeName, name, args);
    }
    return handler(name, args);
  }

  /**
   * @throws UnknownPropertyError if no handler is configured
   */
  getMissingProperty(receiver: object, slots: IMissingMemberHandlers, name: string): unknown {
    const handler = this.findPropertyMissing(receiver, slots);
    if (!handler) {
      throw new UnknownPropertyError(this.typeName, name);
    }
    return handler(name);
  }

  /**
   * @throws UnknownPropertyError if no handler is configured
   */
  setMissingProperty(
    receiver: object,
    slots: IMissingMemberHandlers,
    name: string,
    value: unknown,
  ): void {
    const handler = this.findPropertyMissingSet(receiver, slots);
    if (!handler) {
      throw new UnknownPropertyError(this.typeName, name, 'set');
    }
    handler(name, value);
  }
}
