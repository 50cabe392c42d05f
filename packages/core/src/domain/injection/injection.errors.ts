/**
 * @fileoverview Injection Errors
 *
 * @packageDocumentation
 * @module @decorum/core/domain/injection
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * @version 1.0.0
 */

import { DecorationError } from '../dynamic/decoration.errors';

import { type InjectionKey, getServiceName } from './service-identifier';

/**
 * Error thrown when the lookup service has nothing for an injection point.
 *
 * @remarks
 * **Solutions:**
 * 1. Register the value: `registry.add(Clock, new SystemClock())`
 * 2. Pass a `lookupService` to `decorate()`
 * 3. Give the point an explicit `key` matching an existing registration
 *
 * The slot stays unresolved, so a later read queries the lookup service again.
 */
export class UnresolvedDependencyError extends DecorationError {
  /**
   * The key that was looked up.
   */
  public readonly key: InjectionKey;

  constructor(typeName: string, pointName: string, key: InjectionKey, reason = 'not found') {
    super(
      `Cannot inject '${typeName}.${pointName}': no service for key '${getServiceName(key)}' (${reason}).`,
      typeName,
      pointName,
    );
    this.key = key;
  }
}

/**
 * Error thrown when resolving an injection point requires the value of that
 * same point on the same instance.
 *
 * @remarks
 * The lookup service read the point it was asked to provide. Resolving again
 * would query the lookup service a second time for one slot.
 */
export class CircularInjectionError extends DecorationError {
  constructor(typeName: string, pointName: string) {
    super(
      `Circular injection detected: '${typeName}.${pointName}' was read while it was being resolved.`,
      typeName,
      pointName,
    );
  }
}

/**
 * Error thrown when registering a key twice in the same service registry.
 */
export class DuplicateServiceError extends Error {
  /**
   * The key registered twice.
   */
  public readonly key: InjectionKey;

  constructor(key: InjectionKey) {
    super(
      `Service '${getServiceName(key)}' is already registered. ` +
        `A registry holds exactly one value per key.`,
    );
    this.name = this.constructor.name;
    this.key = key;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Error thrown when a service factory depends on itself.
 */
export class CircularDependencyError extends Error {
  /**
   * Names along the cycle, first to last.
   */
  public readonly cyclePath: string[];

  constructor(key: InjectionKey, resolutionPath: readonly string[]) {
    const cyclePath = [...resolutionPath, getServiceName(key)];
    super(`Circular dependency detected: ${cyclePath.join(' -> ')}`);
    this.name = this.constructor.name;
    this.cyclePath = cyclePath;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
