/**
 * @fileoverview IDynamicObject - Dynamic Access to a Decorated Instance
 *
 * @packageDocumentation
 * @module @decorum/core/domain/dynamic
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Port)
 *
 * Every decorated instance has a dynamic side reachable through `dynamic()`.
 * It is the same dispatch path plain property access goes through, exposed
 * as methods so callers can reach members TypeScript does not know about:
 *
 * ```typescript
 * const thing = factory.instantiate();
 *
 * dynamic(thing).setMethodMissingHandler((name, args) => calls.push([name, args]));
 * dynamic(thing).invokeMethod('m1', []);
 * dynamic(thing).setProperty('color', 'red');   // enum coercion
 * ```
 *
 * ## Missing-Member Handlers
 *
 * Three independent slots. An unset slot means "no fallback here": lookup
 * moves on to the base type's own `methodMissing` / `propertyMissing` /
 * `propertyMissingSet`, then to the factory's `handlers`, then fails with
 * `UnknownMethodError` / `UnknownPropertyError`.
 *
 * @version 1.0.0
 */

/**
 * Called for a method no declaration, prototype function or property-style
 * setter answers.
 */
export type MethodMissingHandler = (name: string, args: readonly unknown[]) => unknown;

/**
 * Called for a property read nothing else answers.
 */
export type PropertyGetMissingHandler = (name: string) => unknown;

/**
 * Called for a property write nothing else accepts.
 */
export type PropertySetMissingHandler = (name: string, value: unknown) => void;

/**
 * The three handler slots, each optional.
 */
export interface IMissingMemberHandlers {
  methodMissing?: MethodMissingHandler;
  propertyMissing?: PropertyGetMissingHandler;
  propertyMissingSet?: PropertySetMissingHandler;
}

/**
 * Logger accepted by `decorate()`.
 *
 * @remarks
 * `console` satisfies it. Without one, decoration is silent.
 */
export interface IDecorationLogger {
  debug(message: string, ...meta: unknown[]): void;
}

/**
 * Construction state of a decorated instance.
 *
 * @remarks
 * While `constructing`, dispatch answers from declared and prototype members
 * only: no extension bag, no missing-member handlers.
 */
export type DynamicPhase = 'constructing' | 'ready';

/**
 * Dynamic side of a decorated instance.
 */
export interface IDynamicObject {
  /** Current construction state. */
  readonly phase: DynamicPhase;

  /**
   * Call a method by name.
   *
   * @remarks
   * Errors thrown by the implementation, a coerced callback or a handler
   * propagate unchanged.
   */
  invokeMethod(name: string, args: readonly unknown[]): unknown;

  getProperty(name: string): unknown;

  setProperty(name: string, value: unknown): void;

  /**
   * Check if a read of `name` would be answered without a missing-property
   * handler.
   */
  hasProperty(name: string): boolean;

  /**
   * Check if a call to `name` would be answered without a method-missing
   * handler.
   */
  hasMethod(name: string): boolean;

  /**
   * The extension bag, or `undefined` for non-extensible types.
   */
  readonly extensions: Map<string, unknown> | undefined;

  setMethodMissingHandler(handler: MethodMissingHandler | undefined): void;

  setPropertyGetMissingHandler(handler: PropertyGetMissingHandler | undefined): void;

  setPropertySetMissingHandler(handler: PropertySetMissingHandler | undefined): void;
}
