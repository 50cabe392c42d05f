/**
 * @fileoverview DynamicObject - Dispatch State of a Decorated Instance
 *
 * @packageDocumentation
 * @module @decorum/core/infrastructure/dynamic
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Every access a decorated instance cannot answer from its own properties
 * ends up here. The state lives beside the instance (in a WeakMap), never on
 * it, so the base class sees exactly the properties it defined. Declared
 * fields live here too: a class lists them with `declare` so that they never
 * become own properties and every write is dispatched.
 *
 * ## Property Read
 *
 * ```
 * getProperty(name)
 *   1. Injection point          → InjectionCache
 *   2. Own property
 *   3. Declared property        → field value / accessor on the prototype
 *   4. Declared method group    → cached dispatcher
 *   5. Prototype chain
 *   -- constructing: stop here, UnknownPropertyError --
 *   6. Extension container      → the bag (UnknownPropertyError if non-extensible)
 *   7. Extension
 *   8. Missing-property handler
 *   9. UnknownPropertyError
 * ```
 *
 * ## Method Call
 *
 * ```
 * invokeMethod(name, args)
 *   1. Declared overloads       → resolve, coerce, call the implementation
 *   2. Undeclared function      → call it
 *   3. obj.prop(value)          → property-style assignment
 *   -- constructing: stop here, UnknownMethodError --
 *   4. Method-missing handler
 *   5. UnknownMethodError
 * ```
 *
 * @version 1.0.0
 */

import {
  type DynamicPhase,
  type IDynamicObject,
  type IMissingMemberHandlers,
  type IPropertyEntry,
  type IRegistryEntry,
  type MethodMissingHandler,
  type PropertyGetMissingHandler,
  type PropertySetMissingHandler,
  ReadOnlyPropertyError,
  UnknownMethodError,
  UnknownPropertyError,
  getWritableType,
} from '../../domain';
import { applyCoercions, coerceAssignment } from '../dispatch/argument-coercion';
import { type OverloadResolver } from '../dispatch/overload-resolver';
import { type InjectionCache } from '../injection/injection-cache';
import { type Callable, findFunction, isCallable } from '../reflection/prototype-members';

import { ExtensionBag } from './extension-bag';
import { type MissingMemberProtocol } from './missing-member-protocol';

/**
 * What a decorated type's instances share.
 */
export interface IDecoratedBinding {
  readonly entry: IRegistryEntry;

  /**
   * Object inheriting from the base prototype, outside the dispatch path.
   * Declared members are read and written through it with the instance as
   * receiver.
   */
  readonly target: object;

  readonly resolver: OverloadResolver;
  readonly injection: InjectionCache;
  readonly protocol: MissingMemberProtocol;

  /** @default 'ext' */
  readonly extensionContainerName: string;
}

/**
 * Dispatch state per instance.
 * @internal
 */
const objects = new WeakMap<object, DynamicObject>();

/**
 * Bindings by decorated prototype.
 * @internal
 */
const bindings = new WeakMap<object, IDecoratedBinding>();

/**
 * DynamicObject - IDynamicObject implementation.
 *
 * @remarks
 * Created on the first dispatched access, which may happen while the base
 * constructor is still running. Until `markReady()` the object only answers
 * from declared and prototype members.
 */
export class DynamicObject implements IDynamicObject {
  private currentPhase: DynamicPhase = 'constructing';

  private readonly slots: IMissingMemberHandlers = {};

  private readonly dispatchers = new Map<string, Callable>();

  /**
   * Values of declared field-backed properties.
   */
  private readonly fields = new Map<string, unknown>();

  private bag: ExtensionBag | undefined;

  private constructor(
    private readonly instance: object,
    private readonly binding: IDecoratedBinding,
  ) {}

  // ============================================================================
  // Instance Tracking
  // ============================================================================

  /**
   * Make instances inheriting from `prototype` dispatch through `binding`.
   */
  static register(prototype: object, binding: IDecoratedBinding): void {
    bindings.set(prototype, binding);
  }

  /**
   * Dispatch state of a decorated instance, created on first use.
   *
   * @returns `undefined` if the value is not a decorated instance
   */
  static for(value: unknown): DynamicObject | undefined {
    if (typeof value !== 'object' || value === null) {
      return undefined;
    }

    const existing = objects.get(value);
    if (existing) {
      return existing;
    }

    const binding = findBinding(value);
    if (!binding) {
      return undefined;
    }

    const object = new DynamicObject(value, binding);
    objects.set(value, object);
    return object;
  }

  get phase(): DynamicPhase {
    return this.currentPhase;
  }

  /**
   * End the construction window.
   */
  markReady(): this {
    this.currentPhase = 'ready';
    return this;
  }

  // ============================================================================
  // Properties
  // ============================================================================

  getProperty(name: string): unknown {
    const { entry, target, injection, protocol } = this.binding;

    const point = entry.injectionPoints.get(name);
    if (point) {
      return injection.getInjected(this.instance, point);
    }

    if (Object.hasOwn(this.instance, name)) {
      return Reflect.get(this.instance, name);
    }

    const property = entry.properties.get(name);
    if (property) {
      return isFieldBacked(property)
        ? this.fields.get(name)
        : Reflect.get(target, name, this.instance);
    }

    if (entry.methods.has(name)) {
      return this.getDispatcher(name);
    }

    if (Reflect.has(target, name)) {
      return Reflect.get(target, name, this.instance);
    }

    if (this.currentPhase === 'constructing') {
      throw new UnknownPropertyError(entry.typeName, name);
    }

    if (name === this.binding.extensionContainerName) {
      return this.getBag(name).container;
    }

    if (this.bag?.has(name)) {
      return this.bag.get(name);
    }

    // A plain call reads the member first; hand it to methodMissing.
    if (
      !protocol.findPropertyMissing(this.instance, this.slots) &&
      protocol.findMethodMissing(this.instance, this.slots)
    ) {
      return this.getDispatcher(name);
    }

    return protocol.getMissingProperty(this.instance, this.slots, name);
  }

  setProperty(name: string, value: unknown): void {
    const { entry, target, injection, protocol } = this.binding;

    if (Object.hasOwn(this.instance, name)) {
      if (!Reflect.set(this.instance, name, value)) {
        throw new ReadOnlyPropertyError(entry.typeName, name);
      }
      return;
    }

    const point = entry.injectionPoints.get(name);
    if (point) {
      injection.setInjected(this.instance, point, value);
      return;
    }

    const property = entry.properties.get(name);
    if (property) {
      const coerced = coerceAssignment(getWritableType(property), value);
      if (isFieldBacked(property)) {
        this.fields.set(name, coerced);
      } else if (!Reflect.set(target, name, coerced, this.instance)) {
        throw new ReadOnlyPropertyError(entry.typeName, name);
      }
      return;
    }

    if (Reflect.has(target, name) || this.currentPhase === 'constructing') {
      if (!Reflect.set(target, name, value, this.instance)) {
        throw new ReadOnlyPropertyError(entry.typeName, name);
      }
      return;
    }

    if (name === this.binding.extensionContainerName) {
      if (!entry.extensible) {
        throw new UnknownPropertyError(entry.typeName, name, 'set');
      }
      throw new ReadOnlyPropertyError(entry.typeName, name);
    }

    if (this.bag?.has(name)) {
      this.bag.set(name, value);
      return;
    }

    protocol.setMissingProperty(this.instance, this.slots, name, value);
  }

  hasProperty(name: string): boolean {
    const { entry, target } = this.binding;

    if (
      entry.injectionPoints.has(name) ||
      Object.hasOwn(this.instance, name) ||
      entry.properties.has(name) ||
      entry.methods.has(name) ||
      Reflect.has(target, name)
    ) {
      return true;
    }

    if (this.currentPhase === 'constructing') {
      return false;
    }

    return (
      (name === this.binding.extensionContainerName && entry.extensible) ||
      (this.bag?.has(name) ?? false)
    );
  }

  get extensions(): Map<string, unknown> | undefined {
    if (!this.binding.entry.extensible) {
      return undefined;
    }
    return this.getBag(this.binding.extensionContainerName).values;
  }

  // ============================================================================
  // Methods
  // ============================================================================

  invokeMethod(name: string, args: readonly unknown[]): unknown {
    const { entry, target, resolver, protocol } = this.binding;

    const declared = entry.methods.has(name);
    if (declared) {
      const resolution = resolver.resolve(entry, name, args);
      if (resolution.kind === 'match') {
        const implementation = findFunction(target, resolution.method.implementation);
        if (implementation) {
          return Reflect.apply(
            implementation,
            this.instance,
            applyCoercions(resolution.method, resolution.matches, args),
          );
        }
      }
    } else {
      const plain = this.findPlainFunction(name);
      if (plain) {
        return Reflect.apply(plain, this.instance, [...args]);
      }
    }

    const property = entry.properties.get(name);
    if (args.length === 1 && property && getWritableType(property)) {
      this.setProperty(name, args[0]);
      return undefined;
    }

    if (this.currentPhase === 'constructing') {
      throw new UnknownMethodError(entry.typeName, name, args);
    }

    return protocol.invokeMethodMissing(this.instance, this.slots, name, args);
  }

  hasMethod(name: string): boolean {
    return this.binding.entry.methods.has(name) || this.findPlainFunction(name) !== undefined;
  }

  // ============================================================================
  // Handler Slots
  // ============================================================================

  setMethodMissingHandler(handler: MethodMissingHandler | undefined): void {
    this.slots.methodMissing = handler;
  }

  setPropertyGetMissingHandler(handler: PropertyGetMissingHandler | undefined): void {
    this.slots.propertyMissing = handler;
  }

  setPropertySetMissingHandler(handler: PropertySetMissingHandler | undefined): void {
    this.slots.propertyMissingSet = handler;
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  private getDispatcher(name: string): Callable {
    let dispatcher = this.dispatchers.get(name);
    if (!dispatcher) {
      dispatcher = (...args: unknown[]): unknown => this.invokeMethod(name, args);
      this.dispatchers.set(name, dispatcher);
    }
    return dispatcher;
  }

  private getBag(name: string): ExtensionBag {
    if (!this.binding.entry.extensible) {
      throw new UnknownPropertyError(this.binding.entry.typeName, name);
    }
    if (!this.bag) {
      this.bag = new ExtensionBag();
    }
    return this.bag;
  }

  private findPlainFunction(name: string): Callable | undefined {
    const own: unknown = Object.getOwnPropertyDescriptor(this.instance, name)?.value;
    if (isCallable(own)) {
      return own;
    }
    return findFunction(this.binding.target, name);
  }
}

/**
 * A declared field without declared accessors keeps its value beside the
 * instance, so every write passes through coercion.
 */
function isFieldBacked(property: IPropertyEntry): boolean {
  return property.field !== undefined && !property.getter && !property.setter;
}

function findBinding(value: object): IDecoratedBinding | undefined {
  let current: unknown = Object.getPrototypeOf(value);
  while (typeof current === 'object' && current !== null) {
    const binding = bindings.get(current);
    if (binding) {
      return binding;
    }
    current = Object.getPrototypeOf(current);
  }
  return undefined;
}
