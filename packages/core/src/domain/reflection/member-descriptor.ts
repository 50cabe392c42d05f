/**
 * @fileoverview Member Descriptors - The Per-Type Registry Entry
 *
 * @packageDocumentation
 * @module @decorum/core/domain/reflection
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A registry entry is built once per class and shared by every instance of
 * its decorated variant. Everything in it is frozen after the build.
 *
 * ```
 * RegistryEntry (Tester)
 * ├─ methods
 * │  ├─ overloaded → [(Integer, Action) #0, (String, Action) #1]
 * │  └─ oneAction  → [(Action) #2]
 * ├─ properties
 * │  └─ lastMethod → field String
 * └─ injectionPoints
 *    └─ clock → key Clock, setter: none
 * ```
 *
 * @version 1.0.0
 */

import type { AbstractConstructor, InjectionKey } from '../injection/service-identifier';

import { type IMarker } from './marker';
import { type MemberKind } from './member-declaration';
import { type RuntimeType } from './runtime-type';

/**
 * Common descriptor fields.
 */
export interface IMemberDescriptor {
  readonly name: string;
  readonly kind: MemberKind;
  readonly declaringType: AbstractConstructor;

  /** Position in the flattened declaration list; breaks overload ties. */
  readonly order: number;

  readonly markers: readonly IMarker[];
}

/**
 * One declared method overload.
 */
export interface IMethodDescriptor extends IMemberDescriptor {
  readonly kind: 'method';
  readonly parameters: readonly RuntimeType[];
  readonly returns: RuntimeType;
  readonly implementation: string;
  readonly abstract: boolean;
}

/**
 * A declared field, getter or setter.
 */
export interface IPropertyDescriptor extends IMemberDescriptor {
  readonly kind: 'property' | 'getter' | 'setter';
  readonly type: RuntimeType;
}

/**
 * Everything declared under one property name.
 */
export interface IPropertyEntry {
  readonly name: string;
  readonly field?: IPropertyDescriptor;
  readonly getter?: IPropertyDescriptor;
  readonly setter?: IPropertyDescriptor;
}

/**
 * A getter whose value comes from a lookup service.
 */
export interface IInjectionPoint {
  readonly name: string;
  readonly getter: IPropertyDescriptor;
  readonly setter?: IPropertyDescriptor;
  readonly key: InjectionKey;
  readonly marker: IMarker;
}

/**
 * Reflected view of one class.
 */
export interface IRegistryEntry {
  readonly type: AbstractConstructor;
  readonly typeName: string;

  /** False when the class carries a non-extensible marker. */
  readonly extensible: boolean;

  /** Overloads grouped by name, in declaration order. */
  readonly methods: ReadonlyMap<string, readonly IMethodDescriptor[]>;

  readonly properties: ReadonlyMap<string, IPropertyEntry>;
  readonly injectionPoints: ReadonlyMap<string, IInjectionPoint>;
}

/**
 * Check if the entry declares a method with the given name.
 */
export function hasDeclaredMethod(entry: IRegistryEntry, name: string): boolean {
  return entry.methods.has(name);
}

/**
 * Check if the entry declares a property (field, accessor or injection point).
 */
export function hasDeclaredProperty(entry: IRegistryEntry, name: string): boolean {
  return entry.properties.has(name) || entry.injectionPoints.has(name);
}

/**
 * Type accepted when assigning the property, if it can be assigned at all.
 */
export function getWritableType(property: IPropertyEntry): RuntimeType | undefined {
  return property.setter?.type ?? property.field?.type;
}

/**
 * Format a method signature for messages, e.g. `overloaded(Integer, Action)`.
 */
export function formatSignature(method: Pick<IMethodDescriptor, 'name' | 'parameters'>): string {
  return `${method.name}(${method.parameters.map((parameter) => parameter.name).join(', ')})`;
}
