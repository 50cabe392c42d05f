/**
 * @fileoverview Member Declarations - Static Member Tables
 *
 * @packageDocumentation
 * @module @decorum/core/domain/reflection
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * ## Zero-Reflection Declarations
 *
 * A decoratable class lists its dynamic members in a `static members` table,
 * the same way services list their dependencies in `static inject`:
 *
 * ```typescript
 * class Tester {
 *   static members = [
 *     method('overloaded', [Types.Integer, Action], { implementation: 'overloadedInteger' }),
 *     method('overloaded', [Types.String, Action], { implementation: 'overloadedString' }),
 *     property('lastMethod', Types.String),
 *   ];
 *
 *   declare overloaded: (value: number | string, action: IAction) => void;
 *
 *   lastMethod?: string;
 *
 *   private overloadedInteger(value: number, action: IAction): void { ... }
 *   private overloadedString(value: string, action: IAction): void { ... }
 * }
 * ```
 *
 * Several declarations may share a name: they are overloads, told apart at
 * call time by the runtime types of the arguments.
 *
 * @version 1.0.0
 */

import type { AbstractConstructor, InjectionKey } from '../injection/service-identifier';

import { type IMarker } from './marker';
import { type RuntimeType, Types } from './runtime-type';

/**
 * Brand used to recognise declarations built by the helpers below.
 * @internal
 */
const DECLARATION_BRAND = Symbol('MemberDeclaration');

/**
 * Kind of a declared member.
 *
 * @remarks
 * `property` is field-backed; `getter` and `setter` are accessors.
 */
export type MemberKind = 'method' | 'property' | 'getter' | 'setter';

interface IDeclarationBase {
  readonly [DECLARATION_BRAND]: true;
  readonly name: string;
  readonly markers: readonly IMarker[];
}

export interface IMethodDeclaration extends IDeclarationBase {
  readonly kind: 'method';
  readonly parameters: readonly RuntimeType[];
  readonly returns: RuntimeType;

  /** Prototype key holding the implementation. */
  readonly implementation: string;

  /** Whether the implementation may be missing from the prototype. */
  readonly abstract: boolean;
}

export interface IPropertyDeclaration extends IDeclarationBase {
  readonly kind: 'property';
  readonly type: RuntimeType;
}

export interface IGetterDeclaration extends IDeclarationBase {
  readonly kind: 'getter';
  readonly type: RuntimeType;

  /** Lookup key overriding the declared type, for injection points. */
  readonly key?: InjectionKey;
}

export interface ISetterDeclaration extends IDeclarationBase {
  readonly kind: 'setter';
  readonly type: RuntimeType;
}

export type MemberDeclaration =
  | IMethodDeclaration
  | IPropertyDeclaration
  | IGetterDeclaration
  | ISetterDeclaration;

export interface IMethodOptions {
  implementation?: string;
  returns?: RuntimeType;
  markers?: readonly IMarker[];
  abstract?: boolean;
}

export interface IAccessorOptions {
  markers?: readonly IMarker[];
  key?: InjectionKey;
}

// ============================================================================
// Declaration Helpers
// ============================================================================

/**
 * Declare a method (one overload).
 *
 * @param name - Name callers use
 * @param parameters - Parameter types, in order
 * @param options - Implementation key (defaults to `name`), return type, markers
 */
export function method(
  name: string,
  parameters: readonly RuntimeType[] = [],
  options: IMethodOptions = {},
): IMethodDeclaration {
  return Object.freeze({
    [DECLARATION_BRAND]: true as const,
    kind: 'method' as const,
    name,
    parameters: Object.freeze([...parameters]),
    returns: options.returns ?? Types.Object,
    implementation: options.implementation ?? name,
    abstract: options.abstract ?? false,
    markers: Object.freeze([...(options.markers ?? [])]),
  });
}

/**
 * Declare a field-backed property.
 */
export function property(
  name: string,
  type: RuntimeType = Types.Object,
  options: Pick<IAccessorOptions, 'markers'> = {},
): IPropertyDeclaration {
  return Object.freeze({
    [DECLARATION_BRAND]: true as const,
    kind: 'property' as const,
    name,
    type,
    markers: Object.freeze([...(options.markers ?? [])]),
  });
}

/**
 * Declare a getter. With an injection marker it becomes an injection point.
 */
export function getter(
  name: string,
  type: RuntimeType = Types.Object,
  options: IAccessorOptions = {},
): IGetterDeclaration {
  return Object.freeze({
    [DECLARATION_BRAND]: true as const,
    kind: 'getter' as const,
    name,
    type,
    key: options.key,
    markers: Object.freeze([...(options.markers ?? [])]),
  });
}

/**
 * Declare a setter.
 */
export function setter(
  name: string,
  type: RuntimeType = Types.Object,
  options: Pick<IAccessorOptions, 'markers'> = {},
): ISetterDeclaration {
  return Object.freeze({
    [DECLARATION_BRAND]: true as const,
    kind: 'setter' as const,
    name,
    type,
    markers: Object.freeze([...(options.markers ?? [])]),
  });
}

/**
 * Check if a value was produced by one of the declaration helpers.
 */
export function isMemberDeclaration(value: unknown): value is MemberDeclaration {
  return typeof value === 'object' && value !== null && DECLARATION_BRAND in value;
}

// ============================================================================
// Reflection Contract
// ============================================================================

/**
 * A declaration together with the class that declared it.
 */
export interface IDeclaredMember {
  readonly declaration: MemberDeclaration;
  readonly declaringType: AbstractConstructor;
}

/**
 * What a reflector reports about a class.
 */
export interface IReflectedType {
  readonly type: AbstractConstructor;
  readonly name: string;

  /** Type-level markers, including inherited ones. */
  readonly markers: readonly IMarker[];

  /** Declarations, base class first, each class in its own declaration order. */
  readonly members: readonly IDeclaredMember[];

  /** The class prototype, used to check implementations exist. */
  readonly prototype: object;
}

/**
 * Member reflection capability.
 *
 * @remarks
 * The default implementation reads `static members` and `static markers`.
 * Supply another to describe classes you cannot edit.
 */
export interface IMemberReflector {
  reflect(type: AbstractConstructor): IReflectedType;
}
