/**
 * @fileoverview RuntimeType - Parameter Types Checked at Call Time
 *
 * @packageDocumentation
 * @module @decorum/core/domain/reflection
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * TypeScript types are erased before a decorated method is ever called, so a
 * declared member states its parameter types with runtime descriptions
 * instead. Overload selection compares those descriptions against the actual
 * arguments:
 *
 * ```typescript
 * static members = [
 *   method('flag', [Types.Integer], { implementation: 'flagInteger' }),
 *   method('flag', [Types.Number], { implementation: 'flagNumber' }),
 *   method('flag', [Types.Object], { implementation: 'flagAny' }),
 * ];
 * ```
 *
 * ## Match Ranks
 *
 * | Rank | Argument vs. parameter |
 * |------|------------------------|
 * | Exact | same runtime type (`1` → Integer, `1.5` → Number, `'a'` → String) |
 * | NumericWidening | integer argument, `Number` parameter |
 * | Conversion | string naming an enum member, enum parameter |
 * | Top | `Object` parameter, or a nullish argument for a reference type |
 *
 * @version 1.0.0
 */

import type { AbstractConstructor } from '../injection/service-identifier';

/**
 * Brand used to recognise runtime type descriptions.
 * @internal
 */
const RUNTIME_TYPE_BRAND = Symbol('RuntimeType');

/**
 * TypeScript enum object (numeric or string valued).
 */
export type EnumLike = Readonly<Record<string, string | number>>;

/**
 * Discriminator of a runtime type.
 */
export type RuntimeTypeKind =
  | 'top'
  | 'void'
  | 'integer'
  | 'number'
  | 'string'
  | 'boolean'
  | 'closure'
  | 'array'
  | 'enum'
  | 'instance'
  | 'capability';

export interface IRuntimeTypeBase {
  readonly [RUNTIME_TYPE_BRAND]: true;
  readonly name: string;
}

/**
 * A type with no further structure.
 */
export interface IPrimitiveType extends IRuntimeTypeBase {
  readonly kind: 'top' | 'void' | 'integer' | 'number' | 'string' | 'boolean' | 'closure' | 'array';
}

/**
 * A TypeScript enum. Strings convert to members by case-insensitive name.
 */
export interface IEnumType extends IRuntimeTypeBase {
  readonly kind: 'enum';
  readonly values: EnumLike;
}

/**
 * Instances of a class (or of its subclasses).
 */
export interface IInstanceType extends IRuntimeTypeBase {
  readonly kind: 'instance';
  readonly ctor: AbstractConstructor;
}

/**
 * An object exposing exactly one callable method.
 *
 * @remarks
 * A bare function passed where a capability is the last declared parameter
 * is wrapped so that it satisfies the capability (see `CallbackWrapper`).
 */
export interface ICapabilityType extends IRuntimeTypeBase {
  readonly kind: 'capability';
  readonly method: string;
  readonly returns: RuntimeType;
}

export type RuntimeType = IPrimitiveType | IEnumType | IInstanceType | ICapabilityType;

/**
 * How well an argument fits a parameter; lower is better.
 */
export enum MatchRank {
  Exact = 0,
  NumericWidening = 1,
  Conversion = 2,
  Top = 3,
}

/**
 * What has to happen to an argument before it can be passed on.
 */
export type CoercionKind = 'none' | 'callback' | 'enum';

/**
 * Result of matching one argument against one parameter type.
 */
export interface IArgumentMatch {
  readonly rank: MatchRank;
  readonly coercion: CoercionKind;
}

const EXACT: IArgumentMatch = Object.freeze({ rank: MatchRank.Exact, coercion: 'none' });
const WIDENING: IArgumentMatch = Object.freeze({ rank: MatchRank.NumericWidening, coercion: 'none' });
const TOP: IArgumentMatch = Object.freeze({ rank: MatchRank.Top, coercion: 'none' });
const CALLBACK: IArgumentMatch = Object.freeze({ rank: MatchRank.Exact, coercion: 'callback' });
const ENUM_CONVERSION: IArgumentMatch = Object.freeze({
  rank: MatchRank.Conversion,
  coercion: 'enum',
});

function primitive(kind: IPrimitiveType['kind'], name: string): IPrimitiveType {
  return Object.freeze({ [RUNTIME_TYPE_BRAND]: true as const, kind, name });
}

// ============================================================================
// Type Constructors
// ============================================================================

/**
 * Runtime type descriptions used in member declarations.
 *
 * @example
 * ```typescript
 * const Action = Types.capability('Action', 'execute');
 *
 * static members = [
 *   method('configure', [Types.String, Action]),
 *   property('color', Types.enumOf(Color, 'Color')),
 *   getter('clock', Types.instanceOf(Clock), { markers: [Inject] }),
 * ];
 * ```
 */
export const Types = {
  Object: primitive('top', 'Object'),
  Void: primitive('void', 'void'),
  Integer: primitive('integer', 'Integer'),
  Number: primitive('number', 'Number'),
  String: primitive('string', 'String'),
  Boolean: primitive('boolean', 'Boolean'),
  Closure: primitive('closure', 'Closure'),
  Array: primitive('array', 'Array'),

  enumOf(values: EnumLike, name = 'Enum'): IEnumType {
    return Object.freeze({ [RUNTIME_TYPE_BRAND]: true as const, kind: 'enum' as const, name, values });
  },

  instanceOf(ctor: AbstractConstructor): IInstanceType {
    return Object.freeze({
      [RUNTIME_TYPE_BRAND]: true as const,
      kind: 'instance' as const,
      name: ctor.name || 'AnonymousClass',
      ctor,
    });
  },

  capability(name: string, method: string, returns: RuntimeType = primitive('void', 'void')): ICapabilityType {
    return Object.freeze({
      [RUNTIME_TYPE_BRAND]: true as const,
      kind: 'capability' as const,
      name,
      method,
      returns,
    });
  },
} as const;

/**
 * Check if a value is a runtime type description.
 */
export function isRuntimeType(value: unknown): value is RuntimeType {
  return typeof value === 'object' && value !== null && RUNTIME_TYPE_BRAND in value;
}

// ============================================================================
// Enum Helpers
// ============================================================================

/**
 * Member names of an enum, without the reverse mappings of numeric enums.
 */
export function getEnumNames(values: EnumLike): string[] {
  return Object.keys(values).filter((key) => Number.isNaN(Number(key)));
}

/**
 * Check if a value is one of the enum's member values.
 */
export function isEnumValue(values: EnumLike, value: unknown): boolean {
  return getEnumNames(values).some((name) => values[name] === value);
}

/**
 * Find an enum member by name, ignoring case.
 */
export function findEnumMember(values: EnumLike, name: string): string | number | undefined {
  const wanted = name.toUpperCase();
  const match = getEnumNames(values).find((candidate) => candidate.toUpperCase() === wanted);
  return match === undefined ? undefined : values[match];
}

// ============================================================================
// Matching
// ============================================================================

/**
 * Check if a value satisfies a capability without coercion.
 */
export function satisfiesCapability(type: ICapabilityType, value: unknown): boolean {
  if (typeof value === 'function') {
    // call, apply and bind inherited from Function.prototype do not count.
    const member: unknown = Reflect.get(value, type.method);
    return typeof member === 'function' && member !== Reflect.get(Function.prototype, type.method);
  }
  if (typeof value === 'object' && value !== null) {
    return typeof Reflect.get(value, type.method) === 'function';
  }
  return false;
}

/**
 * Match an argument against a parameter type.
 *
 * @returns The match, or `undefined` when the argument is not acceptable
 */
export function matchArgument(type: RuntimeType, value: unknown): IArgumentMatch | undefined {
  if (type.kind === 'top') {
    return TOP;
  }

  if (value === null || value === undefined) {
    switch (type.kind) {
      case 'void':
        return value === undefined ? EXACT : undefined;
      case 'integer':
      case 'number':
      case 'boolean':
        return undefined;
      default:
        return TOP;
    }
  }

  switch (type.kind) {
    case 'void':
      return undefined;

    case 'integer':
      return typeof value === 'bigint' || (typeof value === 'number' && Number.isInteger(value))
        ? EXACT
        : undefined;

    case 'number':
      if (typeof value === 'bigint') {
        return WIDENING;
      }
      if (typeof value !== 'number') {
        return undefined;
      }
      return Number.isInteger(value) ? WIDENING : EXACT;

    case 'string':
      return typeof value === 'string' ? EXACT : undefined;

    case 'boolean':
      return typeof value === 'boolean' ? EXACT : undefined;

    case 'closure':
      return typeof value === 'function' ? EXACT : undefined;

    case 'array':
      return Array.isArray(value) ? EXACT : undefined;

    case 'enum':
      if (isEnumValue(type.values, value)) {
        return EXACT;
      }
      return typeof value === 'string' && findEnumMember(type.values, value) !== undefined
        ? ENUM_CONVERSION
        : undefined;

    case 'instance':
      return value instanceof type.ctor ? EXACT : undefined;

    case 'capability':
      if (satisfiesCapability(type, value)) {
        return EXACT;
      }
      return typeof value === 'function' ? CALLBACK : undefined;
  }
}

/**
 * Check if every value of `source` is acceptable where `target` is declared.
 *
 * @remarks
 * Used to validate that an injection setter accepts what its getter returns.
 */
export function isAssignable(source: RuntimeType, target: RuntimeType): boolean {
  if (target.kind === 'top') {
    return true;
  }

  if (target.kind === 'number' && source.kind === 'integer') {
    return true;
  }

  switch (target.kind) {
    case 'enum':
      return source.kind === 'enum' && source.values === target.values;
    case 'instance':
      return source.kind === 'instance' && isSubclassOf(source.ctor, target.ctor);
    case 'capability':
      return source === target;
    default:
      return source.kind === target.kind;
  }
}

function isSubclassOf(candidate: AbstractConstructor, base: AbstractConstructor): boolean {
  let current: unknown = candidate;
  while (typeof current === 'function') {
    if (current === base) {
      return true;
    }
    current = Object.getPrototypeOf(current);
  }
  return false;
}

/**
 * Describe the runtime type of a value for error messages.
 *
 * @example
 * ```typescript
 * describeValue(1);        // 'Integer'
 * describeValue(1.5);      // 'Number'
 * describeValue(() => 1);  // 'Closure'
 * describeValue(new Foo());  // 'Foo'
 * ```
 */
export function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  switch (typeof value) {
    case 'undefined':
      return 'undefined';
    case 'number':
      return Number.isInteger(value) ? 'Integer' : 'Number';
    case 'bigint':
      return 'Integer';
    case 'string':
      return 'String';
    case 'boolean':
      return 'Boolean';
    case 'function':
      return 'Closure';
    case 'symbol':
      return 'Symbol';
    case 'object':
      if (Array.isArray(value)) {
        return 'Array';
      }
      return getConstructorName(value);
  }
}

function getConstructorName(value: object): string {
  const ctor: unknown = Reflect.get(value, 'constructor');
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
}
