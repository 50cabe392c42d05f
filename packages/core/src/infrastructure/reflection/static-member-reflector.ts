/**
 * @fileoverview StaticMemberReflector - Reads `static members` Tables
 *
 * @packageDocumentation
 * @module @decorum/core/infrastructure/reflection
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE (Adapter)
 *
 * ## Zero-Reflection Pattern
 *
 * Declarations are read from static properties, never from decorator
 * metadata:
 *
 * ```typescript
 * abstract class Bean {
 *   static markers = [NonExtensible];
 *   static members = [getter('thing', Types.Number, { markers: [Inject] })];
 *   abstract get thing(): number;
 * }
 * ```
 *
 * Only a class's OWN `members` and `markers` count, so a subclass that
 * declares nothing does not report its parent's table twice.
 *
 * @version 1.0.0
 */

import {
  type AbstractConstructor,
  type IDeclaredMember,
  type IMarker,
  type IMemberReflector,
  type IReflectedType,
  RegistrationError,
  isMarker,
  isMemberDeclaration,
} from '../../domain';

/**
 * Static property holding member declarations.
 */
export const MEMBERS_PROPERTY = 'members';

/**
 * Static property holding type-level markers.
 */
export const MARKERS_PROPERTY = 'markers';

/**
 * Default IMemberReflector.
 *
 * @example
 * ```typescript
 * const reflected = new StaticMemberReflector().reflect(ActionsTester);
 * reflected.members.map((m) => m.declaration.name);
 * // ['oneAction', 'twoArgs', 'overloaded', 'overloaded', ...]
 * ```
 */
export class StaticMemberReflector implements IMemberReflector {
  reflect(type: AbstractConstructor): IReflectedType {
    const name = type.name || 'AnonymousClass';
    const markers: IMarker[] = [];
    const members: IDeclaredMember[] = [];

    for (const declaringType of getConstructorChain(type)) {
      markers.push(...readMarkers(name, declaringType));
      for (const declaration of readDeclarations(name, declaringType)) {
        members.push(Object.freeze({ declaration, declaringType }));
      }
    }

    const prototype: unknown = Reflect.get(type, 'prototype');
    if (typeof prototype !== 'object' || prototype === null) {
      throw new RegistrationError(name, undefined, 'the type has no prototype');
    }

    return Object.freeze({
      type,
      name,
      markers: Object.freeze(markers),
      members: Object.freeze(members),
      prototype,
    });
  }
}

/**
 * Constructors from the root base class down to `type`.
 * @internal
 */
export function getConstructorChain(type: AbstractConstructor): AbstractConstructor[] {
  const chain: AbstractConstructor[] = [];
  let current: unknown = type;

  while (isConstructor(current) && current !== Function.prototype) {
    chain.unshift(current);
    current = Object.getPrototypeOf(current);
  }

  return chain;
}

function isConstructor(value: unknown): value is AbstractConstructor {
  return typeof value === 'function' && typeof Reflect.get(value, 'prototype') === 'object';
}

function readDeclarations(typeName: string, declaringType: AbstractConstructor) {
  const table = readOwnTable(typeName, declaringType, MEMBERS_PROPERTY);

  return table.map((entry, index) => {
    if (!isMemberDeclaration(entry)) {
      throw new RegistrationError(
        typeName,
        undefined,
        `entry ${index} of ${declaringType.name}.${MEMBERS_PROPERTY} is not a member declaration`,
      );
    }
    return entry;
  });
}

function readMarkers(typeName: string, declaringType: AbstractConstructor): IMarker[] {
  const table = readOwnTable(typeName, declaringType, MARKERS_PROPERTY);

  return table.map((entry, index) => {
    if (!isMarker(entry)) {
      throw new RegistrationError(
        typeName,
        undefined,
        `entry ${index} of ${declaringType.name}.${MARKERS_PROPERTY} is not a marker`,
      );
    }
    return entry;
  });
}

function readOwnTable(
  typeName: string,
  declaringType: AbstractConstructor,
  property: string,
): readonly unknown[] {
  if (!Object.hasOwn(declaringType, property)) {
    return [];
  }

  const table: unknown = Reflect.get(declaringType, property);
  if (!Array.isArray(table)) {
    throw new RegistrationError(
      typeName,
      undefined,
      `${declaringType.name}.${property} must be an array`,
    );
  }
  return table;
}
