/**
 * @fileoverview Argument Coercion - Applying What the Resolver Decided
 *
 * @packageDocumentation
 * @module @decorum/core/infrastructure/dispatch
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The resolver only says which arguments need converting. This module
 * converts them: bare functions become capability wrappers, strings become
 * enum members. The same enum conversion applies to declared-property
 * assignment.
 *
 * @version 1.0.0
 */

import {
  type IArgumentMatch,
  type IEnumType,
  type IMethodDescriptor,
  type RuntimeType,
  TypeCoercionError,
  findEnumMember,
  getEnumNames,
  isEnumValue,
} from '../../domain';

import { coerce } from './callback-coercion';

/**
 * Convert a member name to the enum value, ignoring case.
 *
 * @throws TypeCoercionError if no member has that name
 */
export function convertEnum(type: IEnumType, name: string): string | number {
  const value = findEnumMember(type.values, name);
  if (value === undefined) {
    throw new TypeCoercionError(type.name, name, getEnumNames(type.values));
  }
  return value;
}

/**
 * Arguments as the selected overload's implementation receives them.
 */
export function applyCoercions(
  method: IMethodDescriptor,
  matches: readonly IArgumentMatch[],
  args: readonly unknown[],
): unknown[] {
  return args.map((arg, index) => {
    const parameter = method.parameters[index];
    const match = matches[index];
    if (!parameter || !match || match.coercion === 'none') {
      return arg;
    }
    return coerceArgument(parameter, match, arg);
  });
}

function coerceArgument(parameter: RuntimeType, match: IArgumentMatch, arg: unknown): unknown {
  if (match.coercion === 'callback' && parameter.kind === 'capability' && isFunction(arg)) {
    return coerce(parameter, arg);
  }

  if (match.coercion === 'enum' && parameter.kind === 'enum' && typeof arg === 'string') {
    return convertEnum(parameter, arg);
  }

  return arg;
}

/**
 * Value to store when assigning a declared property of the given type.
 *
 * @throws TypeCoercionError for a string naming no member of an enum type
 */
export function coerceAssignment(type: RuntimeType | undefined, value: unknown): unknown {
  if (type?.kind === 'enum' && typeof value === 'string' && !isEnumValue(type.values, value)) {
    return convertEnum(type, value);
  }
  return value;
}

function isFunction(value: unknown): value is (...args: unknown[]) => unknown {
  return typeof value === 'function';
}
