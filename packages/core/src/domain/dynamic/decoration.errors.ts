/**
 * @fileoverview Decoration Errors - Error Classes of the Dispatch Layer
 *
 * @packageDocumentation
 * @module @decorum/core/domain/dynamic
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Errors raised by the engine itself. Errors raised by user code (method
 * implementations, missing-member handlers, coerced callbacks, lookup
 * services) are never wrapped in these: they reach the caller unchanged.
 *
 * @version 1.0.0
 */

import { describeValue } from '../reflection/runtime-type';

/**
 * Base error class for all decoration errors.
 *
 * @remarks
 * ```typescript
 * try {
 *   dynamic(thing).invokeMethod('m1', []);
 * } catch (error) {
 *   if (error instanceof UnknownMethodError) {
 *     console.error(error.memberPath, error.arity);
 *   }
 * }
 * ```
 */
export abstract class DecorationError extends Error {
  /**
   * Name of the (decorated) type involved.
   */
  public readonly typeName: string;

  /**
   * Name of the member involved, when there is one.
   */
  public readonly memberName: string | undefined;

  constructor(message: string, typeName: string, memberName?: string) {
    super(message);
    this.name = this.constructor.name;
    this.typeName = typeName;
    this.memberName = memberName;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * `Type.member`, or just `Type`.
   */
  get memberPath(): string {
    return this.memberName === undefined ? this.typeName : `${this.typeName}.${this.memberName}`;
  }
}

/**
 * Error thrown when a class's declarations cannot be registered.
 *
 * @remarks
 * **Causes:**
 * - More than one injection marker on the same member
 * - An injection marker on something other than a getter
 * - An injection setter whose type does not accept the getter's type
 * - A method implementation missing from the prototype
 * - The same signature declared twice by one class
 *
 * The type cannot be decorated until the declarations are fixed.
 */
export class RegistrationError extends DecorationError {
  /**
   * What is wrong with the declaration.
   */
  public readonly reason: string;

  constructor(typeName: string, memberName: string | undefined, reason: string) {
    const where = memberName === undefined ? `type '${typeName}'` : `'${typeName}.${memberName}'`;
    super(`Cannot register ${where}: ${reason}`, typeName, memberName);
    this.reason = reason;
  }
}

/**
 * Error thrown when no declared method matches a call and no method-missing
 * handler is configured.
 */
export class UnknownMethodError extends DecorationError {
  /**
   * Number of arguments supplied.
   */
  public readonly arity: number;

  /**
   * Runtime type names of the supplied arguments.
   */
  public readonly argumentTypes: readonly string[];

  constructor(typeName: string, methodName: string, args: readonly unknown[]) {
    const argumentTypes = args.map(describeValue);
    super(
      `Could not find method ${methodName}() for arguments [${argumentTypes.join(', ')}] ` +
        `on object of type ${typeName}.`,
      typeName,
      methodName,
    );
    this.arity = args.length;
    this.argumentTypes = Object.freeze(argumentTypes);
  }

  get methodName(): string {
    return this.memberName ?? '';
  }
}

/**
 * Error thrown when a property is neither declared, nor an extension, nor
 * handled by a property-missing handler.
 */
export class UnknownPropertyError extends DecorationError {
  /**
   * Whether the property was being read or written.
   */
  public readonly access: 'get' | 'set';

  constructor(typeName: string, propertyName: string, access: 'get' | 'set' = 'get') {
    super(
      `Could not ${access} unknown property '${propertyName}' for object of type ${typeName}.`,
      typeName,
      propertyName,
    );
    this.access = access;
  }

  get propertyName(): string {
    return this.memberName ?? '';
  }
}

/**
 * Error thrown when assigning a property that only has a getter.
 */
export class ReadOnlyPropertyError extends DecorationError {
  constructor(typeName: string, propertyName: string) {
    super(
      `Cannot set read-only property '${propertyName}' for object of type ${typeName}.`,
      typeName,
      propertyName,
    );
  }
}

/**
 * Error thrown when an argument cannot be converted to the declared type.
 *
 * @example
 * ```typescript
 * subject.color = 'purple';
 * // TypeCoercionError: Cannot convert 'purple' to Color (expected one of RED, GREEN)
 * ```
 */
export class TypeCoercionError extends DecorationError {
  /**
   * The value that could not be converted.
   */
  public readonly value: unknown;

  constructor(targetTypeName: string, value: unknown, expected: readonly string[]) {
    super(
      `Cannot convert '${String(value)}' to ${targetTypeName} (expected one of ${expected.join(', ')})`,
      targetTypeName,
    );
    this.value = value;
  }
}
