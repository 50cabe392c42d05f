/**
 * @fileoverview Domain Dynamic Module Exports
 *
 * @packageDocumentation
 * @module @decorum/core/domain/dynamic
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 */

export {
  type MethodMissingHandler,
  type PropertyGetMissingHandler,
  type PropertySetMissingHandler,
  type IMissingMemberHandlers,
  type IDecorationLogger,
  type DynamicPhase,
  type IDynamicObject,
} from './dynamic-object.interface';

export {
  DecorationError,
  RegistrationError,
  UnknownMethodError,
  UnknownPropertyError,
  ReadOnlyPropertyError,
  TypeCoercionError,
} from './decoration.errors';
