/**
 * @fileoverview Infrastructure Dispatch Module Exports
 *
 * @packageDocumentation
 * @module @decorum/core/infrastructure/dispatch
 * @license Apache-2.0
 */

export {
  OverloadResolver,
  type OverloadResolution,
  type IOverloadMatch,
  type IOverloadNoMatch,
} from './overload-resolver';

export { CallbackWrapper, coerce, isCallbackWrapper, translateReturn } from './callback-coercion';

export { convertEnum, applyCoercions, coerceAssignment } from './argument-coercion';
