/**
 * @fileoverview Infrastructure Reflection Module Exports
 *
 * @packageDocumentation
 * @module @decorum/core/infrastructure/reflection
 * @license Apache-2.0
 */

export {
  StaticMemberReflector,
  MEMBERS_PROPERTY,
  MARKERS_PROPERTY,
  getConstructorChain,
} from './static-member-reflector';

export { MemberRegistry, type IMemberRegistryOptions } from './member-registry';

export {
  type Callable,
  isCallable,
  findPropertyDescriptor,
  findFunction,
} from './prototype-members';
