/**
 * @fileoverview Domain Injection Module Exports
 *
 * @packageDocumentation
 * @module @decorum/core/domain/injection
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Keys, the lookup service port, injection slot states and injection errors.
 */

export {
  type Constructor,
  type AbstractConstructor,
  type ServiceIdentifier,
  type InjectionKey,
  isServiceIdentifier,
  isInjectionKey,
  getServiceName,
  getServiceKey,
  createToken,
} from './service-identifier';

export { type IServiceLookup, isServiceLookup } from './service-lookup.interface';

export {
  type InjectionSlot,
  type SettledSlot,
  UNRESOLVED,
  RESOLVING,
  resolvedSlot,
  explicitSlot,
  isSettled,
} from './injection-slot';

export {
  UnresolvedDependencyError,
  CircularInjectionError,
  DuplicateServiceError,
  CircularDependencyError,
} from './injection.errors';
