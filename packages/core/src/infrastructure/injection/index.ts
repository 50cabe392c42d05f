/**
 * @fileoverview Infrastructure Injection Module Exports
 *
 * @packageDocumentation
 * @module @decorum/core/infrastructure/injection
 * @license Apache-2.0
 */

export { InjectionCache, type IInjectionCacheOptions } from './injection-cache';

export {
  ServiceRegistry,
  createServiceRegistry,
  type ServiceFactory,
} from './service-registry';
