/**
 * @fileoverview @decorum/core - Main Entry Point
 *
 * Runtime decoration of plain classes: missing-member handlers, callback
 * coercion, lazy injection and overload dispatch by runtime argument types.
 *
 * @packageDocumentation
 * @module @decorum/core
 * @version 1.0.0
 * @license Apache-2.0
 *
 * @example
 * ```typescript
 * import {
 *   decorate,
 *   dynamic,
 *   getter,
 *   method,
 *   Inject,
 *   ServiceRegistry,
 *   Types,
 * } from '@decorum/core';
 *
 * const Action = Types.capability('Action', 'execute');
 *
 * abstract class Job {
 *   static members = [
 *     getter('retries', Types.Number, { markers: [Inject] }),
 *     method('configure', [Action]),
 *   ];
 *
 *   abstract get retries(): number;
 *
 *   configure(action: { execute(subject: unknown): void }): void {
 *     action.execute(this);
 *   }
 * }
 *
 * const services = new ServiceRegistry().add(Types.Number, 3);
 * const job = decorate(Job, { lookupService: services }).instantiate();
 *
 * job.retries;                                      // 3
 * dynamic(job).invokeMethod('configure', [(subject: unknown) => {}]);
 * ```
 */

// ============================================================================
// Domain Layer Exports
// Contracts, runtime types, errors - NO dispatch logic
// ============================================================================
export * from './domain';

// ============================================================================
// Infrastructure Layer Exports
// Registry, resolver, injection cache, dynamic objects
// ============================================================================
export * from './infrastructure';

// ============================================================================
// Application Layer Exports
// decorate(), dynamic()
// ============================================================================
export * from './application';

// ============================================================================
// Version
// ============================================================================
export const VERSION = '1.0.0';
