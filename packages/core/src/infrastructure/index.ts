/**
 * @fileoverview Infrastructure Layer Exports
 *
 * The Infrastructure layer implements the domain contracts: member
 * reflection, overload dispatch, injection and the proxy-based dynamic
 * object.
 *
 * @module @decorum/core/infrastructure
 * @license Apache-2.0
 */

// ============================================================================
// Reflection - Static member tables and the per-type registry
// ============================================================================
export * from './reflection';

// ============================================================================
// Dispatch - Overload resolution and argument coercion
// ============================================================================
export * from './dispatch';

// ============================================================================
// Injection - Injection cache and default lookup service
// ============================================================================
export * from './injection';

// ============================================================================
// Dynamic - Extension bag, missing-member protocol, proxy dispatch
// ============================================================================
export * from './dynamic';
