/**
 * @fileoverview Domain Layer Exports
 *
 * The Domain layer holds the contracts of the decoration engine: runtime
 * types, declarations, lookup ports and errors. Nothing here dispatches.
 * NO infrastructure dependencies are allowed here (Hexagonal Architecture).
 *
 * @module @decorum/core/domain
 * @license Apache-2.0
 */

// ============================================================================
// Reflection - Runtime types, markers, declarations, descriptors
// ============================================================================
export * from './reflection';

// ============================================================================
// Injection - Lookup keys, lookup service port, slot states
// ============================================================================
export * from './injection';

// ============================================================================
// Dynamic - Dynamic object contract and dispatch errors
// ============================================================================
export * from './dynamic';
