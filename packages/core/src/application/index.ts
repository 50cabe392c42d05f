/**
 * @fileoverview Application Layer Exports
 *
 * The Application layer exposes the decoration entry points that wire the
 * infrastructure together.
 *
 * @module @decorum/core/application
 * @license Apache-2.0
 */

// ============================================================================
// Decoration - decorate(), dynamic()
// ============================================================================
export * from './decoration';
