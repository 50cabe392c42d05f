/**
 * @fileoverview InjectionSlot - Per-Instance State of an Injection Point
 *
 * @packageDocumentation
 * @module @decorum/core/domain/injection
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * ```
 *              get()                    lookup ok
 * Unresolved ─────────► Resolving ─────────────────► Resolved(value)
 *     ▲                    │                              │
 *     └── lookup failed ───┘                              │ set()
 *                                                         ▼
 * Unresolved ─────────────── set() ───────────────► Explicit(value)
 * ```
 *
 * `Resolving` marks the exclusive region around the lookup: only the call
 * that entered it may leave it. Once a value is held the slot never returns
 * to `Unresolved`.
 *
 * @version 1.0.0
 */

export type InjectionSlot =
  | { readonly state: 'unresolved' }
  | { readonly state: 'resolving' }
  | { readonly state: 'resolved'; readonly value: unknown }
  | { readonly state: 'explicit'; readonly value: unknown };

/**
 * A slot that holds a value.
 */
export type SettledSlot = Extract<InjectionSlot, { readonly value: unknown }>;

export const UNRESOLVED: InjectionSlot = Object.freeze({ state: 'unresolved' });

export const RESOLVING: InjectionSlot = Object.freeze({ state: 'resolving' });

export function resolvedSlot(value: unknown): InjectionSlot {
  return Object.freeze({ state: 'resolved', value });
}

export function explicitSlot(value: unknown): InjectionSlot {
  return Object.freeze({ state: 'explicit', value });
}

/**
 * Check if a slot holds a value (resolved or explicitly set).
 */
export function isSettled(slot: InjectionSlot): slot is SettledSlot {
  return slot.state === 'resolved' || slot.state === 'explicit';
}
