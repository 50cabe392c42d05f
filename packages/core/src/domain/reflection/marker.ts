/**
 * @fileoverview Marker - Annotations Attached to Types and Members
 *
 * @packageDocumentation
 * @module @decorum/core/domain/reflection
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Markers play the role annotations play elsewhere, without decorators or
 * reflect-metadata: they are plain values listed next to a declaration.
 *
 * ```typescript
 * class Settings {
 *   static markers = [NonExtensible];
 *   static members = [getter('clock', Types.instanceOf(Clock), { markers: [Inject] })];
 * }
 * ```
 *
 * Markers compare by identity. Which markers mean "inject" or "non-extensible"
 * is decided by the decoration options, so a project can bring its own.
 *
 * @version 1.0.0
 */

/**
 * A named marker value.
 */
export interface IMarker {
  readonly id: symbol;
  readonly name: string;
}

/**
 * Create a new marker.
 *
 * @example
 * ```typescript
 * export const Wired = createMarker('Wired');
 *
 * const factory = decorate(Job, { injectionMarkers: [Wired], lookupService });
 * ```
 */
export function createMarker(name: string): IMarker {
  return Object.freeze({ id: Symbol(name), name });
}

/**
 * Check if a value is a marker.
 */
export function isMarker(value: unknown): value is IMarker {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'id') === 'symbol' &&
    typeof Reflect.get(value, 'name') === 'string'
  );
}

/**
 * Marks a getter as an injection point.
 */
export const Inject = createMarker('Inject');

/**
 * Marks a type whose instances never get an extension bag.
 */
export const NonExtensible = createMarker('NonExtensible');

/**
 * Markers of `markers` that belong to `recognised`, in declaration order.
 */
export function selectMarkers(
  markers: readonly IMarker[],
  recognised: ReadonlySet<IMarker>,
): IMarker[] {
  return markers.filter((marker) => recognised.has(marker));
}
