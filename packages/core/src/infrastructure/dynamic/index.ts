/**
 * @fileoverview Infrastructure Dynamic Module Exports
 *
 * @packageDocumentation
 * @module @decorum/core/infrastructure/dynamic
 * @license Apache-2.0
 */

export { ExtensionBag } from './extension-bag';
export { MissingMemberProtocol } from './missing-member-protocol';
export { DynamicObject, type IDecoratedBinding } from './dynamic-object';
export { DispatchHandler, PASSTHROUGH_KEYS } from './dispatch-handler';
