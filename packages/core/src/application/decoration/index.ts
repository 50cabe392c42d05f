/**
 * @fileoverview Application Decoration Module Exports
 *
 * @packageDocumentation
 * @module @decorum/core/application/decoration
 * @license Apache-2.0
 */

export {
  decorate,
  dynamic,
  isDecorated,
  DecoratedTypeFactory,
  DECORATED_SUFFIX,
  type IDecorateOptions,
  type DecorationServices,
} from './decorate';
