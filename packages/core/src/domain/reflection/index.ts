/**
 * @fileoverview Domain Reflection Module Exports
 *
 * @packageDocumentation
 * @module @decorum/core/domain/reflection
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Runtime types, markers, member declarations and the descriptors the
 * member registry builds from them.
 */

// ============================================================================
// Runtime Types
// ============================================================================

export {
  type EnumLike,
  type RuntimeTypeKind,
  type IRuntimeTypeBase,
  type IPrimitiveType,
  type IEnumType,
  type IInstanceType,
  type ICapabilityType,
  type RuntimeType,
  type CoercionKind,
  type IArgumentMatch,
  MatchRank,
  Types,
  isRuntimeType,
  getEnumNames,
  isEnumValue,
  findEnumMember,
  satisfiesCapability,
  matchArgument,
  isAssignable,
  describeValue,
} from './runtime-type';

// ============================================================================
// Markers
// ============================================================================

export { type IMarker, createMarker, isMarker, selectMarkers, Inject, NonExtensible } from './marker';

// ============================================================================
// Declarations
// ============================================================================

export {
  type MemberKind,
  type IMethodDeclaration,
  type IPropertyDeclaration,
  type IGetterDeclaration,
  type ISetterDeclaration,
  type MemberDeclaration,
  type IMethodOptions,
  type IAccessorOptions,
  type IDeclaredMember,
  type IReflectedType,
  type IMemberReflector,
  method,
  property,
  getter,
  setter,
  isMemberDeclaration,
} from './member-declaration';

// ============================================================================
// Descriptors
// ============================================================================

export {
  type IMemberDescriptor,
  type IMethodDescriptor,
  type IPropertyDescriptor,
  type IPropertyEntry,
  type IInjectionPoint,
  type IRegistryEntry,
  hasDeclaredMethod,
  hasDeclaredProperty,
  getWritableType,
  formatSignature,
} from './member-descriptor';
