/**
 * @fileoverview MemberRegistry - Per-Type Member Tables
 *
 * @packageDocumentation
 * @module @decorum/core/infrastructure/reflection
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Builds the registry entry of a class once and caches it for the lifetime
 * of the class. Every instance of the decorated variant shares the entry.
 *
 * ## Build Algorithm
 *
 * ```
 * build(type)
 *   1. Return the cached entry if there is one
 *   2. Reflect the declarations, base class first
 *   3. For each declaration:
 *      a. Check its injection markers (at most one, getters only)
 *      b. Method: check the implementation exists, group by name,
 *         replace an inherited declaration of the same signature
 *      c. Getter with an injection marker: injection point
 *      d. Anything else: property entry
 *   4. Pair injection points with their setters and check the types
 *   5. Freeze and cache
 * ```
 *
 * @version 1.0.0
 */

import {
  type AbstractConstructor,
  type IDeclaredMember,
  type IDecorationLogger,
  type IGetterDeclaration,
  type IInjectionPoint,
  type IMarker,
  type IMemberReflector,
  type IMethodDeclaration,
  type IMethodDescriptor,
  type IPropertyDeclaration,
  type IPropertyDescriptor,
  type IPropertyEntry,
  type IReflectedType,
  type IRegistryEntry,
  type ISetterDeclaration,
  type RuntimeType,
  Inject,
  NonExtensible,
  RegistrationError,
  formatSignature,
  hasDeclaredMethod,
  hasDeclaredProperty,
  isAssignable,
  selectMarkers,
} from '../../domain';

import { findFunction } from './prototype-members';
import { StaticMemberReflector } from './static-member-reflector';

/**
 * Registry options.
 */
export interface IMemberRegistryOptions {
  /**
   * Markers that turn a getter into an injection point.
   * @default [Inject]
   */
  injectionMarkers?: readonly IMarker[];

  /**
   * Type-level markers that disable the extension bag.
   * @default [NonExtensible]
   */
  nonExtensibleMarkers?: readonly IMarker[];

  /**
   * Source of declarations.
   * @default new StaticMemberReflector()
   */
  reflector?: IMemberReflector;

  /**
   * Receives a debug line per built entry.
   */
  logger?: IDecorationLogger;
}

interface IMutablePropertyEntry {
  name: string;
  field?: IPropertyDescriptor;
  getter?: IPropertyDescriptor;
  setter?: IPropertyDescriptor;
}

interface IPendingInjectionPoint {
  readonly getter: IPropertyDescriptor;
  readonly declaration: IGetterDeclaration;
  readonly marker: IMarker;
}

/**
 * MemberRegistry - builds and caches registry entries.
 *
 * @remarks
 * An entry depends on the markers the registry recognises, so registries
 * with different markers never share entries. `decorate()` uses one shared
 * default registry unless it is given custom markers or a reflector.
 *
 * @example
 * ```typescript
 * const registry = new MemberRegistry({ injectionMarkers: [Wired] });
 * const entry = registry.build(Job);
 *
 * entry.injectionPoints.get('clock')?.key;   // Types.instanceOf(Clock)
 * ```
 */
export class MemberRegistry {
  private readonly entries = new WeakMap<AbstractConstructor, IRegistryEntry>();

  private readonly options: Required<Omit<IMemberRegistryOptions, 'logger'>>;

  private readonly logger: IDecorationLogger | undefined;

  private readonly injectionMarkers: ReadonlySet<IMarker>;

  private readonly nonExtensibleMarkers: ReadonlySet<IMarker>;

  constructor(options?: IMemberRegistryOptions) {
    this.options = {
      injectionMarkers: options?.injectionMarkers ?? [Inject],
      nonExtensibleMarkers: options?.nonExtensibleMarkers ?? [NonExtensible],
      reflector: options?.reflector ?? new StaticMemberReflector(),
    };
    this.logger = options?.logger;
    this.injectionMarkers = new Set(this.options.injectionMarkers);
    this.nonExtensibleMarkers = new Set(this.options.nonExtensibleMarkers);
  }

  // ============================================================================
  // Public API
  // ============================================================================

  /**
   * Get the entry of a type, building it on first use.
   *
   * @param logger - Overrides the registry's logger for this build
   * @throws RegistrationError if the declarations are malformed
   */
  build(type: AbstractConstructor, logger = this.logger): IRegistryEntry {
    const cached = this.entries.get(type);
    if (cached) {
      return cached;
    }

    const entry = this.createEntry(this.options.reflector.reflect(type));
    this.entries.set(type, entry);

    logger?.debug(
      `[decorum] Registered ${entry.typeName}: ${entry.methods.size} method group(s), ` +
        `${entry.properties.size} propert(ies), ${entry.injectionPoints.size} injection point(s)`,
    );

    return entry;
  }

  /**
   * Check if the type's entry has been built.
   */
  has(type: AbstractConstructor): boolean {
    return this.entries.has(type);
  }

  hasMethod(entry: IRegistryEntry, name: string): boolean {
    return hasDeclaredMethod(entry, name);
  }

  hasProperty(entry: IRegistryEntry, name: string): boolean {
    return hasDeclaredProperty(entry, name);
  }

  // ============================================================================
  // Entry Construction
  // ============================================================================

  private createEntry(reflected: IReflectedType): IRegistryEntry {
    const typeName = reflected.name;
    const methods = new Map<string, IMethodDescriptor[]>();
    const properties = new Map<string, IMutablePropertyEntry>();
    const pending = new Map<string, IPendingInjectionPoint>();

    reflected.members.forEach((member, order) => {
      const marker = this.getInjectionMarker(typeName, member);
      const { declaration, declaringType } = member;

      switch (declaration.kind) {
        case 'method':
          this.addMethod(reflected, methods, declaration, declaringType, order);
          return;

        case 'getter': {
          const descriptor = createPropertyDescriptor(declaration, declaringType, order);
          if (marker) {
            pending.set(declaration.name, { getter: descriptor, declaration, marker });
            deleteGetter(properties, declaration.name);
          } else {
            pending.delete(declaration.name);
            getPropertyEntry(properties, declaration.name).getter = descriptor;
          }
          return;
        }

        case 'property':
        case 'setter':
          getPropertyEntry(properties, declaration.name)[
            declaration.kind === 'property' ? 'field' : 'setter'
          ] = createPropertyDescriptor(declaration, declaringType, order);
          return;
      }
    });

    const injectionPoints = new Map<string, IInjectionPoint>();
    for (const [name, point] of pending) {
      injectionPoints.set(name, createInjectionPoint(typeName, point, properties.get(name)));
    }

    return Object.freeze({
      type: reflected.type,
      typeName,
      extensible: selectMarkers(reflected.markers, this.nonExtensibleMarkers).length === 0,
      methods: freezeMap(methods, (group) => Object.freeze(group)),
      properties: freezeMap(properties, (entry): IPropertyEntry => Object.freeze({ ...entry })),
      injectionPoints: freezeMap(injectionPoints, (point) => point),
    });
  }

  private getInjectionMarker(typeName: string, member: IDeclaredMember): IMarker | undefined {
    const { declaration } = member;
    const recognised = selectMarkers(declaration.markers, this.injectionMarkers);

    if (recognised.length > 1) {
      throw new RegistrationError(
        typeName,
        declaration.name,
        `more than one injection marker (${recognised.map((marker) => marker.name).join(', ')})`,
      );
    }

    const [marker] = recognised;
    if (marker && declaration.kind !== 'getter') {
      throw new RegistrationError(
        typeName,
        declaration.name,
        `injection marker '${marker.name}' is only allowed on getters, not on a ${declaration.kind}`,
      );
    }

    return marker;
  }

  private addMethod(
    reflected: IReflectedType,
    methods: Map<string, IMethodDescriptor[]>,
    declaration: IMethodDeclaration,
    declaringType: AbstractConstructor,
    order: number,
  ): void {
    if (!declaration.abstract && !findFunction(reflected.prototype, declaration.implementation)) {
      throw new RegistrationError(
        reflected.name,
        declaration.name,
        `implementation '${declaration.implementation}' is not a function on the prototype`,
      );
    }

    let group = methods.get(declaration.name);
    if (!group) {
      group = [];
      methods.set(declaration.name, group);
    }

    const index = group.findIndex((candidate) =>
      sameParameters(candidate.parameters, declaration.parameters),
    );
    const existing = index >= 0 ? group[index] : undefined;

    if (existing?.declaringType === declaringType) {
      throw new RegistrationError(
        reflected.name,
        declaration.name,
        `signature ${formatSignature(declaration)} is declared twice by ${declaringType.name}`,
      );
    }

    const descriptor: IMethodDescriptor = Object.freeze({
      name: declaration.name,
      kind: 'method',
      declaringType,
      order: existing?.order ?? order,
      markers: declaration.markers,
      parameters: declaration.parameters,
      returns: declaration.returns,
      implementation: declaration.implementation,
      abstract: declaration.abstract,
    });

    if (existing) {
      group[index] = descriptor;
    } else {
      group.push(descriptor);
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function createPropertyDescriptor(
  declaration: IPropertyDeclaration | IGetterDeclaration | ISetterDeclaration,
  declaringType: AbstractConstructor,
  order: number,
): IPropertyDescriptor {
  return Object.freeze({
    name: declaration.name,
    kind: declaration.kind,
    declaringType,
    order,
    markers: declaration.markers,
    type: declaration.type,
  });
}

function createInjectionPoint(
  typeName: string,
  point: IPendingInjectionPoint,
  property: IMutablePropertyEntry | undefined,
): IInjectionPoint {
  const { getter, declaration, marker } = point;

  if (property?.field) {
    throw new RegistrationError(
      typeName,
      getter.name,
      `a field cannot share its name with the injection point`,
    );
  }

  const setter = property?.setter;
  if (setter && !isAssignable(getter.type, setter.type)) {
    throw new RegistrationError(
      typeName,
      getter.name,
      `setter type '${setter.type.name}' does not accept getter type '${getter.type.name}'`,
    );
  }

  return Object.freeze({
    name: getter.name,
    getter,
    setter,
    key: declaration.key ?? getter.type,
    marker,
  });
}

function deleteGetter(properties: Map<string, IMutablePropertyEntry>, name: string): void {
  const entry = properties.get(name);
  if (entry) {
    delete entry.getter;
  }
}

function getPropertyEntry(
  properties: Map<string, IMutablePropertyEntry>,
  name: string,
): IMutablePropertyEntry {
  let entry = properties.get(name);
  if (!entry) {
    entry = { name };
    properties.set(name, entry);
  }
  return entry;
}

function sameParameters(left: readonly RuntimeType[], right: readonly RuntimeType[]): boolean {
  return (
    left.length === right.length && left.every((type, index) => sameType(type, right[index]))
  );
}

function sameType(left: RuntimeType, right: RuntimeType | undefined): boolean {
  if (left === right) {
    return true;
  }
  if (left.kind === 'instance' && right?.kind === 'instance') {
    return left.ctor === right.ctor;
  }
  if (left.kind === 'enum' && right?.kind === 'enum') {
    return left.values === right.values;
  }
  return false;
}

function freezeMap<V, R>(source: Map<string, V>, freeze: (value: V) => R): ReadonlyMap<string, R> {
  const result = new Map<string, R>();
  for (const [key, value] of source) {
    result.set(key, freeze(value));
  }
  return result;
}
