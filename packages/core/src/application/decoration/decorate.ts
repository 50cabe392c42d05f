/**
 * @fileoverview decorate() - Synthesizing Decorated Types
 *
 * @packageDocumentation
 * @module @decorum/core/application/decoration
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * `decorate()` wires the registry, the resolver, the injection cache and the
 * missing-member protocol into a synthesized subclass-like type:
 *
 * ```
 * decorate(Thing, options)
 *   1. Build (or reuse) Thing's registry entry
 *   2. Create Thing_Decorated whose prototype inherits from a dispatch proxy
 *   3. Register the prototype so its instances get a DynamicObject
 *   4. Return the factory
 *
 * factory.instantiate(...args)
 *   1. Run Thing's constructor with Thing_Decorated as new.target
 *      (dispatched accesses run in the construction window)
 *   2. End the construction window
 * ```
 *
 * ## Usage
 *
 * ```typescript
 * class DynamicThing {
 *   methods = new Map<string, readonly unknown[]>();
 *
 *   methodMissing(name: string, args: readonly unknown[]): unknown {
 *     this.methods.set(name, args);
 *     return undefined;
 *   }
 * }
 *
 * const factory = decorate(DynamicThing);
 * const thing = factory.instantiate();
 *
 * dynamic(thing).invokeMethod('m1', [1, 2, 3]);
 * thing.methods.get('m1');   // [1, 2, 3]
 * ```
 *
 * @version 1.0.0
 */

import {
  type AbstractConstructor,
  type IDecorationLogger,
  type IDynamicObject,
  type IMarker,
  type IMemberReflector,
  type IMissingMemberHandlers,
  type IRegistryEntry,
  type IServiceLookup,
} from '../../domain';
import {
  type IDecoratedBinding,
  DispatchHandler,
  DynamicObject,
  InjectionCache,
  MemberRegistry,
  MissingMemberProtocol,
  OverloadResolver,
} from '../../infrastructure';

// ============================================================================
// Options
// ============================================================================

/**
 * Decoration options.
 *
 * @remarks
 * Every option has a default; `decorate(Type)` alone gives a decorated type
 * with `Inject` injection, `NonExtensible` opt-out, an `ext` extension
 * container and no lookup service.
 */
export interface IDecorateOptions {
  /**
   * Type-level markers that disable the extension bag.
   * @default [NonExtensible]
   */
  nonExtensibleMarkers?: readonly IMarker[];

  /**
   * Markers that turn a getter into an injection point.
   * @default [Inject]
   */
  injectionMarkers?: readonly IMarker[];

  /**
   * Lookup service for injection points, unless an instance provides its own.
   */
  lookupService?: IServiceLookup;

  /**
   * Type-wide missing-member handlers, consulted after the instance's
   * handler slots and the base type's own handler methods.
   */
  handlers?: IMissingMemberHandlers;

  /**
   * Property exposing the extension bag.
   * @default 'ext'
   */
  extensionContainerName?: string;

  /**
   * Property through which an instance may provide its own lookup service.
   * @default 'services'
   */
  instanceLookupProperty?: string;

  /**
   * Source of member declarations.
   * @default StaticMemberReflector
   */
  reflector?: IMemberReflector;

  /**
   * Registry to build the entry with. Takes precedence over
   * `injectionMarkers`, `nonExtensibleMarkers` and `reflector`.
   */
  registry?: MemberRegistry;

  /**
   * Receives debug lines for registry builds and injections.
   */
  logger?: IDecorationLogger;
}

/**
 * Registry shared by every decoration using the default markers and
 * reflector.
 * @internal
 */
const defaultRegistry = new MemberRegistry();

/**
 * Suffix of synthesized type names.
 */
export const DECORATED_SUFFIX = '_Decorated';

// ============================================================================
// Factory
// ============================================================================

/**
 * Per-type collaborators a factory binds its instances to.
 */
export type DecorationServices = Omit<IDecoratedBinding, 'entry' | 'target'>;

/**
 * DecoratedTypeFactory - creates instances of a decorated type.
 *
 * @template T - Instance type of the base class
 * @template TArgs - Constructor parameters of the base class
 */
export class DecoratedTypeFactory<T extends object, TArgs extends unknown[]> {
  /**
   * The synthesized type. Use it with `instanceof`; create instances with
   * {@link DecoratedTypeFactory.instantiate}.
   */
  readonly decoratedType: abstract new () => object;

  readonly decoratedTypeName: string;

  constructor(
    readonly type: abstract new (...args: TArgs) => T,
    readonly entry: IRegistryEntry,
    services: DecorationServices,
    private readonly logger?: IDecorationLogger,
  ) {
    this.decoratedTypeName = `${entry.typeName}${DECORATED_SUFFIX}`;
    this.decoratedType = this.synthesize(services);
  }

  /**
   * Create a decorated instance.
   *
   * @remarks
   * Errors thrown by the base constructor propagate unchanged.
   */
  instantiate(...args: TArgs): T {
    const instance: unknown = Reflect.construct(this.type, args, this.decoratedType);
    if (!this.isInstance(instance)) {
      throw new TypeError(`${this.entry.typeName} did not construct a ${this.decoratedTypeName}.`);
    }

    DynamicObject.for(instance)?.markReady();
    return instance;
  }

  /**
   * Check if a value is an instance of the decorated type.
   */
  isInstance(value: unknown): value is T {
    return value instanceof this.decoratedType;
  }

  private synthesize(services: DecorationServices): abstract new () => object {
    const decoratedTypeName = this.decoratedTypeName;
    const prototype: unknown = Reflect.get(this.type, 'prototype');
    if (typeof prototype !== 'object' || prototype === null) {
      throw new TypeError(`${this.entry.typeName} has no prototype to decorate.`);
    }

    const target: object = Object.create(prototype);

    const Decorated = class {
      constructor() {
        throw new TypeError(`Use instantiate() to create ${decoratedTypeName} instances.`);
      }
    };

    Object.defineProperty(Decorated, 'name', { value: decoratedTypeName });
    Object.setPrototypeOf(Decorated.prototype, new Proxy(target, new DispatchHandler()));
    Object.setPrototypeOf(Decorated, this.type);

    DynamicObject.register(Decorated.prototype, { ...services, entry: this.entry, target });

    this.logger?.debug(`[decorum] Decorated ${this.entry.typeName} as ${decoratedTypeName}`);

    return Decorated;
  }
}

// ============================================================================
// Entry Points
// ============================================================================

/**
 * Create a decorated variant of a class.
 *
 * @throws RegistrationError if the class's declarations are malformed
 *
 * @example
 * ```typescript
 * const services = new ServiceRegistry().add(Types.Number, 12);
 * const factory = decorate(BeanWithServices, { lookupService: services });
 *
 * factory.instantiate().thing;   // 12
 * ```
 */
export function decorate<T extends object, TArgs extends unknown[]>(
  type: abstract new (...args: TArgs) => T,
  options?: IDecorateOptions,
): DecoratedTypeFactory<T, TArgs> {
  const logger = options?.logger;
  const registry = options?.registry ?? selectRegistry(options);
  const entry = registry.build(type, logger);

  return new DecoratedTypeFactory(
    type,
    entry,
    {
      resolver: new OverloadResolver(),
      injection: new InjectionCache(entry, {
        lookupService: options?.lookupService,
        instanceLookupProperty: options?.instanceLookupProperty ?? 'services',
        logger,
      }),
      protocol: new MissingMemberProtocol(
        entry.typeName,
        getPrototype(type),
        options?.handlers,
      ),
      extensionContainerName: options?.extensionContainerName ?? 'ext',
    },
    logger,
  );
}

/**
 * Dynamic side of a decorated instance.
 *
 * @throws TypeError if the value is not a decorated instance
 *
 * @example
 * ```typescript
 * dynamic(thing).setPropertySetMissingHandler((name, value) => values.push(value));
 * dynamic(thing).setProperty('foo', 'bar');
 * ```
 */
export function dynamic(instance: object): IDynamicObject {
  const dynamicObject = DynamicObject.for(instance);
  if (!dynamicObject) {
    throw new TypeError('Value is not a decorated instance. Create it with decorate().instantiate().');
  }
  return dynamicObject;
}

/**
 * Check if a value is a decorated instance.
 */
export function isDecorated(value: unknown): boolean {
  return DynamicObject.for(value) !== undefined;
}

function selectRegistry(options: IDecorateOptions | undefined): MemberRegistry {
  if (!options?.injectionMarkers && !options?.nonExtensibleMarkers && !options?.reflector) {
    return defaultRegistry;
  }

  return new MemberRegistry({
    injectionMarkers: options.injectionMarkers,
    nonExtensibleMarkers: options.nonExtensibleMarkers,
    reflector: options.reflector,
  });
}

function getPrototype(type: AbstractConstructor): object {
  const prototype: unknown = Reflect.get(type, 'prototype');
  return typeof prototype === 'object' && prototype !== null ? prototype : Object.prototype;
}
