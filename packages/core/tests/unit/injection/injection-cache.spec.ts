/**
 * @fileoverview InjectionCache Unit Tests
 *
 * Tests for lazy, cached resolution of injection points.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';

import {
  type IInjectionPoint,
  type IRegistryEntry,
  CircularInjectionError,
  ReadOnlyPropertyError,
  Types,
  UnresolvedDependencyError,
} from '../../../src/domain';
import { InjectionCache, ServiceRegistry } from '../../../src/infrastructure/injection';
import { MemberRegistry } from '../../../src/infrastructure/reflection';
import { BeanWithMutableServices, BeanWithServices } from '../../fixtures/decorated-types';

// ============================================================================
// Test Fixtures
// ============================================================================

const registry = new MemberRegistry();

function thingOf(entry: IRegistryEntry): IInjectionPoint {
  const point = entry.injectionPoints.get('thing');
  if (!point) {
    throw new Error(`${entry.typeName} has no 'thing' injection point`);
  }
  return point;
}

describe('InjectionCache', () => {
  const readOnly = registry.build(BeanWithServices);
  const mutable = registry.build(BeanWithMutableServices);

  // ============================================================================
  // Lazy Resolution
  // ============================================================================

  describe('getInjected()', () => {
    it('should query the lookup service once per instance', () => {
      const lookup = { get: vi.fn(() => 12) };
      const cache = new InjectionCache(readOnly, { lookupService: lookup });
      const instance = {};

      expect(cache.getInjected(instance, thingOf(readOnly))).toBe(12);
      expect(cache.getInjected(instance, thingOf(readOnly))).toBe(12);

      expect(lookup.get).toHaveBeenCalledTimes(1);
      expect(lookup.get).toHaveBeenCalledWith(Types.Number);
    });

    it('should keep separate slots per instance', () => {
      const lookup = { get: vi.fn(() => 12) };
      const cache = new InjectionCache(readOnly, { lookupService: lookup });

      cache.getInjected({}, thingOf(readOnly));
      cache.getInjected({}, thingOf(readOnly));

      expect(lookup.get).toHaveBeenCalledTimes(2);
    });

    it('should not query before the first read', () => {
      const lookup = { get: vi.fn(() => 12) };
      const cache = new InjectionCache(readOnly, { lookupService: lookup });

      expect(cache.getState({}, thingOf(readOnly))).toBe('unresolved');
      expect(lookup.get).not.toHaveBeenCalled();
    });

    it('should fail without a lookup service', () => {
      const cache = new InjectionCache(readOnly);

      expect(() => cache.getInjected({}, thingOf(readOnly))).toThrow(
        "Cannot inject 'BeanWithServices.thing': no service for key 'Number' (no lookup service).",
      );
    });

    it('should stay unresolved when nothing is found', () => {
      const services = new ServiceRegistry();
      const cache = new InjectionCache(readOnly, { lookupService: services });
      const instance = {};

      expect(() => cache.getInjected(instance, thingOf(readOnly))).toThrow(
        UnresolvedDependencyError,
      );
      expect(cache.getState(instance, thingOf(readOnly))).toBe('unresolved');

      services.add(Types.Number, 3);

      expect(cache.getInjected(instance, thingOf(readOnly))).toBe(3);
      expect(cache.getState(instance, thingOf(readOnly))).toBe('resolved');
    });

    it('should rethrow lookup errors unchanged and allow a retry', () => {
      const failure = new Error('lookup unavailable');
      const lookup = {
        get: vi
          .fn()
          .mockImplementationOnce(() => {
            throw failure;
          })
          .mockReturnValue(12),
      };
      const cache = new InjectionCache(readOnly, { lookupService: lookup });
      const instance = {};

      expect(() => cache.getInjected(instance, thingOf(readOnly))).toThrow(failure);
      expect(cache.getState(instance, thingOf(readOnly))).toBe('unresolved');
      expect(cache.getInjected(instance, thingOf(readOnly))).toBe(12);
      expect(lookup.get).toHaveBeenCalledTimes(2);
    });

    it('should detect a lookup that reads the point it is resolving', () => {
      const instance = {};
      const cache: InjectionCache = new InjectionCache(readOnly, {
        lookupService: { get: () => cache.getInjected(instance, thingOf(readOnly)) },
      });

      expect(() => cache.getInjected(instance, thingOf(readOnly))).toThrow(CircularInjectionError);
      expect(cache.getState(instance, thingOf(readOnly))).toBe('unresolved');
    });

    it('should log resolved injections', () => {
      const logger = { debug: vi.fn() };
      const cache = new InjectionCache(readOnly, {
        lookupService: { get: () => 12 },
        logger,
      });

      cache.getInjected({}, thingOf(readOnly));

      expect(logger.debug).toHaveBeenCalledWith(
        "[decorum] Injected BeanWithServices.thing from 'Number'",
      );
    });
  });

  // ============================================================================
  // Explicit Assignment
  // ============================================================================

  describe('setInjected()', () => {
    it('should win over the lookup service', () => {
      const lookup = { get: vi.fn(() => 12) };
      const cache = new InjectionCache(mutable, { lookupService: lookup });
      const instance = {};

      cache.setInjected(instance, thingOf(mutable), 5);

      expect(cache.getInjected(instance, thingOf(mutable))).toBe(5);
      expect(cache.getState(instance, thingOf(mutable))).toBe('explicit');
      expect(lookup.get).not.toHaveBeenCalled();
    });

    it('should replace a resolved value', () => {
      const cache = new InjectionCache(mutable, { lookupService: { get: () => 12 } });
      const instance = {};

      expect(cache.getInjected(instance, thingOf(mutable))).toBe(12);
      cache.setInjected(instance, thingOf(mutable), 7);

      expect(cache.getInjected(instance, thingOf(mutable))).toBe(7);
    });

    it('should keep a value assigned while the lookup runs', () => {
      const instance = {};
      const cache: InjectionCache = new InjectionCache(mutable, {
        lookupService: {
          get: () => {
            cache.setInjected(instance, thingOf(mutable), 7);
            return 9;
          },
        },
      });

      expect(cache.getInjected(instance, thingOf(mutable))).toBe(7);
      expect(cache.getState(instance, thingOf(mutable))).toBe('explicit');
    });

    it('should reject points without a setter', () => {
      const cache = new InjectionCache(readOnly);

      expect(() => cache.setInjected({}, thingOf(readOnly), 5)).toThrow(ReadOnlyPropertyError);
    });
  });

  // ============================================================================
  // Lookup Selection
  // ============================================================================

  describe('lookupFor()', () => {
    it('should prefer a lookup service held by the instance', () => {
      const own = new ServiceRegistry().add(Types.Number, 1);
      const cache = new InjectionCache(readOnly, {
        lookupService: new ServiceRegistry().add(Types.Number, 2),
      });
      const instance = { services: own };

      expect(cache.lookupFor(instance)).toBe(own);
      expect(cache.getInjected(instance, thingOf(readOnly))).toBe(1);
    });

    it('should ignore an instance property that is not a lookup service', () => {
      const fallback = new ServiceRegistry();
      const cache = new InjectionCache(readOnly, { lookupService: fallback });

      expect(cache.lookupFor({ services: ['not', 'a', 'lookup'] })).toBe(fallback);
    });

    it('should read the configured instance property', () => {
      const own = new ServiceRegistry();
      const cache = new InjectionCache(readOnly, { instanceLookupProperty: 'container' });

      expect(cache.lookupFor({ container: own })).toBe(own);
      expect(cache.lookupFor({ services: own })).toBeUndefined();
    });
  });
});
