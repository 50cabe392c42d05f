/**
 * @fileoverview MemberRegistry Unit Tests
 *
 * Tests for building registry entries from member declarations.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';

import {
  Inject,
  RegistrationError,
  Types,
  createMarker,
  getter,
  method,
  property,
  setter,
} from '../../../src/domain';
import { MemberRegistry } from '../../../src/infrastructure/reflection';
import {
  ActionsTester,
  BeanWithMutableServices,
  CustomInject,
  NonExtensibleObject,
} from '../../fixtures/decorated-types';

// ============================================================================
// Test Fixtures
// ============================================================================

class Base {
  static members = [
    method('greet', [Types.String]),
    method('greet', [Types.Integer], { implementation: 'greetNumber' }),
  ];

  greet(name: string): string {
    return `base ${name}`;
  }

  protected greetNumber(id: number): string {
    return `base #${id}`;
  }
}

class Derived extends Base {
  static override members = [
    method('greet', [Types.String], { implementation: 'greetLoudly' }),
    method('wave', []),
  ];

  wave(): string {
    return 'wave';
  }

  protected greetLoudly(name: string): string {
    return `DERIVED ${name}`;
  }
}

class Silent extends Derived {}

describe('MemberRegistry', () => {
  // ============================================================================
  // Building Entries
  // ============================================================================

  describe('build()', () => {
    it('should group overloads by name in declaration order', () => {
      const entry = new MemberRegistry().build(ActionsTester);

      const overloads = entry.methods.get('overloaded') ?? [];
      expect(overloads.map((overload) => overload.implementation)).toEqual([
        'overloadedInteger',
        'overloadedString',
        'overloadedObject',
      ]);
      expect(overloads.map((overload) => overload.order)).toEqual([3, 4, 5]);
    });

    it('should name the entry after the class', () => {
      const entry = new MemberRegistry().build(ActionsTester);

      expect(entry.typeName).toBe('ActionsTester');
      expect(entry.type).toBe(ActionsTester);
      expect(entry.extensible).toBe(true);
    });

    it('should cache entries per type', () => {
      const registry = new MemberRegistry();

      expect(registry.has(Base)).toBe(false);
      const first = registry.build(Base);

      expect(registry.build(Base)).toBe(first);
      expect(registry.has(Base)).toBe(true);
    });

    it('should log one debug line per built entry', () => {
      const logger = { debug: vi.fn() };
      const registry = new MemberRegistry({ logger });

      registry.build(Base);
      registry.build(Base);

      expect(logger.debug).toHaveBeenCalledTimes(1);
      expect(logger.debug).toHaveBeenCalledWith(
        '[decorum] Registered Base: 1 method group(s), 0 propert(ies), 0 injection point(s)',
      );
    });

    it('should mark types carrying a non-extensible marker', () => {
      expect(new MemberRegistry().build(NonExtensibleObject).extensible).toBe(false);
    });

    it('should honour custom non-extensible markers', () => {
      const Sealed = createMarker('Sealed');
      class Closed {
        static markers = [Sealed];
      }

      expect(new MemberRegistry().build(Closed).extensible).toBe(true);
      expect(new MemberRegistry({ nonExtensibleMarkers: [Sealed] }).build(Closed).extensible).toBe(
        false,
      );
    });
  });

  // ============================================================================
  // Inheritance
  // ============================================================================

  describe('inheritance', () => {
    it('should replace an inherited signature and keep its position', () => {
      const entry = new MemberRegistry().build(Derived);

      const greet = entry.methods.get('greet') ?? [];
      expect(greet).toHaveLength(2);
      expect(greet[0]?.implementation).toBe('greetLoudly');
      expect(greet[0]?.declaringType).toBe(Derived);
      expect(greet[0]?.order).toBe(0);
      expect(greet[1]?.implementation).toBe('greetNumber');
    });

    it('should inherit declarations of base classes without tables', () => {
      const entry = new MemberRegistry().build(Silent);

      expect(entry.typeName).toBe('Silent');
      expect([...entry.methods.keys()]).toEqual(['greet', 'wave']);
    });

    it('should pair an inherited injection getter with a subclass setter', () => {
      const entry = new MemberRegistry().build(BeanWithMutableServices);

      const point = entry.injectionPoints.get('thing');
      expect(point?.key).toBe(Types.Number);
      expect(point?.marker).toBe(Inject);
      expect(point?.setter?.type).toBe(Types.Number);
    });
  });

  // ============================================================================
  // Injection Points
  // ============================================================================

  describe('injection points', () => {
    it('should use the explicit key over the declared type', () => {
      const ClockKey = Symbol('Clock');
      class Timed {
        static members = [getter('clock', Types.Object, { markers: [Inject], key: ClockKey })];
      }

      expect(new MemberRegistry().build(Timed).injectionPoints.get('clock')?.key).toBe(ClockKey);
    });

    it('should only recognise the configured markers', () => {
      class Custom {
        static members = [getter('thing', Types.Number, { markers: [CustomInject] })];
      }

      const byDefault = new MemberRegistry().build(Custom);
      const custom = new MemberRegistry({ injectionMarkers: [CustomInject] }).build(Custom);

      expect(byDefault.injectionPoints.size).toBe(0);
      expect(byDefault.properties.get('thing')?.getter?.type).toBe(Types.Number);
      expect(custom.injectionPoints.get('thing')?.marker).toBe(CustomInject);
    });
  });

  // ============================================================================
  // Registration Errors
  // ============================================================================

  describe('registration errors', () => {
    it('should reject more than one injection marker on a member', () => {
      class Doubled {
        static members = [getter('thing', Types.Number, { markers: [Inject, CustomInject] })];
      }
      const registry = new MemberRegistry({ injectionMarkers: [Inject, CustomInject] });

      expect(() => registry.build(Doubled)).toThrow(
        "Cannot register 'Doubled.thing': more than one injection marker (Inject, CustomInject)",
      );
    });

    it('should reject an injection marker on a method', () => {
      class Misplaced {
        static members = [method('run', [], { markers: [Inject] })];

        run(): void {}
      }

      expect(() => new MemberRegistry().build(Misplaced)).toThrow(
        "Cannot register 'Misplaced.run': injection marker 'Inject' is only allowed on getters, not on a method",
      );
    });

    it('should reject an injection marker on a field', () => {
      class Misplaced {
        static members = [property('thing', Types.Number, { markers: [Inject] })];
      }

      expect(() => new MemberRegistry().build(Misplaced)).toThrow(RegistrationError);
    });

    it('should reject a missing implementation', () => {
      class Hollow {
        static members = [method('run', [Types.String], { implementation: 'doRun' })];
      }

      let error: unknown;
      try {
        new MemberRegistry().build(Hollow);
      } catch (caught) {
        error = caught;
      }

      expect(error).toBeInstanceOf(RegistrationError);
      expect(error).toMatchObject({
        typeName: 'Hollow',
        memberName: 'run',
        reason: "implementation 'doRun' is not a function on the prototype",
      });
    });

    it('should accept a missing implementation declared abstract', () => {
      abstract class Shape {
        static members = [method('area', [], { abstract: true })];
      }

      expect(new MemberRegistry().build(Shape).methods.get('area')).toHaveLength(1);
    });

    it('should reject the same signature declared twice by one class', () => {
      class Twice {
        static members = [method('run', [Types.String]), method('run', [Types.String])];

        run(): void {}
      }

      expect(() => new MemberRegistry().build(Twice)).toThrow(
        "Cannot register 'Twice.run': signature run(String) is declared twice by Twice",
      );
    });

    it('should reject a field sharing its name with an injection point', () => {
      class Clash {
        static members = [
          getter('thing', Types.Number, { markers: [Inject] }),
          property('thing', Types.Number),
        ];
      }

      expect(() => new MemberRegistry().build(Clash)).toThrow(
        "Cannot register 'Clash.thing': a field cannot share its name with the injection point",
      );
    });

    it('should reject an injection setter that does not accept the getter type', () => {
      class Narrow {
        static members = [
          getter('thing', Types.Number, { markers: [Inject] }),
          setter('thing', Types.Integer),
        ];
      }

      expect(() => new MemberRegistry().build(Narrow)).toThrow(
        "Cannot register 'Narrow.thing': setter type 'Integer' does not accept getter type 'Number'",
      );
    });

    it('should reject a members table that is not an array', () => {
      class Broken {
        static members = 'greet';
      }

      expect(() => new MemberRegistry().build(Broken)).toThrow(
        "Cannot register type 'Broken': Broken.members must be an array",
      );
    });
  });
});
