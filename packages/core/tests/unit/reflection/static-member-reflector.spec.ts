/**
 * @fileoverview StaticMemberReflector Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import {
  type MemberDeclaration,
  NonExtensible,
  RegistrationError,
  Types,
  createMarker,
  method,
  property,
} from '../../../src/domain';
import { StaticMemberReflector, getConstructorChain } from '../../../src/infrastructure/reflection';

// ============================================================================
// Test Fixtures
// ============================================================================

const Audited = createMarker('Audited');

class Root {
  static markers = [Audited];
  static members: readonly MemberDeclaration[] = [property('id', Types.Integer)];
}

class Middle extends Root {}

class Leaf extends Middle {
  static override markers = [NonExtensible];
  static override members: readonly MemberDeclaration[] = [
    method('run', []),
    property('label', Types.String),
  ];

  run(): void {}
}

describe('StaticMemberReflector', () => {
  const reflector = new StaticMemberReflector();

  it('should list constructors from the root class down', () => {
    expect(getConstructorChain(Leaf)).toEqual([Root, Middle, Leaf]);
  });

  it('should read declarations base class first', () => {
    const reflected = reflector.reflect(Leaf);

    expect(reflected.members.map((member) => member.declaration.name)).toEqual([
      'id',
      'run',
      'label',
    ]);
    expect(reflected.members.map((member) => member.declaringType)).toEqual([Root, Leaf, Leaf]);
  });

  it('should not report inherited tables twice', () => {
    expect(reflector.reflect(Middle).members).toHaveLength(1);
  });

  it('should collect markers along the chain', () => {
    expect(reflector.reflect(Leaf).markers).toEqual([Audited, NonExtensible]);
  });

  it('should expose the prototype', () => {
    expect(reflector.reflect(Leaf).prototype).toBe(Leaf.prototype);
  });

  it('should reject entries that are not declarations', () => {
    class Loose {
      static members = [{ kind: 'method', name: 'run' }];
    }

    expect(() => reflector.reflect(Loose)).toThrow(
      "Cannot register type 'Loose': entry 0 of Loose.members is not a member declaration",
    );
  });

  it('should reject markers that are not markers', () => {
    class Loose {
      static markers = ['NonExtensible'];
    }

    expect(() => reflector.reflect(Loose)).toThrow(RegistrationError);
  });
});
