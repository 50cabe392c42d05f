/**
 * @fileoverview MissingMemberProtocol Unit Tests
 *
 * Tests for the lookup order of missing-member handlers.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';

import {
  type IMissingMemberHandlers,
  UnknownMethodError,
  UnknownPropertyError,
} from '../../../src/domain';
import { MissingMemberProtocol } from '../../../src/infrastructure/dynamic';

// ============================================================================
// Test Fixtures
// ============================================================================

class Recorder {
  readonly calls: string[] = [];

  methodMissing(name: string, args: readonly unknown[]): unknown {
    this.calls.push(`method ${name}/${args.length}`);
    return 'from type';
  }

  propertyMissing(name: string): unknown {
    this.calls.push(`get ${name}`);
    return 'from type';
  }

  propertyMissingSet(name: string, value: unknown): void {
    this.calls.push(`set ${name}=${String(value)}`);
  }
}

class Bare {}

describe('MissingMemberProtocol', () => {
  // ============================================================================
  // Lookup Order
  // ============================================================================

  describe('handler lookup', () => {
    it('should prefer the instance slot', () => {
      const protocol = new MissingMemberProtocol('Recorder', Recorder.prototype, {
        methodMissing: () => 'from factory',
      });
      const receiver = new Recorder();
      const slots: IMissingMemberHandlers = { methodMissing: () => 'from slot' };

      expect(protocol.invokeMethodMissing(receiver, slots, 'm1', [])).toBe('from slot');
      expect(receiver.calls).toEqual([]);
    });

    it('should call the type handler with the receiver as this', () => {
      const protocol = new MissingMemberProtocol('Recorder', Recorder.prototype);
      const receiver = new Recorder();

      expect(protocol.invokeMethodMissing(receiver, {}, 'm1', [1, 2])).toBe('from type');
      expect(protocol.getMissingProperty(receiver, {}, 'foo')).toBe('from type');
      protocol.setMissingProperty(receiver, {}, 'foo', 'bar');

      expect(receiver.calls).toEqual(['method m1/2', 'get foo', 'set foo=bar']);
    });

    it('should fall back to the factory handlers', () => {
      const propertyMissing = vi.fn(() => 'from factory');
      const protocol = new MissingMemberProtocol('Bare', Bare.prototype, { propertyMissing });

      expect(protocol.getMissingProperty({}, {}, 'foo')).toBe('from factory');
      expect(propertyMissing).toHaveBeenCalledWith('foo');
    });

    it('should keep the three handlers independent', () => {
      const protocol = new MissingMemberProtocol('Bare', Bare.prototype, {
        methodMissing: () => 'handled',
      });

      expect(protocol.findMethodMissing({}, {})).toBeDefined();
      expect(protocol.findPropertyMissing({}, {})).toBeUndefined();
      expect(protocol.findPropertyMissingSet({}, {})).toBeUndefined();
    });
  });

  // ============================================================================
  // No Handler
  // ============================================================================

  describe('without handlers', () => {
    const protocol = new MissingMemberProtocol('Bare', Bare.prototype);

    it('should report unknown methods with their argument types', () => {
      let error: unknown;
      try {
        protocol.invokeMethodMissing({}, {}, 'm1', [1, 'a']);
      } catch (caught) {
        error = caught;
      }

      expect(error).toBeInstanceOf(UnknownMethodError);
      expect(error).toMatchObject({
        message: 'Could not find method m1() for arguments [Integer, String] on object of type Bare.',
        arity: 2,
        argumentTypes: ['Integer', 'String'],
      });
    });

    it('should report unknown property reads', () => {
      expect(() => protocol.getMissingProperty({}, {}, 'foo')).toThrow(
        "Could not get unknown property 'foo' for object of type Bare.",
      );
    });

    it('should report unknown property writes', () => {
      let error: unknown;
      try {
        protocol.setMissingProperty({}, {}, 'foo', 1);
      } catch (caught) {
        error = caught;
      }

      expect(error).toBeInstanceOf(UnknownPropertyError);
      expect(error).toMatchObject({ access: 'set', propertyName: 'foo' });
    });
  });

  it('should let handler errors through unchanged', () => {
    const failure = new Error('handler failed');
    const protocol = new MissingMemberProtocol('Bare', Bare.prototype, {
      methodMissing: () => {
        throw failure;
      },
    });

    expect(() => protocol.invokeMethodMissing({}, {}, 'm1', [])).toThrow(failure);
  });
});
