/**
 * @fileoverview Callback Coercion Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';

import { Types } from '../../../src/domain';
import {
  CallbackWrapper,
  coerce,
  isCallbackWrapper,
  translateReturn,
} from '../../../src/infrastructure/dispatch';
import { TestEnum, TestEnumType } from '../../fixtures/decorated-types';

const Action = Types.capability('Action', 'execute');
const Namer = Types.capability('Namer', 'name', Types.String);

function invoke(wrapper: object, name: string, args: unknown[]): unknown {
  const fn: unknown = Reflect.get(wrapper, name);
  if (typeof fn !== 'function') {
    throw new TypeError(`${name} is not a function`);
  }
  return Reflect.apply(fn, wrapper, args);
}

describe('Callback Coercion', () => {
  // ============================================================================
  // Wrapping
  // ============================================================================

  describe('coerce()', () => {
    it('should expose the function as the capability method', () => {
      const callback = vi.fn();
      const wrapper = coerce(Action, callback);

      invoke(wrapper, 'execute', ['subject', 2]);

      expect(callback).toHaveBeenCalledWith('subject', 2);
    });

    it('should make the capability method enumerable', () => {
      expect(Object.keys(coerce(Action, vi.fn()))).toEqual(['capability', 'callable', 'execute']);
    });

    it('should keep the wrapped function', () => {
      const callback = vi.fn();
      const wrapper = coerce(Action, callback);

      expect(wrapper.callable).toBe(callback);
      expect(wrapper.capability).toBe(Action);
      expect(isCallbackWrapper(wrapper)).toBe(true);
      expect(isCallbackWrapper(callback)).toBe(false);
    });

    it('should discard the result for a void capability', () => {
      const wrapper = new CallbackWrapper(Action, () => 'ignored');

      expect(invoke(wrapper, 'execute', [])).toBeUndefined();
    });

    it('should translate the result to the declared return type', () => {
      const wrapper = coerce(Namer, () => 42);

      expect(invoke(wrapper, 'name', [])).toBe('42');
    });

    it('should let errors thrown by the function through unchanged', () => {
      const failure = new Error('callback failed');
      const wrapper = coerce(Action, () => {
        throw failure;
      });

      expect(() => invoke(wrapper, 'execute', [])).toThrow(failure);
    });
  });

  // ============================================================================
  // Return Translation
  // ============================================================================

  describe('translateReturn()', () => {
    it('should convert to strings and booleans', () => {
      expect(translateReturn(Types.String, 7)).toBe('7');
      expect(translateReturn(Types.Boolean, 'yes')).toBe(true);
      expect(translateReturn(Types.Boolean, 0)).toBe(false);
    });

    it('should truncate integers', () => {
      expect(translateReturn(Types.Integer, 2.9)).toBe(2);
      expect(translateReturn(Types.Integer, '-3.5')).toBe(-3);
    });

    it('should convert numeric strings to numbers', () => {
      expect(translateReturn(Types.Number, '1.25')).toBe(1.25);
    });

    it('should leave results that are not numeric unchanged', () => {
      expect(translateReturn(Types.Integer, 'abc')).toBe('abc');
      expect(translateReturn(Types.Number, 'abc')).toBe('abc');
    });

    it('should keep bigint results exact', () => {
      expect(translateReturn(Types.Integer, 9007199254740993n)).toBe(9007199254740993n);
      expect(translateReturn(Types.Number, 5n)).toBe(5n);
    });

    it('should map enum member names to values', () => {
      expect(translateReturn(TestEnumType, 'def')).toBe(TestEnum.DEF);
      expect(translateReturn(TestEnumType, 'GHI')).toBe('GHI');
    });

    it('should pass nullish results through', () => {
      expect(translateReturn(Types.String, null)).toBeNull();
      expect(translateReturn(Types.Integer, undefined)).toBeUndefined();
    });

    it('should return other values unchanged', () => {
      const value = { id: 1 };

      expect(translateReturn(Types.Object, value)).toBe(value);
    });
  });
});
