import {describe, expect, test} from 'vitest';
import {RegisterArray} from './register-array.ts';

describe('RegisterArray', () => {
  test('starts with every register at 0', () => {
    const registers = new RegisterArray(16, 61);
    expect(registers.length).toBe(16);
    expect(Array.from(registers.toUint8Array())).toEqual(new Array(16).fill(0));
  });

  test('get rejects out of range indexes', () => {
    const registers = new RegisterArray(16, 61);
    expect(() => registers.get(-1)).toThrow('Index out of range: -1');
    expect(() => registers.get(16)).toThrow('Index out of range: 16');
  });

  describe('raise', () => {
    test('only increases a register', () => {
      const registers = new RegisterArray(16, 61);
      registers.raise(3, 5);
      expect(registers.get(3)).toBe(5);
      registers.raise(3, 2);
      expect(registers.get(3)).toBe(5);
      registers.raise(3, 5);
      expect(registers.get(3)).toBe(5);
      registers.raise(3, 7);
      expect(registers.get(3)).toBe(7);
    });

    test('leaves other registers untouched', () => {
      const registers = new RegisterArray(4, 61);
      registers.raise(1, 9);
      expect(Array.from(registers.toUint8Array())).toEqual([0, 9, 0, 0]);
    });

    test('caps ranks at maxRank', () => {
      const registers = new RegisterArray(4, 47);
      registers.raise(0, 48);
      expect(registers.get(0)).toBe(47);
    });
  });

  describe('pointwiseMax', () => {
    test('takes the larger rank at every index', () => {
      const a = RegisterArray.from([0, 4, 2, 9], 61);
      const b = RegisterArray.from([3, 1, 2, 10], 61);
      const c = a.pointwiseMax(b);
      expect(Array.from(c.toUint8Array())).toEqual([3, 4, 2, 10]);
    });

    test('does not modify its inputs', () => {
      const a = RegisterArray.from([0, 4], 61);
      const b = RegisterArray.from([3, 1], 61);
      a.pointwiseMax(b);
      expect(Array.from(a.toUint8Array())).toEqual([0, 4]);
      expect(Array.from(b.toUint8Array())).toEqual([3, 1]);
    });

    test('rejects arrays of different length', () => {
      const a = new RegisterArray(16, 61);
      const b = new RegisterArray(32, 60);
      expect(() => a.pointwiseMax(b)).toThrow(
        'Cannot combine register arrays of different length: 16 !== 32',
      );
    });
  });

  test('from rejects ranks above maxRank', () => {
    expect(() => RegisterArray.from([0, 62], 61)).toThrow(
      'Register 1 holds 62, expected 0..61',
    );
  });

  test('equals compares ranks', () => {
    const a = RegisterArray.from([1, 2, 3], 61);
    expect(a.equals(RegisterArray.from([1, 2, 3], 61))).toBe(true);
    expect(a.equals(RegisterArray.from([1, 2, 4], 61))).toBe(false);
    expect(a.equals(RegisterArray.from([1, 2], 61))).toBe(false);
  });

  test('toUint8Array returns a copy', () => {
    const a = RegisterArray.from([1, 2], 61);
    const copy = a.toUint8Array();
    copy[0] = 50;
    expect(a.get(0)).toBe(1);
  });
});
