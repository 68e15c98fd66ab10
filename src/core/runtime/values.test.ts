import { describe, it, expect } from 'vitest';
import { combine, createInteger, createReal, floorDiv, formatReal, jsonInteger } from './values.js';

describe('formatReal', () => {
    it('keeps a fractional part on whole reals', () => {
        expect(formatReal(3)).toBe('3.0');
        expect(formatReal(2.5)).toBe('2.5');
        expect(formatReal(-4)).toBe('-4.0');
    });

    it('expands exponent notation into positional digits', () => {
        expect(formatReal(1e-7)).toBe('0.0000001');
        expect(formatReal(-1.25e-7)).toBe('-0.000000125');
        expect(formatReal(1e21)).toBe('1' + '0'.repeat(21) + '.0');
        expect(formatReal(1.5e22)).toBe('15' + '0'.repeat(21) + '.0');
    });
});

describe('integer helpers', () => {
    it('floors integer division toward negative infinity', () => {
        expect(floorDiv(7n, 2n)).toBe(3n);
        expect(floorDiv(-7n, 2n)).toBe(-4n);
        expect(floorDiv(7n, -2n)).toBe(-4n);
        expect(floorDiv(-8n, -2n)).toBe(4n);
        expect(floorDiv(-6n, 2n)).toBe(-3n);
    });

    it('stays integer only when both operands are', () => {
        const add = (a: bigint, b: bigint) => a + b;
        const addReal = (a: number, b: number) => a + b;
        expect(combine(createInteger(2n), createInteger(3n), add, addReal)).toEqual({ kind: 'integer', value: 5n });
        expect(combine(createInteger(2n), createReal(0.5), add, addReal)).toEqual({ kind: 'real', value: 2.5 });
    });

    it('writes JSON-unsafe integers as strings', () => {
        expect(jsonInteger(42n)).toBe(42);
        expect(jsonInteger(-9007199254740991n)).toBe(-9007199254740991);
        expect(jsonInteger(9007199254740993n)).toBe('9007199254740993');
    });
});
