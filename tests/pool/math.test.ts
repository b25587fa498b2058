import { describe, it, expect } from 'vitest';
import { sqrt, quote, getAmountOut, getAmountIn, scaledPrice, PRICE_SCALE } from '../../src/pool/math.js';
import { AmmError } from '../../src/pool/errors.js';

function codeOf(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (error) {
        return error instanceof AmmError ? error.code : 'not-an-amm-error';
    }
    return undefined;
}

describe('sqrt', () => {
    it('floors non-square values', () => {
        expect(sqrt(0n)).toBe(0n);
        expect(sqrt(1n)).toBe(1n);
        expect(sqrt(2n)).toBe(1n);
        expect(sqrt(15n)).toBe(3n);
        expect(sqrt(16n)).toBe(4n);
    });
    it('sizes the first deposit of 1000 x 4000', () => {
        expect(sqrt(1000n * 4000n)).toBe(2000n);
    });
    it('handles values beyond 2^128', () => {
        const root = 2n ** 70n + 12345n;
        expect(sqrt(root * root)).toBe(root);
        expect(sqrt(root * root - 1n)).toBe(root - 1n);
    });
    it('rejects negative input', () => {
        expect(() => sqrt(-1n)).toThrow('Square root of negative number');
    });
});

describe('getAmountOut', () => {
    it('applies the 0.3% fee and floors', () => {
        // 100*997*4000 / (1000*1000 + 100*997) = 398800000 / 1099700
        expect(getAmountOut(100n, 1000n, 4000n)).toBe(362n);
    });
    it('returns 0 for a zero input', () => {
        expect(getAmountOut(0n, 1000n, 4000n)).toBe(0n);
    });
    it('stays below the output reserve for huge inputs', () => {
        expect(getAmountOut(10n ** 30n, 1000n, 4000n)).toBe(3999n);
    });
    it('rejects empty reserves', () => {
        expect(codeOf(() => getAmountOut(10n, 0n, 4000n))).toBe('EmptyReserves');
        expect(codeOf(() => getAmountOut(10n, 1000n, 0n))).toBe('EmptyReserves');
    });
    it('rejects negative input', () => {
        expect(codeOf(() => getAmountOut(-1n, 1000n, 4000n))).toBe('InsufficientAmount');
    });
});

describe('getAmountIn', () => {
    it('rounds the required input up', () => {
        // 1000*362*1000 / (3638*997) = 99.8..., floored to 99, plus 1
        expect(getAmountIn(362n, 1000n, 4000n)).toBe(100n);
    });
    it('inverts getAmountOut', () => {
        const amountIn = getAmountIn(500n, 1000n, 4000n);
        expect(getAmountOut(amountIn, 1000n, 4000n)).toBeGreaterThanOrEqual(500n);
        expect(getAmountOut(amountIn - 1n, 1000n, 4000n)).toBeLessThan(500n);
    });
    it('rejects draining the whole output reserve', () => {
        expect(codeOf(() => getAmountIn(4000n, 1000n, 4000n))).toBe('InsufficientLiquidity');
    });
    it('rejects a zero output', () => {
        expect(codeOf(() => getAmountIn(0n, 1000n, 4000n))).toBe('InsufficientOutputAmount');
    });
});

describe('quote', () => {
    it('scales by the reserve ratio without a fee', () => {
        expect(quote(100n, 1000n, 4000n)).toBe(400n);
        expect(quote(3n, 4000n, 1000n)).toBe(0n);
    });
    it('rejects zero amounts and empty reserves', () => {
        expect(codeOf(() => quote(0n, 1000n, 4000n))).toBe('InsufficientAmount');
        expect(codeOf(() => quote(1n, 0n, 4000n))).toBe('EmptyReserves');
    });
});

describe('scaledPrice', () => {
    it('expresses the other reserve per base unit at 1e18', () => {
        expect(scaledPrice(1000n, 4000n)).toBe(4n * PRICE_SCALE);
        expect(scaledPrice(4000n, 1000n)).toBe(PRICE_SCALE / 4n);
    });
    it('fails with EmptyPool on a zero base reserve', () => {
        expect(codeOf(() => scaledPrice(0n, 4000n))).toBe('EmptyPool');
    });
});
