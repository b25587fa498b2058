/**
 * Constant-product pricing math
 *
 * Formula: x * y = k
 * Fee: 0.3%, applied by scaling the input by 997/1000. The fee stays in the
 * pool, so k grows on every swap.
 *
 * All values are integer base units; every division floors.
 */

import { AmmError } from './errors.js';

export const FEE_MULTIPLIER = 997n;
export const FEE_DENOMINATOR = 1000n;

// Fixed-point scale for prices: 1.0 == PRICE_SCALE
export const PRICE_SCALE = 10n ** 18n;

/**
 * Integer square root, floored (Babylonian iteration)
 */
export function sqrt(value: bigint): bigint {
    if (value < 0n) throw new Error('Square root of negative number');
    if (value === 0n) return 0n;

    let x = value;
    let y = (x + 1n) / 2n;
    while (y < x) {
        x = y;
        y = (x + value / x) / 2n;
    }
    return x;
}

export function min(a: bigint, b: bigint): bigint {
    return a < b ? a : b;
}

/**
 * Amount of B worth `amountA` at the current reserve ratio (no fee)
 */
export function quote(amountA: bigint, reserveA: bigint, reserveB: bigint): bigint {
    if (amountA <= 0n) throw new AmmError('InsufficientAmount');
    if (reserveA <= 0n || reserveB <= 0n) throw new AmmError('EmptyReserves');
    return (amountA * reserveB) / reserveA;
}

/**
 * Exact-input swap output.
 * Always strictly below reserveOut for positive reserves.
 */
export function getAmountOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
    if (amountIn < 0n) throw new AmmError('InsufficientAmount');
    if (reserveIn <= 0n || reserveOut <= 0n) throw new AmmError('EmptyReserves');

    const amountInWithFee = amountIn * FEE_MULTIPLIER;
    const numerator = amountInWithFee * reserveOut;
    const denominator = reserveIn * FEE_DENOMINATOR + amountInWithFee;
    return numerator / denominator;
}

/**
 * Exact-output swap input, rounded up so the pool never loses on rounding
 */
export function getAmountIn(amountOut: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
    if (amountOut <= 0n) throw new AmmError('InsufficientOutputAmount');
    if (reserveIn <= 0n || reserveOut <= 0n) throw new AmmError('EmptyReserves');
    if (amountOut >= reserveOut) throw new AmmError('InsufficientLiquidity');

    const numerator = reserveIn * amountOut * FEE_DENOMINATOR;
    const denominator = (reserveOut - amountOut) * FEE_MULTIPLIER;
    return numerator / denominator + 1n;
}

/**
 * Price of `reserveBase`'s asset in units of the other, scaled by PRICE_SCALE
 */
export function scaledPrice(reserveBase: bigint, reserveOther: bigint): bigint {
    if (reserveBase === 0n) throw new AmmError('EmptyPool');
    return (reserveOther * PRICE_SCALE) / reserveBase;
}
