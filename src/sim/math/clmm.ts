/**
 * Concentrated Liquidity AMM Math
 *
 * Orca Whirlpool / Raydium CLMM, Q64 fixed-point math (sqrtPriceX64).
 * Swaps run inside the current range only: a swap that would drain more
 * than the pool's vault balance on the output side returns zero, since the
 * snapshot carries no tick arrays to cross into the next range.
 *
 * Key formulas:
 * - Δx = L * (1/√P_lower - 1/√P_upper)
 * - Δy = L * (√P_upper - √P_lower)
 */

import type { ConcentratedLiquidityPool } from '../../types.js';
import { FeeMode } from '../../types.js';
import { applyFee, assertU128, assertU64, shiftReserves, type CurveSwap } from './fees.js';

export const Q64 = 2n ** 64n;

/**
 * Token0 amount between two sqrt prices
 * Δx = L * (√P_upper - √P_lower) / (√P_upper * √P_lower)
 */
export function getAmount0Delta(
    sqrtPriceLowerX64: bigint,
    sqrtPriceUpperX64: bigint,
    liquidity: bigint,
    roundUp: boolean
): bigint {
    if (sqrtPriceLowerX64 > sqrtPriceUpperX64) {
        [sqrtPriceLowerX64, sqrtPriceUpperX64] = [sqrtPriceUpperX64, sqrtPriceLowerX64];
    }

    const numerator = liquidity * (sqrtPriceUpperX64 - sqrtPriceLowerX64);
    const denominator = sqrtPriceLowerX64 * sqrtPriceUpperX64;

    if (roundUp) {
        return (numerator * Q64 + denominator - 1n) / denominator;
    } else {
        return (numerator * Q64) / denominator;
    }
}

/**
 * Token1 amount between two sqrt prices
 * Δy = L * (√P_upper - √P_lower)
 */
export function getAmount1Delta(
    sqrtPriceLowerX64: bigint,
    sqrtPriceUpperX64: bigint,
    liquidity: bigint,
    roundUp: boolean
): bigint {
    if (sqrtPriceLowerX64 > sqrtPriceUpperX64) {
        [sqrtPriceLowerX64, sqrtPriceUpperX64] = [sqrtPriceUpperX64, sqrtPriceLowerX64];
    }

    const diff = sqrtPriceUpperX64 - sqrtPriceLowerX64;

    if (roundUp) {
        return (liquidity * diff + Q64 - 1n) / Q64;
    } else {
        return (liquidity * diff) / Q64;
    }
}

/**
 * Sqrt price after adding amountIn of the input token
 */
export function getNextSqrtPriceFromInput(
    sqrtPriceX64: bigint,
    liquidity: bigint,
    amountIn: bigint,
    zeroForOne: boolean
): bigint {
    if (zeroForOne) {
        // Selling token0: price decreases
        // sqrtPrice_new = sqrtPrice * L / (L + Δx * sqrtPrice / 2^64)
        const product = amountIn * sqrtPriceX64;
        const denominator = (liquidity << 64n) + product;
        return (sqrtPriceX64 * (liquidity << 64n)) / denominator;
    } else {
        // Selling token1: price increases
        // sqrtPrice_new = sqrtPrice + Δy * 2^64 / L
        return sqrtPriceX64 + (amountIn << 64n) / liquidity;
    }
}

export function swapConcentrated(
    pool: ConcentratedLiquidityPool,
    iIn: number,
    iOut: number,
    amountIn: bigint
): CurveSwap<ConcentratedLiquidityPool> {
    assertU64(amountIn, 'amountIn', pool.id);
    assertU128(pool.sqrtPriceX64, 'sqrtPriceX64', pool.id);
    assertU128(pool.liquidity, 'liquidity', pool.id);

    const reserveOut = pool.reserves[iOut] ?? 0n;
    if (
        amountIn <= 0n ||
        pool.liquidity <= 0n ||
        pool.sqrtPriceX64 <= 0n ||
        (pool.reserves[iIn] ?? 0n) <= 0n ||
        reserveOut <= 0n
    ) {
        return { amountOut: 0n, pool };
    }

    const zeroForOne = iIn === 0;
    const net = pool.feeMode === FeeMode.Input ? applyFee(amountIn, pool.feeBps) : amountIn;
    if (net <= 0n) {
        return { amountOut: 0n, pool };
    }

    const nextSqrtPriceX64 = getNextSqrtPriceFromInput(pool.sqrtPriceX64, pool.liquidity, net, zeroForOne);
    assertU128(nextSqrtPriceX64, 'sqrtPriceX64', pool.id);
    if (nextSqrtPriceX64 <= 0n) {
        return { amountOut: 0n, pool };
    }

    const gross = zeroForOne
        ? getAmount1Delta(nextSqrtPriceX64, pool.sqrtPriceX64, pool.liquidity, false)
        : getAmount0Delta(pool.sqrtPriceX64, nextSqrtPriceX64, pool.liquidity, false);
    const amountOut = pool.feeMode === FeeMode.Output ? applyFee(gross, pool.feeBps) : gross;

    // Range exhausted: crossing into the next range is not modelled
    if (amountOut <= 0n || amountOut > reserveOut) {
        return { amountOut: 0n, pool };
    }

    return {
        amountOut,
        pool: {
            ...pool,
            sqrtPriceX64: nextSqrtPriceX64,
            reserves: shiftReserves(pool.reserves, iIn, iOut, net, amountOut, pool.id),
        },
    };
}
