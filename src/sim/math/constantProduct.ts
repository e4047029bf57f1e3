/**
 * Constant Product AMM Math
 *
 * x * y = k
 *
 * Used by: Raydium AMM v4, Orca legacy pools, PumpSwap
 *
 * Key formulas:
 * - dy = (y * dx) / (x + dx)  [exact output for input]
 */

import type { ConstantProductPool } from '../../types.js';
import { FeeMode } from '../../types.js';
import { applyFee, assertU64, shiftReserves, type CurveSwap } from './fees.js';
import { NumericOverflowError } from '../../errors.js';

/**
 * Pure constant product: get output amount for input
 * dy = (y * dx) / (x + dx)
 *
 * This does NOT include fees
 */
export function getAmountOutPure(
    amountIn: bigint,
    reserveIn: bigint,
    reserveOut: bigint
): bigint {
    if (amountIn <= 0n || reserveIn <= 0n || reserveOut <= 0n) {
        return 0n;
    }

    const numerator = reserveOut * amountIn;
    const denominator = reserveIn + amountIn;

    return numerator / denominator;
}

/**
 * Simulate a swap tokens[iIn] → tokens[iOut]
 *
 * Flow:
 * 1. input-fee venues deduct the fee, then run the curve
 * 2. output-fee venues run the curve, then deduct the fee
 * 3. the full input is credited, so the fee stays in the pool either way
 */
export function swapConstantProduct(
    pool: ConstantProductPool,
    iIn: number,
    iOut: number,
    amountIn: bigint
): CurveSwap<ConstantProductPool> {
    assertU64(amountIn, 'amountIn', pool.id);

    const reserveIn = pool.reserves[iIn] ?? 0n;
    const reserveOut = pool.reserves[iOut] ?? 0n;

    if (amountIn <= 0n || reserveIn <= 0n || reserveOut <= 0n) {
        return { amountOut: 0n, pool };
    }

    const amountOut =
        pool.feeMode === FeeMode.Input
            ? getAmountOutPure(applyFee(amountIn, pool.feeBps), reserveIn, reserveOut)
            : applyFee(getAmountOutPure(amountIn, reserveIn, reserveOut), pool.feeBps);

    if (amountOut <= 0n) {
        return { amountOut: 0n, pool };
    }

    const reserves = shiftReserves(pool.reserves, iIn, iOut, amountIn, amountOut, pool.id);
    const inAfter = reserves[iIn] ?? 0n;
    const outAfter = reserves[iOut] ?? 0n;
    if (!validateInvariant(reserveIn, reserveOut, inAfter, outAfter)) {
        throw new NumericOverflowError(`invariant decreased: ${reserveIn}*${reserveOut} -> ${inAfter}*${outAfter}`, pool.id);
    }

    return { amountOut, pool: { ...pool, reserves } };
}

/**
 * Validate constant product invariant
 * k = x * y should stay constant (or increase due to fees)
 */
export function validateInvariant(
    reserveInBefore: bigint,
    reserveOutBefore: bigint,
    reserveInAfter: bigint,
    reserveOutAfter: bigint
): boolean {
    const kBefore = reserveInBefore * reserveOutBefore;
    const kAfter = reserveInAfter * reserveOutAfter;

    return kAfter >= kBefore;
}
