/**
 * Stable Swap Math (Curve invariant)
 *
 * A·n^n·Σx + D = A·D·n^n + D^(n+1) / (n^n·Πx)
 *
 * Used by: Saber, Mercurial
 *
 * Reserves are taken in a common precision; pools whose coins differ in
 * decimals must be normalised by the loader.
 */

import type { StableSwapPool } from '../../types.js';
import { FeeMode } from '../../types.js';
import { NumericOverflowError } from '../../errors.js';
import { applyFee, assertU64, shiftReserves, type CurveSwap } from './fees.js';

const MAX_ITERATIONS = 255;

function absDiff(a: bigint, b: bigint): bigint {
    return a > b ? a - b : b - a;
}

/**
 * Invariant D by Newton iteration.
 * Returns 0 for an empty pool; any zero coin balance also yields 0.
 */
export function computeD(xp: readonly bigint[], amp: bigint, context?: string): bigint {
    const n = BigInt(xp.length);
    let sum = 0n;
    for (const x of xp) {
        if (x <= 0n) return 0n;
        sum += x;
    }

    let d = sum;
    const ann = amp * n;

    for (let i = 0; i < MAX_ITERATIONS; i++) {
        let dP = d;
        for (const x of xp) {
            dP = (dP * d) / (x * n);
        }
        const prev = d;
        d = ((ann * sum + dP * n) * d) / ((ann - 1n) * d + (n + 1n) * dP);
        if (absDiff(d, prev) <= 1n) {
            return d;
        }
    }

    throw new NumericOverflowError('stable-swap invariant did not converge', context);
}

/**
 * New balance of coin j after coin i is set to x, holding D constant
 */
export function computeY(
    i: number,
    j: number,
    x: bigint,
    xp: readonly bigint[],
    amp: bigint,
    context?: string
): bigint {
    const n = BigInt(xp.length);
    const d = computeD(xp, amp, context);
    const ann = amp * n;

    let c = d;
    let sum = 0n;
    for (let k = 0; k < xp.length; k++) {
        if (k === j) continue;
        const xk = k === i ? x : (xp[k] ?? 0n);
        sum += xk;
        c = (c * d) / (xk * n);
    }
    c = (c * d) / (ann * n);
    const b = sum + d / ann;

    let y = d;
    for (let iter = 0; iter < MAX_ITERATIONS; iter++) {
        const prev = y;
        y = (y * y + c) / (2n * y + b - d);
        if (absDiff(y, prev) <= 1n) {
            return y;
        }
    }

    throw new NumericOverflowError('stable-swap balance did not converge', context);
}

export function swapStableSwap(
    pool: StableSwapPool,
    iIn: number,
    iOut: number,
    amountIn: bigint
): CurveSwap<StableSwapPool> {
    assertU64(amountIn, 'amountIn', pool.id);

    if (amountIn <= 0n || pool.amp <= 0n || pool.reserves.some(r => r <= 0n)) {
        return { amountOut: 0n, pool };
    }

    const reserveIn = pool.reserves[iIn] ?? 0n;
    const reserveOut = pool.reserves[iOut] ?? 0n;
    const credit = pool.feeMode === FeeMode.Input ? applyFee(amountIn, pool.feeBps) : amountIn;
    if (credit <= 0n) {
        return { amountOut: 0n, pool };
    }

    const y = computeY(iIn, iOut, reserveIn + credit, pool.reserves, pool.amp, pool.id);
    // -1 rounds against the trader, as on chain
    const gross = reserveOut - y - 1n;
    if (gross <= 0n) {
        return { amountOut: 0n, pool };
    }

    const amountOut = pool.feeMode === FeeMode.Output ? applyFee(gross, pool.feeBps) : gross;
    if (amountOut <= 0n) {
        return { amountOut: 0n, pool };
    }

    return {
        amountOut,
        pool: { ...pool, reserves: shiftReserves(pool.reserves, iIn, iOut, credit, amountOut, pool.id) },
    };
}
