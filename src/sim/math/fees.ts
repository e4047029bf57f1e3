/**
 * Fee and integer-range helpers shared by the venue math modules
 *
 * Fees are basis points of FEE_DENOMINATOR. Every fee application floors,
 * so simulated outputs never exceed what the chain would pay.
 */

import type { Pool } from '../../types.js';
import { U128_MAX, U64_MAX } from '../../types.js';
import { NumericOverflowError } from '../../errors.js';

export const FEE_DENOMINATOR = 10_000n;

/** Amount left after the fee: floor(amount * (10000 - fee) / 10000) */
export function applyFee(amount: bigint, feeBps: bigint): bigint {
    if (feeBps <= 0n) return amount;
    if (feeBps >= FEE_DENOMINATOR) return 0n;
    return (amount * (FEE_DENOMINATOR - feeBps)) / FEE_DENOMINATOR;
}

export function assertU64(value: bigint, what: string, context?: string): void {
    if (value < 0n || value > U64_MAX) {
        throw new NumericOverflowError(`${what} ${value} outside u64`, context);
    }
}

export function assertU128(value: bigint, what: string, context?: string): void {
    if (value < 0n || value > U128_MAX) {
        throw new NumericOverflowError(`${what} ${value} outside u128`, context);
    }
}

/** Outcome of one swap against a pool snapshot */
export interface CurveSwap<P extends Pool = Pool> {
    amountOut: bigint;
    /** Pool state after the swap; the input pool when nothing was traded */
    pool: P;
}

/** Reserves with tokenIn credited and tokenOut debited */
export function shiftReserves(
    reserves: readonly bigint[],
    iIn: number,
    iOut: number,
    credit: bigint,
    debit: bigint,
    context?: string
): bigint[] {
    const next = [...reserves];
    const rIn = (next[iIn] ?? 0n) + credit;
    const rOut = (next[iOut] ?? 0n) - debit;
    assertU64(rIn, 'reserve', context);
    assertU64(rOut, 'reserve', context);
    next[iIn] = rIn;
    next[iOut] = rOut;
    return next;
}
