/**
 * Path Pricer
 *
 * Dispatches each swap to the math module of its pool kind and chains swaps
 * through a path: the output of one swap is the input of the next, and a pool
 * touched twice sees the state left by its first swap.
 *
 * Pure computation over a pool snapshot; never suspends.
 */

import type { Pool, SwapPath, SwapPathResult, SwapQuote } from '../types.js';
import { PoolKind, tokenIndex } from '../types.js';
import { DataUnavailableError, describeError, isArbError } from '../errors.js';
import { ratioBps } from '../utils/amounts.js';
import { createLogger } from '../utils/logger.js';
import { swapConstantProduct } from './math/constantProduct.js';
import { swapStableSwap } from './math/stableSwap.js';
import { swapConcentrated } from './math/clmm.js';
import type { CurveSwap } from './math/fees.js';

const log = createLogger('pricer');

/** Probe size for the marginal rate: 1 / PROBE_DIVISOR of the input reserve */
const PROBE_DIVISOR = 10_000n;

export interface SwapOutcome {
    amountOut: bigint;
    priceImpactBps: number;
    pool: Pool;
}

function runCurve(pool: Pool, iIn: number, iOut: number, amountIn: bigint): CurveSwap {
    switch (pool.kind) {
        case PoolKind.ConstantProduct:
            return swapConstantProduct(pool, iIn, iOut, amountIn);
        case PoolKind.StableSwap:
            return swapStableSwap(pool, iIn, iOut, amountIn);
        case PoolKind.ConcentratedLiquidity:
            return swapConcentrated(pool, iIn, iOut, amountIn);
    }
}

/**
 * |out - ideal| / ideal in bps, where ideal prices amountIn at the marginal
 * rate measured by a tiny probe swap
 */
function priceImpact(pool: Pool, iIn: number, iOut: number, amountIn: bigint, amountOut: bigint): number {
    const reserveIn = pool.reserves[iIn] ?? 0n;
    let probe = reserveIn / PROBE_DIVISOR;
    if (probe < 1n) probe = 1n;
    if (probe > amountIn) probe = amountIn;
    if (probe <= 0n) return 0;

    const probeOut = runCurve(pool, iIn, iOut, probe).amountOut;
    const ideal = (amountIn * probeOut) / probe;
    if (ideal === 0n) return 0;

    const diff = ideal > amountOut ? ideal - amountOut : amountOut - ideal;
    return ratioBps(diff, ideal);
}

/**
 * Quote one swap tokenIn → tokenOut through a pool
 * Zero reserves give zero output; overflow throws NumericOverflowError.
 */
export function quoteSwap(pool: Pool, tokenIn: string, tokenOut: string, amountIn: bigint): SwapOutcome {
    const iIn = tokenIndex(pool, tokenIn);
    const iOut = tokenIndex(pool, tokenOut);
    if (iIn < 0 || iOut < 0 || iIn === iOut) {
        throw new DataUnavailableError(`pool does not trade ${tokenIn} → ${tokenOut}`, pool.id);
    }

    const swap = runCurve(pool, iIn, iOut, amountIn);
    const priceImpactBps = swap.amountOut > 0n ? priceImpact(pool, iIn, iOut, amountIn, swap.amountOut) : 0;

    return { amountOut: swap.amountOut, priceImpactBps, pool: swap.pool };
}

/**
 * Simulate a whole path for amountIn of the base token
 */
export function pricePath(
    path: SwapPath,
    amountIn: bigint,
    pools: ReadonlyMap<string, Pool>,
    generation: number
): SwapPathResult {
    // Working copies so repeated pools see their own earlier swaps
    const working = new Map<string, Pool>();
    const quotes: SwapQuote[] = [];
    let current = amountIn;

    for (const swap of path.swaps) {
        const pool = working.get(swap.pool) ?? pools.get(swap.pool);
        if (!pool) {
            throw new DataUnavailableError('pool missing from snapshot', `${path.id} @ ${swap.pool}`);
        }

        const outcome = quoteSwap(pool, swap.tokenIn, swap.tokenOut, current);
        working.set(swap.pool, outcome.pool);
        quotes.push({
            pool: swap.pool,
            tokenIn: swap.tokenIn,
            tokenOut: swap.tokenOut,
            amountIn: current,
            amountOut: outcome.amountOut,
            priceImpactBps: outcome.priceImpactBps,
        });
        current = outcome.amountOut;
    }

    const profit = current - amountIn;
    return {
        path,
        amountIn,
        amountOut: current,
        profit,
        profitBps: ratioBps(profit, amountIn),
        quotes,
        impactBps: quotes.reduce((sum, q) => sum + q.priceImpactBps, 0),
        generation,
    };
}

export interface PricingReport {
    results: SwapPathResult[];
    discarded: Array<{ path: SwapPath; error: string }>;
}

/**
 * Price every path; a path whose math fails is discarded and logged,
 * its siblings are unaffected
 */
export function pricePaths(
    paths: readonly SwapPath[],
    amountIn: bigint,
    pools: ReadonlyMap<string, Pool>,
    generation: number,
    strategy = ''
): PricingReport {
    const results: SwapPathResult[] = [];
    const discarded: PricingReport['discarded'] = [];

    for (const path of paths) {
        try {
            results.push(pricePath(path, amountIn, pools, generation));
        } catch (e) {
            if (!isArbError(e)) throw e;
            const error = describeError(e);
            discarded.push({ path, error });
            log.warn(`discarded path strategy=${strategy} path=${path.id}: ${error}`);
        }
    }

    return { results, discarded };
}
