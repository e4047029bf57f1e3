/**
 * Path Ranker / Selector
 *
 * Orders priced paths by profit and keeps the best K of them.
 * K is a cap: fewer qualifying paths give a shorter list, never padding.
 */

import type { Pool, SwapPath, SwapPathResult, SwapPathSelected, VecSwapPathSelected } from '../types.js';
import { DataUnavailableError, InputError } from '../errors.js';

export interface SelectionPolicy {
    /** numbers_of_best_paths */
    limit: number;
    /** Smallest profit (base units) that qualifies; defaults to 1 */
    minProfit?: bigint;
    /** 2-hop paths must route through one of these tokens */
    restrictTo?: readonly string[];
}

/** Tokens visited between the first and last swap */
export function intermediateTokens(path: SwapPath): string[] {
    return path.swaps.slice(0, -1).map(s => s.tokenOut);
}

/** Profit desc, then aggregate impact asc, then enumeration order */
export function compareResults(a: SwapPathResult, b: SwapPathResult): number {
    if (a.profit !== b.profit) return a.profit > b.profit ? -1 : 1;
    if (a.impactBps !== b.impactBps) return a.impactBps - b.impactBps;
    return a.path.ordinal - b.path.ordinal;
}

export function rankResults(results: readonly SwapPathResult[], policy: SelectionPolicy): SwapPathResult[] {
    if (!Number.isInteger(policy.limit) || policy.limit < 0) {
        throw new InputError(`numbers_of_best_paths must be a non-negative integer, got ${policy.limit}`);
    }
    const minProfit = policy.minProfit ?? 1n;
    const allow = policy.restrictTo ? new Set(policy.restrictTo) : undefined;

    return results
        .filter(r => r.profit >= minProfit)
        .filter(r => !allow || r.path.hops === 1 || intermediateTokens(r.path).some(t => allow.has(t)))
        .sort(compareResults)
        .slice(0, policy.limit);
}

/**
 * Tag ranked results with the strategy name and the pools they were priced
 * against, so the selection can be re-priced without the session graph.
 */
export function toSelection(
    strategy: string,
    ranked: readonly SwapPathResult[],
    pools: ReadonlyMap<string, Pool>,
    selectedAt: number
): VecSwapPathSelected {
    const value: SwapPathSelected[] = ranked.map(result => {
        const used: Pool[] = [];
        for (const swap of result.path.swaps) {
            if (used.some(p => p.id === swap.pool)) continue;
            const pool = pools.get(swap.pool);
            if (!pool) {
                throw new DataUnavailableError('selected path references a pool outside the snapshot', result.path.id);
            }
            used.push(pool);
        }
        return { strategy, selectedAt, result, pools: used };
    });
    return { value };
}
