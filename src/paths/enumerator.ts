/**
 * Path Enumerator
 *
 * Generates candidate cycles over a market graph:
 * - 1-hop: base → target → base through two distinct pools
 * - 2-hop: base → A → B → base through three distinct pools, where A and B
 *   are targets or allowed bridge tokens and at least one is a target
 *
 * Parallel pools between the same pair each produce their own path.
 * Order is stable: targets in request order, then graph edge order.
 */

import type { Swap, SwapPath, TokenInfos } from '../types.js';
import { shortAddr } from '../types.js';
import { InputError } from '../errors.js';
import { edgesBetween, hasToken, type MarketEdge, type MarketGraph } from '../graph/marketGraph.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('enumerator');

export interface EnumerationRequest {
    base: string;
    targets: readonly string[];
    include1hop: boolean;
    include2hop: boolean;
    /** Extra intermediates allowed in 2-hop cycles (e.g. USDC) */
    bridges?: readonly string[];
}

export function pathId(swaps: readonly Swap[]): string {
    return swaps.map(s => `${s.pool}:${s.tokenIn}:${s.tokenOut}`).join('/');
}

function toSwap(edge: MarketEdge): Swap {
    return { pool: edge.pool, dex: edge.dex, tokenIn: edge.tokenIn, tokenOut: edge.tokenOut };
}

/** Human-readable path: SOL → BONK → SOL [raydium, orca] */
export function describePath(path: SwapPath, tokens: TokenInfos): string {
    const first = path.swaps[0];
    if (!first) return path.id;
    const symbol = (a: string) => tokens[a]?.symbol ?? shortAddr(a);
    const route = [symbol(first.tokenIn), ...path.swaps.map(s => symbol(s.tokenOut))].join(' → ');
    return `${route} [${path.swaps.map(s => s.dex).join(', ')}]`;
}

export function enumeratePaths(graph: MarketGraph, request: EnumerationRequest): SwapPath[] {
    const { base } = request;
    const targets = [...new Set(request.targets.filter(t => t !== base))];
    if (targets.length === 0) {
        throw new InputError('no target tokens besides the base token', shortAddr(base));
    }

    if (!hasToken(graph, base)) {
        log.warn(`base token ${shortAddr(base)} has no pools; no paths`);
        return [];
    }

    const paths: SwapPath[] = [];
    const push = (swaps: Swap[], hops: 1 | 2) => {
        paths.push({ id: pathId(swaps), hops, swaps, ordinal: paths.length });
    };

    if (request.include1hop) {
        for (const target of targets) {
            const out = edgesBetween(graph, base, target);
            const back = edgesBetween(graph, target, base);
            if (out.length === 0 || back.length === 0) {
                log.debug(`no round trip for ${shortAddr(target)}`);
                continue;
            }
            for (const e1 of out) {
                for (const e2 of back) {
                    if (e1.pool === e2.pool) continue;
                    push([toSwap(e1), toSwap(e2)], 1);
                }
            }
        }
    }

    if (request.include2hop) {
        const targetSet = new Set(targets);
        const intermediates = [...targets];
        for (const b of request.bridges ?? []) {
            if (b !== base && !targetSet.has(b) && !intermediates.includes(b)) intermediates.push(b);
        }

        for (const a of intermediates) {
            for (const b of intermediates) {
                if (a === b) continue;
                if (!targetSet.has(a) && !targetSet.has(b)) continue;

                const leg1 = edgesBetween(graph, base, a);
                const leg2 = edgesBetween(graph, a, b);
                const leg3 = edgesBetween(graph, b, base);
                for (const e1 of leg1) {
                    for (const e2 of leg2) {
                        if (e2.pool === e1.pool) continue;
                        for (const e3 of leg3) {
                            if (e3.pool === e1.pool || e3.pool === e2.pool) continue;
                            push([toSwap(e1), toSwap(e2), toSwap(e3)], 2);
                        }
                    }
                }
            }
        }
    }

    return paths;
}
