/**
 * Market Graph Builder
 *
 * Turns a flat pool collection into a token adjacency map.
 * Every ordered token pair a pool holds nonzero reserves for becomes one
 * directed edge; parallel pools between the same pair stay separate edges.
 *
 * Pure: no clock, no network. The returned graph is frozen and shared
 * read-only by every configuration run of a session.
 */

import type { Pool } from '../types.js';

export interface MarketEdge {
    pool: string;
    dex: string;
    tokenIn: string;
    tokenOut: string;
}

export interface MarketGraph {
    /** Snapshot generation the pools were taken from */
    generation: number;
    pools: ReadonlyMap<string, Pool>;
    /** tokenIn → outgoing edges, sorted by (tokenOut, dex, pool) */
    edges: ReadonlyMap<string, readonly MarketEdge[]>;
}

function compareEdges(a: MarketEdge, b: MarketEdge): number {
    if (a.tokenOut !== b.tokenOut) return a.tokenOut < b.tokenOut ? -1 : 1;
    if (a.dex !== b.dex) return a.dex < b.dex ? -1 : 1;
    if (a.pool !== b.pool) return a.pool < b.pool ? -1 : 1;
    return 0;
}

function nonzeroTokens(pool: Pool): string[] {
    const out: string[] = [];
    pool.tokens.forEach((token, i) => {
        const reserve = pool.reserves[i];
        if (reserve !== undefined && reserve > 0n) out.push(token);
    });
    return out;
}

export function buildMarketGraph(pools: Iterable<Pool>, generation = 0): MarketGraph {
    const poolMap = new Map<string, Pool>();
    const adj = new Map<string, MarketEdge[]>();

    for (const pool of pools) {
        const live = nonzeroTokens(pool);
        if (live.length < 2) continue;
        // Later duplicates of an id replace earlier ones, same as a reserve refresh
        poolMap.set(pool.id, Object.freeze(pool));
    }

    for (const pool of poolMap.values()) {
        const live = nonzeroTokens(pool);
        for (const tokenIn of live) {
            for (const tokenOut of live) {
                if (tokenIn === tokenOut) continue;
                let list = adj.get(tokenIn);
                if (!list) {
                    list = [];
                    adj.set(tokenIn, list);
                }
                list.push({ pool: pool.id, dex: pool.dex, tokenIn, tokenOut });
            }
        }
    }

    const edges = new Map<string, readonly MarketEdge[]>();
    for (const [token, list] of adj) {
        list.sort(compareEdges);
        edges.set(token, Object.freeze(list.map(e => Object.freeze(e))));
    }

    return Object.freeze({ generation, pools: poolMap, edges });
}

/** Edges tokenIn → tokenOut, in graph order */
export function edgesBetween(graph: MarketGraph, tokenIn: string, tokenOut: string): MarketEdge[] {
    return (graph.edges.get(tokenIn) ?? []).filter(e => e.tokenOut === tokenOut);
}

export function getPool(graph: MarketGraph, id: string): Pool | undefined {
    return graph.pools.get(id);
}

export function hasToken(graph: MarketGraph, token: string): boolean {
    return graph.edges.has(token);
}

export function edgeCount(graph: MarketGraph): number {
    let n = 0;
    for (const list of graph.edges.values()) n += list.length;
    return n;
}
