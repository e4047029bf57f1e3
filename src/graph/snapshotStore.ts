/**
 * Reserve Snapshot Store
 *
 * Snapshot-and-replace: a refresh installs a new frozen pool object and bumps
 * the generation; nothing already handed out is ever mutated. Readers that
 * captured a snapshot keep pricing against it unaffected by later refreshes.
 */

import type { Pool, QuoteUpdate } from '../types.js';
import { PoolKind, U128_MAX, U64_MAX } from '../types.js';
import { DataUnavailableError, NumericOverflowError } from '../errors.js';

export interface PoolSnapshot {
    pool: Pool;
    /** Store generation at which this snapshot was installed */
    generation: number;
    receivedAtMs: number;
}

export class ReserveSnapshotStore {
    private entries = new Map<string, PoolSnapshot>();
    private gen = 0;

    constructor(initial: Iterable<Pool> = [], receivedAtMs = 0) {
        for (const pool of initial) {
            this.install(pool, receivedAtMs);
        }
    }

    get generation(): number {
        return this.gen;
    }

    get size(): number {
        return this.entries.size;
    }

    get(poolId: string): PoolSnapshot | undefined {
        return this.entries.get(poolId);
    }

    has(poolId: string): boolean {
        return this.entries.has(poolId);
    }

    /** Replace a pool wholesale */
    replace(pool: Pool, receivedAtMs: number): PoolSnapshot {
        return this.install(pool, receivedAtMs);
    }

    /**
     * Apply a quote update to a known pool.
     * Reserve count must match the pool's token count.
     */
    applyQuote(update: QuoteUpdate): PoolSnapshot {
        const current = this.entries.get(update.pool);
        if (!current) {
            throw new DataUnavailableError('quote for unknown pool', update.pool);
        }
        const prev = current.pool;
        if (update.reserves.length !== prev.tokens.length) {
            throw new DataUnavailableError(
                `quote has ${update.reserves.length} reserves, pool holds ${prev.tokens.length} tokens`,
                update.pool
            );
        }
        for (const r of update.reserves) {
            if (r < 0n || r > U64_MAX) {
                throw new NumericOverflowError(`reserve ${r} outside u64`, update.pool);
            }
        }

        let next: Pool;
        if (prev.kind === PoolKind.ConcentratedLiquidity) {
            const sqrtPriceX64 = update.sqrtPriceX64 ?? prev.sqrtPriceX64;
            const liquidity = update.liquidity ?? prev.liquidity;
            if (sqrtPriceX64 > U128_MAX || liquidity > U128_MAX) {
                throw new NumericOverflowError('sqrt price or liquidity outside u128', update.pool);
            }
            next = { ...prev, reserves: [...update.reserves], sqrtPriceX64, liquidity };
        } else {
            next = { ...prev, reserves: [...update.reserves] };
        }
        return this.install(next, update.receivedAtMs);
    }

    /** Pools of the current generation, in insertion order */
    pools(): Pool[] {
        return [...this.entries.values()].map(e => e.pool);
    }

    /** Point-in-time copy of the id → pool map */
    snapshot(): Map<string, Pool> {
        const out = new Map<string, Pool>();
        for (const [id, e] of this.entries) out.set(id, e.pool);
        return out;
    }

    /** Pool ids whose snapshot is older than maxAgeMs at nowMs */
    staleSince(nowMs: number, maxAgeMs: number): string[] {
        const out: string[] = [];
        for (const [id, e] of this.entries) {
            if (nowMs - e.receivedAtMs > maxAgeMs) out.push(id);
        }
        return out;
    }

    private install(pool: Pool, receivedAtMs: number): PoolSnapshot {
        this.gen++;
        const frozen: Pool = Object.freeze({ ...pool, tokens: Object.freeze([...pool.tokens]), reserves: Object.freeze([...pool.reserves]) });
        const entry: PoolSnapshot = Object.freeze({ pool: frozen, generation: this.gen, receivedAtMs });
        this.entries.set(pool.id, entry);
        return entry;
    }
}
