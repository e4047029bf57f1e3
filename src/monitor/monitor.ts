/**
 * Live Opportunity Monitor
 *
 * Holds the paths of one strategy and re-prices them as quotes arrive.
 * Only paths through the updated pool are re-priced. Per path:
 *
 *   stale → repricing → profitable | unprofitable
 *
 * and back to stale once any of its pools has not been refreshed within
 * the freshness window. The monitor owns this state; readers get copies.
 */

import { setImmediate as yieldToLoop } from 'node:timers/promises';

import type { Pool, QuoteUpdate, SwapPath, SwapPathResult, VecSwapPathSelected } from '../types.js';
import { ReserveSnapshotStore } from '../graph/snapshotStore.js';
import { pricePath } from '../sim/engine.js';
import { compareResults } from '../select/selector.js';
import type { BoundedChannel } from '../ingest/channel.js';
import { describeError, isArbError } from '../errors.js';
import { createLogger, logPath } from '../utils/logger.js';

const log = createLogger('monitor');

export const PathState = {
    Stale: 'stale',
    Repricing: 'repricing',
    Profitable: 'profitable',
    Unprofitable: 'unprofitable',
} as const;

export type PathState = (typeof PathState)[keyof typeof PathState];

export interface MonitorOptions {
    /** Simulated input in base units */
    amountIn: bigint;
    /** A path is profitable only when its profit (base units) exceeds this */
    minProfit: bigint;
    /** Aggregate impact must stay below this */
    maxImpactBps: number;
    freshnessMs: number;
    now?: () => number;
    /** When the seeded pool snapshots count as received; defaults to construction time */
    seededAtMs?: number;
    /** Updates applied per loop turn before yielding */
    batchSize?: number;
}

export interface MonitorEntry {
    id: string;
    strategy: string;
    path: SwapPath;
    state: PathState;
    result?: SwapPathResult;
    reason?: string;
    changedAtMs: number;
}

export interface Transition {
    id: string;
    from: PathState;
    to: PathState;
}

export interface MonitorStats {
    updates: number;
    ignored: number;
    repriced: number;
}

function freezePath(path: SwapPath): SwapPath {
    return Object.freeze({ ...path, swaps: Object.freeze(path.swaps.map(s => Object.freeze({ ...s }))) });
}

function freezeResult(result: SwapPathResult): SwapPathResult {
    return Object.freeze({
        ...result,
        path: freezePath(result.path),
        quotes: Object.freeze(result.quotes.map(q => Object.freeze({ ...q }))),
    });
}

export class OpportunityMonitor {
    private readonly store: ReserveSnapshotStore;
    private readonly entries = new Map<string, Readonly<MonitorEntry>>();
    /** pool id → ids of paths through it */
    private readonly byPool = new Map<string, Set<string>>();
    private readonly lastSlot = new Map<string, number>();
    private readonly now: () => number;

    readonly stats: MonitorStats = { updates: 0, ignored: 0, repriced: 0 };

    constructor(
        strategy: VecSwapPathSelected,
        private readonly options: MonitorOptions
    ) {
        this.now = options.now ?? Date.now;
        const seededAt = options.seededAtMs ?? this.now();

        const pools = new Map<string, Pool>();
        for (const record of strategy.value) {
            for (const pool of record.pools) {
                if (!pools.has(pool.id)) pools.set(pool.id, pool);
            }
        }
        this.store = new ReserveSnapshotStore(pools.values(), seededAt);

        for (const record of strategy.value) {
            if (this.entries.has(record.result.path.id)) continue;
            const path = freezePath(record.result.path);
            this.entries.set(
                path.id,
                Object.freeze({ id: path.id, strategy: record.strategy, path, state: PathState.Stale, changedAtMs: seededAt })
            );
            for (const swap of path.swaps) {
                let ids = this.byPool.get(swap.pool);
                if (!ids) {
                    ids = new Set();
                    this.byPool.set(swap.pool, ids);
                }
                ids.add(path.id);
            }
        }
        log.info(`monitoring ${this.entries.size} paths over ${this.store.size} pools`);
    }

    get size(): number {
        return this.entries.size;
    }

    get thresholds(): Readonly<Pick<MonitorOptions, 'amountIn' | 'minProfit' | 'maxImpactBps' | 'freshnessMs'>> {
        const { amountIn, minProfit, maxImpactBps, freshnessMs } = this.options;
        return { amountIn, minProfit, maxImpactBps, freshnessMs };
    }

    /**
     * Install a quote and re-price the paths through its pool.
     * Quotes for unknown pools, out-of-order slots and invalid reserves are ignored.
     */
    applyUpdate(update: QuoteUpdate): Transition[] {
        this.stats.updates++;
        const affected = this.byPool.get(update.pool);
        if (!affected) {
            this.stats.ignored++;
            return [];
        }

        const seen = this.lastSlot.get(update.pool);
        if (update.slot !== undefined && seen !== undefined && update.slot < seen) {
            this.stats.ignored++;
            log.debug(`out-of-order quote for ${update.pool}: slot ${update.slot} < ${seen}`);
            return [];
        }

        try {
            this.store.applyQuote(update);
        } catch (e) {
            if (!isArbError(e)) throw e;
            this.stats.ignored++;
            log.warn(`ignored quote: ${describeError(e)}`);
            return [];
        }
        if (update.slot !== undefined) this.lastSlot.set(update.pool, update.slot);

        const pools = this.store.snapshot();
        const transitions: Transition[] = [];
        for (const id of affected) {
            const t = this.repriceWith(id, pools);
            if (t) transitions.push(t);
        }
        return transitions;
    }

    /** Move paths whose reserves aged past the freshness window back to stale */
    sweep(): Transition[] {
        const stalePools = new Set(this.store.staleSince(this.now(), this.options.freshnessMs));
        if (stalePools.size === 0) return [];

        const transitions: Transition[] = [];
        for (const entry of this.entries.values()) {
            if (entry.state === PathState.Stale) continue;
            if (!entry.path.swaps.some(s => stalePools.has(s.pool))) continue;
            transitions.push(this.set(entry, { state: PathState.Stale, reason: 'reserves aged past freshness window' }));
        }
        return transitions;
    }

    /** Re-price one path against the current snapshot; returns the new entry */
    reprice(id: string): MonitorEntry | undefined {
        if (!this.entries.has(id)) return undefined;
        this.repriceWith(id, this.store.snapshot());
        return this.entry(id);
    }

    entry(id: string): MonitorEntry | undefined {
        const e = this.entries.get(id);
        return e ? { ...e } : undefined;
    }

    /** Every monitored path, in strategy order */
    all(): MonitorEntry[] {
        return [...this.entries.values()].map(e => ({ ...e }));
    }

    /** Profitable paths, most profitable first */
    view(): Array<MonitorEntry & { result: SwapPathResult }> {
        const profitable: Array<MonitorEntry & { result: SwapPathResult }> = [];
        for (const e of this.entries.values()) {
            if (e.state === PathState.Profitable && e.result) profitable.push({ ...e, result: e.result });
        }
        return profitable.sort((a, b) => compareResults(a.result, b.result));
    }

    /**
     * Drain the channel until it closes or the signal aborts.
     * Yields to the event loop after every batch.
     */
    async run(channel: BoundedChannel<QuoteUpdate>, signal?: AbortSignal): Promise<void> {
        const batchSize = this.options.batchSize ?? 256;
        while (!signal?.aborted) {
            await channel.wait(signal);
            if (signal?.aborted) break;

            const batch = channel.drain(batchSize);
            if (batch.length === 0 && channel.isClosed) break;

            for (const update of batch) this.applyUpdate(update);
            this.sweep();
            await yieldToLoop();
        }
        log.info(`monitor stopped after ${this.stats.updates} updates (${channel.dropped} dropped in channel)`);
    }

    private repriceWith(id: string, pools: ReadonlyMap<string, Pool>): Transition | undefined {
        const current = this.entries.get(id);
        if (!current) return undefined;
        const from = current.state;
        this.set(current, { state: PathState.Repricing });
        this.stats.repriced++;

        let next: Partial<MonitorEntry>;
        const stale = new Set(this.store.staleSince(this.now(), this.options.freshnessMs));
        if (current.path.swaps.some(s => stale.has(s.pool))) {
            next = { state: PathState.Stale, reason: 'stale reserves' };
        } else {
            try {
                next = this.classify(pricePath(current.path, this.options.amountIn, pools, this.store.generation));
            } catch (e) {
                if (!isArbError(e)) throw e;
                next = { state: PathState.Unprofitable, result: undefined, reason: describeError(e) };
            }
        }

        const to = this.set(this.entries.get(id) ?? current, next).to;
        if (to !== from) {
            logPath({
                type: 'MONITOR',
                action: `${from} -> ${to}`,
                strategy: current.strategy,
                path: id,
                profit: next.result?.profit,
                profitBps: next.result?.profitBps,
                impactBps: next.result?.impactBps,
                reason: next.reason,
            });
        }
        return { id, from, to };
    }

    private classify(result: SwapPathResult): Partial<MonitorEntry> {
        const { minProfit, maxImpactBps } = this.options;
        const frozen = freezeResult(result);
        if (result.profit <= minProfit) {
            return { state: PathState.Unprofitable, result: frozen, reason: 'profit below minimum' };
        }
        if (result.impactBps >= maxImpactBps) {
            return { state: PathState.Unprofitable, result: frozen, reason: 'price impact above cap' };
        }
        return { state: PathState.Profitable, result: frozen, reason: undefined };
    }

    private set(entry: Readonly<MonitorEntry>, patch: Partial<MonitorEntry>): Transition {
        const next: MonitorEntry = { ...entry, ...patch, changedAtMs: this.now() };
        this.entries.set(entry.id, Object.freeze(next));
        return { id: entry.id, from: entry.state, to: next.state };
    }
}
