/**
 * Session driver
 *
 * Loads pools once, freezes one market graph, runs every configuration
 * concurrently over it, waits for all of them, then merges the persisted
 * selections into one strategy when more than one run produced a file.
 *
 * A failing run never cancels its siblings; failures are collected and
 * reported with the run's name.
 */

import type { Pool, VecSwapPathSelected } from '../types.js';
import { PersistenceFailure, describeError, isArbError } from '../errors.js';
import { buildMarketGraph, edgeCount, type MarketGraph } from '../graph/marketGraph.js';
import { ReserveSnapshotStore } from '../graph/snapshotStore.js';
import { aggregateStrategies, mergeStrategyFiles } from '../select/aggregator.js';
import type { PoolLoader } from '../io/poolLoader.js';
import type { TokenInfoProvider } from '../io/tokenInfo.js';
import type { DocumentStore } from '../io/documentStore.js';
import type { SessionConfig, StrategyConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { runStrategy, type StrategyRun } from './strategy.js';

const log = createLogger('session');

export interface SessionDeps {
    loader: PoolLoader;
    tokenInfo: TokenInfoProvider;
    store?: DocumentStore;
}

export interface SessionOptions {
    amountIn: bigint;
    minProfit: bigint;
    strategyDir: string;
    now?: () => number;
}

export type RunOutcome =
    | { name: string; status: 'fulfilled'; run: StrategyRun }
    | { name: string; status: 'rejected'; error: string };

export interface SessionStrategy {
    name: string;
    selection: VecSwapPathSelected;
    /** Absent when the merged strategy could not be persisted */
    file?: string;
}

export interface SessionOutcome {
    graph: MarketGraph;
    runs: RunOutcome[];
    /** Strategy handed to the monitor; absent when no run selected anything */
    strategy?: SessionStrategy;
    aggregationError?: string;
}

/** Tokens one run prices and logs: its own set plus the shared bridges */
function runTokens(config: StrategyConfig, bridges: readonly string[]): string[] {
    return [...new Set([...config.tokensToArb.map(t => t.address), ...bridges])];
}

export function buildSessionGraph(pools: readonly Pool[], now: () => number): MarketGraph {
    const store = new ReserveSnapshotStore(pools, now());
    const graph = buildMarketGraph(store.pools(), store.generation);
    log.info(`graph: ${graph.pools.size}/${pools.length} pools usable, ${edgeCount(graph)} edges`);
    return graph;
}

export async function runSession(
    session: SessionConfig,
    deps: SessionDeps,
    options: SessionOptions
): Promise<SessionOutcome> {
    const now = options.now ?? Date.now;
    const fresh = session.runs.some(r => r.getFreshPools);

    const pools = await deps.loader.load(fresh);
    const graph = buildSessionGraph(pools, now);

    // Token metadata is resolved once per run
    const settled = await Promise.allSettled(
        session.runs.map(async config =>
            runStrategy(config, {
                graph,
                tokens: await deps.tokenInfo.resolve(runTokens(config, session.bridges)),
                amountIn: options.amountIn,
                minProfit: options.minProfit,
                bridges: session.bridges,
                restrictTo: session.restrictTo,
                dir: options.strategyDir,
                store: deps.store,
                now,
            })
        )
    );

    const runs: RunOutcome[] = settled.map((s, i) => {
        const name = session.runs[i]?.name ?? `run-${i}`;
        if (s.status === 'fulfilled') return { name, status: 'fulfilled', run: s.value };
        if (!isArbError(s.reason)) {
            log.error(`${name}: unexpected failure`, s.reason);
        }
        const error = describeError(s.reason);
        log.error(`run ${name} failed: ${error}`);
        return { name, status: 'rejected', error };
    });

    const completed = runs.flatMap(r => (r.status === 'fulfilled' && r.run.selection.value.length > 0 ? [r.run] : []));
    const outcome: SessionOutcome = { graph, runs };
    if (completed.length === 0) {
        log.warn('no run selected any path');
        return outcome;
    }

    const [only] = completed;
    if (only && completed.length === 1) {
        outcome.strategy = { name: only.name, selection: only.selection, file: only.file };
        return outcome;
    }

    const files = completed.flatMap(r => (r.file ? [r.file] : []));
    try {
        if (files.length !== completed.length) {
            const failed = completed.find(r => !r.file);
            throw failed?.persistError ?? new PersistenceFailure('selection file missing', failed?.name);
        }
        const merged = await mergeStrategyFiles(files, { dir: options.strategyDir, store: deps.store });
        outcome.strategy = { name: merged.name, selection: merged.selection, file: merged.file };
    } catch (e) {
        if (!isArbError(e)) throw e;
        outcome.aggregationError = describeError(e);
        log.error(`aggregation failed, continuing with the in-memory merge: ${outcome.aggregationError}`);
        outcome.strategy = aggregateStrategies(completed.map(r => r.selection));
    }
    return outcome;
}
