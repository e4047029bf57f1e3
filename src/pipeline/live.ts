/**
 * Live stage: feed → channel → monitor → handoff
 *
 * The feed socket only decodes and enqueues. The monitor drains the channel
 * on its own loop, and a submit loop hands the best profitable paths to the
 * execution handoff, once per repriced result.
 */

import { setTimeout as sleep } from 'node:timers/promises';

import type { QuoteUpdate, VecSwapPathSelected } from '../types.js';
import { BoundedChannel } from '../ingest/channel.js';
import { QuoteFeed } from '../ingest/feed.js';
import { OpportunityMonitor, type MonitorOptions } from '../monitor/monitor.js';
import { ExecutionHandoff, type HandoffOptions, type TransactionBuilder } from '../execute/handoff.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('live');

export interface LiveOptions {
    feedUrl: string;
    monitor: MonitorOptions;
    handoff: HandoffOptions;
    channelCapacity?: number;
    submitIntervalMs?: number;
    reconnect?: { initialBackoffMs: number; maxBackoffMs: number };
}

export interface LiveSummary {
    accepted: number;
    rejected: number;
    failed: number;
    updates: number;
    droppedUpdates: number;
    malformedFrames: number;
}

export async function runLive(
    selection: VecSwapPathSelected,
    builder: TransactionBuilder,
    options: LiveOptions,
    signal: AbortSignal
): Promise<LiveSummary> {
    const channel = new BoundedChannel<QuoteUpdate>(options.channelCapacity ?? 4_096);
    const monitor = new OpportunityMonitor(selection, options.monitor);
    const handoff = new ExecutionHandoff(monitor, builder, options.handoff);

    const pools = [...new Set(selection.value.flatMap(r => r.pools.map(p => p.id)))];
    const feed = new QuoteFeed(options.feedUrl, channel, {
        pools,
        now: options.monitor.now,
        ...options.reconnect,
    });

    const summary: LiveSummary = { accepted: 0, rejected: 0, failed: 0, updates: 0, droppedUpdates: 0, malformedFrames: 0 };
    /** path id → generation of the result last submitted */
    const submitted = new Map<string, number>();

    const submitLoop = async (): Promise<void> => {
        const interval = options.submitIntervalMs ?? 250;
        while (!signal.aborted) {
            try {
                await sleep(interval, undefined, { signal });
            } catch (e) {
                if (signal.aborted) break;
                throw e;
            }
            for (const entry of monitor.view()) {
                const generation = entry.result?.generation;
                if (generation === undefined || submitted.get(entry.id) === generation) continue;
                submitted.set(entry.id, generation);
                const outcome = await handoff.submit(entry.id);
                summary[outcome.status]++;
            }
        }
    };

    feed.start();
    try {
        await Promise.all([monitor.run(channel, signal), submitLoop()]);
    } finally {
        channel.close();
        await feed.stop();
    }

    summary.updates = monitor.stats.updates;
    summary.droppedUpdates = channel.dropped;
    summary.malformedFrames = feed.stats.malformed;
    log.info(
        `live stage done: ${summary.accepted} accepted, ${summary.rejected} rejected, ${summary.failed} failed, ` +
            `${summary.updates} updates`
    );
    return summary;
}
