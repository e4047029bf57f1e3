/**
 * Strategy Aggregator
 *
 * Merges the selections of one session into a combined strategy.
 * Order-preserving concatenation; no re-ranking.
 */

import * as path from 'node:path';

import type { VecSwapPathSelected } from '../types.js';
import { readStrategyFile, writeStrategyFile } from '../io/strategyFile.js';
import type { DocumentStore } from '../io/documentStore.js';
import { Collection } from '../io/documentStore.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('aggregator');

export const ULTRA_DIR = 'ultra_strategies';

export interface AggregatedStrategy {
    name: string;
    selection: VecSwapPathSelected;
}

/** Strategy tags in order of first appearance */
export function strategyNames(selection: VecSwapPathSelected): string[] {
    const names: string[] = [];
    for (const record of selection.value) {
        if (!names.includes(record.strategy)) names.push(record.strategy);
    }
    return names;
}

/** ["SOL-BONK", "SOL-WIF"] → "0-SOL-BONK-1-SOL-WIF" */
export function mergedStrategyName(names: readonly string[]): string {
    return names.map((name, i) => `${i}-${name}`).join('-');
}

export function aggregateStrategies(inputs: readonly VecSwapPathSelected[]): AggregatedStrategy {
    const selection: VecSwapPathSelected = { value: inputs.flatMap(input => input.value) };
    return { name: mergedStrategyName(strategyNames(selection)), selection };
}

export interface StrategySinks {
    /** Root strategy directory; merged files go under its ultra_strategies/ */
    dir: string;
    store?: DocumentStore;
}

export interface MergedStrategyFile extends AggregatedStrategy {
    file: string;
}

/**
 * Read persisted strategy files, merge them in the given order and persist
 * the result. A missing or unreadable input raises PersistenceFailure.
 */
export async function mergeStrategyFiles(files: readonly string[], sinks: StrategySinks): Promise<MergedStrategyFile> {
    const inputs: VecSwapPathSelected[] = [];
    for (const file of files) {
        inputs.push(await readStrategyFile(file));
    }

    const merged = aggregateStrategies(inputs);
    const file = path.join(sinks.dir, ULTRA_DIR, `${merged.name}.json`);
    await writeStrategyFile(file, merged.selection);
    sinks.store?.insert(Collection.UltraStrategies, { name: merged.name, ...merged.selection });

    log.info(`merged ${files.length} strategies into ${merged.name} (${merged.selection.value.length} paths)`);
    return { ...merged, file };
}
