/**
 * One configuration run:
 * enumerate → price → rank → select → persist (file, then document store)
 *
 * Stages run in that order over the session's shared, frozen graph.
 * A persistence failure is reported on the run result; the in-memory
 * selection is kept.
 */

import type { TokenInfos, VecSwapPathSelected } from '../types.js';
import { InputError, PersistenceFailure, describeError } from '../errors.js';
import type { MarketGraph } from '../graph/marketGraph.js';
import { describePath, enumeratePaths } from '../paths/enumerator.js';
import { pricePaths } from '../sim/engine.js';
import { rankResults, toSelection } from '../select/selector.js';
import { strategyFilePath, writeStrategyFile } from '../io/strategyFile.js';
import { Collection, type DocumentStore } from '../io/documentStore.js';
import { validateStrategyConfig, type StrategyConfig } from '../config.js';
import { createLogger, logPath } from '../utils/logger.js';
import { formatAmount } from '../utils/amounts.js';

const log = createLogger('strategy');

export interface StrategyContext {
    graph: MarketGraph;
    tokens: TokenInfos;
    amountIn: bigint;
    minProfit: bigint;
    bridges: readonly string[];
    restrictTo?: readonly string[];
    /** Directory of per-strategy selection files */
    dir: string;
    store?: DocumentStore;
    now?: () => number;
}

export interface StrategyRun {
    name: string;
    enumerated: number;
    priced: number;
    discarded: number;
    selection: VecSwapPathSelected;
    /** Set once the selection file is written */
    file?: string;
    persistError?: PersistenceFailure;
}

export async function runStrategy(config: StrategyConfig, ctx: StrategyContext): Promise<StrategyRun> {
    validateStrategyConfig(config);
    const { name } = config;
    const [base, ...rest] = config.tokensToArb.map(t => t.address);
    if (base === undefined) throw new InputError('no base token', name);

    const paths = enumeratePaths(ctx.graph, {
        base,
        targets: rest,
        include1hop: config.include1hop,
        include2hop: config.include2hop,
        bridges: ctx.bridges,
    });
    const report = pricePaths(paths, ctx.amountIn, ctx.graph.pools, ctx.graph.generation, name);
    const ranked = rankResults(report.results, {
        limit: config.numbersOfBestPaths,
        minProfit: ctx.minProfit,
        restrictTo: ctx.restrictTo,
    });
    const selection = toSelection(name, ranked, ctx.graph.pools, (ctx.now ?? Date.now)());

    const decimals = ctx.tokens[base]?.decimals ?? 0;
    log.info(
        `${name}: ${paths.length} paths, ${report.results.length} priced, ` +
            `${report.discarded.length} discarded, ${ranked.length} selected`
    );
    for (const result of ranked) {
        logPath({
            type: 'SELECT',
            action: describePath(result.path, ctx.tokens),
            strategy: name,
            path: result.path.id,
            profit: result.profit,
            profitBps: result.profitBps,
            impactBps: result.impactBps,
        });
        log.debug(`${name}: +${formatAmount(result.profit, decimals)} on ${formatAmount(result.amountIn, decimals)}`);
    }

    const run: StrategyRun = {
        name,
        enumerated: paths.length,
        priced: report.results.length,
        discarded: report.discarded.length,
        selection,
    };

    try {
        const file = strategyFilePath(ctx.dir, name);
        await writeStrategyFile(file, selection);
        run.file = file;
        ctx.store?.insert(Collection.BestPathsSelected, { name, ...selection });
    } catch (e) {
        if (!(e instanceof PersistenceFailure)) throw e;
        log.error(`${name}: ${describeError(e)}`);
        run.persistError = e;
    }
    return run;
}
