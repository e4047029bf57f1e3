#!/usr/bin/env node
// src/index.ts - ENTRY POINT
// pools → graph → concurrent strategy runs → merged strategy → live monitor → handoff
//
// RUN: POOLS_FILE=data/pools.json FEED_URL=ws://localhost:8080 npm start
//      STRATEGY_FILE=best_paths_selected/SOL-TOKEN_X.json FEED_URL=ws://localhost:8080 npm start

import * as fs from "node:fs/promises";
import { Connection } from "@solana/web3.js";

import { loadEnvConfig, parseSessionConfig, type EnvConfig } from "./config.js";
import { InputError, describeError } from "./errors.js";
import { JsonPoolLoader, VaultReserveSource } from "./io/poolLoader.js";
import { RpcTokenInfoProvider, StaticTokenInfoProvider, type TokenInfoProvider } from "./io/tokenInfo.js";
import { SqliteDocumentStore } from "./io/documentStore.js";
import { readStrategyFile } from "./io/strategyFile.js";
import { runSession } from "./pipeline/session.js";
import { runLive } from "./pipeline/live.js";
import { DryRunTransactionBuilder } from "./execute/handoff.js";
import { formatAmount } from "./utils/amounts.js";
import logger, { setDebug } from "./utils/logger.js";
import type { VecSwapPathSelected } from "./types.js";

async function readSession(file: string) {
    let raw: string;
    try {
        raw = await fs.readFile(file, "utf8");
    } catch (e) {
        throw new InputError(`session config unreadable: ${describeError(e)}`, file);
    }
    try {
        return parseSessionConfig(JSON.parse(raw));
    } catch (e) {
        if (e instanceof SyntaxError) throw new InputError("session config is not JSON", file);
        throw e;
    }
}

async function tokenInfoFor(env: EnvConfig, loader: JsonPoolLoader, symbols: Record<string, string>): Promise<TokenInfoProvider> {
    if (env.rpcUrl) return new RpcTokenInfoProvider(new Connection(env.rpcUrl, "confirmed"), symbols);
    const { tokens } = await loader.read();
    return new StaticTokenInfoProvider(tokens);
}

async function monitor(env: EnvConfig, selection: VecSwapPathSelected): Promise<void> {
    if (!env.feedUrl) {
        logger.warn("FEED_URL not set; skipping live monitoring");
        return;
    }

    const controller = new AbortController();
    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down...`);
        controller.abort();
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
    const timer = env.monitorMs > 0 ? setTimeout(() => shutdown("MONITOR_MS"), env.monitorMs) : undefined;

    try {
        await runLive(
            selection,
            new DryRunTransactionBuilder(),
            {
                feedUrl: env.feedUrl,
                monitor: {
                    amountIn: env.simulationAmount,
                    minProfit: env.minProfit,
                    maxImpactBps: env.maxImpactBps,
                    freshnessMs: env.freshnessMs,
                },
                handoff: { mode: env.executionMode, slippageBps: env.slippageBps },
            },
            controller.signal
        );
    } finally {
        clearTimeout(timer);
    }
}

async function main(): Promise<void> {
    const env = loadEnvConfig();
    setDebug(env.debug);
    logger.info("═══════════════════════════════════════════════════════════════");
    logger.info(`Pools: ${env.poolsFile}  Session: ${env.strategyFile ? "skipped" : env.sessionFile}`);
    logger.info(`Simulation amount: ${formatAmount(env.simulationAmount, 9)} (base 9 decimals)`);
    logger.info(`Feed: ${env.feedUrl ?? "none"}  Mode: ${env.executionMode}`);
    logger.info("═══════════════════════════════════════════════════════════════");

    if (env.strategyFile) {
        const selection = await readStrategyFile(env.strategyFile);
        logger.info(`strategy file ${env.strategyFile}: ${selection.value.length} paths`);
        await monitor(env, selection);
        return;
    }

    const session = await readSession(env.sessionFile);
    const symbols: Record<string, string> = {};
    for (const run of session.runs) {
        for (const t of run.tokensToArb) symbols[t.address] = t.symbol;
    }

    const reserveSource = env.rpcUrl ? new VaultReserveSource(new Connection(env.rpcUrl, "confirmed")) : undefined;
    const loader = new JsonPoolLoader(env.poolsFile, reserveSource);
    const store = new SqliteDocumentStore(env.dbPath);

    try {
        const outcome = await runSession(
            session,
            { loader, tokenInfo: await tokenInfoFor(env, loader, symbols), store },
            { amountIn: env.simulationAmount, minProfit: env.minProfit, strategyDir: env.strategyDir }
        );

        const failed = outcome.runs.filter(r => r.status === "rejected").length;
        logger.info(`session done: ${outcome.runs.length - failed}/${outcome.runs.length} runs succeeded`);
        if (!outcome.strategy) return;
        logger.info(`strategy ${outcome.strategy.name}: ${outcome.strategy.selection.value.length} paths`);

        await monitor(env, outcome.strategy.selection);
    } finally {
        store.close();
    }
}

main().catch((err: unknown) => {
    logger.error("Fatal error:", describeError(err));
    process.exit(1);
});
