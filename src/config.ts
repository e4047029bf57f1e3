// src/config.ts
// Process configuration (.env) and session configuration (token sets per run)
//
// Both are plain values handed to constructors; nothing here is global.

import dotenv from "dotenv";
import { PublicKey } from "@solana/web3.js";

import type { InputVec, TokenInArb } from "./types.js";
import { InputError } from "./errors.js";
import { ExecutionMode } from "./execute/handoff.js";
import { isRecord } from "./io/strategyFile.js";

// ============================================================================
// ENVIRONMENT
// ============================================================================

export interface EnvConfig {
    rpcUrl?: string;
    feedUrl?: string;
    dbPath: string;
    poolsFile: string;
    sessionFile: string;
    strategyDir: string;
    /** Persisted selection to monitor directly; the session is skipped when set */
    strategyFile?: string;
    /** Input of every simulated path, base units (3.5 SOL by default) */
    simulationAmount: bigint;
    minProfit: bigint;
    maxImpactBps: number;
    freshnessMs: number;
    slippageBps: number;
    executionMode: ExecutionMode;
    /** How long the monitor runs; 0 runs until interrupted */
    monitorMs: number;
    debug: boolean;
}

export const ENV_DEFAULTS = {
    dbPath: "data/cyclearb.db",
    poolsFile: "data/pools.json",
    sessionFile: "config/session.json",
    strategyDir: "best_paths_selected",
    simulationAmount: 3_500_000_000n,
    minProfit: 1n,
    maxImpactBps: 300,
    freshnessMs: 10_000,
    slippageBps: 50,
    executionMode: ExecutionMode.Simulate,
    monitorMs: 0,
} as const;

type Env = Readonly<Record<string, string | undefined>>;

function envBigInt(env: Env, key: string, fallback: bigint): bigint {
    const raw = env[key]?.trim();
    if (!raw) return fallback;
    if (!/^\d+$/.test(raw)) throw new InputError(`${key} must be a non-negative integer, got "${raw}"`);
    return BigInt(raw);
}

function envInt(env: Env, key: string, fallback: number): number {
    const raw = env[key]?.trim();
    if (!raw) return fallback;
    const n = Number(raw);
    if (!Number.isSafeInteger(n) || n < 0) throw new InputError(`${key} must be a non-negative integer, got "${raw}"`);
    return n;
}

function envMode(env: Env): ExecutionMode {
    const raw = env.EXECUTION_MODE?.trim();
    if (!raw) return ENV_DEFAULTS.executionMode;
    if (raw === ExecutionMode.Simulate || raw === ExecutionMode.Send) return raw;
    throw new InputError(`EXECUTION_MODE must be "simulate" or "send", got "${raw}"`);
}

/** Reads configuration from an environment map; pure */
export function readEnvConfig(env: Env): EnvConfig {
    const slippageBps = envInt(env, "SLIPPAGE_BPS", ENV_DEFAULTS.slippageBps);
    if (slippageBps >= 10_000) throw new InputError(`SLIPPAGE_BPS must be below 10000, got ${slippageBps}`);

    return {
        rpcUrl: env.RPC_URL || undefined,
        feedUrl: env.FEED_URL || undefined,
        dbPath: env.DB_PATH || ENV_DEFAULTS.dbPath,
        poolsFile: env.POOLS_FILE || ENV_DEFAULTS.poolsFile,
        sessionFile: env.SESSION_FILE || ENV_DEFAULTS.sessionFile,
        strategyDir: env.STRATEGY_DIR || ENV_DEFAULTS.strategyDir,
        strategyFile: env.STRATEGY_FILE || undefined,
        simulationAmount: envBigInt(env, "SIMULATION_AMOUNT", ENV_DEFAULTS.simulationAmount),
        minProfit: envBigInt(env, "MIN_PROFIT", ENV_DEFAULTS.minProfit),
        maxImpactBps: envInt(env, "MAX_IMPACT_BPS", ENV_DEFAULTS.maxImpactBps),
        freshnessMs: envInt(env, "FRESHNESS_MS", ENV_DEFAULTS.freshnessMs),
        slippageBps,
        executionMode: envMode(env),
        monitorMs: envInt(env, "MONITOR_MS", ENV_DEFAULTS.monitorMs),
        debug: env.DEBUG === "1",
    };
}

/** Loads .env into process.env, then reads it */
export function loadEnvConfig(dotenvPath?: string): EnvConfig {
    dotenv.config(dotenvPath ? { path: dotenvPath } : undefined);
    return readEnvConfig(process.env);
}

// ============================================================================
// SESSION
// ============================================================================

export interface StrategyConfig extends InputVec {
    /** Strategy name; file name of its selection */
    name: string;
}

export interface SessionConfig {
    runs: StrategyConfig[];
    /** Extra 2-hop intermediates shared by all runs (e.g. USDC) */
    bridges: string[];
    /** Allow-list for 2-hop intermediates; unrestricted when absent */
    restrictTo?: string[];
}

function addressList(v: unknown, where: string): string[] {
    if (v === undefined) return [];
    if (!Array.isArray(v) || !v.every((a): a is string => typeof a === "string")) {
        throw new InputError(`${where} must be a list of addresses`);
    }
    return v;
}

function parseToken(v: unknown, where: string): TokenInArb {
    if (!isRecord(v) || typeof v.address !== "string" || typeof v.symbol !== "string") {
        throw new InputError(`${where} must be { address, symbol }`);
    }
    return { address: v.address, symbol: v.symbol };
}

function flag(o: Record<string, unknown>, key: string, fallback: boolean, where: string): boolean {
    const v = o[key];
    if (v === undefined) return fallback;
    if (typeof v !== "boolean") throw new InputError(`${where}.${key} must be a boolean`);
    return v;
}

function parseRun(v: unknown, i: number): StrategyConfig {
    const where = `runs[${i}]`;
    if (!isRecord(v)) throw new InputError(`${where} must be an object`);
    if (!Array.isArray(v.tokensToArb)) throw new InputError(`${where}.tokensToArb must be a list`);

    const tokensToArb = v.tokensToArb.map((t, j) => parseToken(t, `${where}.tokensToArb[${j}]`));
    const k = v.numbersOfBestPaths;
    if (typeof k !== "number") throw new InputError(`${where}.numbersOfBestPaths must be a number`);
    const name = typeof v.name === "string" && v.name.length > 0 ? v.name : tokensToArb.map(t => t.symbol).join("-");

    return {
        name,
        tokensToArb,
        include1hop: flag(v, "include1hop", true, where),
        include2hop: flag(v, "include2hop", false, where),
        numbersOfBestPaths: k,
        getFreshPools: flag(v, "getFreshPools", false, where),
    };
}

export function isValidAddress(address: string): boolean {
    try {
        return new PublicKey(address).toBase58() === address;
    } catch {
        return false;
    }
}

/**
 * Semantic checks of one run. Failing them is fatal for that run only,
 * so the session parser leaves them to the run.
 */
export function validateStrategyConfig(config: StrategyConfig): void {
    const ctx = config.name;
    if (config.tokensToArb.length < 2) {
        throw new InputError("tokensToArb needs a base token and at least one target", ctx);
    }
    for (const t of config.tokensToArb) {
        if (!isValidAddress(t.address)) throw new InputError(`invalid token address "${t.address}"`, ctx);
    }
    if (!config.include1hop && !config.include2hop) {
        throw new InputError("both include1hop and include2hop are off", ctx);
    }
    if (!Number.isInteger(config.numbersOfBestPaths) || config.numbersOfBestPaths < 1) {
        throw new InputError(`numbersOfBestPaths must be a positive integer, got ${config.numbersOfBestPaths}`, ctx);
    }
}

/**
 * Session file:
 *   { "runs": [{ "name"?, "tokensToArb": [{ "address", "symbol" }], "include1hop",
 *       "include2hop", "numbersOfBestPaths", "getFreshPools" }], "bridges"?, "restrictTo"? }
 */
export function parseSessionConfig(json: unknown): SessionConfig {
    if (!isRecord(json)) throw new InputError("session config must be an object");
    if (!Array.isArray(json.runs) || json.runs.length === 0) {
        throw new InputError("session config needs at least one run");
    }

    const runs = json.runs.map(parseRun);
    const names = new Set<string>();
    for (const run of runs) {
        if (names.has(run.name)) throw new InputError(`duplicate strategy name "${run.name}"`);
        names.add(run.name);
    }

    const bridges = addressList(json.bridges, "bridges");
    for (const b of bridges) {
        if (!isValidAddress(b)) throw new InputError(`invalid bridge address "${b}"`);
    }

    const session: SessionConfig = { runs, bridges };
    if (json.restrictTo !== undefined) session.restrictTo = addressList(json.restrictTo, "restrictTo");
    return session;
}
