/**
 * Strategy file sink
 *
 * File format: { "value": [ SwapPathSelected, ... ] } with every bigint
 * written as a decimal string. Reading validates the structure and restores
 * the bigints, so a written selection reads back equal.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import type {
    Pool,
    Swap,
    SwapPath,
    SwapPathResult,
    SwapPathSelected,
    SwapQuote,
    VecSwapPathSelected,
} from '../types.js';
import { DEFAULT_FEE_MODE, FeeMode, PoolKind } from '../types.js';
import { PersistenceFailure } from '../errors.js';

// ============================================================================
// ENCODING
// ============================================================================

/** JSON with bigints as decimal strings */
export function encodeJson(value: unknown, space?: number): string {
    return JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v), space);
}

// ============================================================================
// DECODING
// ============================================================================

type Fields = Record<string, unknown>;

export function isRecord(v: unknown): v is Fields {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Structural problem in a decoded document; callers map it to their error class */
export class FormatError extends Error {}

function record(v: unknown, where: string): Fields {
    if (!isRecord(v)) throw new FormatError(`${where}: expected an object`);
    return v;
}

function list(o: Fields, key: string, where: string): unknown[] {
    const v = o[key];
    if (!Array.isArray(v)) throw new FormatError(`${where}.${key}: expected an array`);
    return v;
}

function text(o: Fields, key: string, where: string): string {
    const v = o[key];
    if (typeof v !== 'string') throw new FormatError(`${where}.${key}: expected a string`);
    return v;
}

function int(o: Fields, key: string, where: string): number {
    const v = o[key];
    if (typeof v !== 'number' || !Number.isInteger(v)) throw new FormatError(`${where}.${key}: expected an integer`);
    return v;
}

export function toBigInt(v: unknown, where: string): bigint {
    if (typeof v === 'string' && /^-?\d+$/.test(v)) return BigInt(v);
    if (typeof v === 'number' && Number.isSafeInteger(v)) return BigInt(v);
    throw new FormatError(`${where}: expected an integer string`);
}

function big(o: Fields, key: string, where: string): bigint {
    return toBigInt(o[key], `${where}.${key}`);
}

function decodeSwap(v: unknown, where: string): Swap {
    const o = record(v, where);
    return {
        pool: text(o, 'pool', where),
        dex: text(o, 'dex', where),
        tokenIn: text(o, 'tokenIn', where),
        tokenOut: text(o, 'tokenOut', where),
    };
}

function decodePath(v: unknown, where: string): SwapPath {
    const o = record(v, where);
    const hops = int(o, 'hops', where);
    if (hops !== 1 && hops !== 2) throw new FormatError(`${where}.hops: expected 1 or 2`);
    return {
        id: text(o, 'id', where),
        hops,
        swaps: list(o, 'swaps', where).map((s, i) => decodeSwap(s, `${where}.swaps[${i}]`)),
        ordinal: int(o, 'ordinal', where),
    };
}

function decodeQuote(v: unknown, where: string): SwapQuote {
    const o = record(v, where);
    return {
        pool: text(o, 'pool', where),
        tokenIn: text(o, 'tokenIn', where),
        tokenOut: text(o, 'tokenOut', where),
        amountIn: big(o, 'amountIn', where),
        amountOut: big(o, 'amountOut', where),
        priceImpactBps: int(o, 'priceImpactBps', where),
    };
}

function decodeResult(v: unknown, where: string): SwapPathResult {
    const o = record(v, where);
    return {
        path: decodePath(o.path, `${where}.path`),
        amountIn: big(o, 'amountIn', where),
        amountOut: big(o, 'amountOut', where),
        profit: big(o, 'profit', where),
        profitBps: int(o, 'profitBps', where),
        quotes: list(o, 'quotes', where).map((q, i) => decodeQuote(q, `${where}.quotes[${i}]`)),
        impactBps: int(o, 'impactBps', where),
        generation: int(o, 'generation', where),
    };
}

function poolKindOf(o: Fields, where: string): PoolKind {
    const kind = text(o, 'kind', where);
    switch (kind) {
        case PoolKind.ConstantProduct:
        case PoolKind.StableSwap:
        case PoolKind.ConcentratedLiquidity:
            return kind;
        default:
            throw new FormatError(`${where}.kind: unknown pool kind "${kind}"`);
    }
}

/** Missing feeMode falls back to the default for the pool kind */
function feeModeOf(o: Fields, kind: PoolKind, where: string): FeeMode {
    if (o.feeMode === undefined) return DEFAULT_FEE_MODE[kind];
    const mode = text(o, 'feeMode', where);
    if (mode === FeeMode.Input || mode === FeeMode.Output) return mode;
    throw new FormatError(`${where}.feeMode: unknown fee mode "${mode}"`);
}

export function decodePool(v: unknown, where: string): Pool {
    const o = record(v, where);
    const kind = poolKindOf(o, where);
    const base = {
        id: text(o, 'id', where),
        dex: text(o, 'dex', where),
        tokens: list(o, 'tokens', where).map((t, i) => {
            if (typeof t !== 'string') throw new FormatError(`${where}.tokens[${i}]: expected a string`);
            return t;
        }),
        reserves: list(o, 'reserves', where).map((r, i) => toBigInt(r, `${where}.reserves[${i}]`)),
        feeBps: big(o, 'feeBps', where),
        feeMode: feeModeOf(o, kind, where),
    };
    if (base.tokens.length < 2 || base.tokens.length !== base.reserves.length) {
        throw new FormatError(`${where}: needs two or more tokens, each with a reserve`);
    }

    switch (kind) {
        case PoolKind.ConstantProduct:
            return { kind, ...base };
        case PoolKind.StableSwap:
            return { kind, ...base, amp: big(o, 'amp', where) };
        case PoolKind.ConcentratedLiquidity:
            return {
                kind,
                ...base,
                sqrtPriceX64: big(o, 'sqrtPriceX64', where),
                liquidity: big(o, 'liquidity', where),
            };
    }
}

function decodeSelected(v: unknown, where: string): SwapPathSelected {
    const o = record(v, where);
    return {
        strategy: text(o, 'strategy', where),
        selectedAt: int(o, 'selectedAt', where),
        result: decodeResult(o.result, `${where}.result`),
        pools: list(o, 'pools', where).map((p, i) => decodePool(p, `${where}.pools[${i}]`)),
    };
}

/** Validate parsed JSON as a selection; throws PersistenceFailure naming the bad field */
export function decodeSelection(json: unknown, source = 'selection'): VecSwapPathSelected {
    try {
        const o = record(json, 'root');
        return { value: list(o, 'value', 'root').map((s, i) => decodeSelected(s, `value[${i}]`)) };
    } catch (e) {
        if (e instanceof FormatError) throw new PersistenceFailure(`malformed strategy: ${e.message}`, source, e);
        throw e;
    }
}

// ============================================================================
// FILE I/O
// ============================================================================

export function strategyFilePath(dir: string, name: string): string {
    return path.join(dir, `${name}.json`);
}

export async function writeStrategyFile(file: string, selection: VecSwapPathSelected): Promise<void> {
    try {
        await fs.mkdir(path.dirname(file), { recursive: true });
        await fs.writeFile(file, encodeJson(selection, 2) + '\n', 'utf8');
    } catch (e) {
        throw new PersistenceFailure('could not write strategy file', file, e);
    }
}

export async function readStrategyFile(file: string): Promise<VecSwapPathSelected> {
    let raw: string;
    try {
        raw = await fs.readFile(file, 'utf8');
    } catch (e) {
        throw new PersistenceFailure('could not read strategy file', file, e);
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (e) {
        throw new PersistenceFailure('strategy file is not JSON', file, e);
    }
    return decodeSelection(json, file);
}
