/**
 * Shared pool and token builders for spec files
 */

import {
    FeeMode,
    PoolKind,
    type ConcentratedLiquidityPool,
    type ConstantProductPool,
    type Pool,
    type StableSwapPool,
    type SwapPath,
    type TokenInfos,
    type VecSwapPathSelected,
} from '../types.js';
import { pathId } from '../paths/enumerator.js';
import { pricePath } from '../sim/engine.js';

export const SOL = 'So11111111111111111111111111111111111111112';
export const USDC = 'EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v';
export const TOKEN_X = 'XoXo111111111111111111111111111111111111111';
export const TOKEN_Y = 'YyYy111111111111111111111111111111111111111';

export const TOKEN_INFOS: TokenInfos = Object.freeze({
    [SOL]: { address: SOL, symbol: 'SOL', decimals: 9 },
    [USDC]: { address: USDC, symbol: 'USDC', decimals: 6 },
    [TOKEN_X]: { address: TOKEN_X, symbol: 'TOKEN_X', decimals: 6 },
    [TOKEN_Y]: { address: TOKEN_Y, symbol: 'TOKEN_Y', decimals: 6 },
});

export function cpPool(
    id: string,
    tokenA: string,
    reserveA: bigint,
    tokenB: string,
    reserveB: bigint,
    overrides: Partial<ConstantProductPool> = {}
): ConstantProductPool {
    return {
        kind: PoolKind.ConstantProduct,
        id,
        dex: 'raydium',
        tokens: [tokenA, tokenB],
        reserves: [reserveA, reserveB],
        feeBps: 0n,
        feeMode: FeeMode.Input,
        ...overrides,
    };
}

export function stablePool(
    id: string,
    tokens: string[],
    reserves: bigint[],
    overrides: Partial<StableSwapPool> = {}
): StableSwapPool {
    return {
        kind: PoolKind.StableSwap,
        id,
        dex: 'saber',
        tokens,
        reserves,
        feeBps: 0n,
        feeMode: FeeMode.Output,
        amp: 100n,
        ...overrides,
    };
}

export function clmmPool(
    id: string,
    token0: string,
    reserve0: bigint,
    token1: string,
    reserve1: bigint,
    overrides: Partial<ConcentratedLiquidityPool> = {}
): ConcentratedLiquidityPool {
    return {
        kind: PoolKind.ConcentratedLiquidity,
        id,
        dex: 'orca',
        tokens: [token0, token1],
        reserves: [reserve0, reserve1],
        feeBps: 0n,
        feeMode: FeeMode.Input,
        // price 1.0
        sqrtPriceX64: 1n << 64n,
        liquidity: 1_000_000n,
        ...overrides,
    };
}

/**
 * Selection of `count` records for one strategy: SOL → TOKEN_X on a
 * constant-product pool, back to SOL on a CLMM pool, at growing input sizes.
 * A stable pool rides along so every pool kind is represented.
 */
export function sampleSelection(strategy: string, count: number, selectedAt = 1_700_000_000_000): VecSwapPathSelected {
    const pools: Pool[] = [
        cpPool(`${strategy}-cp`, SOL, 1_000_000_000n, TOKEN_X, 2_000_000_000n, { feeBps: 25n }),
        clmmPool(`${strategy}-clmm`, TOKEN_X, 2_000_000_000n, SOL, 1_000_000_000n, {
            feeBps: 30n,
            liquidity: 1_414_213_562n,
            sqrtPriceX64: 13_043_817_825_332_782_212n,
        }),
        stablePool(`${strategy}-stable`, [USDC, TOKEN_Y], [5_000_000n, 5_000_000n], { feeBps: 4n }),
    ];
    const swaps = [
        { pool: `${strategy}-cp`, dex: 'raydium', tokenIn: SOL, tokenOut: TOKEN_X },
        { pool: `${strategy}-clmm`, dex: 'orca', tokenIn: TOKEN_X, tokenOut: SOL },
    ];
    const byId = new Map(pools.map(p => [p.id, p]));

    return {
        value: Array.from({ length: count }, (_, i) => {
            const path: SwapPath = { id: `${pathId(swaps)}#${i}`, hops: 1, swaps, ordinal: i };
            return { strategy, selectedAt, result: pricePath(path, 1_000_000n * BigInt(i + 1), byId, 1), pools };
        }),
    };
}
