/**
 * Core type definitions for the cycle arbitrage pipeline
 * These interfaces define module boundaries between the pipeline stages
 */

// ============================================================================
// POOL KINDS
// ============================================================================

export const PoolKind = {
    ConstantProduct: 'constant-product',
    StableSwap: 'stable-swap',
    ConcentratedLiquidity: 'concentrated-liquidity',
} as const;

export type PoolKind = (typeof PoolKind)[keyof typeof PoolKind];

/**
 * Where a venue takes its fee.
 * - input: fee deducted from amountIn before the curve
 * - output: fee deducted from the curve output
 */
export const FeeMode = {
    Input: 'input',
    Output: 'output',
} as const;

export type FeeMode = (typeof FeeMode)[keyof typeof FeeMode];

/** Default fee placement per pool kind, used when a pool record does not say */
export const DEFAULT_FEE_MODE: Record<PoolKind, FeeMode> = {
    [PoolKind.ConstantProduct]: FeeMode.Input,
    [PoolKind.StableSwap]: FeeMode.Output,
    [PoolKind.ConcentratedLiquidity]: FeeMode.Input,
};

// ============================================================================
// TOKENS
// ============================================================================

export interface Token {
    address: string;
    symbol: string;
    decimals: number;
}

/** Token metadata keyed by address, resolved once per run */
export type TokenInfos = Readonly<Record<string, Readonly<Token>>>;

// ============================================================================
// POOL STATE
// ============================================================================

interface PoolBase {
    /** Pool account address */
    id: string;
    /** Venue label (raydium, orca, meteora, ...) */
    dex: string;
    /** Token mints held by the pool; reserves[i] belongs to tokens[i] */
    tokens: readonly string[];
    reserves: readonly bigint[];
    feeBps: bigint;
    feeMode: FeeMode;
}

export interface ConstantProductPool extends PoolBase {
    kind: typeof PoolKind.ConstantProduct;
}

export interface StableSwapPool extends PoolBase {
    kind: typeof PoolKind.StableSwap;
    /** Amplification coefficient */
    amp: bigint;
}

export interface ConcentratedLiquidityPool extends PoolBase {
    kind: typeof PoolKind.ConcentratedLiquidity;
    /** Q64.64 sqrt(price of tokens[0] in tokens[1]) */
    sqrtPriceX64: bigint;
    /** Active liquidity of the current range */
    liquidity: bigint;
}

export type Pool = ConstantProductPool | StableSwapPool | ConcentratedLiquidityPool;

// ============================================================================
// PATHS
// ============================================================================

/** One swap through one pool */
export interface Swap {
    pool: string;
    dex: string;
    tokenIn: string;
    tokenOut: string;
}

/**
 * Cycle starting and ending at the base token.
 * hops = number of intermediate tokens: 1 → two swaps, 2 → three swaps.
 */
export interface SwapPath {
    id: string;
    hops: 1 | 2;
    swaps: readonly Swap[];
    /** Position in enumeration order; last tie-breaker when ranking */
    ordinal: number;
}

export interface SwapQuote {
    pool: string;
    tokenIn: string;
    tokenOut: string;
    amountIn: bigint;
    amountOut: bigint;
    priceImpactBps: number;
}

export interface SwapPathResult {
    path: SwapPath;
    amountIn: bigint;
    amountOut: bigint;
    /** amountOut - amountIn, denominated in the base token */
    profit: bigint;
    profitBps: number;
    quotes: readonly SwapQuote[];
    /** Sum of per-swap price impact */
    impactBps: number;
    /** Generation of the reserve snapshot this result was computed from */
    generation: number;
}

/** One selected path, tagged with the strategy that selected it */
export interface SwapPathSelected {
    strategy: string;
    selectedAt: number;
    result: SwapPathResult;
    /** Pool snapshots the result was priced against */
    pools: readonly Pool[];
}

export interface VecSwapPathSelected {
    value: SwapPathSelected[];
}

// ============================================================================
// CONFIGURATION RECORDS
// ============================================================================

export interface TokenInArb {
    address: string;
    symbol: string;
}

export interface InputVec {
    /** First entry is the base token */
    tokensToArb: readonly TokenInArb[];
    include1hop: boolean;
    include2hop: boolean;
    numbersOfBestPaths: number;
    getFreshPools: boolean;
}

// ============================================================================
// LIVE FEED
// ============================================================================

export interface QuoteUpdate {
    pool: string;
    /** Aligned with the pool's token order */
    reserves: bigint[];
    sqrtPriceX64?: bigint;
    liquidity?: bigint;
    slot?: number;
    receivedAtMs: number;
    source: 'text' | 'binary';
}

// ============================================================================
// HELPERS
// ============================================================================

export const U64_MAX = (1n << 64n) - 1n;
export const U128_MAX = (1n << 128n) - 1n;

/** Index of a token in a pool, -1 if absent */
export function tokenIndex(pool: Pool, token: string): number {
    return pool.tokens.indexOf(token);
}

/** Short form of an address for log lines */
export function shortAddr(address: string): string {
    return address.length > 12 ? `${address.slice(0, 4)}..${address.slice(-4)}` : address;
}
