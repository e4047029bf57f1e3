/**
 * Execution Handoff
 *
 * Re-validates a profitable path at the moment of submission and forwards it
 * to the transaction builder. Classification and submission are not atomic,
 * so every submit re-prices first. Rejections and builder failures are
 * reported to the caller and never retried here.
 */

import type { SwapPath } from '../types.js';
import { describeError } from '../errors.js';
import { createLogger, logPath } from '../utils/logger.js';
import { PathState, type OpportunityMonitor } from '../monitor/monitor.js';

const log = createLogger('handoff');

export const ExecutionMode = {
    Simulate: 'simulate',
    Send: 'send',
} as const;

export type ExecutionMode = (typeof ExecutionMode)[keyof typeof ExecutionMode];

export interface ExecutionRequest {
    pathId: string;
    strategy: string;
    path: SwapPath;
    amountIn: bigint;
    expectedOut: bigint;
    /** expectedOut less slippage; the builder must not accept less */
    minAmountOut: bigint;
    mode: ExecutionMode;
    /** Snapshot generation the request was priced against */
    generation: number;
    createdAtMs: number;
}

export interface TransactionResult {
    simulated: boolean;
    signature?: string;
    logs?: string[];
}

/** Assembles, signs and submits; owns keys and on-chain mechanics */
export interface TransactionBuilder {
    execute(request: ExecutionRequest): Promise<TransactionResult>;
}

export type HandoffOutcome =
    | { status: 'accepted'; request: ExecutionRequest; result: TransactionResult }
    | { status: 'rejected'; pathId: string; reason: string }
    | { status: 'failed'; pathId: string; request: ExecutionRequest; error: string };

export interface HandoffOptions {
    mode: ExecutionMode;
    slippageBps: number;
    now?: () => number;
}

export class ExecutionHandoff {
    private readonly now: () => number;

    constructor(
        private readonly monitor: OpportunityMonitor,
        private readonly builder: TransactionBuilder,
        private readonly options: HandoffOptions
    ) {
        if (!Number.isInteger(options.slippageBps) || options.slippageBps < 0 || options.slippageBps >= 10_000) {
            throw new RangeError(`slippageBps must be an integer in [0, 10000), got ${options.slippageBps}`);
        }
        this.now = options.now ?? Date.now;
    }

    async submit(pathId: string): Promise<HandoffOutcome> {
        const before = this.monitor.entry(pathId);
        if (!before) return this.reject(pathId, 'unknown path');
        if (before.state !== PathState.Profitable) return this.reject(pathId, `path is ${before.state}`);

        // Prices may have moved since classification
        const entry = this.monitor.reprice(pathId);
        if (!entry?.result || entry.state !== PathState.Profitable) {
            return this.reject(pathId, entry?.reason ?? `path is ${entry?.state ?? 'gone'}`);
        }

        const { result } = entry;
        const { minProfit } = this.monitor.thresholds;
        const minAmountOut = (result.amountOut * BigInt(10_000 - this.options.slippageBps)) / 10_000n;
        if (minAmountOut - result.amountIn <= minProfit) {
            return this.reject(
                pathId,
                `profit does not survive ${this.options.slippageBps}bps slippage (min out ${minAmountOut})`
            );
        }

        const request: ExecutionRequest = {
            pathId,
            strategy: entry.strategy,
            path: entry.path,
            amountIn: result.amountIn,
            expectedOut: result.amountOut,
            minAmountOut,
            mode: this.options.mode,
            generation: result.generation,
            createdAtMs: this.now(),
        };

        try {
            const txResult = await this.builder.execute(request);
            logPath({
                type: 'HANDOFF',
                action: txResult.simulated ? 'simulated' : 'sent',
                strategy: entry.strategy,
                path: pathId,
                profit: result.profit,
                profitBps: result.profitBps,
                impactBps: result.impactBps,
            });
            return { status: 'accepted', request, result: txResult };
        } catch (e) {
            const error = describeError(e);
            log.error(`builder failed for ${pathId}: ${error}`);
            return { status: 'failed', pathId, request, error };
        }
    }

    private reject(pathId: string, reason: string): HandoffOutcome {
        logPath({ type: 'HANDOFF', action: 'rejected', path: pathId, reason });
        return { status: 'rejected', pathId, reason };
    }
}

/** Records requests and reports them simulated; nothing leaves the process */
export class DryRunTransactionBuilder implements TransactionBuilder {
    readonly requests: ExecutionRequest[] = [];

    async execute(request: ExecutionRequest): Promise<TransactionResult> {
        this.requests.push(request);
        return {
            simulated: true,
            signature: `dry-run-${this.requests.length}`,
            logs: [`${request.mode} ${request.pathId} in=${request.amountIn} minOut=${request.minAmountOut}`],
        };
    }
}
