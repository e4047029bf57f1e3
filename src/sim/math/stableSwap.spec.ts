import test from 'node:test';
import assert from 'node:assert/strict';

import { computeD, swapStableSwap } from './stableSwap.js';
import { getAmountOutPure } from './constantProduct.js';
import { FeeMode } from '../../types.js';
import { SOL, TOKEN_X, TOKEN_Y, USDC, stablePool } from '../../test/fixtures.js';

test('stableSwap: invariant of a balanced pool equals the sum of balances', () => {
    assert.equal(computeD([1_000_000n, 1_000_000n], 100n), 2_000_000n);
    assert.equal(computeD([0n, 1_000_000n], 100n), 0n);
});

test('stableSwap: near-peg output beats constant product at equal reserves', () => {
    const pool = stablePool('s', [USDC, TOKEN_X], [1_000_000n, 1_000_000n]);
    const r = swapStableSwap(pool, 0, 1, 100_000n);

    assert.equal(r.amountOut, 99_900n);
    assert.ok(r.amountOut > getAmountOutPure(100_000n, 1_000_000n, 1_000_000n));
    assert.deepEqual(r.pool.reserves, [1_100_000n, 900_100n]);
});

test('stableSwap: output fee applies to the curve output', () => {
    const pool = stablePool('s', [USDC, TOKEN_X], [1_000_000n, 1_000_000n], { feeBps: 4n, feeMode: FeeMode.Output });
    const r = swapStableSwap(pool, 0, 1, 100_000n);
    assert.equal(r.amountOut, 99_860n);
});

test('stableSwap: three-coin pools swap between any pair', () => {
    const pool = stablePool('s3', [USDC, TOKEN_X, TOKEN_Y], [1_000_000n, 1_000_000n, 1_000_000n]);
    const r = swapStableSwap(pool, 0, 2, 100_000n);
    assert.equal(r.amountOut, 99_900n);
    assert.deepEqual(r.pool.reserves, [1_100_000n, 1_000_000n, 900_100n]);
});

test('stableSwap: any empty coin balance gives zero output', () => {
    const pool = stablePool('s', [SOL, USDC, TOKEN_X], [1_000n, 0n, 1_000n]);
    const r = swapStableSwap(pool, 0, 2, 10n);
    assert.equal(r.amountOut, 0n);
    assert.equal(r.pool, pool);
});
