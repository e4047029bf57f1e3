import test from 'node:test';
import assert from 'node:assert/strict';

import { getAmountOutPure, swapConstantProduct, validateInvariant } from './constantProduct.js';
import { applyFee } from './fees.js';
import { NumericOverflowError } from '../../errors.js';
import { FeeMode, U64_MAX } from '../../types.js';
import { SOL, TOKEN_X, cpPool } from '../../test/fixtures.js';

test('constantProduct: pure curve output', () => {
    assert.equal(getAmountOutPure(1_000_000n, 1_000_000n, 1_000_000n), 500_000n);
    assert.equal(getAmountOutPure(0n, 1n, 1n), 0n);
    assert.equal(getAmountOutPure(5n, 0n, 1n), 0n);
});

test('constantProduct: input fee is deducted before the curve and stays in the pool', () => {
    const pool = cpPool('p', SOL, 3_000_000n, TOKEN_X, 9_000_000n, { feeBps: 25n });
    const amountIn = 555_555n;

    const net = (amountIn * 9_975n) / 10_000n;
    const expectedOut = (9_000_000n * net) / (3_000_000n + net);

    const r = swapConstantProduct(pool, 0, 1, amountIn);
    assert.equal(r.amountOut, expectedOut);
    assert.deepEqual(r.pool.reserves, [3_000_000n + amountIn, 9_000_000n - expectedOut]);
    assert.ok(validateInvariant(3_000_000n, 9_000_000n, r.pool.reserves[0] ?? 0n, r.pool.reserves[1] ?? 0n));
});

test('constantProduct: output fee is deducted after the curve and the full input is credited', () => {
    const pool = cpPool('p', SOL, 3_000_000n, TOKEN_X, 9_000_000n, { feeBps: 25n, feeMode: FeeMode.Output });
    const amountIn = 555_555n;

    const gross = (9_000_000n * amountIn) / (3_000_000n + amountIn);
    const expectedOut = applyFee(gross, 25n);

    const r = swapConstantProduct(pool, 0, 1, amountIn);
    assert.equal(r.amountOut, expectedOut);
    assert.deepEqual(r.pool.reserves, [3_000_000n + amountIn, 9_000_000n - expectedOut]);
});

test('constantProduct: zero reserve on the needed side gives zero output, not an error', () => {
    const pool = cpPool('p', SOL, 1_000n, TOKEN_X, 0n);
    const r = swapConstantProduct(pool, 0, 1, 500n);
    assert.equal(r.amountOut, 0n);
    assert.equal(r.pool, pool);
});

test('constantProduct: k never falls across a swap', () => {
    assert.ok(validateInvariant(10n, 10n, 11n, 10n));
    assert.ok(validateInvariant(10n, 10n, 20n, 5n));
    assert.ok(!validateInvariant(10n, 10n, 20n, 4n));

    for (const feeMode of [FeeMode.Input, FeeMode.Output]) {
        const pool = cpPool('p', SOL, 7_777n, TOKEN_X, 3_333n, { feeBps: 30n, feeMode });
        const r = swapConstantProduct(pool, 1, 0, 1_234n);
        const [x, y] = r.pool.reserves;
        assert.ok((x ?? 0n) * (y ?? 0n) > 7_777n * 3_333n);
    }
});

test('constantProduct: amounts beyond u64 raise NumericOverflowError', () => {
    const pool = cpPool('p', SOL, 1_000n, TOKEN_X, 1_000n);
    assert.throws(() => swapConstantProduct(pool, 0, 1, U64_MAX + 1n), NumericOverflowError);

    const full = cpPool('q', SOL, U64_MAX - 10n, TOKEN_X, U64_MAX - 10n);
    assert.throws(() => swapConstantProduct(full, 0, 1, 1_000n), NumericOverflowError);
});

test('constantProduct: swapping does not mutate the input pool', () => {
    const pool = cpPool('p', SOL, 1_000_000n, TOKEN_X, 1_000_000n);
    swapConstantProduct(pool, 0, 1, 1_000_000n);
    assert.deepEqual(pool.reserves, [1_000_000n, 1_000_000n]);
});
