import test from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { decodeSelection, encodeJson, readStrategyFile, strategyFilePath, writeStrategyFile } from './strategyFile.js';
import { PersistenceFailure } from '../errors.js';
import { PoolKind } from '../types.js';
import { sampleSelection } from '../test/fixtures.js';

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cyclearb-file-'));
    try {
        await fn(dir);
    } finally {
        await fs.rm(dir, { recursive: true, force: true });
    }
}

test('a selection written to file reads back equal', () =>
    withTempDir(async dir => {
        const selection = sampleSelection('SOL-TOKEN_X', 3);
        const file = strategyFilePath(dir, 'SOL-TOKEN_X');
        await writeStrategyFile(file, selection);

        const back = await readStrategyFile(file);
        assert.deepEqual(back, selection);
        assert.deepEqual(
            back.value[0]?.pools.map(p => p.kind),
            [PoolKind.ConstantProduct, PoolKind.ConcentratedLiquidity, PoolKind.StableSwap]
        );
    }));

test('bigints are stored as decimal strings under "value"', () =>
    withTempDir(async dir => {
        const file = path.join(dir, 'nested', 's.json');
        await writeStrategyFile(file, sampleSelection('s', 1));

        const raw: unknown = JSON.parse(await fs.readFile(file, 'utf8'));
        const selection = decodeSelection(raw);
        const first = selection.value[0];
        assert.ok(first);
        assert.match(encodeJson({ n: first.result.profit }), /^\{"n":"-?\d+"\}$/);
        assert.ok(/"sqrtPriceX64": "13043817825332782212"/.test(await fs.readFile(file, 'utf8')));
    }));

test('negative profits survive the round trip', () => {
    const selection = sampleSelection('s', 1);
    const record = selection.value[0];
    assert.ok(record);
    const losing = { value: [{ ...record, result: { ...record.result, profit: -42n } }] };
    assert.equal(decodeSelection(JSON.parse(encodeJson(losing))).value[0]?.result.profit, -42n);
});

test('malformed documents raise PersistenceFailure naming the field', () => {
    assert.throws(() => decodeSelection({ value: [{}] }), (e: unknown) => {
        assert.ok(e instanceof PersistenceFailure);
        assert.match(e.message, /value\[0\]\.strategy/);
        return true;
    });
    assert.throws(() => decodeSelection([]), PersistenceFailure);

    const threeHops = encodeJson(sampleSelection('s', 1)).replace('"hops":1', '"hops":3');
    assert.throws(() => decodeSelection(JSON.parse(threeHops)), /hops: expected 1 or 2/);
});

test('unreadable or non-JSON files raise PersistenceFailure', () =>
    withTempDir(async dir => {
        await assert.rejects(readStrategyFile(path.join(dir, 'missing.json')), PersistenceFailure);
        const bad = path.join(dir, 'bad.json');
        await fs.writeFile(bad, '{ nope');
        await assert.rejects(readStrategyFile(bad), PersistenceFailure);
    }));
