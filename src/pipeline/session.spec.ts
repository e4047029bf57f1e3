import test from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { runSession, type SessionOptions } from './session.js';
import type { PoolLoader } from '../io/poolLoader.js';
import { StaticTokenInfoProvider } from '../io/tokenInfo.js';
import { Collection, SqliteDocumentStore } from '../io/documentStore.js';
import { readStrategyFile } from '../io/strategyFile.js';
import type { SessionConfig, StrategyConfig } from '../config.js';
import type { Pool } from '../types.js';
import { SOL, TOKEN_INFOS, TOKEN_X, TOKEN_Y, USDC, cpPool } from '../test/fixtures.js';

const POOLS: Pool[] = [
    cpPool('x-a', SOL, 1_000_000_000_000n, TOKEN_X, 1_000_000_000_000n, { feeBps: 25n }),
    cpPool('x-b', SOL, 1_000_000_000_000n, TOKEN_X, 900_000_000_000n, { feeBps: 25n }),
    cpPool('x-c', SOL, 1_000_000_000_000n, TOKEN_X, 800_000_000_000n, { feeBps: 25n }),
    cpPool('y-a', SOL, 1_000_000_000_000n, TOKEN_Y, 1_000_000_000_000n, { feeBps: 25n }),
    cpPool('y-b', SOL, 1_000_000_000_000n, TOKEN_Y, 800_000_000_000n, { feeBps: 25n }),
];

function run(symbol: 'TOKEN_X' | 'TOKEN_Y', k: number, patch: Partial<StrategyConfig> = {}): StrategyConfig {
    const address = symbol === 'TOKEN_X' ? TOKEN_X : TOKEN_Y;
    return {
        name: `SOL-${symbol}`,
        tokensToArb: [
            { address: SOL, symbol: 'SOL' },
            { address, symbol },
        ],
        include1hop: true,
        include2hop: false,
        numbersOfBestPaths: k,
        getFreshPools: false,
        ...patch,
    };
}

class FakeLoader implements PoolLoader {
    readonly calls: boolean[] = [];

    async load(fresh: boolean): Promise<Pool[]> {
        this.calls.push(fresh);
        return POOLS;
    }
}

const tokenInfo = new StaticTokenInfoProvider(Object.values(TOKEN_INFOS));

async function withDir(fn: (options: SessionOptions, dir: string) => Promise<void>): Promise<void> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cyclearb-session-'));
    try {
        await fn({ amountIn: 3_500_000_000n, minProfit: 1n, strategyDir: dir, now: () => 1_700_000_000_000 }, dir);
    } finally {
        await fs.rm(dir, { recursive: true, force: true });
    }
}

test('two runs over one graph are merged into an ultra strategy', () =>
    withDir(async (options, dir) => {
        const loader = new FakeLoader();
        const store = new SqliteDocumentStore(':memory:');
        try {
            const session: SessionConfig = { runs: [run('TOKEN_X', 4), run('TOKEN_Y', 2)], bridges: [] };
            const outcome = await runSession(session, { loader, tokenInfo, store }, options);

            assert.deepEqual(loader.calls, [false]);
            assert.equal(outcome.graph.pools.size, 5);
            assert.deepEqual(
                outcome.runs.map(r => [r.name, r.status, r.status === 'fulfilled' ? r.run.selection.value.length : 0]),
                [
                    ['SOL-TOKEN_X', 'fulfilled', 3],
                    ['SOL-TOKEN_Y', 'fulfilled', 1],
                ]
            );

            const strategy = outcome.strategy;
            assert.ok(strategy);
            assert.equal(strategy.name, '0-SOL-TOKEN_X-1-SOL-TOKEN_Y');
            assert.equal(strategy.file, path.join(dir, 'ultra_strategies', '0-SOL-TOKEN_X-1-SOL-TOKEN_Y.json'));
            assert.deepEqual(
                strategy.selection.value.map(r => [r.strategy, r.result.profit]),
                [
                    ['SOL-TOKEN_X', 819_270_249n],
                    ['SOL-TOKEN_X', 389_022_997n],
                    ['SOL-TOKEN_X', 341_194_794n],
                    ['SOL-TOKEN_Y', 819_270_249n],
                ]
            );
            assert.equal((await readStrategyFile(strategy.file ?? '')).value.length, 4);
            assert.equal(outcome.aggregationError, undefined);

            assert.equal(store.count(Collection.BestPathsSelected), 2);
            assert.equal(store.count(Collection.UltraStrategies), 1);
        } finally {
            store.close();
        }
    }));

test('a run with bad configuration fails alone; the survivor is used as is', () =>
    withDir(async (options, dir) => {
        const session: SessionConfig = {
            runs: [run('TOKEN_X', 4), run('TOKEN_Y', 2, { include1hop: false })],
            bridges: [],
        };
        const outcome = await runSession(session, { loader: new FakeLoader(), tokenInfo }, options);

        const failed = outcome.runs[1];
        assert.equal(failed?.status, 'rejected');
        if (failed?.status !== 'rejected') return;
        assert.equal(failed.error, 'INPUT: both include1hop and include2hop are off (SOL-TOKEN_Y)');

        assert.equal(outcome.strategy?.name, 'SOL-TOKEN_X');
        assert.equal(outcome.strategy?.file, path.join(dir, 'SOL-TOKEN_X.json'));
        assert.equal(outcome.strategy?.selection.value.length, 3);
    }));

test('any run asking for fresh pools makes the load fresh', () =>
    withDir(async options => {
        const loader = new FakeLoader();
        const session: SessionConfig = {
            runs: [run('TOKEN_X', 1), run('TOKEN_Y', 1, { getFreshPools: true })],
            bridges: [],
        };
        await runSession(session, { loader, tokenInfo }, options);
        assert.deepEqual(loader.calls, [true]);
    }));

test('nothing above the profit floor leaves the session without a strategy', () =>
    withDir(async options => {
        const session: SessionConfig = { runs: [run('TOKEN_X', 4), run('TOKEN_Y', 4)], bridges: [] };
        const outcome = await runSession(
            session,
            { loader: new FakeLoader(), tokenInfo },
            { ...options, minProfit: 10n ** 12n }
        );
        assert.ok(outcome.runs.every(r => r.status === 'fulfilled'));
        assert.equal(outcome.strategy, undefined);
    }));

test('an unwritable strategy directory falls back to an in-memory merge', () =>
    withDir(async (options, dir) => {
        const blocker = path.join(dir, 'blocker');
        await fs.writeFile(blocker, '');
        const session: SessionConfig = { runs: [run('TOKEN_X', 4), run('TOKEN_Y', 2)], bridges: [] };
        const outcome = await runSession(
            session,
            { loader: new FakeLoader(), tokenInfo },
            { ...options, strategyDir: blocker }
        );

        assert.match(outcome.aggregationError ?? '', /^PERSISTENCE: could not write strategy file/);
        assert.equal(outcome.strategy?.name, '0-SOL-TOKEN_X-1-SOL-TOKEN_Y');
        assert.equal(outcome.strategy?.file, undefined);
        assert.equal(outcome.strategy?.selection.value.length, 4);
    }));

test('a token without metadata fails only the run that needs it', () =>
    withDir(async options => {
        const session: SessionConfig = { runs: [run('TOKEN_X', 4), run('TOKEN_Y', 2)], bridges: [] };
        const partial = new StaticTokenInfoProvider([
            TOKEN_INFOS[SOL] ?? assert.fail('no SOL'),
            TOKEN_INFOS[TOKEN_X] ?? assert.fail('no X'),
        ]);
        const outcome = await runSession(session, { loader: new FakeLoader(), tokenInfo: partial }, options);

        const [healthy, missing] = outcome.runs;
        assert.equal(healthy?.status, 'fulfilled');
        assert.equal(missing?.status, 'rejected');
        if (missing?.status !== 'rejected') return;
        assert.equal(missing.error, `DATA_UNAVAILABLE: no metadata for token (${TOKEN_Y})`);
        assert.equal(outcome.strategy?.name, 'SOL-TOKEN_X');
        assert.equal(outcome.strategy?.selection.value.length, 3);
    }));

test('a bridge without metadata fails every run that shares it', () =>
    withDir(async options => {
        const session: SessionConfig = { runs: [run('TOKEN_X', 1)], bridges: [USDC] };
        const partial = new StaticTokenInfoProvider([
            TOKEN_INFOS[SOL] ?? assert.fail('no SOL'),
            TOKEN_INFOS[TOKEN_X] ?? assert.fail('no X'),
        ]);
        const outcome = await runSession(session, { loader: new FakeLoader(), tokenInfo: partial }, options);
        assert.deepEqual(outcome.runs.map(r => r.status), ['rejected']);
        assert.equal(outcome.strategy, undefined);
    }));
