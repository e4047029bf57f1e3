import test from 'node:test';
import assert from 'node:assert/strict';

import {
    ENV_DEFAULTS,
    isValidAddress,
    parseSessionConfig,
    readEnvConfig,
    validateStrategyConfig,
    type StrategyConfig,
} from './config.js';
import { InputError } from './errors.js';
import { SOL, TOKEN_X, USDC } from './test/fixtures.js';

test('env: defaults when nothing is set', () => {
    const config = readEnvConfig({});
    assert.equal(config.rpcUrl, undefined);
    assert.equal(config.feedUrl, undefined);
    assert.equal(config.dbPath, 'data/cyclearb.db');
    assert.equal(config.simulationAmount, 3_500_000_000n);
    assert.equal(config.minProfit, ENV_DEFAULTS.minProfit);
    assert.equal(config.slippageBps, 50);
    assert.equal(config.executionMode, 'simulate');
    assert.equal(config.debug, false);
    assert.equal(config.strategyFile, undefined);
});

test('env: values are parsed and checked', () => {
    const config = readEnvConfig({
        RPC_URL: 'http://localhost:8899',
        SIMULATION_AMOUNT: '1000000000',
        MIN_PROFIT: '5000',
        MAX_IMPACT_BPS: '150',
        EXECUTION_MODE: 'send',
        DEBUG: '1',
        STRATEGY_FILE: 'best_paths_selected/SOL-TOKEN_X.json',
    });
    assert.equal(config.rpcUrl, 'http://localhost:8899');
    assert.equal(config.simulationAmount, 1_000_000_000n);
    assert.equal(config.minProfit, 5_000n);
    assert.equal(config.maxImpactBps, 150);
    assert.equal(config.executionMode, 'send');
    assert.equal(config.debug, true);
    assert.equal(config.strategyFile, 'best_paths_selected/SOL-TOKEN_X.json');

    assert.throws(() => readEnvConfig({ SIMULATION_AMOUNT: '3.5' }), InputError);
    assert.throws(() => readEnvConfig({ FRESHNESS_MS: '-1' }), InputError);
    assert.throws(() => readEnvConfig({ SLIPPAGE_BPS: '10000' }), /below 10000/);
    assert.throws(() => readEnvConfig({ EXECUTION_MODE: 'yolo' }), /EXECUTION_MODE/);
});

test('addresses must round-trip through base58', () => {
    assert.equal(isValidAddress(SOL), true);
    assert.equal(isValidAddress(TOKEN_X), true);
    assert.equal(isValidAddress('not-an-address'), false);
    assert.equal(isValidAddress(''), false);
});

const RUN = {
    tokensToArb: [
        { address: SOL, symbol: 'SOL' },
        { address: TOKEN_X, symbol: 'TOKEN_X' },
    ],
    numbersOfBestPaths: 3,
};

test('session: run defaults and derived names', () => {
    const session = parseSessionConfig({ runs: [RUN], bridges: [USDC] });
    assert.deepEqual(session, {
        runs: [
            {
                name: 'SOL-TOKEN_X',
                tokensToArb: RUN.tokensToArb,
                include1hop: true,
                include2hop: false,
                numbersOfBestPaths: 3,
                getFreshPools: false,
            },
        ],
        bridges: [USDC],
    });

    const restricted = parseSessionConfig({ runs: [{ ...RUN, name: 'custom' }], restrictTo: [USDC] });
    assert.equal(restricted.runs[0]?.name, 'custom');
    assert.deepEqual(restricted.restrictTo, [USDC]);
    assert.deepEqual(restricted.bridges, []);
});

test('session: structural problems fail the whole file', () => {
    assert.throws(() => parseSessionConfig([]), InputError);
    assert.throws(() => parseSessionConfig({ runs: [] }), /at least one run/);
    assert.throws(() => parseSessionConfig({ runs: [RUN, RUN] }), /duplicate strategy name "SOL-TOKEN_X"/);
    assert.throws(() => parseSessionConfig({ runs: [{ ...RUN, include2hop: 'yes' }] }), /include2hop must be a boolean/);
    assert.throws(() => parseSessionConfig({ runs: [{ ...RUN, numbersOfBestPaths: '3' }] }), InputError);
    assert.throws(() => parseSessionConfig({ runs: [RUN], bridges: ['bogus'] }), /invalid bridge address/);
});

test('run validation names the run that failed', () => {
    const base: StrategyConfig = parseSessionConfig({ runs: [RUN] }).runs[0] ?? assert.fail('no run');
    const cases: Array<[Partial<StrategyConfig>, RegExp]> = [
        [{ tokensToArb: [{ address: SOL, symbol: 'SOL' }] }, /base token and at least one target/],
        [{ tokensToArb: [{ address: SOL, symbol: 'SOL' }, { address: 'zzz', symbol: 'Z' }] }, /invalid token address/],
        [{ include1hop: false, include2hop: false }, /both include1hop and include2hop are off/],
        [{ numbersOfBestPaths: 0 }, /positive integer/],
        [{ numbersOfBestPaths: 1.5 }, /positive integer/],
    ];
    for (const [patch, message] of cases) {
        assert.throws(
            () => validateStrategyConfig({ ...base, ...patch }),
            (e: unknown) => e instanceof InputError && message.test(e.message) && e.context === 'SOL-TOKEN_X'
        );
    }
    assert.doesNotThrow(() => validateStrategyConfig(base));
});
