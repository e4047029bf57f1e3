/**
 * Pool loading
 *
 * The pool file lists token metadata and pool snapshots:
 *
 *   {
 *     "tokens": [{ "address", "symbol", "decimals" }],
 *     "pools": [{ "kind", "id", "dex", "tokens", "reserves", "feeBps",
 *                 "feeMode"?, "amp"?, "sqrtPriceX64"?, "liquidity"?, "vaults"? }]
 *   }
 *
 * A fresh load re-reads vault balances for pools that list their vault
 * token accounts; everything else comes from the file.
 */

import * as fs from 'node:fs/promises';
import { AccountLayout } from '@solana/spl-token';
import { PublicKey, type AccountInfo, type Connection } from '@solana/web3.js';

import type { Pool, Token } from '../types.js';
import { DataUnavailableError, InputError, describeError, isArbError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { FormatError, decodePool, isRecord } from './strategyFile.js';
import { isValidAddress } from '../config.js';

const log = createLogger('pools');

export interface PoolLoader {
    /** fresh=false may serve cached or static data */
    load(fresh: boolean): Promise<Pool[]>;
}

export interface PoolFile {
    tokens: Token[];
    pools: Pool[];
    /** pool id → vault token accounts aligned with pool.tokens */
    vaults: Map<string, string[]>;
}

/** Supplies current reserves for pools with known vault accounts */
export interface ReserveSource {
    fetchReserves(vaults: ReadonlyMap<string, readonly string[]>): Promise<Map<string, bigint[]>>;
}

function decodeToken(v: unknown, where: string): Token {
    if (!isRecord(v)) throw new FormatError(`${where}: expected an object`);
    const { address, symbol, decimals } = v;
    if (typeof address !== 'string' || typeof symbol !== 'string') {
        throw new FormatError(`${where}: address and symbol must be strings`);
    }
    if (typeof decimals !== 'number' || !Number.isInteger(decimals) || decimals < 0) {
        throw new FormatError(`${where}.decimals: expected a non-negative integer`);
    }
    return { address, symbol, decimals };
}

function decodeVaults(v: unknown, pool: Pool, where: string): string[] | undefined {
    if (v === undefined) return undefined;
    if (!Array.isArray(v) || v.length !== pool.tokens.length || !v.every(a => typeof a === 'string')) {
        throw new FormatError(`${where}.vaults: expected one account per token`);
    }
    const accounts = v.filter((a): a is string => typeof a === 'string');
    const bad = accounts.find(a => !isValidAddress(a));
    if (bad !== undefined) throw new FormatError(`${where}.vaults: "${bad}" is not a valid address`);
    return accounts;
}

export function parsePoolFile(json: unknown, source = 'pool file'): PoolFile {
    try {
        if (!isRecord(json)) throw new FormatError('root: expected an object');
        const tokens = Array.isArray(json.tokens) ? json.tokens.map((t, i) => decodeToken(t, `tokens[${i}]`)) : [];
        if (!Array.isArray(json.pools)) throw new FormatError('root.pools: expected an array');

        const pools: Pool[] = [];
        const vaults = new Map<string, string[]>();
        json.pools.forEach((raw, i) => {
            const where = `pools[${i}]`;
            const pool = decodePool(raw, where);
            pools.push(pool);
            const accounts = decodeVaults(isRecord(raw) ? raw.vaults : undefined, pool, where);
            if (accounts) vaults.set(pool.id, accounts);
        });
        return { tokens, pools, vaults };
    } catch (e) {
        if (e instanceof FormatError) throw new InputError(`malformed pool file: ${e.message}`, source);
        throw e;
    }
}

export async function readPoolFile(file: string): Promise<PoolFile> {
    let raw: string;
    try {
        raw = await fs.readFile(file, 'utf8');
    } catch (e) {
        throw new DataUnavailableError(`pool file unreadable: ${e instanceof Error ? e.message : String(e)}`, file);
    }
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch {
        throw new InputError('pool file is not JSON', file);
    }
    return parsePoolFile(json, file);
}

export class JsonPoolLoader implements PoolLoader {
    private cached?: PoolFile;

    constructor(
        private readonly file: string,
        private readonly reserveSource?: ReserveSource
    ) {}

    async read(): Promise<PoolFile> {
        this.cached ??= await readPoolFile(this.file);
        return this.cached;
    }

    async load(fresh: boolean): Promise<Pool[]> {
        const { pools, vaults } = await this.read();
        if (!fresh) return pools;

        if (!this.reserveSource) {
            log.warn(`fresh pools requested but no reserve source is configured; using ${this.file}`);
            return pools;
        }
        if (vaults.size === 0) {
            log.warn(`fresh pools requested but ${this.file} lists no vault accounts`);
            return pools;
        }

        let latest: Map<string, bigint[]>;
        try {
            latest = await this.reserveSource.fetchReserves(vaults);
        } catch (e) {
            if (!isArbError(e)) throw e;
            log.warn(`fresh reserves unavailable, using ${this.file}: ${describeError(e)}`);
            return pools;
        }
        let refreshed = 0;
        const out = pools.map(pool => {
            const reserves = latest.get(pool.id);
            if (!reserves || reserves.length !== pool.reserves.length) return pool;
            refreshed++;
            return { ...pool, reserves };
        });
        log.info(`refreshed reserves of ${refreshed}/${pools.length} pools`);
        return out;
    }
}

/** RPC accounts per getMultipleAccountsInfo call */
export const ACCOUNTS_PER_CALL = 100;

export type AccountsReader = Pick<Connection, 'getMultipleAccountsInfo'>;

/** Reads SPL token balances of pool vaults, in chunks the RPC accepts */
export class VaultReserveSource implements ReserveSource {
    constructor(
        private readonly connection: AccountsReader,
        private readonly chunkSize = ACCOUNTS_PER_CALL
    ) {}

    async fetchReserves(vaults: ReadonlyMap<string, readonly string[]>): Promise<Map<string, bigint[]>> {
        const owners: Array<{ pool: string; index: number }> = [];
        const keys: PublicKey[] = [];
        for (const [pool, accounts] of vaults) {
            accounts.forEach((account, index) => {
                owners.push({ pool, index });
                keys.push(new PublicKey(account));
            });
        }

        const infos: Array<AccountInfo<Buffer> | null> = [];
        for (let i = 0; i < keys.length; i += this.chunkSize) {
            const slice = keys.slice(i, i + this.chunkSize);
            try {
                infos.push(...(await this.connection.getMultipleAccountsInfo(slice, 'confirmed')));
            } catch (e) {
                throw new DataUnavailableError(
                    `vault fetch failed for accounts ${i}..${i + slice.length - 1}: ${describeError(e)}`
                );
            }
        }

        const out = new Map<string, bigint[]>();
        const incomplete = new Set<string>();
        infos.forEach((info, i) => {
            const owner = owners[i];
            if (!owner) return;
            if (!info || info.data.length < AccountLayout.span) {
                incomplete.add(owner.pool);
                return;
            }
            let reserves = out.get(owner.pool);
            if (!reserves) {
                reserves = [];
                out.set(owner.pool, reserves);
            }
            reserves[owner.index] = AccountLayout.decode(info.data).amount;
        });

        for (const pool of incomplete) {
            log.warn(`vault accounts of ${pool} missing; keeping file reserves`);
            out.delete(pool);
        }
        return out;
    }
}
