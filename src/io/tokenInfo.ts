// src/io/tokenInfo.ts
// Token metadata resolution; done once per run before pricing starts

import { getMint } from '@solana/spl-token';
import { PublicKey, type Connection } from '@solana/web3.js';

import type { Token, TokenInfos } from '../types.js';
import { shortAddr } from '../types.js';
import { DataUnavailableError } from '../errors.js';

export interface TokenInfoProvider {
    resolve(addresses: readonly string[]): Promise<TokenInfos>;
}

function freeze(tokens: Token[]): TokenInfos {
    const out: Record<string, Readonly<Token>> = {};
    for (const t of tokens) out[t.address] = Object.freeze({ ...t });
    return Object.freeze(out);
}

/** Metadata known up front, e.g. the pool file's token list */
export class StaticTokenInfoProvider implements TokenInfoProvider {
    private readonly known = new Map<string, Token>();

    constructor(tokens: readonly Token[]) {
        for (const t of tokens) this.known.set(t.address, t);
    }

    async resolve(addresses: readonly string[]): Promise<TokenInfos> {
        const out: Token[] = [];
        for (const address of new Set(addresses)) {
            const token = this.known.get(address);
            if (!token) throw new DataUnavailableError('no metadata for token', address);
            out.push(token);
        }
        return freeze(out);
    }
}

/**
 * Decimals from the mint account; symbols from the caller's labels,
 * falling back to a shortened address.
 */
export class RpcTokenInfoProvider implements TokenInfoProvider {
    constructor(
        private readonly connection: Connection,
        private readonly symbols: Readonly<Record<string, string>> = {}
    ) {}

    async resolve(addresses: readonly string[]): Promise<TokenInfos> {
        const unique = [...new Set(addresses)];
        const tokens = await Promise.all(
            unique.map(async address => {
                try {
                    const mint = await getMint(this.connection, new PublicKey(address), 'confirmed');
                    return { address, symbol: this.symbols[address] ?? shortAddr(address), decimals: mint.decimals };
                } catch (e) {
                    throw new DataUnavailableError(
                        `mint lookup failed: ${e instanceof Error ? e.message : String(e)}`,
                        address
                    );
                }
            })
        );
        return freeze(tokens);
    }
}
