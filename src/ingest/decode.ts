/**
 * Quote payload decoding
 *
 * Text frames (JSON):
 *   { "event": "quote" | "quote_res", "data": { "pool", "reserves": ["..."],
 *     "sqrtPriceX64"?, "liquidity"?, "slot"? } }
 * or the bare data object.
 *
 * Binary frames (little-endian):
 *   u8 version | 32B pool key | u8 n | n × u64 reserve | u64 slot
 *   version 2 appends u128 sqrtPriceX64 | u128 liquidity
 *
 * Anything else decodes to null.
 */

import bs58 from 'bs58';

import type { QuoteUpdate } from '../types.js';
import { U128_MAX, U64_MAX } from '../types.js';
import { isRecord, toBigInt } from '../io/strategyFile.js';

export const QUOTE_EVENTS = ['quote', 'quote_res'] as const;

const POOL_KEY_LEN = 32;
const HEADER_LEN = 1 + POOL_KEY_LEN + 1;

export type RawPayload = Buffer | ArrayBuffer | Buffer[] | string;

function toBuffer(data: RawPayload): Buffer {
    if (typeof data === 'string') return Buffer.from(data, 'utf8');
    if (Array.isArray(data)) return Buffer.concat(data);
    if (Buffer.isBuffer(data)) return data;
    return Buffer.from(data);
}

function readU128LE(buf: Buffer, offset: number): bigint {
    const lo = buf.readBigUInt64LE(offset);
    const hi = buf.readBigUInt64LE(offset + 8);
    return (hi << 64n) | lo;
}

function decodeBinary(buf: Buffer, receivedAtMs: number): QuoteUpdate | null {
    if (buf.length < HEADER_LEN) return null;
    const version = buf.readUInt8(0);
    if (version !== 1 && version !== 2) return null;

    const count = buf.readUInt8(1 + POOL_KEY_LEN);
    const reservesEnd = HEADER_LEN + count * 8;
    const expected = reservesEnd + 8 + (version === 2 ? 32 : 0);
    if (count < 2 || buf.length !== expected) return null;

    const pool = bs58.encode(buf.subarray(1, 1 + POOL_KEY_LEN));
    const reserves: bigint[] = [];
    for (let i = 0; i < count; i++) {
        reserves.push(buf.readBigUInt64LE(HEADER_LEN + i * 8));
    }
    const slot = Number(buf.readBigUInt64LE(reservesEnd));

    const update: QuoteUpdate = { pool, reserves, slot, receivedAtMs, source: 'binary' };
    if (version === 2) {
        update.sqrtPriceX64 = readU128LE(buf, reservesEnd + 8);
        update.liquidity = readU128LE(buf, reservesEnd + 24);
    }
    return update;
}

function optionalU128(v: unknown): bigint | undefined | null {
    if (v === undefined) return undefined;
    const n = toBigInt(v, 'quote');
    return n < 0n || n > U128_MAX ? null : n;
}

function decodeData(data: unknown, receivedAtMs: number): QuoteUpdate | null {
    if (!isRecord(data)) return null;
    const { pool, reserves, slot } = data;
    if (typeof pool !== 'string' || pool.length === 0) return null;
    if (!Array.isArray(reserves) || reserves.length < 2) return null;
    if (slot !== undefined && (typeof slot !== 'number' || !Number.isSafeInteger(slot) || slot < 0)) return null;

    const parsed = reserves.map(r => toBigInt(r, 'quote.reserves'));
    if (parsed.some(r => r < 0n || r > U64_MAX)) return null;

    const sqrtPriceX64 = optionalU128(data.sqrtPriceX64);
    const liquidity = optionalU128(data.liquidity);
    if (sqrtPriceX64 === null || liquidity === null) return null;

    const update: QuoteUpdate = { pool, reserves: parsed, receivedAtMs, source: 'text' };
    if (slot !== undefined) update.slot = slot;
    if (sqrtPriceX64 !== undefined) update.sqrtPriceX64 = sqrtPriceX64;
    if (liquidity !== undefined) update.liquidity = liquidity;
    return update;
}

function decodeText(raw: string, receivedAtMs: number): QuoteUpdate | null {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch {
        return null;
    }
    if (!isRecord(json)) return null;
    if (json.event === undefined) return decodeData(json, receivedAtMs);
    if (!QUOTE_EVENTS.some(e => e === json.event)) return null;
    return decodeData(json.data, receivedAtMs);
}

/** Decode one feed frame; null when the frame is not a well-formed quote */
export function decodeQuotePayload(data: RawPayload, isBinary: boolean, receivedAtMs: number): QuoteUpdate | null {
    try {
        const buf = toBuffer(data);
        return isBinary ? decodeBinary(buf, receivedAtMs) : decodeText(buf.toString('utf8'), receivedAtMs);
    } catch {
        // non-integer numeric fields
        return null;
    }
}

/** Binary frame for an update; the inverse of the binary decoder */
export function encodeBinaryQuote(poolKey: Uint8Array, reserves: readonly bigint[], slot: bigint, clmm?: { sqrtPriceX64: bigint; liquidity: bigint }): Buffer {
    const version = clmm ? 2 : 1;
    const buf = Buffer.alloc(HEADER_LEN + reserves.length * 8 + 8 + (clmm ? 32 : 0));
    buf.writeUInt8(version, 0);
    Buffer.from(poolKey).copy(buf, 1, 0, POOL_KEY_LEN);
    buf.writeUInt8(reserves.length, 1 + POOL_KEY_LEN);
    let offset = HEADER_LEN;
    for (const r of reserves) {
        buf.writeBigUInt64LE(r, offset);
        offset += 8;
    }
    buf.writeBigUInt64LE(slot, offset);
    offset += 8;
    if (clmm) {
        for (const v of [clmm.sqrtPriceX64, clmm.liquidity]) {
            buf.writeBigUInt64LE(v & U64_MAX, offset);
            buf.writeBigUInt64LE(v >> 64n, offset + 8);
            offset += 16;
        }
    }
    return buf;
}
