/**
 * Feed Ingestor
 *
 * One WebSocket subscription to the quote feed. Frames are decoded in the
 * socket callback and pushed into a bounded channel; pricing happens in the
 * monitor loop, never here. Disconnects reconnect with exponential backoff
 * (2s doubling to 60s), reset once a connection opens.
 */

import WebSocket, { type RawData } from 'ws';

import type { QuoteUpdate } from '../types.js';
import { createLogger } from '../utils/logger.js';
import type { BoundedChannel } from './channel.js';
import { decodeQuotePayload } from './decode.js';

const log = createLogger('feed');

export type FeedState = 'idle' | 'connecting' | 'open' | 'reconnecting' | 'stopped';

export interface FeedOptions {
    /** Pool ids sent in the subscribe message on every (re)connect */
    pools?: readonly string[];
    initialBackoffMs?: number;
    maxBackoffMs?: number;
    now?: () => number;
}

export interface FeedStats {
    received: number;
    decoded: number;
    malformed: number;
    connects: number;
    disconnects: number;
}

export class QuoteFeed {
    private ws: WebSocket | null = null;
    private timer: NodeJS.Timeout | null = null;
    private backoffMs: number;
    private feedState: FeedState = 'idle';
    private readonly initialBackoffMs: number;
    private readonly maxBackoffMs: number;
    private readonly now: () => number;

    readonly stats: FeedStats = { received: 0, decoded: 0, malformed: 0, connects: 0, disconnects: 0 };

    constructor(
        private readonly url: string,
        private readonly channel: BoundedChannel<QuoteUpdate>,
        private readonly options: FeedOptions = {}
    ) {
        this.initialBackoffMs = options.initialBackoffMs ?? 2_000;
        this.maxBackoffMs = options.maxBackoffMs ?? 60_000;
        this.now = options.now ?? Date.now;
        this.backoffMs = this.initialBackoffMs;
    }

    get state(): FeedState {
        return this.feedState;
    }

    /** Current reconnect delay */
    get backoff(): number {
        return this.backoffMs;
    }

    /** Starts connecting; returns immediately */
    start(): void {
        if (this.feedState !== 'idle') return;
        this.connect();
    }

    /** Closes the socket and cancels any pending reconnect */
    async stop(): Promise<void> {
        this.feedState = 'stopped';
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        const ws = this.ws;
        this.ws = null;
        if (!ws || ws.readyState === WebSocket.CLOSED) return;

        await new Promise<void>(resolve => {
            ws.once('close', () => resolve());
            if (ws.readyState === WebSocket.CONNECTING) {
                ws.terminate();
            } else {
                ws.close();
            }
        });
        ws.removeAllListeners();
    }

    private connect(): void {
        this.feedState = 'connecting';
        log.info(`connecting to ${this.url}`);

        const ws = new WebSocket(this.url);
        this.ws = ws;

        ws.on('open', () => {
            this.feedState = 'open';
            this.stats.connects++;
            this.backoffMs = this.initialBackoffMs;
            log.info('feed open');
            this.subscribe(ws);
        });
        ws.on('message', (data: RawData, isBinary: boolean) => this.handleMessage(data, isBinary));
        ws.on('error', (e: Error) => log.error(`feed error: ${e.message}`));
        ws.on('close', () => {
            if (this.ws !== ws) return;
            this.ws = null;
            this.stats.disconnects++;
            this.scheduleReconnect();
        });
    }

    private subscribe(ws: WebSocket): void {
        const pools = this.options.pools ?? [];
        if (pools.length === 0) return;
        ws.send(JSON.stringify({ event: 'quote', data: { pools } }));
        log.debug(`subscribed to ${pools.length} pools`);
    }

    private handleMessage(data: RawData, isBinary: boolean): void {
        this.stats.received++;
        const update = decodeQuotePayload(data, isBinary, this.now());
        if (!update) {
            this.stats.malformed++;
            log.warn(`dropped malformed ${isBinary ? 'binary' : 'text'} frame (${this.stats.malformed} so far)`);
            return;
        }
        this.stats.decoded++;
        this.channel.push(update);
    }

    private scheduleReconnect(): void {
        if (this.feedState === 'stopped') return;
        this.feedState = 'reconnecting';
        const delay = this.backoffMs;
        log.warn(`feed closed; reconnecting in ${delay}ms`);
        this.timer = setTimeout(() => {
            this.timer = null;
            this.backoffMs = Math.min(this.backoffMs * 2, this.maxBackoffMs);
            this.connect();
        }, delay);
    }
}
