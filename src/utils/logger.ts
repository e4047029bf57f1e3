// src/utils/logger.ts
// Console logger for the arbitrage pipeline

export interface PathLog {
    type: string;
    strategy?: string;
    path?: string;
    action?: string;
    profit?: bigint;
    profitBps?: number;
    impactBps?: number;
    reason?: string;
    [key: string]: unknown;
}

/** One line per path decision: [TYPE] action | strategy=... | path=... */
export function formatPathLog(log: PathLog): string {
    const parts: string[] = [`[${log.type}]`];

    if (log.action) parts.push(log.action);
    if (log.strategy) parts.push(`strategy=${log.strategy}`);
    if (log.path) parts.push(`path=${log.path}`);
    if (log.profit !== undefined) parts.push(`profit=${log.profit.toString()}`);
    if (log.profitBps !== undefined) parts.push(`net=${log.profitBps}bps`);
    if (log.impactBps !== undefined) parts.push(`impact=${log.impactBps}bps`);
    if (log.reason) parts.push(`reason=${log.reason}`);

    return parts.join(" | ");
}

export function logPath(log: PathLog): void {
    console.log(formatPathLog(log));
}

export interface Logger {
    info: (...args: unknown[]) => void;
    warn: (...args: unknown[]) => void;
    error: (...args: unknown[]) => void;
    debug: (...args: unknown[]) => void;
}

let debugOverride: boolean | undefined;

/** Turns debug lines on or off for every logger; unset, DEBUG=1 decides */
export function setDebug(enabled: boolean | undefined): void {
    debugOverride = enabled;
}

export function isDebugEnabled(): boolean {
    return debugOverride ?? process.env.DEBUG === "1";
}

/** Logger whose lines carry a component tag, e.g. [INFO] [monitor] ... */
export function createLogger(scope: string): Logger {
    const tag = `[${scope}]`;
    return {
        info: (...args: unknown[]) => console.log("[INFO]", tag, ...args),
        warn: (...args: unknown[]) => console.warn("[WARN]", tag, ...args),
        error: (...args: unknown[]) => console.error("[ERROR]", tag, ...args),
        debug: (...args: unknown[]) => {
            if (isDebugEnabled()) {
                console.log("[DEBUG]", tag, ...args);
            }
        },
    };
}

export const logger = createLogger("cyclearb");

export default logger;
