// src/utils/amounts.ts
// Conversions between raw on-chain amounts and human-readable decimals

/**
 * Raw integer amount → decimal string with the token's precision.
 * Trailing zeros of the fraction are trimmed.
 */
export function formatAmount(raw: bigint, decimals: number): string {
    const negative = raw < 0n;
    const abs = negative ? -raw : raw;
    const scale = 10n ** BigInt(decimals);
    const whole = abs / scale;
    const frac = (abs % scale).toString().padStart(decimals, "0").replace(/0+$/, "");
    const body = frac.length > 0 ? `${whole}.${frac}` : whole.toString();
    return negative ? `-${body}` : body;
}

/** Signed ratio in basis points, truncated toward zero */
export function ratioBps(numerator: bigint, denominator: bigint): number {
    if (denominator === 0n) return 0;
    return Number((numerator * 10_000n) / denominator);
}
