/**
 * @tandem/ledger — Deterministic integer arithmetic.
 *
 * All amounts are bigint in smallest units. Decimal strings appear only
 * at the edges (configured prices, human-readable log output).
 *
 * Rules:
 * - No floating-point operations
 * - Division truncates toward zero
 * - Zero runtime dependencies
 */

import { LedgerError } from "./types.js";

// ─── Decimal Strings ─────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "15" with decimals=18 → 15000000000000000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 150000000n with decimals=8 → "1.50000000"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}

/**
 * Parse a base-10 unsigned integer string of smallest units.
 * Used when reading serialized amounts back (snapshots, events).
 */
export function parseUnits(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new LedgerError("INVALID_AMOUNT", `Expected an unsigned integer amount, got "${value}"`);
  }
  return BigInt(value);
}

// ─── Integer Helpers ─────────────────────────────────────────────────────

export function pow10(exp: number): bigint {
  if (!Number.isInteger(exp) || exp < 0) {
    throw new LedgerError("INVALID_AMOUNT", `pow10 exponent must be a non-negative integer, got ${String(exp)}`);
  }
  return 10n ** BigInt(exp);
}

/**
 * a * b / denominator, truncated toward zero.
 * The product is formed first so no precision is lost before the division.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Division by zero");
  }
  return (a * b) / denominator;
}

// ─── Guards ──────────────────────────────────────────────────────────────

/**
 * Deposits and swaps move a strictly positive amount.
 */
export function requirePositive(amount: bigint, label: string): void {
  if (amount <= 0n) {
    throw new LedgerError("ZERO_AMOUNT", `${label} must be greater than zero, got ${amount.toString()}`, {
      details: { amount: amount.toString() },
    });
  }
}

export function requireNonNegative(amount: bigint, label: string): void {
  if (amount < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must not be negative, got ${amount.toString()}`, {
      details: { amount: amount.toString() },
    });
  }
}
