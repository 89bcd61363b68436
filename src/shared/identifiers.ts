/**
 * Domain primitive identifiers: branded types for compile-time safety.
 *
 * Each identifier wraps a primitive with a unique brand, preventing accidental
 * mixing (e.g., passing a StrategyId where an AccountId is expected when
 * building request identifiers).
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Account (user) that owns a set of strategy conditions. */
export type AccountId = Brand<number, "AccountId">;
/** Persisted strategy row identifier; part of the request id. */
export type StrategyId = Brand<number, "StrategyId">;
/** Exchange instrument symbol, e.g. "BTCUSDT". */
export type TradingSymbol = Brand<string, "TradingSymbol">;
/** Deterministic per-dispatch tracing / idempotency key. */
export type RequestId = Brand<string, "RequestId">;

// ── Factory functions with validation ────────────────────────────────

function createNumericId<B extends string>(value: number, label: B): Brand<number, B> {
	if (!Number.isSafeInteger(value) || value < 0) {
		throw new Error(`${label} must be a non-negative integer, got: ${value}`);
	}
	return value as Brand<number, B>;
}

function createStringId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** Create a validated AccountId. Throws if negative or not an integer. */
export function accountId(value: number): AccountId {
	return createNumericId(value, "AccountId");
}

/** Create a validated StrategyId. Throws if negative or not an integer. */
export function strategyId(value: number): StrategyId {
	return createNumericId(value, "StrategyId");
}

/** Create a validated TradingSymbol from a raw string. Throws if empty. */
export function tradingSymbol(value: string): TradingSymbol {
	return createStringId(value, "TradingSymbol");
}

/** Create a RequestId from a raw string. Throws if empty. */
export function requestId(value: string): RequestId {
	return createStringId(value, "RequestId");
}

// ── Utility: extract raw values ──────────────────────────────────────

/** Extract the raw string from a branded string identifier. */
export function idToString(id: TradingSymbol | RequestId): string {
	return id;
}

/** Extract the raw number from a branded numeric identifier. */
export function idToNumber(id: AccountId | StrategyId): number {
	return id;
}
