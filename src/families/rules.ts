/**
 * Field checks shared by the family validators, plus the margin/leverage
 * defaults every family applies.
 *
 * Each check returns `OK_VOID` or a `ValidationError` naming the field.
 * Optional fields are only checked when present.
 */

import type { ConditionRecord } from "../conditions/types.js";
import { ValidationError } from "../lib/validation/index.js";
import { OK_VOID, type Result, err, firstFailure } from "../shared/result.js";
import { type LeverageSettings, MARGIN_MODES, type MarginMode } from "./types.js";

function fail(field: string, reason: string): Result<void, ValidationError> {
	return err(new ValidationError(field, reason));
}

export function required(field: string, value: unknown): Result<void, ValidationError> {
	return value === undefined ? fail(field, "is required") : OK_VOID;
}

export function finite(field: string, value: number | undefined): Result<void, ValidationError> {
	if (value === undefined) return OK_VOID;
	return Number.isFinite(value) ? OK_VOID : fail(field, `must be a finite number, got ${value}`);
}

/** Rank, limit, price and amount fields. */
export function nonNegative(field: string, value: number | undefined): Result<void, ValidationError> {
	if (value === undefined) return OK_VOID;
	if (!Number.isFinite(value) || value < 0) {
		return fail(field, `must be a non-negative number, got ${value}`);
	}
	return OK_VOID;
}

/** Multipliers, thresholds and sizes. */
export function positive(field: string, value: number | undefined): Result<void, ValidationError> {
	if (value === undefined) return OK_VOID;
	if (!Number.isFinite(value) || value <= 0) {
		return fail(field, `must be greater than 0, got ${value}`);
	}
	return OK_VOID;
}

/** Periods and leverage factors. */
export function positiveInteger(field: string, value: number | undefined): Result<void, ValidationError> {
	if (value === undefined) return OK_VOID;
	if (!Number.isSafeInteger(value) || value <= 0) {
		return fail(field, `must be a positive integer, got ${value}`);
	}
	return OK_VOID;
}

export function integerInRange(
	field: string,
	value: number | undefined,
	min: number,
	max: number,
): Result<void, ValidationError> {
	if (value === undefined) return OK_VOID;
	if (!Number.isSafeInteger(value) || value < min || value > max) {
		return fail(field, `must be an integer in [${min}, ${max}], got ${value}`);
	}
	return OK_VOID;
}

export function numberInRange(
	field: string,
	value: number | undefined,
	min: number,
	max: number,
): Result<void, ValidationError> {
	if (value === undefined) return OK_VOID;
	if (!Number.isFinite(value) || value < min || value > max) {
		return fail(field, `must be in [${min}, ${max}], got ${value}`);
	}
	return OK_VOID;
}

export function lessThan(
	field: string,
	value: number | undefined,
	otherField: string,
	other: number | undefined,
): Result<void, ValidationError> {
	if (value === undefined || other === undefined) return OK_VOID;
	return value < other ? OK_VOID : fail(field, `must be less than ${otherField} (${value} >= ${other})`);
}

/** Narrows a raw token to one of `tokens`. */
export function isToken<T extends string>(tokens: readonly T[], value: string | undefined): value is T {
	return value !== undefined && tokens.some((token) => token === value);
}

export function oneOf(
	field: string,
	value: string | undefined,
	tokens: readonly string[],
): Result<void, ValidationError> {
	if (value === undefined || isToken(tokens, value)) return OK_VOID;
	return fail(field, `unrecognized token "${value}", expected one of ${tokens.join(", ")}`);
}

/** Returns `value` when it is a recognized token, otherwise `fallback`. */
export function tokenOr<T extends string>(tokens: readonly T[], value: string | undefined, fallback: T): T {
	return isToken(tokens, value) ? value : fallback;
}

// ── Margin and leverage ──────────────────────────────────────────────

export const LEVERAGE_DEFAULTS: LeverageSettings = Object.freeze({
	enabled: false,
	defaultLeverage: 1,
	maxLeverage: 100,
});

export const DEFAULT_MARGIN_MODE: MarginMode = "ISOLATED";

/** Checks marginMode and, when leverage is enabled, the leverage bounds. */
export function validateExecution(record: ConditionRecord): Result<void, ValidationError> {
	return firstFailure([
		() => oneOf("marginMode", record.marginMode, MARGIN_MODES),
		() => (record.enableLeverage === true ? validateLeverage(record) : OK_VOID),
	]);
}

function validateLeverage(record: ConditionRecord): Result<void, ValidationError> {
	return firstFailure([
		() => positiveInteger("defaultLeverage", record.defaultLeverage),
		() => positiveInteger("maxLeverage", record.maxLeverage),
		() => {
			const settings = buildLeverage(record);
			return settings.defaultLeverage <= settings.maxLeverage
				? OK_VOID
				: fail(
						"defaultLeverage",
						`must not exceed maxLeverage (${settings.defaultLeverage} > ${settings.maxLeverage})`,
					);
		},
	]);
}

export function buildMarginMode(record: ConditionRecord): MarginMode {
	return tokenOr(MARGIN_MODES, record.marginMode, DEFAULT_MARGIN_MODE);
}

function positiveOr(value: number | undefined, fallback: number): number {
	return value !== undefined && value > 0 ? value : fallback;
}

/** Leverage values that are missing or not positive fall back to the defaults. */
export function buildLeverage(record: ConditionRecord): LeverageSettings {
	return Object.freeze({
		enabled: record.enableLeverage ?? LEVERAGE_DEFAULTS.enabled,
		defaultLeverage: positiveOr(record.defaultLeverage, LEVERAGE_DEFAULTS.defaultLeverage),
		maxLeverage: positiveOr(record.maxLeverage, LEVERAGE_DEFAULTS.maxLeverage),
	});
}
