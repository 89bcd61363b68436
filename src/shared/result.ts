/**
 * Result<T, E>: explicit success/failure values for dispatch operations.
 *
 * Routing, validation and config building never throw for expected failures;
 * they return a Result and let the caller decide. Exceptions are reserved for
 * process-start boundaries (see `unwrap`).
 */

/** Discriminated union for fallible operations: `ok: true` carries a value, `ok: false` carries an error. */
export type Result<T, E = Error> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

// ── Factories ────────────────────────────────────────────────────────

/** Create a successful Result wrapping the given value. */
export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

/** Create a failed Result wrapping the given error. */
export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

/** Shared successful `Result<void>` for checks that produce no value. */
export const OK_VOID: Result<void, never> = Object.freeze({ ok: true as const, value: undefined });

// ── Combinators ──────────────────────────────────────────────────────

/** Transform the success value of a Result, leaving errors untouched. */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
	return result.ok ? ok(fn(result.value)) : result;
}

/**
 * Run checks in order and return the first failure, or `OK_VOID` when all pass.
 * Checks after the first failure are not invoked.
 */
export function firstFailure<E>(checks: readonly (() => Result<void, E>)[]): Result<void, E> {
	for (const check of checks) {
		const result = check();
		if (!result.ok) return result;
	}
	return OK_VOID;
}

/** Extract the success value or throw the error. Use at system boundaries only. */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (result.ok) return result.value;
	throw result.error instanceof Error ? result.error : new Error(String(result.error));
}
