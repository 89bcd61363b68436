/**
 * DispatchError hierarchy: structured error classification.
 *
 * Every error carries a category (retryable, non-retryable, fatal). The
 * dispatcher itself never retries; the category tells the calling
 * orchestrator whether a later attempt with refreshed inputs can succeed and
 * whether the process should refuse to keep running.
 */

/** Error severity categories that drive caller-side retry and startup behavior. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing DispatchError subclasses with optional cause chain. */
interface DispatchErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for dispatch operations, with category-based retry semantics. */
export class DispatchError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "DispatchError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Fatal error for invalid environment configuration or conflicting registrations. */
export class ConfigError extends DispatchError {
	constructor(message: string, context: Record<string, unknown> & DispatchErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Kind of structural defect found while building a route table. */
export type RouteTableDefect = "duplicate_strategy_type" | "non_monotonic_priority" | "empty_table";

/**
 * Fatal error raised when a route table is ambiguous. Built at process start:
 * a process that hits this must refuse to start.
 */
export class RouteTableError extends DispatchError {
	readonly defect: RouteTableDefect;

	constructor(
		message: string,
		defect: RouteTableDefect,
		context: Record<string, unknown> & DispatchErrorOptions = {},
	) {
		const { cause, ...rest } = context;
		super(message, "ROUTE_TABLE_INVALID", ErrorCategory.Fatal, rest, "fix the route table and redeploy");
		this.name = "RouteTableError";
		this.defect = defect;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			defect: this.defect,
		};
	}
}

/** Retryable error for collaborator connectivity failures (store, executor). */
export class NetworkError extends DispatchError {
	constructor(message: string, context: Record<string, unknown> & DispatchErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "NETWORK_ERROR", ErrorCategory.Retryable, rest);
		this.name = "NetworkError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable error for collaborator timeouts. */
export class TimeoutError extends DispatchError {
	constructor(message: string, context: Record<string, unknown> & DispatchErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "TIMEOUT_ERROR", ErrorCategory.Retryable, rest);
		this.name = "TimeoutError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends DispatchError {
	constructor(message: string, context: Record<string, unknown> & DispatchErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

/** Classify an unknown collaborator failure into the appropriate DispatchError subtype. */
export function classifyError(error: unknown): DispatchError {
	if (error instanceof DispatchError) return error;
	if (error instanceof Error) {
		const msg = error.message.toLowerCase();
		const code = "code" in error && typeof error.code === "string" ? error.code : undefined;

		if (code === "ETIMEDOUT" || msg.includes("timeout") || msg.includes("timed out")) {
			return new TimeoutError(error.message, { cause: error });
		}
		if (
			code === "ECONNREFUSED" ||
			code === "ENOTFOUND" ||
			code === "ECONNRESET" ||
			msg.includes("fetch failed")
		) {
			return new NetworkError(error.message, { cause: error });
		}
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}
