/**
 * Logger wrapper: domain-agnostic structured logging backed by pino.
 *
 * Callers depend on the narrow `Logger` interface, never on pino directly, so
 * tests can capture output through `destination` and components can accept a
 * silent logger.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	/** Bindings attached to every line, e.g. the service name */
	readonly base?: Record<string, unknown> | undefined;
	readonly redactPaths?: readonly string[] | undefined;
	readonly destination?: { write(msg: string): void } | undefined;
}

type LogMethod = {
	(msg: string): void;
	(obj: Record<string, unknown>, msg: string): void;
};

/** Structured logger interface. */
export interface Logger {
	readonly trace: LogMethod;
	readonly debug: LogMethod;
	readonly info: LogMethod;
	readonly warn: LogMethod;
	readonly error: LogMethod;
	readonly fatal: LogMethod;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Factory ─────────────────────────────────────────────────────────

function method(pinoLogger: pino.Logger, level: LogLevel): LogMethod {
	return (msgOrObj: string | Record<string, unknown>, msg?: string): void => {
		if (typeof msgOrObj === "string") {
			pinoLogger[level](msgOrObj);
		} else {
			pinoLogger[level](msgOrObj, msg ?? "");
		}
	};
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		trace: method(pinoLogger, "trace"),
		debug: method(pinoLogger, "debug"),
		info: method(pinoLogger, "info"),
		warn: method(pinoLogger, "warn"),
		error: method(pinoLogger, "error"),
		fatal: method(pinoLogger, "fatal"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with optional path redaction and a custom
 * destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info", base: { service: "strategy-dispatcher" } });
 * logger.info({ requestId: "traditional-456-BTCUSDT" }, "route selected");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.base !== undefined) {
		pinoOptions.base = { ...config.base };
	}

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const pinoLogger =
		config.destination !== undefined ? pino(pinoOptions, config.destination) : pino(pinoOptions);

	return wrapPino(pinoLogger);
}

/** A logger that drops every line. Default for components built without one. */
export function silentLogger(): Logger {
	return wrapPino(pino({ level: "silent" }));
}
