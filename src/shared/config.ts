/**
 * Dispatcher runtime configuration.
 *
 * Only operational knobs live here. Route priorities and family defaults are
 * code, not configuration: changing them means redeploying the route table.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { ConfigError } from "./errors.js";

export interface DispatcherConfig {
	/** Service name, bound to every log line */
	readonly name: string;
	/** Minimum log level */
	readonly logLevel: LogLevel;
	/** When true, plans are built and logged but never handed to an executor */
	readonly dryRun: boolean;
}

export const DEFAULT_DISPATCHER_CONFIG: DispatcherConfig = {
	name: "strategy-dispatcher",
	logLevel: "info",
	dryRun: true,
};

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

/** Mutable builder shape for constructing Partial<DispatcherConfig>. */
interface MutableDispatcherConfig {
	name?: string;
	logLevel?: LogLevel;
	dryRun?: boolean;
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * Reads dispatcher config values from environment variables.
 * Supported: DISPATCH_NAME, DISPATCH_LOG_LEVEL, DISPATCH_DRY_RUN.
 * @throws ConfigError if a variable holds an unrecognized value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<DispatcherConfig> {
	const result: MutableDispatcherConfig = {};

	const name = env["DISPATCH_NAME"];
	if (name !== undefined) {
		if (name.trim().length === 0) {
			throw new ConfigError("Invalid DISPATCH_NAME: must not be blank", { key: "DISPATCH_NAME" });
		}
		result.name = name.trim();
	}

	const level = env["DISPATCH_LOG_LEVEL"];
	if (level !== undefined) {
		const normalized = level.trim().toLowerCase();
		if (!isLogLevel(normalized)) {
			throw new ConfigError(
				`Invalid DISPATCH_LOG_LEVEL: "${level}" must be one of ${LOG_LEVELS.join(", ")}`,
				{ key: "DISPATCH_LOG_LEVEL" },
			);
		}
		result.logLevel = normalized;
	}

	const dryRun = env["DISPATCH_DRY_RUN"];
	if (dryRun !== undefined) {
		if (dryRun !== "true" && dryRun !== "false") {
			throw new ConfigError(`Invalid DISPATCH_DRY_RUN: "${dryRun}" must be "true" or "false"`, {
				key: "DISPATCH_DRY_RUN",
			});
		}
		result.dryRun = dryRun === "true";
	}

	return result;
}

/** Merges defaults, environment values and explicit overrides (last wins). */
export function resolveConfig(
	overrides: Partial<DispatcherConfig> = {},
	env: NodeJS.ProcessEnv = process.env,
): DispatcherConfig {
	return { ...DEFAULT_DISPATCHER_CONFIG, ...configFromEnv(env), ...overrides };
}
