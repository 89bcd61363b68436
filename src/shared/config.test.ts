import { describe, expect, it } from "vitest";
import { DEFAULT_DISPATCHER_CONFIG, configFromEnv, resolveConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("DispatcherConfig", () => {
	describe("DEFAULT_DISPATCHER_CONFIG", () => {
		it("has sensible defaults", () => {
			expect(DEFAULT_DISPATCHER_CONFIG).toEqual({
				name: "strategy-dispatcher",
				logLevel: "info",
				dryRun: true,
			});
		});

		it("defaults to dry run (safe by default)", () => {
			expect(DEFAULT_DISPATCHER_CONFIG.dryRun).toBe(true);
		});
	});

	describe("configFromEnv", () => {
		it("returns empty object when no DISPATCH_ env vars", () => {
			expect(configFromEnv({})).toEqual({});
		});

		it("reads DISPATCH_NAME and trims it", () => {
			expect(configFromEnv({ DISPATCH_NAME: "  router-a " }).name).toBe("router-a");
		});

		it("rejects a blank DISPATCH_NAME", () => {
			expect(() => configFromEnv({ DISPATCH_NAME: "  " })).toThrow(ConfigError);
		});

		it("reads DISPATCH_LOG_LEVEL case-insensitively", () => {
			expect(configFromEnv({ DISPATCH_LOG_LEVEL: "DEBUG" }).logLevel).toBe("debug");
		});

		it("rejects an unknown log level", () => {
			expect(() => configFromEnv({ DISPATCH_LOG_LEVEL: "verbose" })).toThrow(
				'Invalid DISPATCH_LOG_LEVEL: "verbose" must be one of trace, debug, info, warn, error, fatal',
			);
		});

		it("reads DISPATCH_DRY_RUN as boolean", () => {
			expect(configFromEnv({ DISPATCH_DRY_RUN: "false" }).dryRun).toBe(false);
			expect(configFromEnv({ DISPATCH_DRY_RUN: "true" }).dryRun).toBe(true);
		});

		it("rejects non-boolean DISPATCH_DRY_RUN", () => {
			expect(() => configFromEnv({ DISPATCH_DRY_RUN: "yes" })).toThrow(ConfigError);
		});

		it("reads process.env by default", () => {
			process.env["DISPATCH_NAME"] = "from-process";
			try {
				expect(configFromEnv().name).toBe("from-process");
			} finally {
				Reflect.deleteProperty(process.env, "DISPATCH_NAME");
			}
		});
	});

	describe("resolveConfig", () => {
		it("layers overrides over env over defaults", () => {
			const config = resolveConfig(
				{ dryRun: false },
				{ DISPATCH_NAME: "env-name", DISPATCH_DRY_RUN: "true" },
			);
			expect(config).toEqual({ name: "env-name", logLevel: "info", dryRun: false });
		});

		it("returns defaults for an empty environment", () => {
			expect(resolveConfig({}, {})).toEqual(DEFAULT_DISPATCHER_CONFIG);
		});
	});
});
