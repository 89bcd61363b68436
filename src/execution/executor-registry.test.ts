import { describe, expect, it } from "vitest";
import type { StrategyType } from "../families/types.js";
import { ConfigError } from "../shared/errors.js";
import { ExecutorRegistry } from "./executor-registry.js";
import type { StrategyExecutor } from "./types.js";

function stubExecutor(strategyType: StrategyType): StrategyExecutor {
	return {
		strategyType,
		execute: async (plan) => ({
			requestId: plan.context.requestId,
			strategyType: plan.strategyType,
			accepted: true,
		}),
	};
}

describe("ExecutorRegistry", () => {
	it("resolves a registered executor", () => {
		const grid = stubExecutor("grid_trading");
		const registry = new ExecutorRegistry().register(grid);

		const result = registry.resolve("grid_trading");

		expect(result.ok).toBe(true);
		if (result.ok) expect(result.value).toBe(grid);
	});

	it("returns a ConfigError for an unsupported strategy type", () => {
		const registry = new ExecutorRegistry().register(stubExecutor("traditional"));

		const result = registry.resolve("arbitrage");

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(ConfigError);
			expect(result.error.message).toBe('unsupported strategy type "arbitrage"');
			expect(result.error.context).toEqual({ strategyType: "arbitrage" });
		}
	});

	it("throws when a strategy type is registered twice", () => {
		const registry = new ExecutorRegistry().register(stubExecutor("mean_reversion"));

		expect(() => registry.register(stubExecutor("mean_reversion"))).toThrow(ConfigError);
	});

	it("lists registered strategy types in registration order", () => {
		const registry = new ExecutorRegistry()
			.register(stubExecutor("moving_average"))
			.register(stubExecutor("traditional"));

		expect(registry.strategyTypes()).toEqual(["moving_average", "traditional"]);
		expect(registry.has("traditional")).toBe(true);
		expect(registry.has("grid_trading")).toBe(false);
	});
});
