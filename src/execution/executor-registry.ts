import type { StrategyType } from "../families/types.js";
import { ConfigError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { StrategyExecutor } from "./types.js";

/**
 * Maps each strategy type to the one backend that runs it.
 *
 * Populated at process start. A second registration for the same type is a
 * wiring mistake and throws.
 */
export class ExecutorRegistry {
	private readonly executors = new Map<StrategyType, StrategyExecutor>();

	/** @throws ConfigError when `executor.strategyType` is already registered */
	register(executor: StrategyExecutor): this {
		if (this.executors.has(executor.strategyType)) {
			throw new ConfigError(`executor already registered for strategy type "${executor.strategyType}"`, {
				strategyType: executor.strategyType,
			});
		}
		this.executors.set(executor.strategyType, executor);
		return this;
	}

	resolve(strategyType: StrategyType): Result<StrategyExecutor, ConfigError> {
		const executor = this.executors.get(strategyType);
		if (executor === undefined) {
			return err(new ConfigError(`unsupported strategy type "${strategyType}"`, { strategyType }));
		}
		return ok(executor);
	}

	has(strategyType: StrategyType): boolean {
		return this.executors.has(strategyType);
	}

	strategyTypes(): readonly StrategyType[] {
		return [...this.executors.keys()];
	}
}
