/**
 * Dispatcher: loads an account's conditions, picks a route and hands the
 * resulting plan to the executor registered for it.
 *
 * Collaborators (store, executor) are awaited once each; the dispatcher adds
 * no retries or timeouts. Every outcome is logged and emitted, and nothing
 * thrown by a collaborator escapes `plan()` or `dispatch()`. Event handlers
 * all run even when one throws; each failure is logged.
 */

import type { ConditionStore } from "../conditions/store.js";
import type { ConditionRecord } from "../conditions/types.js";
import { buildExecutionContext, buildExecutionMarketData } from "../execution/context.js";
import type { ExecutorRegistry } from "../execution/executor-registry.js";
import type { DispatchPlan } from "../execution/types.js";
import { TypedEmitter } from "../lib/events/index.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import type { Router } from "../routing/router.js";
import { type DispatcherConfig, resolveConfig } from "../shared/config.js";
import { classifyError } from "../shared/errors.js";
import { idToNumber, idToString } from "../shared/identifiers.js";
import type { DispatchEvents } from "./events.js";
import type { DispatchOutcome, DispatchRequest } from "./types.js";

export interface DispatcherDeps {
	readonly store: ConditionStore;
	readonly router: Router;
	readonly registry: ExecutorRegistry;
	/** Defaults to a pino logger at `config.logLevel` */
	readonly logger?: Logger | undefined;
	/** Merged over the environment and defaults via `resolveConfig` */
	readonly config?: Partial<DispatcherConfig> | undefined;
}

export class Dispatcher {
	readonly events = new TypedEmitter<DispatchEvents>();
	readonly config: DispatcherConfig;

	private readonly store: ConditionStore;
	private readonly router: Router;
	private readonly registry: ExecutorRegistry;
	private readonly logger: Logger;

	constructor(deps: DispatcherDeps) {
		this.store = deps.store;
		this.router = deps.router;
		this.registry = deps.registry;
		this.config = resolveConfig(deps.config);
		this.logger = (deps.logger ?? createLogger({ level: this.config.logLevel })).child({
			dispatcher: this.config.name,
		});
	}

	/** Selects a route and builds the plan without executing it. */
	async plan(request: DispatchRequest): Promise<DispatchOutcome> {
		const log = this.requestLogger(request);
		const outcome = await this.buildPlan(request);
		this.publish(outcome, log);
		return outcome;
	}

	/**
	 * Plans and, unless `dryRun` is set, executes through the registered
	 * executor. In dry-run mode the outcome is `planned`.
	 */
	async dispatch(request: DispatchRequest): Promise<DispatchOutcome> {
		const log = this.requestLogger(request);
		const planned = await this.buildPlan(request);
		const outcome =
			planned.type === "planned" && !this.config.dryRun ? await this.execute(planned.plan) : planned;
		this.publish(outcome, log);
		return outcome;
	}

	private async buildPlan(request: DispatchRequest): Promise<DispatchOutcome> {
		let record: ConditionRecord | null;
		try {
			record = await this.store.load(request.accountId);
		} catch (e: unknown) {
			return { type: "failed", plan: null, error: classifyError(e) };
		}
		if (record === null) {
			return { type: "missing_conditions", accountId: request.accountId };
		}

		const decision = this.router.evaluate(record);
		switch (decision.type) {
			case "none":
				return { type: "no_route", accountId: request.accountId };
			case "rejected":
				return {
					type: "rejected",
					accountId: request.accountId,
					strategyType: decision.route.strategyType,
					error: decision.error,
				};
			case "selected": {
				const { route } = decision;
				const plan: DispatchPlan = Object.freeze({
					strategyType: route.strategyType,
					config: route.buildConfig(record),
					context: buildExecutionContext(
						request.symbol,
						route.strategyType,
						request.accountId,
						request.strategyId,
					),
					marketData: buildExecutionMarketData(request.market),
				});
				return { type: "planned", plan };
			}
		}
	}

	private async execute(plan: DispatchPlan): Promise<DispatchOutcome> {
		const executor = this.registry.resolve(plan.strategyType);
		if (!executor.ok) {
			return { type: "failed", plan, error: executor.error };
		}
		try {
			const report = await executor.value.execute(plan);
			return { type: "executed", plan, report };
		} catch (e: unknown) {
			return { type: "failed", plan, error: classifyError(e) };
		}
	}

	private requestLogger(request: DispatchRequest): Logger {
		return this.logger.child({
			accountId: idToNumber(request.accountId),
			strategyId: idToNumber(request.strategyId),
			symbol: idToString(request.symbol),
		});
	}

	private publish(outcome: DispatchOutcome, log: Logger): void {
		this.log(outcome, log);
		try {
			this.emit(outcome);
		} catch (e: unknown) {
			const thrown = e instanceof AggregateError ? e.errors : [e];
			for (const error of thrown) {
				log.error(
					{ err: classifyError(error).toJSON(), outcome: outcome.type },
					"dispatch event handler threw",
				);
			}
		}
	}

	private log(outcome: DispatchOutcome, log: Logger): void {
		switch (outcome.type) {
			case "planned":
				log.info(
					{
						strategyType: outcome.plan.strategyType,
						requestId: idToString(outcome.plan.context.requestId),
					},
					this.config.dryRun ? "route planned (dry run)" : "route planned",
				);
				return;
			case "executed":
				log.info(
					{
						strategyType: outcome.plan.strategyType,
						requestId: idToString(outcome.plan.context.requestId),
						accepted: outcome.report.accepted,
					},
					"strategy executed",
				);
				return;
			case "no_route":
				log.debug("no strategy enabled");
				return;
			case "rejected":
				log.warn({ strategyType: outcome.strategyType, err: outcome.error.toJSON() }, "route rejected");
				return;
			case "missing_conditions":
				log.warn("no conditions stored for account");
				return;
			case "failed":
				log.error(
					{
						...(outcome.plan !== null && {
							strategyType: outcome.plan.strategyType,
							requestId: idToString(outcome.plan.context.requestId),
						}),
						err: outcome.error.toJSON(),
					},
					"dispatch failed",
				);
				return;
		}
	}

	private emit(outcome: DispatchOutcome): void {
		switch (outcome.type) {
			case "planned":
				this.events.emit("planned", outcome);
				return;
			case "executed":
				this.events.emit("executed", outcome);
				return;
			case "no_route":
				this.events.emit("no_route", outcome);
				return;
			case "rejected":
				this.events.emit("rejected", outcome);
				return;
			case "missing_conditions":
				this.events.emit("missing_conditions", outcome);
				return;
			case "failed":
				this.events.emit("failed", outcome);
				return;
		}
	}
}
