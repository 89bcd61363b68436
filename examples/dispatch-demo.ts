/**
 * Dispatch demo: routes two accounts and prints what each backend would run.
 *
 * Dry run: plans are built and logged, no executor is called.
 * Run: npx tsx examples/dispatch-demo.ts
 */

import {
	Dispatcher,
	ExecutorRegistry,
	MemoryConditionStore,
	RouteTable,
	Router,
	type StrategyExecutor,
	accountId,
	createLogger,
	strategyId,
	tradingSymbol,
} from "../src/index.js";

// ── Conditions, as the conditions table would return them ───────────

const store = new MemoryConditionStore();

const rows = [
	{ short_on_gainers: 1, gainers_rank_limit: "15", market_cap_limit_short: "2.5" },
	{ moving_average_enabled: 1, ma_type: "EMA", short_ma_period: 9, long_ma_period: 21, grid_trading_enabled: 1 },
];

rows.forEach((row, i) => {
	const stored = store.putRow(accountId(i + 1), row);
	if (!stored.ok) throw stored.error;
});

// ── Wiring ───────────────────────────────────────────────────────────

const logging: StrategyExecutor = {
	strategyType: "traditional",
	execute: async (plan) => ({ requestId: plan.context.requestId, strategyType: plan.strategyType, accepted: true }),
};

const dispatcher = new Dispatcher({
	store,
	router: new Router(RouteTable.standard()),
	registry: new ExecutorRegistry().register(logging),
	logger: createLogger({ level: "info", base: { service: "dispatch-demo" } }),
	config: { dryRun: true },
});

dispatcher.events.on("planned", ({ plan }) => {
	console.log(`${plan.context.requestId}:`, JSON.stringify(plan.config));
});

// ── Run ──────────────────────────────────────────────────────────────

for (const [account, symbol] of [
	[1, "BTCUSDT"],
	[2, "ETHUSDT"],
] as const) {
	await dispatcher.dispatch({
		accountId: accountId(account),
		strategyId: strategyId(account * 100),
		symbol: tradingSymbol(symbol),
		market: { symbol, marketCap: 1_000_000_000, gainersRank: 3, hasSpot: true, hasFutures: true },
	});
}
