import { bench, describe } from "vitest";
import { conditionRecord } from "../src/conditions/types.js";
import { RouteTable } from "../src/routing/route-table.js";
import { Router } from "../src/routing/router.js";

const router = new Router(RouteTable.standard());

const gridOnly = conditionRecord({ gridTradingEnabled: true, gridLevels: 20 });
const everything = conditionRecord({
	meanReversionEnabled: true,
	movingAverageEnabled: true,
	maType: "SMA",
	shortMaPeriod: 5,
	longMaPeriod: 20,
	shortOnGainers: true,
	statArbEnabled: true,
	spotFutureSpread: 0.2,
	gridTradingEnabled: true,
});

describe("route selection", () => {
	bench("lowest priority only (walks the whole table)", () => {
		for (let i = 0; i < 1000; i++) {
			router.selectRoute(gridOnly);
		}
	});

	bench("all families enabled", () => {
		for (let i = 0; i < 1000; i++) {
			router.selectRoute(everything);
		}
	});

	bench("select and build config", () => {
		for (let i = 0; i < 1000; i++) {
			router.selectRoute(everything)?.buildConfig(everything);
		}
	});
});
