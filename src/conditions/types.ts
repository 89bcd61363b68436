/**
 * Condition Record: one account's enabled strategy families and their tunables.
 *
 * Read-only snapshot loaded fresh per dispatch decision. Activation flags are
 * independent: zero, one or many may be true at once. Tunables are optional;
 * each family's config builder fills in its own defaults.
 *
 * Enumerated tunables are carried as raw strings. An unrecognized token must
 * reach the family validator (which invalidates the route) rather than fail
 * the load.
 */

/** Activation flags, one or more per strategy family. */
export interface ActivationFlags {
	// mean_reversion
	readonly meanReversionEnabled: boolean;
	// moving_average
	readonly movingAverageEnabled: boolean;
	// traditional
	readonly shortOnGainers: boolean;
	readonly longOnSmallGainers: boolean;
	readonly futuresPriceShortStrategyEnabled: boolean;
	// arbitrage
	readonly crossExchangeArbEnabled: boolean;
	readonly spotFutureArbEnabled: boolean;
	readonly triangleArbEnabled: boolean;
	readonly statArbEnabled: boolean;
	readonly futuresSpotArbEnabled: boolean;
	// grid_trading
	readonly gridTradingEnabled: boolean;
}

/** Margin and leverage settings shared by every family that trades on margin. */
export interface ExecutionTunables {
	/** Raw token; recognized: ISOLATED, CROSS */
	readonly marginMode?: string | undefined;
	readonly enableLeverage?: boolean | undefined;
	readonly defaultLeverage?: number | undefined;
	readonly maxLeverage?: number | undefined;
}

export interface TraditionalTunables {
	readonly gainersRankLimit?: number | undefined;
	readonly gainersRankLimitLong?: number | undefined;
	/** In units of 10,000 */
	readonly marketCapLimitShort?: number | undefined;
	/** In units of 10,000 */
	readonly marketCapLimitLong?: number | undefined;
	readonly shortMultiplier?: number | undefined;
	readonly longMultiplier?: number | undefined;
	readonly futuresPriceRankFilterEnabled?: boolean | undefined;
	readonly maxFuturesPriceRank?: number | undefined;
	/** Raw token; recognized: spot, futures, both */
	readonly tradingType?: string | undefined;
	readonly futuresPriceShortMaxRank?: number | undefined;
	readonly futuresPriceShortMinFundingRate?: number | undefined;
	readonly futuresPriceShortLeverage?: number | undefined;
	readonly enableMarginLossStopLoss?: boolean | undefined;
	readonly marginLossStopLossPercent?: number | undefined;
	readonly enableMarginProfitTakeProfit?: boolean | undefined;
	readonly marginProfitTakeProfitPercent?: number | undefined;
}

export interface MovingAverageTunables {
	/** Raw token; recognized: SMA, EMA */
	readonly maType?: string | undefined;
	readonly shortMaPeriod?: number | undefined;
	readonly longMaPeriod?: number | undefined;
	/** Raw token; recognized: GOLDEN_CROSS, DEATH_CROSS, BOTH */
	readonly maCrossSignal?: string | undefined;
	readonly maTrendFilter?: boolean | undefined;
	/** Raw token; recognized: UP, DOWN, BOTH */
	readonly maTrendDirection?: string | undefined;
	/** Raw token; recognized: QUALITY_FIRST, BALANCED, QUANTITY_FIRST */
	readonly maSignalMode?: string | undefined;
}

export interface MeanReversionTunables {
	readonly mrPeriod?: number | undefined;
	readonly mrChannelPeriod?: number | undefined;
	/** Raw token; recognized: conservative, balanced, aggressive, adaptive */
	readonly mrSignalMode?: string | undefined;
	readonly mrBollingerBandsEnabled?: boolean | undefined;
	readonly mrBollingerMultiplier?: number | undefined;
	readonly mrMinReversionStrength?: number | undefined;
	readonly mrRsiEnabled?: boolean | undefined;
	readonly mrRsiOverbought?: number | undefined;
	readonly mrRsiOversold?: number | undefined;
	readonly mrMaxPositionSize?: number | undefined;
	readonly mrMaxHoldHours?: number | undefined;
}

export interface ArbitrageTunables {
	/** Minimum profit threshold for any enabled arbitrage mode */
	readonly spotFutureSpread?: number | undefined;
}

export interface GridTunables {
	readonly gridUpperPrice?: number | undefined;
	readonly gridLowerPrice?: number | undefined;
	readonly gridLevels?: number | undefined;
	readonly gridInvestmentAmount?: number | undefined;
	readonly gridStopLossEnabled?: boolean | undefined;
	readonly gridStopLossPercent?: number | undefined;
}

export interface ConditionRecord
	extends ActivationFlags,
		ExecutionTunables,
		TraditionalTunables,
		MovingAverageTunables,
		MeanReversionTunables,
		ArbitrageTunables,
		GridTunables {}

/** All activation flags cleared. Spread over it to build a record in code. */
export const NO_FLAGS: ActivationFlags = Object.freeze({
	meanReversionEnabled: false,
	movingAverageEnabled: false,
	shortOnGainers: false,
	longOnSmallGainers: false,
	futuresPriceShortStrategyEnabled: false,
	crossExchangeArbEnabled: false,
	spotFutureArbEnabled: false,
	triangleArbEnabled: false,
	statArbEnabled: false,
	futuresSpotArbEnabled: false,
	gridTradingEnabled: false,
});

/** Builds a frozen Condition Record with every flag defaulting to false. */
export function conditionRecord(fields: Partial<ConditionRecord> = {}): ConditionRecord {
	return Object.freeze({ ...NO_FLAGS, ...fields });
}
