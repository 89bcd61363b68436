/**
 * Persistence-row schema for Condition Records.
 *
 * Rows arrive snake_case, the way the conditions table stores them. Flags may
 * be booleans or 0/1 tinyints and default to false when absent; decimal
 * columns may arrive as numeric strings; NULL means "not set".
 *
 * The table also writes a column's zero value for "not set": an empty token,
 * and 0 in the columns whose builder supplies a default.
 */

import { type ValidationError, validate, z } from "../lib/validation/index.js";
import { type Result, map } from "../shared/result.js";
import { type ConditionRecord, conditionRecord } from "./types.js";

const DECIMAL_STRING = /^-?\d+(\.\d+)?$/;

const flag = z
	.union([z.boolean(), z.literal(0), z.literal(1)])
	.nullish()
	.transform((v) => v === true || v === 1);

const optionalFlag = z
	.union([z.boolean(), z.literal(0), z.literal(1)])
	.nullish()
	.transform((v) => (v === null || v === undefined ? undefined : v === true || v === 1));

const optionalNumber = z
	.union([
		z.number(),
		z.string().trim().regex(DECIMAL_STRING, "expected a decimal number").transform(Number),
	])
	.nullish()
	.transform((v) => v ?? undefined);

/** Like optionalNumber, but a stored 0 is read as unset. */
const defaultedNumber = optionalNumber.transform((v) => (v === 0 ? undefined : v));

const optionalToken = z
	.string()
	.nullish()
	.transform((v) => (v === null || v === undefined || v.trim() === "" ? undefined : v));

export const conditionRowSchema = z.object({
	// activation flags
	mean_reversion_enabled: flag,
	moving_average_enabled: flag,
	short_on_gainers: flag,
	long_on_small_gainers: flag,
	futures_price_short_strategy_enabled: flag,
	cross_exchange_arb_enabled: flag,
	spot_future_arb_enabled: flag,
	triangle_arb_enabled: flag,
	stat_arb_enabled: flag,
	futures_spot_arb_enabled: flag,
	grid_trading_enabled: flag,

	// execution
	margin_mode: optionalToken,
	enable_leverage: optionalFlag,
	default_leverage: defaultedNumber,
	max_leverage: defaultedNumber,

	// traditional
	gainers_rank_limit: optionalNumber,
	gainers_rank_limit_long: optionalNumber,
	market_cap_limit_short: optionalNumber,
	market_cap_limit_long: optionalNumber,
	short_multiplier: defaultedNumber,
	long_multiplier: defaultedNumber,
	futures_price_rank_filter_enabled: optionalFlag,
	max_futures_price_rank: optionalNumber,
	trading_type: optionalToken,
	futures_price_short_max_rank: optionalNumber,
	futures_price_short_min_funding_rate: optionalNumber,
	futures_price_short_leverage: optionalNumber,
	enable_margin_loss_stop_loss: optionalFlag,
	margin_loss_stop_loss_percent: optionalNumber,
	enable_margin_profit_take_profit: optionalFlag,
	margin_profit_take_profit_percent: optionalNumber,

	// moving average
	ma_type: optionalToken,
	short_ma_period: optionalNumber,
	long_ma_period: optionalNumber,
	ma_cross_signal: optionalToken,
	ma_trend_filter: optionalFlag,
	ma_trend_direction: optionalToken,
	ma_signal_mode: optionalToken,

	// mean reversion
	mr_period: defaultedNumber,
	mr_channel_period: defaultedNumber,
	mr_signal_mode: optionalToken,
	mr_bollinger_bands_enabled: optionalFlag,
	mr_bollinger_multiplier: defaultedNumber,
	mr_min_reversion_strength: optionalNumber,
	mr_rsi_enabled: optionalFlag,
	mr_rsi_overbought: defaultedNumber,
	mr_rsi_oversold: defaultedNumber,
	mr_max_position_size: defaultedNumber,
	mr_max_hold_hours: defaultedNumber,

	// arbitrage
	spot_future_spread: optionalNumber,

	// grid
	grid_upper_price: optionalNumber,
	grid_lower_price: optionalNumber,
	grid_levels: defaultedNumber,
	grid_investment_amount: optionalNumber,
	grid_stop_loss_enabled: optionalFlag,
	grid_stop_loss_percent: optionalNumber,
});

/** Shape of a conditions row as the store returns it. */
export type ConditionRow = z.input<typeof conditionRowSchema>;

type ParsedRow = z.output<typeof conditionRowSchema>;

function toRecord(row: ParsedRow): ConditionRecord {
	return conditionRecord({
		meanReversionEnabled: row.mean_reversion_enabled,
		movingAverageEnabled: row.moving_average_enabled,
		shortOnGainers: row.short_on_gainers,
		longOnSmallGainers: row.long_on_small_gainers,
		futuresPriceShortStrategyEnabled: row.futures_price_short_strategy_enabled,
		crossExchangeArbEnabled: row.cross_exchange_arb_enabled,
		spotFutureArbEnabled: row.spot_future_arb_enabled,
		triangleArbEnabled: row.triangle_arb_enabled,
		statArbEnabled: row.stat_arb_enabled,
		futuresSpotArbEnabled: row.futures_spot_arb_enabled,
		gridTradingEnabled: row.grid_trading_enabled,

		marginMode: row.margin_mode,
		enableLeverage: row.enable_leverage,
		defaultLeverage: row.default_leverage,
		maxLeverage: row.max_leverage,

		gainersRankLimit: row.gainers_rank_limit,
		gainersRankLimitLong: row.gainers_rank_limit_long,
		marketCapLimitShort: row.market_cap_limit_short,
		marketCapLimitLong: row.market_cap_limit_long,
		shortMultiplier: row.short_multiplier,
		longMultiplier: row.long_multiplier,
		futuresPriceRankFilterEnabled: row.futures_price_rank_filter_enabled,
		maxFuturesPriceRank: row.max_futures_price_rank,
		tradingType: row.trading_type,
		futuresPriceShortMaxRank: row.futures_price_short_max_rank,
		futuresPriceShortMinFundingRate: row.futures_price_short_min_funding_rate,
		futuresPriceShortLeverage: row.futures_price_short_leverage,
		enableMarginLossStopLoss: row.enable_margin_loss_stop_loss,
		marginLossStopLossPercent: row.margin_loss_stop_loss_percent,
		enableMarginProfitTakeProfit: row.enable_margin_profit_take_profit,
		marginProfitTakeProfitPercent: row.margin_profit_take_profit_percent,

		maType: row.ma_type,
		shortMaPeriod: row.short_ma_period,
		longMaPeriod: row.long_ma_period,
		maCrossSignal: row.ma_cross_signal,
		maTrendFilter: row.ma_trend_filter,
		maTrendDirection: row.ma_trend_direction,
		maSignalMode: row.ma_signal_mode,

		mrPeriod: row.mr_period,
		mrChannelPeriod: row.mr_channel_period,
		mrSignalMode: row.mr_signal_mode,
		mrBollingerBandsEnabled: row.mr_bollinger_bands_enabled,
		mrBollingerMultiplier: row.mr_bollinger_multiplier,
		mrMinReversionStrength: row.mr_min_reversion_strength,
		mrRsiEnabled: row.mr_rsi_enabled,
		mrRsiOverbought: row.mr_rsi_overbought,
		mrRsiOversold: row.mr_rsi_oversold,
		mrMaxPositionSize: row.mr_max_position_size,
		mrMaxHoldHours: row.mr_max_hold_hours,

		spotFutureSpread: row.spot_future_spread,

		gridUpperPrice: row.grid_upper_price,
		gridLowerPrice: row.grid_lower_price,
		gridLevels: row.grid_levels,
		gridInvestmentAmount: row.grid_investment_amount,
		gridStopLossEnabled: row.grid_stop_loss_enabled,
		gridStopLossPercent: row.grid_stop_loss_percent,
	});
}

/**
 * Parses a snake_case conditions row into a frozen Condition Record.
 * Unknown columns are ignored; a wrongly-typed column yields a ValidationError
 * naming it.
 */
export function parseConditionRecord(row: unknown): Result<ConditionRecord, ValidationError> {
	return map(validate(conditionRowSchema, row), toRecord);
}
