import type { IndicatorCalculator } from "../indicators/calculator";
import type { IndicatorReading, PositionSide } from "../types";
import { createMacdIndicator, evaluateMacd, macdTarget } from "./macd";
import { createStochRsiIndicator, evaluateStochRsi, stochRsiTarget } from "./stochRsi";
import type { Strategy, StrategyInput, StrategySignal } from "./types";

export type { Strategy, StrategyInput, StrategySignal } from "./types";

export function createIndicator(strategy: Strategy): IndicatorCalculator<IndicatorReading> {
	switch (strategy.kind) {
		case "stoch_rsi":
			return createStochRsiIndicator(strategy.params);
		case "macd":
			return createMacdIndicator(strategy.params);
	}
}

export function evaluateStrategy(strategy: Strategy, input: StrategyInput): StrategySignal {
	switch (strategy.kind) {
		case "stoch_rsi":
			return evaluateStochRsi(strategy.params, input);
		case "macd":
			return evaluateMacd(strategy.params, input);
	}
}

/** Price the strategy expects to exit at, used to estimate gain before fees. */
export function targetPrice(strategy: Strategy, side: PositionSide, price: number): number {
	switch (strategy.kind) {
		case "stoch_rsi":
			return side === "LONG" ? stochRsiTarget(strategy.params, price) : price;
		case "macd":
			return macdTarget(strategy.params, side, price);
	}
}

/** Closed candles the indicator needs before its first reading. */
export function warmupCandles(strategy: Strategy): number {
	switch (strategy.kind) {
		case "stoch_rsi":
			return strategy.params.rsiPeriod + strategy.params.stochPeriod;
		case "macd":
			return strategy.params.slow + strategy.params.signal;
	}
}

/**
 * Smallest candle window that warms the indicator up and leaves room for its
 * smoothing to settle, plus the forming candle that is never used. Over a
 * shorter sliding window a recompute drifts away from the running values.
 */
export function minimumLookback(strategy: Strategy): number {
	const smoothing =
		strategy.kind === "stoch_rsi" ? strategy.params.rsiPeriod : strategy.params.slow;
	return warmupCandles(strategy) + 4 * smoothing + 1;
}
