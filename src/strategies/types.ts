import type { Position } from "../schemas/botState";
import type { ExitReason, IndicatorReading, PositionSide } from "../types";

export type StochRsiParams = {
	rsiPeriod: number;
	stochPeriod: number;
	oversold: number;
	overbought: number;
	/** Percent move expected after an oversold entry, used by the fee filter. */
	expectedMovePercent: number;
};

export type MacdParams = {
	fast: number;
	slow: number;
	signal: number;
	takeProfitPercent: number;
	maxHoldHours: number;
};

export type Strategy =
	| { kind: "stoch_rsi"; params: StochRsiParams }
	| { kind: "macd"; params: MacdParams };

export type StrategyInput = {
	reading: IndicatorReading;
	position: Position;
	price: number;
	now: number;
};

export type StrategySignal =
	| { kind: "hold"; reason: string }
	| { kind: "open"; side: PositionSide; reason: string }
	| {
			kind: "close";
			exitReason: Extract<ExitReason, "STRATEGY" | "TAKE_PROFIT" | "MAX_HOLD">;
			reason: string;
	  };
