import { StochRsiCalculator } from "../indicators/stochRsi";
import type { StochRsiParams, StrategyInput, StrategySignal } from "./types";

export function createStochRsiIndicator(params: StochRsiParams): StochRsiCalculator {
	return new StochRsiCalculator(params.rsiPeriod, params.stochPeriod);
}

/** Long-only mean reversion: buy oversold, sell overbought. */
export function evaluateStochRsi(
	params: StochRsiParams,
	{ reading, position }: StrategyInput,
): StrategySignal {
	if (reading.kind !== "stoch_rsi") {
		return { kind: "hold", reason: `unexpected ${reading.kind} reading` };
	}
	const value = reading.stochRsi.toFixed(2);

	if (position.side === "FLAT") {
		if (reading.stochRsi <= params.oversold) {
			return {
				kind: "open",
				side: "LONG",
				reason: `StochRSI oversold ${value} <= ${params.oversold}`,
			};
		}
		return { kind: "hold", reason: `StochRSI ${value} above oversold band` };
	}

	if (position.side === "LONG" && reading.stochRsi >= params.overbought) {
		return {
			kind: "close",
			exitReason: "STRATEGY",
			reason: `StochRSI overbought ${value} >= ${params.overbought}`,
		};
	}

	return { kind: "hold", reason: `StochRSI ${value} inside bands` };
}

export function stochRsiTarget(params: StochRsiParams, price: number): number {
	return price * (1 + params.expectedMovePercent / 100);
}
