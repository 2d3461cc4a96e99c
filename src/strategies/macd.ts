import { MacdCalculator } from "../indicators/macd";
import type { MacdReading } from "../types";
import { HOUR_MS } from "../utils/time";
import type { MacdParams, StrategyInput, StrategySignal } from "./types";

export function createMacdIndicator(params: MacdParams): MacdCalculator {
	return new MacdCalculator({
		fast: params.fast,
		slow: params.slow,
		signal: params.signal,
	});
}

function crossedAbove(reading: MacdReading): boolean {
	return (
		reading.previous.macd <= reading.previous.signal &&
		reading.macd > reading.signal
	);
}

function crossedBelow(reading: MacdReading): boolean {
	return (
		reading.previous.macd >= reading.previous.signal &&
		reading.macd < reading.signal
	);
}

/** Two-sided crossover strategy with histogram and momentum confirmation. */
export function evaluateMacd(
	params: MacdParams,
	{ reading, position, price, now }: StrategyInput,
): StrategySignal {
	if (reading.kind !== "macd") {
		return { kind: "hold", reason: `unexpected ${reading.kind} reading` };
	}

	if (position.side !== "FLAT") {
		const direction = position.side === "LONG" ? 1 : -1;
		const movePercent =
			((price - position.entryPrice) / position.entryPrice) * 100 * direction;
		if (movePercent >= params.takeProfitPercent) {
			return {
				kind: "close",
				exitReason: "TAKE_PROFIT",
				reason: `take profit reached (${movePercent.toFixed(2)}%)`,
			};
		}

		if (now - position.entryTime >= params.maxHoldHours * HOUR_MS) {
			return {
				kind: "close",
				exitReason: "MAX_HOLD",
				reason: `held for ${params.maxHoldHours}h or more`,
			};
		}

		if (position.side === "LONG" && crossedBelow(reading)) {
			return {
				kind: "close",
				exitReason: "STRATEGY",
				reason: "MACD bearish crossover against long",
			};
		}
		if (position.side === "SHORT" && crossedAbove(reading)) {
			return {
				kind: "close",
				exitReason: "STRATEGY",
				reason: "MACD bullish crossover against short",
			};
		}
		return { kind: "hold", reason: "no exit condition" };
	}

	if (
		crossedAbove(reading) &&
		reading.histogram > 0 &&
		reading.macd > reading.previous.macd
	) {
		return { kind: "open", side: "LONG", reason: "MACD bullish crossover" };
	}

	if (
		crossedBelow(reading) &&
		reading.histogram < 0 &&
		reading.macd < reading.previous.macd
	) {
		return { kind: "open", side: "SHORT", reason: "MACD bearish crossover" };
	}

	return { kind: "hold", reason: "no crossover" };
}

export function macdTarget(
	params: MacdParams,
	side: "LONG" | "SHORT",
	price: number,
): number {
	const move = params.takeProfitPercent / 100;
	return side === "LONG" ? price * (1 + move) : price * (1 - move);
}
