import type { CircuitBreakerState, Position } from "../schemas/botState";
import { evaluateStrategy, targetPrice } from "../strategies";
import type { Strategy } from "../strategies/types";
import type { ExitReason, IndicatorReading, ManualSignal, PositionSide } from "../types";

export const PAUSED_REASON = "circuit breaker paused";

export type ActionSource = "STRATEGY" | "MANUAL";

export type Action =
	| { kind: "none"; reason: string }
	| {
			kind: "open";
			side: PositionSide;
			targetPrice: number;
			source: ActionSource;
			reason: string;
	  }
	| {
			kind: "close";
			exitReason: ExitReason;
			/** Protective and operator exits go out regardless of fees. */
			skipFeeCheck: boolean;
			reason: string;
	  };

export type RejectedSignal = {
	signal: ManualSignal;
	reason: string;
};

export type Decision = {
	action: Action;
	/** Signal ids to persist as consumed, accepted or not. */
	consumed: string[];
	rejected: RejectedSignal[];
	/** The manual signal that produced the action, if any. */
	accepted?: ManualSignal;
};

export type DecisionInput = {
	strategy: Strategy;
	position: Position;
	circuitBreaker: CircuitBreakerState;
	/** Undefined while the indicator is warming up. */
	reading: IndicatorReading | undefined;
	price: number;
	now: number;
	manualSignals: readonly ManualSignal[];
	consumedSignalIds: readonly string[];
	signalTtlMs: number;
	/** Candle the last executed trade was decided on; the strategy waits for a newer one. */
	lastActionCandle: number | null;
};

export function stopLossPriceFor(
	side: PositionSide,
	entryPrice: number,
	stopLossPercent: number,
): number {
	const offset = stopLossPercent / 100;
	return side === "LONG" ? entryPrice * (1 - offset) : entryPrice * (1 + offset);
}

export function stopLossBreached(position: Position, price: number): boolean {
	switch (position.side) {
		case "FLAT":
			return false;
		case "LONG":
			return price <= position.stopLossPrice;
		case "SHORT":
			return price >= position.stopLossPrice;
	}
}

type ManualOutcome = {
	action: Action | undefined;
	accepted?: ManualSignal;
	consumed: string[];
	rejected: RejectedSignal[];
};

function pickManualSignal(input: DecisionInput): ManualOutcome {
	const seen = new Set(input.consumedSignalIds);
	const pending = input.manualSignals
		.filter((signal) => !signal.consumed && !seen.has(signal.id))
		.sort((a, b) => a.issuedAt - b.issuedAt);

	const consumed: string[] = [];
	const rejected: RejectedSignal[] = [];

	for (const signal of pending) {
		consumed.push(signal.id);

		if (input.now - signal.issuedAt > input.signalTtlMs) {
			rejected.push({ signal, reason: "signal expired" });
			continue;
		}

		if (signal.action === "BUY") {
			if (input.position.side !== "FLAT") {
				rejected.push({ signal, reason: `cannot BUY while ${input.position.side}` });
				continue;
			}
			return {
				action: {
					kind: "open",
					side: "LONG",
					targetPrice: targetPrice(input.strategy, "LONG", input.price),
					source: "MANUAL",
					reason: `manual BUY from ${signal.issuedBy}`,
				},
				accepted: signal,
				consumed,
				rejected,
			};
		}

		if (input.position.side === "FLAT") {
			rejected.push({ signal, reason: "cannot SELL without an open position" });
			continue;
		}
		return {
			action: {
				kind: "close",
				exitReason: "MANUAL",
				skipFeeCheck: true,
				reason: `manual SELL from ${signal.issuedBy}`,
			},
			accepted: signal,
			consumed,
			rejected,
		};
	}

	return { action: undefined, consumed, rejected };
}

function strategyAction(input: DecisionInput): Action {
	if (!input.reading) {
		return { kind: "none", reason: "indicator warming up" };
	}
	if (input.lastActionCandle !== null && input.reading.openTime <= input.lastActionCandle) {
		return { kind: "none", reason: "waiting for a new candle" };
	}

	const signal = evaluateStrategy(input.strategy, {
		reading: input.reading,
		position: input.position,
		price: input.price,
		now: input.now,
	});

	switch (signal.kind) {
		case "hold":
			return { kind: "none", reason: signal.reason };
		case "open":
			return {
				kind: "open",
				side: signal.side,
				targetPrice: targetPrice(input.strategy, signal.side, input.price),
				source: "STRATEGY",
				reason: signal.reason,
			};
		case "close":
			return {
				kind: "close",
				exitReason: signal.exitReason,
				skipFeeCheck: signal.exitReason !== "STRATEGY",
				reason: signal.reason,
			};
	}
}

/**
 * Picks exactly one action per cycle: stop-loss, then the oldest valid manual
 * signal, then the strategy rule, else nothing. The strategy acts at most once
 * per closed candle. Entries are suppressed while the breaker is paused.
 */
export function decide(input: DecisionInput): Decision {
	const { position } = input;
	if (position.side !== "FLAT" && stopLossBreached(position, input.price)) {
		return {
			action: {
				kind: "close",
				exitReason: "STOP_LOSS",
				skipFeeCheck: true,
				reason: `price ${input.price} breached stop ${position.stopLossPrice}`,
			},
			consumed: [],
			rejected: [],
		};
	}

	const manual = pickManualSignal(input);
	const action = manual.action ?? strategyAction(input);

	if (action.kind === "open" && input.circuitBreaker.status === "PAUSED") {
		return {
			action: { kind: "none", reason: PAUSED_REASON },
			consumed: manual.consumed,
			rejected: manual.rejected,
			accepted: manual.accepted,
		};
	}

	return {
		action,
		consumed: manual.consumed,
		rejected: manual.rejected,
		accepted: manual.accepted,
	};
}
