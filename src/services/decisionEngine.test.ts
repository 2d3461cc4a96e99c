import { describe, expect, it } from "vitest";
import type { CircuitBreakerState, Position } from "../schemas/botState";
import type { Strategy } from "../strategies/types";
import { seededRandom } from "../testing/fakes";
import type { IndicatorReading, MacdPoint, ManualSignal } from "../types";
import { type DecisionInput, PAUSED_REASON, decide, stopLossPriceFor } from "./decisionEngine";

const NOW = 1_700_000_000_000;

const STOCH: Strategy = {
	kind: "stoch_rsi",
	params: { rsiPeriod: 14, stochPeriod: 14, oversold: 20, overbought: 80, expectedMovePercent: 5 },
};

const MACD: Strategy = {
	kind: "macd",
	params: { fast: 12, slow: 26, signal: 9, takeProfitPercent: 2, maxHoldHours: 24 },
};

const RUNNING: CircuitBreakerState = { status: "RUNNING", pausedUntil: null };
const PAUSED: CircuitBreakerState = { status: "PAUSED", pausedUntil: NOW + 60_000 };

const LONG: Position = {
	side: "LONG",
	symbol: "ETHUSDT",
	entryPrice: 100,
	quantity: 0.5,
	entryTime: NOW - 60_000,
	stopLossPrice: 97.5,
	entryFee: 0.025,
};

function stoch(value: number): IndicatorReading {
	return { kind: "stoch_rsi", openTime: NOW - 60_000, rsi: 40, stochRsi: value };
}

function macd(point: MacdPoint, previous: MacdPoint): IndicatorReading {
	return { kind: "macd", openTime: NOW - 60_000, ...point, previous };
}

function signal(id: string, action: ManualSignal["action"], ageMs = 1_000): ManualSignal {
	return { id, issuedBy: "operator", action, issuedAt: NOW - ageMs, consumed: false };
}

function input(overrides: Partial<DecisionInput> = {}): DecisionInput {
	return {
		strategy: STOCH,
		position: { side: "FLAT" },
		circuitBreaker: RUNNING,
		reading: stoch(50),
		price: 100,
		now: NOW,
		manualSignals: [],
		consumedSignalIds: [],
		signalTtlMs: 300_000,
		lastActionCandle: null,
		...overrides,
	};
}

describe("stopLossPriceFor", () => {
	it("places the stop below a long and above a short", () => {
		expect(stopLossPriceFor("LONG", 100, 2.5)).toBeCloseTo(97.5, 10);
		expect(stopLossPriceFor("SHORT", 100, 2.5)).toBeCloseTo(102.5, 10);
	});
});

describe("decide", () => {
	it("closes on a stop-loss breach before anything else", () => {
		const decision = decide(
			input({ position: LONG, price: 97, manualSignals: [signal("s1", "SELL")] }),
		);
		expect(decision.action).toMatchObject({
			kind: "close",
			exitReason: "STOP_LOSS",
			skipFeeCheck: true,
		});
		expect(decision.consumed).toEqual([]);
	});

	it("treats a short's stop as breached at or above the stop price", () => {
		const short: Position = { ...LONG, side: "SHORT", stopLossPrice: 102.5 };
		expect(decide(input({ position: short, price: 102.5 })).action.kind).toBe("close");
		expect(decide(input({ position: short, price: 102.4 })).action.kind).toBe("none");
	});

	it("opens a long on a manual BUY while flat", () => {
		const decision = decide(input({ manualSignals: [signal("s1", "BUY")] }));

		expect(decision.action).toMatchObject({ kind: "open", side: "LONG", source: "MANUAL" });
		expect(decision.action.kind === "open" && decision.action.targetPrice).toBeCloseTo(105, 10);
		expect(decision.consumed).toEqual(["s1"]);
		expect(decision.accepted?.id).toBe("s1");
	});

	it("closes on a manual SELL without a fee check", () => {
		const decision = decide(input({ position: LONG, manualSignals: [signal("s1", "SELL")] }));
		expect(decision.action).toEqual({
			kind: "close",
			exitReason: "MANUAL",
			skipFeeCheck: true,
			reason: "manual SELL from operator",
		});
	});

	it("consumes invalid signals ahead of the first valid one", () => {
		const decision = decide(
			input({
				manualSignals: [signal("late-buy", "BUY", 1_000), signal("early-sell", "SELL", 5_000)],
			}),
		);

		expect(decision.consumed).toEqual(["early-sell", "late-buy"]);
		expect(decision.rejected.map((r) => [r.signal.id, r.reason])).toEqual([
			["early-sell", "cannot SELL without an open position"],
		]);
		expect(decision.action.kind).toBe("open");
	});

	it("falls through to the strategy when every signal is invalid", () => {
		const decision = decide(
			input({ position: LONG, reading: stoch(85), manualSignals: [signal("s1", "BUY")] }),
		);
		expect(decision.rejected).toHaveLength(1);
		expect(decision.action).toMatchObject({ kind: "close", exitReason: "STRATEGY", skipFeeCheck: false });
	});

	it("rejects signals older than the TTL", () => {
		const decision = decide(input({ manualSignals: [signal("old", "BUY", 400_000)] }));
		expect(decision.consumed).toEqual(["old"]);
		expect(decision.rejected[0].reason).toBe("signal expired");
		expect(decision.action.kind).toBe("none");
	});

	it("ignores signals already consumed in an earlier cycle", () => {
		const decision = decide(
			input({ manualSignals: [signal("s1", "BUY")], consumedSignalIds: ["s1"] }),
		);
		expect(decision.consumed).toEqual([]);
		expect(decision.action.kind).toBe("none");
	});

	it("opens a long when StochRSI is oversold", () => {
		const decision = decide(input({ reading: stoch(12) }));
		expect(decision.action).toMatchObject({ kind: "open", side: "LONG", source: "STRATEGY" });
	});

	it("closes a long when StochRSI is overbought, with a fee check", () => {
		expect(decide(input({ position: LONG, reading: stoch(85) })).action).toEqual({
			kind: "close",
			exitReason: "STRATEGY",
			skipFeeCheck: false,
			reason: "StochRSI overbought 85.00 >= 80",
		});
	});

	describe("once a trade was made on the latest candle", () => {
		const acted = { reading: stoch(12), lastActionCandle: NOW - 60_000 };

		it("waits for the next candle before the strategy acts again", () => {
			expect(decide(input(acted)).action).toEqual({ kind: "none", reason: "waiting for a new candle" });
			expect(decide(input({ ...acted, lastActionCandle: NOW - 120_000 })).action.kind).toBe("open");
		});

		it("still honours the stop-loss and manual signals", () => {
			expect(decide(input({ ...acted, position: LONG, price: 97 })).action).toMatchObject({
				exitReason: "STOP_LOSS",
			});
			expect(decide(input({ ...acted, manualSignals: [signal("s1", "BUY")] })).action).toMatchObject({
				kind: "open",
				source: "MANUAL",
			});
		});
	});

	describe("MACD", () => {
		const bullish = macd({ macd: 0.2, signal: 0.1, histogram: 0.1 }, { macd: 0.05, signal: 0.1, histogram: -0.05 });
		const bearish = macd({ macd: -0.1, signal: 0, histogram: -0.1 }, { macd: 0.1, signal: 0.05, histogram: 0.05 });
		const flat = macd({ macd: 0.2, signal: 0.1, histogram: 0.1 }, { macd: 0.3, signal: 0.2, histogram: 0.1 });

		it("opens a long on a confirmed bullish crossover", () => {
			const action = decide(input({ strategy: MACD, reading: bullish })).action;
			expect(action).toMatchObject({ kind: "open", side: "LONG", source: "STRATEGY", reason: "MACD bullish crossover" });
			expect(action.kind === "open" && action.targetPrice).toBeCloseTo(102, 10);
		});

		it("opens a short on a confirmed bearish crossover", () => {
			const action = decide(input({ strategy: MACD, reading: bearish })).action;
			expect(action).toMatchObject({ kind: "open", side: "SHORT", reason: "MACD bearish crossover" });
			expect(action.kind === "open" && action.targetPrice).toBeCloseTo(98, 10);
		});

		it("needs rising momentum to confirm a crossover", () => {
			const fading = macd({ macd: 0.2, signal: 0.1, histogram: 0.1 }, { macd: 0.3, signal: 0.35, histogram: -0.05 });
			expect(decide(input({ strategy: MACD, reading: fading })).action).toEqual({
				kind: "none",
				reason: "no crossover",
			});
		});

		it("closes after the maximum hold time without a fee check", () => {
			const stale: Position = { ...LONG, entryTime: NOW - 25 * 3_600_000 };
			expect(decide(input({ strategy: MACD, position: stale, reading: flat })).action).toEqual({
				kind: "close",
				exitReason: "MAX_HOLD",
				skipFeeCheck: true,
				reason: "held for 24h or more",
			});
		});

		it("closes on an opposite crossover with a fee check", () => {
			expect(decide(input({ strategy: MACD, position: LONG, reading: bearish, price: 101 })).action).toEqual({
				kind: "close",
				exitReason: "STRATEGY",
				skipFeeCheck: false,
				reason: "MACD bearish crossover against long",
			});

			const short: Position = { ...LONG, side: "SHORT", stopLossPrice: 102.5 };
			expect(decide(input({ strategy: MACD, position: short, reading: bullish, price: 99.5 })).action).toMatchObject({
				exitReason: "STRATEGY",
				reason: "MACD bullish crossover against short",
			});
		});

		it("holds a position without an exit condition", () => {
			expect(decide(input({ strategy: MACD, position: LONG, reading: flat, price: 101 })).action).toEqual({
				kind: "none",
				reason: "no exit condition",
			});
		});
	});

	it("does nothing while the indicator warms up", () => {
		expect(decide(input({ reading: undefined })).action).toEqual({
			kind: "none",
			reason: "indicator warming up",
		});
	});

	it("takes profit on MACD without a fee check", () => {
		const reading: IndicatorReading = {
			kind: "macd",
			openTime: NOW,
			macd: 1,
			signal: 0.5,
			histogram: 0.5,
			previous: { macd: 0.9, signal: 0.4, histogram: 0.5 },
		};
		const decision = decide(input({ strategy: MACD, position: LONG, reading, price: 103 }));
		expect(decision.action).toMatchObject({
			kind: "close",
			exitReason: "TAKE_PROFIT",
			skipFeeCheck: true,
		});
	});

	describe("while the breaker is paused", () => {
		it("blocks a manual BUY but still consumes it", () => {
			const decision = decide(
				input({ circuitBreaker: PAUSED, manualSignals: [signal("s1", "BUY")] }),
			);
			expect(decision.action).toEqual({ kind: "none", reason: PAUSED_REASON });
			expect(decision.consumed).toEqual(["s1"]);
			expect(decision.accepted?.id).toBe("s1");
		});

		it("still closes positions", () => {
			const decision = decide(
				input({ circuitBreaker: PAUSED, position: LONG, manualSignals: [signal("s1", "SELL")] }),
			);
			expect(decision.action).toMatchObject({ kind: "close", exitReason: "MANUAL" });
		});

		it("never returns an open action", () => {
			const random = seededRandom(42);
			const pick = <T>(items: readonly T[]): T => items[Math.floor(random() * items.length)];

			for (let i = 0; i < 500; i++) {
				const position = pick<Position>([
					{ side: "FLAT" },
					LONG,
					{ ...LONG, side: "SHORT", stopLossPrice: 102.5 },
				]);
				const manualSignals = Array.from({ length: Math.floor(random() * 3) }, (_, idx) =>
					signal(`s${i}-${idx}`, pick<ManualSignal["action"]>(["BUY", "SELL"]), random() * 600_000),
				);
				const reading: IndicatorReading =
					random() < 0.5
						? stoch(random() * 100)
						: {
								kind: "macd",
								openTime: NOW,
								macd: random() - 0.5,
								signal: random() - 0.5,
								histogram: random() - 0.5,
								previous: { macd: random() - 0.5, signal: random() - 0.5, histogram: 0 },
							};

				const decision = decide(
					input({
						strategy: reading.kind === "macd" ? MACD : STOCH,
						circuitBreaker: PAUSED,
						position,
						reading: random() < 0.1 ? undefined : reading,
						price: 95 + random() * 10,
						manualSignals,
					}),
				);
				expect(decision.action.kind).not.toBe("open");
			}
		});
	});
});
