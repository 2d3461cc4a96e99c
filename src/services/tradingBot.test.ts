import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type AppConfig, loadConfig } from "../config";
import { TransientIOError, ValidationError } from "../errors";
import {
	FakeMarketData,
	MemoryJournal,
	RecordingExecution,
	RecordingNotifier,
	candlesFromCloses,
} from "../testing/fakes";
import { MINUTE_MS } from "../utils/time";
import { ManualSignalQueue } from "./manualSignals";
import { StateStore } from "./stateStore";
import { TradingBot } from "./tradingBot";

const T0 = 1_700_000_000_000;
const NOW = T0 + 6 * MINUTE_MS;
// RSI(2) over these closes ends 100, 100, 33.3, so StochRSI(3) reads 0.
const OVERSOLD = candlesFromCloses([1, 2, 3, 4, 5, 3], T0);

let dir: string;
let config: AppConfig;

function configFor(overrides: NodeJS.ProcessEnv = {}): AppConfig {
	return loadConfig(
		{
			RSI_PERIOD: "2",
			STOCH_PERIOD: "3",
			MIN_NOTIONAL_USD: "5",
			CIRCUIT_BREAKER_ERRORS: "5",
			RETRY_ATTEMPTS: "1",
			CANDLE_LOOKBACK: "20",
			STATE_FILE: path.join(dir, "bot-state.json"),
			...overrides,
		},
		dir,
	);
}

beforeEach(async () => {
	dir = await fs.mkdtemp(path.join(os.tmpdir(), "trading-bot-"));
	config = configFor();
});

afterEach(async () => {
	await fs.rm(dir, { recursive: true, force: true });
});

async function setup(options: { candles?: typeof OVERSOLD; equity?: number } = {}) {
	const store = new StateStore(config.paths.stateFile);
	await store.load();
	const marketData = new FakeMarketData(options.candles ?? OVERSOLD);
	const execution = new RecordingExecution(options.equity ?? 1000);
	const notifier = new RecordingNotifier();
	const journal = new MemoryJournal();
	const signals = new ManualSignalQueue(300_000, () => NOW);
	const bot = new TradingBot({
		config,
		store,
		marketData,
		execution,
		signals,
		notifier,
		journal,
		now: () => NOW,
		wait: async () => undefined,
	});
	return { bot, store, marketData, execution, notifier, journal, signals };
}

async function tripBreaker(bot: TradingBot, marketData: FakeMarketData): Promise<void> {
	for (let i = 0; i < 5; i++) {
		marketData.enqueue(new TransientIOError("market.fetchRecentCandles", "socket hang up"));
		await bot.runCycle(NOW + i * 1_000);
	}
}

describe("TradingBot", () => {
	it("opens a long when StochRSI is oversold", async () => {
		const { bot, store, execution, notifier } = await setup();

		const result = await bot.runCycle(NOW);

		expect(result.outcome).toBe("executed");
		expect(execution.orders).toEqual([{ side: "BUY", quantity: 3.333, priceHint: 3, reduceOnly: false }]);
		expect(store.snapshot().position).toEqual({
			side: "LONG",
			symbol: "ETHUSDT",
			entryPrice: 3,
			quantity: 3.333,
			entryTime: NOW,
			stopLossPrice: 2.925,
			entryFee: 0.0049995,
		});
		expect(notifier.ofType("TradeOpened")).toHaveLength(1);
	});

	it("closes on a stop-loss breach and books the trade", async () => {
		const { bot, store, marketData, execution, journal, notifier } = await setup();
		await bot.runCycle(NOW);

		marketData.fallback = [...OVERSOLD, ...candlesFromCloses([2.9], NOW)];
		const result = await bot.runCycle(NOW + 30_000);

		expect(result.action).toMatchObject({ kind: "close", exitReason: "STOP_LOSS" });
		expect(execution.orders[1]).toEqual({ side: "SELL", quantity: 3.333, priceHint: 2.9, reduceOnly: true });

		const state = store.snapshot();
		expect(state.position).toEqual({ side: "FLAT" });
		expect(state.roiLedger).toHaveLength(1);
		expect(state.roiLedger[0]).toMatchObject({
			side: "LONG",
			entryPrice: 3,
			exitPrice: 2.9,
			quantity: 3.333,
			realizedPnl: -0.34313235,
			feesPaid: 0.00983235,
			exitReason: "STOP_LOSS",
			openTime: NOW,
			closeTime: NOW + 30_000,
		});
		expect(journal.records).toEqual(state.roiLedger);
		expect(notifier.ofType("TradeClosed")).toHaveLength(1);
	});

	it("does not trade the same candle again after a stop-loss", async () => {
		const { bot, store, marketData, execution } = await setup();
		await bot.runCycle(NOW);
		marketData.fallback = [...OVERSOLD, ...candlesFromCloses([2.9], NOW)];
		await bot.runCycle(NOW + 30_000);

		const result = await bot.runCycle(NOW + 45_000);

		expect(result).toMatchObject({ outcome: "idle", detail: "waiting for a new candle" });
		expect(execution.orders.map((order) => order.side)).toEqual(["BUY", "SELL"]);
		expect(store.snapshot().lastActionCandle).toBe(T0 + 5 * MINUTE_MS);
	});

	it("lets the strategy act again once a new candle closes", async () => {
		const { bot, marketData, execution } = await setup();
		await bot.runCycle(NOW);
		marketData.fallback = [...OVERSOLD, ...candlesFromCloses([2.9], NOW)];
		await bot.runCycle(NOW + 30_000);

		// RSI(2) falls again to 31.25 on the 2.9 close, the lowest in the window.
		const result = await bot.runCycle(NOW + MINUTE_MS);

		expect(result.outcome).toBe("executed");
		expect(execution.orders.map((order) => order.side)).toEqual(["BUY", "SELL", "BUY"]);
	});

	it("skips a trade whose expected gain does not cover fees", async () => {
		config = configFor({ EXPECTED_MOVE_PERCENT: "0.05" });
		const { bot, store, execution } = await setup();

		const result = await bot.runCycle(NOW);

		expect(result).toMatchObject({
			outcome: "skipped",
			detail: "expected gain 0.0050 does not cover fees 0.0100",
		});
		expect(execution.equityCalls).toBe(1);
		expect(execution.orders).toEqual([]);
		expect(store.snapshot().errorLog).toEqual([]);
		expect(store.snapshot().lastActionCandle).toBeNull();
	});

	it("keeps the remainder open after a partial close", async () => {
		const { bot, store, execution, signals } = await setup();
		await bot.runCycle(NOW);

		execution.fillCap = 2;
		signals.push({ id: "tg-2", issuedBy: "alice", action: "SELL", issuedAt: NOW, consumed: false });
		const result = await bot.runCycle(NOW + 1_000);

		expect(result.action).toMatchObject({ kind: "close", exitReason: "MANUAL" });
		const state = store.snapshot();
		expect(state.roiLedger[0]).toMatchObject({
			quantity: 2,
			exitPrice: 3,
			feesPaid: 0.006,
			realizedPnl: -0.006,
			exitReason: "MANUAL",
		});
		expect(state.position).toEqual({
			side: "LONG",
			symbol: "ETHUSDT",
			entryPrice: 3,
			quantity: 1.333,
			entryTime: NOW,
			stopLossPrice: 2.925,
			entryFee: 0.0019995,
		});
	});

	it("pauses entries after repeated failures", async () => {
		const { bot, store, marketData, execution, notifier } = await setup();

		await tripBreaker(bot, marketData);

		const paused = notifier.ofType("BreakerPaused");
		expect(paused).toEqual([
			{ type: "BreakerPaused", pausedUntil: NOW + 4_000 + 3_600_000, errorCount: 5, extended: false },
		]);
		expect(store.snapshot().circuitBreaker.status).toBe("PAUSED");

		const result = await bot.runCycle(NOW + 10_000);
		expect(result).toMatchObject({ outcome: "idle", detail: "circuit breaker paused" });
		expect(execution.orders).toEqual([]);
		expect(execution.equityCalls).toBe(0);
	});

	it("consumes a manual BUY blocked by the breaker", async () => {
		const { bot, store, marketData, notifier, signals } = await setup();
		await tripBreaker(bot, marketData);

		signals.push({ id: "tg-1", issuedBy: "alice", action: "BUY", issuedAt: NOW - 1_000, consumed: false });
		await bot.runCycle(NOW + 10_000);

		expect(store.snapshot().consumedSignalIds).toEqual(["tg-1"]);
		expect(signals.size).toBe(0);
		expect(notifier.ofType("ManualSignalHandled")).toMatchObject([
			{ outcome: "blocked", reason: "circuit breaker paused" },
		]);
	});

	it("resumes after the cooldown", async () => {
		const { bot, store, marketData, execution, notifier } = await setup();
		await tripBreaker(bot, marketData);
		const pausedUntil = NOW + 4_000 + 3_600_000;

		const result = await bot.runCycle(pausedUntil);

		expect(notifier.ofType("BreakerResumed")).toEqual([{ type: "BreakerResumed", at: pausedUntil }]);
		expect(store.snapshot().circuitBreaker).toEqual({ status: "RUNNING", pausedUntil: null });
		expect(store.snapshot().errorLog).toEqual([]);
		expect(result.outcome).toBe("executed");
		expect(execution.orders).toHaveLength(1);
	});

	it("records errors reported between cycles", async () => {
		const { bot, store } = await setup({ candles: [] });

		bot.reportError(new TransientIOError("telegram.getUpdates", "socket hang up"));
		bot.reportError(new ValidationError("Unexpected getUpdates response"));
		const result = await bot.runCycle(NOW);

		expect(result.outcome).toBe("skipped");
		expect(store.snapshot().errorLog).toMatchObject([
			{ category: "TRANSIENT_IO", message: "telegram.getUpdates: socket hang up", timestamp: NOW },
		]);
	});

	it("skips an entry it cannot size without counting an error", async () => {
		const { bot, store, execution } = await setup({ equity: 0 });

		const result = await bot.runCycle(NOW);

		expect(result).toMatchObject({ outcome: "skipped", detail: "equity must be positive, got 0" });
		expect(execution.orders).toEqual([]);
		expect(store.snapshot().errorLog).toEqual([]);
	});

	it("reports status from the stored state", async () => {
		const { bot } = await setup();
		await bot.runCycle(NOW);

		expect(bot.statusReport()).toMatchObject({
			type: "StatusReport",
			symbol: "ETHUSDT",
			dryRun: true,
			position: { side: "LONG", quantity: 3.333 },
			circuitBreaker: { status: "RUNNING", pausedUntil: null },
			summary: { trades: 0 },
		});
	});
});
