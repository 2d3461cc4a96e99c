import crypto from "node:crypto";
import type { AppConfig } from "../config";
import {
	ExchangeRejectedError,
	FeeRejectedError,
	InsufficientDataError,
	SizingError,
	categoryOf,
	countsTowardBreaker,
	errorMessage,
} from "../errors";
import type { IndicatorCalculator } from "../indicators/calculator";
import { type ActivePosition, type TradeRecord, isOpen } from "../schemas/botState";
import { createIndicator } from "../strategies";
import type {
	ExecutionClient,
	FeeScheduleProvider,
	IndicatorReading,
	ManualSignal,
	ManualSignalSource,
	MarketDataSource,
	OrderRequest,
	OrderResult,
} from "../types";
import { dec, toAmount } from "../utils/decimal";
import { logger } from "../utils/logger";
import { withRetry, withTimeout } from "../utils/retry";
import { sleep } from "../utils/time";
import { type BreakerOutcome, CircuitBreaker, type BreakerTransition, errorEvent } from "./circuitBreaker";
import { type Action, PAUSED_REASON, decide, stopLossPriceFor } from "./decisionEngine";
import { FeeFilter, StaticFeeSchedule } from "./feeFilter";
import type { NotificationEvent, NotificationSink } from "./notifier";
import { PositionSizer, sizingPolicyFrom } from "./positionSizer";
import { grossPnlOf, summarizeLedger } from "./roi";
import type { StateStore } from "./stateStore";

export interface TradeJournal {
	logTrade(record: TradeRecord): Promise<void>;
}

export type TradingBotDeps = {
	config: AppConfig;
	store: StateStore;
	marketData: MarketDataSource;
	execution: ExecutionClient;
	signals: ManualSignalSource;
	notifier: NotificationSink;
	journal?: TradeJournal;
	fees?: FeeScheduleProvider;
	now?: () => number;
	/** Backoff sleep between retries. */
	wait?: (ms: number) => Promise<void>;
};

export type CycleResult = {
	action: Action;
	outcome: "executed" | "idle" | "skipped" | "failed";
	detail: string;
};

type PendingError = { error: unknown; at: number };

type Decided = {
	action: Action;
	price: number;
	/** Open time of the latest closed candle behind the decision. */
	candle: number | undefined;
};

function orderSideFor(position: ActivePosition): OrderRequest["side"] {
	return position.side === "LONG" ? "SELL" : "BUY";
}

export class TradingBot {
	private readonly config: AppConfig;
	private readonly store: StateStore;
	private readonly marketData: MarketDataSource;
	private readonly execution: ExecutionClient;
	private readonly signals: ManualSignalSource;
	private readonly notifier: NotificationSink;
	private readonly journal: TradeJournal | undefined;
	private readonly now: () => number;
	private readonly wait: (ms: number) => Promise<void>;

	private readonly indicator: IndicatorCalculator<IndicatorReading>;
	private readonly breaker: CircuitBreaker;
	private readonly sizer: PositionSizer;
	private readonly feeFilter: FeeFilter;

	private pendingErrors: PendingError[] = [];
	private running = false;
	private loop: Promise<void> | undefined;
	private wake: (() => void) | undefined;

	constructor(deps: TradingBotDeps) {
		this.config = deps.config;
		this.store = deps.store;
		this.marketData = deps.marketData;
		this.execution = deps.execution;
		this.signals = deps.signals;
		this.notifier = deps.notifier;
		this.journal = deps.journal;
		this.now = deps.now ?? Date.now;
		this.wait = deps.wait ?? sleep;

		const { risk } = deps.config;
		this.indicator = createIndicator(deps.config.strategy);
		this.breaker = new CircuitBreaker(deps.config.breaker);
		this.sizer = new PositionSizer({
			policy: sizingPolicyFrom(risk),
			minNotionalUsd: risk.minNotionalUsd,
			quantityStep: risk.quantityStep,
		});
		this.feeFilter = new FeeFilter(deps.fees ?? new StaticFeeSchedule(risk.fees));
	}

	/** Queues a failure seen outside the cycle; it is recorded on the next cycle. */
	reportError(error: unknown): void {
		if (!countsTowardBreaker(error)) {
			logger.warn({ error: errorMessage(error) }, "Ignoring non-fault error report");
			return;
		}
		this.pendingErrors.push({ error, at: this.now() });
	}

	async runCycle(now: number = this.now()): Promise<CycleResult> {
		await this.settleBreaker(now);

		let action: Action = { kind: "none", reason: "cycle did not reach a decision" };
		try {
			const decided = await this.decideAction(now);
			action = decided.action;
			return await this.execute(decided, now);
		} catch (error) {
			return this.handleCycleError(action, error, now);
		}
	}

	start(): void {
		if (this.running) return;
		this.running = true;
		logger.info(
			{
				symbol: this.config.exchange.symbol,
				timeframe: this.config.exchange.timeframe,
				strategy: this.config.strategy.kind,
				intervalMs: this.config.scheduling.cycleIntervalMs,
			},
			"Trading loop started",
		);
		this.loop = this.runLoop();
	}

	/** Stops after the in-flight cycle and its commits have finished. */
	async stop(): Promise<void> {
		this.running = false;
		this.wake?.();
		await this.loop;
		await this.store.flush();
		logger.info("Trading loop stopped");
	}

	statusReport(): NotificationEvent {
		const state = this.store.snapshot();
		return {
			type: "StatusReport",
			symbol: this.config.exchange.symbol,
			dryRun: this.config.dryRun,
			position: state.position,
			circuitBreaker: state.circuitBreaker,
			summary: summarizeLedger(state.roiLedger),
		};
	}

	private async runLoop(): Promise<void> {
		while (this.running) {
			const result = await this.runCycle();
			logger.debug({ outcome: result.outcome, detail: result.detail }, "Cycle finished");
			if (!this.running) break;
			await this.pause(this.config.scheduling.cycleIntervalMs);
		}
	}

	private pause(ms: number): Promise<void> {
		return new Promise((resolve) => {
			const done = () => {
				clearTimeout(timer);
				this.wake = undefined;
				resolve();
			};
			const timer = setTimeout(done, ms);
			this.wake = done;
		});
	}

	private io<T>(operation: string, fn: () => Promise<T>): Promise<T> {
		return withRetry(
			operation,
			() => withTimeout(operation, fn(), this.config.io.timeoutMs),
			{ attempts: this.config.io.retryAttempts, baseDelayMs: this.config.io.retryDelayMs, wait: this.wait },
		);
	}

	private async settleBreaker(now: number): Promise<void> {
		const pending = this.pendingErrors.splice(0);
		const state = this.store.snapshot();

		let outcome: BreakerOutcome = this.breaker.refresh(state, now);
		const transitions: BreakerTransition[] = outcome.transition ? [outcome.transition] : [];
		for (const { error, at } of pending) {
			outcome = this.breaker.record(outcome, errorEvent(error, at), now);
			if (outcome.transition) transitions.push(outcome.transition);
		}

		if (!pending.length && !transitions.length && outcome.errorLog.length === state.errorLog.length) {
			return;
		}

		try {
			await this.store.commit((draft) => {
				draft.errorLog = outcome.errorLog;
				draft.circuitBreaker = outcome.circuitBreaker;
			}, "breaker update");
		} catch (error) {
			this.pendingErrors.unshift(...pending);
			logger.error({ error: errorMessage(error) }, "Failed to persist breaker state");
			return;
		}
		this.announce(transitions, outcome, now);
	}

	private announce(transitions: readonly BreakerTransition[], outcome: BreakerOutcome, now: number): void {
		for (const transition of transitions) {
			if (transition === "RESUMED") {
				logger.info("Circuit breaker reset, trading resumed");
				this.notifier.emit({ type: "BreakerResumed", at: now });
				continue;
			}
			logger.warn(
				{ pausedUntil: outcome.circuitBreaker.pausedUntil, errors: outcome.errorLog.length },
				transition === "PAUSED" ? "Circuit breaker tripped" : "Circuit breaker pause extended",
			);
			this.notifier.emit({
				type: "BreakerPaused",
				pausedUntil: outcome.circuitBreaker.pausedUntil ?? now,
				errorCount: outcome.errorLog.length,
				extended: transition === "EXTENDED",
			});
		}
	}

	private async recordFailure(error: unknown, now: number): Promise<void> {
		const outcome = this.breaker.record(this.store.snapshot(), errorEvent(error, now), now);
		try {
			await this.store.commit((draft) => {
				draft.errorLog = outcome.errorLog;
				draft.circuitBreaker = outcome.circuitBreaker;
			}, "record error");
		} catch (commitError) {
			logger.error(
				{ error: errorMessage(commitError), original: errorMessage(error) },
				"Failed to record error event",
			);
			return;
		}
		if (outcome.transition) {
			this.announce([outcome.transition], outcome, now);
		}
	}

	private async readIndicator(now: number): Promise<{ reading: IndicatorReading | undefined; price: number }> {
		const { symbol, timeframe } = this.config.exchange;
		const candles = await this.io("market.fetchRecentCandles", () =>
			this.marketData.fetchRecentCandles(symbol, timeframe, this.config.scheduling.candleLookback),
		);
		const latest = candles.at(-1);
		if (!latest) {
			throw new InsufficientDataError("price feed", 1, 0);
		}

		const closed = candles.filter((candle) => candle.closeTime < now);
		try {
			return { reading: this.indicator.update(closed), price: latest.close };
		} catch (error) {
			if (!(error instanceof InsufficientDataError)) throw error;
			logger.debug({ error: error.message }, "Indicator warming up");
			return { reading: undefined, price: latest.close };
		}
	}

	private async decideAction(now: number): Promise<Decided> {
		const { reading, price } = await this.readIndicator(now);
		const manualSignals = await this.signals.pollPending();
		const state = this.store.snapshot();

		const decision = decide({
			strategy: this.config.strategy,
			position: state.position,
			circuitBreaker: state.circuitBreaker,
			reading,
			price,
			now,
			manualSignals,
			consumedSignalIds: state.consumedSignalIds,
			signalTtlMs: this.config.telegram.signalTtlSec * 1000,
			lastActionCandle: state.lastActionCandle,
		});

		if (decision.consumed.length) {
			await this.store.commit((draft) => {
				draft.consumedSignalIds.push(...decision.consumed);
			}, "consume manual signals");
			this.signals.acknowledge(decision.consumed);
		}
		for (const { signal, reason } of decision.rejected) {
			this.signalHandled(signal, "rejected", reason);
		}
		if (decision.accepted) {
			const blocked =
				decision.action.kind === "none" && decision.action.reason === PAUSED_REASON;
			this.signalHandled(decision.accepted, blocked ? "blocked" : "accepted", decision.action.reason);
		}

		return { action: decision.action, price, candle: reading?.openTime };
	}

	private signalHandled(
		signal: ManualSignal,
		outcome: "accepted" | "rejected" | "blocked",
		reason: string,
	): void {
		logger.info({ id: signal.id, action: signal.action, outcome, reason }, "Manual signal handled");
		this.notifier.emit({ type: "ManualSignalHandled", signal, outcome, reason });
	}

	private async execute({ action, price, candle }: Decided, now: number): Promise<CycleResult> {
		switch (action.kind) {
			case "none":
				logger.debug({ reason: action.reason }, "No action");
				return { action, outcome: "idle", detail: action.reason };
			case "open":
				return this.openPosition(action, price, candle, now);
			case "close":
				return this.closePosition(action, price, candle, now);
		}
	}

	private async submit(order: OrderRequest): Promise<OrderResult> {
		// Never retried or raced against a timeout: a placed order is followed to its fill by the client.
		const result = await this.execution.submitOrder(order);
		if (!(result.filledQuantity > 0)) {
			throw new ExchangeRejectedError(`${order.side} ${order.quantity} was not filled`);
		}
		return result;
	}

	private async openPosition(
		action: Extract<Action, { kind: "open" }>,
		price: number,
		candle: number | undefined,
		now: number,
	): Promise<CycleResult> {
		const state = this.store.snapshot();
		if (state.circuitBreaker.status === "PAUSED") {
			return { action, outcome: "skipped", detail: PAUSED_REASON };
		}
		if (isOpen(state.position)) {
			return { action, outcome: "skipped", detail: `already ${state.position.side}` };
		}

		const equity = await this.io("execution.getEquity", () => this.execution.getEquity());
		const size = this.sizer.size(equity, price);

		const verdict = this.feeFilter.evaluate({
			quantity: size.quantity,
			price,
			targetPrice: action.targetPrice,
			side: action.side,
		});
		if (!verdict.accepted) {
			throw new FeeRejectedError(verdict.reason);
		}

		const fill = await this.submit({
			side: action.side === "LONG" ? "BUY" : "SELL",
			quantity: size.quantity,
			priceHint: price,
			reduceOnly: false,
		});

		const { symbol } = this.config.exchange;
		const stopLossPrice = toAmount(
			dec(stopLossPriceFor(action.side, fill.filledPrice, this.config.risk.stopLossPercent)),
		);
		await this.store.commit((draft) => {
			draft.position = {
				side: action.side,
				symbol,
				entryPrice: fill.filledPrice,
				quantity: fill.filledQuantity,
				entryTime: now,
				stopLossPrice,
				entryFee: fill.feePaid,
			};
			if (candle !== undefined) draft.lastActionCandle = candle;
		}, `open ${action.side}`);

		logger.info(
			{
				symbol,
				side: action.side,
				entry: fill.filledPrice,
				qty: fill.filledQuantity,
				stopPrice: stopLossPrice,
				source: action.source,
			},
			"Position opened",
		);
		this.notifier.emit({
			type: "TradeOpened",
			symbol,
			side: action.side,
			entryPrice: fill.filledPrice,
			quantity: fill.filledQuantity,
			stopLossPrice,
			source: action.source,
			reason: action.reason,
		});
		return { action, outcome: "executed", detail: action.reason };
	}

	private async closePosition(
		action: Extract<Action, { kind: "close" }>,
		price: number,
		candle: number | undefined,
		now: number,
	): Promise<CycleResult> {
		const { position } = this.store.snapshot();
		if (!isOpen(position)) {
			return { action, outcome: "skipped", detail: "no open position" };
		}

		if (!action.skipFeeCheck) {
			const verdict = this.feeFilter.evaluate({
				quantity: position.quantity,
				price: position.entryPrice,
				targetPrice: price,
				side: position.side,
			});
			if (!verdict.accepted) {
				throw new FeeRejectedError(verdict.reason);
			}
		}

		const fill = await this.submit({
			side: orderSideFor(position),
			quantity: position.quantity,
			priceHint: price,
			reduceOnly: true,
		});

		const record = this.tradeRecord(position, fill, action, now);
		const remaining = dec(position.quantity).minus(record.quantity);

		await this.store.commit((draft) => {
			draft.roiLedger.push(record);
			if (remaining.gt(0)) {
				draft.position = {
					...position,
					quantity: toAmount(remaining),
					entryFee: toAmount(dec(position.entryFee).mul(remaining).div(position.quantity)),
				};
			} else {
				draft.position = { side: "FLAT" };
			}
			if (candle !== undefined) draft.lastActionCandle = candle;
		}, `close ${action.exitReason}`);

		logger.info(
			{
				symbol: record.symbol,
				exitReason: record.exitReason,
				exit: record.exitPrice,
				pnl: record.realizedPnl,
				remaining: toAmount(remaining),
			},
			"Position closed",
		);
		if (this.journal) {
			try {
				await this.journal.logTrade(record);
			} catch (error) {
				logger.warn({ tradeId: record.id, error: errorMessage(error) }, "Failed to append trade log");
			}
		}
		this.notifier.emit({ type: "TradeClosed", trade: record, reason: action.reason });
		return { action, outcome: "executed", detail: action.reason };
	}

	private tradeRecord(
		position: ActivePosition,
		fill: OrderResult,
		action: Extract<Action, { kind: "close" }>,
		now: number,
	): TradeRecord {
		const quantity = Math.min(fill.filledQuantity, position.quantity);
		const entryFeeShare = dec(position.entryFee).mul(quantity).div(position.quantity);
		const fees = entryFeeShare.plus(fill.feePaid);
		const gross = grossPnlOf(position.side, position.entryPrice, fill.filledPrice, quantity);

		return {
			id: crypto.randomUUID(),
			symbol: position.symbol,
			side: position.side,
			openTime: position.entryTime,
			closeTime: Math.max(now, position.entryTime + 1),
			entryPrice: position.entryPrice,
			exitPrice: fill.filledPrice,
			quantity,
			realizedPnl: toAmount(dec(gross).minus(fees)),
			feesPaid: toAmount(fees),
			exitReason: action.exitReason,
		};
	}

	private async handleCycleError(action: Action, error: unknown, now: number): Promise<CycleResult> {
		const detail = errorMessage(error);

		if (error instanceof SizingError || error instanceof FeeRejectedError) {
			logger.warn({ action: action.kind, reason: detail }, "Trade skipped by risk checks");
			return { action, outcome: "skipped", detail };
		}
		if (!countsTowardBreaker(error)) {
			logger.info({ category: categoryOf(error), reason: detail }, "Cycle skipped");
			return { action, outcome: "skipped", detail };
		}

		logger.error({ action: action.kind, category: categoryOf(error), error: detail }, "Cycle failed");
		await this.recordFailure(error, now);
		return { action, outcome: "failed", detail };
	}
}
