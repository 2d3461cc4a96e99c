import { type TelegramSettings, isTelegramConfigured, sendTelegramMessage } from "../clients/telegram";
import { errorMessage } from "../errors";
import type { CircuitBreakerState, Position, TradeRecord } from "../schemas/botState";
import type { ManualSignal, PositionSide } from "../types";
import { logger } from "../utils/logger";
import { isoTime } from "../utils/time";
import type { RoiSummary } from "./roi";

export type NotificationEvent =
	| {
			type: "TradeOpened";
			symbol: string;
			side: PositionSide;
			entryPrice: number;
			quantity: number;
			stopLossPrice: number;
			source: "STRATEGY" | "MANUAL";
			reason: string;
	  }
	| { type: "TradeClosed"; trade: TradeRecord; reason: string }
	| { type: "BreakerPaused"; pausedUntil: number; errorCount: number; extended: boolean }
	| { type: "BreakerResumed"; at: number }
	| { type: "FatalError"; message: string }
	| {
			type: "ManualSignalHandled";
			signal: ManualSignal;
			outcome: "accepted" | "rejected" | "blocked";
			reason: string;
	  }
	| {
			type: "StatusReport";
			symbol: string;
			dryRun: boolean;
			position: Position;
			circuitBreaker: CircuitBreakerState;
			summary: RoiSummary;
	  };

export interface NotificationSink {
	/** Never throws and never blocks the caller on delivery. */
	emit(event: NotificationEvent): void;
}

function signed(value: number): string {
	return `${value >= 0 ? "+" : ""}${value.toFixed(4)}`;
}

function describePosition(position: Position): string {
	if (position.side === "FLAT") return "FLAT";
	return `${position.side} ${position.quantity} @ ${position.entryPrice} (SL ${position.stopLossPrice})`;
}

export function formatEvent(event: NotificationEvent): string {
	switch (event.type) {
		case "TradeOpened":
			return [
				`*Opened ${event.side}* ${event.symbol}`,
				`Entry: ${event.entryPrice}`,
				`Qty: ${event.quantity}`,
				`SL: ${event.stopLossPrice}`,
				`Signal: ${event.source} (${event.reason})`,
			].join("\n");
		case "TradeClosed":
			return [
				`*Closed ${event.trade.side}* ${event.trade.symbol} (${event.trade.exitReason})`,
				`Entry: ${event.trade.entryPrice}`,
				`Exit: ${event.trade.exitPrice}`,
				`Qty: ${event.trade.quantity}`,
				`PnL: ${signed(event.trade.realizedPnl)} (fees ${event.trade.feesPaid})`,
				`Reason: ${event.reason}`,
			].join("\n");
		case "BreakerPaused":
			return event.extended
				? `*Circuit breaker* pause extended to ${isoTime(event.pausedUntil)} (${event.errorCount} recent errors)`
				: `*Circuit breaker tripped* after ${event.errorCount} errors, entries paused until ${isoTime(event.pausedUntil)}`;
		case "BreakerResumed":
			return `*Circuit breaker reset*, trading resumed at ${isoTime(event.at)}`;
		case "FatalError":
			return `*Fatal error*: ${event.message}`;
		case "ManualSignalHandled":
			return `Manual ${event.signal.action} from ${event.signal.issuedBy} ${event.outcome}: ${event.reason}`;
		case "StatusReport":
			return [
				`*Status* ${event.symbol}${event.dryRun ? " (dry run)" : ""}`,
				`Position: ${describePosition(event.position)}`,
				`Breaker: ${event.circuitBreaker.status}${
					event.circuitBreaker.pausedUntil === null
						? ""
						: ` until ${isoTime(event.circuitBreaker.pausedUntil)}`
				}`,
				`Trades: ${event.summary.trades} (${event.summary.wins}W/${event.summary.losses}L, ${event.summary.winRate}%)`,
				`Net PnL: ${signed(event.summary.netPnl)} after ${event.summary.fees} fees`,
			].join("\n");
	}
}

export class TelegramNotifier implements NotificationSink {
	constructor(private readonly settings: TelegramSettings) {}

	emit(event: NotificationEvent): void {
		logger.info({ event: event.type }, "Notification");
		if (!isTelegramConfigured(this.settings)) return;

		sendTelegramMessage(this.settings, formatEvent(event)).catch((error: unknown) => {
			logger.warn(
				{ event: event.type, error: errorMessage(error) },
				"Failed to deliver notification",
			);
		});
	}
}
