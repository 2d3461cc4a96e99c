import type { PositionSide } from "../types";
import type { TradeRecord } from "../schemas/botState";
import { dec, sumOf, toAmount } from "../utils/decimal";

export type RoiSummary = {
	trades: number;
	wins: number;
	losses: number;
	/** Percentage of trades with positive net PnL, 0 when there are none. */
	winRate: number;
	grossPnl: number;
	fees: number;
	netPnl: number;
};

/** Price move times quantity, signed by the position side. Fees excluded. */
export function grossPnlOf(
	side: PositionSide,
	entryPrice: number,
	exitPrice: number,
	quantity: number,
): number {
	const move =
		side === "LONG" ? dec(exitPrice).minus(entryPrice) : dec(entryPrice).minus(exitPrice);
	return toAmount(move.mul(quantity));
}

/** `realizedPnl` on a record is already net of fees. */
export function summarizeLedger(ledger: readonly TradeRecord[]): RoiSummary {
	const net = sumOf(ledger.map((trade) => trade.realizedPnl));
	const fees = sumOf(ledger.map((trade) => trade.feesPaid));
	const wins = ledger.filter((trade) => trade.realizedPnl > 0).length;
	const losses = ledger.filter((trade) => trade.realizedPnl < 0).length;

	return {
		trades: ledger.length,
		wins,
		losses,
		winRate: ledger.length ? toAmount(dec(wins).div(ledger.length).mul(100), 2) : 0,
		grossPnl: toAmount(net.plus(fees)),
		fees: toAmount(fees),
		netPnl: toAmount(net),
	};
}
