import type { TradeRecord } from "../schemas/botState";
import { logger } from "../utils/logger";
import { appendLine } from "../utils/storage";

/** Appends closed trades to a JSON-lines journal beside the state file. */
export class TradeLogger {
	constructor(private readonly filePath: string) {}

	async logTrade(record: TradeRecord): Promise<void> {
		await appendLine(this.filePath, JSON.stringify(record));
		logger.info(
			{ tradeId: record.id, symbol: record.symbol, pnl: record.realizedPnl },
			"Trade recorded",
		);
	}
}
