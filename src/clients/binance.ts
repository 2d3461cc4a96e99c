import { USDMClient } from "binance";
import { ExchangeRejectedError, TransientIOError, errorMessage } from "../errors";
import type {
	Candle,
	ExecutionClient,
	FeeScheduleProvider,
	MarketDataSource,
	OrderRequest,
	OrderResult,
	Timeframe,
} from "../types";
import { dec, toAmount } from "../utils/decimal";
import { logger } from "../utils/logger";
import { type RetryOptions, withRetry } from "../utils/retry";
import { sleep } from "../utils/time";

export type BinanceSettings = {
	apiKey: string;
	apiSecret: string;
	baseUrl: string;
	useTestnet: boolean;
	symbol: string;
	leverage: number;
};

function apiErrorCode(error: unknown): number | undefined {
	if (!error || typeof error !== "object" || !("code" in error)) return undefined;
	return typeof error.code === "number" ? error.code : undefined;
}

/**
 * Binance answers refused requests with a negative numeric code. Anything
 * else (socket errors, 5xx, timeouts) is worth retrying.
 */
export function classifyBinanceError(operation: string, error: unknown): Error {
	const code = apiErrorCode(error);
	const message =
		error && typeof error === "object" && "message" in error && typeof error.message === "string"
			? error.message
			: errorMessage(error);
	if (code !== undefined && code < 0) {
		return new ExchangeRejectedError(`${operation}: ${message}`, code, { cause: error });
	}
	return new TransientIOError(operation, message, { cause: error });
}

/** The part of an order response the fill is read from. */
type OrderSnapshot = {
	status: string;
	executedQty?: string | number;
	avgPrice?: string | number;
};

export type BinanceClientOptions = {
	requestTimeoutMs?: number;
	/** Status reads after placement before the fill is assumed. */
	maxPolls?: number;
	pollDelayMs?: number;
	retry?: Pick<RetryOptions, "attempts" | "baseDelayMs">;
	wait?: (ms: number) => Promise<void>;
};

const FINAL_STATUSES: ReadonlySet<string> = new Set([
	"FILLED",
	"CANCELED",
	"EXPIRED",
	"EXPIRED_IN_MATCH",
	"REJECTED",
]);

function ensureNumber(value: string | number | undefined): number {
	if (value === undefined) return 0;
	return typeof value === "number" ? value : Number(value);
}

export class BinanceFuturesClient implements MarketDataSource, ExecutionClient {
	private readonly rest: USDMClient;
	private readonly options: Required<BinanceClientOptions>;

	constructor(
		private readonly settings: BinanceSettings,
		private readonly fees: FeeScheduleProvider,
		options: BinanceClientOptions = {},
	) {
		this.options = {
			requestTimeoutMs: options.requestTimeoutMs ?? 10_000,
			maxPolls: options.maxPolls ?? 5,
			pollDelayMs: options.pollDelayMs ?? 500,
			retry: options.retry ?? { attempts: 3, baseDelayMs: 250 },
			wait: options.wait ?? sleep,
		};
		this.rest = new USDMClient(
			{
				api_key: settings.apiKey,
				api_secret: settings.apiSecret,
				baseUrl: settings.baseUrl,
				beautifyResponses: true,
				useTestnet: settings.useTestnet,
			},
			{ timeout: this.options.requestTimeoutMs },
		);
	}

	async fetchRecentCandles(
		symbol: string,
		timeframe: Timeframe,
		count: number,
	): Promise<Candle[]> {
		try {
			const data = await this.rest.getKlines({ symbol, interval: timeframe, limit: count });
			return data.map((kline) => ({
				openTime: kline[0],
				open: Number(kline[1]),
				high: Number(kline[2]),
				low: Number(kline[3]),
				close: Number(kline[4]),
				volume: Number(kline[5]),
				closeTime: kline[6],
			}));
		} catch (error) {
			throw classifyBinanceError("binance.getKlines", error);
		}
	}

	async getEquity(): Promise<number> {
		try {
			const balances = await this.rest.getBalanceV3();
			const match = balances.find((b) => b.asset === "USDT");
			// Wallet balance: margin held by an open position still counts.
			return match ? ensureNumber(match.balance) : 0;
		} catch (error) {
			throw classifyBinanceError("binance.getBalance", error);
		}
	}

	async setLeverage(): Promise<void> {
		try {
			await this.rest.setLeverage({
				symbol: this.settings.symbol,
				leverage: this.settings.leverage,
			});
			logger.info(
				{ symbol: this.settings.symbol, leverage: this.settings.leverage },
				"Leverage set",
			);
		} catch (error) {
			throw classifyBinanceError("binance.setLeverage", error);
		}
	}

	/**
	 * Market order. Once placed, the order is followed until it reaches a final
	 * status; a fill is never reported as failed just because a status read did.
	 */
	async submitOrder(order: OrderRequest): Promise<OrderResult> {
		const { symbol } = this.settings;
		let placed: OrderSnapshot & { orderId: number };
		try {
			placed = await this.rest.submitNewOrder({
				symbol,
				side: order.side,
				type: "MARKET",
				quantity: order.quantity,
				reduceOnly: order.reduceOnly ? "true" : "false",
				newOrderRespType: "RESULT",
			});
			logger.info(
				{ symbol, side: order.side, qty: order.quantity, orderId: placed.orderId, reduceOnly: order.reduceOnly },
				"Placed market order",
			);
		} catch (error) {
			throw classifyBinanceError("binance.submitNewOrder", error);
		}

		const final = await this.awaitFinalStatus(placed.orderId, placed);
		if (final) return this.toResult(final, order);

		logger.warn(
			{ symbol, orderId: placed.orderId, qty: order.quantity },
			"Order status unconfirmed, assuming the market order filled in full",
		);
		return this.toResult(
			{ status: "FILLED", executedQty: order.quantity, avgPrice: order.priceHint },
			order,
		);
	}

	private async awaitFinalStatus(
		orderId: number,
		placed: OrderSnapshot,
	): Promise<OrderSnapshot | undefined> {
		if (FINAL_STATUSES.has(placed.status)) return placed;

		const { symbol } = this.settings;
		const { maxPolls, pollDelayMs, wait } = this.options;
		for (let poll = 1; poll <= maxPolls; poll++) {
			await wait(pollDelayMs);
			try {
				const status = await withRetry(
					"binance.getOrder",
					async () => {
						try {
							return await this.rest.getOrder({ symbol, orderId });
						} catch (error) {
							throw classifyBinanceError("binance.getOrder", error);
						}
					},
					{ ...this.options.retry, wait },
				);
				if (FINAL_STATUSES.has(status.status)) return status;
				logger.debug({ symbol, orderId, status: status.status, poll }, "Order not final yet");
			} catch (error) {
				logger.warn({ symbol, orderId, poll, error: errorMessage(error) }, "Failed to read order status");
			}
		}
		return undefined;
	}

	private toResult(status: OrderSnapshot, order: OrderRequest): OrderResult {
		const filledQuantity = ensureNumber(status.executedQty);
		const filledPrice = ensureNumber(status.avgPrice) || order.priceHint;
		const feePaid = toAmount(
			dec(filledQuantity).mul(filledPrice).mul(this.fees.current().takerRate),
		);
		return { filledPrice, filledQuantity, feePaid };
	}
}
