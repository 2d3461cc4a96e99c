export type Candle = {
	openTime: number;
	closeTime: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
};

export type Timeframe = "1m" | "5m" | "15m" | "30m" | "1h" | "4h" | "1d";

export type OrderSide = "BUY" | "SELL";

export type PositionSide = "LONG" | "SHORT";

export type ExitReason =
	| "STOP_LOSS"
	| "TAKE_PROFIT"
	| "MAX_HOLD"
	| "STRATEGY"
	| "MANUAL";

export type StochRsiReading = {
	kind: "stoch_rsi";
	openTime: number;
	rsi: number;
	stochRsi: number;
};

export type MacdPoint = {
	macd: number;
	signal: number;
	histogram: number;
};

export type MacdReading = MacdPoint & {
	kind: "macd";
	openTime: number;
	previous: MacdPoint;
};

export type IndicatorReading = StochRsiReading | MacdReading;

export type ManualSignal = {
	id: string;
	issuedBy: string;
	action: OrderSide;
	issuedAt: number;
	consumed: boolean;
};

export type OrderRequest = {
	side: OrderSide;
	quantity: number;
	priceHint: number;
	reduceOnly: boolean;
};

export type OrderResult = {
	filledPrice: number;
	filledQuantity: number;
	feePaid: number;
};

export interface MarketDataSource {
	fetchRecentCandles(
		symbol: string,
		timeframe: Timeframe,
		count: number,
	): Promise<Candle[]>;
}

export interface ExecutionClient {
	submitOrder(order: OrderRequest): Promise<OrderResult>;
	getEquity(): Promise<number>;
}

export interface ManualSignalSource {
	pollPending(): Promise<ManualSignal[]>;
	/** Consumption is tracked in BotState; this only lets the source forget them. */
	acknowledge(ids: readonly string[]): void;
}

export type FeeSchedule = {
	makerRate: number;
	takerRate: number;
};

export interface FeeScheduleProvider {
	current(): FeeSchedule;
}
