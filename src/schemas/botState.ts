import { z } from "zod";

export const BOT_STATE_VERSION = 1 as const;

export const MAX_CONSUMED_SIGNAL_IDS = 200;

export const PositionSideSchema = z.enum(["LONG", "SHORT"]);

export const FlatPositionSchema = z.object({
	side: z.literal("FLAT"),
});

export const OpenPositionSchema = z.object({
	side: PositionSideSchema,
	symbol: z.string().min(1),
	entryPrice: z.number().positive(),
	quantity: z.number().positive(),
	entryTime: z.number().int().nonnegative(),
	stopLossPrice: z.number().nonnegative(),
	entryFee: z.number().nonnegative(),
});
export type OpenPosition = z.infer<typeof OpenPositionSchema>;

export const PositionSchema = z.discriminatedUnion("side", [
	FlatPositionSchema,
	OpenPositionSchema.extend({ side: z.literal("LONG") }),
	OpenPositionSchema.extend({ side: z.literal("SHORT") }),
]);
export type Position = z.infer<typeof PositionSchema>;
export type ActivePosition = Exclude<Position, { side: "FLAT" }>;

export const ExitReasonSchema = z.enum([
	"STOP_LOSS",
	"TAKE_PROFIT",
	"MAX_HOLD",
	"STRATEGY",
	"MANUAL",
]);

export const TradeRecordSchema = z.object({
	id: z.string().min(1),
	symbol: z.string().min(1),
	side: PositionSideSchema,
	openTime: z.number().int().nonnegative(),
	closeTime: z.number().int().nonnegative(),
	entryPrice: z.number().positive(),
	exitPrice: z.number().positive(),
	quantity: z.number().nonnegative(),
	realizedPnl: z.number(),
	feesPaid: z.number().nonnegative(),
	exitReason: ExitReasonSchema,
});
export type TradeRecord = z.infer<typeof TradeRecordSchema>;

export const ErrorEventSchema = z.object({
	timestamp: z.number().int().nonnegative(),
	category: z.string().min(1),
	messageDigest: z.string().min(1),
	message: z.string(),
});
export type ErrorEvent = z.infer<typeof ErrorEventSchema>;

export const BreakerStatusSchema = z.enum(["RUNNING", "PAUSED"]);
export type BreakerStatus = z.infer<typeof BreakerStatusSchema>;

export const CircuitBreakerStateSchema = z.object({
	status: BreakerStatusSchema,
	pausedUntil: z.number().int().nullable(),
});
export type CircuitBreakerState = z.infer<typeof CircuitBreakerStateSchema>;

export const BotStateSchema = z.object({
	version: z.literal(BOT_STATE_VERSION),
	updatedAt: z.string().min(1),
	position: PositionSchema,
	roiLedger: z.array(TradeRecordSchema),
	errorLog: z.array(ErrorEventSchema),
	circuitBreaker: CircuitBreakerStateSchema,
	consumedSignalIds: z.array(z.string()).default([]),
	/** Open time of the closed candle the last executed trade was decided on. */
	lastActionCandle: z.number().int().nullable().default(null),
});
export type BotState = z.infer<typeof BotStateSchema>;

export function defaultBotState(now: number = Date.now()): BotState {
	return {
		version: BOT_STATE_VERSION,
		updatedAt: new Date(now).toISOString(),
		position: { side: "FLAT" },
		roiLedger: [],
		errorLog: [],
		circuitBreaker: { status: "RUNNING", pausedUntil: null },
		consumedSignalIds: [],
		lastActionCandle: null,
	};
}

/** Cross-field rules the schema alone cannot express. */
export function findInvariantViolations(state: BotState): string[] {
	const issues: string[] = [];

	state.roiLedger.forEach((trade, idx) => {
		if (trade.openTime >= trade.closeTime) {
			issues.push(`trade #${idx} (${trade.id}) closes at or before it opens`);
		}
	});

	const ids = new Set<string>();
	for (const trade of state.roiLedger) {
		if (ids.has(trade.id)) issues.push(`duplicate trade id ${trade.id}`);
		ids.add(trade.id);
	}

	const { status, pausedUntil } = state.circuitBreaker;
	if (status === "PAUSED" && pausedUntil === null) {
		issues.push("circuit breaker is PAUSED without pausedUntil");
	}
	if (status === "RUNNING" && pausedUntil !== null) {
		issues.push("circuit breaker is RUNNING but has pausedUntil");
	}

	return issues;
}

export function isOpen(position: Position): position is ActivePosition {
	return position.side !== "FLAT";
}
