import path from "node:path";
import dotenv from "dotenv";
import cron from "node-cron";
import { z } from "zod";
import { ValidationError } from "../errors";
import { minimumLookback } from "../strategies";
import type { Strategy } from "../strategies/types";
import type { Timeframe } from "../types";

dotenv.config();

const booleanFlag = (fallback: "true" | "false") =>
	z
		.enum(["true", "false", "TRUE", "FALSE", "True", "False", "1", "0"])
		.default(fallback)
		.transform((value) => value.toLowerCase() === "true" || value === "1");

const optionalNumber = z.coerce.number().positive().optional();

const csv = z
	.string()
	.default("")
	.transform((value) =>
		value
			.split(",")
			.map((item) => item.trim())
			.filter(Boolean),
	);

const TIMEFRAMES = ["1m", "5m", "15m", "30m", "1h", "4h", "1d"] as const satisfies readonly Timeframe[];

export const envSchema = z.object({
	DRY_RUN: booleanFlag("true"),
	BINANCE_API_KEY: z.string().default(""),
	BINANCE_API_SECRET: z.string().default(""),
	BINANCE_USE_TESTNET: booleanFlag("true"),
	BINANCE_FUTURES_URL: z.string().url().optional(),
	SYMBOL: z.string().min(1).default("ETHUSDT"),
	TIMEFRAME: z.enum(TIMEFRAMES).default("30m"),
	LEVERAGE: z.coerce.number().int().min(1).max(50).default(10),

	STRATEGY_NAME: z.enum(["stoch_rsi", "macd"]).default("stoch_rsi"),
	RSI_PERIOD: z.coerce.number().int().min(1).default(14),
	STOCH_PERIOD: z.coerce.number().int().min(1).default(14),
	STOCH_RSI_OVERSOLD: z.coerce.number().gt(0).lt(100).default(20),
	STOCH_RSI_OVERBOUGHT: z.coerce.number().gt(0).lt(100).default(80),
	EXPECTED_MOVE_PERCENT: z.coerce.number().positive().default(5),
	MACD_FAST: z.coerce.number().int().min(1).default(12),
	MACD_SLOW: z.coerce.number().int().min(2).default(26),
	MACD_SIGNAL: z.coerce.number().int().min(1).default(9),
	TAKE_PROFIT_PERCENT: z.coerce.number().positive().default(2),
	MAX_HOLD_HOURS: z.coerce.number().positive().default(24),

	STOP_LOSS_PERCENT: z.coerce.number().gt(0).max(20).default(2.5),
	POSITION_SIZE_USD: optionalNumber,
	POSITION_SIZE_PERCENT: z.coerce.number().gt(0).max(10).default(1),
	MIN_NOTIONAL_USD: z.coerce.number().nonnegative().default(10),
	QUANTITY_STEP: z.coerce.number().positive().default(0.001),
	MAKER_FEE_RATE: z.coerce.number().min(0).max(0.01).default(0.0002),
	TAKER_FEE_RATE: z.coerce.number().min(0).max(0.01).default(0.0005),

	CIRCUIT_BREAKER_ERRORS: z.coerce.number().int().min(1).default(5),
	CIRCUIT_BREAKER_WINDOW_HOURS: z.coerce.number().positive().default(1),
	CIRCUIT_BREAKER_COOLDOWN_MINUTES: z.coerce.number().positive().default(60),
	RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
	RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
	IO_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

	CYCLE_INTERVAL_SEC: z.coerce.number().int().min(5).default(30),
	CANDLE_LOOKBACK: z.coerce.number().int().min(10).max(1500).default(150),
	STATUS_CRON: z
		.string()
		.default("0 * * * *")
		.refine((expression) => cron.validate(expression), "not a valid cron expression"),

	TELEGRAM_BOT_TOKEN: z.string().default(""),
	TELEGRAM_CHAT_ID: z.string().default(""),
	TELEGRAM_AUTHORIZED_USERS: csv,
	MANUAL_SIGNAL_POLL_SEC: z.coerce.number().int().min(1).default(10),
	MANUAL_SIGNAL_TTL_SEC: z.coerce.number().int().min(1).default(300),

	PAPER_EQUITY: z.coerce.number().positive().default(1000),
	STATE_FILE: z.string().default("data/bot-state.json"),
	TRADE_LOG: z.string().default("data/trades.log"),
});

export type Env = z.infer<typeof envSchema>;

function crossFieldIssues(env: Env): string[] {
	const issues: string[] = [];
	if (env.STOCH_RSI_OVERSOLD >= env.STOCH_RSI_OVERBOUGHT) {
		issues.push("STOCH_RSI_OVERSOLD must be less than STOCH_RSI_OVERBOUGHT");
	}
	if (env.MACD_FAST >= env.MACD_SLOW) {
		issues.push("MACD_FAST must be less than MACD_SLOW");
	}
	if (!env.DRY_RUN && (!env.BINANCE_API_KEY || !env.BINANCE_API_SECRET)) {
		issues.push("BINANCE_API_KEY and BINANCE_API_SECRET are required when DRY_RUN=false");
	}
	if (env.POSITION_SIZE_USD !== undefined && env.POSITION_SIZE_USD < env.MIN_NOTIONAL_USD) {
		issues.push("POSITION_SIZE_USD must be at least MIN_NOTIONAL_USD");
	}
	const lookback = minimumLookback(strategyFrom(env));
	if (env.CANDLE_LOOKBACK < lookback) {
		issues.push(`CANDLE_LOOKBACK must be at least ${lookback} for ${env.STRATEGY_NAME}`);
	}
	return issues;
}

function strategyFrom(env: Env): Strategy {
	if (env.STRATEGY_NAME === "macd") {
		return {
			kind: "macd",
			params: {
				fast: env.MACD_FAST,
				slow: env.MACD_SLOW,
				signal: env.MACD_SIGNAL,
				takeProfitPercent: env.TAKE_PROFIT_PERCENT,
				maxHoldHours: env.MAX_HOLD_HOURS,
			},
		};
	}
	return {
		kind: "stoch_rsi",
		params: {
			rsiPeriod: env.RSI_PERIOD,
			stochPeriod: env.STOCH_PERIOD,
			oversold: env.STOCH_RSI_OVERSOLD,
			overbought: env.STOCH_RSI_OVERBOUGHT,
			expectedMovePercent: env.EXPECTED_MOVE_PERCENT,
		},
	};
}

function toConfig(env: Env, cwd: string) {
	const useTestnet = env.BINANCE_USE_TESTNET;
	return {
		dryRun: env.DRY_RUN,
		exchange: {
			apiKey: env.BINANCE_API_KEY,
			apiSecret: env.BINANCE_API_SECRET,
			useTestnet,
			baseUrl:
				env.BINANCE_FUTURES_URL ??
				(useTestnet
					? "https://testnet.binancefuture.com"
					: "https://fapi.binance.com"),
			symbol: env.SYMBOL,
			timeframe: env.TIMEFRAME,
			leverage: env.LEVERAGE,
			paperEquity: env.PAPER_EQUITY,
		},
		telegram: {
			botToken: env.TELEGRAM_BOT_TOKEN,
			chatId: env.TELEGRAM_CHAT_ID,
			authorizedUsers: env.TELEGRAM_AUTHORIZED_USERS,
			pollIntervalSec: env.MANUAL_SIGNAL_POLL_SEC,
			signalTtlSec: env.MANUAL_SIGNAL_TTL_SEC,
		},
		strategy: strategyFrom(env),
		risk: {
			stopLossPercent: env.STOP_LOSS_PERCENT,
			positionSizeUsd: env.POSITION_SIZE_USD,
			positionSizePercent: env.POSITION_SIZE_PERCENT,
			minNotionalUsd: env.MIN_NOTIONAL_USD,
			quantityStep: env.QUANTITY_STEP,
			fees: {
				makerRate: env.MAKER_FEE_RATE,
				takerRate: env.TAKER_FEE_RATE,
			},
		},
		breaker: {
			threshold: env.CIRCUIT_BREAKER_ERRORS,
			windowMs: env.CIRCUIT_BREAKER_WINDOW_HOURS * 60 * 60 * 1000,
			cooldownMs: env.CIRCUIT_BREAKER_COOLDOWN_MINUTES * 60 * 1000,
		},
		io: {
			retryAttempts: env.RETRY_ATTEMPTS,
			retryDelayMs: env.RETRY_DELAY_MS,
			timeoutMs: env.IO_TIMEOUT_MS,
		},
		scheduling: {
			cycleIntervalMs: env.CYCLE_INTERVAL_SEC * 1000,
			candleLookback: env.CANDLE_LOOKBACK,
			statusCron: env.STATUS_CRON,
			timezone: "UTC",
		},
		paths: {
			stateFile: path.resolve(cwd, env.STATE_FILE),
			tradeLog: path.resolve(cwd, env.TRADE_LOG),
		},
	};
}

export type AppConfig = ReturnType<typeof toConfig>;

export function loadConfig(
	source: NodeJS.ProcessEnv = process.env,
	cwd: string = process.cwd(),
): AppConfig {
	// Blank entries in .env mean "use the default".
	const present = Object.fromEntries(
		Object.entries(source).filter(([, value]) => value !== undefined && value.trim() !== ""),
	);
	const parsed = envSchema.safeParse(present);
	if (!parsed.success) {
		const issues = parsed.error.issues.map(
			(issue) => `${issue.path.join(".") || "env"}: ${issue.message}`,
		);
		throw new ValidationError("Invalid configuration", issues);
	}

	const issues = crossFieldIssues(parsed.data);
	if (issues.length) {
		throw new ValidationError("Invalid configuration", issues);
	}

	return toConfig(parsed.data, cwd);
}

/** Config safe to log: credentials replaced, everything else as loaded. */
export function maskedConfig(config: AppConfig): AppConfig {
	const mask = (value: string) => (value ? "***" : "");
	return {
		...config,
		exchange: {
			...config.exchange,
			apiKey: mask(config.exchange.apiKey),
			apiSecret: mask(config.exchange.apiSecret),
		},
		telegram: {
			...config.telegram,
			botToken: mask(config.telegram.botToken),
		},
	};
}
