import cron from "node-cron";
import type { Subscription } from "rxjs";
import { BinanceFuturesClient } from "./clients/binance";
import { PaperExchange } from "./clients/paperExchange";
import { isTelegramConfigured, sendTelegramMessage } from "./clients/telegram";
import { type AppConfig, loadConfig, maskedConfig } from "./config";
import { ValidationError, errorMessage } from "./errors";
import { StaticFeeSchedule } from "./services/feeFilter";
import { ManualSignalQueue, watchTelegramSignals } from "./services/manualSignals";
import { TelegramNotifier, formatEvent } from "./services/notifier";
import { StateStore } from "./services/stateStore";
import { TradeLogger } from "./services/tradeLogger";
import { TradingBot } from "./services/tradingBot";
import type { ExecutionClient } from "./types";
import { logger } from "./utils/logger";

async function reportConfigFailure(error: ValidationError): Promise<void> {
	const settings = {
		botToken: process.env.TELEGRAM_BOT_TOKEN ?? "",
		chatId: process.env.TELEGRAM_CHAT_ID ?? "",
	};
	if (!isTelegramConfigured(settings)) return;
	try {
		await sendTelegramMessage(
			settings,
			formatEvent({ type: "FatalError", message: error.message }),
		);
	} catch (sendError) {
		logger.warn({ error: errorMessage(sendError) }, "Failed to deliver startup failure");
	}
}

async function createExecution(
	config: AppConfig,
	exchange: BinanceFuturesClient,
	fees: StaticFeeSchedule,
): Promise<ExecutionClient> {
	if (config.dryRun) {
		logger.info({ equity: config.exchange.paperEquity }, "Dry run: orders go to the paper exchange");
		return new PaperExchange(config.exchange.paperEquity, fees);
	}
	await exchange.setLeverage();
	return exchange;
}

async function bootstrap(): Promise<void> {
	let config: AppConfig;
	try {
		config = loadConfig();
	} catch (error) {
		if (error instanceof ValidationError) {
			logger.error({ issues: error.issues }, "Invalid configuration");
			await reportConfigFailure(error);
			process.exitCode = 1;
			return;
		}
		throw error;
	}

	logger.info({ config: maskedConfig(config) }, "Starting momentum bot");

	const notifier = new TelegramNotifier(config.telegram);
	const store = new StateStore(config.paths.stateFile);
	try {
		await store.load();
	} catch (error) {
		notifier.emit({ type: "FatalError", message: errorMessage(error) });
		throw error;
	}

	const fees = new StaticFeeSchedule(config.risk.fees);
	const exchange = new BinanceFuturesClient(config.exchange, fees, {
		requestTimeoutMs: config.io.timeoutMs,
		retry: { attempts: config.io.retryAttempts, baseDelayMs: config.io.retryDelayMs },
	});
	const execution = await createExecution(config, exchange, fees);
	const signals = new ManualSignalQueue(config.telegram.signalTtlSec * 1000);

	const bot = new TradingBot({
		config,
		store,
		marketData: exchange,
		execution,
		signals,
		notifier,
		journal: new TradeLogger(config.paths.tradeLog),
		fees,
	});

	let signalWatch: Subscription | undefined;
	if (isTelegramConfigured(config.telegram)) {
		signalWatch = watchTelegramSignals({
			settings: config.telegram,
			auth: {
				chatId: config.telegram.chatId,
				authorizedUsers: config.telegram.authorizedUsers,
			},
			pollIntervalMs: config.telegram.pollIntervalSec * 1000,
			timeoutMs: config.io.timeoutMs,
			retry: { attempts: config.io.retryAttempts, baseDelayMs: config.io.retryDelayMs },
			onError: (error) => {
				logger.warn({ error: errorMessage(error) }, "Manual signal poll failed");
				bot.reportError(error);
			},
		}).subscribe({
			next: (signal) => signals.push(signal),
			error: (error: unknown) => logger.error({ error: errorMessage(error) }, "Manual signal stream errored"),
		});
	} else {
		logger.info("Telegram not configured, manual signals disabled");
	}

	const statusJob = cron.schedule(
		config.scheduling.statusCron,
		() => notifier.emit(bot.statusReport()),
		{ timezone: config.scheduling.timezone },
	);

	bot.start();

	let stopping = false;
	const shutdown = (signal: NodeJS.Signals) => {
		if (stopping) return;
		stopping = true;
		logger.info({ signal }, "Shutting down");
		statusJob.stop();
		signalWatch?.unsubscribe();
		bot
			.stop()
			.then(() => logger.flush())
			.catch((error: unknown) => {
				logger.error({ error: errorMessage(error) }, "Shutdown failed");
				process.exitCode = 1;
			});
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);
}

bootstrap().catch((err: unknown) => {
	logger.error({ err }, "Fatal error");
	process.exitCode = 1;
});
