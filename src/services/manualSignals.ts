import { EMPTY, type Observable, from, timer } from "rxjs";
import { catchError, exhaustMap, filter, map, mergeMap } from "rxjs/operators";
import { type TelegramSettings, type TelegramUpdate, fetchTelegramUpdates } from "../clients/telegram";
import type { ManualSignal, ManualSignalSource, OrderSide } from "../types";
import { logger } from "../utils/logger";
import { type RetryOptions, withRetry, withTimeout } from "../utils/retry";

const COMMANDS: Record<string, OrderSide> = {
	"/buy": "BUY",
	"/sell": "SELL",
};

/**
 * Operator signals waiting for the decision cycle. Entries past the TTL are
 * dropped on every read.
 */
export class ManualSignalQueue implements ManualSignalSource {
	private signals: ManualSignal[] = [];

	constructor(
		private readonly ttlMs: number,
		private readonly now: () => number = Date.now,
	) {}

	push(signal: ManualSignal): void {
		if (this.signals.some((pending) => pending.id === signal.id)) return;
		this.signals.push({ ...signal });
		logger.info(
			{ id: signal.id, action: signal.action, issuedBy: signal.issuedBy },
			"Manual signal queued",
		);
	}

	async pollPending(): Promise<ManualSignal[]> {
		this.dropExpired();
		return this.signals
			.filter((signal) => !signal.consumed)
			.map((signal) => ({ ...signal }));
	}

	acknowledge(ids: readonly string[]): void {
		const consumed = new Set(ids);
		this.signals = this.signals.filter((signal) => !consumed.has(signal.id));
	}

	get size(): number {
		return this.signals.length;
	}

	private dropExpired(): void {
		const cutoff = this.now() - this.ttlMs;
		const expired = this.signals.filter((signal) => signal.issuedAt < cutoff);
		if (!expired.length) return;
		logger.info({ ids: expired.map((signal) => signal.id) }, "Dropping expired manual signals");
		this.signals = this.signals.filter((signal) => signal.issuedAt >= cutoff);
	}
}

export type SignalAuthorization = {
	chatId: string;
	/** Telegram user ids or usernames; empty means anyone in `chatId`. */
	authorizedUsers: readonly string[];
};

function isAuthorized(
	message: NonNullable<TelegramUpdate["message"]>,
	auth: SignalAuthorization,
): boolean {
	if (!auth.authorizedUsers.length) {
		return String(message.chat.id) === auth.chatId;
	}
	const sender = message.from;
	if (!sender) return false;
	const names = [String(sender.id)];
	if (sender.username) names.push(sender.username, `@${sender.username}`);
	return names.some((name) => auth.authorizedUsers.includes(name));
}

/** `/buy` or `/sell` (optionally addressed as `/buy@SomeBot`) from an authorized sender. */
export function parseSignalCommand(
	update: TelegramUpdate,
	auth: SignalAuthorization,
): ManualSignal | undefined {
	const message = update.message;
	const text = message?.text?.trim();
	if (!message || !text) return undefined;

	const command = text.split(/\s+/)[0].split("@")[0].toLowerCase();
	const action = COMMANDS[command];
	if (!action) return undefined;

	if (!isAuthorized(message, auth)) {
		logger.warn(
			{ updateId: update.update_id, from: message.from?.id, chat: message.chat.id },
			"Ignoring manual signal from unauthorized sender",
		);
		return undefined;
	}

	return {
		id: `tg-${update.update_id}`,
		issuedBy: message.from?.username ?? String(message.from?.id ?? message.chat.id),
		action,
		issuedAt: message.date * 1000,
		consumed: false,
	};
}

export type SignalWatchOptions = {
	settings: TelegramSettings;
	auth: SignalAuthorization;
	pollIntervalMs: number;
	timeoutMs: number;
	retry: RetryOptions;
	/** Called when a poll still fails after its retries. */
	onError: (error: unknown) => void;
};

/**
 * Polls getUpdates on a fixed interval. A poll still running when the next
 * tick fires is not overlapped.
 */
export function watchTelegramSignals(options: SignalWatchOptions): Observable<ManualSignal> {
	let offset: number | undefined;

	const poll = async (): Promise<TelegramUpdate[]> => {
		const updates = await withRetry(
			"telegram.getUpdates",
			() =>
				withTimeout(
					"telegram.getUpdates",
					fetchTelegramUpdates(options.settings, offset),
					options.timeoutMs,
				),
			options.retry,
		);
		for (const update of updates) {
			offset = Math.max(offset ?? 0, update.update_id + 1);
		}
		return updates;
	};

	return timer(0, options.pollIntervalMs).pipe(
		exhaustMap(() =>
			from(poll()).pipe(
				catchError((error: unknown) => {
					options.onError(error);
					return EMPTY;
				}),
			),
		),
		mergeMap((updates) => from(updates)),
		map((update) => parseSignalCommand(update, options.auth)),
		filter((signal): signal is ManualSignal => signal !== undefined),
	);
}
