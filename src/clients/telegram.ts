import axios from "axios";
import { z } from "zod";
import { TransientIOError, ValidationError, errorMessage } from "../errors";
import { logger } from "../utils/logger";

export type TelegramSettings = {
	botToken: string;
	chatId: string;
};

const API_BASE = "https://api.telegram.org";

const TelegramUpdateSchema = z.object({
	update_id: z.number().int(),
	message: z
		.object({
			message_id: z.number().int(),
			date: z.number().int(),
			text: z.string().optional(),
			from: z
				.object({
					id: z.number().int(),
					username: z.string().optional(),
				})
				.optional(),
			chat: z.object({ id: z.number().int() }),
		})
		.optional(),
});
export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>;

const GetUpdatesResponseSchema = z.object({
	ok: z.boolean(),
	result: z.array(TelegramUpdateSchema),
});

export function isTelegramConfigured(settings: TelegramSettings): boolean {
	return Boolean(settings.botToken && settings.chatId);
}

export async function sendTelegramMessage(
	settings: TelegramSettings,
	text: string,
): Promise<void> {
	if (!isTelegramConfigured(settings)) {
		logger.warn("Telegram bot token or chat id missing, skipping notification");
		return;
	}

	const url = `${API_BASE}/bot${settings.botToken}/sendMessage`;

	try {
		await axios.post(url, {
			chat_id: settings.chatId,
			text,
			parse_mode: "Markdown",
		});
	} catch (error) {
		throw new TransientIOError("telegram.sendMessage", errorMessage(error), {
			cause: error,
		});
	}
}

/** Updates after `offset`, long-polled for up to `timeoutSec`. */
export async function fetchTelegramUpdates(
	settings: TelegramSettings,
	offset: number | undefined,
	timeoutSec = 0,
): Promise<TelegramUpdate[]> {
	const url = `${API_BASE}/bot${settings.botToken}/getUpdates`;

	let data: unknown;
	try {
		const response = await axios.get<unknown>(url, {
			params: { offset, timeout: timeoutSec, allowed_updates: '["message"]' },
		});
		data = response.data;
	} catch (error) {
		throw new TransientIOError("telegram.getUpdates", errorMessage(error), {
			cause: error,
		});
	}

	const parsed = GetUpdatesResponseSchema.safeParse(data);
	if (!parsed.success || !parsed.data.ok) {
		throw new ValidationError(
			"Unexpected getUpdates response",
			parsed.success ? ["ok=false"] : parsed.error.issues.map((issue) => issue.message),
		);
	}
	return parsed.data.result;
}
