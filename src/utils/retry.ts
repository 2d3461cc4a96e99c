import { TransientIOError, errorMessage } from "../errors";
import { logger } from "./logger";
import { sleep } from "./time";

export type RetryOptions = {
	attempts: number;
	baseDelayMs: number;
	maxDelayMs?: number;
	/** Defaults to retrying TransientIOError only. */
	isRetryable?: (error: unknown) => boolean;
	random?: () => number;
	wait?: (ms: number) => Promise<void>;
};

/** Full-jitter exponential delay for the given zero-based retry number. */
export function backoffDelay(
	retry: number,
	baseDelayMs: number,
	maxDelayMs: number,
	random: () => number = Math.random,
): number {
	const ceiling = Math.min(maxDelayMs, baseDelayMs * 2 ** retry);
	return Math.round(ceiling / 2 + (random() * ceiling) / 2);
}

export async function withRetry<T>(
	operation: string,
	fn: () => Promise<T>,
	options: RetryOptions,
): Promise<T> {
	const attempts = Math.max(1, options.attempts);
	const isRetryable =
		options.isRetryable ?? ((error) => error instanceof TransientIOError);
	const wait = options.wait ?? sleep;
	const maxDelayMs = options.maxDelayMs ?? 30_000;

	for (let attempt = 1; ; attempt++) {
		try {
			return await fn();
		} catch (error) {
			if (attempt >= attempts || !isRetryable(error)) {
				throw error;
			}
			const delay = backoffDelay(
				attempt - 1,
				options.baseDelayMs,
				maxDelayMs,
				options.random,
			);
			logger.warn(
				{ operation, attempt, attempts, delay, error: errorMessage(error) },
				"Retrying after transient failure",
			);
			await wait(delay);
		}
	}
}

/** Rejects with TransientIOError when `promise` does not settle in time. */
export async function withTimeout<T>(
	operation: string,
	promise: Promise<T>,
	timeoutMs: number,
): Promise<T> {
	let timer: NodeJS.Timeout | undefined;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(
			() => reject(new TransientIOError(operation, `timed out after ${timeoutMs}ms`)),
			timeoutMs,
		);
	});
	try {
		return await Promise.race([promise, timeout]);
	} finally {
		clearTimeout(timer);
	}
}
