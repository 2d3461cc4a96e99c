import crypto from "node:crypto";
import { categoryOf, errorMessage } from "../errors";
import type { CircuitBreakerState, ErrorEvent } from "../schemas/botState";

export const MAX_ERROR_MESSAGE_LENGTH = 200;

export type BreakerSettings = {
	threshold: number;
	windowMs: number;
	cooldownMs: number;
};

export type BreakerTransition = "PAUSED" | "EXTENDED" | "RESUMED";

export type BreakerSlice = {
	errorLog: ErrorEvent[];
	circuitBreaker: CircuitBreakerState;
};

export type BreakerOutcome = BreakerSlice & {
	transition: BreakerTransition | null;
};

export function errorEvent(error: unknown, now: number): ErrorEvent {
	const category = categoryOf(error);
	const message = errorMessage(error).slice(0, MAX_ERROR_MESSAGE_LENGTH);
	const messageDigest = crypto
		.createHash("sha1")
		.update(`${category}:${message}`)
		.digest("hex");
	return { timestamp: now, category, messageDigest, message };
}

/**
 * Counts failures over a sliding window. Reaching the threshold pauses new
 * entries for the cooldown; further failures while paused push the resume
 * time out instead of pausing again.
 */
export class CircuitBreaker {
	constructor(private readonly settings: BreakerSettings) {}

	record(state: BreakerSlice, event: ErrorEvent, now: number): BreakerOutcome {
		const errorLog = [...this.prune(state.errorLog, now), event];

		if (errorLog.length < this.settings.threshold) {
			return { errorLog, circuitBreaker: { ...state.circuitBreaker }, transition: null };
		}

		const pausedUntil = now + this.settings.cooldownMs;
		if (state.circuitBreaker.status === "PAUSED") {
			return {
				errorLog,
				circuitBreaker: {
					status: "PAUSED",
					pausedUntil: Math.max(pausedUntil, state.circuitBreaker.pausedUntil ?? 0),
				},
				transition: "EXTENDED",
			};
		}

		return {
			errorLog,
			circuitBreaker: { status: "PAUSED", pausedUntil },
			transition: "PAUSED",
		};
	}

	refresh(state: BreakerSlice, now: number): BreakerOutcome {
		const { status, pausedUntil } = state.circuitBreaker;
		if (status === "PAUSED" && pausedUntil !== null && now >= pausedUntil) {
			return {
				errorLog: [],
				circuitBreaker: { status: "RUNNING", pausedUntil: null },
				transition: "RESUMED",
			};
		}
		return {
			errorLog: this.prune(state.errorLog, now),
			circuitBreaker: { ...state.circuitBreaker },
			transition: null,
		};
	}

	private prune(errorLog: readonly ErrorEvent[], now: number): ErrorEvent[] {
		const cutoff = now - this.settings.windowMs;
		return errorLog.filter((event) => event.timestamp > cutoff);
	}
}
