import crypto from "node:crypto";
import { describe, expect, it } from "vitest";
import { SizingError, TransientIOError } from "../errors";
import type { ErrorEvent } from "../schemas/botState";
import { type BreakerSlice, CircuitBreaker, errorEvent } from "./circuitBreaker";

const breaker = new CircuitBreaker({ threshold: 3, windowMs: 60_000, cooldownMs: 120_000 });

function running(errorLog: ErrorEvent[] = []): BreakerSlice {
	return { errorLog, circuitBreaker: { status: "RUNNING", pausedUntil: null } };
}

function failure(at: number): ErrorEvent {
	return errorEvent(new TransientIOError("market.fetchRecentCandles", "socket hang up"), at);
}

describe("errorEvent", () => {
	it("digests category and message", () => {
		const event = errorEvent(new TransientIOError("op", "boom"), 1_000);
		expect(event).toEqual({
			timestamp: 1_000,
			category: "TRANSIENT_IO",
			message: "op: boom",
			messageDigest: crypto.createHash("sha1").update("TRANSIENT_IO:op: boom").digest("hex"),
		});
	});

	it("truncates long messages to 200 characters", () => {
		const event = errorEvent(new Error("x".repeat(500)), 0);
		expect(event.message).toHaveLength(200);
		expect(event.category).toBe("INTERNAL");
	});

	it("keeps the category of risk errors", () => {
		expect(errorEvent(new SizingError("too small"), 0).category).toBe("SIZING");
	});
});

describe("CircuitBreaker", () => {
	it("stays running below the threshold", () => {
		const first = breaker.record(running(), failure(0), 0);
		const second = breaker.record(first, failure(1_000), 1_000);

		expect(second.transition).toBeNull();
		expect(second.circuitBreaker).toEqual({ status: "RUNNING", pausedUntil: null });
		expect(second.errorLog).toHaveLength(2);
	});

	it("pauses when the threshold is reached inside the window", () => {
		let state = running();
		for (const at of [0, 10_000]) {
			state = breaker.record(state, failure(at), at);
		}
		const outcome = breaker.record(state, failure(20_000), 20_000);

		expect(outcome.transition).toBe("PAUSED");
		expect(outcome.circuitBreaker).toEqual({ status: "PAUSED", pausedUntil: 140_000 });
	});

	it("forgets events older than the window", () => {
		let state = running();
		for (const at of [0, 10_000]) {
			state = breaker.record(state, failure(at), at);
		}
		const outcome = breaker.record(state, failure(70_000), 70_000);

		expect(outcome.transition).toBeNull();
		expect(outcome.errorLog.map((event) => event.timestamp)).toEqual([70_000]);
	});

	it("extends an existing pause instead of pausing again", () => {
		const paused: BreakerSlice = {
			errorLog: [failure(0), failure(1_000), failure(2_000)],
			circuitBreaker: { status: "PAUSED", pausedUntil: 122_000 },
		};
		const outcome = breaker.record(paused, failure(30_000), 30_000);

		expect(outcome.transition).toBe("EXTENDED");
		expect(outcome.circuitBreaker).toEqual({ status: "PAUSED", pausedUntil: 150_000 });
	});

	it("resumes once the cooldown has elapsed and clears the error log", () => {
		const paused: BreakerSlice = {
			errorLog: [failure(0), failure(1_000), failure(2_000)],
			circuitBreaker: { status: "PAUSED", pausedUntil: 122_000 },
		};

		const early = breaker.refresh(paused, 121_999);
		expect(early.transition).toBeNull();
		expect(early.circuitBreaker.status).toBe("PAUSED");

		const resumed = breaker.refresh(paused, 122_000);
		expect(resumed).toEqual({
			errorLog: [],
			circuitBreaker: { status: "RUNNING", pausedUntil: null },
			transition: "RESUMED",
		});
	});

	it("prunes stale events on refresh while running", () => {
		const outcome = breaker.refresh(running([failure(0), failure(50_000)]), 100_000);
		expect(outcome.errorLog.map((event) => event.timestamp)).toEqual([50_000]);
		expect(outcome.transition).toBeNull();
	});
});
