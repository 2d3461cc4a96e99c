import { InsufficientDataError } from "../errors";
import type { Candle } from "../types";

export interface IndicatorCalculator<T> {
	/** Throws InsufficientDataError until the warm-up period is complete. */
	update(window: readonly Candle[]): T;
	reset(): void;
}

/**
 * Carries smoothing state between calls. A window that still contains the last
 * consumed candle only feeds the newer candles; any other window starts over.
 */
export abstract class WindowedCalculator<T> implements IndicatorCalculator<T> {
	private lastOpenTime: number | undefined;
	private consumed = 0;

	protected abstract readonly label: string;

	protected abstract get required(): number;

	protected abstract push(close: number): void;

	protected abstract read(openTime: number): T | undefined;

	protected abstract clear(): void;

	update(window: readonly Candle[]): T {
		for (const candle of this.unseen(window)) {
			if (
				this.lastOpenTime !== undefined &&
				candle.openTime <= this.lastOpenTime
			) {
				continue;
			}
			this.push(candle.close);
			this.consumed += 1;
			this.lastOpenTime = candle.openTime;
		}

		const reading =
			this.lastOpenTime === undefined ? undefined : this.read(this.lastOpenTime);
		if (reading === undefined) {
			throw new InsufficientDataError(this.label, this.required, this.consumed);
		}
		return reading;
	}

	reset(): void {
		this.clear();
		this.lastOpenTime = undefined;
		this.consumed = 0;
	}

	private unseen(window: readonly Candle[]): readonly Candle[] {
		if (this.lastOpenTime === undefined) return window;
		const idx = window.findIndex((c) => c.openTime === this.lastOpenTime);
		if (idx < 0) {
			this.reset();
			return window;
		}
		return window.slice(idx + 1);
	}
}
