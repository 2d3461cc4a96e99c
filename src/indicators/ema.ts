/** EMA seeded with the simple average of its first `period` samples. */
export class Ema {
	private readonly k: number;
	private seedSum = 0;
	private seedCount = 0;
	private current: number | undefined;

	constructor(readonly period: number) {
		if (!Number.isInteger(period) || period < 1) {
			throw new RangeError(`EMA period must be a positive integer, got ${period}`);
		}
		this.k = 2 / (period + 1);
	}

	get value(): number | undefined {
		return this.current;
	}

	push(sample: number): number | undefined {
		if (this.current === undefined) {
			this.seedSum += sample;
			this.seedCount += 1;
			if (this.seedCount === this.period) {
				this.current = this.seedSum / this.period;
			}
			return this.current;
		}
		this.current = sample * this.k + this.current * (1 - this.k);
		return this.current;
	}

	reset(): void {
		this.seedSum = 0;
		this.seedCount = 0;
		this.current = undefined;
	}
}

/** EMA values aligned so that index 0 belongs to `values[period - 1]`. */
export function calculateEmaSeries(values: readonly number[], period: number): number[] {
	if (values.length < period) return [];
	const k = 2 / (period + 1);
	let ema = values.slice(0, period).reduce((acc, val) => acc + val, 0) / period;
	const series = [ema];
	for (let i = period; i < values.length; i++) {
		ema = values[i] * k + ema * (1 - k);
		series.push(ema);
	}
	return series;
}
