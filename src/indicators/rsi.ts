import { InsufficientDataError } from "../errors";

export function rsiFromAverages(avgGain: number, avgLoss: number): number {
	if (avgLoss === 0) return 100;
	const rs = avgGain / avgLoss;
	return 100 - 100 / (1 + rs);
}

/** Incremental RSI using Wilder's smoothing, seeded by a simple average. */
export class WilderRsi {
	private prevClose: number | undefined;
	private samples = 0;
	private gainSum = 0;
	private lossSum = 0;
	private avgGain = 0;
	private avgLoss = 0;
	private last: number | undefined;

	constructor(readonly period: number) {
		if (!Number.isInteger(period) || period < 1) {
			throw new RangeError(`RSI period must be a positive integer, got ${period}`);
		}
	}

	get value(): number | undefined {
		return this.last;
	}

	push(close: number): number | undefined {
		if (this.prevClose === undefined) {
			this.prevClose = close;
			return undefined;
		}

		const change = close - this.prevClose;
		this.prevClose = close;
		const gain = change > 0 ? change : 0;
		const loss = change < 0 ? -change : 0;
		this.samples += 1;

		if (this.samples < this.period) {
			this.gainSum += gain;
			this.lossSum += loss;
			return undefined;
		}

		if (this.samples === this.period) {
			this.avgGain = (this.gainSum + gain) / this.period;
			this.avgLoss = (this.lossSum + loss) / this.period;
		} else {
			this.avgGain = (this.avgGain * (this.period - 1) + gain) / this.period;
			this.avgLoss = (this.avgLoss * (this.period - 1) + loss) / this.period;
		}

		this.last = rsiFromAverages(this.avgGain, this.avgLoss);
		return this.last;
	}

	reset(): void {
		this.prevClose = undefined;
		this.samples = 0;
		this.gainSum = 0;
		this.lossSum = 0;
		this.avgGain = 0;
		this.avgLoss = 0;
		this.last = undefined;
	}
}

/**
 * Every RSI value the window allows, oldest first. The first value belongs to
 * `closes[period]`.
 */
export function calculateRsiSeries(closes: readonly number[], period: number): number[] {
	if (closes.length < period + 1) return [];

	const gains: number[] = [];
	const losses: number[] = [];
	for (let i = 1; i < closes.length; i++) {
		const change = closes[i] - closes[i - 1];
		gains.push(change > 0 ? change : 0);
		losses.push(change < 0 ? -change : 0);
	}

	let avgGain = gains.slice(0, period).reduce((acc, val) => acc + val, 0) / period;
	let avgLoss = losses.slice(0, period).reduce((acc, val) => acc + val, 0) / period;
	const series = [rsiFromAverages(avgGain, avgLoss)];

	for (let i = period; i < gains.length; i++) {
		avgGain = (avgGain * (period - 1) + gains[i]) / period;
		avgLoss = (avgLoss * (period - 1) + losses[i]) / period;
		series.push(rsiFromAverages(avgGain, avgLoss));
	}

	return series;
}

export function calculateRsi(closes: readonly number[], period: number): number {
	const series = calculateRsiSeries(closes, period);
	if (!series.length) {
		throw new InsufficientDataError(`RSI(${period})`, period + 1, closes.length);
	}
	return series[series.length - 1];
}
