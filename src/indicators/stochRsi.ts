import { InsufficientDataError } from "../errors";
import type { StochRsiReading } from "../types";
import { WindowedCalculator } from "./calculator";
import { WilderRsi, calculateRsiSeries } from "./rsi";

/** Position of the last value within the window's range, scaled to 0-100. */
export function stochasticOf(values: readonly number[]): number {
	if (!values.length) {
		throw new RangeError("stochasticOf needs at least one value");
	}
	const current = values[values.length - 1];
	const highest = Math.max(...values);
	const lowest = Math.min(...values);
	if (highest === lowest) return 50;
	return ((current - lowest) / (highest - lowest)) * 100;
}

export function calculateStochRsi(
	closes: readonly number[],
	rsiPeriod: number,
	stochPeriod: number,
): { rsi: number; stochRsi: number } {
	const series = calculateRsiSeries(closes, rsiPeriod);
	if (series.length < stochPeriod) {
		throw new InsufficientDataError(
			`StochRSI(${rsiPeriod},${stochPeriod})`,
			rsiPeriod + stochPeriod,
			closes.length,
		);
	}
	const window = series.slice(-stochPeriod);
	return { rsi: window[window.length - 1], stochRsi: stochasticOf(window) };
}

export class StochRsiCalculator extends WindowedCalculator<StochRsiReading> {
	protected readonly label: string;
	private readonly rsi: WilderRsi;
	private rsiWindow: number[] = [];

	constructor(
		private readonly rsiPeriod: number,
		private readonly stochPeriod: number,
	) {
		super();
		this.label = `StochRSI(${rsiPeriod},${stochPeriod})`;
		this.rsi = new WilderRsi(rsiPeriod);
	}

	protected get required(): number {
		return this.rsiPeriod + this.stochPeriod;
	}

	protected push(close: number): void {
		const value = this.rsi.push(close);
		if (value === undefined) return;
		this.rsiWindow.push(value);
		if (this.rsiWindow.length > this.stochPeriod) {
			this.rsiWindow.shift();
		}
	}

	protected read(openTime: number): StochRsiReading | undefined {
		if (this.rsiWindow.length < this.stochPeriod) return undefined;
		return {
			kind: "stoch_rsi",
			openTime,
			rsi: this.rsiWindow[this.rsiWindow.length - 1],
			stochRsi: stochasticOf(this.rsiWindow),
		};
	}

	protected clear(): void {
		this.rsi.reset();
		this.rsiWindow = [];
	}
}
