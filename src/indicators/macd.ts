import { InsufficientDataError } from "../errors";
import type { MacdPoint, MacdReading } from "../types";
import { WindowedCalculator } from "./calculator";
import { Ema, calculateEmaSeries } from "./ema";

export type MacdPeriods = {
	fast: number;
	slow: number;
	signal: number;
};

function assertPeriods({ fast, slow }: MacdPeriods): void {
	if (fast >= slow) {
		throw new RangeError(`MACD fast period (${fast}) must be below slow period (${slow})`);
	}
}

export function calculateMacdSeries(
	closes: readonly number[],
	periods: MacdPeriods,
): MacdPoint[] {
	assertPeriods(periods);
	const fastEma = calculateEmaSeries(closes, periods.fast);
	const slowEma = calculateEmaSeries(closes, periods.slow);
	const offset = periods.slow - periods.fast;
	const macdLine = slowEma.map((slow, i) => fastEma[i + offset] - slow);
	const signalLine = calculateEmaSeries(macdLine, periods.signal);

	return signalLine.map((signal, i) => {
		const macd = macdLine[i + periods.signal - 1];
		return { macd, signal, histogram: macd - signal };
	});
}

/** Latest MACD point together with the one before it, for crossover checks. */
export function calculateMacd(
	closes: readonly number[],
	periods: MacdPeriods,
): MacdPoint & { previous: MacdPoint } {
	const series = calculateMacdSeries(closes, periods);
	if (series.length < 2) {
		throw new InsufficientDataError(
			`MACD(${periods.fast},${periods.slow},${periods.signal})`,
			periods.slow + periods.signal,
			closes.length,
		);
	}
	return { ...series[series.length - 1], previous: series[series.length - 2] };
}

export class MacdCalculator extends WindowedCalculator<MacdReading> {
	protected readonly label: string;
	private readonly fastEma: Ema;
	private readonly slowEma: Ema;
	private readonly signalEma: Ema;
	private latest: MacdPoint | undefined;
	private previous: MacdPoint | undefined;

	constructor(private readonly periods: MacdPeriods) {
		super();
		assertPeriods(periods);
		this.label = `MACD(${periods.fast},${periods.slow},${periods.signal})`;
		this.fastEma = new Ema(periods.fast);
		this.slowEma = new Ema(periods.slow);
		this.signalEma = new Ema(periods.signal);
	}

	protected get required(): number {
		return this.periods.slow + this.periods.signal;
	}

	protected push(close: number): void {
		const fast = this.fastEma.push(close);
		const slow = this.slowEma.push(close);
		if (fast === undefined || slow === undefined) return;

		const macd = fast - slow;
		const signal = this.signalEma.push(macd);
		if (signal === undefined) return;

		this.previous = this.latest;
		this.latest = { macd, signal, histogram: macd - signal };
	}

	protected read(openTime: number): MacdReading | undefined {
		if (!this.latest || !this.previous) return undefined;
		return { kind: "macd", openTime, ...this.latest, previous: this.previous };
	}

	protected clear(): void {
		this.fastEma.reset();
		this.slowEma.reset();
		this.signalEma.reset();
		this.latest = undefined;
		this.previous = undefined;
	}
}
