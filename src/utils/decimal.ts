import Decimal from "decimal.js";

Decimal.set({ precision: 28, rounding: Decimal.ROUND_HALF_UP });

export { Decimal };

export function dec(value: Decimal.Value): Decimal {
	return new Decimal(value);
}

/** Largest multiple of `step` that does not exceed `value`. */
export function roundDownToStep(value: Decimal, step: Decimal.Value): Decimal {
	const increment = dec(step);
	if (increment.lte(0)) return value;
	return value.div(increment).floor().mul(increment);
}

/** Back to a JS number at 8 decimal places for storage and exchange calls. */
export function toAmount(value: Decimal, places = 8): number {
	return value.toDecimalPlaces(places, Decimal.ROUND_HALF_UP).toNumber();
}

export function sumOf(values: readonly Decimal.Value[]): Decimal {
	return values.reduce<Decimal>((acc, val) => acc.plus(val), dec(0));
}
