import { SizingError } from "../errors";
import { dec, roundDownToStep, toAmount } from "../utils/decimal";

export type SizingPolicy =
	| { kind: "fixed"; notionalUsd: number }
	| { kind: "percent"; percent: number };

export type SizerOptions = {
	policy: SizingPolicy;
	minNotionalUsd: number;
	quantityStep: number;
	/** Largest share of equity a single position may take. */
	maxEquityFraction?: number;
};

export type PositionSize = {
	quantity: number;
	notional: number;
};

/** A fixed notional, when configured, takes precedence over the percentage. */
export function sizingPolicyFrom(risk: {
	positionSizeUsd?: number;
	positionSizePercent: number;
}): SizingPolicy {
	if (risk.positionSizeUsd !== undefined) {
		return { kind: "fixed", notionalUsd: risk.positionSizeUsd };
	}
	return { kind: "percent", percent: risk.positionSizePercent };
}

export class PositionSizer {
	private readonly maxEquityFraction: number;

	constructor(private readonly options: SizerOptions) {
		this.maxEquityFraction = options.maxEquityFraction ?? 0.5;
	}

	size(equity: number, price: number): PositionSize {
		if (!(equity > 0)) {
			throw new SizingError(`equity must be positive, got ${equity}`);
		}
		if (!(price > 0)) {
			throw new SizingError(`price must be positive, got ${price}`);
		}

		const { policy } = this.options;
		const intended =
			policy.kind === "fixed"
				? dec(policy.notionalUsd)
				: dec(equity).mul(policy.percent).div(100);

		const cap = dec(equity).mul(this.maxEquityFraction);
		if (intended.gt(cap)) {
			throw new SizingError(
				`notional ${intended.toFixed(2)} exceeds ${this.maxEquityFraction * 100}% of equity ${equity}`,
			);
		}

		const quantity = roundDownToStep(intended.div(price), this.options.quantityStep);
		const notional = quantity.mul(price);
		if (quantity.lte(0) || notional.lt(this.options.minNotionalUsd)) {
			throw new SizingError(
				`notional ${notional.toFixed(2)} below minimum ${this.options.minNotionalUsd}`,
			);
		}

		return { quantity: toAmount(quantity), notional: toAmount(notional) };
	}
}
