import type { FeeSchedule, FeeScheduleProvider, PositionSide } from "../types";
import { Decimal, dec, toAmount } from "../utils/decimal";

export type FeeRole = "maker" | "taker";

export type FeeCandidate = {
	quantity: number;
	price: number;
	targetPrice: number;
	side: PositionSide;
};

export type FeeVerdict =
	| { accepted: true; expectedGain: number; roundTripFee: number }
	| { accepted: false; expectedGain: number; roundTripFee: number; reason: string };

/** Fee schedule read from configuration. */
export class StaticFeeSchedule implements FeeScheduleProvider {
	constructor(private readonly schedule: FeeSchedule) {}

	current(): FeeSchedule {
		return { ...this.schedule };
	}
}

function rateFor(schedule: FeeSchedule, role: FeeRole): Decimal {
	return dec(role === "maker" ? schedule.makerRate : schedule.takerRate);
}

export class FeeFilter {
	constructor(
		private readonly fees: FeeScheduleProvider,
		private readonly entryRole: FeeRole = "taker",
		private readonly exitRole: FeeRole = "taker",
	) {}

	/**
	 * Accepts the trade only when the move from `price` to `targetPrice` pays
	 * for both legs. A move against `side` is a negative gain.
	 */
	evaluate({ quantity, price, targetPrice, side }: FeeCandidate): FeeVerdict {
		const schedule = this.fees.current();
		const qty = dec(quantity);

		const entryFee = qty.mul(price).mul(rateFor(schedule, this.entryRole));
		const exitFee = qty.mul(targetPrice).mul(rateFor(schedule, this.exitRole));
		const roundTrip = entryFee.plus(exitFee);

		const move =
			side === "LONG" ? dec(targetPrice).minus(price) : dec(price).minus(targetPrice);
		const gain = move.mul(qty);

		const expectedGain = toAmount(gain);
		const roundTripFee = toAmount(roundTrip);

		if (gain.lte(roundTrip)) {
			return {
				accepted: false,
				expectedGain,
				roundTripFee,
				reason: `expected gain ${gain.toFixed(4)} does not cover fees ${roundTrip.toFixed(4)}`,
			};
		}
		return { accepted: true, expectedGain, roundTripFee };
	}
}
