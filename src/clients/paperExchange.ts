import type {
	ExecutionClient,
	FeeScheduleProvider,
	OrderRequest,
	OrderResult,
} from "../types";
import { Decimal, dec, toAmount } from "../utils/decimal";
import { logger } from "../utils/logger";

type PaperHolding = {
	/** Positive for long, negative for short. */
	quantity: Decimal;
	entryPrice: Decimal;
};

/**
 * Dry-run execution: fills every market order at its price hint, charges the
 * taker fee and books realized PnL into a simulated balance.
 */
export class PaperExchange implements ExecutionClient {
	private balance: Decimal;
	private holding: PaperHolding = { quantity: dec(0), entryPrice: dec(0) };

	constructor(
		startingEquity: number,
		private readonly fees: FeeScheduleProvider,
	) {
		this.balance = dec(startingEquity);
	}

	async getEquity(): Promise<number> {
		return toAmount(this.balance);
	}

	async submitOrder(order: OrderRequest): Promise<OrderResult> {
		const price = dec(order.priceHint);
		const signed = order.side === "BUY" ? dec(order.quantity) : dec(order.quantity).neg();
		let quantity = dec(order.quantity);

		const current = this.holding.quantity;
		const reducing = !current.isZero() && current.isPositive() !== signed.isPositive();

		if (order.reduceOnly && !reducing) {
			quantity = dec(0);
		} else if (reducing) {
			const closing = Decimal.min(quantity, current.abs());
			if (order.reduceOnly) quantity = closing;
			const direction = current.isPositive() ? 1 : -1;
			this.balance = this.balance.plus(
				price.minus(this.holding.entryPrice).mul(closing).mul(direction),
			);
		}

		const feePaid = quantity.mul(price).mul(this.fees.current().takerRate);
		this.balance = this.balance.minus(feePaid);
		this.applyFill(order.side === "BUY" ? quantity : quantity.neg(), price);

		logger.info(
			{ side: order.side, qty: toAmount(quantity), price: order.priceHint, balance: toAmount(this.balance) },
			"Paper order filled",
		);

		return {
			filledPrice: order.priceHint,
			filledQuantity: toAmount(quantity),
			feePaid: toAmount(feePaid),
		};
	}

	private applyFill(delta: Decimal, price: Decimal): void {
		const before = this.holding.quantity;
		const after = before.plus(delta);

		if (after.isZero()) {
			this.holding = { quantity: dec(0), entryPrice: dec(0) };
		} else if (before.isZero() || before.isPositive() !== after.isPositive()) {
			this.holding = { quantity: after, entryPrice: price };
		} else if (before.isPositive() === delta.isPositive()) {
			const cost = before.abs().mul(this.holding.entryPrice).plus(delta.abs().mul(price));
			this.holding = { quantity: after, entryPrice: cost.div(after.abs()) };
		} else {
			this.holding = { quantity: after, entryPrice: this.holding.entryPrice };
		}
	}
}
