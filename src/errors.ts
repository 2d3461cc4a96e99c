export type ErrorCategory =
	| "TRANSIENT_IO"
	| "VALIDATION"
	| "INSUFFICIENT_DATA"
	| "SIZING"
	| "FEE_REJECTED"
	| "EXCHANGE_REJECTED"
	| "STATE_INVARIANT"
	| "STATE_LOCK"
	| "INTERNAL";

export class BotError extends Error {
	readonly category: ErrorCategory;

	constructor(category: ErrorCategory, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
		this.category = category;
	}
}

/** Network failure or timeout talking to an external collaborator. */
export class TransientIOError extends BotError {
	readonly operation: string;

	constructor(operation: string, message: string, options?: ErrorOptions) {
		super("TRANSIENT_IO", `${operation}: ${message}`, options);
		this.operation = operation;
	}
}

/** Bad configuration or unreadable durable state. Fatal at startup. */
export class ValidationError extends BotError {
	readonly issues: string[];

	constructor(message: string, issues: string[] = []) {
		super(
			"VALIDATION",
			issues.length ? `${message}: ${issues.join("; ")}` : message,
		);
		this.issues = issues;
	}
}

export class StateCorruptedError extends ValidationError {}

export class InsufficientDataError extends BotError {
	readonly required: number;
	readonly received: number;

	constructor(indicator: string, required: number, received: number) {
		super(
			"INSUFFICIENT_DATA",
			`${indicator} needs ${required} candles, received ${received}`,
		);
		this.required = required;
		this.received = received;
	}
}

export class SizingError extends BotError {
	constructor(message: string) {
		super("SIZING", message);
	}
}

export class FeeRejectedError extends BotError {
	constructor(message: string) {
		super("FEE_REJECTED", message);
	}
}

/** The exchange answered but refused the request (bad params, margin, ...). */
export class ExchangeRejectedError extends BotError {
	readonly code: number | undefined;

	constructor(message: string, code?: number, options?: ErrorOptions) {
		super("EXCHANGE_REJECTED", message, options);
		this.code = code;
	}
}

export class StateInvariantError extends BotError {
	constructor(issues: string[]) {
		super("STATE_INVARIANT", `State invariant violated: ${issues.join("; ")}`);
	}
}

export class StateLockError extends BotError {
	constructor(lockPath: string) {
		super("STATE_LOCK", `Could not acquire state lock ${lockPath}`);
	}
}

/**
 * Risk decisions (sizing, fees) and indicator warm-up are correct behaviour,
 * not faults, so they never count toward the circuit breaker.
 */
export function countsTowardBreaker(error: unknown): boolean {
	if (!(error instanceof BotError)) return true;
	switch (error.category) {
		case "SIZING":
		case "FEE_REJECTED":
		case "INSUFFICIENT_DATA":
		case "VALIDATION":
			return false;
		default:
			return true;
	}
}

export function categoryOf(error: unknown): ErrorCategory {
	return error instanceof BotError ? error.category : "INTERNAL";
}

export function errorMessage(error: unknown): string {
	if (error instanceof Error) return error.message;
	return String(error);
}
