import fs from "node:fs/promises";
import path from "node:path";
import { StateCorruptedError, StateInvariantError, StateLockError, errorMessage } from "../errors";
import {
	type BotState,
	BotStateSchema,
	MAX_CONSUMED_SIGNAL_IDS,
	defaultBotState,
	findInvariantViolations,
} from "../schemas/botState";
import { logger } from "../utils/logger";
import {
	findOrphanedTempFiles,
	isErrnoException,
	readJson,
	writeJsonAtomic,
} from "../utils/storage";
import { sleep } from "../utils/time";

/** Edits the draft in place. */
export type StateMutation = (draft: BotState) => void;

export type StateStoreOptions = {
	now?: () => number;
	/** A lock file older than this is left over from a dead writer. */
	staleLockMs?: number;
	lockRetries?: number;
	lockRetryDelayMs?: number;
};

/**
 * Single writer for BotState. Every commit validates the mutated copy, writes
 * it to disk atomically and only then swaps it into memory.
 */
export class StateStore {
	private state: BotState | undefined;
	private tail: Promise<void> = Promise.resolve();
	private readonly lockPath: string;
	private readonly now: () => number;
	private readonly staleLockMs: number;
	private readonly lockRetries: number;
	private readonly lockRetryDelayMs: number;

	constructor(
		readonly filePath: string,
		options: StateStoreOptions = {},
	) {
		this.lockPath = `${filePath}.lock`;
		this.now = options.now ?? Date.now;
		this.staleLockMs = options.staleLockMs ?? 30_000;
		this.lockRetries = options.lockRetries ?? 20;
		this.lockRetryDelayMs = options.lockRetryDelayMs ?? 50;
	}

	async load(): Promise<BotState> {
		for (const orphan of await findOrphanedTempFiles(this.filePath)) {
			await fs.rm(orphan, { force: true });
			logger.warn({ file: orphan }, "Removed temp file from an interrupted write");
		}

		let raw: unknown;
		try {
			raw = await readJson(this.filePath);
		} catch (error) {
			if (error instanceof SyntaxError) {
				throw new StateCorruptedError(`State file ${this.filePath} is not valid JSON`, [
					error.message,
				]);
			}
			throw error;
		}

		if (raw === undefined) {
			this.state = defaultBotState(this.now());
			logger.info({ file: this.filePath }, "No saved state, starting flat");
			return this.snapshot();
		}

		const parsed = BotStateSchema.safeParse(raw);
		if (!parsed.success) {
			throw new StateCorruptedError(
				`State file ${this.filePath} failed validation`,
				parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
			);
		}

		const violations = findInvariantViolations(parsed.data);
		if (violations.length) {
			throw new StateCorruptedError(
				`State file ${this.filePath} breaks invariants`,
				violations,
			);
		}

		this.state = parsed.data;
		logger.info(
			{
				file: this.filePath,
				position: parsed.data.position.side,
				breaker: parsed.data.circuitBreaker.status,
				trades: parsed.data.roiLedger.length,
			},
			"Loaded state",
		);
		return this.snapshot();
	}

	snapshot(): BotState {
		return structuredClone(this.current());
	}

	/** Queues the mutation behind any commit already in flight. */
	commit(mutation: StateMutation, reason: string): Promise<BotState> {
		const run = this.tail.then(() => this.apply(mutation, reason));
		// Failures reach the caller through `run`; the queue keeps going.
		this.tail = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}

	/** Resolves once every queued commit has settled. */
	flush(): Promise<void> {
		return this.tail;
	}

	private current(): BotState {
		if (!this.state) {
			throw new Error("StateStore used before load()");
		}
		return this.state;
	}

	private async apply(mutation: StateMutation, reason: string): Promise<BotState> {
		const draft = structuredClone(this.current());
		mutation(draft);
		draft.updatedAt = new Date(this.now()).toISOString();
		draft.consumedSignalIds = draft.consumedSignalIds.slice(-MAX_CONSUMED_SIGNAL_IDS);

		const parsed = BotStateSchema.safeParse(draft);
		if (!parsed.success) {
			throw new StateInvariantError(
				parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
			);
		}
		const violations = findInvariantViolations(parsed.data);
		if (violations.length) {
			throw new StateInvariantError(violations);
		}

		await this.withLock(() => writeJsonAtomic(this.filePath, parsed.data));
		this.state = parsed.data;
		logger.debug({ reason, updatedAt: parsed.data.updatedAt }, "State committed");
		return this.snapshot();
	}

	private async withLock<T>(fn: () => Promise<T>): Promise<T> {
		await this.acquireLock();
		try {
			return await fn();
		} finally {
			await fs.rm(this.lockPath, { force: true });
		}
	}

	private async acquireLock(): Promise<void> {
		await fs.mkdir(path.dirname(this.lockPath), { recursive: true });

		for (let attempt = 0; attempt <= this.lockRetries; attempt++) {
			try {
				const handle = await fs.open(this.lockPath, "wx");
				try {
					await handle.writeFile(`${process.pid} ${this.now()}`, "utf8");
				} finally {
					await handle.close();
				}
				return;
			} catch (error) {
				if (!isErrnoException(error) || error.code !== "EEXIST") {
					throw error;
				}
			}

			if (await this.removeStaleLock()) continue;
			await sleep(this.lockRetryDelayMs);
		}

		throw new StateLockError(this.lockPath);
	}

	private async removeStaleLock(): Promise<boolean> {
		try {
			const stats = await fs.stat(this.lockPath);
			// mtime is wall-clock time, so the age is too.
			if (Date.now() - stats.mtimeMs < this.staleLockMs) return false;
		} catch (error) {
			// Released between our open and stat: try again straight away.
			if (isErrnoException(error) && error.code === "ENOENT") return true;
			throw error;
		}

		logger.warn(
			{ lock: this.lockPath, staleAfterMs: this.staleLockMs },
			"Removing stale state lock",
		);
		try {
			await fs.rm(this.lockPath, { force: true });
		} catch (error) {
			logger.warn({ lock: this.lockPath, error: errorMessage(error) }, "Failed to remove stale lock");
			return false;
		}
		return true;
	}
}
