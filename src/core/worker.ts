import { DEFAULT_STOP_TIMEOUT_MS, WorkerStatus } from "../const.js";
import { AlreadyRunningError, ShutdownTimeoutError } from "../exceptions.js";
import type { Logger } from "../support/log.js";
import { describeError } from "../support/utils.js";

/** Resolve with `true` if `task` settles within `timeoutMs`. */
function settlesWithin(task: Promise<void>, timeoutMs: number): Promise<boolean> {
	return new Promise<boolean>((resolve) => {
		const timer = setTimeout(() => resolve(false), timeoutMs);
		task.then(
			() => {
				clearTimeout(timer);
				resolve(true);
			},
			() => {
				clearTimeout(timer);
				resolve(true);
			},
		);
	});
}

/**
 * Base class for a role that owns a socket and one background loop.
 *
 * `start` opens resources and launches the loop, `stop` asks the loop to
 * finish, waits for it within a bound and always releases the resources.
 * A loop that ends by itself (the socket became unusable) also releases
 * them and leaves the role stopped, with the cause in `lastError`.
 */
export abstract class StoppableWorker {
	protected readonly logger: Logger;
	private _status = WorkerStatus.Stopped;
	private _lastError: Error | null = null;
	private pendingOpen: Promise<void> | null = null;
	private stopRequested = false;
	private task: Promise<void> | null = null;
	private abortController: AbortController | null = null;

	constructor(logger: Logger) {
		this.logger = logger;
	}

	get status(): WorkerStatus {
		return this._status;
	}

	get isRunning(): boolean {
		return this._status === WorkerStatus.Running;
	}

	/** Why the loop ended on its own, if it did. Cleared by `start`. */
	get lastError(): Error | null {
		return this._lastError;
	}

	/**
	 * Open the socket and launch the loop. When `stop` is called while the
	 * socket is still opening, `start` resolves without launching the loop
	 * and the role stays stopped.
	 */
	async start(): Promise<void> {
		if (this.pendingOpen || this._status === WorkerStatus.Running) {
			throw new AlreadyRunningError(`${this.constructor.name} is already running`);
		}

		this.logger.debug("%s starting", this.constructor.name);
		this._lastError = null;
		this.stopRequested = false;
		const opening = this.openOrRelease();
		this.pendingOpen = opening;
		try {
			await opening;
		} finally {
			this.pendingOpen = null;
		}

		if (this.stopRequested) {
			this.stopRequested = false;
			this.logger.debug("%s stopped while starting", this.constructor.name);
			return;
		}

		const abortController = new AbortController();
		this.abortController = abortController;
		this._status = WorkerStatus.Running;
		this.task = this.runWrapper(abortController.signal);
	}

	private async openOrRelease(): Promise<void> {
		try {
			await this.open();
		} catch (ex) {
			this.logger.error("%s failed to start: %s", this.constructor.name, describeError(ex));
			await this.close();
			throw ex;
		}
	}

	/**
	 * Stop the loop and release the socket. A no-op when not running; while
	 * `start` is still opening, waits for it and releases what it opened.
	 *
	 * Rejects with `ShutdownTimeoutError` when the loop did not finish in
	 * `timeoutMs`; the socket is closed and the role stopped regardless.
	 */
	async stop(timeoutMs: number = DEFAULT_STOP_TIMEOUT_MS): Promise<void> {
		const opening = this.pendingOpen;
		if (opening) {
			this.stopRequested = true;
			// A failed open is reported to the caller of start
			await opening.then(
				() => undefined,
				() => undefined,
			);
			await this.close();
			this._status = WorkerStatus.Stopped;
			return;
		}

		const task = this.task;
		if (!task) return;

		this.logger.debug("%s stopping", this.constructor.name);
		this.task = null;
		this.abortController?.abort();
		this.abortController = null;

		const finished = await settlesWithin(task, timeoutMs);
		await this.close();
		this._status = WorkerStatus.Stopped;

		if (!finished) {
			this.logger.warn(
				"%s loop did not stop within %dms",
				this.constructor.name,
				timeoutMs,
			);
			throw new ShutdownTimeoutError(
				`${this.constructor.name} did not stop within ${timeoutMs}ms`,
				timeoutMs,
			);
		}
	}

	private async runWrapper(signal: AbortSignal): Promise<void> {
		try {
			await this.run(signal);
		} catch (ex) {
			this._lastError = ex instanceof Error ? ex : new Error(String(ex));
			this.logger.error("%s loop error: %s", this.constructor.name, describeError(ex));
		} finally {
			this.logger.debug("%s loop finished", this.constructor.name);
		}

		if (!signal.aborted) {
			// Ended without being asked to
			this.task = null;
			this.abortController = null;
			await this.close();
			this._status = WorkerStatus.Stopped;
		}
	}

	/** Acquire the socket. Called by `start`. */
	protected abstract open(): Promise<void>;

	/** The loop. Must return soon after `signal` is aborted. */
	protected abstract run(signal: AbortSignal): Promise<void>;

	/** Release the socket. Must tolerate being called more than once. */
	protected abstract close(): Promise<void>;
}
