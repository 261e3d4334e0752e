/**
 * Periodic multicast announcer.
 */

import { SocketFatalError } from "../exceptions.js";
import {
	createPublisherSettings,
	type PublisherSettings,
	type PublisherSettingsInput,
} from "../settings.js";
import { getLogger } from "../support/log.js";
import { describeError, logBinary, shorten, sleep } from "../support/utils.js";
import { type Clock, MetricsCollector, type MetricsSnapshot } from "./metrics.js";
import {
	bindSocket,
	closeSocket,
	createUdpSocket,
	type DatagramSocket,
	isSocketUnusable,
	type SocketFactory,
	sendDatagram,
} from "./socket.js";
import { StoppableWorker } from "./worker.js";

const logger = getLogger("lanbeacon.publisher");

export interface PublisherOptions extends PublisherSettingsInput {
	socketFactory?: SocketFactory;
	/** Time source for metrics, in milliseconds. */
	clock?: Clock;
}

// Always a private copy of the message
function toPayload(message: Buffer | string): Buffer {
	return typeof message === "string"
		? Buffer.from(message, "utf-8")
		: Buffer.from(message);
}

/**
 * Sends the current message to the multicast group once per interval.
 *
 * The first datagram goes out after one full interval. A failed send is
 * counted and the loop carries on with the next tick.
 */
export class Publisher extends StoppableWorker {
	readonly settings: Readonly<Omit<PublisherSettings, "message">>;
	private _message: Buffer;
	private readonly metrics: MetricsCollector;
	private readonly socketFactory: SocketFactory;
	private socket: DatagramSocket | null = null;
	private socketFailure: Error | null = null;
	private closing = false;

	constructor(options: PublisherOptions) {
		super(logger);
		const { socketFactory, clock, ...input } = options;
		const { message, ...settings } = createPublisherSettings(input);
		this.settings = Object.freeze(settings);
		this._message = toPayload(message);
		this.metrics = new MetricsCollector(clock);
		this.socketFactory = socketFactory ?? createUdpSocket;
	}

	get message(): Buffer {
		return this._message;
	}

	/** Replace the payload used from the next send on. */
	updateMessage(message: Buffer | string): void {
		this._message = toPayload(message);
		logger.debug("Message updated: %s", shorten(this._message, 100));
	}

	getMetrics(): MetricsSnapshot {
		return this.metrics.snapshot(0);
	}

	resetMetrics(): void {
		this.metrics.reset();
		logger.info("Publisher metrics reset");
	}

	protected async open(): Promise<void> {
		const { group, port, ttl, loopback } = this.settings;
		const socket = this.socketFactory();
		this.socket = socket;
		this.socketFailure = null;
		this.closing = false;

		await bindSocket(socket, 0, this.settings.interface ?? undefined);
		socket.setMulticastTTL(ttl);
		socket.setMulticastLoopback(loopback);
		if (this.settings.interface) {
			socket.setMulticastInterface(this.settings.interface);
		}

		socket.on("error", (err) => {
			this.socketFailure = err;
		});
		socket.on("close", () => {
			if (!this.closing) {
				this.socketFailure = new SocketFatalError("socket closed unexpectedly");
			}
		});

		logger.debug("Socket initialized for %s:%d (ttl %d)", group, port, ttl);
	}

	protected async run(signal: AbortSignal): Promise<void> {
		const { group, port, intervalMs } = this.settings;
		logger.info("Starting advertisement loop to %s:%d", group, port);

		while (!signal.aborted) {
			if (await sleep(intervalMs, signal)) break;
			await this.sendOnce();
		}
	}

	private async sendOnce(): Promise<void> {
		const { group, port } = this.settings;
		const socket = this.socket;
		if (!socket || this.socketFailure) {
			throw new SocketFatalError("socket is no longer usable", {
				cause: this.socketFailure ?? undefined,
			});
		}

		const payload = this._message;
		try {
			await sendDatagram(socket, payload, port, group);
		} catch (ex) {
			this.metrics.recordError();
			if (isSocketUnusable(ex)) {
				throw new SocketFatalError("socket is no longer usable", { cause: ex });
			}
			logger.warn("Error sending multicast: %s", describeError(ex));
			return;
		}

		this.metrics.recordSent(payload.length);
		logBinary(logger, "Published", { Bytes: payload.length, Data: payload });
	}

	protected async close(): Promise<void> {
		const socket = this.socket;
		if (!socket) return;
		this.closing = true;
		this.socket = null;
		await closeSocket(socket);
		logger.debug("Socket closed");
	}
}
