/**
 * Multicast receiver feeding a service registry.
 */

import type { RemoteInfo } from "node:dgram";
import { SocketFatalError } from "../exceptions.js";
import {
	createListenerSettings,
	type ListenerSettings,
	type ListenerSettingsInput,
} from "../settings.js";
import { getLogger } from "../support/log.js";
import { describeError, logBinary } from "../support/utils.js";
import {
	decodeDescriptor,
	descriptorName,
	type ServiceDescriptor,
} from "./descriptor.js";
import { type Clock, MetricsCollector, type MetricsSnapshot } from "./metrics.js";
import { ServiceRegistry } from "./registry.js";
import {
	bindSocket,
	closeSocket,
	createUdpSocket,
	DatagramInbox,
	type DatagramSocket,
	type SocketFactory,
} from "./socket.js";
import { StoppableWorker } from "./worker.js";

const logger = getLogger("lanbeacon.listener");

/**
 * Receives every decoded descriptor. Called on the receive loop and never
 * awaited; a returned promise is only watched for rejection. The
 * descriptor is frozen and is the same object the registry holds.
 */
export type NotificationSink = (
	descriptor: ServiceDescriptor,
) => void | Promise<void>;

export interface ListenerOptions extends ListenerSettingsInput {
	sink?: NotificationSink | null;
	/** Registry to feed; one is created from `serviceTimeoutMs` otherwise. */
	registry?: ServiceRegistry;
	socketFactory?: SocketFactory;
	/** Time source for metrics, in milliseconds. */
	clock?: Clock;
}

export class Listener extends StoppableWorker {
	readonly settings: Readonly<ListenerSettings>;
	readonly registry: ServiceRegistry;
	sink: NotificationSink | null;
	private readonly metrics: MetricsCollector;
	private readonly socketFactory: SocketFactory;
	private socket: DatagramSocket | null = null;
	private inbox: DatagramInbox | null = null;

	constructor(options: ListenerOptions = {}) {
		super(logger);
		const { sink, registry, socketFactory, clock, ...input } = options;
		this.settings = Object.freeze(createListenerSettings(input));
		this.registry =
			registry ??
			new ServiceRegistry({ serviceTimeoutMs: this.settings.serviceTimeoutMs });
		this.sink = sink ?? null;
		this.metrics = new MetricsCollector(clock);
		this.socketFactory = socketFactory ?? createUdpSocket;
	}

	getMetrics(): MetricsSnapshot {
		return this.metrics.snapshot(this.registry.activeCount());
	}

	/** Reset the counters. Registry contents are kept. */
	resetMetrics(): void {
		this.metrics.reset();
		logger.info("Listener metrics reset");
	}

	protected async open(): Promise<void> {
		const { group, port } = this.settings;
		logger.info("Starting multicast listener on %s:%d", group, port);

		const socket = this.socketFactory();
		this.socket = socket;
		await bindSocket(socket, port);
		socket.addMembership(group, this.settings.interface ?? undefined);

		this.inbox = new DatagramInbox(socket, {
			onDrop: () => {
				this.metrics.recordError();
				logger.warn("Receive queue full, datagram dropped");
			},
		});
		logger.debug("Socket joined %s", group);
	}

	protected async run(signal: AbortSignal): Promise<void> {
		const inbox = this.inbox;
		if (!inbox) {
			throw new SocketFatalError("listener socket is not open");
		}

		logger.info("Entering receive loop");
		while (!signal.aborted) {
			const item = await inbox.receive(this.settings.timeoutMs, signal);
			switch (item.kind) {
				case "idle":
					break;
				case "datagram":
					this.datagramReceived(item.data, item.rinfo);
					break;
				case "error":
					this.metrics.recordError();
					logger.error("Socket error: %s", describeError(item.error));
					break;
				case "closed":
					this.metrics.recordError();
					throw new SocketFatalError("listener socket closed unexpectedly");
			}
		}
	}

	private datagramReceived(data: Buffer, rinfo: RemoteInfo): void {
		this.metrics.recordReceived(data.length);

		let descriptor: ServiceDescriptor;
		try {
			descriptor = Object.freeze(
				decodeDescriptor(data, this.settings.bufferSize),
			);
		} catch (ex) {
			this.metrics.recordError();
			logger.warn(
				"Invalid payload from %s:%d: %s",
				rinfo.address,
				rinfo.port,
				describeError(ex),
			);
			return;
		}

		logBinary(logger, "Received", {
			From: `${rinfo.address}:${rinfo.port}`,
			Data: data,
		});

		if (this.accepts(descriptor)) {
			this.registry.refresh(descriptor.address, descriptor);
		} else {
			logger.debug(
				"Ignoring %s (type %s)",
				descriptorName(descriptor),
				descriptor.type,
			);
		}

		this.notify(descriptor);
	}

	private accepts(descriptor: ServiceDescriptor): boolean {
		const { typeFilter } = this.settings;
		return !typeFilter || descriptor.type.includes(typeFilter);
	}

	private notify(descriptor: ServiceDescriptor): void {
		const sink = this.sink;
		if (!sink) return;

		try {
			const result = sink(descriptor);
			if (result instanceof Promise) {
				void result.catch((ex: unknown) => this.sinkFailed(ex));
			}
		} catch (ex) {
			this.sinkFailed(ex);
		}
	}

	private sinkFailed(ex: unknown): void {
		this.metrics.recordError();
		logger.error("Callback error: %s", describeError(ex));
	}

	protected async close(): Promise<void> {
		const socket = this.socket;
		if (!socket) return;
		this.socket = null;
		this.inbox?.close();
		this.inbox = null;

		try {
			socket.dropMembership(
				this.settings.group,
				this.settings.interface ?? undefined,
			);
		} catch (ex) {
			logger.debug("Leaving %s failed: %s", this.settings.group, describeError(ex));
		}
		await closeSocket(socket);
		logger.debug("Socket closed");
	}
}
