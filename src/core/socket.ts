/**
 * UDP socket plumbing shared by publishers and listeners.
 */

import * as dgram from "node:dgram";
import { ReceiveError, SendError } from "../exceptions.js";

// Datagrams buffered while the receive loop is busy
const DEFAULT_MAX_PENDING = 1024;

// Error codes meaning the socket cannot be used any more
const UNUSABLE_SOCKET_CODES = new Set([
	"ERR_SOCKET_DGRAM_NOT_RUNNING",
	"ERR_SOCKET_DGRAM_NOT_CONNECTED",
	"EBADF",
]);

/** The part of `dgram.Socket` used here. */
export interface DatagramSocket {
	on(
		event: "message",
		listener: (msg: Buffer, rinfo: dgram.RemoteInfo) => void,
	): unknown;
	on(event: "error", listener: (err: Error) => void): unknown;
	on(event: "close", listener: () => void): unknown;
	once(event: "error", listener: (err: Error) => void): unknown;
	removeListener(event: "error", listener: (err: Error) => void): unknown;
	bind(port: number, address?: string, callback?: () => void): unknown;
	send(
		msg: Buffer,
		port: number,
		address: string,
		callback: (error: Error | null, bytes: number) => void,
	): void;
	setMulticastTTL(ttl: number): unknown;
	setMulticastLoopback(flag: boolean): unknown;
	setMulticastInterface(interfaceAddress: string): void;
	addMembership(multicastAddress: string, multicastInterface?: string): void;
	dropMembership(multicastAddress: string, multicastInterface?: string): void;
	close(callback?: () => void): unknown;
}

export type SocketFactory = () => DatagramSocket;

export const createUdpSocket: SocketFactory = () =>
	dgram.createSocket({ type: "udp4", reuseAddr: true });

function errorCode(err: unknown): string | undefined {
	if (!(err instanceof Error)) return undefined;
	const code = "code" in err ? err.code : undefined;
	if (typeof code === "string" && code) return code;
	return err.cause !== undefined ? errorCode(err.cause) : undefined;
}

export function isSocketUnusable(err: unknown): boolean {
	const code = errorCode(err);
	return code !== undefined && UNUSABLE_SOCKET_CODES.has(code);
}

export function bindSocket(
	socket: DatagramSocket,
	port: number,
	address?: string,
): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		const onError = (err: Error) => reject(err);
		socket.once("error", onError);
		socket.bind(port, address, () => {
			socket.removeListener("error", onError);
			resolve();
		});
	});
}

export function sendDatagram(
	socket: DatagramSocket,
	payload: Buffer,
	port: number,
	address: string,
): Promise<number> {
	return new Promise<number>((resolve, reject) => {
		try {
			socket.send(payload, port, address, (error, bytes) => {
				if (error) {
					reject(new SendError(error.message, { cause: error }));
				} else {
					resolve(bytes);
				}
			});
		} catch (ex) {
			const message = ex instanceof Error ? ex.message : String(ex);
			reject(new SendError(message, { cause: ex }));
		}
	});
}

/** Close a socket, tolerating one that is already closed. */
export function closeSocket(socket: DatagramSocket): Promise<void> {
	return new Promise<void>((resolve) => {
		try {
			socket.close(() => resolve());
		} catch {
			// already closed
			resolve();
		}
	});
}

export type InboxItem =
	| { kind: "datagram"; data: Buffer; rinfo: dgram.RemoteInfo }
	| { kind: "error"; error: Error }
	| { kind: "idle" }
	| { kind: "closed" };

/**
 * Turns the socket's message events into a pull-style receive with a
 * bounded wait.
 *
 * `receive` resolves with `idle` when the wait expires, the signal is
 * aborted or the inbox is closed, and with `closed` when the socket goes
 * away underneath it.
 */
export class DatagramInbox {
	private queue: InboxItem[] = [];
	private waiter: ((item: InboxItem) => void) | null = null;
	private closed = false;
	private readonly maxPending: number;
	private readonly onDrop: (() => void) | undefined;

	constructor(
		socket: DatagramSocket,
		options: { maxPending?: number; onDrop?: () => void } = {},
	) {
		this.maxPending = options.maxPending ?? DEFAULT_MAX_PENDING;
		this.onDrop = options.onDrop;

		socket.on("message", (data, rinfo) => {
			this.push({ kind: "datagram", data, rinfo });
		});
		socket.on("error", (error) => {
			this.push({
				kind: "error",
				error: new ReceiveError(error.message, { cause: error }),
			});
		});
		socket.on("close", () => {
			this.push({ kind: "closed" });
		});
	}

	get pending(): number {
		return this.queue.length;
	}

	receive(timeoutMs: number, signal?: AbortSignal): Promise<InboxItem> {
		const next = this.queue.shift();
		if (next) return Promise.resolve(next);
		if (this.closed || signal?.aborted) return Promise.resolve({ kind: "idle" });

		return new Promise<InboxItem>((resolve) => {
			const finish = (item: InboxItem) => {
				clearTimeout(timer);
				signal?.removeEventListener("abort", onAbort);
				if (this.waiter === finish) this.waiter = null;
				resolve(item);
			};
			const onAbort = () => finish({ kind: "idle" });
			const timer = setTimeout(() => finish({ kind: "idle" }), timeoutMs);
			signal?.addEventListener("abort", onAbort, { once: true });
			this.waiter = finish;
		});
	}

	close(): void {
		this.closed = true;
		this.queue = [];
		this.waiter?.({ kind: "idle" });
	}

	private push(item: InboxItem): void {
		if (this.closed) return;

		if (this.waiter) {
			this.waiter(item);
			return;
		}

		if (item.kind === "datagram" && this.queue.length >= this.maxPending) {
			this.onDrop?.();
			return;
		}
		this.queue.push(item);
	}
}
