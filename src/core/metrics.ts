/**
 * Traffic counters shared by publishers and listeners.
 */

// Lower bound for uptime when deriving the packet rate
const MIN_UPTIME_SECONDS = 1e-3;

export type Clock = () => number;

export interface MetricsSnapshot {
	readonly packetsSent: number;
	readonly packetsReceived: number;
	readonly bytesSent: number;
	readonly bytesReceived: number;
	readonly errors: number;
	readonly activeServices: number;
	readonly uptimeSeconds: number;
	readonly packetsPerSecond: number;
}

/**
 * Every method runs to completion on the event loop, so a snapshot can
 * never observe a half-applied update.
 */
export class MetricsCollector {
	private readonly clock: Clock;
	private startTime: number;
	private packetsSent = 0;
	private packetsReceived = 0;
	private bytesSent = 0;
	private bytesReceived = 0;
	private errors = 0;

	/** @param clock monotonic time source in milliseconds */
	constructor(clock: Clock = () => performance.now()) {
		this.clock = clock;
		this.startTime = clock();
	}

	recordSent(bytes: number): void {
		this.packetsSent += 1;
		this.bytesSent += bytes;
	}

	recordReceived(bytes: number): void {
		this.packetsReceived += 1;
		this.bytesReceived += bytes;
	}

	recordError(): void {
		this.errors += 1;
	}

	snapshot(activeCount = 0): MetricsSnapshot {
		const uptimeSeconds = Math.max(0, (this.clock() - this.startTime) / 1000);
		const packets = this.packetsSent + this.packetsReceived;
		return Object.freeze({
			packetsSent: this.packetsSent,
			packetsReceived: this.packetsReceived,
			bytesSent: this.bytesSent,
			bytesReceived: this.bytesReceived,
			errors: this.errors,
			activeServices: activeCount,
			uptimeSeconds,
			packetsPerSecond: packets / Math.max(uptimeSeconds, MIN_UPTIME_SECONDS),
		});
	}

	reset(): void {
		this.packetsSent = 0;
		this.packetsReceived = 0;
		this.bytesSent = 0;
		this.bytesReceived = 0;
		this.errors = 0;
		this.startTime = this.clock();
	}
}
