import {
	createRegistrySettings,
	type RegistrySettingsInput,
} from "../settings.js";
import { getLogger } from "../support/log.js";
import { describeError } from "../support/utils.js";
import type { ServiceDescriptor } from "./descriptor.js";
import type { Clock } from "./metrics.js";

const logger = getLogger("lanbeacon.registry");

export interface ServiceEntry {
	readonly identity: string;
	readonly descriptor: ServiceDescriptor;
	/** Time of the latest sighting, in milliseconds on the registry clock. */
	readonly lastSeen: number;
}

/** Receives registry changes. All methods are optional. */
export interface RegistryListener {
	serviceAdded?(entry: ServiceEntry): void;
	serviceUpdated?(entry: ServiceEntry): void;
	serviceRemoved?(entry: ServiceEntry): void;
}

export interface RegistryOptions extends RegistrySettingsInput {
	clock?: Clock;
	listener?: RegistryListener | null;
}

/**
 * Services seen on the network, keyed by identity.
 *
 * Staleness is evaluated when queried: an entry older than the service
 * timeout is left out of every answer even before `sweep` removes it.
 */
export class ServiceRegistry {
	readonly serviceTimeoutMs: number;
	listener: RegistryListener | null;
	private readonly clock: Clock;
	private entries = new Map<string, ServiceEntry>();

	constructor(options: RegistryOptions = {}) {
		const { clock, listener, ...settings } = options;
		this.serviceTimeoutMs = createRegistrySettings(settings).serviceTimeoutMs;
		this.clock = clock ?? Date.now;
		this.listener = listener ?? null;
	}

	now(): number {
		return this.clock();
	}

	/**
	 * Insert or replace the entry for `identity`. The latest descriptor wins.
	 *
	 * A stale entry that was not swept yet counts as gone: listeners see it
	 * removed and the service added again.
	 */
	refresh(
		identity: string,
		descriptor: ServiceDescriptor,
		now: number = this.clock(),
	): void {
		let existing = this.entries.get(identity);
		if (existing && !this.isActive(existing, now)) {
			this.entries.delete(identity);
			logger.info("Service timeout: %s", identity);
			this.notify("serviceRemoved", existing);
			existing = undefined;
		}

		const entry: ServiceEntry = Object.freeze({
			identity,
			descriptor,
			lastSeen: existing ? Math.max(existing.lastSeen, now) : now,
		});
		this.entries.set(identity, entry);

		if (existing) {
			this.notify("serviceUpdated", entry);
		} else {
			logger.info("Service discovered: %s", identity);
			this.notify("serviceAdded", entry);
		}
	}

	isActive(entry: ServiceEntry, now: number = this.clock()): boolean {
		return now - entry.lastSeen < this.serviceTimeoutMs;
	}

	get(identity: string, now: number = this.clock()): ServiceEntry | null {
		const entry = this.entries.get(identity);
		return entry && this.isActive(entry, now) ? entry : null;
	}

	activeCount(now: number = this.clock()): number {
		let count = 0;
		for (const entry of this.entries.values()) {
			if (this.isActive(entry, now)) count++;
		}
		return count;
	}

	activeSnapshot(now: number = this.clock()): ServiceEntry[] {
		return [...this.entries.values()].filter((entry) =>
			this.isActive(entry, now),
		);
	}

	/** Remove every entry that has gone stale and return what was removed. */
	sweep(now: number = this.clock()): ServiceEntry[] {
		const removed: ServiceEntry[] = [];
		for (const [identity, entry] of this.entries) {
			if (!this.isActive(entry, now)) {
				this.entries.delete(identity);
				removed.push(entry);
			}
		}
		for (const entry of removed) {
			logger.info("Service timeout: %s", entry.identity);
			this.notify("serviceRemoved", entry);
		}
		return removed;
	}

	reset(): void {
		this.entries.clear();
	}

	/** Number of stored entries, stale ones included. */
	get size(): number {
		return this.entries.size;
	}

	private notify(event: keyof RegistryListener, entry: ServiceEntry): void {
		const handler = this.listener?.[event];
		if (!handler) return;
		try {
			handler.call(this.listener, entry);
		} catch (ex) {
			logger.error("Registry listener %s failed: %s", event, describeError(ex));
		}
	}
}
