/**
 * Browsing for services: a listener, its registry and a sweeper run as one.
 */

import { DEFAULT_SCAN_TIMEOUT_MS } from "./const.js";
import type { ServiceDescriptor } from "./core/descriptor.js";
import { Listener, type ListenerOptions } from "./core/listener.js";
import type { MetricsSnapshot } from "./core/metrics.js";
import type {
	RegistryListener,
	ServiceEntry,
	ServiceRegistry,
} from "./core/registry.js";
import { Sweeper } from "./core/sweeper.js";
import { NoServiceError } from "./exceptions.js";
import { getLogger } from "./support/log.js";
import { sleep } from "./support/utils.js";

const logger = getLogger("lanbeacon.browser");

export interface BrowserOptions extends ListenerOptions {
	/** How often stale services are removed from the registry. */
	sweepIntervalMs?: number;
	registryListener?: RegistryListener;
}

export class ServiceBrowser {
	readonly listener: Listener;
	readonly registry: ServiceRegistry;
	private readonly sweeper: Sweeper;

	constructor(options: BrowserOptions = {}) {
		const { sweepIntervalMs, registryListener, ...listenerOptions } = options;
		this.listener = new Listener(listenerOptions);
		this.registry = this.listener.registry;
		if (registryListener) {
			this.registry.listener = registryListener;
		}
		this.sweeper = new Sweeper(this.registry, { intervalMs: sweepIntervalMs });
	}

	get isRunning(): boolean {
		return this.listener.isRunning;
	}

	async start(): Promise<void> {
		await this.listener.start();
		this.sweeper.start();
	}

	async stop(timeoutMs?: number): Promise<void> {
		this.sweeper.stop();
		await this.listener.stop(timeoutMs);
	}

	/** Currently active services, in order of first sighting. */
	entries(): ServiceEntry[] {
		return this.registry.activeSnapshot();
	}

	services(): ServiceDescriptor[] {
		return this.entries().map((entry) => entry.descriptor);
	}

	/** Descriptor of the active service at `identity`. */
	select(identity: string): ServiceDescriptor {
		const entry = this.registry.get(identity);
		if (!entry) {
			throw new NoServiceError(`no active service at ${identity}`);
		}
		logger.info("Selected service: %s", identity);
		return entry.descriptor;
	}

	/** Forget every service and start counting anew. */
	clear(): void {
		this.registry.reset();
		this.listener.resetMetrics();
		logger.info("Service list cleared");
	}

	getMetrics(): MetricsSnapshot {
		return this.listener.getMetrics();
	}
}

export interface ScanOptions extends BrowserOptions {
	/** How long to listen before answering. */
	durationMs?: number;
	/** Ends the scan early; services seen so far are returned. */
	signal?: AbortSignal;
}

/** Listen for a while and return the services that announced themselves. */
export async function scan(
	options: ScanOptions = {},
): Promise<ServiceDescriptor[]> {
	const { durationMs = DEFAULT_SCAN_TIMEOUT_MS, signal, ...browserOptions } =
		options;
	const browser = new ServiceBrowser(browserOptions);

	logger.debug("Scanning for %dms", durationMs);
	await browser.start();
	try {
		await sleep(durationMs, signal);
		return browser.services();
	} finally {
		await browser.stop();
	}
}
