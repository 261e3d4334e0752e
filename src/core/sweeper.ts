import {
	createSweeperSettings,
	type SweeperSettingsInput,
} from "../settings.js";
import type { ServiceRegistry } from "./registry.js";

/** Calls `sweep` on a registry at a fixed interval. */
export class Sweeper {
	readonly intervalMs: number;
	private readonly registry: ServiceRegistry;
	private intervalId: ReturnType<typeof setInterval> | null = null;

	constructor(registry: ServiceRegistry, options: SweeperSettingsInput = {}) {
		this.registry = registry;
		this.intervalMs = createSweeperSettings(options).intervalMs;
	}

	get isRunning(): boolean {
		return this.intervalId !== null;
	}

	start(): void {
		if (this.intervalId) return;
		this.intervalId = setInterval(() => {
			this.registry.sweep();
		}, this.intervalMs);
	}

	stop(): void {
		if (this.intervalId) {
			clearInterval(this.intervalId);
			this.intervalId = null;
		}
	}
}
