import { describe, expect, it, vi } from "vitest";
import type { ServiceDescriptor } from "../../src/core/descriptor.js";
import { type RegistryListener, ServiceRegistry } from "../../src/core/registry.js";
import { SettingsError } from "../../src/exceptions.js";

const WINDOW = 30000;

function descriptor(address: string, name = "svc"): ServiceDescriptor {
	return { type: "vault", address, name };
}

function createRegistry(listener?: RegistryListener): ServiceRegistry {
	return new ServiceRegistry({
		serviceTimeoutMs: WINDOW,
		clock: () => 0,
		listener,
	});
}

describe("ServiceRegistry", () => {
	it("uses a thirty second window by default", () => {
		expect(new ServiceRegistry().serviceTimeoutMs).toBe(30000);
	});

	it("rejects a non-positive window", () => {
		expect(() => new ServiceRegistry({ serviceTimeoutMs: 0 })).toThrow(
			SettingsError,
		);
	});

	it("counts unique identities", () => {
		const registry = createRegistry();
		registry.refresh("A", descriptor("A"), 0);
		registry.refresh("B", descriptor("B"), 100);
		registry.refresh("A", descriptor("A"), 200);
		expect(registry.activeCount(300)).toBe(2);
		expect(registry.size).toBe(2);
	});

	it("replaces the descriptor on refresh", () => {
		const registry = createRegistry();
		registry.refresh("A", descriptor("A", "first"), 0);
		registry.refresh("A", descriptor("A", "second"), 10);
		const entry = registry.get("A", 10);
		expect(entry?.descriptor.name).toBe("second");
		expect(entry?.lastSeen).toBe(10);
	});

	it("never moves lastSeen backwards", () => {
		const registry = createRegistry();
		registry.refresh("A", descriptor("A"), 5000);
		registry.refresh("A", descriptor("A", "late"), 1000);
		const entry = registry.get("A", 5000);
		expect(entry?.lastSeen).toBe(5000);
		expect(entry?.descriptor.name).toBe("late");
	});

	it("filters stale entries lazily", () => {
		const registry = createRegistry();
		registry.refresh("A", descriptor("A"), 0);
		expect(registry.activeCount(29000)).toBe(1);
		expect(registry.activeCount(31000)).toBe(0);
		expect(registry.size).toBe(1);

		registry.sweep(31000);
		expect(registry.size).toBe(0);
	});

	it("treats an entry exactly one window old as stale", () => {
		const registry = createRegistry();
		registry.refresh("A", descriptor("A"), 0);
		expect(registry.activeCount(WINDOW - 1)).toBe(1);
		expect(registry.activeCount(WINDOW)).toBe(0);
		expect(registry.get("A", WINDOW)).toBeNull();
	});

	it("snapshot holds exactly the identities inside the window", () => {
		const registry = createRegistry();
		registry.refresh("A", descriptor("A"), 0);
		registry.refresh("B", descriptor("B"), 10000);
		registry.refresh("C", descriptor("C"), 20000);
		registry.refresh("A", descriptor("A"), 25000);

		const identities = registry
			.activeSnapshot(40000)
			.map((entry) => entry.identity);
		expect(identities).toEqual(["A", "C"]);
	});

	it("sweep removes exactly the stale entries", () => {
		const registry = createRegistry();
		registry.refresh("A", descriptor("A"), 0);
		registry.refresh("B", descriptor("B"), 20000);

		const removed = registry.sweep(35000);
		expect(removed.map((entry) => entry.identity)).toEqual(["A"]);
		expect(registry.size).toBe(1);
		expect(registry.get("B", 35000)?.identity).toBe("B");
	});

	it("sweep is a no-op the second time", () => {
		const registry = createRegistry();
		registry.refresh("A", descriptor("A"), 0);
		registry.refresh("B", descriptor("B"), 20000);

		registry.sweep(35000);
		expect(registry.sweep(35000)).toEqual([]);
		expect(registry.sweep(36000)).toEqual([]);
		expect(registry.size).toBe(1);
	});

	it("sweep on an empty registry does nothing", () => {
		const registry = createRegistry();
		expect(registry.sweep(100000)).toEqual([]);
	});

	it("reset clears everything", () => {
		const registry = createRegistry();
		registry.refresh("A", descriptor("A"), 0);
		registry.reset();
		expect(registry.size).toBe(0);
		expect(registry.activeSnapshot(0)).toEqual([]);
	});

	it("uses its clock when no time is given", () => {
		let now = 1000;
		const registry = new ServiceRegistry({
			serviceTimeoutMs: 500,
			clock: () => now,
		});
		registry.refresh("A", descriptor("A"));
		expect(registry.get("A")?.lastSeen).toBe(1000);
		now = 1400;
		expect(registry.activeCount()).toBe(1);
		now = 1500;
		expect(registry.activeCount()).toBe(0);
		expect(registry.sweep().length).toBe(1);
	});

	it("hands out frozen entries", () => {
		const registry = createRegistry();
		registry.refresh("A", descriptor("A"), 0);
		const [entry] = registry.activeSnapshot(0);
		expect(Object.isFrozen(entry)).toBe(true);
	});

	describe("listener", () => {
		it("reports added, updated and removed services", () => {
			const listener = {
				serviceAdded: vi.fn(),
				serviceUpdated: vi.fn(),
				serviceRemoved: vi.fn(),
			};
			const registry = createRegistry(listener);

			registry.refresh("A", descriptor("A"), 0);
			expect(listener.serviceAdded).toHaveBeenCalledTimes(1);
			expect(listener.serviceAdded.mock.calls[0][0].identity).toBe("A");

			registry.refresh("A", descriptor("A"), 100);
			expect(listener.serviceUpdated).toHaveBeenCalledTimes(1);
			expect(listener.serviceUpdated.mock.calls[0][0].lastSeen).toBe(100);

			registry.sweep(50000);
			expect(listener.serviceRemoved).toHaveBeenCalledTimes(1);
			expect(listener.serviceRemoved.mock.calls[0][0].identity).toBe("A");
		});

		it("reports a stale service that returns before a sweep as removed and added", () => {
			const events: string[] = [];
			const registry = createRegistry({
				serviceAdded: (entry) => events.push(`added ${entry.identity}`),
				serviceUpdated: (entry) => events.push(`updated ${entry.identity}`),
				serviceRemoved: (entry) => events.push(`removed ${entry.identity}`),
			});

			registry.refresh("A", descriptor("A"), 0);
			expect(registry.activeCount(31000)).toBe(0);
			registry.refresh("A", descriptor("A"), 31000);
			registry.sweep(31000);

			expect(events).toEqual(["added A", "removed A", "added A"]);
			expect(registry.get("A", 31000)?.lastSeen).toBe(31000);
			expect(registry.size).toBe(1);
		});

		it("keeps working when a listener throws", () => {
			const registry = createRegistry({
				serviceAdded: () => {
					throw new Error("boom");
				},
			});
			expect(() => registry.refresh("A", descriptor("A"), 0)).not.toThrow();
			expect(registry.activeCount(0)).toBe(1);
		});

		it("accepts partial listeners", () => {
			const serviceRemoved = vi.fn();
			const registry = createRegistry({ serviceRemoved });
			registry.refresh("A", descriptor("A"), 0);
			registry.sweep(WINDOW);
			expect(serviceRemoved).toHaveBeenCalledTimes(1);
		});
	});
});
