import { describe, expect, it } from "vitest";
import {
	__version__,
	createDescriptor,
	DEFAULT_MULTICAST_GROUP,
	Listener,
	NoServiceError,
	Publisher,
	ServiceBrowser,
	ServiceRegistry,
	scan,
	WorkerStatus,
} from "../src/index.js";
import { FakeNetwork } from "./fakeNetwork.js";

describe("public api", () => {
	it("exposes the version", () => {
		expect(__version__).toBe("0.1.0");
	});

	it("exports the building blocks", () => {
		expect(typeof Publisher).toBe("function");
		expect(typeof Listener).toBe("function");
		expect(typeof ServiceRegistry).toBe("function");
		expect(typeof ServiceBrowser).toBe("function");
		expect(typeof scan).toBe("function");
		expect(new NoServiceError("x")).toBeInstanceOf(Error);
		expect(DEFAULT_MULTICAST_GROUP).toBe("224.1.1.1");
	});

	it("announces and discovers a service end to end", async () => {
		const network = new FakeNetwork();
		const descriptor = createDescriptor({
			type: "vault",
			name: "Vault",
			host: "10.0.0.1",
			port: 2004,
		});
		const publisher = new Publisher({
			intervalMs: 10,
			message: JSON.stringify(descriptor),
			socketFactory: network.createSocket,
		});
		await publisher.start();
		expect(publisher.status).toBe(WorkerStatus.Running);

		const services = await scan({
			durationMs: 100,
			timeoutMs: 20,
			socketFactory: network.createSocket,
		});
		await publisher.stop();

		expect(services.map((service) => service.address)).toEqual([
			"10.0.0.1:2004",
		]);
		expect(services[0].name).toBe("Vault");
		expect(publisher.status).toBe(WorkerStatus.Stopped);
	});
});
