import { describe, expect, it } from "vitest";
import {
	createDescriptor,
	decodeDescriptor,
	descriptorName,
	encodeDescriptor,
	parseDescriptor,
} from "../../src/core/descriptor.js";
import { DecodeError } from "../../src/exceptions.js";

describe("decodeDescriptor", () => {
	it("decodes a complete descriptor", () => {
		const data = Buffer.from(
			'{"type":"vault-test","name":"Vault","address":"10.0.0.5:2004","version":"1.2","timestamp":1700000000.5}',
		);
		expect(decodeDescriptor(data)).toEqual({
			type: "vault-test",
			name: "Vault",
			address: "10.0.0.5:2004",
			version: "1.2",
			timestamp: 1700000000.5,
		});
	});

	it("keeps unknown fields untouched", () => {
		const data = Buffer.from(
			'{"type":"t","address":"a","ip":["127.0.0.1"],"extra":{"nested":true}}',
		);
		const descriptor = decodeDescriptor(data);
		expect(descriptor.ip).toEqual(["127.0.0.1"]);
		expect(descriptor.extra).toEqual({ nested: true });
	});

	it("accepts the legacy addr field", () => {
		const descriptor = decodeDescriptor(
			Buffer.from('{"type":"vault","addr":"10.0.0.7"}'),
		);
		expect(descriptor.address).toBe("10.0.0.7");
		expect(descriptor.addr).toBe("10.0.0.7");
	});

	it("prefers address over addr", () => {
		const descriptor = decodeDescriptor(
			Buffer.from('{"type":"vault","address":"10.0.0.1","addr":"10.0.0.2"}'),
		);
		expect(descriptor.address).toBe("10.0.0.1");
	});

	it("rejects invalid JSON", () => {
		expect(() => decodeDescriptor(Buffer.from("not json"))).toThrow(
			"payload is not valid JSON",
		);
	});

	it("rejects invalid UTF-8", () => {
		expect(() => decodeDescriptor(Buffer.from([0x7b, 0xff, 0xfe, 0x7d]))).toThrow(
			"payload is not valid UTF-8",
		);
	});

	it("rejects JSON that is not an object", () => {
		expect(() => decodeDescriptor(Buffer.from("[1,2,3]"))).toThrow(
			"descriptor is not a JSON object",
		);
		expect(() => decodeDescriptor(Buffer.from("null"))).toThrow(DecodeError);
		expect(() => decodeDescriptor(Buffer.from('"text"'))).toThrow(DecodeError);
	});

	it("rejects a missing type", () => {
		expect(() => decodeDescriptor(Buffer.from('{"address":"a"}'))).toThrow(
			"invalid descriptor fields: type",
		);
	});

	it("rejects a missing address", () => {
		expect(() => decodeDescriptor(Buffer.from('{"type":"t"}'))).toThrow(
			"invalid descriptor fields: address",
		);
	});

	it("rejects empty or non-string required fields", () => {
		expect(() =>
			decodeDescriptor(Buffer.from('{"type":"","address":5}')),
		).toThrow("invalid descriptor fields: type, address");
	});

	it("rejects oversized datagrams", () => {
		const data = Buffer.from('{"type":"t","address":"a"}');
		expect(() => decodeDescriptor(data, data.length - 1)).toThrow(
			`datagram of ${data.length} bytes exceeds limit of ${data.length - 1} bytes`,
		);
		expect(decodeDescriptor(data, data.length).address).toBe("a");
	});

	it("throws DecodeError with the parse failure as cause", () => {
		try {
			decodeDescriptor(Buffer.from("{"));
			expect.unreachable();
		} catch (ex) {
			expect(ex).toBeInstanceOf(DecodeError);
			expect(ex instanceof DecodeError && ex.cause).toBeInstanceOf(SyntaxError);
		}
	});
});

describe("parseDescriptor", () => {
	it("validates an already parsed value", () => {
		expect(parseDescriptor({ type: "t", address: "a" })).toEqual({
			type: "t",
			address: "a",
		});
		expect(() => parseDescriptor(42)).toThrow(DecodeError);
	});
});

describe("encodeDescriptor", () => {
	it("round trips through decode", () => {
		const original = {
			type: "vault",
			name: "Kitchen",
			address: "192.168.1.20:8200",
			version: "2.0",
			timestamp: 1234.5,
			tags: ["a", "b"],
		};
		expect(decodeDescriptor(encodeDescriptor(original))).toEqual(original);
	});

	it("encodes as UTF-8 JSON", () => {
		const data = encodeDescriptor({ type: "t", address: "a", name: "Küche" });
		expect(data.toString("utf-8")).toBe(
			'{"type":"t","address":"a","name":"Küche"}',
		);
	});
});

describe("createDescriptor", () => {
	it("builds the address from host and port", () => {
		const descriptor = createDescriptor({
			type: "vault",
			name: "Vault",
			version: "1.0",
			host: "10.1.2.3",
			port: 2004,
		});
		expect(descriptor.type).toBe("vault");
		expect(descriptor.address).toBe("10.1.2.3:2004");
		expect(descriptor.name).toBe("Vault");
		expect(descriptor.version).toBe("1.0");
		expect(typeof descriptor.timestamp).toBe("number");
	});

	it("uses an explicit address as is", () => {
		const descriptor = createDescriptor({
			type: "vault",
			address: "vault.local",
			host: "10.1.2.3",
			port: 2004,
		});
		expect(descriptor.address).toBe("vault.local");
	});

	it("merges extra properties without overriding required fields", () => {
		const descriptor = createDescriptor({
			type: "vault",
			host: "10.1.2.3",
			properties: { type: "other", region: "eu" },
		});
		expect(descriptor.type).toBe("vault");
		expect(descriptor.address).toBe("10.1.2.3");
		expect(descriptor.region).toBe("eu");
		expect("name" in descriptor).toBe(false);
	});

	it("falls back to a local address", () => {
		const descriptor = createDescriptor({ type: "vault", port: 1 });
		expect(descriptor.address).toMatch(/^\d+\.\d+\.\d+\.\d+:1$/);
	});
});

describe("descriptorName", () => {
	it("returns the name or unknown", () => {
		expect(descriptorName({ type: "t", address: "a", name: "n" })).toBe("n");
		expect(descriptorName({ type: "t", address: "a", name: 3 })).toBe("unknown");
		expect(descriptorName({ type: "t", address: "a" })).toBe("unknown");
	});
});
