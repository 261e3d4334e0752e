/**
 * Service descriptors carried as the body of discovery datagrams.
 *
 * A descriptor is JSON text in UTF-8. Only `type` and `address` are
 * interpreted; everything else travels along untouched.
 */

import { z } from "zod";
import { MAX_DATAGRAM_SIZE } from "../const.js";
import { DecodeError } from "../exceptions.js";
import { getPrivateAddresses } from "../support/net.js";

export interface ServiceDescriptor {
	type: string;
	address: string;
	[key: string]: unknown;
}

export const descriptorSchema = z
	.object({
		type: z.string().min(1),
		address: z.string().min(1),
	})
	.passthrough();

const utf8 = new TextDecoder("utf-8", { fatal: true });

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate an already parsed JSON value as a descriptor.
 *
 * A value that carries its identity under the legacy `addr` key gets an
 * `address` field with the same value; `addr` itself is kept.
 */
export function parseDescriptor(value: unknown): ServiceDescriptor {
	if (!isRecord(value)) {
		throw new DecodeError("descriptor is not a JSON object");
	}

	// Older announcers send the address under "addr"
	const candidate =
		value.address === undefined && typeof value.addr === "string"
			? { ...value, address: value.addr }
			: value;

	const result = descriptorSchema.safeParse(candidate);
	if (!result.success) {
		const fields = result.error.issues.map((issue: z.ZodIssue) =>
			issue.path.join("."),
		);
		throw new DecodeError(`invalid descriptor fields: ${fields.join(", ")}`);
	}
	return result.data;
}

export function decodeDescriptor(
	data: Buffer,
	maxSize: number = MAX_DATAGRAM_SIZE,
): ServiceDescriptor {
	if (data.length > maxSize) {
		throw new DecodeError(
			`datagram of ${data.length} bytes exceeds limit of ${maxSize} bytes`,
		);
	}

	let text: string;
	try {
		text = utf8.decode(data);
	} catch (ex) {
		throw new DecodeError("payload is not valid UTF-8", { cause: ex });
	}

	let value: unknown;
	try {
		value = JSON.parse(text);
	} catch (ex) {
		throw new DecodeError("payload is not valid JSON", { cause: ex });
	}

	return parseDescriptor(value);
}

export function encodeDescriptor(descriptor: ServiceDescriptor): Buffer {
	return Buffer.from(JSON.stringify(descriptor), "utf-8");
}

export interface DescriptorOptions {
	type: string;
	name?: string;
	version?: string;
	/** Full identity address, takes precedence over host and port. */
	address?: string;
	host?: string;
	port?: number;
	properties?: Record<string, unknown>;
}

/**
 * Build a descriptor for a local service. Without an explicit address or
 * host, the first private non-loopback IPv4 address is used.
 */
export function createDescriptor(options: DescriptorOptions): ServiceDescriptor {
	const host = options.host ?? getPrivateAddresses(false)[0] ?? "127.0.0.1";
	const address =
		options.address ??
		(options.port !== undefined ? `${host}:${options.port}` : host);

	const descriptor: ServiceDescriptor = {
		...options.properties,
		type: options.type,
		address,
		timestamp: Date.now() / 1000,
	};
	if (options.name !== undefined) descriptor.name = options.name;
	if (options.version !== undefined) descriptor.version = options.version;
	return descriptor;
}

export function descriptorName(descriptor: ServiceDescriptor): string {
	return typeof descriptor.name === "string" ? descriptor.name : "unknown";
}
