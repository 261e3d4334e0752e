import { z } from "zod";
import {
	DEFAULT_BUFFER_SIZE,
	DEFAULT_INTERVAL_MS,
	DEFAULT_MULTICAST_GROUP,
	DEFAULT_PORT,
	DEFAULT_RECEIVE_TIMEOUT_MS,
	DEFAULT_SERVICE_TIMEOUT_MS,
	DEFAULT_SWEEP_INTERVAL_MS,
	DEFAULT_TTL,
	MAX_DATAGRAM_SIZE,
} from "./const.js";
import { SettingsError } from "./exceptions.js";
import { isIpv4, isMulticastIpv4 } from "./support/net.js";

const groupSchema = z
	.string()
	.default(DEFAULT_MULTICAST_GROUP)
	.refine((group: string) => isMulticastIpv4(group), {
		message: "not an IPv4 multicast address",
	});

const portSchema = z.number().int().min(1).max(65535).default(DEFAULT_PORT);

const interfaceSchema = z
	.string()
	.nullable()
	.default(null)
	.refine((address: string | null) => address === null || isIpv4(address), {
		message: "not an IPv4 address",
	});

const durationMs = (fallback: number) =>
	z.number().int().positive().default(fallback);

const registrySettingsSchema = z.object({
	serviceTimeoutMs: durationMs(DEFAULT_SERVICE_TIMEOUT_MS),
});

const sweeperSettingsSchema = z.object({
	intervalMs: durationMs(DEFAULT_SWEEP_INTERVAL_MS),
});

const publisherSettingsSchema = z.object({
	group: groupSchema,
	port: portSchema,
	ttl: z.number().int().min(0).max(255).default(DEFAULT_TTL),
	intervalMs: durationMs(DEFAULT_INTERVAL_MS),
	message: z.union([z.string(), z.instanceof(Buffer)]),
	interface: interfaceSchema,
	loopback: z.boolean().default(true),
});

const listenerSettingsSchema = z.object({
	group: groupSchema,
	port: portSchema,
	timeoutMs: durationMs(DEFAULT_RECEIVE_TIMEOUT_MS),
	bufferSize: z
		.number()
		.int()
		.min(1)
		.max(MAX_DATAGRAM_SIZE)
		.default(DEFAULT_BUFFER_SIZE),
	typeFilter: z.string().default(""),
	interface: interfaceSchema,
	serviceTimeoutMs: durationMs(DEFAULT_SERVICE_TIMEOUT_MS),
});

export type RegistrySettings = z.infer<typeof registrySettingsSchema>;
export type SweeperSettings = z.infer<typeof sweeperSettingsSchema>;
export type PublisherSettings = z.infer<typeof publisherSettingsSchema>;
export type ListenerSettings = z.infer<typeof listenerSettingsSchema>;

export type RegistrySettingsInput = z.input<typeof registrySettingsSchema>;
export type SweeperSettingsInput = z.input<typeof sweeperSettingsSchema>;
export type PublisherSettingsInput = z.input<typeof publisherSettingsSchema>;
export type ListenerSettingsInput = z.input<typeof listenerSettingsSchema>;

export {
	registrySettingsSchema,
	sweeperSettingsSchema,
	publisherSettingsSchema,
	listenerSettingsSchema,
};

function parseSettings<S extends z.ZodTypeAny>(
	what: string,
	schema: S,
	input: unknown,
): z.infer<S> {
	const result = schema.safeParse(input);
	if (!result.success) {
		const issues = result.error.issues.map(
			(issue: z.ZodIssue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`,
		);
		throw new SettingsError(
			`invalid ${what} settings: ${issues.join("; ")}`,
			issues,
		);
	}
	return result.data;
}

export function createRegistrySettings(
	input?: RegistrySettingsInput,
): RegistrySettings {
	return parseSettings("registry", registrySettingsSchema, input ?? {});
}

export function createSweeperSettings(
	input?: SweeperSettingsInput,
): SweeperSettings {
	return parseSettings("sweeper", sweeperSettingsSchema, input ?? {});
}

export function createPublisherSettings(
	input: PublisherSettingsInput,
): PublisherSettings {
	return parseSettings("publisher", publisherSettingsSchema, input);
}

export function createListenerSettings(
	input?: ListenerSettingsInput,
): ListenerSettings {
	return parseSettings("listener", listenerSettingsSchema, input ?? {});
}
