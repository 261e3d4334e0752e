import { type Logger, LogLevel } from "./log.js";

const BINARY_LINE_LENGTH = 100;

export function shorten(text: string | Buffer, length: number): string {
	if (typeof text === "string") {
		return text.length < length ? text : `${text.slice(0, length - 3)}...`;
	}
	if (text.length < length) return text.toString();
	return `${text.subarray(0, length - 3).toString()}...`;
}

function logValue(value: unknown): string {
	if (value === null || value === undefined) return "";
	if (Buffer.isBuffer(value)) {
		return value.toString("utf-8");
	}
	return String(value);
}

export function describeError(err: unknown): string {
	if (err instanceof Error) {
		const code = "code" in err ? err.code : undefined;
		return typeof code === "string" && code
			? `${err.message} (${code})`
			: err.message;
	}
	return String(err);
}

/**
 * Log a message with key/value pairs at debug level, truncating long values.
 *
 * The line length can be overridden with LANBEACON_BINARY_MAX_LINE.
 */
export function logBinary(
	logger: Pick<Logger, "isEnabledFor" | "debug">,
	message: string,
	kwargs: Record<string, unknown> = {},
): void {
	if (!logger.isEnabledFor(LogLevel.Debug)) return;

	const overrideLength = Number.parseInt(
		process.env.LANBEACON_BINARY_MAX_LINE ?? "0",
		10,
	);
	const lineLength = overrideLength || BINARY_LINE_LENGTH;

	const parts = Object.keys(kwargs)
		.sort()
		.map((k) => `${k}=${shorten(logValue(kwargs[k]), lineLength)}`);

	logger.debug("%s (%s)", message, parts.join(", "));
}

/**
 * Wait for `ms` milliseconds. Resolves early with `true` when `signal` is
 * aborted, otherwise with `false` once the time has passed.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
	if (signal?.aborted) return Promise.resolve(true);
	return new Promise<boolean>((resolve) => {
		const onAbort = () => {
			clearTimeout(timer);
			resolve(true);
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve(false);
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}
