export class AlreadyRunningError extends Error {
	constructor(message?: string) {
		super(message);
		this.name = "AlreadyRunningError";
	}
}

export class ShutdownTimeoutError extends Error {
	readonly timeoutMs: number;

	constructor(message: string, timeoutMs: number) {
		super(message);
		this.name = "ShutdownTimeoutError";
		this.timeoutMs = timeoutMs;
	}
}

export class SendError extends Error {
	constructor(message?: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "SendError";
	}
}

export class ReceiveError extends Error {
	constructor(message?: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ReceiveError";
	}
}

export class DecodeError extends Error {
	constructor(message?: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "DecodeError";
	}
}

export class SocketFatalError extends Error {
	constructor(message?: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "SocketFatalError";
	}
}

export class NoServiceError extends Error {
	constructor(message?: string) {
		super(message);
		this.name = "NoServiceError";
	}
}

export class SettingsError extends Error {
	readonly issues: string[];

	constructor(message: string, issues: string[] = []) {
		super(message);
		this.name = "SettingsError";
		this.issues = issues;
	}
}
