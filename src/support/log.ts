import { format } from "node:util";

export enum LogLevel {
	Debug = 10,
	Info = 20,
	Warning = 30,
	Error = 40,
	Off = 100,
}

export type LogSink = (level: LogLevel, name: string, message: string) => void;

export interface Logger {
	readonly name: string;
	isEnabledFor(level: LogLevel): boolean;
	debug(...args: unknown[]): void;
	info(...args: unknown[]): void;
	warn(...args: unknown[]): void;
	error(...args: unknown[]): void;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
	debug: LogLevel.Debug,
	info: LogLevel.Info,
	warn: LogLevel.Warning,
	warning: LogLevel.Warning,
	error: LogLevel.Error,
	off: LogLevel.Off,
	silent: LogLevel.Off,
};

export function parseLogLevel(
	value: string | undefined,
	fallback: LogLevel = LogLevel.Warning,
): LogLevel {
	if (!value) return fallback;
	return LEVEL_NAMES[value.trim().toLowerCase()] ?? fallback;
}

function consoleSink(level: LogLevel, name: string, message: string): void {
	const line = `[${new Date().toISOString()}] [${LogLevel[level]}] ${name}: ${message}`;
	if (level >= LogLevel.Error) {
		console.error(line);
	} else if (level >= LogLevel.Warning) {
		console.warn(line);
	} else {
		console.log(line);
	}
}

let logLevel = parseLogLevel(process.env.LANBEACON_LOG_LEVEL);
let logSink: LogSink = consoleSink;

export function setLogLevel(level: LogLevel): void {
	logLevel = level;
}

export function getLogLevel(): LogLevel {
	return logLevel;
}

/** Route log lines somewhere other than the console; `null` restores it. */
export function setLogSink(sink: LogSink | null): void {
	logSink = sink ?? consoleSink;
}

function emit(level: LogLevel, name: string, args: unknown[]): void {
	if (level < logLevel) return;
	logSink(level, name, format(...args));
}

export function getLogger(name: string): Logger {
	return {
		name,
		isEnabledFor: (level: LogLevel) => level >= logLevel,
		debug: (...args: unknown[]) => emit(LogLevel.Debug, name, args),
		info: (...args: unknown[]) => emit(LogLevel.Info, name, args),
		warn: (...args: unknown[]) => emit(LogLevel.Warning, name, args),
		error: (...args: unknown[]) => emit(LogLevel.Error, name, args),
	};
}
