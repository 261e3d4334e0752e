export const MAJOR_VERSION = "0";
export const MINOR_VERSION = "1";
export const PATCH_VERSION = "0";
export const __short_version__ = `${MAJOR_VERSION}.${MINOR_VERSION}`;
export const __version__ = `${__short_version__}.${PATCH_VERSION}`;

export const DEFAULT_MULTICAST_GROUP = "224.1.1.1";
export const DEFAULT_PORT = 5004;
export const DEFAULT_TTL = 2;
export const DEFAULT_INTERVAL_MS = 2000;
export const DEFAULT_RECEIVE_TIMEOUT_MS = 2000;
export const DEFAULT_BUFFER_SIZE = 1400;
export const DEFAULT_SERVICE_TIMEOUT_MS = 30000;
export const DEFAULT_SWEEP_INTERVAL_MS = 5000;
export const DEFAULT_STOP_TIMEOUT_MS = 5000;
export const DEFAULT_SCAN_TIMEOUT_MS = 3000;

// Largest payload a single IPv4 UDP datagram can carry
export const MAX_DATAGRAM_SIZE = 65507;

export enum WorkerStatus {
	Stopped = "stopped",
	Running = "running",
}
