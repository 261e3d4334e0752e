export {
	getLogger,
	getLogLevel,
	type Logger,
	LogLevel,
	type LogSink,
	parseLogLevel,
	setLogLevel,
	setLogSink,
} from "./log.js";
export { getPrivateAddresses, isIpv4, isMulticastIpv4 } from "./net.js";
export { describeError, logBinary, shorten, sleep } from "./utils.js";
