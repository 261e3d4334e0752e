export {
	createDescriptor,
	type DescriptorOptions,
	decodeDescriptor,
	descriptorName,
	descriptorSchema,
	encodeDescriptor,
	parseDescriptor,
	type ServiceDescriptor,
} from "./descriptor.js";
export {
	Listener,
	type ListenerOptions,
	type NotificationSink,
} from "./listener.js";
export {
	type Clock,
	MetricsCollector,
	type MetricsSnapshot,
} from "./metrics.js";
export { Publisher, type PublisherOptions } from "./publisher.js";
export {
	type RegistryListener,
	type RegistryOptions,
	type ServiceEntry,
	ServiceRegistry,
} from "./registry.js";
export {
	createUdpSocket,
	DatagramInbox,
	type DatagramSocket,
	type InboxItem,
	type SocketFactory,
} from "./socket.js";
export { Sweeper } from "./sweeper.js";
export { StoppableWorker } from "./worker.js";
