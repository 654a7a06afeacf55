export { MqttTransport, createMqttTransport, buildClientOptions, brokerUrl } from './mqtt-transport.js';
export type { ConnectFn } from './mqtt-transport.js';
export { deriveSessionId } from './session-id.js';
