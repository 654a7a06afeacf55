export { RedisQueueConsumer } from './queue-consumer.js';
export type { QueueConsumerOptions } from './queue-consumer.js';
export { ControlSubscriber, parseControlMessage, handleControlMessage } from './control-subscriber.js';
export type { ControlHandler } from './control-subscriber.js';
