export { createKafkaClient, type KafkaClientOptions } from "./client.js";
export {
	createProducer,
	type RelayProducer,
	type OutgoingRecord,
	type ProducerOptions,
} from "./producer.js";
export {
	createConsumer,
	decodeHeaders,
	nextOffset,
	toStreamRecord,
	type RelayConsumer,
	type ConsumerOptions,
	type RecordHandler,
	type StreamRecord,
} from "./consumer.js";
export {
	createDeadLetterPublisher,
	buildDeadLetterHeaders,
	DEAD_LETTER_HEADERS,
	type DeadLetterPublisher,
	type DeadLetterPublisherOptions,
	type DeadLetterSource,
} from "./dlq.js";
export {
	DEAD_LETTER_SUFFIX,
	getDeadLetterTopic,
	isDeadLetterTopic,
} from "./topics.js";
export { ConsumerStateError } from "./errors.js";
