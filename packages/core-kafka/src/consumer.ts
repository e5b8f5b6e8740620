import type { Logger } from "@relay/core-telemetry";
import type {
	Consumer,
	EachMessagePayload,
	IHeaders,
	Kafka,
	KafkaMessage,
} from "kafkajs";
import { ConsumerStateError } from "./errors.js";

/**
 * One record as handed to a worker: decoded key, value and headers plus the
 * position it was read from.
 */
export interface StreamRecord {
	topic: string;
	partition: number;
	offset: string;
	key: string | null;
	value: string | null;
	headers: Record<string, string | undefined>;
	timestamp: string;
}

export type RecordHandler = (record: StreamRecord) => Promise<void>;

export interface ConsumerOptions {
	kafka: Kafka;
	logger: Logger;
	groupId: string;
	topics: string[];
	concurrency?: number;
	sessionTimeout?: number;
	heartbeatInterval?: number;
	maxRetries?: number;
}

export interface RelayConsumer {
	connect(): Promise<void>;
	disconnect(): Promise<void>;
	subscribe(): Promise<void>;
	run(handler: RecordHandler): Promise<void>;
	pause(): void;
	resume(): void;
	isConnected(): boolean;
	isPaused(): boolean;
	/** Called when kafkajs gives up on the consumer after its own retries */
	onCrash(listener: (error: Error) => void): void;
}

export function decodeHeaders(
	headers: IHeaders | undefined,
): Record<string, string | undefined> {
	const decoded: Record<string, string | undefined> = {};
	if (!headers) {
		return decoded;
	}
	for (const [key, value] of Object.entries(headers)) {
		if (value === undefined) {
			decoded[key] = undefined;
		} else if (Array.isArray(value)) {
			decoded[key] = value.map((v) => v.toString()).join(",");
		} else {
			decoded[key] = value.toString();
		}
	}
	return decoded;
}

export function toStreamRecord(
	topic: string,
	partition: number,
	message: KafkaMessage,
): StreamRecord {
	return {
		topic,
		partition,
		offset: message.offset,
		key: message.key ? message.key.toString() : null,
		value: message.value ? message.value.toString() : null,
		headers: decodeHeaders(message.headers),
		timestamp: message.timestamp,
	};
}

export function nextOffset(offset: string): string {
	return (BigInt(offset) + 1n).toString();
}

class RelayConsumerImpl implements RelayConsumer {
	private consumer: Consumer;
	private logger: Logger;
	private topics: string[];
	private concurrency: number;
	private connected = false;
	private running = false;
	private paused = false;

	constructor(options: ConsumerOptions) {
		this.consumer = options.kafka.consumer({
			groupId: options.groupId,
			sessionTimeout: options.sessionTimeout ?? 30000,
			heartbeatInterval: options.heartbeatInterval ?? 3000,
			maxBytesPerPartition: 1048576,
			retry: {
				retries: options.maxRetries ?? 5,
			},
		});
		this.logger = options.logger;
		this.topics = options.topics;
		this.concurrency = options.concurrency ?? 1;
	}

	async connect(): Promise<void> {
		if (this.connected) return;
		await this.consumer.connect();
		this.connected = true;
		this.logger.info("Kafka consumer connected");
	}

	async disconnect(): Promise<void> {
		if (!this.connected) return;
		await this.consumer.disconnect();
		this.connected = false;
		this.running = false;
		this.logger.info("Kafka consumer disconnected");
	}

	async subscribe(): Promise<void> {
		for (const topic of this.topics) {
			await this.consumer.subscribe({ topic, fromBeginning: false });
		}
		this.logger.info("Subscribed to topics", { topics: this.topics });
	}

	pause(): void {
		if (this.paused) return;
		this.consumer.pause(this.topics.map((topic) => ({ topic })));
		this.paused = true;
		this.logger.info("Consumer paused", { topics: this.topics });
	}

	resume(): void {
		if (!this.paused) return;
		this.consumer.resume(this.topics.map((topic) => ({ topic })));
		this.paused = false;
		this.logger.info("Consumer resumed", { topics: this.topics });
	}

	isConnected(): boolean {
		return this.connected;
	}

	isPaused(): boolean {
		return this.paused;
	}

	onCrash(listener: (error: Error) => void): void {
		this.consumer.on(this.consumer.events.CRASH, (event) => {
			listener(event.payload.error);
		});
	}

	async run(handler: RecordHandler): Promise<void> {
		if (!this.connected) {
			throw new ConsumerStateError("Consumer must be connected before run");
		}
		if (this.running) {
			throw new ConsumerStateError("Consumer already running");
		}
		this.running = true;

		await this.consumer.run({
			autoCommit: false,
			partitionsConsumedConcurrently: this.concurrency,
			eachMessage: async (payload: EachMessagePayload) => {
				await this.handleMessage(payload, handler);
			},
		});
	}

	private async handleMessage(
		payload: EachMessagePayload,
		handler: RecordHandler,
	): Promise<void> {
		const { topic, partition, message } = payload;
		const record = toStreamRecord(topic, partition, message);

		try {
			await handler(record);
		} catch (error) {
			// Offset stays uncommitted; kafkajs seeks back and redelivers.
			this.logger.warn("Record handler failed, offset not committed", {
				topic,
				partition,
				offset: message.offset,
				error_message: error instanceof Error ? error.message : String(error),
			});
			throw error;
		}

		await this.consumer.commitOffsets([
			{ topic, partition, offset: nextOffset(message.offset) },
		]);
	}
}

export function createConsumer(options: ConsumerOptions): RelayConsumer {
	return new RelayConsumerImpl(options);
}
