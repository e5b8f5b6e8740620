import type { Logger } from "@relay/core-telemetry";
import type { Kafka, Producer, RecordMetadata } from "kafkajs";

export interface OutgoingRecord {
	key: string | null;
	value: string | null;
	headers?: Record<string, string>;
}

export interface RelayProducer {
	connect(): Promise<void>;
	disconnect(): Promise<void>;
	isConnected(): boolean;
	send(topic: string, records: OutgoingRecord[]): Promise<RecordMetadata[]>;
}

export interface ProducerOptions {
	kafka: Kafka;
	logger: Logger;
	serviceName: string;
}

class RelayProducerImpl implements RelayProducer {
	private producer: Producer;
	private logger: Logger;
	private serviceName: string;
	private connected = false;

	constructor(options: ProducerOptions) {
		this.producer = options.kafka.producer({
			idempotent: true,
			maxInFlightRequests: 5,
		});
		this.logger = options.logger;
		this.serviceName = options.serviceName;
	}

	async connect(): Promise<void> {
		if (this.connected) return;
		await this.producer.connect();
		this.connected = true;
		this.logger.info("Kafka producer connected");
	}

	async disconnect(): Promise<void> {
		if (!this.connected) return;
		await this.producer.disconnect();
		this.connected = false;
		this.logger.info("Kafka producer disconnected");
	}

	isConnected(): boolean {
		return this.connected;
	}

	async send(
		topic: string,
		records: OutgoingRecord[],
	): Promise<RecordMetadata[]> {
		const result = await this.producer.send({
			topic,
			messages: records.map((record) => ({
				key: record.key,
				value: record.value,
				headers: {
					"x-relay-service": this.serviceName,
					...record.headers,
				},
			})),
		});

		this.logger.debug("Records sent", {
			topic,
			record_count: records.length,
		});

		return result;
	}
}

export function createProducer(options: ProducerOptions): RelayProducer {
	return new RelayProducerImpl(options);
}
