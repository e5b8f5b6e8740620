import {
	type DeadLetterPublisher,
	type DeadLetterSource,
	type RelayConsumer,
	type RelayProducer,
	type StreamRecord,
	createConsumer,
	createDeadLetterPublisher,
	createKafkaClient,
	createProducer,
} from "@relay/core-kafka";
import {
	Injectable,
	type OnModuleDestroy,
	type OnModuleInit,
} from "@nestjs/common";
import type { Kafka } from "kafkajs";
import type { WorkerConfig } from "../config/config.module.js";
import type { LifecycleService } from "../lifecycle/lifecycle.service.js";
import type { EventLogger } from "../telemetry/events.js";
import type { LoggerService } from "../telemetry/logger.service.js";
import type { TelemetryService } from "../telemetry/telemetry.service.js";
import type { SubscriptionRegistry } from "./subscription-registry.js";
import type { ProcessResult, WorkerContext } from "./types.js";

export type RecordProcessor = (
	record: StreamRecord,
	context: WorkerContext,
) => Promise<ProcessResult>;

const SHUTDOWN_DRAIN_MS = 30000;

export function toWorkerContext(record: StreamRecord): WorkerContext {
	const context: WorkerContext = {
		topic: record.topic,
		partition: record.partition,
		offset: record.offset,
		key: record.key,
	};
	const traceId = record.headers["x-datadog-trace-id"];
	const spanId = record.headers["x-datadog-parent-id"];
	if (traceId) context.traceId = traceId;
	if (spanId) context.spanId = spanId;
	return context;
}

/**
 * Owns the Kafka client for a worker: one manual-commit consumer on the
 * configured topic, registered for pause/resume under the consumer group
 * id, and one producer used for dead-lettering.
 */
@Injectable()
export class KafkaService implements OnModuleInit, OnModuleDestroy {
	private readonly consumer: RelayConsumer;
	private readonly producer: RelayProducer;
	private readonly deadLetters: DeadLetterPublisher;
	private isConnected = false;
	private isRunning = false;
	private isShuttingDown = false;
	private inFlightCount = 0;

	constructor(
		private readonly config: WorkerConfig,
		private readonly telemetry: TelemetryService,
		private readonly logger: LoggerService,
		private readonly eventLogger: EventLogger,
		private readonly registry: SubscriptionRegistry,
		private readonly lifecycle?: LifecycleService,
		kafka?: Kafka,
	) {
		const client =
			kafka ?? createKafkaClient({ config: config.kafka, logger });

		this.consumer = createConsumer({
			kafka: client,
			logger,
			groupId: config.kafka.groupId,
			topics: [config.kafka.topic],
			concurrency: config.kafka.concurrency,
			sessionTimeout: config.kafka.sessionTimeout,
			heartbeatInterval: config.kafka.heartbeatInterval,
			maxRetries: config.kafka.maxRetries,
		});
		this.producer = createProducer({
			kafka: client,
			logger,
			serviceName: config.base.service.name,
		});
		this.deadLetters = createDeadLetterPublisher({
			producer: this.producer,
			logger,
		});
	}

	async onModuleInit(): Promise<void> {
		await this.connect();
	}

	async onModuleDestroy(): Promise<void> {
		await this.disconnect();
	}

	async connect(): Promise<void> {
		if (this.isConnected) return;

		await this.producer.connect();
		await this.consumer.connect();
		await this.consumer.subscribe();
		this.consumer.onCrash((error) => {
			this.isRunning = false;
			this.telemetry.increment("kafka.consumer_crashed");
			this.eventLogger.kafkaError(error.message);
		});

		this.registry.register(this.config.kafka.groupId, this.consumer);
		this.isConnected = true;
		this.eventLogger.kafkaConnected();
	}

	async disconnect(): Promise<void> {
		if (!this.isConnected) return;

		this.isShuttingDown = true;
		this.registry.unregister(this.config.kafka.groupId);

		const deadline = Date.now() + SHUTDOWN_DRAIN_MS;
		while (this.inFlightCount > 0 && Date.now() < deadline) {
			await this.sleep(1000);
		}

		await this.consumer.disconnect();
		await this.producer.disconnect();
		this.isConnected = false;
		this.isRunning = false;

		this.eventLogger.kafkaDisconnected(
			this.inFlightCount > 0 ? "forced" : "graceful",
		);
	}

	/**
	 * Starts consuming. Offsets are committed only for records whose
	 * processor resolved; a thrown error leaves the record for redelivery.
	 */
	async run(processor: RecordProcessor): Promise<void> {
		this.telemetry.increment("worker.started");
		await this.consumer.run(async (record) => {
			this.inFlightCount++;
			this.lifecycle?.setInFlightCount(this.inFlightCount);
			try {
				await this.handleRecord(record, processor);
			} finally {
				this.inFlightCount--;
				this.lifecycle?.setInFlightCount(this.inFlightCount);
			}
		});
		this.isRunning = true;
	}

	private async handleRecord(
		record: StreamRecord,
		processor: RecordProcessor,
	): Promise<void> {
		const context = toWorkerContext(record);
		const startTime = Date.now();
		this.telemetry.increment("messages.received");

		let result: ProcessResult;
		try {
			result = await processor(record, context);
		} catch (error) {
			this.telemetry.increment("messages.error");
			this.logger.error("Record processing failed, awaiting redelivery", {
				topic: context.topic,
				partition: context.partition,
				offset: context.offset,
				routing_key: context.key ?? undefined,
				error_message: error instanceof Error ? error.message : String(error),
			});
			throw error;
		}

		const duration = Date.now() - startTime;
		switch (result.status) {
			case "success":
				this.telemetry.increment("messages.success");
				this.telemetry.timing("messages.duration", duration);
				this.eventLogger.messageProcessed(context, duration);
				break;
			case "skip":
				this.telemetry.increment("messages.skipped");
				this.eventLogger.messageSkipped(context, result.reason);
				break;
			case "deferred":
				this.telemetry.increment("messages.deferred");
				this.eventLogger.messageDeferred(context, result.reason);
				break;
			case "dlq":
				this.telemetry.increment("messages.dlq");
				this.eventLogger.messageDeadLettered(context, result.reason);
				break;
		}
	}

	/**
	 * Re-emits a record to `<topic>.DLT`. Never throws.
	 */
	async deadLetter(source: DeadLetterSource, reason: string): Promise<void> {
		await this.deadLetters.publish(source, reason);
	}

	isReady(): boolean {
		return this.isConnected && this.isRunning && !this.isShuttingDown;
	}

	isAlive(): boolean {
		return this.isConnected;
	}

	isPaused(): boolean {
		return this.consumer.isPaused();
	}

	private sleep(ms: number): Promise<void> {
		return new Promise((resolve) => setTimeout(resolve, ms));
	}
}
