import type { StreamRecord } from "@relay/core-kafka";
import {
	Inject,
	Injectable,
	type OnApplicationBootstrap,
} from "@nestjs/common";
import { WORKER_CONFIG, type WorkerConfig } from "../config/config.module.js";
import { LOGGER, type LoggerService } from "../telemetry/logger.service.js";
import { TelemetryService } from "../telemetry/telemetry.service.js";
import { KafkaService } from "./kafka.service.js";
import type { ProcessResult, WorkerContext } from "./types.js";

export type WorkerHandler = (
	record: StreamRecord,
	context: WorkerContext,
) => Promise<ProcessResult>;

/**
 * Base class for Kafka workers. Extend it and implement `process`; the
 * record is acknowledged once `process` resolves.
 */
@Injectable()
export abstract class BaseWorkerService implements OnApplicationBootstrap {
	constructor(
		protected readonly kafka: KafkaService,
		protected readonly telemetry: TelemetryService,
		@Inject(LOGGER) protected readonly logger: LoggerService,
		@Inject(WORKER_CONFIG) protected readonly config: WorkerConfig,
	) {}

	async onApplicationBootstrap(): Promise<void> {
		this.logger.lifecycle("Worker service starting", {
			service: this.config.base.service.name,
			topic: this.config.kafka.topic,
		});

		await this.kafka.run(this.handleRecord.bind(this));
	}

	protected abstract process(
		record: StreamRecord,
		context: WorkerContext,
	): Promise<ProcessResult>;

	private async handleRecord(
		record: StreamRecord,
		context: WorkerContext,
	): Promise<ProcessResult> {
		return this.telemetry.withSpan(
			`${this.config.base.service.name}.process`,
			{ topic: record.topic },
			async () => this.process(record, context),
		);
	}
}
