import type { DeadLetterSource, StreamRecord } from "@relay/core-kafka";
import {
	BaseWorkerService,
	type KafkaService,
	type LoggerService,
	type ProcessResult,
	type TelemetryService,
	type WorkerConfig,
	type WorkerContext,
	deadLettered,
	deferred,
	skip,
	success,
} from "@relay/worker-base";
import type { BackpressureService } from "../backpressure/backpressure.service.js";
import { type Clock, systemClock } from "../clock.js";
import type { OutboundEvent, OutboundEventStore } from "../db/outbound-event.js";
import type { RecordStore } from "../db/record.repository.js";
import { isRemoval } from "../intake/event-kind.js";
import { type ClassifiedEvent, classifyRecord } from "../intake/intake-classifier.js";
import type { RelayMetricsService } from "../metrics/relay-metrics.service.js";
import { errorMessage, isPermanentDispatchError } from "../vendor/dispatch-errors.js";
import type { VendorDispatcher } from "../vendor/vendor-dispatcher.js";

function deadLetterSource(record: StreamRecord): DeadLetterSource {
	return {
		topic: record.topic,
		key: record.key,
		value: record.value,
		headers: record.headers,
		partition: record.partition,
		offset: record.offset,
	};
}

/**
 * Intake path for change events: classify, persist, attempt one immediate
 * send. The offset is committed once `process` resolves, so anything thrown
 * before the outbox row exists leads to redelivery.
 */
export class RelayWorkerService extends BaseWorkerService {
	constructor(
		kafka: KafkaService,
		telemetry: TelemetryService,
		logger: LoggerService,
		config: WorkerConfig,
		private readonly records: RecordStore,
		private readonly outbox: OutboundEventStore,
		private readonly dispatcher: VendorDispatcher,
		private readonly backpressure: BackpressureService,
		private readonly metrics: RelayMetricsService,
		private readonly now: Clock = systemClock,
	) {
		super(kafka, telemetry, logger, config);
	}

	protected async process(
		record: StreamRecord,
		context: WorkerContext,
	): Promise<ProcessResult> {
		const classification = classifyRecord(record);

		switch (classification.type) {
			case "unroutable":
				return skip(
					`Unroutable record (objectType=${classification.objectType ?? "unknown"}, action=${classification.action ?? "unknown"})`,
				);
			case "malformed":
				await this.kafka.deadLetter(
					deadLetterSource(record),
					classification.reason,
				);
				this.metrics.poison();
				this.logger.critical("Malformed record dead-lettered", {
					topic: context.topic,
					partition: context.partition,
					offset: context.offset,
					reason: classification.reason,
				});
				return deadLettered(classification.reason);
			case "routable":
				return this.relay(record, classification.event);
		}
	}

	private async relay(
		record: StreamRecord,
		event: ClassifiedEvent,
	): Promise<ProcessResult> {
		const outbound = await this.persist(event);
		const attemptedAt = new Date(this.now());

		try {
			await this.dispatcher.send(outbound.payload);
		} catch (error) {
			const reason = errorMessage(error);
			if (isPermanentDispatchError(error)) {
				await this.update({ ...outbound, status: "FAILED", lastAttempt: attemptedAt });
				await this.kafka.deadLetter(deadLetterSource(record), reason);
				this.metrics.failed();
				return deadLettered(reason);
			}

			await this.update({
				...outbound,
				retryCount: outbound.retryCount + 1,
				lastAttempt: attemptedAt,
			});
			this.metrics.retry();
			this.backpressure.pauseConsumer("dispatch_failure");
			this.logger.operational("Vendor dispatch deferred", {
				outbound_id: outbound.id,
				routing_key: outbound.routingKey,
				kind: event.kind,
				error_message: reason,
			});
			return deferred(reason);
		}

		await this.update({ ...outbound, status: "SENT", lastAttempt: attemptedAt });
		this.metrics.sent();
		return success();
	}

	/**
	 * Record store then outbox. Errors propagate so the record is redelivered.
	 */
	private async persist(event: ClassifiedEvent): Promise<OutboundEvent> {
		try {
			if (isRemoval(event.action)) {
				await this.records.delete(event.routingKey);
			} else {
				await this.records.upsert(event.routingKey, event.body);
			}
			return await this.outbox.create({
				routingKey: event.routingKey,
				payload: event.body,
				lastAttempt: new Date(this.now()),
			});
		} catch (error) {
			this.metrics.databaseFailure("intake_persist", error);
			throw error;
		}
	}

	/**
	 * Bookkeeping after the send. A failure here leaves the row PENDING for
	 * the retry scheduler instead of redelivering the record.
	 */
	private async update(event: OutboundEvent): Promise<void> {
		try {
			await this.outbox.save(event);
		} catch (error) {
			this.metrics.databaseFailure("outbox_save", error);
			this.logger.error("Outbox update after dispatch failed", {
				outbound_id: event.id,
				status: event.status,
				error_message: errorMessage(error),
			});
		}
	}
}
