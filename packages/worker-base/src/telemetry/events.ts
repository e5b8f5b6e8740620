import { getDeadLetterTopic } from "@relay/core-kafka";
import { Injectable } from "@nestjs/common";
import type { WorkerConfig } from "../config/config.module.js";
import type { WorkerContext } from "../kafka/types.js";
import type {
	BaseEvent,
	CircuitStateChangedEvent,
	ConsumerPausedEvent,
	ConsumerResumedEvent,
	DatabaseErrorEvent,
	HealthChangedEvent,
	KafkaConnectedEvent,
	KafkaDisconnectedEvent,
	KafkaErrorEvent,
	MessageDeadLetteredEvent,
	MessageDeferredEvent,
	MessageProcessedEvent,
	MessageSkippedEvent,
	OutboxStatisticsEvent,
	RecordPosition,
	RetentionSweepCompletedEvent,
	RetryPassCompletedEvent,
	ServiceTags,
	WorkerShutdownCompletedEvent,
	WorkerShutdownInitiatedEvent,
	WorkerStartedEvent,
	WorkerStartingEvent,
} from "./events.types.js";
import type { LoggerService } from "./logger.service.js";

export const EVENT_LOGGER = "EVENT_LOGGER";

function createBaseEvent<T extends string>(event: T): BaseEvent & { event: T } {
	return {
		event,
		timestamp: new Date().toISOString(),
		"dd.forward": true,
	};
}

function toPosition(context: WorkerContext): RecordPosition {
	const position: RecordPosition = {
		topic: context.topic,
		kafka_partition: context.partition,
		kafka_offset: context.offset,
	};
	if (context.key !== null) position.routing_key = context.key;
	return position;
}

export interface RetryPassCounts {
	pending: number;
	sent: number;
	failed: number;
	exhausted: number;
	notDue: number;
	deadLettered: number;
	resumed: boolean;
}

export interface OutboxCounts {
	pending: number;
	sent: number;
	failed: number;
	recentRetries: number;
}

/**
 * Emits typed relay events through the logger. Every event carries the
 * service tags and `dd.forward: true`.
 */
@Injectable()
export class EventLogger {
	private readonly baseTags: ServiceTags;

	constructor(
		private readonly logger: LoggerService,
		private readonly config: WorkerConfig,
	) {
		this.baseTags = {
			service: config.base.service.name,
			version: config.base.service.version,
			env: config.base.env,
			team: config.base.service.team,
			region: config.base.service.region,
		};
	}

	private emit<T extends BaseEvent>(event: T): void {
		this.logger.info(event.event, { ...this.baseTags, ...event });
	}

	workerStarting(): void {
		const event: WorkerStartingEvent = {
			...createBaseEvent("relay.worker.starting"),
			service: this.baseTags.service,
			version: this.baseTags.version,
			env: this.baseTags.env,
		};
		this.emit(event);
	}

	workerStarted(): void {
		const event: WorkerStartedEvent = {
			...createBaseEvent("relay.worker.started"),
			service: this.baseTags.service,
			version: this.baseTags.version,
			env: this.baseTags.env,
			config: {
				team: this.baseTags.team,
				kafka_topic: this.config.kafka.topic,
				kafka_group_id: this.config.kafka.groupId,
				vendor_url: this.config.vendor.baseUrl,
				health_port: this.config.base.healthPort,
			},
		};
		this.emit(event);
	}

	workerShutdownInitiated(inFlightCount: number, signal?: string): void {
		const event: WorkerShutdownInitiatedEvent = {
			...createBaseEvent("relay.worker.shutdown.initiated"),
			service: this.baseTags.service,
			in_flight_count: inFlightCount,
		};
		if (signal) event.signal = signal;
		this.emit(event);
	}

	workerShutdownCompleted(
		durationMs: number,
		reason: "graceful" | "error" | "signal",
	): void {
		const event: WorkerShutdownCompletedEvent = {
			...createBaseEvent("relay.worker.shutdown.completed"),
			service: this.baseTags.service,
			duration_ms: durationMs,
			reason,
		};
		this.emit(event);
	}

	messageProcessed(context: WorkerContext, durationMs: number): void {
		const event: MessageProcessedEvent = {
			...createBaseEvent("relay.message.processed"),
			...toPosition(context),
			duration_ms: durationMs,
		};
		this.emit(event);
	}

	messageSkipped(context: WorkerContext, reason: string): void {
		const event: MessageSkippedEvent = {
			...createBaseEvent("relay.message.skipped"),
			...toPosition(context),
			reason,
		};
		this.emit(event);
	}

	messageDeferred(context: WorkerContext, reason: string): void {
		const event: MessageDeferredEvent = {
			...createBaseEvent("relay.message.deferred"),
			...toPosition(context),
			reason,
		};
		this.emit(event);
	}

	messageDeadLettered(context: WorkerContext, reason: string): void {
		const event: MessageDeadLetteredEvent = {
			...createBaseEvent("relay.message.dead_lettered"),
			...toPosition(context),
			reason,
			dlq_topic: getDeadLetterTopic(context.topic),
		};
		this.emit(event);
	}

	kafkaConnected(): void {
		const event: KafkaConnectedEvent = {
			...createBaseEvent("relay.kafka.connected"),
			broker: this.config.kafka.brokers.join(","),
			client_id: this.config.kafka.clientId,
			group_id: this.config.kafka.groupId,
			topic: this.config.kafka.topic,
		};
		this.emit(event);
	}

	kafkaDisconnected(reason: string): void {
		const event: KafkaDisconnectedEvent = {
			...createBaseEvent("relay.kafka.disconnected"),
			broker: this.config.kafka.brokers.join(","),
			client_id: this.config.kafka.clientId,
			reason,
		};
		this.emit(event);
	}

	kafkaError(errorMessage: string): void {
		const event: KafkaErrorEvent = {
			...createBaseEvent("relay.kafka.error"),
			client_id: this.config.kafka.clientId,
			error_message: errorMessage,
		};
		this.emit(event);
	}

	consumerPaused(listenerId: string, trigger: string): void {
		const event: ConsumerPausedEvent = {
			...createBaseEvent("relay.consumer.paused"),
			listener_id: listenerId,
			trigger,
		};
		this.emit(event);
	}

	consumerResumed(listenerId: string, trigger: string): void {
		const event: ConsumerResumedEvent = {
			...createBaseEvent("relay.consumer.resumed"),
			listener_id: listenerId,
			trigger,
		};
		this.emit(event);
	}

	circuitStateChanged(circuit: string, from: string, to: string): void {
		const event: CircuitStateChangedEvent = {
			...createBaseEvent("relay.circuit.state_changed"),
			circuit,
			from_state: from,
			to_state: to,
		};
		this.emit(event);
	}

	retryPassCompleted(counts: RetryPassCounts): void {
		const event: RetryPassCompletedEvent = {
			...createBaseEvent("relay.retry.pass_completed"),
			pending: counts.pending,
			sent: counts.sent,
			failed: counts.failed,
			exhausted: counts.exhausted,
			not_due: counts.notDue,
			dead_lettered: counts.deadLettered,
			resumed: counts.resumed,
		};
		this.emit(event);
	}

	outboxStatistics(counts: OutboxCounts): void {
		const event: OutboxStatisticsEvent = {
			...createBaseEvent("relay.outbox.statistics"),
			pending: counts.pending,
			sent: counts.sent,
			failed: counts.failed,
			recent_retries: counts.recentRetries,
		};
		this.emit(event);
	}

	retentionSweepCompleted(deleted: number, cutoff: Date): void {
		const event: RetentionSweepCompletedEvent = {
			...createBaseEvent("relay.retention.sweep_completed"),
			deleted,
			cutoff: cutoff.toISOString(),
		};
		this.emit(event);
	}

	databaseError(
		operation: string,
		errorCode: string,
		errorMessage: string,
	): void {
		const event: DatabaseErrorEvent = {
			...createBaseEvent("relay.database.error"),
			operation,
			error_code: errorCode,
			error_message: errorMessage,
		};
		this.emit(event);
	}

	healthChanged(
		previousStatus: HealthChangedEvent["previous_status"],
		currentStatus: HealthChangedEvent["current_status"],
		checks: Record<string, string>,
	): void {
		const event: HealthChangedEvent = {
			...createBaseEvent("relay.health.changed"),
			service: this.baseTags.service,
			previous_status: previousStatus,
			current_status: currentStatus,
			checks,
		};
		this.emit(event);
	}
}
