/**
 * Structured events forwarded to Datadog (`dd.forward: true`).
 * Names follow `relay.<area>.<action>`.
 */

export interface ServiceTags {
	service: string;
	version: string;
	env: string;
	team: string;
	region: string;
}

export interface BaseEvent {
	event: string;
	/** ISO 8601 */
	timestamp: string;
	"dd.forward": true;
}

/** Where a record was read from */
export interface RecordPosition {
	topic: string;
	kafka_partition: number;
	kafka_offset: string;
	routing_key?: string;
}

// Worker lifecycle

export interface WorkerStartingEvent extends BaseEvent {
	event: "relay.worker.starting";
	service: string;
	version: string;
	env: string;
}

export interface WorkerStartedEvent extends BaseEvent {
	event: "relay.worker.started";
	service: string;
	version: string;
	env: string;
	config: {
		team: string;
		kafka_topic: string;
		kafka_group_id: string;
		vendor_url: string;
		health_port: number;
	};
}

export interface WorkerShutdownInitiatedEvent extends BaseEvent {
	event: "relay.worker.shutdown.initiated";
	service: string;
	in_flight_count: number;
	signal?: string;
}

export interface WorkerShutdownCompletedEvent extends BaseEvent {
	event: "relay.worker.shutdown.completed";
	service: string;
	duration_ms: number;
	reason: "graceful" | "error" | "signal";
}

export type WorkerLifecycleEvent =
	| WorkerStartingEvent
	| WorkerStartedEvent
	| WorkerShutdownInitiatedEvent
	| WorkerShutdownCompletedEvent;

// Record processing

export interface MessageProcessedEvent extends BaseEvent, RecordPosition {
	event: "relay.message.processed";
	duration_ms: number;
}

export interface MessageSkippedEvent extends BaseEvent, RecordPosition {
	event: "relay.message.skipped";
	reason: string;
}

export interface MessageDeferredEvent extends BaseEvent, RecordPosition {
	event: "relay.message.deferred";
	reason: string;
}

export interface MessageDeadLetteredEvent extends BaseEvent, RecordPosition {
	event: "relay.message.dead_lettered";
	reason: string;
	dlq_topic: string;
}

export type MessageProcessingEvent =
	| MessageProcessedEvent
	| MessageSkippedEvent
	| MessageDeferredEvent
	| MessageDeadLetteredEvent;

// Kafka

export interface KafkaConnectedEvent extends BaseEvent {
	event: "relay.kafka.connected";
	broker: string;
	client_id: string;
	group_id: string;
	topic: string;
}

export interface KafkaDisconnectedEvent extends BaseEvent {
	event: "relay.kafka.disconnected";
	broker: string;
	client_id: string;
	reason: string;
}

export interface KafkaErrorEvent extends BaseEvent {
	event: "relay.kafka.error";
	client_id: string;
	error_message: string;
}

export type KafkaConnectionEvent =
	| KafkaConnectedEvent
	| KafkaDisconnectedEvent
	| KafkaErrorEvent;

// Backpressure and dispatch

export interface ConsumerPausedEvent extends BaseEvent {
	event: "relay.consumer.paused";
	listener_id: string;
	trigger: string;
}

export interface ConsumerResumedEvent extends BaseEvent {
	event: "relay.consumer.resumed";
	listener_id: string;
	trigger: string;
}

export interface CircuitStateChangedEvent extends BaseEvent {
	event: "relay.circuit.state_changed";
	circuit: string;
	from_state: string;
	to_state: string;
}

export interface RetryPassCompletedEvent extends BaseEvent {
	event: "relay.retry.pass_completed";
	pending: number;
	sent: number;
	failed: number;
	exhausted: number;
	not_due: number;
	dead_lettered: number;
	resumed: boolean;
}

export interface OutboxStatisticsEvent extends BaseEvent {
	event: "relay.outbox.statistics";
	pending: number;
	sent: number;
	failed: number;
	recent_retries: number;
}

export interface RetentionSweepCompletedEvent extends BaseEvent {
	event: "relay.retention.sweep_completed";
	deleted: number;
	cutoff: string;
}

export type RelayFlowEvent =
	| ConsumerPausedEvent
	| ConsumerResumedEvent
	| CircuitStateChangedEvent
	| RetryPassCompletedEvent
	| OutboxStatisticsEvent
	| RetentionSweepCompletedEvent;

// Database and health

export interface DatabaseErrorEvent extends BaseEvent {
	event: "relay.database.error";
	operation: string;
	error_code: string;
	error_message: string;
}

export interface HealthChangedEvent extends BaseEvent {
	event: "relay.health.changed";
	service: string;
	previous_status: "ok" | "degraded" | "unhealthy" | "unknown";
	current_status: "ok" | "degraded" | "unhealthy";
	checks: Record<string, string>;
}

export type RelayEvent =
	| WorkerLifecycleEvent
	| MessageProcessingEvent
	| KafkaConnectionEvent
	| RelayFlowEvent
	| DatabaseErrorEvent
	| HealthChangedEvent;

export type EventName = RelayEvent["event"];

export type EventByName<T extends EventName> = Extract<
	RelayEvent,
	{ event: T }
>;
