import { beforeEach, describe, expect, it, vi } from "vitest";
import { buildWorkerConfig } from "../../config/config.module.js";
import type { WorkerContext } from "../../kafka/types.js";
import { EventLogger } from "../events.js";
import type { LoggerService } from "../logger.service.js";

const createMockLogger = (): LoggerService =>
	({
		log: vi.fn(),
		info: vi.fn(),
		debug: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		verbose: vi.fn(),
		child: vi.fn(),
		createEventLogger: vi.fn(),
	}) as unknown as LoggerService;

const config = buildWorkerConfig({
	ENV: "test",
	SERVICE_NAME: "test-relay",
	SERVICE_VERSION: "1.0.0",
	TEAM: "platform",
	KAFKA_BROKERS: "broker-1:9092,broker-2:9092",
	KAFKA_TOPIC: "changes",
	DATABASE_URL: "postgresql://relay@localhost:5432/relay",
	VENDOR_BASE_URL: "http://vendor.test/updates",
});

const context: WorkerContext = {
	topic: "changes",
	partition: 3,
	offset: "1200",
	key: "team-7",
};

describe("EventLogger", () => {
	let mockLogger: LoggerService;
	let eventLogger: EventLogger;

	const lastEvent = (): [string, Record<string, unknown>] => {
		const calls = vi.mocked(mockLogger.info).mock.calls;
		const call = calls[calls.length - 1];
		if (!call) {
			throw new Error("no event emitted");
		}
		return [call[0], { ...call[1] }];
	};

	beforeEach(() => {
		mockLogger = createMockLogger();
		eventLogger = new EventLogger(mockLogger, config);
	});

	it("should emit workerStarted with the relay configuration", () => {
		eventLogger.workerStarted();

		const [message, event] = lastEvent();
		expect(message).toBe("relay.worker.started");
		expect(event).toMatchObject({
			event: "relay.worker.started",
			"dd.forward": true,
			service: "test-relay",
			version: "1.0.0",
			env: "test",
			team: "platform",
			config: {
				team: "platform",
				kafka_topic: "changes",
				kafka_group_id: "test-relay-group",
				vendor_url: "http://vendor.test/updates",
				health_port: 3000,
			},
		});
		expect(typeof event["timestamp"]).toBe("string");
	});

	it("should emit record position on processing events", () => {
		eventLogger.messageProcessed(context, 42);

		const [message, event] = lastEvent();
		expect(message).toBe("relay.message.processed");
		expect(event).toMatchObject({
			topic: "changes",
			kafka_partition: 3,
			kafka_offset: "1200",
			routing_key: "team-7",
			duration_ms: 42,
		});
	});

	it("should omit the routing key for keyless records", () => {
		eventLogger.messageSkipped({ ...context, key: null }, "unroutable");

		const [, event] = lastEvent();
		expect(event["reason"]).toBe("unroutable");
		expect(event).not.toHaveProperty("routing_key");
	});

	it("should name the dead-letter topic derived from the source topic", () => {
		eventLogger.messageDeadLettered(context, "Unexpected end of JSON input");

		const [message, event] = lastEvent();
		expect(message).toBe("relay.message.dead_lettered");
		expect(event["dlq_topic"]).toBe("changes.DLT");
		expect(event["reason"]).toBe("Unexpected end of JSON input");
	});

	it("should emit deferred records with their reason", () => {
		eventLogger.messageDeferred(context, "Vendor returned 503");

		const [message, event] = lastEvent();
		expect(message).toBe("relay.message.deferred");
		expect(event["reason"]).toBe("Vendor returned 503");
	});

	it("should emit pause and resume with the listener and trigger", () => {
		eventLogger.consumerPaused("test-relay-group", "circuit_open");
		expect(lastEvent()[1]).toMatchObject({
			event: "relay.consumer.paused",
			listener_id: "test-relay-group",
			trigger: "circuit_open",
		});

		eventLogger.consumerResumed("test-relay-group", "retry_pass");
		expect(lastEvent()[1]).toMatchObject({
			event: "relay.consumer.resumed",
			trigger: "retry_pass",
		});
	});

	it("should emit circuit transitions", () => {
		eventLogger.circuitStateChanged("vendor", "CLOSED", "OPEN");

		expect(lastEvent()[1]).toMatchObject({
			event: "relay.circuit.state_changed",
			circuit: "vendor",
			from_state: "CLOSED",
			to_state: "OPEN",
		});
	});

	it("should emit retry pass counts in snake case", () => {
		eventLogger.retryPassCompleted({
			pending: 3,
			sent: 1,
			failed: 1,
			exhausted: 0,
			notDue: 1,
			deadLettered: 0,
			resumed: false,
		});

		expect(lastEvent()[1]).toMatchObject({
			event: "relay.retry.pass_completed",
			pending: 3,
			sent: 1,
			failed: 1,
			not_due: 1,
			dead_lettered: 0,
			resumed: false,
		});
	});

	it("should emit Kafka connection details", () => {
		eventLogger.kafkaConnected();

		expect(lastEvent()[1]).toMatchObject({
			event: "relay.kafka.connected",
			broker: "broker-1:9092,broker-2:9092",
			client_id: "test-relay",
			group_id: "test-relay-group",
			topic: "changes",
		});
	});

	it("should emit shutdown events", () => {
		eventLogger.workerShutdownInitiated(2, "SIGTERM");
		expect(lastEvent()[1]).toMatchObject({
			event: "relay.worker.shutdown.initiated",
			in_flight_count: 2,
			signal: "SIGTERM",
		});

		eventLogger.workerShutdownCompleted(1500, "signal");
		expect(lastEvent()[1]).toMatchObject({
			event: "relay.worker.shutdown.completed",
			duration_ms: 1500,
			reason: "signal",
		});
	});

	it("should emit retention sweeps with an ISO cutoff", () => {
		eventLogger.retentionSweepCompleted(4, new Date("2026-01-01T00:00:00Z"));

		expect(lastEvent()[1]).toMatchObject({
			event: "relay.retention.sweep_completed",
			deleted: 4,
			cutoff: "2026-01-01T00:00:00.000Z",
		});
	});
});
