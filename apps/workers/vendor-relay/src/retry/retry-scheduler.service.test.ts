import { SubscriptionRegistry } from "@relay/worker-base";
import { type Mock, beforeEach, describe, expect, it, vi } from "vitest";
import { InMemoryOutboundEventStore } from "../__tests__/support/in-memory-outbox.js";
import {
	createMockEventLogger,
	createMockKafka,
	createMockLogger,
	createMockTelemetry,
	createPausable,
	testConfig,
} from "../__tests__/support/fakes.js";
import { BackpressureService } from "../backpressure/backpressure.service.js";
import { ConsumerPauseState } from "../backpressure/consumer-pause-state.js";
import { RelayMetricsService } from "../metrics/relay-metrics.service.js";
import {
	VendorRejectedError,
	VendorUnavailableError,
} from "../vendor/dispatch-errors.js";
import type { VendorDispatcher } from "../vendor/vendor-dispatcher.js";
import { RetrySchedulerService } from "./retry-scheduler.service.js";

const NOW = Date.parse("2026-03-01T12:00:00Z");
const MINUTE = 60000;
const minutesAgo = (minutes: number): Date => new Date(NOW - minutes * MINUTE);

describe("RetrySchedulerService", () => {
	const config = testConfig();
	let store: InMemoryOutboundEventStore;
	let send: Mock<(payload: string) => Promise<void>>;
	let handle: ReturnType<typeof createPausable>;
	let backpressure: BackpressureService;
	let metrics: RelayMetricsService;
	let kafka: ReturnType<typeof createMockKafka>;
	let eventLogger: ReturnType<typeof createMockEventLogger>;
	let scheduler: RetrySchedulerService;

	const pending = (routingKey: string, lastAttempt: Date, retryCount = 0) =>
		store.seed({
			routingKey,
			payload: JSON.stringify({ id: routingKey }),
			status: "PENDING",
			retryCount,
			lastAttempt,
		});

	beforeEach(() => {
		store = new InMemoryOutboundEventStore();
		send = vi.fn<(payload: string) => Promise<void>>(async () => {});
		handle = createPausable();
		const registry = new SubscriptionRegistry();
		registry.register(config.kafka.groupId, handle);
		eventLogger = createMockEventLogger();
		const logger = createMockLogger();
		const telemetry = createMockTelemetry();
		backpressure = new BackpressureService(
			registry,
			new ConsumerPauseState(),
			config.kafka.groupId,
			logger,
			eventLogger,
			telemetry,
		);
		metrics = new RelayMetricsService(store, telemetry, logger, eventLogger, config);
		kafka = createMockKafka();
		scheduler = new RetrySchedulerService(
			store,
			{ send } as unknown as VendorDispatcher,
			backpressure,
			metrics,
			kafka.kafka,
			logger,
			eventLogger,
			config,
			() => NOW,
		);
	});

	it("should stop the pass at the first retryable failure", async () => {
		const first = pending("team-1", minutesAgo(30));
		const second = pending("team-2", minutesAgo(20));
		const third = pending("team-3", minutesAgo(10));
		send
			.mockResolvedValueOnce(undefined)
			.mockRejectedValueOnce(new VendorUnavailableError("Vendor returned 503", 503));

		const summary = await scheduler.runPass();

		expect(store.get(first.id)).toMatchObject({ status: "SENT", retryCount: 0 });
		expect(store.get(second.id)).toMatchObject({
			status: "PENDING",
			retryCount: 1,
			lastAttempt: new Date(NOW),
		});
		expect(store.get(third.id)).toEqual(third);
		expect(send).toHaveBeenCalledTimes(2);
		expect(summary).toEqual({
			pending: 3,
			sent: 1,
			failed: 1,
			exhausted: 0,
			notDue: 0,
			deadLettered: 0,
			resumed: false,
		});
		expect(handle.resume).not.toHaveBeenCalled();
	});

	it("should retry in ascending last-attempt order", async () => {
		pending("team-late", minutesAgo(5));
		pending("team-early", minutesAgo(50));

		await scheduler.runPass();

		expect(send.mock.calls.map(([payload]) => payload)).toEqual([
			'{"id":"team-early"}',
			'{"id":"team-late"}',
		]);
	});

	it("should fail events at the attempt cap and never pick them up again", async () => {
		const capped = pending("team-1", minutesAgo(600), config.retry.maxAttempts);

		const first = await scheduler.runPass();
		const second = await scheduler.runPass();

		expect(store.get(capped.id)?.status).toBe("FAILED");
		expect(first.exhausted).toBe(1);
		expect(second.pending).toBe(0);
		expect(send).not.toHaveBeenCalled();
		expect(metrics.snapshot().failed).toBe(1);
	});

	it("should skip events still inside their backoff", async () => {
		// retry 2 waits four minutes
		const waiting = pending("team-1", minutesAgo(3), 2);

		const summary = await scheduler.runPass();

		expect(summary.notDue).toBe(1);
		expect(send).not.toHaveBeenCalled();
		expect(store.get(waiting.id)).toEqual(waiting);
	});

	it("should resume the consumer after a pass with sends and no failures", async () => {
		backpressure.pauseConsumer("dispatch_failure");
		pending("team-1", minutesAgo(10));
		pending("team-2", minutesAgo(5));

		const summary = await scheduler.runPass();

		expect(summary.sent).toBe(2);
		expect(summary.resumed).toBe(true);
		expect(handle.resume).toHaveBeenCalledOnce();
		expect(eventLogger.consumerResumed).toHaveBeenCalledWith(
			config.kafka.groupId,
			"retry_pass",
		);
	});

	it("should not resume after a pass that sent nothing", async () => {
		backpressure.pauseConsumer("dispatch_failure");

		const summary = await scheduler.runPass();

		expect(summary.resumed).toBe(false);
		expect(handle.resume).not.toHaveBeenCalled();
	});

	it("should dead-letter rejected payloads and carry on with the pass", async () => {
		backpressure.pauseConsumer("dispatch_failure");
		const rejected = pending("team-1", minutesAgo(10));
		const accepted = pending("team-2", minutesAgo(5));
		send.mockRejectedValueOnce(new VendorRejectedError(400));

		const summary = await scheduler.runPass();

		expect(store.get(rejected.id)?.status).toBe("FAILED");
		expect(store.get(accepted.id)?.status).toBe("SENT");
		expect(kafka.deadLetter).toHaveBeenCalledWith(
			{ topic: "changes", key: "team-1", value: '{"id":"team-1"}' },
			"Vendor rejected payload with 400",
		);
		expect(summary).toMatchObject({ sent: 1, deadLettered: 1, resumed: false });
		expect(handle.resume).not.toHaveBeenCalled();
	});

	it("should stop early when the pass is aborted", async () => {
		pending("team-1", minutesAgo(10));
		const controller = new AbortController();
		controller.abort();

		const summary = await scheduler.runPass(controller.signal);

		expect(summary.sent).toBe(0);
		expect(send).not.toHaveBeenCalled();
	});

	it("should report the pass counts", async () => {
		pending("team-1", minutesAgo(10));

		const summary = await scheduler.runPass();

		expect(eventLogger.retryPassCompleted).toHaveBeenCalledWith(summary);
	});

	it("should eventually send a backed-off event once the vendor recovers", async () => {
		const event = pending("team-1", minutesAgo(2));
		send.mockRejectedValueOnce(new VendorUnavailableError("Vendor returned 502", 502));

		await scheduler.runPass();
		expect(store.get(event.id)).toMatchObject({ status: "PENDING", retryCount: 1 });

		const later = new RetrySchedulerService(
			store,
			{ send } as unknown as VendorDispatcher,
			backpressure,
			metrics,
			kafka.kafka,
			createMockLogger(),
			eventLogger,
			config,
			() => NOW + 2 * MINUTE,
		);
		await later.runPass();

		expect(store.get(event.id)).toMatchObject({ status: "SENT", retryCount: 1 });
		expect(store.all()).toHaveLength(1);
	});
});
