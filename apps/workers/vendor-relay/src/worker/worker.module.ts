import {
	EVENT_LOGGER,
	type EventLogger,
	KafkaService,
	LOGGER,
	type LoggerService,
	SubscriptionRegistry,
	TelemetryService,
	WORKER_CONFIG,
	type WorkerConfig,
} from "@relay/worker-base";
import {
	Inject,
	Module,
	type OnApplicationBootstrap,
	type OnModuleDestroy,
} from "@nestjs/common";
import type pg from "pg";
import { BackpressureService } from "../backpressure/backpressure.service.js";
import { ConsumerPauseState } from "../backpressure/consumer-pause-state.js";
import { DB_POOL } from "../db/database.module.js";
import {
	OUTBOUND_EVENT_STORE,
	type OutboundEventStore,
} from "../db/outbound-event.js";
import { OutboundEventRepository } from "../db/outbound-event.repository.js";
import { RECORD_STORE, type RecordStore, RecordRepository } from "../db/record.repository.js";
import { RelayMetricsService } from "../metrics/relay-metrics.service.js";
import { RetentionSweepService } from "../retry/retention-sweep.service.js";
import { RetrySchedulerService } from "../retry/retry-scheduler.service.js";
import type { CircuitBreaker } from "../vendor/circuit-breaker.js";
import { VENDOR_CIRCUIT } from "../vendor/vendor.module.js";
import { VendorDispatcher } from "../vendor/vendor-dispatcher.js";
import { RelayWorkerService } from "./worker.service.js";

@Module({
	providers: [
		{
			provide: OUTBOUND_EVENT_STORE,
			useFactory: (pool: pg.Pool, logger: LoggerService) =>
				new OutboundEventRepository(pool, logger),
			inject: [DB_POOL, LOGGER],
		},
		{
			provide: RECORD_STORE,
			useFactory: (pool: pg.Pool, logger: LoggerService) =>
				new RecordRepository(pool, logger),
			inject: [DB_POOL, LOGGER],
		},
		{
			provide: RelayMetricsService,
			useFactory: (
				store: OutboundEventStore,
				telemetry: TelemetryService,
				logger: LoggerService,
				eventLogger: EventLogger,
				config: WorkerConfig,
			) => new RelayMetricsService(store, telemetry, logger, eventLogger, config),
			inject: [
				OUTBOUND_EVENT_STORE,
				TelemetryService,
				LOGGER,
				EVENT_LOGGER,
				WORKER_CONFIG,
			],
		},
		{
			provide: BackpressureService,
			useFactory: (
				registry: SubscriptionRegistry,
				config: WorkerConfig,
				logger: LoggerService,
				eventLogger: EventLogger,
				telemetry: TelemetryService,
				breaker: CircuitBreaker,
			) => {
				const backpressure = new BackpressureService(
					registry,
					new ConsumerPauseState(),
					config.kafka.groupId,
					logger,
					eventLogger,
					telemetry,
				);
				backpressure.observe(breaker);
				return backpressure;
			},
			inject: [
				SubscriptionRegistry,
				WORKER_CONFIG,
				LOGGER,
				EVENT_LOGGER,
				TelemetryService,
				VENDOR_CIRCUIT,
			],
		},
		{
			provide: RetrySchedulerService,
			useFactory: (
				store: OutboundEventStore,
				dispatcher: VendorDispatcher,
				backpressure: BackpressureService,
				metrics: RelayMetricsService,
				kafka: KafkaService,
				logger: LoggerService,
				eventLogger: EventLogger,
				config: WorkerConfig,
			) =>
				new RetrySchedulerService(
					store,
					dispatcher,
					backpressure,
					metrics,
					kafka,
					logger,
					eventLogger,
					config,
				),
			inject: [
				OUTBOUND_EVENT_STORE,
				VendorDispatcher,
				BackpressureService,
				RelayMetricsService,
				KafkaService,
				LOGGER,
				EVENT_LOGGER,
				WORKER_CONFIG,
			],
		},
		{
			provide: RetentionSweepService,
			useFactory: (
				store: OutboundEventStore,
				metrics: RelayMetricsService,
				logger: LoggerService,
				eventLogger: EventLogger,
				config: WorkerConfig,
			) => new RetentionSweepService(store, metrics, logger, eventLogger, config),
			inject: [
				OUTBOUND_EVENT_STORE,
				RelayMetricsService,
				LOGGER,
				EVENT_LOGGER,
				WORKER_CONFIG,
			],
		},
		{
			provide: RelayWorkerService,
			useFactory: (
				kafka: KafkaService,
				telemetry: TelemetryService,
				logger: LoggerService,
				config: WorkerConfig,
				records: RecordStore,
				outbox: OutboundEventStore,
				dispatcher: VendorDispatcher,
				backpressure: BackpressureService,
				metrics: RelayMetricsService,
			) =>
				new RelayWorkerService(
					kafka,
					telemetry,
					logger,
					config,
					records,
					outbox,
					dispatcher,
					backpressure,
					metrics,
				),
			inject: [
				KafkaService,
				TelemetryService,
				LOGGER,
				WORKER_CONFIG,
				RECORD_STORE,
				OUTBOUND_EVENT_STORE,
				VendorDispatcher,
				BackpressureService,
				RelayMetricsService,
			],
		},
	],
	exports: [RelayWorkerService],
})
export class WorkerModule implements OnApplicationBootstrap, OnModuleDestroy {
	constructor(
		@Inject(RetrySchedulerService)
		private readonly retryScheduler: RetrySchedulerService,
		@Inject(RetentionSweepService)
		private readonly retentionSweep: RetentionSweepService,
		@Inject(RelayMetricsService)
		private readonly metrics: RelayMetricsService,
		@Inject(BackpressureService)
		private readonly backpressure: BackpressureService,
	) {}

	onApplicationBootstrap(): void {
		this.retryScheduler.start();
		this.retentionSweep.start();
		this.metrics.startReporting();
	}

	async onModuleDestroy(): Promise<void> {
		this.backpressure.detach();
		await Promise.all([
			this.retryScheduler.stop(),
			this.retentionSweep.stop(),
			this.metrics.stopReporting(),
		]);
	}
}
