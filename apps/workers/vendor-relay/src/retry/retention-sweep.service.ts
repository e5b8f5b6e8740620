import type { EventLogger, LoggerService, WorkerConfig } from "@relay/worker-base";
import { type Clock, systemClock } from "../clock.js";
import type { OutboundEventStore } from "../db/outbound-event.js";
import type { RelayMetricsService } from "../metrics/relay-metrics.service.js";
import { RecurringTask } from "./recurring-task.js";

/**
 * Purges FAILED outbox events whose last attempt is older than the
 * configured age.
 */
export class RetentionSweepService {
	private readonly task: RecurringTask;

	constructor(
		private readonly store: OutboundEventStore,
		private readonly metrics: RelayMetricsService,
		private readonly logger: LoggerService,
		private readonly eventLogger: EventLogger,
		private readonly config: WorkerConfig,
		private readonly now: Clock = systemClock,
	) {
		this.task = new RecurringTask({
			name: "retention-sweep",
			periodMs: config.retention.sweepPeriodMs,
			run: async () => {
				await this.sweep();
			},
			onError: (error) => {
				this.metrics.databaseFailure("retention_sweep", error);
			},
		});
	}

	start(): void {
		this.task.start();
	}

	async stop(): Promise<void> {
		await this.task.stop();
	}

	async sweep(): Promise<number> {
		const cutoff = new Date(this.now() - this.config.retention.failedMaxAgeMs);
		const expired = await this.store.findByStatusAndLastAttemptBefore(
			"FAILED",
			cutoff,
		);
		const deleted = await this.store.deleteByIds(expired.map((event) => event.id));

		this.eventLogger.retentionSweepCompleted(deleted, cutoff);
		if (deleted > 0) {
			this.logger.info("Expired failed events purged", { deleted });
		}
		return deleted;
	}
}
