import type {
	EventLogger,
	LoggerService,
	TelemetryService,
	WorkerConfig,
} from "@relay/worker-base";
import { type Clock, systemClock } from "../clock.js";
import type { OutboundEventStore } from "../db/outbound-event.js";
import { RecurringTask } from "../retry/recurring-task.js";

export interface RelayCounters {
	sent: number;
	failed: number;
	retry: number;
	poison: number;
	databaseFailures: number;
}

export interface OutboxStatistics {
	pending: number;
	sent: number;
	failed: number;
	/** Sum of retry counts over PENDING rows attempted within the report period */
	recentRetries: number;
	counters: RelayCounters;
}

function errorCode(error: unknown): string {
	if (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		typeof error.code === "string"
	) {
		return error.code;
	}
	return "UNKNOWN";
}

/**
 * Increment-only relay counters, forwarded to dogstatsd, plus the periodic
 * outbox statistics report. Nothing reads the counters to make decisions.
 */
export class RelayMetricsService {
	private readonly counters: RelayCounters = {
		sent: 0,
		failed: 0,
		retry: 0,
		poison: 0,
		databaseFailures: 0,
	};
	private readonly task: RecurringTask;

	constructor(
		private readonly store: OutboundEventStore,
		private readonly telemetry: TelemetryService,
		private readonly logger: LoggerService,
		private readonly eventLogger: EventLogger,
		private readonly config: WorkerConfig,
		private readonly now: Clock = systemClock,
	) {
		this.task = new RecurringTask({
			name: "outbox-statistics",
			periodMs: config.statistics.reportPeriodMs,
			run: async () => {
				await this.reportStatistics();
			},
			onError: (error) => {
				this.databaseFailure("report_statistics", error);
			},
		});
	}

	sent(): void {
		this.bump("sent", "outbox.sent");
	}

	failed(): void {
		this.bump("failed", "outbox.failed");
	}

	retry(): void {
		this.bump("retry", "outbox.retry");
	}

	poison(): void {
		this.bump("poison", "messages.poison");
	}

	databaseFailure(operation: string, error: unknown): void {
		this.counters.databaseFailures++;
		this.telemetry.increment("database.failures", 1, { operation });
		this.eventLogger.databaseError(
			operation,
			errorCode(error),
			error instanceof Error ? error.message : String(error),
		);
	}

	snapshot(): RelayCounters {
		return { ...this.counters };
	}

	async reportStatistics(): Promise<OutboxStatistics> {
		const { reportPeriodMs, pendingAlertThreshold, failedAlertThreshold } =
			this.config.statistics;

		const [pending, sent, failed, recent] = await Promise.all([
			this.store.countByStatus("PENDING"),
			this.store.countByStatus("SENT"),
			this.store.countByStatus("FAILED"),
			this.store.findByStatusAndLastAttemptAfter(
				"PENDING",
				new Date(this.now() - reportPeriodMs),
			),
		]);

		const statistics: OutboxStatistics = {
			pending,
			sent,
			failed,
			recentRetries: recent.reduce((sum, event) => sum + event.retryCount, 0),
			counters: this.snapshot(),
		};

		this.telemetry.gauge("outbox.pending", pending);
		this.telemetry.gauge("outbox.failed", failed);
		this.eventLogger.outboxStatistics({
			pending,
			sent,
			failed,
			recentRetries: statistics.recentRetries,
		});

		if (pending > pendingAlertThreshold) {
			this.logger.warn("Outbox pending backlog above threshold", {
				pending,
				threshold: pendingAlertThreshold,
			});
		}
		if (failed > failedAlertThreshold) {
			this.logger.warn("Outbox failed events above threshold", {
				failed,
				threshold: failedAlertThreshold,
			});
		}

		return statistics;
	}

	startReporting(): void {
		this.task.start();
	}

	async stopReporting(): Promise<void> {
		await this.task.stop();
	}

	private bump(counter: keyof Omit<RelayCounters, "databaseFailures">, metric: string): void {
		this.counters[counter]++;
		this.telemetry.increment(metric);
	}
}
