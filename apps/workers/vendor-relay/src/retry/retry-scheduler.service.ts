import type {
	EventLogger,
	KafkaService,
	LoggerService,
	WorkerConfig,
} from "@relay/worker-base";
import type { BackpressureService } from "../backpressure/backpressure.service.js";
import { type Clock, systemClock } from "../clock.js";
import type { OutboundEvent, OutboundEventStore } from "../db/outbound-event.js";
import type { RelayMetricsService } from "../metrics/relay-metrics.service.js";
import { errorMessage, isPermanentDispatchError } from "../vendor/dispatch-errors.js";
import type { VendorDispatcher } from "../vendor/vendor-dispatcher.js";
import { isEligible } from "./backoff.js";
import { RecurringTask } from "./recurring-task.js";

export interface RetryPassSummary {
	pending: number;
	sent: number;
	/** Retryable failures; the pass stops at the first one */
	failed: number;
	exhausted: number;
	notDue: number;
	deadLettered: number;
	resumed: boolean;
}

/**
 * Periodically re-sends PENDING outbox events whose backoff has elapsed.
 */
export class RetrySchedulerService {
	private readonly task: RecurringTask;

	constructor(
		private readonly store: OutboundEventStore,
		private readonly dispatcher: VendorDispatcher,
		private readonly backpressure: BackpressureService,
		private readonly metrics: RelayMetricsService,
		private readonly kafka: KafkaService,
		private readonly logger: LoggerService,
		private readonly eventLogger: EventLogger,
		private readonly config: WorkerConfig,
		private readonly now: Clock = systemClock,
	) {
		this.task = new RecurringTask({
			name: "retry-scheduler",
			periodMs: config.retry.schedulerPeriodMs,
			run: async (signal) => {
				await this.runPass(signal);
			},
			onError: (error) => {
				this.metrics.databaseFailure("retry_pass", error);
				this.logger.error("Retry pass failed", {
					error_message: errorMessage(error),
				});
			},
		});
	}

	start(): void {
		this.task.start();
		this.logger.lifecycle("Retry scheduler started", {
			period_ms: this.config.retry.schedulerPeriodMs,
			max_attempts: this.config.retry.maxAttempts,
		});
	}

	async stop(): Promise<void> {
		await this.task.stop();
	}

	/**
	 * Walks PENDING events oldest attempt first. Events at the attempt cap
	 * become FAILED; events still inside their backoff are skipped. The pass
	 * ends at the first retryable failure. The consumer is resumed only when
	 * something was sent and nothing failed.
	 */
	async runPass(signal?: AbortSignal): Promise<RetryPassSummary> {
		const { maxAttempts, initialDelayMs } = this.config.retry;
		const pending = await this.store.findByStatus("PENDING");
		const summary: RetryPassSummary = {
			pending: pending.length,
			sent: 0,
			failed: 0,
			exhausted: 0,
			notDue: 0,
			deadLettered: 0,
			resumed: false,
		};

		for (const event of pending) {
			if (signal?.aborted) break;

			if (event.retryCount >= maxAttempts) {
				await this.store.save({ ...event, status: "FAILED" });
				this.metrics.failed();
				summary.exhausted++;
				this.logger.warn("Outbound event exhausted its retries", {
					outbound_id: event.id,
					routing_key: event.routingKey,
					retry_count: event.retryCount,
				});
				continue;
			}

			const now = this.now();
			if (!isEligible(event, now, initialDelayMs)) {
				summary.notDue++;
				continue;
			}

			const outcome = await this.retry(event, now);
			if (outcome === "sent") {
				summary.sent++;
			} else if (outcome === "dead_lettered") {
				summary.deadLettered++;
			} else {
				summary.failed++;
				break;
			}
		}

		if (
			summary.sent > 0 &&
			summary.failed === 0 &&
			summary.deadLettered === 0
		) {
			summary.resumed = this.backpressure.resumeConsumer("retry_pass");
		}

		this.eventLogger.retryPassCompleted(summary);
		return summary;
	}

	private async retry(
		event: OutboundEvent,
		now: number,
	): Promise<"sent" | "dead_lettered" | "failed"> {
		const lastAttempt = new Date(now);
		try {
			await this.dispatcher.send(event.payload);
		} catch (error) {
			const reason = errorMessage(error);
			if (isPermanentDispatchError(error)) {
				await this.store.save({ ...event, status: "FAILED", lastAttempt });
				await this.kafka.deadLetter(
					{
						topic: this.config.kafka.topic,
						key: event.routingKey,
						value: event.payload,
					},
					reason,
				);
				this.metrics.failed();
				return "dead_lettered";
			}

			await this.store.save({
				...event,
				retryCount: event.retryCount + 1,
				lastAttempt,
			});
			this.metrics.retry();
			this.logger.warn("Retry failed, pass stopped", {
				outbound_id: event.id,
				routing_key: event.routingKey,
				retry_count: event.retryCount + 1,
				error_message: reason,
			});
			return "failed";
		}

		await this.store.save({ ...event, status: "SENT", lastAttempt });
		this.metrics.sent();
		return "sent";
	}
}
