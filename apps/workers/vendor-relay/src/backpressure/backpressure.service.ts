import type {
	EventLogger,
	LoggerService,
	SubscriptionRegistry,
	TelemetryService,
} from "@relay/worker-base";
import type { CircuitBreaker, StateTransition } from "../vendor/circuit-breaker.js";
import type { ConsumerPauseState } from "./consumer-pause-state.js";

export type BackpressureTrigger =
	| "dispatch_failure"
	| "circuit_open"
	| "circuit_half_open"
	| "circuit_closed"
	| "retry_pass";

/**
 * Pauses and resumes the stream listener registered under `listenerId`.
 * A listener that is not registered yet, or that refuses the call because
 * it is not running, is left alone and the flag is not touched. Neither
 * method throws.
 */
export class BackpressureService {
	private readonly unsubscribers: Array<() => void> = [];

	constructor(
		private readonly registry: SubscriptionRegistry,
		private readonly state: ConsumerPauseState,
		private readonly listenerId: string,
		private readonly logger: LoggerService,
		private readonly eventLogger: EventLogger,
		private readonly telemetry: TelemetryService,
	) {}

	pauseConsumer(trigger: BackpressureTrigger): boolean {
		return this.flip(true, trigger);
	}

	resumeConsumer(trigger: BackpressureTrigger): boolean {
		return this.flip(false, trigger);
	}

	isPaused(): boolean {
		return this.state.isPaused();
	}

	/**
	 * CLOSED→OPEN and HALF_OPEN→OPEN pause; OPEN→HALF_OPEN and
	 * HALF_OPEN→CLOSED resume.
	 */
	observe(breaker: CircuitBreaker): void {
		this.unsubscribers.push(
			breaker.onStateTransition((transition) => this.onTransition(transition)),
		);
	}

	detach(): void {
		for (const unsubscribe of this.unsubscribers.splice(0)) {
			unsubscribe();
		}
	}

	private onTransition({ from, to }: StateTransition): void {
		if (to === "OPEN") {
			this.pauseConsumer("circuit_open");
		} else if (from === "OPEN" && to === "HALF_OPEN") {
			this.resumeConsumer("circuit_half_open");
		} else if (from === "HALF_OPEN" && to === "CLOSED") {
			this.resumeConsumer("circuit_closed");
		}
	}

	private flip(pause: boolean, trigger: BackpressureTrigger): boolean {
		const handle = this.registry.get(this.listenerId);
		if (!handle) {
			this.logger.debug("No live subscription, backpressure skipped", {
				listener_id: this.listenerId,
				action: pause ? "pause" : "resume",
				trigger,
			});
			return false;
		}

		if (!this.state.compareAndSet(!pause, pause)) {
			return false;
		}

		try {
			if (pause) {
				handle.pause();
			} else {
				handle.resume();
			}
		} catch (error) {
			this.state.compareAndSet(pause, !pause);
			this.logger.warn("Listener rejected backpressure call", {
				listener_id: this.listenerId,
				action: pause ? "pause" : "resume",
				trigger,
				error_message: error instanceof Error ? error.message : String(error),
			});
			return false;
		}

		if (pause) {
			this.eventLogger.consumerPaused(this.listenerId, trigger);
			this.telemetry.increment("consumer.paused", 1, { trigger });
		} else {
			this.eventLogger.consumerResumed(this.listenerId, trigger);
			this.telemetry.increment("consumer.resumed", 1, { trigger });
		}
		return true;
	}
}
