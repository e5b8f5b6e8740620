import {
	type BeforeApplicationShutdown,
	Injectable,
	type OnApplicationShutdown,
} from "@nestjs/common";
import type { EventLogger } from "../telemetry/events.js";
import type { LoggerService } from "../telemetry/logger.service.js";
import type { TelemetryService } from "../telemetry/telemetry.service.js";

export type ShutdownSignal = "SIGTERM" | "SIGINT" | "ERROR";

type ShutdownCallback = () => Promise<void> | void;

/** Grace period for log and metric flushes before a fatal exit */
const FATAL_EXIT_DELAY_MS = 1000;

@Injectable()
export class LifecycleService
	implements OnApplicationShutdown, BeforeApplicationShutdown
{
	private shutdownCallbacks: ShutdownCallback[] = [];
	private isShuttingDown = false;
	private shutdownStartTime?: number;
	private shutdownSignal?: string;
	private inFlightCount = 0;

	constructor(
		private readonly logger: LoggerService,
		private readonly telemetry: TelemetryService,
		private readonly eventLogger: EventLogger,
		installProcessHandlers = true,
	) {
		if (installProcessHandlers) {
			process.on("SIGTERM", () => this.handleSignal("SIGTERM"));
			process.on("SIGINT", () => this.handleSignal("SIGINT"));
			process.on("uncaughtException", (error) =>
				this.handleUncaughtException(error),
			);
			process.on("unhandledRejection", (reason) =>
				this.handleUnhandledRejection(reason),
			);
		}
	}

	setInFlightCount(count: number): void {
		this.inFlightCount = count;
	}

	/**
	 * Callbacks run in reverse registration order on shutdown
	 */
	onShutdown(callback: ShutdownCallback): void {
		this.shutdownCallbacks.push(callback);
	}

	isShutdownInProgress(): boolean {
		return this.isShuttingDown;
	}

	async beforeApplicationShutdown(signal?: string): Promise<void> {
		this.isShuttingDown = true;
		this.shutdownStartTime = Date.now();
		if (signal) this.shutdownSignal = signal;
		this.eventLogger.workerShutdownInitiated(this.inFlightCount, signal);
		this.telemetry.increment("worker.shutdown_started");
	}

	async onApplicationShutdown(): Promise<void> {
		for (const callback of [...this.shutdownCallbacks].reverse()) {
			try {
				await callback();
			} catch (error) {
				this.logger.error("Shutdown callback failed", {
					error_message: error instanceof Error ? error.message : String(error),
				});
			}
		}

		const durationMs = this.shutdownStartTime
			? Date.now() - this.shutdownStartTime
			: 0;
		this.eventLogger.workerShutdownCompleted(
			durationMs,
			this.shutdownSignal ? "signal" : "graceful",
		);
		this.telemetry.increment("worker.shutdown_completed");
		this.telemetry.flush();
	}

	private handleSignal(signal: ShutdownSignal): void {
		if (this.isShuttingDown) {
			return;
		}
		this.isShuttingDown = true;
		this.shutdownSignal = signal;
		this.telemetry.increment("worker.signal_received", 1, { signal });
	}

	private handleUncaughtException(error: Error): void {
		this.logger.critical("Uncaught exception", {
			error_message: error.message,
			stack: error.stack,
		});
		this.telemetry.increment("worker.uncaught_exception");
		this.exitAfterFlush();
	}

	private handleUnhandledRejection(reason: unknown): void {
		this.logger.critical("Unhandled rejection", {
			error_message: reason instanceof Error ? reason.message : String(reason),
			stack: reason instanceof Error ? reason.stack : undefined,
		});
		this.telemetry.increment("worker.unhandled_rejection");
		this.exitAfterFlush();
	}

	private exitAfterFlush(): void {
		this.telemetry.flush();
		setTimeout(() => {
			process.exit(1);
		}, FATAL_EXIT_DELAY_MS);
	}
}
