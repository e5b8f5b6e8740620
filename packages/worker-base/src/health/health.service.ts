import { Injectable } from "@nestjs/common";
import type { KafkaService } from "../kafka/kafka.service.js";
import type { EventLogger } from "../telemetry/events.js";

export type CheckStatus = "ok" | "degraded" | "unhealthy";

export interface CheckResult {
	status: CheckStatus;
	message?: string;
}

export interface HealthResponse {
	status: CheckStatus;
	timestamp: string;
	checks: Record<string, CheckResult>;
}

export interface DatabaseHealthCheck {
	check(): Promise<boolean>;
}

/**
 * Extra named check contributed by a worker (vendor circuit, backlog size)
 */
export interface HealthIndicator {
	readonly name: string;
	check(): Promise<CheckResult> | CheckResult;
}

export const DATABASE_HEALTH = "DATABASE_HEALTH";
export const HEALTH_INDICATORS = "HEALTH_INDICATORS";
export const HEALTH_SERVICE = "HEALTH_SERVICE";

export function overallStatus(checks: CheckResult[]): CheckStatus {
	if (checks.some((c) => c.status === "unhealthy")) return "unhealthy";
	if (checks.some((c) => c.status === "degraded")) return "degraded";
	return "ok";
}

@Injectable()
export class HealthService {
	private lastStatus: CheckStatus | "unknown" = "unknown";

	constructor(
		private readonly kafka: KafkaService,
		private readonly dbHealth?: DatabaseHealthCheck,
		private readonly indicators: HealthIndicator[] = [],
		private readonly eventLogger?: EventLogger,
	) {}

	async check(): Promise<HealthResponse> {
		const checks: Record<string, CheckResult> = {
			kafka: this.kafka.isAlive()
				? { status: "ok" }
				: { status: "unhealthy", message: "Kafka not connected" },
		};

		if (this.dbHealth) {
			try {
				checks["database"] = (await this.dbHealth.check())
					? { status: "ok" }
					: { status: "unhealthy", message: "Database check failed" };
			} catch (error) {
				checks["database"] = {
					status: "unhealthy",
					message:
						error instanceof Error ? error.message : "Database check failed",
				};
			}
		}

		for (const indicator of this.indicators) {
			try {
				checks[indicator.name] = await indicator.check();
			} catch (error) {
				checks[indicator.name] = {
					status: "unhealthy",
					message: error instanceof Error ? error.message : String(error),
				};
			}
		}

		const status = overallStatus(Object.values(checks));
		if (status !== this.lastStatus) {
			this.eventLogger?.healthChanged(
				this.lastStatus,
				status,
				Object.fromEntries(
					Object.entries(checks).map(([name, result]) => [name, result.status]),
				),
			);
			this.lastStatus = status;
		}

		return { status, timestamp: new Date().toISOString(), checks };
	}
}
