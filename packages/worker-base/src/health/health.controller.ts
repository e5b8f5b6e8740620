import {
	Controller,
	Get,
	HttpCode,
	HttpStatus,
	Inject,
	ServiceUnavailableException,
} from "@nestjs/common";
import {
	HEALTH_SERVICE,
	type HealthResponse,
	type HealthService,
} from "./health.service.js";

@Controller("health")
export class HealthController {
	constructor(
		@Inject(HEALTH_SERVICE) private readonly healthService: HealthService,
	) {}

	/**
	 * Liveness probe: the process is up
	 */
	@Get("live")
	@HttpCode(HttpStatus.OK)
	async liveness(): Promise<{ status: "ok" }> {
		return { status: "ok" };
	}

	/**
	 * Readiness probe: 503 only when a check is unhealthy. A degraded
	 * relay (vendor circuit open) still consumes and buffers to the outbox.
	 */
	@Get("ready")
	async readiness(): Promise<HealthResponse> {
		const result = await this.healthService.check();
		if (result.status === "unhealthy") {
			throw new ServiceUnavailableException(result);
		}
		return result;
	}

	@Get()
	async getHealth(): Promise<HealthResponse> {
		return this.healthService.check();
	}
}
