import { Module } from "@nestjs/common";
import { KafkaService } from "../kafka/kafka.service.js";
import { EVENT_LOGGER, type EventLogger } from "../telemetry/events.js";
import { HealthController } from "./health.controller.js";
import {
	DATABASE_HEALTH,
	type DatabaseHealthCheck,
	HEALTH_INDICATORS,
	HEALTH_SERVICE,
	type HealthIndicator,
	HealthService,
} from "./health.service.js";

@Module({
	controllers: [HealthController],
	providers: [
		{
			provide: HEALTH_SERVICE,
			useFactory: (
				kafka: KafkaService,
				eventLogger: EventLogger,
				dbHealth?: DatabaseHealthCheck,
				indicators?: HealthIndicator[],
			) => new HealthService(kafka, dbHealth, indicators, eventLogger),
			inject: [
				KafkaService,
				EVENT_LOGGER,
				{ token: DATABASE_HEALTH, optional: true },
				{ token: HEALTH_INDICATORS, optional: true },
			],
		},
	],
	exports: [HEALTH_SERVICE],
})
export class HealthModule {}
