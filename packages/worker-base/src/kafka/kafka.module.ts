import { Global, Module } from "@nestjs/common";
import { WORKER_CONFIG, type WorkerConfig } from "../config/config.module.js";
import { LifecycleService } from "../lifecycle/lifecycle.service.js";
import { EVENT_LOGGER, type EventLogger } from "../telemetry/events.js";
import { LOGGER, type LoggerService } from "../telemetry/logger.service.js";
import { TelemetryService } from "../telemetry/telemetry.service.js";
import { KafkaService } from "./kafka.service.js";
import { SubscriptionRegistry } from "./subscription-registry.js";

@Global()
@Module({
	providers: [
		SubscriptionRegistry,
		{
			provide: KafkaService,
			useFactory: (
				config: WorkerConfig,
				telemetry: TelemetryService,
				logger: LoggerService,
				eventLogger: EventLogger,
				registry: SubscriptionRegistry,
				lifecycle?: LifecycleService,
			) =>
				new KafkaService(
					config,
					telemetry,
					logger,
					eventLogger,
					registry,
					lifecycle,
				),
			inject: [
				WORKER_CONFIG,
				TelemetryService,
				LOGGER,
				EVENT_LOGGER,
				SubscriptionRegistry,
				{ token: LifecycleService, optional: true },
			],
		},
	],
	exports: [KafkaService, SubscriptionRegistry],
})
export class KafkaModule {}
