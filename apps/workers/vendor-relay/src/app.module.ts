import {
	HealthModule,
	KafkaModule,
	LifecycleModule,
	TelemetryModule,
	WorkerConfigModule,
} from "@relay/worker-base";
import { Module } from "@nestjs/common";
import { DatabaseModule } from "./db/database.module.js";
import { VendorModule } from "./vendor/vendor.module.js";
import { WorkerModule } from "./worker/worker.module.js";

@Module({
	imports: [
		WorkerConfigModule.forRoot({ envFilePath: ".env" }),
		TelemetryModule,
		LifecycleModule,
		KafkaModule,
		DatabaseModule.forRoot(),
		VendorModule,
		HealthModule,
		WorkerModule,
	],
})
export class AppModule {}
