import "reflect-metadata";
import {
	EVENT_LOGGER,
	type EventLogger,
	LOGGER,
	type LoggerService,
	WORKER_CONFIG,
	type WorkerConfig,
} from "@relay/worker-base";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module.js";

async function bootstrap(): Promise<void> {
	const app = await NestFactory.create(AppModule, { bufferLogs: true });

	const logger = app.get<LoggerService>(LOGGER);
	app.useLogger(logger);
	app.enableShutdownHooks();

	const config = app.get<WorkerConfig>(WORKER_CONFIG);
	const eventLogger = app.get<EventLogger>(EVENT_LOGGER);
	eventLogger.workerStarting();

	await app.listen(config.base.healthPort);

	eventLogger.workerStarted();
	logger.lifecycle("Vendor relay started", {
		health_port: config.base.healthPort,
		topic: config.kafka.topic,
	});
}

bootstrap().catch((error: unknown) => {
	console.error("Failed to start vendor relay:", error);
	process.exit(1);
});
