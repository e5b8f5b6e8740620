// Config
export {
	WorkerConfigModule,
	WORKER_CONFIG,
	buildWorkerConfig,
} from "./config/config.module.js";
export type {
	WorkerConfig,
	WorkerConfigOptions,
} from "./config/config.module.js";

// Kafka
export { KafkaModule } from "./kafka/kafka.module.js";
export {
	KafkaService,
	toWorkerContext,
	type RecordProcessor,
} from "./kafka/kafka.service.js";
export {
	SubscriptionRegistry,
	type PausableSubscription,
} from "./kafka/subscription-registry.js";
export { BaseWorkerService } from "./kafka/base-worker.service.js";
export type { WorkerHandler } from "./kafka/base-worker.service.js";
export type { ProcessResult, WorkerContext } from "./kafka/types.js";

// Telemetry
export { TelemetryModule } from "./telemetry/telemetry.module.js";
export { TelemetryService } from "./telemetry/telemetry.service.js";
export { LoggerService, LOGGER } from "./telemetry/logger.service.js";
export type {
	LogContext,
	TieredLogContext,
} from "./telemetry/logger.service.js";
export {
	EventLogger,
	EVENT_LOGGER,
	type OutboxCounts,
	type RetryPassCounts,
} from "./telemetry/events.js";
export {
	LogTier,
	type LoggingConfig,
	loggingConfigFor,
	shouldForwardLog,
	PRODUCTION_LOGGING_CONFIG,
	LOCAL_LOGGING_CONFIG,
} from "./telemetry/log-tier.js";
export type {
	RelayEvent,
	ServiceTags,
	BaseEvent,
	EventName,
	EventByName,
} from "./telemetry/events.types.js";

// Health
export { HealthModule } from "./health/health.module.js";
export { HealthController } from "./health/health.controller.js";
export {
	HealthService,
	HEALTH_SERVICE,
	DATABASE_HEALTH,
	HEALTH_INDICATORS,
	overallStatus,
	type CheckResult,
	type CheckStatus,
	type DatabaseHealthCheck,
	type HealthIndicator,
	type HealthResponse,
} from "./health/health.service.js";

// Lifecycle
export { LifecycleModule } from "./lifecycle/lifecycle.module.js";
export { LifecycleService } from "./lifecycle/lifecycle.service.js";
export type { ShutdownSignal } from "./lifecycle/lifecycle.service.js";

// Errors
export {
	WorkerError,
	isNonRetryable,
	success,
	skip,
	deferred,
	deadLettered,
} from "./errors/error-classifier.js";
export type { ErrorClassification } from "./errors/error-classifier.js";
