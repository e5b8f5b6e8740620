export {
	createLogger,
	createPinoLogger,
	redactSensitive,
	type Logger,
	type LogContext,
	type LoggerOptions,
	type ServiceTags,
} from "./logger.js";
export { createMetrics, type Metrics, type MetricsOptions } from "./metrics.js";
