export {
	loadConfig,
	type ConfigLoaderOptions,
	type RelayConfig,
} from "./loader.js";
export {
	baseConfigSchema,
	kafkaConfigSchema,
	postgresConfigSchema,
	vendorConfigSchema,
	rateLimitConfigSchema,
	circuitBreakerConfigSchema,
	retryConfigSchema,
	retentionConfigSchema,
	statisticsConfigSchema,
	datadogConfigSchema,
} from "./schemas.js";
export type {
	BaseConfig,
	KafkaConfig,
	PostgresConfig,
	VendorConfig,
	RateLimitConfig,
	CircuitBreakerConfig,
	RetryConfig,
	RetentionConfig,
	StatisticsConfig,
	DatadogConfig,
	ServiceIdentity,
} from "./schemas.js";
export { ConfigError, MissingEnvVarError, ValidationError } from "./errors.js";
