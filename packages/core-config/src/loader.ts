import type { ZodType, ZodTypeDef } from "zod";
import { MissingEnvVarError, ValidationError } from "./errors.js";
import {
	type BaseConfig,
	type CircuitBreakerConfig,
	type DatadogConfig,
	type KafkaConfig,
	type PostgresConfig,
	type RateLimitConfig,
	type RetentionConfig,
	type RetryConfig,
	type StatisticsConfig,
	type VendorConfig,
	baseConfigSchema,
	circuitBreakerConfigSchema,
	datadogConfigSchema,
	kafkaConfigSchema,
	postgresConfigSchema,
	rateLimitConfigSchema,
	retentionConfigSchema,
	retryConfigSchema,
	statisticsConfigSchema,
	vendorConfigSchema,
} from "./schemas.js";

export interface ConfigLoaderOptions {
	/** Throw on missing required vars instead of deferring to schema validation */
	strict?: boolean;
	/** Custom environment object (defaults to process.env) */
	env?: Record<string, string | undefined>;
}

type EnvValue = string | number | boolean;

interface EnvVarDef {
	key: string;
	required?: boolean;
	default?: EnvValue;
	transform?: (value: string) => EnvValue;
}

function getEnvVar(
	env: Record<string, string | undefined>,
	def: EnvVarDef,
	strict: boolean,
): EnvValue | undefined {
	const value = env[def.key];

	if (value === undefined || value === "") {
		if (def.required && strict) {
			throw new MissingEnvVarError(def.key);
		}
		return def.default;
	}

	if (def.transform) {
		return def.transform(value);
	}

	return value;
}

const toBool = (v: string): boolean => v.toLowerCase() === "true" || v === "1";
const toInt = (v: string): number => Number.parseInt(v, 10);
const toFloat = (v: string): number => Number.parseFloat(v);

export interface RelayConfig {
	base: BaseConfig;
	kafka: KafkaConfig;
	postgres: PostgresConfig;
	vendor: VendorConfig;
	rateLimit: RateLimitConfig;
	circuitBreaker: CircuitBreakerConfig;
	retry: RetryConfig;
	retention: RetentionConfig;
	statistics: StatisticsConfig;
	datadog: DatadogConfig;
}

function validateSchema<T>(
	schema: ZodType<T, ZodTypeDef, unknown>,
	data: unknown,
	name: string,
): T {
	const result = schema.safeParse(data);
	if (!result.success) {
		const errors = result.error.errors.map((e) => ({
			path: e.path.join("."),
			message: e.message,
		}));
		throw new ValidationError(name, errors);
	}
	return result.data;
}

export function loadConfig(options: ConfigLoaderOptions = {}): RelayConfig {
	const env = options.env ?? process.env;
	const strict = options.strict ?? false;
	const read = (def: EnvVarDef) => getEnvVar(env, def, strict);

	const serviceName = String(
		read({ key: "SERVICE_NAME", default: "vendor-relay" }),
	);

	const baseRaw = {
		env: read({ key: "ENV" }),
		service: {
			name: serviceName,
			version: read({ key: "SERVICE_VERSION", default: "0.1.0" }),
			team: read({ key: "TEAM" }),
			region: read({ key: "REGION" }),
		},
		logLevel: read({ key: "LOG_LEVEL" }),
		logFormat: read({ key: "LOG_FORMAT" }),
		healthPort: read({ key: "HEALTH_PORT", transform: toInt }),
	};

	const brokers = read({ key: "KAFKA_BROKERS", required: true });
	const saslUsername = read({ key: "KAFKA_SASL_USERNAME" });
	const saslPassword = read({ key: "KAFKA_SASL_PASSWORD" });

	const kafkaRaw = {
		brokers:
			typeof brokers === "string"
				? brokers
						.split(",")
						.map((b) => b.trim())
						.filter((b) => b.length > 0)
				: undefined,
		clientId: read({ key: "KAFKA_CLIENT_ID", default: serviceName }),
		groupId: read({ key: "KAFKA_GROUP_ID", default: `${serviceName}-group` }),
		topic: read({ key: "KAFKA_TOPIC", default: "changes" }),
		ssl: read({ key: "KAFKA_SSL", transform: toBool }),
		sasl:
			saslUsername !== undefined && saslPassword !== undefined
				? {
						mechanism: read({ key: "KAFKA_SASL_MECHANISM", default: "plain" }),
						username: saslUsername,
						password: saslPassword,
					}
				: undefined,
		concurrency: read({ key: "KAFKA_CONCURRENCY", transform: toInt }),
		sessionTimeout: read({ key: "KAFKA_SESSION_TIMEOUT", transform: toInt }),
		heartbeatInterval: read({
			key: "KAFKA_HEARTBEAT_INTERVAL",
			transform: toInt,
		}),
		maxRetries: read({ key: "KAFKA_MAX_RETRIES", transform: toInt }),
		retryBackoffMs: read({ key: "KAFKA_RETRY_BACKOFF_MS", transform: toInt }),
	};

	const postgresRaw = {
		url: read({ key: "DATABASE_URL", required: true }),
		poolMin: read({ key: "POSTGRES_POOL_MIN", transform: toInt }),
		poolMax: read({ key: "POSTGRES_POOL_MAX", transform: toInt }),
		connectionTimeoutMs: read({
			key: "POSTGRES_CONNECTION_TIMEOUT_MS",
			transform: toInt,
		}),
	};

	const vendorRaw = {
		baseUrl: read({ key: "VENDOR_BASE_URL", required: true }),
		requestTimeoutMs: read({
			key: "VENDOR_REQUEST_TIMEOUT_MS",
			transform: toInt,
		}),
	};

	const rateLimitRaw = {
		limitForPeriod: read({ key: "VENDOR_RATE_LIMIT", transform: toInt }),
		refreshPeriodMs: read({
			key: "VENDOR_RATE_LIMIT_PERIOD_MS",
			transform: toInt,
		}),
		timeoutMs: read({ key: "VENDOR_RATE_LIMIT_TIMEOUT_MS", transform: toInt }),
	};

	const circuitBreakerRaw = {
		failureRateThreshold: read({
			key: "VENDOR_CB_FAILURE_RATE",
			transform: toFloat,
		}),
		slidingWindowSize: read({ key: "VENDOR_CB_WINDOW_SIZE", transform: toInt }),
		minimumCalls: read({ key: "VENDOR_CB_MINIMUM_CALLS", transform: toInt }),
		waitDurationInOpenMs: read({
			key: "VENDOR_CB_OPEN_WAIT_MS",
			transform: toInt,
		}),
		permittedCallsInHalfOpen: read({
			key: "VENDOR_CB_HALF_OPEN_CALLS",
			transform: toInt,
		}),
	};

	const retryRaw = {
		maxAttempts: read({ key: "RETRY_MAX_ATTEMPTS", transform: toInt }),
		initialDelayMs: read({ key: "RETRY_INITIAL_DELAY_MS", transform: toInt }),
		schedulerPeriodMs: read({
			key: "RETRY_SCHEDULER_PERIOD_MS",
			transform: toInt,
		}),
	};

	const retentionRaw = {
		failedMaxAgeMs: read({
			key: "RETENTION_FAILED_MAX_AGE_MS",
			transform: toInt,
		}),
		sweepPeriodMs: read({ key: "RETENTION_SWEEP_PERIOD_MS", transform: toInt }),
	};

	const statisticsRaw = {
		reportPeriodMs: read({ key: "STATS_REPORT_PERIOD_MS", transform: toInt }),
		pendingAlertThreshold: read({
			key: "STATS_PENDING_ALERT_THRESHOLD",
			transform: toInt,
		}),
		failedAlertThreshold: read({
			key: "STATS_FAILED_ALERT_THRESHOLD",
			transform: toInt,
		}),
	};

	const datadogRaw = {
		traceEnabled: read({ key: "DD_TRACE_ENABLED", transform: toBool }),
		runtimeMetricsEnabled: read({
			key: "DD_RUNTIME_METRICS_ENABLED",
			transform: toBool,
		}),
	};

	return {
		base: validateSchema(baseConfigSchema, baseRaw, "base"),
		kafka: validateSchema(kafkaConfigSchema, kafkaRaw, "kafka"),
		postgres: validateSchema(postgresConfigSchema, postgresRaw, "postgres"),
		vendor: validateSchema(vendorConfigSchema, vendorRaw, "vendor"),
		rateLimit: validateSchema(rateLimitConfigSchema, rateLimitRaw, "rateLimit"),
		circuitBreaker: validateSchema(
			circuitBreakerConfigSchema,
			circuitBreakerRaw,
			"circuitBreaker",
		),
		retry: validateSchema(retryConfigSchema, retryRaw, "retry"),
		retention: validateSchema(retentionConfigSchema, retentionRaw, "retention"),
		statistics: validateSchema(
			statisticsConfigSchema,
			statisticsRaw,
			"statistics",
		),
		datadog: validateSchema(datadogConfigSchema, datadogRaw, "datadog"),
	};
}
