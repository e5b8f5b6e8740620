import { z } from "zod";

export const serviceIdentitySchema = z.object({
	name: z.string().min(1),
	version: z.string().min(1),
	team: z.string().min(1).default("integrations"),
	region: z.string().default("local"),
});

export type ServiceIdentity = z.infer<typeof serviceIdentitySchema>;

export const baseConfigSchema = z.object({
	env: z.enum(["dev", "staging", "prod", "test"]).default("dev"),
	service: serviceIdentitySchema,
	logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
	logFormat: z.enum(["json", "pretty"]).default("json"),
	healthPort: z.number().int().positive().default(3000),
});

export type BaseConfig = z.infer<typeof baseConfigSchema>;

export const kafkaConfigSchema = z.object({
	brokers: z.array(z.string().min(1)).min(1),
	clientId: z.string().min(1),
	/** Consumer group id; also the listener id used for pause/resume lookup */
	groupId: z.string().min(1),
	topic: z.string().min(1),
	ssl: z.boolean().default(false),
	sasl: z
		.object({
			mechanism: z.enum(["plain", "scram-sha-256", "scram-sha-512"]),
			username: z.string().min(1),
			password: z.string().min(1),
		})
		.optional(),
	concurrency: z.number().int().positive().default(1),
	sessionTimeout: z.number().int().positive().default(30000),
	heartbeatInterval: z.number().int().positive().default(3000),
	maxRetries: z.number().int().nonnegative().default(5),
	retryBackoffMs: z.number().int().positive().default(300),
});

export type KafkaConfig = z.infer<typeof kafkaConfigSchema>;

export const postgresConfigSchema = z.object({
	url: z.string().url(),
	poolMin: z.number().int().nonnegative().default(2),
	poolMax: z.number().int().positive().default(10),
	connectionTimeoutMs: z.number().int().positive().default(10000),
});

export type PostgresConfig = z.infer<typeof postgresConfigSchema>;

export const vendorConfigSchema = z.object({
	baseUrl: z.string().url(),
	requestTimeoutMs: z.number().int().positive().default(10000),
});

export type VendorConfig = z.infer<typeof vendorConfigSchema>;

export const rateLimitConfigSchema = z.object({
	limitForPeriod: z.number().int().positive().default(20),
	refreshPeriodMs: z.number().int().positive().default(60000),
	timeoutMs: z.number().int().nonnegative().default(2000),
});

export type RateLimitConfig = z.infer<typeof rateLimitConfigSchema>;

export const circuitBreakerConfigSchema = z
	.object({
		failureRateThreshold: z.number().gt(0).max(100).default(50),
		slidingWindowSize: z.number().int().positive().default(5),
		minimumCalls: z.number().int().positive().default(3),
		waitDurationInOpenMs: z.number().int().positive().default(60000),
		permittedCallsInHalfOpen: z.number().int().positive().default(1),
	})
	.refine((c) => c.minimumCalls <= c.slidingWindowSize, {
		message: "minimumCalls must not exceed slidingWindowSize",
		path: ["minimumCalls"],
	});

export type CircuitBreakerConfig = z.infer<typeof circuitBreakerConfigSchema>;

export const retryConfigSchema = z.object({
	maxAttempts: z.number().int().positive().default(5),
	initialDelayMs: z.number().int().positive().default(60000),
	schedulerPeriodMs: z.number().int().positive().default(30000),
});

export type RetryConfig = z.infer<typeof retryConfigSchema>;

export const retentionConfigSchema = z.object({
	failedMaxAgeMs: z
		.number()
		.int()
		.positive()
		.default(7 * 24 * 60 * 60 * 1000),
	sweepPeriodMs: z
		.number()
		.int()
		.positive()
		.default(24 * 60 * 60 * 1000),
});

export type RetentionConfig = z.infer<typeof retentionConfigSchema>;

export const statisticsConfigSchema = z.object({
	reportPeriodMs: z
		.number()
		.int()
		.positive()
		.default(5 * 60 * 1000),
	pendingAlertThreshold: z.number().int().nonnegative().default(100),
	failedAlertThreshold: z.number().int().nonnegative().default(50),
});

export type StatisticsConfig = z.infer<typeof statisticsConfigSchema>;

export const datadogConfigSchema = z.object({
	traceEnabled: z.boolean().default(true),
	runtimeMetricsEnabled: z.boolean().default(true),
});

export type DatadogConfig = z.infer<typeof datadogConfigSchema>;
