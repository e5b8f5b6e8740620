/**
 * Log tiers decide which lines are forwarded to Datadog:
 * - CRITICAL: always (uncaught exceptions, dead-lettered records)
 * - OPERATIONAL: always (relay events, dispatch failures, state changes)
 * - LIFECYCLE: startup, shutdown and connection changes
 * - DEBUG: only when sampled
 */
export enum LogTier {
	CRITICAL = "critical",
	OPERATIONAL = "operational",
	LIFECYCLE = "lifecycle",
	DEBUG = "debug",
}

export interface LoggingConfig {
	/** Base pino level */
	level: string;
	/** Tiers forwarded to Datadog */
	shipTiers: LogTier[];
	/** Fraction of debug lines to forward (0-1) */
	sampleDebugRate: number;
}

export const PRODUCTION_LOGGING_CONFIG: LoggingConfig = {
	level: "info",
	shipTiers: [LogTier.CRITICAL, LogTier.OPERATIONAL, LogTier.LIFECYCLE],
	sampleDebugRate: 0,
};

export const LOCAL_LOGGING_CONFIG: LoggingConfig = {
	level: "debug",
	shipTiers: [
		LogTier.CRITICAL,
		LogTier.OPERATIONAL,
		LogTier.LIFECYCLE,
		LogTier.DEBUG,
	],
	sampleDebugRate: 1,
};

/**
 * Shipping rules for a deployment environment. The configured level always
 * wins over the preset's level.
 */
export function loggingConfigFor(env: string, level: string): LoggingConfig {
	const preset =
		env === "prod" || env === "staging"
			? PRODUCTION_LOGGING_CONFIG
			: LOCAL_LOGGING_CONFIG;
	return { ...preset, shipTiers: [...preset.shipTiers], level };
}

export function shouldForwardLog(
	tier: LogTier,
	config: LoggingConfig,
	traceId?: string,
): { forward: boolean; sampled?: boolean } {
	if (tier === LogTier.CRITICAL) {
		return { forward: true };
	}

	if (!config.shipTiers.includes(tier)) {
		return { forward: false };
	}

	if (tier === LogTier.DEBUG) {
		if (config.sampleDebugRate <= 0) {
			return { forward: false };
		}
		if (config.sampleDebugRate >= 1) {
			return { forward: true, sampled: true };
		}

		// Same trace, same decision across services
		const sampled = traceId
			? hashToRate(traceId) < config.sampleDebugRate
			: Math.random() < config.sampleDebugRate;
		return { forward: sampled, sampled };
	}

	return { forward: true };
}

function hashToRate(traceId: string): number {
	let hash = 0;
	for (let i = 0; i < traceId.length; i++) {
		hash = (hash << 5) - hash + traceId.charCodeAt(i);
		hash |= 0;
	}
	return Math.abs(hash) / 2147483647;
}
