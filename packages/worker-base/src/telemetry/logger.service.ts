import {
	type LogContext,
	type Logger,
	createPinoLogger,
	redactSensitive,
} from "@relay/core-telemetry";
import {
	Injectable,
	type LoggerService as NestLoggerService,
} from "@nestjs/common";
import type pino from "pino";
import type { WorkerConfig } from "../config/config.module.js";
import { EventLogger } from "./events.js";
import { LogTier, shouldForwardLog } from "./log-tier.js";

export const LOGGER = "LOGGER";

export type { LogContext };

export interface TieredLogContext extends LogContext {
	tier?: LogTier;
}

/**
 * Nest logger backed by pino. Every structured line carries the service
 * tags, a tier and the `dd.forward` flag the Datadog pipeline filters on.
 */
@Injectable()
export class LoggerService implements NestLoggerService, Logger {
	private readonly pino: pino.Logger;
	private readonly baseTags: Record<string, string>;

	constructor(
		private readonly config: WorkerConfig,
		instance?: pino.Logger,
	) {
		this.baseTags = {
			env: config.base.env,
			service: config.base.service.name,
			version: config.base.service.version,
			team: config.base.service.team,
			region: config.base.service.region,
		};
		this.pino =
			instance ??
			createPinoLogger({
				level: config.logging.level,
				serviceTags: {
					service: config.base.service.name,
					version: config.base.service.version,
					env: config.base.env,
				},
				pretty: config.base.logFormat === "pretty",
			});
	}

	private formatContext(
		context?: TieredLogContext,
		defaultTier: LogTier = LogTier.OPERATIONAL,
	): Record<string, unknown> {
		if (!context) {
			const { forward } = shouldForwardLog(defaultTier, this.config.logging);
			return { ...this.baseTags, tier: defaultTier, "dd.forward": forward };
		}

		const { tier: explicitTier, ...rest } = context;
		const tier = explicitTier ?? defaultTier;
		const { forward, sampled } = shouldForwardLog(
			tier,
			this.config.logging,
			context.trace_id,
		);

		return {
			...this.baseTags,
			...redactSensitive(rest),
			tier,
			"dd.forward": forward,
			...(sampled !== undefined && { "dd.sampled": sampled }),
			dd: {
				trace_id: context.trace_id,
				span_id: context.span_id,
			},
		};
	}

	log(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.info({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.info(this.formatContext(context), message);
		}
	}

	info(message: string, context?: LogContext): void {
		this.pino.info(this.formatContext(context), message);
	}

	/**
	 * Accepts both Nest's `(message, stack, context)` form and a structured
	 * context object.
	 */
	error(
		message: string,
		traceOrContext?: string | LogContext,
		nestContext?: string,
	): void {
		if (traceOrContext === undefined || typeof traceOrContext === "string") {
			this.pino.error(
				{
					...this.formatContext(undefined),
					...(nestContext && { nestContext }),
					...(traceOrContext && { stack: traceOrContext }),
				},
				message,
			);
			return;
		}
		this.pino.error(this.formatContext(traceOrContext), message);
	}

	warn(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.warn({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.warn(this.formatContext(context), message);
		}
	}

	debug(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.debug({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.debug(this.formatContext(context, LogTier.DEBUG), message);
		}
	}

	verbose(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.trace({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.trace(this.formatContext(context, LogTier.DEBUG), message);
		}
	}

	child(bindings: Record<string, unknown>): LoggerService {
		return new LoggerService(
			this.config,
			this.pino.child(redactSensitive(bindings)),
		);
	}

	/** Always shipped: uncaught exceptions, dead-lettered records */
	critical(message: string, context?: LogContext): void {
		this.tiered(LogTier.CRITICAL, message, context);
	}

	/** Always shipped: relay events, dispatch failures */
	operational(message: string, context?: LogContext): void {
		this.tiered(LogTier.OPERATIONAL, message, context);
	}

	lifecycle(message: string, context?: LogContext): void {
		this.tiered(LogTier.LIFECYCLE, message, context);
	}

	debugTiered(message: string, context?: LogContext): void {
		this.tiered(LogTier.DEBUG, message, context);
	}

	tiered(tier: LogTier, message: string, context?: LogContext): void {
		const formatted = this.formatContext({ ...context, tier }, tier);

		switch (tier) {
			case LogTier.CRITICAL:
				this.pino.error(formatted, message);
				break;
			case LogTier.OPERATIONAL:
			case LogTier.LIFECYCLE:
				this.pino.info(formatted, message);
				break;
			case LogTier.DEBUG:
				this.pino.debug(formatted, message);
				break;
		}
	}

	createEventLogger(): EventLogger {
		return new EventLogger(this, this.config);
	}
}
