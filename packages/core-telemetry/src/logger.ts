import pino from "pino";

export interface LogContext extends Record<string, unknown> {
	trace_id?: string;
	span_id?: string;
	topic?: string;
	partition?: number;
	offset?: string;
	routing_key?: string;
	event_id?: number;
	error_code?: string;
}

export interface Logger {
	debug(msg: string, context?: LogContext): void;
	info(msg: string, context?: LogContext): void;
	warn(msg: string, context?: LogContext): void;
	error(msg: string, context?: LogContext): void;
	child(bindings: Record<string, unknown>): Logger;
}

export interface ServiceTags {
	service: string;
	version: string;
	env: string;
}

export interface LoggerOptions {
	level?: string;
	serviceTags: ServiceTags;
	pretty?: boolean;
}

/**
 * Keys whose values never reach a log line
 */
const REDACTED_PATTERNS = [
	/password/i,
	/secret/i,
	/token/i,
	/api_?key/i,
	/auth/i,
	/credential/i,
	/private/i,
];

export function redactSensitive(
	obj: Record<string, unknown>,
): Record<string, unknown> {
	const result: Record<string, unknown> = {};

	for (const [key, value] of Object.entries(obj)) {
		if (REDACTED_PATTERNS.some((p) => p.test(key))) {
			result[key] = "[REDACTED]";
			continue;
		}

		if (Array.isArray(value)) {
			result[key] = value.map((item: unknown) =>
				item && typeof item === "object" && !Array.isArray(item)
					? redactSensitive(item as Record<string, unknown>)
					: item,
			);
			continue;
		}

		if (value && typeof value === "object" && !(value instanceof Error)) {
			result[key] = redactSensitive(value as Record<string, unknown>);
			continue;
		}

		result[key] = value;
	}

	return result;
}

/**
 * Raw pino instance with the shared formatting rules (ISO time, level
 * labels, service base bindings, optional pretty transport).
 */
export function createPinoLogger(options: LoggerOptions): pino.Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: options.level ?? "info",
		base: {
			env: options.serviceTags.env,
			service: options.serviceTags.service,
			version: options.serviceTags.version,
		},
		formatters: {
			level: (label) => ({ level: label }),
		},
		timestamp: pino.stdTimeFunctions.isoTime,
	};

	if (options.pretty) {
		pinoOptions.transport = {
			target: "pino-pretty",
			options: {
				colorize: true,
				translateTime: "SYS:standard",
				ignore: "pid,hostname",
			},
		};
	}

	return pino(pinoOptions);
}

class PinoLogger implements Logger {
	constructor(private readonly pino: pino.Logger) {}

	private formatContext(context?: LogContext): Record<string, unknown> {
		if (!context) {
			return {};
		}

		return {
			...redactSensitive(context),
			dd: {
				trace_id: context.trace_id,
				span_id: context.span_id,
			},
		};
	}

	debug(msg: string, context?: LogContext): void {
		this.pino.debug(this.formatContext(context), msg);
	}

	info(msg: string, context?: LogContext): void {
		this.pino.info(this.formatContext(context), msg);
	}

	warn(msg: string, context?: LogContext): void {
		this.pino.warn(this.formatContext(context), msg);
	}

	error(msg: string, context?: LogContext): void {
		this.pino.error(this.formatContext(context), msg);
	}

	child(bindings: Record<string, unknown>): Logger {
		return new PinoLogger(this.pino.child(redactSensitive(bindings)));
	}
}

export function createLogger(options: LoggerOptions): Logger {
	return new PinoLogger(createPinoLogger(options));
}
