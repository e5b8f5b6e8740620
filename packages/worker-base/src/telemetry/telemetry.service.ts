import { createRequire } from "node:module";
import { type Metrics, createMetrics } from "@relay/core-telemetry";
import { Injectable } from "@nestjs/common";
import type { Span, Tracer } from "dd-trace";
import type { WorkerConfig } from "../config/config.module.js";

const require = createRequire(import.meta.url);

@Injectable()
export class TelemetryService {
	private tracer: Tracer | null = null;
	private metrics: Metrics = createMetrics({ prefix: "relay", baseTags: {} });
	private baseTags: Record<string, string> = {};

	/**
	 * Starts dd-trace when enabled and binds metrics to its dogstatsd client.
	 * A tracer may be passed in directly (tests, preloaded agents).
	 */
	initialize(config: WorkerConfig, tracer?: Tracer): void {
		this.baseTags = {
			env: config.base.env,
			service: config.base.service.name,
			version: config.base.service.version,
			team: config.base.service.team,
			region: config.base.service.region,
		};

		this.tracer = tracer ?? null;
		if (!this.tracer && config.datadog.traceEnabled) {
			this.tracer = this.startTracer(config);
		}

		this.metrics = createMetrics({
			prefix: "relay",
			baseTags: this.baseTags,
			tracer: this.tracer,
		});
	}

	private startTracer(config: WorkerConfig): Tracer | null {
		try {
			const ddTrace: { default: Tracer } = require("dd-trace");
			return ddTrace.default.init({
				service: config.base.service.name,
				version: config.base.service.version,
				env: config.base.env,
				logInjection: true,
				runtimeMetrics: config.datadog.runtimeMetricsEnabled,
			});
		} catch (error) {
			console.warn(
				"dd-trace not available, tracing disabled:",
				error instanceof Error ? error.message : String(error),
			);
			return null;
		}
	}

	getTracer(): Tracer | null {
		return this.tracer;
	}

	getCurrentSpan(): Span | undefined {
		return this.tracer?.scope().active() ?? undefined;
	}

	getMetricTags(extra?: Record<string, string>): Record<string, string> {
		return { ...this.baseTags, ...extra };
	}

	increment(name: string, value = 1, tags?: Record<string, string>): void {
		this.metrics.increment(name, value, tags);
	}

	gauge(name: string, value: number, tags?: Record<string, string>): void {
		this.metrics.gauge(name, value, tags);
	}

	timing(
		name: string,
		durationMs: number,
		tags?: Record<string, string>,
	): void {
		this.metrics.timing(name, durationMs, tags);
	}

	flush(): void {
		this.metrics.flush();
	}

	/**
	 * Runs `fn` inside a span. Without a tracer `fn` runs untraced.
	 */
	async withSpan<T>(
		name: string,
		tags: Record<string, string>,
		fn: (span?: Span) => Promise<T>,
	): Promise<T> {
		if (!this.tracer) {
			return fn();
		}

		return this.tracer.trace(name, { tags }, async (span) => {
			try {
				return await fn(span);
			} catch (error) {
				span?.setTag("error", true);
				if (error instanceof Error) {
					span?.setTag("error.message", error.message);
				}
				throw error;
			}
		});
	}

	getTraceContext(): { trace_id?: string; span_id?: string } {
		const span = this.getCurrentSpan();
		if (!span) return {};

		const context = span.context();
		return {
			trace_id: context.toTraceId(),
			span_id: context.toSpanId(),
		};
	}
}
