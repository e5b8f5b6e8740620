import type { Tracer } from "dd-trace";

export interface Metrics {
	increment(name: string, value?: number, tags?: Record<string, string>): void;
	gauge(name: string, value: number, tags?: Record<string, string>): void;
	timing(name: string, durationMs: number, tags?: Record<string, string>): void;
	flush(): void;
}

export interface MetricsOptions {
	prefix: string;
	baseTags: Record<string, string>;
	tracer?: Tracer | null;
}

/**
 * Metrics forwarded to the Datadog agent through the tracer's dogstatsd client
 */
class DatadogMetrics implements Metrics {
	constructor(
		private readonly prefix: string,
		private readonly baseTags: Record<string, string>,
		private readonly dogstatsd: Tracer["dogstatsd"],
	) {}

	private formatName(name: string): string {
		return `${this.prefix}.${name}`;
	}

	private formatTags(extra?: Record<string, string>): Record<string, string> {
		return { ...this.baseTags, ...extra };
	}

	increment(name: string, value = 1, tags?: Record<string, string>): void {
		this.dogstatsd.increment(
			this.formatName(name),
			value,
			this.formatTags(tags),
		);
	}

	gauge(name: string, value: number, tags?: Record<string, string>): void {
		this.dogstatsd.gauge(this.formatName(name), value, this.formatTags(tags));
	}

	timing(
		name: string,
		durationMs: number,
		tags?: Record<string, string>,
	): void {
		this.dogstatsd.distribution(
			this.formatName(`${name}.duration_ms`),
			durationMs,
			this.formatTags(tags),
		);
	}

	flush(): void {
		this.dogstatsd.flush();
	}
}

/**
 * No-op metrics for when Datadog is not configured
 */
class NoopMetrics implements Metrics {
	increment(): void {}
	gauge(): void {}
	timing(): void {}
	flush(): void {}
}

export function createMetrics(options: MetricsOptions): Metrics {
	if (!options.tracer) {
		return new NoopMetrics();
	}
	return new DatadogMetrics(
		options.prefix,
		options.baseTags,
		options.tracer.dogstatsd,
	);
}
