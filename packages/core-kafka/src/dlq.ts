import type { Logger } from "@relay/core-telemetry";
import type { RelayProducer } from "./producer.js";
import { getDeadLetterTopic } from "./topics.js";

/**
 * The record being dead-lettered. Records that never came off the stream
 * (a retry pass rejecting a stored payload) carry no partition or offset.
 */
export interface DeadLetterSource {
	topic: string;
	key: string | null;
	value: string | null;
	headers?: Record<string, string | undefined>;
	partition?: number;
	offset?: string;
}

export interface DeadLetterPublisher {
	publish(source: DeadLetterSource, reason: string): Promise<void>;
}

export interface DeadLetterPublisherOptions {
	producer: RelayProducer;
	logger: Logger;
}

export const DEAD_LETTER_HEADERS = {
	error: "error",
	originalTopic: "x-original-topic",
	originalPartition: "x-original-partition",
	originalOffset: "x-original-offset",
} as const;

export function buildDeadLetterHeaders(
	source: DeadLetterSource,
	reason: string,
): Record<string, string> {
	const headers: Record<string, string> = {};
	for (const [key, value] of Object.entries(source.headers ?? {})) {
		if (value !== undefined) {
			headers[key] = value;
		}
	}

	headers[DEAD_LETTER_HEADERS.error] = reason;
	headers[DEAD_LETTER_HEADERS.originalTopic] = source.topic;
	if (source.partition !== undefined) {
		headers[DEAD_LETTER_HEADERS.originalPartition] = String(source.partition);
	}
	if (source.offset !== undefined) {
		headers[DEAD_LETTER_HEADERS.originalOffset] = source.offset;
	}
	return headers;
}

class DeadLetterPublisherImpl implements DeadLetterPublisher {
	private producer: RelayProducer;
	private logger: Logger;

	constructor(options: DeadLetterPublisherOptions) {
		this.producer = options.producer;
		this.logger = options.logger;
	}

	async publish(source: DeadLetterSource, reason: string): Promise<void> {
		const deadLetterTopic = getDeadLetterTopic(source.topic);

		try {
			await this.producer.send(deadLetterTopic, [
				{
					key: source.key,
					value: source.value,
					headers: buildDeadLetterHeaders(source, reason),
				},
			]);

			this.logger.warn("Record published to dead-letter topic", {
				topic: source.topic,
				dead_letter_topic: deadLetterTopic,
				routing_key: source.key ?? undefined,
				reason,
			});
		} catch (error) {
			// The source record is already acknowledged; nothing upstream can act on this.
			this.logger.error("Failed to publish to dead-letter topic", {
				topic: source.topic,
				dead_letter_topic: deadLetterTopic,
				routing_key: source.key ?? undefined,
				reason,
				error_message: error instanceof Error ? error.message : String(error),
			});
		}
	}
}

export function createDeadLetterPublisher(
	options: DeadLetterPublisherOptions,
): DeadLetterPublisher {
	return new DeadLetterPublisherImpl(options);
}
