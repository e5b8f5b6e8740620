/**
 * Where the record being processed came from, plus trace correlation
 */
export interface WorkerContext {
	topic: string;
	partition: number;
	offset: string;
	/** Record key; the routing key for relay records */
	key: string | null;
	traceId?: string;
	spanId?: string;
}

/**
 * Outcome of processing one record. Every variant is acknowledged;
 * a record is left unacknowledged only by throwing.
 */
export type ProcessResult =
	| { status: "success" }
	| { status: "skip"; reason: string }
	/** Accepted and stored, delivery left to a later retry pass */
	| { status: "deferred"; reason: string }
	| { status: "dlq"; reason: string };
