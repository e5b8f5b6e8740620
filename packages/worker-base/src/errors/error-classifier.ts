import type { ProcessResult } from "../kafka/types.js";

/**
 * Whether a failure is worth another attempt
 */
export type ErrorClassification = "retryable" | "non_retryable";

export class WorkerError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		public readonly classification: ErrorClassification,
	) {
		super(message);
		this.name = "WorkerError";
	}
}

export function isNonRetryable(error: unknown): error is WorkerError {
	return error instanceof WorkerError && error.classification === "non_retryable";
}

export function success(): ProcessResult {
	return { status: "success" };
}

export function skip(reason: string): ProcessResult {
	return { status: "skip", reason };
}

export function deferred(reason: string): ProcessResult {
	return { status: "deferred", reason };
}

export function deadLettered(reason: string): ProcessResult {
	return { status: "dlq", reason };
}
