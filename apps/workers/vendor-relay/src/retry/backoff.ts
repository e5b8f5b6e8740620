import type { OutboundEvent } from "../db/outbound-event.js";

/** initialDelayMs * 2^retryCount */
export function backoffDelayMs(retryCount: number, initialDelayMs: number): number {
	return initialDelayMs * 2 ** retryCount;
}

export function nextEligibleAt(
	event: Pick<OutboundEvent, "lastAttempt" | "retryCount">,
	initialDelayMs: number,
): number {
	return (
		event.lastAttempt.getTime() + backoffDelayMs(event.retryCount, initialDelayMs)
	);
}

export function isEligible(
	event: Pick<OutboundEvent, "lastAttempt" | "retryCount">,
	now: number,
	initialDelayMs: number,
): boolean {
	return now >= nextEligibleAt(event, initialDelayMs);
}
