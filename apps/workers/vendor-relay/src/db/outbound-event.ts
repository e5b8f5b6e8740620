export type OutboundStatus = "PENDING" | "SENT" | "FAILED";

/**
 * One delivery chain for one relayed payload. `retryCount` never decreases
 * and FAILED is terminal until the retention sweep purges the row.
 */
export interface OutboundEvent {
	id: string;
	routingKey: string;
	payload: string;
	status: OutboundStatus;
	retryCount: number;
	lastAttempt: Date;
	createdAt: Date;
}

export interface NewOutboundEvent {
	routingKey: string;
	payload: string;
	lastAttempt: Date;
}

export const OUTBOUND_EVENT_STORE = "OUTBOUND_EVENT_STORE";

/**
 * Durable outbox. Each write touches a single row and is atomic on its own.
 */
export interface OutboundEventStore {
	create(input: NewOutboundEvent): Promise<OutboundEvent>;
	save(event: OutboundEvent): Promise<OutboundEvent>;
	/** Ordered by last attempt ascending, then id */
	findByStatus(status: OutboundStatus): Promise<OutboundEvent[]>;
	countByStatus(status: OutboundStatus): Promise<number>;
	findByStatusAndLastAttemptBefore(
		status: OutboundStatus,
		before: Date,
	): Promise<OutboundEvent[]>;
	findByStatusAndLastAttemptAfter(
		status: OutboundStatus,
		after: Date,
	): Promise<OutboundEvent[]>;
	deleteByIds(ids: string[]): Promise<number>;
}
