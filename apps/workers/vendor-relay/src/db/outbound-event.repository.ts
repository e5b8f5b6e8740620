import { LOGGER, type LoggerService } from "@relay/worker-base";
import { Inject, Injectable } from "@nestjs/common";
import type pg from "pg";
import { DB_POOL } from "./database.module.js";
import type {
	NewOutboundEvent,
	OutboundEvent,
	OutboundEventStore,
	OutboundStatus,
} from "./outbound-event.js";

export interface OutboundEventRow {
	id: string;
	routing_key: string;
	payload: string;
	status: OutboundStatus;
	retry_count: number;
	last_attempt: Date;
	created_at: Date;
}

const COLUMNS =
	"id, routing_key, payload, status, retry_count, last_attempt, created_at";

export function toOutboundEvent(row: OutboundEventRow): OutboundEvent {
	return {
		id: String(row.id),
		routingKey: row.routing_key,
		payload: row.payload,
		status: row.status,
		retryCount: row.retry_count,
		lastAttempt: row.last_attempt,
		createdAt: row.created_at,
	};
}

/**
 * pg-backed outbox. Every write is one statement on one row, so saves of
 * the same id serialize on the row lock and saves of different ids do not
 * contend.
 */
@Injectable()
export class OutboundEventRepository implements OutboundEventStore {
	constructor(
		@Inject(DB_POOL) private readonly pool: pg.Pool,
		@Inject(LOGGER) private readonly logger: LoggerService,
	) {}

	async create(input: NewOutboundEvent): Promise<OutboundEvent> {
		const result = await this.pool.query<OutboundEventRow>(
			`INSERT INTO outbound_event (routing_key, payload, status, retry_count, last_attempt)
			 VALUES ($1, $2, 'PENDING', 0, $3)
			 RETURNING ${COLUMNS}`,
			[input.routingKey, input.payload, input.lastAttempt],
		);
		const row = result.rows[0];
		if (!row) {
			throw new Error("Insert into outbound_event returned no row");
		}
		this.logger.debug("Outbound event created", {
			outbound_id: row.id,
			routing_key: row.routing_key,
		});
		return toOutboundEvent(row);
	}

	async save(event: OutboundEvent): Promise<OutboundEvent> {
		const result = await this.pool.query<OutboundEventRow>(
			`UPDATE outbound_event
			 SET payload = $2,
			     status = $3,
			     retry_count = GREATEST(retry_count, $4),
			     last_attempt = $5
			 WHERE id = $1 AND status <> 'FAILED'
			 RETURNING ${COLUMNS}`,
			[
				event.id,
				event.payload,
				event.status,
				event.retryCount,
				event.lastAttempt,
			],
		);
		const row = result.rows[0];
		if (!row) {
			throw new Error(`Outbound event ${event.id} not found or already FAILED`);
		}
		return toOutboundEvent(row);
	}

	async findByStatus(status: OutboundStatus): Promise<OutboundEvent[]> {
		const result = await this.pool.query<OutboundEventRow>(
			`SELECT ${COLUMNS} FROM outbound_event
			 WHERE status = $1
			 ORDER BY last_attempt ASC, id ASC`,
			[status],
		);
		return result.rows.map(toOutboundEvent);
	}

	async countByStatus(status: OutboundStatus): Promise<number> {
		const result = await this.pool.query<{ count: string }>(
			"SELECT COUNT(*) AS count FROM outbound_event WHERE status = $1",
			[status],
		);
		return Number(result.rows[0]?.count ?? 0);
	}

	async findByStatusAndLastAttemptBefore(
		status: OutboundStatus,
		before: Date,
	): Promise<OutboundEvent[]> {
		const result = await this.pool.query<OutboundEventRow>(
			`SELECT ${COLUMNS} FROM outbound_event
			 WHERE status = $1 AND last_attempt < $2
			 ORDER BY last_attempt ASC, id ASC`,
			[status, before],
		);
		return result.rows.map(toOutboundEvent);
	}

	async findByStatusAndLastAttemptAfter(
		status: OutboundStatus,
		after: Date,
	): Promise<OutboundEvent[]> {
		const result = await this.pool.query<OutboundEventRow>(
			`SELECT ${COLUMNS} FROM outbound_event
			 WHERE status = $1 AND last_attempt > $2
			 ORDER BY last_attempt ASC, id ASC`,
			[status, after],
		);
		return result.rows.map(toOutboundEvent);
	}

	async deleteByIds(ids: string[]): Promise<number> {
		if (ids.length === 0) {
			return 0;
		}
		const result = await this.pool.query(
			"DELETE FROM outbound_event WHERE id = ANY($1::bigint[])",
			[ids],
		);
		return result.rowCount ?? 0;
	}
}
