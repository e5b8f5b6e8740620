import { LOGGER, type LoggerService } from "@relay/worker-base";
import { Inject, Injectable } from "@nestjs/common";
import type pg from "pg";
import { DB_POOL } from "./database.module.js";

export const RECORD_STORE = "RECORD_STORE";

/**
 * Local copy of the relayed entities, keyed by routing key
 */
export interface RecordStore {
	upsert(externalId: string, payload: string): Promise<void>;
	delete(externalId: string): Promise<boolean>;
}

@Injectable()
export class RecordRepository implements RecordStore {
	constructor(
		@Inject(DB_POOL) private readonly pool: pg.Pool,
		@Inject(LOGGER) private readonly logger: LoggerService,
	) {}

	async upsert(externalId: string, payload: string): Promise<void> {
		await this.pool.query(
			`INSERT INTO relay_record (external_id, payload)
			 VALUES ($1, $2)
			 ON CONFLICT (external_id) DO UPDATE
			 SET payload = EXCLUDED.payload, updated_at = NOW()`,
			[externalId, payload],
		);
		this.logger.debug("Record upserted", { routing_key: externalId });
	}

	async delete(externalId: string): Promise<boolean> {
		const result = await this.pool.query(
			"DELETE FROM relay_record WHERE external_id = $1",
			[externalId],
		);
		const deleted = (result.rowCount ?? 0) > 0;
		if (deleted) {
			this.logger.debug("Record deleted", { routing_key: externalId });
		}
		return deleted;
	}
}
