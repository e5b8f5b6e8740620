import {
	type DatabaseHealthCheck,
	DATABASE_HEALTH,
	LOGGER,
	LifecycleService,
	type LoggerService,
	WORKER_CONFIG,
	type WorkerConfig,
} from "@relay/worker-base";
import { type DynamicModule, Module } from "@nestjs/common";
import pg from "pg";
import { applySchema } from "./schema.js";

export const DB_POOL = "DB_POOL";

export function createPool(config: WorkerConfig, logger: LoggerService): pg.Pool {
	const pool = new pg.Pool({
		connectionString: config.postgres.url,
		min: config.postgres.poolMin,
		max: config.postgres.poolMax,
		idleTimeoutMillis: 30000,
		connectionTimeoutMillis: config.postgres.connectionTimeoutMs,
	});

	pool.on("error", (error) => {
		logger.error("Unexpected database pool error", {
			error_message: error.message,
		});
	});

	logger.info("Postgres pool created", {
		host: new URL(config.postgres.url).hostname,
		pool_max: config.postgres.poolMax,
	});
	return pool;
}

export function createDatabaseHealthCheck(pool: pg.Pool): DatabaseHealthCheck {
	return {
		check: async (): Promise<boolean> => {
			const result = await pool.query("SELECT 1");
			return result.rowCount === 1;
		},
	};
}

@Module({})
export class DatabaseModule {
	static forRoot(): DynamicModule {
		return {
			module: DatabaseModule,
			global: true,
			providers: [
				{
					provide: DB_POOL,
					useFactory: async (
						config: WorkerConfig,
						logger: LoggerService,
						lifecycle: LifecycleService,
					): Promise<pg.Pool> => {
						const pool = createPool(config, logger);
						await applySchema(pool, logger);
						lifecycle.onShutdown(async () => {
							await pool.end();
							logger.info("Postgres pool closed");
						});
						return pool;
					},
					inject: [WORKER_CONFIG, LOGGER, LifecycleService],
				},
				{
					provide: DATABASE_HEALTH,
					useFactory: createDatabaseHealthCheck,
					inject: [DB_POOL],
				},
			],
			exports: [DB_POOL, DATABASE_HEALTH],
		};
	}
}
