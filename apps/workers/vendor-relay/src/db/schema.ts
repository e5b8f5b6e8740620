import { readFile, readdir } from "node:fs/promises";
import type { LoggerService } from "@relay/worker-base";
import type pg from "pg";

export const SQL_DIR = new URL("./sql/", import.meta.url);

/**
 * Runs every `sql/*.sql` file in name order. The files only use
 * `IF NOT EXISTS` DDL, so this is safe on every start.
 */
export async function applySchema(
	pool: Pick<pg.Pool, "query">,
	logger: LoggerService,
	dir: URL = SQL_DIR,
): Promise<string[]> {
	const files = (await readdir(dir))
		.filter((name) => name.endsWith(".sql"))
		.sort();

	for (const file of files) {
		const sql = await readFile(new URL(file, dir), "utf8");
		await pool.query(sql);
		logger.debug("Schema file applied", { file });
	}

	logger.info("Schema applied", { files: files.length });
	return files;
}
