import type pg from "pg";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { createMockLogger } from "../__tests__/support/fakes.js";
import type { OutboundEvent } from "./outbound-event.js";
import {
	type OutboundEventRow,
	OutboundEventRepository,
} from "./outbound-event.repository.js";

const lastAttempt = new Date("2026-03-01T12:00:00Z");

const row = (overrides: Partial<OutboundEventRow> = {}): OutboundEventRow => ({
	id: "7",
	routing_key: "team-1",
	payload: '{"id":"team-1"}',
	status: "PENDING",
	retry_count: 0,
	last_attempt: lastAttempt,
	created_at: lastAttempt,
	...overrides,
});

describe("OutboundEventRepository", () => {
	let query: ReturnType<typeof vi.fn>;
	let repository: OutboundEventRepository;

	const lastQuery = (): [string, unknown[]] => {
		const call = query.mock.calls.at(-1);
		if (!call) {
			throw new Error("no query issued");
		}
		return [String(call[0]), Array.isArray(call[1]) ? call[1] : []];
	};

	beforeEach(() => {
		query = vi.fn();
		repository = new OutboundEventRepository(
			{ query } as unknown as pg.Pool,
			createMockLogger(),
		);
	});

	it("should insert a PENDING event and map the returned row", async () => {
		query.mockResolvedValue({ rows: [row()], rowCount: 1 });

		const created = await repository.create({
			routingKey: "team-1",
			payload: '{"id":"team-1"}',
			lastAttempt,
		});

		const [sql, params] = lastQuery();
		expect(sql).toContain("INSERT INTO outbound_event");
		expect(sql).toContain("'PENDING'");
		expect(params).toEqual(["team-1", '{"id":"team-1"}', lastAttempt]);
		expect(created).toEqual({
			id: "7",
			routingKey: "team-1",
			payload: '{"id":"team-1"}',
			status: "PENDING",
			retryCount: 0,
			lastAttempt,
			createdAt: lastAttempt,
		});
	});

	it("should never lower the stored retry count on save", async () => {
		query.mockResolvedValue({ rows: [row({ retry_count: 3, status: "SENT" })], rowCount: 1 });
		const event: OutboundEvent = {
			id: "7",
			routingKey: "team-1",
			payload: "{}",
			status: "SENT",
			retryCount: 2,
			lastAttempt,
			createdAt: lastAttempt,
		};

		const saved = await repository.save(event);

		const [sql, params] = lastQuery();
		expect(sql).toContain("retry_count = GREATEST(retry_count, $4)");
		expect(sql).toContain("WHERE id = $1 AND status <> 'FAILED'");
		expect(params).toEqual(["7", "{}", "SENT", 2, lastAttempt]);
		expect(saved.retryCount).toBe(3);
	});

	it("should fail a save for an unknown or FAILED id", async () => {
		query.mockResolvedValue({ rows: [], rowCount: 0 });

		await expect(
			repository.save({
				id: "404",
				routingKey: "team-1",
				payload: "{}",
				status: "SENT",
				retryCount: 0,
				lastAttempt,
				createdAt: lastAttempt,
			}),
		).rejects.toThrow("Outbound event 404 not found or already FAILED");
	});

	it("should order by last attempt then id", async () => {
		query.mockResolvedValue({ rows: [row(), row({ id: "8" })], rowCount: 2 });

		const events = await repository.findByStatus("PENDING");

		const [sql, params] = lastQuery();
		expect(sql).toContain("ORDER BY last_attempt ASC, id ASC");
		expect(params).toEqual(["PENDING"]);
		expect(events.map((e) => e.id)).toEqual(["7", "8"]);
	});

	it("should parse the count returned as text", async () => {
		query.mockResolvedValue({ rows: [{ count: "12" }], rowCount: 1 });

		await expect(repository.countByStatus("FAILED")).resolves.toBe(12);
	});

	it("should filter by last attempt in both directions", async () => {
		query.mockResolvedValue({ rows: [], rowCount: 0 });

		await repository.findByStatusAndLastAttemptBefore("FAILED", lastAttempt);
		expect(lastQuery()[0]).toContain("last_attempt < $2");

		await repository.findByStatusAndLastAttemptAfter("PENDING", lastAttempt);
		expect(lastQuery()[0]).toContain("last_attempt > $2");
		expect(lastQuery()[1]).toEqual(["PENDING", lastAttempt]);
	});

	it("should delete by id and skip the query for an empty list", async () => {
		query.mockResolvedValue({ rows: [], rowCount: 2 });

		await expect(repository.deleteByIds([])).resolves.toBe(0);
		expect(query).not.toHaveBeenCalled();

		await expect(repository.deleteByIds(["1", "2"])).resolves.toBe(2);
		expect(lastQuery()[1]).toEqual([["1", "2"]]);
	});

	it("should propagate database errors", async () => {
		query.mockRejectedValue(new Error("connection terminated"));

		await expect(
			repository.create({ routingKey: "team-1", payload: "{}", lastAttempt }),
		).rejects.toThrow("connection terminated");
	});
});
