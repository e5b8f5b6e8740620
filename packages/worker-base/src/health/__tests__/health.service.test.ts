import { describe, expect, it, vi } from "vitest";
import type { KafkaService } from "../../kafka/kafka.service.js";
import type { EventLogger } from "../../telemetry/events.js";
import {
	type CheckResult,
	type HealthIndicator,
	HealthService,
	overallStatus,
} from "../health.service.js";

const kafkaStub = (alive: boolean): KafkaService =>
	({ isAlive: () => alive }) as unknown as KafkaService;

const indicator = (name: string, result: CheckResult): HealthIndicator => ({
	name,
	check: () => result,
});

describe("overallStatus", () => {
	it("should rank unhealthy over degraded over ok", () => {
		expect(overallStatus([{ status: "ok" }])).toBe("ok");
		expect(overallStatus([{ status: "ok" }, { status: "degraded" }])).toBe(
			"degraded",
		);
		expect(
			overallStatus([{ status: "degraded" }, { status: "unhealthy" }]),
		).toBe("unhealthy");
	});
});

describe("HealthService", () => {
	it("should report ok when Kafka and the database are up", async () => {
		const service = new HealthService(kafkaStub(true), {
			check: async () => true,
		});

		const response = await service.check();

		expect(response.status).toBe("ok");
		expect(response.checks).toEqual({
			kafka: { status: "ok" },
			database: { status: "ok" },
		});
	});

	it("should report degraded when an indicator is degraded", async () => {
		const service = new HealthService(kafkaStub(true), undefined, [
			indicator("vendor", { status: "degraded", message: "Circuit OPEN" }),
		]);

		const response = await service.check();

		expect(response.status).toBe("degraded");
		expect(response.checks["vendor"]).toEqual({
			status: "degraded",
			message: "Circuit OPEN",
		});
	});

	it("should report unhealthy when the database check throws", async () => {
		const service = new HealthService(kafkaStub(true), {
			check: async () => {
				throw new Error("connection refused");
			},
		});

		const response = await service.check();

		expect(response.status).toBe("unhealthy");
		expect(response.checks["database"]).toEqual({
			status: "unhealthy",
			message: "connection refused",
		});
	});

	it("should report unhealthy when Kafka is disconnected", async () => {
		const service = new HealthService(kafkaStub(false));

		const response = await service.check();

		expect(response.status).toBe("unhealthy");
		expect(response.checks["kafka"]).toEqual({
			status: "unhealthy",
			message: "Kafka not connected",
		});
	});

	it("should emit healthChanged only when the status changes", async () => {
		const healthChanged = vi.fn();
		const eventLogger = { healthChanged } as unknown as EventLogger;
		let vendor: CheckResult = { status: "ok" };
		const service = new HealthService(
			kafkaStub(true),
			undefined,
			[{ name: "vendor", check: () => vendor }],
			eventLogger,
		);

		await service.check();
		await service.check();
		vendor = { status: "degraded" };
		await service.check();

		expect(healthChanged).toHaveBeenCalledTimes(2);
		expect(healthChanged).toHaveBeenNthCalledWith(1, "unknown", "ok", {
			kafka: "ok",
			vendor: "ok",
		});
		expect(healthChanged).toHaveBeenNthCalledWith(2, "ok", "degraded", {
			kafka: "ok",
			vendor: "degraded",
		});
	});
});
