import type { Logger } from "@relay/core-telemetry";
import type { EachMessagePayload, IHeaders, Kafka } from "kafkajs";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { type StreamRecord, createConsumer, nextOffset } from "../consumer.js";
import { ConsumerStateError } from "../errors.js";

const createMockLogger = (): Logger => {
	const logger: Logger = {
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		child: vi.fn(() => logger),
	};
	return logger;
};

const createFakeKafka = () => {
	let eachMessage: ((payload: EachMessagePayload) => Promise<void>) | undefined;
	const consumer = {
		connect: vi.fn(async () => {}),
		disconnect: vi.fn(async () => {}),
		subscribe: vi.fn(async () => {}),
		pause: vi.fn(),
		resume: vi.fn(),
		commitOffsets: vi.fn(async () => {}),
		run: vi.fn(
			async (config: {
				eachMessage: (payload: EachMessagePayload) => Promise<void>;
			}) => {
				eachMessage = config.eachMessage;
			},
		),
	};
	const kafka = { consumer: vi.fn(() => consumer) } as unknown as Kafka;

	const deliver = async (
		overrides: { key?: Buffer | null; value?: Buffer | null; headers?: IHeaders } = {},
	): Promise<void> => {
		if (!eachMessage) {
			throw new Error("consumer is not running");
		}
		await eachMessage({
			topic: "changes",
			partition: 2,
			message: {
				key: "key" in overrides ? (overrides.key ?? null) : Buffer.from("team-1"),
				value:
					"value" in overrides
						? (overrides.value ?? null)
						: Buffer.from('{"name":"Blue"}'),
				timestamp: "1700000000000",
				attributes: 0,
				offset: "41",
				headers: overrides.headers ?? {},
			},
			heartbeat: async () => {},
			pause: () => () => {},
		});
	};

	return { kafka, consumer, deliver };
};

describe("RelayConsumer", () => {
	let fake: ReturnType<typeof createFakeKafka>;

	beforeEach(() => {
		fake = createFakeKafka();
	});

	const startConsumer = async (handler: (record: StreamRecord) => Promise<void>) => {
		const consumer = createConsumer({
			kafka: fake.kafka,
			logger: createMockLogger(),
			groupId: "relay-group",
			topics: ["changes"],
			concurrency: 3,
		});
		await consumer.connect();
		await consumer.run(handler);
		return consumer;
	};

	it("should run with manual commits and the configured concurrency", async () => {
		await startConsumer(async () => {});

		expect(fake.consumer.run).toHaveBeenCalledWith(
			expect.objectContaining({
				autoCommit: false,
				partitionsConsumedConcurrently: 3,
			}),
		);
	});

	it("should decode the record and commit the next offset after the handler", async () => {
		const handler = vi.fn(async (_record: StreamRecord) => {});
		await startConsumer(handler);

		await fake.deliver({
			headers: { objectType: Buffer.from("TEAM"), action: "CREATE" },
		});

		expect(handler).toHaveBeenCalledWith({
			topic: "changes",
			partition: 2,
			offset: "41",
			key: "team-1",
			value: '{"name":"Blue"}',
			headers: { objectType: "TEAM", action: "CREATE" },
			timestamp: "1700000000000",
		});
		expect(fake.consumer.commitOffsets).toHaveBeenCalledWith([
			{ topic: "changes", partition: 2, offset: "42" },
		]);
	});

	it("should not commit and should rethrow when the handler fails", async () => {
		await startConsumer(async () => {
			throw new Error("database unavailable");
		});

		await expect(fake.deliver({})).rejects.toThrow("database unavailable");
		expect(fake.consumer.commitOffsets).not.toHaveBeenCalled();
	});

	it("should map null key and value to null", async () => {
		const handler = vi.fn(async (_record: StreamRecord) => {});
		await startConsumer(handler);

		await fake.deliver({ key: null, value: null });

		expect(handler).toHaveBeenCalledWith(
			expect.objectContaining({ key: null, value: null }),
		);
	});

	it("should pause and resume every topic once per transition", async () => {
		const consumer = await startConsumer(async () => {});

		consumer.pause();
		consumer.pause();
		consumer.resume();
		consumer.resume();

		expect(fake.consumer.pause).toHaveBeenCalledTimes(1);
		expect(fake.consumer.pause).toHaveBeenCalledWith([{ topic: "changes" }]);
		expect(fake.consumer.resume).toHaveBeenCalledTimes(1);
		expect(consumer.isPaused()).toBe(false);
	});

	it("should refuse to run twice or before connecting", async () => {
		const consumer = createConsumer({
			kafka: fake.kafka,
			logger: createMockLogger(),
			groupId: "relay-group",
			topics: ["changes"],
		});

		await expect(consumer.run(async () => {})).rejects.toThrow(
			ConsumerStateError,
		);

		await consumer.connect();
		await consumer.run(async () => {});
		await expect(consumer.run(async () => {})).rejects.toThrow(
			"Consumer already running",
		);
	});
});

describe("nextOffset", () => {
	it("should add one without losing precision on large offsets", () => {
		expect(nextOffset("0")).toBe("1");
		expect(nextOffset("9007199254740993")).toBe("9007199254740994");
	});
});
