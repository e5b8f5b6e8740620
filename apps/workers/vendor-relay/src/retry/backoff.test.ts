import { describe, expect, it } from "vitest";
import { backoffDelayMs, isEligible, nextEligibleAt } from "./backoff.js";

const MINUTE = 60000;

describe("backoff", () => {
	it("should double the delay with every retry", () => {
		expect([0, 1, 2, 3, 4].map((n) => backoffDelayMs(n, MINUTE))).toEqual([
			MINUTE,
			2 * MINUTE,
			4 * MINUTE,
			8 * MINUTE,
			16 * MINUTE,
		]);
	});

	it("should push eligibility strictly later for each retry count", () => {
		const lastAttempt = new Date(0);
		const eligibleAt = [0, 1, 2, 3, 4].map((retryCount) =>
			nextEligibleAt({ lastAttempt, retryCount }, MINUTE),
		);

		for (let i = 1; i < eligibleAt.length; i++) {
			expect(eligibleAt[i]).toBeGreaterThan(eligibleAt[i - 1] ?? Infinity);
		}
	});

	it("should become eligible exactly when the delay has elapsed", () => {
		const event = { lastAttempt: new Date(1000), retryCount: 2 };

		expect(isEligible(event, 1000 + 4 * MINUTE - 1, MINUTE)).toBe(false);
		expect(isEligible(event, 1000 + 4 * MINUTE, MINUTE)).toBe(true);
	});
});
