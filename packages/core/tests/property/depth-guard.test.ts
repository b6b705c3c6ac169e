import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { load } from "../../src/api.js";
import { NestingDepthExceededError } from "../../src/errors/yaml-errors.js";
import { getNumRuns, nestedFlowArbitrary } from "./generators.js";

describe("nesting depth guard", () => {
	it("accepts documents at or below the limit", () => {
		fc.assert(
			fc.property(nestedFlowArbitrary, fc.integer({ min: 0, max: 5 }), ({ depth, text }, slack) => {
				expect(() => load(text, { maxNestingDepth: depth + slack })).not.toThrow();
			}),
			{ numRuns: getNumRuns() },
		);
	});

	it("rejects documents above the limit with the configured limit", () => {
		fc.assert(
			fc.property(
				nestedFlowArbitrary.filter(({ depth }) => depth > 1),
				fc.integer({ min: 1, max: 40 }),
				({ depth, text }, limit) => {
					fc.pre(limit < depth);
					try {
						load(text, { maxNestingDepth: limit });
						expect.unreachable();
					} catch (error) {
						expect(error).toBeInstanceOf(NestingDepthExceededError);
						if (error instanceof NestingDepthExceededError) {
							expect(error.limit).toBe(limit);
						}
					}
				},
			),
			{ numRuns: getNumRuns() },
		);
	});
});
