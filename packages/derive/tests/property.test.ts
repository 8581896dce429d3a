/**
 * Property-based tests for derivation.
 *
 * Uses fast-check to verify invariants:
 * 1. Every variant yields status ?? 500 and code ?? variant name
 * 2. Variant order does not change any variant's result
 * 3. Deriving the same description twice gives the same rules
 * 4. Any status outside 200–599 rejects the type
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { deriveErrorType } from "../src/derive.js";
import type { Attributes, ErrorValue, VariantDescription } from "../src/types.js";
import { captureDerivationError, describeByVariant } from "./helpers.js";

// =============================================================================
// Arbitraries
// =============================================================================

interface VariantSample {
  readonly name: string;
  readonly shape: "unit" | "unnamed";
  readonly status: number | string | undefined;
  readonly code: string | undefined;
}

const VARIANT_NAMES = ["BadRequest", "NotFound", "Conflict", "Gone", "Internal", "Timeout", "Auth"];

const arbStatus = fc.integer({ min: 200, max: 599 });

const arbVariantSamples: fc.Arbitrary<VariantSample[]> = fc.uniqueArray(
  fc.record({
    name: fc.constantFrom(...VARIANT_NAMES),
    shape: fc.constantFrom<"unit" | "unnamed">("unit", "unnamed"),
    status: fc.option(fc.oneof(arbStatus, arbStatus.map(String)), { nil: undefined }),
    code: fc.option(fc.string({ minLength: 1, maxLength: 12 }), { nil: undefined }),
  }),
  { selector: (sample) => sample.name, minLength: 1, maxLength: VARIANT_NAMES.length },
);

function toVariant(sample: VariantSample): VariantDescription {
  const attributes: Record<string, unknown> = {};
  if (sample.status !== undefined) attributes["status_code"] = sample.status;
  if (sample.code !== undefined) attributes["code"] = sample.code;
  return {
    name: sample.name,
    fields: sample.shape === "unit" ? { kind: "unit" } : { kind: "unnamed" },
    attributes: attributes satisfies Attributes,
  };
}

function toValue(sample: VariantSample): ErrorValue {
  return sample.shape === "unnamed" ? { variant: sample.name, payload: "p" } : { variant: sample.name };
}

function derive(samples: readonly VariantSample[]) {
  return deriveErrorType({
    name: "Generated",
    variants: samples.map(toVariant),
    describe: describeByVariant,
  });
}

// =============================================================================
// Tests
// =============================================================================

describe("derivation property tests", () => {
  it("fills defaults for every variant", () => {
    fc.assert(
      fc.property(arbVariantSamples, (samples) => {
        const type = derive(samples);

        for (const sample of samples) {
          const ctx = type.intoResponseContext(toValue(sample));
          expect(ctx.statusCode).toBe(sample.status !== undefined ? Number(sample.status) : 500);
          expect(ctx.code).toBe(sample.code ?? sample.name);
          expect(ctx.message).toBe(describeByVariant(toValue(sample)));
        }
      }),
      { numRuns: 100 },
    );
  });

  it("variant order does not change any variant's result", () => {
    const arbPair = arbVariantSamples.chain((samples) =>
      fc.tuple(
        fc.constant(samples),
        fc.shuffledSubarray(samples, { minLength: samples.length, maxLength: samples.length }),
      ),
    );

    fc.assert(
      fc.property(arbPair, ([samples, shuffled]) => {
        const a = derive(samples);
        const b = derive(shuffled);

        for (const sample of samples) {
          const value = toValue(sample);
          expect(b.intoResponseContext(value).toJSON()).toEqual(
            a.intoResponseContext(value).toJSON(),
          );
          expect(b.rule(sample.name)).toEqual(a.rule(sample.name));
        }
      }),
      { numRuns: 100 },
    );
  });

  it("derivation is deterministic", () => {
    fc.assert(
      fc.property(arbVariantSamples, (samples) => {
        expect(derive(samples).rules).toEqual(derive(samples).rules);
      }),
      { numRuns: 50 },
    );
  });

  it("any status outside 200–599 rejects the type", () => {
    const arbBadStatus = fc.oneof(
      fc.integer({ min: -1000, max: 199 }),
      fc.integer({ min: 600, max: 100_000 }),
    );

    fc.assert(
      fc.property(arbVariantSamples, arbBadStatus, fc.boolean(), (samples, status, asString) => {
        const [first, ...rest] = samples;
        if (first === undefined) return;
        const broken = { ...first, status: asString ? String(status) : status };

        const err = captureDerivationError(() => derive([broken, ...rest]));
        expect(err.code).toBe("INVALID_STATUS_CODE");
        expect(err.variant).toBe(first.name);
      }),
      { numRuns: 100 },
    );
  });
});
