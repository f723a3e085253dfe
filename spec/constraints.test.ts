import { describe, it, expect } from "vitest";
import { applyRangeBounds, parseCheckConstraint } from "../src/util/constraints.js";

describe("parseCheckConstraint", () => {
  it("reads ranges joined by AND", () => {
    expect(parseCheckConstraint("((age >= 18) AND (age <= 65))").ranges).toEqual([
      { column: "age", min: 18, minInclusive: true, max: 65, maxInclusive: true },
    ]);
  });

  it("keeps BETWEEN together", () => {
    expect(parseCheckConstraint("qty BETWEEN 1 AND 5").ranges).toEqual([
      { column: "qty", min: 1, max: 5, minInclusive: true, maxInclusive: true },
    ]);
  });

  it("reads IN lists", () => {
    expect(parseCheckConstraint("status IN ('open', 'it''s')").allowed).toEqual([
      { column: "status", values: ["open", "it's"] },
    ]);
  });

  it("reads ranges with the casts PostgreSQL renders", () => {
    expect(
      parseCheckConstraint("((price > (0)::numeric) AND (price <= (1000)::numeric))").ranges,
    ).toEqual([{ column: "price", min: 0, minInclusive: false, max: 1000, maxInclusive: true }]);
    expect(parseCheckConstraint("((qty)::integer >= '-5'::integer)").ranges).toEqual([
      { column: "qty", min: -5, minInclusive: true },
    ]);
  });

  it("reads = ANY (ARRAY[...]) lists as allowed values", () => {
    const parsed = parseCheckConstraint(
      "((status)::text = ANY ((ARRAY['open'::character varying, 'closed'::character varying])::text[]))",
    );
    expect(parsed.allowed).toEqual([{ column: "status", values: ["open", "closed"] }]);
    expect(parsed.ranges).toEqual([]);
  });

  it("ignores expressions it does not understand", () => {
    const parsed = parseCheckConstraint("length(code) = 3");
    expect(parsed.ranges).toEqual([]);
    expect(parsed.allowed).toEqual([]);
    expect(parsed.raw).toBe("length(code) = 3");
  });
});

describe("applyRangeBounds", () => {
  it("moves exclusive bounds inwards by the step", () => {
    const { ranges } = parseCheckConstraint("n > 0 AND n < 10");
    expect(applyRangeBounds("n", ranges, 1, 100)).toEqual({ min: 1, max: 9 });
    expect(applyRangeBounds("n", ranges, 1, 100, 0.5)).toEqual({ min: 0.5, max: 9.5 });
  });

  it("moves fractional exclusive bounds to the next step inside them", () => {
    const { ranges } = parseCheckConstraint("qty > 0.5 AND qty < 9.5");
    expect(applyRangeBounds("qty", ranges, 1, 100)).toEqual({ min: 1, max: 9 });

    const price = parseCheckConstraint("(price > 0.005) AND (price < 1000)").ranges;
    expect(applyRangeBounds("price", price, 0, 5000, 0.01)).toEqual({ min: 0.01, max: 999.99 });
  });

  it("keeps the defaults for unconstrained columns", () => {
    expect(applyRangeBounds("m", [], 1, 100)).toEqual({ min: 1, max: 100 });
  });
});
