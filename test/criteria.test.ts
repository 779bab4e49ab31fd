import { describe, expect, test } from "vitest";
import { z } from "zod";
import { AuctionState } from "../src/engine/auction/auctionState";
import { parseHand } from "../src/engine/hand/hand";
import {
  CriteriaRegistry,
  createCriteriaRegistry,
  defineCriterion,
  hcpCriterion,
} from "../src/engine/rules/criteria";
import type { CriterionSpec } from "../src/engine/rules/ruleTypes";
import {
  DuplicateRegistrationError,
  InvalidCriterionParamsError,
  RegistryFrozenError,
  UnknownCriterionError,
} from "../src/errors";

const strong = parseHand("AQ3 AK3 J2 AQ652");
const weak = parseHand("K9742 J2 QJ65 K3");

function hcp(min?: number, max?: number): CriterionSpec {
  const params: Record<string, number> = {};
  if (min !== undefined) params.min = min;
  if (max !== undefined) params.max = max;
  return { name: "hcp", params };
}

describe("built-in criteria", () => {
  const registry = createCriteriaRegistry();

  test("opening holds until someone bids", () => {
    const state = new AuctionState();
    expect(registry.check([{ name: "opening" }], strong, state)).toBe(true);
    state.addBid("P");
    expect(registry.check([{ name: "opening" }], strong, state)).toBe(true);
    state.addBid("1C");
    expect(registry.check([{ name: "opening" }], strong, state)).toBe(false);
  });

  test("hcp range is inclusive with 0 and 40 defaults", () => {
    const state = new AuctionState();
    expect(registry.check([hcp(20, 21)], strong, state)).toBe(true);
    expect(registry.check([hcp(21)], strong, state)).toBe(false);
    expect(registry.check([hcp(undefined, 10)], weak, state)).toBe(true);
    expect(registry.check([hcp()], weak, state)).toBe(true);
  });

  test("balanced and shape", () => {
    const state = new AuctionState();
    expect(registry.check([{ name: "balanced" }], strong, state)).toBe(true);
    expect(registry.check([{ name: "balanced" }], weak, state)).toBe(false);
    expect(registry.check([{ name: "shape", params: { pattern: "S5+" } }], weak, state)).toBe(true);
  });

  test("all criteria must hold by default", () => {
    const state = new AuctionState();
    expect(registry.check([{ name: "balanced" }, hcp(10, 12)], weak, state)).toBe(false);
    expect(registry.check([{ name: "balanced" }, hcp(10, 12)], weak, state, "any")).toBe(true);
    expect(registry.check([], weak, state)).toBe(true);
  });

  test("or holds when any child does", () => {
    const state = new AuctionState();
    const spec: CriterionSpec = {
      name: "or",
      children: [{ name: "balanced" }, { name: "shape", params: { pattern: "D4" } }],
    };
    expect(registry.check([spec], weak, state)).toBe(true);
    expect(registry.check([{ name: "or", children: [{ name: "balanced" }] }], weak, state)).toBe(false);
  });

  test("evaluation is repeatable and leaves the auction untouched", () => {
    const state = new AuctionState();
    state.addBid("2N");
    const specs = [hcp(10), { name: "opening" }];
    const first = registry.check(specs, weak, state);
    expect(registry.check(specs, weak, state)).toBe(first);
    expect(state.bids).toEqual(["2N"]);
  });

  test("names are looked up case-insensitively", () => {
    expect(registry.check([{ name: "HCP", params: { min: 10 } }], weak, new AuctionState())).toBe(true);
  });

  test("bad parameters are a configuration error", () => {
    const state = new AuctionState();
    expect(() => registry.check([hcp(22, 20)], weak, state)).toThrow(InvalidCriterionParamsError);
    expect(() => registry.check([{ name: "hcp", params: { min: "ten" } }], weak, state)).toThrow(
      InvalidCriterionParamsError,
    );
    expect(() => registry.validate({ name: "shape", params: { pattern: "7-5" } })).toThrow(
      InvalidCriterionParamsError,
    );
    expect(() => registry.validate({ name: "balanced", children: [{ name: "opening" }] })).toThrow(
      InvalidCriterionParamsError,
    );
  });

  test("validate walks into or children", () => {
    expect(() => registry.validate({ name: "or", children: [{ name: "suitQuality" }] })).toThrow(
      UnknownCriterionError,
    );
  });
});

describe("CriteriaRegistry", () => {
  test("unknown names fail", () => {
    const registry = createCriteriaRegistry();
    expect(() => registry.check([{ name: "losers" }], strong, new AuctionState())).toThrow(UnknownCriterionError);
  });

  test("duplicate registration fails", () => {
    const registry = createCriteriaRegistry();
    expect(() => registry.register(hcpCriterion)).toThrow(DuplicateRegistrationError);
  });

  test("custom criteria can be registered until frozen", () => {
    const registry = new CriteriaRegistry();
    const aces = defineCriterion("aces", z.object({ min: z.number().int() }), ({ min }, { hand }) => {
      const aces = [hand.S, hand.H, hand.D, hand.C].filter((h) => h.includes("A")).length;
      return aces >= min;
    });
    registry.register(aces).freeze();

    expect(registry.isFrozen).toBe(true);
    expect(registry.check([{ name: "aces", params: { min: 3 } }], strong, new AuctionState())).toBe(true);
    expect(() => registry.register(hcpCriterion)).toThrow(RegistryFrozenError);
  });
});
