import { fileURLToPath } from "node:url";
import { describe, expect, test } from "vitest";
import { createHandoffRegistry } from "../src/engine/bidder";
import { createCriteriaRegistry } from "../src/engine/rules/criteria";
import { loadSystemFile, parseSystem, type SystemRegistries } from "../src/engine/rules/loadSystem";
import {
  InvalidCriterionParamsError,
  InvalidSystemError,
  MissingCriteriaError,
  UnknownCriterionError,
  UnknownHandoffError,
} from "../src/errors";

function registries(): SystemRegistries {
  return { criteria: createCriteriaRegistry(), handoffs: createHandoffRegistry() };
}

function systemWith(response: Record<string, unknown>): unknown {
  return {
    name: "test",
    openings: [
      {
        bid: "2N",
        criteria: [{ name: "opening" }],
        responses: [response],
      },
    ],
  };
}

describe("parseSystem", () => {
  test("accepts a nested tree with a hand-off", () => {
    const system = parseSystem(
      systemWith({ bid: "3N", criteria: [{ name: "hcp", params: { min: 10 } }], handoff: "CONFI" }),
      registries(),
    );
    expect(system.name).toBe("test");
    expect(system.openings[0].responses?.[0]).toEqual({
      bid: "3N",
      criteria: [{ name: "hcp", params: { min: 10 } }],
      handoff: "CONFI",
    });
  });

  test("a node without criteria fails at load", () => {
    expect(() => parseSystem(systemWith({ bid: "3N", criteria: [] }), registries())).toThrow(MissingCriteriaError);
    expect(() => parseSystem(systemWith({ bid: "3N", criteria: [] }), registries())).toThrow(
      "No criteria found for bid 3N at 2N 3N",
    );
  });

  test("unknown criterion and hand-off names fail at load", () => {
    expect(() => parseSystem(systemWith({ bid: "3N", criteria: [{ name: "losers" }] }), registries())).toThrow(
      UnknownCriterionError,
    );
    expect(() =>
      parseSystem(systemWith({ bid: "3N", criteria: [{ name: "opening" }], handoff: "rkcb" }), registries()),
    ).toThrow(UnknownHandoffError);
  });

  test("bad criterion parameters fail at load", () => {
    expect(() =>
      parseSystem(systemWith({ bid: "3N", criteria: [{ name: "hcp", params: { max: 41 } }] }), registries()),
    ).toThrow(InvalidCriterionParamsError);
  });

  test("structural problems are reported as an invalid system", () => {
    expect(() => parseSystem(systemWith({ bid: "3NT", criteria: [{ name: "opening" }] }), registries())).toThrow(
      InvalidSystemError,
    );
    expect(() => parseSystem({ openings: [] }, registries())).toThrow(InvalidSystemError);
    expect(() => parseSystem("2N", registries())).toThrow(InvalidSystemError);
  });
});

describe("loadSystemFile", () => {
  test("reads and validates a system from disk", () => {
    const path = fileURLToPath(new URL("./fixtures/weak-two.json", import.meta.url));
    const system = loadSystemFile(path, registries());
    expect(system.name).toBe("Weak twos");
    expect(system.openings.map((node) => node.bid)).toEqual(["2S"]);
  });

  test("a missing file is an invalid system", () => {
    const path = fileURLToPath(new URL("./fixtures/missing.json", import.meta.url));
    expect(() => loadSystemFile(path, registries())).toThrow(InvalidSystemError);
  });
});
