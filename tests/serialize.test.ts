import { parse as parseYaml } from "yaml";
import { describe, expect, test } from "vitest";

import { serializeRuleSetResult } from "../src/core/serialize.js";

import type { RuleSetResult } from "../src/types.js";

const fixtureResult: RuleSetResult = {
  results: {
    adult: true,
    member: false,
  },
  stats: {
    totalRules: 2,
    evaluatedRules: 2,
    matchedRules: 1,
  },
  diagnostics: {
    warnings: ["variable not bound: tier"],
    errors: [],
  },
};

describe("serializer", () => {
  test("json", () => {
    const output = serializeRuleSetResult(fixtureResult, "json");

    expect(output.endsWith("}\n")).toBe(true);
    expect(JSON.parse(output)).toEqual(fixtureResult);
  });

  test("jsonl writes one line per rule", () => {
    expect(serializeRuleSetResult(fixtureResult, "jsonl")).toBe(
      '{"rule":"adult","matched":true}\n{"rule":"member","matched":false}\n',
    );
  });

  test("yaml", () => {
    const output = serializeRuleSetResult(fixtureResult, "yaml");

    expect(output.startsWith("results:\n  adult: true\n  member: false\n")).toBe(true);
    expect(parseYaml(output)).toEqual(fixtureResult);
  });
});
