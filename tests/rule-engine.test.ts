import { describe, expect, test } from "vitest";

import { RuleSetValidationError } from "../src/core/schema.js";
import { compileRuleSet, evaluateRuleSet, evaluateRules, loadRuleSet } from "../src/rules.js";
import { readFixture } from "./helpers.js";

const checkout = readFixture("rules", "checkout.yaml");

describe("rule engine", () => {
  test("evaluates rules in dependency order", () => {
    const compiled = loadRuleSet(checkout);

    expect(Object.keys(compiled)).toEqual([
      "references",
      "names",
      "order",
      "rules",
      "dependencies",
      "variables",
    ]);
    expect(compiled.order).toEqual(["adult", "member", "blocked_region", "can_checkout"]);
    expect(compiled.dependencies.get("can_checkout")).toEqual(["adult", "blocked_region", "member"]);

    const result = evaluateRuleSet(compiled, { age: 30, tier: "gold", country: "DE", total: 250 });

    expect(result.results).toEqual({
      adult: true,
      member: true,
      blocked_region: false,
      can_checkout: true,
    });
    expect(result.stats).toEqual({ totalRules: 4, evaluatedRules: 4, matchedRules: 3 });
    expect(result.diagnostics).toEqual({ warnings: [], errors: [] });
  });

  test("isolates evaluation errors per rule and reports unbound variables", () => {
    const result = evaluateRules(checkout, { age: 16, country: "XX-1" });

    expect(result.results).toEqual({
      adult: false,
      member: false,
      blocked_region: true,
      can_checkout: false,
    });
    expect(result.diagnostics.errors).toEqual([
      "can_checkout: cannot apply < to boolean and number",
    ]);
    expect(result.diagnostics.warnings).toEqual([
      "variable not bound: tier",
      "variable not bound: total",
    ]);
    expect(result.stats.matchedRules).toBe(1);
  });

  test("selects rules by glob and still evaluates their dependencies", () => {
    const compiled = loadRuleSet(checkout);
    const result = evaluateRuleSet(
      compiled,
      { age: 30, tier: "gold", country: "DE", total: 250 },
      { select: ["can_*"] },
    );

    expect(result.results).toEqual({ can_checkout: true });
    expect(result.stats).toEqual({ totalRules: 4, evaluatedRules: 4, matchedRules: 1 });
  });

  test("warns about selections that match nothing", () => {
    const result = evaluateRuleSet(loadRuleSet(checkout), {}, { select: ["refund_*"] });

    expect(result.results).toEqual({});
    expect(result.stats.evaluatedRules).toBe(0);
    expect(result.diagnostics.warnings).toEqual(["selection matched no rules: refund_*"]);
  });

  test("rule references can be turned off", () => {
    const yaml = `
rules:
  a: x > 1
  b: a
`.trim();

    expect(evaluateRules(yaml, { x: 5 }).results).toEqual({ a: true, b: true });

    const detached = evaluateRules(yaml, { x: 5 }, { references: false });
    expect(detached.results).toEqual({ a: true, b: false });
    expect(detached.diagnostics.warnings).toEqual(["variable not bound: a"]);
  });

  test("strict evaluation records unbound variables as errors", () => {
    const result = evaluateRules("rules:\n  ready: flag", {}, { strict: true });

    expect(result.results).toEqual({ ready: false });
    expect(result.diagnostics.errors).toEqual(["ready: unbound variable: flag"]);
  });

  test("rejects reference cycles", () => {
    expect(() => loadRuleSet(readFixture("rules", "cycle.yaml"))).toThrow(
      "rule cycle detected at first",
    );
  });

  test("collects syntax errors from every rule", () => {
    let issues: string[] = [];

    try {
      compileRuleSet({ rules: { bad: "a ==", worse: { or: ["(b"] }, fine: "c" } });
    } catch (error) {
      if (!(error instanceof RuleSetValidationError)) {
        throw error;
      }

      issues = error.issues;
    }

    expect(issues).toEqual([
      "rules.bad: number, string or variable expected, but input ended at index 4",
      "rules.worse.or[0]: closing ) expected, but input ended at index 2",
    ]);
  });

  test("rejects rule names that read as keywords or numbers", () => {
    expect(() => compileRuleSet({ rules: { and: "a", fine: "b" } })).toThrow(
      "rules.and is not a valid rule name",
    );
    expect(() => compileRuleSet({ rules: { "2": "a" } })).toThrow("rules.2 is not a valid rule name");
  });
});
