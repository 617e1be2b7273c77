import { parse as parseYaml } from "yaml";

import { tokenize } from "./expression/index.js";

import type { RuleSetSpec, RuleSpec } from "../types.js";

export class RuleSetValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.join("; "));
    this.name = "RuleSetValidationError";
    this.issues = issues;
  }
}

/** Rule names must read back as a plain variable so expressions can reference them. */
export function ruleNameIssue(name: string): string | undefined {
  if (name === "__proto__") {
    return `rules.${name} is a reserved rule name`;
  }

  const tokens = tokenize(name);

  if (
    tokens.length !== 1 ||
    tokens[0].kind !== "variable" ||
    tokens[0].text !== name ||
    name.startsWith("!")
  ) {
    return `rules.${name} is not a valid rule name`;
  }

  return undefined;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeRuleList(value: unknown, path: string, issues: string[]): RuleSpec[] | undefined {
  if (!Array.isArray(value)) {
    issues.push(`${path} must be an array`);
    return undefined;
  }

  if (value.length === 0) {
    issues.push(`${path} must not be empty`);
    return undefined;
  }

  return value
    .map((entry, index) => normalizeRule(entry, `${path}[${index}]`, issues))
    .filter((entry): entry is RuleSpec => entry !== undefined);
}

function normalizeRule(value: unknown, path: string, issues: string[]): RuleSpec | undefined {
  if (typeof value === "string") {
    if (value.trim() === "") {
      issues.push(`${path} must not be empty`);
      return undefined;
    }

    return value;
  }

  if (!isPlainObject(value)) {
    issues.push(`${path} must be a string or rule object`);
    return undefined;
  }

  const result: Exclude<RuleSpec, string> = {};

  if (!("and" in value) && !("or" in value) && !("not" in value)) {
    issues.push(`${path} needs an and, or or not entry`);
  }

  for (const key of Object.keys(value)) {
    if (key !== "and" && key !== "or" && key !== "not") {
      issues.push(`${path}.${key} is not a supported rule operator`);
    }
  }

  if ("and" in value) {
    result.and = normalizeRuleList(value.and, `${path}.and`, issues);
  }

  if ("or" in value) {
    result.or = normalizeRuleList(value.or, `${path}.or`, issues);
  }

  if ("not" in value) {
    // A list under `not` negates the conjunction of its entries.
    result.not = Array.isArray(value.not)
      ? normalizeRule({ and: value.not }, `${path}.not`, issues)
      : normalizeRule(value.not, `${path}.not`, issues);
  }

  return result;
}

export function validateAndNormalizeRuleSet(value: unknown): RuleSetSpec {
  const issues: string[] = [];

  if (!isPlainObject(value)) {
    throw new RuleSetValidationError(["rule set must be a YAML object"]);
  }

  const rulesRaw = value.rules;

  if (!isPlainObject(rulesRaw) || Object.keys(rulesRaw).length === 0) {
    throw new RuleSetValidationError(["rules must be a non-empty object"]);
  }

  const rules: Record<string, RuleSpec> = {};

  for (const [name, entry] of Object.entries(rulesRaw)) {
    const nameIssue = ruleNameIssue(name);

    if (nameIssue) {
      issues.push(nameIssue);
      continue;
    }

    const rule = normalizeRule(entry, `rules.${name}`, issues);

    if (rule !== undefined) {
      rules[name] = rule;
    }
  }

  if (issues.length > 0) {
    throw new RuleSetValidationError(issues);
  }

  return { rules };
}

export function parseRuleSetYaml(input: string): RuleSetSpec {
  let parsed: unknown;

  try {
    parsed = parseYaml(input);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RuleSetValidationError([`invalid YAML: ${message}`]);
  }

  return validateAndNormalizeRuleSet(parsed);
}
