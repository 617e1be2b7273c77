import { minimatch } from "minimatch";

import {
  EvaluationError,
  ExpressionSyntaxError,
  collectVariables,
  evaluateAst,
  isTruthy,
  parseExpression,
} from "./expression/index.js";
import { RuleSetValidationError, ruleNameIssue } from "./schema.js";

import type { Binding, ExpressionNode, Value } from "./expression/index.js";
import type { RuleSetDiagnostics, RuleSetResult, RuleSetSpec, RuleSpec } from "../types.js";

export interface CompileRuleSetOptions {
  /** Resolve variables named after another rule to that rule's result. Defaults to true. */
  references?: boolean;
}

export interface EvaluateRuleSetOptions {
  /** minimatch patterns over rule names; every rule is evaluated when empty. */
  select?: string[];
  strict?: boolean;
}

type CompiledRule =
  | { kind: "expr"; expression: ExpressionNode }
  | { kind: "tree"; and?: CompiledRule[]; or?: CompiledRule[]; not?: CompiledRule };

export interface CompiledRuleSet {
  references: boolean;
  names: string[];
  order: string[];
  rules: Map<string, CompiledRule>;
  dependencies: Map<string, string[]>;
  variables: Map<string, string[]>;
}

function compileRule(rule: RuleSpec, path: string, issues: string[]): CompiledRule | undefined {
  if (typeof rule === "string") {
    try {
      return { kind: "expr", expression: parseExpression(rule) };
    } catch (error) {
      if (error instanceof ExpressionSyntaxError) {
        issues.push(`${path}: ${error.message}`);
        return undefined;
      }

      throw error;
    }
  }

  const compileList = (entries: RuleSpec[] | undefined, listPath: string) =>
    entries
      ?.map((entry, index) => compileRule(entry, `${listPath}[${index}]`, issues))
      .filter((entry): entry is CompiledRule => entry !== undefined);

  return {
    kind: "tree",
    and: compileList(rule.and, `${path}.and`),
    or: compileList(rule.or, `${path}.or`),
    not: rule.not === undefined ? undefined : compileRule(rule.not, `${path}.not`, issues),
  };
}

function ruleVariables(rule: CompiledRule, output: Set<string>): void {
  if (rule.kind === "expr") {
    for (const name of collectVariables(rule.expression)) {
      output.add(name);
    }

    return;
  }

  for (const entry of [...(rule.and ?? []), ...(rule.or ?? []), ...(rule.not ? [rule.not] : [])]) {
    ruleVariables(entry, output);
  }
}

function topoSort(names: string[], dependencies: Map<string, string[]>, issues: string[]): string[] {
  const temp = new Set<string>();
  const visited = new Set<string>();
  const output: string[] = [];

  function visit(node: string): boolean {
    if (visited.has(node)) {
      return true;
    }

    if (temp.has(node)) {
      issues.push(`rule cycle detected at ${node}`);
      return false;
    }

    temp.add(node);
    for (const dep of dependencies.get(node) ?? []) {
      if (!visit(dep)) {
        return false;
      }
    }
    temp.delete(node);
    visited.add(node);
    output.push(node);
    return true;
  }

  for (const name of names) {
    if (!visit(name)) {
      break;
    }
  }

  return output;
}

export function compileRuleSet(
  spec: RuleSetSpec,
  options: CompileRuleSetOptions = {},
): CompiledRuleSet {
  const references = options.references ?? true;
  const names = Object.keys(spec.rules);
  const issues: string[] = [];
  const rules = new Map<string, CompiledRule>();
  const dependencies = new Map<string, string[]>();
  const variables = new Map<string, string[]>();

  for (const name of names) {
    const nameIssue = ruleNameIssue(name);

    if (nameIssue) {
      issues.push(nameIssue);
      continue;
    }

    const compiled = compileRule(spec.rules[name], `rules.${name}`, issues);

    if (!compiled) {
      continue;
    }

    const referenced = new Set<string>();
    ruleVariables(compiled, referenced);

    const ruleDeps = references
      ? [...referenced].filter((entry) => Object.hasOwn(spec.rules, entry))
      : [];

    rules.set(name, compiled);
    dependencies.set(name, ruleDeps);
    variables.set(name, [...referenced].filter((entry) => !ruleDeps.includes(entry)));
  }

  const order = issues.length === 0 ? topoSort(names, dependencies, issues) : [];

  if (issues.length > 0) {
    throw new RuleSetValidationError(issues);
  }

  return {
    references,
    names,
    order,
    rules,
    dependencies,
    variables,
  };
}

function evaluateRule(rule: CompiledRule, scope: Binding, strict: boolean): boolean {
  if (rule.kind === "expr") {
    return isTruthy(evaluateAst(rule.expression, scope, { strict }));
  }

  const and = rule.and?.map((entry) => evaluateRule(entry, scope, strict)) ?? [];
  const or = rule.or?.map((entry) => evaluateRule(entry, scope, strict)) ?? [];
  const not = rule.not ? evaluateRule(rule.not, scope, strict) : false;

  return and.every((entry) => entry) && (or.length === 0 || or.some((entry) => entry)) && !not;
}

function selectRules(
  compiled: CompiledRuleSet,
  patterns: string[],
  diagnostics: RuleSetDiagnostics,
): string[] {
  if (patterns.length === 0) {
    return compiled.names;
  }

  for (const pattern of patterns) {
    if (!compiled.names.some((name) => minimatch(name, pattern))) {
      diagnostics.warnings.push(`selection matched no rules: ${pattern}`);
    }
  }

  return compiled.names.filter((name) => patterns.some((pattern) => minimatch(name, pattern)));
}

function requiredRules(compiled: CompiledRuleSet, selected: string[]): Set<string> {
  const required = new Set<string>();
  const pending = [...selected];

  while (pending.length > 0) {
    const name = pending.pop();

    if (name === undefined || required.has(name)) {
      continue;
    }

    required.add(name);
    pending.push(...(compiled.dependencies.get(name) ?? []));
  }

  return required;
}

/**
 * Evaluates the selected rules and the rules they reference. A rule whose
 * evaluation fails reads as false and is reported in `diagnostics.errors`.
 */
export function evaluateRuleSet(
  compiled: CompiledRuleSet,
  binding: Binding,
  options: EvaluateRuleSetOptions = {},
): RuleSetResult {
  const strict = options.strict ?? false;
  const diagnostics: RuleSetDiagnostics = { warnings: [], errors: [] };
  const selected = selectRules(compiled, options.select ?? [], diagnostics);
  const required = requiredRules(compiled, selected);
  const scope: Record<string, Value> = { ...binding };
  const computed = new Map<string, boolean>();
  const unbound = new Set<string>();

  for (const name of compiled.order) {
    const rule = compiled.rules.get(name);

    if (!rule || !required.has(name)) {
      continue;
    }

    for (const variable of compiled.variables.get(name) ?? []) {
      if (!Object.hasOwn(binding, variable)) {
        unbound.add(variable);
      }
    }

    let value = false;

    try {
      value = evaluateRule(rule, scope, strict);
    } catch (error) {
      if (!(error instanceof EvaluationError)) {
        throw error;
      }

      diagnostics.errors.push(`${name}: ${error.message}`);
    }

    computed.set(name, value);

    if (compiled.references) {
      scope[name] = value;
    }
  }

  for (const variable of unbound) {
    diagnostics.warnings.push(`variable not bound: ${variable}`);
  }

  const results: Record<string, boolean> = {};

  for (const name of selected) {
    results[name] = computed.get(name) ?? false;
  }

  return {
    results,
    stats: {
      totalRules: compiled.names.length,
      evaluatedRules: computed.size,
      matchedRules: Object.values(results).filter((entry) => entry).length,
    },
    diagnostics,
  };
}
