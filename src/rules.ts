import { compileRuleSet, evaluateRuleSet } from "./core/rule-engine.js";
import { parseRuleSetYaml } from "./core/schema.js";

import type {
  CompiledRuleSet,
  CompileRuleSetOptions,
  EvaluateRuleSetOptions,
} from "./core/rule-engine.js";
import type { Binding } from "./core/expression/index.js";
import type { RuleSetResult } from "./types.js";

export function loadRuleSet(yaml: string, options: CompileRuleSetOptions = {}): CompiledRuleSet {
  return compileRuleSet(parseRuleSetYaml(yaml), options);
}

export function evaluateRules(
  yaml: string,
  binding: Binding,
  options: CompileRuleSetOptions & EvaluateRuleSetOptions = {},
): RuleSetResult {
  const compiled = loadRuleSet(yaml, { references: options.references });
  return evaluateRuleSet(compiled, binding, { select: options.select, strict: options.strict });
}

export { compileRuleSet, evaluateRuleSet, parseRuleSetYaml };
