export { BooleanExpression, compileExpression } from "./expression.js";
export { evaluateRules, loadRuleSet, compileRuleSet, evaluateRuleSet, parseRuleSetYaml } from "./rules.js";
export { RuleSetValidationError } from "./core/schema.js";
export { serializeRuleSetResult } from "./core/serialize.js";
export {
  EvaluationError,
  EvaluationTypeError,
  ExpressionSyntaxError,
  collectVariables,
  evaluateAst,
  evaluateExpression,
  formatExpression,
  isTruthy,
  parseExpression,
  parseTokens,
  tokenize,
} from "./core/expression/index.js";

export type {
  CompiledRuleSet,
  CompileRuleSetOptions,
  EvaluateRuleSetOptions,
} from "./core/rule-engine.js";

export type {
  Binding,
  ComparisonNode,
  ComparisonOperator,
  EvaluateOptions,
  ExpressionNode,
  LogicalNode,
  LogicalOperator,
  NumberLiteralNode,
  StringLiteralNode,
  TerminalNode,
  Token,
  TokenKind,
  Value,
  VariableNode,
} from "./core/expression/index.js";

export type {
  OutputFormat,
  RuleSetDiagnostics,
  RuleSetResult,
  RuleSetSpec,
  RuleSetStats,
  RuleSpec,
} from "./types.js";
