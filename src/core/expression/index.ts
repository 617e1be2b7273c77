export {
  EvaluationError,
  EvaluationTypeError,
  evaluateAst,
  evaluateExpression,
  isTruthy,
} from "./evaluator.js";
export { collectVariables, formatExpression } from "./format.js";
export { ExpressionSyntaxError, parseExpression, parseTokens } from "./parser.js";
export { tokenize } from "./tokenizer.js";
export type { Binding, EvaluateOptions, Value } from "./evaluator.js";
export type { Token, TokenKind } from "./tokenizer.js";
export type {
  ComparisonNode,
  ComparisonOperator,
  ExpressionNode,
  LogicalNode,
  LogicalOperator,
  NumberLiteralNode,
  StringLiteralNode,
  TerminalNode,
  VariableNode,
} from "./ast.js";
