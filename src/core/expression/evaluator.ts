import { parseExpression } from "./parser.js";

import type { ComparisonOperator, ExpressionNode, VariableNode } from "./ast.js";

export type Value = boolean | number | string;

export type Binding = Readonly<Record<string, Value>>;

export interface EvaluateOptions {
  strict?: boolean;
}

export class EvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EvaluationError";
  }
}

export class EvaluationTypeError extends EvaluationError {
  readonly operator: string;
  readonly left: string;
  readonly right: string;

  constructor(operator: string, left: unknown, right: unknown) {
    super(`cannot apply ${operator} to ${typeName(left)} and ${typeName(right)}`);
    this.name = "EvaluationTypeError";
    this.operator = operator;
    this.left = typeName(left);
    this.right = typeName(right);
  }
}

function typeName(value: unknown): string {
  return value === null ? "null" : typeof value;
}

function isValue(value: unknown): value is Value {
  return typeof value === "boolean" || typeof value === "number" || typeof value === "string";
}

export function isTruthy(value: Value): boolean {
  if (typeof value === "boolean") {
    return value;
  }

  if (typeof value === "number") {
    return value !== 0;
  }

  return value.length > 0;
}

function resolveVariable(node: VariableNode, binding: Binding, options: EvaluateOptions): Value {
  let value: Value = false;

  if (Object.hasOwn(binding, node.name)) {
    const bound: unknown = binding[node.name];

    if (!isValue(bound)) {
      throw new EvaluationError(`unsupported value type for ${node.name}: ${typeName(bound)}`);
    }

    value = bound;
  } else if (options.strict) {
    throw new EvaluationError(`unbound variable: ${node.name}`);
  }

  return node.negated ? !isTruthy(value) : value;
}

function compareOrdered(operator: ComparisonOperator, left: Value, right: Value): number {
  // NaN on either side makes every ordering false.
  if (typeof left === "number" && typeof right === "number") {
    return left < right ? -1 : left > right ? 1 : left === right ? 0 : Number.NaN;
  }

  if (typeof left === "string" && typeof right === "string") {
    return left < right ? -1 : left > right ? 1 : 0;
  }

  if (typeof left === "boolean" && typeof right === "boolean") {
    return Number(left) - Number(right);
  }

  throw new EvaluationTypeError(operator, left, right);
}

function compare(operator: ComparisonOperator, left: Value, right: Value): boolean {
  switch (operator) {
    case "==":
      return left === right;
    case "!=":
      return left !== right;
    case ">":
      return compareOrdered(operator, left, right) > 0;
    case ">=":
      return compareOrdered(operator, left, right) >= 0;
    case "<":
      return compareOrdered(operator, left, right) < 0;
    case "<=":
      return compareOrdered(operator, left, right) <= 0;
    case ".*":
      if (typeof left !== "string" || typeof right !== "string") {
        throw new EvaluationTypeError(operator, left, right);
      }

      return left.startsWith(right);
  }
}

export function evaluateAst(
  expression: ExpressionNode,
  binding: Binding,
  options: EvaluateOptions = {},
): Value {
  switch (expression.kind) {
    case "number":
    case "string":
      return expression.value;
    case "variable":
      return resolveVariable(expression, binding, options);
    case "comparison":
      return compare(
        expression.operator,
        evaluateAst(expression.left, binding, options),
        evaluateAst(expression.right, binding, options),
      );
    case "logical": {
      // Both sides are always visited.
      const left = isTruthy(evaluateAst(expression.left, binding, options));
      const right = isTruthy(evaluateAst(expression.right, binding, options));
      return expression.operator === "and" ? left && right : left || right;
    }
  }
}

export function evaluateExpression(
  source: string,
  binding: Binding,
  options: EvaluateOptions = {},
): Value {
  return evaluateAst(parseExpression(source), binding, options);
}
