import {
  collectVariables,
  evaluateAst,
  formatExpression,
  isTruthy,
  parseExpression,
} from "./core/expression/index.js";

import type {
  Binding,
  EvaluateOptions,
  ExpressionNode,
  Value,
} from "./core/expression/index.js";

/**
 * A parsed boolean expression. The source is tokenized and parsed once, when
 * the object is constructed, and the tree can then be evaluated against any
 * number of bindings.
 *
 * @example
 * const adult = new BooleanExpression("age >= 18 and !banned");
 * adult.test({ age: 21 }); // true
 */
export class BooleanExpression {
  readonly source: string;
  readonly root: ExpressionNode;
  readonly variables: readonly string[];

  constructor(source: string) {
    this.source = source;
    this.root = parseExpression(source);
    this.variables = collectVariables(this.root);
  }

  /** Bare terminals evaluate to their raw value, so the result is not always a boolean. */
  evaluate(binding: Binding = {}, options: EvaluateOptions = {}): Value {
    return evaluateAst(this.root, binding, options);
  }

  test(binding: Binding = {}, options: EvaluateOptions = {}): boolean {
    return isTruthy(this.evaluate(binding, options));
  }

  toString(): string {
    return formatExpression(this.root);
  }
}

export function compileExpression(source: string): BooleanExpression {
  return new BooleanExpression(source);
}
