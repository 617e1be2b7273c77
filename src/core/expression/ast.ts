export type ExpressionNode = TerminalNode | ComparisonNode | LogicalNode;

export type TerminalNode = NumberLiteralNode | StringLiteralNode | VariableNode;

export type ComparisonOperator = ">" | ">=" | "<" | "<=" | "==" | "!=" | ".*";

export type LogicalOperator = "and" | "or";

export interface NumberLiteralNode {
  readonly kind: "number";
  readonly value: number;
}

export interface StringLiteralNode {
  readonly kind: "string";
  readonly value: string;
}

/** `negated` is set when the source name carried a leading `!`. */
export interface VariableNode {
  readonly kind: "variable";
  readonly name: string;
  readonly negated: boolean;
}

export interface ComparisonNode {
  readonly kind: "comparison";
  readonly operator: ComparisonOperator;
  readonly left: TerminalNode;
  readonly right: TerminalNode;
}

export interface LogicalNode {
  readonly kind: "logical";
  readonly operator: LogicalOperator;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}
