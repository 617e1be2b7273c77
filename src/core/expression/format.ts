import type { ExpressionNode, TerminalNode } from "./ast.js";

const logicalPrecedence = {
  or: 1,
  and: 2,
} as const;

function formatNumber(value: number): string {
  if (Number.isNaN(value)) {
    return "nan";
  }

  if (!Number.isFinite(value)) {
    return value > 0 ? "inf" : "-inf";
  }

  return Object.is(value, -0) ? "-0" : String(value);
}

function formatString(value: string): string {
  return value.includes("\"") ? `'${value}'` : `"${value}"`;
}

function formatTerminal(node: TerminalNode): string {
  switch (node.kind) {
    case "number":
      return formatNumber(node.value);
    case "string":
      return formatString(node.value);
    case "variable":
      return node.negated ? `!${node.name}` : node.name;
  }
}

function formatOperand(node: ExpressionNode, minPrecedence: number): string {
  const text = formatExpression(node);

  if (node.kind === "logical" && logicalPrecedence[node.operator] < minPrecedence) {
    return `(${text})`;
  }

  return text;
}

/**
 * Renders a tree back to expression text. Parsing the output again yields the
 * same tree; groups are only kept where precedence or left association needs them.
 */
export function formatExpression(node: ExpressionNode): string {
  if (node.kind === "comparison") {
    return `${formatTerminal(node.left)} ${node.operator} ${formatTerminal(node.right)}`;
  }

  if (node.kind === "logical") {
    const precedence = logicalPrecedence[node.operator];
    const left = formatOperand(node.left, precedence);
    const right = formatOperand(node.right, precedence + 1);
    return `${left} ${node.operator} ${right}`;
  }

  return formatTerminal(node);
}

export function collectVariables(node: ExpressionNode): string[] {
  const output = new Set<string>();

  function visit(current: ExpressionNode): void {
    if (current.kind === "variable") {
      output.add(current.name);
      return;
    }

    if (current.kind === "comparison" || current.kind === "logical") {
      visit(current.left);
      visit(current.right);
    }
  }

  visit(node);
  return [...output];
}
