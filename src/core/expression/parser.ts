import { parseNumber, tokenize } from "./tokenizer.js";

import type {
  ComparisonOperator,
  ExpressionNode,
  LogicalOperator,
  TerminalNode,
} from "./ast.js";
import type { Token, TokenKind } from "./tokenizer.js";

const comparisonOperators = new Map<TokenKind, ComparisonOperator>([
  ["gt", ">"],
  ["gte", ">="],
  ["lt", "<"],
  ["lte", "<="],
  ["eq", "=="],
  ["neq", "!="],
  ["prefix", ".*"],
]);

export class ExpressionSyntaxError extends Error {
  readonly index: number;

  constructor(message: string, index: number) {
    super(`${message} at index ${index}`);
    this.name = "ExpressionSyntaxError";
    this.index = index;
  }
}

function quote(token: Token): string {
  return JSON.stringify(token.text);
}

class Parser {
  private readonly tokens: readonly Token[];
  private readonly end: number;
  private position: number;

  constructor(tokens: readonly Token[], end: number) {
    this.tokens = tokens;
    this.end = end;
    this.position = 0;
  }

  parse(): ExpressionNode {
    const expression = this.parseExpression();
    const trailing = this.peek();

    if (trailing) {
      throw this.unexpected(trailing, "operator expected");
    }

    return expression;
  }

  private parseExpression(): ExpressionNode {
    let left = this.parseAndTerm();

    while (this.peek()?.kind === "or") {
      this.consume();
      left = this.logical("or", left, this.parseAndTerm());
    }

    return left;
  }

  private parseAndTerm(): ExpressionNode {
    let left = this.parseCondition();

    while (this.peek()?.kind === "and") {
      this.consume();
      left = this.logical("and", left, this.parseCondition());
    }

    return left;
  }

  private parseCondition(): ExpressionNode {
    if (this.peek()?.kind === "lparen") {
      this.consume();
      const expression = this.parseExpression();
      const closing = this.peek();

      if (!closing) {
        throw new ExpressionSyntaxError("closing ) expected, but input ended", this.end);
      }

      if (closing.kind !== "rparen") {
        throw this.unexpected(closing, "closing ) expected");
      }

      this.consume();
      return expression;
    }

    const left = this.parseTerminal();
    const next = this.peek();
    const operator = next ? comparisonOperators.get(next.kind) : undefined;

    if (!operator) {
      return left;
    }

    this.consume();

    return {
      kind: "comparison",
      operator,
      left,
      right: this.parseTerminal(),
    };
  }

  private parseTerminal(): TerminalNode {
    const token = this.peek();

    if (!token) {
      throw new ExpressionSyntaxError("number, string or variable expected, but input ended", this.end);
    }

    if (token.kind === "number") {
      this.consume();
      return { kind: "number", value: parseNumber(token.text) };
    }

    if (token.kind === "string") {
      this.consume();
      return { kind: "string", value: token.text.slice(1, -1) };
    }

    if (token.kind === "variable") {
      this.consume();
      const negated = token.text.startsWith("!");
      const name = negated ? token.text.slice(1) : token.text;

      if (name === "") {
        throw new ExpressionSyntaxError("variable name expected after !", token.start);
      }

      return { kind: "variable", name, negated };
    }

    throw this.unexpected(token, "number, string or variable expected");
  }

  private logical(
    operator: LogicalOperator,
    left: ExpressionNode,
    right: ExpressionNode,
  ): ExpressionNode {
    return { kind: "logical", operator, left, right };
  }

  private unexpected(token: Token, expectation: string): ExpressionSyntaxError {
    if (token.kind === "unrecognized") {
      return new ExpressionSyntaxError(`unrecognized token ${quote(token)}`, token.start);
    }

    return new ExpressionSyntaxError(`${expectation}, but got ${quote(token)}`, token.start);
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private consume(): void {
    this.position += 1;
  }
}

/** `end` is the offset reported when input runs out, normally the source length. */
export function parseTokens(tokens: readonly Token[], end = 0): ExpressionNode {
  const lastToken = tokens[tokens.length - 1];
  const parser = new Parser(tokens, Math.max(end, lastToken ? lastToken.end : 0));
  return parser.parse();
}

export function parseExpression(input: string): ExpressionNode {
  return parseTokens(tokenize(input), input.length);
}
