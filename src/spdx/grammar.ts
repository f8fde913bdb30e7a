export interface LicenseLeafNode {
  license: string;
  plus?: boolean;
  exception?: string;
}

export interface ConjunctionNode {
  conjunction: "and" | "or";
  left: LicenseExpressionNode;
  right: LicenseExpressionNode;
}

/** Same shape as the tree returned by spdx-expression-parse. */
export type LicenseExpressionNode = LicenseLeafNode | ConjunctionNode;

type Token =
  | { kind: "open" }
  | { kind: "close" }
  | { kind: "operator"; operator: "and" | "or" | "with" }
  | { kind: "id"; value: string; plus: boolean };

const ID_PATTERN = /^([A-Za-z0-9.-]+(?::[A-Za-z0-9.-]+)?)(\+)?/;
const OPERATORS = new Map<string, "and" | "or" | "with">([
  ["AND", "and"],
  ["and", "and"],
  ["OR", "or"],
  ["or", "or"],
  ["WITH", "with"],
  ["with", "with"],
]);

function tokenize(expression: string): Token[] | undefined {
  const tokens: Token[] = [];
  let rest = expression;
  while (rest.length > 0) {
    const whitespace = /^\s+/.exec(rest);
    if (whitespace) {
      rest = rest.slice(whitespace[0].length);
      continue;
    }
    if (rest.startsWith("(")) {
      tokens.push({ kind: "open" });
      rest = rest.slice(1);
      continue;
    }
    if (rest.startsWith(")")) {
      tokens.push({ kind: "close" });
      rest = rest.slice(1);
      continue;
    }
    const match = ID_PATTERN.exec(rest);
    if (!match) {
      return undefined;
    }
    const [text, value, plus] = match;
    const operator = plus === undefined ? OPERATORS.get(value) : undefined;
    tokens.push(
      operator ? { kind: "operator", operator } : { kind: "id", value, plus: plus !== undefined },
    );
    rest = rest.slice(text.length);
  }
  return tokens;
}

/**
 * Recursive descent over the SPDX license expression grammar. Any idstring is
 * accepted as a license, listed or not. WITH binds tighter than AND, AND
 * tighter than OR.
 */
class ExpressionParser {
  private position = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): LicenseExpressionNode | undefined {
    const node = this.parseOr();
    return node && this.position === this.tokens.length ? node : undefined;
  }

  private parseOr(): LicenseExpressionNode | undefined {
    return this.parseConjunction("or", () => this.parseAnd());
  }

  private parseAnd(): LicenseExpressionNode | undefined {
    return this.parseConjunction("and", () => this.parseWith());
  }

  private parseConjunction(
    conjunction: "and" | "or",
    operand: () => LicenseExpressionNode | undefined,
  ): LicenseExpressionNode | undefined {
    let left = operand();
    while (left && this.peekOperator() === conjunction) {
      this.position += 1;
      const right = operand();
      if (!right) {
        return undefined;
      }
      left = { conjunction, left, right };
    }
    return left;
  }

  private parseWith(): LicenseExpressionNode | undefined {
    const token = this.tokens[this.position];
    if (token?.kind === "open") {
      this.position += 1;
      const inner = this.parseOr();
      if (!inner || this.tokens[this.position]?.kind !== "close") {
        return undefined;
      }
      this.position += 1;
      return inner;
    }
    if (token?.kind !== "id") {
      return undefined;
    }
    this.position += 1;
    const leaf: LicenseLeafNode = { license: token.value };
    if (token.plus) {
      leaf.plus = true;
    }
    if (this.peekOperator() === "with") {
      const exception = this.tokens[this.position + 1];
      if (exception?.kind !== "id" || exception.plus) {
        return undefined;
      }
      leaf.exception = exception.value;
      this.position += 2;
    }
    return leaf;
  }

  private peekOperator(): "and" | "or" | "with" | undefined {
    const token = this.tokens[this.position];
    return token?.kind === "operator" ? token.operator : undefined;
  }
}

/**
 * Parses the syntax of an SPDX expression without checking identifiers
 * against the SPDX license list. Returns undefined on a syntax error.
 */
export function parseExpressionSyntax(expression: string): LicenseExpressionNode | undefined {
  const tokens = tokenize(expression);
  if (!tokens || tokens.length === 0) {
    return undefined;
  }
  return new ExpressionParser(tokens).parse();
}
