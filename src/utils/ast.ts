import { Node, SyntaxKind } from "ts-morph";

export type LiteralValue = string | number | boolean;

export function getNodeLine(node: Node): number {
  return node.getSourceFile().getLineAndColumnAtPos(node.getStart()).line;
}

/**
 * Reads a string, number or boolean literal. Anything that needs evaluation,
 * identifiers and template expressions included, yields undefined.
 */
export function getLiteralValue(node: Node): LiteralValue | undefined {
  if (Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
    return node.getLiteralValue();
  }
  if (Node.isNumericLiteral(node)) {
    return node.getLiteralValue();
  }
  if (node.getKind() === SyntaxKind.TrueKeyword) {
    return true;
  }
  if (node.getKind() === SyntaxKind.FalseKeyword) {
    return false;
  }
  if (Node.isPrefixUnaryExpression(node) && node.getOperatorToken() === SyntaxKind.MinusToken) {
    const operand = node.getOperand();
    if (Node.isNumericLiteral(operand)) {
      return -operand.getLiteralValue();
    }
  }
  return undefined;
}
