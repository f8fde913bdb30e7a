import parse from "spdx-expression-parse";
import { parseExpressionSyntax, type LicenseExpressionNode } from "./grammar.js";

export interface SpdxLicenseLeaf {
  id: string;
  orLater: boolean;
  exception?: string;
}

/**
 * `NONE` and `NOASSERTION` state that no license was concluded. They are not
 * licenses: callers drop them from the decomposed leaves.
 */
export const NO_LICENSE_MARKERS: readonly string[] = ["NONE", "NOASSERTION"];

export function isNoLicenseMarker(id: string): boolean {
  return NO_LICENSE_MARKERS.includes(id.toUpperCase());
}

/**
 * Parses an SPDX expression. Identifiers missing from the SPDX license list,
 * lower-case ones included, are kept as written; only a syntax error yields
 * undefined.
 */
export function parseLicenseExpression(expression: string): LicenseExpressionNode | undefined {
  const trimmed = expression.trim();
  if (trimmed.length === 0) {
    return undefined;
  }
  try {
    return parse(trimmed);
  } catch {
    return parseExpressionSyntax(trimmed);
  }
}

/**
 * Splits an SPDX expression into its leaf licenses, walking through AND, OR
 * and WITH. Returns undefined for a blank or unparseable expression.
 *
 * The deprecated `X+` form yields a single leaf `X` flagged as or-later.
 */
export function decomposeLicenseExpression(expression: string): SpdxLicenseLeaf[] | undefined {
  const info = parseLicenseExpression(expression);
  if (!info) {
    return undefined;
  }
  const leaves: SpdxLicenseLeaf[] = [];
  collectLeaves(info, leaves);
  return leaves;
}

function collectLeaves(info: LicenseExpressionNode, leaves: SpdxLicenseLeaf[]): void {
  if ("conjunction" in info) {
    collectLeaves(info.left, leaves);
    collectLeaves(info.right, leaves);
    return;
  }

  const leaf: SpdxLicenseLeaf = {
    id: info.license,
    orLater: info.plus === true || info.license.endsWith("-or-later"),
  };
  if (info.exception) {
    leaf.exception = info.exception;
  }
  leaves.push(leaf);
}

export function licenseLeafToString(leaf: SpdxLicenseLeaf): string {
  if (leaf.orLater && !leaf.id.endsWith("-or-later")) {
    return `${leaf.id}+`;
  }
  return leaf.id;
}

export function isLicenseRef(license: string): boolean {
  return /^(DocumentRef-[^:]+:)?LicenseRef-/.test(license);
}
