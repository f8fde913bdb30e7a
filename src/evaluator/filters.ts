import { RuleDefinitionError } from "../errors.js";
import type { RuleDefinition, Severity, Violation } from "./types.js";

const SEVERITY_RANK: Record<Severity, number> = {
  hint: 1,
  warning: 2,
  error: 3,
};

export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export function filterViolationsBySeverity(
  violations: Violation[],
  minSeverity?: Severity,
): Violation[] {
  if (!minSeverity) {
    return violations;
  }
  return violations.filter((violation) => compareSeverity(violation.severity, minSeverity) >= 0);
}

/**
 * Keeps the rules named in `selected`, in their declaration order. Naming a
 * rule that does not exist is a configuration defect.
 */
export function selectRules(
  rules: RuleDefinition[],
  selected?: readonly string[],
): RuleDefinition[] {
  if (!selected || selected.length === 0) {
    return rules;
  }
  const known = new Set(rules.map((rule) => rule.name));
  const unknown = selected.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new RuleDefinitionError(
      `Unknown rule name(s): ${unknown.join(", ")}. Available rules: ${[...known].join(", ")}.`,
    );
  }
  return rules.filter((rule) => selected.includes(rule.name));
}
