import type { Identifier, LicenseSource } from "../model/types.js";
import type { DependencyRule } from "./dependency-rule.js";
import type { LicenseView } from "./license-view.js";
import type { RuleMatcher } from "./matcher.js";
import type { PackageRule } from "./package-rule.js";

export type Severity = "hint" | "warning" | "error";

export const SEVERITIES = ["hint", "warning", "error"] as const;

export type RuleTarget = "package" | "dependency";

/**
 * `matched` reports a violation when the matcher holds, `unmatched` when a
 * required condition does not.
 */
export type ViolationTrigger = "matched" | "unmatched";

interface RuleDefinitionBase {
  name: string;
  /** When set, the rule is evaluated once per license resolved under this view. */
  licenseView?: LicenseView;
  violateWhen: ViolationTrigger;
  severity: Severity;
  message: string;
  howToFix?: string;
}

export interface PackageRuleDefinition extends RuleDefinitionBase {
  target: "package";
  matcher: (rule: PackageRule) => RuleMatcher;
}

export interface DependencyRuleDefinition extends RuleDefinitionBase {
  target: "dependency";
  matcher: (rule: DependencyRule) => RuleMatcher;
}

export type RuleDefinition = PackageRuleDefinition | DependencyRuleDefinition;

export interface ViolationLocation {
  project: Identifier;
  scope: string;
  level: number;
  path: Identifier[];
}

export interface Violation {
  rule: string;
  pkg: Identifier;
  license?: string;
  licenseSource?: LicenseSource;
  severity: Severity;
  message: string;
  howToFix: string;
  location?: ViolationLocation;
}

/**
 * A rule that could not be evaluated for one context, e.g. because the
 * context lacks a field one of its atoms needs.
 */
export interface RuleFailure {
  rule: string;
  pkg: Identifier;
  message: string;
  location?: ViolationLocation;
}

export interface EvaluationResult {
  violations: Violation[];
  failures: RuleFailure[];
  evaluatedContexts: number;
}
