import { MissingContextError } from "../errors.js";
import { identifierToString } from "../model/identifier.js";
import type { Logger } from "../utils/logger.js";
import { DependencyRule, type DependencyRuleInit } from "./dependency-rule.js";
import { filterViolationsBySeverity, selectRules } from "./filters.js";
import type { RuleMatcher } from "./matcher.js";
import { PackageRule, type PackageRuleInit } from "./package-rule.js";
import type { RuleSet } from "./rule-set.js";
import type {
  EvaluationResult,
  RuleDefinition,
  RuleFailure,
  Severity,
  Violation,
  ViolationLocation,
} from "./types.js";
import { walkDependencies, type DependencyWalk } from "./walker.js";

export interface EvaluateRulesOptions {
  /** Names of the rules to run; all rules run when empty. */
  selectedRules?: readonly string[];
  minSeverity?: Severity;
  logger?: Logger;
}

interface EvaluationState {
  violations: Violation[];
  failures: RuleFailure[];
  evaluatedContexts: number;
}

export function evaluateRulesDetailed(
  ruleSet: RuleSet,
  rules: RuleDefinition[],
  options: EvaluateRulesOptions = {},
): EvaluationResult {
  const logger = options.logger ?? ruleSet.logger;
  const activeRules = selectRules(rules, options.selectedRules);
  const walk = walkDependencies(ruleSet);
  const state: EvaluationState = { violations: [], failures: [], evaluatedContexts: 0 };

  for (const rule of activeRules) {
    const before = state.violations.length;
    if (rule.target === "package") {
      evaluateContexts(rule, packageContexts(ruleSet, rule), rule.matcher, state);
    } else {
      evaluateContexts(rule, dependencyContexts(ruleSet, walk, rule), rule.matcher, state);
    }
    logger.debug(
      `Rule "${rule.name}" (${rule.target}) produced ${state.violations.length - before} violation(s).`,
    );
  }

  if (state.failures.length > 0) {
    logger.warn(`${state.failures.length} rule evaluation(s) failed for missing context.`);
  }

  return {
    violations: filterViolationsBySeverity(state.violations, options.minSeverity),
    failures: state.failures,
    evaluatedContexts: state.evaluatedContexts,
  };
}

export function evaluateRules(
  ruleSet: RuleSet,
  rules: RuleDefinition[],
  options: EvaluateRulesOptions = {},
): Violation[] {
  return evaluateRulesDetailed(ruleSet, rules, options).violations;
}

function* packageContexts(ruleSet: RuleSet, rule: RuleDefinition): Generator<PackageRule> {
  for (const pkg of ruleSet.packages) {
    const init: PackageRuleInit = {
      ruleSet,
      name: rule.name,
      pkg,
      curations: ruleSet.getCurations(pkg.id),
      detectedLicenses: ruleSet.getDetectedLicenses(pkg.id),
    };
    if (!rule.licenseView) {
      yield new PackageRule(init);
      continue;
    }
    for (const license of ruleSet.resolveLicenses(pkg, rule.licenseView)) {
      yield new PackageRule({ ...init, license });
    }
  }
}

function* dependencyContexts(
  ruleSet: RuleSet,
  walk: DependencyWalk,
  rule: RuleDefinition,
): Generator<DependencyRule> {
  for (const node of walk) {
    const init: DependencyRuleInit = {
      ruleSet,
      name: rule.name,
      pkg: node.pkg,
      curations: ruleSet.getCurations(node.pkg.id),
      detectedLicenses: ruleSet.getDetectedLicenses(node.pkg.id),
      dependency: node.dependency,
      ancestors: node.ancestors,
      level: node.level,
      scope: node.scope,
      project: node.project,
    };
    if (!rule.licenseView) {
      yield new DependencyRule(init);
      continue;
    }
    for (const license of ruleSet.resolveLicenses(node.pkg, rule.licenseView)) {
      yield new DependencyRule({ ...init, license });
    }
  }
}

function evaluateContexts<C extends PackageRule>(
  rule: RuleDefinition,
  contexts: Iterable<C>,
  createMatcher: (context: C) => RuleMatcher,
  state: EvaluationState,
): void {
  for (const context of contexts) {
    state.evaluatedContexts += 1;
    const location = locationOf(context);

    let matched: boolean;
    try {
      matched = createMatcher(context).matches();
    } catch (error) {
      if (!(error instanceof MissingContextError)) {
        throw error;
      }
      state.failures.push({
        rule: rule.name,
        pkg: context.pkg.id,
        message: error.message,
        ...(location ? { location } : {}),
      });
      continue;
    }

    const violated = rule.violateWhen === "matched" ? matched : !matched;
    if (!violated) {
      continue;
    }

    const values = templateValues(context);
    state.violations.push({
      rule: rule.name,
      pkg: context.pkg.id,
      ...(context.license
        ? { license: context.license.license, licenseSource: context.license.source }
        : {}),
      severity: rule.severity,
      message: renderTemplate(rule.message, values),
      howToFix: renderTemplate(rule.howToFix ?? "", values),
      ...(location ? { location } : {}),
    });
  }
}

function locationOf(context: PackageRule): ViolationLocation | undefined {
  if (!(context instanceof DependencyRule)) {
    return undefined;
  }
  return {
    project: context.project.id,
    scope: context.scope.name,
    level: context.level,
    path: [...context.ancestors, context.dependency.id],
  };
}

function templateValues(context: PackageRule): Map<string, string> {
  const values = new Map<string, string>([["id", identifierToString(context.pkg.id)]]);
  if (context.license) {
    values.set("license", context.license.license);
    values.set("source", context.license.source);
  }
  if (context instanceof DependencyRule) {
    values.set("level", String(context.level));
    values.set("scope", context.scope.name);
    values.set("project", identifierToString(context.project.id));
  }
  return values;
}

/** Replaces `{key}` placeholders; unknown keys are left untouched. */
export function renderTemplate(template: string, values: Map<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, key: string) => values.get(key) ?? placeholder);
}
