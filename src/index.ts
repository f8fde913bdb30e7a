export * from "./model/types.js";
export {
  identifierToString,
  matchesPattern,
  parseIdentifier,
  sameIdentifier,
} from "./model/identifier.js";
export { applyCurations, curationsFor } from "./model/curations.js";
export {
  AnalysisResultSchema,
  DEFAULT_MAX_TREE_DEPTH,
  loadAnalysisResult,
  parseAnalysisResult,
  type ParseAnalysisResultOptions,
} from "./model/analysis-result.js";
export {
  decomposeLicenseExpression,
  isLicenseRef,
  isNoLicenseMarker,
  licenseLeafToString,
  NO_LICENSE_MARKERS,
  parseLicenseExpression,
  type SpdxLicenseLeaf,
} from "./spdx/expression.js";
export {
  parseExpressionSyntax,
  type ConjunctionNode,
  type LicenseExpressionNode,
  type LicenseLeafNode,
} from "./spdx/grammar.js";
export {
  isLicenseView,
  LICENSE_VIEWS,
  resolveLicenses,
  type LicenseView,
  type ResolveLicensesOptions,
} from "./evaluator/license-view.js";
export { DEFAULT_LICENSE_VIEW, RuleSet, type RuleSetOptions } from "./evaluator/rule-set.js";
export { DependencyWalk, walkDependencies, type DependencyNode } from "./evaluator/walker.js";
export { allOf, anyOf, createMatcher, not, type RuleMatcher } from "./evaluator/matcher.js";
export { PackageRule, type PackageRuleInit } from "./evaluator/package-rule.js";
export { DependencyRule, type DependencyRuleInit } from "./evaluator/dependency-rule.js";
export {
  evaluateRules,
  evaluateRulesDetailed,
  renderTemplate,
  type EvaluateRulesOptions,
} from "./evaluator/evaluate.js";
export { compareSeverity, filterViolationsBySeverity, selectRules } from "./evaluator/filters.js";
export * from "./evaluator/types.js";
export {
  AtomRegistry,
  createDefaultAtomRegistry,
  registerDefaultAtoms,
  type AtomArgument,
  type AtomDefinition,
  type AtomParam,
  type AtomParamKind,
} from "./evaluator/rules/atoms.js";
export {
  compileRuleScript,
  loadRuleScript,
  type CompileRuleScriptOptions,
} from "./evaluator/rules/script.js";
export { runEvaluation, type RunEvaluationOptions } from "./evaluator/run.js";
export {
  EvaluatorConfigSchema,
  loadEvaluatorConfig,
  resolveEvaluatorConfig,
  type EvaluatorConfig,
} from "./config.js";
export * from "./errors.js";
export {
  createLogger,
  defaultLogger,
  silentLogger,
  warnOnce,
  type Logger,
  type LoggerOptions,
  type LogLevel,
} from "./utils/logger.js";
