import { resolveEvaluatorConfig, type EvaluatorConfig } from "../config.js";
import { loadAnalysisResult } from "../model/analysis-result.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { evaluateRulesDetailed } from "./evaluate.js";
import { RuleSet } from "./rule-set.js";
import { loadRuleScript, type CompileRuleScriptOptions } from "./rules/script.js";
import type { EvaluationResult } from "./types.js";

export interface RunEvaluationOptions extends CompileRuleScriptOptions {
  analysisResultPath: string;
  rulesPath: string;
  config?: EvaluatorConfig;
  logger?: Logger;
}

/**
 * Loads an analysis result and a rule script from disk and evaluates the
 * rules. The rule script is compiled first so that a broken rule fails the run
 * before the analysis result is touched.
 */
export function runEvaluation(options: RunEvaluationOptions): EvaluationResult {
  const config = options.config ?? resolveEvaluatorConfig();
  const logger = options.logger ?? createLogger({ level: config.logLevel });

  const rules = loadRuleScript(options.rulesPath, { registry: options.registry });
  logger.debug(`Compiled ${rules.length} rule(s) from ${options.rulesPath}.`);

  const result = loadAnalysisResult(options.analysisResultPath, {
    maxTreeDepth: config.maxTreeDepth,
  });
  const ruleSet = new RuleSet(result, {
    logger,
    defaultLicenseView: config.defaultLicenseView,
  });

  const evaluation = evaluateRulesDetailed(ruleSet, rules, {
    selectedRules: config.rules,
    minSeverity: config.minSeverity,
    logger,
  });
  logger.info(
    `Evaluated ${evaluation.evaluatedContexts} context(s): ${evaluation.violations.length} violation(s), ${evaluation.failures.length} failure(s).`,
  );
  return evaluation;
}
