import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { loadEvaluatorConfig, resolveEvaluatorConfig } from "../src/config.js";
import { AnalysisResultError } from "../src/errors.js";
import { runEvaluation } from "../src/evaluator/run.js";
import { createLogger, silentLogger } from "../src/utils/logger.js";
import { id, recordingLogger } from "./test-data.js";

const fixture = (name: string): string =>
  fileURLToPath(new URL(`../test-fixtures/${name}`, import.meta.url));

const analysisResultPath = fixture("analysis-result.json");
const rulesPath = fixture("rules/policy.rules.ts");

const CODEC = "Maven:org.example.gpl:codec:1.4";
const TINY_PARSER = "NPM::tiny-parser:0.3.1";
const STOREFRONT = "Gradle:com.example:storefront:2.1.0";

const BROKEN_RULES = `
rule("COPYLEFT", {
  message: "{id} is copyleft.",
  when: isCopyleft(),
});
`;

describe("runEvaluation", () => {
  let scratchDir = "";

  beforeAll(() => {
    scratchDir = fs.mkdtempSync(path.join(os.tmpdir(), "license-policy-"));
  });

  afterAll(() => {
    fs.rmSync(scratchDir, { recursive: true, force: true });
  });

  it("evaluates a rule script against an analysis result on disk", () => {
    const evaluation = runEvaluation({ analysisResultPath, rulesPath, logger: silentLogger });

    expect(evaluation.failures).toEqual([]);
    expect(evaluation.evaluatedContexts).toBe(8);
    expect(evaluation.violations).toEqual([
      {
        rule: "NO_STATIC_COPYLEFT",
        pkg: id(CODEC),
        severity: "error",
        message: `${CODEC} is statically linked into ${STOREFRONT}.`,
        howToFix: `Link ${CODEC} dynamically.`,
        location: { project: id(STOREFRONT), scope: "runtimeClasspath", level: 0, path: [id(CODEC)] },
      },
      {
        rule: "DECLARED_LICENSE_REQUIRED",
        pkg: id(TINY_PARSER),
        severity: "warning",
        message: `${TINY_PARSER} declares no license.`,
        howToFix: "",
      },
      {
        rule: "UNKNOWN_DETECTED",
        pkg: id(TINY_PARSER),
        license: "LicenseRef-scancode-unknown",
        licenseSource: "DETECTED",
        severity: "hint",
        message: `LicenseRef-scancode-unknown detected in ${TINY_PARSER}.`,
        howToFix: "",
      },
    ]);
  });

  it("applies the configured severity threshold and rule selection", () => {
    const config = loadEvaluatorConfig(fixture("evaluator.config.json"));

    const evaluation = runEvaluation({ analysisResultPath, rulesPath, config });

    expect(evaluation.violations.map((violation) => violation.rule)).toEqual([
      "NO_STATIC_COPYLEFT",
      "DECLARED_LICENSE_REQUIRED",
    ]);

    const selected = runEvaluation({
      analysisResultPath,
      rulesPath,
      config: resolveEvaluatorConfig({ rules: ["UNKNOWN_DETECTED"], logLevel: "silent" }),
    });
    expect(selected.violations.map((violation) => violation.rule)).toEqual(["UNKNOWN_DETECTED"]);
  });

  it("logs a summary at info level", () => {
    const recorder = recordingLogger();
    const logger = createLogger({ level: "info", stream: recorder.stream });

    runEvaluation({ analysisResultPath, rulesPath, logger });

    expect(recorder.lines).toEqual([
      "[info] Evaluated 8 context(s): 3 violation(s), 0 failure(s).\n",
    ]);
  });

  it("fails on a broken rule script before reading the analysis result", () => {
    const brokenRulesPath = path.join(scratchDir, "broken.rules.ts");
    fs.writeFileSync(brokenRulesPath, BROKEN_RULES, "utf-8");

    expect(() =>
      runEvaluation({
        analysisResultPath: fixture("missing.json"),
        rulesPath: brokenRulesPath,
        logger: silentLogger,
      }),
    ).toThrow(`${brokenRulesPath}:4: Unknown atom "isCopyleft".`);
  });

  it("enforces the configured maximum tree depth", () => {
    expect(() =>
      runEvaluation({
        analysisResultPath,
        rulesPath,
        config: resolveEvaluatorConfig({ maxTreeDepth: 1, logLevel: "silent" }),
      }),
    ).toThrow(AnalysisResultError);
  });
});
