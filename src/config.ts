import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LICENSE_VIEWS } from "./evaluator/license-view.js";
import { DEFAULT_LICENSE_VIEW } from "./evaluator/rule-set.js";
import { SEVERITIES } from "./evaluator/types.js";
import { DEFAULT_MAX_TREE_DEPTH } from "./model/analysis-result.js";

export const EvaluatorConfigSchema = z
  .object({
    defaultLicenseView: z.enum(LICENSE_VIEWS).default(DEFAULT_LICENSE_VIEW),
    maxTreeDepth: z.number().int().positive().default(DEFAULT_MAX_TREE_DEPTH),
    minSeverity: z.enum(SEVERITIES).optional(),
    rules: z.array(z.string().min(1)).optional(),
    logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("warn"),
  })
  .strict();

export type EvaluatorConfig = Readonly<z.infer<typeof EvaluatorConfigSchema>>;

export function resolveEvaluatorConfig(input: unknown = {}): EvaluatorConfig {
  const parsed = EvaluatorConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid evaluator configuration.",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
    );
  }
  return Object.freeze(parsed.data);
}

export function loadEvaluatorConfig(filePath: string): EvaluatorConfig {
  const resolved = path.resolve(filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not read evaluator configuration "${resolved}": ${reason}`);
  }
  return resolveEvaluatorConfig(raw);
}
