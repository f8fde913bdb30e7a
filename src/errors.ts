export interface SourcePosition {
  file: string;
  line: number;
}

/**
 * Raised while loading rule definitions. Always fatal: nothing is evaluated
 * once a rule script fails to compile.
 */
export class RuleDefinitionError extends Error {
  readonly position: SourcePosition | undefined;

  constructor(message: string, position?: SourcePosition) {
    super(position ? `${position.file}:${position.line}: ${message}` : message);
    this.name = "RuleDefinitionError";
    this.position = position;
  }
}

/**
 * Raised by a matcher that needs a context field the rule context does not
 * carry, such as the enclosing project of a package-level context.
 */
export class MissingContextError extends Error {
  readonly field: string;

  constructor(field: string, message?: string) {
    super(message ?? `The rule context has no ${field}.`);
    this.name = "MissingContextError";
    this.field = field;
  }
}

export class AnalysisResultError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((issue) => `- ${issue}`).join("\n")}` : message);
    this.name = "AnalysisResultError";
    this.issues = issues;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((issue) => `- ${issue}`).join("\n")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
