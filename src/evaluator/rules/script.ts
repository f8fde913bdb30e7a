import fs from "node:fs";
import path from "node:path";
import { Node, SyntaxKind, type CallExpression, type ObjectLiteralExpression } from "ts-morph";
import { RuleDefinitionError } from "../../errors.js";
import { createScriptSourceFile, getSyntaxProblems } from "../../utils/ast-project.js";
import { getLiteralValue, getNodeLine } from "../../utils/ast.js";
import { isLicenseView, LICENSE_VIEWS, type LicenseView } from "../license-view.js";
import { allOf, anyOf, not, type RuleMatcher } from "../matcher.js";
import type { PackageRule } from "../package-rule.js";
import {
  SEVERITIES,
  type RuleDefinition,
  type RuleTarget,
  type Severity,
  type ViolationTrigger,
} from "../types.js";
import {
  createDefaultAtomRegistry,
  isLicenseSource,
  type AtomArgument,
  type AtomDefinition,
  type AtomParam,
  type AtomRegistry,
} from "./atoms.js";

export interface CompileRuleScriptOptions {
  registry?: AtomRegistry;
}

type MatcherFactory = (context: PackageRule) => RuleMatcher;

const RULE_TARGETS: readonly RuleTarget[] = ["package", "dependency"];
const VIOLATION_TRIGGERS: readonly ViolationTrigger[] = ["matched", "unmatched"];
const RULE_PROPERTIES = ["target", "severity", "violateWhen", "message", "howToFix", "when"];

/**
 * Compiles a rule script into rule definitions. A script is TypeScript source
 * made of top-level calls only:
 *
 * ```ts
 * rule("NO_STATIC_GPL", {
 *   severity: "error",
 *   message: "{id} links a GPL licensed dependency statically.",
 *   when: isStaticallyLinked() && hasLicense("GPL-*"),
 * });
 *
 * licenseRule("NO_UNKNOWN_REFS", "CONCLUDED_OR_REST", {
 *   target: "package",
 *   message: "{id} is licensed under {license} ({source}).",
 *   when: isLicenseRef(),
 * });
 * ```
 *
 * `when` accepts `&&`, `||`, `!`, parentheses and calls of registered atoms
 * with literal arguments. Every problem is reported as a RuleDefinitionError
 * before anything is evaluated.
 */
export function compileRuleScript(
  source: string,
  fileName = "rules.ts",
  options: CompileRuleScriptOptions = {},
): RuleDefinition[] {
  const registry = options.registry ?? createDefaultAtomRegistry();
  const sourceFile = createScriptSourceFile(source, fileName);

  const problems = getSyntaxProblems(sourceFile);
  if (problems.length > 0) {
    const [first] = problems;
    throw new RuleDefinitionError(first.message, { file: fileName, line: first.line });
  }

  const compiler = new ScriptCompiler(fileName, registry);
  const rules: RuleDefinition[] = [];
  const names = new Set<string>();

  for (const statement of sourceFile.getStatements()) {
    if (Node.isEmptyStatement(statement)) {
      continue;
    }
    const rule = compiler.compileStatement(statement);
    if (names.has(rule.name)) {
      throw compiler.error(`Duplicate rule name "${rule.name}".`, statement);
    }
    names.add(rule.name);
    rules.push(rule);
  }

  return rules;
}

export function loadRuleScript(
  filePath: string,
  options: CompileRuleScriptOptions = {},
): RuleDefinition[] {
  const resolved = path.resolve(filePath);
  let source: string;
  try {
    source = fs.readFileSync(resolved, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RuleDefinitionError(`Could not read rule script "${resolved}": ${reason}`);
  }
  return compileRuleScript(source, resolved, options);
}

class ScriptCompiler {
  constructor(
    private readonly fileName: string,
    private readonly registry: AtomRegistry,
  ) {}

  error(message: string, node: Node): RuleDefinitionError {
    return new RuleDefinitionError(message, { file: this.fileName, line: getNodeLine(node) });
  }

  compileStatement(statement: Node): RuleDefinition {
    const call = Node.isExpressionStatement(statement) ? statement.getExpression() : undefined;
    if (!call || !Node.isCallExpression(call)) {
      throw this.error(
        "Only rule(...) and licenseRule(...) calls are allowed at the top level.",
        statement,
      );
    }

    const callee = call.getExpression().getText();
    if (callee === "rule") {
      const [nameNode, body] = this.expectArguments(call, 2);
      return this.compileRule(this.ruleName(nameNode), undefined, body);
    }
    if (callee === "licenseRule") {
      const [nameNode, viewNode, body] = this.expectArguments(call, 3);
      return this.compileRule(this.ruleName(nameNode), this.licenseView(viewNode), body);
    }
    throw this.error(`Unknown rule function "${callee}". Expected rule or licenseRule.`, call);
  }

  private expectArguments(call: CallExpression, count: number): Node[] {
    const args = call.getArguments();
    if (args.length !== count) {
      throw this.error(
        `${call.getExpression().getText()}() expects ${count} arguments, got ${args.length}.`,
        call,
      );
    }
    return args;
  }

  private ruleName(node: Node): string {
    const value = getLiteralValue(node);
    if (typeof value !== "string" || value.trim().length === 0) {
      throw this.error("The rule name must be a non-empty string literal.", node);
    }
    return value.trim();
  }

  private licenseView(node: Node): LicenseView {
    const value = getLiteralValue(node);
    if (typeof value !== "string" || !isLicenseView(value)) {
      throw this.error(
        `Unknown license view ${node.getText()}. Expected one of: ${LICENSE_VIEWS.join(", ")}.`,
        node,
      );
    }
    return value;
  }

  private compileRule(
    name: string,
    licenseView: LicenseView | undefined,
    body: Node,
  ): RuleDefinition {
    if (!Node.isObjectLiteralExpression(body)) {
      throw this.error(`The body of rule "${name}" must be an object literal.`, body);
    }
    const properties = this.readProperties(body);

    const when = properties.get("when");
    if (!when) {
      throw this.error(`Rule "${name}" has no "when" condition.`, body);
    }
    const message = this.stringProperty(properties, "message");
    if (message === undefined) {
      throw this.error(`Rule "${name}" has no message.`, body);
    }
    const howToFix = this.stringProperty(properties, "howToFix");
    const severity: Severity = this.choiceProperty(properties, "severity", SEVERITIES) ?? "error";
    const violateWhen: ViolationTrigger =
      this.choiceProperty(properties, "violateWhen", VIOLATION_TRIGGERS) ?? "matched";
    const target: RuleTarget = this.choiceProperty(properties, "target", RULE_TARGETS) ?? "dependency";
    const matcher = this.compileExpression(when);

    const common = {
      name,
      violateWhen,
      severity,
      message,
      ...(howToFix !== undefined ? { howToFix } : {}),
      ...(licenseView ? { licenseView } : {}),
    };
    return target === "package"
      ? { ...common, target: "package", matcher }
      : { ...common, target: "dependency", matcher };
  }

  private readProperties(body: ObjectLiteralExpression): Map<string, Node> {
    const properties = new Map<string, Node>();
    for (const property of body.getProperties()) {
      if (!Node.isPropertyAssignment(property)) {
        throw this.error("Rule properties must be plain `key: value` assignments.", property);
      }
      const key = property.getName();
      if (!RULE_PROPERTIES.includes(key)) {
        throw this.error(
          `Unknown rule property "${key}". Expected one of: ${RULE_PROPERTIES.join(", ")}.`,
          property,
        );
      }
      if (properties.has(key)) {
        throw this.error(`Duplicate rule property "${key}".`, property);
      }
      const initializer = property.getInitializer();
      if (!initializer) {
        throw this.error(`Rule property "${key}" has no value.`, property);
      }
      properties.set(key, initializer);
    }
    return properties;
  }

  private stringProperty(properties: Map<string, Node>, key: string): string | undefined {
    const node = properties.get(key);
    if (!node) {
      return undefined;
    }
    const value = getLiteralValue(node);
    if (typeof value !== "string") {
      throw this.error(`Rule property "${key}" must be a string literal.`, node);
    }
    return value;
  }

  private choiceProperty<T extends string>(
    properties: Map<string, Node>,
    key: string,
    allowed: readonly T[],
  ): T | undefined {
    const node = properties.get(key);
    if (!node) {
      return undefined;
    }
    const value = getLiteralValue(node);
    const choice = allowed.find((candidate) => candidate === value);
    if (choice === undefined) {
      throw this.error(
        `Invalid ${key} ${node.getText()}. Expected one of: ${allowed.join(", ")}.`,
        node,
      );
    }
    return choice;
  }

  private compileExpression(node: Node): MatcherFactory {
    if (Node.isParenthesizedExpression(node)) {
      return this.compileExpression(node.getExpression());
    }

    if (Node.isBinaryExpression(node)) {
      const operator = node.getOperatorToken().getKind();
      if (operator !== SyntaxKind.AmpersandAmpersandToken && operator !== SyntaxKind.BarBarToken) {
        throw this.error(
          `Unsupported operator "${node.getOperatorToken().getText()}". Use &&, || or !.`,
          node,
        );
      }
      const left = this.compileExpression(node.getLeft());
      const right = this.compileExpression(node.getRight());
      return operator === SyntaxKind.AmpersandAmpersandToken
        ? (context) => allOf(left(context), right(context))
        : (context) => anyOf(left(context), right(context));
    }

    if (Node.isPrefixUnaryExpression(node)) {
      if (node.getOperatorToken() !== SyntaxKind.ExclamationToken) {
        throw this.error(`Unsupported expression "${node.getText()}".`, node);
      }
      const operand = this.compileExpression(node.getOperand());
      return (context) => not(operand(context));
    }

    if (Node.isCallExpression(node)) {
      return this.compileAtom(node);
    }

    throw this.error(
      `Unsupported expression "${node.getText()}". Conditions combine atom calls with &&, || and !.`,
      node,
    );
  }

  private compileAtom(call: CallExpression): MatcherFactory {
    const callee = call.getExpression();
    if (!Node.isIdentifier(callee)) {
      throw this.error(`Unsupported call "${callee.getText()}".`, call);
    }
    const atom = this.registry.get(callee.getText());
    if (!atom) {
      throw this.error(
        `Unknown atom "${callee.getText()}". Available atoms: ${this.registry.names().join(", ")}.`,
        call,
      );
    }

    const argNodes = call.getArguments();
    const required = atom.params.filter((param) => !param.optional).length;
    if (argNodes.length < required || argNodes.length > atom.params.length) {
      const expected =
        required === atom.params.length ? `${required}` : `${required} to ${atom.params.length}`;
      throw this.error(
        `${atom.name}() expects ${expected} argument(s), got ${argNodes.length}.`,
        call,
      );
    }

    const args = argNodes.map((argNode, index) =>
      this.compileArgument(atom, atom.params[index], argNode),
    );
    return (context) => atom.create(context, args);
  }

  private compileArgument(atom: AtomDefinition, param: AtomParam, node: Node): AtomArgument {
    const value = getLiteralValue(node);
    const where = `argument "${param.name}" of ${atom.name}()`;
    if (value === undefined) {
      throw this.error(`The ${where} must be a literal.`, node);
    }

    switch (param.kind) {
      case "string":
      case "number":
      case "boolean":
        if (typeof value !== param.kind) {
          throw this.error(`The ${where} must be a ${param.kind}.`, node);
        }
        return value;
      case "view":
        if (typeof value !== "string" || !isLicenseView(value)) {
          throw this.error(
            `Unknown license view ${node.getText()} in ${where}. Expected one of: ${LICENSE_VIEWS.join(", ")}.`,
            node,
          );
        }
        return value;
      case "source":
        if (typeof value !== "string" || !isLicenseSource(value)) {
          throw this.error(`Unknown license source ${node.getText()} in ${where}.`, node);
        }
        return value;
    }
  }
}
