import { identifierToString, matchesPattern } from "../model/identifier.js";
import type {
  Identifier,
  PackageLinkage,
  PackageReference,
  Project,
  Scope,
} from "../model/types.js";
import { createMatcher, type RuleMatcher } from "./matcher.js";
import { PackageRule, type PackageRuleInit } from "./package-rule.js";

export interface DependencyRuleInit extends PackageRuleInit {
  dependency: PackageReference;
  ancestors: readonly Identifier[];
  level: number;
  scope: Scope;
  project: Project;
}

const STATIC_LINKAGES: readonly PackageLinkage[] = ["STATIC", "PROJECT_STATIC"];

/**
 * Context for one node of a dependency tree: the package together with the
 * edge that reached it and its position below a project scope.
 */
export class DependencyRule extends PackageRule {
  readonly dependency: PackageReference;
  readonly ancestors: readonly Identifier[];
  readonly level: number;
  readonly scope: Scope;
  readonly project: Project;

  constructor(init: DependencyRuleInit) {
    super(init);
    this.dependency = init.dependency;
    this.ancestors = [...init.ancestors];
    this.level = init.level;
    this.scope = init.scope;
    this.project = init.project;
  }

  isAtTreeLevel(level: number): RuleMatcher {
    return createMatcher(`isAtTreeLevel(${level})`, () => this.level === level);
  }

  isProjectFromOrg(org: string): RuleMatcher {
    return createMatcher(`isProjectFromOrg(${org})`, () => this.project.id.namespace === org);
  }

  // The linkage recorded on the edge wins over the package's own.
  isStaticallyLinked(): RuleMatcher {
    return createMatcher("isStaticallyLinked()", () => {
      const linkage = this.dependency.linkage ?? this.pkg.linkage;
      return linkage !== undefined && STATIC_LINKAGES.includes(linkage);
    });
  }

  isInScope(pattern: string): RuleMatcher {
    return createMatcher(`isInScope(${pattern})`, () => matchesPattern(this.scope.name, pattern));
  }

  hasAncestor(predicate: (ancestor: Identifier) => boolean, description: string): RuleMatcher {
    return createMatcher(`hasAncestor(${description})`, () => this.ancestors.some(predicate));
  }

  hasAncestorWithId(pattern: string): RuleMatcher {
    return this.hasAncestor(
      (ancestor) => matchesPattern(identifierToString(ancestor), pattern),
      pattern,
    );
  }
}
