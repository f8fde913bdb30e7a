import type {
  Identifier,
  Package,
  PackageReference,
  Project,
  Scope,
} from "../model/types.js";
import type { RuleSet } from "./rule-set.js";

export interface DependencyNode {
  pkg: Package;
  dependency: PackageReference;
  /** Identifiers from the scope root down to, but excluding, this node. */
  ancestors: readonly Identifier[];
  level: number;
  scope: Scope;
  project: Project;
}

/**
 * Depth-first, pre-order walk over every project scope of a rule set. Each
 * iteration starts over, so the same walk can be consumed once per rule.
 */
export class DependencyWalk implements Iterable<DependencyNode> {
  constructor(private readonly ruleSet: RuleSet) {}

  *[Symbol.iterator](): Iterator<DependencyNode> {
    for (const project of this.ruleSet.projects) {
      for (const scope of project.scopes) {
        yield* this.visit(scope.dependencies, [], 0, scope, project);
      }
    }
  }

  toArray(): DependencyNode[] {
    return [...this];
  }

  private *visit(
    references: PackageReference[],
    ancestors: readonly Identifier[],
    level: number,
    scope: Scope,
    project: Project,
  ): Generator<DependencyNode> {
    for (const dependency of references) {
      yield {
        pkg: this.ruleSet.resolvePackage(dependency.id),
        dependency,
        ancestors,
        level,
        scope,
        project,
      };
      yield* this.visit(
        dependency.dependencies,
        [...ancestors, dependency.id],
        level + 1,
        scope,
        project,
      );
    }
  }
}

export function walkDependencies(ruleSet: RuleSet): DependencyWalk {
  return new DependencyWalk(ruleSet);
}
