import { MissingContextError } from "../../errors.js";
import { LICENSE_SOURCES, type LicenseSource } from "../../model/types.js";
import { DependencyRule } from "../dependency-rule.js";
import { isLicenseView, type LicenseView } from "../license-view.js";
import { createMatcher, type RuleMatcher } from "../matcher.js";
import type { PackageRule } from "../package-rule.js";

export type AtomArgument = string | number | boolean;

export type AtomParamKind = "string" | "number" | "boolean" | "view" | "source";

export interface AtomParam {
  name: string;
  kind: AtomParamKind;
  optional?: boolean;
}

export interface AtomDefinition {
  name: string;
  params: readonly AtomParam[];
  create(context: PackageRule, args: readonly AtomArgument[]): RuleMatcher;
}

/**
 * Name to factory mapping for the atoms a rule script may call. Nothing is
 * discovered implicitly: atoms exist once they are registered.
 */
export class AtomRegistry {
  private readonly atoms = new Map<string, AtomDefinition>();

  register(definition: AtomDefinition): this {
    if (this.atoms.has(definition.name)) {
      throw new Error(`Atom "${definition.name}" is already registered.`);
    }
    this.atoms.set(definition.name, definition);
    return this;
  }

  get(name: string): AtomDefinition | undefined {
    return this.atoms.get(name);
  }

  names(): string[] {
    return [...this.atoms.keys()].sort();
  }
}

export function isLicenseSource(value: string): value is LicenseSource {
  return LICENSE_SOURCES.some((source) => source === value);
}

function stringArg(args: readonly AtomArgument[], index: number): string {
  const value = args[index];
  if (typeof value !== "string") {
    throw new Error(`Expected a string at argument ${index + 1}.`);
  }
  return value;
}

function numberArg(args: readonly AtomArgument[], index: number): number {
  const value = args[index];
  if (typeof value !== "number") {
    throw new Error(`Expected a number at argument ${index + 1}.`);
  }
  return value;
}

function optionalViewArg(args: readonly AtomArgument[], index: number): LicenseView | undefined {
  const value = args[index];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string" || !isLicenseView(value)) {
    throw new Error(`Expected a license view at argument ${index + 1}.`);
  }
  return value;
}

function sourceArg(args: readonly AtomArgument[], index: number): LicenseSource {
  const value = args[index];
  if (typeof value !== "string" || !isLicenseSource(value)) {
    throw new Error(`Expected a license source at argument ${index + 1}.`);
  }
  return value;
}

/**
 * Wraps an atom that needs the tree position of a dependency. Used on a
 * package context, its matcher fails with a MissingContextError when asked.
 */
function treeAtom(
  name: string,
  params: readonly AtomParam[],
  build: (context: DependencyRule, args: readonly AtomArgument[]) => RuleMatcher,
): AtomDefinition {
  return {
    name,
    params,
    create(context, args) {
      if (context instanceof DependencyRule) {
        return build(context, args);
      }
      return createMatcher(`${name}()`, () => {
        throw new MissingContextError(
          "dependency",
          `Rule "${context.name}" uses ${name}() on a package without a dependency tree position.`,
        );
      });
    },
  };
}

export function registerDefaultAtoms(registry: AtomRegistry): AtomRegistry {
  return registry
    .register({
      name: "isType",
      params: [{ name: "type", kind: "string" }],
      create: (context, args) => context.isType(stringArg(args, 0)),
    })
    .register({
      name: "isFromOrg",
      params: [{ name: "org", kind: "string" }],
      create: (context, args) => context.isFromOrg(stringArg(args, 0)),
    })
    .register({
      name: "hasLicense",
      params: [
        { name: "pattern", kind: "string" },
        { name: "view", kind: "view", optional: true },
      ],
      create: (context, args) => context.hasLicense(stringArg(args, 0), optionalViewArg(args, 1)),
    })
    .register({
      name: "hasAnyLicense",
      params: [{ name: "view", kind: "view", optional: true }],
      create: (context, args) => context.hasAnyLicense(optionalViewArg(args, 0)),
    })
    .register({
      name: "hasConcludedLicense",
      params: [],
      create: (context) => context.hasConcludedLicense(),
    })
    .register({
      name: "isLicense",
      params: [{ name: "pattern", kind: "string" }],
      create: (context, args) => context.isLicense(stringArg(args, 0)),
    })
    .register({
      name: "isLicenseSource",
      params: [{ name: "source", kind: "source" }],
      create: (context, args) => context.isLicenseSource(sourceArg(args, 0)),
    })
    .register({
      name: "isLicenseRef",
      params: [],
      create: (context) => context.isLicenseRef(),
    })
    .register(
      treeAtom("isAtTreeLevel", [{ name: "level", kind: "number" }], (context, args) =>
        context.isAtTreeLevel(numberArg(args, 0)),
      ),
    )
    .register(
      treeAtom("isProjectFromOrg", [{ name: "org", kind: "string" }], (context, args) =>
        context.isProjectFromOrg(stringArg(args, 0)),
      ),
    )
    .register(treeAtom("isStaticallyLinked", [], (context) => context.isStaticallyLinked()))
    .register(
      treeAtom("isInScope", [{ name: "pattern", kind: "string" }], (context, args) =>
        context.isInScope(stringArg(args, 0)),
      ),
    )
    .register(
      treeAtom("hasAncestorWithId", [{ name: "pattern", kind: "string" }], (context, args) =>
        context.hasAncestorWithId(stringArg(args, 0)),
      ),
    );
}

export function createDefaultAtomRegistry(): AtomRegistry {
  return registerDefaultAtoms(new AtomRegistry());
}
