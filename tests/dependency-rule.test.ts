import { describe, expect, it } from "vitest";
import { DependencyRule } from "../src/evaluator/dependency-rule.js";
import { allOf, anyOf, not } from "../src/evaluator/matcher.js";
import { PackageRule } from "../src/evaluator/package-rule.js";
import { MissingContextError } from "../src/errors.js";
import type { Package, PackageReference } from "../src/model/types.js";
import {
  createRuleSet,
  detectedLicenses,
  id,
  packageDynamicallyLinked,
  packageRefDynamicallyLinked,
  packageRefStaticallyLinked,
  packageStaticallyLinked,
  packageWithOnlyDeclaredLicense,
  packageWithoutLicense,
  projectIncluded,
  ref,
  scopeIncluded,
} from "./test-data.js";

const ruleSet = createRuleSet();

function createRule(
  pkg: Package,
  dependency: PackageReference,
  overrides: Partial<{ level: number; ancestors: PackageReference["id"][] }> = {},
): DependencyRule {
  return new DependencyRule({
    ruleSet,
    name: "test",
    pkg,
    curations: [],
    detectedLicenses: [],
    dependency,
    ancestors: overrides.ancestors ?? [],
    level: overrides.level ?? 0,
    scope: scopeIncluded,
    project: projectIncluded,
  });
}

const toReference = (pkg: Package): PackageReference => ({ id: pkg.id, dependencies: [] });

describe("isAtTreeLevel()", () => {
  it("returns true if the dependency is at the expected tree level", () => {
    const rule = createRule(packageWithoutLicense, toReference(packageWithoutLicense));
    expect(rule.isAtTreeLevel(0).matches()).toBe(true);
  });

  it("returns false if the dependency is not at the expected tree level", () => {
    const rule = createRule(packageWithoutLicense, toReference(packageWithoutLicense));
    expect(rule.isAtTreeLevel(1).matches()).toBe(false);
  });
});

describe("isProjectFromOrg()", () => {
  it("returns true if the project is from org", () => {
    const rule = createRule(packageWithoutLicense, toReference(packageWithoutLicense));
    expect(rule.isProjectFromOrg("here").matches()).toBe(true);
  });

  it("returns false if the project is not from org", () => {
    const rule = createRule(packageWithoutLicense, toReference(packageWithoutLicense));
    expect(rule.isProjectFromOrg("unknown").matches()).toBe(false);
  });
});

describe("isStaticallyLinked()", () => {
  it("returns true if the dependency is statically linked", () => {
    const rule = createRule(packageStaticallyLinked, packageRefStaticallyLinked);
    expect(rule.isStaticallyLinked().matches()).toBe(true);
  });

  it("returns false if the dependency is not statically linked", () => {
    const rule = createRule(packageDynamicallyLinked, packageRefDynamicallyLinked);
    expect(rule.isStaticallyLinked().matches()).toBe(false);
  });

  it("falls back to the package linkage when the edge has none", () => {
    const pkg: Package = { ...packageStaticallyLinked, linkage: "PROJECT_STATIC" };
    expect(createRule(pkg, toReference(pkg)).isStaticallyLinked().matches()).toBe(true);
    expect(createRule(packageWithoutLicense, toReference(packageWithoutLicense)).isStaticallyLinked().matches()).toBe(false);
  });

  it("prefers the edge linkage over the package linkage", () => {
    const pkg: Package = { ...packageStaticallyLinked, linkage: "STATIC" };
    const rule = createRule(pkg, { ...toReference(pkg), linkage: "DYNAMIC" });
    expect(rule.isStaticallyLinked().matches()).toBe(false);
  });
});

describe("isInScope()", () => {
  it("matches the enclosing scope name with wildcards", () => {
    const rule = createRule(packageWithoutLicense, toReference(packageWithoutLicense));
    expect(rule.isInScope("compile").matches()).toBe(true);
    expect(rule.isInScope("comp*").matches()).toBe(true);
    expect(rule.isInScope("test").matches()).toBe(false);
  });
});

describe("hasAncestorWithId()", () => {
  it("checks the ancestor chain only", () => {
    const rule = createRule(packageWithoutLicense, toReference(packageWithoutLicense), {
      level: 2,
      ancestors: [id("Maven:org.example:parent:1.0"), id("NPM::left-pad:1.3.0")],
    });

    expect(rule.hasAncestorWithId("NPM::left-pad:*").matches()).toBe(true);
    expect(rule.hasAncestorWithId("Maven:org.example:parent:1.0").matches()).toBe(true);
    expect(rule.hasAncestorWithId("Maven:org.example:package-without-license:1.0").matches()).toBe(false);
    expect(rule.hasAncestor((ancestor) => ancestor.type === "Gradle", "gradle").matches()).toBe(false);
  });
});

describe("package atoms", () => {
  it("tests the identifier type and namespace", () => {
    const rule = createRule(packageWithoutLicense, toReference(packageWithoutLicense));
    expect(rule.isType("Maven").matches()).toBe(true);
    expect(rule.isType("NPM").matches()).toBe(false);
    expect(rule.isFromOrg("org.example").matches()).toBe(true);
    expect(rule.isFromOrg("here").matches()).toBe(false);
  });

  it("tests licenses under the requested view", () => {
    const rule = new PackageRule({
      ruleSet,
      name: "test",
      pkg: packageWithOnlyDeclaredLicense,
      detectedLicenses,
    });

    expect(rule.hasLicense("MIT").matches()).toBe(true);
    expect(rule.hasLicense("Apache-*").matches()).toBe(true);
    expect(rule.hasLicense("LicenseRef-a").matches()).toBe(false);
    expect(rule.hasLicense("LicenseRef-a", "ONLY_DETECTED").matches()).toBe(true);
    expect(rule.hasAnyLicense("ONLY_CONCLUDED").matches()).toBe(false);
    expect(rule.hasConcludedLicense().matches()).toBe(false);
  });

  it("ignores NOASSERTION but accepts unlisted identifiers as concluded licenses", () => {
    const concluded = (concludedLicense: string): PackageRule =>
      new PackageRule({
        ruleSet,
        name: "test",
        pkg: { ...packageWithoutLicense, concludedLicense },
      });

    expect(concluded("NOASSERTION").hasConcludedLicense().matches()).toBe(false);
    expect(concluded("Proprietary").hasConcludedLicense().matches()).toBe(true);
    expect(concluded("MIT AND (").hasConcludedLicense().matches()).toBe(false);
  });

  it("tests the bound license of a license rule context", () => {
    const rule = new PackageRule({
      ruleSet,
      name: "test",
      pkg: packageWithOnlyDeclaredLicense,
      license: { license: "LicenseRef-a", source: "DETECTED" },
    });

    expect(rule.isLicense("LicenseRef-*").matches()).toBe(true);
    expect(rule.isLicenseSource("DETECTED").matches()).toBe(true);
    expect(rule.isLicenseSource("DECLARED").matches()).toBe(false);
    expect(rule.isLicenseRef().matches()).toBe(true);
  });

  it("fails license atoms on a context without a bound license", () => {
    const rule = new PackageRule({ ruleSet, name: "no-license", pkg: packageWithoutLicense });
    const matcher = rule.isLicense("MIT");

    expect(() => matcher.matches()).toThrow(MissingContextError);
    expect(() => matcher.matches()).toThrow('Rule "no-license" uses a license atom outside of a license rule.');
  });
});

describe("matcher combinators", () => {
  const rule = createRule(packageStaticallyLinked, packageRefStaticallyLinked);

  it("combines atoms with and, or and not", () => {
    expect(allOf(rule.isStaticallyLinked(), rule.isAtTreeLevel(0)).matches()).toBe(true);
    expect(allOf(rule.isStaticallyLinked(), rule.isAtTreeLevel(1)).matches()).toBe(false);
    expect(anyOf(rule.isAtTreeLevel(3), rule.isProjectFromOrg("here")).matches()).toBe(true);
    expect(not(rule.isStaticallyLinked()).matches()).toBe(false);
  });

  it("short-circuits evaluation", () => {
    const unbound = new PackageRule({ ruleSet, name: "test", pkg: packageStaticallyLinked });
    expect(allOf(rule.isAtTreeLevel(5), unbound.isLicense("MIT")).matches()).toBe(false);
    expect(anyOf(rule.isAtTreeLevel(0), unbound.isLicense("MIT")).matches()).toBe(true);
  });

  it("describes the combined expression and evaluates repeatably", () => {
    const matcher = anyOf(not(rule.isAtTreeLevel(1)), rule.isInScope("test"));
    expect(matcher.description).toBe("(NOT isAtTreeLevel(1) OR isInScope(test))");
    expect(matcher.matches()).toBe(true);
    expect(matcher.matches()).toBe(true);
  });

  it("copies the ancestor chain it is given", () => {
    const ancestors = [id("Maven:org.example:parent:1.0")];
    const context = createRule(packageWithoutLicense, ref("Maven:org.example:package-without-license:1.0"), {
      ancestors,
      level: 1,
    });
    ancestors.push(id("Maven:org.example:other:1.0"));
    expect(context.ancestors).toHaveLength(1);
  });
});
