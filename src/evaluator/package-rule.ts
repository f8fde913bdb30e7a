import { MissingContextError } from "../errors.js";
import { matchesPattern } from "../model/identifier.js";
import type {
  LicenseFinding,
  LicenseSource,
  Package,
  PackageCuration,
  ResolvedLicense,
} from "../model/types.js";
import { isLicenseRef } from "../spdx/expression.js";
import { resolveLicenses, type LicenseView } from "./license-view.js";
import { createMatcher, type RuleMatcher } from "./matcher.js";
import type { RuleSet } from "./rule-set.js";

export interface PackageRuleInit {
  ruleSet: RuleSet;
  name: string;
  pkg: Package;
  curations?: PackageCuration[];
  detectedLicenses?: LicenseFinding[];
  license?: ResolvedLicense;
}

/**
 * Evaluation context for a single package, optionally narrowed to one of its
 * resolved licenses. Every atom returns a fresh matcher bound to this context.
 */
export class PackageRule {
  readonly ruleSet: RuleSet;
  readonly name: string;
  readonly pkg: Package;
  readonly curations: readonly PackageCuration[];
  readonly detectedLicenses: readonly LicenseFinding[];
  readonly license: ResolvedLicense | undefined;

  constructor(init: PackageRuleInit) {
    this.ruleSet = init.ruleSet;
    this.name = init.name;
    this.pkg = init.pkg;
    this.curations = init.curations ?? [];
    this.detectedLicenses = init.detectedLicenses ?? [];
    this.license = init.license;
  }

  licenses(view: LicenseView = this.ruleSet.defaultLicenseView): ResolvedLicense[] {
    return resolveLicenses(view, this.pkg, this.detectedLicenses, {
      logger: this.ruleSet.logger,
    });
  }

  isType(type: string): RuleMatcher {
    return createMatcher(`isType(${type})`, () => this.pkg.id.type === type);
  }

  isFromOrg(org: string): RuleMatcher {
    return createMatcher(`isFromOrg(${org})`, () => this.pkg.id.namespace === org);
  }

  hasLicense(pattern: string, view?: LicenseView): RuleMatcher {
    return createMatcher(`hasLicense(${pattern}${view ? `, ${view}` : ""})`, () =>
      this.licenses(view).some((entry) => matchesPattern(entry.license, pattern)),
    );
  }

  hasAnyLicense(view?: LicenseView): RuleMatcher {
    return createMatcher(`hasAnyLicense(${view ?? ""})`, () => this.licenses(view).length > 0);
  }

  hasConcludedLicense(): RuleMatcher {
    return createMatcher(
      "hasConcludedLicense()",
      () => this.licenses("ONLY_CONCLUDED").length > 0,
    );
  }

  isLicense(pattern: string): RuleMatcher {
    return createMatcher(`isLicense(${pattern})`, () =>
      matchesPattern(this.requireLicense().license, pattern),
    );
  }

  isLicenseSource(source: LicenseSource): RuleMatcher {
    return createMatcher(
      `isLicenseSource(${source})`,
      () => this.requireLicense().source === source,
    );
  }

  isLicenseRef(): RuleMatcher {
    return createMatcher("isLicenseRef()", () => isLicenseRef(this.requireLicense().license));
  }

  private requireLicense(): ResolvedLicense {
    if (!this.license) {
      throw new MissingContextError(
        "license",
        `Rule "${this.name}" uses a license atom outside of a license rule.`,
      );
    }
    return this.license;
  }
}
