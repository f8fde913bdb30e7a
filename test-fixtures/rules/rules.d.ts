import type { LicenseView } from "../../src/evaluator/license-view.js";
import type { RuleTarget, Severity, ViolationTrigger } from "../../src/evaluator/types.js";
import type { LicenseSource } from "../../src/model/types.js";

interface RuleBody {
  target?: RuleTarget;
  severity?: Severity;
  violateWhen?: ViolationTrigger;
  message: string;
  howToFix?: string;
  when: boolean;
}

// Globals a rule script is written against; the default atom registry.
declare global {
  function rule(name: string, body: RuleBody): void;
  function licenseRule(name: string, view: LicenseView, body: RuleBody): void;

  function isType(type: string): boolean;
  function isFromOrg(org: string): boolean;
  function hasLicense(pattern: string, view?: LicenseView): boolean;
  function hasAnyLicense(view?: LicenseView): boolean;
  function hasConcludedLicense(): boolean;
  function isLicense(pattern: string): boolean;
  function isLicenseSource(source: LicenseSource): boolean;
  function isLicenseRef(): boolean;
  function isAtTreeLevel(level: number): boolean;
  function isProjectFromOrg(org: string): boolean;
  function isStaticallyLinked(): boolean;
  function isInScope(pattern: string): boolean;
  function hasAncestorWithId(pattern: string): boolean;
}

export {};
