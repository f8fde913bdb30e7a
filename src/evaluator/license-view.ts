import { identifierToString } from "../model/identifier.js";
import type { LicenseFinding, LicenseSource, Package, ResolvedLicense } from "../model/types.js";
import {
  decomposeLicenseExpression,
  isNoLicenseMarker,
  licenseLeafToString,
} from "../spdx/expression.js";
import { defaultLogger, warnOnce, type Logger } from "../utils/logger.js";

export const LICENSE_VIEWS = [
  "ALL",
  "CONCLUDED_OR_REST",
  "CONCLUDED_OR_DECLARED_OR_DETECTED",
  "CONCLUDED_OR_DETECTED",
  "ONLY_CONCLUDED",
  "ONLY_DECLARED",
  "ONLY_DETECTED",
] as const;

/**
 * Selects which license evidence of a package is taken into account and in
 * which precedence.
 */
export type LicenseView = (typeof LICENSE_VIEWS)[number];

export function isLicenseView(value: string): value is LicenseView {
  return LICENSE_VIEWS.some((view) => view === value);
}

export interface ResolveLicensesOptions {
  logger?: Logger;
}

type Evidence = () => ResolvedLicense[];

export function resolveLicenses(
  view: LicenseView,
  pkg: Package,
  detectedFindings: readonly LicenseFinding[],
  options: ResolveLicensesOptions = {},
): ResolvedLicense[] {
  const logger = options.logger ?? defaultLogger;
  const concluded: Evidence = () => concludedLicenses(pkg, logger);
  const declared: Evidence = () => tagged(pkg.declaredLicenses, "DECLARED");
  const detected: Evidence = () =>
    tagged(
      detectedFindings.map((finding) => finding.license),
      "DETECTED",
    );

  switch (view) {
    case "ALL":
      return unique([...concluded(), ...declared(), ...detected()]);
    case "CONCLUDED_OR_REST": {
      const fromConcluded = concluded();
      return unique(fromConcluded.length > 0 ? fromConcluded : [...declared(), ...detected()]);
    }
    case "CONCLUDED_OR_DECLARED_OR_DETECTED":
      return unique(firstNonEmpty(concluded, declared, detected));
    case "CONCLUDED_OR_DETECTED":
      return unique(firstNonEmpty(concluded, detected));
    case "ONLY_CONCLUDED":
      return unique(concluded());
    case "ONLY_DECLARED":
      return unique(declared());
    case "ONLY_DETECTED":
      return unique(detected());
    default:
      return assertNever(view);
  }
}

function concludedLicenses(pkg: Package, logger: Logger): ResolvedLicense[] {
  const expression = pkg.concludedLicense?.trim() ?? "";
  if (expression.length === 0) {
    return [];
  }
  const leaves = decomposeLicenseExpression(expression);
  if (!leaves) {
    warnOnce(
      logger,
      `Ignoring malformed concluded license "${expression}" of ${identifierToString(pkg.id)}.`,
    );
    return [];
  }
  // NONE and NOASSERTION mean nothing was concluded, so views fall through.
  return leaves
    .filter((leaf) => !isNoLicenseMarker(leaf.id))
    .map((leaf): ResolvedLicense => ({
      license: licenseLeafToString(leaf),
      source: "CONCLUDED",
    }));
}

function tagged(licenses: readonly string[], source: LicenseSource): ResolvedLicense[] {
  return licenses
    .map((license) => license.trim())
    .filter((license) => license.length > 0)
    .map((license) => ({ license, source }));
}

function firstNonEmpty(...candidates: Evidence[]): ResolvedLicense[] {
  for (const candidate of candidates) {
    const licenses = candidate();
    if (licenses.length > 0) {
      return licenses;
    }
  }
  return [];
}

function unique(licenses: ResolvedLicense[]): ResolvedLicense[] {
  const seen = new Set<string>();
  const result: ResolvedLicense[] = [];
  for (const entry of licenses) {
    const key = `${entry.source}|${entry.license}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(entry);
  }
  return result;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled license view: ${String(value)}`);
}
