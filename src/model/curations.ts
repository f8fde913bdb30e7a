import { sameIdentifier } from "./identifier.js";
import type { Package, PackageCuration } from "./types.js";

export function curationsFor(pkg: Package, curations: PackageCuration[]): PackageCuration[] {
  return curations.filter((curation) => sameIdentifier(curation.id, pkg.id));
}

/**
 * Applies the matching curations in declaration order. A later curation
 * overrides the fields set by an earlier one; unset fields are left alone.
 */
export function applyCurations(pkg: Package, curations: PackageCuration[]): Package {
  let curated: Package = pkg;
  for (const curation of curationsFor(pkg, curations)) {
    curated = {
      ...curated,
      ...(curation.concludedLicense !== undefined
        ? { concludedLicense: curation.concludedLicense }
        : {}),
      ...(curation.declaredLicenses !== undefined
        ? { declaredLicenses: [...curation.declaredLicenses] }
        : {}),
      ...(curation.linkage !== undefined ? { linkage: curation.linkage } : {}),
    };
  }
  return curated;
}
