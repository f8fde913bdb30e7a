import { applyCurations, curationsFor } from "../model/curations.js";
import { identifierToString } from "../model/identifier.js";
import type {
  AnalysisResult,
  Identifier,
  LicenseFinding,
  Package,
  PackageCuration,
  Project,
  ResolvedLicense,
} from "../model/types.js";
import { defaultLogger, type Logger } from "../utils/logger.js";
import { resolveLicenses, type LicenseView } from "./license-view.js";

export interface RuleSetOptions {
  logger?: Logger;
  defaultLicenseView?: LicenseView;
}

export const DEFAULT_LICENSE_VIEW: LicenseView = "CONCLUDED_OR_DECLARED_OR_DETECTED";

/**
 * Read-only view over one analysis result. Rule contexts query it for
 * curated package metadata, curations and scanner findings.
 */
export class RuleSet {
  readonly result: AnalysisResult;
  readonly logger: Logger;
  readonly defaultLicenseView: LicenseView;

  private readonly packagesById = new Map<string, Package>();
  private readonly curatedById = new Map<string, Package>();
  private readonly projectsById = new Map<string, Project>();
  private readonly findingsById = new Map<string, LicenseFinding[]>();

  constructor(result: AnalysisResult, options: RuleSetOptions = {}) {
    this.result = result;
    this.logger = options.logger ?? defaultLogger;
    this.defaultLicenseView = options.defaultLicenseView ?? DEFAULT_LICENSE_VIEW;

    for (const pkg of result.packages) {
      const key = identifierToString(pkg.id);
      this.packagesById.set(key, pkg);
      this.curatedById.set(key, applyCurations(pkg, result.curations));
    }
    for (const project of result.projects) {
      this.projectsById.set(identifierToString(project.id), project);
    }
    for (const scanResult of result.scanResults) {
      const key = identifierToString(scanResult.id);
      const existing = this.findingsById.get(key) ?? [];
      this.findingsById.set(key, [...existing, ...scanResult.licenseFindings]);
    }
  }

  get projects(): Project[] {
    return this.result.projects;
  }

  /** All packages with their curations applied, in input order. */
  get packages(): Package[] {
    return this.result.packages.map((pkg) => this.curatedById.get(identifierToString(pkg.id)) ?? pkg);
  }

  getPackage(id: Identifier): Package | undefined {
    return this.packagesById.get(identifierToString(id));
  }

  getCuratedPackage(id: Identifier): Package | undefined {
    return this.curatedById.get(identifierToString(id));
  }

  getProject(id: Identifier): Project | undefined {
    return this.projectsById.get(identifierToString(id));
  }

  getCurations(id: Identifier): PackageCuration[] {
    const pkg = this.getPackage(id);
    return pkg ? curationsFor(pkg, this.result.curations) : [];
  }

  getDetectedLicenses(id: Identifier): LicenseFinding[] {
    return this.findingsById.get(identifierToString(id)) ?? [];
  }

  /**
   * Returns the curated package for a dependency reference. References to a
   * project of the same result yield a package built from that project.
   */
  resolvePackage(id: Identifier): Package {
    const curated = this.getCuratedPackage(id);
    if (curated) {
      return curated;
    }
    const project = this.getProject(id);
    if (project) {
      return {
        id: project.id,
        declaredLicenses: project.declaredLicenses,
        ...(project.vcs ? { vcs: project.vcs } : {}),
      };
    }
    throw new Error(`No package or project found for ${identifierToString(id)}.`);
  }

  resolveLicenses(pkg: Package, view: LicenseView = this.defaultLicenseView): ResolvedLicense[] {
    return resolveLicenses(view, pkg, this.getDetectedLicenses(pkg.id), { logger: this.logger });
  }
}
