export interface Identifier {
  type: string;
  namespace: string;
  name: string;
  version: string;
}

export type LicenseSource = "DECLARED" | "CONCLUDED" | "DETECTED";

export const LICENSE_SOURCES: readonly LicenseSource[] = ["DECLARED", "CONCLUDED", "DETECTED"];

export interface TextLocation {
  path: string;
  startLine: number;
  endLine: number;
}

export interface LicenseFinding {
  license: string;
  location: TextLocation;
}

export interface ResolvedLicense {
  license: string;
  source: LicenseSource;
}

export type PackageLinkage = "DYNAMIC" | "STATIC" | "PROJECT_DYNAMIC" | "PROJECT_STATIC";

export interface RemoteArtifact {
  url: string;
  hash?: string;
}

export interface VcsInfo {
  type: string;
  url: string;
  revision: string;
  path?: string;
}

export interface Package {
  id: Identifier;
  declaredLicenses: string[];
  concludedLicense?: string;
  description?: string;
  homepageUrl?: string;
  binaryArtifact?: RemoteArtifact;
  sourceArtifact?: RemoteArtifact;
  vcs?: VcsInfo;
  linkage?: PackageLinkage;
}

export interface PackageReference {
  id: Identifier;
  linkage?: PackageLinkage;
  dependencies: PackageReference[];
}

export interface Scope {
  name: string;
  dependencies: PackageReference[];
}

export interface Project {
  id: Identifier;
  definitionFilePath?: string;
  declaredLicenses: string[];
  vcs?: VcsInfo;
  scopes: Scope[];
}

export interface PackageCuration {
  id: Identifier;
  comment?: string;
  concludedLicense?: string;
  declaredLicenses?: string[];
  linkage?: PackageLinkage;
}

export interface ScanResult {
  id: Identifier;
  licenseFindings: LicenseFinding[];
}

export interface AnalysisResult {
  projects: Project[];
  packages: Package[];
  curations: PackageCuration[];
  scanResults: ScanResult[];
}
