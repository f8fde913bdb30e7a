import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { AnalysisResultError } from "../errors.js";
import { identifierToString, parseIdentifier } from "./identifier.js";
import type {
  AnalysisResult,
  Identifier,
  PackageLinkage,
  PackageReference,
} from "./types.js";

export const DEFAULT_MAX_TREE_DEPTH = 256;

export interface ParseAnalysisResultOptions {
  maxTreeDepth?: number;
}

const IdentifierSchema = z.string().transform((value, ctx): Identifier => {
  const id = parseIdentifier(value);
  if (!id) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid identifier "${value}". Expected "Type:namespace:name:version".`,
    });
    return z.NEVER;
  }
  return id;
});

const LinkageSchema = z.enum(["DYNAMIC", "STATIC", "PROJECT_DYNAMIC", "PROJECT_STATIC"]);

const RemoteArtifactSchema = z.object({
  url: z.string(),
  hash: z.string().optional(),
});

const VcsInfoSchema = z.object({
  type: z.string(),
  url: z.string(),
  revision: z.string(),
  path: z.string().optional(),
});

interface PackageReferenceInput {
  id: string;
  linkage?: PackageLinkage;
  dependencies?: PackageReferenceInput[];
}

const PackageReferenceSchema: z.ZodType<PackageReference, z.ZodTypeDef, PackageReferenceInput> =
  z.lazy(() =>
    z.object({
      id: IdentifierSchema,
      linkage: LinkageSchema.optional(),
      dependencies: z.array(PackageReferenceSchema).default([]),
    }),
  );

const ScopeSchema = z.object({
  name: z.string().min(1),
  dependencies: z.array(PackageReferenceSchema).default([]),
});

const ProjectSchema = z.object({
  id: IdentifierSchema,
  definitionFilePath: z.string().optional(),
  declaredLicenses: z.array(z.string()).default([]),
  vcs: VcsInfoSchema.optional(),
  scopes: z.array(ScopeSchema).default([]),
});

const PackageSchema = z.object({
  id: IdentifierSchema,
  declaredLicenses: z.array(z.string()).default([]),
  concludedLicense: z.string().optional(),
  description: z.string().optional(),
  homepageUrl: z.string().optional(),
  binaryArtifact: RemoteArtifactSchema.optional(),
  sourceArtifact: RemoteArtifactSchema.optional(),
  vcs: VcsInfoSchema.optional(),
  linkage: LinkageSchema.optional(),
});

const CurationSchema = z.object({
  id: IdentifierSchema,
  comment: z.string().optional(),
  concludedLicense: z.string().optional(),
  declaredLicenses: z.array(z.string()).optional(),
  linkage: LinkageSchema.optional(),
});

const LicenseFindingSchema = z.object({
  license: z.string(),
  location: z.object({
    path: z.string(),
    startLine: z.number().int().nonnegative(),
    endLine: z.number().int().nonnegative(),
  }),
});

const ScanResultSchema = z.object({
  id: IdentifierSchema,
  licenseFindings: z.array(LicenseFindingSchema).default([]),
});

export const AnalysisResultSchema = z.object({
  projects: z.array(ProjectSchema).default([]),
  packages: z.array(PackageSchema).default([]),
  curations: z.array(CurationSchema).default([]),
  scanResults: z.array(ScanResultSchema).default([]),
});

export function parseAnalysisResult(
  input: unknown,
  options: ParseAnalysisResultOptions = {},
): AnalysisResult {
  const parsed = AnalysisResultSchema.safeParse(input);
  if (!parsed.success) {
    throw new AnalysisResultError(
      "Invalid analysis result.",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
    );
  }

  const result: AnalysisResult = parsed.data;
  assertTreeDepth(result, options.maxTreeDepth ?? DEFAULT_MAX_TREE_DEPTH);
  assertReferencesResolve(result);
  return result;
}

export function loadAnalysisResult(
  filePath: string,
  options: ParseAnalysisResultOptions = {},
): AnalysisResult {
  const resolved = path.resolve(filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AnalysisResultError(`Could not read analysis result "${resolved}": ${reason}`);
  }
  return parseAnalysisResult(raw, options);
}

function assertTreeDepth(result: AnalysisResult, maxTreeDepth: number): void {
  const issues: string[] = [];

  for (const project of result.projects) {
    for (const scope of project.scopes) {
      const pending: Array<{ ref: PackageReference; level: number }> = scope.dependencies.map(
        (ref) => ({ ref, level: 0 }),
      );
      while (pending.length > 0) {
        const next = pending.pop();
        if (!next) {
          break;
        }
        if (next.level >= maxTreeDepth) {
          issues.push(
            `${identifierToString(project.id)} / ${scope.name}: ${identifierToString(next.ref.id)} is nested deeper than ${maxTreeDepth} levels.`,
          );
          break;
        }
        for (const child of next.ref.dependencies) {
          pending.push({ ref: child, level: next.level + 1 });
        }
      }
    }
  }

  if (issues.length > 0) {
    throw new AnalysisResultError("Dependency tree exceeds the maximum depth.", issues);
  }
}

function assertReferencesResolve(result: AnalysisResult): void {
  const known = new Set<string>([
    ...result.packages.map((pkg) => identifierToString(pkg.id)),
    ...result.projects.map((project) => identifierToString(project.id)),
  ]);
  const dangling = new Set<string>();

  const visit = (refs: PackageReference[]): void => {
    for (const ref of refs) {
      const key = identifierToString(ref.id);
      if (!known.has(key)) {
        dangling.add(key);
      }
      visit(ref.dependencies);
    }
  };

  for (const project of result.projects) {
    for (const scope of project.scopes) {
      visit(scope.dependencies);
    }
  }

  if (dangling.size > 0) {
    throw new AnalysisResultError(
      "Dependency references point to unknown packages.",
      [...dangling].sort(),
    );
  }
}
