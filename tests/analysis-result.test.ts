import { describe, expect, it } from "vitest";
import { AnalysisResultError } from "../src/errors.js";
import { loadAnalysisResult, parseAnalysisResult } from "../src/model/analysis-result.js";

function parseError(input: unknown, maxTreeDepth?: number): AnalysisResultError {
  try {
    parseAnalysisResult(input, { maxTreeDepth });
  } catch (error) {
    if (error instanceof AnalysisResultError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected the analysis result to be rejected.");
}

const chain = {
  projects: [
    {
      id: "Maven:here:app:1.0",
      scopes: [
        {
          name: "compile",
          dependencies: [
            { id: "NPM::a:1.0.0", dependencies: [{ id: "NPM::b:1.0.0", dependencies: [{ id: "NPM::c:1.0.0" }] }] },
          ],
        },
      ],
    },
  ],
  packages: [{ id: "NPM::a:1.0.0" }, { id: "NPM::b:1.0.0" }, { id: "NPM::c:1.0.0" }],
};

describe("parseAnalysisResult", () => {
  it("parses identifiers and fills in defaults", () => {
    expect(parseAnalysisResult({ packages: [{ id: "NPM::left-pad:1.3.0", extra: true }] })).toEqual({
      projects: [],
      packages: [
        {
          id: { type: "NPM", namespace: "", name: "left-pad", version: "1.3.0" },
          declaredLicenses: [],
        },
      ],
      curations: [],
      scanResults: [],
    });
  });

  it("keeps linkage and nested references", () => {
    const result = parseAnalysisResult(chain);
    const [root] = result.projects[0].scopes[0].dependencies;

    expect(root.linkage).toBeUndefined();
    expect(root.dependencies[0].dependencies[0].id.name).toBe("c");
    expect(root.dependencies[0].dependencies[0].dependencies).toEqual([]);
  });

  it("reports invalid identifiers with their path", () => {
    expect(parseError({ packages: [{ id: "left-pad" }] }).issues).toEqual([
      'packages.0.id: Invalid identifier "left-pad". Expected "Type:namespace:name:version".',
    ]);
    expect(parseError({ packages: [{ id: ":ns:name:1.0" }] }).issues).toHaveLength(1);
  });

  it("reports a non-object input at the root", () => {
    expect(parseError(null).issues).toEqual(["<root>: Expected object, received null"]);
  });

  it("rejects unknown linkage values", () => {
    const error = parseError({
      projects: [
        {
          id: "Maven:here:app:1.0",
          scopes: [{ name: "compile", dependencies: [{ id: "NPM::a:1.0.0", linkage: "EMBEDDED" }] }],
        },
      ],
      packages: [{ id: "NPM::a:1.0.0" }],
    });
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^projects\.0\.scopes\.0\.dependencies\.0\.linkage: /);
  });

  it("rejects trees deeper than the maximum depth", () => {
    const error = parseError(chain, 2);

    expect(error.message).toBe(
      "Dependency tree exceeds the maximum depth.\n- Maven:here:app:1.0 / compile: NPM::c:1.0.0 is nested deeper than 2 levels.",
    );
    expect(parseAnalysisResult(chain, { maxTreeDepth: 3 }).packages).toHaveLength(3);
  });

  it("rejects references to unknown packages", () => {
    const error = parseError({
      projects: [
        {
          id: "Maven:here:app:1.0",
          scopes: [
            {
              name: "compile",
              dependencies: [{ id: "NPM::z:1.0.0", dependencies: [{ id: "NPM::y:1.0.0" }] }, { id: "NPM::z:1.0.0" }],
            },
          ],
        },
      ],
    });

    expect(error.message).toBe("Dependency references point to unknown packages.\n- NPM::y:1.0.0\n- NPM::z:1.0.0");
  });

  it("accepts references to other projects", () => {
    const result = parseAnalysisResult({
      projects: [
        {
          id: "Gradle:org.example:app:1.0",
          scopes: [{ name: "runtimeClasspath", dependencies: [{ id: "Gradle:org.example:lib:1.0" }] }],
        },
        { id: "Gradle:org.example:lib:1.0" },
      ],
    });

    expect(result.projects).toHaveLength(2);
    expect(result.projects[1].scopes).toEqual([]);
  });
});

describe("loadAnalysisResult", () => {
  it("wraps unreadable files in an AnalysisResultError", () => {
    expect(() => loadAnalysisResult("does-not-exist/analysis-result.json")).toThrow(
      /^Could not read analysis result ".*analysis-result\.json": /,
    );
  });
});
