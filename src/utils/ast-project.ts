import { Project, type SourceFile } from "ts-morph";

export interface SyntaxProblem {
  message: string;
  line: number;
}

export function createScriptSourceFile(source: string, fileName: string): SourceFile {
  const project = new Project({
    useInMemoryFileSystem: true,
    skipAddingFilesFromTsConfig: true,
  });
  return project.createSourceFile(fileName, source, { overwrite: true });
}

export function getSyntaxProblems(sourceFile: SourceFile): SyntaxProblem[] {
  const diagnostics = sourceFile.getProject().getProgram().getSyntacticDiagnostics(sourceFile);
  return diagnostics.map((diagnostic) => {
    const text = diagnostic.getMessageText();
    return {
      message: typeof text === "string" ? text : text.getMessageText(),
      line: diagnostic.getLineNumber() ?? 1,
    };
  });
}
