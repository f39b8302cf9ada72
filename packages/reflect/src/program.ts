/**
 * TypeScript programs to reflect over: from files on disk, or from source
 * text held in memory.
 */

import * as ts from "typescript";
import { SchemaDefinitionError } from "@fieldmap/core";

export const DEFAULT_COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  moduleResolution: ts.ModuleResolutionKind.Bundler,
  strict: true,
  noEmit: true,
  types: [],
};

/**
 * Build a program whose root files live in memory. Library files still come
 * from the installed `typescript` package.
 */
export function createInMemoryProgram(
  files: Readonly<Record<string, string>>,
  options: ts.CompilerOptions = DEFAULT_COMPILER_OPTIONS
): ts.Program {
  const sources = new Map(Object.entries(files));
  const host = ts.createCompilerHost(options);
  const originalGetSourceFile = host.getSourceFile;
  const originalReadFile = host.readFile;
  const originalFileExists = host.fileExists;

  host.getSourceFile = (fileName, languageVersion, onError, shouldCreateNewSourceFile) => {
    const content = sources.get(fileName);
    if (content !== undefined) {
      return ts.createSourceFile(fileName, content, languageVersion, true);
    }
    return originalGetSourceFile.call(host, fileName, languageVersion, onError, shouldCreateNewSourceFile);
  };

  host.readFile = (fileName) => sources.get(fileName) ?? originalReadFile.call(host, fileName);

  host.fileExists = (fileName) => sources.has(fileName) || originalFileExists.call(host, fileName);

  return checked(ts.createProgram([...sources.keys()], options, host));
}

/** Build a program from files on disk. */
export function createProgramFromFiles(
  fileNames: readonly string[],
  options: ts.CompilerOptions = DEFAULT_COMPILER_OPTIONS
): ts.Program {
  return checked(ts.createProgram(fileNames, options));
}

/** Reject programs whose own files do not parse. */
function checked(program: ts.Program): ts.Program {
  for (const sourceFile of program.getRootFileNames()) {
    const file = program.getSourceFile(sourceFile);
    if (!file) {
      throw new SchemaDefinitionError(`Cannot read source file ${sourceFile}`, "");
    }
    const [first] = program.getSyntacticDiagnostics(file);
    if (first) {
      const message = ts.flattenDiagnosticMessageText(first.messageText, " ");
      throw new SchemaDefinitionError(`Cannot parse ${sourceFile}: ${message}`, "");
    }
  }
  return program;
}
