import { CSharpAstParser } from "./CSharpAstParser";
import { CompilationUnit } from "../../../ir/statementIr";

let parser: CSharpAstParser | null = null;

/**
 * Returns the shared C# parser, loading the grammar on first use.
 */
export function getCSharpParser(): CSharpAstParser {
  if (!parser) {
    parser = CSharpAstParser.create();
  }
  return parser;
}

/**
 * Parses C# source into the statement tree the generator consumes.
 */
export function parseCSharpCode(code: string): CompilationUnit {
  return getCSharpParser().parse(code);
}

export { CSharpAstParser };
