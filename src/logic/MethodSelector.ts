import { ClassDeclaration, MethodDeclaration } from "../ir/statementIr";

export interface MethodSelectionOptions {
  entryMethod: string;
  eventHandlerSuffixes: string[];
  maxEventHandlers: number;
}

export function isEventHandlerName(
  name: string,
  suffixes: readonly string[]
): boolean {
  return suffixes.some((suffix) => name.endsWith(suffix));
}

/**
 * Picks the methods to diagram from a class.
 *
 * With an explicit target, only the first method of that exact name (or
 * nothing). Otherwise the entry method, if any, followed by event handlers
 * in declaration order, at most `maxEventHandlers` of them.
 */
export function selectRoots(
  classDecl: ClassDeclaration,
  options: MethodSelectionOptions,
  explicitTarget?: string
): MethodDeclaration[] {
  const methods = classDecl.methods;

  if (explicitTarget !== undefined) {
    const target = methods.find((m) => m.name === explicitTarget);
    return target ? [target] : [];
  }

  const roots: MethodDeclaration[] = [];
  const entry = methods.find((m) => m.name === options.entryMethod);
  if (entry) {
    roots.push(entry);
  }

  const handlers = methods
    .filter((m) => isEventHandlerName(m.name, options.eventHandlerSuffixes))
    .slice(0, options.maxEventHandlers);

  return [...roots, ...handlers];
}
