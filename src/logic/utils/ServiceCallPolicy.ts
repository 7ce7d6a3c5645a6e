import { CallTarget, InvocationExpression } from "../../ir/statementIr";

export interface ServiceCallPolicyOptions {
  serviceMarkers: string[];
  constructionMarker: string;
}

/**
 * Decides whether a call is drawn as a service call. Swap the whole
 * function to change the heuristic.
 */
export type ServiceCallPolicy = (
  displayName: string,
  invocation: InvocationExpression
) => boolean;

/**
 * Name shown for a call: the member for `a.b()`, the identifier for `b()`,
 * otherwise the callee text as written.
 */
export function resolveCallName(target: CallTarget): string {
  switch (target.kind) {
    case "member_access":
      return target.memberName;
    case "identifier":
    case "other":
      return target.text;
  }
}

/**
 * Substring heuristic: a qualified name, a marker such as `Service` in the
 * name, or an object construction in the callee. It also matches helpers such
 * as `getClientName`; that is accepted.
 */
export function createServiceCallPolicy(
  options: ServiceCallPolicyOptions
): ServiceCallPolicy {
  return (displayName, invocation) =>
    displayName.includes(".") ||
    options.serviceMarkers.some((marker) => displayName.includes(marker)) ||
    invocation.target.text.includes(options.constructionMarker);
}
