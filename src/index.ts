export * from "./ir/ir";
export * from "./ir/statementIr";
export { analyzeCode } from "./logic/analyzer";
export type { FlowAnalysis } from "./logic/analyzer";
export { FlowchartGenerator } from "./logic/FlowchartGenerator";
export type { FlowchartGeneratorOptions } from "./logic/FlowchartGenerator";
export { MermaidGenerator } from "./logic/MermaidGenerator";
export { selectRoots, isEventHandlerName } from "./logic/MethodSelector";
export { StatementVisitor } from "./logic/StatementVisitor";
export { FlowContext } from "./logic/common/FlowContext";
export { NodeIdAllocator } from "./logic/common/NodeIdAllocator";
export {
  CSharpAstParser,
  parseCSharpCode,
} from "./logic/language-services/csharp";
export { LabelSanitizer } from "./logic/utils/LabelSanitizer";
export {
  createServiceCallPolicy,
  resolveCallName,
} from "./logic/utils/ServiceCallPolicy";
export type { ServiceCallPolicy } from "./logic/utils/ServiceCallPolicy";
export {
  DEFAULT_FLOW_CONFIG,
  loadFlowConfig,
  resolveFlowConfig,
} from "./logic/utils/FlowConfig";
export type { FlowConfiguration } from "./logic/utils/FlowConfig";
export * from "./logic/errors";
