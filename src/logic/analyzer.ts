import { FlowchartIR } from "../ir/ir";
import { FlowchartGenerator } from "./FlowchartGenerator";
import { parseCSharpCode } from "./language-services/csharp";
import { MermaidGenerator } from "./MermaidGenerator";
import { DEFAULT_FLOW_CONFIG, FlowConfiguration } from "./utils/FlowConfig";

export interface FlowAnalysis {
  ir: FlowchartIR;
  document: string;
}

/**
 * Analyzes C# source and renders its flow diagram.
 * @param sourceCode - The source code to analyze.
 * @param methodName - Optional method to diagram instead of the entry method and event handlers.
 * @param config - Generation settings; defaults apply when omitted.
 * @returns The diagram IR and the Markdown document holding the mermaid block.
 */
export function analyzeCode(
  sourceCode: string,
  methodName?: string,
  config: FlowConfiguration = DEFAULT_FLOW_CONFIG
): FlowAnalysis {
  const unit = parseCSharpCode(sourceCode);
  const ir = new FlowchartGenerator({ config }).generate(unit, methodName);
  return { ir, document: new MermaidGenerator().generate(ir) };
}
