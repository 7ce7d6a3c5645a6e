import { FlowchartIR } from "../ir/ir";
import { CompilationUnit, MethodDeclaration } from "../ir/statementIr";
import { FlowContext } from "./common/FlowContext";
import { selectRoots } from "./MethodSelector";
import { StatementVisitor } from "./StatementVisitor";
import { DEFAULT_FLOW_CONFIG, FlowConfiguration } from "./utils/FlowConfig";
import { logDebug, logWarn } from "./utils/Logger";
import { ServiceCallPolicy } from "./utils/ServiceCallPolicy";

export const NO_CLASS_LABEL = "No class found";

export interface FlowchartGeneratorOptions {
  config?: FlowConfiguration;
  serviceCallPolicy?: ServiceCallPolicy;
}

/**
 * Turns a parsed compilation unit into a {@link FlowchartIR}: one section
 * per selected method of the first class.
 */
export class FlowchartGenerator {
  private readonly config: FlowConfiguration;
  private readonly serviceCallPolicy?: ServiceCallPolicy;

  constructor(options: FlowchartGeneratorOptions = {}) {
    this.config = options.config ?? DEFAULT_FLOW_CONFIG;
    this.serviceCallPolicy = options.serviceCallPolicy;
  }

  public generate(unit: CompilationUnit, targetMethod?: string): FlowchartIR {
    // Fresh per call: ids restart at N0 and no method counts as drawn yet.
    const ctx = new FlowContext(this.config, this.serviceCallPolicy);
    const ir: FlowchartIR = {
      title: this.config.title,
      direction: this.config.direction,
      sections: [],
    };

    // Only the first class is considered.
    const classDecl = unit.classes[0];
    if (!classDecl) {
      ctx.addNode("action", NO_CLASS_LABEL);
      ir.sections = ctx.takeSections();
      return ir;
    }

    const roots = selectRoots(classDecl, this.config, targetMethod);
    if (targetMethod !== undefined && roots.length === 0) {
      logWarn(`Method ${targetMethod} not found in class ${classDecl.name}`);
      ctx.addNode(
        "action",
        ctx.sanitizeLabel(`Method '${targetMethod}' not found`)
      );
    }

    const visitor = new StatementVisitor(ctx);
    for (const method of roots) {
      this.analyzeMethod(method, ctx, visitor);
    }

    ir.sections = ctx.takeSections();
    logDebug(
      `Generated ${ir.sections.length} section(s) with ${ctx.ids.issued} node(s) for class ${classDecl.name}`
    );
    return ir;
  }

  private analyzeMethod(
    method: MethodDeclaration,
    ctx: FlowContext,
    visitor: StatementVisitor
  ): void {
    if (ctx.processedMethods.has(method.name)) {
      logDebug(`Skipping ${method.name}: already diagrammed`);
      return;
    }
    ctx.processedMethods.add(method.name);

    const startNode = ctx.addNode(
      "start",
      ctx.sanitizeLabel(method.name),
      "start"
    );
    if (method.body) {
      visitor.visitSequence(method.body, startNode, 0);
    }
    ctx.closeSection(method.name);
  }
}
