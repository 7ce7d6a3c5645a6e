import { FlowchartEdge, FlowchartIR, FlowchartNode, FlowSection } from "../ir/ir";

const INDENT = "    ";

class StringBuilder {
  private parts: string[] = [];

  append(str: string): void {
    this.parts.push(str);
  }

  appendLine(str: string = ""): void {
    this.parts.push(str, "\n");
  }

  toString(): string {
    return this.parts.join("");
  }

  clear(): void {
    this.parts.length = 0;
  }
}

/**
 * Renders a {@link FlowchartIR} as a Markdown document holding one mermaid
 * `graph` block. Labels are written as they are in the IR.
 */
export class MermaidGenerator {
  private sb = new StringBuilder();

  public generate(ir: FlowchartIR): string {
    this.sb.clear();
    this.sb.appendLine(`# ${ir.title}`);
    this.sb.appendLine();
    this.sb.appendLine("```mermaid");
    this.sb.appendLine(`graph ${ir.direction}`);

    ir.sections.forEach((section, index) => {
      if (index > 0) {
        this.sb.appendLine();
      }
      this.appendSection(section);
    });

    this.sb.appendLine("```");
    return this.sb.toString();
  }

  private appendSection(section: FlowSection): void {
    for (const node of section.nodes) {
      this.sb.append(INDENT);
      this.sb.appendLine(this.formatNode(node));
    }

    for (const node of section.nodes) {
      if (node.style) {
        this.sb.append(INDENT);
        this.sb.appendLine(`style ${node.id} ${node.style}`);
      }
    }

    for (const edge of section.edges) {
      this.sb.append(INDENT);
      this.sb.appendLine(this.formatEdge(edge));
    }
  }

  private formatNode(node: FlowchartNode): string {
    if (node.shape === "junction") {
      return `${node.id}[ ]`;
    }
    const [open, close] = this.getShape(node);
    return `${node.id}${open}${node.label}${close}`;
  }

  private formatEdge(edge: FlowchartEdge): string {
    const arrow = edge.dashed ? "-.->" : "-->";
    const label = edge.label ? `|${edge.label}|` : "";
    return `${edge.from} ${arrow}${label} ${edge.to}`;
  }

  private getShape(node: FlowchartNode): [string, string] {
    switch (node.shape) {
      case "start":
      case "terminal":
        return ["([", "])"];
      case "decision":
        return ["{", "}"];
      case "service":
        return ["[[", "]]"];
      case "junction":
      case "action":
      default:
        return ["[", "]"];
    }
  }
}
