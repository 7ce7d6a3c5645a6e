import {
  FlowchartEdge,
  FlowchartNode,
  FlowSection,
  NodeShape,
} from "../../ir/ir";
import { FlowConfiguration, NodeStyleKey } from "../utils/FlowConfig";
import { LabelSanitizer } from "../utils/LabelSanitizer";
import {
  createServiceCallPolicy,
  ServiceCallPolicy,
} from "../utils/ServiceCallPolicy";
import { NodeIdAllocator } from "./NodeIdAllocator";

export interface EdgeOptions {
  label?: string;
  dashed?: boolean;
}

/**
 * Request-scoped state for one `generate` call: id allocation, the set of
 * methods already drawn, and the append-only graph being built.
 */
export class FlowContext {
  readonly ids = new NodeIdAllocator();
  readonly processedMethods = new Set<string>();
  readonly serviceCallPolicy: ServiceCallPolicy;

  private sections: FlowSection[] = [];
  private nodes: FlowchartNode[] = [];
  private edges: FlowchartEdge[] = [];

  constructor(
    readonly config: FlowConfiguration,
    serviceCallPolicy?: ServiceCallPolicy
  ) {
    this.serviceCallPolicy =
      serviceCallPolicy ?? createServiceCallPolicy(config);
  }

  sanitizeLabel(raw: string | null | undefined): string {
    return LabelSanitizer.sanitize(raw, this.config.labelMaxLength);
  }

  sanitizeCondition(raw: string | null | undefined): string {
    return LabelSanitizer.sanitizeCondition(
      raw,
      this.config.conditionMaxLength
    );
  }

  /** Emits a node whose label is already sanitized. */
  addNode(shape: NodeShape, label: string, styleKey?: NodeStyleKey): string {
    const node: FlowchartNode = { id: this.ids.next(), label, shape };
    if (styleKey) {
      node.style = this.config.styles[styleKey];
    }
    this.nodes.push(node);
    return node.id;
  }

  addEdge(from: string, to: string, options: EdgeOptions = {}): void {
    const edge: FlowchartEdge = { from, to };
    if (options.label !== undefined) edge.label = options.label;
    if (options.dashed) edge.dashed = true;
    this.edges.push(edge);
  }

  /** Emits a node and an edge into it from `parent`. */
  connect(
    parent: string,
    shape: NodeShape,
    label: string,
    styleKey?: NodeStyleKey,
    edge?: EdgeOptions
  ): string {
    const id = this.addNode(shape, label, styleKey);
    this.addEdge(parent, id, edge);
    return id;
  }

  createJunction(parent: string, edge?: EdgeOptions): string {
    return this.connect(parent, "junction", "", undefined, edge);
  }

  /** Ends the current section; later nodes start a new one. */
  closeSection(name?: string): void {
    if (this.nodes.length === 0 && this.edges.length === 0) return;
    const section: FlowSection = { nodes: this.nodes, edges: this.edges };
    if (name !== undefined) section.name = name;
    this.sections.push(section);
    this.nodes = [];
    this.edges = [];
  }

  takeSections(): FlowSection[] {
    this.closeSection();
    return this.sections;
  }
}
