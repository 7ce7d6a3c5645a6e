export type NodeShape =
  | "start"
  | "terminal"
  | "decision"
  | "action"
  | "service"
  | "junction";

export interface FlowchartNode {
  id: string;
  label: string;
  shape: NodeShape;
  style?: string;
}

export interface FlowchartEdge {
  from: string; // nodeId
  to: string; // nodeId
  label?: string;
  // catch transitions
  dashed?: boolean;
}

/**
 * The nodes and edges emitted for one diagrammed method, or for a
 * placeholder when nothing could be diagrammed.
 */
export interface FlowSection {
  name?: string;
  nodes: FlowchartNode[];
  edges: FlowchartEdge[];
}

export interface FlowchartIR {
  title: string;
  direction: "TD" | "TB" | "BT" | "LR" | "RL";
  sections: FlowSection[];
}
