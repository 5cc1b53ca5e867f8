/**
 * Automation node: typed single-use ports, part of an acyclic flow.
 */
import type { AutomationDiagramNode, AutomationNodeType } from "../types/diagram";
import { BaseDiagramNode } from "./base";

export class AutomationNode extends BaseDiagramNode implements AutomationDiagramNode {
  readonly family = "automation" as const;

  constructor(
    id: string,
    name: string,
    public readonly nodeType: AutomationNodeType,
  ) {
    super(id, name);
  }
}
