/**
 * Port registry: resolves port ids to ports and owners, and tracks the
 * single-use binding of exclusive ports.
 */
import type { DiagramNode, Port, PortDirection } from "../types/diagram";

export class PortRegistry {
  private readonly nodes = new Map<string, DiagramNode>();
  private readonly ports = new Map<string, Port>();

  register(node: DiagramNode): void {
    this.nodes.set(node.id, node);
    for (const port of [...node.inputs, ...node.outputs]) {
      this.ports.set(port.id, port);
    }
  }

  unregister(node: DiagramNode): void {
    this.nodes.delete(node.id);
    for (const [id, port] of this.ports) {
      if (port.owner === node) this.ports.delete(id);
    }
  }

  /** Ports added to a node after registration are picked up on lookup. */
  getPort(portId: string): Port | undefined {
    const known = this.ports.get(portId);
    if (known) return known;
    for (const node of this.nodes.values()) this.register(node);
    return this.ports.get(portId);
  }

  getOwner(portId: string): DiagramNode | undefined {
    return this.getPort(portId)?.owner;
  }

  portsOf(node: DiagramNode, direction: PortDirection): readonly Port[] {
    return direction === "input" ? node.inputs : node.outputs;
  }

  first(node: DiagramNode, direction: PortDirection): Port | undefined {
    return this.portsOf(node, direction)[0];
  }

  firstAvailable(node: DiagramNode, direction: PortDirection): Port | undefined {
    return this.portsOf(node, direction).find((p) => p.isAvailable);
  }

  bind(output: Port, input: Port): void {
    output.isAvailable = false;
    input.isAvailable = false;
    output.connection = input;
    input.connection = output;
  }

  release(port: Port): void {
    port.isAvailable = true;
    port.connection = null;
  }
}
