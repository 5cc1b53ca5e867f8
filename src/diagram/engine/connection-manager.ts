/**
 * Connection manager: creates, validates, annotates and reverses edges
 * between diagram nodes.
 *
 * Automation nodes get exclusive edges (single-use ports, typed, acyclic);
 * every other pairing gets a shared edge that allows fan-out and fan-in and
 * is annotated by the PK/FK and schema checks instead of being blocked.
 *
 * All operations are synchronous. Structural rejections return null and are
 * logged at debug level; only programming errors throw.
 */
import {
  DEFAULT_CONNECTION_CONFIG,
  type LogLevel,
} from "../constants";
import { wouldCreateCycle } from "../lib/cycle-detector";
import {
  applyMultiplicity,
  createEdge,
  links,
  markWarning,
  resetStatus,
  touches,
} from "../lib/edges";
import { createLogger, type Logger, type LogSink } from "../lib/logger";
import { areNodeTypesCompatible } from "../lib/node-compatibility";
import { validatePkFk } from "../lib/pk-fk-validator";
import { SchemaPropagator } from "../lib/schema-propagator";
import {
  createDiagramStore,
  type DiagramState,
  type DiagramStore,
} from "../stores/diagram.store";
import {
  isAutomationNode,
  type DiagramNode,
  type InferenceResult,
  type Port,
} from "../types/diagram";
import type {
  ConnectionValidationResult,
  Edge,
  EdgePolicy,
  Multiplicity,
  MultiplicityPreset,
  RejectionReason,
} from "../types/edge";
import { isCompatible } from "../types/type-compatibility";
import { InvalidArgumentError } from "./errors";
import {
  capturePorts,
  type CommandType,
  EdgeCommand,
  type EdgeSnapshot,
  HistoryLog,
  restorePorts,
} from "./history";
import { PortRegistry } from "./port-registry";

export interface ConnectOptions {
  /** Markers for this edge only; wins over a pending preset end by end. */
  multiplicity?: MultiplicityPreset;
  sourcePort?: Port;
  targetPort?: Port;
}

export interface ConnectionManagerOptions {
  logger?: Logger;
  /** Console-like sink for the default logger. */
  logSink?: LogSink;
  logLevel?: LogLevel;
  warningColor?: string;
  /** Per port type, merged over the built-in data-flow colors. */
  dataFlowColors?: Record<string, string>;
  /** Called after every mutation with the published state. */
  onRedraw?: (state: DiagramState) => void;
  store?: DiagramStore;
}

type ConnectionPlan =
  | { valid: true; source: Port; target: Port; policy: EdgePolicy }
  | { valid: false; reason: RejectionReason };

export class ConnectionManager {
  private readonly registry = new PortRegistry();
  private readonly history = new HistoryLog();
  private readonly propagator: SchemaPropagator;
  private readonly logger: Logger;
  private readonly store: DiagramStore;
  private readonly warningColor: string;
  private readonly dataFlowColors: Record<string, string>;
  private edges: Edge[];
  private pendingPreset: MultiplicityPreset | null = null;

  constructor(options: ConnectionManagerOptions = {}) {
    this.logger =
      options.logger ??
      createLogger(
        "ConnectionManager",
        options.logSink ?? console,
        options.logLevel ?? DEFAULT_CONNECTION_CONFIG.logLevel,
      );
    this.warningColor = options.warningColor ?? DEFAULT_CONNECTION_CONFIG.warningColor;
    this.dataFlowColors = {
      ...DEFAULT_CONNECTION_CONFIG.dataFlowColors,
      ...options.dataFlowColors,
    };
    this.store = options.store ?? createDiagramStore();
    this.edges = [...this.store.getState().edges];
    for (const edge of this.edges) {
      this.registry.register(edge.source.owner);
      this.registry.register(edge.target.owner);
    }
    this.propagator = new SchemaPropagator(() => this.edges, {
      warningColor: this.warningColor,
      logger: this.logger.child("Schema"),
    });
    if (options.onRedraw) {
      const onRedraw = options.onRedraw;
      this.store.subscribe((state) => onRedraw(state));
    }
  }

  // ─── Connect ───────────────────────────────────────────────────────────────

  connect(
    a: DiagramNode | null | undefined,
    b: DiagramNode | null | undefined,
    options: ConnectOptions = {},
  ): Edge | null {
    const [source, target] = this.assertPair(a, b, options);
    const plan = this.plan(source, target, options);
    if (!plan.valid) {
      this.logger.debug(`Rejected ${source.name} → ${target.name}: ${plan.reason}`);
      return null;
    }

    const ports = [plan.source, plan.target];
    const index = this.edges.length;
    const beforePorts = capturePorts(ports);

    const edge = createEdge(plan.source, plan.target, plan.policy);
    applyMultiplicity(edge, this.takePreset(options.multiplicity));
    if (plan.policy === "exclusive") {
      edge.isDataFlowAnimated = true;
      this.registry.bind(plan.source, plan.target);
    }
    this.annotate(edge);
    this.edges.push(edge);
    this.reinfer(source, target);

    this.record("connect", edge, {
      before: { present: false, index, source: edge.source, target: edge.target, ports: beforePorts },
      after: { present: true, index, source: edge.source, target: edge.target, ports: capturePorts(ports) },
    });
    this.logger.debug(`Connected ${source.name} → ${target.name} (${edge.policy})`);
    this.publish();
    return edge;
  }

  /** Runs the structural checks of `connect` without mutating anything. */
  canConnect(
    a: DiagramNode | null | undefined,
    b: DiagramNode | null | undefined,
    options: ConnectOptions = {},
  ): ConnectionValidationResult {
    const [source, target] = this.assertPair(a, b, options);
    const plan = this.plan(source, target, options);
    return plan.valid ? { valid: true } : { valid: false, reason: plan.reason };
  }

  private assertPair(
    a: DiagramNode | null | undefined,
    b: DiagramNode | null | undefined,
    options: ConnectOptions,
  ): [DiagramNode, DiagramNode] {
    if (!a) throw new InvalidArgumentError("Source node is required", "a");
    if (!b) throw new InvalidArgumentError("Target node is required", "b");
    if (a === b) {
      throw new InvalidArgumentError(`Cannot connect ${a.name} to itself`, "b");
    }
    const { sourcePort, targetPort } = options;
    if (sourcePort && (sourcePort.owner !== a || sourcePort.direction !== "output")) {
      throw new InvalidArgumentError(
        `Port ${sourcePort.id} is not an output of ${a.name}`,
        "sourcePort",
      );
    }
    if (targetPort && (targetPort.owner !== b || targetPort.direction !== "input")) {
      throw new InvalidArgumentError(
        `Port ${targetPort.id} is not an input of ${b.name}`,
        "targetPort",
      );
    }
    this.registry.register(a);
    this.registry.register(b);
    return [a, b];
  }

  private plan(a: DiagramNode, b: DiagramNode, options: ConnectOptions): ConnectionPlan {
    if (isAutomationNode(a) && isAutomationNode(b)) {
      const source = options.sourcePort ?? this.registry.firstAvailable(a, "output");
      const target = options.targetPort ?? this.registry.firstAvailable(b, "input");
      if (!source?.isAvailable || !target?.isAvailable) {
        return { valid: false, reason: "no-available-port" };
      }
      if (source.direction !== "output" || target.direction !== "input") {
        return { valid: false, reason: "direction" };
      }
      if (!isCompatible(source.dataType, target.dataType)) {
        return { valid: false, reason: "type-mismatch" };
      }
      if (!areNodeTypesCompatible(a.nodeType, b.nodeType)) {
        return { valid: false, reason: "node-type" };
      }
      const reason = this.checkGraph(this.edges, a, b);
      if (reason) return { valid: false, reason };
      return { valid: true, source, target, policy: "exclusive" };
    }

    const source = options.sourcePort ?? this.registry.first(a, "output");
    const target = options.targetPort ?? this.freeInput(b) ?? this.registry.first(b, "input");
    if (!source || !target) return { valid: false, reason: "missing-port" };
    return { valid: true, source, target, policy: "shared" };
  }

  /** Duplicate and cycle checks for a new a → b automation edge. */
  private checkGraph(
    edges: readonly Edge[],
    a: DiagramNode,
    b: DiagramNode,
  ): RejectionReason | null {
    if (edges.some((e) => e.source.owner === a && e.target.owner === b)) {
      return "duplicate";
    }
    const graph = edges.map((e) => ({
      sourceNodeId: e.source.owner.id,
      targetNodeId: e.target.owner.id,
    }));
    return wouldCreateCycle(graph, a.id, b.id) ? "cycle" : null;
  }

  /**
   * Recomputes what an edge derives from its endpoints: data-flow color,
   * PK/FK status and the attached schemas.
   */
  private annotate(edge: Edge): void {
    resetStatus(edge);
    edge.schema = null;
    edge.expectedSchema = null;
    if (edge.policy === "exclusive") {
      edge.dataFlowColor = this.dataFlowColor(edge.source.dataType);
    } else {
      const outcome = validatePkFk(edge, (key, error) =>
        this.logger.debug(`Ignoring malformed ${key}: ${error}`),
      );
      if (outcome === "invalid") markWarning(edge, this.warningColor);
    }
    this.propagator.attach(edge);
  }

  private freeInput(node: DiagramNode): Port | undefined {
    return node.inputs.find((port) => !this.edges.some((e) => e.target === port));
  }

  private takePreset(explicit: MultiplicityPreset | undefined): MultiplicityPreset | null {
    const pending = this.pendingPreset;
    this.pendingPreset = null;
    if (!explicit) return pending;
    return {
      start: explicit.start ?? pending?.start,
      end: explicit.end ?? pending?.end,
    };
  }

  private dataFlowColor(dataType: string): string {
    return (
      this.dataFlowColors[dataType.toLowerCase()] ??
      DEFAULT_CONNECTION_CONFIG.defaultDataFlowColor
    );
  }

  // ─── Disconnect / move ─────────────────────────────────────────────────────

  /** Removes the first edge between the two nodes, in either direction. */
  disconnect(
    a: DiagramNode | null | undefined,
    b: DiagramNode | null | undefined,
  ): boolean {
    if (!a) throw new InvalidArgumentError("Source node is required", "a");
    if (!b) throw new InvalidArgumentError("Target node is required", "b");
    const index = this.edges.findIndex((e) => links(e, a, b));
    const edge = this.edges[index];
    if (!edge) {
      this.logger.debug(`No edge between ${a.name} and ${b.name}`);
      return false;
    }

    const ports = [edge.source, edge.target];
    const beforePorts = capturePorts(ports);
    this.edges.splice(index, 1);
    if (edge.policy === "exclusive") {
      this.registry.release(edge.source);
      this.registry.release(edge.target);
    }
    this.reinfer(a, b);

    this.record("disconnect", edge, {
      before: { present: true, index, source: edge.source, target: edge.target, ports: beforePorts },
      after: { present: false, index, source: edge.source, target: edge.target, ports: capturePorts(ports) },
    });
    this.logger.debug(`Disconnected ${a.name} and ${b.name}`);
    this.publish();
    return true;
  }

  moveEdge(edge: Edge | null | undefined, newSource?: Port, newTarget?: Port): void {
    if (!edge) throw new InvalidArgumentError("Edge is required", "edge");
    const index = this.edges.indexOf(edge);
    if (index < 0) {
      this.logger.debug(`Edge ${edge.id} is not managed here`);
      return;
    }
    if (!newSource && !newTarget) return;
    if (newSource && newSource.direction !== "output") {
      throw new InvalidArgumentError(`Port ${newSource.id} is not an output`, "newSource");
    }
    if (newTarget && newTarget.direction !== "input") {
      throw new InvalidArgumentError(`Port ${newTarget.id} is not an input`, "newTarget");
    }
    const oldSource = edge.source;
    const oldTarget = edge.target;
    const nextSource = newSource ?? oldSource;
    const nextTarget = newTarget ?? oldTarget;
    if (nextSource.owner === nextTarget.owner) {
      throw new InvalidArgumentError(
        `Moving edge ${edge.id} would connect ${nextSource.owner.name} to itself`,
        newSource ? "newSource" : "newTarget",
      );
    }
    this.registry.register(nextSource.owner);
    this.registry.register(nextTarget.owner);
    if (edge.policy === "exclusive") {
      const reason = this.checkExclusiveMove(edge, nextSource, nextTarget);
      if (reason) {
        this.logger.debug(
          `Rejected move of ${edge.id} to ${nextSource.owner.name} → ${nextTarget.owner.name}: ${reason}`,
        );
        return;
      }
    }

    const ports = [oldSource, oldTarget, nextSource, nextTarget];
    const beforePorts = capturePorts(ports);
    if (edge.policy === "exclusive") {
      if (newSource) this.registry.release(oldSource);
      if (newTarget) this.registry.release(oldTarget);
    }
    this.setEndpoints(edge, nextSource, nextTarget);
    if (edge.policy === "exclusive") this.registry.bind(nextSource, nextTarget);
    this.annotate(edge);
    this.reinfer(oldSource.owner, oldTarget.owner, nextSource.owner, nextTarget.owner);

    this.record("move", edge, {
      before: { present: true, index, source: oldSource, target: oldTarget, ports: beforePorts },
      after: { present: true, index, source: nextSource, target: nextTarget, ports: capturePorts(ports) },
    });
    this.logger.debug(
      `Moved edge ${edge.id} to ${nextSource.owner.name} → ${nextTarget.owner.name}`,
    );
    this.publish();
  }

  private checkExclusiveMove(edge: Edge, source: Port, target: Port): RejectionReason | null {
    const a = source.owner;
    const b = target.owner;
    if (!isAutomationNode(a) || !isAutomationNode(b)) return "node-type";
    if (
      (source !== edge.source && !source.isAvailable) ||
      (target !== edge.target && !target.isAvailable)
    ) {
      return "no-available-port";
    }
    if (!isCompatible(source.dataType, target.dataType)) return "type-mismatch";
    if (!areNodeTypesCompatible(a.nodeType, b.nodeType)) return "node-type";
    return this.checkGraph(
      this.edges.filter((e) => e !== edge),
      a,
      b,
    );
  }

  private setEndpoints(edge: Edge, source: Port, target: Port): void {
    edge.source = source;
    edge.target = target;
    edge.sourceRowId = source.rowId ?? null;
    edge.targetRowId = target.rowId ?? null;
  }

  // ─── Presets / inference ───────────────────────────────────────────────────

  /** One-shot markers for the next edge created, then cleared. */
  setNextEdgeMultiplicityPreset(start?: Multiplicity, end?: Multiplicity): void {
    this.pendingPreset = { start, end };
  }

  get nextEdgeMultiplicityPreset(): MultiplicityPreset | null {
    return this.pendingPreset;
  }

  inferSchema(node: DiagramNode | null | undefined): InferenceResult | null {
    if (!node) throw new InvalidArgumentError("Node is required", "node");
    this.registry.register(node);
    const result = this.propagator.reinfer(node);
    this.publish();
    return result;
  }

  private reinfer(...nodes: DiagramNode[]): void {
    for (const node of new Set(nodes)) this.propagator.reinfer(node);
  }

  // ─── History ───────────────────────────────────────────────────────────────

  private record(
    type: CommandType,
    edge: Edge,
    snapshots: { before: EdgeSnapshot; after: EdgeSnapshot },
  ): void {
    this.history.record(
      new EdgeCommand(type, edge, snapshots.before, snapshots.after, (e, s) =>
        this.restore(e, s),
      ),
    );
  }

  private restore(edge: Edge, snapshot: EdgeSnapshot): void {
    const affected = [edge.source.owner, edge.target.owner];
    const current = this.edges.indexOf(edge);
    if (current >= 0) this.edges.splice(current, 1);
    if (snapshot.present) {
      this.edges.splice(Math.min(snapshot.index, this.edges.length), 0, edge);
    }
    this.setEndpoints(edge, snapshot.source, snapshot.target);
    restorePorts(snapshot.ports);
    if (snapshot.present) this.annotate(edge);
    this.reinfer(...affected, snapshot.source.owner, snapshot.target.owner);
  }

  undo(): boolean {
    const command = this.history.undo();
    if (!command) return false;
    this.logger.debug(`Undid ${command.type}`);
    this.publish();
    return true;
  }

  redo(): boolean {
    const command = this.history.redo();
    if (!command) return false;
    this.logger.debug(`Redid ${command.type}`);
    this.publish();
    return true;
  }

  get canUndo(): boolean {
    return this.history.canUndo;
  }

  get canRedo(): boolean {
    return this.history.canRedo;
  }

  clearHistory(): void {
    this.history.clear();
    this.publish();
  }

  // ─── Queries ───────────────────────────────────────────────────────────────

  getEdges(): readonly Edge[] {
    return [...this.edges];
  }

  getEdgesFor(node: DiagramNode): Edge[] {
    return this.edges.filter((e) => touches(e, node));
  }

  registerNode(node: DiagramNode): void {
    this.registry.register(node);
  }

  /** Forgets a node the host has destroyed. Its edges must be removed first. */
  unregisterNode(node: DiagramNode): void {
    if (this.edges.some((e) => touches(e, node))) {
      throw new InvalidArgumentError(
        `${node.name} still has edges; disconnect them first`,
        "node",
      );
    }
    this.registry.unregister(node);
  }

  getPort(portId: string): Port | undefined {
    return this.registry.getPort(portId);
  }

  getOwnerForPort(portId: string): DiagramNode | undefined {
    return this.registry.getOwner(portId);
  }

  getStore(): DiagramStore {
    return this.store;
  }

  subscribe(listener: (state: DiagramState) => void): () => void {
    return this.store.subscribe((state) => listener(state));
  }

  /** Publishes the edge list and bumps the redraw revision. */
  private publish(): void {
    this.store.setState((state) => ({
      edges: [...this.edges],
      revision: state.revision + 1,
      canUndo: this.history.canUndo,
      canRedo: this.history.canRedo,
    }));
  }
}
