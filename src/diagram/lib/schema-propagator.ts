/**
 * Schema propagation: attaches declared schemas to edges, checks them
 * against the sink's expected schema and re-runs inference on nodes that
 * derive their output from upstream edges.
 */
import { JOIN_KIND, PROPERTY_KEYS } from "../constants";
import type {
  DiagramNode,
  InferenceResult,
  SchemaInference,
  UpstreamSchemaLookup,
} from "../types/diagram";
import type { Edge } from "../types/edge";
import type { ColumnSchema } from "../types/schema";
import { equalsIgnoreCase, findColumn, schemasCompatible } from "./column-schema";
import { markWarning, resetStatus } from "./edges";
import type { Logger } from "./logger";
import { readColumnSchema, readString } from "./properties";

export interface SchemaPropagatorOptions {
  warningColor: string;
  logger: Logger;
}

export class SchemaPropagator {
  constructor(
    private readonly getEdges: () => readonly Edge[],
    private readonly options: SchemaPropagatorOptions,
  ) {}

  private readSchema(node: DiagramNode, key: string): ColumnSchema | null {
    return readColumnSchema(node, key, (k, error) =>
      this.options.logger.debug(
        `Ignoring malformed ${k} on ${node.name} (${node.id}): ${error}`,
      ),
    );
  }

  /**
   * Copies the declared output schema onto a new edge and compares it with
   * the expected schema. Shared edges may read either endpoint.
   */
  attach(edge: Edge): void {
    const source = edge.source.owner;
    const target = edge.target.owner;
    const eitherEnd = edge.policy === "shared";

    const schema =
      this.readSchema(source, PROPERTY_KEYS.outputSchema) ??
      (eitherEnd ? this.readSchema(target, PROPERTY_KEYS.outputSchema) : null);
    if (schema) edge.schema = schema;

    const expected =
      this.readSchema(target, PROPERTY_KEYS.expectedSchema) ??
      (eitherEnd ? this.readSchema(source, PROPERTY_KEYS.expectedSchema) : null);
    if (expected && edge.schema) {
      edge.expectedSchema = expected;
      this.checkExpected(edge);
    }
  }

  private checkExpected(edge: Edge): void {
    if (!edge.expectedSchema || !edge.schema) return;
    if (!schemasCompatible(edge.expectedSchema, edge.schema)) {
      markWarning(edge, this.options.warningColor);
    }
  }

  incoming(node: DiagramNode): Edge[] {
    return this.getEdges().filter((e) => e.target.owner === node);
  }

  outgoing(node: DiagramNode): Edge[] {
    return this.getEdges().filter((e) => e.source.owner === node);
  }

  /**
   * Nodes with several input ports are looked up by port index; single-port
   * nodes (fan-in) by the order their incoming edges were created.
   */
  upstreamLookup(node: DiagramNode): UpstreamSchemaLookup {
    const incoming = this.incoming(node);
    if (node.inputs.length > 1) {
      return (index) => {
        const port = node.inputs[index];
        if (!port) return null;
        return incoming.find((e) => e.target === port)?.schema ?? null;
      };
    }
    return (index) => incoming[index]?.schema ?? null;
  }

  /**
   * Re-runs inference on `node` and, when its output changed (a new schema,
   * or none because an input is gone), on everything downstream. Returns the
   * node's own result, or null when it has no capability.
   */
  reinfer(
    node: DiagramNode,
    visited: Set<string> = new Set(),
  ): InferenceResult | null {
    if (visited.has(node.id)) return null;
    visited.add(node.id);

    const upstream = this.upstreamLookup(node);
    const capability = node.schemaInference();
    let result: InferenceResult | null = null;
    if (capability) {
      result = this.runInference(node, capability, upstream);
      if (result.status !== "error") {
        const schema = result.status === "success" ? result.schema : null;
        for (const edge of this.outgoing(node)) {
          this.refresh(edge, schema);
          this.reinfer(edge.target.owner, visited);
        }
      }
    }
    this.validateJoin(node, upstream);
    return result;
  }

  private refresh(edge: Edge, schema: ColumnSchema | null): void {
    resetStatus(edge);
    edge.schema = schema;
    edge.expectedSchema = null;
    if (!schema) return;
    const expected = this.readSchema(edge.target.owner, PROPERTY_KEYS.expectedSchema);
    if (expected) {
      edge.expectedSchema = expected;
      this.checkExpected(edge);
    }
  }

  private runInference(
    node: DiagramNode,
    capability: SchemaInference,
    upstream: UpstreamSchemaLookup,
  ): InferenceResult {
    let result: InferenceResult;
    try {
      result = capability.inferOutputSchema(upstream);
    } catch (err) {
      result = {
        status: "error",
        error: err instanceof Error ? err.message : String(err),
      };
    }
    if (result.status === "error") {
      this.options.logger.warn(
        `Schema inference failed for ${node.name} (${node.id}): ${result.error}`,
      );
    } else if (result.status === "skipped") {
      this.options.logger.debug(
        `Schema inference skipped for ${node.name} (${node.id}): ${result.reason}`,
      );
    }
    return result;
  }

  /** Flags the outgoing edges of a Join whose keys do not resolve. */
  private validateJoin(node: DiagramNode, upstream: UpstreamSchemaLookup): void {
    const kind = readString(node, PROPERTY_KEYS.kind);
    if (!kind || !equalsIgnoreCase(kind.trim(), JOIN_KIND)) return;

    const left = upstream(0);
    const right = upstream(1);
    if (!left || !right) return;

    const leftKey = (readString(node, PROPERTY_KEYS.joinKeyLeft) ?? "").trim();
    const rightKey = (readString(node, PROPERTY_KEYS.joinKeyRight) ?? "").trim();
    const lc = leftKey ? findColumn(left, leftKey) : undefined;
    const rc = rightKey ? findColumn(right, rightKey) : undefined;
    const typesAgree =
      !!lc &&
      !!rc &&
      (!lc.dataType || !rc.dataType || equalsIgnoreCase(lc.dataType, rc.dataType));
    if (typesAgree) return;

    this.options.logger.debug(
      `Join keys '${leftKey}'/'${rightKey}' do not resolve on ${node.name} (${node.id})`,
    );
    for (const edge of this.outgoing(node)) {
      markWarning(edge, this.options.warningColor);
    }
  }
}
