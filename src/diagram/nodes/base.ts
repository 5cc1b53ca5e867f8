/**
 * Base diagram node: port factories and the property bag.
 */
import { v4 as uuid } from "uuid";
import { InvalidArgumentError } from "../engine/errors";
import { equalsIgnoreCase } from "../lib/column-schema";
import type {
  DiagramNode,
  NodeFamily,
  NodeProperty,
  Port,
  PortDataType,
  PortDirection,
  PropertyType,
  SchemaInference,
} from "../types/diagram";

export interface PortOptions {
  id?: string;
  label?: string;
  rowId?: string;
}

function inferPropertyType(value: unknown): PropertyType {
  if (Array.isArray(value)) return "list";
  if (typeof value === "number") return "number";
  if (typeof value === "boolean") return "boolean";
  return "string";
}

export abstract class BaseDiagramNode implements DiagramNode {
  abstract readonly family: NodeFamily;

  private readonly inputPorts: Port[] = [];
  private readonly outputPorts: Port[] = [];
  private readonly properties = new Map<string, NodeProperty>();

  constructor(
    public readonly id: string,
    public name: string,
  ) {}

  get inputs(): readonly Port[] {
    return this.inputPorts;
  }

  get outputs(): readonly Port[] {
    return this.outputPorts;
  }

  addInput(dataType: PortDataType, options: PortOptions = {}): Port {
    return this.addPort("input", dataType, options);
  }

  addOutput(dataType: PortDataType, options: PortOptions = {}): Port {
    return this.addPort("output", dataType, options);
  }

  private addPort(
    direction: PortDirection,
    dataType: PortDataType,
    options: PortOptions,
  ): Port {
    const port: Port = {
      id: options.id ?? uuid(),
      owner: this,
      direction,
      dataType,
      label: options.label,
      rowId: options.rowId,
      isAvailable: true,
      connection: null,
    };
    (direction === "input" ? this.inputPorts : this.outputPorts).push(port);
    return port;
  }

  defineProperty<T>(property: NodeProperty<T>): void {
    this.properties.set(property.name, property);
  }

  getProperty(key: string): NodeProperty | undefined {
    return this.properties.get(key);
  }

  getPropertyValue(key: string): unknown {
    const property = this.properties.get(key);
    if (!property) return undefined;
    return property.currentValue !== undefined
      ? property.currentValue
      : property.defaultValue;
  }

  /**
   * Sets the current value. Unknown keys are defined on the fly; values
   * outside a property's declared choices are rejected.
   */
  setPropertyValue(key: string, value: unknown): void {
    const property = this.properties.get(key);
    if (!property) {
      this.properties.set(key, {
        name: key,
        type: inferPropertyType(value),
        defaultValue: value,
        currentValue: value,
      });
      return;
    }
    const { choices } = property;
    if (
      choices &&
      (typeof value !== "string" || !choices.some((c) => equalsIgnoreCase(c, value)))
    ) {
      throw new InvalidArgumentError(
        `${String(value)} is not a legal value for ${key} (expected one of ${choices.join(", ")})`,
        key,
      );
    }
    property.currentValue = value;
  }

  schemaInference(): SchemaInference | null {
    return null;
  }
}

/** A plain node with shared-edge semantics (state charts, UML, flowcharts…). */
export class GenericNode extends BaseDiagramNode {
  readonly family = "generic" as const;
}
