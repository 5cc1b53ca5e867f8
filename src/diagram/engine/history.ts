/**
 * Undo/Redo log using command pattern.
 *
 * Commands are recorded after they have been applied; `execute` replays
 * them on redo. Recording a new command clears the redo stack.
 */
import type { Port } from "../types/diagram";
import type { Edge } from "../types/edge";

export type CommandType = "connect" | "disconnect" | "move";

export interface Command {
  type: CommandType;
  execute: () => void;
  undo: () => void;
}

export class HistoryLog {
  private undoStack: Command[] = [];
  private redoStack: Command[] = [];

  record(command: Command): void {
    this.undoStack.push(command);
    this.redoStack = []; // any new change clears redo
  }

  undo(): Command | null {
    const command = this.undoStack.pop();
    if (!command) return null;
    command.undo();
    this.redoStack.push(command);
    return command;
  }

  redo(): Command | null {
    const command = this.redoStack.pop();
    if (!command) return null;
    command.execute();
    this.undoStack.push(command);
    return command;
  }

  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
  }

  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }
}

// ─── Edge snapshots ──────────────────────────────────────────────────────────

export interface PortSnapshot {
  port: Port;
  isAvailable: boolean;
  connection: Port | null;
}

/** Everything a connect/disconnect/move changes about one edge. */
export interface EdgeSnapshot {
  present: boolean;
  index: number;
  source: Port;
  target: Port;
  ports: PortSnapshot[];
}

export function capturePorts(ports: readonly Port[]): PortSnapshot[] {
  const unique = [...new Set(ports)];
  return unique.map((port) => ({
    port,
    isAvailable: port.isAvailable,
    connection: port.connection,
  }));
}

export function restorePorts(snapshots: readonly PortSnapshot[]): void {
  for (const s of snapshots) {
    s.port.isAvailable = s.isAvailable;
    s.port.connection = s.connection;
  }
}

/**
 * A command that flips one edge between two captured states. Undo and redo
 * must alternate: each is legal exactly once per flip.
 */
export class EdgeCommand implements Command {
  private applied = true;

  constructor(
    readonly type: CommandType,
    readonly edge: Edge,
    private readonly before: EdgeSnapshot,
    private readonly after: EdgeSnapshot,
    private readonly restore: (edge: Edge, snapshot: EdgeSnapshot) => void,
  ) {}

  undo = (): void => {
    if (!this.applied) throw new Error(`${this.type} on edge ${this.edge.id} is already undone`);
    this.restore(this.edge, this.before);
    this.applied = false;
  };

  execute = (): void => {
    if (this.applied) throw new Error(`${this.type} on edge ${this.edge.id} is already applied`);
    this.restore(this.edge, this.after);
    this.applied = true;
  };
}
