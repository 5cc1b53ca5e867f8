/**
 * Diagram store: published snapshot of the edge list for hosts to render.
 * The connection manager is the only writer; every mutation bumps
 * `revision`, which is the redraw request.
 */
import { createStore, type StoreApi } from "zustand/vanilla";
import type { Edge } from "../types/edge";

export interface DiagramState {
  edges: readonly Edge[];
  revision: number;
  canUndo: boolean;
  canRedo: boolean;
}

export type DiagramStore = StoreApi<DiagramState>;

export function createDiagramStore(initial: Partial<DiagramState> = {}): DiagramStore {
  return createStore<DiagramState>()(() => ({
    edges: [],
    revision: 0,
    canUndo: false,
    canRedo: false,
    ...initial,
  }));
}
