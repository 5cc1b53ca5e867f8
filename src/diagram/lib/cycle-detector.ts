/**
 * Cycle check for acyclic automation graphs.
 */
export interface SimpleEdge { sourceNodeId: string; targetNodeId: string }

function buildAdjacency(edges: readonly SimpleEdge[]): Map<string, string[]> {
  const adj = new Map<string, string[]>()
  for (const e of edges) {
    const next = adj.get(e.sourceNodeId) ?? []
    next.push(e.targetNodeId)
    adj.set(e.sourceNodeId, next)
  }
  return adj
}

/**
 * Would source → target close a loop? Searches from target along existing
 * edges; reaching source means a path target ⇝ source already exists.
 */
export function wouldCreateCycle(edges: readonly SimpleEdge[], sourceNodeId: string, targetNodeId: string): boolean {
  const adj = buildAdjacency(edges)
  const visited = new Set<string>()
  const stack = new Set<string>()
  function dfs(current: string): boolean {
    if (current === sourceNodeId) return true
    visited.add(current)
    stack.add(current)
    for (const neighbor of adj.get(current) ?? []) {
      // a loop already reachable from target is treated as unsafe too
      if (stack.has(neighbor)) return true
      if (!visited.has(neighbor) && dfs(neighbor)) return true
    }
    stack.delete(current)
    return false
  }
  return dfs(targetNodeId)
}
