/**
 * Node-type compatibility for automation nodes.
 */
import { DISALLOWED_NODE_TYPE_PAIRS } from '../constants'
import type { AutomationNodeType } from '../types/diagram'

export function areNodeTypesCompatible(source: AutomationNodeType, target: AutomationNodeType): boolean {
  return !DISALLOWED_NODE_TYPE_PAIRS.some(([s, t]) => s === source && t === target)
}
