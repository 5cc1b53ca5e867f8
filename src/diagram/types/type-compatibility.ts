/**
 * Type compatibility system for port connections.
 *
 * Directed: an entry lists the input types an output of the key type may feed.
 * Do not mirror entries, number → string does not imply string → number.
 */

import type { PortDataType } from './diagram'

export const TYPE_COMPATIBILITY: Readonly<Record<string, readonly PortDataType[]>> = {
  'number': ['string'],
  'string': ['object'],
  'array': ['object'],
  'object': ['array'],
  'boolean': ['number', 'string']
}

export function isCompatible(sourceType: PortDataType, targetType: PortDataType): boolean {
  const source = sourceType.toLowerCase()
  const target = targetType.toLowerCase()
  if (source === 'any' || target === 'any') return true
  if (source === target) return true
  const compatibleTargets = TYPE_COMPATIBILITY[source]
  return compatibleTargets ? compatibleTargets.includes(target) : false
}

export function getCompatibleTypes(sourceType: PortDataType): PortDataType[] {
  const source = sourceType.toLowerCase()
  return [source, ...(TYPE_COMPATIBILITY[source] ?? [])]
}
