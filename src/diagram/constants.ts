/**
 * Shared constants for the connection engine.
 */

import type { AutomationNodeType } from './types/diagram'

/** Well-known property keys read from node property maps. */
export const PROPERTY_KEYS = {
  outputSchema: 'OutputSchema',
  expectedSchema: 'ExpectedSchema',
  columns: 'Columns',
  foreignKeys: 'ForeignKeys',
  entityName: 'EntityName',
  kind: 'Kind',
  joinKeyLeft: 'JoinKeyLeft',
  joinKeyRight: 'JoinKeyRight',
  joinType: 'JoinType',
  derivedColumns: 'DerivedColumns',
  groupBy: 'GroupBy',
  aggregates: 'Aggregates'
} as const

export const JOIN_KIND = 'Join'

/** Amber, shown on edges carrying a semantic warning. */
export const WARNING_COLOR = '#FF9800'

/** Animated data-flow color per output port type. */
export const DATA_FLOW_COLORS: Readonly<Record<string, string>> = {
  string: '#008000',
  number: '#0000FF',
  boolean: '#FFA500',
  object: '#800080',
  array: '#FF0000',
  file: '#A52A2A',
  image: '#FFC0CB',
  binary: '#808080'
} as const

export const DEFAULT_DATA_FLOW_COLOR = '#00FFFF'

/** Source → target node type pairs that may never be linked. */
export const DISALLOWED_NODE_TYPE_PAIRS: ReadonlyArray<readonly [AutomationNodeType, AutomationNodeType]> = [
  ['Trigger', 'Trigger'],
  ['DataSource', 'DataSource']
]

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const DEFAULT_CONNECTION_CONFIG = {
  logLevel: 'info' as LogLevel,
  warningColor: WARNING_COLOR,
  dataFlowColors: DATA_FLOW_COLORS,
  defaultDataFlowColor: DEFAULT_DATA_FLOW_COLOR
}
