export * from './diagram/types'
export {
  PROPERTY_KEYS,
  JOIN_KIND,
  WARNING_COLOR,
  DATA_FLOW_COLORS,
  DEFAULT_DATA_FLOW_COLOR,
  DISALLOWED_NODE_TYPE_PAIRS,
  DEFAULT_CONNECTION_CONFIG
} from './diagram/constants'
export type { LogLevel } from './diagram/constants'

export {
  ConnectionManager,
  type ConnectOptions,
  type ConnectionManagerOptions
} from './diagram/engine/connection-manager'
export { InvalidArgumentError } from './diagram/engine/errors'
export { HistoryLog, EdgeCommand, type Command, type CommandType } from './diagram/engine/history'
export { PortRegistry } from './diagram/engine/port-registry'
export { createDiagramStore, type DiagramState, type DiagramStore } from './diagram/stores/diagram.store'

export {
  columnDefinitionSchema,
  columnSchemaSchema,
  parseColumnSchema,
  serializeColumnSchema,
  schemasCompatible,
  findColumn,
  type ColumnInput
} from './diagram/lib/column-schema'
export {
  foreignKeyDefinitionSchema,
  parseForeignKeys,
  serializeForeignKeys,
  type ForeignKeyInput
} from './diagram/lib/foreign-keys'
export { wouldCreateCycle, type SimpleEdge } from './diagram/lib/cycle-detector'
export { areNodeTypesCompatible } from './diagram/lib/node-compatibility'
export { validatePkFk, type PkFkOutcome } from './diagram/lib/pk-fk-validator'
export { SchemaPropagator, type SchemaPropagatorOptions } from './diagram/lib/schema-propagator'
export { createLogger, type Logger, type LogSink } from './diagram/lib/logger'

export { BaseDiagramNode, GenericNode, type PortOptions } from './diagram/nodes/base'
export { AutomationNode } from './diagram/nodes/automation'
export { ErdEntityNode, type ErdEntityOptions } from './diagram/nodes/erd-entity'
export { EtlNode, DerivedEtlNode, ETL_KINDS, type EtlKind } from './diagram/nodes/etl/etl-node'
export { EtlSourceNode, EtlTargetNode } from './diagram/nodes/etl/endpoints'
export { EtlTransformNode, type DerivedColumn, type TransformKind } from './diagram/nodes/etl/transform'
export { EtlJoinNode, JOIN_TYPES, type JoinType, type JoinOptions } from './diagram/nodes/etl/join'
export { EtlAggregateNode, AGGREGATE_FUNCTIONS, type Aggregate, type AggregateOptions } from './diagram/nodes/etl/aggregate'
