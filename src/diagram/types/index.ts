export type {
  ColumnDefinition, ColumnSchema, ForeignKeyDefinition, ParseResult
} from './schema'

export type {
  PortDirection, PortDataType, Port, NodeFamily, AutomationNodeType,
  PropertyType, NodeProperty, UpstreamSchemaLookup, InferenceResult,
  SchemaInference, DiagramNode, AutomationDiagramNode
} from './diagram'
export { isAutomationNode } from './diagram'

export type {
  Edge, EdgeStatus, EdgePolicy, EdgeLabels, Multiplicity, MultiplicityPreset,
  DataFlowDirection, RejectionReason, ConnectionValidationResult
} from './edge'

export { TYPE_COMPATIBILITY, isCompatible, getCompatibleTypes } from './type-compatibility'
