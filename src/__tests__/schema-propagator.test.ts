import { describe, it, expect, beforeEach, vi } from 'vitest'
import { SchemaPropagator } from '@/diagram/lib/schema-propagator'
import { createEdge } from '@/diagram/lib/edges'
import { createLogger, type LogSink } from '@/diagram/lib/logger'
import { GenericNode } from '@/diagram/nodes/base'
import { EtlSourceNode, EtlTargetNode } from '@/diagram/nodes/etl/endpoints'
import { EtlTransformNode } from '@/diagram/nodes/etl/transform'
import { EtlJoinNode } from '@/diagram/nodes/etl/join'
import type { SchemaInference } from '@/diagram/types/diagram'
import type { Edge } from '@/diagram/types/edge'

class BrokenNode extends GenericNode {
  schemaInference(): SchemaInference {
    return {
      inferOutputSchema: () => {
        throw new Error('boom')
      }
    }
  }
}

function createSink() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies LogSink
}

describe('SchemaPropagator', () => {
  let edges: Edge[]
  let sink: ReturnType<typeof createSink>
  let propagator: SchemaPropagator

  beforeEach(() => {
    edges = []
    sink = createSink()
    propagator = new SchemaPropagator(() => edges, {
      warningColor: '#FF9800',
      logger: createLogger('Test', sink, 'debug')
    })
  })

  describe('attach', () => {
    it('should copy the source output schema onto the edge', () => {
      const source = new EtlSourceNode('src', 'Customers', [{ name: 'Id', dataType: 'int' }])
      const target = new EtlTargetNode('dst', 'Warehouse')
      const edge = createEdge(source.outputs[0], target.inputs[0], 'shared')

      propagator.attach(edge)

      expect(edge.schema).toEqual([
        { name: 'Id', dataType: 'int', isPrimaryKey: false, isForeignKey: false, isNullable: true }
      ])
      expect(edge.status).toBe('normal')
    })

    it('should flag a schema that misses expected columns', () => {
      const source = new EtlSourceNode('src', 'Customers', [{ name: 'Id', dataType: 'int' }])
      const target = new EtlTargetNode('dst', 'Warehouse', [
        { name: 'Id', dataType: 'int' },
        { name: 'Email', dataType: 'string' }
      ])
      const edge = createEdge(source.outputs[0], target.inputs[0], 'shared')

      propagator.attach(edge)

      expect(edge.expectedSchema?.map((c) => c.name)).toEqual(['Id', 'Email'])
      expect(edge.status).toBe('warning')
      expect(edge.statusColor).toBe('#FF9800')
      expect(edge.showStatusIndicator).toBe(true)
    })

    it('should fall back to the target schema only for shared edges', () => {
      const a = new GenericNode('a', 'A')
      const b = new GenericNode('b', 'B')
      b.setPropertyValue('OutputSchema', '[{"name":"x"}]')
      const out = a.addOutput('any')
      const input = b.addInput('any')

      const shared = createEdge(out, input, 'shared')
      propagator.attach(shared)
      expect(shared.schema).toEqual([
        { name: 'x', dataType: '', isPrimaryKey: false, isForeignKey: false, isNullable: true }
      ])

      const exclusive = createEdge(out, input, 'exclusive')
      propagator.attach(exclusive)
      expect(exclusive.schema).toBeNull()
    })

    it('should ignore a malformed schema and log it at debug level', () => {
      const a = new GenericNode('a', 'A')
      const b = new GenericNode('b', 'B')
      a.setPropertyValue('OutputSchema', 'not json')
      const edge = createEdge(a.addOutput('any'), b.addInput('any'), 'exclusive')

      propagator.attach(edge)

      expect(edge.schema).toBeNull()
      expect(sink.debug).toHaveBeenCalledWith(
        expect.stringMatching(/^\[Test\] Ignoring malformed OutputSchema on A \(a\): /)
      )
    })
  })

  describe('reinfer', () => {
    it('should push an inferred schema onto outgoing edges', () => {
      const source = new EtlSourceNode('src', 'Orders', [{ name: 'Total', dataType: 'decimal' }])
      const transform = new EtlTransformNode('tx', 'AddTax', 'Derive')
      transform.addDerivedColumn({ name: 'Tax', dataType: 'decimal', expression: 'Total * 0.2' })
      const target = new EtlTargetNode('dst', 'Sink', [{ name: 'Tax' }])
      const incoming = createEdge(source.outputs[0], transform.inputs[0], 'shared')
      const outgoing = createEdge(transform.outputs[0], target.inputs[0], 'shared')
      edges.push(incoming, outgoing)
      propagator.attach(incoming)

      const result = propagator.reinfer(transform)

      expect(result?.status).toBe('success')
      expect(outgoing.schema?.map((c) => c.name)).toEqual(['Total', 'Tax'])
      expect(outgoing.status).toBe('normal')
      expect(transform.outputSchema?.map((c) => c.name)).toEqual(['Total', 'Tax'])
    })

    it('should clear outgoing schemas and warnings once the input is gone', () => {
      const source = new EtlSourceNode('src', 'Orders', [{ name: 'Total', dataType: 'decimal' }])
      const transform = new EtlTransformNode('tx', 'Filter')
      const target = new EtlTargetNode('dst', 'Sink', [{ name: 'Total' }, { name: 'Tax' }])
      const incoming = createEdge(source.outputs[0], transform.inputs[0], 'shared')
      const outgoing = createEdge(transform.outputs[0], target.inputs[0], 'shared')
      edges.push(incoming, outgoing)
      propagator.attach(incoming)
      propagator.reinfer(transform)
      expect(outgoing.status).toBe('warning')

      edges.splice(0, 1)
      const result = propagator.reinfer(transform)

      expect(result?.status).toBe('skipped')
      expect(transform.outputSchema).toBeNull()
      expect(outgoing.schema).toBeNull()
      expect(outgoing.expectedSchema).toBeNull()
      expect(outgoing.status).toBe('normal')
      expect(outgoing.statusColor).toBeNull()
    })

    it('should return null for nodes without the capability', () => {
      expect(propagator.reinfer(new GenericNode('g', 'Plain'))).toBeNull()
    })

    it('should contain a throwing inference routine and log it once', () => {
      const node = new BrokenNode('broken', 'Broken')

      const result = propagator.reinfer(node)

      expect(result).toEqual({ status: 'error', error: 'boom' })
      expect(sink.warn).toHaveBeenCalledTimes(1)
      expect(sink.warn).toHaveBeenCalledWith('[Test] Schema inference failed for Broken (broken): boom')
    })

    it('should skip nodes whose inputs carry no schema', () => {
      const result = propagator.reinfer(new EtlTransformNode('tx', 'Filter'))
      expect(result).toEqual({ status: 'skipped', reason: 'no schema on input 0' })
      expect(sink.warn).not.toHaveBeenCalled()
    })
  })

  describe('join validation', () => {
    function wireJoin(leftKey: string, rightKey: string) {
      const left = new EtlSourceNode('l', 'Customers', [
        { name: 'Id', dataType: 'int' },
        { name: 'Name', dataType: 'string' }
      ])
      const right = new EtlSourceNode('r', 'Orders', [
        { name: 'CustomerId', dataType: 'int' },
        { name: 'Total', dataType: 'decimal' }
      ])
      const join = new EtlJoinNode('j', 'CustomerOrders', { leftKey, rightKey })
      const target = new EtlTargetNode('t', 'Report')
      // right input wired first: lookup goes by port index, not edge order
      const rightEdge = createEdge(right.outputs[0], join.inputs[1], 'shared')
      const leftEdge = createEdge(left.outputs[0], join.inputs[0], 'shared')
      const outEdge = createEdge(join.outputs[0], target.inputs[0], 'shared')
      edges.push(rightEdge, leftEdge, outEdge)
      propagator.attach(rightEdge)
      propagator.attach(leftEdge)
      propagator.reinfer(join)
      return { leftEdge, rightEdge, outEdge }
    }

    it('should leave edges normal when both keys resolve with matching types', () => {
      const { outEdge } = wireJoin('Id', ' CustomerId ')
      expect(outEdge.schema?.map((c) => c.name)).toEqual(['Id', 'Name', 'CustomerId', 'Total'])
      expect(outEdge.status).toBe('normal')
    })

    it('should flag outgoing edges when a key is missing', () => {
      const { leftEdge, rightEdge, outEdge } = wireJoin('Id', 'Nope')
      expect(outEdge.status).toBe('warning')
      expect(outEdge.statusColor).toBe('#FF9800')
      expect(leftEdge.status).toBe('normal')
      expect(rightEdge.status).toBe('normal')
    })

    it('should flag outgoing edges when key types disagree', () => {
      const { outEdge } = wireJoin('Name', 'CustomerId')
      expect(outEdge.status).toBe('warning')
    })
  })
})
