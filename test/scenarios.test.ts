import { describe, expect, it, vi } from 'vitest'
import { createFixedOracles } from '../src/oracles/fixed'
import { SeriationEngine } from '../src/seriation/engine'
import { hasCycle } from '../src/seriation/cycles'
import { runSeriationPipeline } from '../src/seriation/pipeline'
import { developmentEdgeWeight, developmentOracles, developmentRecords } from './helpers'

describe('seriation scenarios', () => {
  it('orders a three-step development of loss functions into regularization', async () => {
    const { output } = await runSeriationPipeline(developmentRecords, developmentOracles())
    expect(output.concepts).toEqual([
      { id: 'concept:1', name: 'loss_functions', aliases: ['loss functions'] },
      { id: 'concept:2', name: 'regularization', aliases: ['regularization'] }
    ])
    expect(output.edges).toEqual([
      { from: 'concept:1', to: 'concept:2', weight: developmentEdgeWeight, evidence: [['B', 'C']], ambiguous: false }
    ])
    expect(output.series).toEqual([
      {
        clusterId: 'cluster:A',
        entries: [
          { documentId: 'A', rank: 1, parentDocumentId: null },
          { documentId: 'B', rank: 2, parentDocumentId: 'A' },
          { documentId: 'C', rank: 3, parentDocumentId: 'B' }
        ]
      }
    ])
    expect(output.report).toEqual({
      documentsTouched: 3,
      clustersTouched: 1,
      edgesTouched: 1,
      ambiguities: [],
      failures: [],
      cancelled: false
    })
  })

  it('keeps unrelated documents with the same timestamp apart', async () => {
    const records = [
      { id: 'D1', text: 'conv', timestamp: '2024-04-01T00:00:00Z', classification: 'produced' },
      { id: 'D2', text: 'tok', timestamp: '2024-04-01T00:00:00Z', classification: 'produced' }
    ]
    const oracles = createFixedOracles([
      { text: 'conv', concepts: [{ name: 'convolution', score: 1 }], embedding: [1, 0] },
      { text: 'tok', concepts: [{ name: 'tokenization', score: 1 }], embedding: [0, 1] }
    ])
    const { output } = await runSeriationPipeline(records, oracles)
    expect(output.edges).toEqual([])
    expect(output.series).toEqual([
      { clusterId: 'cluster:D1', entries: [{ documentId: 'D1', rank: 1, parentDocumentId: null }] },
      { clusterId: 'cluster:D2', entries: [{ documentId: 'D2', rank: 1, parentDocumentId: null }] }
    ])
  })

  it('canonicalizes a registered alias across documents', async () => {
    const engine = new SeriationEngine()
    const ref = engine.registry.canonicalize('machine learning')
    engine.registry.registerAlias('ML', ref)
    const oracles = createFixedOracles([
      { text: 'long form', concepts: [{ name: 'machine learning', score: 0.9 }] },
      { text: 'short form', concepts: [{ name: 'ML', score: 0.8 }] }
    ])
    await engine.ingest(
      [
        { id: 'doc1', text: 'long form', classification: 'consumed' },
        { id: 'doc2', text: 'short form', classification: 'consumed' }
      ],
      oracles
    )
    const output = await engine.build()
    expect(output.concepts).toEqual([{ id: ref, name: 'machine learning', aliases: ['machine learning', 'ml'] }])
    expect(Array.from(engine.registry.lookup(ref).documents.keys()).sort()).toEqual(['doc1', 'doc2'])
  })
})

describe('engine properties', () => {
  it('builds identical graphs twice in a row', async () => {
    const engine = new SeriationEngine()
    await engine.ingest(developmentRecords, developmentOracles())
    const first = await engine.build()
    const second = await engine.build()
    expect(second.edges).toEqual(first.edges)
    expect(second.series).toEqual(first.series)
  })

  it('never returns a cyclic graph', async () => {
    const oracles = createFixedOracles([
      { text: 'one', concepts: [{ name: 'attention', score: 1 }, { name: 'recurrence', score: 1 }], embedding: [1, 0] },
      { text: 'two', concepts: [{ name: 'attention', score: 1 }, { name: 'recurrence', score: 1 }], embedding: [1, 0.1] },
      { text: 'three', concepts: [{ name: 'recurrence', score: 0.9 }, { name: 'attention', score: 0.6 }], embedding: [1, 0.2] }
    ])
    const records = [
      { id: 'r1', text: 'one', timestamp: '2023-01-01T00:00:00Z', classification: 'produced' },
      { id: 'r2', text: 'two', timestamp: '2023-06-01T00:00:00Z', classification: 'produced' },
      { id: 'r3', text: 'three', timestamp: '2023-09-01T00:00:00Z', classification: 'produced' }
    ]
    const { engine, output } = await runSeriationPipeline(records, oracles)
    expect(hasCycle(engine.snapshot().graph.edges)).toBe(false)
    expect(output.edges.filter((e) => e.ambiguous)).toHaveLength(1)
    expect(output.report.ambiguities.map((a) => a.kind)).toEqual(['cycle'])
  })

  it('matches a full rebuild after applying one new document', async () => {
    const incremental = new SeriationEngine()
    await incremental.ingest(developmentRecords.slice(0, 2), developmentOracles())
    await incremental.build()
    const report = await incremental.update(developmentRecords.slice(2), developmentOracles())

    const full = new SeriationEngine()
    await full.ingest(developmentRecords, developmentOracles())
    await full.build()

    expect(report.documentsTouched).toBe(1)
    expect(report.failures).toEqual([])
    expect(incremental.output().concepts).toEqual(full.output().concepts)
    expect(incremental.output().edges).toEqual(full.output().edges)
    expect(incremental.output().series).toEqual(full.output().series)
  })

  it('rolls a failed cluster placement back to a singleton', async () => {
    const engine = new SeriationEngine()
    await engine.ingest(developmentRecords.slice(0, 2), developmentOracles())
    await engine.build()
    vi.spyOn(engine.clustering, 'describe').mockImplementationOnce(() => {
      throw new Error('boom')
    })

    const report = await engine.update(developmentRecords.slice(2), developmentOracles())
    expect(report.failures).toEqual([{ kind: 'cluster-update', documentId: 'C', clusterId: undefined, message: 'Update of cluster:C failed: boom' }])
    const clusters = engine.snapshot().clusters
    expect(Array.from(clusters.keys()).sort()).toEqual(['cluster:A', 'cluster:C'])
    expect(clusters.get('cluster:A')?.documentIds).toEqual(['A', 'B'])
    expect(engine.output().series).toEqual([
      {
        clusterId: 'cluster:A',
        entries: [
          { documentId: 'A', rank: 1, parentDocumentId: null },
          { documentId: 'B', rank: 2, parentDocumentId: 'A' }
        ]
      },
      { clusterId: 'cluster:C', entries: [{ documentId: 'C', rank: 1, parentDocumentId: null }] }
    ])
  })
})
