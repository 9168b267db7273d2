import { describe, expect, it } from 'vitest'
import { doc } from '../../test/helpers'
import { ClusteringStage } from './clustering'
import { ConceptGraphBuilder } from './graph'
import { emptyState, IncrementalUpdater } from './incremental'
import { SimilarityIndex } from './similarity'

function updater() {
  const index = new SimilarityIndex()
  return {
    index,
    updater: new IncrementalUpdater({
      index,
      clustering: new ClusteringStage(index),
      graphBuilder: new ConceptGraphBuilder()
    })
  }
}

describe('IncrementalUpdater', () => {
  it('grows a state from nothing one document at a time', async () => {
    const { updater: u, index } = updater()
    const p = doc({ id: 'P', at: '2024-01-01T00:00:00Z', concepts: { 'concept:1': 1, 'concept:2': 1 }, embedding: [1, 0] })
    const q = doc({ id: 'Q', at: '2024-02-01T00:00:00Z', concepts: { 'concept:1': 1, 'concept:2': 1 }, embedding: [1, 0] })
    const { state, report, applied } = await u.apply(emptyState(), [q, p])

    expect(applied).toEqual(['P', 'Q'])
    expect(index.ids()).toEqual(['P', 'Q'])
    const clusters = Array.from(state.clusters.values())
    expect(clusters.map((c) => [c.id, c.documentIds, c.centroid])).toEqual([['cluster:P', ['P', 'Q'], [1, 0]]])
    expect(clusters[0].cohesion).toBeCloseTo(1, 12)
    expect(state.graph.edges.map((e) => `${e.from}->${e.to}`)).toEqual(['concept:2->concept:1'])
    expect(report).toMatchObject({ documentsTouched: 2, clustersTouched: 1, edgesTouched: 2, cancelled: false, failures: [] })
    expect(report.ambiguities.map((a) => [a.kind, a.from, a.to])).toEqual([['cycle', 'concept:1', 'concept:2']])
    expect(state.series.get('cluster:P')?.entries.map((e) => e.documentId)).toEqual(['P', 'Q'])
  })

  it('takes the last version of a document changed twice in one batch', async () => {
    const { updater: u } = updater()
    const first = doc({ id: 'P', concepts: { 'concept:1': 1 }, embedding: [1, 0] })
    const second = doc({ id: 'P', concepts: { 'concept:2': 1 }, embedding: [0, 1] })
    const { state, applied } = await u.apply(emptyState(), [first, second])
    expect(applied).toEqual(['P'])
    expect(state.documents.get('P')?.concepts).toEqual([{ ref: 'concept:2', score: 1 }])
    expect(state.clusters.get('cluster:P')?.centroid).toEqual([0, 1])
  })

  it('never mutates the state it was given', async () => {
    const { updater: u } = updater()
    const before = emptyState()
    await u.apply(before, [doc({ id: 'P', embedding: [1, 0] })])
    expect(before.documents.size).toBe(0)
    expect(before.clusters.size).toBe(0)
    expect(before.accumulator.size).toBe(0)
  })
})
