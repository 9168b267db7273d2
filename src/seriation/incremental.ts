import pLimit from 'p-limit'
import { debug, warn } from '../logger'
import { ClusteringStage, clusterIdFor } from './clustering'
import defaultConfig from './config'
import { ClusterUpdateFailure, EmbeddingDimensionError } from './errors'
import { ConceptGraph, ConceptGraphBuilder, EdgeAccumulator } from './graph'
import { conflictToAmbiguity, OrderedSeries, SeriationOrderer } from './ordering'
import { cosineSimilarity, SimilarityIndex } from './similarity'
import { Ambiguity, Cluster, ConceptEdge, ConceptRef, Document, DocumentFailure, SeriationConfig, UpdateReport } from './types'

/** Everything a build or update settles on. Replaced wholesale, never patched in place. */
export interface EngineState {
  documents: Map<string, Document>
  clusters: Map<string, Cluster>
  membership: Map<string, string> // documentId -> clusterId
  accumulator: EdgeAccumulator
  graph: ConceptGraph
  cycleAmbiguities: Ambiguity[]
  series: Map<string, OrderedSeries>
}

export function emptyState(): EngineState {
  return {
    documents: new Map(),
    clusters: new Map(),
    membership: new Map(),
    accumulator: new EdgeAccumulator(),
    graph: ConceptGraph.empty(),
    cycleAmbiguities: [],
    series: new Map()
  }
}

export interface ApplyOptions {
  signal?: AbortSignal
}

interface Placement {
  remove: string[]
  add: Cluster[]
}

function singletonCluster(doc: Document, index: SimilarityIndex): Cluster {
  return {
    id: clusterIdFor([doc.id]),
    documentIds: [doc.id],
    centroid: index.has(doc.id) ? [...index.get(doc.id)] : undefined,
    cohesion: 1
  }
}

function edgeStates(graph: ConceptGraph) {
  const states = new Map<string, string>()
  const record = (e: ConceptEdge, active: boolean) => states.set(`${e.from}\u0001${e.to}`, `${active}:${e.weight}`)
  for (const e of graph.edges) record(e, true)
  for (const e of graph.dropped) record(e, false)
  return states
}

/** Applies order-conflict flags of every series to a freshly finalized graph. */
export function applyOrderFlags(graph: ConceptGraph, series: Iterable<OrderedSeries>): Ambiguity[] {
  const ambiguities: Ambiguity[] = []
  for (const s of series) {
    for (const conflict of s.conflicts) {
      const ambiguity = conflictToAmbiguity(conflict)
      if (ambiguity && graph.markAmbiguous(ambiguity.from, ambiguity.to)) ambiguities.push(ambiguity)
    }
  }
  return ambiguities
}

export interface UpdaterDependencies {
  index: SimilarityIndex
  clustering: ClusteringStage
  graphBuilder: ConceptGraphBuilder
  config?: SeriationConfig
}

/**
 * Folds new or re-extracted documents into an existing state. Only pairs that
 * involve a changed document are re-scored, only the clusters around it are
 * re-clustered, and each cluster placement commits all-or-nothing.
 */
export class IncrementalUpdater {
  private readonly cfg: SeriationConfig

  constructor(private readonly deps: UpdaterDependencies) {
    this.cfg = deps.config ?? defaultConfig
  }

  async apply(
    state: EngineState,
    changedDocuments: readonly Document[],
    options: ApplyOptions = {}
  ): Promise<{ state: EngineState; report: UpdateReport; applied: string[] }> {
    // vectors held by the index before this call, per document written
    const written = new Map<string, number[] | undefined>()
    try {
      return await this.applyAll(state, changedDocuments, options, written)
    } catch (err) {
      for (const id of written.keys()) this.deps.index.delete(id)
      for (const [id, vector] of written) if (vector) this.deps.index.set(id, vector)
      throw err
    }
  }

  private async applyAll(
    state: EngineState,
    changedDocuments: readonly Document[],
    options: ApplyOptions,
    written: Map<string, number[] | undefined>
  ): Promise<{ state: EngineState; report: UpdateReport; applied: string[] }> {
    const latest = new Map<string, Document>()
    for (const doc of changedDocuments) latest.set(doc.id, doc)
    const pending = Array.from(latest.values()).sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))

    const documents = new Map(state.documents)
    const clusters = new Map(state.clusters)
    const membership = new Map(state.membership)
    const failures: DocumentFailure[] = []
    const membershipTouched = new Set<string>()
    const applied: string[] = []
    let cancelled = false

    for (const changed of pending) {
      if (options.signal?.aborted) {
        cancelled = true
        failures.push({ kind: 'cancelled', documentId: changed.id, message: `Update of "${changed.id}" cancelled before it started` })
        continue
      }
      const doc = this.admitEmbedding(changed, failures)
      const previous = documents.get(doc.id)
      documents.set(doc.id, doc)
      applied.push(doc.id)

      const view = { documents, clusters, membership }
      try {
        this.syncEmbedding(doc, written)
        const placement = this.place(doc, previous !== undefined, view)
        this.validate(placement, doc, view)
        for (const id of placement.remove) {
          clusters.delete(id)
          membershipTouched.add(id)
        }
        for (const c of placement.add) {
          clusters.set(c.id, c)
          for (const member of c.documentIds) membership.set(member, c.id)
          membershipTouched.add(c.id)
        }
      } catch (err) {
        const prior = membership.get(doc.id)
        const failure = new ClusterUpdateFailure(prior ? [prior] : [clusterIdFor([doc.id])], err)
        warn(failure.message)
        failures.push({ kind: 'cluster-update', documentId: doc.id, clusterId: prior, message: failure.message })
        if (!prior) {
          const single = singletonCluster(doc, this.deps.index)
          clusters.set(single.id, single)
          membership.set(doc.id, single.id)
          membershipTouched.add(single.id)
        }
      }
    }

    const accumulator = state.accumulator.clone()
    const appliedSet = new Set(applied)
    for (const id of applied) accumulator.removeDocument(id)
    const timestampFailures = this.deps.graphBuilder.accumulateFor(accumulator, appliedSet, Array.from(documents.values()))
    for (const f of timestampFailures) failures.push({ kind: 'timestamp', documentId: f.documentId, message: f.message })
    const { graph, ambiguities: cycleAmbiguities } = this.deps.graphBuilder.finalize(accumulator)

    const before = edgeStates(state.graph)
    const after = edgeStates(graph)
    const changedConcepts = new Set<ConceptRef>()
    for (const key of new Set([...before.keys(), ...after.keys()])) {
      if (before.get(key) === after.get(key)) continue
      const [from, to] = key.split('\u0001')
      changedConcepts.add(from)
      changedConcepts.add(to)
    }
    const edgesTouched = Array.from(new Set([...before.keys(), ...after.keys()])).filter((k) => before.get(k) !== after.get(k)).length

    const reorder = new Set(Array.from(membershipTouched).filter((id) => clusters.has(id)))
    if (changedConcepts.size > 0) {
      for (const doc of documents.values()) {
        const clusterId = membership.get(doc.id)
        if (clusterId && doc.concepts.some((c) => changedConcepts.has(c.ref))) reorder.add(clusterId)
      }
    }

    const series = new Map(state.series)
    for (const id of series.keys()) if (!clusters.has(id)) series.delete(id)
    const orderer = new SeriationOrderer(documents, graph, this.deps.index)
    const limit = pLimit(this.cfg.concurrency)
    const reordered = await Promise.all(
      Array.from(reorder)
        .sort()
        .map((id) =>
          limit(async () => {
            const cluster = clusters.get(id)
            return cluster ? orderer.order(cluster) : undefined
          })
        )
    )
    for (const s of reordered) if (s) series.set(s.clusterId, s)

    const orderAmbiguities = applyOrderFlags(graph, series.values())
    const reorderedIds = new Set(reordered.flatMap((s) => (s ? [s.clusterId] : [])))
    debug('incremental update', applied.length, 'documents,', reorderedIds.size, 'clusters reordered,', edgesTouched, 'edges')

    const next: EngineState = {
      documents,
      clusters,
      membership,
      accumulator,
      graph,
      cycleAmbiguities,
      series
    }
    const report: UpdateReport = {
      documentsTouched: applied.length,
      clustersTouched: new Set([...reorderedIds, ...Array.from(membershipTouched).filter((id) => clusters.has(id))]).size,
      edgesTouched,
      ambiguities: [...cycleAmbiguities, ...orderAmbiguities.filter((a) => a.clusterId !== undefined && reorderedIds.has(a.clusterId))],
      failures,
      cancelled
    }
    return { state: next, report, applied }
  }

  /** Drops a vector the index would reject, so the document is placed without one. */
  private admitEmbedding(doc: Document, failures: DocumentFailure[]): Document {
    if (!doc.embedding) return doc
    try {
      this.deps.index.check(doc.id, doc.embedding)
      return doc
    } catch (err) {
      if (!(err instanceof EmbeddingDimensionError)) throw err
      warn(err.message)
      failures.push({ kind: 'embedding', documentId: doc.id, message: err.message })
      return { ...doc, embedding: undefined }
    }
  }

  private syncEmbedding(doc: Document, written: Map<string, number[] | undefined>) {
    const index = this.deps.index
    if (!written.has(doc.id)) written.set(doc.id, index.has(doc.id) ? index.get(doc.id) : undefined)
    if (doc.embedding) index.set(doc.id, doc.embedding)
    else index.delete(doc.id)
  }

  private membersOf(cluster: Cluster, documents: Map<string, Document>, except?: string): Document[] {
    return cluster.documentIds.flatMap((id) => {
      const d = documents.get(id)
      return d && id !== except ? [d] : []
    })
  }

  /** Re-describes what is left of a cluster, splitting it locally if it fell below the floor. */
  private remainder(cluster: Cluster, docId: string, documents: Map<string, Document>): Cluster[] {
    const rest = this.membersOf(cluster, documents, docId)
    if (rest.length === 0) return []
    const described = this.deps.clustering.describe(rest)
    if (rest.length === 1 || described.cohesion >= this.deps.clustering.cohesionFloor) return [described]
    return this.deps.clustering.cluster(rest)
  }

  private place(
    doc: Document,
    existed: boolean,
    view: { documents: Map<string, Document>; clusters: Map<string, Cluster>; membership: Map<string, string> }
  ): Placement {
    const { documents, clusters, membership } = view
    const clustering = this.deps.clustering
    const previousId = existed ? membership.get(doc.id) : undefined
    const previous = previousId ? clusters.get(previousId) : undefined
    const remove: string[] = previous ? [previous.id] : []
    const leftover = previous ? this.remainder(previous, doc.id, documents) : []

    if (!this.deps.index.has(doc.id)) {
      return { remove, add: [...leftover, clustering.describe([doc])] }
    }

    const vector = this.deps.index.get(doc.id)
    const candidates = [...leftover, ...Array.from(clusters.values()).filter((c) => c.id !== previousId)]
      .filter((c) => c.centroid !== undefined)
      .map((c) => ({ cluster: c, score: c.centroid ? cosineSimilarity(vector, c.centroid) : 0 }))
      .sort((a, b) => b.score - a.score || (a.cluster.id < b.cluster.id ? -1 : a.cluster.id > b.cluster.id ? 1 : 0))

    const best = candidates[0]
    if (best && best.score >= clustering.cohesionFloor) {
      const joined = clustering.describe([...this.membersOf(best.cluster, documents, doc.id), doc])
      if (joined.cohesion >= clustering.cohesionFloor) {
        const fromLeftover = leftover.includes(best.cluster)
        return {
          remove: fromLeftover ? remove : [...remove, best.cluster.id],
          add: [...leftover.filter((c) => c !== best.cluster), joined]
        }
      }
    }

    // local re-cluster of the nearest cluster and its neighbours
    const local = candidates.slice(0, 1 + this.cfg.incremental.neighborClusters).map((c) => c.cluster)
    const members = [doc, ...local.flatMap((c) => this.membersOf(c, documents, doc.id))]
    debug('local re-cluster around', doc.id, 'over', local.map((c) => c.id))
    const reclustered = clustering.cluster(members)
    return {
      remove: [...remove, ...local.filter((c) => !leftover.includes(c)).map((c) => c.id)],
      add: [...leftover.filter((c) => !local.includes(c)), ...reclustered]
    }
  }

  private validate(
    placement: Placement,
    doc: Document,
    view: { documents: Map<string, Document>; clusters: Map<string, Cluster> }
  ) {
    const expected = new Set<string>([doc.id])
    for (const id of placement.remove) {
      const c = view.clusters.get(id)
      if (!c) throw new Error(`Cluster ${id} vanished during update`)
      for (const member of c.documentIds) expected.add(member)
    }
    const seen = new Set<string>()
    for (const c of placement.add) {
      for (const member of c.documentIds) {
        if (seen.has(member)) throw new Error(`Document ${member} placed twice`)
        if (!view.documents.has(member)) throw new Error(`Unknown document ${member}`)
        seen.add(member)
      }
      if (c.documentIds.length > 1 && c.cohesion < this.deps.clustering.cohesionFloor) {
        throw new Error(`Cluster ${c.id} cohesion ${c.cohesion.toFixed(3)} below floor`)
      }
    }
    for (const id of expected) if (!seen.has(id)) throw new Error(`Document ${id} lost during update`)
    for (const id of seen) if (!expected.has(id)) throw new Error(`Document ${id} pulled in from an untouched cluster`)
  }
}
