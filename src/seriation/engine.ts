import pLimit from 'p-limit'
import { info, warn } from '../logger'
import { ClusteringStage } from './clustering'
import { mergeConfig } from './config'
import { BuildCancelledError, EmbeddingDimensionError } from './errors'
import { ConceptGraphBuilder } from './graph'
import { applyOrderFlags, emptyState, EngineState, IncrementalUpdater } from './incremental'
import { IngestOptions, IngestResult, ingestRecords } from './ingest'
import { OrderedSeries, SeriationOrderer } from './ordering'
import { ConceptRegistry } from './registry'
import { SimilarityIndex } from './similarity'
import {
  Document,
  DocumentFailure,
  EngineOutput,
  Oracles,
  ScoredConcept,
  SeriationConfig,
  SeriationConfigOverrides,
  UpdateReport
} from './types'

export interface EngineOptions {
  config?: SeriationConfigOverrides
  registry?: ConceptRegistry
  index?: SimilarityIndex
}

export interface RunOptions {
  signal?: AbortSignal
}

/**
 * Owns one registry, one similarity index and the latest settled state. Full
 * builds fan out one task per cluster; updates go through the incremental
 * updater.
 */
export class SeriationEngine {
  readonly config: SeriationConfig
  readonly registry: ConceptRegistry
  readonly index: SimilarityIndex
  readonly clustering: ClusteringStage
  readonly graphBuilder: ConceptGraphBuilder
  readonly updater: IncrementalUpdater
  private state: EngineState = emptyState()
  private staged = new Map<string, Document>()
  private pendingFailures: DocumentFailure[] = []
  private lastReport: UpdateReport = {
    documentsTouched: 0,
    clustersTouched: 0,
    edgesTouched: 0,
    ambiguities: [],
    failures: [],
    cancelled: false
  }

  constructor(options: EngineOptions = {}) {
    this.config = mergeConfig(options.config)
    this.registry = options.registry ?? new ConceptRegistry(this.config.registry)
    this.index = options.index ?? new SimilarityIndex()
    this.clustering = new ClusteringStage(this.index, this.config.clustering)
    this.graphBuilder = new ConceptGraphBuilder(this.config.graph, this.config.concurrency)
    this.updater = new IncrementalUpdater({
      index: this.index,
      clustering: this.clustering,
      graphBuilder: this.graphBuilder,
      config: this.config
    })
  }

  /** Runs the oracles over raw records and stages the documents for the next build. */
  async ingest(records: readonly unknown[], oracles: Oracles, options: IngestOptions = {}): Promise<IngestResult> {
    const result = await ingestRecords(records, oracles, this.registry, {
      concurrency: options.concurrency ?? this.config.concurrency,
      signal: options.signal
    })
    for (const doc of result.documents) this.staged.set(doc.id, doc)
    this.pendingFailures.push(...result.failures)
    return result
  }

  /** Stages already-extracted documents. */
  stage(documents: readonly Document[]) {
    for (const doc of documents) {
      this.registry.detachDocument(doc.id)
      this.staged.set(doc.id, doc)
    }
  }

  get documents(): Document[] {
    return Array.from(this.state.documents.values())
  }

  /** Full rebuild over every settled and staged document. */
  async build(options: RunOptions = {}): Promise<EngineOutput> {
    const consumed = new Map(this.staged)
    const all = new Map(this.state.documents)
    for (const [id, doc] of consumed) all.set(id, doc)
    for (const id of this.index.ids()) if (!all.has(id)) this.index.delete(id)
    const embeddingFailures: DocumentFailure[] = []
    const documents = Array.from(all.values())
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .map((d) => this.accept(d, embeddingFailures))

    const clusters = this.clustering.cluster(documents)
    const graphResult = await this.graphBuilder.build(documents, clusters, options)
    const byId = new Map(documents.map((d) => [d.id, d]))
    const orderer = new SeriationOrderer(byId, graphResult.graph, this.index)

    const limit = pLimit(this.config.concurrency)
    const cancelled = new Set(graphResult.cancelledClusters)
    const ordered = await Promise.all(
      clusters.map((cluster) =>
        limit(async (): Promise<OrderedSeries | undefined> => {
          if (options.signal?.aborted || cancelled.has(cluster.id)) {
            cancelled.add(cluster.id)
            return undefined
          }
          return orderer.order(cluster)
        })
      )
    )
    const series = new Map<string, OrderedSeries>()
    for (const s of ordered) if (s) series.set(s.clusterId, s)
    const orderAmbiguities = applyOrderFlags(graphResult.graph, series.values())

    const failures: DocumentFailure[] = [
      ...this.pendingFailures,
      ...embeddingFailures,
      ...graphResult.timestampFailures.map((f) => ({ kind: 'timestamp' as const, documentId: f.documentId, message: f.message }))
    ]
    this.pendingFailures = []
    for (const [id, doc] of consumed) if (this.staged.get(id) === doc) this.staged.delete(id)
    if (cancelled.size > 0) {
      const pending = Array.from(cancelled).sort()
      const error = new BuildCancelledError(pending)
      warn(error.message)
      for (const clusterId of pending) failures.push({ kind: 'cancelled', clusterId, message: error.message })
    }

    this.state = {
      documents: byId,
      clusters: new Map(clusters.map((c) => [c.id, c])),
      membership: new Map(clusters.flatMap((c) => c.documentIds.map((id): [string, string] => [id, c.id]))),
      accumulator: graphResult.accumulator,
      graph: graphResult.graph,
      cycleAmbiguities: graphResult.ambiguities,
      series
    }
    this.lastReport = {
      documentsTouched: documents.length,
      clustersTouched: series.size,
      edgesTouched: graphResult.graph.edges.length + graphResult.graph.dropped.length,
      ambiguities: [...graphResult.ambiguities, ...orderAmbiguities],
      failures,
      cancelled: cancelled.size > 0
    }
    info('build complete:', documents.length, 'documents,', clusters.length, 'clusters,', graphResult.graph.edges.length, 'edges')
    return this.output()
  }

  /** Applies new or re-extracted documents without a full rebuild. */
  async apply(changedDocuments: readonly Document[], options: RunOptions = {}): Promise<UpdateReport> {
    const accepted = changedDocuments.map((d) => this.accept(d))
    const { state, report, applied } = await this.updater.apply(this.state, accepted, options)
    const appliedSet = new Set(applied)
    for (const doc of accepted) {
      if (!appliedSet.has(doc.id)) continue
      this.registry.detachDocument(doc.id)
      for (const c of doc.concepts) this.registry.attach(c.ref, doc.id, c.score)
    }
    report.failures.unshift(...this.pendingFailures)
    report.cancelled = report.cancelled || report.failures.some((f) => f.kind === 'cancelled')
    this.pendingFailures = []
    this.state = state
    this.lastReport = report
    return report
  }

  /** Ingests records through the oracles and applies them incrementally. */
  async update(records: readonly unknown[], oracles: Oracles, options: RunOptions = {}): Promise<UpdateReport> {
    const { documents } = await this.ingest(records, oracles, options)
    for (const doc of documents) this.staged.delete(doc.id)
    return this.apply(documents, options)
  }

  series(clusterId: string): OrderedSeries | undefined {
    return this.state.series.get(clusterId)
  }

  snapshot(): Readonly<EngineState> {
    return this.state
  }

  output(): EngineOutput {
    return toEngineOutput(this.registry, this.state, this.lastReport)
  }

  /**
   * Resolves merged concept refs. On a full build (`failures` given) the
   * embedding is mirrored into the index here; a vector the index rejects is
   * reported and dropped, so the document clusters as a singleton. Updates
   * leave the index to the updater, per document.
   */
  private accept(doc: Document, failures?: DocumentFailure[]): Document {
    const scores = new Map<string, number>()
    for (const c of doc.concepts) {
      const ref = this.registry.resolve(c.ref)
      scores.set(ref, Math.max(scores.get(ref) ?? 0, c.score))
    }
    const concepts: ScoredConcept[] = Array.from(scores, ([ref, score]) => ({ ref, score }))
    const resolved: Document = { ...doc, concepts }
    if (!failures) return resolved
    let accepted = resolved
    if (resolved.embedding) {
      try {
        this.index.set(resolved.id, resolved.embedding)
      } catch (err) {
        if (!(err instanceof EmbeddingDimensionError)) throw err
        warn(err.message)
        failures.push({ kind: 'embedding', documentId: resolved.id, message: err.message })
        this.index.delete(resolved.id)
        accepted = { ...resolved, embedding: undefined }
      }
    } else {
      this.index.delete(resolved.id)
    }
    for (const c of concepts) this.registry.attach(c.ref, doc.id, c.score)
    return accepted
  }
}

export function toEngineOutput(registry: ConceptRegistry, state: EngineState, report: UpdateReport): EngineOutput {
  return {
    concepts: registry.concepts().map((c) => ({ id: c.id, name: c.name, aliases: Array.from(c.aliases).sort() })),
    edges: state.graph.allEdges().map((e) => ({
      from: e.from,
      to: e.to,
      weight: e.weight,
      evidence: e.evidence.map((p): [string, string] => [p.earlier, p.later]),
      ambiguous: e.ambiguous
    })),
    series: Array.from(state.series.values())
      .sort((a, b) => (a.clusterId < b.clusterId ? -1 : a.clusterId > b.clusterId ? 1 : 0))
      .map((s) => ({
        clusterId: s.clusterId,
        entries: s.entries.map((e) => ({ documentId: e.documentId, rank: e.rank, parentDocumentId: e.parentDocumentId }))
      })),
    report
  }
}
