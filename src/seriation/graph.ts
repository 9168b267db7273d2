import pLimit from 'p-limit'
import { debug, warn } from '../logger'
import defaultConfig from './config'
import { breakCycles, compareEdges } from './cycles'
import { InsufficientTimestampError } from './errors'
import { daysBetween, isFullyKnown, referenceInstant } from './timestamps'
import { Ambiguity, Cluster, ConceptEdge, ConceptRef, Document, EvidencePair, SeriationConfig } from './types'

interface Contribution {
  pair: EvidencePair
  amount: number
}

interface EdgeSlot {
  from: ConceptRef
  to: ConceptRef
  contributions: Map<string, Contribution>
}

function edgeKey(from: ConceptRef, to: ConceptRef) {
  return `${from}\u0001${to}`
}

function evidenceKey(pair: EvidencePair) {
  return `${pair.earlier}\u0001${pair.later}`
}

/**
 * Per-edge accumulator keyed by the document pair that produced each
 * contribution. Weights are summed in key order, so the same evidence always
 * yields the same weight however it was added.
 */
export class EdgeAccumulator {
  private readonly slots = new Map<string, EdgeSlot>()

  add(from: ConceptRef, to: ConceptRef, pair: EvidencePair, amount: number) {
    const key = edgeKey(from, to)
    let slot = this.slots.get(key)
    if (!slot) {
      slot = { from, to, contributions: new Map() }
      this.slots.set(key, slot)
    }
    const ek = evidenceKey(pair)
    const existing = slot.contributions.get(ek)
    if (existing) existing.amount += amount
    else slot.contributions.set(ek, { pair, amount })
  }

  /** Drops every contribution involving the document; returns the affected edge keys. */
  removeDocument(documentId: string): Set<string> {
    const touched = new Set<string>()
    for (const [key, slot] of this.slots) {
      for (const [ek, c] of slot.contributions) {
        if (c.pair.earlier === documentId || c.pair.later === documentId) {
          slot.contributions.delete(ek)
          touched.add(key)
        }
      }
      if (slot.contributions.size === 0) this.slots.delete(key)
    }
    return touched
  }

  absorb(other: EdgeAccumulator) {
    for (const slot of other.slots.values()) {
      for (const c of slot.contributions.values()) this.add(slot.from, slot.to, c.pair, c.amount)
    }
  }

  clone(): EdgeAccumulator {
    const copy = new EdgeAccumulator()
    copy.absorb(this)
    return copy
  }

  weight(from: ConceptRef, to: ConceptRef): number {
    const slot = this.slots.get(edgeKey(from, to))
    return slot ? sumInKeyOrder(slot) : 0
  }

  get size() {
    return this.slots.size
  }

  edges(): ConceptEdge[] {
    const out: ConceptEdge[] = []
    for (const slot of this.slots.values()) {
      const keys = Array.from(slot.contributions.keys()).sort()
      out.push({
        from: slot.from,
        to: slot.to,
        weight: sumInKeyOrder(slot),
        evidence: keys.flatMap((k) => {
          const c = slot.contributions.get(k)
          return c ? [{ ...c.pair }] : []
        }),
        ambiguous: false
      })
    }
    return out.sort(compareEdges)
  }
}

function sumInKeyOrder(slot: EdgeSlot) {
  let total = 0
  for (const k of Array.from(slot.contributions.keys()).sort()) total += slot.contributions.get(k)?.amount ?? 0
  return total
}

export class ConceptGraph {
  private readonly byKey = new Map<string, ConceptEdge>()
  private readonly out = new Map<ConceptRef, ConceptEdge[]>()

  constructor(
    readonly edges: ConceptEdge[],
    readonly dropped: ConceptEdge[] = []
  ) {
    for (const e of edges) {
      this.byKey.set(edgeKey(e.from, e.to), e)
      const list = this.out.get(e.from)
      if (list) list.push(e)
      else this.out.set(e.from, [e])
    }
  }

  static empty() {
    return new ConceptGraph([], [])
  }

  edge(from: ConceptRef, to: ConceptRef): ConceptEdge | undefined {
    return this.byKey.get(edgeKey(from, to))
  }

  outgoing(from: ConceptRef): ConceptEdge[] {
    return this.out.get(from) ?? []
  }

  /** Flags an active edge; returns false when no such edge exists. */
  markAmbiguous(from: ConceptRef, to: ConceptRef) {
    const e = this.edge(from, to)
    if (!e) return false
    e.ambiguous = true
    return true
  }

  /** Active and dropped edges together, as handed to presentation. */
  allEdges(): ConceptEdge[] {
    return [...this.edges, ...this.dropped].sort(compareEdges)
  }
}

export interface ConceptGraphResult {
  graph: ConceptGraph
  accumulator: EdgeAccumulator
  ambiguities: Ambiguity[]
  timestampFailures: InsufficientTimestampError[]
  cancelledClusters: string[]
}

export interface BuildOptions {
  signal?: AbortSignal
}

interface TimedDocument {
  doc: Document
  instant: number
}

/**
 * Builds the concept influence graph: when two documents share a concept, the
 * earlier document's concepts gain an edge into that shared concept, weighted
 * by both scores and decayed by the time between them.
 */
export class ConceptGraphBuilder {
  constructor(
    private readonly cfg: SeriationConfig['graph'] = defaultConfig.graph,
    private readonly concurrency = defaultConfig.concurrency
  ) {}

  async build(documents: readonly Document[], clusters: readonly Cluster[], options: BuildOptions = {}): Promise<ConceptGraphResult> {
    const { timed, failures } = this.timeline(documents)
    const byId = new Map(timed.map((t) => [t.doc.id, t]))

    const owned = new Set<string>()
    const units: Array<{ id: string; later: TimedDocument[] }> = clusters.map((c) => {
      const later = c.documentIds.flatMap((id) => {
        const t = byId.get(id)
        if (t) owned.add(id)
        return t ? [t] : []
      })
      return { id: c.id, later }
    })
    const orphans = timed.filter((t) => !owned.has(t.doc.id))
    if (orphans.length > 0) units.push({ id: 'unclustered', later: orphans })

    const limit = pLimit(this.concurrency)
    const cancelledClusters: string[] = []
    const partials = await Promise.all(
      units.map((unit) =>
        limit(async () => {
          if (options.signal?.aborted) {
            cancelledClusters.push(unit.id)
            return undefined
          }
          const acc = new EdgeAccumulator()
          for (const later of unit.later) {
            for (const earlier of timed) {
              if (earlier.instant >= later.instant) break
              this.contribute(acc, earlier, later)
            }
          }
          return acc
        })
      )
    )

    const accumulator = new EdgeAccumulator()
    for (const p of partials) if (p) accumulator.absorb(p)
    if (cancelledClusters.length > 0) warn('graph build cancelled for', cancelledClusters.length, 'cluster(s)')
    return { ...this.finalize(accumulator), timestampFailures: failures, cancelledClusters: cancelledClusters.sort() }
  }

  /** Adds contributions for every pair involving one of `changed`. */
  accumulateFor(accumulator: EdgeAccumulator, changed: ReadonlySet<string>, documents: readonly Document[]) {
    const { timed, failures } = this.timeline(documents)
    for (let j = 0; j < timed.length; j++) {
      for (let i = 0; i < j; i++) {
        const earlier = timed[i]
        const later = timed[j]
        if (earlier.instant >= later.instant) continue
        if (!changed.has(earlier.doc.id) && !changed.has(later.doc.id)) continue
        this.contribute(accumulator, earlier, later)
      }
    }
    return failures.filter((f) => changed.has(f.documentId))
  }

  finalize(accumulator: EdgeAccumulator): Pick<ConceptGraphResult, 'graph' | 'accumulator' | 'ambiguities'> {
    const { kept, dropped } = breakCycles(accumulator.edges())
    const ambiguities: Ambiguity[] = dropped.map((e) => {
      e.ambiguous = true
      return {
        kind: 'cycle',
        from: e.from,
        to: e.to,
        weight: e.weight,
        message: `Ambiguous precedence: dropped ${e.from} -> ${e.to} (weight ${e.weight.toFixed(4)}) to break a cycle`
      }
    })
    debug('graph finalized', kept.length, 'edges,', dropped.length, 'dropped')
    return { graph: new ConceptGraph(kept, dropped), accumulator, ambiguities }
  }

  private timeline(documents: readonly Document[]) {
    const timed: TimedDocument[] = []
    const failures: InsufficientTimestampError[] = []
    for (const doc of documents) {
      const instant = referenceInstant(doc.timestamp)
      if (instant === undefined || !isFullyKnown(doc.timestamp)) {
        failures.push(new InsufficientTimestampError(doc.id, doc.timestamp?.raw))
        continue
      }
      timed.push({ doc, instant })
    }
    timed.sort((a, b) => a.instant - b.instant || (a.doc.id < b.doc.id ? -1 : a.doc.id > b.doc.id ? 1 : 0))
    failures.sort((a, b) => (a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0))
    return { timed, failures }
  }

  private contribute(acc: EdgeAccumulator, earlier: TimedDocument, later: TimedDocument) {
    const earlierScores = scoreMap(earlier.doc)
    const laterScores = scoreMap(later.doc)
    const decay = Math.pow(0.5, daysBetween(earlier.instant, later.instant) / this.cfg.halfLifeDays)
    const pair = { earlier: earlier.doc.id, later: later.doc.id }
    for (const [shared, laterScore] of laterScores) {
      const earlierScore = earlierScores.get(shared)
      if (earlierScore === undefined || earlierScore * laterScore < this.cfg.sharedScoreThreshold) continue
      for (const [source, sourceScore] of earlierScores) {
        if (source === shared) continue
        acc.add(source, shared, pair, sourceScore * laterScore * decay)
      }
    }
  }
}

export function scoreMap(doc: Document): Map<ConceptRef, number> {
  const scores = new Map<ConceptRef, number>()
  for (const c of doc.concepts) scores.set(c.ref, Math.max(scores.get(c.ref) ?? 0, c.score))
  return scores
}
