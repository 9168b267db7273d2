import { InconsistentOrderError } from './errors'
import { ConceptGraph, scoreMap } from './graph'
import { cosineSimilarity, SimilarityIndex } from './similarity'
import { strictlyBefore } from './timestamps'
import { Ambiguity, Cluster, ConceptEdge, Document, SeriesEntry } from './types'

export interface OrderedSeries {
  clusterId: string
  entries: SeriesEntry[]
  conflicts: InconsistentOrderError[]
}

interface Link {
  weight: number
  strongest?: ConceptEdge
}

function compareIds(a: string, b: string) {
  return a < b ? -1 : a > b ? 1 : 0
}

export function conflictToAmbiguity(conflict: InconsistentOrderError): Ambiguity | undefined {
  if (!conflict.edge) return undefined
  return {
    kind: 'order-conflict',
    from: conflict.edge.from,
    to: conflict.edge.to,
    weight: conflict.edge.weight,
    clusterId: conflict.clusterId,
    documents: conflict.documents,
    message: conflict.message
  }
}

/**
 * Orders the documents of one cluster. Known timestamps and concept links are
 * hard constraints; similarity to the centroid only breaks ties. Entries form a
 * forest through `parentDocumentId`.
 */
export class SeriationOrderer {
  constructor(
    private readonly documents: ReadonlyMap<string, Document>,
    private readonly graph: ConceptGraph,
    private readonly index: SimilarityIndex
  ) {}

  order(cluster: Cluster): OrderedSeries {
    const members = cluster.documentIds
      .map((id) => this.documents.get(id))
      .filter((d): d is Document => d !== undefined)
      .sort((a, b) => compareIds(a.id, b.id))
    const ids = members.map((d) => d.id)
    const links = this.documentLinks(members)
    const link = (a: string, b: string) => links.get(a)?.get(b)?.weight ?? 0

    const successors = new Map<string, Set<string>>(ids.map((id) => [id, new Set<string>()]))
    const addConstraint = (a: string, b: string) => successors.get(a)?.add(b)
    for (const a of members) {
      for (const b of members) {
        if (a !== b && strictlyBefore(a.timestamp, b.timestamp)) addConstraint(a.id, b.id)
      }
    }

    const candidates: Array<{ a: Document; b: Document; weight: number; strongest?: ConceptEdge }> = []
    for (const a of members) {
      for (const b of members) {
        if (a === b) continue
        const forward = links.get(a.id)?.get(b.id)
        if (forward && forward.weight > link(b.id, a.id)) {
          candidates.push({ a, b, weight: forward.weight, strongest: forward.strongest })
        }
      }
    }
    candidates.sort((x, y) => y.weight - x.weight || compareIds(x.a.id, y.a.id) || compareIds(x.b.id, y.b.id))

    const conflicts: InconsistentOrderError[] = []
    const edgeInfo = (e?: ConceptEdge) => (e ? { from: e.from, to: e.to, weight: e.weight } : undefined)
    for (const { a, b, strongest } of candidates) {
      const pair = { earlier: a.id, later: b.id }
      if (strictlyBefore(b.timestamp, a.timestamp)) {
        conflicts.push(new InconsistentOrderError(cluster.id, pair, edgeInfo(strongest), 'timestamp'))
        continue
      }
      if (successors.get(a.id)?.has(b.id)) continue
      if (reachable(successors, b.id, a.id)) {
        conflicts.push(new InconsistentOrderError(cluster.id, pair, edgeInfo(strongest), 'cycle'))
        continue
      }
      addConstraint(a.id, b.id)
    }

    const order = this.topologicalOrder(ids, successors, cluster)
    const rankOf = new Map(order.map((id, i) => [id, i + 1]))
    const entries: SeriesEntry[] = order.map((documentId, i) => {
      let parent: string | null = null
      let parentWeight = 0
      for (let p = i - 1; p >= 0; p--) {
        const w = link(order[p], documentId)
        if (w > parentWeight) {
          parent = order[p]
          parentWeight = w
        }
      }
      return { documentId, clusterId: cluster.id, rank: rankOf.get(documentId) ?? i + 1, parentDocumentId: parent }
    })
    return { clusterId: cluster.id, entries, conflicts }
  }

  similarityToCentroid(documentId: string, cluster: Cluster): number {
    if (!cluster.centroid || !this.index.has(documentId)) return 0
    return cosineSimilarity(this.index.get(documentId), cluster.centroid)
  }

  /** w(a,b): total weight of active concept edges from a concept of `a` into a concept of `b`. */
  private documentLinks(members: Document[]) {
    const concepts = new Map(members.map((d) => [d.id, scoreMap(d)]))
    const links = new Map<string, Map<string, Link>>()
    for (const a of members) {
      const row = new Map<string, Link>()
      for (const source of concepts.get(a.id)?.keys() ?? []) {
        for (const e of this.graph.outgoing(source)) {
          for (const b of members) {
            if (b === a || !concepts.get(b.id)?.has(e.to)) continue
            const entry = row.get(b.id) ?? { weight: 0 }
            entry.weight += e.weight
            if (!entry.strongest || e.weight > entry.strongest.weight) entry.strongest = e
            row.set(b.id, entry)
          }
        }
      }
      links.set(a.id, row)
    }
    return links
  }

  private topologicalOrder(ids: string[], successors: Map<string, Set<string>>, cluster: Cluster): string[] {
    const indegree = new Map<string, number>(ids.map((id) => [id, 0]))
    for (const next of successors.values()) {
      for (const id of next) indegree.set(id, (indegree.get(id) ?? 0) + 1)
    }
    const similarity = new Map(ids.map((id) => [id, this.similarityToCentroid(id, cluster)]))
    const preferred = (a: string, b: string) => (similarity.get(b) ?? 0) - (similarity.get(a) ?? 0) || compareIds(a, b)

    const ready = ids.filter((id) => indegree.get(id) === 0)
    const order: string[] = []
    while (ready.length > 0) {
      ready.sort(preferred)
      const id = ready.shift()
      if (id === undefined) break
      order.push(id)
      for (const next of successors.get(id) ?? []) {
        const remaining = (indegree.get(next) ?? 0) - 1
        indegree.set(next, remaining)
        if (remaining === 0) ready.push(next)
      }
    }
    return order
  }
}

function reachable(successors: Map<string, Set<string>>, from: string, to: string): boolean {
  const seen = new Set<string>([from])
  const stack = [from]
  while (stack.length > 0) {
    const current = stack.pop()
    if (current === undefined) break
    if (current === to) return true
    for (const next of successors.get(current) ?? []) {
      if (!seen.has(next)) {
        seen.add(next)
        stack.push(next)
      }
    }
  }
  return false
}
