import { debug } from '../logger'
import defaultConfig from './config'
import { meanVector, SimilarityIndex } from './similarity'
import { Cluster, Document, SeriationConfig } from './types'

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 0
  let shared = 0
  for (const x of a) if (b.has(x)) shared++
  return shared / (a.size + b.size - shared)
}

export function clusterIdFor(documentIds: readonly string[]) {
  return `cluster:${[...documentIds].sort()[0]}`
}

function byId(a: { id: string }, b: { id: string }) {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

interface Group {
  id: string
  members: number[]
}

/**
 * Average-linkage agglomerative clustering over a hybrid similarity: cosine of
 * the embeddings blended with the Jaccard overlap of concept sets. Merging
 * stops at the cohesion floor, so weakly related documents stay on their own.
 */
export class ClusteringStage {
  private readonly conceptSets = new WeakMap<Document, Set<string>>()

  constructor(
    private readonly index: SimilarityIndex,
    private readonly cfg: SeriationConfig['clustering'] = defaultConfig.clustering
  ) {}

  get cohesionFloor() {
    return this.cfg.cohesionFloor
  }

  combinedSimilarity(a: Document, b: Document): number {
    const embedding = this.index.similarity(a.id, b.id)
    const concepts = jaccard(this.conceptsOf(a), this.conceptsOf(b))
    return this.cfg.embeddingWeight * embedding + this.cfg.conceptWeight * concepts
  }

  /** Mean pairwise combined similarity; 1 for a single document. */
  meanPairwiseSimilarity(documents: readonly Document[]): number {
    if (documents.length < 2) return 1
    let sum = 0
    let pairs = 0
    for (let i = 0; i < documents.length; i++) {
      for (let j = i + 1; j < documents.length; j++) {
        sum += this.combinedSimilarity(documents[i], documents[j])
        pairs++
      }
    }
    return sum / pairs
  }

  describe(documents: readonly Document[]): Cluster {
    const members = [...documents].sort(byId)
    const embedded = members.filter((d) => this.index.has(d.id))
    const canScore = embedded.length === members.length
    return {
      id: clusterIdFor(members.map((d) => d.id)),
      documentIds: members.map((d) => d.id),
      centroid: meanVector(embedded.map((d) => this.index.get(d.id))),
      cohesion: canScore ? this.meanPairwiseSimilarity(members) : 1
    }
  }

  cluster(documents: readonly Document[]): Cluster[] {
    const docs = [...documents].sort(byId)
    const embedded = docs.filter((d) => this.index.has(d.id))
    const loose = docs.filter((d) => !this.index.has(d.id))
    if (embedded.length < 2) {
      debug('clustering: fewer than two embeddings, all singletons')
      return docs.map((d) => this.describe([d]))
    }

    const n = embedded.length
    const sums: number[][] = Array.from({ length: n }, () => new Array<number>(n).fill(0))
    for (let i = 0; i < n; i++) {
      for (let j = i + 1; j < n; j++) {
        const s = this.combinedSimilarity(embedded[i], embedded[j])
        sums[i][j] = s
        sums[j][i] = s
      }
    }
    const groups: Array<Group | undefined> = embedded.map((d, i) => ({ id: d.id, members: [i] }))

    for (;;) {
      let best: { i: number; j: number; score: number; key: string } | undefined
      for (let i = 0; i < n; i++) {
        const gi = groups[i]
        if (!gi) continue
        for (let j = i + 1; j < n; j++) {
          const gj = groups[j]
          if (!gj) continue
          const score = sums[i][j] / (gi.members.length * gj.members.length)
          const key = gi.id < gj.id ? `${gi.id}|${gj.id}` : `${gj.id}|${gi.id}`
          if (!best || score > best.score || (score === best.score && key < best.key)) best = { i, j, score, key }
        }
      }
      if (!best || best.score < this.cfg.cohesionFloor) break

      const target = groups[best.i]
      const source = groups[best.j]
      if (!target || !source) break
      target.members.push(...source.members)
      target.id = target.id < source.id ? target.id : source.id
      groups[best.j] = undefined
      for (let k = 0; k < n; k++) {
        if (k === best.i || !groups[k]) continue
        sums[best.i][k] += sums[best.j][k]
        sums[k][best.i] = sums[best.i][k]
      }
    }

    const clusters: Cluster[] = []
    for (const g of groups) {
      if (g) clusters.push(this.describe(g.members.map((m) => embedded[m])))
    }
    for (const d of loose) clusters.push(this.describe([d]))
    return clusters.sort(byId)
  }

  private conceptsOf(doc: Document): Set<string> {
    let set = this.conceptSets.get(doc)
    if (!set) {
      set = new Set(doc.concepts.map((c) => c.ref))
      this.conceptSets.set(doc, set)
    }
    return set
  }
}
