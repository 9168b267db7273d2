// Data model for the concept graph and seriation engine

export type Classification = 'consumed' | 'produced'

/** Opaque, stable concept identifier, e.g. `concept:12`. */
export type ConceptRef = string

export interface TimeRange {
  start?: number // epoch ms, undefined when open
  end?: number
  raw: string
}

export interface ScoredConcept {
  ref: ConceptRef
  score: number // [0,1]
}

export interface Document {
  id: string
  timestamp?: TimeRange
  classification: Classification
  concepts: ScoredConcept[]
  embedding?: number[]
  pathMetadata: Record<string, string>
}

export interface Concept {
  id: ConceptRef
  name: string
  aliases: Set<string>
  documents: Map<string, number> // documentId -> score
  mergedInto?: ConceptRef
}

export interface EvidencePair {
  earlier: string
  later: string
}

export interface ConceptEdge {
  from: ConceptRef
  to: ConceptRef
  weight: number
  evidence: EvidencePair[]
  ambiguous: boolean
}

export interface Cluster {
  id: string
  documentIds: string[] // sorted
  centroid?: number[]
  cohesion: number
}

export interface SeriesEntry {
  documentId: string
  clusterId: string
  rank: number // 1-based
  parentDocumentId: string | null
}

export type AmbiguityKind = 'cycle' | 'order-conflict'

export interface Ambiguity {
  kind: AmbiguityKind
  from: ConceptRef
  to: ConceptRef
  weight: number
  clusterId?: string
  documents?: EvidencePair
  message: string
}

export type FailureKind = 'timestamp' | 'extraction' | 'embedding' | 'record' | 'cluster-update' | 'cancelled'

export interface DocumentFailure {
  kind: FailureKind
  documentId?: string
  clusterId?: string
  message: string
}

export interface UpdateReport {
  documentsTouched: number
  clustersTouched: number
  edgesTouched: number
  ambiguities: Ambiguity[]
  failures: DocumentFailure[]
  cancelled: boolean
}

export interface OutputConcept {
  id: ConceptRef
  name: string
  aliases: string[]
}

export interface OutputEdge {
  from: ConceptRef
  to: ConceptRef
  weight: number
  evidence: Array<[string, string]>
  ambiguous: boolean
}

export interface OutputSeries {
  clusterId: string
  entries: Array<{ documentId: string; rank: number; parentDocumentId: string | null }>
}

export interface EngineOutput {
  concepts: OutputConcept[]
  edges: OutputEdge[]
  series: OutputSeries[]
  report: UpdateReport
}

export interface SeriationConfig {
  registry: {
    fuzzyThreshold: number
    highConfidenceAlias: number
  }
  clustering: {
    embeddingWeight: number
    conceptWeight: number
    cohesionFloor: number
  }
  graph: {
    sharedScoreThreshold: number
    halfLifeDays: number
  }
  incremental: {
    neighborClusters: number
  }
  concurrency: number
}

export type SeriationConfigOverrides = {
  [K in keyof SeriationConfig]?: SeriationConfig[K] extends object ? Partial<SeriationConfig[K]> : SeriationConfig[K]
}

export interface ExtractedConcept {
  name: string
  score: number
}

/** What an oracle may know about the text besides its content. */
export interface OracleContext {
  documentId: string
}

/** Concept extraction oracle: an LLM or NLP pipeline behind a pure call. */
export interface ConceptExtractor {
  extract(text: string, context?: OracleContext): Promise<ExtractedConcept[]>
}

/** Embedding oracle: a fixed-length vector per text, or undefined when none could be computed. */
export interface Embedder {
  embed(text: string, context?: OracleContext): Promise<number[] | undefined>
}

export interface Oracles {
  extractor: ConceptExtractor
  embedder: Embedder
}
