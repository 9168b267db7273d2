export { SeriationEngine, toEngineOutput } from './seriation/engine'
export type { EngineOptions, RunOptions } from './seriation/engine'
export { ConceptRegistry, normalizeConceptName, stringSimilarity } from './seriation/registry'
export { SimilarityIndex, cosineSimilarity } from './seriation/similarity'
export { ClusteringStage, jaccard } from './seriation/clustering'
export { ConceptGraph, ConceptGraphBuilder } from './seriation/graph'
export { SeriationOrderer } from './seriation/ordering'
export type { OrderedSeries } from './seriation/ordering'
export { IncrementalUpdater, emptyState } from './seriation/incremental'
export type { EngineState } from './seriation/incremental'
export { ingestRecords, ingestRecordSchema, documentIdFor } from './seriation/ingest'
export type { IngestRecord } from './seriation/ingest'
export { parseTimestamp } from './seriation/timestamps'
export { defaultConfig, mergeConfig, loadConfigFromEnv } from './seriation/config'
export { runSeriationPipeline } from './seriation/pipeline'
export type { PipelineOptions, PipelineResult } from './seriation/pipeline'
export { exportAll, exportGraphJson, exportCsv, exportSeriesCsv, graphFileSchema } from './seriation/export'
export type { ExportBundle } from './seriation/export'
export { buildMermaid, exportMermaid } from './exporters/mermaidExporter'
export { buildDot, exportGraphViz } from './exporters/graphVizExporter'
export { createFixedOracles } from './oracles/fixed'
export { createOllamaOracles } from './oracles/ollama'
export { loadManifest } from './manifest'
export * from './seriation/errors'
export * from './seriation/types'
