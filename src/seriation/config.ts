import appRootPath from 'app-root-path'
import { config as loadDotenvFiles } from 'dotenv-flow'
import path from 'node:path'
import { z } from 'zod'
import { SeriationConfig, SeriationConfigOverrides } from './types'

export const defaultConfig: SeriationConfig = {
  registry: {
    fuzzyThreshold: 0.88,
    highConfidenceAlias: 0.9
  },
  clustering: {
    // concept overlap guards against vocabulary-only or embedding-only grouping
    embeddingWeight: 0.7,
    conceptWeight: 0.3,
    cohesionFloor: 0.55
  },
  graph: {
    sharedScoreThreshold: 0.25,
    halfLifeDays: 180
  },
  incremental: {
    neighborClusters: 2
  },
  concurrency: 4
}

export default defaultConfig

const unit = z.number().min(0).max(1)

const configSchema = z.object({
  registry: z.object({ fuzzyThreshold: unit, highConfidenceAlias: unit }),
  clustering: z.object({ embeddingWeight: unit, conceptWeight: unit, cohesionFloor: unit }),
  graph: z.object({ sharedScoreThreshold: unit, halfLifeDays: z.number().positive() }),
  incremental: z.object({ neighborClusters: z.number().int().min(0) }),
  concurrency: z.number().int().min(1)
})

export function mergeConfig(partial?: SeriationConfigOverrides, base: SeriationConfig = defaultConfig): SeriationConfig {
  if (!partial) return base
  const merged: SeriationConfig = {
    registry: { ...base.registry, ...partial.registry },
    clustering: { ...base.clustering, ...partial.clustering },
    graph: { ...base.graph, ...partial.graph },
    incremental: { ...base.incremental, ...partial.incremental },
    concurrency: partial.concurrency ?? base.concurrency
  }
  return configSchema.parse(merged)
}

const ENV_KEYS: Array<[string, (cfg: SeriationConfigOverrides, value: number) => void]> = [
  ['SERIATION_FUZZY_THRESHOLD', (c, v) => (c.registry = { ...c.registry, fuzzyThreshold: v })],
  ['SERIATION_HIGH_CONFIDENCE_ALIAS', (c, v) => (c.registry = { ...c.registry, highConfidenceAlias: v })],
  ['SERIATION_EMBEDDING_WEIGHT', (c, v) => (c.clustering = { ...c.clustering, embeddingWeight: v })],
  ['SERIATION_CONCEPT_WEIGHT', (c, v) => (c.clustering = { ...c.clustering, conceptWeight: v })],
  ['SERIATION_COHESION_FLOOR', (c, v) => (c.clustering = { ...c.clustering, cohesionFloor: v })],
  ['SERIATION_SHARED_SCORE_THRESHOLD', (c, v) => (c.graph = { ...c.graph, sharedScoreThreshold: v })],
  ['SERIATION_HALF_LIFE_DAYS', (c, v) => (c.graph = { ...c.graph, halfLifeDays: v })],
  ['SERIATION_NEIGHBOR_CLUSTERS', (c, v) => (c.incremental = { ...c.incremental, neighborClusters: v })],
  ['SERIATION_CONCURRENCY', (c, v) => (c.concurrency = v)]
]

/**
 * Reads `SERIATION_*` overrides from the environment. `.env` files at the
 * project root are loaded first unless `loadDotenv` is false.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env, loadDotenv = true): SeriationConfig {
  if (loadDotenv) {
    loadDotenvFiles({ path: path.resolve(appRootPath.path), silent: true })
  }
  const overrides: SeriationConfigOverrides = {}
  for (const [key, assign] of ENV_KEYS) {
    const raw = env[key]
    if (raw === undefined || raw.trim() === '') continue
    const value = Number(raw)
    if (!Number.isFinite(value)) throw new Error(`${key} must be a number, got "${raw}"`)
    assign(overrides, value)
  }
  return mergeConfig(overrides)
}
