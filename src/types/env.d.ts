declare namespace NodeJS {
  interface ProcessEnv {
    SERIATION_DEV_LOG?: string
    SERIATION_LOG_LEVEL?: string
    SERIATION_FUZZY_THRESHOLD?: string
    SERIATION_HIGH_CONFIDENCE_ALIAS?: string
    SERIATION_EMBEDDING_WEIGHT?: string
    SERIATION_CONCEPT_WEIGHT?: string
    SERIATION_COHESION_FLOOR?: string
    SERIATION_SHARED_SCORE_THRESHOLD?: string
    SERIATION_HALF_LIFE_DAYS?: string
    SERIATION_NEIGHBOR_CLUSTERS?: string
    SERIATION_CONCURRENCY?: string
    OLLAMA_MODEL?: string
    OLLAMA_EMBED_MODEL?: string
  }
}
