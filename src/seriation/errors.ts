import type { ConceptRef, EvidencePair } from './types'

export type SeriationErrorCode =
  | 'ambiguous_merge'
  | 'missing_embedding'
  | 'embedding_dimension'
  | 'insufficient_timestamp'
  | 'invalid_timestamp'
  | 'inconsistent_order'
  | 'cluster_update_failure'
  | 'unknown_concept'
  | 'invalid_concept_name'
  | 'registry_busy'
  | 'build_cancelled'

export class SeriationError extends Error {
  readonly code: SeriationErrorCode
  readonly details: Record<string, unknown>

  constructor(code: SeriationErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message)
    this.name = 'SeriationError'
    this.code = code
    this.details = details
  }
}

export class AmbiguousMergeError extends SeriationError {
  constructor(
    readonly refA: ConceptRef,
    readonly refB: ConceptRef,
    readonly conflict: [string, string]
  ) {
    super('ambiguous_merge', `Cannot merge ${refA} and ${refB}: "${conflict[0]}" and "${conflict[1]}" are declared distinct`, {
      refA,
      refB,
      conflict
    })
    this.name = 'AmbiguousMergeError'
  }
}

export class MissingEmbeddingError extends SeriationError {
  constructor(readonly documentId: string) {
    super('missing_embedding', `No embedding for "${documentId}"; compute it with the embedding oracle first`, { documentId })
    this.name = 'MissingEmbeddingError'
  }
}

export class EmbeddingDimensionError extends SeriationError {
  constructor(expected: number, actual: number, id?: string) {
    super('embedding_dimension', `Embedding dimension ${actual} does not match ${expected}${id ? ` for "${id}"` : ''}`, {
      expected,
      actual,
      id
    })
    this.name = 'EmbeddingDimensionError'
  }
}

export class InsufficientTimestampError extends SeriationError {
  constructor(readonly documentId: string, raw?: string) {
    super(
      'insufficient_timestamp',
      raw
        ? `Document "${documentId}" has a partial timestamp "${raw}"; excluded from edge creation`
        : `Document "${documentId}" has no timestamp; excluded from edge creation`,
      { documentId, raw }
    )
    this.name = 'InsufficientTimestampError'
  }
}

export class InvalidTimestampError extends SeriationError {
  constructor(readonly raw: string) {
    super('invalid_timestamp', `Not an ISO-8601 instant or interval: "${raw}"`, { raw })
    this.name = 'InvalidTimestampError'
  }
}

export class InconsistentOrderError extends SeriationError {
  constructor(
    readonly clusterId: string,
    readonly documents: EvidencePair,
    readonly edge: { from: ConceptRef; to: ConceptRef; weight: number } | undefined,
    reason: 'timestamp' | 'cycle'
  ) {
    super(
      'inconsistent_order',
      reason === 'timestamp'
        ? `Concept links place "${documents.earlier}" before "${documents.later}" but timestamps disagree; timestamp order kept`
        : `Concept link "${documents.earlier}" -> "${documents.later}" would close an ordering cycle; skipped`,
      { clusterId, documents, edge, reason }
    )
    this.name = 'InconsistentOrderError'
  }
}

export class ClusterUpdateFailure extends SeriationError {
  constructor(readonly clusterIds: string[], cause: unknown) {
    super('cluster_update_failure', `Update of ${clusterIds.join(', ')} failed: ${getErrorMessage(cause)}`, {
      clusterIds,
      cause: getErrorMessage(cause)
    })
    this.name = 'ClusterUpdateFailure'
  }
}

export class UnknownConceptError extends SeriationError {
  constructor(readonly ref: ConceptRef) {
    super('unknown_concept', `Unknown concept ${ref}`, { ref })
    this.name = 'UnknownConceptError'
  }
}

export class InvalidConceptNameError extends SeriationError {
  constructor(raw: string) {
    super('invalid_concept_name', `Concept name "${raw}" is empty after normalization`, { raw })
    this.name = 'InvalidConceptNameError'
  }
}

export class RegistryBusyError extends SeriationError {
  constructor(operation: string) {
    super('registry_busy', `Registry is already mutating; "${operation}" must not re-enter`, { operation })
    this.name = 'RegistryBusyError'
  }
}

export class BuildCancelledError extends SeriationError {
  constructor(readonly pending: string[]) {
    super('build_cancelled', `Build cancelled with ${pending.length} cluster task(s) outstanding`, { pending })
    this.name = 'BuildCancelledError'
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}
