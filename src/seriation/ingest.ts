import { createHash } from 'node:crypto'
import pLimit from 'p-limit'
import { z } from 'zod'
import { debug, warn } from '../logger'
import { getErrorMessage, InvalidConceptNameError } from './errors'
import { ConceptRegistry } from './registry'
import { parseTimestamp } from './timestamps'
import { Document, DocumentFailure, ExtractedConcept, Oracles, ScoredConcept, TimeRange } from './types'

export const ingestRecordSchema = z
  .object({
    id: z.string().min(1).optional(),
    text: z.string(),
    timestamp: z.string().optional(),
    classification: z.enum(['consumed', 'produced']),
    pathMetadata: z.record(z.string()).optional(),
    path_metadata: z.record(z.string()).optional()
  })
  .transform(({ path_metadata, pathMetadata, ...rest }) => ({
    ...rest,
    pathMetadata: { ...path_metadata, ...pathMetadata }
  }))

export type IngestRecord = z.input<typeof ingestRecordSchema>
export type ParsedRecord = z.output<typeof ingestRecordSchema>

/** Stable id from the source path and content: `doc:` plus 16 hex chars of sha256. */
export function documentIdFor(path: string, text: string) {
  return 'doc:' + createHash('sha256').update(`${path}\n${text}`).digest('hex').slice(0, 16)
}

/** The record's own id, or the one derived from its path and text. */
export function recordId(record: ParsedRecord) {
  return record.id ?? documentIdFor(record.pathMetadata.path ?? '', record.text)
}

export interface IngestOptions {
  concurrency?: number
  signal?: AbortSignal
}

export interface IngestResult {
  documents: Document[]
  failures: DocumentFailure[]
}

interface OracleOutput {
  record: ParsedRecord
  id: string
  extracted: ExtractedConcept[]
  embedding?: number[]
}

function clampScore(score: number) {
  if (!Number.isFinite(score)) return 0
  return Math.max(0, Math.min(1, score))
}

/**
 * Turns ingestion records into engine documents. Oracle calls run
 * concurrently; canonicalization happens afterwards in record order so concept
 * ids do not depend on oracle latency.
 */
export async function ingestRecords(
  records: readonly unknown[],
  oracles: Oracles,
  registry: ConceptRegistry,
  options: IngestOptions = {}
): Promise<IngestResult> {
  const failures: DocumentFailure[] = []
  const parsed: Array<{ record: ParsedRecord; id: string }> = []
  records.forEach((raw, i) => {
    const result = ingestRecordSchema.safeParse(raw)
    if (!result.success) {
      failures.push({ kind: 'record', message: `Record ${i} rejected: ${result.error.issues.map((x) => x.message).join('; ')}` })
      return
    }
    const record = result.data
    parsed.push({ record, id: recordId(record) })
  })

  const limit = pLimit(options.concurrency ?? 4)
  const outputs = await Promise.all(
    parsed.map(({ record, id }) =>
      limit(async (): Promise<OracleOutput | undefined> => {
        if (options.signal?.aborted) {
          failures.push({ kind: 'cancelled', documentId: id, message: `Ingestion of "${id}" cancelled` })
          return undefined
        }
        let extracted: ExtractedConcept[] = []
        try {
          extracted = await oracles.extractor.extract(record.text, { documentId: id })
        } catch (err) {
          warn('extraction failed for', id, getErrorMessage(err))
          failures.push({ kind: 'extraction', documentId: id, message: getErrorMessage(err) })
        }
        let embedding: number[] | undefined
        try {
          const vector = await oracles.embedder.embed(record.text, { documentId: id })
          embedding = vector && vector.length > 0 ? vector : undefined
        } catch (err) {
          warn('embedding failed for', id, getErrorMessage(err))
          failures.push({ kind: 'embedding', documentId: id, message: getErrorMessage(err) })
        }
        return { record, id, extracted, embedding }
      })
    )
  )

  const documents: Document[] = []
  for (const out of outputs) {
    if (!out) continue
    let timestamp: TimeRange | undefined
    if (out.record.timestamp !== undefined) {
      try {
        timestamp = parseTimestamp(out.record.timestamp)
      } catch (err) {
        failures.push({ kind: 'timestamp', documentId: out.id, message: getErrorMessage(err) })
      }
    }
    registry.detachDocument(out.id)
    const scores = new Map<string, number>()
    for (const concept of out.extracted) {
      const score = clampScore(concept.score)
      try {
        const ref = registry.canonicalize(concept.name, { documentId: out.id, score })
        scores.set(ref, Math.max(scores.get(ref) ?? 0, score))
      } catch (err) {
        if (!(err instanceof InvalidConceptNameError)) throw err
        debug('skipping empty concept name in', out.id)
      }
    }
    const concepts: ScoredConcept[] = Array.from(scores, ([ref, score]) => ({ ref, score }))
    documents.push({
      id: out.id,
      timestamp,
      classification: out.record.classification,
      concepts,
      embedding: out.embedding,
      pathMetadata: out.record.pathMetadata
    })
  }
  failures.sort((a, b) => {
    const x = a.documentId ?? ''
    const y = b.documentId ?? ''
    return x < y ? -1 : x > y ? 1 : 0
  })
  return { documents, failures }
}
