import appRoot from 'app-root-path'
import { parse } from 'csv-parse/sync'
import fs from 'fs/promises'
import path from 'path'
import { z } from 'zod'
import { debug } from './logger'
import { FixedOracleEntry } from './oracles/fixed'
import { ingestRecordSchema, recordId } from './seriation/ingest'

const conceptSchema = z.object({ name: z.string(), score: z.number().min(0).max(1) })

/**
 * One manifest entry: an ingestion record, optionally carrying precomputed
 * concepts and an embedding for the fixed oracles.
 */
export const manifestEntrySchema = z
  .object({
    text: z.string(),
    concepts: z.array(conceptSchema).optional(),
    embedding: z.array(z.number()).optional()
  })
  .passthrough()

export type ManifestEntry = z.infer<typeof manifestEntrySchema>

const manifestSchema = z.union([z.array(manifestEntrySchema), z.object({ documents: z.array(manifestEntrySchema) })])

const KNOWN_COLUMNS = new Set(['id', 'text', 'timestamp', 'classification', 'concepts', 'embedding'])

/** `loss functions:0.9;regularization` -> scored concepts; a missing score is 1. */
export function parseConceptCell(cell: string) {
  return cell
    .split(';')
    .map((part) => part.trim())
    .filter(Boolean)
    .map((part) => {
      const at = part.lastIndexOf(':')
      if (at < 0) return { name: part, score: 1 }
      const score = Number(part.slice(at + 1))
      if (!Number.isFinite(score)) throw new Error(`Invalid concept score in "${part}"`)
      return { name: part.slice(0, at).trim(), score }
    })
}

export function parseEmbeddingCell(cell: string): number[] | undefined {
  const parts = cell.split(/[\s;]+/).filter(Boolean)
  if (parts.length === 0) return undefined
  return parts.map((p) => {
    const n = Number(p)
    if (!Number.isFinite(n)) throw new Error(`Invalid embedding component "${p}"`)
    return n
  })
}

export function manifestFromCsv(text: string): ManifestEntry[] {
  const rows = z.array(z.record(z.string())).parse(
    parse(text, {
      columns: true,
      skip_empty_lines: true
    })
  )
  return rows.map((row) => {
    const pathMetadata: Record<string, string> = {}
    for (const [key, value] of Object.entries(row)) {
      if (!KNOWN_COLUMNS.has(key) && value !== '') pathMetadata[key] = value
    }
    return manifestEntrySchema.parse({
      id: row.id || undefined,
      text: row.text ?? '',
      timestamp: row.timestamp || undefined,
      classification: row.classification,
      pathMetadata,
      concepts: row.concepts ? parseConceptCell(row.concepts) : undefined,
      embedding: row.embedding ? parseEmbeddingCell(row.embedding) : undefined
    })
  })
}

export function manifestFromJson(text: string): ManifestEntry[] {
  const parsed = manifestSchema.parse(JSON.parse(text))
  return Array.isArray(parsed) ? parsed : parsed.documents
}

/** Loads a `.json` or `.csv` manifest; relative paths resolve against the project root. */
export async function loadManifest(filePath: string): Promise<ManifestEntry[]> {
  const absPath = path.resolve(appRoot.path, filePath)
  const text = await fs.readFile(absPath, 'utf-8')
  const entries = path.extname(absPath).toLowerCase() === '.csv' ? manifestFromCsv(text) : manifestFromJson(text)
  debug('manifest loaded', absPath, entries.length, 'entries')
  return entries
}

/**
 * Precomputed values keyed on each entry's document id, given or derived the
 * way ingestion derives it, so entries sharing a text stay apart. Entries
 * ingestion would reject are left out.
 */
export function fixedOracleEntries(entries: readonly ManifestEntry[]): FixedOracleEntry[] {
  return entries.flatMap((e) => {
    const record = ingestRecordSchema.safeParse(e)
    if (!record.success) return []
    return [{ id: recordId(record.data), concepts: e.concepts, embedding: e.embedding }]
  })
}
