import { ExtractedConcept, OracleContext, Oracles } from '../seriation/types'

export interface FixedOracleEntry {
  id?: string
  text?: string
  concepts?: ExtractedConcept[]
  embedding?: number[]
}

/**
 * Oracles backed by a lookup table. Entries with an `id` answer for that
 * document only; entries without one answer by document text. Unknown
 * documents have no concepts and no embedding. Used for precomputed manifests
 * and tests.
 */
export function createFixedOracles(entries: Iterable<FixedOracleEntry>): Oracles {
  const byId = new Map<string, FixedOracleEntry>()
  const byText = new Map<string, FixedOracleEntry>()
  for (const entry of entries) {
    if (entry.id !== undefined) byId.set(entry.id, entry)
    else if (entry.text !== undefined) byText.set(entry.text, entry)
  }
  const find = (text: string, context?: OracleContext) =>
    (context ? byId.get(context.documentId) : undefined) ?? byText.get(text)
  return {
    extractor: {
      async extract(text, context) {
        return (find(text, context)?.concepts ?? []).map((c) => ({ ...c }))
      }
    },
    embedder: {
      async embed(text, context) {
        const vector = find(text, context)?.embedding
        return vector ? [...vector] : undefined
      }
    }
  }
}
