import { describe, expect, it } from 'vitest'
import { createFixedOracles } from '../oracles/fixed'
import { documentIdFor, ingestRecords } from './ingest'
import { ConceptRegistry } from './registry'
import { Oracles } from './types'

const fixed = createFixedOracles([
  {
    text: 'first',
    concepts: [
      { name: 'Loss', score: 0.3 },
      { name: 'loss', score: 0.6 },
      { name: '  ', score: 1 },
      { name: 'Dropout', score: 1.4 }
    ],
    embedding: [1, 0]
  },
  { text: 'second', concepts: [{ name: 'dropout', score: 0.5 }], embedding: [] }
])

const oracles: Oracles = {
  extractor: {
    async extract(text) {
      if (text === 'broken') throw new Error('model offline')
      return fixed.extractor.extract(text)
    }
  },
  embedder: fixed.embedder
}

describe('documentIdFor', () => {
  it('is stable and content addressed', () => {
    const id = documentIdFor('papers/b.pdf', 'second')
    expect(id).toMatch(/^doc:[0-9a-f]{16}$/)
    expect(documentIdFor('papers/b.pdf', 'second')).toBe(id)
    expect(documentIdFor('papers/c.pdf', 'second')).not.toBe(id)
  })
})

describe('ingestRecords', () => {
  const records: unknown[] = [
    { id: 'a', text: 'first', timestamp: '2024-01-01T00:00:00Z', classification: 'produced', path_metadata: { path: 'notes/a.md' } },
    { text: 'second', classification: 'consumed', pathMetadata: { path: 'papers/b.pdf' } },
    { text: 'broken', classification: 'produced' },
    { text: 42 }
  ]

  it('turns records into documents with canonical concepts', async () => {
    const registry = new ConceptRegistry()
    const { documents } = await ingestRecords(records, oracles, registry)
    expect(documents.map((d) => d.id)).toEqual(['a', documentIdFor('papers/b.pdf', 'second'), documentIdFor('', 'broken')])

    const [first, second, broken] = documents
    expect(first.concepts).toEqual([
      { ref: 'concept:1', score: 0.6 },
      { ref: 'concept:2', score: 1 }
    ])
    expect(first.timestamp).toEqual({ start: Date.UTC(2024, 0, 1), end: Date.UTC(2024, 0, 1), raw: '2024-01-01T00:00:00Z' })
    expect(first.pathMetadata).toEqual({ path: 'notes/a.md' })
    expect(first.embedding).toEqual([1, 0])

    expect(second.classification).toBe('consumed')
    expect(second.concepts).toEqual([{ ref: 'concept:2', score: 0.5 }])
    expect(second.embedding).toBeUndefined()
    expect(second.timestamp).toBeUndefined()

    expect(broken.concepts).toEqual([])
    expect(Array.from(registry.lookup('concept:2').documents.keys())).toEqual(['a', second.id])
  })

  it('records per-document failures instead of throwing', async () => {
    const { failures } = await ingestRecords(records, oracles, new ConceptRegistry())
    expect(failures).toHaveLength(2)
    expect(failures[0].kind).toBe('record')
    expect(failures[0].message).toMatch(/^Record 3 rejected: /)
    expect(failures[1]).toEqual({ kind: 'extraction', documentId: documentIdFor('', 'broken'), message: 'model offline' })
  })

  it('orders failures by document id code unit', async () => {
    const { failures } = await ingestRecords(
      [
        { id: 'b', text: 'broken', classification: 'produced' },
        { id: 'B', text: 'broken', classification: 'produced' }
      ],
      oracles,
      new ConceptRegistry()
    )
    expect(failures.map((f) => f.documentId)).toEqual(['B', 'b'])
  })

  it('stops calling the oracles once cancelled', async () => {
    const controller = new AbortController()
    controller.abort()
    const { documents, failures } = await ingestRecords(records.slice(0, 1), oracles, new ConceptRegistry(), {
      signal: controller.signal
    })
    expect(documents).toEqual([])
    expect(failures).toEqual([{ kind: 'cancelled', documentId: 'a', message: 'Ingestion of "a" cancelled' }])
  })
})
