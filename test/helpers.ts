import { createFixedOracles } from '../src/oracles/fixed'
import { parseTimestamp } from '../src/seriation/timestamps'
import { Document, EngineOutput } from '../src/seriation/types'

export interface DocSpec {
  id: string
  at?: string
  concepts?: Record<string, number>
  embedding?: number[]
}

/** Builds an engine document with concept refs given directly. */
export function doc(input: DocSpec): Document {
  return {
    id: input.id,
    timestamp: input.at === undefined ? undefined : parseTimestamp(input.at),
    classification: 'produced',
    concepts: Object.entries(input.concepts ?? {}).map(([ref, score]) => ({ ref, score })),
    embedding: input.embedding,
    pathMetadata: {}
  }
}

/** Three documents: loss functions in January, both in February, regularization in March. */
export const developmentRecords = [
  { id: 'A', text: 'alpha notes', timestamp: '2024-01-15T00:00:00Z', classification: 'consumed' },
  { id: 'B', text: 'beta notes', timestamp: '2024-02-15T00:00:00Z', classification: 'produced' },
  { id: 'C', text: 'gamma notes', timestamp: '2024-03-15T00:00:00Z', classification: 'produced' }
]

export const developmentEntries = [
  { text: 'alpha notes', concepts: [{ name: 'loss_functions', score: 0.9 }], embedding: [1, 0] },
  {
    text: 'beta notes',
    concepts: [
      { name: 'loss_functions', score: 0.8 },
      { name: 'regularization', score: 0.7 }
    ],
    embedding: [1, 0]
  },
  { text: 'gamma notes', concepts: [{ name: 'regularization', score: 0.9 }], embedding: [1, 0] }
]

/** Weight of loss_functions -> regularization contributed by the February/March pair. */
export const developmentEdgeWeight = 0.8 * 0.9 * Math.pow(0.5, 29 / 180)

export function developmentOracles() {
  return createFixedOracles(developmentEntries)
}

export const sampleOutput: EngineOutput = {
  concepts: [
    { id: 'concept:1', name: 'loss "functions"', aliases: ['loss functions'] },
    { id: 'concept:2', name: 'regularization', aliases: ['regularization', 'reg'] }
  ],
  edges: [
    { from: 'concept:1', to: 'concept:2', weight: 0.5, evidence: [['B', 'C']], ambiguous: false },
    {
      from: 'concept:2',
      to: 'concept:1',
      weight: 0.25,
      evidence: [
        ['A', 'B'],
        ['B', 'C']
      ],
      ambiguous: true
    }
  ],
  series: [
    {
      clusterId: 'cluster:A',
      entries: [
        { documentId: 'A', rank: 1, parentDocumentId: null },
        { documentId: 'B', rank: 2, parentDocumentId: 'A' }
      ]
    }
  ],
  report: { documentsTouched: 2, clustersTouched: 1, edgesTouched: 2, ambiguities: [], failures: [], cancelled: false }
}
