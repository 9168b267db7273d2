import { describe, expect, it } from 'vitest'
import { breakCycles, hasCycle, stronglyConnectedComponents } from './cycles'
import { ConceptEdge } from './types'

function edge(from: number, to: number, weight: number): ConceptEdge {
  return { from: `concept:${from}`, to: `concept:${to}`, weight, evidence: [], ambiguous: false }
}

describe('stronglyConnectedComponents', () => {
  it('groups mutually reachable concepts', () => {
    const components = stronglyConnectedComponents([edge(1, 2, 1), edge(2, 3, 1), edge(3, 2, 1), edge(3, 4, 1)])
    expect(components).toEqual([['concept:1'], ['concept:2', 'concept:3'], ['concept:4']])
  })
})

describe('breakCycles', () => {
  it('drops the weaker edge of a two-cycle', () => {
    const { kept, dropped } = breakCycles([edge(1, 2, 2), edge(2, 1, 1)])
    expect(kept.map((e) => [e.from, e.to])).toEqual([['concept:1', 'concept:2']])
    expect(dropped.map((e) => [e.from, e.to])).toEqual([['concept:2', 'concept:1']])
  })

  it('drops the weakest edge of a longer cycle', () => {
    const { kept, dropped } = breakCycles([edge(1, 2, 3), edge(2, 3, 2), edge(3, 1, 1), edge(3, 4, 0.5)])
    expect(dropped.map((e) => `${e.from}->${e.to}`)).toEqual(['concept:3->concept:1'])
    expect(hasCycle(kept)).toBe(false)
    expect(kept).toHaveLength(3)
  })

  it('breaks ties by edge order', () => {
    const { dropped } = breakCycles([edge(2, 1, 1), edge(1, 2, 1)])
    expect(dropped.map((e) => `${e.from}->${e.to}`)).toEqual(['concept:1->concept:2'])
  })

  it('leaves acyclic graphs alone', () => {
    const edges = [edge(1, 2, 1), edge(2, 3, 1)]
    expect(breakCycles(edges)).toEqual({ kept: edges, dropped: [] })
  })

  it('returns an acyclic graph for a dense tangle', () => {
    const edges: ConceptEdge[] = []
    for (let i = 1; i <= 5; i++) {
      for (let j = 1; j <= 5; j++) if (i !== j) edges.push(edge(i, j, ((i * 7 + j * 3) % 5) + 1))
    }
    const { kept, dropped } = breakCycles(edges)
    expect(hasCycle(kept)).toBe(false)
    expect(kept.length + dropped.length).toBe(20)
  })
})
