import { compareConceptRefs } from './registry'
import { ConceptEdge, ConceptRef } from './types'

function adjacency(edges: readonly ConceptEdge[]) {
  const out = new Map<ConceptRef, ConceptEdge[]>()
  for (const e of edges) {
    const list = out.get(e.from)
    if (list) list.push(e)
    else out.set(e.from, [e])
  }
  return out
}

function nodesOf(edges: readonly ConceptEdge[]) {
  const nodes = new Set<ConceptRef>()
  for (const e of edges) {
    nodes.add(e.from)
    nodes.add(e.to)
  }
  return Array.from(nodes).sort(compareConceptRefs)
}

export function compareEdges(a: Pick<ConceptEdge, 'from' | 'to'>, b: Pick<ConceptEdge, 'from' | 'to'>) {
  return compareConceptRefs(a.from, b.from) || compareConceptRefs(a.to, b.to)
}

/** Tarjan's algorithm. Components come back with their nodes sorted, smallest first. */
export function stronglyConnectedComponents(edges: readonly ConceptEdge[]): ConceptRef[][] {
  const adj = adjacency(edges)
  const index = new Map<ConceptRef, number>()
  const low = new Map<ConceptRef, number>()
  const onStack = new Set<ConceptRef>()
  const stack: ConceptRef[] = []
  const components: ConceptRef[][] = []
  let counter = 0

  function visit(v: ConceptRef) {
    index.set(v, counter)
    low.set(v, counter)
    counter++
    stack.push(v)
    onStack.add(v)
    for (const e of adj.get(v) ?? []) {
      const w = e.to
      if (!index.has(w)) {
        visit(w)
        low.set(v, Math.min(low.get(v) ?? 0, low.get(w) ?? 0))
      } else if (onStack.has(w)) {
        low.set(v, Math.min(low.get(v) ?? 0, index.get(w) ?? 0))
      }
    }
    if (low.get(v) === index.get(v)) {
      const component: ConceptRef[] = []
      let w: ConceptRef | undefined
      do {
        w = stack.pop()
        if (w === undefined) break
        onStack.delete(w)
        component.push(w)
      } while (w !== v)
      components.push(component.sort(compareConceptRefs))
    }
  }

  for (const v of nodesOf(edges)) {
    if (!index.has(v)) visit(v)
  }
  return components.sort((a, b) => compareConceptRefs(a[0], b[0]))
}

export function hasCycle(edges: readonly ConceptEdge[]) {
  return edges.some((e) => e.from === e.to) || stronglyConnectedComponents(edges).some((c) => c.length > 1)
}

/**
 * Removes the weakest edge inside every strongly connected component until
 * none is left. Every edge inside a component lies on some cycle, so each
 * removal breaks at least one of them.
 */
export function breakCycles(edges: readonly ConceptEdge[]): { kept: ConceptEdge[]; dropped: ConceptEdge[] } {
  let kept = [...edges].sort(compareEdges)
  const dropped: ConceptEdge[] = []
  for (;;) {
    const components = stronglyConnectedComponents(kept).filter((c) => c.length > 1)
    if (components.length === 0) break
    const removed = new Set<ConceptEdge>()
    for (const component of components) {
      const members = new Set(component)
      let weakest: ConceptEdge | undefined
      for (const e of kept) {
        if (!members.has(e.from) || !members.has(e.to)) continue
        if (!weakest || e.weight < weakest.weight || (e.weight === weakest.weight && compareEdges(e, weakest) < 0)) {
          weakest = e
        }
      }
      if (weakest) removed.add(weakest)
    }
    kept = kept.filter((e) => !removed.has(e))
    dropped.push(...Array.from(removed).sort(compareEdges))
  }
  return { kept, dropped }
}
