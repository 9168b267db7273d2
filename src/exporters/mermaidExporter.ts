import path from 'node:path'
import { atomicWrite } from '../interfaces/atomicWrite'
import { EngineOutput } from '../seriation/types'

export type GraphView = Pick<EngineOutput, 'concepts' | 'edges'>

export function sanitizeId(s: string) {
  return s.replace(/[^a-zA-Z0-9_]+/g, '_').replace(/^_+|_+$/g, '') || 'N'
}

/**
 * Builds a Mermaid flowchart of the concept graph. Edges are labelled with
 * their weight; ambiguous edges (dropped by cycle breaking or contradicted by
 * a timestamp) are dashed.
 */
export function buildMermaid(graph: GraphView) {
  const nodeLines = graph.concepts.map((c) => `  ${sanitizeId(c.id)}["${c.name.replace(/"/g, '#quot;')}"]`)
  const edgeLines = graph.edges.map((e) => {
    const arrow = e.ambiguous ? '-.->' : '-->'
    return `  ${sanitizeId(e.from)} ${arrow}|${e.weight.toFixed(3)}| ${sanitizeId(e.to)}`
  })
  return ['graph LR', ...nodeLines, ...edgeLines].join('\n') + '\n'
}

/** Writes `<baseName>.mmd` into `dir`. */
export async function exportMermaid(dir: string, baseName: string, graph: GraphView) {
  const outPath = path.join(dir, `${baseName}.mmd`)
  await atomicWrite(outPath, buildMermaid(graph))
  return outPath
}

export default exportMermaid
