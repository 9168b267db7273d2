import path from 'node:path'
import { z } from 'zod'
import { exportGraphViz } from '../exporters/graphVizExporter'
import { exportMermaid } from '../exporters/mermaidExporter'
import { atomicWrite, atomicWriteJson } from '../interfaces/atomicWrite'
import { EngineOutput } from './types'

export interface ExportBundle {
  graphJsonPath: string
  conceptsCsvPath: string
  edgesCsvPath: string
  seriesCsvPath: string
  mermaidPath: string
  dotPath: string
  svgPath?: string
}

/** Shape of a written `<base>.graph.json`, for tools that read it back. */
export const graphFileSchema = z.object({
  concepts: z.array(z.object({ id: z.string(), name: z.string(), aliases: z.array(z.string()) })),
  edges: z.array(
    z.object({
      from: z.string(),
      to: z.string(),
      weight: z.number(),
      evidence: z.array(z.tuple([z.string(), z.string()])),
      ambiguous: z.boolean()
    })
  )
})

export type GraphFile = z.infer<typeof graphFileSchema>

function csv(s: string) {
  return '"' + s.replace(/"/g, '""') + '"'
}

export function conceptsCsv(output: Pick<EngineOutput, 'concepts'>) {
  return ['id,name,aliases']
    .concat(output.concepts.map((c) => `${csv(c.id)},${csv(c.name)},${csv(c.aliases.join('|'))}`))
    .join('\n')
}

export function edgesCsv(output: Pick<EngineOutput, 'edges'>) {
  return ['from,to,weight,ambiguous,evidence']
    .concat(
      output.edges.map(
        (e) =>
          `${csv(e.from)},${csv(e.to)},${e.weight.toFixed(6)},${e.ambiguous},${csv(e.evidence.map(([a, b]) => `${a}>${b}`).join('|'))}`
      )
    )
    .join('\n')
}

export function seriesCsv(output: Pick<EngineOutput, 'series'>) {
  const rows = output.series.flatMap((s) =>
    s.entries.map((e) => `${csv(s.clusterId)},${e.rank},${csv(e.documentId)},${csv(e.parentDocumentId ?? '')}`)
  )
  return ['clusterId,rank,documentId,parentDocumentId'].concat(rows).join('\n')
}

export async function exportGraphJson(dir: string, base: string, output: EngineOutput) {
  return atomicWriteJson(path.join(dir, `${base}.graph.json`), output)
}

export async function exportCsv(dir: string, base: string, output: EngineOutput) {
  const conceptsPath = await atomicWrite(path.join(dir, `${base}.concepts.csv`), conceptsCsv(output))
  const edgesPath = await atomicWrite(path.join(dir, `${base}.edges.csv`), edgesCsv(output))
  return { conceptsPath, edgesPath }
}

export async function exportSeriesCsv(dir: string, base: string, output: EngineOutput) {
  return atomicWrite(path.join(dir, `${base}.series.csv`), seriesCsv(output))
}

export async function exportAll(
  dir: string,
  base: string,
  output: EngineOutput,
  options: { renderSvg?: boolean } = {}
): Promise<ExportBundle> {
  const graphJsonPath = await exportGraphJson(dir, base, output)
  const { conceptsPath, edgesPath } = await exportCsv(dir, base, output)
  const seriesCsvPath = await exportSeriesCsv(dir, base, output)
  const mermaidPath = await exportMermaid(dir, base, output)
  const { dotPath, svgPath } = await exportGraphViz(dir, base, output, { render: options.renderSvg })
  return {
    graphJsonPath,
    conceptsCsvPath: conceptsPath,
    edgesCsvPath: edgesPath,
    seriesCsvPath,
    mermaidPath,
    dotPath,
    svgPath
  }
}
