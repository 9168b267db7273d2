import childProcess from 'node:child_process'
import path from 'node:path'
import { atomicWrite } from '../interfaces/atomicWrite'
import { GraphView } from './mermaidExporter'

function quote(s: string) {
  return '"' + s.replace(/\\/g, '\\\\').replace(/"/g, '\\"') + '"'
}

export function buildDot(graph: GraphView) {
  let dot = 'digraph concepts {\n  rankdir=LR;\n  node [shape=box];\n'
  for (const c of graph.concepts) dot += `  ${quote(c.id)} [label=${quote(c.name)}];\n`
  for (const e of graph.edges) {
    const style = e.ambiguous ? ', style=dashed' : ''
    dot += `  ${quote(e.from)} -> ${quote(e.to)} [label="${e.weight.toFixed(3)}"${style}];\n`
  }
  dot += '}\n'
  return dot
}

function runDot(format: 'svg' | 'png', inputPath: string, outputPath: string) {
  return new Promise<void>((resolve, reject) => {
    const dotProcess = childProcess.spawn('dot', [`-T${format}`, inputPath, '-o', outputPath])
    dotProcess.on('error', (err) => {
      reject(err)
    })
    dotProcess.on('close', (code) => {
      if (code === 0) {
        resolve()
      } else {
        reject(new Error(`dot process exited with code ${code}`))
      }
    })
  })
}

/** Writes `<baseName>.dot`; with `render` set, also runs Graphviz to produce an SVG beside it. */
export async function exportGraphViz(
  dir: string,
  baseName: string,
  graph: GraphView,
  options: { render?: boolean } = {}
): Promise<{ dotPath: string; svgPath?: string }> {
  const dotPath = path.join(dir, `${baseName}.dot`)
  await atomicWrite(dotPath, buildDot(graph))
  if (!options.render) return { dotPath }
  const svgPath = path.join(dir, `${baseName}.svg`)
  await runDot('svg', dotPath, svgPath)
  return { dotPath, svgPath }
}
