#!/usr/bin/env node
import fs from 'node:fs'
import fsp from 'node:fs/promises'
import path from 'node:path'
import { buildDot } from './exporters/graphVizExporter'
import { buildMermaid } from './exporters/mermaidExporter'
import { atomicWrite } from './interfaces/atomicWrite'
import { error, info, setLogLevel } from './logger'
import { fixedOracleEntries, loadManifest } from './manifest'
import { createFixedOracles } from './oracles/fixed'
import { createOllamaOracles } from './oracles/ollama'
import { loadConfigFromEnv } from './seriation/config'
import { getErrorMessage } from './seriation/errors'
import { graphFileSchema } from './seriation/export'
import { runSeriationPipeline } from './seriation/pipeline'

export interface ParsedArgs {
  positional: string[]
  flags: Map<string, string | true>
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positional: string[] = []
  const flags = new Map<string, string | true>()
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (!arg.startsWith('--')) {
      positional.push(arg)
      continue
    }
    const [name, inline] = arg.slice(2).split('=', 2)
    if (inline !== undefined) flags.set(name, inline)
    else if (name === 'base' && i + 1 < argv.length) flags.set(name, argv[++i])
    else flags.set(name, true)
  }
  return { positional, flags }
}

async function cmdBuild(args: ParsedArgs) {
  const [input, outDir] = args.positional
  if (!input || !outDir) throw new Error('Usage: build <manifest.json|manifest.csv> <outDir> [--ollama] [--base name] [--svg] [--quiet]')
  if (!fs.existsSync(input)) throw new Error(`Input not found: ${input}`)

  const entries = await loadManifest(path.resolve(input))
  const oracles = args.flags.has('ollama') ? createOllamaOracles() : createFixedOracles(fixedOracleEntries(entries))
  const base = args.flags.get('base')
  const config = loadConfigFromEnv()
  const { output, exports } = await runSeriationPipeline(entries, oracles, {
    config,
    exportDir: outDir,
    baseName: typeof base === 'string' ? base : path.basename(input, path.extname(input)),
    renderSvg: args.flags.has('svg')
  })
  info(
    `${output.concepts.length} concepts, ${output.edges.length} edges, ${output.series.length} series,`,
    `${output.report.failures.length} failures, ${output.report.ambiguities.length} ambiguities`
  )
  if (exports) console.log('Graph written to', exports.graphJsonPath)
}

async function readGraph(input: string) {
  if (!fs.existsSync(input)) throw new Error(`Input not found: ${input}`)
  return graphFileSchema.parse(JSON.parse(await fsp.readFile(input, 'utf8')))
}

async function cmdMermaid(args: ParsedArgs) {
  const [input, output] = args.positional
  if (!input || !output) throw new Error('Usage: mermaid <graph.json> <output.mmd>')
  await atomicWrite(output, buildMermaid(await readGraph(input)))
  console.log('Mermaid diagram written to', output)
}

async function cmdDot(args: ParsedArgs) {
  const [input, output] = args.positional
  if (!input || !output) throw new Error('Usage: dot <graph.json> <output.dot>')
  await atomicWrite(output, buildDot(await readGraph(input)))
  console.log('DOT graph written to', output)
}

export async function main(argv: string[]) {
  const cmd = argv[0]
  const args = parseArgs(argv.slice(1))
  if (args.flags.has('quiet')) setLogLevel('warn')
  try {
    if (cmd === 'build') await cmdBuild(args)
    else if (cmd === 'mermaid') await cmdMermaid(args)
    else if (cmd === 'dot') await cmdDot(args)
    else {
      console.log('Usage: seriate <command> [args]')
      console.log('Commands:')
      console.log('  build <manifest.json|manifest.csv> <outDir> [--ollama] [--base name] [--svg] [--quiet]')
      console.log('  mermaid <graph.json> <output.mmd>')
      console.log('  dot <graph.json> <output.dot>')
      process.exitCode = 1
    }
  } catch (err) {
    error(getErrorMessage(err))
    process.exitCode = 1
  }
}

if (require.main === module) {
  void main(process.argv.slice(2))
}
