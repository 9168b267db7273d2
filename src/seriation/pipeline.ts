import { info } from '../logger'
import { SeriationEngine } from './engine'
import { ExportBundle, exportAll } from './export'
import { EngineOutput, Oracles, SeriationConfigOverrides } from './types'

export interface PipelineOptions {
  config?: SeriationConfigOverrides
  exportDir?: string
  baseName?: string
  renderSvg?: boolean
  signal?: AbortSignal
}

export interface PipelineResult {
  engine: SeriationEngine
  output: EngineOutput
  exports?: ExportBundle
}

/** Ingest, build and optionally export in one call. */
export async function runSeriationPipeline(
  records: readonly unknown[],
  oracles: Oracles,
  opts: PipelineOptions = {}
): Promise<PipelineResult> {
  const engine = new SeriationEngine({ config: opts.config })
  // 1. Extraction, embedding and canonicalization
  await engine.ingest(records, oracles, { signal: opts.signal })
  // 2. Clustering, graph and ordering
  const output = await engine.build({ signal: opts.signal })
  // 3. Export
  let exports: ExportBundle | undefined
  if (opts.exportDir) {
    exports = await exportAll(opts.exportDir, opts.baseName || 'seriation', output, { renderSvg: opts.renderSvg })
    info('exports written to', opts.exportDir)
  }
  return { engine, output, exports }
}
