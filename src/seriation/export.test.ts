import fsp from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { sampleOutput } from '../../test/helpers'
import { conceptsCsv, edgesCsv, exportAll, graphFileSchema, seriesCsv } from './export'

describe('csv builders', () => {
  it('quotes concept rows', () => {
    expect(conceptsCsv(sampleOutput)).toBe(
      ['id,name,aliases', '"concept:1","loss ""functions""","loss functions"', '"concept:2","regularization","regularization|reg"'].join('\n')
    )
  })

  it('lists edges with their evidence pairs', () => {
    expect(edgesCsv(sampleOutput)).toBe(
      [
        'from,to,weight,ambiguous,evidence',
        '"concept:1","concept:2",0.500000,false,"B>C"',
        '"concept:2","concept:1",0.250000,true,"A>B|B>C"'
      ].join('\n')
    )
  })

  it('lists series entries by cluster and rank', () => {
    expect(seriesCsv(sampleOutput)).toBe(
      ['clusterId,rank,documentId,parentDocumentId', '"cluster:A",1,"A",""', '"cluster:A",2,"B","A"'].join('\n')
    )
  })
})

describe('exportAll', () => {
  let dir = ''

  beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'seriation-export-'))
  })

  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true })
  })

  it('writes every artifact beside each other', async () => {
    const bundle = await exportAll(dir, 'run', sampleOutput)
    expect(bundle).toEqual({
      graphJsonPath: path.join(dir, 'run.graph.json'),
      conceptsCsvPath: path.join(dir, 'run.concepts.csv'),
      edgesCsvPath: path.join(dir, 'run.edges.csv'),
      seriesCsvPath: path.join(dir, 'run.series.csv'),
      mermaidPath: path.join(dir, 'run.mmd'),
      dotPath: path.join(dir, 'run.dot'),
      svgPath: undefined
    })
    const graph = graphFileSchema.parse(JSON.parse(await fsp.readFile(bundle.graphJsonPath, 'utf8')))
    expect(graph.edges).toEqual(sampleOutput.edges)
    expect((await fsp.readdir(dir)).sort()).toEqual([
      'run.concepts.csv',
      'run.dot',
      'run.edges.csv',
      'run.graph.json',
      'run.mmd',
      'run.series.csv'
    ])
  })
})
