import { describe, expect, it, vi } from 'vitest'
import { createFixedOracles } from './fixed'
import { createOllamaOracles, OllamaClient, parseExtraction } from './ollama'

describe('createFixedOracles', () => {
  it('answers from the table and knows nothing else', async () => {
    const oracles = createFixedOracles([{ text: 'known', concepts: [{ name: 'pruning', score: 0.5 }], embedding: [0, 1] }])
    expect(await oracles.extractor.extract('known')).toEqual([{ name: 'pruning', score: 0.5 }])
    expect(await oracles.embedder.embed('known')).toEqual([0, 1])
    expect(await oracles.extractor.extract('unknown')).toEqual([])
    expect(await oracles.embedder.embed('unknown')).toBeUndefined()
  })

  it('answers per document id when entries carry one', async () => {
    const oracles = createFixedOracles([
      { id: 'A', concepts: [{ name: 'alpha', score: 1 }], embedding: [1, 0] },
      { id: 'B', concepts: [{ name: 'beta', score: 1 }], embedding: [0, 1] }
    ])
    expect(await oracles.extractor.extract('', { documentId: 'A' })).toEqual([{ name: 'alpha', score: 1 }])
    expect(await oracles.embedder.embed('', { documentId: 'B' })).toEqual([0, 1])
    expect(await oracles.embedder.embed('')).toBeUndefined()
  })
})

describe('parseExtraction', () => {
  it('accepts an object or a bare list and drops blank names', () => {
    expect(parseExtraction('{"concepts":[{"name":"Attention","score":0.9},{"name":" "}]}')).toEqual([
      { name: 'Attention', score: 0.9 }
    ])
    expect(parseExtraction('[{"name":"attention"}]')).toEqual([{ name: 'attention', score: 1 }])
  })

  it('rejects malformed output', () => {
    expect(() => parseExtraction('{"concepts":[{"name":"x","score":3}]}')).toThrow()
    expect(() => parseExtraction('not json')).toThrow()
  })
})

describe('createOllamaOracles', () => {
  function fakeClient() {
    const chat = vi.fn<OllamaClient['chat']>()
    const embed = vi.fn<OllamaClient['embed']>()
    return { client: { chat, embed }, chat, embed }
  }

  it('asks the chat model for JSON and retries on failure', async () => {
    const { client, chat } = fakeClient()
    chat.mockRejectedValueOnce(new Error('busy')).mockResolvedValueOnce({
      message: { content: '{"concepts":[{"name":"attention","score":0.7}]}' }
    })
    const oracles = createOllamaOracles({ client, model: 'test-model', retries: 1 })
    expect(await oracles.extractor.extract('some text')).toEqual([{ name: 'attention', score: 0.7 }])
    expect(chat).toHaveBeenCalledTimes(2)
    expect(chat).toHaveBeenLastCalledWith(expect.objectContaining({ model: 'test-model', format: 'json', stream: false }))
  })

  it('gives up after the last retry', async () => {
    const { client, chat } = fakeClient()
    chat.mockRejectedValue(new Error('offline'))
    const oracles = createOllamaOracles({ client, retries: 0 })
    await expect(oracles.extractor.extract('text')).rejects.toThrow('offline')
  })

  it('returns the first embedding, or nothing when it is empty', async () => {
    const { client, embed } = fakeClient()
    embed.mockResolvedValueOnce({ embeddings: [[0.1, 0.2]] }).mockResolvedValueOnce({ embeddings: [[]] })
    const oracles = createOllamaOracles({ client, embedModel: 'test-embed', retries: 0 })
    expect(await oracles.embedder.embed('a')).toEqual([0.1, 0.2])
    expect(await oracles.embedder.embed('b')).toBeUndefined()
    expect(embed).toHaveBeenCalledWith({ model: 'test-embed', input: 'a' })
  })
})
