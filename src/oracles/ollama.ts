import ollama, { ChatRequest, EmbedRequest, Ollama } from 'ollama'
import { z } from 'zod'
import { debug, warn } from '../logger'
import { getErrorMessage } from '../seriation/errors'
import { ExtractedConcept, Oracles } from '../seriation/types'

export interface OllamaClient {
  chat(request: ChatRequest & { stream?: false }): Promise<{ message: { content: string } }>
  embed(request: EmbedRequest): Promise<{ embeddings: number[][] }>
}

export interface OllamaOracleOptions {
  model?: string
  embedModel?: string
  host?: string
  retries?: number
  maxConcepts?: number
  client?: OllamaClient
}

const EXTRACTION_PROMPT = `You extract the key technical concepts a document discusses.
Reply with JSON only: {"concepts": [{"name": string, "score": number}]}.
"name" is a short noun phrase in lowercase. "score" in [0,1] is how central the concept is to the document.
List at most {max} concepts, most central first.`

const conceptSchema = z.object({
  name: z.string(),
  score: z.number().min(0).max(1).default(1)
})

const extractionSchema = z.union([z.object({ concepts: z.array(conceptSchema) }), z.array(conceptSchema)])

export function parseExtraction(content: string): ExtractedConcept[] {
  const parsed = extractionSchema.parse(JSON.parse(content))
  const concepts = Array.isArray(parsed) ? parsed : parsed.concepts
  return concepts.filter((c) => c.name.trim().length > 0)
}

async function withRetries<T>(label: string, retries: number, fn: () => Promise<T>): Promise<T> {
  let lastErr: unknown = undefined
  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      return await fn()
    } catch (err) {
      lastErr = err
      debug(`${label} attempt ${attempt} failed`, getErrorMessage(err))
      if (attempt < retries) await new Promise((r) => setTimeout(r, 200 * (attempt + 1)))
    }
  }
  throw lastErr
}

/** Concept extraction through an Ollama chat model in JSON mode, vectors through its embed endpoint. */
export function createOllamaOracles(options: OllamaOracleOptions = {}): Oracles {
  const client: OllamaClient = options.client ?? (options.host ? new Ollama({ host: options.host }) : ollama)
  const model = options.model ?? process.env.OLLAMA_MODEL ?? 'llama3.2'
  const embedModel = options.embedModel ?? process.env.OLLAMA_EMBED_MODEL ?? 'nomic-embed-text'
  const retries = options.retries ?? 2
  const system = EXTRACTION_PROMPT.replace('{max}', String(options.maxConcepts ?? 12))

  return {
    extractor: {
      extract: (text) =>
        withRetries('extraction', retries, async () => {
          const response = await client.chat({
            model,
            format: 'json',
            stream: false,
            messages: [
              { role: 'system', content: system },
              { role: 'user', content: text }
            ]
          })
          debug('extraction raw response', response.message.content)
          return parseExtraction(response.message.content)
        })
    },
    embedder: {
      embed: (text) =>
        withRetries('embedding', retries, async () => {
          const response = await client.embed({ model: embedModel, input: text })
          const vector = response.embeddings[0]
          if (!vector || vector.length === 0) {
            warn('empty embedding returned by', embedModel)
            return undefined
          }
          return vector
        })
    }
  }
}
