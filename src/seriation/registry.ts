import { debug } from '../logger'
import defaultConfig from './config'
import { AmbiguousMergeError, InvalidConceptNameError, RegistryBusyError, UnknownConceptError } from './errors'
import { Concept, ConceptRef, SeriationConfig } from './types'

interface AliasEntry {
  ref: ConceptRef
  confidence: number
}

export interface CanonicalizeOptions {
  documentId?: string
  score?: number
}

export function normalizeConceptName(raw: string) {
  return raw
    .toLowerCase()
    .replace(/[_-]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
}

function levenshtein(a: string, b: string): number {
  if (a === b) return 0
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j)
  for (let i = 1; i <= a.length; i++) {
    const row = [i]
    for (let j = 1; j <= b.length; j++) {
      const cost = a.charAt(i - 1) === b.charAt(j - 1) ? 0 : 1
      row[j] = Math.min(prev[j - 1] + cost, row[j - 1] + 1, prev[j] + 1)
    }
    prev = row
  }
  return prev[b.length]
}

/** Normalized Levenshtein similarity in [0,1]. */
export function stringSimilarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length)
  if (longest === 0) return 1
  return 1 - levenshtein(a, b) / longest
}

function sequenceOf(ref: ConceptRef) {
  return Number(ref.slice(ref.indexOf(':') + 1))
}

export function compareConceptRefs(a: ConceptRef, b: ConceptRef) {
  return sequenceOf(a) - sequenceOf(b) || (a < b ? -1 : a > b ? 1 : 0)
}

function pairKey(a: string, b: string) {
  return a < b ? `${a}|${b}` : `${b}|${a}`
}

/**
 * Canonical concept names, aliases and identifiers. One instance is shared by
 * reference between the engine's components; mutations run in a single-writer
 * scope and the alias table only ever grows.
 */
export class ConceptRegistry {
  private readonly byId = new Map<ConceptRef, Concept>()
  private readonly aliasTable = new Map<string, AliasEntry>()
  private readonly distinct = new Set<string>()
  private nextSequence = 1
  private writing = false

  constructor(private readonly cfg: SeriationConfig['registry'] = defaultConfig.registry) {}

  canonicalize(rawName: string, options: CanonicalizeOptions = {}): ConceptRef {
    const name = normalizeConceptName(rawName)
    if (!name) throw new InvalidConceptNameError(rawName)
    return this.exclusive('canonicalize', () => {
      let ref = this.aliasTable.get(name)?.ref
      if (ref === undefined) {
        const match = this.fuzzyMatch(name)
        if (match) {
          debug('registry fuzzy alias', name, '->', match.ref, match.score.toFixed(3))
          this.addAlias(name, match.ref, match.score)
          ref = match.ref
        } else {
          ref = this.create(rawName.trim(), name)
        }
      }
      const canonical = this.resolve(ref)
      if (options.documentId !== undefined) this.attachUnlocked(canonical, options.documentId, options.score ?? 1)
      return canonical
    })
  }

  /** Explicit alias at full confidence. Folds an existing concept of that name into `ref`. */
  registerAlias(alias: string, ref: ConceptRef): ConceptRef {
    const name = normalizeConceptName(alias)
    if (!name) throw new InvalidConceptNameError(alias)
    return this.exclusive('registerAlias', () => {
      const target = this.resolve(ref)
      const existing = this.aliasTable.get(name)
      if (existing && this.resolve(existing.ref) !== target) {
        return this.mergeUnlocked(existing.ref, target)
      }
      this.addAlias(name, target, 1)
      return target
    })
  }

  /** Explicit non-alias mapping: the two names never denote the same concept. */
  declareDistinct(nameA: string, nameB: string) {
    const a = normalizeConceptName(nameA)
    const b = normalizeConceptName(nameB)
    if (!a) throw new InvalidConceptNameError(nameA)
    if (!b) throw new InvalidConceptNameError(nameB)
    this.exclusive('declareDistinct', () => {
      this.distinct.add(pairKey(a, b))
    })
  }

  merge(refA: ConceptRef, refB: ConceptRef): ConceptRef {
    return this.exclusive('merge', () => this.mergeUnlocked(refA, refB))
  }

  lookup(ref: ConceptRef): Concept {
    return this.require(this.resolve(ref))
  }

  resolve(ref: ConceptRef): ConceptRef {
    let current = this.require(ref)
    while (current.mergedInto !== undefined) current = this.require(current.mergedInto)
    return current.id
  }

  has(ref: ConceptRef) {
    return this.byId.has(ref)
  }

  attach(ref: ConceptRef, documentId: string, score: number) {
    this.exclusive('attach', () => this.attachUnlocked(this.resolve(ref), documentId, score))
  }

  detachDocument(documentId: string) {
    this.exclusive('detachDocument', () => {
      for (const concept of this.byId.values()) concept.documents.delete(documentId)
    })
  }

  /** Live concepts, oldest first. */
  concepts(): Concept[] {
    return Array.from(this.byId.values())
      .filter((c) => c.mergedInto === undefined)
      .sort((a, b) => compareConceptRefs(a.id, b.id))
  }

  aliasConfidence(alias: string): number | undefined {
    return this.aliasTable.get(normalizeConceptName(alias))?.confidence
  }

  private create(displayName: string, name: string): ConceptRef {
    const id = `concept:${this.nextSequence++}`
    this.byId.set(id, { id, name: displayName, aliases: new Set(), documents: new Map() })
    this.addAlias(name, id, 1)
    return id
  }

  private addAlias(name: string, ref: ConceptRef, confidence: number) {
    this.aliasTable.set(name, { ref, confidence })
    this.require(ref).aliases.add(name)
  }

  private attachUnlocked(ref: ConceptRef, documentId: string, score: number) {
    const docs = this.require(ref).documents
    docs.set(documentId, Math.max(docs.get(documentId) ?? 0, score))
  }

  private fuzzyMatch(name: string): { ref: ConceptRef; score: number } | undefined {
    let best: { ref: ConceptRef; score: number } | undefined
    for (const [alias, entry] of this.aliasTable) {
      if (this.distinct.has(pairKey(alias, name))) continue
      const score = stringSimilarity(alias, name)
      if (score < this.cfg.fuzzyThreshold) continue
      const ref = this.resolve(entry.ref)
      if (!best || score > best.score || (score === best.score && compareConceptRefs(ref, best.ref) < 0)) {
        best = { ref, score }
      }
    }
    return best
  }

  private highConfidenceAliases(concept: Concept) {
    return Array.from(concept.aliases).filter(
      (alias) => (this.aliasTable.get(alias)?.confidence ?? 0) >= this.cfg.highConfidenceAlias
    )
  }

  private findConflict(a: Concept, b: Concept): [string, string] | undefined {
    const highA = this.highConfidenceAliases(a)
    const highB = new Set(this.highConfidenceAliases(b))
    if (highA.some((alias) => highB.has(alias))) return undefined
    for (const x of highA) {
      for (const y of highB) {
        if (this.distinct.has(pairKey(x, y))) return [x, y]
      }
    }
    return undefined
  }

  private mergeUnlocked(refA: ConceptRef, refB: ConceptRef): ConceptRef {
    const a = this.lookup(refA)
    const b = this.lookup(refB)
    if (a.id === b.id) return a.id
    const conflict = this.findConflict(a, b)
    if (conflict) throw new AmbiguousMergeError(a.id, b.id, conflict)

    const [survivor, loser] = compareConceptRefs(a.id, b.id) <= 0 ? [a, b] : [b, a]
    for (const alias of loser.aliases) survivor.aliases.add(alias)
    for (const [documentId, score] of loser.documents) {
      survivor.documents.set(documentId, Math.max(survivor.documents.get(documentId) ?? 0, score))
    }
    loser.mergedInto = survivor.id
    debug('registry merged', loser.id, 'into', survivor.id)
    return survivor.id
  }

  private require(ref: ConceptRef): Concept {
    const concept = this.byId.get(ref)
    if (!concept) throw new UnknownConceptError(ref)
    return concept
  }

  private exclusive<T>(operation: string, fn: () => T): T {
    if (this.writing) throw new RegistryBusyError(operation)
    this.writing = true
    try {
      return fn()
    } finally {
      this.writing = false
    }
  }
}
