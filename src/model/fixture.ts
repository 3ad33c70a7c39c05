// Fixture format for the table model and the decode CLI.
// {
//   "vocab": ["[PAD]", "[UNK]", "[START]", "[STOP]", ...],   id = index
//   "unknownTokenThreshold": 4,
//   "model": { "pGen": 0.8 | null, "rows": { "<token>": [[id, logProb], ...] }, "defaultRow": [...] },
//   temporary OOV ids start at vocab.length
//   "examples": [{ "id": "ex-1", "attnLength": 6, "oov": { "<temp id>": <model id> } }]
// }
import { ConfigError } from '@/decoder/errors'
import { splitSentences } from '@/decoder/output'
import { START_DECODING } from '@/decoder/lexicon'
import type { Candidate, TableModelSpec } from './tableModel'

export const STOP_DECODING = '[STOP]'

export interface FixtureExample {
  id: string
  attnLength: number
  oov: Map<number, number>
}

export interface ModelFixture {
  vocab: string[]
  unknownTokenThreshold: number
  startTokenId: number
  stopTokenId: number
  model: TableModelSpec
  examples: FixtureExample[]
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function parseId(field: string, v: unknown, vocabSize: number): number {
  const n = typeof v === 'string' ? Number(v) : v
  if (typeof n !== 'number' || !Number.isInteger(n) || n < 0) {
    throw new ConfigError(field, `expected a token id, got ${JSON.stringify(v)}`)
  }
  if (n >= vocabSize) throw new ConfigError(field, `token id ${n} outside vocabulary of ${vocabSize}`)
  return n
}

// Candidate ids may exceed the vocabulary: those are an input's temporary OOV ids
function parseRow(field: string, v: unknown): Candidate[] {
  if (!Array.isArray(v)) throw new ConfigError(field, 'expected an array of [id, logProb] pairs')
  return v.map((pair: unknown, i) => {
    if (!Array.isArray(pair) || pair.length !== 2) {
      throw new ConfigError(`${field}[${i}]`, 'expected an [id, logProb] pair')
    }
    const logProb: unknown = pair[1]
    if (typeof logProb !== 'number' || !(logProb <= 0)) {
      throw new ConfigError(`${field}[${i}]`, `log-prob must be a number <= 0`)
    }
    return { id: parseId(`${field}[${i}]`, pair[0], Infinity), logProb }
  })
}

function indexOfWord(vocab: string[], word: string): number {
  const id = vocab.indexOf(word)
  if (id === -1) throw new ConfigError('vocab', `missing ${word}`)
  return id
}

export function parseModelFixture(raw: unknown): ModelFixture {
  if (!isRecord(raw)) throw new ConfigError('fixture', 'expected an object')
  const { vocab, unknownTokenThreshold, model, examples } = raw
  if (!Array.isArray(vocab) || !vocab.every((w): w is string => typeof w === 'string')) {
    throw new ConfigError('vocab', 'expected an array of words')
  }
  if (typeof unknownTokenThreshold !== 'number' || !Number.isInteger(unknownTokenThreshold)) {
    throw new ConfigError('unknownTokenThreshold', 'expected an integer')
  }
  if (!isRecord(model)) throw new ConfigError('model', 'expected an object')
  const pGenRaw = model['pGen'] ?? null
  let pGen: number | null = null
  if (pGenRaw !== null) {
    if (typeof pGenRaw !== 'number' || pGenRaw < 0 || pGenRaw > 1) {
      throw new ConfigError('model.pGen', 'expected a probability or null')
    }
    pGen = pGenRaw
  }
  const rowsRaw = model['rows']
  if (!isRecord(rowsRaw)) throw new ConfigError('model.rows', 'expected an object keyed by token id')
  const rows = new Map<number, Candidate[]>()
  for (const [key, row] of Object.entries(rowsRaw)) {
    rows.set(parseId(`model.rows.${key}`, key, vocab.length), parseRow(`model.rows.${key}`, row))
  }
  const defaultRow =
    model['defaultRow'] === undefined
      ? undefined
      : parseRow('model.defaultRow', model['defaultRow'])

  if (!Array.isArray(examples)) throw new ConfigError('examples', 'expected an array')
  const parsedExamples = examples.map((ex: unknown, i): FixtureExample => {
    if (!isRecord(ex)) throw new ConfigError(`examples[${i}]`, 'expected an object')
    const id = typeof ex['id'] === 'string' ? ex['id'] : `ex-${i + 1}`
    const attnLength = ex['attnLength']
    if (typeof attnLength !== 'number' || !Number.isInteger(attnLength) || attnLength < 1) {
      throw new ConfigError(`examples[${i}].attnLength`, 'expected a positive integer')
    }
    const oov = new Map<number, number>()
    const oovRaw = ex['oov'] ?? {}
    if (!isRecord(oovRaw)) throw new ConfigError(`examples[${i}].oov`, 'expected an object')
    for (const [temp, target] of Object.entries(oovRaw)) {
      const tempId = Number(temp)
      if (!Number.isInteger(tempId) || tempId < 0) {
        throw new ConfigError(`examples[${i}].oov.${temp}`, 'expected an integer key')
      }
      oov.set(tempId, parseId(`examples[${i}].oov.${temp}`, target, vocab.length))
    }
    return { id, attnLength, oov }
  })

  return {
    vocab,
    unknownTokenThreshold,
    startTokenId: indexOfWord(vocab, START_DECODING),
    stopTokenId: indexOfWord(vocab, STOP_DECODING),
    model: { rows, defaultRow, pGen },
    examples: parsedExamples,
  }
}

/** Words for ids; ids past the vocabulary render as [OOV:<id>] */
export function renderIds(ids: readonly number[], vocab: readonly string[]): string {
  return ids.map((id) => vocab[id] ?? `[OOV:${id}]`).join(' ')
}

/** One rendered line per sentence, split after each '.' */
export function renderSentences(ids: readonly number[], vocab: readonly string[]): string[] {
  const dot = vocab.indexOf('.')
  const ends = new Set(dot === -1 ? [] : [dot])
  return splitSentences(ids, ends).map((sentence) => renderIds(sentence, vocab))
}
