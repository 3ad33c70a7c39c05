import type { DecodeStep, DecodeStepOutput } from '@/decoder/beamSearch'

export interface Candidate {
  id: number
  logProb: number
}

export interface TableModelSpec {
  rows: ReadonlyMap<number, readonly Candidate[]> // keyed by the latest token
  defaultRow?: readonly Candidate[]
  pGen: number | null // null: no copy mechanism
}

export interface TableState {
  step: number
}

export class MissingRowError extends Error {
  constructor(token: number) {
    super(`no candidate row for token ${token}`)
    this.name = 'MissingRowError'
  }
}

/**
 * Deterministic decode step backed by a candidate table.
 * Attention on step s is one-hot at position s mod attnLength; coverage accumulates it.
 */
export function tableDecodeStep(spec: TableModelSpec): DecodeStep<TableState> {
  const sorted = new Map<number, Candidate[]>()
  for (const [token, row] of spec.rows) {
    sorted.set(token, [...row].sort((a, b) => b.logProb - a.logProb))
  }
  const pGen = spec.pGen
  const fallback = spec.defaultRow ? [...spec.defaultRow].sort((a, b) => b.logProb - a.logProb) : null

  return ({ latestTokens, states, coverages }) => {
    const topkIds: number[][] = []
    const topkLogProbs: number[][] = []
    const newStates: TableState[] = []
    const attnDists: number[][] = []
    const newCoverages: number[][] = []
    for (let i = 0; i < latestTokens.length; i++) {
      const token = latestTokens[i]!
      const row = sorted.get(token) ?? fallback
      if (!row) throw new MissingRowError(token)
      const step = states[i]!.step
      const prev = coverages[i]!
      const attn = prev.map((_, pos) => (pos === step % prev.length ? 1 : 0))
      topkIds.push(row.map((c) => c.id))
      topkLogProbs.push(row.map((c) => c.logProb))
      newStates.push({ step: step + 1 })
      attnDists.push(attn)
      newCoverages.push(prev.map((c, pos) => c + attn[pos]!))
    }
    const result: DecodeStepOutput<TableState> = {
      topkIds,
      topkLogProbs,
      newStates,
      attnDists,
      pGens: pGen === null ? null : latestTokens.map(() => pGen),
      newCoverages,
    }
    return result
  }
}
