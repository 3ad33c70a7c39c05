import { DegenerateScoringError, MalformedHypothesisError } from './errors'

/** Score given to any hypothesis carrying an unknown-vocabulary token */
export const DISQUALIFIED_SCORE = -(10 ** 6)
export const REPEATED_NGRAM_PENALTY = 10 ** 6
export const PRONOUN_PENALTY = 0.8
const SENTENCE_START_SPAN = 5 // window is (i, i + 5), weight 1 / (j - i + 5)
const MEAN_WEIGHT = 0.75

export type ScoringMode = 'plain' | 'smart'

export interface Lexicon {
  startSentIds: ReadonlySet<number>
  stopwordIds: ReadonlySet<number>
  pronounIds: ReadonlySet<number>
}

export interface UnknownTokenRule {
  stopTokenId: number
  unknownTokenThreshold: number
}

export interface ScoringContext extends UnknownTokenRule {
  lexicon: Lexicon
}

/**
 * Interior tokens (between the start token and the latest one) below the threshold
 * disqualify; the latest token disqualifies only when it is not the stop token.
 */
export function hasUnknownToken(tokens: readonly number[], rule: UnknownTokenRule): boolean {
  const { unknownTokenThreshold: threshold, stopTokenId } = rule
  for (let i = 1; i < tokens.length - 1; i++) {
    if (tokens[i]! < threshold) return true
  }
  const latest = tokens[tokens.length - 1]
  return latest !== undefined && latest < threshold && latest !== stopTokenId
}

/** Sum of log-probs over the token count (start token included) */
export function plainAvgLogProb(tokens: readonly number[], logProbs: readonly number[]): number {
  let sum = 0
  for (const lp of logProbs) sum += lp
  return sum / tokens.length
}

/**
 * Average log-prob blended with a weighted average over the few tokens after each
 * sentence start. Pronouns pay a fixed penalty.
 * Returns 0.75 * mean(logProbs') + 0.25 * (normalized weights . logProbs').
 */
export function smartAvgLogProb(
  tokens: readonly number[],
  logProbs: readonly number[],
  lexicon: Lexicon,
): number {
  const n = tokens.length
  const weights = new Float64Array(n)
  const adjusted = Float64Array.from(logProbs)

  for (let i = 0; i < n; i++) {
    const token = tokens[i]!
    if (lexicon.startSentIds.has(token)) {
      const end = Math.min(n, i + SENTENCE_START_SPAN)
      for (let j = i + 1; j < end; j++) {
        if (!lexicon.stopwordIds.has(tokens[j]!)) weights[j] = 1 / (j - i + SENTENCE_START_SPAN)
      }
    }
    if (lexicon.pronounIds.has(token)) adjusted[i]! -= PRONOUN_PENALTY
  }

  let weightSum = 0
  for (let i = 0; i < n; i++) weightSum += weights[i]!
  if (!(weightSum > 0)) {
    throw new DegenerateScoringError(`no weighted position after a sentence start in ${n} tokens`)
  }

  let mean = 0
  let sentenceStart = 0
  for (let i = 0; i < n; i++) {
    mean += adjusted[i]!
    sentenceStart += (weights[i]! / weightSum) * adjusted[i]!
  }
  mean /= n
  return MEAN_WEIGHT * mean + (1 - MEAN_WEIGHT) * sentenceStart
}

export function repeatedNGramLoss(tokens: readonly number[], n = 3): number {
  const seen = new Set<string>()
  for (let i = 0; i + n <= tokens.length; i++) {
    const key = tokens.slice(i, i + n).join(',')
    if (seen.has(key)) return REPEATED_NGRAM_PENALTY
    seen.add(key)
  }
  return 0
}

/**
 * Mean over steps of sum(min(attn_t, coverage_t)), where coverage_t is the sum of the
 * attention distributions before step t.
 */
export function coverageLoss(attnDists: readonly (readonly number[])[]): number {
  const first = attnDists[0]
  if (!first) throw new MalformedHypothesisError('coverage loss needs at least one attention step')
  const coverage = new Float64Array(first.length)
  let total = 0
  for (const attn of attnDists) {
    if (attn.length !== coverage.length) {
      throw new MalformedHypothesisError(
        `attention length ${attn.length} differs from ${coverage.length}`,
      )
    }
    let stepLoss = 0
    for (let k = 0; k < attn.length; k++) {
      stepLoss += Math.min(attn[k]!, coverage[k]!)
      coverage[k]! += attn[k]!
    }
    total += stepLoss
  }
  return total / attnDists.length
}

export function averageTopAttention(attnDists: readonly (readonly number[])[]): number {
  if (attnDists.length === 0) {
    throw new MalformedHypothesisError('top attention needs at least one attention step')
  }
  let sum = 0
  for (const attn of attnDists) {
    let top = -Infinity
    for (const a of attn) if (a > top) top = a
    sum += top
  }
  return sum / attnDists.length
}
