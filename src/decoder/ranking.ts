import type { Hypothesis } from './hypothesis'
import type { ScoringContext, ScoringMode } from './scoring'

export interface Ranked<S> {
  hypothesis: Hypothesis<S>
  score: number
}

export function scoreFunction<S>(
  mode: ScoringMode,
  ctx: ScoringContext,
): (h: Hypothesis<S>) => number {
  return mode === 'smart' ? (h) => h.score(ctx) : (h) => h.avgLogProb(ctx)
}

/** Descending by score; equal scores keep their input order */
export function rankHyps<S>(
  hyps: readonly Hypothesis<S>[],
  ctx: ScoringContext,
  mode: ScoringMode,
): Ranked<S>[] {
  const scoreOf = scoreFunction<S>(mode, ctx)
  const scored = hyps.map((hypothesis, idx) => ({ hypothesis, score: scoreOf(hypothesis), idx }))
  scored.sort((a, b) => b.score - a.score || a.idx - b.idx)
  return scored.map(({ hypothesis, score }) => ({ hypothesis, score }))
}

export function sortHyps<S>(
  hyps: readonly Hypothesis<S>[],
  ctx: ScoringContext,
  mode: ScoringMode,
): Hypothesis<S>[] {
  return rankHyps(hyps, ctx, mode).map((r) => r.hypothesis)
}

/** Winner of a final result set, or undefined when the set is empty */
export function bestOf<S>(
  hyps: readonly Hypothesis<S>[],
  ctx: ScoringContext,
  mode: ScoringMode,
): Ranked<S> | undefined {
  return rankHyps(hyps, ctx, mode)[0]
}
