import { remapToken, resolveConfig, scoringContextOf, type BeamSearchOptions } from './config'
import { DecodeStepContractError, EmptyBeamError } from './errors'
import { Hypothesis, type Vector } from './hypothesis'
import { bestOf, rankHyps } from './ranking'

export interface DecodeStepInput<S> {
  latestTokens: readonly number[] // already remapped to model-known ids
  states: readonly S[]
  coverages: readonly Vector[]
}

/** One row per input hypothesis; the state/attention/coverage of a row is shared by its candidates */
export interface DecodeStepOutput<S> {
  topkIds: readonly (readonly number[])[]
  topkLogProbs: readonly (readonly number[])[]
  newStates: readonly S[]
  attnDists: readonly Vector[]
  pGens: readonly number[] | null // null: no copy mechanism
  newCoverages: readonly Vector[]
}

/**
 * The model capability driven by the search: given the live hypotheses, return at least
 * 2 * beamSize candidate next tokens for each. Errors it throws propagate unchanged.
 */
export type DecodeStep<S> = (
  input: DecodeStepInput<S>,
) => DecodeStepOutput<S> | Promise<DecodeStepOutput<S>>

export interface SearchStart<S> {
  state: S // initial decoder state, shared by every beam slot
  attnLength: number // number of input positions
  copyMechanism?: boolean // default true; false means no generation probabilities
}

export interface StepTrace {
  step: number // steps completed
  live: number
  results: number
  candidates: number
  bestScore: number | null // top candidate score this step
}

export interface RunOptions {
  onStep?: (trace: StepTrace) => void
}

export interface BeamSearchResult<S> {
  hypothesis: Hypothesis<S>
  score: number
  steps: number
  completed: boolean // false when no hypothesis reached the stop token and live ones were ranked instead
}

function checkStepOutput<S>(
  out: DecodeStepOutput<S>,
  rows: number,
  used: number,
  perRow: number,
  attnLength: number,
  copyMechanism: boolean,
): void {
  if ((out.pGens !== null) !== copyMechanism) {
    throw new DecodeStepContractError(
      copyMechanism ? 'pGens missing for a copy-mechanism model' : 'pGens returned by a model without a copy mechanism',
    )
  }
  const lengths: [string, number][] = [
    ['topkIds', out.topkIds.length],
    ['topkLogProbs', out.topkLogProbs.length],
    ['newStates', out.newStates.length],
    ['attnDists', out.attnDists.length],
    ['newCoverages', out.newCoverages.length],
  ]
  if (out.pGens) lengths.push(['pGens', out.pGens.length])
  for (const [field, len] of lengths) {
    if (len !== rows) throw new DecodeStepContractError(`${field} has ${len} rows for ${rows} hypotheses`)
  }
  for (let i = 0; i < used; i++) {
    const ids = out.topkIds[i]!
    const lps = out.topkLogProbs[i]!
    if (ids.length < perRow || lps.length < perRow) {
      throw new DecodeStepContractError(
        `row ${i} has ${Math.min(ids.length, lps.length)} candidates, need ${perRow}`,
      )
    }
    if (out.attnDists[i]!.length !== attnLength || out.newCoverages[i]!.length !== attnLength) {
      throw new DecodeStepContractError(`row ${i} vectors do not cover ${attnLength} input positions`)
    }
  }
}

export async function runBeamSearch<S>(
  start: SearchStart<S>,
  decodeStep: DecodeStep<S>,
  options: BeamSearchOptions,
  run: RunOptions = {},
): Promise<BeamSearchResult<S>> {
  const config = resolveConfig(options)
  const ctx = scoringContextOf(config)
  const { beamSize, maxDecSteps, minDecSteps, stopTokenId, unknownTokenThreshold, scoringMode } =
    config
  const perRow = 2 * beamSize
  const maxResults = 4 * beamSize

  const root = Hypothesis.root(config.startTokenId, start.state, start.attnLength, {
    copyMechanism: start.copyMechanism,
  })
  let hyps: Hypothesis<S>[] = Array.from({ length: beamSize }, () => root)
  const results: Hypothesis<S>[] = []
  let steps = 0

  while (steps < maxDecSteps && results.length < maxResults) {
    if (hyps.length === 0) break // every candidate was discarded; nothing left to extend

    const out = await decodeStep({
      latestTokens: hyps.map((h) => remapToken(config.tokenRemap, h.latestToken)),
      states: hyps.map((h) => h.state),
      coverages: hyps.map((h) => h.coverage),
    })
    // All slots start identical, so only the first one is expanded on step 0
    const numOrig = steps === 0 ? 1 : hyps.length
    checkStepOutput(out, hyps.length, numOrig, perRow, start.attnLength, start.copyMechanism !== false)

    const candidates: Hypothesis<S>[] = []
    for (let i = 0; i < numOrig; i++) {
      const h = hyps[i]!
      const ids = out.topkIds[i]!
      const lps = out.topkLogProbs[i]!
      // one frozen copy per row, shared by its candidates
      const attnDist = Object.freeze(out.attnDists[i]!.slice())
      const coverage = Object.freeze(out.newCoverages[i]!.slice())
      for (let j = 0; j < perRow; j++) {
        candidates.push(
          h.extend({
            token: ids[j]!,
            logProb: lps[j]!,
            state: out.newStates[i]!,
            attnDist,
            pGen: out.pGens ? out.pGens[i]! : null,
            coverage,
          }),
        )
      }
    }

    const ranked = rankHyps(candidates, ctx, scoringMode)
    const next: Hypothesis<S>[] = []
    for (const { hypothesis: h } of ranked) {
      const latest = h.latestToken
      if (latest === stopTokenId) {
        // too-short completions are dropped
        if (steps >= minDecSteps) results.push(h)
      } else if (latest >= unknownTokenThreshold) {
        next.push(h)
      }
      if (next.length === beamSize || results.length === maxResults) break
    }

    hyps = next
    steps++
    run.onStep?.({
      step: steps,
      live: hyps.length,
      results: results.length,
      candidates: candidates.length,
      bestScore: ranked[0]?.score ?? null,
    })
  }

  const completed = results.length > 0
  const best = bestOf(completed ? results : hyps, ctx, scoringMode)
  if (!best) throw new EmptyBeamError()
  return { hypothesis: best.hypothesis, score: best.score, steps, completed }
}
