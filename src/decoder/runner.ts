/* eslint-disable no-console */
import { runBeamSearch, type DecodeStep, type SearchStart, type StepTrace } from './beamSearch'
import type { BeamSearchOptions, TokenRemap } from './config'
import type { Hypothesis } from './hypothesis'
import { decodedIds } from './output'

export type Logger = Pick<Console, 'info' | 'warn' | 'error' | 'debug'>

export interface DecodeExample<S> {
  id: string
  start: SearchStart<S>
  tokenRemap?: TokenRemap // this input's temporary OOV ids -> unknown-token id
}

export interface DecodedOutput<S> {
  id: string
  ids: number[]
  score: number
  steps: number
  completed: boolean
  ms: number
  hypothesis: Hypothesis<S>
}

export interface DecodeFailure {
  id: string
  error: Error
}

export interface DecodeRunSummary<S> {
  outputs: DecodedOutput<S>[]
  failures: DecodeFailure[]
  meanScore: number | null
}

export interface DecodeRunOptions {
  log?: Logger
  trace?: boolean // log every step at debug level
}

/**
 * Decode inputs one after another. A failing input is logged and skipped.
 */
export async function decodeExamples<S>(
  examples: readonly DecodeExample<S>[],
  decodeStep: DecodeStep<S>,
  config: BeamSearchOptions,
  opts: DecodeRunOptions = {},
): Promise<DecodeRunSummary<S>> {
  const log = opts.log ?? console
  const outputs: DecodedOutput<S>[] = []
  const failures: DecodeFailure[] = []
  let scoreSum = 0

  for (const ex of examples) {
    const t0 = performance.now()
    const onStep = opts.trace
      ? (t: StepTrace) =>
          log.debug(
            `[trace] ${ex.id} step=${t.step} live=${t.live} results=${t.results} best=${t.bestScore ?? 'n/a'}`,
          )
      : undefined
    try {
      const res = await runBeamSearch(
        ex.start,
        decodeStep,
        { ...config, tokenRemap: ex.tokenRemap ?? config.tokenRemap },
        { onStep },
      )
      const ms = performance.now() - t0
      const out: DecodedOutput<S> = {
        id: ex.id,
        ids: decodedIds(res.hypothesis, config.stopTokenId),
        score: res.score,
        steps: res.steps,
        completed: res.completed,
        ms,
        hypothesis: res.hypothesis,
      }
      outputs.push(out)
      scoreSum += res.score
      log.info(`[decode] ${ex.id} in ${ms.toFixed(1)}ms`)
      log.info(`[decode] mean score: ${scoreSum / outputs.length}`)
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e))
      failures.push({ id: ex.id, error })
      log.warn(`[warn] ${ex.id} failed: ${error.message}`)
    }
  }

  return {
    outputs,
    failures,
    meanScore: outputs.length ? scoreSum / outputs.length : null,
  }
}
