import { ConfigError } from './errors'
import type { Lexicon, ScoringContext, ScoringMode } from './scoring'

/** Maps input-specific (temporary out-of-vocabulary) ids to ids the model knows */
export type TokenRemap = ReadonlyMap<number, number> | ((token: number) => number)

export interface BeamSearchConfig {
  beamSize: number
  maxDecSteps: number
  minDecSteps: number
  startTokenId: number
  stopTokenId: number
  unknownTokenThreshold: number // ids below this are unknown-vocabulary placeholders
  scoringMode: ScoringMode
  lexicon: Lexicon
  tokenRemap?: TokenRemap
}

export interface BeamSearchOptions {
  beamSize?: number // default 4
  maxDecSteps?: number // default 100
  minDecSteps?: number // default min(35, maxDecSteps)
  startTokenId: number
  stopTokenId: number
  unknownTokenThreshold: number
  scoringMode?: ScoringMode // default 'plain'
  lexicon?: Partial<Lexicon>
  tokenRemap?: TokenRemap
}

export const DEFAULT_BEAM_SIZE = 4
export const DEFAULT_MAX_DEC_STEPS = 100
export const DEFAULT_MIN_DEC_STEPS = 35

const SCORING_MODES: readonly ScoringMode[] = ['plain', 'smart']

function requireInt(field: string, v: number, min: number): number {
  if (!Number.isInteger(v)) throw new ConfigError(field, `expected an integer, got ${v}`)
  if (v < min) throw new ConfigError(field, `must be >= ${min}, got ${v}`)
  return v
}

export function resolveConfig(opts: BeamSearchOptions): BeamSearchConfig {
  const beamSize = requireInt('beamSize', opts.beamSize ?? DEFAULT_BEAM_SIZE, 1)
  const maxDecSteps = requireInt('maxDecSteps', opts.maxDecSteps ?? DEFAULT_MAX_DEC_STEPS, 1)
  const minDecSteps = requireInt(
    'minDecSteps',
    opts.minDecSteps ?? Math.min(DEFAULT_MIN_DEC_STEPS, maxDecSteps),
    0,
  )
  if (minDecSteps > maxDecSteps) {
    throw new ConfigError('minDecSteps', `${minDecSteps} exceeds maxDecSteps ${maxDecSteps}`)
  }
  const startTokenId = requireInt('startTokenId', opts.startTokenId, 0)
  const stopTokenId = requireInt('stopTokenId', opts.stopTokenId, 0)
  const unknownTokenThreshold = requireInt('unknownTokenThreshold', opts.unknownTokenThreshold, 0)
  const scoringMode = opts.scoringMode ?? 'plain'
  if (!SCORING_MODES.includes(scoringMode)) {
    throw new ConfigError('scoringMode', `expected one of ${SCORING_MODES.join(', ')}`)
  }
  const lexicon: Lexicon = {
    startSentIds: opts.lexicon?.startSentIds ?? new Set<number>(),
    stopwordIds: opts.lexicon?.stopwordIds ?? new Set<number>(),
    pronounIds: opts.lexicon?.pronounIds ?? new Set<number>(),
  }
  if (scoringMode === 'smart' && !lexicon.startSentIds.has(startTokenId)) {
    throw new ConfigError('lexicon.startSentIds', 'smart scoring needs the start token as a sentence start')
  }
  return {
    beamSize,
    maxDecSteps,
    minDecSteps,
    startTokenId,
    stopTokenId,
    unknownTokenThreshold,
    scoringMode,
    lexicon,
    tokenRemap: opts.tokenRemap,
  }
}

export function scoringContextOf(config: BeamSearchConfig): ScoringContext {
  return {
    stopTokenId: config.stopTokenId,
    unknownTokenThreshold: config.unknownTokenThreshold,
    lexicon: config.lexicon,
  }
}

export function remapToken(remap: TokenRemap | undefined, token: number): number {
  if (!remap) return token
  if (typeof remap === 'function') return remap(token)
  return remap.get(token) ?? token
}
