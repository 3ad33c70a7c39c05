import { AppendList } from './appendList'
import { MalformedHypothesisError } from './errors'
import {
  DISQUALIFIED_SCORE,
  averageTopAttention,
  coverageLoss,
  hasUnknownToken,
  plainAvgLogProb,
  repeatedNGramLoss,
  smartAvgLogProb,
  type Lexicon,
  type ScoringContext,
  type UnknownTokenRule,
} from './scoring'

/** Attention or coverage weights over the input positions */
export type Vector = readonly number[]

// Vectors are copied and frozen on entry so a caller's arrays cannot change a hypothesis
function frozen(v: Vector): Vector {
  return Object.isFrozen(v) ? v : Object.freeze(v.slice())
}

export interface HypothesisInit<S> {
  tokens: readonly number[]
  logProbs: readonly number[]
  state: S
  attnDists: readonly Vector[]
  pGens: readonly number[] | null // null: model has no copy mechanism
  coverage: Vector
}

export interface Extension<S> {
  token: number
  logProb: number
  state: S
  attnDist: Vector
  pGen: number | null
  coverage: Vector
}

/**
 * One candidate sequence during beam search. Immutable: extend() returns a new value
 * sharing the parent's histories.
 */
export class Hypothesis<S> {
  private constructor(
    private readonly tokenList: AppendList<number>,
    private readonly logProbList: AppendList<number>,
    readonly state: S,
    private readonly attnList: AppendList<Vector>,
    private readonly pGenList: AppendList<number> | null,
    readonly coverage: Vector,
  ) {}

  static create<S>(init: HypothesisInit<S>): Hypothesis<S> {
    const { tokens, logProbs, attnDists, pGens, coverage } = init
    if (tokens.length === 0) throw new MalformedHypothesisError('no tokens')
    if (logProbs.length !== tokens.length) {
      throw new MalformedHypothesisError(
        `${logProbs.length} log-probs for ${tokens.length} tokens`,
      )
    }
    if (attnDists.length !== tokens.length - 1) {
      throw new MalformedHypothesisError(
        `${attnDists.length} attention steps for ${tokens.length} tokens`,
      )
    }
    if (pGens && pGens.length !== attnDists.length) {
      throw new MalformedHypothesisError(
        `${pGens.length} generation probabilities for ${attnDists.length} steps`,
      )
    }
    for (const attn of attnDists) {
      if (attn.length !== coverage.length) {
        throw new MalformedHypothesisError(
          `attention length ${attn.length} differs from coverage length ${coverage.length}`,
        )
      }
    }
    return new Hypothesis(
      AppendList.from(tokens),
      AppendList.from(logProbs),
      init.state,
      AppendList.from(attnDists.map(frozen)),
      pGens ? AppendList.from(pGens) : null,
      frozen(coverage),
    )
  }

  /** Start-of-search hypothesis: the start token with log-prob 0 and zero coverage */
  static root<S>(
    startTokenId: number,
    state: S,
    attnLength: number,
    opts: { copyMechanism?: boolean } = {},
  ): Hypothesis<S> {
    return Hypothesis.create({
      tokens: [startTokenId],
      logProbs: [0],
      state,
      attnDists: [],
      pGens: opts.copyMechanism === false ? null : [],
      coverage: new Array<number>(attnLength).fill(0),
    })
  }

  extend(step: Extension<S>): Hypothesis<S> {
    if ((step.pGen === null) !== (this.pGenList === null)) {
      throw new MalformedHypothesisError(
        this.pGenList ? 'missing generation probability' : 'unexpected generation probability',
      )
    }
    if (step.attnDist.length !== this.coverage.length || step.coverage.length !== this.coverage.length) {
      throw new MalformedHypothesisError(
        `step vectors (${step.attnDist.length}, ${step.coverage.length}) do not match ${this.coverage.length} input positions`,
      )
    }
    return new Hypothesis(
      this.tokenList.push(step.token),
      this.logProbList.push(step.logProb),
      step.state,
      this.attnList.push(frozen(step.attnDist)),
      this.pGenList && step.pGen !== null ? this.pGenList.push(step.pGen) : null,
      frozen(step.coverage),
    )
  }

  get tokens(): readonly number[] {
    return this.tokenList.toArray()
  }

  get logProbs(): readonly number[] {
    return this.logProbList.toArray()
  }

  get attnDists(): readonly Vector[] {
    return this.attnList.toArray()
  }

  get pGens(): readonly number[] | null {
    return this.pGenList ? this.pGenList.toArray() : null
  }

  get length(): number {
    return this.tokenList.length
  }

  get latestToken(): number {
    const last = this.tokenList.last()
    // create() rejects empty token lists
    if (last === undefined) throw new MalformedHypothesisError('no tokens')
    return last
  }

  hasUnknownToken(rule: UnknownTokenRule): boolean {
    return hasUnknownToken(this.tokens, rule)
  }

  avgLogProb(rule: UnknownTokenRule): number {
    if (this.hasUnknownToken(rule)) return DISQUALIFIED_SCORE
    return plainAvgLogProb(this.tokens, this.logProbs)
  }

  repeatedNGramLoss(n = 3): number {
    return repeatedNGramLoss(this.tokens, n)
  }

  get covLoss(): number {
    return coverageLoss(this.attnDists)
  }

  get avgTopAttn(): number {
    return averageTopAttention(this.attnDists)
  }

  smartAvgLogProb(lexicon: Lexicon): number {
    return smartAvgLogProb(this.tokens, this.logProbs, lexicon)
  }

  score(ctx: ScoringContext): number {
    if (this.hasUnknownToken(ctx)) return DISQUALIFIED_SCORE
    return this.smartAvgLogProb(ctx.lexicon) - this.repeatedNGramLoss() - this.covLoss
  }
}
