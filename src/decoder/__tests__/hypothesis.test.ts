import { describe, it, expect } from 'vitest'
import { Hypothesis } from '../hypothesis'
import { MalformedHypothesisError } from '../errors'
import type { ScoringContext } from '../scoring'

const ctx: ScoringContext = {
  stopTokenId: 1,
  unknownTokenThreshold: 5,
  lexicon: { startSentIds: new Set([0]), stopwordIds: new Set(), pronounIds: new Set() },
}

function withHistory(tokens: number[], logProbs: number[], attnDists: number[][]) {
  return Hypothesis.create({
    tokens,
    logProbs,
    state: 'state',
    attnDists,
    pGens: attnDists.map(() => 0.5),
    coverage: attnDists[0] ? attnDists[0].map(() => 0) : [0, 0],
  })
}

describe('Hypothesis', () => {
  it('root holds only the start token', () => {
    const root = Hypothesis.root(0, 'init', 3)
    expect(root.tokens).toEqual([0])
    expect(root.logProbs).toEqual([0])
    expect(root.attnDists).toEqual([])
    expect(root.pGens).toEqual([])
    expect(root.coverage).toEqual([0, 0, 0])
    expect(root.latestToken).toBe(0)
    expect(root.state).toBe('init')
  })

  it('root without a copy mechanism has no generation probabilities', () => {
    const root = Hypothesis.root(0, null, 2, { copyMechanism: false })
    expect(root.pGens).toBeNull()
    const child = root.extend({
      token: 7,
      logProb: -1,
      state: null,
      attnDist: [1, 0],
      pGen: null,
      coverage: [1, 0],
    })
    expect(child.pGens).toBeNull()
    expect(child.tokens).toEqual([0, 7])
  })

  it('extend appends and never touches the parent', () => {
    const parent = Hypothesis.root(0, 's0', 2)
    const child = parent.extend({
      token: 7,
      logProb: -0.5,
      state: 's1',
      attnDist: [0.25, 0.75],
      pGen: 0.9,
      coverage: [0.25, 0.75],
    })
    expect(parent.tokens).toEqual([0])
    expect(parent.logProbs).toEqual([0])
    expect(parent.attnDists).toEqual([])
    expect(parent.pGens).toEqual([])
    expect(parent.coverage).toEqual([0, 0])
    expect(parent.state).toBe('s0')

    expect(child.tokens).toEqual([0, 7])
    expect(child.logProbs).toEqual([0, -0.5])
    expect(child.attnDists).toEqual([[0.25, 0.75]])
    expect(child.pGens).toEqual([0.9])
    expect(child.coverage).toEqual([0.25, 0.75])
    expect(child.state).toBe('s1')
    expect(child.latestToken).toBe(7)
  })

  it('create keeps its own copy of the attention and coverage vectors', () => {
    const attn = [0.5, 0.5]
    const coverage = [0, 0]
    const h = Hypothesis.create({
      tokens: [0, 7],
      logProbs: [0, -1],
      state: null,
      attnDists: [attn],
      pGens: null,
      coverage,
    })
    coverage[0] = 99
    attn[0] = 0
    attn[1] = 1
    expect(h.coverage).toEqual([0, 0])
    expect(h.attnDists).toEqual([[0.5, 0.5]])
    expect(Object.isFrozen(h.coverage)).toBe(true)
  })

  it('extend keeps its own copy of the step vectors', () => {
    const attnDist = [0.25, 0.75]
    const coverage = [0.25, 0.75]
    const child = Hypothesis.root(0, null, 2).extend({
      token: 7,
      logProb: -0.5,
      state: null,
      attnDist,
      pGen: 0.9,
      coverage,
    })
    attnDist[0] = 1
    coverage[1] = 5
    expect(child.attnDists).toEqual([[0.25, 0.75]])
    expect(child.coverage).toEqual([0.25, 0.75])
  })

  it('siblings built from one frozen vector share it', () => {
    const attnDist = Object.freeze([1, 0])
    const root = Hypothesis.root(0, null, 2)
    const a = root.extend({ token: 5, logProb: -1, state: null, attnDist, pGen: 0.5, coverage: attnDist })
    const b = root.extend({ token: 6, logProb: -2, state: null, attnDist, pGen: 0.5, coverage: attnDist })
    expect(a.attnDists[0]).toBe(attnDist)
    expect(b.attnDists[0]).toBe(attnDist)
    expect(a.coverage).toBe(b.coverage)
  })

  it('siblings do not share appended elements', () => {
    const parent = Hypothesis.root(0, 0, 1)
    const step = { logProb: -1, state: 1, attnDist: [1], pGen: 0.5, coverage: [1] }
    const a = parent.extend({ ...step, token: 8 })
    const b = parent.extend({ ...step, token: 9 })
    expect(a.tokens).toEqual([0, 8])
    expect(b.tokens).toEqual([0, 9])
  })

  it('rejects a generation probability that does not match the history', () => {
    const withCopy = Hypothesis.root(0, null, 1)
    expect(() =>
      withCopy.extend({ token: 7, logProb: -1, state: null, attnDist: [1], pGen: null, coverage: [1] }),
    ).toThrow(MalformedHypothesisError)
    const noCopy = Hypothesis.root(0, null, 1, { copyMechanism: false })
    expect(() =>
      noCopy.extend({ token: 7, logProb: -1, state: null, attnDist: [1], pGen: 0.5, coverage: [1] }),
    ).toThrow(MalformedHypothesisError)
  })

  it('rejects step vectors of the wrong length', () => {
    const root = Hypothesis.root(0, null, 2)
    expect(() =>
      root.extend({ token: 7, logProb: -1, state: null, attnDist: [1], pGen: 0.5, coverage: [1, 0] }),
    ).toThrow(MalformedHypothesisError)
  })

  it('create validates sequence lengths', () => {
    const base = { state: null, pGens: null, coverage: [0] }
    expect(() =>
      Hypothesis.create({ ...base, tokens: [0, 7], logProbs: [0], attnDists: [[1]] }),
    ).toThrow(MalformedHypothesisError)
    expect(() =>
      Hypothesis.create({ ...base, tokens: [0, 7], logProbs: [0, -1], attnDists: [] }),
    ).toThrow(MalformedHypothesisError)
    expect(() =>
      Hypothesis.create({ ...base, tokens: [0, 7], logProbs: [0, -1], attnDists: [[1]], pGens: [0.1, 0.2] }),
    ).toThrow(MalformedHypothesisError)
    expect(() =>
      Hypothesis.create({ ...base, tokens: [], logProbs: [], attnDists: [] }),
    ).toThrow(MalformedHypothesisError)
  })

  it('avgLogProb returns the sentinel for an interior unknown token', () => {
    const h = withHistory([0, 2, 7, 8], [0, -0.1, -0.1, -0.1], [[1], [1], [1]])
    expect(h.hasUnknownToken(ctx)).toBe(true)
    expect(h.avgLogProb(ctx)).toBe(-(10 ** 6))
  })

  it('avgLogProb averages over all tokens', () => {
    const h = withHistory([0, 7, 8, 1], [0, -1, -2, -1], [[1], [1], [1]])
    expect(h.avgLogProb(ctx)).toBe(-1)
  })

  it('covLoss and avgTopAttn read the attention history', () => {
    const h = withHistory([0, 7, 8, 9], [0, -1, -2, -3], [[1, 0], [0, 1], [1, 0]])
    expect(h.covLoss).toBeCloseTo(1 / 3, 12)
    expect(h.avgTopAttn).toBe(1)
  })

  it('score combines smart average, repetition and coverage losses', () => {
    const h = withHistory([0, 7, 8, 9], [0, -1, -2, -3], [[1, 0], [0, 1], [1, 0]])
    const smart = 0.75 * -1.5 + 0.25 * (-139 / 73)
    expect(h.smartAvgLogProb(ctx.lexicon)).toBeCloseTo(smart, 10)
    expect(h.repeatedNGramLoss()).toBe(0)
    expect(h.score(ctx)).toBeCloseTo(smart - 1 / 3, 10)
  })

  it('score applies the repetition penalty', () => {
    const h = withHistory(
      [0, 7, 8, 9, 7, 8, 9],
      [0, -1, -1, -1, -1, -1, -1],
      [[1, 0], [0, 1], [1, 0], [0, 1], [1, 0], [0, 1]],
    )
    expect(h.repeatedNGramLoss()).toBe(10 ** 6)
    expect(h.score(ctx)).toBeLessThan(-(10 ** 5))
  })

  it('score returns the sentinel before any other computation', () => {
    // the stopword-free window would otherwise be fine; the unknown token decides
    const h = withHistory([0, 3], [0, -1], [[1]])
    expect(h.score(ctx)).toBe(-(10 ** 6))
  })
})
