import { describe, it } from 'vitest'
import fc from 'fast-check'
import { Hypothesis } from '../hypothesis'
import { repeatedNGramLoss } from '../scoring'

const ATTN = 3

const stepArb = fc.record({
  token: fc.integer({ min: 0, max: 50 }),
  logProb: fc.double({ min: -20, max: 0, noNaN: true }),
  attn: fc.array(fc.double({ min: 0, max: 1, noNaN: true }), { minLength: ATTN, maxLength: ATTN }),
  pGen: fc.double({ min: 0, max: 1, noNaN: true }),
})

describe('hypothesis property tests', () => {
  it('keeps sequence lengths aligned and parents untouched', () => {
    fc.assert(
      fc.property(fc.array(stepArb, { minLength: 1, maxLength: 30 }), (steps) => {
        let h = Hypothesis.root(0, 0, ATTN)
        for (const [i, s] of steps.entries()) {
          const before = {
            tokens: [...h.tokens],
            logProbs: [...h.logProbs],
            attnDists: h.attnDists.map((a) => [...a]),
            pGens: h.pGens ? [...h.pGens] : null,
            coverage: [...h.coverage],
          }
          const coverage = h.coverage.map((c, k) => c + s.attn[k]!)
          const child = h.extend({
            token: s.token,
            logProb: s.logProb,
            state: i + 1,
            attnDist: s.attn,
            pGen: s.pGen,
            coverage,
          })
          const parentSame =
            JSON.stringify(before) ===
            JSON.stringify({
              tokens: h.tokens,
              logProbs: h.logProbs,
              attnDists: h.attnDists,
              pGens: h.pGens,
              coverage: h.coverage,
            })
          if (!parentSame) return false
          const n = child.tokens.length
          if (child.logProbs.length !== n) return false
          if (child.attnDists.length !== n - 1) return false
          if (child.pGens?.length !== n - 1) return false
          if (child.latestToken !== s.token) return false
          h = child
        }
        return true
      }),
      { numRuns: 100 },
    )
  })

  it('repeated trigram loss matches a pairwise scan', () => {
    fc.assert(
      fc.property(fc.array(fc.integer({ min: 0, max: 4 }), { maxLength: 12 }), (tokens) => {
        let repeated = false
        for (let i = 0; i + 3 <= tokens.length && !repeated; i++) {
          for (let j = i + 1; j + 3 <= tokens.length; j++) {
            if (tokens[i] === tokens[j] && tokens[i + 1] === tokens[j + 1] && tokens[i + 2] === tokens[j + 2]) {
              repeated = true
              break
            }
          }
        }
        return repeatedNGramLoss(tokens) === (repeated ? 10 ** 6 : 0)
      }),
      { numRuns: 200 },
    )
  })
})
