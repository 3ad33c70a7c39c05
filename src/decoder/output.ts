import type { Hypothesis } from './hypothesis'

/** Generated ids: the start token dropped and everything from the first stop token cut */
export function decodedIds<S>(hyp: Hypothesis<S>, stopTokenId: number): number[] {
  const ids = hyp.tokens.slice(1)
  const stopIdx = ids.indexOf(stopTokenId)
  return stopIdx === -1 ? ids : ids.slice(0, stopIdx)
}

/** Split at sentence-end ids (kept at the end of their sentence); a trailing remainder is its own sentence */
export function splitSentences(
  ids: readonly number[],
  sentenceEndIds: ReadonlySet<number>,
): number[][] {
  const sentences: number[][] = []
  let current: number[] = []
  for (const id of ids) {
    current.push(id)
    if (sentenceEndIds.has(id)) {
      sentences.push(current)
      current = []
    }
  }
  if (current.length) sentences.push(current)
  return sentences
}
