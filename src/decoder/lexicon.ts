import type { Lexicon } from './scoring'

/** Marker the vocabulary uses for the start-of-decoding token */
export const START_DECODING = '[START]'

export interface LexiconWords {
  sentenceStarts: readonly string[]
  stopwords: readonly string[]
  pronouns: readonly string[]
}

export const DEFAULT_LEXICON_WORDS: LexiconWords = {
  sentenceStarts: [START_DECODING, '.'],
  stopwords: ['the', 'a', 'an', 'it', 'its', 'this', 'that', 'these', 'those'],
  pronouns: ['he', 'she', 'him', 'her', 'i', 'we'],
}

/** Resolve word lists to id sets; words the lookup does not know are skipped */
export function buildLexicon(
  lookup: (word: string) => number | undefined,
  words: LexiconWords = DEFAULT_LEXICON_WORDS,
): Lexicon {
  const resolve = (list: readonly string[]) => {
    const ids = new Set<number>()
    for (const w of list) {
      const id = lookup(w)
      if (id !== undefined) ids.add(id)
    }
    return ids
  }
  return {
    startSentIds: resolve(words.sentenceStarts),
    stopwordIds: resolve(words.stopwords),
    pronounIds: resolve(words.pronouns),
  }
}
