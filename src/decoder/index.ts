export { AppendList } from './appendList.ts'
export { Hypothesis, type Vector, type Extension, type HypothesisInit } from './hypothesis.ts'
export {
  DISQUALIFIED_SCORE,
  REPEATED_NGRAM_PENALTY,
  PRONOUN_PENALTY,
  hasUnknownToken,
  plainAvgLogProb,
  smartAvgLogProb,
  repeatedNGramLoss,
  coverageLoss,
  averageTopAttention,
  type Lexicon,
  type ScoringContext,
  type ScoringMode,
  type UnknownTokenRule,
} from './scoring.ts'
export { rankHyps, sortHyps, bestOf, scoreFunction, type Ranked } from './ranking.ts'
export {
  resolveConfig,
  scoringContextOf,
  remapToken,
  type BeamSearchConfig,
  type BeamSearchOptions,
  type TokenRemap,
} from './config.ts'
export {
  runBeamSearch,
  type DecodeStep,
  type DecodeStepInput,
  type DecodeStepOutput,
  type SearchStart,
  type StepTrace,
  type RunOptions,
  type BeamSearchResult,
} from './beamSearch.ts'
export { decodedIds, splitSentences } from './output.ts'
export { buildLexicon, DEFAULT_LEXICON_WORDS, START_DECODING, type LexiconWords } from './lexicon.ts'
export {
  decodeExamples,
  type DecodeExample,
  type DecodedOutput,
  type DecodeFailure,
  type DecodeRunSummary,
  type Logger,
} from './runner.ts'
export {
  MalformedHypothesisError,
  DegenerateScoringError,
  DecodeStepContractError,
  ConfigError,
  EmptyBeamError,
} from './errors.ts'
