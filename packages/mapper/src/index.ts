export { cosineSimilarity, compareSuggestions, pickTopK, rankKeys, aggregateConfidence } from './scorer';
export {
  extractPhrases, extractNumbers,
  DEFAULT_MAX_PHRASE_WORDS, DEFAULT_MAX_CANDIDATES
} from './extractor';
export type { ExtractOptions, NumericMention } from './extractor';
export { mapCandidates, phrasesToEmbed, createMapperOptions, DEFAULT_MAPPER_OPTIONS } from './mapper';
export type { MapperOptions, PhraseVectors } from './mapper';
