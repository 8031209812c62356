/**
 * Scam detection - classification and indicator extraction
 */

export {
  IndicatorExtractor,
  createIndicatorExtractor,
  normalizePhone,
  normalizeUrl,
  type IndicatorExtractorOptions,
} from './IndicatorExtractor.js';

export {
  ScamClassifier,
  createScamClassifier,
  buildClassificationPrompt,
  parseVerdict,
  SCAM_DETECTOR_INSTRUCTIONS,
  type ClassificationResult,
  type GenerationSettings,
  type ScamClassifierOptions,
} from './ScamClassifier.js';

export {
  KeywordScorer,
  KeywordWeightsSchema,
  loadKeywordWeights,
  defaultKeywordWeights,
  type KeywordScore,
  type KeywordWeights,
} from './keywords.js';
