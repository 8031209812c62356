/**
 * Webhook Integration - outbound result callback
 */

export {
  ResultReporter,
  createResultReporter,
  buildFinalPayload,
  summarizeSession,
  toExtractedIntelligence,
  type DispatchResult,
  type ExtractedIntelligence,
  type FinalResultPayload,
  type ResultReporterOptions,
} from './ResultReporter.js';
