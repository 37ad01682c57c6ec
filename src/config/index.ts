export {
  DEFAULT_ANALYZER_OPTIONS,
  parseLineLocation,
  resolveAnalyzerOptions,
  resolveExtractorOptions,
} from './options.js';
export type {
  AnalyzerOptions,
  ExtractorOptions,
  ResolvedAnalyzerOptions,
  ResolvedExtractorOptions,
} from './options.js';
