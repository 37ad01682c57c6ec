export {
  AnalysisError,
  ConfigError,
  FileAccessError,
  GrammarLoadError,
  describeCause,
} from './AnalysisError.js';
export type { ErrorSeverity, ErrorContext, AnalysisErrorJSON } from './AnalysisError.js';
