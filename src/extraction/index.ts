export { HeuristicLineScanner, braceDelta, declarationName, destructuringKind, extractNameAndKind } from './HeuristicLineScanner.js';
export type { ExtractedBinding } from './HeuristicLineScanner.js';
export {
  LINE_LOCATION_STRATEGIES,
  SpanLineLocator,
  TextLineLocator,
  createLineLocator,
  isLineLocationStrategy,
  locateLine,
} from './LineLocator.js';
export type { LineLocationStrategy, LineLocator } from './LineLocator.js';
export { boundIdentifier, decomposePattern } from './PatternDecomposer.js';
export type { PatternSite } from './PatternDecomposer.js';
export { RustTreeVisitor, classifyNode } from './RustTreeVisitor.js';
export type { VisitTarget } from './RustTreeVisitor.js';
export { findMutBindings } from './mut-bindings.js';
export type { MutBinding } from './mut-bindings.js';
