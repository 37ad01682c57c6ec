/**
 * Base extraction infrastructure
 *
 * Exports record types, the extractor interface and the record collector
 */

export * from './BindingTypes.js';
export * from './BindingExtractor.js';
export * from './BindingCollector.js';
