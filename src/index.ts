/**
 * rust-inventory
 *
 * Binding and declaration inventory for Rust projects. Files are parsed
 * with tree-sitter-rust; files with syntax errors are scanned line by line.
 *
 * @example
 * ```typescript
 * import { ProjectAnalyzer, RustBindingExtractor } from 'rust-inventory';
 *
 * const analyzer = new ProjectAnalyzer(new RustBindingExtractor());
 * const results = await analyzer.analyze('./my-crate');
 * console.log(results.mutable.map((binding) => binding.name));
 * ```
 */

// ============================================================================
// Records & extractor seam
// ============================================================================

export * from './base/index.js';
export { RustBindingExtractor } from './rust/RustBindingExtractor.js';

// ============================================================================
// Extraction engine
// ============================================================================

export * from './extraction/index.js';
export * from './type-inference/index.js';

// ============================================================================
// Project analysis & output
// ============================================================================

export * from './project/index.js';
export * from './output/index.js';

// ============================================================================
// Ambient: config, errors, logging, WASM loading
// ============================================================================

export * from './config/index.js';
export * from './errors/index.js';
export * from './logging/index.js';
export * from './wasm/index.js';
