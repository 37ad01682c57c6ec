/**
 * WASM loader module exports
 */

export { WasmLoader } from './WasmLoader.js';
export type {
  WasmLoaderOptions,
  LoadedParser,
  SupportedLanguage,
  SyntaxNode,
  SyntaxPoint,
  SyntaxTree,
} from './types.js';
