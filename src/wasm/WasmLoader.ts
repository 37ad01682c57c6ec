/**
 * WASM loader for tree-sitter parsers in Node.js
 * Note: Browser environments are not supported
 */

import { createRequire } from 'module';
import { Language, Parser } from 'web-tree-sitter';
import type { LoadedParser, SupportedLanguage, SyntaxTree, WasmLoaderOptions } from './types.js';

const GRAMMAR_FILES: Record<SupportedLanguage, string> = {
  rust: 'tree-sitter-rust/tree-sitter-rust.wasm',
};

/**
 * WASM loader for Node.js environments
 */
export class WasmLoader {
  private static parserInstances = new Map<string, Promise<LoadedParser>>();
  private static runtimeReady: Promise<void> | null = null;

  /**
   * Load tree-sitter and a language grammar.
   * Concurrent callers share the same in-flight load.
   */
  static loadParser(
    language: SupportedLanguage,
    options: WasmLoaderOptions = {}
  ): Promise<LoadedParser> {
    const cacheKey = WasmLoader.cacheKey(language, options);

    const cached = this.parserInstances.get(cacheKey);
    if (cached) {
      return cached;
    }

    const loading = this.loadNodeParser(language, options);
    this.parserInstances.set(cacheKey, loading);
    // Failed loads are evicted
    void loading.catch(() => this.parserInstances.delete(cacheKey));
    return loading;
  }

  /**
   * Resolve the grammar file from node_modules unless a path was given
   */
  static resolveGrammarPath(language: SupportedLanguage, options: WasmLoaderOptions = {}): string {
    if (options.grammarWasmPath) {
      return options.grammarWasmPath;
    }
    const require = createRequire(import.meta.url);
    return require.resolve(GRAMMAR_FILES[language]);
  }

  /**
   * Load a parser for Node.js environment
   */
  private static async loadNodeParser(
    language: SupportedLanguage,
    options: WasmLoaderOptions
  ): Promise<LoadedParser> {
    if (!this.runtimeReady) {
      this.runtimeReady = Parser.init();
    }
    await this.runtimeReady;

    const grammarPath = this.resolveGrammarPath(language, options);
    const languageInstance = await Language.load(grammarPath);

    const parser = new Parser();
    parser.setLanguage(languageInstance);

    return {
      grammarPath,
      parse(content: string): SyntaxTree | null {
        return parser.parse(content);
      },
    };
  }

  private static cacheKey(language: SupportedLanguage, options: WasmLoaderOptions): string {
    return `${language}-node-${options.grammarWasmPath ?? 'bundled'}`;
  }

  /**
   * Clear the parser cache
   * Useful for tests or reloading
   */
  static clearCache(): void {
    this.parserInstances.clear();
  }

  /**
   * Check if a parser is already cached
   */
  static isCached(language: SupportedLanguage, options: WasmLoaderOptions = {}): boolean {
    return this.parserInstances.has(WasmLoader.cacheKey(language, options));
  }
}
