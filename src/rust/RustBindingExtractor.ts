/**
 * Rust Binding Extractor
 *
 * Per file, tries to build a syntax tree with tree-sitter-rust and walks it
 * with {@link RustTreeVisitor}. When the grammar is unavailable, the parser
 * returns no tree, or the tree contains ERROR / MISSING nodes, the file is
 * handed to {@link HeuristicLineScanner} instead.
 */

import { BaseBindingExtractor } from '../base/BindingExtractor.js';
import { BindingCollector } from '../base/BindingCollector.js';
import type { ExtractionPath, FileExtraction } from '../base/BindingTypes.js';
import {
  resolveExtractorOptions,
  type ExtractorOptions,
  type ResolvedExtractorOptions,
} from '../config/options.js';
import { GrammarLoadError, describeCause } from '../errors/AnalysisError.js';
import { HeuristicLineScanner } from '../extraction/HeuristicLineScanner.js';
import { createLineLocator } from '../extraction/LineLocator.js';
import { RustTreeVisitor } from '../extraction/RustTreeVisitor.js';
import { WasmLoader } from '../wasm/WasmLoader.js';
import type { LoadedParser } from '../wasm/types.js';

export class RustBindingExtractor extends BaseBindingExtractor {
  readonly language = 'rust';
  readonly extensions = ['.rs'];

  private readonly options: ResolvedExtractorOptions;
  private parser: LoadedParser | null = null;
  private initialization: Promise<void> | null = null;
  private grammarError: GrammarLoadError | null = null;

  constructor(options: ExtractorOptions = {}) {
    super();
    this.options = resolveExtractorOptions(options);
  }

  /**
   * Load the grammar once. A load failure is logged and remembered;
   * every file then takes the heuristic path.
   */
  initialize(): Promise<void> {
    if (!this.initialization) {
      this.initialization = this.loadGrammar();
    }
    return this.initialization;
  }

  private async loadGrammar(): Promise<void> {
    try {
      this.parser = await WasmLoader.loadParser('rust', {
        grammarWasmPath: this.options.grammarWasmPath,
      });
      this.options.logger.debug('✅ Rust grammar loaded', { grammarPath: this.parser.grammarPath });
    } catch (error) {
      this.grammarError = new GrammarLoadError('rust', error);
      this.options.logger.warn(`⚠️  ${this.grammarError.message}`, {
        suggestion: this.grammarError.suggestion,
      });
    }
  }

  /**
   * The grammar load failure, if initialization failed
   */
  get loadError(): GrammarLoadError | null {
    return this.grammarError;
  }

  async extractFile(filePath: string, content: string): Promise<FileExtraction> {
    await this.initialize();
    const lines = content.split(/\r?\n/);

    if (!this.parser) {
      return this.scanHeuristically(filePath, content, 'grammar unavailable');
    }

    const tree = this.parser.parse(content);
    if (!tree) {
      return this.scanHeuristically(filePath, content, 'parser returned no tree');
    }

    try {
      if (tree.rootNode.hasError) {
        return this.scanHeuristically(filePath, content, 'syntax errors in file');
      }

      const collector = new BindingCollector();
      const locator = createLineLocator(this.options.lineLocation, lines);
      try {
        new RustTreeVisitor(filePath, lines, locator, collector).visit(tree.rootNode);
      } catch (error) {
        return this.scanHeuristically(filePath, content, `tree walk failed: ${describeCause(error)}`);
      }
      return this.result(filePath, 'tree', collector);
    } finally {
      tree.delete();
    }
  }

  private scanHeuristically(filePath: string, content: string, reason: string): FileExtraction {
    this.options.logger.debug('📝 Falling back to line scanner', { filePath, reason });
    const collector = new BindingCollector();
    new HeuristicLineScanner(filePath, collector).scan(content);
    return this.result(filePath, 'heuristic', collector, reason);
  }

  private result(
    filePath: string,
    path: ExtractionPath,
    collector: BindingCollector,
    fallbackReason?: string
  ): FileExtraction {
    return {
      filePath,
      path,
      mutable: collector.mutable,
      immutable: collector.immutable,
      declarations: collector.declarations,
      fallbackReason,
    };
  }
}
