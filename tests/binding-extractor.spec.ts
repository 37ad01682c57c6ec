/**
 * Tree-path and fallback extraction through RustBindingExtractor
 */
import { describe, it, expect, beforeAll } from 'vitest';
import { RustBindingExtractor } from '../src/rust/RustBindingExtractor.js';
import type { BindingRecord } from '../src/base/BindingTypes.js';
import type { Logger } from '../src/logging/Logger.js';

class RecordingLogger implements Logger {
  readonly warnings: string[] = [];
  readonly debugs: string[] = [];

  error(): void {}
  warn(message: string): void {
    this.warnings.push(message);
  }
  info(): void {}
  debug(message: string): void {
    this.debugs.push(message);
  }
}

const PROGRAM = [
  'struct Config {',
  '    retries: u32,',
  '}',
  '',
  'enum Mode {',
  '    Fast,',
  '    Slow,',
  '}',
  '',
  'fn run(mut n: u32, m: i32, cfg: &Config) -> u32 {',
  '    let mut x = 5;',
  '    let y = "hi";',
  '    let (a, b): (i32, String) = (1, String::new());',
  '    let mut items: Vec<i32> = Vec::new();',
  '    for mut item in items.iter_mut() {',
  '        *item += 1;',
  '    }',
  '    for i in 0..n {',
  '        x += i;',
  '    }',
  '    if let Some(mut v) = items.pop() {',
  '        v += 1;',
  '    }',
  '    let Config { retries } = cfg;',
  '    x + n + retries',
  '}',
].join('\n');

const PATTERNS = [
  'fn patterns(pair: (i32, i32), data: &[u8], opt: Option<String>) {',
  '    let &total: &u32 = &0;',
  '    let [first, .., last] = [1, 2, 3];',
  '    let [head, rest @ ..] = data;',
  '    let Some(mut value) = opt;',
  '    let (x, (y, z)) = (1, (2, 3));',
  '    let Pair { left: mut l, right: r } = make();',
  '    for (i, ch) in data.iter().enumerate() {',
  '    }',
  '    while let Some(mut top) = stack_pop() {',
  '        top += 1;',
  '    }',
  '}',
].join('\n');

function summary(records: readonly BindingRecord[]): Array<[string, number, string, string, string]> {
  return records.map((r) => [r.name, r.location.line, r.declarationKind, r.inferredType, r.basicType]);
}

describe('RustBindingExtractor (tree path)', () => {
  const extractor = new RustBindingExtractor();

  beforeAll(async () => {
    await extractor.initialize();
  });

  it('should load the grammar', () => {
    expect(extractor.loadError).toBeNull();
  });

  it('should record mutable bindings in traversal order', async () => {
    const result = await extractor.extractFile('src/main.rs', PROGRAM);

    expect(result.path).toBe('tree');
    expect(result.fallbackReason).toBeUndefined();
    expect(summary(result.mutable)).toEqual([
      ['n', 10, 'function parameter: u32', 'unsigned integer (u32)', 'u32'],
      ['x', 11, 'inferred from initialization', 'integer', 'integer'],
      ['items', 14, 'explicitly typed pattern', 'vector of integer (i32)', 'Vec<i32>'],
      ['item', 15, 'for loop variable', 'mutable reference to collection element', 'Mutable Iterator'],
      ['v', 21, 'if-let pattern', 'optional value content', 'unknown'],
    ]);
  });

  it('should record immutable bindings', async () => {
    const result = await extractor.extractFile('src/main.rs', PROGRAM);

    expect(summary(result.immutable)).toEqual([
      ['y', 12, 'inferred from initialization', 'string', 'String'],
      ['a', 13, 'explicitly typed pattern', 'integer (i32)', 'i32'],
      ['b', 13, 'explicitly typed pattern', 'owned string', 'String'],
      ['i', 18, 'for loop variable', 'integer (range)', 'Unknown expression'],
      ['retries', 24, 'destructured from struct Config', "field 'retries' of Config", 'unknown'],
    ]);
  });

  it('should attach scope, file and context line', async () => {
    const result = await extractor.extractFile('src/main.rs', PROGRAM);

    expect(result.mutable[1]).toEqual({
      name: 'x',
      isMutable: true,
      location: { filePath: 'src/main.rs', line: 11 },
      contextLine: '    let mut x = 5;',
      declarationKind: 'inferred from initialization',
      inferredType: 'integer',
      basicType: 'integer',
      scope: 'run',
    });
    expect(result.mutable[0].contextLine).toBe('fn run(mut n: u32, m: i32, cfg: &Config) -> u32 {');
  });

  it('should skip immutable parameters', async () => {
    const result = await extractor.extractFile('src/main.rs', PROGRAM);
    const names = [...result.mutable, ...result.immutable].map((r) => r.name);

    expect(names).not.toContain('m');
    expect(names).not.toContain('cfg');
  });

  it('should record declarations', async () => {
    const result = await extractor.extractFile('src/main.rs', PROGRAM);

    expect(result.declarations).toEqual([
      { name: 'Config', declarationType: 'struct', location: { filePath: 'src/main.rs', line: 1 } },
      { name: 'Mode', declarationType: 'enum', location: { filePath: 'src/main.rs', line: 5 } },
      { name: 'run', declarationType: 'function', location: { filePath: 'src/main.rs', line: 10 } },
    ]);
  });

  it('should decompose nested and reference patterns', async () => {
    const result = await extractor.extractFile('src/patterns.rs', PATTERNS);

    expect(summary(result.mutable)).toEqual([
      ['value', 5, 'destructured from Some', 'optional value', 'unknown'],
      ['l', 7, 'destructured from struct Pair', "field 'left' of Pair", 'unknown'],
      ['top', 10, 'while-let pattern', 'optional value content', 'unknown'],
    ]);
    expect(summary(result.immutable)).toEqual([
      ['total', 2, 'reference pattern', 'reference to unsigned integer (u32)', '&u32'],
      ['first', 3, 'slice pattern', 'slice element', 'unknown'],
      ['last', 3, 'slice pattern', 'slice element', 'unknown'],
      ['head', 4, 'slice pattern', 'slice element', 'unknown'],
      ['rest', 4, 'slice pattern', 'remaining slice elements', 'unknown'],
      ['x', 6, 'pattern match', 'inferred from context', 'unknown'],
      ['y', 6, 'pattern match', 'inferred from context', 'unknown'],
      ['z', 6, 'pattern match', 'inferred from context', 'unknown'],
      ['r', 7, 'destructured from struct Pair', "field 'right' of Pair", 'unknown'],
      ['i', 8, 'pattern match', 'reference to collection element', 'unknown'],
      ['ch', 8, 'pattern match', 'reference to collection element', 'unknown'],
    ]);
  });

  it('should bind the first alternative of an or-pattern and label other variants from context', async () => {
    const source = [
      'fn unwrap_all(r: Result<i32, i32>, wrapped: Wrap) {',
      '    let (Ok(v) | Err(v)) = r;',
      '    let Wrap(w) = wrapped;',
      '}',
    ].join('\n');

    const result = await extractor.extractFile('src/alternatives.rs', source);

    expect(result.path).toBe('tree');
    expect(result.mutable).toEqual([]);
    expect(summary(result.immutable)).toEqual([
      ['v', 2, 'destructured from Ok', 'success value', 'unknown'],
      ['w', 3, 'destructured from Wrap', 'inferred from context', 'unknown'],
    ]);
  });

  it('should produce identical records for identical input', async () => {
    const first = await extractor.extractFile('src/main.rs', PROGRAM);
    const second = await extractor.extractFile('src/main.rs', PROGRAM);

    expect(second).toEqual(first);
  });

  it('should resolve lines by text search when asked', async () => {
    const textExtractor = new RustBindingExtractor({ lineLocation: 'text' });
    const result = await textExtractor.extractFile('src/main.rs', PROGRAM);

    const lines = Object.fromEntries(
      [...result.mutable, ...result.immutable].map((r) => [r.name, r.location.line])
    );
    expect(lines.x).toBe(11);
    expect(lines.v).toBe(21);
    // `i` first appears inside `Config` on line 1
    expect(lines.i).toBe(1);
  });
});

describe('RustBindingExtractor (fallback path)', () => {
  it('should scan files with syntax errors line by line', async () => {
    const logger = new RecordingLogger();
    const extractor = new RustBindingExtractor({ logger });
    const source = 'fn main() {\n    let mut x = 5\n    let y = ;\n}\n';

    const result = await extractor.extractFile('src/broken.rs', source);

    expect(result.path).toBe('heuristic');
    expect(result.fallbackReason).toBe('syntax errors in file');
    expect(summary(result.mutable)).toEqual([['x', 2, 'inferred', 'integer', 'i32']]);
    expect(summary(result.immutable)).toEqual([['y', 3, 'inferred', 'inferred', 'unknown']]);
    expect(result.mutable[0].scope).toBe('main');
    expect(result.declarations).toEqual([
      { name: 'main', declarationType: 'function', location: { filePath: 'src/broken.rs', line: 1 } },
    ]);
    expect(logger.debugs).toContain('📝 Falling back to line scanner');
  });

  it('should fall back for every file when the grammar cannot load', async () => {
    const logger = new RecordingLogger();
    const extractor = new RustBindingExtractor({
      grammarWasmPath: '/nonexistent/tree-sitter-rust.wasm',
      logger,
    });

    const result = await extractor.extractFile('src/lib.rs', 'fn main() {\n    let mut x = 1;\n}\n');

    expect(result.path).toBe('heuristic');
    expect(result.fallbackReason).toBe('grammar unavailable');
    expect(result.mutable.map((r) => r.name)).toEqual(['x']);
    expect(extractor.loadError?.code).toBe('ERR_GRAMMAR_LOAD');
    expect(logger.warnings).toHaveLength(1);
    expect(logger.warnings[0].startsWith('⚠️  Failed to load rust grammar:')).toBe(true);
  });

  it('should only handle .rs files', () => {
    const extractor = new RustBindingExtractor();

    expect(extractor.canHandle('src/main.rs')).toBe(true);
    expect(extractor.canHandle('Cargo.toml')).toBe(false);
    expect(extractor.canHandle('Makefile')).toBe(false);
  });
});
