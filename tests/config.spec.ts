import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  DEFAULT_ANALYZER_OPTIONS,
  parseLineLocation,
  resolveAnalyzerOptions,
  resolveExtractorOptions,
} from '../src/config/options.js';
import { ConfigError, FileAccessError, GrammarLoadError } from '../src/errors/AnalysisError.js';
import { ConsoleLogger, formatMessage, isLogLevel, silentLogger } from '../src/logging/Logger.js';

describe('options', () => {
  it('should fill analyzer defaults', () => {
    const resolved = resolveAnalyzerOptions({ sort: true, concurrency: undefined });

    expect(resolved).toEqual({ ...DEFAULT_ANALYZER_OPTIONS, sort: true, logger: silentLogger });
  });

  it('should reject a non-integer concurrency', () => {
    expect(() => resolveAnalyzerOptions({ concurrency: 1.5 })).toThrow('Invalid concurrency: 1.5');
  });

  it('should default the line location strategy to span', () => {
    expect(resolveExtractorOptions().lineLocation).toBe('span');
    expect(parseLineLocation('text')).toBe('text');
    expect(() => parseLineLocation('column')).toThrow(ConfigError);
  });
});

describe('errors', () => {
  it('should carry code, severity and context', () => {
    const error = new FileAccessError('src/a.rs', new Error('EACCES'));

    expect(error.toJSON()).toEqual({
      code: 'ERR_FILE_ACCESS',
      severity: 'error',
      message: 'Cannot read src/a.rs: EACCES',
      context: { filePath: 'src/a.rs' },
      suggestion: 'Check file permissions; the file was skipped',
    });
    expect(error.name).toBe('FileAccessError');
    expect(error).toBeInstanceOf(Error);
  });

  it('should describe grammar load failures as warnings', () => {
    const error = new GrammarLoadError('rust', 'missing wasm');

    expect(error.message).toBe('Failed to load rust grammar: missing wasm');
    expect(error.severity).toBe('warning');
    expect(error.cause).toBe('missing wasm');
  });
});

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should append context as JSON', () => {
    expect(formatMessage('📊 done', { files: 2 })).toBe('📊 done {"files":2}');
    expect(formatMessage('plain', {})).toBe('plain');
  });

  it('should mark circular references', () => {
    const context: Record<string, unknown> = { name: 'loop' };
    context.self = context;

    expect(formatMessage('cycle', context)).toBe('cycle {"name":"loop","self":"[Circular]"}');
  });

  it('should drop messages below the threshold', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = new ConsoleLogger('warnings');

    logger.warn('⚠️  careful');
    logger.info('hidden');

    expect(warn).toHaveBeenCalledWith('⚠️  careful');
    expect(info).not.toHaveBeenCalled();
  });

  it('should validate level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
