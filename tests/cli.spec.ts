import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { runAnalysis, type AnalyzeCommandOptions, type CliOutput } from '../src/cli/analyze.js';
import { describeError, formatError } from '../src/cli/errorFormatter.js';
import { createProgram, readPackageVersion } from '../src/cli/program.js';
import { ConfigError } from '../src/errors/AnalysisError.js';
import { renderProjectTree } from '../src/project/ProjectTree.js';

class BufferedOutput implements CliOutput {
  readonly lines: string[] = [];

  log(line: string): void {
    this.lines.push(line);
  }
}

const defaults: AnalyzeCommandOptions = { format: 'text', lineLocation: 'span', logLevel: 'silent' };
const now = (): Date => new Date('2024-01-02T03:04:05.000Z');

let root: string;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), 'rust-inventory-cli-'));
  await fs.mkdir(path.join(root, 'src'));
  await fs.writeFile(path.join(root, 'Cargo.toml'), '[package]\nname = "demo"\nversion = "0.2.0"\n');
  await fs.writeFile(path.join(root, 'src/main.rs'), 'fn main() {\n    let mut count = 0;\n}\n');
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe('runAnalysis', () => {
  it('should print the header, summary and report', async () => {
    const out = new BufferedOutput();

    const results = await runAnalysis(root, defaults, { out, now });

    expect(results?.mutable.map((b) => b.name)).toEqual(['count']);
    expect(out.lines.slice(0, 8)).toEqual([
      'Analysis run at: 2024-01-02T03:04:05.000Z',
      `Analyzing Rust project at: ${root}`,
      'Project version: 0.2.0',
      '',
      '\x1b[1mSummary:\x1b[0m',
      'Found 1 mutable variables',
      'Found 0 immutable variables',
      'Found 1 data structure objects',
    ]);
    expect(out.lines[10]).toBe('Project Name: demo');
    expect(out.lines[15]).toBe(
      `  count (mutable): let mut count = 0; at ${path.join(root, 'src/main.rs')}:2` +
        ' - kind: inferred from initialization, type: integer, basic type: integer, scope: main'
    );
  });

  it('should write the report to a file', async () => {
    const out = new BufferedOutput();
    const file = path.join(root, 'report.json');

    await runAnalysis(root, { ...defaults, format: 'json', output: file }, { out, now });

    const report: unknown = JSON.parse(await fs.readFile(file, 'utf8'));
    expect(report).toMatchObject({
      metadata: {
        project_name: 'demo',
        version: '0.2.0',
        datetime: '2024-01-02T03:04:05.000Z',
        mutable_variable_count: 1,
      },
    });
    expect(out.lines[out.lines.length - 1]).toBe(`Results written to: ${file}`);
  });

  it('should only print the tree with --tree', async () => {
    const out = new BufferedOutput();

    const results = await runAnalysis(root, { ...defaults, tree: true }, { out, now });

    expect(results).toBeNull();
    expect(out.lines).toEqual(await renderProjectTree(root));
  });

  it('should reject invalid flags before analyzing', async () => {
    const out = new BufferedOutput();

    await expect(runAnalysis(root, { ...defaults, format: 'yaml' }, { out })).rejects.toThrow(
      'Invalid output format: yaml'
    );
    await expect(runAnalysis(root, { ...defaults, logLevel: 'loud' }, { out })).rejects.toThrow(
      'Invalid log level: loud'
    );
    await expect(runAnalysis(root, { ...defaults, lineLocation: 'column' }, { out })).rejects.toThrow(
      'Unknown line location strategy: column'
    );
    expect(out.lines).toEqual([]);
  });

  it('should reject a missing project directory', async () => {
    const missing = path.join(root, 'missing');

    await expect(runAnalysis(missing, defaults, { out: new BufferedOutput() })).rejects.toThrow(ConfigError);
  });
});

describe('errorFormatter', () => {
  it('should format a title with next steps', () => {
    expect(formatError('Invalid output format: yaml', ['Use one of: json, csv, text'])).toEqual([
      '✗ Invalid output format: yaml',
      '',
      '→ Use one of: json, csv, text',
    ]);
    expect(formatError('Boom')).toEqual(['✗ Boom']);
  });

  it('should describe analysis errors and plain values', () => {
    expect(describeError(new ConfigError('bad flag', {}, 'fix it'))).toEqual({
      title: 'bad flag',
      nextSteps: ['fix it'],
    });
    expect(describeError(new Error('disk full'))).toEqual({ title: 'disk full', nextSteps: [] });
    expect(describeError('plain')).toEqual({ title: 'plain', nextSteps: [] });
  });
});

describe('createProgram', () => {
  it('should declare the analysis options', () => {
    const program = createProgram();

    expect(program.name()).toBe('rust-inventory');
    expect(program.options.map((option) => option.long)).toEqual([
      '--version',
      '--output',
      '--format',
      '--sort',
      '--tree',
      '--link',
      '--line-location',
      '--log-level',
    ]);
  });

  it('should read the package version', () => {
    expect(readPackageVersion()).toBe('0.1.0');
  });
});
