import { describe, it, expect } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { BindingRecord, DeclarationRecord } from '../src/base/BindingTypes.js';
import { ConfigError } from '../src/errors/AnalysisError.js';
import {
  buildJsonReport,
  editorLink,
  parseOutputFormat,
  renderConsoleReport,
  renderCsv,
  renderJson,
  renderSummary,
  renderText,
  writeReport,
} from '../src/output/index.js';
import type { AnalysisResults } from '../src/project/types.js';

const x: BindingRecord = {
  name: 'x',
  isMutable: true,
  location: { filePath: 'src/main.rs', line: 3 },
  contextLine: '    let mut x = 5;',
  declarationKind: 'inferred from initialization',
  inferredType: 'integer',
  basicType: 'integer',
  scope: 'main',
};

const label: BindingRecord = {
  name: 'label',
  isMutable: false,
  location: { filePath: 'src/main.rs', line: 4 },
  contextLine: '    let label = "hi";',
  declarationKind: 'inferred from initialization',
  inferredType: 'string',
  basicType: 'String',
  scope: 'main',
};

const main: DeclarationRecord = {
  name: 'main',
  declarationType: 'function',
  location: { filePath: 'src/main.rs', line: 1 },
};

const results: AnalysisResults = {
  mutable: [x],
  immutable: [label],
  declarations: [main],
  fileErrors: [],
  filesAnalyzed: 1,
  fallbackFiles: [],
};

const metadata = { projectName: 'demo', version: '0.1.0', datetime: '2024-01-02T03:04:05.000Z' };
const linked = { link: true, cwd: '/work/demo' };

describe('editorLink', () => {
  it('should build an absolute vscode link', () => {
    expect(editorLink(x.location, '/work/demo')).toBe('vscode://file//work/demo/src/main.rs:3');
    expect(editorLink({ filePath: '/abs/lib.rs', line: 9 }, '/work/demo')).toBe('vscode://file//abs/lib.rs:9');
  });
});

describe('renderText', () => {
  it('should render every section', () => {
    expect(renderText(results, metadata, { link: false })).toBe(
      [
        'Project Information',
        '-------------------',
        'Project Name: demo',
        'Version: 0.1.0',
        'Analysis Run At: 2024-01-02T03:04:05.000Z',
        '',
        'Mutable Variables (1)',
        '-------------------',
        'x (mutable): let mut x = 5; at src/main.rs:3 - kind: inferred from initialization, type: integer, basic type: integer, scope: main',
        '',
        'Immutable Variables (1)',
        '---------------------',
        'label (immutable): let label = "hi"; at src/main.rs:4 - kind: inferred from initialization, type: string, basic type: String, scope: main',
        '',
        'Data Structures (1)',
        '----------------',
        'main (function): at src/main.rs:1',
        '',
      ].join('\n')
    );
  });

  it('should wrap locations in links', () => {
    const lines = renderText(results, metadata, linked).split('\n');

    expect(lines[8]).toBe(
      'x (mutable): let mut x = 5; at [src/main.rs:3](vscode://file//work/demo/src/main.rs:3)' +
        ' - kind: inferred from initialization, type: integer, basic type: integer, scope: main'
    );
    expect(lines[16]).toBe('main (function): at [src/main.rs:1](vscode://file//work/demo/src/main.rs:1)');
  });
});

describe('renderJson', () => {
  it('should render metadata counts and records', () => {
    expect(JSON.parse(renderJson(results, metadata, { link: false }))).toEqual({
      metadata: {
        version: '0.1.0',
        project_name: 'demo',
        datetime: '2024-01-02T03:04:05.000Z',
        mutable_variable_count: 1,
        immutable_variable_count: 1,
        data_structure_count: 1,
      },
      mutable_variables: [
        {
          name: 'x',
          file: 'src/main.rs',
          line: 3,
          context: 'let mut x = 5;',
          kind: 'inferred from initialization',
          type: 'integer',
          basic_type: 'integer',
          scope: 'main',
        },
      ],
      immutable_variables: [
        {
          name: 'label',
          file: 'src/main.rs',
          line: 4,
          context: 'let label = "hi";',
          kind: 'inferred from initialization',
          type: 'string',
          basic_type: 'String',
          scope: 'main',
        },
      ],
      data_structures: [{ name: 'main', type: 'function', file: 'src/main.rs', line: 1 }],
    });
    expect(buildJsonReport(results, metadata, { link: false }).mutable_variables[0].vscode_link).toBeUndefined();
  });

  it('should add links only when asked', () => {
    const report = buildJsonReport(results, metadata, linked);

    expect(report.mutable_variables[0].vscode_link).toBe('vscode://file//work/demo/src/main.rs:3');
    expect(report.data_structures[0].vscode_link).toBe('vscode://file//work/demo/src/main.rs:1');
  });

  it('should indent with two spaces', () => {
    expect(renderJson(results, metadata, { link: false }).split('\n')[1]).toBe('  "metadata": {');
  });
});

describe('renderCsv', () => {
  it('should quote string fields and double inner quotes', () => {
    expect(renderCsv(results, metadata, { link: false })).toBe(
      [
        'Project Name,demo',
        'Version,0.1.0',
        'Analysis Run At,2024-01-02T03:04:05.000Z',
        '',
        'mutability,name,file,line,context,kind,type,basic_type,scope',
        'mutable,"x","src/main.rs",3,"let mut x = 5;","inferred from initialization","integer","integer","main"',
        'immutable,"label","src/main.rs",4,"let label = ""hi"";","inferred from initialization","string","String","main"',
        'type,name,file,line',
        '"function","main","src/main.rs",1',
        '',
      ].join('\n')
    );
  });

  it('should add a link column', () => {
    const lines = renderCsv(results, metadata, linked).split('\n');

    expect(lines[4]).toBe('mutability,name,file,line,context,kind,type,basic_type,scope,vscode_link');
    expect(lines[7]).toBe('type,name,file,line,vscode_link');
    expect(lines[8]).toBe('"function","main","src/main.rs",1,"vscode://file//work/demo/src/main.rs:1"');
  });
});

describe('console report', () => {
  it('should print counts in the summary', () => {
    expect(renderSummary({ ...results, fallbackFiles: ['src/broken.rs'] })).toEqual([
      '',
      '\x1b[1mSummary:\x1b[0m',
      'Found 1 mutable variables',
      'Found 1 immutable variables',
      'Found 1 data structure objects',
      '\x1b[2m1 file(s) scanned line by line (syntax errors)\x1b[0m',
    ]);
  });

  it('should indent records under bold headings', () => {
    const lines = renderConsoleReport(results, metadata, { link: false });

    expect(lines[1]).toBe('\x1b[1mProject Information:\x1b[0m');
    expect(lines[6]).toBe('\x1b[1mMutable Variables (1):\x1b[0m');
    expect(lines[7]).toBe(
      '  x (mutable): let mut x = 5; at src/main.rs:3 - kind: inferred from initialization, type: integer, basic type: integer, scope: main'
    );
    expect(lines[lines.length - 1]).toBe('  main (function): at src/main.rs:1');
  });
});

describe('parseOutputFormat', () => {
  it('should accept known formats', () => {
    expect(parseOutputFormat('csv')).toBe('csv');
  });

  it('should reject unknown formats with a suggestion', () => {
    expect(() => parseOutputFormat('xml')).toThrow(ConfigError);
    try {
      parseOutputFormat('xml');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.message).toBe('Invalid output format: xml');
        expect(error.suggestion).toBe('Use one of: json, csv, text');
      }
    }
  });
});

describe('writeReport', () => {
  it('should write the rendered report', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rust-inventory-out-'));
    try {
      const file = path.join(dir, 'report.txt');
      await writeReport(file, 'text', results, metadata, { link: false });

      expect(await fs.readFile(file, 'utf8')).toBe(renderText(results, metadata, { link: false }));
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
