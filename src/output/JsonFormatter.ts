import type { BindingRecord, DeclarationRecord } from '../base/BindingTypes.js';
import type { AnalysisResults } from '../project/types.js';
import { editorLink } from './links.js';
import type { RenderOptions, RunMetadata } from './types.js';

interface JsonBinding {
  name: string;
  file: string;
  line: number;
  context: string;
  kind: string;
  type: string;
  basic_type: string;
  scope: string;
  vscode_link?: string;
}

interface JsonDeclaration {
  name: string;
  type: string;
  file: string;
  line: number;
  vscode_link?: string;
}

export interface JsonReport {
  metadata: {
    version: string;
    project_name: string;
    datetime: string;
    mutable_variable_count: number;
    immutable_variable_count: number;
    data_structure_count: number;
  };
  mutable_variables: JsonBinding[];
  immutable_variables: JsonBinding[];
  data_structures: JsonDeclaration[];
}

function toJsonBinding(record: BindingRecord, options: RenderOptions): JsonBinding {
  const entry: JsonBinding = {
    name: record.name,
    file: record.location.filePath,
    line: record.location.line,
    context: record.contextLine.trim(),
    kind: record.declarationKind,
    type: record.inferredType,
    basic_type: record.basicType,
    scope: record.scope,
  };
  if (options.link) entry.vscode_link = editorLink(record.location, options.cwd);
  return entry;
}

function toJsonDeclaration(record: DeclarationRecord, options: RenderOptions): JsonDeclaration {
  const entry: JsonDeclaration = {
    name: record.name,
    type: record.declarationType,
    file: record.location.filePath,
    line: record.location.line,
  };
  if (options.link) entry.vscode_link = editorLink(record.location, options.cwd);
  return entry;
}

export function buildJsonReport(
  results: AnalysisResults,
  metadata: RunMetadata,
  options: RenderOptions
): JsonReport {
  return {
    metadata: {
      version: metadata.version,
      project_name: metadata.projectName,
      datetime: metadata.datetime,
      mutable_variable_count: results.mutable.length,
      immutable_variable_count: results.immutable.length,
      data_structure_count: results.declarations.length,
    },
    mutable_variables: results.mutable.map((record) => toJsonBinding(record, options)),
    immutable_variables: results.immutable.map((record) => toJsonBinding(record, options)),
    data_structures: results.declarations.map((record) => toJsonDeclaration(record, options)),
  };
}

export function renderJson(results: AnalysisResults, metadata: RunMetadata, options: RenderOptions): string {
  return JSON.stringify(buildJsonReport(results, metadata, options), null, 2);
}
