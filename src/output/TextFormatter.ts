/**
 * Plain-text rendering, one record per line
 *
 *   x (mutable): let mut x = 5; at src/main.rs:3 - kind: ..., type: ..., basic type: ..., scope: main
 */

import type { BindingRecord, DeclarationRecord } from '../base/BindingTypes.js';
import type { AnalysisResults } from '../project/types.js';
import { editorLink } from './links.js';
import type { RenderOptions, RunMetadata } from './types.js';

function locationText(record: BindingRecord | DeclarationRecord, options: RenderOptions): string {
  const { filePath, line } = record.location;
  if (!options.link) return `${filePath}:${line}`;
  return `[${filePath}:${line}](${editorLink(record.location, options.cwd)})`;
}

export function formatBinding(record: BindingRecord, options: RenderOptions = { link: false }): string {
  const mutability = record.isMutable ? 'mutable' : 'immutable';
  return (
    `${record.name} (${mutability}): ${record.contextLine.trim()} at ${locationText(record, options)}` +
    ` - kind: ${record.declarationKind}, type: ${record.inferredType},` +
    ` basic type: ${record.basicType}, scope: ${record.scope}`
  );
}

export function formatDeclaration(record: DeclarationRecord, options: RenderOptions = { link: false }): string {
  return `${record.name} (${record.declarationType}): at ${locationText(record, options)}`;
}

export function renderText(results: AnalysisResults, metadata: RunMetadata, options: RenderOptions): string {
  const lines = [
    'Project Information',
    '-------------------',
    `Project Name: ${metadata.projectName}`,
    `Version: ${metadata.version}`,
    `Analysis Run At: ${metadata.datetime}`,
    '',
    `Mutable Variables (${results.mutable.length})`,
    '-------------------',
    ...results.mutable.map((record) => formatBinding(record, options)),
    '',
    `Immutable Variables (${results.immutable.length})`,
    '---------------------',
    ...results.immutable.map((record) => formatBinding(record, options)),
    '',
    `Data Structures (${results.declarations.length})`,
    '----------------',
    ...results.declarations.map((record) => formatDeclaration(record, options)),
  ];
  return `${lines.join('\n')}\n`;
}
