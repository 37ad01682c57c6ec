/**
 * CSV rendering: metadata rows, the binding table, then the declaration table
 */

import type { BindingRecord } from '../base/BindingTypes.js';
import type { AnalysisResults } from '../project/types.js';
import { editorLink } from './links.js';
import type { RenderOptions, RunMetadata } from './types.js';

/** Double-quoted field with inner quotes doubled */
export function csvQuote(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

function bindingRow(record: BindingRecord, options: RenderOptions): string {
  const fields = [
    record.isMutable ? 'mutable' : 'immutable',
    csvQuote(record.name),
    csvQuote(record.location.filePath),
    String(record.location.line),
    csvQuote(record.contextLine.trim()),
    csvQuote(record.declarationKind),
    csvQuote(record.inferredType),
    csvQuote(record.basicType),
    csvQuote(record.scope),
  ];
  if (options.link) fields.push(csvQuote(editorLink(record.location, options.cwd)));
  return fields.join(',');
}

export function renderCsv(results: AnalysisResults, metadata: RunMetadata, options: RenderOptions): string {
  const linkColumn = options.link ? ',vscode_link' : '';
  const lines = [
    `Project Name,${metadata.projectName}`,
    `Version,${metadata.version}`,
    `Analysis Run At,${metadata.datetime}`,
    '',
    `mutability,name,file,line,context,kind,type,basic_type,scope${linkColumn}`,
    ...results.mutable.map((record) => bindingRow(record, options)),
    ...results.immutable.map((record) => bindingRow(record, options)),
    `type,name,file,line${linkColumn}`,
  ];

  for (const declaration of results.declarations) {
    const fields = [
      csvQuote(declaration.declarationType),
      csvQuote(declaration.name),
      csvQuote(declaration.location.filePath),
      String(declaration.location.line),
    ];
    if (options.link) fields.push(csvQuote(editorLink(declaration.location, options.cwd)));
    lines.push(fields.join(','));
  }
  return `${lines.join('\n')}\n`;
}
