/**
 * Console report: the text sections with bold headings and indented records
 */

import type { AnalysisResults } from '../project/types.js';
import { styled } from './colors.js';
import { formatBinding, formatDeclaration } from './TextFormatter.js';
import type { RenderOptions, RunMetadata } from './types.js';

export function renderSummary(results: AnalysisResults): string[] {
  const lines = [
    '',
    styled('Summary:', 'bold'),
    `Found ${results.mutable.length} mutable variables`,
    `Found ${results.immutable.length} immutable variables`,
    `Found ${results.declarations.length} data structure objects`,
  ];
  if (results.fallbackFiles.length > 0) {
    lines.push(styled(`${results.fallbackFiles.length} file(s) scanned line by line (syntax errors)`, 'dim'));
  }
  if (results.fileErrors.length > 0) {
    lines.push(`${results.fileErrors.length} file(s) could not be read`);
  }
  return lines;
}

export function renderConsoleReport(
  results: AnalysisResults,
  metadata: RunMetadata,
  options: RenderOptions
): string[] {
  return [
    '',
    styled('Project Information:', 'bold'),
    `Project Name: ${metadata.projectName}`,
    `Version: ${metadata.version}`,
    `Analysis Run At: ${metadata.datetime}`,
    '',
    styled(`Mutable Variables (${results.mutable.length}):`, 'bold'),
    ...results.mutable.map((record) => `  ${formatBinding(record, options)}`),
    '',
    styled(`Immutable Variables (${results.immutable.length}):`, 'bold'),
    ...results.immutable.map((record) => `  ${formatBinding(record, options)}`),
    '',
    styled(`Data Structures (${results.declarations.length}):`, 'bold'),
    ...results.declarations.map((record) => `  ${formatDeclaration(record, options)}`),
  ];
}
