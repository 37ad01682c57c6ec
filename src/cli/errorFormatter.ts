/**
 * Standardized error formatting for the CLI
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { AnalysisError, describeCause } from '../errors/AnalysisError.js';

export function formatError(title: string, nextSteps: readonly string[] = []): string[] {
  const lines = [`✗ ${title}`];
  if (nextSteps.length > 0) {
    lines.push('');
    for (const step of nextSteps) {
      lines.push(`→ ${step}`);
    }
  }
  return lines;
}

/**
 * Title and next steps for any thrown value
 */
export function describeError(error: unknown): { title: string; nextSteps: string[] } {
  if (error instanceof AnalysisError) {
    return { title: error.message, nextSteps: error.suggestion ? [error.suggestion] : [] };
  }
  return { title: describeCause(error), nextSteps: [] };
}

/**
 * Print a standardized error message and exit with code 1
 *
 * @example
 * exitWithError('Invalid output format: yaml', ['Use one of: json, csv, text']);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  for (const line of formatError(title, nextSteps)) {
    console.error(line);
  }
  process.exit(1);
}
