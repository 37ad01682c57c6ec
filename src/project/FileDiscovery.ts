/**
 * Source file discovery
 *
 * Recursive walk from the project root. Entries are visited in name order
 * so two walks over the same tree return the same list.
 */

import type { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { FileAccessError } from '../errors/AnalysisError.js';
import type { ResolvedAnalyzerOptions } from '../config/options.js';
import type { DiscoveryResult } from './types.js';

type DiscoveryOptions = Pick<ResolvedAnalyzerOptions, 'extensions' | 'excludeDirectories' | 'includeHidden'>;

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export async function discoverSourceFiles(root: string, options: DiscoveryOptions): Promise<DiscoveryResult> {
  const result: DiscoveryResult = { files: [], errors: [] };
  const excluded = new Set(options.excludeDirectories);

  const walk = async (directory: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      result.errors.push(new FileAccessError(directory, error));
      return;
    }

    entries.sort((a, b) => compareNames(a.name, b.name));
    for (const entry of entries) {
      const hidden = entry.name.startsWith('.');
      const fullPath = path.join(directory, entry.name);

      if (entry.isDirectory()) {
        if (excluded.has(entry.name) || (hidden && !options.includeHidden)) continue;
        await walk(fullPath);
      } else if (entry.isFile() && options.extensions.includes(path.extname(entry.name))) {
        result.files.push(fullPath);
      }
    }
  };

  await walk(root);
  return result;
}
