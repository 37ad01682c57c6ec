/**
 * Indented listing of a project's directories and Rust files
 *
 * `target/` is listed but not descended into.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { compareNames } from './FileDiscovery.js';

const INDENT = '  ';

export async function renderProjectTree(root: string): Promise<string[]> {
  const lines: string[] = [`📂 ${path.basename(path.resolve(root))}`];

  const walk = async (directory: string, depth: number): Promise<void> => {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    entries.sort((a, b) => compareNames(a.name, b.name));

    for (const entry of entries) {
      const prefix = INDENT.repeat(depth);
      if (entry.isDirectory()) {
        lines.push(`${prefix}📂 ${entry.name}`);
        if (entry.name !== 'target') {
          await walk(path.join(directory, entry.name), depth + 1);
        }
      } else if (entry.isFile() && entry.name.endsWith('.rs')) {
        lines.push(`${prefix}📄 ${entry.name}`);
      }
    }
  };

  await walk(root, 1);
  return lines;
}
