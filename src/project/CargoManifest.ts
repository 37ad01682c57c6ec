/**
 * Cargo.toml metadata
 *
 * Line-based reader for `[package] name` and `version`; not a TOML parser.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { Logger } from '../logging/Logger.js';
import { silentLogger } from '../logging/Logger.js';
import { UNKNOWN } from '../type-inference/sentinels.js';
import type { ProjectMetadata } from './types.js';

export function parseCargoManifest(content: string): ProjectMetadata {
  const metadata: ProjectMetadata = { projectName: UNKNOWN, version: UNKNOWN };
  let currentSection = '';

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
      currentSection = trimmed.slice(1, -1).trim();
      continue;
    }
    if (currentSection !== 'package') continue;

    const name = trimmed.match(/^name\s*=\s*"([^"]+)"/);
    if (name) {
      metadata.projectName = name[1];
      continue;
    }
    const version = trimmed.match(/^version\s*=\s*"([^"]+)"/);
    if (version) {
      metadata.version = version[1];
    }
  }
  return metadata;
}

/**
 * Read `<projectDir>/Cargo.toml`; both fields are `unknown` when the file is missing
 */
export async function readCargoMetadata(
  projectDir: string,
  logger: Logger = silentLogger
): Promise<ProjectMetadata> {
  const manifestPath = path.join(projectDir, 'Cargo.toml');
  try {
    const content = await fs.readFile(manifestPath, 'utf8');
    return parseCargoManifest(content);
  } catch (error) {
    logger.debug('No readable Cargo.toml, using unknown project metadata', {
      manifestPath,
      error: error instanceof Error ? error.message : String(error),
    });
    return { projectName: UNKNOWN, version: UNKNOWN };
  }
}
