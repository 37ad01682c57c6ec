import { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { runAnalysis, type AnalyzeCommandOptions } from './analyze.js';
import { describeError, exitWithError } from './errorFormatter.js';

/**
 * Version from the nearest package.json above this module (src/ or dist/src/)
 */
export function readPackageVersion(): string {
  let directory = dirname(fileURLToPath(import.meta.url));
  for (let depth = 0; depth < 4; depth++) {
    const candidate = join(directory, 'package.json');
    if (existsSync(candidate)) {
      const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    }
    directory = dirname(directory);
  }
  return '0.0.0';
}

export function createProgram(): Command {
  return new Command()
    .name('rust-inventory')
    .description('Inventory of variable bindings and declarations in a Rust project')
    .version(readPackageVersion())
    .argument('<project_dir>', 'Rust project directory to analyze')
    .option('-o, --output <file>', 'Write the report to a file instead of the console')
    .option('-f, --format <format>', 'Report format for --output: json, csv or text', 'text')
    .option('-s, --sort', 'Sort variables by name')
    .option('-t, --tree', 'Print the project directory tree and exit')
    .option('-l, --link', 'Add vscode:// links to every record')
    .option('--line-location <strategy>', 'How tree nodes are mapped to lines: span or text', 'span')
    .option('--log-level <level>', 'silent, errors, warnings, info or debug', 'warnings')
    .addHelpText('after', `
Examples:
  rust-inventory ./my-crate                         Print the report
  rust-inventory ./my-crate -o report.json -f json  Write a JSON report
  rust-inventory ./my-crate --sort --link           Sorted, with editor links
  rust-inventory ./my-crate --tree                  Show the source tree
`)
    .action(async (projectDir: string, options: AnalyzeCommandOptions) => {
      try {
        await runAnalysis(projectDir, options);
      } catch (error) {
        const { title, nextSteps } = describeError(error);
        exitWithError(title, nextSteps);
      }
    });
}
