/**
 * Command-line program
 *
 *   markdown-notes build [--root <dir>] [--config <file>] [--renderer <name>] [--dry-run]
 */

import { Command, Option } from 'commander';
import type { RendererName } from './base/MarkdownRenderer.js';
import { buildSite, DEFAULT_CONFIG_FILE } from './site/index.js';

interface BuildCliOptions {
  root: string;
  config: string;
  renderer?: RendererName;
  dryRun: boolean;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('markdown-notes')
    .description('Build note pages and category listings from Markdown files')
    .version('0.1.0');

  program
    .command('build', { isDefault: true })
    .description('Convert every note and refresh the listings')
    .option('--root <dir>', 'site root directory', process.cwd())
    .option('-c, --config <file>', 'config file relative to the root', DEFAULT_CONFIG_FILE)
    .addOption(new Option('--renderer <name>', 'override the configured renderer').choices(['simple', 'marked']))
    .option('--dry-run', 'print the generated listings without writing files', false)
    .action(async (options: BuildCliOptions) => {
      const summary = await buildSite({
        root: options.root,
        configFile: options.config,
        renderer: options.renderer,
        dryRun: options.dryRun,
      });
      if (!summary.dryRun) {
        console.log(`✅ Wrote ${summary.written.length} pages, removed ${summary.removed.length} stale pages`);
      }
    });

  return program;
}
