import type { Command } from 'commander';
import { statSync } from 'fs';
import * as path from 'path';
import { buildCliOverrides, parseBundleOptions } from '../boundaries/cli-parser';
import type { BundleOptions } from '../schemas/cli-schemas';
import { loadConfig } from '../boundaries/config-loader';
import { DEFAULT_OUTPUT_FILENAME } from '../config/constants';
import { handleUnknownError } from '../errors/index';
import { BundleWriter } from '../output/bundle-writer';
import { error, setSilentMode, setVerboseMode } from '../output/logger';
import { printBundleSummary, printResolution } from '../output/reporter';
import type { CliOverrides, GlobalConfig } from '../presets/types';
import { bundleFiles } from './orchestrator';

// Option keys (camelCase, as commander stores them) that map onto settings
const SETTING_OPTION_KEYS = [
  'securityCheck',
  'maxFileSize',
  'includeDotPaths',
  'includeBinaryFiles',
  'removeScrapedMetadata',
  'lineEnding',
  'separatorStyle',
  'metadata',
  'maxLines',
];

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/*
 * Options the user typed, leaving out commander defaults (`--no-metadata`
 * defaults `metadata` to true, which must not count as an override).
 */
export function explicitOptions(command: Command, keys: string[]): Record<string, unknown> {
  const opts: Record<string, unknown> = command.opts();
  const result: Record<string, unknown> = {};
  for (const key of keys) {
    if (command.getOptionValueSource(key) === 'cli') {
      result[key] = opts[key];
    }
  }
  return result;
}

function fail(context: string, e: unknown): never {
  const err = handleUnknownError(e, context);
  error(`Error: ${err.message}`);
  process.exit(1);
}

/*
 * Registers the default command: bundle a directory into one file.
 */
export function registerMainCommand(program: Command): void {
  program
    .option('-s, --source <dir>', 'Directory to bundle', '.')
    .option('-o, --output <file>', `Output file (default: ${DEFAULT_OUTPUT_FILENAME})`)
    .option('-p, --preset <file>', 'Preset document to load (repeatable, later wins)', collect, [])
    .option('--preset-group <name>', 'Only use this preset group')
    .option('--disable-presets', 'Ignore every preset document')
    .option('--no-user-presets', 'Skip global and user preset documents')
    .option('--explain', 'Print how each file\'s settings were resolved')
    .option('--strict', 'Fail the run on the first file that cannot be processed')
    .option('--concurrency <n>', 'Files processed in parallel')
    .option('-v, --verbose', 'Enable verbose logging')
    .option('-q, --quiet', 'Only print errors')
    .option('--security-check <mode>', 'error, warn or skip')
    .option('--max-file-size <size>', 'Skip files larger than this (e.g. 500KB)')
    .option('--include-dot-paths', 'Include hidden files and directories')
    .option('--include-binary-files', 'Include binary files')
    .option('--remove-scraped-metadata', 'Strip scraper footers from Markdown files')
    .option('--line-ending <ending>', 'lf or crlf')
    .option('--separator-style <style>', 'Standard, Detailed, Markdown, MachineReadable or None')
    .option('--no-metadata', 'Leave file metadata out of separators')
    .option('--max-lines <n>', 'Truncate each file after this many lines (0 for no limit)')
    .action(async () => {
      let options: BundleOptions;
      let cliOverrides: CliOverrides;
      try {
        options = parseBundleOptions(program.opts());
        cliOverrides = buildCliOverrides(explicitOptions(program, SETTING_OPTION_KEYS));
      } catch (e: unknown) {
        fail('Parsing CLI options', e);
      }

      setVerboseMode(options.verbose);
      setSilentMode(options.quiet);

      const sourceDir = path.resolve(options.source);
      const outputPath = path.resolve(options.output ?? DEFAULT_OUTPUT_FILENAME);

      let config: GlobalConfig;
      try {
        config = loadConfig({
          sourceDir,
          presets: options.preset,
          includeUserPresets: options.userPresets,
          disablePresets: options.disablePresets,
          ...(options.presetGroup !== undefined ? { presetGroup: options.presetGroup } : {}),
        });
      } catch (e: unknown) {
        fail('Loading presets', e);
      }

      try {
        const result = await bundleFiles({
          sourceDir,
          config,
          cliOverrides,
          concurrency: options.concurrency,
          strict: options.strict,
          explain: options.explain,
          skip: [outputPath],
        });

        if (options.explain) {
          for (const outcome of result.outcomes) {
            if (outcome.status !== 'failed') printResolution(outcome.path, outcome.resolution);
          }
        }

        new BundleWriter().write(outputPath, result.bundled);
        printBundleSummary(result, outputPath, statSync(outputPath).size);
      } catch (e: unknown) {
        fail('Bundling files', e);
      }
    });
}
