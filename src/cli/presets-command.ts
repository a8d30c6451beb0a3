import type { Command } from 'commander';
import { statSync } from 'fs';
import * as path from 'path';
import { parsePresetsOptions } from '../boundaries/cli-parser';
import { loadConfig } from '../boundaries/config-loader';
import { handleUnknownError } from '../errors/index';
import { error } from '../output/logger';
import { printPresetGroups, printResolution } from '../output/reporter';
import { resolveSettings } from '../presets/settings-resolver';
import type { FileEntry } from '../presets/types';
import { extensionOf, isBinaryFile, isHiddenPath } from '../scan/file-resolver';
import type { PresetsOptions } from '../schemas/cli-schemas';
import { collect } from './commands';

/*
 * Describes a file for resolution without listing the whole tree. A path
 * that does not exist yet is still resolved, as an empty text file.
 */
export function describeFile(sourceDir: string, filePath: string): FileEntry {
  const absolute = path.resolve(sourceDir, filePath);
  const relative = path.relative(sourceDir, absolute).split(path.sep).join('/');
  let sizeBytes = 0;
  let isBinary = false;
  try {
    sizeBytes = statSync(absolute).size;
    isBinary = isBinaryFile(absolute);
  } catch (e: unknown) {
    if (!(e instanceof Error && 'code' in e && e.code === 'ENOENT')) throw e;
  }
  return {
    path: relative,
    extension: extensionOf(relative),
    sizeBytes,
    isHidden: isHiddenPath(relative),
    isBinary,
  };
}

/*
 * Registers the 'presets' command: list loaded groups, or explain the
 * settings one file would get.
 */
export function registerPresetsCommand(program: Command): void {
  program
    .command('presets')
    .description('List preset groups, or explain how a file\'s settings resolve')
    .option('-p, --preset <file>', 'Preset document to load (repeatable, later wins)', collect, [])
    .option('--no-user-presets', 'Skip global and user preset documents')
    .option('-s, --source <dir>', 'Project root', '.')
    .option('--explain <file>', 'Show the resolution trace for one file')
    .action((rawOpts: unknown) => {
      let options: PresetsOptions;
      try {
        options = parsePresetsOptions(rawOpts);
        const sourceDir = path.resolve(options.source);
        const config = loadConfig({ sourceDir, presets: options.preset, includeUserPresets: options.userPresets });

        if (options.explain === undefined) {
          printPresetGroups(config);
          return;
        }
        const file = describeFile(sourceDir, options.explain);
        printResolution(file.path, resolveSettings(file, config, {}, { trace: true }));
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Listing presets');
        error(`Error: ${err.message}`);
        process.exit(1);
      }
    });
}
