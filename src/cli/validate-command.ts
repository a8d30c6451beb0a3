import type { Command } from 'commander';
import * as path from 'path';
import { parseValidateOptions } from '../boundaries/cli-parser';
import { discoverPresetFiles } from '../boundaries/preset-discovery';
import { loadPresets } from '../boundaries/preset-loader';
import { handleUnknownError } from '../errors/index';
import { error, log } from '../output/logger';
import { printValidationRow } from '../output/reporter';
import type { ValidateOptions } from '../schemas/cli-schemas';
import { collect } from './commands';

/*
 * Checks each preset document on its own, then all of them together so
 * `--preset-group` and cross-document redefinitions are checked too.
 * Returns the number of documents (or combinations) that failed.
 */
export function validatePresetFiles(files: string[], root: string, presetGroup?: string): number {
  let failures = 0;
  for (const file of files) {
    try {
      const config = loadPresets([file], { root });
      printValidationRow('ok', `${file} (${config.ruleGroups.length} group(s))`);
    } catch (e: unknown) {
      printValidationRow('error', handleUnknownError(e, 'Validating preset').message);
      failures++;
    }
  }

  if (failures === 0 && (files.length > 1 || presetGroup !== undefined)) {
    try {
      loadPresets(files, { root, ...(presetGroup !== undefined ? { presetGroup } : {}) });
      printValidationRow('ok', 'combined configuration');
    } catch (e: unknown) {
      printValidationRow('error', handleUnknownError(e, 'Validating presets').message);
      failures++;
    }
  }
  return failures;
}

/*
 * Registers the 'validate' command: load preset documents without
 * bundling anything.
 */
export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Validate preset documents')
    .option('-p, --preset <file>', 'Preset document to check (repeatable)', collect, [])
    .option('--preset-group <name>', 'Check that this group exists')
    .option('--no-user-presets', 'Skip global and user preset documents')
    .option('-s, --source <dir>', 'Project root that preset paths must stay within', '.')
    .action((rawOpts: unknown) => {
      let options: ValidateOptions;
      try {
        options = parseValidateOptions(rawOpts);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing validate command options');
        error(`Error: ${err.message}`);
        process.exit(1);
      }

      const files = discoverPresetFiles({ projectPresets: options.preset, includeUserPresets: options.userPresets });
      if (files.length === 0) {
        log('No preset documents found.');
        return;
      }

      const failures = validatePresetFiles(files, path.resolve(options.source), options.presetGroup);
      if (failures > 0) {
        error(`${failures} preset check(s) failed.`);
        process.exit(1);
      }
    });
}
