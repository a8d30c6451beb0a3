#!/usr/bin/env node
import { program } from 'commander';
import { handleUnknownError } from './errors/index';
import { registerMainCommand } from './cli/commands';
import { registerPresetsCommand } from './cli/presets-command';
import { registerValidateCommand } from './cli/validate-command';

// Set up Commander program
program
  .name('onebundle')
  .description('Bundle a source tree into one text file, shaped per file by presets')
  .version('0.1.0')
  // Subcommands reuse option names (-p, -s), so options bind to the command they follow
  .enablePositionalOptions();

registerValidateCommand(program);
registerPresetsCommand(program);
registerMainCommand(program);

program.parseAsync(process.argv).catch((e: unknown) => {
  const err = handleUnknownError(e, 'Running command');
  console.error(`Error: ${err.message}`);
  process.exit(1);
});
