import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import type { BundleRunResult } from '../cli/types';
import { SETTINGS_KEYS } from '../presets/overrides';
import type { GlobalConfig, Resolution, RuleGroup, Settings } from '../presets/types';
import { formatFileSize } from '../utils/file-size';
import { log } from './logger';

function padVisible(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - stripAnsi(text).length));
}

function formatValue(value: Settings[keyof Settings]): string {
  if (value === null) return 'none';
  if (Array.isArray(value)) return value.length > 0 ? value.join(', ') : '[]';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function groupStatus(group: RuleGroup): string {
  if (!group.enabled) return chalk.gray('disabled');
  if (!group.active) return chalk.yellow('inactive');
  return chalk.green('enabled');
}

/*
 * One line per group, highest priority first, with its rules underneath.
 */
export function formatPresetGroups(config: GlobalConfig): string[] {
  if (config.ruleGroups.length === 0) return ['No preset groups loaded.'];

  const nameWidth = Math.max(...config.ruleGroups.map((group) => group.name.length)) + 2;
  const lines: string[] = [];
  for (const group of config.ruleGroups) {
    const status = padVisible(groupStatus(group), 10);
    const description = group.description ? `  ${chalk.dim(group.description)}` : '';
    lines.push(`${chalk.bold(group.name.padEnd(nameWidth))}${status} priority ${group.priority}${description}`);

    const rules = group.defaultRule ? [...group.rules, group.defaultRule] : group.rules;
    for (const rule of rules) {
      const axes = [...rule.extensions, ...rule.patterns];
      lines.push(`  ${chalk.cyan(rule.name)}: ${axes.length > 0 ? axes.join(', ') : '(fallback)'}`);
    }
  }
  return lines;
}

export function printPresetGroups(config: GlobalConfig): void {
  for (const line of formatPresetGroups(config)) log(line);
}

/*
 * Explains how a file's settings came about: which rules were tried, which
 * layers applied, and the final values.
 */
export function formatResolution(filePath: string, resolution: Resolution): string[] {
  const lines = [chalk.underline(filePath)];
  const { trace, match, settings } = resolution;

  if (trace) {
    for (const candidate of trace.candidates) {
      const mark = candidate.matched ? chalk.green('✓') : chalk.gray('·');
      lines.push(`  ${mark} ${candidate.group}/${candidate.rule}`);
    }
    for (const layer of trace.layers) {
      const fields = layer.fields.length > 0 ? layer.fields.join(', ') : chalk.gray('(no fields)');
      lines.push(`  ${chalk.cyan(layer.kind.padEnd(12))} ${layer.label}: ${fields}`);
    }
  }

  const matched = match ? `${match.group}/${match.rule}${match.fallback ? ' (default)' : ''}` : 'none';
  lines.push(`  rule: ${matched}`);
  for (const key of SETTINGS_KEYS) {
    lines.push(`  ${key.padEnd(22)} ${formatValue(settings[key])}`);
  }
  return lines;
}

export function printResolution(filePath: string, resolution: Resolution): void {
  for (const line of formatResolution(filePath, resolution)) log(line);
}

export function formatBundleSummary(result: BundleRunResult, outputPath: string, outputBytes: number): string {
  const okMark = result.failed === 0 ? chalk.green('✓') : chalk.yellow('!');
  const fileTxt = result.bundled.length === 1 ? '1 file' : `${result.bundled.length} files`;
  const parts = [`${okMark} Bundled ${fileTxt} into ${outputPath} (${formatFileSize(outputBytes)})`];
  if (result.skipped > 0) parts.push(chalk.gray(`${result.skipped} skipped`));
  if (result.failed > 0) parts.push(chalk.red(`${result.failed} failed`));
  if (result.warnings > 0) parts.push(chalk.yellow(result.warnings === 1 ? '1 warning' : `${result.warnings} warnings`));
  return parts.join(', ');
}

export function printBundleSummary(result: BundleRunResult, outputPath: string, outputBytes: number): void {
  log(formatBundleSummary(result, outputPath, outputBytes));
}

export function printValidationRow(level: 'error' | 'ok', message: string): void {
  const label = level === 'error' ? chalk.red('error') : chalk.green('ok');
  log(`  ${padVisible(label, 6)}${message}`);
}
