import { readFile, stat } from 'fs/promises';
import * as path from 'path';
import { ActionPipeline } from '../actions/action-pipeline';
import { BundleError, ProcessingError, SecurityCheckError, handleUnknownError } from '../errors/index';
import { debug, warn } from '../output/logger';
import type { BundledFile } from '../output/bundle-writer';
import { resolveSettings } from '../presets/settings-resolver';
import { SecurityCheckMode, type FileEntry } from '../presets/types';
import { resolveFiles } from '../scan/file-resolver';
import { RegexSecretScanner, type SecurityCheck } from '../security/secret-scanner';
import { SkipReason, type BundleRunOptions, type BundleRunResult, type FileOutcome } from './types';

async function runWithConcurrency<T, R>(
  items: T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let i = 0;
  const workers = new Array(Math.min(limit, items.length))
    .fill(0)
    .map(async () => {
      while (true) {
        const idx = i++;
        if (idx >= items.length) break;
        const item = items[idx];
        if (item !== undefined) {
          results[idx] = await worker(item, idx);
        }
      }
    });
  await Promise.all(workers);
  return results;
}

interface FileWorkerContext {
  sourceDir: string;
  options: BundleRunOptions;
  pipeline: ActionPipeline;
  scanner: SecurityCheck;
}

/*
 * Resolve, filter, scan and transform one file. Every failure is captured
 * in the outcome; nothing thrown here reaches other files.
 */
async function processFile(entry: FileEntry, ctx: FileWorkerContext): Promise<FileOutcome> {
  const { options } = ctx;
  try {
    const resolution = resolveSettings(entry, options.config, options.cliOverrides, { trace: options.explain === true });
    const { settings } = resolution;

    if (entry.isHidden && !settings.includeHidden) {
      return { status: 'skipped', path: entry.path, reason: SkipReason.Hidden, resolution };
    }
    if (entry.isBinary && !settings.includeBinary) {
      return { status: 'skipped', path: entry.path, reason: SkipReason.Binary, resolution };
    }
    if (settings.maxFileSize !== null && entry.sizeBytes > settings.maxFileSize) {
      return { status: 'skipped', path: entry.path, reason: SkipReason.TooLarge, resolution };
    }

    const absolute = path.join(ctx.sourceDir, entry.path);
    const [raw, info] = await Promise.all([readFile(absolute, 'utf-8'), stat(absolute)]);

    const findings = settings.securityCheck === SecurityCheckMode.Skip ? [] : ctx.scanner.scan(raw, entry.path);
    if (findings.length > 0 && settings.securityCheck === SecurityCheckMode.Error) {
      const context = resolution.match
        ? { file: entry.path, group: resolution.match.group, rule: resolution.match.rule }
        : { file: entry.path };
      return {
        status: 'failed',
        path: entry.path,
        error: new SecurityCheckError(findings.map((finding) => finding.message), context),
      };
    }

    const result = ctx.pipeline.apply(raw, settings, {
      path: entry.path,
      extension: entry.extension,
      match: resolution.match,
    });
    if (!result.ok) {
      return { status: 'failed', path: entry.path, error: result.error };
    }

    const file: BundledFile = {
      path: entry.path,
      extension: entry.extension,
      sizeBytes: entry.sizeBytes,
      modified: info.mtime,
      content: result.content,
      settings,
    };
    return { status: 'bundled', path: entry.path, file, resolution, actionsRun: result.actionsRun, findings };
  } catch (e: unknown) {
    return { status: 'failed', path: entry.path, error: handleUnknownError(e, `Processing ${entry.path}`) };
  }
}

/*
 * Runs every listed file through resolution and the action pipeline with
 * bounded concurrency. Outcomes keep listing order. A security finding in
 * "error" mode aborts the run; with `strict` so does any other failure.
 */
export async function bundleFiles(options: BundleRunOptions): Promise<BundleRunResult> {
  const sourceDir = path.resolve(options.sourceDir);
  const entries = resolveFiles({
    sourceDir,
    filters: options.config.filters,
    ...(options.skip ? { skip: options.skip } : {}),
  });
  debug(`[onebundle] ${entries.length} candidate file(s) under ${sourceDir}`);

  const ctx: FileWorkerContext = {
    sourceDir,
    options,
    pipeline: options.pipeline ?? new ActionPipeline(),
    scanner: options.securityCheck ?? new RegexSecretScanner(),
  };
  const outcomes = await runWithConcurrency(entries, options.concurrency, (entry) => processFile(entry, ctx));

  let warnings = 0;
  for (const outcome of outcomes) {
    if (outcome.status === 'failed') {
      if (outcome.error instanceof SecurityCheckError || options.strict) {
        throw outcome.error instanceof BundleError
          ? outcome.error
          : new ProcessingError(outcome.error.message, { file: outcome.path });
      }
      warn(`[onebundle] Skipping ${outcome.path}: ${outcome.error.message}`);
      warnings++;
    } else if (outcome.status === 'bundled' && outcome.findings.length > 0) {
      for (const finding of outcome.findings) {
        warn(`[onebundle] ${finding.path}: ${finding.message}`);
      }
      warnings += outcome.findings.length;
    } else if (outcome.status === 'skipped') {
      debug(`[onebundle] Skipped ${outcome.path} (${outcome.reason})`);
    }
  }

  const bundled: BundledFile[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'bundled') bundled.push(outcome.file);
  }

  return {
    outcomes,
    bundled,
    totalFiles: entries.length,
    skipped: outcomes.filter((outcome) => outcome.status === 'skipped').length,
    failed: outcomes.filter((outcome) => outcome.status === 'failed').length,
    warnings,
  };
}
