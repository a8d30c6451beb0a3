import {
  ProcessorExecutionError,
  UnknownProcessorError,
  handleUnknownError,
  type ErrorContext,
} from '../errors/index';
import { debug } from '../output/logger';
import { ActionName, type Settings } from '../presets/types';
import { createBuiltinRegistry, type ProcessorRegistry } from '../processors/processor-registry';
import { joinParagraphs } from './join-paragraphs';
import { minify } from './minify';
import { stripComments } from './strip-comments';
import { stripTags } from './strip-tags';
import { removeScrapedMetadata, truncateLines } from './truncation';
import type { ActionContext, ActionHandler, PipelineResult } from './types';
import { compressWhitespace, removeEmptyLines } from './whitespace';

const BUILTIN_ACTIONS: Record<Exclude<ActionName, ActionName.Custom>, ActionHandler> = {
  [ActionName.None]: (content) => content,
  [ActionName.Minify]: minify,
  [ActionName.StripTags]: stripTags,
  [ActionName.StripComments]: stripComments,
  [ActionName.CompressWhitespace]: compressWhitespace,
  [ActionName.RemoveEmptyLines]: removeEmptyLines,
  [ActionName.JoinParagraphs]: joinParagraphs,
};

function errorContext(context: ActionContext): ErrorContext {
  return {
    file: context.path,
    ...(context.match ? { group: context.match.group, rule: context.match.rule } : {}),
  };
}

/*
 * Applies a file's effective settings to its content: scrape-footer
 * removal first, then each action in list order, then line truncation.
 * A failure is returned, not thrown, so one file never stops the run.
 */
export class ActionPipeline {
  constructor(private readonly processors: ProcessorRegistry = createBuiltinRegistry()) {}

  apply(content: string, settings: Readonly<Settings>, context: ActionContext): PipelineResult {
    const actionsRun: string[] = [];
    try {
      let result = settings.removeScrapedMetadata ? removeScrapedMetadata(content) : content;

      for (const action of settings.actions) {
        result = action === ActionName.Custom
          ? this.runCustom(result, settings, context)
          : BUILTIN_ACTIONS[action](result, settings, context);
        actionsRun.push(action === ActionName.Custom ? `custom:${settings.customProcessor ?? ''}` : action);
      }

      if (settings.maxLines !== null) {
        result = truncateLines(result, settings.maxLines);
      }

      debug(`[onebundle] ${context.path}: ${actionsRun.join(', ') || 'no actions'}`);
      return { ok: true, content: result, actionsRun };
    } catch (e: unknown) {
      return { ok: false, error: handleUnknownError(e, `Processing ${context.path}`), actionsRun };
    }
  }

  private runCustom(content: string, settings: Readonly<Settings>, context: ActionContext): string {
    const name = settings.customProcessor;
    const processor = name === null ? undefined : this.processors.get(name);
    if (name === null || !processor) {
      throw new UnknownProcessorError(name, this.processors.getRegisteredNames(), errorContext(context));
    }
    try {
      return processor(content, settings.processorArgs, { path: context.path, extension: context.extension });
    } catch (e: unknown) {
      throw new ProcessorExecutionError(name, e, errorContext(context));
    }
  }
}
