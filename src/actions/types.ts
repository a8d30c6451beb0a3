import type { RuleMatch, Settings } from '../presets/types';

export interface ActionContext {
  // File path relative to the project root, POSIX form
  path: string;
  extension: string;
  // The rule that produced the settings, for error reporting
  match?: RuleMatch | null;
}

export type ActionHandler = (content: string, settings: Readonly<Settings>, context: ActionContext) => string;

export type PipelineResult =
  | { ok: true; content: string; actionsRun: string[] }
  | { ok: false; error: Error; actionsRun: string[] };
