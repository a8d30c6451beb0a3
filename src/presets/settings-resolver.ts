import { BUILTIN_SETTINGS } from './defaults';
import { SETTINGS_KEYS, applyOverrides, freezeSettings, presentFields } from './overrides';
import { extensionCandidates, matchesRule } from './pattern-matcher';
import type {
  CandidateCheck,
  CliOverrides,
  FileEntry,
  GlobalConfig,
  LayerKind,
  PartialSettings,
  Resolution,
  Rule,
  RuleGroup,
  RuleMatch,
  Settings,
  TraceLayer,
} from './types';

export interface ResolveOptions {
  // Record every layer and candidate rule in Resolution.trace
  trace?: boolean;
}

export interface RuleCandidate {
  group: RuleGroup;
  rule: Rule;
}

export function isGroupLive(group: RuleGroup): boolean {
  return group.enabled && group.active;
}

/*
 * Flattens the priority-sorted groups into the single ordered list of
 * (group, rule) pairs the resolver walks. Default rules are not included.
 */
export function flattenRules(config: GlobalConfig): RuleCandidate[] {
  const candidates: RuleCandidate[] = [];
  for (const group of config.ruleGroups) {
    if (!isGroupLive(group)) continue;
    for (const rule of group.rules) {
      candidates.push({ group, rule });
    }
  }
  return candidates;
}

/*
 * Per-extension layer for a file, most specific suffix first (".min.js" before ".js").
 */
export function findExtensionSettings(
  file: FileEntry,
  perExtension: Record<string, PartialSettings>
): { extension: string; layer: PartialSettings } | null {
  for (const extension of extensionCandidates(file)) {
    const layer = perExtension[extension];
    if (layer) return { extension, layer };
  }
  return null;
}

function changedFields(before: Readonly<Settings>, after: Readonly<Settings>): Array<keyof Settings> {
  return SETTINGS_KEYS.filter((key) => JSON.stringify(before[key]) !== JSON.stringify(after[key]));
}

/*
 * Computes the effective settings for one file. Layers, lowest first:
 * built-in defaults, global defaults, per-extension settings, the first
 * matching rule across all live groups (or the top group's default rule),
 * and finally the explicitly-set CLI flags.
 */
export function resolveSettings(
  file: FileEntry,
  config: GlobalConfig,
  cliOverrides: CliOverrides = {},
  options: ResolveOptions = {}
): Resolution {
  const layers: TraceLayer[] = [];
  const candidates: CandidateCheck[] = [];

  let settings: Settings = applyOverrides(config.defaultSettings, {});
  const apply = (kind: LayerKind, label: string, layer: PartialSettings): void => {
    settings = applyOverrides(settings, layer);
    if (options.trace) layers.push({ kind, label, fields: presentFields(layer) });
  };

  if (options.trace) {
    layers.push({ kind: 'builtin', label: 'built-in defaults', fields: [] });
    layers.push({ kind: 'global', label: 'global defaults', fields: changedFields(BUILTIN_SETTINGS, config.defaultSettings) });
  }

  const extensionSettings = findExtensionSettings(file, config.perExtensionSettings);
  if (extensionSettings) {
    apply('extension', `extension ${extensionSettings.extension}`, extensionSettings.layer);
  }

  let match: RuleMatch | null = null;
  for (const { group, rule } of flattenRules(config)) {
    const matched = matchesRule(file, rule, group.basePath);
    if (options.trace) candidates.push({ group: group.name, rule: rule.name, matched });
    if (matched) {
      apply('rule', `${group.name}/${rule.name}`, rule.overrides);
      match = { group: group.name, rule: rule.name, fallback: false };
      break;
    }
  }

  if (!match) {
    const topGroup = config.ruleGroups.find(isGroupLive);
    if (topGroup?.defaultRule) {
      apply('default-rule', `${topGroup.name}/${topGroup.defaultRule.name}`, topGroup.defaultRule.overrides);
      match = { group: topGroup.name, rule: topGroup.defaultRule.name, fallback: true };
    }
  }

  if (presentFields(cliOverrides).length > 0) {
    apply('cli', 'command line', cliOverrides);
  }

  const resolution: Resolution = { settings: freezeSettings(settings), match };
  if (options.trace) {
    resolution.trace = { file: file.path, layers, candidates };
  }
  return resolution;
}
