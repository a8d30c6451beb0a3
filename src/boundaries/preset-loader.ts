import { existsSync, readFileSync, statSync } from 'fs';
import * as path from 'path';
import {
  DEFAULT_RULE_NAME,
  GLOBAL_SETTINGS_KEY,
  MAX_PRESET_DOCUMENT_BYTES,
  PROCESSOR_NAME_PATTERN,
} from '../config/constants';
import {
  ConfigError,
  ConfigTooLargeError,
  InvalidProcessorNameError,
  PathEscapesRootError,
  UnsupportedPatternSyntaxError,
  handleUnknownError,
  type ErrorContext,
} from '../errors/index';
import { debug } from '../output/logger';
import { BUILTIN_SETTINGS } from '../presets/defaults';
import { applyOverrides, deepFreeze, freezeSettings } from '../presets/overrides';
import { normalizeExtension, resolvePattern } from '../presets/pattern-matcher';
import type { FileFilters, GlobalConfig, PartialSettings, Rule, RuleGroup, Settings } from '../presets/types';
import {
  GLOBAL_SETTINGS_SCHEMA,
  GROUP_SCHEMA,
  PRESET_DOCUMENT_SCHEMA,
  RULE_SCHEMA,
  type GlobalSettingsInput,
  type SettingsLayerInput,
} from '../schemas/preset-schemas';
import { parseWithSchema, parseYamlDocument } from './yaml-parser';

export interface PresetLoadOptions {
  // Project root; every path value must stay inside it. Defaults to cwd.
  root?: string;
  // Restrict resolution to one group, treating it as enabled
  presetGroup?: string;
  maxBytes?: number;
}

interface TopLevelGlobals {
  source: string;
  settings: GlobalSettingsInput;
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

/*
 * Maps a validated YAML settings block onto a sparse settings layer.
 * Only keys the document actually set end up in the layer.
 */
export function toPartialSettings(raw: SettingsLayerInput): PartialSettings {
  const layer: PartialSettings = {};
  if (raw.security_check !== undefined) layer.securityCheck = raw.security_check;
  if (raw.max_file_size !== undefined) layer.maxFileSize = raw.max_file_size;
  if (raw.include_dot_paths !== undefined) layer.includeHidden = raw.include_dot_paths;
  if (raw.include_binary_files !== undefined) layer.includeBinary = raw.include_binary_files;
  if (raw.remove_scraped_metadata !== undefined) layer.removeScrapedMetadata = raw.remove_scraped_metadata;
  if (raw.line_ending !== undefined) layer.lineEnding = raw.line_ending;
  if (raw.separator_style !== undefined) layer.separatorStyle = raw.separator_style;
  if (raw.include_metadata !== undefined) layer.includeMetadata = raw.include_metadata;
  if (raw.max_lines !== undefined) layer.maxLines = raw.max_lines;
  if (raw.actions !== undefined) layer.actions = [...raw.actions];
  if (raw.custom_processor !== undefined) layer.customProcessor = raw.custom_processor;
  if (raw.processor_args !== undefined) layer.processorArgs = { ...raw.processor_args };
  if (raw.strip_tags !== undefined) layer.stripTags = raw.strip_tags.map((tag) => tag.toLowerCase());
  if (raw.preserve_tags !== undefined) layer.preserveTags = raw.preserve_tags.map((tag) => tag.toLowerCase());
  return layer;
}

export class PresetLoader {
  private readonly root: string;
  private readonly maxBytes: number;
  private readonly presetGroup: string | undefined;

  constructor(options: PresetLoadOptions = {}) {
    this.root = path.resolve(options.root ?? process.cwd());
    this.maxBytes = options.maxBytes ?? MAX_PRESET_DOCUMENT_BYTES;
    this.presetGroup = options.presetGroup;
  }

  /**
   * Loads preset documents in order. A group defined again in a later
   * document replaces the earlier definition entirely and takes the later
   * document's place in load order.
   */
  load(paths: string[]): GlobalConfig {
    const groups = new Map<string, RuleGroup>();
    const topLevel: TopLevelGlobals[] = [];
    const sources: string[] = [];

    for (const presetPath of paths) {
      const source = path.resolve(this.root, presetPath);
      const document = this.readDocument(source);
      sources.push(source);

      for (const [name, value] of Object.entries(document)) {
        if (name === GLOBAL_SETTINGS_KEY) {
          const settings = parseWithSchema(GLOBAL_SETTINGS_SCHEMA, value ?? {}, 'global settings', { source });
          this.validateGlobalSettings(settings, { source });
          topLevel.push({ source, settings });
          continue;
        }
        const group = this.parseGroup(name, value, source);
        if (groups.has(name)) {
          debug(`[onebundle] Group '${name}' from ${source} replaces an earlier definition`);
          groups.delete(name);
        }
        groups.set(name, group);
      }
    }

    const ruleGroups = this.selectGroups(Array.from(groups.values()));
    // Array.prototype.sort is stable: equal priorities keep load order
    ruleGroups.sort((a, b) => b.priority - a.priority);

    return deepFreeze(this.buildConfig(ruleGroups, topLevel, sources));
  }

  private readDocument(source: string): Record<string, unknown> {
    if (!existsSync(source)) {
      throw new ConfigError('Preset file not found', { source });
    }
    const size = statSync(source).size;
    if (size > this.maxBytes) {
      throw new ConfigTooLargeError(size, this.maxBytes, { source });
    }

    let text: string;
    try {
      text = readFileSync(source, 'utf-8');
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Reading preset file');
      throw new ConfigError(`Failed to read preset file: ${err.message}`, { source });
    }

    const raw = parseYamlDocument(text, source);
    return parseWithSchema(PRESET_DOCUMENT_SCHEMA, raw, 'preset document (expected a mapping of groups)', { source });
  }

  private parseGroup(name: string, value: unknown, source: string): RuleGroup {
    const context: ErrorContext = { source, group: name };
    const raw = parseWithSchema(GROUP_SCHEMA, value ?? {}, 'preset group', context);

    const basePath = raw.base_path ? this.containedRelative(raw.base_path, context) || null : null;

    let activationCondition: string | null = null;
    let active = true;
    if (raw.enabled_if_exists) {
      activationCondition = raw.enabled_if_exists;
      const relative = this.containedRelative(raw.enabled_if_exists, context);
      active = existsSync(path.resolve(this.root, relative));
      if (!active) debug(`[onebundle] Group '${name}' inactive: ${raw.enabled_if_exists} does not exist`);
    }

    const rules: Rule[] = [];
    let defaultRule: Rule | null = null;
    for (const [ruleName, ruleValue] of Object.entries(raw.presets ?? raw.rules ?? {})) {
      const rule = this.parseRule(ruleName, ruleValue, name, basePath, source);
      if (ruleName === DEFAULT_RULE_NAME) {
        defaultRule = rule;
      } else {
        rules.push(rule);
      }
    }

    let globalDefaults: PartialSettings = {};
    let extensionSettings: Record<string, PartialSettings> = {};
    if (raw.global_settings) {
      this.validateGlobalSettings(raw.global_settings, context);
      globalDefaults = toPartialSettings(raw.global_settings);
      extensionSettings = this.buildExtensionSettings(raw.global_settings);
    }

    return {
      name,
      description: raw.description,
      enabled: raw.enabled,
      priority: raw.priority,
      basePath,
      activationCondition,
      active,
      rules,
      defaultRule,
      globalDefaults,
      extensionSettings,
      source,
      filters: raw.global_settings ? this.buildFilters(raw.global_settings) : emptyFilters(),
    };
  }

  private parseRule(name: string, value: unknown, group: string, basePath: string | null, source: string): Rule {
    const context: ErrorContext = { source, group, rule: name };
    const raw = parseWithSchema(RULE_SCHEMA, value ?? {}, 'preset rule', context);

    for (const pattern of raw.patterns) {
      this.validatePattern(pattern, basePath, context);
    }
    this.validateProcessorName(raw.custom_processor, context);

    return {
      name,
      group,
      extensions: raw.extensions.map(normalizeExtension).filter((ext) => ext !== ''),
      patterns: raw.patterns.map((pattern) =>
        path.isAbsolute(pattern) ? toPosix(path.relative(this.root, pattern)) : pattern
      ),
      overrides: toPartialSettings(raw),
    };
  }

  private validateGlobalSettings(settings: GlobalSettingsInput, context: ErrorContext): void {
    this.validateProcessorName(settings.custom_processor, context);
    for (const [ext, layer] of Object.entries(settings.extensions)) {
      this.validateProcessorName(layer.custom_processor, { ...context, rule: `extensions.${ext}` });
    }
    for (const pattern of [...settings.include_patterns, ...settings.exclude_patterns]) {
      if (pattern.startsWith('!')) {
        throw new UnsupportedPatternSyntaxError(pattern, context);
      }
    }
    for (const file of [...(settings.include_paths_file ?? []), ...(settings.exclude_paths_file ?? [])]) {
      this.containedRelative(file, context);
    }
  }

  private validatePattern(pattern: string, basePath: string | null, context: ErrorContext): void {
    if (pattern.startsWith('!')) {
      throw new UnsupportedPatternSyntaxError(pattern, context);
    }
    const resolved = path.isAbsolute(pattern) ? pattern : resolvePattern(pattern, basePath);
    this.containedRelative(resolved, context);
  }

  private validateProcessorName(name: string | null | undefined, context: ErrorContext): void {
    if (name !== undefined && name !== null && !PROCESSOR_NAME_PATTERN.test(name)) {
      throw new InvalidProcessorNameError(name, context);
    }
  }

  /*
   * Normalises a path value against the root and returns it relative to the
   * root in POSIX form. Anything that lands outside the root is rejected.
   */
  private containedRelative(value: string, context: ErrorContext): string {
    const absolute = path.resolve(this.root, value);
    const relative = path.relative(this.root, absolute);
    if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      throw new PathEscapesRootError(value, this.root, context);
    }
    return toPosix(relative);
  }

  private buildExtensionSettings(settings: GlobalSettingsInput): Record<string, PartialSettings> {
    const result: Record<string, PartialSettings> = {};
    for (const [ext, layer] of Object.entries(settings.extensions)) {
      const key = normalizeExtension(ext);
      if (key !== '') result[key] = toPartialSettings(layer);
    }
    return result;
  }

  private buildFilters(settings: GlobalSettingsInput): FileFilters {
    return {
      includePatterns: [...settings.include_patterns],
      excludePatterns: [...settings.exclude_patterns],
      includeExtensions: settings.include_extensions.map(normalizeExtension),
      excludeExtensions: settings.exclude_extensions.map(normalizeExtension),
      includePathsFiles: (settings.include_paths_file ?? []).map((file) => path.resolve(this.root, file)),
      excludePathsFiles: (settings.exclude_paths_file ?? []).map((file) => path.resolve(this.root, file)),
    };
  }

  private selectGroups(groups: RuleGroup[]): RuleGroup[] {
    if (this.presetGroup === undefined) return groups;
    const selected = groups.find((group) => group.name === this.presetGroup);
    if (!selected) {
      const available = groups.map((group) => group.name).join(', ');
      throw new ConfigError(`Preset group '${this.presetGroup}' not found. Available groups: ${available || 'none'}`);
    }
    return [{ ...selected, enabled: true }];
  }

  /*
   * Global layers apply lowest precedence first: top-level global_settings
   * blocks in document order, then group-level global_settings of live
   * groups from the lowest priority up, so the highest-priority group wins.
   */
  private buildConfig(ruleGroups: RuleGroup[], topLevel: TopLevelGlobals[], sources: string[]): GlobalConfig {
    let defaultSettings: Settings = applyOverrides(BUILTIN_SETTINGS, {});
    const perExtensionSettings: Record<string, PartialSettings> = {};
    const filterLayers: FileFilters[] = [];

    for (const { settings } of topLevel) {
      defaultSettings = applyOverrides(defaultSettings, toPartialSettings(settings));
      Object.assign(perExtensionSettings, this.buildExtensionSettings(settings));
      filterLayers.push(this.buildFilters(settings));
    }

    const ascending = ruleGroups.filter((group) => group.enabled && group.active).reverse();
    for (const group of ascending) {
      defaultSettings = applyOverrides(defaultSettings, group.globalDefaults);
      Object.assign(perExtensionSettings, group.extensionSettings);
      filterLayers.push(group.filters);
    }

    return {
      defaultSettings: freezeSettings(defaultSettings),
      perExtensionSettings,
      ruleGroups,
      filters: mergeFilters(filterLayers),
      sources,
    };
  }
}

function emptyFilters(): FileFilters {
  return {
    includePatterns: [],
    excludePatterns: [],
    includeExtensions: [],
    excludeExtensions: [],
    includePathsFiles: [],
    excludePathsFiles: [],
  };
}

function mergeFilters(layers: FileFilters[]): FileFilters {
  const merged = emptyFilters();
  const keys: Array<keyof FileFilters> = [
    'includePatterns',
    'excludePatterns',
    'includeExtensions',
    'excludeExtensions',
    'includePathsFiles',
    'excludePathsFiles',
  ];
  for (const key of keys) {
    merged[key] = Array.from(new Set(layers.flatMap((layer) => layer[key])));
  }
  return merged;
}

export function emptyGlobalConfig(): GlobalConfig {
  return deepFreeze({
    defaultSettings: BUILTIN_SETTINGS,
    perExtensionSettings: {},
    ruleGroups: [],
    filters: emptyFilters(),
    sources: [],
  });
}

/**
 * Load preset documents (in order) into an immutable GlobalConfig.
 */
export function loadPresets(paths: string[], options: PresetLoadOptions = {}): GlobalConfig {
  return new PresetLoader(options).load(paths);
}
