import { BUILTIN_SETTINGS } from '../src/presets/defaults.js';
import { applyOverrides } from '../src/presets/overrides.js';
import type { FileEntry, GlobalConfig, PartialSettings, Rule, RuleGroup, Settings } from '../src/presets/types.js';

export function makeFile(filePath: string, overrides: Partial<FileEntry> = {}): FileEntry {
    const name = filePath.split('/').pop() ?? filePath;
    const dot = name.lastIndexOf('.');
    const extension = dot > 0 ? name.slice(dot).toLowerCase() : dot === 0 ? name.toLowerCase() : '';
    return {
        path: filePath,
        extension,
        sizeBytes: 100,
        isHidden: filePath.split('/').some((segment) => segment.startsWith('.')),
        isBinary: false,
        ...overrides,
    };
}

export function makeRule(name: string, group: string, fields: Partial<Omit<Rule, 'name' | 'group'>> = {}): Rule {
    return {
        name,
        group,
        extensions: fields.extensions ?? [],
        patterns: fields.patterns ?? [],
        overrides: fields.overrides ?? {},
    };
}

export function makeGroup(name: string, fields: Partial<Omit<RuleGroup, 'name'>> = {}): RuleGroup {
    return {
        name,
        description: '',
        enabled: true,
        priority: 0,
        basePath: null,
        activationCondition: null,
        active: true,
        rules: [],
        defaultRule: null,
        globalDefaults: {},
        extensionSettings: {},
        filters: {
            includePatterns: [],
            excludePatterns: [],
            includeExtensions: [],
            excludeExtensions: [],
            includePathsFiles: [],
            excludePathsFiles: [],
        },
        source: 'test.yml',
        ...fields,
    };
}

/*
 * Builds a config the way the loader would: groups sorted by priority
 * (stable), globals folded onto the built-in defaults.
 */
export function makeConfig(
    groups: RuleGroup[],
    globals: PartialSettings = {},
    perExtensionSettings: Record<string, PartialSettings> = {}
): GlobalConfig {
    const defaultSettings: Settings = applyOverrides(BUILTIN_SETTINGS, globals);
    return {
        defaultSettings,
        perExtensionSettings,
        ruleGroups: [...groups].sort((a, b) => b.priority - a.priority),
        filters: makeGroup('filters').filters,
        sources: [],
    };
}

export function settingsWith(overrides: PartialSettings = {}): Settings {
    return applyOverrides(BUILTIN_SETTINGS, overrides);
}
