import type { PartialSettings, Settings } from './types';

export const SETTINGS_KEYS: ReadonlyArray<keyof Settings> = [
  'securityCheck',
  'maxFileSize',
  'includeHidden',
  'includeBinary',
  'removeScrapedMetadata',
  'lineEnding',
  'separatorStyle',
  'includeMetadata',
  'maxLines',
  'actions',
  'customProcessor',
  'processorArgs',
  'stripTags',
  'preserveTags',
];

function pick<K extends keyof Settings>(key: K, base: Readonly<Settings>, layer: PartialSettings): Settings[K] {
  const value: Settings[K] | undefined = layer[key];
  return value === undefined ? base[key] : value;
}

/*
 * Applies one sparse layer on top of a complete record. Present fields win,
 * list and map fields are replaced wholesale (never concatenated).
 */
export function applyOverrides(base: Readonly<Settings>, layer: PartialSettings): Settings {
  return {
    securityCheck: pick('securityCheck', base, layer),
    maxFileSize: pick('maxFileSize', base, layer),
    includeHidden: pick('includeHidden', base, layer),
    includeBinary: pick('includeBinary', base, layer),
    removeScrapedMetadata: pick('removeScrapedMetadata', base, layer),
    lineEnding: pick('lineEnding', base, layer),
    separatorStyle: pick('separatorStyle', base, layer),
    includeMetadata: pick('includeMetadata', base, layer),
    maxLines: pick('maxLines', base, layer),
    actions: [...pick('actions', base, layer)],
    customProcessor: pick('customProcessor', base, layer),
    processorArgs: { ...pick('processorArgs', base, layer) },
    stripTags: [...pick('stripTags', base, layer)],
    preserveTags: [...pick('preserveTags', base, layer)],
  };
}

/*
 * Field names a layer actually sets, in canonical order. Used for traces.
 */
export function presentFields(layer: PartialSettings): Array<keyof Settings> {
  return SETTINGS_KEYS.filter((key) => layer[key] !== undefined);
}

export function freezeSettings(settings: Settings): Readonly<Settings> {
  Object.freeze(settings.actions);
  Object.freeze(settings.processorArgs);
  Object.freeze(settings.stripTags);
  Object.freeze(settings.preserveTags);
  return Object.freeze(settings);
}

/*
 * Recursively freezes a plain data tree. Used once on the loaded configuration.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
