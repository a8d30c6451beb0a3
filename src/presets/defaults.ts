import { freezeSettings } from './overrides';
import { LineEnding, SecurityCheckMode, SeparatorStyle, type Settings } from './types';

export const BUILTIN_SETTINGS: Readonly<Settings> = freezeSettings({
  securityCheck: SecurityCheckMode.Warn,
  maxFileSize: null,
  includeHidden: false,
  includeBinary: false,
  removeScrapedMetadata: false,
  lineEnding: LineEnding.LF,
  separatorStyle: SeparatorStyle.Standard,
  includeMetadata: true,
  maxLines: null,
  actions: [],
  customProcessor: null,
  processorArgs: {},
  stripTags: [],
  preserveTags: [],
});
