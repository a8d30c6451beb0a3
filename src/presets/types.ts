export enum SecurityCheckMode {
  Error = 'error',
  Warn = 'warn',
  Skip = 'skip',
}

export enum SeparatorStyle {
  Standard = 'Standard',
  Detailed = 'Detailed',
  Markdown = 'Markdown',
  MachineReadable = 'MachineReadable',
  None = 'None',
}

export enum LineEnding {
  LF = 'lf',
  CRLF = 'crlf',
}

export enum ActionName {
  None = 'none',
  Minify = 'minify',
  StripTags = 'strip_tags',
  StripComments = 'strip_comments',
  CompressWhitespace = 'compress_whitespace',
  RemoveEmptyLines = 'remove_empty_lines',
  JoinParagraphs = 'join_paragraphs',
  Custom = 'custom',
}

/*
 * Effective settings for one file. Every field is always populated;
 * `null` means "no limit" or "not configured", never "unset".
 */
export interface Settings {
  securityCheck: SecurityCheckMode;
  maxFileSize: number | null;
  includeHidden: boolean;
  includeBinary: boolean;
  removeScrapedMetadata: boolean;
  lineEnding: LineEnding;
  separatorStyle: SeparatorStyle;
  includeMetadata: boolean;
  maxLines: number | null;
  actions: ActionName[];
  customProcessor: string | null;
  processorArgs: Record<string, unknown>;
  stripTags: string[];
  preserveTags: string[];
}

/*
 * A sparse layer of settings. A key that is absent does not take part in
 * resolution; a key that is present replaces the lower layer's value.
 */
export type PartialSettings = Partial<Settings>;

export interface Rule {
  name: string;
  group: string;
  extensions: string[];
  patterns: string[];
  overrides: PartialSettings;
}

export interface RuleGroup {
  name: string;
  description: string;
  enabled: boolean;
  priority: number;
  basePath: string | null;
  activationCondition: string | null;
  // Result of evaluating activationCondition once at load time
  active: boolean;
  rules: Rule[];
  defaultRule: Rule | null;
  globalDefaults: PartialSettings;
  extensionSettings: Record<string, PartialSettings>;
  filters: FileFilters;
  source: string;
}

/*
 * Traversal filters collected from global_settings. The core never applies
 * them; they are handed to the file-list producer.
 */
export interface FileFilters {
  includePatterns: string[];
  excludePatterns: string[];
  includeExtensions: string[];
  excludeExtensions: string[];
  includePathsFiles: string[];
  excludePathsFiles: string[];
}

export interface GlobalConfig {
  defaultSettings: Settings;
  perExtensionSettings: Record<string, PartialSettings>;
  // Sorted by priority descending, load order breaking ties
  ruleGroups: RuleGroup[];
  filters: FileFilters;
  sources: string[];
}

export interface FileEntry {
  // Relative to the project root, POSIX separators
  path: string;
  extension: string;
  sizeBytes: number;
  isHidden: boolean;
  isBinary: boolean;
}

export type CliOverrides = PartialSettings;

export type LayerKind = 'builtin' | 'global' | 'extension' | 'rule' | 'default-rule' | 'cli';

export interface TraceLayer {
  kind: LayerKind;
  label: string;
  fields: Array<keyof Settings>;
}

export interface CandidateCheck {
  group: string;
  rule: string;
  matched: boolean;
}

export interface ResolutionTrace {
  file: string;
  layers: TraceLayer[];
  candidates: CandidateCheck[];
}

export interface RuleMatch {
  group: string;
  rule: string;
  fallback: boolean;
}

export interface Resolution {
  settings: Readonly<Settings>;
  match: RuleMatch | null;
  trace?: ResolutionTrace;
}
