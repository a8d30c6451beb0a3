/**
 * Configuration constants
 */

export const MAX_PRESET_DOCUMENT_BYTES = 10 * 1024 * 1024;

export const PROCESSOR_NAME_PATTERN = /^[A-Za-z0-9_]+$/;

// Top-level preset document key that holds global defaults instead of a group
export const GLOBAL_SETTINGS_KEY = 'global_settings';

// Rule name that acts as a group's fallback for otherwise unmatched files
export const DEFAULT_RULE_NAME = 'default';

export const USER_CONFIG_DIRNAME = '.onebundle';
export const GLOBAL_PRESET_FILENAME = 'global-presets.yml';
export const USER_PRESETS_DIRNAME = 'presets';

export const DEFAULT_OUTPUT_FILENAME = 'bundle.txt';

export const DEFAULT_EXCLUDED_DIRS = [
  'node_modules',
  '.git',
  '.svn',
  '.hg',
  '__pycache__',
  '.venv',
  'dist',
  'build',
  '.next',
  '.cache',
];

// Bytes inspected when sniffing a file for binary content
export const BINARY_SNIFF_BYTES = 8192;

export const DEFAULT_CONCURRENCY = 8;
