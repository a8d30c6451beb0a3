import fg from 'fast-glob';
import { existsSync } from 'fs';
import { homedir } from 'os';
import * as path from 'path';
import { GLOBAL_PRESET_FILENAME, USER_CONFIG_DIRNAME, USER_PRESETS_DIRNAME } from '../config/constants';

export interface PresetDiscoveryOptions {
  // Preset files named on the command line, in order
  projectPresets: string[];
  includeUserPresets?: boolean;
  env?: NodeJS.ProcessEnv;
}

export function userConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME && env.XDG_CONFIG_HOME.trim() !== '' ? env.XDG_CONFIG_HOME : homedir();
  return path.join(base, USER_CONFIG_DIRNAME);
}

/*
 * Orders preset documents lowest precedence first: the global file, then
 * user presets (sorted by name), then the project's own. Later documents
 * redefine groups of earlier ones.
 */
export function discoverPresetFiles(options: PresetDiscoveryOptions): string[] {
  const files: string[] = [];

  if (options.includeUserPresets ?? true) {
    const configDir = userConfigDir(options.env);
    const globalFile = path.join(configDir, GLOBAL_PRESET_FILENAME);
    if (existsSync(globalFile)) files.push(globalFile);

    const presetsDir = path.join(configDir, USER_PRESETS_DIRNAME);
    if (existsSync(presetsDir)) {
      const userFiles = fg.sync('*.{yml,yaml}', { cwd: presetsDir, onlyFiles: true, absolute: true });
      files.push(...userFiles.sort());
    }
  }

  for (const preset of options.projectPresets) {
    const absolute = path.resolve(preset);
    if (!files.includes(absolute)) files.push(absolute);
  }
  return files;
}
