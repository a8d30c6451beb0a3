import * as path from 'path';
import { debug } from '../output/logger';
import type { GlobalConfig } from '../presets/types';
import { discoverPresetFiles } from './preset-discovery';
import { emptyGlobalConfig, loadPresets } from './preset-loader';

export interface ConfigLoadRequest {
  // Project root; preset paths must stay inside it
  sourceDir: string;
  presets: string[];
  presetGroup?: string;
  includeUserPresets: boolean;
  disablePresets?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * Discover and load every preset document that applies to a run.
 */
export function loadConfig(request: ConfigLoadRequest): GlobalConfig {
  if (request.disablePresets) {
    debug('[onebundle] Presets disabled; using built-in defaults');
    return emptyGlobalConfig();
  }

  const files = discoverPresetFiles({
    projectPresets: request.presets,
    includeUserPresets: request.includeUserPresets,
    ...(request.env ? { env: request.env } : {}),
  });
  debug(`[onebundle] Preset documents: ${files.length > 0 ? files.join(', ') : 'none'}`);

  return loadPresets(files, {
    root: path.resolve(request.sourceDir),
    ...(request.presetGroup !== undefined ? { presetGroup: request.presetGroup } : {}),
  });
}
