import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import path from 'path';
import { tmpdir } from 'os';
import { discoverPresetFiles, userConfigDir } from '../src/boundaries/preset-discovery.js';
import { loadConfig } from '../src/boundaries/config-loader.js';
import { BUILTIN_SETTINGS } from '../src/presets/defaults.js';

describe('preset discovery', () => {
    let configHome: string;
    let projectDir: string;
    let env: NodeJS.ProcessEnv;

    beforeEach(() => {
        configHome = mkdtempSync(path.join(tmpdir(), 'discovery-home-'));
        projectDir = mkdtempSync(path.join(tmpdir(), 'discovery-project-'));
        env = { XDG_CONFIG_HOME: configHome };
    });

    afterEach(() => {
        rmSync(configHome, { recursive: true, force: true });
        rmSync(projectDir, { recursive: true, force: true });
    });

    it('places the user config directory under XDG_CONFIG_HOME', () => {
        expect(userConfigDir(env)).toBe(path.join(configHome, '.onebundle'));
    });

    it('orders the global file, user presets, then project presets', () => {
        const userDir = path.join(configHome, '.onebundle');
        mkdirSync(path.join(userDir, 'presets'), { recursive: true });
        writeFileSync(path.join(userDir, 'global-presets.yml'), '{}\n');
        writeFileSync(path.join(userDir, 'presets', 'b.yml'), '{}\n');
        writeFileSync(path.join(userDir, 'presets', 'a.yaml'), '{}\n');
        writeFileSync(path.join(userDir, 'presets', 'notes.txt'), 'not a preset\n');
        const project = path.join(projectDir, 'presets.yml');

        expect(discoverPresetFiles({ projectPresets: [project], env })).toEqual([
            path.join(userDir, 'global-presets.yml'),
            path.join(userDir, 'presets', 'a.yaml'),
            path.join(userDir, 'presets', 'b.yml'),
            project,
        ]);
        expect(discoverPresetFiles({ projectPresets: [project], includeUserPresets: false, env })).toEqual([project]);
    });

    it('loads only built-in defaults when presets are disabled', () => {
        const config = loadConfig({ sourceDir: projectDir, presets: [], includeUserPresets: true, disablePresets: true, env });
        expect(config.ruleGroups).toEqual([]);
        expect(config.defaultSettings).toEqual(BUILTIN_SETTINGS);
    });
});
