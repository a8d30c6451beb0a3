import { describe, it, expect } from 'vitest';
import stripAnsi from 'strip-ansi';
import type { BundleRunResult } from '../src/cli/types.js';
import { formatBundleSummary, formatPresetGroups, formatResolution } from '../src/output/reporter.js';
import { resolveSettings } from '../src/presets/settings-resolver.js';
import { makeConfig, makeFile, makeGroup, makeRule } from './utils.js';

const plain = (lines: string[]) => lines.map((line) => stripAnsi(line));

function summary(fields: Partial<BundleRunResult>): BundleRunResult {
    return { outcomes: [], bundled: [], totalFiles: 0, skipped: 0, failed: 0, warnings: 0, ...fields };
}

describe('formatPresetGroups', () => {
    it('lists groups with their rules', () => {
        const config = makeConfig([
            makeGroup('web', {
                priority: 10,
                description: 'Web assets',
                rules: [makeRule('js', 'web', { extensions: ['.js'] })],
                defaultRule: makeRule('default', 'web'),
            }),
            makeGroup('old', { enabled: false }),
        ]);

        expect(plain(formatPresetGroups(config))).toEqual([
            'web  enabled    priority 10  Web assets',
            '  js: .js',
            '  default: (fallback)',
            'old  disabled   priority 0',
        ]);
    });

    it('says so when nothing is loaded', () => {
        expect(formatPresetGroups(makeConfig([]))).toEqual(['No preset groups loaded.']);
    });
});

describe('formatResolution', () => {
    it('shows the matched rule and final values', () => {
        const config = makeConfig([
            makeGroup('web', { rules: [makeRule('js', 'web', { extensions: ['.js'], overrides: { maxLines: 50 } })] }),
        ]);
        const lines = plain(formatResolution('app.js', resolveSettings(makeFile('app.js'), config)));

        expect(lines[0]).toBe('app.js');
        expect(lines[1]).toBe('  rule: web/js');
        expect(lines).toContain(`  ${'maxLines'.padEnd(22)} 50`);
        expect(lines).toContain(`  ${'customProcessor'.padEnd(22)} none`);
    });

    it('lists tried rules when traced', () => {
        const config = makeConfig([
            makeGroup('web', {
                rules: [
                    makeRule('css', 'web', { extensions: ['.css'] }),
                    makeRule('js', 'web', { extensions: ['.js'] }),
                ],
            }),
        ]);
        const lines = plain(formatResolution('app.js', resolveSettings(makeFile('app.js'), config, {}, { trace: true })));

        expect(lines.slice(1, 3)).toEqual(['  · web/css', '  ✓ web/js']);
    });
});

describe('formatBundleSummary', () => {
    it('summarises counts', () => {
        const result = summary({ skipped: 1, warnings: 1, bundled: [] });
        expect(stripAnsi(formatBundleSummary(result, 'out.txt', 2048))).toBe(
            '✓ Bundled 0 files into out.txt (2.00 KB), 1 skipped, 1 warning'
        );
    });
});
