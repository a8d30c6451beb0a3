import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import path from 'path';
import { tmpdir } from 'os';
import { BundleWriter, checksum, type BundledFile } from '../src/output/bundle-writer.js';
import { LineEnding, SeparatorStyle, type PartialSettings } from '../src/presets/types.js';
import { settingsWith } from './utils.js';

const RULE = '='.repeat(88);

function bundled(settings: PartialSettings, content = 'line1\nline2', filePath = 'src/a.ts'): BundledFile {
    return {
        path: filePath,
        extension: path.extname(filePath),
        sizeBytes: 12,
        modified: new Date('2024-01-02T03:04:05Z'),
        content,
        settings: settingsWith(settings),
    };
}

describe('BundleWriter', () => {
    const writer = new BundleWriter({ idFactory: () => 'id-1' });
    const sha = checksum('line1\nline2');

    it('computes a SHA-256 hex digest', () => {
        expect(sha).toMatch(/^[0-9a-f]{64}$/);
    });

    it('renders the Standard separator with and without metadata', () => {
        expect(writer.renderFile(bundled({ separatorStyle: SeparatorStyle.Standard }))).toBe(
            `======= src/a.ts | CHECKSUM_SHA256: ${sha} ======\nline1\nline2`
        );
        expect(writer.renderFile(bundled({ separatorStyle: SeparatorStyle.Standard, includeMetadata: false }))).toBe(
            '======= src/a.ts ======\nline1\nline2'
        );
    });

    it('renders content only with None', () => {
        expect(writer.renderFile(bundled({ separatorStyle: SeparatorStyle.None }))).toBe('line1\nline2');
    });

    it('uses the file\'s line ending throughout', () => {
        const file = bundled({ includeMetadata: false, lineEnding: LineEnding.CRLF });
        expect(writer.renderFile(file)).toBe('======= src/a.ts ======\r\nline1\r\nline2');
    });

    it('renders the Detailed separator', () => {
        expect(writer.renderFile(bundled({ separatorStyle: SeparatorStyle.Detailed, includeMetadata: false }))).toBe(
            `${RULE}\n== FILE: src/a.ts\n${RULE}\nline1\nline2`
        );
    });

    it('renders the Markdown separator with a fenced block', () => {
        expect(writer.renderFile(bundled({ separatorStyle: SeparatorStyle.Markdown }))).toBe(
            '## src/a.ts\n' +
                `**Date Modified:** 2024-01-02 03:04:05 | **Size:** 12 B | **Type:** .ts | **Checksum (SHA256):** ${sha}\n` +
                '\n```ts\nline1\nline2\n```'
        );
    });

    it('renders MachineReadable blocks', () => {
        const file = bundled({ separatorStyle: SeparatorStyle.MachineReadable, includeMetadata: false });
        expect(writer.renderFile(file)).toBe(
            [
                '--- ONEBUNDLE_BEGIN_FILE_METADATA_BLOCK_id-1 ---',
                'METADATA_JSON:',
                '{',
                '    "original_filepath": "src/a.ts",',
                '    "original_filename": "a.ts"',
                '}',
                '--- ONEBUNDLE_END_FILE_METADATA_BLOCK_id-1 ---',
                '--- ONEBUNDLE_BEGIN_FILE_CONTENT_BLOCK_id-1 ---',
                'line1',
                'line2',
                '--- ONEBUNDLE_END_FILE_CONTENT_BLOCK_id-1 ---',
            ].join('\n')
        );
    });

    it('separates files by a blank line', () => {
        const none = { separatorStyle: SeparatorStyle.None };
        expect(writer.render([bundled(none, 'a'), bundled(none, 'b')])).toBe('a\n\nb\n');
    });

    describe('write', () => {
        let tempDir: string;

        beforeEach(() => {
            tempDir = mkdtempSync(path.join(tmpdir(), 'bundle-test-'));
        });

        afterEach(() => {
            rmSync(tempDir, { recursive: true, force: true });
        });

        it('creates missing directories', () => {
            const output = path.join(tempDir, 'out', 'bundle.txt');
            writer.write(output, [bundled({ separatorStyle: SeparatorStyle.None }, 'hello')]);
            expect(readFileSync(output, 'utf-8')).toBe('hello\n');
        });
    });
});
