import { describe, it, expect } from 'vitest';
import { formatFileSize, parseFileSize } from '../src/utils/file-size.js';

describe('parseFileSize', () => {
    it('parses units with a 1024 base', () => {
        expect(parseFileSize('500KB')).toBe(512000);
        expect(parseFileSize('1.5 MB')).toBe(1572864);
        expect(parseFileSize('2048')).toBe(2048);
        expect(parseFileSize('10mb')).toBe(10485760);
    });

    it('returns null for anything else', () => {
        expect(parseFileSize('lots')).toBeNull();
        expect(parseFileSize('-5KB')).toBeNull();
    });
});

describe('formatFileSize', () => {
    it('picks a readable unit', () => {
        expect(formatFileSize(512)).toBe('512 B');
        expect(formatFileSize(1536)).toBe('1.50 KB');
        expect(formatFileSize(3 * 1024 * 1024)).toBe('3.00 MB');
    });
});
